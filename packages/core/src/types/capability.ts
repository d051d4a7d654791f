// Capability system types -- descriptors, call requests, results

import type { JsonObject, JsonValue } from "./json";

/**
 * Normalized parameter schema. Always an "object" schema with a
 * properties map; any other JSON Schema keywords pass through untouched.
 */
export interface ObjectSchema {
  type: "object";
  properties: JsonObject;
  required?: string[];
  [keyword: string]: JsonValue | undefined;
}

/**
 * A capability as advertised to the model, after normalization.
 */
export interface CapabilityDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: ObjectSchema;
}

/**
 * A capability as a provider reports it. The schema is untrusted and may be
 * missing or malformed.
 */
export interface RawCapabilityDescriptor {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema?: unknown;
}

/**
 * A capability invocation requested by the model. `arguments` is the raw
 * JSON text exactly as streamed; it is parsed only when the call executes.
 */
export interface CapabilityCallRequest {
  readonly id: string;
  readonly name: string;
  readonly arguments: string;
}

export type CapabilityContent =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "image"; readonly mimeType: string; readonly data: string }
  | { readonly type: "resource"; readonly uri: string; readonly text?: string }
  | { readonly type: "json"; readonly value: unknown };

/**
 * What a session returns from a successful invoke. `isError` means the
 * provider accepted the call but the capability itself failed.
 */
export interface CapabilityResult {
  readonly content: readonly CapabilityContent[];
  readonly isError?: boolean;
}
