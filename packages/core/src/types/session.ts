// Capability session: one live connection to a provider process

import type { CapabilityResult, RawCapabilityDescriptor } from "./capability";
import type { JsonObject } from "./json";

export interface SessionCallOptions {
  readonly signal?: AbortSignal;
}

export interface CapabilitySession {
  /** Stable name, unique within a registry. */
  readonly name: string;

  /** List advertised capabilities. May reject; the catalog skips the session. */
  listCapabilities(options?: SessionCallOptions): Promise<RawCapabilityDescriptor[]>;

  /**
   * Invoke a capability. Rejecting means the session declined or failed the
   * call before running it (including "not found"); resolving means it ran.
   */
  invoke(name: string, args: JsonObject, options?: SessionCallOptions): Promise<CapabilityResult>;

  close?(): Promise<void>;
}
