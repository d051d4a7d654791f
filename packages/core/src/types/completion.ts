// Streaming completion client contract

import type { CapabilityDescriptor } from "./capability";
import type { Message } from "./message";

/**
 * One incremental piece of a streamed model response.
 * - "text": a content delta
 * - "call": a partial capability call, merged with others of the same index
 */
export type CompletionFragment =
  | { readonly type: "text"; readonly text: string }
  | {
      readonly type: "call";
      readonly index: number;
      readonly id?: string;
      readonly name?: string;
      readonly arguments?: string;
    };

export interface CompletionOptions {
  readonly signal?: AbortSignal;
  /**
   * Whether the model may request several calls to run concurrently.
   * The orchestrator always sends false: calls run strictly in order.
   */
  readonly parallelCalls: boolean;
}

/**
 * Sends the transcript and catalog to the model and yields fragments.
 * Transport failures surface as a rejection from the iterator.
 */
export interface CompletionClient {
  readonly name: string;
  stream(
    messages: readonly Message[],
    capabilities: readonly CapabilityDescriptor[],
    options: CompletionOptions,
  ): AsyncIterable<CompletionFragment>;
}
