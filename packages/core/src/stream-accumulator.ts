// StreamAccumulator: folds streamed fragments into one candidate assistant message
//
// Text deltas are concatenated. Call fragments are merged by index: the
// first fragment carrying an id or name fixes it, argument text is appended.

import type { CapabilityCallRequest, CompletionFragment, Logger } from "./types";
import { generateId } from "./conversation";

export interface CandidateMessage {
  readonly content: string;
  readonly calls: CapabilityCallRequest[];
}

interface PartialCall {
  id: string;
  name: string;
  arguments: string;
}

export class StreamAccumulator {
  private content = "";
  private partials = new Map<number, PartialCall>();

  constructor(private readonly logger?: Logger) {}

  get text(): string {
    return this.content;
  }

  get isEmpty(): boolean {
    return this.content.length === 0 && this.partials.size === 0;
  }

  push(fragment: CompletionFragment): void {
    if (fragment.type === "text") {
      this.content += fragment.text;
      return;
    }

    const existing = this.partials.get(fragment.index);
    if (!existing) {
      this.partials.set(fragment.index, {
        id: fragment.id ?? "",
        name: fragment.name ?? "",
        arguments: fragment.arguments ?? "",
      });
      return;
    }

    if (!existing.id && fragment.id) existing.id = fragment.id;
    if (!existing.name && fragment.name) existing.name = fragment.name;
    if (fragment.arguments) existing.arguments += fragment.arguments;
  }

  build(): CandidateMessage {
    const calls: CapabilityCallRequest[] = [];
    const usedIds = new Set<string>();
    const indices = [...this.partials.keys()].sort((a, b) => a - b);

    for (const index of indices) {
      const partial = this.partials.get(index);
      if (!partial) continue;

      if (!partial.name) {
        this.logger?.warn("Dropping capability call without a name", { index, callId: partial.id });
        continue;
      }

      const id = partial.id && !usedIds.has(partial.id) ? partial.id : `call_${generateId()}`;
      usedIds.add(id);
      calls.push({
        id,
        name: partial.name,
        arguments: partial.arguments,
      });
    }

    return { content: this.content, calls };
  }
}
