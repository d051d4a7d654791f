// ConversationState: append-only transcript owned by one orchestrator

import type {
  AssistantMessage,
  CapabilityCallRequest,
  Message,
  SystemMessage,
  ToolMessage,
  UserMessage,
} from "./types";
import { ConversationStateError } from "./types";

export function generateId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * Ordered transcript. The system message is fixed at creation and always
 * first; everything after it is only ever appended.
 */
export class ConversationState {
  private entries: Message[];
  // call id -> resolved?
  private calls = new Map<string, boolean>();

  constructor(readonly systemPrompt: string) {
    this.entries = [this.systemMessage()];
  }

  get messages(): readonly Message[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  last(): Message {
    return this.entries[this.entries.length - 1];
  }

  appendUser(content: string): UserMessage {
    const message: UserMessage = {
      id: generateId(),
      role: "user",
      content,
      timestamp: Date.now(),
    };
    this.entries.push(message);
    return message;
  }

  appendAssistant(content: string, calls: readonly CapabilityCallRequest[] = []): AssistantMessage {
    if (content.length === 0 && calls.length === 0) {
      throw new ConversationStateError("Assistant message must carry content or capability calls");
    }

    const seen = new Set<string>();
    for (const call of calls) {
      if (seen.has(call.id) || this.calls.has(call.id)) {
        throw new ConversationStateError(`Duplicate capability call id "${call.id}"`);
      }
      seen.add(call.id);
    }

    const message: AssistantMessage = {
      id: generateId(),
      role: "assistant",
      content,
      calls: [...calls],
      timestamp: Date.now(),
    };
    this.entries.push(message);
    for (const call of calls) this.calls.set(call.id, false);
    return message;
  }

  appendToolResult(call: Pick<CapabilityCallRequest, "id" | "name">, content: string): ToolMessage {
    const resolved = this.calls.get(call.id);
    if (resolved === undefined) {
      throw new ConversationStateError(`No capability call with id "${call.id}" was requested`);
    }
    if (resolved) {
      throw new ConversationStateError(`Capability call "${call.id}" already has a result`);
    }

    const message: ToolMessage = {
      id: generateId(),
      role: "tool",
      callId: call.id,
      name: call.name,
      content,
      timestamp: Date.now(),
    };
    this.entries.push(message);
    this.calls.set(call.id, true);
    return message;
  }

  /** Whether any assistant message so far requested a call with this id. */
  hasCall(id: string): boolean {
    return this.calls.has(id);
  }

  /** Call ids requested by the model that have no tool message yet. */
  unresolvedCallIds(): string[] {
    return [...this.calls].filter(([, resolved]) => !resolved).map(([id]) => id);
  }

  /** Start a fresh transcript with the same system prompt. */
  reset(): void {
    this.entries = [this.systemMessage()];
    this.calls.clear();
  }

  private systemMessage(): SystemMessage {
    return {
      id: generateId(),
      role: "system",
      content: this.systemPrompt,
      timestamp: Date.now(),
    };
  }
}
