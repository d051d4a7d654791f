// Message types: the transcript the model sees as its context

import type { CapabilityCallRequest } from "./capability";

interface BaseMessage {
  readonly id: string;
  readonly timestamp: number;
}

export interface SystemMessage extends BaseMessage {
  readonly role: "system";
  readonly content: string;
}

export interface UserMessage extends BaseMessage {
  readonly role: "user";
  readonly content: string;
}

/**
 * Either final natural-language content, or a non-empty list of capability
 * calls (optionally with accompanying text). Never both empty.
 */
export interface AssistantMessage extends BaseMessage {
  readonly role: "assistant";
  readonly content: string;
  readonly calls: readonly CapabilityCallRequest[];
}

/** Result of one capability call, correlated by call id. */
export interface ToolMessage extends BaseMessage {
  readonly role: "tool";
  readonly callId: string;
  readonly name: string;
  readonly content: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type MessageRole = Message["role"];
