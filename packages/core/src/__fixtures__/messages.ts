// Test fixture: fragment builders and transcript helpers

import type { CompletionFragment, Message, ToolMessage } from "../types";

export function text(value: string): CompletionFragment {
  return { type: "text", text: value };
}

/** A complete call in one fragment. */
export function call(index: number, id: string, name: string, args: unknown = {}): CompletionFragment {
  return { type: "call", index, id, name, arguments: JSON.stringify(args) };
}

/** A call streamed as several fragments: header first, then argument pieces. */
export function splitCall(index: number, id: string, name: string, argumentPieces: string[]): CompletionFragment[] {
  return [
    { type: "call", index, id, name },
    ...argumentPieces.map((piece): CompletionFragment => ({ type: "call", index, arguments: piece })),
  ];
}

export function toolMessages(messages: readonly Message[]): ToolMessage[] {
  return messages.filter((m): m is ToolMessage => m.role === "tool");
}

export function roles(messages: readonly Message[]): string[] {
  return messages.map((m) => m.role);
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}
