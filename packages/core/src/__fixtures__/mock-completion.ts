// Test fixture: completion client that replays scripted rounds of fragments

import type {
  CapabilityDescriptor,
  CompletionClient,
  CompletionFragment,
  CompletionOptions,
  Message,
} from "../types";

/** One scripted round: fragments to yield, optionally followed by a failure. */
export interface ScriptedRound {
  readonly fragments: readonly CompletionFragment[];
  readonly failWith?: Error;
}

export interface RecordedRequest {
  readonly messages: Message[];
  readonly capabilities: CapabilityDescriptor[];
  readonly options: CompletionOptions;
}

export class MockCompletionClient implements CompletionClient {
  readonly name = "mock";
  public requests: RecordedRequest[] = [];
  /** Called at the start of every request, before any fragment is yielded. */
  public onRequest?: (request: RecordedRequest) => void;

  constructor(private rounds: ScriptedRound[] = []) {}

  async *stream(
    messages: readonly Message[],
    capabilities: readonly CapabilityDescriptor[],
    options: CompletionOptions,
  ): AsyncIterable<CompletionFragment> {
    const request: RecordedRequest = { messages: [...messages], capabilities: [...capabilities], options };
    this.requests.push(request);
    this.onRequest?.(request);

    const round = this.rounds.shift();
    if (!round) throw new Error("MockCompletionClient: no scripted round left");

    for (const fragment of round.fragments) {
      if (options.signal?.aborted) return;
      yield fragment;
    }
    if (round.failWith) throw round.failWith;
  }

  /** Queue more rounds. */
  script(...rounds: ScriptedRound[]): void {
    this.rounds.push(...rounds);
  }

  get remaining(): number {
    return this.rounds.length;
  }
}
