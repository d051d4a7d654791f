// Orchestrator: the conversation loop with capability calling
//
// Flow: user utterance → stream completion → if capability calls,
//   execute them one by one → append results → stream again → repeat
//   until the model answers without calls (or maxRounds is hit).
//
// States: idle → awaiting_completion ⇄ executing_capabilities → done | failed

import type { CatalogRefreshOutcome, DuplicateNamePolicy } from "./capability-catalog";
import { CapabilityCatalog } from "./capability-catalog";
import { CapabilityDispatcher } from "./capability-dispatcher";
import { parseCapabilityArguments } from "./capability-arguments";
import { ConversationState, generateId } from "./conversation";
import type { EventBus } from "./events";
import { SessionRegistry } from "./session-registry";
import { StreamAccumulator, type CandidateMessage } from "./stream-accumulator";
import type {
  AssistantMessage,
  CapabilityArgumentParseError,
  CapabilityCallRequest,
  CapabilitySession,
  CompletionClient,
  JsonObject,
  Logger,
} from "./types";
import {
  ConversationStateError,
  EmptyCompletionError,
  StreamTransportError,
  ToolrelayError,
  TurnCancelledError,
  TurnLimitExceededError,
  describeError,
} from "./types";

export type OrchestratorState =
  | "idle"
  | "awaiting_completion"
  | "executing_capabilities"
  | "done"
  | "failed";

/**
 * Rendering events yielded by Orchestrator.submitUtterance().
 * Presentation-agnostic: the caller decides how to display them.
 */
export type TurnEvent =
  | { readonly type: "assistant_text_delta"; readonly text: string }
  | {
      readonly type: "capability_call_started";
      readonly callId: string;
      readonly name: string;
      readonly arguments: JsonObject;
    }
  | {
      readonly type: "capability_call_finished";
      readonly callId: string;
      readonly name: string;
      readonly result: string;
      readonly error?: ToolrelayError;
    }
  | {
      readonly type: "capability_call_skipped";
      readonly callId: string;
      readonly name: string;
      readonly error: CapabilityArgumentParseError;
    }
  | { readonly type: "turn_complete"; readonly message: AssistantMessage; readonly rounds: number }
  | { readonly type: "turn_failed"; readonly reason: string; readonly error: ToolrelayError };

export interface OrchestratorDeps {
  readonly completion: CompletionClient;
  readonly logger: Logger;
  readonly systemPrompt: string;
  readonly sessions?: readonly CapabilitySession[];
  readonly eventBus?: EventBus;
  readonly conversationId?: string;
  readonly identity?: {
    readonly paramName?: string;
    readonly userId?: string | null;
  };
  readonly duplicateNames?: DuplicateNamePolicy;
  readonly callTimeoutMs?: number | null;
  readonly maxResultChars?: number;
  readonly maxRounds?: number;
}

export interface TurnOptions {
  readonly signal?: AbortSignal;
}

interface TurnContext {
  readonly turnId: string;
  readonly startTime: number;
  readonly log: Logger;
}

export const DEFAULT_MAX_ROUNDS = 30;
export const DEFAULT_IDENTITY_PARAM = "uid";

function toTurnError(error: unknown, signal?: AbortSignal): ToolrelayError {
  if (error instanceof ToolrelayError) return error;
  if (signal?.aborted) return new TurnCancelledError("Turn cancelled", error);
  return new ToolrelayError(describeError(error), "INTERNAL", error);
}

/**
 * One orchestrator per conversation. Owns the transcript, the session
 * registry and the catalog; nothing here is process-wide.
 */
export class Orchestrator {
  readonly conversationId: string;
  readonly conversation: ConversationState;
  readonly sessions: SessionRegistry;
  readonly catalog: CapabilityCatalog;

  private readonly dispatcher: CapabilityDispatcher;
  private readonly logger: Logger;
  private readonly maxRounds: number;
  private _state: OrchestratorState = "idle";
  private _lastError: ToolrelayError | null = null;
  private active = false;

  constructor(private readonly deps: OrchestratorDeps) {
    this.conversationId = deps.conversationId ?? generateId();
    this.logger = deps.logger.child({ component: "Orchestrator", conversationId: this.conversationId });
    this.maxRounds = deps.maxRounds ?? DEFAULT_MAX_ROUNDS;

    const reservedParam = deps.identity?.paramName ?? DEFAULT_IDENTITY_PARAM;

    this.conversation = new ConversationState(deps.systemPrompt);
    this.sessions = new SessionRegistry(deps.logger);
    for (const session of deps.sessions ?? []) this.sessions.add(session);

    this.catalog = new CapabilityCatalog({
      reservedParam,
      duplicateNames: deps.duplicateNames,
      logger: deps.logger,
    });
    this.dispatcher = new CapabilityDispatcher({
      registry: this.sessions,
      catalog: this.catalog,
      logger: deps.logger,
      reservedParam,
      userId: deps.identity?.userId ?? null,
      timeoutMs: deps.callTimeoutMs ?? null,
      maxResultChars: deps.maxResultChars,
    });
  }

  get state(): OrchestratorState {
    return this._state;
  }

  /** The error that ended the most recent failed turn, if any. */
  get lastError(): ToolrelayError | null {
    return this._lastError;
  }

  get isTurnActive(): boolean {
    return this.active;
  }

  addSession(session: CapabilitySession): void {
    this.assertIdle("add a session");
    this.sessions.add(session);
  }

  /** Rebuild the catalog from every registered session. */
  async refreshCatalog(options?: TurnOptions): Promise<CatalogRefreshOutcome> {
    this.assertIdle("refresh the catalog");
    const outcome = await this.catalog.refresh(this.sessions.list(), options);

    if (outcome.failure) {
      this.logger.warn("Catalog refreshed with failures", { error: outcome.failure.message });
    }
    this.deps.eventBus?.emit("catalog:refreshed", {
      capabilities: outcome.descriptors.length,
      failedSessions: outcome.failure?.failures.map((f) => f.session) ?? [],
    });
    return outcome;
  }

  /** Discard the transcript and start over with the same system prompt. */
  resetConversation(): void {
    this.assertIdle("reset the conversation");
    this.conversation.reset();
    this._state = "idle";
    this._lastError = null;
  }

  async close(): Promise<void> {
    await this.sessions.closeAll();
  }

  /**
   * Run one turn for a user utterance, yielding rendering events until the
   * model produces a final answer or the turn fails. A blank utterance is
   * ignored. Failures end the stream with a turn_failed event.
   */
  async *submitUtterance(text: string, options?: TurnOptions): AsyncGenerator<TurnEvent> {
    if (this.active) {
      throw new ConversationStateError("A turn is already in progress for this conversation");
    }
    if (text.trim().length === 0) return;

    const turnId = generateId();
    const turn: TurnContext = { turnId, startTime: Date.now(), log: this.logger.child({ turnId }) };

    this.active = true;
    try {
      yield* this.runTurn(text, turn, options?.signal);
    } finally {
      this.active = false;
      if (this._state === "awaiting_completion" || this._state === "executing_capabilities") {
        // Consumer stopped iterating mid-turn.
        this.failTurn(turn, new TurnCancelledError("Turn abandoned before completion"));
      }
    }
  }

  private async *runTurn(text: string, turn: TurnContext, signal?: AbortSignal): AsyncGenerator<TurnEvent> {
    const { turnId, startTime, log } = turn;

    this._lastError = null;
    this.transition("idle");
    this.conversation.appendUser(text);
    this.deps.eventBus?.emit("turn:started", { conversationId: this.conversationId, turnId, utterance: text });

    let round = 0;
    try {
      for (;;) {
        if (round >= this.maxRounds) throw new TurnLimitExceededError(this.maxRounds);
        round++;

        this.transition("awaiting_completion");
        const candidate = yield* this.streamCompletion(signal);

        // ── No capability calls → final answer ──
        if (candidate.calls.length === 0) {
          const message = this.conversation.appendAssistant(candidate.content);
          this.transition("done");
          log.info("Turn complete", { rounds: round, durationMs: Date.now() - startTime });
          this.deps.eventBus?.emit("turn:completed", {
            conversationId: this.conversationId,
            turnId,
            message,
            rounds: round,
            durationMs: Date.now() - startTime,
          });
          yield { type: "turn_complete", message, rounds: round };
          return;
        }

        // ── Capability calls → append, execute in order, loop ──
        const calls = this.withUnusedCallIds(candidate.calls, log);
        this.conversation.appendAssistant(candidate.content, calls);
        this.transition("executing_capabilities");
        yield* this.executeCalls(calls, log.child({ round }), signal);

        log.debug("Capability round complete, continuing", { round, calls: calls.length });
      }
    } catch (error) {
      const failure = toTurnError(error, signal);
      this.failTurn(turn, failure, round);
      yield { type: "turn_failed", reason: failure.message, error: failure };
    }
  }

  private failTurn(turn: TurnContext, failure: ToolrelayError, round?: number): void {
    this._lastError = failure;
    this.transition("failed");
    turn.log.error("Turn failed", { round, code: failure.code, error: failure.message });
    this.deps.eventBus?.emit("turn:failed", {
      conversationId: this.conversationId,
      turnId: turn.turnId,
      error: failure,
      durationMs: Date.now() - turn.startTime,
    });
  }

  /**
   * Models may reuse call ids across rounds (e.g. "call_0" every time).
   * Ids already present in the transcript get a fresh one.
   */
  private withUnusedCallIds(calls: readonly CapabilityCallRequest[], log: Logger): CapabilityCallRequest[] {
    return calls.map((call) => {
      if (!this.conversation.hasCall(call.id)) return call;
      const id = `call_${generateId()}`;
      log.debug("Reassigned reused capability call id", { callId: call.id, newId: id });
      return { ...call, id };
    });
  }

  private async *streamCompletion(signal?: AbortSignal): AsyncGenerator<TurnEvent, CandidateMessage> {
    if (signal?.aborted) throw new TurnCancelledError("Turn cancelled", signal.reason);

    const accumulator = new StreamAccumulator(this.logger);
    try {
      const stream = this.deps.completion.stream(this.conversation.messages, this.catalog.descriptors, {
        signal,
        parallelCalls: false,
      });
      for await (const fragment of stream) {
        if (signal?.aborted) throw new TurnCancelledError("Turn cancelled", signal.reason);
        accumulator.push(fragment);
        if (fragment.type === "text" && fragment.text.length > 0) {
          yield { type: "assistant_text_delta", text: fragment.text };
        }
      }
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      if (signal?.aborted) throw new TurnCancelledError("Turn cancelled", error);
      throw new StreamTransportError(`Completion stream failed: ${describeError(error)}`, error);
    }

    // A client may end its stream quietly when the signal fires.
    if (signal?.aborted) throw new TurnCancelledError("Turn cancelled", signal.reason);

    const candidate = accumulator.build();
    if (candidate.content.length === 0 && candidate.calls.length === 0) {
      throw new EmptyCompletionError();
    }
    return candidate;
  }

  private async *executeCalls(
    calls: readonly CapabilityCallRequest[],
    log: Logger,
    signal?: AbortSignal,
  ): AsyncGenerator<TurnEvent> {
    for (const call of calls) {
      if (signal?.aborted) throw new TurnCancelledError("Turn cancelled", signal.reason);

      const parsed = parseCapabilityArguments(call);
      if (!parsed.ok) {
        // Left unresolved: no tool message for this call id.
        log.warn("Skipping capability call with malformed arguments", {
          capability: call.name,
          callId: call.id,
          error: parsed.error.message,
        });
        yield { type: "capability_call_skipped", callId: call.id, name: call.name, error: parsed.error };
        continue;
      }

      log.info("Executing capability", { capability: call.name, callId: call.id });
      yield { type: "capability_call_started", callId: call.id, name: call.name, arguments: parsed.value };
      this.deps.eventBus?.emit("capability:calling", { conversationId: this.conversationId, call });

      const startTime = Date.now();
      const outcome = await this.dispatcher.dispatch(call.name, parsed.value, { signal });
      const content = outcome.ok ? outcome.value : `Error: ${outcome.error.message}`;

      this.conversation.appendToolResult(call, content);
      this.deps.eventBus?.emit("capability:result", {
        conversationId: this.conversationId,
        call,
        content,
        isError: !outcome.ok,
        durationMs: Date.now() - startTime,
      });

      if (outcome.ok) {
        yield { type: "capability_call_finished", callId: call.id, name: call.name, result: content };
      } else {
        log.warn("Capability call failed", {
          capability: call.name,
          callId: call.id,
          code: outcome.error.code,
          error: outcome.error.message,
        });
        yield {
          type: "capability_call_finished",
          callId: call.id,
          name: call.name,
          result: content,
          error: outcome.error,
        };
      }
    }
  }

  private transition(next: OrchestratorState): void {
    if (this._state === next) return;
    this.logger.debug("State transition", { from: this._state, to: next });
    this._state = next;
  }

  private assertIdle(action: string): void {
    if (this.active) {
      throw new ConversationStateError(`Cannot ${action} while a turn is in progress`);
    }
  }
}
