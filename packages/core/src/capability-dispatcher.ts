// CapabilityDispatcher: routes a capability call to the session that accepts it
//
// Candidates are the sessions the catalog indexed for the name, then every
// other registered session, each group in registration order. The first
// session whose invoke resolves wins. A session that advertised the name
// only receives arguments that fit the schema it advertised.

import { validateArguments } from "./capability-arguments";
import type { CapabilityCatalog } from "./capability-catalog";
import type { SessionRegistry } from "./session-registry";
import type {
  CapabilityResult,
  CapabilitySession,
  JsonObject,
  Logger,
  Result,
  SessionFailure,
} from "./types";
import {
  CapabilityArgumentValidationError,
  CapabilityExecutionError,
  CapabilityNotFound,
  TurnCancelledError,
  describeError,
  err,
  ok,
} from "./types";

export const DEFAULT_MAX_RESULT_CHARS = 50_000;
const EMPTY_RESULT_TEXT = "Tool executed successfully";

export interface DispatcherOptions {
  readonly registry: SessionRegistry;
  readonly catalog: CapabilityCatalog;
  readonly logger: Logger;
  /** Name of the user-identity parameter injected into every call. */
  readonly reservedParam: string;
  /** Value injected under reservedParam. Null or empty disables injection. */
  readonly userId?: string | null;
  /** Default per-call deadline; a dispatch may override it. */
  readonly timeoutMs?: number | null;
  readonly maxResultChars?: number;
}

export interface DispatchOptions {
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number | null;
}

export type DispatchError = CapabilityNotFound | CapabilityExecutionError | CapabilityArgumentValidationError;

type Attempt =
  | { readonly kind: "completed"; readonly result: CapabilityResult }
  | { readonly kind: "declined"; readonly error: unknown }
  | { readonly kind: "timed_out"; readonly timeoutMs: number };

/**
 * Flatten a capability result into the single string a tool message carries.
 */
export function renderCapabilityResult(
  result: CapabilityResult,
  maxChars: number = DEFAULT_MAX_RESULT_CHARS,
): string {
  const parts = result.content.map((part) => {
    switch (part.type) {
      case "text":
        return part.text;
      case "resource":
        return part.text ?? JSON.stringify({ uri: part.uri });
      case "image":
        return JSON.stringify({ type: "image", mimeType: part.mimeType, bytes: part.data.length });
      case "json":
        return JSON.stringify(part.value);
    }
  });

  let text = parts.length > 0 ? parts.join("\n") : EMPTY_RESULT_TEXT;
  if (text.length > maxChars) {
    text = text.slice(0, maxChars) + "\n[truncated]";
  }
  return text;
}

export class CapabilityDispatcher {
  private readonly logger: Logger;
  private readonly maxResultChars: number;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger.child({ component: "CapabilityDispatcher" });
    this.maxResultChars = options.maxResultChars ?? DEFAULT_MAX_RESULT_CHARS;
  }

  /**
   * Execute a capability by name. Never rejects for capability failures:
   * those come back as a Result error. Rejects only with TurnCancelledError
   * when the caller's signal fires.
   */
  async dispatch(
    name: string,
    args?: JsonObject,
    options?: DispatchOptions,
  ): Promise<Result<string, DispatchError>> {
    const signal = options?.signal;
    const timeoutMs = options?.timeoutMs !== undefined ? options.timeoutMs : this.options.timeoutMs ?? null;
    const payload = this.injectIdentity(args);
    const declined: SessionFailure[] = [];
    let invalid: CapabilityArgumentValidationError | undefined;

    for (const session of this.candidates(name)) {
      if (signal?.aborted) throw new TurnCancelledError("Dispatch cancelled", signal.reason);

      const descriptor = this.options.catalog.find(name, session.name);
      const issues = descriptor ? validateArguments(args ?? {}, descriptor.parameters) : [];
      if (issues.length > 0) {
        this.logger.debug("Arguments do not fit session schema, skipping", {
          capability: name,
          session: session.name,
          issues,
        });
        const error = new CapabilityArgumentValidationError(name, issues);
        if (!invalid) invalid = error;
        declined.push({ session: session.name, error });
        continue;
      }

      const attempt = await this.attempt(session, name, payload, signal, timeoutMs);

      if (attempt.kind === "completed") {
        const text = renderCapabilityResult(attempt.result, this.maxResultChars);
        if (attempt.result.isError) {
          this.logger.warn("Capability reported an error", { capability: name, session: session.name });
          return err(new CapabilityExecutionError(text, name, session.name));
        }
        this.logger.debug("Capability executed", {
          capability: name,
          session: session.name,
          contentLength: text.length,
        });
        return ok(text);
      }

      if (attempt.kind === "timed_out") {
        this.logger.warn("Capability call timed out", {
          capability: name,
          session: session.name,
          timeoutMs: attempt.timeoutMs,
        });
        return err(
          new CapabilityExecutionError(
            `capability "${name}" timed out after ${attempt.timeoutMs} ms`,
            name,
            session.name,
          ),
        );
      }

      this.logger.debug("Session declined capability call", {
        capability: name,
        session: session.name,
        error: describeError(attempt.error),
      });
      declined.push({ session: session.name, error: attempt.error });
    }

    return err(invalid ?? new CapabilityNotFound(name, declined));
  }

  private candidates(name: string): CapabilitySession[] {
    const { registry, catalog } = this.options;
    const indexed = catalog
      .sessionsFor(name)
      .map((sessionName) => registry.get(sessionName))
      .filter((s): s is CapabilitySession => s !== undefined);
    const rest = registry.list().filter((s) => !indexed.includes(s));
    return [...indexed, ...rest];
  }

  private injectIdentity(args?: JsonObject): JsonObject {
    const payload: JsonObject = { ...(args ?? {}) };
    const { reservedParam, userId } = this.options;
    if (userId) payload[reservedParam] = userId;
    return payload;
  }

  private async attempt(
    session: CapabilitySession,
    name: string,
    args: JsonObject,
    signal: AbortSignal | undefined,
    timeoutMs: number | null,
  ): Promise<Attempt> {
    const controller = new AbortController();
    let timedOut = false;

    const relay = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", relay, { once: true });

    const timer =
      timeoutMs != null
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeoutMs)
        : undefined;

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });

    try {
      const result = await Promise.race([
        session.invoke(name, args, { signal: controller.signal }),
        aborted,
      ]);
      return { kind: "completed", result };
    } catch (error) {
      if (timedOut && timeoutMs != null) return { kind: "timed_out", timeoutMs };
      if (signal?.aborted) throw new TurnCancelledError("Dispatch cancelled", error);
      return { kind: "declined", error };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", relay);
    }
  }
}
