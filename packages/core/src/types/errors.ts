// Error types and Result monad for explicit error handling

export type Result<T, E = ToolrelayError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export class ToolrelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ToolrelayError";
  }
}

export interface SessionFailure {
  readonly session: string;
  readonly error: unknown;
}

/** One or more sessions could not list their capabilities. Never fatal. */
export class CatalogRefreshPartialFailure extends ToolrelayError {
  constructor(public readonly failures: readonly SessionFailure[]) {
    super(
      `Failed to list capabilities from ${failures.length} session(s): ${failures
        .map((f) => `${f.session} (${describeError(f.error)})`)
        .join(", ")}`,
      "CATALOG_PARTIAL_FAILURE",
    );
    this.name = "CatalogRefreshPartialFailure";
  }
}

export class CapabilityArgumentParseError extends ToolrelayError {
  constructor(
    public readonly capability: string,
    public readonly callId: string,
    cause?: unknown,
  ) {
    super(
      `Malformed arguments for "${capability}" (call ${callId}): ${describeError(cause)}`,
      "CAPABILITY_ARGUMENT_PARSE",
      cause,
    );
    this.name = "CapabilityArgumentParseError";
  }
}

export class CapabilityArgumentValidationError extends ToolrelayError {
  constructor(
    public readonly capability: string,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid arguments for "${capability}": ${issues.join("; ")}`, "CAPABILITY_ARGUMENT_INVALID");
    this.name = "CapabilityArgumentValidationError";
  }
}

export class CapabilityNotFound extends ToolrelayError {
  constructor(
    public readonly capability: string,
    public readonly attempts: readonly SessionFailure[] = [],
  ) {
    super(`capability "${capability}" not found in any connected provider`, "CAPABILITY_NOT_FOUND");
    this.name = "CapabilityNotFound";
  }
}

export class CapabilityExecutionError extends ToolrelayError {
  constructor(
    message: string,
    public readonly capability: string,
    public readonly session: string,
    cause?: unknown,
  ) {
    super(message, "CAPABILITY_EXECUTION", cause);
    this.name = "CapabilityExecutionError";
  }
}

export class StreamTransportError extends ToolrelayError {
  constructor(message: string, cause?: unknown) {
    super(message, "STREAM_TRANSPORT", cause);
    this.name = "StreamTransportError";
  }
}

export class TurnCancelledError extends ToolrelayError {
  constructor(message = "Turn cancelled", cause?: unknown) {
    super(message, "TURN_CANCELLED", cause);
    this.name = "TurnCancelledError";
  }
}

export class TurnLimitExceededError extends ToolrelayError {
  constructor(public readonly maxRounds: number) {
    super(`Reached maximum capability-call rounds (${maxRounds}) without a final answer`, "TURN_LIMIT_EXCEEDED");
    this.name = "TurnLimitExceededError";
  }
}

export class EmptyCompletionError extends ToolrelayError {
  constructor() {
    super("Completion stream ended without content or capability calls", "EMPTY_COMPLETION");
    this.name = "EmptyCompletionError";
  }
}

export class DuplicateCapabilityError extends ToolrelayError {
  constructor(
    public readonly capability: string,
    public readonly sessions: readonly string[],
  ) {
    super(
      `Capability "${capability}" is advertised by more than one provider: ${sessions.join(", ")}`,
      "DUPLICATE_CAPABILITY",
    );
    this.name = "DuplicateCapabilityError";
  }
}

export class ConversationStateError extends ToolrelayError {
  constructor(message: string) {
    super(message, "CONVERSATION_STATE");
    this.name = "ConversationStateError";
  }
}

/** A session or capability name is registered twice. */
export class RegistrationError extends ToolrelayError {
  constructor(message: string) {
    super(message, "DUPLICATE_REGISTRATION");
    this.name = "RegistrationError";
  }
}

export class ConfigError extends ToolrelayError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
