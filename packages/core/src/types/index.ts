// Barrel export: the public type surface of @toolrelay/core

export type {
  Message,
  MessageRole,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
} from "./message";

export type {
  CapabilityDescriptor,
  RawCapabilityDescriptor,
  CapabilityCallRequest,
  CapabilityContent,
  CapabilityResult,
  ObjectSchema,
} from "./capability";

export type { JsonPrimitive, JsonValue, JsonObject } from "./json";
export { isJsonObject, toJsonValue } from "./json";

export type {
  CompletionClient,
  CompletionFragment,
  CompletionOptions,
} from "./completion";

export type { CapabilitySession, SessionCallOptions } from "./session";

export type { Logger, LogLevel } from "./logger";
export { ConsoleLogger, LOG_LEVELS, isLogLevel } from "./logger";

export {
  ToolrelayError,
  CatalogRefreshPartialFailure,
  CapabilityArgumentParseError,
  CapabilityArgumentValidationError,
  CapabilityNotFound,
  CapabilityExecutionError,
  StreamTransportError,
  TurnCancelledError,
  TurnLimitExceededError,
  EmptyCompletionError,
  DuplicateCapabilityError,
  ConversationStateError,
  RegistrationError,
  ConfigError,
  describeError,
  ok,
  err,
} from "./errors";
export type { Result, SessionFailure } from "./errors";
