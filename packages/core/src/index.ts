// @toolrelay/core: conversation orchestration with capability calling
// Re-exports all types, interfaces, and core logic

// Types
export * from "./types";

// Events
export {
  type ToolrelayEvents,
  type ToolrelayEventName,
  type EventListener,
  type EventBus,
  SimpleEventBus,
} from "./events";

// Conversation state
export { ConversationState, generateId } from "./conversation";

// Stream accumulation
export { type CandidateMessage, StreamAccumulator } from "./stream-accumulator";

// Capability catalog
export {
  type DuplicateNamePolicy,
  type CatalogOptions,
  type CatalogEntry,
  type CatalogRefreshOutcome,
  CapabilityCatalog,
  normalizeParameterSchema,
  normalizeDescriptor,
} from "./capability-catalog";

// Capability arguments
export { parseCapabilityArguments, validateArguments } from "./capability-arguments";

// Capability dispatcher
export {
  type DispatcherOptions,
  type DispatchOptions,
  type DispatchError,
  DEFAULT_MAX_RESULT_CHARS,
  CapabilityDispatcher,
  renderCapabilityResult,
} from "./capability-dispatcher";

// Sessions
export { SessionRegistry } from "./session-registry";
export { type CapabilityHandler, LocalCapabilitySession } from "./local-session";

// Orchestrator
export {
  type OrchestratorState,
  type TurnEvent,
  type OrchestratorDeps,
  type TurnOptions,
  DEFAULT_MAX_ROUNDS,
  DEFAULT_IDENTITY_PARAM,
  Orchestrator,
} from "./orchestrator";

// Version
export { CORE_VERSION } from "./version";
