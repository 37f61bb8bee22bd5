export type {
  GenerationSettings,
  FunctionLogEntry,
  AgentContextSnapshot,
} from "./AgentContext.js";

export type { FunctionCall, FunctionCallParseResult } from "./FunctionCall.js";

export type {
  ChatMessage,
  CompletionRequest,
  CompletionChoice,
  CompletionUsage,
  CompletionResult,
  ProviderConfig,
} from "./Completion.js";

export type {
  Capability,
  CapabilityHandle,
  CapabilityRegistration,
} from "./Capability.js";

export type {
  TickEventType,
  TickPhase,
  TickEvent,
  TickStartedEvent,
  PhaseCompletedEvent,
  CompletionRetryEvent,
  ProviderFailoverEvent,
  FunctionCallInvalidEvent,
  FunctionDispatchedEvent,
  TickCompletedEvent,
  TickFailedEvent,
  AnyTickEvent,
} from "./Events.js";
