// === Types ===
export type {
  GenerationSettings,
  FunctionLogEntry,
  AgentContextSnapshot,
  FunctionCall,
  FunctionCallParseResult,
  ChatMessage,
  CompletionRequest,
  CompletionChoice,
  CompletionUsage,
  CompletionResult,
  ProviderConfig,
  Capability,
  CapabilityHandle,
  CapabilityRegistration,
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
} from "./types/index.js";

// === Core ===
export {
  RuntimeError,
  TransportError,
  ProviderResponseError,
  CompletionError,
  ProtocolError,
  DispatchError,
  StateError,
  ConfigError,
  isRuntimeError,
  describeError,
} from "./core/errors.js";
export type { RuntimeErrorKind } from "./core/errors.js";
export { withRetry, isRetryable } from "./core/Retry.js";
export type { RetryOptions } from "./core/Retry.js";

// === Context ===
export {
  ContextStore,
  WORLD_CONTEXT_LABEL,
  TASK_CONTEXT_LABEL,
  EXECUTION_CONTEXT_LABEL,
} from "./context/ContextStore.js";
export type { ContextStoreInit } from "./context/ContextStore.js";
export {
  GenerationSettingsSchema,
  DEFAULT_GENERATION_SETTINGS,
  resolveGenerationSettings,
} from "./context/GenerationSettings.js";
export type { GenerationSettingsInput } from "./context/GenerationSettings.js";

// === Protocol ===
export {
  FUNCTION_CALL_SHAPE,
  parseFunctionCall,
  isValidFunctionCall,
  formatFunctionCall,
} from "./protocol/FunctionCallProtocol.js";

// === Registry & capabilities ===
export { CapabilityRegistry } from "./registry/CapabilityRegistry.js";
export type { CapabilityRegistryOptions } from "./registry/CapabilityRegistry.js";
export { defineCapability, action } from "./capabilities/defineCapability.js";
export type { ActionDefinition } from "./capabilities/defineCapability.js";
export { builtinCapabilities } from "./capabilities/builtin.js";
export type { BuiltinCapabilityOptions } from "./capabilities/builtin.js";
export { createLogCapability, defaultLogFilename } from "./capabilities/LogCapability.js";
export type { LogCapabilityOptions } from "./capabilities/LogCapability.js";
export { createMarkdownFileCapability } from "./capabilities/MarkdownFileCapability.js";
export type { MarkdownFileCapabilityOptions } from "./capabilities/MarkdownFileCapability.js";
export { createSearchCapability } from "./capabilities/SearchCapability.js";
export type { SearchCapabilityOptions } from "./capabilities/SearchCapability.js";
export { createEmailCapability } from "./capabilities/EmailCapability.js";
export type { EmailCapabilityOptions } from "./capabilities/EmailCapability.js";
export { createSmsCapability } from "./capabilities/SmsCapability.js";
export type { SmsCapabilityOptions, SmsClient } from "./capabilities/SmsCapability.js";

// === Completion ===
export {
  OpenAICompatibleClient,
  apiKeyEnvVar,
  resolveApiKey,
  chatCompletionsUrl,
} from "./llm/OpenAICompatibleClient.js";
export type { ChatCompletionBody, ChatCompletionOptions } from "./llm/OpenAICompatibleClient.js";
export {
  FailoverCompletionGateway,
  buildRequestBody,
  normalizeCompletion,
  triggersFailover,
} from "./llm/CompletionGateway.js";
export type {
  CompletionGateway,
  CompletionObserver,
  FailoverCompletionGatewayConfig,
} from "./llm/CompletionGateway.js";

// === Engine ===
export { TickEngine } from "./engine/TickEngine.js";
export type { TickEngineOptions, TickResult, DispatchOutcome } from "./engine/TickEngine.js";
export {
  WORLD_TICK_PROMPT,
  TASK_TICK_PROMPT,
  EXECUTION_TICK_PROMPT,
  DEFAULT_SYSTEM_PROMPT,
} from "./engine/prompts.js";

// === Agent ===
export { Agent } from "./agent/Agent.js";
export type { AgentOptions } from "./agent/Agent.js";
export { AgentSupervisor } from "./agent/AgentSupervisor.js";
export type {
  AgentSupervisorOptions,
  SupervisorState,
  SupervisorStatus,
  Tickable,
} from "./agent/AgentSupervisor.js";

// === Persistence ===
export {
  InMemoryPersistenceSink,
  FilePersistenceSink,
  AgentContextSnapshotSchema,
} from "./persistence/PersistenceSink.js";
export type { PersistenceSink } from "./persistence/PersistenceSink.js";

// === Config ===
export {
  DEFAULT_CONFIG_FILE,
  AgentConfigSchema,
  parseAgentConfig,
  loadAgentConfig,
  capabilityOptionsFromConfig,
  createAgentFromConfig,
} from "./config/AgentConfig.js";
export type {
  AgentConfig,
  AgentConfigInput,
  AgentConfigLoadResult,
  AgentAssembly,
} from "./config/AgentConfig.js";

// === Observability ===
export { EventLog } from "./observability/EventLog.js";
export type { LogEntry, EventListener } from "./observability/EventLog.js";
export { Metrics } from "./observability/Metrics.js";
export type { CounterValue, HistogramValue } from "./observability/Metrics.js";
export {
  createLogger,
  consoleWriter,
  stderrWriter,
  sanitizeForLog,
  summarizeForLog,
} from "./observability/Logger.js";
export type { Logger, LoggerOptions, LogLevel, LogWriter } from "./observability/Logger.js";
