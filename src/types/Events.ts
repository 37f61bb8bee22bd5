import type { RuntimeErrorKind } from "../core/errors.js";

/**
 * Event types emitted by the tick engine and completion gateway.
 */
export type TickEventType =
  | "TICK_STARTED"
  | "PHASE_COMPLETED"
  | "COMPLETION_RETRY"
  | "PROVIDER_FAILOVER"
  | "FUNCTION_CALL_INVALID"
  | "FUNCTION_DISPATCHED"
  | "TICK_COMPLETED"
  | "TICK_FAILED";

export type TickPhase = "world" | "task" | "execution";

/**
 * Base event structure for all tick events.
 */
export interface TickEvent {
  type: TickEventType;
  timestamp: string; // ISO 8601
  sessionHandle: string;
  /** 1-based number of the tick the event belongs to */
  tick: number;
}

export interface TickStartedEvent extends TickEvent {
  type: "TICK_STARTED";
  phases: TickPhase[];
}

export interface PhaseCompletedEvent extends TickEvent {
  type: "PHASE_COMPLETED";
  phase: TickPhase;
  items: number;
  durationMs: number;
}

export interface CompletionRetryEvent extends TickEvent {
  type: "COMPLETION_RETRY";
  provider: string;
  attempt: number;
  reason: string;
}

export interface ProviderFailoverEvent extends TickEvent {
  type: "PROVIDER_FAILOVER";
  from: string;
  to: string;
  backupIndex: number;
  reason: string;
}

/**
 * Emitted for every rejected function-call payload, before it is regenerated.
 */
export interface FunctionCallInvalidEvent extends TickEvent {
  type: "FUNCTION_CALL_INVALID";
  item: string;
  attempt: number;
  maxAttempts: number;
  reason: string;
  payloadSummary: string;
}

export interface FunctionDispatchedEvent extends TickEvent {
  type: "FUNCTION_DISPATCHED";
  capabilityName: string;
  actionName: string;
  argsSummary: string;
  durationMs: number;
}

export interface TickCompletedEvent extends TickEvent {
  type: "TICK_COMPLETED";
  dispatched: number;
  durationMs: number;
}

export interface TickFailedEvent extends TickEvent {
  type: "TICK_FAILED";
  phase: TickPhase;
  kind: RuntimeErrorKind | "UNKNOWN";
  message: string;
}

/**
 * Union type of all tick events.
 */
export type AnyTickEvent =
  | TickStartedEvent
  | PhaseCompletedEvent
  | CompletionRetryEvent
  | ProviderFailoverEvent
  | FunctionCallInvalidEvent
  | FunctionDispatchedEvent
  | TickCompletedEvent
  | TickFailedEvent;
