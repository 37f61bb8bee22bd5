/**
 * Generation parameters forwarded to the completion provider.
 */
export interface GenerationSettings {
  maxTokens: number;
  n: number;
  temperature: number;
  topP: number;
  frequencyPenalty: number;
  presencePenalty: number;
  stop?: string | string[];
  /** Sent as a leading system message when present */
  systemPrompt?: string;
  /** When false the world phase is skipped and the world buffer is left as it is */
  includeWorldProcessing: boolean;
}

/**
 * One dispatched function call, kept for history and persistence.
 */
export interface FunctionLogEntry {
  tick: number;
  capabilityName: string;
  actionName: string;
  parameters: Record<string, unknown>;
  ok: boolean;
  timestamp: string; // ISO 8601
}

/**
 * Serializable view of the agent state handed to the persistence sink.
 */
export interface AgentContextSnapshot {
  sessionHandle: string;
  worldContext: string[];
  taskContext: string[];
  executionContext: string[];
  functionLog: FunctionLogEntry[];
  tickCount: number;
  savedAt: string; // ISO 8601
}
