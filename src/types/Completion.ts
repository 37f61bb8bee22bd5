import type { GenerationSettings } from "./AgentContext.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
  settings: GenerationSettings;
}

export interface CompletionChoice {
  index: number;
  message: { role: "assistant"; content: string };
  finishReason?: string;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Provider-independent completion. Lives for one call.
 */
export interface CompletionResult {
  id?: string;
  /** Base URL of the provider that answered */
  provider: string;
  model: string;
  choices: CompletionChoice[];
  usage?: CompletionUsage;
}

/**
 * Where a completion is sent: primary or backup.
 */
export interface ProviderConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
}
