/**
 * Transport for OpenAI-compatible chat completions endpoints.
 * One instance per provider; the gateway decides when to retry or switch.
 */

import type { ChatMessage, ProviderConfig } from "../types/Completion.js";
import { ProviderResponseError, TransportError } from "../core/errors.js";

/**
 * Request body sent to `<baseUrl>/chat/completions`.
 */
export interface ChatCompletionBody {
  messages: ChatMessage[];
  model: string;
  max_tokens: number;
  n: number;
  temperature: number;
  top_p: number;
  frequency_penalty: number;
  presence_penalty: number;
  stop?: string | string[];
}

export interface ChatCompletionOptions {
  /** Request timeout in milliseconds. Default 30000. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Environment variable holding the API key for a provider host.
 */
export function apiKeyEnvVar(baseUrl: string): string {
  if (baseUrl.includes("openai.com")) return "OPENAI_API_KEY";
  if (baseUrl.includes("anthropic")) return "ANTHROPIC_API_KEY";
  if (baseUrl.includes("groq.com")) return "GROQ_API_KEY";
  if (baseUrl.includes("x.ai")) return "GROK_API_KEY";
  return "API_KEY";
}

export function resolveApiKey(
  baseUrl: string,
  apiKey: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  return apiKey ?? env[apiKeyEnvVar(baseUrl)];
}

export function chatCompletionsUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  return trimmed.endsWith("/chat/completions") ? trimmed : `${trimmed}/chat/completions`;
}

export class OpenAICompatibleClient {
  readonly baseUrl: string;
  readonly model: string;
  readonly url: string;
  private readonly apiKey?: string;

  constructor(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.model = config.model;
    this.url = chatCompletionsUrl(this.baseUrl);
    this.apiKey = resolveApiKey(this.baseUrl, config.apiKey, env);
  }

  /**
   * POST a chat completion and return the parsed JSON body.
   * Throws TransportError on network failure or timeout and
   * ProviderResponseError on a non-2xx status.
   */
  async createChatCompletion(
    body: Omit<ChatCompletionBody, "model">,
    options: ChatCompletionOptions = {},
  ): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    let response: Response;
    let text: string;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify({ ...body, model: this.model }),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new TransportError(this.url, `Request to ${this.url} timed out after ${timeoutMs}ms`, err);
      }
      throw new TransportError(
        this.url,
        `Request to ${this.url} failed: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw new ProviderResponseError(this.url, response.status, text);
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new ProviderResponseError(this.url, response.status, `Unparseable body: ${text.slice(0, 200)}`);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;
    return headers;
  }
}
