import { z } from "zod";
import type {
  ChatMessage,
  CompletionRequest,
  CompletionResult,
  ProviderConfig,
} from "../types/Completion.js";
import { OpenAICompatibleClient, resolveApiKey } from "./OpenAICompatibleClient.js";
import type { ChatCompletionBody } from "./OpenAICompatibleClient.js";
import {
  CompletionError,
  ProviderResponseError,
  TransportError,
  describeError,
} from "../core/errors.js";
import { withRetry } from "../core/Retry.js";
import { createLogger } from "../observability/Logger.js";
import type { Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";

/**
 * Hooks a caller can pass to observe intermediate failures of one completion.
 */
export interface CompletionObserver {
  onRetry?(info: { provider: string; attempt: number; reason: string }): void;
  onFailover?(info: { from: string; to: string; backupIndex: number; reason: string }): void;
}

/**
 * Anything that turns a prompt into a completion. The tick engine only sees this.
 */
export interface CompletionGateway {
  complete(request: CompletionRequest, observer?: CompletionObserver): Promise<CompletionResult>;
}

export interface FailoverCompletionGatewayConfig {
  primary: ProviderConfig;
  /** Tried in order after a qualifying primary failure */
  backupProviders?: ProviderConfig[];
  /** Attempts per provider, first try included (default: 3) */
  maxRetries?: number;
  /** How many backups are tried automatically (default: 1, only index 0) */
  failoverDepth?: number;
  /** Total HTTP requests allowed per complete() call across all providers */
  requestBudget?: number;
  /** Deadline per HTTP request in ms (default: 30000) */
  timeoutMs?: number;
  /** Backoff base between attempts in ms (default: 500) */
  baseDelayMs?: number;
  logger?: Logger;
  metrics?: Metrics;
  env?: NodeJS.ProcessEnv;
}

const RawCompletionSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().int().optional(),
        message: z.object({ content: z.string() }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
      total_tokens: z.number().default(0),
    })
    .optional(),
});

/**
 * Build the chat-completions body: optional system message, user prompt last.
 */
export function buildRequestBody(request: CompletionRequest): Omit<ChatCompletionBody, "model"> {
  const { settings } = request;
  const systemPrompt = request.systemPrompt ?? settings.systemPrompt;
  const messages: ChatMessage[] = [];
  if (systemPrompt) messages.push({ role: "system", content: systemPrompt });
  messages.push({ role: "user", content: request.prompt });

  const body: Omit<ChatCompletionBody, "model"> = {
    messages,
    max_tokens: settings.maxTokens,
    n: settings.n,
    temperature: settings.temperature,
    top_p: settings.topP,
    frequency_penalty: settings.frequencyPenalty,
    presence_penalty: settings.presencePenalty,
  };
  if (settings.stop !== undefined) body.stop = settings.stop;
  return body;
}

/**
 * Map a provider response onto CompletionResult; rejects responses without choices.
 */
export function normalizeCompletion(raw: unknown, provider: string, model: string): CompletionResult {
  const parsed = RawCompletionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CompletionError(
      "MALFORMED_COMPLETION",
      `Malformed completion from ${provider}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "/"} ${issue.message}`)
        .join("; ")}`,
      { details: { provider } },
    );
  }

  const { id, choices, usage } = parsed.data;
  return {
    id,
    provider,
    model: parsed.data.model ?? model,
    choices: choices.map((choice, i) => ({
      index: choice.index ?? i,
      message: { role: "assistant", content: choice.message.content },
      finishReason: choice.finish_reason ?? undefined,
    })),
    usage: usage
      ? {
          promptTokens: usage.prompt_tokens,
          completionTokens: usage.completion_tokens,
          totalTokens: usage.total_tokens,
        }
      : undefined,
  };
}

/**
 * 5xx answers and transport failures move the request to the next provider.
 */
export function triggersFailover(error: unknown): boolean {
  if (error instanceof TransportError) return true;
  return error instanceof ProviderResponseError && error.isServerError;
}

type ProviderOutcome =
  | { ok: true; raw: unknown }
  | { ok: false; error: unknown; attempts: number; failover: boolean };

/**
 * Completion gateway over OpenAI-compatible HTTP providers.
 *
 * Each provider gets `maxRetries` attempts. On the primary, the first 5xx or
 * transport error moves to backup index 0 straight away when a backup exists;
 * other statuses are retried in place and then raised. `failoverDepth` bounds
 * how far down the backup list the gateway walks on its own.
 */
export class FailoverCompletionGateway implements CompletionGateway {
  private readonly chain: OpenAICompatibleClient[];
  private readonly maxRetries: number;
  private readonly requestBudget?: number;
  private readonly timeoutMs?: number;
  private readonly baseDelayMs: number;
  private readonly logger: Logger;
  private readonly metrics?: Metrics;

  constructor(config: FailoverCompletionGatewayConfig) {
    const env = config.env ?? process.env;
    const depth = Math.max(0, config.failoverDepth ?? 1);
    const backups = (config.backupProviders ?? []).slice(0, depth);
    const primaryKey = resolveApiKey(config.primary.baseUrl, config.primary.apiKey, env);
    // A keyless backup keeps the primary's credentials.
    this.chain = [
      new OpenAICompatibleClient({ ...config.primary, apiKey: primaryKey }, env),
      ...backups.map(
        (backup) => new OpenAICompatibleClient({ ...backup, apiKey: backup.apiKey ?? primaryKey }, env),
      ),
    ];
    this.maxRetries = Math.max(1, config.maxRetries ?? 3);
    this.requestBudget = config.requestBudget;
    this.timeoutMs = config.timeoutMs;
    this.baseDelayMs = config.baseDelayMs ?? 500;
    this.logger = config.logger ?? createLogger({ prefix: "CompletionGateway" });
    this.metrics = config.metrics;
  }

  /**
   * Base URLs in the order they are tried.
   */
  get providers(): string[] {
    return this.chain.map((client) => client.baseUrl);
  }

  async complete(request: CompletionRequest, observer?: CompletionObserver): Promise<CompletionResult> {
    const body = buildRequestBody(request);
    const budget = { used: 0 };

    for (const [index, client] of this.chain.entries()) {
      const next = this.chain[index + 1];
      const outcome = await this.callProvider(client, body, next !== undefined, budget, observer);
      if (outcome.ok) {
        return normalizeCompletion(outcome.raw, client.baseUrl, client.model);
      }

      if (!outcome.failover || next === undefined) {
        throw this.terminalError(client, outcome.error, outcome.attempts);
      }

      const reason = describeError(outcome.error);
      this.logger.info("completion.failover", {
        from: client.baseUrl,
        to: next.baseUrl,
        backupIndex: index,
        reason,
      });
      this.metrics?.recordFailover(client.baseUrl, next.baseUrl);
      observer?.onFailover?.({ from: client.baseUrl, to: next.baseUrl, backupIndex: index, reason });
    }

    throw new CompletionError("COMPLETION_FAILED", "No completion provider configured");
  }

  private async callProvider(
    client: OpenAICompatibleClient,
    body: Omit<ChatCompletionBody, "model">,
    canFailOver: boolean,
    budget: { used: number },
    observer: CompletionObserver | undefined,
  ): Promise<ProviderOutcome> {
    let attempts = 0;
    let lastError: unknown;

    try {
      const raw = await withRetry(
        async () => {
          if (this.requestBudget !== undefined && budget.used >= this.requestBudget) {
            throw new CompletionError(
              "BUDGET_EXCEEDED",
              `Request budget of ${this.requestBudget} exhausted`,
              { details: { provider: client.baseUrl, lastError: lastError && describeError(lastError) } },
            );
          }
          budget.used++;
          attempts++;
          this.logger.debug("completion.request", { url: client.url, attempt: attempts });
          try {
            const result = await client.createChatCompletion(body, { timeoutMs: this.timeoutMs });
            this.metrics?.recordCompletionRequest(client.baseUrl, "ok");
            return result;
          } catch (error) {
            lastError = error;
            this.metrics?.recordCompletionRequest(
              client.baseUrl,
              error instanceof TransportError ? "transport_error" : "http_error",
            );
            throw error;
          }
        },
        {
          maxRetries: this.maxRetries - 1,
          baseDelayMs: this.baseDelayMs,
          shouldRetry: (error) => !(canFailOver && triggersFailover(error)),
          onRetry: (error, attempt) => {
            const reason = describeError(error);
            this.logger.warn("completion.retry", { url: client.url, attempt, reason });
            observer?.onRetry?.({ provider: client.baseUrl, attempt, reason });
          },
        },
      );
      return { ok: true, raw };
    } catch (error) {
      if (error instanceof CompletionError) throw error;
      const cause = lastError ?? error;
      return {
        ok: false,
        error: cause,
        attempts,
        failover: canFailOver && triggersFailover(cause),
      };
    }
  }

  private terminalError(client: OpenAICompatibleClient, error: unknown, attempts: number): CompletionError {
    const response =
      error instanceof ProviderResponseError
        ? `Status: ${error.status}, Response: ${error.body}`
        : describeError(error);
    this.logger.error("completion.failed", { url: client.url, attempts, response });
    return new CompletionError(
      "COMPLETION_FAILED",
      `Completion request to ${client.url} failed after ${attempts} attempt(s). ${response}`,
      {
        cause: error,
        details: {
          provider: client.baseUrl,
          attempts,
          status: error instanceof ProviderResponseError ? error.status : undefined,
        },
      },
    );
  }
}
