import type { ContextStore } from "../context/ContextStore.js";
import type { CompletionGateway, CompletionObserver } from "../llm/CompletionGateway.js";
import type { CapabilityRegistry } from "../registry/CapabilityRegistry.js";
import type { FunctionCall } from "../types/FunctionCall.js";
import type { CompletionResult } from "../types/Completion.js";
import type { AnyTickEvent, TickPhase } from "../types/Events.js";
import { parseFunctionCall } from "../protocol/FunctionCallProtocol.js";
import { ProtocolError, StateError, describeError, isRuntimeError } from "../core/errors.js";
import { EventLog } from "../observability/EventLog.js";
import { Metrics } from "../observability/Metrics.js";
import { createLogger, sanitizeForLog, summarizeForLog } from "../observability/Logger.js";
import type { Logger } from "../observability/Logger.js";
import {
  DEFAULT_SYSTEM_PROMPT,
  EXECUTION_TICK_PROMPT,
  TASK_TICK_PROMPT,
  WORLD_TICK_PROMPT,
} from "./prompts.js";

/**
 * Result of one dispatched execution item.
 */
export interface DispatchOutcome {
  item: string;
  call: FunctionCall;
  result: unknown;
  /** Completion calls spent before a valid function call came back */
  attempts: number;
  durationMs: number;
}

export interface TickResult {
  tick: number;
  results: DispatchOutcome[];
  worldContext: string[];
  /** The task decomposition this tick dispatched, in order */
  executionItems: string[];
}

export interface TickEngineOptions {
  store: ContextStore;
  gateway: CompletionGateway;
  registry: CapabilityRegistry;
  /** Completion calls allowed per execution item before giving up (default: 3) */
  maxFunctionCallAttempts?: number;
  logger?: Logger;
  eventLog?: EventLog;
  metrics?: Metrics;
}

/**
 * Tick Engine: runs one world → task → execution cycle per `tick()` call.
 *
 * Phases:
 * 1. World (only with `includeWorldProcessing`): every choice becomes a world item
 * 2. Task: the head task is decomposed into pipe-delimited execution items
 * 3. Execution: each item becomes a validated function call and is dispatched
 *
 * Any failure ends the tick. Buffers already replaced stay replaced.
 */
export class TickEngine {
  private readonly store: ContextStore;
  private readonly gateway: CompletionGateway;
  private readonly registry: CapabilityRegistry;
  private readonly maxFunctionCallAttempts: number;
  private readonly logger: Logger;
  private readonly eventLog: EventLog;
  private readonly metrics: Metrics;

  constructor(options: TickEngineOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.registry = options.registry;
    this.maxFunctionCallAttempts = Math.max(1, options.maxFunctionCallAttempts ?? 3);
    this.logger = options.logger ?? createLogger({ prefix: "TickEngine" });
    this.eventLog = options.eventLog ?? new EventLog();
    this.metrics = options.metrics ?? new Metrics();
  }

  getEventLog(): EventLog {
    return this.eventLog;
  }

  getMetrics(): Metrics {
    return this.metrics;
  }

  async tick(): Promise<TickResult> {
    const tick = this.store.tickCount + 1;
    const startTime = Date.now();
    const includeWorld = this.store.settings.includeWorldProcessing;
    let phase: TickPhase = includeWorld ? "world" : "task";

    this.emit({
      type: "TICK_STARTED",
      ...this.base(tick),
      phases: includeWorld ? ["world", "task", "execution"] : ["task", "execution"],
    });
    this.logger.debug("tick.start", { tick, sessionHandle: this.store.sessionHandle });

    try {
      // An empty queue ends the tick before any completion is spent.
      if (this.store.taskContext.length === 0) {
        phase = "task";
        throw new StateError("NO_PENDING_TASKS", "Task context is empty; nothing to decompose");
      }
      if (includeWorld) {
        await this.worldTick(tick);
      }
      phase = "task";
      const executionItems = await this.taskTick(tick);
      phase = "execution";
      const results = await this.executionTick(tick, executionItems);

      this.store.replaceExecution([]);
      this.store.completeTick();

      const durationMs = Date.now() - startTime;
      this.metrics.recordTick(true, durationMs);
      this.emit({
        type: "TICK_COMPLETED",
        ...this.base(tick),
        dispatched: results.length,
        durationMs,
      });
      this.logger.info("tick.completed", { tick, dispatched: results.length, durationMs });

      return {
        tick,
        results,
        worldContext: this.store.worldContext,
        executionItems,
      };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      this.metrics.recordTick(false, durationMs);
      this.emit({
        type: "TICK_FAILED",
        ...this.base(tick),
        phase,
        kind: isRuntimeError(error) ? error.kind : "UNKNOWN",
        message: describeError(error),
      });
      this.logger.warn("tick.failed", { tick, phase, error: describeError(error) });
      throw error;
    }
  }

  private async worldTick(tick: number): Promise<void> {
    const startTime = Date.now();
    const prompt = WORLD_TICK_PROMPT + this.store.aggregate(true, true, false);
    const completion = await this.complete(tick, "world", prompt);
    const items = completion.choices.map((choice) => choice.message.content);
    this.store.replaceWorld(items);
    this.phaseCompleted(tick, "world", items.length, startTime);
  }

  private async taskTick(tick: number): Promise<string[]> {
    const startTime = Date.now();
    const task = this.store.popNextTask();
    if (task === undefined) {
      throw new StateError("NO_PENDING_TASKS", "Task context is empty; nothing to decompose");
    }

    const prompt = `${TASK_TICK_PROMPT}task: ${task}${this.store.aggregate(true, true, true)}`;
    const completion = await this.complete(tick, "task", prompt);
    const text = firstChoice(completion);
    const items = text
      .split("|")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);

    if (items.length === 0) {
      throw new ProtocolError(
        "EMPTY_DECOMPOSITION",
        `Task "${task}" decomposed into no execution items`,
        text,
        { task },
      );
    }

    this.store.replaceExecution(items);
    this.phaseCompleted(tick, "task", items.length, startTime);
    return items;
  }

  private async executionTick(tick: number, items: string[]): Promise<DispatchOutcome[]> {
    const startTime = Date.now();
    const results: DispatchOutcome[] = [];

    for (const [index, item] of items.entries()) {
      const { call, attempts } = await this.generateFunctionCall(tick, item);
      const outcome = await this.dispatch(tick, item, call);
      results.push({ ...outcome, attempts });
      this.store.replaceExecution(items.slice(index + 1));
    }

    this.phaseCompleted(tick, "execution", results.length, startTime);
    return results;
  }

  /**
   * Ask for a function call for one item, regenerating with the same prompt
   * until the answer parses or the attempts run out.
   */
  private async generateFunctionCall(
    tick: number,
    item: string,
  ): Promise<{ call: FunctionCall; attempts: number }> {
    const prompt =
      `${EXECUTION_TICK_PROMPT}${this.registry.describe()}\n` +
      `task: ${item}${this.store.aggregate(true, true, true)}`;

    let lastPayload = "";
    let lastReason = "";
    for (let attempt = 1; attempt <= this.maxFunctionCallAttempts; attempt++) {
      const completion = await this.complete(tick, "execution", prompt);
      const payload = firstChoice(completion);
      const parsed = parseFunctionCall(payload);
      if (parsed.ok) {
        return { call: parsed.call, attempts: attempt };
      }

      lastPayload = payload;
      lastReason = parsed.reason;
      this.metrics.recordInvalidFunctionCall();
      this.emit({
        type: "FUNCTION_CALL_INVALID",
        ...this.base(tick),
        item,
        attempt,
        maxAttempts: this.maxFunctionCallAttempts,
        reason: parsed.reason,
        payloadSummary: summarizeForLog(payload),
      });
      this.logger.debug("function_call.invalid", { item, attempt, reason: parsed.reason });
    }

    throw new ProtocolError(
      "INVALID_FUNCTION_CALL",
      `No valid function call for "${item}" after ${this.maxFunctionCallAttempts} attempt(s): ${lastReason}`,
      lastPayload,
      { item, attempts: this.maxFunctionCallAttempts },
    );
  }

  private async dispatch(
    tick: number,
    item: string,
    call: FunctionCall,
  ): Promise<Omit<DispatchOutcome, "attempts">> {
    const startTime = Date.now();
    const record = (ok: boolean) =>
      this.store.recordFunctionCall({
        tick,
        capabilityName: call.capabilityName,
        actionName: call.actionName,
        parameters: call.parameters,
        ok,
        timestamp: new Date().toISOString(),
      });

    let result: unknown;
    try {
      result = await this.registry.dispatch(call);
    } catch (error) {
      record(false);
      this.metrics.recordDispatch(call.capabilityName, call.actionName, false, Date.now() - startTime);
      throw error;
    }

    const durationMs = Date.now() - startTime;
    record(true);
    this.metrics.recordDispatch(call.capabilityName, call.actionName, true, durationMs);
    this.emit({
      type: "FUNCTION_DISPATCHED",
      ...this.base(tick),
      capabilityName: call.capabilityName,
      actionName: call.actionName,
      argsSummary: sanitizeForLog(call.parameters, 200),
      durationMs,
    });
    if (this.logger.options.includeResults) {
      this.logger.debug("dispatch.result", { item, result: summarizeForLog(result) });
    }

    return { item, call, result, durationMs };
  }

  private async complete(tick: number, phase: TickPhase, prompt: string): Promise<CompletionResult> {
    const settings = this.store.settings;
    if (this.logger.options.includePrompts) {
      this.logger.debug("completion.prompt", { phase, prompt });
    }
    const completion = await this.gateway.complete(
      { prompt, systemPrompt: settings.systemPrompt ?? DEFAULT_SYSTEM_PROMPT, settings },
      this.observer(tick),
    );
    if (this.logger.options.includePrompts) {
      this.logger.debug("completion.choices", {
        phase,
        choices: completion.choices.map((choice) => choice.message.content),
      });
    }
    return completion;
  }

  private observer(tick: number): CompletionObserver {
    return {
      onRetry: (info) => this.emit({ type: "COMPLETION_RETRY", ...this.base(tick), ...info }),
      onFailover: (info) => this.emit({ type: "PROVIDER_FAILOVER", ...this.base(tick), ...info }),
    };
  }

  private phaseCompleted(tick: number, phase: TickPhase, items: number, startTime: number): void {
    this.emit({
      type: "PHASE_COMPLETED",
      ...this.base(tick),
      phase,
      items,
      durationMs: Date.now() - startTime,
    });
  }

  private base(tick: number): { timestamp: string; sessionHandle: string; tick: number } {
    return {
      timestamp: new Date().toISOString(),
      sessionHandle: this.store.sessionHandle,
      tick,
    };
  }

  private emit(event: AnyTickEvent): void {
    this.eventLog.append(event);
  }
}

function firstChoice(completion: CompletionResult): string {
  return completion.choices[0]?.message.content ?? "";
}
