import { ContextStore } from "../context/ContextStore.js";
import type { CompletionGateway } from "../llm/CompletionGateway.js";
import type { CapabilityRegistry } from "../registry/CapabilityRegistry.js";
import { TickEngine } from "../engine/TickEngine.js";
import type { TickResult } from "../engine/TickEngine.js";
import { InMemoryPersistenceSink } from "../persistence/PersistenceSink.js";
import type { PersistenceSink } from "../persistence/PersistenceSink.js";
import type { AgentContextSnapshot, GenerationSettings } from "../types/AgentContext.js";
import { AgentSupervisor } from "./AgentSupervisor.js";
import type { AgentSupervisorOptions } from "./AgentSupervisor.js";
import { EventLog } from "../observability/EventLog.js";
import { describeError } from "../core/errors.js";
import { Metrics } from "../observability/Metrics.js";
import { createLogger } from "../observability/Logger.js";
import type { Logger } from "../observability/Logger.js";

export interface AgentOptions {
  gateway: CompletionGateway;
  registry: CapabilityRegistry;
  sink?: PersistenceSink;
  sessionHandle?: string;
  settings?: GenerationSettings;
  maxFunctionCallAttempts?: number;
  logger?: Logger;
  eventLog?: EventLog;
  metrics?: Metrics;
}

/**
 * One agent: its context, the engine that advances it and where it is saved.
 */
export class Agent {
  readonly store: ContextStore;
  readonly engine: TickEngine;
  readonly sink: PersistenceSink;
  private readonly logger: Logger;
  private supervisor?: AgentSupervisor;

  constructor(options: AgentOptions) {
    this.logger = options.logger ?? createLogger({ prefix: "Agent" });
    this.store = new ContextStore({
      sessionHandle: options.sessionHandle,
      settings: options.settings,
    });
    this.sink = options.sink ?? new InMemoryPersistenceSink();
    this.engine = new TickEngine({
      store: this.store,
      gateway: options.gateway,
      registry: options.registry,
      maxFunctionCallAttempts: options.maxFunctionCallAttempts,
      logger: this.logger.child("TickEngine"),
      eventLog: options.eventLog ?? new EventLog(),
      metrics: options.metrics ?? new Metrics(),
    });
  }

  get sessionHandle(): string {
    return this.store.sessionHandle;
  }

  /**
   * Seed a fresh agent, optionally with its first task. Nothing is restored.
   */
  initialize(taskPrompt?: string): void {
    if (taskPrompt) this.store.pushTask(taskPrompt);
    this.logger.debug("agent.initialize", { sessionHandle: this.sessionHandle });
  }

  pushTask(task: string): void {
    this.store.pushTask(task);
  }

  /**
   * Run one tick and persist the resulting context, also when the tick fails.
   */
  async tick(): Promise<TickResult> {
    let result: TickResult;
    try {
      result = await this.engine.tick();
    } catch (error) {
      try {
        await this.save();
      } catch (saveError) {
        this.logger.error("agent.save_failed", {
          sessionHandle: this.sessionHandle,
          error: describeError(saveError),
        });
      }
      throw error;
    }
    await this.save();
    return result;
  }

  async save(): Promise<AgentContextSnapshot> {
    const snapshot = this.store.snapshot();
    await this.sink.save(this.sessionHandle, snapshot);
    return snapshot;
  }

  /**
   * Start ticking on a timer. Replaces any previous supervisor.
   */
  supervise(options: AgentSupervisorOptions = {}): AgentSupervisor {
    this.supervisor = new AgentSupervisor(this, {
      logger: this.logger.child("AgentSupervisor"),
      ...options,
    });
    this.supervisor.start();
    return this.supervisor;
  }

  /**
   * Stop any supervisor and save the context so the agent can be resumed.
   */
  async phaseOut(): Promise<AgentContextSnapshot> {
    if (this.supervisor) {
      await this.supervisor.stop();
      this.supervisor = undefined;
    }
    const snapshot = await this.save();
    this.logger.info("agent.phase_out", { sessionHandle: this.sessionHandle });
    return snapshot;
  }

  /**
   * Restore the latest saved context for this session. Returns false when none exists.
   */
  async phaseIn(): Promise<boolean> {
    const snapshot = await this.sink.load(this.sessionHandle);
    if (!snapshot) return false;
    this.store.restore(snapshot);
    this.logger.info("agent.phase_in", {
      sessionHandle: this.sessionHandle,
      tickCount: snapshot.tickCount,
    });
    return true;
  }
}
