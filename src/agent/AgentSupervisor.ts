import type { TickResult } from "../engine/TickEngine.js";
import { StateError, describeError } from "../core/errors.js";
import { createLogger } from "../observability/Logger.js";
import type { Logger } from "../observability/Logger.js";

export type SupervisorState = "idle" | "running" | "stopped" | "failed";

export interface SupervisorStatus {
  state: SupervisorState;
  /** Ticks that completed */
  ticks: number;
  /** Beats that found no pending task */
  idleBeats: number;
  failures: number;
  lastHeartbeat?: string; // ISO 8601
  lastError?: string;
}

export interface Tickable {
  tick(): Promise<TickResult>;
}

export interface AgentSupervisorOptions {
  /** Pause between the end of one tick and the start of the next (default: 1000) */
  intervalMs?: number;
  /** Stop with state "failed" on the first non-idle error (default: true) */
  stopOnError?: boolean;
  onTick?: (result: TickResult) => void;
  /** Called for every failure other than an empty task queue */
  onError?: (error: unknown) => void;
  logger?: Logger;
}

/**
 * Drives an agent on a timer, one tick at a time. Ticks never overlap: the
 * next one is scheduled only after the previous one settles.
 */
export class AgentSupervisor {
  private readonly target: Tickable;
  private readonly intervalMs: number;
  private readonly stopOnError: boolean;
  private readonly onTick?: (result: TickResult) => void;
  private readonly onError?: (error: unknown) => void;
  private readonly logger: Logger;

  private state: SupervisorState = "stopped";
  private ticks = 0;
  private idleBeats = 0;
  private failures = 0;
  private lastHeartbeat?: string;
  private lastError?: string;
  private timer?: ReturnType<typeof setTimeout>;
  private inFlight?: Promise<void>;
  private active = false;

  constructor(target: Tickable, options: AgentSupervisorOptions = {}) {
    this.target = target;
    this.intervalMs = options.intervalMs ?? 1000;
    this.stopOnError = options.stopOnError ?? true;
    this.onTick = options.onTick;
    this.onError = options.onError;
    this.logger = options.logger ?? createLogger({ prefix: "AgentSupervisor" });
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.state = "running";
    this.lastError = undefined;
    this.logger.info("supervisor.start", { intervalMs: this.intervalMs });
    this.schedule(0);
  }

  /**
   * Cancel the next tick and wait for the one in flight, if any.
   */
  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
    if (this.state !== "failed") this.state = "stopped";
    this.logger.info("supervisor.stop", { state: this.state, ticks: this.ticks });
  }

  get isActive(): boolean {
    return this.active;
  }

  status(): SupervisorStatus {
    return {
      state: this.state,
      ticks: this.ticks,
      idleBeats: this.idleBeats,
      failures: this.failures,
      lastHeartbeat: this.lastHeartbeat,
      lastError: this.lastError,
    };
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.beat().catch((error: unknown) => {
        this.logger.error("supervisor.callback_failed", { error: describeError(error) });
      });
    }, delayMs);
  }

  private async beat(): Promise<void> {
    try {
      const result = await this.target.tick();
      this.ticks++;
      this.state = "running";
      this.onTick?.(result);
    } catch (error) {
      if (error instanceof StateError) {
        this.idleBeats++;
        this.state = "idle";
        this.logger.debug("supervisor.idle", { reason: error.message });
      } else {
        this.failures++;
        this.lastError = describeError(error);
        this.logger.error("supervisor.tick_failed", { error: this.lastError });
        if (this.stopOnError) {
          this.state = "failed";
          this.active = false;
        }
        this.onError?.(error);
      }
    } finally {
      this.lastHeartbeat = new Date().toISOString();
    }

    if (this.active) this.schedule(this.intervalMs);
  }
}
