import { v4 as uuidv4 } from "uuid";
import type {
  AgentContextSnapshot,
  FunctionLogEntry,
  GenerationSettings,
} from "../types/AgentContext.js";
import { DEFAULT_GENERATION_SETTINGS } from "./GenerationSettings.js";

export const WORLD_CONTEXT_LABEL = "WORLD_CONTEXT:";
export const TASK_CONTEXT_LABEL = "TASK_CONTEXT:";
export const EXECUTION_CONTEXT_LABEL = "EXECUTION_CONTEXT:";

export interface ContextStoreInit {
  sessionHandle?: string;
  settings?: GenerationSettings;
  worldContext?: string[];
  taskContext?: string[];
  executionContext?: string[];
}

/**
 * Holds the three ordered context buffers of one agent.
 *
 * Buffers are only ever replaced wholesale; getters hand out copies so callers
 * cannot mutate state behind the store's back.
 */
export class ContextStore {
  readonly sessionHandle: string;
  private settingsValue: GenerationSettings;
  private world: string[];
  private tasks: string[];
  private execution: string[];
  private functionLogEntries: FunctionLogEntry[] = [];
  private ticks = 0;

  constructor(init: ContextStoreInit = {}) {
    this.sessionHandle = init.sessionHandle ?? uuidv4();
    this.settingsValue = { ...(init.settings ?? DEFAULT_GENERATION_SETTINGS) };
    this.world = [...(init.worldContext ?? [])];
    this.tasks = [...(init.taskContext ?? [])];
    this.execution = [...(init.executionContext ?? [])];
  }

  get settings(): GenerationSettings {
    return this.settingsValue;
  }

  set settings(value: GenerationSettings) {
    this.settingsValue = { ...value };
  }

  get worldContext(): string[] {
    return [...this.world];
  }

  get taskContext(): string[] {
    return [...this.tasks];
  }

  get executionContext(): string[] {
    return [...this.execution];
  }

  get functionLog(): FunctionLogEntry[] {
    return [...this.functionLogEntries];
  }

  get tickCount(): number {
    return this.ticks;
  }

  /**
   * Concatenate the requested buffers, each behind its label, always in
   * world → task → execution order.
   */
  aggregate(includeWorld: boolean, includeTask: boolean, includeExecution: boolean): string {
    let aggregated = "";
    if (includeWorld) aggregated += WORLD_CONTEXT_LABEL + this.world.join("\n");
    if (includeTask) aggregated += TASK_CONTEXT_LABEL + this.tasks.join("\n");
    if (includeExecution) aggregated += EXECUTION_CONTEXT_LABEL + this.execution.join("\n");
    return aggregated;
  }

  replaceWorld(items: readonly string[]): void {
    this.world = [...items];
  }

  replaceTask(items: readonly string[]): void {
    this.tasks = [...items];
  }

  replaceExecution(items: readonly string[]): void {
    this.execution = [...items];
  }

  /**
   * Remove and return the head task; undefined when the queue is empty.
   */
  popNextTask(): string | undefined {
    return this.tasks.shift();
  }

  pushTask(task: string): void {
    this.tasks.push(task);
  }

  recordFunctionCall(entry: FunctionLogEntry): void {
    this.functionLogEntries.push(entry);
  }

  completeTick(): number {
    this.ticks += 1;
    return this.ticks;
  }

  snapshot(): AgentContextSnapshot {
    return {
      sessionHandle: this.sessionHandle,
      worldContext: [...this.world],
      taskContext: [...this.tasks],
      executionContext: [...this.execution],
      functionLog: this.functionLogEntries.map((e) => ({ ...e, parameters: { ...e.parameters } })),
      tickCount: this.ticks,
      savedAt: new Date().toISOString(),
    };
  }

  /**
   * Overwrite every buffer from a snapshot. Settings are left untouched.
   */
  restore(snapshot: AgentContextSnapshot): void {
    this.world = [...snapshot.worldContext];
    this.tasks = [...snapshot.taskContext];
    this.execution = [...snapshot.executionContext];
    this.functionLogEntries = snapshot.functionLog.map((e) => ({
      ...e,
      parameters: { ...e.parameters },
    }));
    this.ticks = snapshot.tickCount;
  }
}
