import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { AgentContextSnapshot } from "../types/AgentContext.js";
import { ConfigError } from "../core/errors.js";
import { isNotFoundError } from "../capabilities/security/sandbox.js";

/**
 * Where agent snapshots go between ticks and across phase-out/phase-in.
 */
export interface PersistenceSink {
  save(sessionHandle: string, snapshot: AgentContextSnapshot): Promise<void>;
  /** Latest snapshot for the handle, or undefined when none was saved */
  load(sessionHandle: string): Promise<AgentContextSnapshot | undefined>;
  list(): Promise<string[]>;
  delete(sessionHandle: string): Promise<void>;
}

const FunctionLogEntrySchema = z.object({
  tick: z.number().int(),
  capabilityName: z.string(),
  actionName: z.string(),
  parameters: z.record(z.unknown()),
  ok: z.boolean(),
  timestamp: z.string(),
});

export const AgentContextSnapshotSchema = z.object({
  sessionHandle: z.string().min(1),
  worldContext: z.array(z.string()),
  taskContext: z.array(z.string()),
  executionContext: z.array(z.string()),
  functionLog: z.array(FunctionLogEntrySchema).default([]),
  tickCount: z.number().int().nonnegative().default(0),
  savedAt: z.string(),
});

function cloneSnapshot(snapshot: AgentContextSnapshot): AgentContextSnapshot {
  return {
    ...snapshot,
    worldContext: [...snapshot.worldContext],
    taskContext: [...snapshot.taskContext],
    executionContext: [...snapshot.executionContext],
    functionLog: snapshot.functionLog.map((entry) => ({
      ...entry,
      parameters: { ...entry.parameters },
    })),
  };
}

/**
 * In-memory sink (default, for tests and one-shot runs).
 */
export class InMemoryPersistenceSink implements PersistenceSink {
  private readonly snapshots = new Map<string, AgentContextSnapshot>();

  async save(sessionHandle: string, snapshot: AgentContextSnapshot): Promise<void> {
    this.snapshots.set(sessionHandle, cloneSnapshot(snapshot));
  }

  async load(sessionHandle: string): Promise<AgentContextSnapshot | undefined> {
    const snapshot = this.snapshots.get(sessionHandle);
    return snapshot ? cloneSnapshot(snapshot) : undefined;
  }

  async list(): Promise<string[]> {
    return [...this.snapshots.keys()];
  }

  async delete(sessionHandle: string): Promise<void> {
    this.snapshots.delete(sessionHandle);
  }

  get size(): number {
    return this.snapshots.size;
  }

  clear(): void {
    this.snapshots.clear();
  }
}

const SNAPSHOT_SUFFIX = ".json";

/**
 * One pretty-printed JSON file per session handle under `directory`.
 */
export class FilePersistenceSink implements PersistenceSink {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  pathFor(sessionHandle: string): string {
    return join(this.directory, `${encodeURIComponent(sessionHandle)}${SNAPSHOT_SUFFIX}`);
  }

  async save(sessionHandle: string, snapshot: AgentContextSnapshot): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(sessionHandle), `${JSON.stringify(snapshot, null, 2)}\n`, "utf-8");
  }

  async load(sessionHandle: string): Promise<AgentContextSnapshot | undefined> {
    const path = this.pathFor(sessionHandle);
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error) {
      if (isNotFoundError(error)) return undefined;
      throw error;
    }

    const parsed = AgentContextSnapshotSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new ConfigError(`Invalid snapshot file ${path}`, { issues: parsed.error.issues });
    }
    return parsed.data;
  }

  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }
    return names
      .filter((name) => name.endsWith(SNAPSHOT_SUFFIX))
      .map((name) => decodeURIComponent(name.slice(0, -SNAPSHOT_SUFFIX.length)))
      .sort();
  }

  async delete(sessionHandle: string): Promise<void> {
    await rm(this.pathFor(sessionHandle), { force: true });
  }
}
