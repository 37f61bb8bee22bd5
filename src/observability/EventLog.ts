import { EventEmitter } from "eventemitter3";
import type { AnyTickEvent, TickEventType } from "../types/Events.js";

/**
 * Event log entry with sequence number.
 */
export interface LogEntry {
  seq: number;
  event: AnyTickEvent;
}

export type EventListener = (entry: LogEntry) => void;

/**
 * Append-only, bounded in-memory log of tick events with subscriptions.
 */
export class EventLog {
  private readonly entries: LogEntry[] = [];
  private seq = 0;
  private readonly maxEntries: number;
  private readonly emitter = new EventEmitter();

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  append(event: AnyTickEvent): LogEntry {
    const entry: LogEntry = { seq: ++this.seq, event };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    this.emitter.emit("event", entry);
    this.emitter.emit(event.type, entry);

    return entry;
  }

  /**
   * Subscribe to all events. Returns the unsubscribe function.
   */
  on(listener: EventListener): () => void {
    this.emitter.on("event", listener);
    return () => this.emitter.off("event", listener);
  }

  onType(type: TickEventType, listener: EventListener): () => void {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  query(filter: {
    type?: TickEventType;
    tick?: number;
    sessionHandle?: string;
    since?: number; // seq number
    limit?: number;
  }): LogEntry[] {
    let results = this.entries;

    const { since, type, tick, sessionHandle, limit } = filter;
    if (since !== undefined) {
      results = results.filter((e) => e.seq > since);
    }
    if (type) {
      results = results.filter((e) => e.event.type === type);
    }
    if (tick !== undefined) {
      results = results.filter((e) => e.event.tick === tick);
    }
    if (sessionHandle) {
      results = results.filter((e) => e.event.sessionHandle === sessionHandle);
    }
    if (limit) {
      results = results.slice(-limit);
    }

    return results;
  }

  getAll(): readonly LogEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries.length = 0;
    this.seq = 0;
  }
}
