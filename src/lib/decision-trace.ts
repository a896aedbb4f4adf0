/**
 * decision-trace.ts: Observable trace log for orchestration decisions.
 *
 * Accumulates timestamped entries showing what a run decided and why, e.g.
 *   word_count=31 => confidence=medium
 *
 * Subscribers are notified on every change; getRecent() returns a cached
 * snapshot that only changes identity when the trace changes.
 */

import type { TraceEntry, Stage } from "./dialogue-types.ts";

const MAX_ENTRIES = 200;
const SNAPSHOT_SIZE = 100;

export class DecisionTrace {
  private entries: TraceEntry[] = [];
  private snapshot: TraceEntry[] = [];
  private listeners: Set<() => void> = new Set();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Add a trace entry and notify subscribers. */
  add(runId: number, stage: Stage, event: string, detail: string, data?: Record<string, unknown>) {
    this.entries.push({ timestamp: this.now(), runId, stage, event, detail, data });

    if (this.entries.length > MAX_ENTRIES) {
      this.entries = this.entries.slice(-MAX_ENTRIES);
    }

    this.snapshot = this.entries.slice(-SNAPSHOT_SIZE);
    this.notify();
  }

  getAll(): TraceEntry[] {
    return [...this.entries];
  }

  /** Entries belonging to one run, oldest first. */
  forRun(runId: number): TraceEntry[] {
    return this.entries.filter((entry) => entry.runId === runId);
  }

  getRecent(): TraceEntry[] {
    return this.snapshot;
  }

  clear() {
    this.entries = [];
    this.snapshot = [];
    this.notify();
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify() {
    for (const listener of this.listeners) listener();
  }
}
