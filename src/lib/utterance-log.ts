/**
 * utterance-log.ts: What the session did with each user utterance.
 *
 * An utterance is recorded as pending when it arrives, tied to the run it
 * started, and settled with that run's outcome. Blank utterances are settled
 * as ignored straight away. Capped at the newest 200 utterances.
 */

import type { RunStatus, Stage, UtteranceRecord } from "./dialogue-types.ts";

const MAX_ENTRIES = 200;

export class UtteranceLog {
  private entries: UtteranceRecord[] = [];
  private nextId = 1;
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  receive(text: string, stage: Stage): UtteranceRecord {
    return this.push({ id: this.nextId++, text, receivedAt: this.now(), stageOnArrival: stage, outcome: "pending" });
  }

  ignore(text: string, stage: Stage): UtteranceRecord {
    const at = this.now();
    return this.push({
      id: this.nextId++,
      text,
      receivedAt: at,
      stageOnArrival: stage,
      outcome: "ignored",
      finalStage: stage,
      settledAt: at,
    });
  }

  attachRun(id: number, runId: number) {
    const entry = this.find(id);
    if (entry) entry.runId = runId;
  }

  /** Record how the utterance's run ended. Unknown or already settled ids are left alone. */
  settle(id: number, outcome: RunStatus, finalStage: Stage) {
    const entry = this.find(id);
    if (!entry || entry.outcome !== "pending") return;
    entry.outcome = outcome;
    entry.finalStage = finalStage;
    entry.settledAt = this.now();
  }

  get(id: number): UtteranceRecord | null {
    const entry = this.find(id);
    return entry ? { ...entry } : null;
  }

  /** The utterance that started `runId`, if it is still in the log. */
  forRun(runId: number): UtteranceRecord | null {
    const entry = this.entries.find((e) => e.runId === runId);
    return entry ? { ...entry } : null;
  }

  pending(): UtteranceRecord[] {
    return this.entries.filter((e) => e.outcome === "pending").map((e) => ({ ...e }));
  }

  getAll(): UtteranceRecord[] {
    return this.entries.map((e) => ({ ...e }));
  }

  clear() {
    this.entries = [];
  }

  private push(entry: UtteranceRecord): UtteranceRecord {
    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries = this.entries.slice(-MAX_ENTRIES);
    }
    return { ...entry };
  }

  private find(id: number): UtteranceRecord | undefined {
    return this.entries.find((e) => e.id === id);
  }
}
