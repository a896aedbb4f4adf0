/**
 * trial-memory.ts: File-backed replay cache of completed runs.
 *
 * Records are keyed by the normalized question. Lookup order:
 *   1. alias   "q2", "question 02" → second stored question
 *   2. exact   normalized match
 *   3. fuzzy   best similarityRatio() against every stored key, if ≥ threshold
 *
 * The whole store is one JSON document rewritten on every save. Read and
 * write failures are logged and never thrown: a broken file behaves like an
 * empty store, and a failed write keeps the in-memory update.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import type { ConfidenceTier, TrialRecord } from "./dialogue-types.ts";
import { CacheIOError, errorMessage } from "./errors.ts";
import { cloneDecision, normalizeDecision, serializeDecision } from "./controller-decision.ts";
import type { SerializedDecision } from "./controller-decision.ts";
import { parseConfidenceHint } from "./confidence.ts";
import { similarityRatio } from "./similarity.ts";
import { logger as defaultLogger } from "./logger.ts";
import type { Logger } from "./logger.ts";

export const DEFAULT_TRIALS_PATH = "my_trials.json";
export const DEFAULT_MATCH_THRESHOLD = 0.6;

const ALIAS_PATTERN = /^q(?:uestion)?\s*0*([0-9]+)/i;
const LEGACY_DECISION_KEYS = ["need_thinking", "confidence", "thinking_behavior_plan"] as const;

export interface TrialMemoryOptions {
  path?: string;
  matchThreshold?: number;
  logger?: Logger;
}

export interface SerializedTrialRecord {
  question: string;
  answer: string;
  thinking_cues: string[];
  decision: SerializedDecision;
  final_confidence: ConfidenceTier;
}

const textSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

const recordEntrySchema = z
  .object({
    question: textSchema.catch(""),
    answer: textSchema.catch(""),
    thinking_cues: z.array(textSchema.catch("")).catch([]),
    decision: z.record(z.unknown()).optional().catch(undefined),
    final_confidence: z.string().optional().catch(undefined),
  })
  .passthrough();

/** Lowercase, turn every run of non-word characters into one space, trim. */
export function normalizeQuestion(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object" && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Coerce one stored entry into a TrialRecord, or null when it has no question. */
export function normalizeRecordEntry(entry: unknown, fallbackQuestion?: string): TrialRecord | null {
  if (!isPlainObject(entry)) return null;
  const source = fallbackQuestion !== undefined && !("question" in entry)
    ? { ...entry, question: fallbackQuestion }
    : entry;

  const parsed = recordEntrySchema.safeParse(source);
  if (!parsed.success || !parsed.data.question) return null;
  const data = parsed.data;

  let rawDecision: Record<string, unknown> = data.decision ?? {};
  if (!isTruthy(rawDecision)) {
    rawDecision = {};
    for (const key of LEGACY_DECISION_KEYS) {
      if (key in source) rawDecision[key] = source[key];
    }
  }
  const decision = normalizeDecision(rawDecision);

  const finalConfidence =
    parseConfidenceHint(data.final_confidence) ?? decision.confidence ?? "medium";

  return {
    question: data.question,
    answer: data.answer,
    thinkingCues: data.thinking_cues.filter((cue) => cue.length > 0),
    decision,
    finalConfidence,
  };
}

/** Pull the list of entries (with fallback questions) out of any accepted document shape. */
function extractEntries(document: unknown): Array<{ entry: unknown; fallbackQuestion?: string }> {
  if (Array.isArray(document)) return document.map((entry) => ({ entry }));
  if (!isPlainObject(document)) return [];

  let container: unknown = document;
  if (isTruthy(document.records)) container = document.records;
  else if (isTruthy(document.trials)) container = document.trials;

  if (Array.isArray(container)) return container.map((entry) => ({ entry }));
  if (isPlainObject(container)) {
    return Object.entries(container).map(([key, entry]) => ({ entry, fallbackQuestion: key }));
  }
  return [];
}

function copyRecord(record: TrialRecord): TrialRecord {
  return {
    ...record,
    thinkingCues: [...record.thinkingCues],
    decision: cloneDecision(record.decision),
  };
}

export function serializeRecord(record: TrialRecord): SerializedTrialRecord {
  return {
    question: record.question,
    answer: record.answer,
    thinking_cues: [...record.thinkingCues],
    decision: serializeDecision(record.decision),
    final_confidence: record.finalConfidence,
  };
}

export class TrialMemory {
  readonly path: string;
  readonly matchThreshold: number;
  private readonly log: Logger;
  /** normalized key → record, in first-insertion order */
  private records = new Map<string, TrialRecord>();
  private loading: Promise<void> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(options: TrialMemoryOptions = {}) {
    this.path = resolve(options.path ?? DEFAULT_TRIALS_PATH);
    this.matchThreshold = options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;
    this.log = options.logger ?? defaultLogger;
  }

  /** Look up a stored run. Returns a copy the caller may mutate. */
  async get(question: string): Promise<TrialRecord | null> {
    await this.ensureLoaded();
    const trimmed = question.trim();
    if (!trimmed) return null;

    const aliased = this.resolveAlias(trimmed);
    if (aliased) return copyRecord(aliased);

    const key = normalizeQuestion(trimmed);
    if (!key) return null;

    const exact = this.records.get(key);
    if (exact) return copyRecord(exact);

    const fuzzy = this.bestFuzzyMatch(key);
    if (fuzzy) {
      this.log.info(
        `[TrialMemory] Fuzzy matched to: ${fuzzy.record.question} (score=${fuzzy.score.toFixed(2)})`,
      );
      return copyRecord(fuzzy.record);
    }
    return null;
  }

  /** Insert or replace the record for its question, then rewrite the file. */
  async saveRecord(record: TrialRecord): Promise<void> {
    await this.ensureLoaded();
    const normalized = normalizeRecordEntry(serializeRecord(record));
    if (!normalized) {
      this.log.warn("[TrialMemory] Refusing to save a record without a question");
      return;
    }
    this.records.set(this.keyFor(normalized.question), normalized);

    this.writes = this.writes.then(() => this.write());
    await this.writes;
  }

  /** Distinct stored questions in insertion order; alias N is element N-1. */
  async listQuestions(): Promise<string[]> {
    await this.ensureLoaded();
    return Array.from(this.records.values(), (record) => record.question);
  }

  async size(): Promise<number> {
    await this.ensureLoaded();
    return this.records.size;
  }

  private keyFor(question: string): string {
    return normalizeQuestion(question) || question.trim();
  }

  private resolveAlias(text: string): TrialRecord | null {
    const match = text.match(ALIAS_PATTERN);
    if (!match) return null;
    const index = Number.parseInt(match[1], 10);
    if (index <= 0 || index > this.records.size) return null;
    return Array.from(this.records.values())[index - 1];
  }

  private bestFuzzyMatch(key: string): { record: TrialRecord; score: number } | null {
    let best: { record: TrialRecord; score: number } | null = null;
    for (const [candidate, record] of this.records) {
      const score = similarityRatio(key, candidate);
      if (score > (best?.score ?? 0)) best = { record, score };
    }
    return best && best.score >= this.matchThreshold ? best : null;
  }

  private ensureLoaded(): Promise<void> {
    this.loading ??= this.load();
    return this.loading;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return;
      this.reportIO(new CacheIOError(this.path, `Failed to read trials: ${errorMessage(err)}`, { cause: err }));
      return;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (err) {
      this.reportIO(new CacheIOError(this.path, `Failed to parse trials: ${errorMessage(err)}`, { cause: err }));
      return;
    }

    for (const { entry, fallbackQuestion } of extractEntries(document)) {
      const record = normalizeRecordEntry(entry, fallbackQuestion);
      if (record) this.records.set(this.keyFor(record.question), record);
    }
    this.log.debug(`[TrialMemory] Loaded ${this.records.size} record(s) from ${this.path}`);
  }

  private async write(): Promise<void> {
    const payload = Array.from(this.records.values(), serializeRecord);
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
    } catch (err) {
      this.reportIO(new CacheIOError(this.path, `Failed to write trials: ${errorMessage(err)}`, { cause: err }));
    }
  }

  private reportIO(error: CacheIOError) {
    this.log.error({ path: error.path, code: error.code }, `[TrialMemory] ${error.message}`);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
