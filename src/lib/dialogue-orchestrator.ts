/**
 * dialogue-orchestrator.ts: The run state machine for one user question.
 *
 *   IDLE → DECIDING → REPLAYING                  (trial memory hit)
 *                   → DIRECT                     (need_thinking = false)
 *                   → THINKING_AND_ANSWERING     (two streams + barrier)
 *        → DONE | CANCELLED | FAILED
 *
 * The thinking task emits the decision's notes, then streamed cues, each
 * paired with a behaviour step, and opens the barrier when its window
 * closes. The answer task collects clauses, waits on the barrier at the
 * first one, resolves confidence and returns the full text. The run then
 * performs the confidence behaviour and exactly one speak().
 *
 * A new run() cancels the active one. Cancellation is checked before every
 * dispatch and before persisting, so a cancelled run has no further effects.
 *
 * State snapshots follow the getState()/subscribe() pattern of DecisionTrace.
 */

import type {
  BehaviorStep,
  ConfidenceTier,
  ControllerDecision,
  OrchestratorState,
  RunResult,
  RunSource,
  Stage,
  StreamRequest,
  TextGenerationService,
  ThinkingCue,
  TrialRecord,
} from "./dialogue-types.ts";
import { DEFAULT_ORCHESTRATOR_STATE } from "./dialogue-types.ts";
import type { AgentConfig } from "./config.ts";
import { BestEffortActuation } from "./actuation-sink.ts";
import type { ActuationSink } from "./actuation-sink.ts";
import type { TrialMemory } from "./trial-memory.ts";
import { DecisionTrace } from "./decision-trace.ts";
import { SentenceStream } from "./sentence-stream.ts";
import { Barrier, linkSignals, sleep, throwIfAborted } from "./timing.ts";
import { RunCancelledError, StreamTransportError, errorMessage } from "./errors.ts";
import { freezeDecision } from "./controller-decision.ts";
import { isMeaningfulThinkingCue, pickThinkingStep } from "./behavior-plan.ts";
import { getConfidenceBehavior, resolveConfidence, resolveDirectConfidence } from "./confidence.ts";
import {
  REASONING_SYSTEM_PROMPT,
  THINKING_SYSTEM_PROMPT,
  buildReasoningPrompt,
  buildThinkingPrompt,
  toneInstructionFor,
} from "./prompt-templates.ts";
import { logger as defaultLogger } from "./logger.ts";
import type { Logger } from "./logger.ts";

export const FALLBACK_ANSWER = "I'm sorry, I can't provide an answer at the moment.";
export const UNAVAILABLE_ANSWER = "I don't have a stored answer for that question yet.";

export interface OrchestratorCallbacks {
  onStageChange?: (stage: Stage, runId: number) => void;
  onThinkingCue?: (cue: ThinkingCue, step: BehaviorStep) => void;
  onAnswerClause?: (clause: string, runId: number) => void;
  onRunComplete?: (result: RunResult) => void;
}

export interface OrchestratorOptions {
  generator: TextGenerationService;
  actuation: ActuationSink | null;
  config: Pick<AgentConfig, "openai" | "thinking" | "streamQueueCapacity">;
  /** Omit to run without the replay cache. */
  memory?: TrialMemory | null;
  callbacks?: OrchestratorCallbacks;
  trace?: DecisionTrace;
  logger?: Logger;
  now?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Never call the generation service; a cache miss speaks UNAVAILABLE_ANSWER. */
  replayOnly?: boolean;
  /** On a cache hit, speak the stored answer without replaying the thinking window. */
  skipReplayThinking?: boolean;
  /** Speak only: no gestures, expressions or gaze changes. */
  speechOnly?: boolean;
}

interface RunContext {
  runId: number;
  stage: Stage;
  question: string;
  signal: AbortSignal;
  startedAt: number;
  cues: string[];
  decision: ControllerDecision | null;
  confidence: ConfidenceTier | null;
  source: RunSource | null;
  speechOnly: boolean;
  thinkingClosedAt?: number;
  answerDispatchedAt?: number;
}

interface ThinkingWindow {
  notes: readonly string[];
  plan: readonly BehaviorStep[];
  /** Absent for replays: only the notes are shown. */
  stream?: StreamRequest;
}

type WindowOutcome = "closed" | "cancelled";

interface GeneratedAnswer {
  text: string;
  confidence: ConfidenceTier;
  /** The stream produced nothing and FALLBACK_ANSWER stands in. */
  fallback: boolean;
}

export class DialogueOrchestrator {
  private state: OrchestratorState = { ...DEFAULT_ORCHESTRATOR_STATE };
  private snapshot: OrchestratorState = this.state;
  private stateListeners: Set<() => void> = new Set();
  private active: { runId: number; controller: AbortController } | null = null;
  private runCounter = 0;

  readonly trace: DecisionTrace;
  private readonly generator: TextGenerationService;
  private readonly actuation: BestEffortActuation;
  private readonly memory: TrialMemory | null;
  private readonly config: OrchestratorOptions["config"];
  private readonly callbacks: OrchestratorCallbacks;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(options: OrchestratorOptions) {
    this.generator = options.generator;
    this.memory = options.memory ?? null;
    this.config = options.config;
    this.callbacks = options.callbacks ?? {};
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
    this.trace = options.trace ?? new DecisionTrace(this.now);
    this.actuation = new BestEffortActuation(options.actuation, { logger: this.log });
  }

  getState(): OrchestratorState {
    return this.snapshot;
  }

  subscribe(listener: () => void): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  isRunning(): boolean {
    return this.active !== null;
  }

  /** Cancel the active run, if any. Its run() promise resolves with status "cancelled". */
  cancel(reason = "cancelled"): boolean {
    if (!this.active) return false;
    this.log.info(`[Orchestrator] Cancelling run ${this.active.runId}: ${reason}`);
    this.active.controller.abort(new RunCancelledError(reason));
    this.active = null;
    return true;
  }

  /**
   * Answer one question. Resolves with the run's outcome; rejects only for a
   * decision or configuration failure, before anything was spoken.
   */
  async run(question: string, options: RunOptions = {}): Promise<RunResult> {
    this.cancel("superseded by a new question");

    const runId = ++this.runCounter;
    const link = linkSignals(options.signal);
    this.active = { runId, controller: link.controller };

    const ctx: RunContext = {
      runId,
      stage: "IDLE",
      question: question.trim(),
      signal: link.controller.signal,
      startedAt: this.now(),
      cues: [],
      decision: null,
      confidence: null,
      source: null,
      speechOnly: options.speechOnly ?? false,
    };
    this.state = { ...DEFAULT_ORCHESTRATOR_STATE, runId, question: ctx.question };
    this.notifyListeners();

    try {
      const result = await this.execute(ctx, options);
      this.setStage(ctx, result.status === "failed" ? "FAILED" : "DONE");
      this.callbacks.onRunComplete?.(result);
      return result;
    } catch (err) {
      if (err instanceof RunCancelledError || ctx.signal.aborted) {
        this.setStage(ctx, "CANCELLED");
        this.trace.add(runId, "CANCELLED", "cancelled", `run ${runId} cancelled`);
        const result = this.buildResult(ctx, "cancelled", "");
        this.callbacks.onRunComplete?.(result);
        return result;
      }
      this.setStage(ctx, "FAILED");
      this.trace.add(runId, "FAILED", "error", errorMessage(err));
      this.log.error(`[Orchestrator] Run ${runId} failed: ${errorMessage(err)}`);
      throw err;
    } finally {
      link.dispose();
      if (this.active?.runId === runId) this.active = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Run phases
  // ---------------------------------------------------------------------------

  private async execute(ctx: RunContext, options: RunOptions): Promise<RunResult> {
    if (!ctx.question) {
      return this.buildResult(ctx, "failed", "", new Error("Question is empty"));
    }

    this.setStage(ctx, "DECIDING");
    const record = this.memory ? await this.memory.get(ctx.question) : null;
    throwIfAborted(ctx.signal);

    if (record) {
      this.trace.add(ctx.runId, "DECIDING", "memory_hit", `replaying "${record.question}"`);
      return this.replay(ctx, record, options.skipReplayThinking ?? false);
    }

    if (options.replayOnly) {
      this.trace.add(ctx.runId, "DECIDING", "memory_miss", "replay-only => unavailable");
      ctx.source = "unavailable";
      await this.dispatchAnswer(ctx, UNAVAILABLE_ANSWER, null);
      return this.buildResult(ctx, "completed", UNAVAILABLE_ANSWER);
    }

    const decision = freezeDecision(await this.generator.decide(ctx.question, ctx.signal));
    throwIfAborted(ctx.signal);
    ctx.decision = decision;
    this.trace.add(
      ctx.runId,
      "DECIDING",
      "decision",
      `need_thinking=${decision.needThinking} confidence=${decision.confidence ?? "none"}`,
      { notes: decision.thinkingNotes.length, plan: decision.behaviorPlan.length },
    );

    return decision.needThinking
      ? this.thinkAndAnswer(ctx, decision)
      : this.respondDirectly(ctx, decision);
  }

  private async replay(ctx: RunContext, record: TrialRecord, skipThinking: boolean): Promise<RunResult> {
    this.setStage(ctx, "REPLAYING");
    ctx.source = "replay";
    ctx.decision = freezeDecision(record.decision);

    if (!skipThinking && record.thinkingCues.length > 0) {
      const barrier = new Barrier(this.now);
      const outcome = await this.relayThinking(
        ctx,
        { notes: record.thinkingCues, plan: record.decision.behaviorPlan },
        barrier,
        ctx.signal,
      );
      if (outcome === "cancelled") throw new RunCancelledError();
      ctx.thinkingClosedAt = barrier.openedAt ?? undefined;
    } else {
      ctx.cues = [...record.thinkingCues];
    }

    const confidence = record.finalConfidence;
    this.setConfidence(ctx, confidence, "stored");
    await this.dispatchAnswer(ctx, record.answer || FALLBACK_ANSWER, confidence);
    return this.buildResult(ctx, "completed", record.answer || FALLBACK_ANSWER);
  }

  private async respondDirectly(ctx: RunContext, decision: ControllerDecision): Promise<RunResult> {
    this.setStage(ctx, "DIRECT");
    ctx.source = "direct";
    const generated = decision.answer.trim();
    const answer = generated || FALLBACK_ANSWER;
    const confidence = resolveDirectConfidence(decision.confidence);
    this.setConfidence(ctx, confidence, decision.confidence ? "hint" : "default");

    await this.dispatchAnswer(ctx, answer, confidence);
    if (generated) await this.persist(ctx, answer, confidence, decision);
    else this.skipPersist(ctx);
    return this.buildResult(ctx, "completed", answer);
  }

  private async thinkAndAnswer(ctx: RunContext, decision: ControllerDecision): Promise<RunResult> {
    this.setStage(ctx, "THINKING_AND_ANSWERING");
    ctx.source = "generated";
    const { openai } = this.config;

    const barrier = new Barrier(this.now);
    const phase = linkSignals(ctx.signal);
    const thinking = this.relayThinking(
      ctx,
      {
        notes: decision.thinkingNotes,
        plan: decision.behaviorPlan,
        stream: {
          systemPrompt: THINKING_SYSTEM_PROMPT,
          userContent: buildThinkingPrompt(ctx.question, decision.thinkingNotes),
          model: openai.thinkingModel,
          temperature: openai.thinkingTemperature,
        },
      },
      barrier,
      phase.controller.signal,
    );

    let answer: GeneratedAnswer;
    try {
      answer = await this.relayAnswer(ctx, decision, barrier);
    } catch (err) {
      phase.controller.abort();
      await thinking;
      phase.dispose();
      if (err instanceof StreamTransportError && !ctx.signal.aborted) {
        this.log.warn(`[Orchestrator] Answer stream failed: ${err.message}`);
        this.trace.add(ctx.runId, "THINKING_AND_ANSWERING", "answer_failed", err.message);
        return this.buildResult(ctx, "failed", "", err);
      }
      throw err;
    }

    await thinking;
    phase.dispose();
    throwIfAborted(ctx.signal);
    ctx.thinkingClosedAt = barrier.openedAt ?? undefined;

    await this.dispatchAnswer(ctx, answer.text, answer.confidence);
    if (answer.fallback) this.skipPersist(ctx);
    else await this.persist(ctx, answer.text, answer.confidence, decision);
    return this.buildResult(ctx, "completed", answer.text);
  }

  /**
   * Notes first, then streamed cues, until maxCues or maxDurationMs. Then
   * hold the window open until min(minDurationMs, maxDurationMs) has passed
   * and open the barrier. Never rejects.
   */
  private async relayThinking(
    ctx: RunContext,
    window: ThinkingWindow,
    barrier: Barrier,
    signal: AbortSignal,
  ): Promise<WindowOutcome> {
    const { minDurationMs, maxDurationMs, pauseMs, maxCues, behaviors } = this.config.thinking;
    const startedAt = this.now();
    const deadline = startedAt + maxDurationMs;
    let emitted = 0;
    const exhausted = () => this.now() >= deadline || emitted >= maxCues;

    const windowLink = linkSignals(signal);
    const timer = setTimeout(() => windowLink.controller.abort(), Math.max(0, maxDurationMs));
    const windowSignal = windowLink.controller.signal;
    this.setState(ctx, { thinkingMode: true });

    const emit = async (text: string) => {
      throwIfAborted(signal);
      const cue: ThinkingCue = { text, index: emitted };
      const step = pickThinkingStep(cue.index, window.plan, behaviors);
      ctx.cues.push(text);
      emitted++;
      this.setState(ctx, { thinkingCues: [...ctx.cues] });
      this.trace.add(ctx.runId, ctx.stage, "thinking_cue", `#${cue.index} ${text}`);
      this.log.info(`[Orchestrator] Robot (thinking): ${text}`);
      this.callbacks.onThinkingCue?.(cue, step);
      if (!ctx.speechOnly) await this.actuation.performStep(step);
    };

    try {
      try {
        for (const note of window.notes) {
          if (exhausted()) break;
          const cleaned = note.trim();
          if (!cleaned) continue;
          await emit(cleaned);
          if (exhausted()) break;
          await sleep(pauseMs, windowSignal);
        }

        const request = window.stream;
        if (request && !exhausted()) {
          const stream = new SentenceStream(
            (streamSignal) => this.generator.openStream(request, streamSignal),
            { capacity: this.config.streamQueueCapacity, signal: windowSignal },
          );
          for await (const clause of stream) {
            if (exhausted()) break;
            if (!isMeaningfulThinkingCue(clause)) continue;
            await emit(clause);
            if (exhausted()) break;
            await sleep(pauseMs, windowSignal);
          }
        }
      } catch (err) {
        if (signal.aborted) return "cancelled";
        if (err instanceof RunCancelledError) {
          this.trace.add(ctx.runId, ctx.stage, "thinking_deadline", `max_duration_ms=${maxDurationMs} reached`);
        } else {
          this.log.warn(`[Orchestrator] Thinking stream failed: ${errorMessage(err)}`);
          this.trace.add(ctx.runId, ctx.stage, "thinking_failed", errorMessage(err));
        }
      } finally {
        clearTimeout(timer);
        windowLink.dispose();
      }

      const floor = Math.min(minDurationMs, maxDurationMs);
      const elapsed = this.now() - startedAt;
      if (elapsed < floor) {
        try {
          await sleep(floor - elapsed, signal);
        } catch (err) {
          if (err instanceof RunCancelledError) return "cancelled";
          throw err;
        }
      }
      return "closed";
    } finally {
      barrier.open();
      this.setState(ctx, { thinkingMode: false });
      this.trace.add(ctx.runId, ctx.stage, "thinking_closed", `cues=${emitted} elapsed_ms=${this.now() - startedAt}`);
    }
  }

  /** Collect the answer; the first clause waits for the thinking window to close. */
  private async relayAnswer(
    ctx: RunContext,
    decision: ControllerDecision,
    barrier: Barrier,
  ): Promise<GeneratedAnswer> {
    const { openai } = this.config;
    const request: StreamRequest = {
      systemPrompt: REASONING_SYSTEM_PROMPT,
      userContent: buildReasoningPrompt(ctx.question, decision.reasoningHint, toneInstructionFor(decision.confidence)),
      model: openai.reasoningModel,
      temperature: openai.reasoningTemperature,
    };
    const stream = new SentenceStream(
      (streamSignal) => this.generator.openStream(request, streamSignal),
      { capacity: this.config.streamQueueCapacity, signal: ctx.signal },
    );

    const parts: string[] = [];
    let confidence: ConfidenceTier | null = null;
    const settleConfidence = async () => {
      await barrier.wait(ctx.signal);
      const tier = resolveConfidence(decision.confidence, stream.wordCount);
      this.setConfidence(ctx, tier, decision.confidence ? "hint" : `word_count=${stream.wordCount}`);
      return tier;
    };

    for await (const clause of stream) {
      confidence ??= await settleConfidence();
      parts.push(clause);
      this.callbacks.onAnswerClause?.(clause, ctx.runId);
    }
    confidence ??= await settleConfidence();

    const text = parts.join(" ").trim();
    return text ? { text, confidence, fallback: false } : { text: FALLBACK_ANSWER, confidence, fallback: true };
  }

  // ---------------------------------------------------------------------------
  // Effects
  // ---------------------------------------------------------------------------

  /** Confidence behaviour (if any), then the run's single speak(). */
  private async dispatchAnswer(ctx: RunContext, answer: string, confidence: ConfidenceTier | null) {
    throwIfAborted(ctx.signal);
    if (confidence && !ctx.speechOnly) {
      await this.actuation.performConfidence(getConfidenceBehavior(confidence));
      throwIfAborted(ctx.signal);
    }

    ctx.answerDispatchedAt = this.now();
    this.trace.add(ctx.runId, ctx.stage, "speak", answer, { confidence });
    this.log.info(`[Orchestrator] Robot: ${answer}`);
    await this.actuation.speak(answer);
    this.setState(ctx, { lastAnswer: answer });
  }

  private async persist(
    ctx: RunContext,
    answer: string,
    confidence: ConfidenceTier,
    decision: ControllerDecision,
  ) {
    if (!this.memory) return;
    throwIfAborted(ctx.signal);
    await this.memory.saveRecord({
      question: ctx.question,
      answer,
      thinkingCues: [...ctx.cues],
      decision,
      finalConfidence: confidence,
    });
    this.trace.add(ctx.runId, ctx.stage, "persist", `saved "${ctx.question}"`);
  }

  /** A fallback answer is never stored, so the next ask generates again. */
  private skipPersist(ctx: RunContext) {
    this.trace.add(ctx.runId, ctx.stage, "persist_skipped", "no generated answer");
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  private setConfidence(ctx: RunContext, tier: ConfidenceTier, basis: string) {
    ctx.confidence = tier;
    this.setState(ctx, { pendingConfidence: tier });
    this.trace.add(ctx.runId, ctx.stage, "confidence", `${basis} => confidence=${tier}`);
  }

  private buildResult(
    ctx: RunContext,
    status: RunResult["status"],
    answer: string,
    error?: Error,
  ): RunResult {
    return {
      runId: ctx.runId,
      status,
      source: ctx.source,
      question: ctx.question,
      answer,
      thinkingCues: [...ctx.cues],
      confidence: ctx.confidence,
      decision: ctx.decision,
      timings: {
        startedAt: ctx.startedAt,
        ...(ctx.thinkingClosedAt === undefined ? {} : { thinkingClosedAt: ctx.thinkingClosedAt }),
        ...(ctx.answerDispatchedAt === undefined ? {} : { answerDispatchedAt: ctx.answerDispatchedAt }),
        finishedAt: this.now(),
      },
      ...(error ? { error } : {}),
    };
  }

  private setStage(ctx: RunContext, stage: Stage) {
    if (ctx.stage === stage) return;
    const previous = ctx.stage;
    ctx.stage = stage;
    this.trace.add(ctx.runId, stage, "stage", `${previous} => ${stage}`);
    if (this.state.runId !== ctx.runId) return;
    this.setState(ctx, { stage });
    this.callbacks.onStageChange?.(stage, ctx.runId);
  }

  /** Only the newest run may touch the published state. */
  private setState(ctx: RunContext, patch: Partial<OrchestratorState>) {
    if (this.state.runId !== ctx.runId) return;
    this.state = { ...this.state, ...patch };
    this.notifyListeners();
  }

  private notifyListeners() {
    this.snapshot = { ...this.state };
    for (const l of this.stateListeners) l();
  }
}
