import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DialogueOrchestrator, FALLBACK_ANSWER, UNAVAILABLE_ANSWER } from "../dialogue-orchestrator.ts";
import type { OrchestratorCallbacks } from "../dialogue-orchestrator.ts";
import type { ActuationSink } from "../actuation-sink.ts";
import type {
  ConfidenceTier,
  ControllerDecision,
  Stage,
  StreamRequest,
  TextGenerationService,
} from "../dialogue-types.ts";
import { createAgentConfig } from "../config.ts";
import type { ThinkingSettings } from "../config.ts";
import { TrialMemory } from "../trial-memory.ts";
import { DecisionParseError, StreamTransportError } from "../errors.ts";
import { REASONING_SYSTEM_PROMPT, THINKING_SYSTEM_PROMPT } from "../prompt-templates.ts";
import { sleep } from "../timing.ts";
import { captureLogger } from "./log-capture.ts";
import type { Logger } from "../logger.ts";

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

interface StreamScript {
  thinking?: string[];
  answer?: string[];
  thinkingError?: Error;
  answerError?: Error;
  /** Keep producing thinking clauses until the window aborts the stream. */
  endlessThinking?: boolean;
  fragmentDelayMs?: number;
}

class FakeGenerator implements TextGenerationService {
  readonly requests: StreamRequest[] = [];
  private readonly decisions: Map<string, ControllerDecision | Error>;
  private readonly script: StreamScript;

  readonly decide = vi.fn(async (question: string) => {
    const decision = this.decisions.get(question);
    if (decision === undefined) throw new Error(`no decision scripted for "${question}"`);
    if (decision instanceof Error) throw decision;
    return decision;
  });

  constructor(decisions: Record<string, ControllerDecision | Error>, script: StreamScript = {}) {
    this.decisions = new Map(Object.entries(decisions));
    this.script = script;
  }

  async *openStream(request: StreamRequest, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    this.requests.push(request);
    const delay = this.script.fragmentDelayMs ?? 0;
    const isThinking = request.model === "think-model";

    if (isThinking && this.script.endlessThinking) {
      for (let i = 1; ; i++) {
        await sleep(delay, signal);
        yield `Thought number ${i}.`;
      }
    }

    for (const fragment of (isThinking ? this.script.thinking : this.script.answer) ?? []) {
      await sleep(delay, signal);
      yield fragment;
    }
    const failure = isThinking ? this.script.thinkingError : this.script.answerError;
    if (failure) throw failure;
  }

  requestFor(model: string): StreamRequest | undefined {
    return this.requests.find((request) => request.model === model);
  }
}

class RecordingSink implements ActuationSink {
  readonly events: string[] = [];
  failGestures = false;

  speak(text: string) {
    this.events.push(`speak:${text}`);
  }

  performGesture(name: string) {
    if (this.failGestures) throw new Error("servo stalled");
    this.events.push(`gesture:${name}`);
  }

  performExpression(name: string) {
    this.events.push(`expression:${name}`);
  }

  attend(x: number, y: number, z: number) {
    this.events.push(`attend:${x},${y},${z}`);
  }

  get spoken(): string[] {
    return this.events.filter((event) => event.startsWith("speak:"));
  }
}

function direct(answer: string, confidence?: ConfidenceTier): ControllerDecision {
  return {
    needThinking: false,
    ...(confidence ? { confidence } : {}),
    thinkingNotes: [],
    behaviorPlan: [],
    reasoningHint: "",
    answer,
  };
}

function thinking(overrides: Partial<ControllerDecision> = {}): ControllerDecision {
  return {
    needThinking: true,
    thinkingNotes: ["Checking the options"],
    behaviorPlan: [{ gesture: "look straight" }],
    reasoningHint: "Mention reliability",
    answer: "",
    ...overrides,
  };
}

const QUESTION = "Why are robots useful?";

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

describe("DialogueOrchestrator", () => {
  let dir: string;
  let memory: TrialMemory;
  let sink: RecordingSink;
  let log: Logger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "orchestrator-"));
    log = captureLogger();
    memory = new TrialMemory({ path: join(dir, "trials.json"), logger: log });
    sink = new RecordingSink();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function build(
    generator: TextGenerationService,
    options: {
      thinking?: Partial<ThinkingSettings>;
      callbacks?: OrchestratorCallbacks;
      withMemory?: boolean;
    } = {},
  ) {
    const config = createAgentConfig({
      openai: { apiKey: "test-secret", thinkingModel: "think-model", reasoningModel: "answer-model" },
      thinking: { minDurationMs: 40, maxDurationMs: 500, pauseMs: 1, maxCues: 12, ...options.thinking },
    });
    return new DialogueOrchestrator({
      generator,
      actuation: sink,
      memory: options.withMemory === false ? null : memory,
      config,
      callbacks: options.callbacks,
      logger: log,
    });
  }

  // -------------------------------------------------------------------------
  // Direct answers
  // -------------------------------------------------------------------------

  describe("direct answers", () => {
    it("speaks the controller's answer once after the confidence behaviour", async () => {
      const generator = new FakeGenerator({ "Hi?": direct("Hello there.", "high") });
      const stages: Stage[] = [];
      const orchestrator = build(generator, { callbacks: { onStageChange: (stage) => stages.push(stage) } });

      const result = await orchestrator.run("Hi?");

      expect(result.status).toBe("completed");
      expect(result.source).toBe("direct");
      expect(result.answer).toBe("Hello there.");
      expect(result.confidence).toBe("high");
      expect(result.timings.thinkingClosedAt).toBeUndefined();
      expect(sink.events).toEqual(["gesture:nod head", "expression:BigSmile", "speak:Hello there."]);
      expect(generator.requests).toEqual([]);
      expect(stages).toEqual(["DECIDING", "DIRECT", "DONE"]);
      expect(orchestrator.getState().stage).toBe("DONE");
    });

    it("persists the run for later replay", async () => {
      const orchestrator = build(new FakeGenerator({ "Hi?": direct("Hello there.", "high") }));
      await orchestrator.run("Hi?");

      const stored = await memory.get("Hi?");
      expect(stored?.answer).toBe("Hello there.");
      expect(stored?.thinkingCues).toEqual([]);
      expect(stored?.finalConfidence).toBe("high");
      expect(stored?.decision.needThinking).toBe(false);
    });

    it("defaults to medium confidence and a fallback answer", async () => {
      const orchestrator = build(new FakeGenerator({ "Hi?": direct("   ") }));
      const result = await orchestrator.run("Hi?");

      expect(result.confidence).toBe("medium");
      expect(result.answer).toBe(FALLBACK_ANSWER);
      expect(sink.spoken).toEqual([`speak:${FALLBACK_ANSWER}`]);
      expect(await memory.size()).toBe(0);
    });

    it("keeps going when the robot fails to gesture", async () => {
      sink.failGestures = true;
      const orchestrator = build(new FakeGenerator({ "Hi?": direct("Hello there.", "low") }));

      const result = await orchestrator.run("Hi?");

      expect(result.status).toBe("completed");
      expect(sink.events).toEqual(["expression:Oh", "speak:Hello there."]);
    });
  });

  // -------------------------------------------------------------------------
  // Visible thinking
  // -------------------------------------------------------------------------

  describe("thinking and answering", () => {
    const script: StreamScript = {
      thinking: ["Let me compare", " them. Almost", " there."],
      answer: ["Robots are ", "helpful. They ", "never tire."],
    };

    it("emits notes then streamed cues, and answers after the window closes", async () => {
      const generator = new FakeGenerator({ [QUESTION]: thinking() }, script);
      const cues: Array<[number, string]> = [];
      const clauses: string[] = [];
      const orchestrator = build(generator, {
        callbacks: {
          onThinkingCue: (cue) => cues.push([cue.index, cue.text]),
          onAnswerClause: (clause) => clauses.push(clause),
        },
      });

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe("completed");
      expect(result.source).toBe("generated");
      expect(result.thinkingCues).toEqual(["Checking the options", "Let me compare them.", "Almost there."]);
      expect(cues).toEqual([
        [0, "Checking the options"],
        [1, "Let me compare them."],
        [2, "Almost there."],
      ]);
      expect(clauses).toEqual(["Robots are helpful.", "They never tire."]);
      expect(result.answer).toBe("Robots are helpful. They never tire.");
      expect(result.confidence).toBe("low");
    });

    it("pairs every cue with the plan and speaks exactly once at the end", async () => {
      const orchestrator = build(new FakeGenerator({ [QUESTION]: thinking() }, script));
      await orchestrator.run(QUESTION);

      expect(sink.events).toEqual([
        "gesture:look straight",
        "gesture:look straight",
        "gesture:look straight",
        "gesture:slight head shake",
        "expression:Oh",
        "speak:Robots are helpful. They never tire.",
      ]);
    });

    it("holds the answer until the minimum thinking time has passed", async () => {
      const orchestrator = build(new FakeGenerator({ [QUESTION]: thinking() }, script));
      const { timings } = await orchestrator.run(QUESTION);

      expect(timings.thinkingClosedAt).toBeDefined();
      expect(timings.answerDispatchedAt).toBeDefined();
      expect(timings.answerDispatchedAt ?? 0).toBeGreaterThanOrEqual(timings.thinkingClosedAt ?? Infinity);
      expect((timings.thinkingClosedAt ?? 0) - timings.startedAt).toBeGreaterThanOrEqual(30);
    });

    it("builds the thinking and answer requests from the decision", async () => {
      const generator = new FakeGenerator({ [QUESTION]: thinking() }, script);
      await build(generator).run(QUESTION);

      expect(generator.requestFor("think-model")).toEqual({
        systemPrompt: THINKING_SYSTEM_PROMPT,
        userContent:
          "User question: Why are robots useful?\n" +
          "Preliminary thoughts:\n" +
          "- Checking the options\n" +
          "Follow the system prompt to generate visible thinking phrases.",
        model: "think-model",
        temperature: 0.2,
      });
      expect(generator.requestFor("answer-model")).toEqual({
        systemPrompt: REASONING_SYSTEM_PROMPT,
        userContent:
          "User question: Why are robots useful?\n" +
          "Preliminary hint to consider: Mention reliability\n" +
          "Please summarize the solution in 2-3 sentences, do not output chain-of-thought reasoning.",
        model: "answer-model",
        temperature: 0.4,
      });
    });

    it("lets a confidence hint override the word count and set the tone", async () => {
      const generator = new FakeGenerator({ [QUESTION]: thinking({ confidence: "high" }) }, script);
      const result = await build(generator).run(QUESTION);

      expect(result.confidence).toBe("high");
      expect(generator.requestFor("answer-model")?.userContent).toContain(
        "\nAdopt this tone: Respond with warm, natural confidence without sounding scripted.",
      );
      expect(sink.events.slice(-3)).toEqual(["gesture:nod head", "expression:BigSmile", "speak:Robots are helpful. They never tire."]);
    });

    it("stores the cues and final confidence", async () => {
      await build(new FakeGenerator({ [QUESTION]: thinking() }, script)).run(QUESTION);

      const stored = await memory.get(QUESTION);
      expect(stored?.thinkingCues).toEqual(["Checking the options", "Let me compare them.", "Almost there."]);
      expect(stored?.finalConfidence).toBe("low");
      expect(stored?.answer).toBe("Robots are helpful. They never tire.");
    });

    it("stops emitting cues at maxCues", async () => {
      const generator = new FakeGenerator(
        { [QUESTION]: thinking({ thinkingNotes: ["One", "Two", "Three", "Four"] }) },
        script,
      );
      const result = await build(generator, { thinking: { maxCues: 2 } }).run(QUESTION);

      expect(result.thinkingCues).toEqual(["One", "Two"]);
      expect(generator.requestFor("think-model")).toBeUndefined();
    });

    it("closes the window at maxDurationMs even if the stream keeps going", async () => {
      const generator = new FakeGenerator(
        { [QUESTION]: thinking({ thinkingNotes: [] }) },
        { endlessThinking: true, fragmentDelayMs: 15, answer: ["Done."] },
      );
      const orchestrator = build(generator, { thinking: { minDurationMs: 1000, maxDurationMs: 50 } });

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe("completed");
      expect(result.answer).toBe("Done.");
      expect(result.thinkingCues.length).toBeLessThanOrEqual(4);
      expect((result.timings.thinkingClosedAt ?? Infinity) - result.timings.startedAt).toBeLessThan(500);
      expect(orchestrator.trace.forRun(result.runId).map((entry) => entry.event)).toContain("thinking_deadline");
    });

    it("still answers when the thinking stream fails", async () => {
      const generator = new FakeGenerator(
        { [QUESTION]: thinking() },
        { thinkingError: new Error("thinking model down"), answer: ["Still here."] },
      );
      const orchestrator = build(generator);

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe("completed");
      expect(result.thinkingCues).toEqual(["Checking the options"]);
      expect(result.answer).toBe("Still here.");
      expect(orchestrator.trace.forRun(result.runId).map((entry) => entry.event)).toContain("thinking_failed");
    });

    it("speaks the fallback when the answer stream is empty", async () => {
      const generator = new FakeGenerator({ [QUESTION]: thinking() }, { thinking: ["Hmm."], answer: [] });
      const result = await build(generator).run(QUESTION);

      expect(result.answer).toBe(FALLBACK_ANSWER);
      expect(result.confidence).toBe("low");
      expect(sink.spoken).toEqual([`speak:${FALLBACK_ANSWER}`]);
    });

    it("does not store a fallback answer, so the next ask generates again", async () => {
      const generator = new FakeGenerator({ [QUESTION]: thinking() }, { thinking: ["Hmm."], answer: [] });
      const orchestrator = build(generator);

      const first = await orchestrator.run(QUESTION);
      const second = await orchestrator.run(QUESTION);

      expect(await memory.size()).toBe(0);
      expect(second.source).toBe("generated");
      expect(generator.decide).toHaveBeenCalledTimes(2);
      expect(orchestrator.trace.forRun(first.runId).map((entry) => entry.event)).toContain("persist_skipped");
    });

    it("performs no gestures or expressions in speech-only mode", async () => {
      const generator = new FakeGenerator(
        { [QUESTION]: thinking({ confidence: "high" }) },
        { thinking: ["Hmm."], answer: ["Robots help."] },
      );
      const result = await build(generator).run(QUESTION, { speechOnly: true });

      expect(result.thinkingCues).toEqual(["Checking the options", "Hmm."]);
      expect(sink.events).toEqual(["speak:Robots help."]);
    });

    it("fails the run without speaking when the answer stream fails", async () => {
      const generator = new FakeGenerator(
        { [QUESTION]: thinking() },
        { thinking: ["Hmm."], answerError: new Error("answer model down") },
      );
      const orchestrator = build(generator);

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe("failed");
      expect(result.error).toBeInstanceOf(StreamTransportError);
      expect(result.error?.message).toBe("Fragment stream failed: answer model down");
      expect(sink.spoken).toEqual([]);
      expect(await memory.size()).toBe(0);
      expect(orchestrator.getState().stage).toBe("FAILED");
    });
  });

  // -------------------------------------------------------------------------
  // Replay
  // -------------------------------------------------------------------------

  describe("replay", () => {
    beforeEach(async () => {
      await memory.saveRecord({
        question: QUESTION,
        answer: "Stored answer.",
        thinkingCues: ["Recalling it"],
        decision: thinking(),
        finalConfidence: "medium",
      });
    });

    it("replays a stored run without calling the generation service", async () => {
      const generator = new FakeGenerator({});
      const orchestrator = build(generator);
      const before = readFileSync(join(dir, "trials.json"), "utf-8");

      const first = await orchestrator.run("why are robots useful");
      const second = await orchestrator.run("Why are robots useful?!");

      expect(first.source).toBe("replay");
      expect(first.answer).toBe("Stored answer.");
      expect(second.answer).toBe("Stored answer.");
      expect(first.thinkingCues).toEqual(["Recalling it"]);
      expect(first.confidence).toBe("medium");
      expect(generator.decide).not.toHaveBeenCalled();
      expect(generator.requests).toEqual([]);
      expect(readFileSync(join(dir, "trials.json"), "utf-8")).toBe(before);
    });

    it("shows the stored cues with the stored plan before speaking", async () => {
      const result = await build(new FakeGenerator({})).run(QUESTION);

      expect(sink.events).toEqual([
        "gesture:look straight",
        "gesture:look straight",
        "expression:Thoughtful",
        "speak:Stored answer.",
      ]);
      expect(result.timings.answerDispatchedAt ?? 0).toBeGreaterThanOrEqual(result.timings.thinkingClosedAt ?? Infinity);
    });

    it("can skip the thinking window", async () => {
      const result = await build(new FakeGenerator({})).run(QUESTION, { skipReplayThinking: true });

      expect(sink.events).toEqual(["gesture:look straight", "expression:Thoughtful", "speak:Stored answer."]);
      expect(result.thinkingCues).toEqual(["Recalling it"]);
      expect(result.timings.thinkingClosedAt).toBeUndefined();
    });

    it("replays in speech-only mode without moving the robot", async () => {
      const result = await build(new FakeGenerator({})).run(QUESTION, { speechOnly: true });

      expect(result.thinkingCues).toEqual(["Recalling it"]);
      expect(sink.events).toEqual(["speak:Stored answer."]);
    });

    it("answers a replay-only miss with the unavailable message", async () => {
      const generator = new FakeGenerator({});
      const result = await build(generator).run("What is the capital of Mars?", { replayOnly: true });

      expect(result.status).toBe("completed");
      expect(result.source).toBe("unavailable");
      expect(result.confidence).toBeNull();
      expect(result.answer).toBe(UNAVAILABLE_ANSWER);
      expect(sink.events).toEqual([`speak:${UNAVAILABLE_ANSWER}`]);
      expect(generator.decide).not.toHaveBeenCalled();
      expect(await memory.size()).toBe(1);
    });
  });

  // -------------------------------------------------------------------------
  // Cancellation and failures
  // -------------------------------------------------------------------------

  describe("cancellation", () => {
    it("cancels mid-thinking with no speech and no record", async () => {
      const generator = new FakeGenerator(
        { [QUESTION]: thinking() },
        { thinking: ["Hmm. Let me see."], answer: ["Too late."], fragmentDelayMs: 5 },
      );
      const orchestrator: DialogueOrchestrator = build(generator, {
        callbacks: {
          onThinkingCue: (cue) => {
            if (cue.index === 0) orchestrator.cancel("user barge-in");
          },
        },
      });

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe("cancelled");
      expect(sink.spoken).toEqual([]);
      expect(await memory.size()).toBe(0);
      expect(orchestrator.getState().stage).toBe("CANCELLED");
      expect(orchestrator.isRunning()).toBe(false);
    });

    it("cancels through the caller's signal", async () => {
      const generator = new FakeGenerator(
        { [QUESTION]: thinking() },
        { thinking: ["Hmm."], answer: ["Too late."], fragmentDelayMs: 5 },
      );
      const controller = new AbortController();
      const orchestrator = build(generator, {
        callbacks: { onThinkingCue: () => controller.abort() },
      });

      const result = await orchestrator.run(QUESTION, { signal: controller.signal });

      expect(result.status).toBe("cancelled");
      expect(sink.spoken).toEqual([]);
    });

    it("lets a new question supersede the active run", async () => {
      const generator = new FakeGenerator(
        { "Slow?": thinking(), "Fast?": direct("Quick answer.", "high") },
        { thinking: ["Hmm."], answer: ["Slow answer."], fragmentDelayMs: 5 },
      );
      const orchestrator = build(generator, { thinking: { minDurationMs: 1000, maxDurationMs: 2000 } });

      const first = orchestrator.run("Slow?");
      await vi.waitFor(() => expect(orchestrator.getState().stage).toBe("THINKING_AND_ANSWERING"), {
        interval: 5,
      });
      const second = await orchestrator.run("Fast?");
      const superseded = await first;

      expect(superseded.status).toBe("cancelled");
      expect(second.status).toBe("completed");
      expect(second.runId).toBe(superseded.runId + 1);
      expect(sink.spoken).toEqual(["speak:Quick answer."]);
      expect(orchestrator.getState().question).toBe("Fast?");
      expect(orchestrator.getState().stage).toBe("DONE");
      expect(await memory.listQuestions()).toEqual(["Fast?"]);
    });

    it("returns false when there is nothing to cancel", () => {
      expect(build(new FakeGenerator({})).cancel()).toBe(false);
    });
  });

  describe("failures", () => {
    it("rejects with DecisionParseError and speaks nothing", async () => {
      const generator = new FakeGenerator({
        [QUESTION]: new DecisionParseError("Controller response is not valid JSON: Unexpected token", "oops"),
      });
      const orchestrator = build(generator);

      await expect(orchestrator.run(QUESTION)).rejects.toBeInstanceOf(DecisionParseError);
      expect(sink.events).toEqual([]);
      expect(orchestrator.getState().stage).toBe("FAILED");
      expect(orchestrator.isRunning()).toBe(false);
    });

    it("fails an empty question without deciding", async () => {
      const generator = new FakeGenerator({});
      const result = await build(generator).run("   ");

      expect(result.status).toBe("failed");
      expect(result.error?.message).toBe("Question is empty");
      expect(generator.decide).not.toHaveBeenCalled();
    });

    it("runs without a trial memory", async () => {
      const generator = new FakeGenerator({ "Hi?": direct("Hello there.") });
      const orchestrator = build(generator, { withMemory: false });

      await orchestrator.run("Hi?");
      await orchestrator.run("Hi?");

      expect(generator.decide).toHaveBeenCalledTimes(2);
      expect(await memory.size()).toBe(0);
    });
  });
});
