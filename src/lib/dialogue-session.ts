/**
 * dialogue-session.ts: Turns conversation events into orchestrator runs.
 *
 * USER_SPEECH_START cancels whatever the robot is working on, USER_UTTERANCE
 * starts a new run (cancelling any active one), ROBOT_SPEECH_END commits the
 * robot's turn to the history. Run failures are logged here and the session
 * returns to idle.
 */

import type { DialogueTurn, RunResult, RunStatus, SessionEvent, Stage } from "./dialogue-types.ts";
import type { DialogueOrchestrator } from "./dialogue-orchestrator.ts";
import { UtteranceLog } from "./utterance-log.ts";
import { errorMessage } from "./errors.ts";
import { logger as defaultLogger } from "./logger.ts";
import type { Logger } from "./logger.ts";

const MAX_HISTORY = 50;

const FINAL_STAGE: Record<RunStatus, Stage> = {
  completed: "DONE",
  cancelled: "CANCELLED",
  failed: "FAILED",
};

export interface DialogueSessionOptions {
  replayOnly?: boolean;
  skipReplayThinking?: boolean;
  /** Speak without gestures or expressions. */
  speechOnly?: boolean;
  maxHistory?: number;
  logger?: Logger;
  onResult?: (result: RunResult) => void;
  onError?: (error: unknown, question: string) => void;
}

export class DialogueSession {
  readonly utterances = new UtteranceLog();
  private history: DialogueTurn[] = [];
  private pending: Set<Promise<void>> = new Set();
  private lastResult: RunResult | null = null;
  private readonly orchestrator: DialogueOrchestrator;
  private readonly options: DialogueSessionOptions;
  private readonly log: Logger;

  constructor(orchestrator: DialogueOrchestrator, options: DialogueSessionOptions = {}) {
    this.orchestrator = orchestrator;
    this.options = options;
    this.log = options.logger ?? defaultLogger;
  }

  dispatch(event: SessionEvent) {
    switch (event.type) {
      case "USER_SPEECH_START":
        if (this.orchestrator.cancel("user started speaking")) {
          this.log.info("[Session] User barge-in, active run cancelled");
        }
        break;

      case "USER_UTTERANCE":
        this.handleUtterance(event.text);
        break;

      case "ROBOT_SPEECH_END":
        if (event.aborted) {
          this.log.info(`[Session] Robot speech interrupted: ${event.text}`);
        } else if (event.text.trim()) {
          this.pushTurn({ role: "assistant", content: event.text.trim() });
        }
        break;

      case "RESET":
        this.orchestrator.cancel("session reset");
        this.history = [];
        this.lastResult = null;
        this.utterances.clear();
        break;
    }
  }

  getHistory(): DialogueTurn[] {
    return [...this.history];
  }

  getLastResult(): RunResult | null {
    return this.lastResult;
  }

  /** Resolves once every run started so far has settled. */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private handleUtterance(raw: string) {
    const text = raw.trim();
    const stage = this.orchestrator.getState().stage;
    if (!text) {
      this.utterances.ignore(raw, stage);
      return;
    }

    const utterance = this.utterances.receive(text, stage);
    this.pushTurn({ role: "user", content: text });

    const run: Promise<void> = this.orchestrator
      .run(text, {
        replayOnly: this.options.replayOnly,
        skipReplayThinking: this.options.skipReplayThinking,
        speechOnly: this.options.speechOnly,
      })
      .then(
        (result) => this.settle(utterance.id, result),
        (err: unknown) => {
          this.log.error(`[Session] Could not answer "${text}": ${errorMessage(err)}`);
          this.utterances.settle(utterance.id, "failed", "FAILED");
          this.options.onError?.(err, text);
        },
      )
      .finally(() => {
        this.pending.delete(run);
      });
    this.pending.add(run);
    // run() claims its id before its first await
    this.utterances.attachRun(utterance.id, this.orchestrator.getState().runId);
  }

  private settle(utteranceId: number, result: RunResult) {
    this.utterances.settle(utteranceId, result.status, FINAL_STAGE[result.status]);
    if (result.status === "completed") this.lastResult = result;
    this.options.onResult?.(result);
  }

  private pushTurn(turn: DialogueTurn) {
    this.history.push(turn);
    const limit = this.options.maxHistory ?? MAX_HISTORY;
    if (this.history.length > limit) this.history = this.history.slice(-limit);
  }
}
