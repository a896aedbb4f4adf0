/**
 * actuation-sink.ts: Robot-side capabilities and a best-effort wrapper around them.
 *
 * ActuationSink is the capability interface a robot adapter implements.
 * BestEffortActuation wraps any sink (or none) so that a failing call is
 * logged as an ActuationError and never reaches the orchestrator.
 */

import type { BehaviorStep } from "./dialogue-types.ts";
import { ActuationError, errorMessage } from "./errors.ts";
import { describeStep } from "./behavior-plan.ts";
import type { ConfidenceBehavior } from "./confidence.ts";
import { logger as defaultLogger } from "./logger.ts";
import type { Logger } from "./logger.ts";

export interface ActuationSink {
  speak(text: string): void | Promise<void>;
  performGesture(name: string): void | Promise<void>;
  performExpression(name: string): void | Promise<void>;
  /** Turn the head towards a point in metres, robot-relative. */
  attend(x: number, y: number, z: number): void | Promise<void>;
}

export interface BestEffortOptions {
  logger?: Logger;
  onError?: (error: ActuationError) => void;
}

export class BestEffortActuation {
  private readonly sink: ActuationSink | null;
  private readonly log: Logger;
  private readonly onError?: (error: ActuationError) => void;

  constructor(sink: ActuationSink | null, options: BestEffortOptions = {}) {
    this.sink = sink;
    this.log = options.logger ?? defaultLogger;
    this.onError = options.onError;
  }

  hasSink(): boolean {
    return this.sink !== null;
  }

  /** Resolves true when the sink accepted the utterance. */
  speak(text: string): Promise<boolean> {
    return this.attempt("speak", (sink) => sink.speak(text));
  }

  performGesture(name: string): Promise<boolean> {
    return this.attempt(`gesture ${name}`, (sink) => sink.performGesture(name));
  }

  performExpression(name: string): Promise<boolean> {
    return this.attempt(`expression ${name}`, (sink) => sink.performExpression(name));
  }

  attend(x: number, y: number, z: number): Promise<boolean> {
    return this.attempt(`attend (${x}, ${y}, ${z})`, (sink) => sink.attend(x, y, z));
  }

  /** Gesture, expression and gaze of one step, issued together. */
  async performStep(step: BehaviorStep): Promise<void> {
    this.log.debug(`[Actuation] step ${describeStep(step)}`);
    const calls: Array<Promise<boolean>> = [];
    if (step.gesture) calls.push(this.performGesture(step.gesture));
    if (step.expression) calls.push(this.performExpression(step.expression));
    if (step.lookAt) calls.push(this.attend(step.lookAt.x, step.lookAt.y, step.lookAt.z));
    await Promise.all(calls);
  }

  async performConfidence(behavior: ConfidenceBehavior): Promise<void> {
    await Promise.all([
      this.performGesture(behavior.gesture),
      this.performExpression(behavior.expression),
    ]);
  }

  private async attempt(
    action: string,
    call: (sink: ActuationSink) => void | Promise<void>,
  ): Promise<boolean> {
    if (!this.sink) return false;
    try {
      await call(this.sink);
      return true;
    } catch (err) {
      const error = new ActuationError(action, `Failed to ${action}: ${errorMessage(err)}`, { cause: err });
      this.log.warn(`[Actuation] ${error.message}`);
      this.onError?.(error);
      return false;
    }
  }
}

/** Prints every action; stands in for a robot during local runs. */
export class ConsoleActuationSink implements ActuationSink {
  private readonly write: (line: string) => void;

  constructor(write: (line: string) => void = (line) => console.log(line)) {
    this.write = write;
  }

  speak(text: string) {
    this.write(`Robot> ${text}`);
  }

  performGesture(name: string) {
    this.write(`  [gesture] ${name}`);
  }

  performExpression(name: string) {
    this.write(`  [expression] ${name}`);
  }

  attend(x: number, y: number, z: number) {
    this.write(`  [attend] (${x}, ${y}, ${z})`);
  }
}
