/**
 * behavior-plan.ts: Which behaviour step goes with which thinking cue.
 *
 * Cue i uses plan[i % plan.length]. A plan shorter than the cue count wraps
 * around rather than running dry. With no plan at all, cues alternate
 * between two fixed gesture/expression pairs.
 */

import type { BehaviorStep } from "./dialogue-types.ts";

export const DEFAULT_THINKING_GESTURES = ["look straight", "slight head shake"] as const;
export const DEFAULT_THINKING_EXPRESSIONS = ["Thoughtful", "Oh"] as const;

const TERMINAL_PUNCTUATION = /^[\s.!?…]+|[\s.!?…]+$/g;

/** A cue counts only if something remains after stripping punctuation and whitespace at its ends. */
export function isMeaningfulThinkingCue(text: string): boolean {
  return text.replace(TERMINAL_PUNCTUATION, "").length > 0;
}

export function hasActuation(step: BehaviorStep): boolean {
  return Boolean(step.gesture || step.expression || step.lookAt);
}

/** Trimmed, non-empty notes in their original order. */
export function normalizeThinkingNotes(notes: readonly string[]): string[] {
  return notes.map((note) => note.trim()).filter((note) => note.length > 0);
}

export function defaultThinkingStep(index: number): BehaviorStep {
  return {
    gesture: DEFAULT_THINKING_GESTURES[index % DEFAULT_THINKING_GESTURES.length],
    expression: DEFAULT_THINKING_EXPRESSIONS[index % DEFAULT_THINKING_EXPRESSIONS.length],
  };
}

/**
 * Step for cue `index`: the controller's plan first, then the configured
 * scripted behaviours, then the built-in alternation.
 */
export function pickThinkingStep(
  index: number,
  plan: readonly BehaviorStep[],
  fallback: readonly BehaviorStep[] = [],
): BehaviorStep {
  const usable = plan.filter(hasActuation);
  if (usable.length > 0) return usable[index % usable.length];

  const scripted = fallback.filter(hasActuation);
  if (scripted.length > 0) return scripted[index % scripted.length];

  return defaultThinkingStep(index);
}

export function describeStep(step: BehaviorStep): string {
  const parts: string[] = [];
  if (step.gesture) parts.push(`gesture=${step.gesture}`);
  if (step.expression) parts.push(`expression=${step.expression}`);
  if (step.lookAt) parts.push(`look_at=(${step.lookAt.x}, ${step.lookAt.y}, ${step.lookAt.z})`);
  if (step.reason) parts.push(`reason=${step.reason}`);
  return parts.join(", ");
}
