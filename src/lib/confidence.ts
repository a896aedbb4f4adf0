/**
 * confidence.ts: Confidence tier resolution and the tier → behaviour table.
 *
 * A valid hint from the controller always wins. Without one, the answer
 * stream's word count decides: longer replies read as more confident.
 */

import type { ConfidenceTier } from "./dialogue-types.ts";
import { CONFIDENCE_TIERS } from "./dialogue-types.ts";

export const LOW_CONFIDENCE_WORD_LIMIT = 25;
export const MEDIUM_CONFIDENCE_WORD_LIMIT = 60;

export interface ConfidenceBehavior {
  gesture: string;
  expression: string;
}

export const CONFIDENCE_BEHAVIORS: Record<ConfidenceTier, ConfidenceBehavior> = {
  low: { gesture: "slight head shake", expression: "Oh" },
  medium: { gesture: "look straight", expression: "Thoughtful" },
  high: { gesture: "nod head", expression: "BigSmile" },
};

/** Tone instruction appended to the reasoning prompt for a given hint. */
export const CONFIDENCE_TONE_GUIDANCE: Record<ConfidenceTier, string> = {
  low: "Sound tentative and gentle, acknowledging uncertainty briefly.",
  medium: "Use a thoughtful, balanced tone that shows measured confidence.",
  high: "Respond with warm, natural confidence without sounding scripted.",
};

export function isConfidenceTier(value: unknown): value is ConfidenceTier {
  return typeof value === "string" && CONFIDENCE_TIERS.some((tier) => tier === value);
}

/** Normalise a loose hint ("  High ") to a tier, or null. */
export function parseConfidenceHint(hint: unknown): ConfidenceTier | null {
  if (typeof hint !== "string") return null;
  const normalized = hint.trim().toLowerCase();
  return isConfidenceTier(normalized) ? normalized : null;
}

export function estimateConfidenceFromWords(wordCount: number): ConfidenceTier {
  if (wordCount < LOW_CONFIDENCE_WORD_LIMIT) return "low";
  if (wordCount < MEDIUM_CONFIDENCE_WORD_LIMIT) return "medium";
  return "high";
}

/** Hint if valid, otherwise the word-count heuristic. */
export function resolveConfidence(hint: unknown, wordCount: number): ConfidenceTier {
  return parseConfidenceHint(hint) ?? estimateConfidenceFromWords(wordCount);
}

/** Used when no answer stream exists to measure: hint if valid, else medium. */
export function resolveDirectConfidence(hint: unknown): ConfidenceTier {
  return parseConfidenceHint(hint) ?? "medium";
}

export function getConfidenceBehavior(tier: ConfidenceTier): ConfidenceBehavior {
  return CONFIDENCE_BEHAVIORS[tier];
}
