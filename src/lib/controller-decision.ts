/**
 * controller-decision.ts: Parse and serialise the controller's decision payload.
 *
 * The wire format is snake_case JSON:
 *   {need_thinking, confidence, thinking_notes, thinking_behavior_plan, reasoning_hint, answer}
 *
 * parseDecisionContent() is strict about the envelope (must be a JSON object,
 * optionally fenced or preceded by <think> blocks) and lenient about fields:
 * a wrong-typed field falls back to its default, plan entries that carry no
 * actuation are dropped, and an unknown confidence becomes absent.
 */

import { z } from "zod";
import type { BehaviorStep, ControllerDecision } from "./dialogue-types.ts";
import { DecisionParseError, errorMessage } from "./errors.ts";
import { hasActuation, normalizeThinkingNotes } from "./behavior-plan.ts";
import { parseConfidenceHint } from "./confidence.ts";
import { parseThinkTags, stripCodeFence } from "./prompt-templates.ts";
import { logger } from "./logger.ts";
import type { Logger } from "./logger.ts";

const lookAtSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

const behaviorStepSchema = z.object({
  gesture: z.string().trim().optional().catch(undefined),
  expression: z.string().trim().optional().catch(undefined),
  look_at: lookAtSchema.optional().catch(undefined),
  reason: z.string().trim().optional().catch(undefined),
});

const booleanLikeSchema = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((value) => value === "true"),
]);

export const decisionPayloadSchema = z.object({
  need_thinking: booleanLikeSchema.catch(false),
  confidence: z.string().optional().catch(undefined),
  thinking_notes: z
    .union([
      z.array(z.union([z.string(), z.number()]).transform(String).catch("")),
      z.string().transform((note) => [note]),
    ])
    .catch([]),
  thinking_behavior_plan: z.array(behaviorStepSchema.nullable().catch(null)).catch([]),
  reasoning_hint: z.string().trim().catch(""),
  answer: z.string().trim().catch(""),
});

export type DecisionPayload = z.infer<typeof decisionPayloadSchema>;

/** Snake_case shape written to the trial store. */
export interface SerializedDecision {
  need_thinking: boolean;
  confidence?: string;
  thinking_notes: string[];
  thinking_behavior_plan: Array<{
    gesture?: string;
    expression?: string;
    look_at?: { x: number; y: number; z: number };
    reason?: string;
  }>;
  reasoning_hint: string;
  answer: string;
}

export const EMPTY_DECISION: Readonly<ControllerDecision> = Object.freeze({
  needThinking: false,
  thinkingNotes: [],
  behaviorPlan: [],
  reasoningHint: "",
  answer: "",
});

function toBehaviorStep(entry: z.infer<typeof behaviorStepSchema>): BehaviorStep {
  const step: BehaviorStep = {};
  if (entry.gesture) step.gesture = entry.gesture;
  if (entry.expression) step.expression = entry.expression;
  if (entry.look_at) step.lookAt = { ...entry.look_at };
  if (entry.reason) step.reason = entry.reason;
  return step;
}

function fromPayload(payload: DecisionPayload, log: Logger = logger): ControllerDecision {
  const decision: ControllerDecision = {
    needThinking: payload.need_thinking,
    thinkingNotes: normalizeThinkingNotes(payload.thinking_notes),
    behaviorPlan: payload.thinking_behavior_plan
      .flatMap((entry) => (entry ? [toBehaviorStep(entry)] : []))
      .filter(hasActuation),
    reasoningHint: payload.reasoning_hint,
    answer: payload.answer,
  };

  if (payload.confidence !== undefined) {
    const tier = parseConfidenceHint(payload.confidence);
    if (tier) decision.confidence = tier;
    else log.warn(`[Decision] Ignoring unknown confidence "${payload.confidence}"`);
  }
  return decision;
}

/**
 * Lenient conversion of an already-parsed value (e.g. a stored record's
 * decision). Anything that is not an object yields an empty decision.
 */
export function normalizeDecision(value: unknown): ControllerDecision {
  const parsed = decisionPayloadSchema.safeParse(value);
  if (!parsed.success) return cloneDecision(EMPTY_DECISION);
  return fromPayload(parsed.data);
}

/** Parse raw controller output. Throws DecisionParseError if it is not a JSON object. */
export function parseDecisionContent(raw: string, log: Logger = logger): ControllerDecision {
  const { response } = parseThinkTags(raw);
  let candidate = stripCodeFence(response);
  if (/^json\s/i.test(candidate)) candidate = candidate.slice(4).trim();

  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch (err) {
    throw new DecisionParseError(
      `Controller response is not valid JSON: ${errorMessage(err)}`,
      raw,
      { cause: err },
    );
  }

  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new DecisionParseError("Controller response is not a JSON object", raw);
  }
  return fromPayload(decisionPayloadSchema.parse(value), log);
}

export function serializeDecision(decision: ControllerDecision): SerializedDecision {
  return {
    need_thinking: decision.needThinking,
    ...(decision.confidence ? { confidence: decision.confidence } : {}),
    thinking_notes: [...decision.thinkingNotes],
    thinking_behavior_plan: decision.behaviorPlan.map((step) => ({
      ...(step.gesture ? { gesture: step.gesture } : {}),
      ...(step.expression ? { expression: step.expression } : {}),
      ...(step.lookAt ? { look_at: { ...step.lookAt } } : {}),
      ...(step.reason ? { reason: step.reason } : {}),
    })),
    reasoning_hint: decision.reasoningHint,
    answer: decision.answer,
  };
}

export function cloneDecision(decision: Readonly<ControllerDecision>): ControllerDecision {
  return {
    ...decision,
    thinkingNotes: [...decision.thinkingNotes],
    behaviorPlan: decision.behaviorPlan.map((step) => ({
      ...step,
      ...(step.lookAt ? { lookAt: { ...step.lookAt } } : {}),
    })),
  };
}

/** Freeze a decision in place, including its notes, plan and steps. */
export function freezeDecision(decision: ControllerDecision): Readonly<ControllerDecision> {
  for (const step of decision.behaviorPlan) {
    if (step.lookAt) Object.freeze(step.lookAt);
    Object.freeze(step);
  }
  Object.freeze(decision.behaviorPlan);
  Object.freeze(decision.thinkingNotes);
  return Object.freeze(decision);
}

/** Lenient parse of a standalone behaviour plan (e.g. scripted thinking behaviours). */
export function parseBehaviorPlan(value: unknown): BehaviorStep[] {
  return normalizeDecision({ thinking_behavior_plan: value }).behaviorPlan;
}
