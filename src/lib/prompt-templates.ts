/**
 * prompt-templates.ts: Prompts for the controller, thinking and answer models.
 *
 * Templates use {{mustache}} placeholders filled by fillTemplate().
 * Also includes parseThinkTags() and stripCodeFence() for cleaning model
 * output before it is parsed as JSON.
 */

import { CONFIDENCE_TONE_GUIDANCE, parseConfidenceHint } from "./confidence.ts";

/** Controller prompt: asks for the strict-JSON decision payload. */
export const CONTROLLER_SYSTEM_PROMPT = `You are the orchestrator of a social robot. Output STRICT JSON only.
Goals:
1) Decide if the robot should enter a visible thinking state.
2) Provide short thinking notes to guide the visible-thinking model.
3) Choose a behavior plan for visible thinking using the allowed options below.
Allowed behavior building blocks:
- Gestures: 'look straight', 'slight head shake', 'nod head'
- Expressions: 'Thoughtful', 'Oh', 'BrowFrown'
- Head targets: optional look_at coordinates in meters, e.g. {"x":0.1,"y":0.3,"z":1.0}
Output JSON keys:
{"need_thinking": true/false,
"confidence": "low/medium/high",
"thinking_notes": ["short phrase 1", "short phrase 2"],
"thinking_behavior_plan": [
    {"gesture": "...", "expression": "...", "look_at": {"x":0,"y":0,"z":1}, "reason": "short rationale"}
],
"reasoning_hint": "Hint for the main answer model, can be empty string",
"answer": "Final answer when need_thinking is false"}
Behavior plan rules:
- Provide 1-3 entries when need_thinking=true, otherwise an empty list.
- Each entry can mix the allowed gestures/expressions and optionally a look_at target.
- Reason can be an empty string.
If need_thinking is true, answer must be empty or omitted.
No prose, no Markdown, ONLY JSON.`;

export const REASONING_SYSTEM_PROMPT =
  "You are a social robot. Answer the user's question in 2-3 friendly English sentences. " +
  "Do not reveal internal reasoning, only output the final suggestion.";

export const THINKING_SYSTEM_PROMPT =
  "You are the robot's visible thinking process. Output 2-4 short English phrases during the waiting period, " +
  "each less than 12 words, describing actions like 'I'm thinking.../I'm comparing.../I'm confirming...', " +
  "with natural tone. Do not give the final answer, no summary at the end.";

export const THINKING_PROMPT_TEMPLATE = `User question: {{question}}
Preliminary thoughts:
{{notes}}
Follow the system prompt to generate visible thinking phrases.`;

export const REASONING_PROMPT_TEMPLATE = `User question: {{question}}{{hintPart}}{{tonePart}}
Please summarize the solution in 2-3 sentences, do not output chain-of-thought reasoning.`;

const DEFAULT_THINKING_NOTE = "Organizing possible answers";

/** Replace all {{key}} placeholders in a template string. */
export function fillTemplate(
  template: string,
  vars: Record<string, string | number | boolean>
): string {
  let result = template;
  for (const [key, value] of Object.entries(vars)) {
    result = result.replaceAll(`{{${key}}}`, String(value));
  }
  return result;
}

/**
 * Parse <think>...</think> tags from LLM output.
 * Reasoning models emit internal reasoning wrapped in think tags before
 * their actual response.
 *
 * Returns { thinking, response } where:
 *  - thinking: content inside <think> tags (may span multiple blocks)
 *  - response: everything outside <think> tags, trimmed
 */
export function parseThinkTags(text: string): { thinking: string; response: string } {
  const thinkRegex = /<think>([\s\S]*?)<\/think>/g;
  let thinking = "";
  let match;
  while ((match = thinkRegex.exec(text)) !== null) {
    thinking += (thinking ? "\n" : "") + match[1].trim();
  }
  const response = text.replace(/<think>[\s\S]*?<\/think>/g, "").trim();
  return { thinking, response };
}

/** Remove a surrounding ``` or ```json fence, if any. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/);
  return fenced ? fenced[1].trim() : trimmed;
}

/** Build the user message for the visible-thinking model. */
export function buildThinkingPrompt(question: string, notes: readonly string[]): string {
  const filtered = notes.filter((note) => note.trim().length > 0);
  const joined = filtered.length > 0
    ? filtered.map((note) => `- ${note}`).join("\n")
    : `- ${DEFAULT_THINKING_NOTE}`;
  return fillTemplate(THINKING_PROMPT_TEMPLATE, { question, notes: joined });
}

/** Build the user message for the answer model with optional hint and tone. */
export function buildReasoningPrompt(question: string, hint: string, toneInstruction: string = ""): string {
  return fillTemplate(REASONING_PROMPT_TEMPLATE, {
    question,
    hintPart: hint ? `\nPreliminary hint to consider: ${hint}` : "",
    tonePart: toneInstruction ? `\nAdopt this tone: ${toneInstruction}` : "",
  });
}

/** Tone instruction for a confidence hint; empty when the hint is missing or unknown. */
export function toneInstructionFor(hint: unknown): string {
  const tier = parseConfidenceHint(hint);
  return tier ? CONFIDENCE_TONE_GUIDANCE[tier] : "";
}
