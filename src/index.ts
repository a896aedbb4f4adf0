export * from "./lib/dialogue-types.ts";
export * from "./lib/errors.ts";
export { AsyncChannel, DEFAULT_CHANNEL_CAPACITY } from "./lib/async-channel.ts";
export { Barrier, linkSignals, sleep, throwIfAborted } from "./lib/timing.ts";
export { SentenceStream, countWords, popReadyClauses } from "./lib/sentence-stream.ts";
export type { FragmentSource, SentenceStreamOptions } from "./lib/sentence-stream.ts";
export { similarityRatio } from "./lib/similarity.ts";
export {
  TrialMemory,
  DEFAULT_MATCH_THRESHOLD,
  DEFAULT_TRIALS_PATH,
  normalizeQuestion,
  normalizeRecordEntry,
  serializeRecord,
} from "./lib/trial-memory.ts";
export type { SerializedTrialRecord, TrialMemoryOptions } from "./lib/trial-memory.ts";
export {
  CONFIDENCE_BEHAVIORS,
  CONFIDENCE_TONE_GUIDANCE,
  estimateConfidenceFromWords,
  getConfidenceBehavior,
  parseConfidenceHint,
  resolveConfidence,
  resolveDirectConfidence,
} from "./lib/confidence.ts";
export type { ConfidenceBehavior } from "./lib/confidence.ts";
export { isMeaningfulThinkingCue, pickThinkingStep } from "./lib/behavior-plan.ts";
export {
  CONTROLLER_SYSTEM_PROMPT,
  REASONING_SYSTEM_PROMPT,
  THINKING_SYSTEM_PROMPT,
  buildReasoningPrompt,
  buildThinkingPrompt,
} from "./lib/prompt-templates.ts";
export { parseDecisionContent, parseBehaviorPlan, serializeDecision } from "./lib/controller-decision.ts";
export { LLMEngine } from "./lib/llm-engine.ts";
export type { LLMEngineCallbacks } from "./lib/llm-engine.ts";
export { BestEffortActuation, ConsoleActuationSink } from "./lib/actuation-sink.ts";
export type { ActuationSink } from "./lib/actuation-sink.ts";
export { DialogueOrchestrator, FALLBACK_ANSWER, UNAVAILABLE_ANSWER } from "./lib/dialogue-orchestrator.ts";
export type { OrchestratorCallbacks, OrchestratorOptions, RunOptions } from "./lib/dialogue-orchestrator.ts";
export { DialogueSession } from "./lib/dialogue-session.ts";
export type { DialogueSessionOptions } from "./lib/dialogue-session.ts";
export { UtteranceLog } from "./lib/utterance-log.ts";
export { DecisionTrace } from "./lib/decision-trace.ts";
export { DEFAULT_SESSION_LOG_PATH, createLogger, logger } from "./lib/logger.ts";
export type { LogLevel, Logger, LoggerOptions } from "./lib/logger.ts";
export { createAgentConfig, loadAgentConfig, normalizeBaseUrl } from "./lib/config.ts";
export type { AgentConfig, OpenAISettings, ThinkingSettings, TrialMemorySettings } from "./lib/config.ts";
