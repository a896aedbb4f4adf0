export type Stage =
  | "IDLE"
  | "DECIDING"
  | "REPLAYING"
  | "DIRECT"
  | "THINKING_AND_ANSWERING"
  | "DONE"
  | "CANCELLED"
  | "FAILED";

/** Stages a run can end in. */
export const TERMINAL_STAGES: Stage[] = ["DONE", "CANCELLED", "FAILED"];

export type ConfidenceTier = "low" | "medium" | "high";

export const CONFIDENCE_TIERS: readonly ConfidenceTier[] = ["low", "medium", "high"];

export interface LookAt {
  x: number;
  y: number;
  z: number;
}

/** One actuation bundle; at least one of gesture/expression/lookAt is set. */
export interface BehaviorStep {
  gesture?: string;
  expression?: string;
  lookAt?: LookAt;
  reason?: string;
}

export interface ControllerDecision {
  needThinking: boolean;
  confidence?: ConfidenceTier;
  thinkingNotes: string[];
  behaviorPlan: BehaviorStep[];
  reasoningHint: string;
  /** Only meaningful when needThinking is false. */
  answer: string;
}

export interface ThinkingCue {
  text: string;
  index: number;
}

export interface TrialRecord {
  question: string;
  answer: string;
  thinkingCues: string[];
  decision: ControllerDecision;
  finalConfidence: ConfidenceTier;
}

export interface StreamRequest {
  systemPrompt: string;
  userContent: string;
  model: string;
  temperature: number;
}

/** The text-generation collaborator: one blocking decision call plus fragment streams. */
export interface TextGenerationService {
  decide(question: string, signal?: AbortSignal): Promise<ControllerDecision>;
  openStream(request: StreamRequest, signal?: AbortSignal): AsyncIterable<string>;
}

export type RunStatus = "completed" | "cancelled" | "failed";

export type RunSource = "replay" | "direct" | "generated" | "unavailable";

export interface RunTimings {
  startedAt: number;
  thinkingClosedAt?: number;
  answerDispatchedAt?: number;
  finishedAt: number;
}

export interface RunResult {
  runId: number;
  status: RunStatus;
  source: RunSource | null;
  question: string;
  answer: string;
  thinkingCues: string[];
  confidence: ConfidenceTier | null;
  decision: ControllerDecision | null;
  timings: RunTimings;
  error?: Error;
}

export interface OrchestratorState {
  stage: Stage;
  runId: number;
  question: string;
  thinkingMode: boolean;
  pendingConfidence: ConfidenceTier | null;
  thinkingCues: string[];
  lastAnswer: string;
}

export const DEFAULT_ORCHESTRATOR_STATE: OrchestratorState = {
  stage: "IDLE",
  runId: 0,
  question: "",
  thinkingMode: false,
  pendingConfidence: null,
  thinkingCues: [],
  lastAnswer: "",
};

// Session events
export type SessionEvent =
  | { type: "USER_SPEECH_START" }
  | { type: "USER_UTTERANCE"; text: string }
  | { type: "ROBOT_SPEECH_END"; text: string; aborted: boolean }
  | { type: "RESET" };

export interface DialogueTurn {
  role: "user" | "assistant";
  content: string;
}

export interface TraceEntry {
  timestamp: number;
  runId: number;
  stage: Stage;
  event: string;
  detail: string;
  data?: Record<string, unknown>;
}

export type UtteranceOutcome = "pending" | RunStatus | "ignored";

/** One user utterance and what became of it. */
export interface UtteranceRecord {
  id: number;
  text: string;
  receivedAt: number;
  /** Orchestrator stage when the utterance arrived. */
  stageOnArrival: Stage;
  outcome: UtteranceOutcome;
  runId?: number;
  finalStage?: Stage;
  settledAt?: number;
}
