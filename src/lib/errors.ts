/**
 * errors.ts: Error taxonomy for the dialogue core.
 *
 * Only DecisionParseError and ConfigurationError ever reach a run() caller.
 * The rest are raised at a collaborator boundary and handled right there.
 */

export type DialogueErrorCode =
  | "CONFIGURATION"
  | "DECISION_PARSE"
  | "STREAM_TRANSPORT"
  | "ACTUATION"
  | "CACHE_IO";

export class DialogueError extends Error {
  readonly code: DialogueErrorCode;

  constructor(code: DialogueErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing credentials or unreadable configuration. Fatal at startup. */
export class ConfigurationError extends DialogueError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
  }
}

/** The controller returned something that is not a valid decision payload. */
export class DecisionParseError extends DialogueError {
  readonly rawContent: string;

  constructor(message: string, rawContent: string, options?: { cause?: unknown }) {
    super("DECISION_PARSE", message, options);
    this.rawContent = rawContent;
  }
}

export class StreamTransportError extends DialogueError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STREAM_TRANSPORT", message, options);
  }
}

export class ActuationError extends DialogueError {
  readonly action: string;

  constructor(action: string, message: string, options?: { cause?: unknown }) {
    super("ACTUATION", message, options);
    this.action = action;
  }
}

export class CacheIOError extends DialogueError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("CACHE_IO", message, options);
    this.path = path;
  }
}

/**
 * Thrown at a suspension point once a run's signal has aborted.
 * Not part of the public taxonomy: run() converts it into a "cancelled" result.
 */
export class RunCancelledError extends Error {
  constructor(message = "Run cancelled") {
    super(message);
    this.name = "RunCancelledError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
