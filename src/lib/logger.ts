/**
 * logger.ts: pino loggers for the dialogue core.
 *
 * Messages keep the `[Scope] message` shape used across the modules; pino adds
 * level and time. A session logger mirrors everything, debug included, into
 * logs/session_log.txt, truncated when the logger is created.
 */

import pino from "pino";
import type { DestinationStream, Logger, StreamEntry } from "pino";
import { resolve } from "node:path";

export type { Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const DEFAULT_SESSION_LOG_PATH = "logs/session_log.txt";

export interface LoggerOptions {
  name?: string;
  level?: string;
  /** Where console-level output goes. Defaults to stderr so stdout stays free for the dialogue. */
  destination?: DestinationStream;
  /** Also write every entry, at debug level, to this file. */
  sessionLogPath?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const name = options.name ?? "dialogue";
  const level = options.level ?? "info";
  const out = options.destination ?? pino.destination({ dest: 2, sync: true });
  if (!options.sessionLogPath) return pino({ name, level }, out);

  const streams: StreamEntry[] = [
    { level: toLevel(level), stream: out },
    {
      level: "debug",
      stream: pino.destination({ dest: resolve(options.sessionLogPath), append: false, mkdir: true, sync: true }),
    },
  ];
  return pino({ name, level: "debug" }, pino.multistream(streams));
}

function toLevel(level: string): LogLevel {
  return level === "debug" || level === "warn" || level === "error" ? level : "info";
}

export const logger = createLogger({ level: process.env.LOG_LEVEL || "info" });
