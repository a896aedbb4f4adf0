/**
 * config.ts: one explicit AgentConfig value, built once at startup.
 *
 * Sources, later ones winning:
 *   defaults → config.json → thinking_config.json (or legacy thinking_behaviors.json)
 *   → api_key.txt / OPENAI_API_KEY when config.json has no key → OPENAI_BASE_URL
 *
 * Environment variables may also come from a .env file in the config directory;
 * variables already set in the environment take precedence over it.
 *
 * Files use snake_case keys. A file that fails validation is reported and skipped.
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import { parse as parseDotenv } from "dotenv";
import type { BehaviorStep } from "./dialogue-types.ts";
import { ConfigurationError, errorMessage } from "./errors.ts";
import { parseBehaviorPlan } from "./controller-decision.ts";
import { DEFAULT_MATCH_THRESHOLD, DEFAULT_TRIALS_PATH } from "./trial-memory.ts";
import { DEFAULT_CHANNEL_CAPACITY } from "./async-channel.ts";
import { logger } from "./logger.ts";
import type { LogLevel } from "./logger.ts";

export interface OpenAISettings {
  apiKey: string;
  baseUrl: string;
  controllerModel: string;
  controllerTemperature: number;
  reasoningModel: string;
  reasoningTemperature: number;
  thinkingModel: string;
  thinkingTemperature: number;
  requestTimeoutMs: number;
}

export interface ThinkingSettings {
  minDurationMs: number;
  maxDurationMs: number;
  pauseMs: number;
  maxCues: number;
  /** Scripted fallback when the controller supplies no behaviour plan. */
  behaviors: BehaviorStep[];
}

export interface TrialMemorySettings {
  enabled: boolean;
  path: string;
  matchThreshold: number;
}

export interface AgentConfig {
  openai: OpenAISettings;
  thinking: ThinkingSettings;
  trialMemory: TrialMemorySettings;
  streamQueueCapacity: number;
  logLevel: LogLevel;
}

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

export const DEFAULT_OPENAI_SETTINGS: OpenAISettings = {
  apiKey: "",
  baseUrl: DEFAULT_BASE_URL,
  controllerModel: "gpt-4.1-mini",
  controllerTemperature: 0.2,
  reasoningModel: "gpt-4.1-mini",
  reasoningTemperature: 0.4,
  thinkingModel: "gpt-4.1-mini",
  thinkingTemperature: 0.2,
  requestTimeoutMs: 60_000,
};

export const DEFAULT_THINKING_SETTINGS: ThinkingSettings = {
  minDurationMs: 8_000,
  maxDurationMs: 10_000,
  pauseMs: 500,
  maxCues: 12,
  behaviors: [],
};

export const DEFAULT_TRIAL_MEMORY_SETTINGS: TrialMemorySettings = {
  enabled: true,
  path: DEFAULT_TRIALS_PATH,
  matchThreshold: DEFAULT_MATCH_THRESHOLD,
};

export const CONFIG_FILE = "config.json";
export const THINKING_CONFIG_FILE = "thinking_config.json";
export const LEGACY_BEHAVIORS_FILE = "thinking_behaviors.json";
export const API_KEY_FILE = "api_key.txt";
export const DOTENV_FILE = ".env";

const configFileSchema = z.object({
  api_key: z.string().optional(),
  base_url: z.string().optional(),
  controller_model: z.string().optional(),
  controller_temperature: z.number().min(0).max(2).optional(),
  reasoning_model: z.string().optional(),
  reasoning_temperature: z.number().min(0).max(2).optional(),
  thinking_model: z.string().optional(),
  thinking_temperature: z.number().min(0).max(2).optional(),
  request_timeout_seconds: z.number().positive().optional(),
  trial_memory_enabled: z.boolean().optional(),
  trial_memory_path: z.string().min(1).optional(),
  match_threshold: z.number().min(0).max(1).optional(),
  stream_queue_capacity: z.number().int().positive().optional(),
  log_level: z.enum(["debug", "info", "warn", "error"]).optional(),
});

const thinkingFileSchema = z.object({
  min_duration_seconds: z.number().nonnegative().nullish(),
  max_duration_seconds: z.number().nonnegative().nullish(),
  pause_seconds: z.number().nonnegative().nullish(),
  max_cues: z.number().int().nonnegative().nullish(),
  behaviors: z.array(z.unknown()).nullish(),
});

export interface LoadConfigOptions {
  /** Directory holding the config files. Defaults to process.cwd(). */
  dir?: string;
  env?: NodeJS.ProcessEnv;
  /** When false, a missing API key is allowed (replay-only runs). */
  requireApiKey?: boolean;
}

/** Strip trailing slashes and make sure the URL ends in a /vN API segment. */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, "");
  if (!trimmed) return DEFAULT_BASE_URL;
  return /\/v\d+$/.test(trimmed) ? trimmed : `${trimmed}/v1`;
}

/** First line that is neither blank nor a # comment. */
export function readApiKeyFile(content: string): string {
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith("#")) return trimmed;
  }
  return "";
}

function readJsonFile(path: string): unknown {
  if (!existsSync(path)) return undefined;
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    logger.warn(`[Config] Failed to load ${path}: ${errorMessage(err)}`);
    return undefined;
  }
}

function parseFile<T>(schema: z.ZodType<T>, path: string): T | undefined {
  const raw = readJsonFile(path);
  if (raw === undefined) return undefined;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`[Config] Ignoring ${path}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    return undefined;
  }
  return parsed.data;
}

/** .env values under the real environment. process.env itself is not modified. */
function withDotenv(dir: string, env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const path = join(dir, DOTENV_FILE);
  if (!existsSync(path)) return env;
  try {
    return { ...parseDotenv(readFileSync(path, "utf-8")), ...env };
  } catch (err) {
    logger.warn(`[Config] Failed to load ${path}: ${errorMessage(err)}`);
    return env;
  }
}

function secondsToMs(seconds: number | null | undefined, fallback: number): number {
  return seconds === null || seconds === undefined ? fallback : Math.round(seconds * 1000);
}

/** Merge partial settings over the defaults. Used by tests and embedders. */
export function createAgentConfig(overrides: {
  openai?: Partial<OpenAISettings>;
  thinking?: Partial<ThinkingSettings>;
  trialMemory?: Partial<TrialMemorySettings>;
  streamQueueCapacity?: number;
  logLevel?: LogLevel;
} = {}): AgentConfig {
  const openai = { ...DEFAULT_OPENAI_SETTINGS, ...overrides.openai };
  return {
    openai: { ...openai, baseUrl: normalizeBaseUrl(openai.baseUrl) },
    thinking: { ...DEFAULT_THINKING_SETTINGS, ...overrides.thinking },
    trialMemory: { ...DEFAULT_TRIAL_MEMORY_SETTINGS, ...overrides.trialMemory },
    streamQueueCapacity: overrides.streamQueueCapacity ?? DEFAULT_CHANNEL_CAPACITY,
    logLevel: overrides.logLevel ?? "info",
  };
}

/** Read every configuration source once. Throws ConfigurationError when no API key is found. */
export function loadAgentConfig(options: LoadConfigOptions = {}): AgentConfig {
  const dir = options.dir ?? process.cwd();
  const env = withDotenv(dir, options.env ?? process.env);

  const file = parseFile(configFileSchema, join(dir, CONFIG_FILE)) ?? {};
  const thinkingFile = parseFile(thinkingFileSchema, join(dir, THINKING_CONFIG_FILE)) ?? {};

  let apiKey = file.api_key?.trim() ?? "";
  if (!apiKey) {
    const keyPath = join(dir, API_KEY_FILE);
    if (existsSync(keyPath)) apiKey = readApiKeyFile(readFileSync(keyPath, "utf-8"));
  }
  if (!apiKey) apiKey = env.OPENAI_API_KEY?.trim() ?? "";

  if (!apiKey && (options.requireApiKey ?? true)) {
    throw new ConfigurationError(
      `API key not found. Set api_key in ${CONFIG_FILE}, add ${API_KEY_FILE}, or set OPENAI_API_KEY in the environment or ${DOTENV_FILE}.`,
    );
  }

  let behaviors = parseBehaviorPlan(thinkingFile.behaviors ?? []);
  if (behaviors.length === 0) {
    const legacy = readJsonFile(join(dir, LEGACY_BEHAVIORS_FILE));
    if (Array.isArray(legacy)) behaviors = parseBehaviorPlan(legacy);
  }

  const defaults = DEFAULT_THINKING_SETTINGS;
  return createAgentConfig({
    openai: {
      apiKey,
      baseUrl: env.OPENAI_BASE_URL?.trim() || file.base_url || DEFAULT_BASE_URL,
      controllerModel: file.controller_model || DEFAULT_OPENAI_SETTINGS.controllerModel,
      controllerTemperature: file.controller_temperature ?? DEFAULT_OPENAI_SETTINGS.controllerTemperature,
      reasoningModel: file.reasoning_model || DEFAULT_OPENAI_SETTINGS.reasoningModel,
      reasoningTemperature: file.reasoning_temperature ?? DEFAULT_OPENAI_SETTINGS.reasoningTemperature,
      thinkingModel: file.thinking_model || DEFAULT_OPENAI_SETTINGS.thinkingModel,
      thinkingTemperature: file.thinking_temperature ?? DEFAULT_OPENAI_SETTINGS.thinkingTemperature,
      requestTimeoutMs: secondsToMs(file.request_timeout_seconds, DEFAULT_OPENAI_SETTINGS.requestTimeoutMs),
    },
    thinking: {
      minDurationMs: secondsToMs(thinkingFile.min_duration_seconds, defaults.minDurationMs),
      maxDurationMs: secondsToMs(thinkingFile.max_duration_seconds, defaults.maxDurationMs),
      pauseMs: secondsToMs(thinkingFile.pause_seconds, defaults.pauseMs),
      maxCues: thinkingFile.max_cues ?? defaults.maxCues,
      behaviors,
    },
    trialMemory: {
      enabled: file.trial_memory_enabled ?? true,
      path: resolve(dir, file.trial_memory_path ?? DEFAULT_TRIALS_PATH),
      matchThreshold: file.match_threshold ?? DEFAULT_MATCH_THRESHOLD,
    },
    streamQueueCapacity: file.stream_queue_capacity ?? DEFAULT_CHANNEL_CAPACITY,
    logLevel: file.log_level ?? "info",
  });
}
