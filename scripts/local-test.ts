#!/usr/bin/env tsx
/**
 * Local dialogue REPL
 *
 * Usage:
 *   npm run local-test
 *   npm run local-test -- --replay-only     # answer only from my_trials.json, speech only
 *   npm run local-test -- --no-memory       # always generate, never replay or save
 *   npm run local-test -- --verbose         # debug logging
 *
 * Runs the orchestrator against a console "robot" that prints speech,
 * gestures and expressions. Logs go to stderr and, at debug level, to
 * logs/session_log.txt. Type "exit" to quit.
 */

import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import {
  ConfigurationError,
  ConsoleActuationSink,
  DEFAULT_SESSION_LOG_PATH,
  DialogueOrchestrator,
  DialogueSession,
  LLMEngine,
  TrialMemory,
  createLogger,
  loadAgentConfig,
} from "../src/index.ts";
import type { AgentConfig } from "../src/index.ts";

interface CliFlags {
  replayOnly: boolean;
  noMemory: boolean;
  verbose: boolean;
}

function parseFlags(argv: string[]): CliFlags {
  return {
    replayOnly: argv.includes("--replay-only"),
    noMemory: argv.includes("--no-memory"),
    verbose: argv.includes("--verbose"),
  };
}

async function main() {
  const flags = parseFlags(process.argv.slice(2));
  if (flags.replayOnly && flags.noMemory) {
    console.error("--replay-only needs the trial memory; drop --no-memory.");
    process.exitCode = 1;
    return;
  }

  let config: AgentConfig;
  try {
    config = loadAgentConfig({ requireApiKey: !flags.replayOnly });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`❌ ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const log = createLogger({
    name: "local-test",
    level: flags.verbose ? "debug" : config.logLevel,
    sessionLogPath: DEFAULT_SESSION_LOG_PATH,
  });

  const memory = config.trialMemory.enabled && !flags.noMemory
    ? new TrialMemory({ path: config.trialMemory.path, matchThreshold: config.trialMemory.matchThreshold, logger: log })
    : null;

  const sink = new ConsoleActuationSink();
  const orchestrator = new DialogueOrchestrator({
    generator: new LLMEngine(config.openai, {}, log),
    actuation: sink,
    memory,
    config,
    callbacks: {
      onThinkingCue: (cue) => console.log(`Robot (thinking): ${cue.text}`),
      onStageChange: (stage, runId) => log.debug(`[Stage] run ${runId}: ${stage}`),
    },
    logger: log,
  });
  const session = new DialogueSession(orchestrator, {
    replayOnly: flags.replayOnly,
    skipReplayThinking: flags.replayOnly,
    speechOnly: flags.replayOnly,
    logger: log,
  });

  const rl = createInterface({ input: stdin, output: stdout });
  rl.on("SIGINT", () => {
    session.dispatch({ type: "USER_SPEECH_START" });
    rl.close();
  });

  console.log("Visible-thinking dialogue. Type a question, or \"exit\" to quit.");
  if (memory) console.log(`Stored questions: ${(await memory.listQuestions()).length}`);

  try {
    for (;;) {
      let line: string;
      try {
        line = await rl.question("\nYou> ");
      } catch {
        break; // input closed
      }
      const text = line.trim();
      if (!text) continue;
      if (text === "exit" || text === "quit") break;

      log.info(`[User] ${text}`);
      session.dispatch({ type: "USER_UTTERANCE", text });
      await session.whenIdle();

      const result = session.getLastResult();
      if (result && result.question === text) {
        session.dispatch({ type: "ROBOT_SPEECH_END", text: result.answer, aborted: false });
        log.info({ source: result.source, confidence: result.confidence }, `[Robot] ${result.answer}`);
      }
    }
  } finally {
    rl.close();
    await session.whenIdle();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
