/**
 * llm-engine.ts: TextGenerationService over an OpenAI-compatible chat API.
 *
 * Key behaviors:
 *  - Lazy client creation (a missing API key fails at first use with ConfigurationError)
 *  - decide(): one blocking controller call, parsed into a ControllerDecision
 *  - openStream(): chat.completions.create({ stream: true }) yielding content deltas
 *  - Every request carries the caller's AbortSignal; an aborted request ends quietly
 */

import OpenAI from "openai";
import type { ControllerDecision, StreamRequest, TextGenerationService } from "./dialogue-types.ts";
import { ConfigurationError, RunCancelledError, StreamTransportError, errorMessage } from "./errors.ts";
import { parseDecisionContent } from "./controller-decision.ts";
import { CONTROLLER_SYSTEM_PROMPT } from "./prompt-templates.ts";
import type { OpenAISettings } from "./config.ts";
import { logger as defaultLogger } from "./logger.ts";
import type { Logger } from "./logger.ts";

/** Callbacks for generation lifecycle events. */
export interface LLMEngineCallbacks {
  onToken?: (token: string, full: string) => void;
  onGenerateComplete?: (text: string, model: string) => void;
  onDecision?: (decision: ControllerDecision, raw: string) => void;
  onError?: (error: string) => void;
}

export class LLMEngine implements TextGenerationService {
  private client: OpenAI | null = null;
  private readonly settings: OpenAISettings;
  private readonly callbacks: LLMEngineCallbacks;
  private readonly log: Logger;

  constructor(settings: OpenAISettings, callbacks: LLMEngineCallbacks = {}, log: Logger = defaultLogger) {
    this.settings = settings;
    this.callbacks = callbacks;
    this.log = log;
  }

  isReady(): boolean {
    return this.settings.apiKey.length > 0;
  }

  /** Ask the controller model how to handle `question`. */
  async decide(question: string, signal?: AbortSignal): Promise<ControllerDecision> {
    const client = this.getClient();
    let raw: string;
    try {
      const completion = await client.chat.completions.create(
        {
          model: this.settings.controllerModel,
          temperature: this.settings.controllerTemperature,
          messages: [
            { role: "system", content: CONTROLLER_SYSTEM_PROMPT },
            { role: "user", content: question },
          ],
        },
        { signal },
      );
      raw = (completion.choices[0]?.message?.content ?? "").trim();
    } catch (err) {
      throw this.translateError(err, signal, "Controller request failed");
    }

    this.log.debug({ raw }, "[LLMEngine] Controller raw response");
    const decision = parseDecisionContent(raw, this.log);
    this.callbacks.onDecision?.(decision, raw);
    return decision;
  }

  /** Stream content deltas for one request. Ends without error when `signal` aborts. */
  async *openStream(request: StreamRequest, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    const client = this.getClient();
    let full = "";
    try {
      const chunks = await client.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          messages: [
            { role: "system", content: request.systemPrompt },
            { role: "user", content: request.userContent },
          ],
          stream: true,
        },
        { signal },
      );

      for await (const chunk of chunks) {
        const delta = chunk.choices[0]?.delta?.content || "";
        if (delta) {
          full += delta;
          this.callbacks.onToken?.(delta, full);
          yield delta;
        }
      }
      this.callbacks.onGenerateComplete?.(full, request.model);
    } catch (err) {
      if (signal?.aborted) return;
      throw this.translateError(err, signal, `Stream from ${request.model} failed`);
    }
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;
    if (!this.isReady()) {
      throw new ConfigurationError("No API key configured for the text-generation service");
    }
    this.client = new OpenAI({
      apiKey: this.settings.apiKey,
      baseURL: this.settings.baseUrl,
      timeout: this.settings.requestTimeoutMs,
    });
    return this.client;
  }

  private translateError(err: unknown, signal: AbortSignal | undefined, context: string): Error {
    if (signal?.aborted) return new RunCancelledError();
    if (err instanceof StreamTransportError) return err;
    const message = `${context}: ${errorMessage(err)}`;
    this.log.warn(`[LLMEngine] ${message}`);
    this.callbacks.onError?.(message);
    return new StreamTransportError(message, { cause: err });
  }
}
