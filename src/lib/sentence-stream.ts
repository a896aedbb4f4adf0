/**
 * sentence-stream.ts: Turns an incremental fragment feed into complete clauses.
 *
 * Fragments arrive unaligned ("Hel", "lo there. How are", " you?"); the
 * stream yields "Hello there." and "How are you?". A producer task reads the
 * fragment source and hands clauses over a bounded AsyncChannel, so the
 * consumer only ever suspends on the channel. A failure on the producer side
 * surfaces to the consumer as a StreamTransportError.
 *
 * wordCount is the number of whitespace-separated tokens in the buffer as it
 * stood after the latest fragment was appended. Confidence estimation reads
 * it when the first clause arrives.
 */

import { AsyncChannel, DEFAULT_CHANNEL_CAPACITY } from "./async-channel.ts";
import { StreamTransportError, errorMessage } from "./errors.ts";
import { linkSignals } from "./timing.ts";

/** Opens the underlying fragment feed. Receives a signal that aborts when the consumer goes away. */
export type FragmentSource = (signal: AbortSignal) => AsyncIterable<string>;

export interface SentenceStreamOptions {
  /** Clauses buffered before the producer waits. */
  capacity?: number;
  /** Cancels both the consumer's waits and the producer. */
  signal?: AbortSignal;
}

const TERMINATORS = new Set([".", "?", "!"]);

/**
 * Cut every complete clause off the front of `text`.
 * The remainder is returned untrimmed so spacing survives into the next fragment.
 */
export function popReadyClauses(text: string): { clauses: string[]; remainder: string } {
  const clauses: string[] = [];
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    if (!TERMINATORS.has(text[i])) continue;
    const clause = text.slice(start, i + 1).trim();
    if (clause) clauses.push(clause);
    start = i + 1;
  }
  return { clauses, remainder: text.slice(start) };
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export class SentenceStream implements AsyncIterable<string> {
  private buffer = "";
  private words = 0;
  private consumed = false;
  private readonly channel: AsyncChannel<string>;
  private readonly openFragments: FragmentSource;
  private readonly signal?: AbortSignal;

  constructor(openFragments: FragmentSource, options: SentenceStreamOptions = {}) {
    this.openFragments = openFragments;
    this.signal = options.signal;
    this.channel = new AsyncChannel<string>(options.capacity ?? DEFAULT_CHANNEL_CAPACITY);
  }

  get wordCount(): number {
    return this.words;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.consumed) throw new Error("SentenceStream can only be consumed once");
    this.consumed = true;

    const link = linkSignals(this.signal);
    const production = this.produce(link.controller.signal);
    let drained = false;

    try {
      for (;;) {
        const result = await this.channel.next(this.signal);
        if (result.done) {
          drained = true;
          return;
        }
        yield result.value;
      }
    } finally {
      if (drained) {
        await production;
      } else {
        // Consumer left early: stop the producer and let it unwind on its own.
        this.channel.cancel();
        link.controller.abort();
        void production;
      }
      link.dispose();
    }
  }

  /** Never rejects: every outcome is reported through the channel. */
  private async produce(signal: AbortSignal): Promise<void> {
    try {
      for await (const fragment of this.openFragments(signal)) {
        if (signal.aborted) break;
        this.buffer += fragment;
        this.words = countWords(this.buffer);

        const { clauses, remainder } = popReadyClauses(this.buffer);
        this.buffer = remainder;
        for (const clause of clauses) {
          if (!(await this.channel.push(clause))) return;
        }
      }

      const tail = this.buffer.trim();
      this.buffer = "";
      if (tail && !signal.aborted) await this.channel.push(tail);
      this.channel.close();
    } catch (err) {
      if (signal.aborted) {
        this.channel.close();
        return;
      }
      this.channel.fail(
        err instanceof StreamTransportError
          ? err
          : new StreamTransportError(`Fragment stream failed: ${errorMessage(err)}`, { cause: err }),
      );
    }
  }
}
