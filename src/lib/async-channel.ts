/**
 * async-channel.ts: Bounded single-consumer hand-off queue.
 *
 * A producer task push()es items and waits while the queue is full; the
 * consumer pulls with next(). close() is the end marker, fail() forwards a
 * producer error to the consumer after any items already queued, and
 * cancel() is the consumer walking away: queued items are dropped and
 * every pending and future push() resolves to false.
 */

import { RunCancelledError } from "./errors.ts";

export const DEFAULT_CHANNEL_CAPACITY = 64;

export class AsyncChannel<T> {
  private items: Array<{ value: T }> = [];
  private readonly capacity: number;
  private closed = false;
  private cancelled = false;
  private failure: { error: unknown } | null = null;
  private consumerWake: (() => void) | null = null;
  private producerWakes: Array<() => void> = [];

  constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  /** Enqueue an item, waiting for room. Resolves false if the consumer cancelled. */
  async push(item: T): Promise<boolean> {
    while (!this.cancelled && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.producerWakes.push(resolve));
    }
    if (this.cancelled) return false;
    if (this.closed) throw new Error("push() after close()");

    this.items.push({ value: item });
    this.wakeConsumer();
    return true;
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.wakeConsumer();
  }

  fail(error: unknown) {
    if (this.closed) return;
    this.failure = { error };
    this.close();
  }

  cancel() {
    this.cancelled = true;
    this.items = [];
    this.wakeProducers();
    this.wakeConsumer();
  }

  /** Next item, or done once closed and drained. Rethrows a forwarded producer error. */
  async next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    for (;;) {
      if (signal?.aborted) throw new RunCancelledError();

      const entry = this.items.shift();
      if (entry) {
        this.wakeProducers();
        return { done: false, value: entry.value };
      }
      if (this.failure) {
        const { error } = this.failure;
        this.failure = null;
        throw error;
      }
      if (this.closed || this.cancelled) return { done: true, value: undefined };

      await this.waitForProducer(signal);
    }
  }

  private waitForProducer(signal?: AbortSignal): Promise<void> {
    if (this.consumerWake) throw new Error("AsyncChannel supports a single consumer");

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.consumerWake = null;
        reject(new RunCancelledError());
      };
      this.consumerWake = () => {
        this.consumerWake = null;
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private wakeConsumer() {
    this.consumerWake?.();
  }

  private wakeProducers() {
    const wakes = this.producerWakes;
    this.producerWakes = [];
    for (const wake of wakes) wake();
  }
}
