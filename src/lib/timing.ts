/**
 * timing.ts: Abortable sleep, the thinking barrier, and signal helpers.
 *
 * Every wait here is a cancellation point: once the signal aborts, the
 * pending promise rejects with RunCancelledError.
 */

import { RunCancelledError } from "./errors.ts";

export function throwIfAborted(signal?: AbortSignal) {
  if (signal?.aborted) throw new RunCancelledError();
}

/** Resolve after `ms`, or reject with RunCancelledError when `signal` aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new RunCancelledError());
  if (ms <= 0) return Promise.resolve();

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Child controller that aborts when any parent does. Call dispose() once the
 * child is no longer needed so the parents drop their listeners.
 */
export function linkSignals(...parents: Array<AbortSignal | undefined>): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener("abort", onAbort));
  }

  return {
    controller,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
      cleanups.length = 0;
    },
  };
}

/** One-shot gate: closed until open() is called, then open forever. */
export class Barrier {
  private opened = false;
  private openedAtMs: number | null = null;
  private waiters: Array<() => void> = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  isOpen(): boolean {
    return this.opened;
  }

  get openedAt(): number | null {
    return this.openedAtMs;
  }

  open() {
    if (this.opened) return;
    this.opened = true;
    this.openedAtMs = this.now();
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  wait(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new RunCancelledError());
    if (this.opened) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== wake);
        reject(new RunCancelledError());
      };
      const wake = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      this.waiters.push(wake);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
