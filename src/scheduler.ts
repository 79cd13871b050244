/**
 * Background task ownership. Every long-running loop (the post loop, one purge loop per channel)
 * is registered here under an id so it can be replaced or cancelled individually.
 */

import { setTimeout as delay } from "node:timers/promises";
import { logError } from "./errors.js";

export type ScheduledTask = (signal: AbortSignal) => Promise<void>;
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface TaskHandle {
  readonly id: string;
  readonly signal: AbortSignal;
  /** Settles when the task function returns, throws or finishes unwinding after cancel. */
  readonly done: Promise<void>;
}

interface RegisteredTask extends TaskHandle {
  controller: AbortController;
}

/** Longest delay a Node timer accepts; anything larger fires after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/** Split long waits into pieces `wait` can handle. */
export function inChunks(wait: Sleep, maxChunkMs = MAX_TIMER_MS): Sleep {
  return async (ms, signal) => {
    let remaining = Math.max(0, ms);
    do {
      const chunk = Math.min(remaining, maxChunkMs);
      await wait(chunk, signal);
      remaining -= chunk;
    } while (remaining > 0);
  };
}

export const sleep: Sleep = inChunks(async (ms, signal) => {
  await delay(ms, undefined, { signal });
});

export function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === "AbortError" || ("code" in err && err.code === "ABORT_ERR");
}

export class TaskScheduler {
  private readonly tasks = new Map<string, RegisteredTask>();

  /** Start `task` under `id`, cancelling whatever was running under the same id. */
  start(id: string, task: ScheduledTask): TaskHandle {
    this.cancel(id);

    const controller = new AbortController();
    const { signal } = controller;
    const done = Promise.resolve()
      .then(() => task(signal))
      .catch((err: unknown) => {
        if (isAbortError(err) && signal.aborted) return;
        logError("Scheduler", `running task ${id}`, err);
      })
      .finally(() => {
        if (this.tasks.get(id)?.controller === controller) this.tasks.delete(id);
      });

    const registered: RegisteredTask = { id, signal, done, controller };
    this.tasks.set(id, registered);
    return registered;
  }

  cancel(id: string): boolean {
    const existing = this.tasks.get(id);
    if (!existing) return false;
    this.tasks.delete(id);
    existing.controller.abort();
    return true;
  }

  cancelAll(): void {
    for (const id of [...this.tasks.keys()]) this.cancel(id);
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  get(id: string): TaskHandle | undefined {
    return this.tasks.get(id);
  }

  ids(): string[] {
    return [...this.tasks.keys()];
  }

  get size(): number {
    return this.tasks.size;
  }
}
