import { setImmediate as yieldToEventLoop } from "node:timers/promises";

export type PoolOutcome<R> =
  | { readonly status: "fulfilled"; readonly value: R }
  | { readonly status: "rejected"; readonly reason: unknown }
  | { readonly status: "cancelled" };

export interface PoolOptions {
  readonly concurrency: number;
  /** Once aborted, workers stop taking new items. Also handed to each task. */
  readonly signal?: AbortSignal;
}

/** Thrown by a task that gave up because the pool's signal was aborted. */
export class TaskAbortedError extends Error {
  public constructor() {
    super("Task aborted");
    this.name = "TaskAbortedError";
  }
}

/**
 * Runs `worker` over `items` with at most `concurrency` tasks in flight.
 *
 * Each worker yields to the event loop before taking the next item, which is
 * where an abort is noticed. A running task stops early only if it watches the
 * signal and throws {@link TaskAbortedError}; it is then reported as cancelled.
 * Outcomes are returned in item order.
 */
export const runPool = async <T, R>(
  items: ReadonlyArray<T>,
  worker: (item: T, index: number, signal?: AbortSignal) => R | Promise<R>,
  { concurrency, signal }: PoolOptions,
): Promise<PoolOutcome<R>[]> => {
  const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: "cancelled" }));
  let cursor = 0;

  const drain = async (): Promise<void> => {
    for (;;) {
      await yieldToEventLoop();
      if (signal?.aborted || cursor >= items.length) {
        return;
      }
      const index = cursor;
      cursor += 1;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      try {
        outcomes[index] = { status: "fulfilled", value: await worker(item, index, signal) };
      } catch (reason) {
        outcomes[index] =
          reason instanceof TaskAbortedError ? { status: "cancelled" } : { status: "rejected", reason };
      }
    }
  };

  const limit = Number.isFinite(concurrency) && concurrency >= 1 ? Math.floor(concurrency) : 1;
  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => drain()));
  return outcomes;
};
