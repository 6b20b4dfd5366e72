import { Worker } from "node:worker_threads";

import type { PerformanceSummary } from "@strategy-lab/metrics";
import type { MarketBar, StrategyKind, StrategyParameters } from "@strategy-lab/sdk";

import { TaskAbortedError } from "./pool.js";

/** Shared by every task of a pool; copied into each worker once. */
export interface SimulationWorkerData {
  readonly bars: ReadonlyArray<MarketBar>;
  readonly initialCapital: number;
  readonly minimumNotional: number;
  readonly riskFreeRate: number;
}

/** Plain data a worker turns back into a strategy with `createStrategy`. */
export interface SimulationTask {
  readonly kind: StrategyKind;
  readonly parameters: StrategyParameters;
}

export interface SimulationRequest extends SimulationTask {
  readonly id: number;
}

export type SimulationReply =
  | { readonly id: number; readonly ok: true; readonly summary: PerformanceSummary }
  | { readonly id: number; readonly ok: false; readonly error: string };

interface PendingTask {
  readonly id: number;
  readonly resolve: (summary: PerformanceSummary) => void;
  readonly reject: (reason: unknown) => void;
}

// Under tsx the sources run as .ts; the compiled build sits beside .js files.
const WORKER_URL = new URL(
  import.meta.url.endsWith(".ts") ? "./simulation-worker.ts" : "./simulation-worker.js",
  import.meta.url,
);

/**
 * Runs simulations on `worker_threads`, one task per worker at a time.
 *
 * Workers are started on demand up to `size` and reused while idle. Aborting a
 * task's signal terminates the worker running it and rejects the task with
 * {@link TaskAbortedError}.
 */
export class SimulationWorkerPool {
  private readonly data: SimulationWorkerData;
  private readonly size: number;
  private readonly workers = new Set<Worker>();
  private readonly pending = new Map<Worker, PendingTask>();
  private readonly exits: Array<Promise<number>> = [];
  private idle: Worker[] = [];
  private nextId = 0;

  public constructor(data: SimulationWorkerData, size: number) {
    this.data = data;
    this.size = Number.isFinite(size) && size >= 1 ? Math.floor(size) : 1;
  }

  /** Workers started and not yet terminated. */
  public get workerCount(): number {
    return this.workers.size;
  }

  public async run(task: SimulationTask, signal?: AbortSignal): Promise<PerformanceSummary> {
    if (signal?.aborted) {
      throw new TaskAbortedError();
    }
    const worker = this.acquire();
    const id = this.nextId;
    this.nextId += 1;

    return new Promise<PerformanceSummary>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.pending.get(worker)?.id !== id) {
          return;
        }
        this.pending.delete(worker);
        this.discard(worker);
        reject(new TaskAbortedError());
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      this.pending.set(worker, {
        id,
        resolve: (summary) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(summary);
        },
        reject: (reason) => {
          signal?.removeEventListener("abort", onAbort);
          reject(reason);
        },
      });
      const request: SimulationRequest = { id, ...task };
      worker.postMessage(request);
    });
  }

  /** Stops every worker. Tasks still running are rejected. */
  public async terminate(): Promise<void> {
    for (const worker of [...this.workers]) {
      this.pending.get(worker)?.reject(new TaskAbortedError());
      this.pending.delete(worker);
      this.discard(worker);
    }
    await Promise.all(this.exits);
  }

  private acquire(): Worker {
    const idle = this.idle.pop();
    if (idle) {
      return idle;
    }
    if (this.workers.size >= this.size) {
      throw new Error(`Simulation worker pool is limited to ${this.size} tasks in flight`);
    }
    const worker = new Worker(WORKER_URL, { workerData: this.data });
    worker.on("message", (reply: SimulationReply) => this.settle(worker, reply));
    worker.on("error", (error) => this.fail(worker, error));
    worker.on("exit", (code) => {
      this.fail(worker, new Error(`Simulation worker exited with code ${code}`));
    });
    this.workers.add(worker);
    return worker;
  }

  private settle(worker: Worker, reply: SimulationReply): void {
    const task = this.pending.get(worker);
    if (!task || task.id !== reply.id) {
      return;
    }
    this.pending.delete(worker);
    this.idle.push(worker);
    if (reply.ok) {
      task.resolve(reply.summary);
    } else {
      task.reject(new Error(reply.error));
    }
  }

  private fail(worker: Worker, error: Error): void {
    const task = this.pending.get(worker);
    this.pending.delete(worker);
    this.discard(worker);
    task?.reject(error);
  }

  private discard(worker: Worker): void {
    if (!this.workers.delete(worker)) {
      return;
    }
    this.idle = this.idle.filter((candidate) => candidate !== worker);
    this.exits.push(worker.terminate());
  }
}
