import { availableParallelism } from "node:os";

import { createLogger, type Logger } from "@strategy-lab/logger";
import { DEFAULT_RISK_FREE_RATE, summarizePerformance } from "@strategy-lab/metrics";
import {
  MarketDataNotFoundError,
  ParameterRangeSchema,
  assertValid,
  type MarketBar,
  type OptimizationResult,
  type ParameterSet,
  type ParameterValue,
  type Strategy,
  type StrategyParameters,
} from "@strategy-lab/sdk";

import { countCombinations, generateParameterGrid, type ParameterRanges } from "./grid.js";
import { runPool } from "./pool.js";
import type { SimulationEngine } from "./simulation.js";
import { SimulationWorkerPool } from "./worker-pool.js";

export const DEFAULT_OPTIMIZER_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * `worker` runs each combination on a `worker_threads` pool; `inline` runs them
 * on the calling thread through the engine.
 */
export type OptimizerExecution = "worker" | "inline";

export interface StrategyOptimizerOptions {
  readonly engine: SimulationEngine;
  readonly symbol: string;
  /**
   * Simulations in flight at once, which is also the worker thread count.
   * Defaults to the available parallelism.
   */
  readonly concurrency?: number;
  /** Overall budget for one `optimize` call. */
  readonly timeoutMs?: number;
  readonly riskFreeRate?: number;
  /** Defaults to `worker`. */
  readonly execution?: OptimizerExecution;
  readonly logger?: Logger;
}

export interface OptimizeOptions {
  /** Aborting stops the sweep the same way the timeout does. */
  readonly signal?: AbortSignal;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Grid search over registered parameter ranges for one symbol.
 *
 * No rolling state is shared between tasks: a worker rebuilds the strategy
 * from its kind and parameters, and inline runs use a `duplicate()` of the
 * supplied strategy.
 */
export class StrategyOptimizer {
  private readonly engine: SimulationEngine;
  private readonly symbol: string;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly riskFreeRate: number;
  private readonly execution: OptimizerExecution;
  private readonly logger: Logger;
  private readonly ranges = new Map<string, ReadonlyArray<ParameterValue>>();
  private results: ReadonlyArray<OptimizationResult> = [];

  public constructor(options: StrategyOptimizerOptions) {
    this.engine = options.engine;
    this.symbol = options.symbol;
    this.concurrency = options.concurrency ?? availableParallelism();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_OPTIMIZER_TIMEOUT_MS;
    this.riskFreeRate = options.riskFreeRate ?? DEFAULT_RISK_FREE_RATE;
    this.execution = options.execution ?? "worker";
    this.logger = options.logger ?? createLogger("optimizer");
  }

  /**
   * Registers candidate values for `name`, replacing any earlier registration.
   *
   * @throws Error when the name is empty or a value is not a finite number,
   * string or boolean.
   */
  public addParameterRange(name: string, values: ReadonlyArray<ParameterValue>): this {
    const range = assertValid(ParameterRangeSchema, { name, values }, "parameter range");
    this.ranges.set(range.name, Object.freeze(range.values));
    return this;
  }

  public getParameterRanges(): ParameterRanges {
    return new Map(this.ranges);
  }

  /** Clears registered ranges and the last results. */
  public reset(): void {
    this.ranges.clear();
    this.results = [];
  }

  /** Results of the most recent `optimize` call, best first. */
  public getResults(): ReadonlyArray<OptimizationResult> {
    return this.results;
  }

  /**
   * Evaluates every valid combination and resolves with the results sorted by
   * Sharpe ratio, best first. Combinations that fail validation are skipped;
   * tasks that throw are logged and left out. When the timeout elapses or the
   * signal aborts, running workers are terminated, unfinished tasks are
   * cancelled and the finished ones are returned.
   *
   * @throws MarketDataNotFoundError when the engine has no bars for the symbol.
   */
  public async optimize(
    strategy: Strategy,
    options: OptimizeOptions = {},
  ): Promise<OptimizationResult[]> {
    this.results = [];
    const combinations = countCombinations(this.ranges);
    if (combinations === 0) {
      return [];
    }
    const bars = this.engine.getMarketData(this.symbol);
    if (bars.length === 0) {
      throw new MarketDataNotFoundError(this.symbol);
    }

    const grid = generateParameterGrid(this.ranges);
    const baseParameters = strategy.getParameters();
    const candidates = grid.filter((parameters) =>
      this.isValidCombination(strategy, baseParameters, parameters),
    );

    this.logger.info("optimization started", {
      strategy: strategy.kind,
      symbol: this.symbol,
      combinations,
      candidates: candidates.length,
      concurrency: this.concurrency,
      execution: this.execution,
    });

    const controller = new AbortController();
    const onExternalAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    const workers =
      this.execution === "worker" ? this.createWorkerPool(bars, candidates.length) : null;
    const outcomes = await runPool(
      candidates,
      (parameters, _index, signal) =>
        workers
          ? this.evaluateInWorker(workers, strategy, baseParameters, parameters, signal)
          : this.evaluate(strategy, baseParameters, parameters),
      { concurrency: this.concurrency, signal: controller.signal },
    ).finally(async () => {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onExternalAbort);
      await workers?.terminate();
    });

    const collected: OptimizationResult[] = [];
    let failed = 0;
    let cancelled = 0;
    outcomes.forEach((outcome, index) => {
      if (outcome.status === "fulfilled") {
        collected.push(outcome.value);
        return;
      }
      if (outcome.status === "rejected") {
        failed += 1;
        this.logger.error("optimization task failed", {
          strategy: strategy.kind,
          symbol: this.symbol,
          parameters: candidates[index],
          error: describeError(outcome.reason),
        });
        return;
      }
      cancelled += 1;
    });

    if (cancelled > 0) {
      this.logger.warn("optimization cancelled pending tasks", {
        strategy: strategy.kind,
        symbol: this.symbol,
        cancelled,
        timeoutMs: this.timeoutMs,
      });
    }

    // Array#sort is stable, so equal Sharpe ratios keep grid order.
    const ranked = collected.sort((a, b) => b.sharpeRatio - a.sharpeRatio);
    this.results = Object.freeze([...ranked]);

    this.logger.info("optimization finished", {
      strategy: strategy.kind,
      symbol: this.symbol,
      evaluated: ranked.length,
      failed,
      cancelled,
      bestSharpe: ranked[0]?.sharpeRatio ?? null,
    });

    return ranked;
  }

  private isValidCombination(
    strategy: Strategy,
    baseParameters: StrategyParameters,
    parameters: ParameterSet,
  ): boolean {
    const scratch = strategy.duplicate();
    scratch.initialize({ ...baseParameters, ...parameters });
    if (scratch.isValidParameters()) {
      return true;
    }
    this.logger.debug("skipping invalid parameter combination", {
      strategy: strategy.kind,
      parameters,
      issues: scratch.getParameterIssues(),
    });
    return false;
  }

  private createWorkerPool(
    bars: ReadonlyArray<MarketBar>,
    candidates: number,
  ): SimulationWorkerPool {
    return new SimulationWorkerPool(
      {
        bars,
        initialCapital: this.engine.initialCapital,
        minimumNotional: this.engine.minimumNotional,
        riskFreeRate: this.riskFreeRate,
      },
      Math.min(this.concurrency, candidates),
    );
  }

  private async evaluateInWorker(
    workers: SimulationWorkerPool,
    strategy: Strategy,
    baseParameters: StrategyParameters,
    parameters: ParameterSet,
    signal: AbortSignal | undefined,
  ): Promise<OptimizationResult> {
    const summary = await workers.run(
      { kind: strategy.kind, parameters: { ...baseParameters, ...parameters } },
      signal,
    );
    return Object.freeze({ parameters: Object.freeze({ ...parameters }), ...summary });
  }

  private evaluate(
    strategy: Strategy,
    baseParameters: StrategyParameters,
    parameters: ParameterSet,
  ): OptimizationResult {
    const instance = strategy.duplicate();
    instance.initialize({ ...baseParameters, ...parameters });
    const simulation = this.engine.runSimulation(instance, this.symbol);
    const summary = summarizePerformance(simulation, this.riskFreeRate);
    return Object.freeze({ parameters: Object.freeze({ ...parameters }), ...summary });
  }
}
