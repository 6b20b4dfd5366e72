import { CsvMarketDataLoader } from "@strategy-lab/data";
import {
  SimulationEngine,
  StrategyOptimizer,
  type MarketDataProvider,
  type ParameterRanges,
} from "@strategy-lab/engine";
import type { Logger } from "@strategy-lab/logger";
import {
  formatOptimizationSummary,
  formatOptimizationTable,
  formatParameters,
  formatSimulationSummary,
  formatTimeSeriesSummary,
  formatTradeTable,
  optimizationReportName,
  simulationReportName,
  timeSeriesReportName,
  writeReport,
  type OptimizationSummaryRow,
} from "@strategy-lab/report";
import {
  STRATEGY_KINDS,
  createStrategy,
  createValidatedStrategy,
  expandRange,
  strategyConfigs,
  type OptimizationResult,
  type ParameterSet,
  type ParameterValue,
  type SimulationResult,
  type StrategyKind,
} from "@strategy-lab/sdk";

import type { CliConfig } from "./config.js";

export interface CommandContext {
  readonly config: CliConfig;
  readonly logger: Logger;
  /** Human-readable output. */
  readonly write: (text: string) => void;
  readonly now?: () => Date;
  readonly signal?: AbortSignal;
}

/** Ranges a full sweep registers for `kind`, in registration order. */
export const defaultParameterRanges = (kind: StrategyKind): Map<string, ParameterValue[]> =>
  new Map(
    Object.entries(strategyConfigs[kind].grid).map(
      ([name, range]): [string, ParameterValue[]] => [name, expandRange(range)],
    ),
  );

const loadMarketData = async (
  context: CommandContext,
  symbols?: ReadonlyArray<string>,
): Promise<MarketDataProvider> => {
  const loader = new CsvMarketDataLoader({ logger: context.logger });
  return loader.loadLatest(context.config.dataDir, symbols ? { symbols } : {});
};

const buildEngine = (
  context: CommandContext,
  marketData: MarketDataProvider,
  initialCapital: number,
): SimulationEngine => new SimulationEngine({ marketData, initialCapital, logger: context.logger });

const buildOptimizer = (
  context: CommandContext,
  engine: SimulationEngine,
  symbol: string,
  ranges: ParameterRanges,
): StrategyOptimizer => {
  const optimizer = new StrategyOptimizer({
    engine,
    symbol,
    timeoutMs: context.config.optimizerTimeoutMs,
    logger: context.logger,
    ...(context.config.optimizerConcurrency === undefined
      ? {}
      : { concurrency: context.config.optimizerConcurrency }),
  });
  for (const [name, values] of ranges) {
    optimizer.addParameterRange(name, values);
  }
  return optimizer;
};

const today = (context: CommandContext): Date => context.now?.() ?? new Date();

// ============================================================================
// simulate
// ============================================================================

export interface SimulateCommandOptions {
  readonly strategy: StrategyKind;
  readonly symbol: string;
  readonly parameters?: ParameterSet;
  readonly initialCapital?: number;
}

export interface SimulateCommandResult {
  readonly result: SimulationResult;
  readonly reportPath: string;
}

/**
 * Runs one strategy over one symbol, prints the headline figures and writes the
 * trade table.
 */
export const runSimulateCommand = async (
  context: CommandContext,
  options: SimulateCommandOptions,
): Promise<SimulateCommandResult> => {
  const strategy = createValidatedStrategy(options.strategy, options.parameters ?? {});
  const marketData = await loadMarketData(context, [options.symbol]);
  const engine = buildEngine(
    context,
    marketData,
    options.initialCapital ?? context.config.initialCapital,
  );

  const result = engine.runSimulation(strategy, options.symbol);
  context.write(`${formatSimulationSummary(result)}\n`);

  const reportPath = await writeReport(
    context.config.resultsDir,
    simulationReportName(options.symbol, today(context)),
    formatTradeTable(result),
  );
  context.logger.info("simulation report written", { symbol: options.symbol, reportPath });
  return { result, reportPath };
};

// ============================================================================
// optimize
// ============================================================================

export interface OptimizeCommandOptions {
  readonly strategy: StrategyKind;
  readonly symbol: string;
  /** Fixed values for parameters that are not swept. */
  readonly parameters?: ParameterSet;
  /** Defaults to the strategy's full sweep grid when empty. */
  readonly ranges?: ParameterRanges;
  readonly initialCapital?: number;
  /** Number of ranked results printed. */
  readonly top?: number;
}

export interface OptimizeCommandResult {
  readonly results: ReadonlyArray<OptimizationResult>;
  readonly reportPath: string;
}

export const runOptimizeCommand = async (
  context: CommandContext,
  options: OptimizeCommandOptions,
): Promise<OptimizeCommandResult> => {
  const initialCapital = options.initialCapital ?? context.config.initialCapital;
  const ranges =
    options.ranges && options.ranges.size > 0
      ? options.ranges
      : defaultParameterRanges(options.strategy);

  const marketData = await loadMarketData(context, [options.symbol]);
  const engine = buildEngine(context, marketData, initialCapital);
  const optimizer = buildOptimizer(context, engine, options.symbol, ranges);

  const results = await optimizer.optimize(
    createStrategy(options.strategy, options.parameters ?? {}),
    context.signal ? { signal: context.signal } : {},
  );

  const top = results.slice(0, options.top ?? 5);
  if (top.length === 0) {
    context.write("No valid parameter combinations.\n");
  }
  top.forEach((result, index) => {
    context.write(
      `#${index + 1} ${formatParameters(result.parameters)} ` +
        `sharpe=${result.sharpeRatio.toFixed(4)} ` +
        `return=${(result.totalReturn * 100).toFixed(2)}% ` +
        `trades=${result.tradeCount}\n`,
    );
  });

  const reportPath = await writeReport(
    context.config.resultsDir,
    `${options.symbol}_${optimizationReportName(options.strategy, today(context))}`,
    formatOptimizationTable(options.symbol, results),
  );
  context.logger.info("optimization report written", {
    strategy: options.strategy,
    symbol: options.symbol,
    reportPath,
  });
  return { results, reportPath };
};

// ============================================================================
// sweep
// ============================================================================

export interface SweepCommandOptions {
  /** Defaults to every strategy. */
  readonly strategies?: ReadonlyArray<StrategyKind>;
  /** Defaults to every symbol in the data snapshot. */
  readonly symbols?: ReadonlyArray<string>;
  readonly initialCapital?: number;
}

export interface SweepCommandResult {
  readonly rows: ReadonlyArray<OptimizationSummaryRow>;
  /** One best-per-symbol summary per strategy. */
  readonly reportPaths: ReadonlyArray<string>;
  /** Trade table of each symbol's best parameters, per strategy. */
  readonly tradeTablePaths: ReadonlyArray<string>;
  /** One time-series summary per strategy. */
  readonly timeSeriesPaths: ReadonlyArray<string>;
}

/**
 * Optimizes every strategy's default grid over every symbol. Per strategy it
 * writes a summary holding the best result for each symbol, the trade table of
 * a re-run with those parameters, and the time series averaged over the re-runs.
 */
export const runSweepCommand = async (
  context: CommandContext,
  options: SweepCommandOptions = {},
): Promise<SweepCommandResult> => {
  const initialCapital = options.initialCapital ?? context.config.initialCapital;
  const marketData = await loadMarketData(context, options.symbols);
  const engine = buildEngine(context, marketData, initialCapital);
  const symbols = marketData.listSymbols().filter((symbol) => {
    if (marketData.getMarketData(symbol).length > 0) {
      return true;
    }
    context.logger.warn("skipping symbol without bars", { symbol });
    return false;
  });

  const allRows: OptimizationSummaryRow[] = [];
  const reportPaths: string[] = [];
  const tradeTablePaths: string[] = [];
  const timeSeriesPaths: string[] = [];
  const date = today(context);

  for (const kind of options.strategies ?? STRATEGY_KINDS) {
    const rows: OptimizationSummaryRow[] = [];
    const bestRuns: SimulationResult[] = [];
    for (const symbol of symbols) {
      const optimizer = buildOptimizer(context, engine, symbol, defaultParameterRanges(kind));
      const results = await optimizer.optimize(
        createStrategy(kind),
        context.signal ? { signal: context.signal } : {},
      );
      const [best] = results;
      if (!best) {
        continue;
      }
      rows.push({ symbol, strategy: kind, result: best });
      context.write(
        `${kind} ${symbol}: ${formatParameters(best.parameters)} ` +
          `sharpe=${best.sharpeRatio.toFixed(4)}\n`,
      );

      const bestRun = engine.runSimulation(createStrategy(kind, best.parameters), symbol);
      bestRuns.push(bestRun);
      tradeTablePaths.push(
        await writeReport(
          context.config.resultsDir,
          `${kind}_${simulationReportName(symbol, date)}`,
          formatTradeTable(bestRun),
        ),
      );
    }

    reportPaths.push(
      await writeReport(
        context.config.resultsDir,
        optimizationReportName(kind, date),
        formatOptimizationSummary(rows),
      ),
    );
    timeSeriesPaths.push(
      await writeReport(
        context.config.resultsDir,
        timeSeriesReportName(kind, date),
        formatTimeSeriesSummary(bestRuns),
      ),
    );
    allRows.push(...rows);
  }

  context.logger.info("sweep finished", {
    strategies: reportPaths.length,
    symbols: symbols.length,
    results: allRows.length,
  });
  return { rows: allRows, reportPaths, tradeTablePaths, timeSeriesPaths };
};
