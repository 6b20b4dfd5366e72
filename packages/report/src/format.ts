import {
  calculateMaxDrawdown,
  calculateSharpe,
  calculateWinRate,
  summarizePerformance,
} from "@strategy-lab/metrics";
import type { OptimizationResult, ParameterSet, SimulationResult } from "@strategy-lab/sdk";

export const TRADE_TABLE_HEADER = "Date,Side,Price,ProfitLoss,Equity";
export const OPTIMIZATION_SUMMARY_HEADER =
  "Symbol,Parameters,Sharpe Ratio,Max Drawdown,Win Rate,Total Trades,Profit/Loss";
export const TIME_SERIES_SUMMARY_HEADER =
  "Date,Avg Sharpe Ratio,Avg Max Drawdown,Avg Win Rate,Avg Profit Loss";

export interface OptimizationSummaryRow {
  readonly symbol: string;
  readonly strategy: string;
  readonly result: OptimizationResult;
}

const csvField = (value: string): string =>
  /[",\n]/u.test(value) ? `"${value.replaceAll('"', '""')}"` : value;

const toCsv = (header: string, rows: ReadonlyArray<ReadonlyArray<string>>): string =>
  [header, ...rows.map((row) => row.map(csvField).join(","))].join("\n") + "\n";

/** `name=value` pairs joined with `;`, in insertion order. */
export const formatParameters = (parameters: ParameterSet): string =>
  Object.entries(parameters)
    .map(([name, value]) => `${name}=${String(value)}`)
    .join(";");

/**
 * One row per executed order. The equity column is the curve value on the
 * order's date.
 */
export const formatTradeTable = (result: SimulationResult): string => {
  const equityByDate = new Map(result.equityCurve.map((point) => [point.date, point.equity]));
  const fallback = result.equityCurve.at(-1)?.equity ?? result.initialCapital;

  const rows = result.orders.map((order) => [
    order.date,
    order.side,
    order.price.toFixed(2),
    order.profitLoss.toFixed(2),
    (equityByDate.get(order.date) ?? fallback).toFixed(2),
  ]);
  return toCsv(TRADE_TABLE_HEADER, rows);
};

/**
 * Best result per symbol and strategy, in the order each pair first appears.
 * Profit/Loss is the total return as a fraction of the initial capital.
 */
export const formatOptimizationSummary = (rows: ReadonlyArray<OptimizationSummaryRow>): string => {
  const best = new Map<string, OptimizationSummaryRow>();
  for (const row of rows) {
    const key = `${row.symbol}\u0000${row.strategy}`;
    const current = best.get(key);
    if (!current || row.result.sharpeRatio > current.result.sharpeRatio) {
      best.set(key, row);
    }
  }

  const lines = Array.from(best.values(), ({ symbol, result }) => optimizationRow(symbol, result));
  return toCsv(OPTIMIZATION_SUMMARY_HEADER, lines);
};

/** Every result of one sweep, in the order given. */
export const formatOptimizationTable = (
  symbol: string,
  results: ReadonlyArray<OptimizationResult>,
): string =>
  toCsv(
    OPTIMIZATION_SUMMARY_HEADER,
    results.map((result) => optimizationRow(symbol, result)),
  );

const optimizationRow = (symbol: string, result: OptimizationResult): string[] => [
  symbol,
  formatParameters(result.parameters),
  result.sharpeRatio.toFixed(4),
  result.maxDrawdown.toFixed(4),
  result.winRate.toFixed(4),
  String(result.tradeCount),
  result.totalReturn.toFixed(2),
];

interface DateTotals {
  runs: number;
  sharpeRatio: number;
  maxDrawdown: number;
  winRate: number;
  profitLoss: number;
}

/**
 * Per-date averages over several runs, typically one re-run of the best
 * parameters per symbol. For each equity point the Sharpe ratio and drawdown
 * cover the curve up to that point, the win rate is the run's overall rate and
 * profit/loss is the equity change since the first point; both are 0 on the
 * first point. A date averages only the runs that reach it.
 */
export const formatTimeSeriesSummary = (
  simulations: ReadonlyArray<SimulationResult>,
  riskFreeRate?: number,
): string => {
  const byDate = new Map<string, DateTotals>();

  for (const simulation of simulations) {
    const curve = simulation.equityCurve;
    const winRate = calculateWinRate(simulation.orders);
    const start = curve[0]?.equity ?? simulation.initialCapital;

    curve.forEach((point, index) => {
      const prefix = curve.slice(0, index + 1);
      const totals = byDate.get(point.date) ?? {
        runs: 0,
        sharpeRatio: 0,
        maxDrawdown: 0,
        winRate: 0,
        profitLoss: 0,
      };
      totals.runs += 1;
      totals.sharpeRatio += calculateSharpe(prefix, riskFreeRate);
      totals.maxDrawdown += calculateMaxDrawdown(prefix);
      totals.winRate += index > 0 ? winRate : 0;
      totals.profitLoss += index > 0 ? point.equity - start : 0;
      byDate.set(point.date, totals);
    });
  }

  const rows = [...byDate.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, totals]) => [
      date,
      (totals.sharpeRatio / totals.runs).toFixed(4),
      (totals.maxDrawdown / totals.runs).toFixed(4),
      (totals.winRate / totals.runs).toFixed(4),
      (totals.profitLoss / totals.runs).toFixed(2),
    ]);
  return toCsv(TIME_SERIES_SUMMARY_HEADER, rows);
};

const percent = (value: number): string => `${(value * 100).toFixed(2)}%`;

/** Plain-text headline figures for a single run. */
export const formatSimulationSummary = (
  result: SimulationResult,
  riskFreeRate?: number,
): string => {
  const summary = summarizePerformance(result, riskFreeRate);
  const finalEquity = result.equityCurve.at(-1)?.equity ?? result.initialCapital;
  const profitFactor = Number.isFinite(summary.profitFactor)
    ? summary.profitFactor.toFixed(4)
    : "inf";

  return [
    `Symbol: ${result.symbol}`,
    `Initial capital: ${result.initialCapital.toFixed(2)}`,
    `Final equity: ${finalEquity.toFixed(2)}`,
    `Total return: ${percent(summary.totalReturn)}`,
    `Sharpe ratio: ${summary.sharpeRatio.toFixed(4)}`,
    `Max drawdown: ${percent(summary.maxDrawdown)}`,
    `Trades: ${summary.tradeCount}`,
    `Win rate: ${percent(summary.winRate)}`,
    `Profit factor: ${profitFactor}`,
  ].join("\n");
};
