export interface EquityPoint {
  readonly date: string;
  readonly equity: number;
}

/** Anything carrying a realized profit or loss, such as an executed order. */
export interface RealizedTrade {
  readonly profitLoss: number;
}

export const TRADING_DAYS_PER_YEAR = 252;
export const DEFAULT_RISK_FREE_RATE = 0.02;

const equityValues = (points: ReadonlyArray<EquityPoint>): number[] =>
  points.map((point) => point.equity);

export const calculateReturns = (points: ReadonlyArray<EquityPoint>): number[] => {
  const values = equityValues(points);
  const returns: number[] = [];
  for (let i = 1; i < values.length; i += 1) {
    const prev = values[i - 1];
    const current = values[i];
    if (prev === undefined || current === undefined || prev <= 0) {
      continue;
    }
    returns.push((current - prev) / prev);
  }
  return returns;
};

const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

const standardDeviation = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const avg = mean(values);
  const variance = values.reduce((acc, value) => {
    const diff = value - avg;
    return acc + diff * diff;
  }, 0) / values.length;
  return Math.sqrt(variance);
};

/**
 * Annualized Sharpe ratio of daily equity returns. The annual risk-free rate is
 * spread evenly over {@link TRADING_DAYS_PER_YEAR} days.
 */
export const calculateSharpe = (
  points: ReadonlyArray<EquityPoint>,
  riskFreeRate = DEFAULT_RISK_FREE_RATE,
): number => {
  if (points.length < 2) {
    return 0;
  }
  const returns = calculateReturns(points);
  if (returns.length === 0) {
    return 0;
  }
  const std = standardDeviation(returns);
  if (std === 0) {
    return 0;
  }
  const excess = mean(returns) - riskFreeRate / TRADING_DAYS_PER_YEAR;
  return excess / std * Math.sqrt(TRADING_DAYS_PER_YEAR);
};

/** Largest peak-to-trough decline as a positive fraction of the peak. */
export const calculateMaxDrawdown = (points: ReadonlyArray<EquityPoint>): number => {
  const [first] = points;
  if (first === undefined) {
    return 0;
  }
  let peak = first.equity;
  let maxDrawdown = 0;
  for (const point of points) {
    if (point.equity > peak) {
      peak = point.equity;
    }
    if (peak > 0) {
      const drawdown = (peak - point.equity) / peak;
      if (drawdown > maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }
  }
  return Math.min(maxDrawdown, 1);
};

export const calculateTotalReturn = (
  points: ReadonlyArray<EquityPoint>,
  initialCapital: number,
): number => {
  const last = points[points.length - 1];
  if (last === undefined || initialCapital <= 0) {
    return 0;
  }
  return (last.equity - initialCapital) / initialCapital;
};

/**
 * Gross profit over gross loss. Zero without trades, `Infinity` when no trade lost.
 */
export const calculateProfitFactor = (trades: ReadonlyArray<RealizedTrade>): number => {
  if (trades.length === 0) {
    return 0;
  }
  let grossProfit = 0;
  let grossLoss = 0;
  for (const trade of trades) {
    if (trade.profitLoss > 0) {
      grossProfit += trade.profitLoss;
    } else if (trade.profitLoss < 0) {
      grossLoss -= trade.profitLoss;
    }
  }
  if (grossLoss === 0) {
    return Number.POSITIVE_INFINITY;
  }
  return grossProfit / grossLoss;
};

/** Share of trades with a positive realized P&L, over every trade given. */
export const calculateWinRate = (trades: ReadonlyArray<RealizedTrade>): number => {
  if (trades.length === 0) {
    return 0;
  }
  const winners = trades.filter((trade) => trade.profitLoss > 0).length;
  return winners / trades.length;
};

export interface PerformanceSummary {
  readonly sharpeRatio: number;
  readonly totalReturn: number;
  readonly maxDrawdown: number;
  readonly tradeCount: number;
  readonly winRate: number;
  readonly profitFactor: number;
}

export interface PerformanceInput {
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly orders: ReadonlyArray<RealizedTrade>;
  readonly initialCapital: number;
}

export const summarizePerformance = (
  { equityCurve, orders, initialCapital }: PerformanceInput,
  riskFreeRate = DEFAULT_RISK_FREE_RATE,
): PerformanceSummary => ({
  sharpeRatio: calculateSharpe(equityCurve, riskFreeRate),
  totalReturn: calculateTotalReturn(equityCurve, initialCapital),
  maxDrawdown: calculateMaxDrawdown(equityCurve),
  tradeCount: orders.length,
  winRate: calculateWinRate(orders),
  profitFactor: calculateProfitFactor(orders),
});
