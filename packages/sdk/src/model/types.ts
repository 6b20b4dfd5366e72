/** ISO-8601 calendar date (`YYYY-MM-DD`). */
export type ISODate = string;

/** Direction of an order. */
export type OrderSide = "BUY" | "SELL";

/** Scalar accepted as a strategy parameter or grid value. */
export type ParameterValue = number | string | boolean;

/** Named parameter assignment, e.g. `{ fastPeriod: 10, slowPeriod: 30 }`. */
export type ParameterSet = Readonly<Record<string, ParameterValue>>;

/**
 * One day's OHLCV record for a single symbol.
 */
export interface MarketBar {
  readonly date: ISODate;
  readonly symbol: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Order intent emitted by a strategy, at most one per bar.
 */
export interface Order {
  readonly symbol: string;
  readonly side: OrderSide;
  /** Requested quantity; `null` leaves sizing to the engine (BUY spends available cash). */
  readonly quantity: number | null;
  readonly reason: string;
}

/**
 * Order after the engine filled it. Execution fields are written once.
 */
export interface ExecutedOrder extends Order {
  /** Filled quantity. */
  readonly quantity: number;
  readonly price: number;
  readonly date: ISODate;
  readonly profitLoss: number;
}

/**
 * Equity snapshot captured after processing a bar.
 */
export interface EquityPoint {
  readonly date: ISODate;
  readonly equity: number;
}

/**
 * Output of one simulation run.
 */
export interface SimulationResult {
  readonly symbol: string;
  readonly orders: ReadonlyArray<ExecutedOrder>;
  /** One point per processed (post warm-up) bar: cash + mark-to-market position value. */
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly initialCapital: number;
}

/**
 * Performance of one parameter combination evaluated by the optimizer.
 */
export interface OptimizationResult {
  readonly parameters: ParameterSet;
  readonly sharpeRatio: number;
  /** (final equity - initial capital) / initial capital. */
  readonly totalReturn: number;
  /** Largest peak-to-trough decline as a fraction in [0, 1]. */
  readonly maxDrawdown: number;
  readonly tradeCount: number;
  readonly winRate: number;
  readonly profitFactor: number;
}
