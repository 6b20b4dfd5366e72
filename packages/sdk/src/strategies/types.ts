import type { z } from "zod";

import type { Position } from "../model/position.js";
import type { MarketBar, Order, OrderSide } from "../model/types.js";

/** Closed set of strategy variants. */
export type StrategyKind = "ma_crossover" | "mean_reversion" | "rsi" | "bollinger_bands" | "sma";

/** Caller-supplied parameters; validated by the variant's schema. */
export type StrategyParameters = Readonly<Record<string, unknown>>;

/** Numeric strategy parameters after defaults are applied. */
export type NumericParameters = Record<string, number>;

/** Read-only diagnostic snapshot: configured parameters plus current indicator values. */
export type StrategyState = Readonly<Record<string, number>>;

/** Open positions keyed by symbol. */
export type PositionBook = ReadonlyMap<string, Position>;

/**
 * Raw direction produced by a variant's indicator logic before the holding gate.
 */
export interface StrategySignal {
  readonly side: OrderSide;
  readonly reason: string;
}

/**
 * Everything that distinguishes one strategy variant from another. A variant is
 * stateless itself; per-run rolling state lives in the value returned by
 * `createState` and is owned by a single strategy instance.
 */
export interface StrategyVariant<P extends NumericParameters, S> {
  readonly kind: StrategyKind;
  readonly title: string;
  readonly description: string;
  readonly schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  readonly defaults: P;
  /** Bars that must be seen before a signal may be emitted. */
  minIndex(params: P): number;
  createState(): S;
  /** Consumes one close and returns the raw signal for this bar, if any. */
  onBar(params: P, state: S, bar: MarketBar): StrategySignal | null;
  /** Indicator values worth exposing through `getState()`. */
  describe(state: S): Record<string, number>;
}

/**
 * Stateful signal generator driven one bar at a time.
 */
export interface Strategy {
  readonly kind: StrategyKind;
  readonly title: string;
  readonly description: string;
  /** Merges `parameters` over the variant defaults and clears rolling state. */
  initialize(parameters?: StrategyParameters): void;
  processMarketData(bar: MarketBar, positions: PositionBook): Order | null;
  getMinIndex(): number;
  /** Clears rolling windows and indicators; keeps the configured parameters. */
  reset(): void;
  isValidParameters(): boolean;
  getParameterIssues(): ReadonlyArray<string>;
  /** Independent instance with the same parameters and fresh state. */
  duplicate(): Strategy;
  getParameters(): StrategyParameters;
  getState(): StrategyState;
}
