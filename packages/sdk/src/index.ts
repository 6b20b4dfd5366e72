// Source of truth for the shapes shared by the engine, data loaders, reports and CLI.

import { z } from "zod";

/** -----------------------------------------------------------------------
 *  MarketBar
 *  -------------------------------------------------------------------- */

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/u;

/** Runtime validator for {@link MarketBar}. */
export const MarketBarSchema = z.object({
  date: z.string().regex(ISO_DATE_PATTERN, "date must be YYYY-MM-DD"),
  symbol: z.string().min(1),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite().positive(),
  volume: z.number().finite().nonnegative(),
});

/** -----------------------------------------------------------------------
 *  Parameter ranges
 *  -------------------------------------------------------------------- */

/** Runtime validator for a single strategy parameter value. */
export const ParameterValueSchema = z.union([z.number().finite(), z.string(), z.boolean()]);

/** Runtime validator for a named list of candidate values. */
export const ParameterRangeSchema = z.object({
  name: z.string().min(1),
  values: z.array(ParameterValueSchema),
});

/** -----------------------------------------------------------------------
 *  OptimizationResult
 *  -------------------------------------------------------------------- */

/** Runtime validator for {@link OptimizationResult}. */
export const OptimizationResultSchema = z.object({
  parameters: z.record(ParameterValueSchema),
  sharpeRatio: z.number(),
  totalReturn: z.number(),
  maxDrawdown: z.number().min(0).max(1),
  tradeCount: z.number().int().nonnegative(),
  winRate: z.number().min(0).max(1),
  profitFactor: z.number().nonnegative(),
});

export { assertValid, formatIssues } from "./validation.js";
export { MarketDataNotFoundError, StrategyConfigurationError } from "./errors.js";
export { Position, type Lot } from "./model/position.js";
export type {
  EquityPoint,
  ExecutedOrder,
  ISODate,
  MarketBar,
  OptimizationResult,
  Order,
  OrderSide,
  ParameterSet,
  ParameterValue,
  SimulationResult,
} from "./model/types.js";
export * from "./strategies/types.js";
export { ConfiguredStrategy } from "./strategies/base.js";
export {
  STRATEGY_KINDS,
  createStrategy,
  createValidatedStrategy,
  isStrategyKind,
} from "./strategies/index.js";
export * as strategies from "./strategies/index.js";
export {
  expandRange,
  strategyConfigs,
  strategyList,
  type GridRange,
  type StrategyConfig,
  type StrategyField,
} from "./strategies/config.js";
