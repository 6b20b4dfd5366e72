import { z } from "zod";

import { mean, pushWindow, standardDeviation } from "./indicators.js";
import type { StrategySignal, StrategyVariant } from "./types.js";

export const kind = "mean_reversion" as const;

export const defaults = { period: 20, threshold: 2 };

export const schema = z.object({
  period: z.number().int().min(2).default(defaults.period),
  threshold: z.number().positive().default(defaults.threshold),
});

export type MeanReversionParams = z.infer<typeof schema>;

interface MeanReversionState {
  readonly closes: number[];
  mean: number | null;
  stdDev: number | null;
  zScore: number | null;
}

/**
 * The z-score compares the current close with the mean and deviation of the
 * `period` closes before it, so the window holds `period + 1` closes.
 */
export const variant: StrategyVariant<MeanReversionParams, MeanReversionState> = {
  kind,
  title: "Mean Reversion",
  description: "Generates signals when the price deviates significantly from its rolling mean.",
  schema,
  defaults,
  minIndex: (params) => params.period,
  createState: () => ({ closes: [], mean: null, stdDev: null, zScore: null }),
  onBar(params, state, bar): StrategySignal | null {
    pushWindow(state.closes, bar.close, params.period + 1);
    if (state.closes.length <= params.period) {
      return null;
    }

    const history = state.closes.slice(0, params.period);
    const average = mean(history);
    const stdDev = standardDeviation(history, average);
    const zScore = stdDev > 0 ? (bar.close - average) / stdDev : 0;
    state.mean = average;
    state.stdDev = stdDev;
    state.zScore = zScore;

    if (zScore > params.threshold) {
      return { side: "SELL", reason: "price_above_z_threshold" };
    }
    if (zScore < -params.threshold) {
      return { side: "BUY", reason: "price_below_z_threshold" };
    }
    return null;
  },
  describe: (state): Record<string, number> =>
    state.mean === null || state.stdDev === null || state.zScore === null
      ? {}
      : { mean: state.mean, stdDev: state.stdDev, zScore: state.zScore },
};
