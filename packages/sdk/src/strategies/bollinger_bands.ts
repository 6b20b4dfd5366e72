import { z } from "zod";

import { mean, pushWindow, standardDeviation } from "./indicators.js";
import type { StrategySignal, StrategyVariant } from "./types.js";

export const kind = "bollinger_bands" as const;

export const defaults = { period: 20, stdDevMultiplier: 2 };

export const schema = z.object({
  period: z.number().int().min(2).default(defaults.period),
  stdDevMultiplier: z.number().positive().default(defaults.stdDevMultiplier),
});

export type BollingerBandsParams = z.infer<typeof schema>;

interface BollingerBandsState {
  readonly closes: number[];
  sma: number | null;
  upperBand: number | null;
  lowerBand: number | null;
}

export const variant: StrategyVariant<BollingerBandsParams, BollingerBandsState> = {
  kind,
  title: "Bollinger Bands",
  description: "Generates signals when the price touches or crosses a Bollinger band.",
  schema,
  defaults,
  minIndex: (params) => params.period,
  createState: () => ({ closes: [], sma: null, upperBand: null, lowerBand: null }),
  onBar(params, state, bar): StrategySignal | null {
    pushWindow(state.closes, bar.close, params.period);
    if (state.closes.length < params.period) {
      return null;
    }

    const sma = mean(state.closes);
    const width = params.stdDevMultiplier * standardDeviation(state.closes, sma);
    state.sma = sma;
    state.upperBand = sma + width;
    state.lowerBand = sma - width;

    if (bar.close >= state.upperBand) {
      return { side: "SELL", reason: "price_at_upper_band" };
    }
    if (bar.close <= state.lowerBand) {
      return { side: "BUY", reason: "price_at_lower_band" };
    }
    return null;
  },
  describe: (state): Record<string, number> =>
    state.sma === null || state.upperBand === null || state.lowerBand === null
      ? {}
      : { sma: state.sma, upperBand: state.upperBand, lowerBand: state.lowerBand },
};
