import { z } from "zod";

import { mean, pushWindow } from "./indicators.js";
import type { StrategySignal, StrategyVariant } from "./types.js";

export const kind = "sma" as const;

export const defaults = { windowSize: 20 };

export const schema = z.object({
  windowSize: z.number().int().min(1).default(defaults.windowSize),
});

export type SmaParams = z.infer<typeof schema>;

interface SmaState {
  readonly closes: number[];
  average: number | null;
  aboveAverage: boolean | null;
}

export const variant: StrategyVariant<SmaParams, SmaState> = {
  kind,
  title: "Simple Moving Average",
  description: "Generates signals when the close crosses its simple moving average.",
  schema,
  defaults,
  minIndex: (params) => params.windowSize,
  createState: () => ({ closes: [], average: null, aboveAverage: null }),
  onBar(params, state, bar): StrategySignal | null {
    pushWindow(state.closes, bar.close, params.windowSize);
    if (state.closes.length < params.windowSize) {
      return null;
    }

    const average = mean(state.closes);
    const wasAbove = state.aboveAverage;
    const isAbove = bar.close > average;
    state.average = average;
    state.aboveAverage = isAbove;

    if (wasAbove === null || wasAbove === isAbove) {
      return null;
    }
    return isAbove
      ? { side: "BUY", reason: "price_crossed_above_sma" }
      : { side: "SELL", reason: "price_crossed_below_sma" };
  },
  describe: (state): Record<string, number> => (state.average === null ? {} : { sma: state.average }),
};
