import { z } from "zod";

import { mean, pushWindow } from "./indicators.js";
import type { StrategySignal, StrategyVariant } from "./types.js";

export const kind = "ma_crossover" as const;

export const defaults = { fastPeriod: 10, slowPeriod: 30 };

export const schema = z
  .object({
    fastPeriod: z.number().int().min(1).default(defaults.fastPeriod),
    slowPeriod: z.number().int().min(2).default(defaults.slowPeriod),
  })
  .superRefine((value, ctx) => {
    if (value.fastPeriod >= value.slowPeriod) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fastPeriod must be less than slowPeriod",
        path: ["fastPeriod"],
      });
    }
  });

export type MaCrossoverParams = z.infer<typeof schema>;

interface MaCrossoverState {
  readonly closes: number[];
  fast: number | null;
  slow: number | null;
}

export const variant: StrategyVariant<MaCrossoverParams, MaCrossoverState> = {
  kind,
  title: "Moving Average Crossover",
  description: "Generates signals when the fast moving average crosses the slow moving average.",
  schema,
  defaults,
  minIndex: (params) => params.slowPeriod,
  createState: () => ({ closes: [], fast: null, slow: null }),
  onBar(params, state, bar): StrategySignal | null {
    pushWindow(state.closes, bar.close, params.slowPeriod);
    if (state.closes.length < params.slowPeriod) {
      return null;
    }

    const prevFast = state.fast;
    const prevSlow = state.slow;
    const fast = mean(state.closes.slice(-params.fastPeriod));
    const slow = mean(state.closes);
    state.fast = fast;
    state.slow = slow;

    if (prevFast === null || prevSlow === null) {
      return null;
    }
    if (prevFast <= prevSlow && fast > slow) {
      return { side: "BUY", reason: "fast_ma_crossed_above_slow" };
    }
    if (prevFast >= prevSlow && fast < slow) {
      return { side: "SELL", reason: "fast_ma_crossed_below_slow" };
    }
    return null;
  },
  describe: (state): Record<string, number> =>
    state.fast === null || state.slow === null ? {} : { fastMA: state.fast, slowMA: state.slow },
};
