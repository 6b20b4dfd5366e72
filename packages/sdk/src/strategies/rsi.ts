import { z } from "zod";

import { pushWindow } from "./indicators.js";
import type { StrategySignal, StrategyVariant } from "./types.js";

export const kind = "rsi" as const;

export const defaults = { period: 14, overboughtThreshold: 70, oversoldThreshold: 30 };

export const schema = z
  .object({
    period: z.number().int().min(1).default(defaults.period),
    overboughtThreshold: z.number().min(0).max(100).default(defaults.overboughtThreshold),
    oversoldThreshold: z.number().min(0).max(100).default(defaults.oversoldThreshold),
  })
  .superRefine((value, ctx) => {
    if (value.overboughtThreshold <= value.oversoldThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "overboughtThreshold must be greater than oversoldThreshold",
        path: ["overboughtThreshold"],
      });
    }
  });

export type RsiParams = z.infer<typeof schema>;

interface RsiState {
  readonly closes: number[];
  rsi: number | null;
}

/**
 * Simple-average RSI over the last `period` price changes.
 */
export const computeRsi = (closes: ReadonlyArray<number>, period: number): number => {
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < closes.length; i += 1) {
    const previous = closes[i - 1];
    const current = closes[i];
    if (previous === undefined || current === undefined) {
      continue;
    }
    const change = current - previous;
    if (change > 0) {
      gains += change;
    } else {
      losses -= change;
    }
  }
  const avgGain = gains / period;
  const avgLoss = losses / period;
  if (avgLoss === 0) {
    return 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
};

export const variant: StrategyVariant<RsiParams, RsiState> = {
  kind,
  title: "RSI",
  description: "Generates signals on overbought and oversold RSI readings.",
  schema,
  defaults,
  // One close beyond the period is needed for the first price change.
  minIndex: (params) => params.period + 1,
  createState: () => ({ closes: [], rsi: null }),
  onBar(params, state, bar): StrategySignal | null {
    pushWindow(state.closes, bar.close, params.period + 1);
    if (state.closes.length <= params.period) {
      return null;
    }

    const rsi = computeRsi(state.closes, params.period);
    state.rsi = rsi;

    if (rsi >= params.overboughtThreshold) {
      return { side: "SELL", reason: "rsi_overbought" };
    }
    if (rsi <= params.oversoldThreshold) {
      return { side: "BUY", reason: "rsi_oversold" };
    }
    return null;
  },
  describe: (state): Record<string, number> => (state.rsi === null ? {} : { rsi: state.rsi }),
};
