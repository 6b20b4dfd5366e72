import type { z } from "zod";

import * as bollingerBands from "./bollinger_bands.js";
import * as maCrossover from "./ma_crossover.js";
import * as meanReversion from "./mean_reversion.js";
import * as rsi from "./rsi.js";
import * as sma from "./sma.js";
import type { StrategyKind } from "./types.js";

export interface StrategyField {
  readonly key: string;
  readonly label: string;
  readonly description?: string;
  readonly type: "number";
  readonly min?: number;
  readonly max?: number;
  readonly step?: number;
}

/** Inclusive arithmetic range of candidate values. */
export interface GridRange {
  readonly start: number;
  readonly end: number;
  readonly step: number;
}

export interface StrategyConfig {
  readonly key: StrategyKind;
  readonly title: string;
  readonly description: string;
  readonly defaults: Readonly<Record<string, number>>;
  readonly fields: ReadonlyArray<StrategyField>;
  /** Ranges swept by a full optimization run, in registration order. */
  readonly grid: Readonly<Record<string, GridRange>>;
  readonly schema: z.ZodTypeAny;
}

/**
 * Expands a range into its values, rounding away floating point drift.
 */
export const expandRange = ({ start, end, step }: GridRange): number[] => {
  if (step <= 0 || end < start) {
    return [];
  }
  const values: number[] = [];
  const count = Math.floor((end - start) / step + 1e-9);
  for (let i = 0; i <= count; i += 1) {
    values.push(Number((start + i * step).toFixed(10)));
  }
  return values;
};

export const strategyConfigs: Record<StrategyKind, StrategyConfig> = {
  [maCrossover.kind]: {
    key: maCrossover.kind,
    title: maCrossover.variant.title,
    description: maCrossover.variant.description,
    defaults: maCrossover.defaults,
    fields: [
      {
        key: "fastPeriod",
        label: "Fast Period",
        description: "Short-term SMA window size.",
        type: "number",
        min: 1,
        step: 1,
      },
      {
        key: "slowPeriod",
        label: "Slow Period",
        description: "Long-term SMA window size.",
        type: "number",
        min: 2,
        step: 1,
      },
    ],
    grid: {
      fastPeriod: { start: 5, end: 20, step: 1 },
      slowPeriod: { start: 20, end: 50, step: 1 },
    },
    schema: maCrossover.schema,
  },
  [meanReversion.kind]: {
    key: meanReversion.kind,
    title: meanReversion.variant.title,
    description: meanReversion.variant.description,
    defaults: meanReversion.defaults,
    fields: [
      {
        key: "period",
        label: "Lookback",
        description: "Closes used for the rolling mean and deviation.",
        type: "number",
        min: 2,
        step: 1,
      },
      {
        key: "threshold",
        label: "Z-Score Threshold",
        type: "number",
        min: 0,
        step: 0.25,
      },
    ],
    grid: {
      period: { start: 5, end: 25, step: 5 },
      threshold: { start: 0.5, end: 2.5, step: 0.25 },
    },
    schema: meanReversion.schema,
  },
  [rsi.kind]: {
    key: rsi.kind,
    title: rsi.variant.title,
    description: rsi.variant.description,
    defaults: rsi.defaults,
    fields: [
      {
        key: "period",
        label: "Period",
        description: "Price changes averaged per reading.",
        type: "number",
        min: 1,
        step: 1,
      },
      {
        key: "overboughtThreshold",
        label: "Overbought",
        type: "number",
        min: 0,
        max: 100,
        step: 1,
      },
      {
        key: "oversoldThreshold",
        label: "Oversold",
        type: "number",
        min: 0,
        max: 100,
        step: 1,
      },
    ],
    grid: {
      period: { start: 5, end: 25, step: 2 },
      overboughtThreshold: { start: 65, end: 85, step: 5 },
      oversoldThreshold: { start: 15, end: 35, step: 5 },
    },
    schema: rsi.schema,
  },
  [bollingerBands.kind]: {
    key: bollingerBands.kind,
    title: bollingerBands.variant.title,
    description: bollingerBands.variant.description,
    defaults: bollingerBands.defaults,
    fields: [
      {
        key: "period",
        label: "Period",
        type: "number",
        min: 2,
        step: 1,
      },
      {
        key: "stdDevMultiplier",
        label: "Band Width",
        description: "Standard deviations between the SMA and each band.",
        type: "number",
        min: 0,
        step: 0.25,
      },
    ],
    grid: {
      period: { start: 5, end: 30, step: 1 },
      stdDevMultiplier: { start: 1, end: 5, step: 0.25 },
    },
    schema: bollingerBands.schema,
  },
  [sma.kind]: {
    key: sma.kind,
    title: sma.variant.title,
    description: sma.variant.description,
    defaults: sma.defaults,
    fields: [
      {
        key: "windowSize",
        label: "Window Size",
        type: "number",
        min: 1,
        step: 1,
      },
    ],
    grid: {
      windowSize: { start: 5, end: 50, step: 5 },
    },
    schema: sma.schema,
  },
};

export const strategyList = Object.values(strategyConfigs);
