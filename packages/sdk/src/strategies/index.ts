import { StrategyConfigurationError } from "../errors.js";

import { ConfiguredStrategy } from "./base.js";
import * as bollingerBands from "./bollinger_bands.js";
import * as maCrossover from "./ma_crossover.js";
import * as meanReversion from "./mean_reversion.js";
import * as rsi from "./rsi.js";
import * as sma from "./sma.js";
import type { Strategy, StrategyKind, StrategyParameters } from "./types.js";

export { bollingerBands, maCrossover, meanReversion, rsi, sma };

export const STRATEGY_KINDS: ReadonlyArray<StrategyKind> = [
  maCrossover.kind,
  meanReversion.kind,
  rsi.kind,
  bollingerBands.kind,
  sma.kind,
];

export const isStrategyKind = (value: string): value is StrategyKind =>
  STRATEGY_KINDS.some((kind) => kind === value);

/**
 * Builds a strategy of the given kind. Invalid parameters do not throw here;
 * check `isValidParameters()` or use {@link createValidatedStrategy}.
 */
export const createStrategy = (
  kind: StrategyKind,
  parameters: StrategyParameters = {},
): Strategy => {
  switch (kind) {
    case maCrossover.kind:
      return new ConfiguredStrategy(maCrossover.variant, parameters);
    case meanReversion.kind:
      return new ConfiguredStrategy(meanReversion.variant, parameters);
    case rsi.kind:
      return new ConfiguredStrategy(rsi.variant, parameters);
    case bollingerBands.kind:
      return new ConfiguredStrategy(bollingerBands.variant, parameters);
    case sma.kind:
      return new ConfiguredStrategy(sma.variant, parameters);
  }
};

export const createValidatedStrategy = (
  kind: StrategyKind,
  parameters: StrategyParameters = {},
): Strategy => {
  const strategy = createStrategy(kind, parameters);
  if (!strategy.isValidParameters()) {
    throw new StrategyConfigurationError(kind, strategy.getParameterIssues());
  }
  return strategy;
};
