import { StrategyConfigurationError } from "../errors.js";
import type { MarketBar, Order } from "../model/types.js";
import { formatIssues } from "../validation.js";

import type {
  NumericParameters,
  PositionBook,
  Strategy,
  StrategyKind,
  StrategyParameters,
  StrategyState,
  StrategyVariant,
} from "./types.js";

interface ResolvedParameters<P> {
  readonly merged: Readonly<Record<string, unknown>>;
  readonly params: P | null;
  readonly issues: ReadonlyArray<string>;
}

const resolveParameters = <P extends NumericParameters, S>(
  variant: StrategyVariant<P, S>,
  parameters: StrategyParameters,
): ResolvedParameters<P> => {
  const merged = Object.freeze({ ...variant.defaults, ...parameters });
  const parsed = variant.schema.safeParse(merged);
  if (!parsed.success) {
    return { merged, params: null, issues: formatIssues(parsed.error) };
  }
  return { merged, params: Object.freeze({ ...parsed.data }), issues: [] };
};

/**
 * Implements the shared strategy contract on top of a variant's indicator logic.
 *
 * The wrapper owns three rules every variant shares: nothing is emitted during
 * the first `getMinIndex()` bars after a reset, a SELL needs a long position in
 * the bar's symbol, and a BUY needs the symbol to be flat.
 */
export class ConfiguredStrategy<P extends NumericParameters, S> implements Strategy {
  private readonly variant: StrategyVariant<P, S>;
  private resolved: ResolvedParameters<P>;
  private state: S;
  private barsSeen = 0;

  public constructor(variant: StrategyVariant<P, S>, parameters: StrategyParameters = {}) {
    this.variant = variant;
    this.resolved = resolveParameters(variant, parameters);
    this.state = variant.createState();
  }

  public get kind(): StrategyKind {
    return this.variant.kind;
  }

  public get title(): string {
    return this.variant.title;
  }

  public get description(): string {
    return this.variant.description;
  }

  public initialize(parameters: StrategyParameters = {}): void {
    this.resolved = resolveParameters(this.variant, parameters);
    this.reset();
  }

  public processMarketData(bar: MarketBar, positions: PositionBook): Order | null {
    const params = this.requireParams();
    const signal = this.variant.onBar(params, this.state, bar);
    this.barsSeen += 1;

    if (signal === null || this.barsSeen <= this.variant.minIndex(params)) {
      return null;
    }

    const position = positions.get(bar.symbol);
    const held = position !== undefined && position.quantity > 0 ? position.quantity : 0;

    if (signal.side === "SELL") {
      if (held === 0) {
        return null;
      }
      return { symbol: bar.symbol, side: "SELL", quantity: held, reason: signal.reason };
    }

    if (held > 0) {
      return null;
    }
    return { symbol: bar.symbol, side: "BUY", quantity: null, reason: signal.reason };
  }

  public getMinIndex(): number {
    return this.variant.minIndex(this.requireParams());
  }

  public reset(): void {
    this.state = this.variant.createState();
    this.barsSeen = 0;
  }

  public isValidParameters(): boolean {
    return this.resolved.params !== null;
  }

  public getParameterIssues(): ReadonlyArray<string> {
    return this.resolved.issues;
  }

  public duplicate(): Strategy {
    return new ConfiguredStrategy(this.variant, this.resolved.merged);
  }

  public getParameters(): StrategyParameters {
    return this.resolved.params ?? this.resolved.merged;
  }

  public getState(): StrategyState {
    const snapshot: Record<string, number> = {};
    for (const [key, value] of Object.entries(this.getParameters())) {
      if (typeof value === "number") {
        snapshot[key] = value;
      }
    }
    return Object.freeze({ ...snapshot, ...this.variant.describe(this.state) });
  }

  private requireParams(): P {
    const { params, issues } = this.resolved;
    if (params === null) {
      throw new StrategyConfigurationError(this.variant.kind, issues);
    }
    return params;
  }
}
