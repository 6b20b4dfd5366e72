import { createLogger, type Logger } from "@strategy-lab/logger";
import {
  MarketDataNotFoundError,
  Position,
  type EquityPoint,
  type ExecutedOrder,
  type MarketBar,
  type Order,
  type SimulationResult,
  type Strategy,
} from "@strategy-lab/sdk";

import type { MarketDataProvider } from "./market-data.js";

export const DEFAULT_INITIAL_CAPITAL = 100_000;
/** BUY orders whose notional falls below this are dropped. */
export const DEFAULT_MINIMUM_NOTIONAL = 10;

export interface SimulationOptions {
  readonly initialCapital?: number;
  readonly minimumNotional?: number;
  readonly logger?: Logger;
}

const defaultLogger = createLogger("engine");

/**
 * Runs `strategy` over `bars` and returns the fills and the equity curve.
 *
 * The strategy is reset first and sees bars from `getMinIndex()` onwards; the
 * warm-up bars before that index are skipped.
 */
export const simulate = (
  strategy: Strategy,
  bars: ReadonlyArray<MarketBar>,
  options: SimulationOptions = {},
): SimulationResult => {
  const initialCapital = options.initialCapital ?? DEFAULT_INITIAL_CAPITAL;
  const minimumNotional = options.minimumNotional ?? DEFAULT_MINIMUM_NOTIONAL;
  const logger = options.logger ?? defaultLogger;

  strategy.reset();
  const minIndex = strategy.getMinIndex();
  const positions = new Map<string, Position>();
  const cashRef = { value: initialCapital };
  const orders: ExecutedOrder[] = [];
  const equityCurve: EquityPoint[] = [];

  for (const bar of bars.slice(minIndex)) {
    positions.get(bar.symbol)?.markToMarket(bar.close);

    const order = strategy.processMarketData(bar, positions);
    if (order) {
      const executed = executeOrder({ order, bar, positions, cashRef, minimumNotional });
      if (executed) {
        orders.push(executed);
        logger.debug("order executed", {
          symbol: executed.symbol,
          side: executed.side,
          quantity: executed.quantity,
          price: executed.price,
          date: executed.date,
          profitLoss: executed.profitLoss,
          reason: executed.reason,
        });
      }
    }

    let marketValue = 0;
    for (const position of positions.values()) {
      marketValue += position.marketValue;
    }
    equityCurve.push(Object.freeze({ date: bar.date, equity: cashRef.value + marketValue }));
  }

  return Object.freeze({
    symbol: bars[0]?.symbol ?? "",
    orders: Object.freeze(orders),
    equityCurve: Object.freeze(equityCurve),
    initialCapital,
  });
};

interface ExecuteOrderArgs {
  readonly order: Order;
  readonly bar: MarketBar;
  readonly positions: Map<string, Position>;
  readonly cashRef: { value: number };
  readonly minimumNotional: number;
}

const executeOrder = ({
  order,
  bar,
  positions,
  cashRef,
  minimumNotional,
}: ExecuteOrderArgs): ExecutedOrder | null => {
  const price = bar.close;
  if (price <= 0) {
    return null;
  }

  const position = positions.get(order.symbol);

  if (order.side === "BUY") {
    const affordable = cashRef.value / price;
    const quantity = Math.min(order.quantity ?? affordable, affordable);
    const notional = quantity * price;
    if (quantity <= 0 || notional < minimumNotional) {
      return null;
    }
    cashRef.value -= notional;
    if (position) {
      position.apply(quantity, price, bar.date);
    } else {
      positions.set(order.symbol, new Position(order.symbol, quantity, price, bar.date));
    }
    return Object.freeze({ ...order, quantity, price, date: bar.date, profitLoss: 0 });
  }

  if (!position || position.quantity <= 0) {
    return null;
  }
  const quantity = Math.min(order.quantity ?? position.quantity, position.quantity);
  const profitLoss = position.apply(-quantity, price, bar.date);
  cashRef.value += quantity * price;
  if (position.isFlat()) {
    positions.delete(order.symbol);
  }
  return Object.freeze({ ...order, quantity, price, date: bar.date, profitLoss });
};

export interface SimulationEngineOptions extends SimulationOptions {
  readonly marketData: MarketDataProvider;
}

/**
 * Binds a market-data provider and default run settings to {@link simulate}.
 */
export class SimulationEngine {
  private readonly marketData: MarketDataProvider;
  private readonly options: SimulationOptions;

  public constructor({ marketData, ...options }: SimulationEngineOptions) {
    this.marketData = marketData;
    this.options = options;
  }

  public get initialCapital(): number {
    return this.options.initialCapital ?? DEFAULT_INITIAL_CAPITAL;
  }

  public get minimumNotional(): number {
    return this.options.minimumNotional ?? DEFAULT_MINIMUM_NOTIONAL;
  }

  public getMarketData(symbol: string): ReadonlyArray<MarketBar> {
    return this.marketData.getMarketData(symbol);
  }

  public listSymbols(): ReadonlyArray<string> {
    return this.marketData.listSymbols();
  }

  /**
   * @throws MarketDataNotFoundError when the provider has no bars for `symbol`.
   */
  public runSimulation(
    strategy: Strategy,
    symbol: string,
    initialCapital = this.initialCapital,
  ): SimulationResult {
    const bars = this.marketData.getMarketData(symbol);
    if (bars.length === 0) {
      throw new MarketDataNotFoundError(symbol);
    }
    return simulate(strategy, bars, { ...this.options, initialCapital });
  }
}
