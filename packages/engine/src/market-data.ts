import type { MarketBar } from "@strategy-lab/sdk";

/**
 * Source of daily bars for the simulation engine.
 */
export interface MarketDataProvider {
  /** Bars for `symbol` in ascending date order; empty when the symbol is unknown. */
  getMarketData(symbol: string): ReadonlyArray<MarketBar>;
  listSymbols(): ReadonlyArray<string>;
}

/**
 * Provider backed by a symbol → bars map. Bars are copied and frozen on the way
 * in, so one instance can be read by every optimizer task at once.
 */
export class InMemoryMarketData implements MarketDataProvider {
  private readonly barsBySymbol = new Map<string, ReadonlyArray<MarketBar>>();

  public constructor(entries: Iterable<readonly [string, ReadonlyArray<MarketBar>]> = []) {
    for (const [symbol, bars] of entries) {
      this.barsBySymbol.set(symbol, freezeBars(bars));
    }
  }

  public static fromBars(bars: ReadonlyArray<MarketBar>): InMemoryMarketData {
    const grouped = new Map<string, MarketBar[]>();
    for (const bar of bars) {
      const list = grouped.get(bar.symbol) ?? [];
      list.push(bar);
      grouped.set(bar.symbol, list);
    }
    for (const list of grouped.values()) {
      list.sort((a, b) => a.date.localeCompare(b.date));
    }
    return new InMemoryMarketData(grouped);
  }

  public getMarketData(symbol: string): ReadonlyArray<MarketBar> {
    return this.barsBySymbol.get(symbol) ?? [];
  }

  public listSymbols(): ReadonlyArray<string> {
    return Array.from(this.barsBySymbol.keys()).sort();
  }
}

const freezeBars = (bars: ReadonlyArray<MarketBar>): ReadonlyArray<MarketBar> =>
  Object.freeze(bars.map((bar) => Object.freeze({ ...bar })));
