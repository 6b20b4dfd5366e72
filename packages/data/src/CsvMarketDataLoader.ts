import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";

import { InMemoryMarketData } from "@strategy-lab/engine";
import { createLogger, type Logger } from "@strategy-lab/logger";
import { MarketBarSchema, MarketDataNotFoundError, type MarketBar } from "@strategy-lab/sdk";

export const MARKET_DATA_FILE_SUFFIX = "_data.csv";

export interface CsvMarketDataLoaderOptions {
  readonly logger?: Logger;
}

export interface CsvLoadOptions {
  /** Symbols to load; every `<SYMBOL>_data.csv` in the directory when omitted. */
  readonly symbols?: ReadonlyArray<string>;
  /** Inclusive `YYYY-MM-DD` bounds. */
  readonly start?: string;
  readonly end?: string;
}

export interface ParsedCsv {
  readonly bars: ReadonlyArray<MarketBar>;
  readonly skipped: number;
}

/**
 * Reads daily bars from `<SYMBOL>_data.csv` files laid out as
 * `Date,Symbol,Open,High,Low,Close,Volume`.
 */
export class CsvMarketDataLoader {
  private readonly logger: Logger;

  public constructor(options: CsvMarketDataLoaderOptions = {}) {
    this.logger = options.logger ?? createLogger("data");
  }

  public async listSymbols(directory: string): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(MARKET_DATA_FILE_SUFFIX))
      .map((entry) => entry.name.slice(0, -MARKET_DATA_FILE_SUFFIX.length))
      .filter((symbol) => symbol.length > 0)
      .sort();
  }

  /**
   * Returns the lexicographically greatest subdirectory of `root`, which for
   * dated directory names (`2024-06-01`, ...) is the most recent snapshot.
   */
  public async resolveLatestDirectory(root: string): Promise<string> {
    const entries = await readdir(root, { withFileTypes: true }).catch((error: unknown) => {
      throw new Error(`Market data directory not found: ${root}`, { cause: error });
    });
    const latest = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
      .at(-1);
    if (!latest) {
      throw new Error(`No market data directories found in ${root}`);
    }
    return join(root, latest);
  }

  /**
   * @throws MarketDataNotFoundError when the symbol has no file in `directory`.
   */
  public async loadSymbol(
    directory: string,
    symbol: string,
    options: Pick<CsvLoadOptions, "start" | "end"> = {},
  ): Promise<ReadonlyArray<MarketBar>> {
    const path = join(directory, `${symbol}${MARKET_DATA_FILE_SUFFIX}`);
    let content: string;
    try {
      content = await readFile(path, { encoding: "utf-8" });
    } catch (error) {
      this.logger.debug("market data file unreadable", { symbol, path, error: String(error) });
      throw new MarketDataNotFoundError(symbol);
    }

    const { bars, skipped } = parseMarketDataCsv(content, symbol);
    if (skipped > 0) {
      this.logger.warn("skipped malformed market data rows", { symbol, path, skipped });
    }
    return filterByDate(bars, options);
  }

  public async loadDirectory(
    directory: string,
    options: CsvLoadOptions = {},
  ): Promise<InMemoryMarketData> {
    const symbols = options.symbols ?? (await this.listSymbols(directory));
    const entries: Array<readonly [string, ReadonlyArray<MarketBar>]> = [];
    for (const symbol of symbols) {
      entries.push([symbol, await this.loadSymbol(directory, symbol, options)]);
    }
    this.logger.info("market data loaded", {
      directory,
      symbols: symbols.length,
      bars: entries.reduce((total, [, bars]) => total + bars.length, 0),
    });
    return new InMemoryMarketData(entries);
  }

  /** Loads from the most recent dated subdirectory of `root`. */
  public async loadLatest(root: string, options: CsvLoadOptions = {}): Promise<InMemoryMarketData> {
    return this.loadDirectory(await this.resolveLatestDirectory(root), options);
  }
}

/**
 * Parses CSV content for one symbol. The header row is dropped, rows that do not
 * form a valid bar are counted as skipped, a repeated date keeps its last row,
 * and bars come back in date order.
 */
export const parseMarketDataCsv = (content: string, symbol: string): ParsedCsv => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  // Remove header row.
  const [, ...rows] = lines;
  const byDate = new Map<string, MarketBar>();
  let skipped = 0;

  for (const row of rows) {
    const bar = toBar(row, symbol);
    if (bar) {
      byDate.set(bar.date, bar);
    } else {
      skipped += 1;
    }
  }

  const bars = Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
  return { bars, skipped };
};

const toBar = (row: string, symbol: string): MarketBar | null => {
  const [date, , openStr, highStr, lowStr, closeStr, volumeStr] = row
    .split(",")
    .map((part) => part.trim());

  const parsed = MarketBarSchema.safeParse({
    date,
    symbol,
    open: toNumber(openStr),
    high: toNumber(highStr),
    low: toNumber(lowStr),
    close: toNumber(closeStr),
    volume: toNumber(volumeStr),
  });
  return parsed.success ? parsed.data : null;
};

const toNumber = (value: string | undefined): number =>
  value === undefined || value === "" ? Number.NaN : Number(value);

const filterByDate = (
  bars: ReadonlyArray<MarketBar>,
  { start, end }: Pick<CsvLoadOptions, "start" | "end">,
): ReadonlyArray<MarketBar> => {
  if (!start && !end) {
    return bars;
  }
  return bars.filter((bar) => {
    const isAfterStart = start ? bar.date >= start : true;
    const isBeforeEnd = end ? bar.date <= end : true;
    return isAfterStart && isBeforeEnd;
  });
};
