/**
 * Raised when a strategy is asked to run with parameters that failed validation.
 */
export class StrategyConfigurationError extends Error {
  public readonly strategy: string;
  public readonly issues: ReadonlyArray<string>;

  public constructor(strategy: string, issues: ReadonlyArray<string>) {
    super(`Invalid parameters for ${strategy}: ${issues.join("; ")}`);
    this.name = "StrategyConfigurationError";
    this.strategy = strategy;
    this.issues = issues;
  }
}

/**
 * Raised when no bars are available for the requested symbol.
 */
export class MarketDataNotFoundError extends Error {
  public readonly symbol: string;

  public constructor(symbol: string) {
    super(`No market data available for symbol: ${symbol}`);
    this.name = "MarketDataNotFoundError";
    this.symbol = symbol;
  }
}
