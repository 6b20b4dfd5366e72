export {
  CsvMarketDataLoader,
  MARKET_DATA_FILE_SUFFIX,
  parseMarketDataCsv,
  type CsvLoadOptions,
  type CsvMarketDataLoaderOptions,
  type ParsedCsv,
} from "./CsvMarketDataLoader.js";
