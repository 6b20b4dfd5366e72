export {
  OPTIMIZATION_SUMMARY_HEADER,
  TIME_SERIES_SUMMARY_HEADER,
  TRADE_TABLE_HEADER,
  formatOptimizationSummary,
  formatOptimizationTable,
  formatParameters,
  formatSimulationSummary,
  formatTimeSeriesSummary,
  formatTradeTable,
  type OptimizationSummaryRow,
} from "./format.js";
export {
  optimizationReportName,
  reportDate,
  simulationReportName,
  timeSeriesReportName,
  writeReport,
} from "./write.js";
