export { InMemoryMarketData, type MarketDataProvider } from "./market-data.js";
export {
  DEFAULT_INITIAL_CAPITAL,
  DEFAULT_MINIMUM_NOTIONAL,
  SimulationEngine,
  simulate,
  type SimulationEngineOptions,
  type SimulationOptions,
} from "./simulation.js";
export { countCombinations, generateParameterGrid, type ParameterRanges } from "./grid.js";
export { TaskAbortedError, runPool, type PoolOptions, type PoolOutcome } from "./pool.js";
export {
  SimulationWorkerPool,
  type SimulationTask,
  type SimulationWorkerData,
} from "./worker-pool.js";
export {
  DEFAULT_OPTIMIZER_TIMEOUT_MS,
  StrategyOptimizer,
  type OptimizeOptions,
  type OptimizerExecution,
  type StrategyOptimizerOptions,
} from "./optimizer.js";
