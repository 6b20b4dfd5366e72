export {
  collect,
  parseList,
  parseParameterAssignments,
  parseParameterRanges,
  parseParameterValue,
  parsePositiveInteger,
  parsePositiveNumber,
  parseStrategyKind,
} from "./args.js";
export {
  defaultParameterRanges,
  runOptimizeCommand,
  runSimulateCommand,
  runSweepCommand,
  type CommandContext,
  type OptimizeCommandOptions,
  type OptimizeCommandResult,
  type SimulateCommandOptions,
  type SimulateCommandResult,
  type SweepCommandOptions,
  type SweepCommandResult,
} from "./commands.js";
export { EnvSchema, loadEnvFiles, resolveConfig, type CliConfig } from "./config.js";
export { createProgram } from "./program.js";
