import { Command } from "commander";

import type { StrategyKind } from "@strategy-lab/sdk";

import {
  collect,
  parseList,
  parseParameterAssignments,
  parseParameterRanges,
  parsePositiveInteger,
  parsePositiveNumber,
  parseStrategyKind,
} from "./args.js";
import { runOptimizeCommand, runSimulateCommand, runSweepCommand, type CommandContext } from "./commands.js";

type GlobalFlags = {
  readonly dataDir?: string;
  readonly resultsDir?: string;
  readonly capital?: number;
};

interface SimulateFlags {
  readonly strategy: StrategyKind;
  readonly symbol: string;
  readonly param: string[];
}

interface OptimizeFlags extends SimulateFlags {
  readonly range: string[];
  readonly top: number;
  readonly concurrency?: number;
  readonly timeout?: number;
}

interface SweepFlags {
  readonly strategies?: string[];
  readonly symbols?: string[];
}

const applyGlobalFlags = (context: CommandContext, flags: GlobalFlags): CommandContext => ({
  ...context,
  config: {
    ...context.config,
    ...(flags.dataDir ? { dataDir: flags.dataDir } : {}),
    ...(flags.resultsDir ? { resultsDir: flags.resultsDir } : {}),
    ...(flags.capital ? { initialCapital: flags.capital } : {}),
  },
});

/**
 * Builds the `strategy-lab` command tree. Command-line flags override the
 * configuration carried by `context`.
 */
export const createProgram = (context: CommandContext): Command => {
  const program = new Command();

  program
    .name("strategy-lab")
    .description("Backtest trading strategies on daily bars and grid-search their parameters")
    .version("0.1.0")
    .option("--data-dir <dir>", "root holding dated market data snapshots")
    .option("--results-dir <dir>", "directory reports are written to")
    .option("--capital <amount>", "initial capital", parsePositiveNumber);

  program
    .command("simulate")
    .description("Run one strategy over one symbol and export its trades")
    .requiredOption("-s, --strategy <kind>", "strategy kind", parseStrategyKind)
    .requiredOption("--symbol <symbol>", "symbol to simulate")
    .option("-p, --param <name=value>", "strategy parameter (repeatable)", collect, [])
    .action(async (flags: SimulateFlags, command: Command) => {
      await runSimulateCommand(applyGlobalFlags(context, command.optsWithGlobals<GlobalFlags>()), {
        strategy: flags.strategy,
        symbol: flags.symbol,
        parameters: parseParameterAssignments(flags.param),
      });
    });

  program
    .command("optimize")
    .description("Grid-search one strategy's parameters on one symbol")
    .requiredOption("-s, --strategy <kind>", "strategy kind", parseStrategyKind)
    .requiredOption("--symbol <symbol>", "symbol to optimize on")
    .option("-p, --param <name=value>", "fixed parameter (repeatable)", collect, [])
    .option(
      "-r, --range <name=values>",
      "candidate values as v1,v2,... or start:end:step (repeatable); defaults to the strategy grid",
      collect,
      [],
    )
    .option("--top <n>", "ranked results to print", parsePositiveInteger, 5)
    .option("--concurrency <n>", "simulations in flight at once", parsePositiveInteger)
    .option("--timeout <ms>", "overall optimization budget", parsePositiveInteger)
    .action(async (flags: OptimizeFlags, command: Command) => {
      const base = applyGlobalFlags(context, command.optsWithGlobals<GlobalFlags>());
      await runOptimizeCommand(
        {
          ...base,
          config: {
            ...base.config,
            ...(flags.concurrency ? { optimizerConcurrency: flags.concurrency } : {}),
            ...(flags.timeout ? { optimizerTimeoutMs: flags.timeout } : {}),
          },
        },
        {
          strategy: flags.strategy,
          symbol: flags.symbol,
          parameters: parseParameterAssignments(flags.param),
          ranges: parseParameterRanges(flags.range),
          top: flags.top,
        },
      );
    });

  program
    .command("sweep")
    .description("Optimize every strategy over every symbol and write one summary per strategy")
    .option("--strategies <kinds>", "comma-separated strategy kinds", parseList)
    .option("--symbols <symbols>", "comma-separated symbols", parseList)
    .action(async (flags: SweepFlags, command: Command) => {
      await runSweepCommand(applyGlobalFlags(context, command.optsWithGlobals<GlobalFlags>()), {
        ...(flags.strategies ? { strategies: flags.strategies.map(parseStrategyKind) } : {}),
        ...(flags.symbols ? { symbols: flags.symbols } : {}),
      });
    });

  return program;
};
