import { config as loadEnv } from "dotenv";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { DEFAULT_OPTIMIZER_TIMEOUT_MS, DEFAULT_INITIAL_CAPITAL } from "@strategy-lab/engine";
import type { LogLevel } from "@strategy-lab/logger";
import { assertValid } from "@strategy-lab/sdk";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");

/** Loads the repository `.env`, then one in the working directory. Existing variables win. */
export const loadEnvFiles = (): void => {
  loadEnv({ path: join(REPO_ROOT, ".env") });
  loadEnv();
};

const blankAsUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const EnvSchema = z.object({
  STRATEGY_LAB_DATA_DIR: z.preprocess(blankAsUndefined, z.string().default("data")),
  STRATEGY_LAB_RESULTS_DIR: z.preprocess(blankAsUndefined, z.string().default("results")),
  STRATEGY_LAB_INITIAL_CAPITAL: z.preprocess(
    blankAsUndefined,
    z.coerce.number().finite().positive().default(DEFAULT_INITIAL_CAPITAL),
  ),
  STRATEGY_LAB_OPTIMIZER_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(DEFAULT_OPTIMIZER_TIMEOUT_MS),
  ),
  STRATEGY_LAB_OPTIMIZER_CONCURRENCY: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().optional(),
  ),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? blankAsUndefined(value.toLowerCase()) : value),
    LogLevelSchema.default("info"),
  ),
});

export interface CliConfig {
  readonly dataDir: string;
  readonly resultsDir: string;
  readonly initialCapital: number;
  readonly optimizerTimeoutMs: number;
  /** Unset means the optimizer picks the available parallelism. */
  readonly optimizerConcurrency?: number;
  readonly logLevel: LogLevel;
}

/**
 * Reads CLI settings from `env`.
 *
 * @throws Error listing every invalid variable.
 */
export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): CliConfig => {
  const parsed = assertValid(EnvSchema, env, "environment");
  return {
    dataDir: parsed.STRATEGY_LAB_DATA_DIR,
    resultsDir: parsed.STRATEGY_LAB_RESULTS_DIR,
    initialCapital: parsed.STRATEGY_LAB_INITIAL_CAPITAL,
    optimizerTimeoutMs: parsed.STRATEGY_LAB_OPTIMIZER_TIMEOUT_MS,
    ...(parsed.STRATEGY_LAB_OPTIMIZER_CONCURRENCY === undefined
      ? {}
      : { optimizerConcurrency: parsed.STRATEGY_LAB_OPTIMIZER_CONCURRENCY }),
    logLevel: parsed.LOG_LEVEL,
  };
};
