#!/usr/bin/env tsx
import { createLogger } from "@strategy-lab/logger";

import { loadEnvFiles, resolveConfig } from "./config.js";
import { createProgram } from "./program.js";

loadEnvFiles();

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const logger = createLogger("services/cli", { level: config.logLevel });
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("interrupt received, cancelling pending work");
    controller.abort();
  });

  const program = createProgram({
    config,
    logger,
    write: (text) => {
      process.stdout.write(text);
    },
    signal: controller.signal,
  });
  await program.parseAsync(process.argv);
};

void main().catch((error: unknown) => {
  createLogger("services/cli").error("command failed", { error: describeError(error) });
  process.exitCode = 1;
});
