import { strict as assert } from "node:assert";
import test from "node:test";

import { resolveConfig } from "../src/config.js";

test("resolveConfig falls back to defaults", () => {
  assert.deepEqual(resolveConfig({}), {
    dataDir: "data",
    resultsDir: "results",
    initialCapital: 100_000,
    optimizerTimeoutMs: 600_000,
    logLevel: "info",
  });
});

test("resolveConfig reads every variable", () => {
  const config = resolveConfig({
    STRATEGY_LAB_DATA_DIR: "/srv/market",
    STRATEGY_LAB_RESULTS_DIR: "/srv/results",
    STRATEGY_LAB_INITIAL_CAPITAL: "2500.5",
    STRATEGY_LAB_OPTIMIZER_TIMEOUT_MS: "1000",
    STRATEGY_LAB_OPTIMIZER_CONCURRENCY: "3",
    LOG_LEVEL: "DEBUG",
  });

  assert.deepEqual(config, {
    dataDir: "/srv/market",
    resultsDir: "/srv/results",
    initialCapital: 2500.5,
    optimizerTimeoutMs: 1000,
    optimizerConcurrency: 3,
    logLevel: "debug",
  });
});

test("blank variables count as unset", () => {
  const config = resolveConfig({
    STRATEGY_LAB_INITIAL_CAPITAL: " ",
    STRATEGY_LAB_OPTIMIZER_CONCURRENCY: "",
    LOG_LEVEL: "",
  });
  assert.equal(config.initialCapital, 100_000);
  assert.equal(config.optimizerConcurrency, undefined);
  assert.equal(config.logLevel, "info");
});

test("resolveConfig lists every invalid variable", () => {
  assert.throws(
    () =>
      resolveConfig({
        STRATEGY_LAB_INITIAL_CAPITAL: "-5",
        STRATEGY_LAB_OPTIMIZER_CONCURRENCY: "1.5",
        LOG_LEVEL: "loud",
      }),
    (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.match(error.message, /^Invalid environment: /u);
      assert.match(error.message, /STRATEGY_LAB_INITIAL_CAPITAL: Number must be greater than 0/u);
      assert.match(error.message, /STRATEGY_LAB_OPTIMIZER_CONCURRENCY: Expected integer, received float/u);
      assert.match(error.message, /LOG_LEVEL: Invalid enum value/u);
      return true;
    },
  );
});
