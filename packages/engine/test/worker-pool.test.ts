import { strict as assert } from "node:assert";
import test from "node:test";

import { summarizePerformance } from "@strategy-lab/metrics";
import { createStrategy, type MarketBar } from "@strategy-lab/sdk";

import { SimulationWorkerPool, TaskAbortedError, simulate } from "../src/index.js";

const bars: MarketBar[] = Array.from({ length: 80 }, (_, idx) => {
  const close = 50 + 6 * Math.sin(idx / 4) + idx * 0.1;
  return {
    date: new Date(Date.UTC(2023, 5, idx + 1)).toISOString().slice(0, 10),
    symbol: "POOL",
    open: close,
    high: close + 0.5,
    low: close - 0.5,
    close,
    volume: 5_000,
  };
});

const DATA = { bars, initialCapital: 25_000, minimumNotional: 10, riskFreeRate: 0.02 };

const standalone = (windowSize: number) =>
  summarizePerformance(
    simulate(createStrategy("sma", { windowSize }), bars, { initialCapital: 25_000 }),
    0.02,
  );

test("tasks submitted together run on separate worker threads", async () => {
  const pool = new SimulationWorkerPool(DATA, 3);
  try {
    const windows = [3, 5, 8];
    const summaries = await Promise.all(
      windows.map((windowSize) => pool.run({ kind: "sma", parameters: { windowSize } })),
    );

    assert.equal(pool.workerCount, 3);
    assert.deepEqual(summaries, windows.map(standalone));
  } finally {
    await pool.terminate();
  }
  assert.equal(pool.workerCount, 0);
});

test("idle workers are reused", async () => {
  const pool = new SimulationWorkerPool(DATA, 2);
  try {
    for (const windowSize of [4, 6, 9]) {
      assert.deepEqual(await pool.run({ kind: "sma", parameters: { windowSize } }), standalone(windowSize));
    }
    assert.equal(pool.workerCount, 1);
  } finally {
    await pool.terminate();
  }
});

test("a simulation error rejects the task and keeps the worker", async () => {
  const pool = new SimulationWorkerPool(DATA, 1);
  try {
    await assert.rejects(
      () => pool.run({ kind: "sma", parameters: { windowSize: 0 } }),
      /^Error: Invalid parameters for sma: windowSize: /u,
    );
    assert.equal(pool.workerCount, 1);
    assert.deepEqual(await pool.run({ kind: "sma", parameters: { windowSize: 5 } }), standalone(5));
  } finally {
    await pool.terminate();
  }
});

test("aborting a running task terminates its worker", async () => {
  const pool = new SimulationWorkerPool(DATA, 1);
  const controller = new AbortController();
  const running = pool.run({ kind: "sma", parameters: { windowSize: 5 } }, controller.signal);
  controller.abort();

  await assert.rejects(running, TaskAbortedError);
  assert.equal(pool.workerCount, 0);
  await pool.terminate();
});

test("an already aborted signal starts no worker", async () => {
  const pool = new SimulationWorkerPool(DATA, 1);
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(
    () => pool.run({ kind: "sma", parameters: { windowSize: 5 } }, controller.signal),
    TaskAbortedError,
  );
  assert.equal(pool.workerCount, 0);
});

test("the pool refuses more tasks in flight than its size", async () => {
  const pool = new SimulationWorkerPool(DATA, 1);
  try {
    const first = pool.run({ kind: "sma", parameters: { windowSize: 5 } });
    await assert.rejects(
      () => pool.run({ kind: "sma", parameters: { windowSize: 6 } }),
      { message: "Simulation worker pool is limited to 1 tasks in flight" },
    );
    assert.deepEqual(await first, standalone(5));
  } finally {
    await pool.terminate();
  }
});
