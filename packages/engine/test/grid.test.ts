import { strict as assert } from "node:assert";
import test from "node:test";

import { countCombinations, generateParameterGrid } from "../src/grid.js";

test("generateParameterGrid varies the first registered name slowest", () => {
  const grid = generateParameterGrid(
    new Map([
      ["fastPeriod", [5, 10]],
      ["slowPeriod", [20, 30, 40]],
    ]),
  );
  assert.deepEqual(grid, [
    { fastPeriod: 5, slowPeriod: 20 },
    { fastPeriod: 5, slowPeriod: 30 },
    { fastPeriod: 5, slowPeriod: 40 },
    { fastPeriod: 10, slowPeriod: 20 },
    { fastPeriod: 10, slowPeriod: 30 },
    { fastPeriod: 10, slowPeriod: 40 },
  ]);
});

test("generateParameterGrid returns nothing without ranges", () => {
  assert.deepEqual(generateParameterGrid(new Map()), []);
  assert.deepEqual(generateParameterGrid(new Map([["period", []]])), []);
});

test("names with no candidate values are left out", () => {
  const grid = generateParameterGrid(
    new Map<string, ReadonlyArray<number>>([
      ["period", [5, 10]],
      ["threshold", []],
    ]),
  );
  assert.deepEqual(grid, [{ period: 5 }, { period: 10 }]);
});

test("generateParameterGrid keeps mixed value types", () => {
  const grid = generateParameterGrid(
    new Map<string, ReadonlyArray<number | string | boolean>>([
      ["mode", ["fast", "slow"]],
      ["enabled", [true]],
    ]),
  );
  assert.deepEqual(grid, [
    { mode: "fast", enabled: true },
    { mode: "slow", enabled: true },
  ]);
});

test("combinations are frozen", () => {
  const [first] = generateParameterGrid(new Map([["period", [5]]]));
  assert.ok(Object.isFrozen(first));
});

test("countCombinations matches the generated grid size", () => {
  const ranges = new Map([
    ["period", [5, 10, 15]],
    ["stdDevMultiplier", [1, 1.5, 2, 2.5]],
    ["unused", []],
  ]);
  assert.equal(countCombinations(ranges), 12);
  assert.equal(generateParameterGrid(ranges).length, 12);
  assert.equal(countCombinations(new Map()), 0);
});
