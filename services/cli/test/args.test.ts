import { strict as assert } from "node:assert";
import test from "node:test";

import { InvalidArgumentError } from "commander";

import {
  collect,
  parseList,
  parseParameterAssignments,
  parseParameterRanges,
  parseParameterValue,
  parsePositiveInteger,
  parsePositiveNumber,
  parseStrategyKind,
} from "../src/args.js";

test("parseParameterValue recognises numbers and booleans", () => {
  assert.equal(parseParameterValue("20"), 20);
  assert.equal(parseParameterValue("1.5"), 1.5);
  assert.equal(parseParameterValue("-2"), -2);
  assert.equal(parseParameterValue("1e3"), 1000);
  assert.equal(parseParameterValue(" 7 "), 7);
  assert.equal(parseParameterValue("true"), true);
  assert.equal(parseParameterValue("false"), false);
  assert.equal(parseParameterValue("12px"), "12px");
  assert.equal(parseParameterValue("fast"), "fast");
});

test("parseParameterAssignments keeps the last value per name", () => {
  assert.deepEqual(
    parseParameterAssignments(["period=20", "threshold=1.5", "period=25", "flag=true"]),
    { period: 25, threshold: 1.5, flag: true },
  );
  assert.deepEqual(parseParameterAssignments([]), {});
});

test("parseParameterAssignments rejects entries without a name or value", () => {
  for (const entry of ["period", "=5", "period="]) {
    assert.throws(
      () => parseParameterAssignments([entry]),
      (error: unknown) => {
        assert.ok(error instanceof InvalidArgumentError);
        assert.equal(error.message, `Expected name=value, received "${entry}".`);
        return true;
      },
    );
  }
});

test("parseParameterRanges accepts lists and start:end:step ranges", () => {
  const ranges = parseParameterRanges([
    "windowSize=5,10, 15",
    "threshold=0.5:1.5:0.25",
    "mode=fast,slow",
  ]);
  assert.deepEqual(
    [...ranges],
    [
      ["windowSize", [5, 10, 15]],
      ["threshold", [0.5, 0.75, 1, 1.25, 1.5]],
      ["mode", ["fast", "slow"]],
    ],
  );
});

test("parseParameterRanges rejects a range without values", () => {
  assert.throws(() => parseParameterRanges(["period=,,"]), {
    message: 'Range for "period" has no values.',
  });
  assert.throws(() => parseParameterRanges(["period=10:5:1"]), {
    message: 'Range for "period" has no values.',
  });
});

test("parseStrategyKind accepts known kinds only", () => {
  assert.equal(parseStrategyKind("rsi"), "rsi");
  assert.throws(() => parseStrategyKind("macd"), {
    message: "Unknown strategy. Expected one of: ma_crossover, mean_reversion, rsi, bollinger_bands, sma.",
  });
});

test("numeric option parsers", () => {
  assert.equal(parsePositiveNumber("2.5"), 2.5);
  assert.equal(parsePositiveInteger("4"), 4);
  assert.throws(() => parsePositiveNumber("abc"), { message: "Expected a positive number." });
  assert.throws(() => parsePositiveNumber("0"), { message: "Expected a positive number." });
  assert.throws(() => parsePositiveInteger("2.5"), { message: "Expected a positive integer." });
});

test("list helpers", () => {
  assert.deepEqual(parseList(" AAPL, MSFT,,"), ["AAPL", "MSFT"]);
  assert.deepEqual(collect("b", ["a"]), ["a", "b"]);
});
