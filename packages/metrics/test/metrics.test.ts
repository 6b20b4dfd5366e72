import { strict as assert } from "node:assert";
import test from "node:test";

import {
  calculateMaxDrawdown,
  calculateProfitFactor,
  calculateReturns,
  calculateSharpe,
  calculateTotalReturn,
  calculateWinRate,
  summarizePerformance,
  type EquityPoint,
  type RealizedTrade,
} from "../src/index.js";

const curve = (...values: number[]): EquityPoint[] =>
  values.map((equity, idx) => ({
    date: `2024-01-${String(idx + 1).padStart(2, "0")}`,
    equity,
  }));

const trades = (...pnls: number[]): RealizedTrade[] => pnls.map((profitLoss) => ({ profitLoss }));

const assertClose = (actual: number, expected: number, tolerance = 1e-9): void => {
  assert.ok(
    Math.abs(actual - expected) < tolerance,
    `expected ${actual} to be within ${tolerance} of ${expected}`,
  );
};

// ============================================================================
// calculateReturns tests
// ============================================================================

test("calculateReturns computes sequential percentage returns", () => {
  assert.deepEqual(calculateReturns(curve(100, 110, 121)), [0.1, 0.1]);
});

test("calculateReturns returns empty array for fewer than two points", () => {
  assert.deepEqual(calculateReturns([]), []);
  assert.deepEqual(calculateReturns(curve(100)), []);
});

test("calculateReturns skips steps from non-positive equity", () => {
  assert.deepEqual(calculateReturns(curve(0, 100, 50)), [-0.5]);
});

// ============================================================================
// calculateSharpe tests
// ============================================================================

test("calculateSharpe subtracts the daily risk-free rate and annualizes", () => {
  const points = curve(100, 102, 100.98, 104.0094);
  assertClose(calculateSharpe(points), 12.37886358824041, 1e-6);
  assertClose(calculateSharpe(points, 0), 12.452988519906523, 1e-6);
});

test("calculateSharpe returns zero for fewer than two points", () => {
  assert.equal(calculateSharpe([]), 0);
  assert.equal(calculateSharpe(curve(100)), 0);
});

test("calculateSharpe returns zero when returns do not vary", () => {
  assert.equal(calculateSharpe(curve(100, 100, 100)), 0);
  assert.equal(calculateSharpe(curve(100, 110, 121)), 0);
});

test("calculateSharpe is negative for a losing curve", () => {
  assert.ok(calculateSharpe(curve(100, 95, 93, 85)) < 0);
});

// ============================================================================
// calculateMaxDrawdown tests
// ============================================================================

test("calculateMaxDrawdown measures from the running peak", () => {
  assertClose(calculateMaxDrawdown(curve(100, 90, 95, 80)), 0.2);
});

test("calculateMaxDrawdown keeps the deepest of several declines", () => {
  assertClose(calculateMaxDrawdown(curve(100, 50, 75, 150, 120)), 0.5);
});

test("calculateMaxDrawdown returns zero for empty and rising curves", () => {
  assert.equal(calculateMaxDrawdown([]), 0);
  assert.equal(calculateMaxDrawdown(curve(100, 110, 121)), 0);
});

test("calculateMaxDrawdown reports a total loss as one", () => {
  assert.equal(calculateMaxDrawdown(curve(100, 0)), 1);
});

// ============================================================================
// calculateTotalReturn tests
// ============================================================================

test("calculateTotalReturn compares the final equity with the initial capital", () => {
  assert.equal(calculateTotalReturn(curve(100_000, 104_000, 110_000), 100_000), 0.1);
  assert.equal(calculateTotalReturn(curve(95_000, 90_000), 100_000), -0.1);
});

test("calculateTotalReturn is zero without equity points or capital", () => {
  assert.equal(calculateTotalReturn([], 100_000), 0);
  assert.equal(calculateTotalReturn(curve(100), 0), 0);
});

// ============================================================================
// calculateProfitFactor / calculateWinRate tests
// ============================================================================

test("calculateProfitFactor divides gross profit by gross loss", () => {
  assert.equal(calculateProfitFactor(trades(300, -100, 0, -50)), 2);
});

test("calculateProfitFactor is infinite without losing trades", () => {
  assert.equal(calculateProfitFactor(trades(0, 120, 0, 30)), Number.POSITIVE_INFINITY);
});

test("calculateProfitFactor is zero without trades", () => {
  assert.equal(calculateProfitFactor([]), 0);
});

test("calculateProfitFactor treats break-even trades as not losing", () => {
  assert.equal(calculateProfitFactor(trades(0, 0)), Number.POSITIVE_INFINITY);
});

test("calculateWinRate counts every trade in the denominator", () => {
  assert.equal(calculateWinRate(trades(300, -100, 0, -50)), 0.25);
  assert.equal(calculateWinRate([]), 0);
});

// ============================================================================
// summarizePerformance tests
// ============================================================================

test("summarizePerformance aggregates every figure", () => {
  const summary = summarizePerformance({
    equityCurve: curve(1_000, 900, 1_100),
    orders: trades(0, 100),
    initialCapital: 1_000,
  });
  assert.equal(summary.tradeCount, 2);
  assert.equal(summary.winRate, 0.5);
  assert.equal(summary.profitFactor, Number.POSITIVE_INFINITY);
  assertClose(summary.totalReturn, 0.1);
  assertClose(summary.maxDrawdown, 0.1);
  assert.ok(Number.isFinite(summary.sharpeRatio));
});

test("summarizePerformance of an empty run is all zeros", () => {
  assert.deepEqual(summarizePerformance({ equityCurve: [], orders: [], initialCapital: 1_000 }), {
    sharpeRatio: 0,
    totalReturn: 0,
    maxDrawdown: 0,
    tradeCount: 0,
    winRate: 0,
    profitFactor: 0,
  });
});
