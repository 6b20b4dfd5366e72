import { strict as assert } from "node:assert";
import test from "node:test";

import { Position } from "../src/index.js";

test("new position records a single lot at the entry price", () => {
  const position = new Position("AAPL", 10, 100, "2024-01-02");
  assert.equal(position.quantity, 10);
  assert.equal(position.averageEntryPrice, 100);
  assert.equal(position.entryDate, "2024-01-02");
  assert.deepEqual(position.getLots(), [{ quantity: 10, price: 100, date: "2024-01-02" }]);
});

test("adding in the same direction recomputes the weighted average entry", () => {
  const position = new Position("AAPL", 10, 100, "2024-01-02");
  const realized = position.apply(30, 120, "2024-01-03");
  assert.equal(realized, 0);
  assert.equal(position.quantity, 40);
  assert.equal(position.averageEntryPrice, 115);
  assert.equal(position.entryDate, "2024-01-02");
});

test("partial close realizes against the oldest lot first", () => {
  const position = new Position("AAPL", 10, 100, "2024-01-02");
  position.apply(10, 110, "2024-01-03");
  const realized = position.apply(-15, 120, "2024-01-04");
  // 10 @ 100 -> +200, 5 @ 110 -> +50
  assert.equal(realized, 250);
  assert.equal(position.quantity, 5);
  assert.equal(position.averageEntryPrice, 110);
  assert.deepEqual(position.getLots(), [{ quantity: 5, price: 110, date: "2024-01-03" }]);
  assert.equal(position.realizedPnl, 250);
});

test("closing the whole quantity leaves no lots", () => {
  const position = new Position("AAPL", 2.5, 80, "2024-01-02");
  const realized = position.apply(-2.5, 60, "2024-01-05");
  assert.equal(realized, -50);
  assert.equal(position.quantity, 0);
  assert.ok(position.isFlat());
  assert.deepEqual(position.getLots(), []);
  assert.equal(position.averageEntryPrice, 0);
});

test("reversing closes the long and opens a short with the remainder", () => {
  const position = new Position("AAPL", 5, 100, "2024-01-02");
  const realized = position.apply(-8, 90, "2024-01-03");
  assert.equal(realized, -50);
  assert.equal(position.quantity, -3);
  assert.equal(position.averageEntryPrice, 90);
  assert.equal(position.entryDate, "2024-01-03");
});

test("short positions realize profit when covered lower", () => {
  const position = new Position("AAPL", -4, 50, "2024-01-02");
  const realized = position.apply(4, 45, "2024-01-03");
  assert.equal(realized, 20);
  assert.ok(position.isFlat());
});

test("unrealized P&L follows the mark for longs and shorts", () => {
  const long = new Position("AAPL", 10, 100, "2024-01-02");
  long.markToMarket(105);
  assert.equal(long.unrealizedPnl, 50);
  assert.equal(long.marketValue, 1_050);

  const short = new Position("MSFT", -10, 100, "2024-01-02");
  short.markToMarket(105);
  assert.equal(short.unrealizedPnl, -50);
});

test("fills update the mark price", () => {
  const position = new Position("AAPL", 1, 100, "2024-01-02");
  position.apply(1, 104, "2024-01-03");
  assert.equal(position.currentPrice, 104);
});
