import { test } from "node:test";
import assert from "node:assert/strict";
import { StopLossManager } from "../src/strategy/stopLoss.js";

/**
 * Stop rules against exact numbers. Every case uses entry 100 on a leg band
 * of low 90 / mid 95 / high 110:
 *   MID       at price >= 105 (entry + (mid - low))
 *   HIGH      at price >= 120 (entry + (high - low))
 *   BREAKEVEN at price >= 110 (entry + (entry - low))
 */

function manager(increment = 5): StopLossManager {
  return new StopLossManager(100, 90, 95, 110, increment);
}

test("initial stop is the leg band low", () => {
  const sl = manager();
  assert.equal(sl.stop, 90);
  assert.equal(sl.getState().breakevenReached, false);
  assert.equal(sl.advanceProgressive(104.99), null);
});

test("only the first matching rule applies per update", () => {
  const sl = manager();
  // 125 satisfies all three rules, MID is checked first.
  assert.deepEqual(sl.advanceProgressive(125), { stage: "MID", from: 90, to: 95 });
  assert.equal(sl.stop, 95);
});

test("MID then HIGH, and breakeven is not reached once the stop is above entry", () => {
  const sl = manager();
  assert.deepEqual(sl.advanceProgressive(105), { stage: "MID", from: 90, to: 95 });
  assert.deepEqual(sl.advanceProgressive(120), { stage: "HIGH", from: 95, to: 110 });
  assert.equal(sl.getState().breakevenReached, false);
  assert.equal(sl.advanceProgressive(130), null);
  assert.equal(sl.advanceTrailing(130), null);
  assert.equal(sl.getState().maxStop, 110);
});

test("MID then BREAKEVEN, then the stop trails in whole increments", () => {
  const sl = manager();
  sl.advanceProgressive(105);
  assert.deepEqual(sl.advanceProgressive(110), { stage: "BREAKEVEN", from: 95, to: 100 });
  assert.equal(sl.getState().breakevenReached, true);
  assert.equal(sl.advanceProgressive(200), null);

  assert.deepEqual(sl.advanceTrailing(112), { stage: "TRAIL", from: 100, to: 110 });
  assert.equal(sl.advanceTrailing(113), null);
  assert.deepEqual(sl.advanceTrailing(121), { stage: "TRAIL", from: 110, to: 120 });
  // never lowered
  assert.equal(sl.advanceTrailing(105), null);
  assert.equal(sl.stop, 120);
  assert.equal(sl.getState().maxStop, 120);
  assert.equal(sl.getState().lastTrailingLevel, 120);
});

test("trailing does nothing before breakeven", () => {
  const sl = manager();
  assert.equal(sl.advanceTrailing(150), null);
  assert.equal(sl.stop, 90);
});

test("the stop is hit when the candle low touches it", () => {
  const sl = manager();
  assert.equal(sl.checkHit(90.01), false);
  assert.equal(sl.checkHit(90), true);
  assert.equal(sl.checkHit(80), true);
});

test("the trailing increment must be positive", () => {
  assert.throws(() => manager(0), /Trailing increment must be > 0 \(got 0\)/);
});
