import { test } from "node:test";
import assert from "node:assert/strict";
import { OscillatorTracker, computeRsi, shouldExitOnDrop, trackPeak } from "../src/utils/indicators.js";

const flat = (n: number, value = 100): number[] => Array.from({ length: n }, () => value);

test("RSI needs period + 1 closes", () => {
  assert.equal(computeRsi(flat(14), 14), undefined);
  assert.equal(computeRsi([...flat(13), 101], 14), undefined);
});

test("a window without movement has no RSI", () => {
  assert.equal(computeRsi(flat(15), 14), undefined);
});

test("only gains gives 100", () => {
  assert.equal(computeRsi([...flat(12), 106, 112, 125], 14), 100);
});

test("RSI is the simple mean of gains and losses over the last period changes", () => {
  // last 14 changes: twelve flat, +3, -2 -> RS 1.5
  const rsi = computeRsi([...flat(19), 103, 101], 14);
  assert.ok(rsi !== undefined && Math.abs(rsi - 60) < 1e-9, `expected 60, got ${rsi}`);

  // only losses
  assert.equal(computeRsi([...flat(14), 90], 14), 0);
});

test("peak tracking and the drop rule", () => {
  assert.equal(trackPeak(55, undefined), 55);
  assert.equal(trackPeak(50, 55), 55);
  assert.equal(trackPeak(60, 55), 60);

  assert.equal(shouldExitOnDrop(90, 100, 10), true);
  assert.equal(shouldExitOnDrop(90.5, 100, 10), false);
  assert.equal(shouldExitOnDrop(10, undefined, 10), false);
});

test("the tracker exits when RSI falls far enough from its peak", () => {
  const tracker = new OscillatorTracker(14, 10);

  assert.deepEqual(tracker.update(flat(10)), { value: undefined, peak: undefined, exit: false });

  const up = tracker.update([...flat(19), 103]);
  assert.deepEqual(up, { value: 100, peak: 100, exit: false });

  const down = tracker.update([...flat(19), 103, 101]);
  assert.equal(down.exit, true);
  assert.equal(down.peak, 100);
  assert.equal(tracker.getPeak(), 100);
});

test("a missing reading leaves the peak alone", () => {
  const tracker = new OscillatorTracker(14, 10);
  tracker.update([...flat(19), 103]);
  assert.deepEqual(tracker.update(flat(20)), { value: undefined, peak: 100, exit: false });
});
