import { test } from "node:test";
import assert from "node:assert/strict";
import { EntryDetector, evaluateSignal } from "../src/strategy/entryDetector.js";
import type { Candle, ReferenceBand } from "../src/types.js";
import { OFFSET, TIMES, at } from "./helpers/bandScenario.js";

const BAND: ReferenceBand = { resistance: 22050, support: 21950, mid: 22000 };

function idx(hhmm: string, close: number, instrumentId = 256265): Candle {
  return { instrumentId, windowStart: at(hhmm), intervalMinutes: 5, open: close, high: close, low: close, close };
}

function detector(): EntryDetector {
  return new EntryDetector(TIMES.tradingStart, OFFSET);
}

test("candles before trading start are ignored", () => {
  const d = detector();
  assert.equal(d.onCandle(idx("09:55", 22100), BAND), null);
  assert.equal(d.getState().phase, "WAITING");
  assert.equal(d.getState().previousCandle, null);
});

test("the first candle only arms; two closes above R with a rising close give CALL", () => {
  const d = detector();
  assert.equal(d.onCandle(idx("10:00", 22060), BAND), null);
  assert.equal(d.getState().phase, "ARMED");

  const signal = d.onCandle(idx("10:05", 22070), BAND);
  assert.equal(signal?.side, "CALL");
  assert.equal(signal?.previous.close, 22060);
  assert.equal(signal?.candle.close, 22070);
  assert.equal(d.getState().phase, "POSITIONED");
});

test("no CALL when the second close does not rise", () => {
  const d = detector();
  d.onCandle(idx("10:00", 22070), BAND);
  assert.equal(d.onCandle(idx("10:05", 22060), BAND), null);
  assert.equal(d.getState().phase, "ARMED");
});

test("two falling closes below G give PUT", () => {
  const d = detector();
  d.onCandle(idx("10:00", 21940), BAND);
  assert.equal(d.onCandle(idx("10:05", 21930), BAND)?.side, "PUT");
});

test("after a close the side re-arms only once two closes are back inside the band", () => {
  const d = detector();
  d.onCandle(idx("10:00", 22060), BAND);
  d.onCandle(idx("10:05", 22070), BAND);
  assert.equal(d.onCandle(idx("10:10", 22080), BAND), null);

  d.notifyClosed();
  assert.equal(d.getState().phase, "REARM_PENDING");
  assert.equal(d.getState().pendingRearmSide, "CALL");

  assert.equal(d.onCandle(idx("10:15", 22090), BAND), null);
  assert.equal(d.onCandle(idx("10:20", 22040), BAND), null);
  assert.equal(d.getState().phase, "REARM_PENDING");

  assert.equal(d.onCandle(idx("10:25", 22030), BAND), null);
  assert.equal(d.getState().phase, "ARMED");
  assert.equal(d.getState().pendingRearmSide, null);

  assert.equal(d.onCandle(idx("10:30", 22060), BAND), null);
  assert.equal(d.onCandle(idx("10:35", 22065), BAND)?.side, "CALL");
});

test("a PUT waits for two closes at or above G before re-arming", () => {
  const d = detector();
  d.onCandle(idx("10:00", 21940), BAND);
  d.onCandle(idx("10:05", 21930), BAND);
  d.notifyClosed();

  d.onCandle(idx("10:10", 21950), BAND);
  assert.equal(d.getState().phase, "REARM_PENDING");
  d.onCandle(idx("10:15", 21960), BAND);
  assert.equal(d.getState().phase, "ARMED");
});

test("abandon returns a signal that could not be acted on to ARMED", () => {
  const d = detector();
  d.onCandle(idx("10:00", 22060), BAND);
  d.onCandle(idx("10:05", 22070), BAND);
  d.abandon();
  assert.equal(d.getState().phase, "ARMED");
  assert.equal(d.getState().positionSide, null);
  assert.equal(d.onCandle(idx("10:10", 22080), BAND)?.side, "CALL");
});

test("out-of-order candles and other instruments are rejected", () => {
  const d = detector();
  d.onCandle(idx("10:05", 22060), BAND);
  assert.equal(d.onCandle(idx("10:00", 22070), BAND), null);
  assert.equal(d.onCandle(idx("10:10", 22070, 99), BAND), null);
  assert.equal(d.getState().previousCandle?.windowStart, at("10:05"));
});

test("without a band the candle is tracked but not evaluated", () => {
  const d = detector();
  d.onCandle(idx("10:00", 22060), BAND);
  assert.equal(d.onCandle(idx("10:05", 22070), null), null);
  assert.equal(d.getState().previousCandle?.close, 22070);
  assert.equal(d.onCandle(idx("10:10", 22080), BAND)?.side, "CALL");
});

test("observe tracks P without evaluating", () => {
  const d = detector();
  d.observe(idx("10:00", 22060));
  d.observe(idx("10:05", 22070));
  assert.equal(d.getState().phase, "ARMED");
  assert.equal(d.getState().previousCandle?.close, 22070);
});

test("evaluateSignal needs both closes beyond the band", () => {
  assert.equal(evaluateSignal(idx("10:00", 22050), idx("10:05", 22070), BAND), null);
  assert.equal(evaluateSignal(idx("10:00", 22051), idx("10:05", 22052), BAND), "CALL");
  assert.equal(evaluateSignal(idx("10:00", 21949), idx("10:05", 21948), BAND), "PUT");
  assert.equal(evaluateSignal(idx("10:00", 21949), idx("10:05", 21949), BAND), null);
});
