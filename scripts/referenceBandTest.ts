import { test } from "node:test";
import assert from "node:assert/strict";
import { BandBook, computeBand, computeBands, formatBand } from "../src/strategy/referenceBand.js";
import type { Candle } from "../src/types.js";
import { at } from "./helpers/bandScenario.js";

function candle(hhmm: string, high: number, low: number): Candle {
  return { instrumentId: 1, windowStart: at(hhmm), intervalMinutes: 5, open: low, high, low, close: high };
}

const WINDOW = [candle("09:45", 22010, 21990), candle("09:50", 22050, 21995), candle("09:55", 22020, 21950)];

test("band is highest high, lowest low and their midpoint", () => {
  assert.deepEqual(computeBand(WINDOW), { resistance: 22050, support: 21950, mid: 22000 });
  assert.equal(formatBand({ resistance: 22050, support: 21950, mid: 22000 }), "R=22050.00 G=21950.00 B=22000.00");
});

test("an empty window has no band", () => {
  assert.equal(computeBand([]), null);
  assert.deepEqual(computeBands({ index: [], call: WINDOW }), {
    index: null,
    call: { resistance: 22050, support: 21950, mid: 22000 },
  });
});

test("a provisional band is replaced by the final one, never the reverse", () => {
  const book = new BandBook();
  const index = computeBand(WINDOW);
  const call = { resistance: 110, support: 90, mid: 100 };
  const put = { resistance: 115, support: 95, mid: 105 };

  const provisional = book.publish("PROVISIONAL", { index }, at("10:00"));
  assert.equal(provisional?.stage, "PROVISIONAL");
  assert.equal(book.isFinal(), false);

  const final = book.publish("FINAL", { index, call, put }, at("10:00") + 2000);
  assert.equal(final?.stage, "FINAL");
  assert.deepEqual(final?.call, call);
  assert.ok(Object.isFrozen(final));

  const again = book.publish("PROVISIONAL", { index: { resistance: 1, support: 0, mid: 0.5 } }, at("10:01"));
  assert.equal(again, final);
  assert.equal(book.current(), final);
});

test("a final band needs both option legs", () => {
  const book = new BandBook();
  const index = computeBand(WINDOW);
  assert.equal(book.publish("FINAL", { index, call: null, put: null }, at("10:00")), null);
  assert.equal(book.publish("FINAL", { index: null }, at("10:00")), null);
  assert.equal(book.current(), null);
});

test("clear forgets the band for the next session", () => {
  const book = new BandBook();
  book.publish("PROVISIONAL", { index: computeBand(WINDOW) }, at("10:00"));
  book.clear();
  assert.equal(book.current(), null);
});
