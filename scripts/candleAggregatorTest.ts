import { test } from "node:test";
import assert from "node:assert/strict";
import { CandleAggregator } from "../src/datafeed/candleAggregator.js";
import type { Candle } from "../src/types.js";
import { at } from "./helpers/bandScenario.js";

const INDEX = 256265;
const SEC = 1000;

function feedOpeningTicks(agg: CandleAggregator): void {
  const t0 = at("09:15");
  agg.ingestTick(INDEX, 100, t0);
  agg.ingestTick(INDEX, 102, t0 + 20 * SEC);
  agg.ingestTick(INDEX, 99, t0 + 40 * SEC);
  agg.ingestTick(INDEX, 101, at("09:16"));
  agg.ingestTick(INDEX, 103, at("09:19") + 59 * SEC);
  agg.ingestTick(INDEX, 104, at("09:20"));
}

test("ticks roll up into 1m and 5m candles, finalized by the first tick of the next bucket", () => {
  const agg = new CandleAggregator();
  const fiveMinute: Candle[] = [];
  agg.onComplete(5, (c) => fiveMinute.push(c));

  feedOpeningTicks(agg);

  assert.deepEqual(fiveMinute, [
    { instrumentId: INDEX, windowStart: at("09:15"), intervalMinutes: 5, open: 100, high: 103, low: 99, close: 103 },
  ]);
  assert.ok(Object.isFrozen(fiveMinute[0]));

  const oneMinute = agg.getCompleted(INDEX, 1);
  assert.deepEqual(
    oneMinute.map((c) => [c.windowStart, c.open, c.high, c.low, c.close]),
    [
      [at("09:15"), 100, 102, 99, 99],
      [at("09:16"), 101, 101, 101, 101],
      [at("09:19"), 103, 103, 103, 103],
    ]
  );

  const current = agg.getCurrent(INDEX, 5);
  assert.equal(current?.windowStart, at("09:20"));
  assert.equal(current?.open, 104);
  assert.equal(agg.lastPrice(INDEX), 104);
});

test("a tick for an already finalized window is dropped and counted", () => {
  const agg = new CandleAggregator();
  feedOpeningTicks(agg);

  agg.ingestTick(INDEX, 50, at("09:18"));

  assert.equal(agg.getLateDropped(), 2);
  assert.equal(agg.getCompleted(INDEX, 5)[0]?.low, 99);
  assert.equal(agg.lastPrice(INDEX), 104);
});

test("instruments aggregate independently", () => {
  const agg = new CandleAggregator();
  agg.ingestTick(1, 10, at("09:15"));
  agg.ingestTick(2, 20, at("09:15"));
  agg.ingestTick(1, 11, at("09:16"));

  assert.equal(agg.getCompleted(1, 1).length, 1);
  assert.equal(agg.getCompleted(2, 1).length, 0);
  assert.equal(agg.getCurrent(2, 1)?.close, 20);
});

test("malformed ticks never open a candle", () => {
  const agg = new CandleAggregator();
  agg.ingestTick(INDEX, Number.NaN, at("09:15"));
  assert.equal(agg.getCurrent(INDEX, 1), null);
  assert.equal(agg.lastPrice(INDEX), undefined);
});

test("getWindow returns completed candles with start <= windowStart < end", () => {
  const agg = new CandleAggregator();
  for (const [hhmm, price] of [
    ["09:15", 1],
    ["09:20", 2],
    ["09:25", 3],
    ["09:30", 4],
  ] as const) {
    agg.ingestTick(INDEX, price, at(hhmm));
  }

  const window = agg.getWindow(INDEX, at("09:20"), at("09:30"), 5);
  assert.deepEqual(
    window.map((c) => c.close),
    [2, 3]
  );
});

test("flush finalizes open candles, optionally without listeners", () => {
  const agg = new CandleAggregator();
  let notified = 0;
  agg.onComplete(1, () => notified++);
  agg.ingestTick(INDEX, 100, at("09:15"));
  agg.ingestTick(7, 5, at("09:15"));

  agg.flush(INDEX, false);

  assert.equal(notified, 0);
  assert.equal(agg.getCompleted(INDEX, 1).length, 1);
  assert.equal(agg.getCompleted(INDEX, 5).length, 1);
  assert.equal(agg.getCurrent(7, 1)?.close, 5);
});

test("a throwing listener does not stop the others", () => {
  const agg = new CandleAggregator();
  const seen: number[] = [];
  agg.onComplete(1, () => {
    throw new Error("boom");
  });
  agg.onComplete(1, (c) => seen.push(c.close));

  agg.ingestTick(INDEX, 100, at("09:15"));
  agg.ingestTick(INDEX, 101, at("09:16"));

  assert.deepEqual(seen, [100]);
});

test("intervals must be multiples of the base interval", () => {
  assert.throws(() => new CandleAggregator({ intervals: [2, 5] }), /Interval 5m must be a positive multiple of base 2m/);
  assert.throws(() => new CandleAggregator().onComplete(15, () => undefined), /Interval 15m is not aggregated/);
});
