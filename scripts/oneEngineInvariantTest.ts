import { test } from "node:test";
import assert from "node:assert/strict";
import { Backtester } from "../src/backtest/backtester.js";
import { OFFSET, STRATEGY, TIMES, TWO_TRADE_DAY, at, buildDayRows, comparable } from "./helpers/bandScenario.js";
import { REPLAY_IDS, startReplay } from "./helpers/replayHarness.js";
import type { HistoricalBar, HistoricalDataProvider, InstrumentId } from "../src/types.js";

/**
 * One strategy core: the live control loop fed tick by tick and the backtest
 * fed stored candles must take the same trades on the same day.
 */
test("live replay and backtest take identical trades", async () => {
  const rows = buildDayRows(TWO_TRADE_DAY);

  const backtest = new Backtester({ strategy: STRATEGY, times: TIMES, offsetMinutes: OFFSET }).run(rows);
  const live = await startReplay(rows);
  await live.runUntil("15:31");

  const liveTrades = live.orch.getTrades();
  assert.equal(liveTrades.length, 2);
  assert.deepEqual(liveTrades.map(comparable), backtest.trades.map(comparable));
  assert.deepEqual(
    liveTrades.map((t) => [t.metadata.maxStop, t.metadata.maxPrice]),
    backtest.trades.map((t) => [t.metadata.maxStop, t.metadata.maxPrice])
  );
  assert.equal(live.orch.getSession().getDailyPnl(), 1575);
});

test("live replay selects strikes off the spot at selection time and publishes a final band", async () => {
  const live = await startReplay(buildDayRows(TWO_TRADE_DAY));
  await live.runUntil("10:00");

  const status = live.orch.getStatus();
  assert.equal(status.legs?.call.symbol, "NIFTY21800CE");
  assert.equal(status.legs?.put.symbol, "NIFTY22200PE");
  assert.equal(status.band?.stage, "FINAL");
  assert.deepEqual(status.band?.index, { resistance: 22050, support: 21950, mid: 22000 });
  assert.deepEqual(status.band?.call, { resistance: 120, support: 90, mid: 105 });
  assert.deepEqual(status.band?.put, { resistance: 115, support: 95, mid: 105 });
});

test("live replay reports entries, exits and the day summary in order", async () => {
  const live = await startReplay(buildDayRows(TWO_TRADE_DAY));
  await live.runUntil("15:31");

  assert.deepEqual(
    live.events.map((e) => e.type),
    ["ENTRY", "EXIT", "ENTRY", "EXIT", "SUMMARY"]
  );
  const [entry] = live.events;
  assert.ok(entry && entry.type === "ENTRY");
  assert.equal(entry.position.tradeId, "20240115_101500_CALL_100");
  assert.equal(entry.position.entryTime, at("10:15"));
  assert.equal(entry.stopLoss, 90);
  assert.equal(entry.qty, 75);

  const summary = live.events[4];
  assert.ok(summary && summary.type === "SUMMARY");
  assert.equal(summary.dailyPnl, 1575);
  assert.equal(summary.trades.length, 2);
});

/**
 * The first history request for each option leg comes back empty.
 */
class EmptyFirstLegFetch implements HistoricalDataProvider {
  private readonly answered: Set<InstrumentId> = new Set();

  constructor(private readonly inner: HistoricalDataProvider) {}

  async fetch(instrumentId: InstrumentId, from: number, to: number, interval: "minute"): Promise<HistoricalBar[]> {
    const isLeg = instrumentId === REPLAY_IDS.CALL || instrumentId === REPLAY_IDS.PUT;
    if (isLeg && !this.answered.has(instrumentId)) {
      this.answered.add(instrumentId);
      return [];
    }
    return this.inner.fetch(instrumentId, from, to, interval);
  }
}

test("an empty leg backfill is retried and the day still trades like the backtest", async () => {
  const rows = buildDayRows(TWO_TRADE_DAY);
  const backtest = new Backtester({ strategy: STRATEGY, times: TIMES, offsetMinutes: OFFSET }).run(rows);
  const live = await startReplay(rows, { historical: (stored) => new EmptyFirstLegFetch(stored) });

  await live.runUntil("10:00");
  assert.equal(live.orch.getStatus().band?.stage, "PROVISIONAL");

  await live.runUntil("10:00", 15);
  const band = live.orch.getStatus().band;
  assert.equal(band?.stage, "FINAL");
  assert.deepEqual(band?.call, { resistance: 120, support: 90, mid: 105 });
  assert.deepEqual(band?.put, { resistance: 115, support: 95, mid: 105 });

  await live.runUntil("15:31");
  assert.deepEqual(live.orch.getTrades().map(comparable), backtest.trades.map(comparable));
});
