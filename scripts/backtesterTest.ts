import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Backtester } from "../src/backtest/backtester.js";
import { computeStats, formatStatsTable, tradesToCsv, writeTradesCsv } from "../src/backtest/report.js";
import type { TradeRecord } from "../src/types.js";
import { OFFSET, STRATEGY, TIMES, TWO_TRADE_DAY, at, buildDayRows, comparable } from "./helpers/bandScenario.js";

function backtester(): Backtester {
  return new Backtester({ strategy: STRATEGY, times: TIMES, offsetMinutes: OFFSET });
}

test("a breakout day produces the stop-loss trade and the RSI trade", () => {
  const result = backtester().run(buildDayRows(TWO_TRADE_DAY));

  assert.equal(result.days.length, 1);
  assert.deepEqual(result.trades.map(comparable), [
    {
      tradeId: "20240115_101500_CALL_100",
      side: "CALL",
      entryTime: at("10:15"),
      entryPrice: 100,
      exitTime: at("10:35"),
      exitPrice: 120,
      exitReason: "SL_HIT",
      pnl: 1500,
      qty: 75,
    },
    {
      tradeId: "20240115_105000_PUT_100",
      side: "PUT",
      entryTime: at("10:50"),
      entryPrice: 100,
      exitTime: at("11:00"),
      exitPrice: 101,
      exitReason: "RSI_EXIT",
      pnl: 75,
      qty: 75,
    },
  ]);
  assert.equal(result.trades[0]?.metadata.maxStop, 120);
  assert.equal(result.trades[0]?.metadata.maxPrice, 125);
  assert.equal(result.trades[1]?.metadata.maxStop, 95);
  assert.equal(result.trades[1]?.metadata.maxPrice, 103);

  assert.deepEqual(result.stats, {
    totalTrades: 2,
    wins: 2,
    losses: 0,
    winRate: 100,
    totalPnl: 1575,
    averagePnl: 787.5,
    averageWin: 787.5,
    averageLoss: 0,
    maxWin: 1500,
    maxLoss: 75,
    profitFactor: null,
  });
});

test("days are replayed independently and in date order", () => {
  const rows = [...buildDayRows(TWO_TRADE_DAY, "2024-01-16"), ...buildDayRows(TWO_TRADE_DAY, "2024-01-15")];
  const result = backtester().run(rows);

  assert.deepEqual(
    result.days.map((d) => [d.date, d.trades.length]),
    [
      ["2024-01-15", 2],
      ["2024-01-16", 2],
    ]
  );
  assert.deepEqual(
    result.trades.map((t) => t.metadata.tradeId),
    ["20240115_101500_CALL_100", "20240115_105000_PUT_100", "20240116_101500_CALL_100", "20240116_105000_PUT_100"]
  );
});

test("a day with too few candles is skipped", () => {
  const result = backtester().run(buildDayRows(TWO_TRADE_DAY, "2024-01-15", "09:15", "09:49"));
  assert.deepEqual(result.days, [{ date: "2024-01-15", trades: [], skipped: "only 7 5m candles" }]);
});

test("a day without reference-window data is skipped", () => {
  const result = backtester().run(buildDayRows(TWO_TRADE_DAY, "2024-01-15", "10:00", "10:59"));
  assert.equal(result.days[0]?.skipped, "no reference band");
  assert.equal(result.trades.length, 0);
});

test("a position still open when the data ends is closed at the last leg close", () => {
  const result = backtester().run(buildDayRows(TWO_TRADE_DAY, "2024-01-15", "09:15", "10:22"));
  assert.equal(result.trades.length, 1);
  const [trade] = result.trades;
  assert.equal(trade?.exitReason, "HARD_EXIT");
  assert.equal(trade?.exitTime, at("10:25"));
  assert.equal(trade?.exitPrice, 112);
  assert.equal(trade?.pnl, 900);
});

function closed(pnl: number): TradeRecord {
  return {
    date: "2024-01-15",
    side: "CALL",
    entryTime: at("10:15"),
    entryPrice: 100,
    exitTime: at("10:35"),
    exitPrice: 100 + pnl / 75,
    exitReason: "SL_HIT",
    pnl,
    metadata: { tradeId: `t${pnl}`, symbol: "CALL", qty: 75, maxStop: 90, maxPrice: 100 },
  };
}

test("a flat trade counts as a loss and profit factor compares average win and loss", () => {
  const stats = computeStats([closed(100), closed(-50), closed(0)]);
  assert.equal(stats.wins, 1);
  assert.equal(stats.losses, 2);
  assert.equal(stats.averageLoss, -25);
  assert.equal(stats.profitFactor, 4);
  assert.equal(stats.maxLoss, -50);

  const table = formatStatsTable(stats).split("\n");
  assert.equal(table[1], "BACKTEST RESULTS");
  assert.ok(table.includes("Win Rate        33.33%"));
  assert.ok(table.includes("Average P&L     16.67"));
  assert.ok(table.includes("Profit Factor   4.00"));
});

test("no trades give zeroed statistics", () => {
  const stats = computeStats([]);
  assert.equal(stats.totalTrades, 0);
  assert.equal(stats.winRate, 0);
  assert.equal(stats.profitFactor, null);
  assert.ok(formatStatsTable(stats).split("\n").includes("Profit Factor   N/A"));
});

test("trades are written as CSV with exchange-local times", async () => {
  const { trades } = backtester().run(buildDayRows(TWO_TRADE_DAY));
  const csv = tradesToCsv(trades, OFFSET);
  const lines = csv.trimEnd().split("\n");

  assert.equal(
    lines[0],
    "trade_id,date,side,symbol,qty,entry_time,entry_price,exit_time,exit_price,exit_reason,pnl,max_stop,max_price"
  );
  assert.equal(lines[1], "20240115_101500_CALL_100,2024-01-15,CALL,CALL,75,10:15:00,100,10:35:00,120,SL_HIT,1500,120,125");
  assert.equal(lines[2], "20240115_105000_PUT_100,2024-01-15,PUT,PUT,75,10:50:00,100,11:00:00,101,RSI_EXIT,75,95,103");

  const dir = await mkdtemp(path.join(os.tmpdir(), "band-backtest-"));
  try {
    const file = path.join(dir, "results.csv");
    await writeTradesCsv(file, trades, OFFSET);
    assert.equal(await readFile(file, "utf8"), csv);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
