import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { StateStore } from "../src/persistence/stateStore.js";
import { CsvJournal } from "../src/persistence/csvJournal.js";
import type { PersistedEngineState } from "../src/persistence/persistedState.js";
import type { TradeRecord } from "../src/types.js";
import { OFFSET, TEST_DATE, at } from "./helpers/bandScenario.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "band-state-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

const STATE: PersistedEngineState = {
  version: 1,
  instanceId: "test-engine",
  savedAt: at("11:00"),
  tradingDate: TEST_DATE,
  dailyPnl: 1575,
  tradesToday: 2,
  openPosition: null,
};

test("state round-trips through the state file", async () => {
  await withTempDir(async (dir) => {
    const store = new StateStore("test-engine", path.join(dir, "nested", "state.json"));
    await store.save(STATE);
    assert.deepEqual(await store.load(), STATE);
  });
});

test("a missing state file loads as nothing", async () => {
  await withTempDir(async (dir) => {
    assert.equal(await new StateStore("test-engine", path.join(dir, "none.json")).load(), null);
  });
});

test("malformed or foreign state is ignored", async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, "state.json");
    const store = new StateStore("test-engine", file);

    await writeFile(file, "{not json", "utf8");
    assert.equal(await store.load(), null);

    await writeFile(file, JSON.stringify({ ...STATE, version: 2 }), "utf8");
    assert.equal(await store.load(), null);

    await writeFile(file, JSON.stringify({ ...STATE, openPosition: { tradeId: 7 } }), "utf8");
    assert.equal(await store.load(), null);
  });
});

test("the default state file is named after the instance", () => {
  assert.equal(new StateStore("desk-2").getPath(), "/tmp/band-engine-state-desk-2.json");
});

const TRADE: TradeRecord = {
  date: TEST_DATE,
  side: "PUT",
  entryTime: at("10:50"),
  entryPrice: 100,
  exitTime: at("11:00"),
  exitPrice: 101,
  exitReason: "RSI_EXIT",
  pnl: 75,
  metadata: { tradeId: "20240115_105000_PUT_100", symbol: "NIFTY22200PE", qty: 75, maxStop: 95, maxPrice: 103 },
};

test("the journal appends candles and trades to per-day files with one header", async () => {
  await withTempDir(async (dir) => {
    const journal = new CsvJournal(dir, OFFSET);
    const candle = { instrumentId: 256265, intervalMinutes: 5, open: 22000, high: 22060, low: 21990, close: 22050.5 };
    journal.saveCandle({ ...candle, windowStart: at("10:00") }, "INDEX");
    journal.saveCandle({ ...candle, windowStart: at("10:05") });
    journal.saveTrade(TRADE);
    await journal.flush();

    assert.equal(
      await readFile(path.join(dir, "candles", "2024-01-15_5m.csv"), "utf8"),
      [
        "datetime,instrument,interval,open,high,low,close",
        "2024-01-15 10:00:00,INDEX,5,22000,22060,21990,22050.5",
        "2024-01-15 10:05:00,256265,5,22000,22060,21990,22050.5",
        "",
      ].join("\n")
    );
    assert.equal(
      await readFile(path.join(dir, "trades", "2024-01-15.csv"), "utf8"),
      [
        "trade_id,date,side,symbol,qty,entry_time,entry_price,exit_time,exit_price,exit_reason,pnl,max_stop,max_price",
        "20240115_105000_PUT_100,2024-01-15,PUT,NIFTY22200PE,75,10:50:00,100,11:00:00,101,RSI_EXIT,75,95,103",
        "",
      ].join("\n")
    );
    assert.equal(journal.getFailures(), 0);
  });
});

test("a journal restarted on the same day does not repeat the header", async () => {
  await withTempDir(async (dir) => {
    const first = new CsvJournal(dir, OFFSET);
    first.saveTrade(TRADE);
    await first.flush();

    const second = new CsvJournal(dir, OFFSET);
    second.saveTrade(TRADE);
    await second.flush();

    const lines = (await readFile(path.join(dir, "trades", "2024-01-15.csv"), "utf8")).trimEnd().split("\n");
    assert.equal(lines.length, 3);
    assert.equal(lines.filter((l) => l.startsWith("trade_id,")).length, 1);
  });
});
