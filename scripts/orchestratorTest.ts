import { test } from "node:test";
import assert from "node:assert/strict";
import { PaperOrderSink } from "../src/execution/orderSink.js";
import { CommandHandler } from "../src/commands.js";
import type { ExitReason, OrderRequest, OrderResult, Position } from "../src/types.js";
import { OFFSET, TEST_DATE, TWO_TRADE_DAY, at, buildDayRows, comparable } from "./helpers/bandScenario.js";
import { startReplay } from "./helpers/replayHarness.js";

/**
 * Paper fills, except the first exit, which the broker refuses.
 */
class FlakyExitSink extends PaperOrderSink {
  private failed = false;

  override async placeExit(order: OrderRequest & { reason: ExitReason }): Promise<OrderResult> {
    if (!this.failed) {
      this.failed = true;
      return { status: "error", message: "broker timeout" };
    }
    return super.placeExit(order);
  }
}

test("a refused exit keeps the position open and the next slice closes it", async () => {
  const live = await startReplay(buildDayRows(TWO_TRADE_DAY), { sink: new FlakyExitSink() });
  await live.runUntil("15:31");

  assert.deepEqual(
    live.events.map((e) => e.type),
    ["ENTRY", "ORDER_FAILED", "EXIT", "ENTRY", "EXIT", "SUMMARY"]
  );
  const failed = live.events[1];
  assert.ok(failed && failed.type === "ORDER_FAILED");
  assert.equal(failed.message, "broker timeout");
  assert.equal(failed.decision.ts, at("10:35"));

  const [first, second] = live.orch.getTrades().map(comparable);
  assert.deepEqual(first, {
    tradeId: "20240115_101500_CALL_100",
    side: "CALL",
    entryTime: at("10:15"),
    entryPrice: 100,
    exitTime: at("10:40"),
    exitPrice: 120,
    exitReason: "SL_HIT",
    pnl: 1500,
    qty: 75,
  });
  assert.equal(second?.tradeId, "20240115_105000_PUT_100");
  assert.equal(second?.exitReason, "RSI_EXIT");
});

test("operator exit closes at the last leg price and shows in the status", async () => {
  const live = await startReplay(buildDayRows(TWO_TRADE_DAY));
  await live.runUntil("10:20");
  const commands = new CommandHandler(live.orch, OFFSET);

  assert.ok(live.orch.getStatus().session.position);
  assert.equal(await commands.exit(), "✅ Closed 20240115_101500_CALL_100");

  const [trade] = live.orch.getTrades();
  assert.equal(trade?.exitReason, "MANUAL");
  assert.equal(trade?.exitPrice, 112);
  assert.equal(trade?.exitTime, at("10:20"));
  assert.equal(trade?.pnl, 900);

  const status = (await commands.status()).split("\n");
  assert.ok(status.includes("Trades: 1 | P&L: +900.00"));
  assert.ok(status.includes("Legs: NIFTY21800CE / NIFTY22200PE"));
  assert.ok(status.includes("Position: none"));

  assert.equal(await commands.exit(), "❌ No open position to exit.");
});

class RefusingExitSink extends PaperOrderSink {
  override async placeExit(): Promise<OrderResult> {
    return { status: "error", message: "exchange closed" };
  }
}

test("a position still open at day rollover is reported before the new day starts", async () => {
  const live = await startReplay(buildDayRows(TWO_TRADE_DAY), { sink: new RefusingExitSink() });
  await live.runUntil("15:31");
  assert.equal(live.orch.getSession().getPosition()?.tradeId, "20240115_101500_CALL_100");

  const nextOpen = at("09:15", "2024-01-16");
  live.clock.set(nextOpen);
  await live.orch.controlTick(nextOpen);

  const last = live.events[live.events.length - 1];
  assert.ok(last && last.type === "ORPHANED_POSITION");
  assert.equal(last.position.tradeId, "20240115_101500_CALL_100");
  assert.equal(live.events.filter((e) => e.type === "ORPHANED_POSITION").length, 1);
  assert.equal(live.orch.getStatus().date, "2024-01-16");
  assert.equal(live.orch.getSession().getPosition(), null);
});

function leftOpen(): Position {
  return {
    tradeId: "20240115_101500_CALL_100",
    side: "CALL",
    contract: {
      instrumentId: 256266,
      symbol: "NIFTY21800CE",
      strike: 21800,
      optionType: "CE",
      expiry: TEST_DATE,
      lotSize: 75,
    },
    entryPrice: 100,
    entryTime: at("10:15"),
    openedOnWindow: at("10:10"),
  };
}

test("state of the same day carries the realized P&L and reports the orphaned position", async () => {
  const live = await startReplay(buildDayRows(TWO_TRADE_DAY));
  live.orch.restore({
    version: 1,
    instanceId: "test-engine",
    savedAt: at("10:30"),
    tradingDate: TEST_DATE,
    dailyPnl: -2500,
    tradesToday: 2,
    openPosition: leftOpen(),
  });

  assert.equal(live.orch.getSession().getDailyPnl(), -2500);
  assert.deepEqual(live.events, [{ type: "ORPHANED_POSITION", position: leftOpen() }]);
  // Not adopted by this run.
  assert.equal(live.orch.getSession().getPosition(), null);

  assert.deepEqual(live.orch.toPersisted(), {
    version: 1,
    instanceId: "test-engine",
    savedAt: at("09:15"),
    tradingDate: TEST_DATE,
    dailyPnl: -2500,
    tradesToday: 0,
    openPosition: null,
  });
});

test("state from another day is ignored", async () => {
  const live = await startReplay(buildDayRows(TWO_TRADE_DAY));
  live.orch.restore({
    version: 1,
    instanceId: "test-engine",
    savedAt: at("15:30", "2024-01-12"),
    tradingDate: "2024-01-12",
    dailyPnl: -9000,
    tradesToday: 3,
    openPosition: leftOpen(),
  });

  assert.equal(live.orch.getSession().getDailyPnl(), 0);
  assert.deepEqual(live.events, []);
});
