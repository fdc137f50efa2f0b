import type { CandleSlice, InstrumentId, OptionContract, TradeRecord } from "../types.js";
import { CandleAggregator } from "../datafeed/candleAggregator.js";
import { groupByDate, type MarketRow } from "../datafeed/historicalCsv.js";
import { BandBook, computeBands } from "../strategy/referenceBand.js";
import { StrategySession, sessionConfigFrom } from "../strategy/strategySession.js";
import { dayTimestamps, type SessionTimes, type StrategyParams } from "../config/settings.js";
import type { ReplayIds } from "../mock/replayFeed.js";
import { computeStats, type BacktestStats } from "./report.js";
import { IST_OFFSET_MINUTES } from "../utils/timeUtils.js";

export const BACKTEST_IDS: ReplayIds = { INDEX: 1, CALL: 2, PUT: 3 };

// Fewer working candles than this and the day is not traded.
const MIN_DAY_CANDLES = 10;

export type BacktestConfig = {
  strategy: StrategyParams;
  times: SessionTimes;
  offsetMinutes?: number;
};

export type DayResult = {
  date: string;
  trades: TradeRecord[];
  skipped?: string;
};

export type BacktestResult = {
  days: DayResult[];
  trades: TradeRecord[];
  stats: BacktestStats;
};

function legContract(id: InstrumentId, side: "CE" | "PE", date: string): OptionContract {
  return Object.freeze({
    instrumentId: id,
    symbol: side === "CE" ? "CALL" : "PUT",
    strike: 0,
    optionType: side,
    expiry: date,
    lotSize: 0, // session falls back to the configured lot size
  });
}

/**
 * Replays stored 1-minute rows day by day through the same StrategySession
 * the live loop uses. Orders fill immediately at the decision price.
 */
export class Backtester {
  private readonly offsetMinutes: number;

  constructor(private readonly config: BacktestConfig) {
    this.offsetMinutes = config.offsetMinutes ?? IST_OFFSET_MINUTES;
  }

  run(rows: readonly MarketRow[]): BacktestResult {
    const days: DayResult[] = [];
    for (const [date, dayRows] of groupByDate([...rows], this.offsetMinutes)) {
      days.push(this.runDay(date, dayRows));
    }
    const trades = days.flatMap((d) => d.trades);
    const skipped = days.filter((d) => d.skipped).length;
    console.log(`[Backtest] ${days.length} days replayed (${skipped} skipped), ${trades.length} trades`);
    return { days, trades, stats: computeStats(trades) };
  }

  runDay(date: string, rows: readonly MarketRow[]): DayResult {
    const { strategy, times } = this.config;
    const interval = strategy.candleInterval;
    const intervalMs = interval * 60 * 1000;
    const clock = dayTimestamps(date, times, this.offsetMinutes);
    const ids = BACKTEST_IDS;

    const aggregator = new CandleAggregator({ intervals: [1, interval], offsetMinutes: this.offsetMinutes });
    for (const row of rows) {
      aggregator.ingestHistoricalBar(ids.INDEX, row.index, row.ts, false);
      aggregator.ingestHistoricalBar(ids.CALL, row.call, row.ts, false);
      aggregator.ingestHistoricalBar(ids.PUT, row.put, row.ts, false);
    }
    aggregator.flush(undefined, false);

    const indexCandles = aggregator.getCompleted(ids.INDEX, interval);
    if (indexCandles.length < MIN_DAY_CANDLES) {
      const reason = `only ${indexCandles.length} ${interval}m candles`;
      console.warn(`[Backtest] ${date}: skipped, ${reason}`);
      return { date, trades: [], skipped: reason };
    }

    const window = (id: InstrumentId) =>
      aggregator.getWindow(id, clock.referenceStart, clock.referenceEnd, interval);
    const bands = new BandBook();
    const band = bands.publish(
      "FINAL",
      computeBands({ index: window(ids.INDEX), call: window(ids.CALL), put: window(ids.PUT) }),
      clock.referenceEnd
    );
    if (!band) {
      const reason = "no reference band";
      console.warn(`[Backtest] ${date}: skipped, ${reason}`);
      return { date, trades: [], skipped: reason };
    }

    const session = new StrategySession(
      date,
      sessionConfigFrom(strategy, times, this.offsetMinutes),
      aggregator,
      bands
    );
    session.setLegs({ index: ids.INDEX, call: legContract(ids.CALL, "CE", date), put: legContract(ids.PUT, "PE", date) });

    const calls = new Map(aggregator.getCompleted(ids.CALL, interval).map((c) => [c.windowStart, c]));
    const puts = new Map(aggregator.getCompleted(ids.PUT, interval).map((c) => [c.windowStart, c]));

    let lastSlice: CandleSlice | null = null;
    for (const candle of indexCandles) {
      if (candle.windowStart < clock.tradingStart) continue;
      const slice: CandleSlice = {
        windowStart: candle.windowStart,
        closeTs: candle.windowStart + intervalMs,
        index: candle,
        call: calls.get(candle.windowStart),
        put: puts.get(candle.windowStart),
      };
      lastSlice = slice;

      const decision = session.processSlice(slice);
      if (decision?.type === "ENTER") session.confirmEntry(decision);
      else if (decision?.type === "EXIT") session.confirmExit(decision);
    }

    // Data ended before the hard-exit candle.
    const open = session.getPosition();
    if (open && lastSlice) {
      console.warn(`[Backtest] ${date}: data ended with ${open.tradeId} open, closing at last price`);
      const exit = session.requestExit("HARD_EXIT", lastSlice.closeTs);
      if (exit) session.confirmExit(exit);
    }

    const trades = session.getTrades();
    console.log(`[Backtest] ${date}: ${trades.length} trades, P&L ${session.getDailyPnl().toFixed(2)}`);
    return { date, trades };
  }
}
