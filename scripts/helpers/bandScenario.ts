import type { MarketRow } from "../../src/datafeed/historicalCsv.js";
import type { SessionTimes, StrategyParams } from "../../src/config/settings.js";
import { exchangeTimeToTs, parseHHMM } from "../../src/utils/timeUtils.js";

export const TEST_DATE = "2024-01-15";
export const OFFSET = 330;

export const TIMES: SessionTimes = {
  marketStart: 555,
  referenceStart: 585,
  referenceEnd: 600,
  strikeSelection: 600,
  tradingStart: 600,
  hardExit: 915,
  marketEnd: 930,
};

export const STRATEGY: StrategyParams = {
  strikeOffset: 200,
  strikeStep: 50,
  lotSize: 75,
  dailyLossLimit: 10000,
  trailingIncrement: 20,
  rsiPeriod: 14,
  rsiExitDrop: 10,
  candleInterval: 5,
};

export function minutes(hhmm: string): number {
  const m = parseHHMM(hhmm);
  if (m === undefined) throw new Error(`bad time ${hhmm}`);
  return m;
}

export function at(hhmm: string, date: string = TEST_DATE): number {
  return exchangeTimeToTs(date, minutes(hhmm), OFFSET);
}

/**
 * [from, price]: the price holds from that minute until the next entry.
 */
export type Segment = readonly [string, number];

function priceAt(segments: readonly Segment[], minute: number): number {
  let price: number | undefined;
  for (const [from, value] of segments) {
    if (minutes(from) <= minute) price = value;
  }
  if (price === undefined) throw new Error(`no price at minute ${minute}`);
  return price;
}

export type DayShape = {
  index: readonly Segment[];
  call: readonly Segment[];
  put: readonly Segment[];
};

/**
 * One flat row per minute (open = high = low = close) from `from` to `to` inclusive.
 */
export function buildDayRows(shape: DayShape, date: string = TEST_DATE, from = "09:15", to = "15:29"): MarketRow[] {
  const rows: MarketRow[] = [];
  for (let m = minutes(from); m <= minutes(to); m++) {
    const flat = (p: number) => ({ open: p, high: p, low: p, close: p });
    rows.push({
      ts: exchangeTimeToTs(date, m, OFFSET),
      index: flat(priceAt(shape.index, m)),
      call: flat(priceAt(shape.call, m)),
      put: flat(priceAt(shape.put, m)),
    });
  }
  return rows;
}

/**
 * Index band 22050 / 21950, call band 120 / 90, put band 115 / 95.
 * CALL breakout on the 10:10 candle; the stop reaches breakeven on the 10:20
 * candle, trails to 120 on the 10:25 candle and is hit on the 10:30 candle.
 * The index then falls through support: PUT on the 10:45 candle, closed by
 * an RSI drop on the 10:55 candle.
 */
export const TWO_TRADE_DAY: DayShape = {
  index: [
    ["09:15", 22000],
    ["09:50", 22050],
    ["09:51", 22000],
    ["09:55", 21950],
    ["09:56", 22000],
    ["10:05", 22060],
    ["10:10", 22070],
    ["10:35", 22000],
    ["10:40", 21940],
    ["10:45", 21930],
  ],
  call: [
    ["09:15", 100],
    ["09:50", 120],
    ["09:51", 100],
    ["09:55", 90],
    ["09:56", 100],
    ["10:15", 106],
    ["10:20", 112],
    ["10:25", 125],
    ["10:30", 118],
  ],
  put: [
    ["09:15", 100],
    ["09:50", 115],
    ["09:51", 100],
    ["09:55", 95],
    ["09:56", 100],
    ["10:50", 103],
    ["10:55", 101],
  ],
};

export type ComparableTrade = {
  tradeId: string;
  side: string;
  entryTime: number;
  entryPrice: number;
  exitTime: number;
  exitPrice: number;
  exitReason: string;
  pnl: number;
  qty: number;
};

export function comparable(trade: {
  side: string;
  entryTime: number;
  entryPrice: number;
  exitTime: number;
  exitPrice: number;
  exitReason: string;
  pnl: number;
  metadata: { tradeId: string; qty: number };
}): ComparableTrade {
  return {
    tradeId: trade.metadata.tradeId,
    side: trade.side,
    entryTime: trade.entryTime,
    entryPrice: trade.entryPrice,
    exitTime: trade.exitTime,
    exitPrice: trade.exitPrice,
    exitReason: trade.exitReason,
    pnl: trade.pnl,
    qty: trade.metadata.qty,
  };
}
