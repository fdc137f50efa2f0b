import type { Candle, HistoricalBar, InstrumentId, OHLC } from "../types.js";
import { IST_OFFSET_MINUTES, floorToInterval, formatDateTime } from "../utils/timeUtils.js";
import { errorMessage } from "../utils/errors.js";

export type CandleListener = (candle: Candle) => void;

/**
 * Read side of candle history. The strategy core only ever sees candles
 * through this interface, so live and replay runs read the same way.
 */
export interface CandleSource {
  getWindow(instrumentId: InstrumentId, start: number, end: number, intervalMinutes: number): Candle[];
}

type MutableCandle = OHLC & {
  instrumentId: InstrumentId;
  windowStart: number;
  intervalMinutes: number;
};

type SeriesState = {
  current: MutableCandle | null;
  completed: Candle[];
  lastClosedStart: number | null;
};

export type CandleAggregatorOptions = {
  intervals?: number[]; // first entry is the base interval historical bars arrive in
  offsetMinutes?: number;
  maxHistory?: number;
};

const MINUTE_MS = 60 * 1000;

/**
 * Turns ticks (or 1-minute historical bars) into finalized candles for each
 * configured interval. Finalized candles are frozen copies; the in-progress
 * candle never leaves this class by reference.
 */
export class CandleAggregator implements CandleSource {
  private readonly intervals: number[];
  private readonly baseInterval: number;
  private readonly offsetMinutes: number;
  private readonly maxHistory: number;
  private readonly series: Map<string, SeriesState> = new Map();
  private readonly listeners: Map<number, CandleListener[]> = new Map();
  private readonly lastPrices: Map<InstrumentId, { price: number; ts: number }> = new Map();
  private lateDropped = 0;

  constructor(options: CandleAggregatorOptions = {}) {
    const intervals = options.intervals ?? [1, 5];
    const base = intervals[0];
    if (base === undefined) throw new Error("CandleAggregator needs at least one interval");
    for (const interval of intervals) {
      if (!Number.isInteger(interval) || interval <= 0 || interval % base !== 0) {
        throw new Error(`Interval ${interval}m must be a positive multiple of base ${base}m`);
      }
    }
    this.intervals = [...intervals];
    this.baseInterval = base;
    this.offsetMinutes = options.offsetMinutes ?? IST_OFFSET_MINUTES;
    this.maxHistory = options.maxHistory ?? 2000;
  }

  /**
   * Register a completion listener for one interval. Listeners run in
   * registration order.
   */
  onComplete(intervalMinutes: number, listener: CandleListener): void {
    if (!this.intervals.includes(intervalMinutes)) {
      throw new Error(`Interval ${intervalMinutes}m is not aggregated`);
    }
    const list = this.listeners.get(intervalMinutes) ?? [];
    list.push(listener);
    this.listeners.set(intervalMinutes, list);
  }

  ingestTick(instrumentId: InstrumentId, price: number, ts: number): void {
    if (!Number.isFinite(price) || !Number.isFinite(ts)) {
      console.warn(`[Aggregator] Ignoring malformed tick for ${instrumentId}: price=${price} ts=${ts}`);
      return;
    }

    const last = this.lastPrices.get(instrumentId);
    if (!last || ts >= last.ts) {
      this.lastPrices.set(instrumentId, { price, ts });
    }

    for (const interval of this.intervals) {
      this.updateWithTick(instrumentId, price, ts, interval);
    }
  }

  /**
   * Backfill one base-interval bar. The bar is appended as a completed base
   * candle and folded into the larger buckets with OHLC merge semantics.
   * A larger bucket is finalized as soon as its last sub-bar has been folded.
   * Returns false when the bar was dropped as late.
   */
  ingestHistoricalBar(
    instrumentId: InstrumentId,
    bar: OHLC,
    ts: number,
    triggerCallbacks: boolean = true
  ): boolean {
    const baseStart = floorToInterval(ts, this.baseInterval, this.offsetMinutes);
    const base = this.getSeries(instrumentId, this.baseInterval);

    if (base.lastClosedStart !== null && baseStart <= base.lastClosedStart) {
      this.dropLate(instrumentId, this.baseInterval, baseStart, "historical bar");
      return false;
    }
    if (base.current && baseStart >= base.current.windowStart) {
      // Live ticks already own this minute.
      this.dropLate(instrumentId, this.baseInterval, baseStart, "historical bar overlaps live candle");
      return false;
    }

    const last = this.lastPrices.get(instrumentId);
    if (!last || baseStart >= last.ts) {
      this.lastPrices.set(instrumentId, { price: bar.close, ts: baseStart });
    }

    this.finalize(base, {
      instrumentId,
      windowStart: baseStart,
      intervalMinutes: this.baseInterval,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
    }, triggerCallbacks);

    const barEnd = baseStart + this.baseInterval * MINUTE_MS;
    for (const interval of this.intervals) {
      if (interval === this.baseInterval) continue;
      this.foldBar(instrumentId, bar, baseStart, barEnd, interval, triggerCallbacks);
    }
    return true;
  }

  /**
   * Completed candles with start <= windowStart < end.
   */
  getWindow(instrumentId: InstrumentId, start: number, end: number, intervalMinutes: number): Candle[] {
    const s = this.series.get(this.key(instrumentId, intervalMinutes));
    if (!s) return [];
    return s.completed.filter((c) => c.windowStart >= start && c.windowStart < end);
  }

  getCompleted(instrumentId: InstrumentId, intervalMinutes: number, count?: number): Candle[] {
    const s = this.series.get(this.key(instrumentId, intervalMinutes));
    if (!s) return [];
    return count === undefined ? [...s.completed] : s.completed.slice(-count);
  }

  /**
   * Copy of the in-progress candle, if any.
   */
  getCurrent(instrumentId: InstrumentId, intervalMinutes: number): Candle | null {
    const s = this.series.get(this.key(instrumentId, intervalMinutes));
    return s?.current ? Object.freeze({ ...s.current }) : null;
  }

  lastPrice(instrumentId: InstrumentId): number | undefined {
    return this.lastPrices.get(instrumentId)?.price;
  }

  getLateDropped(): number {
    return this.lateDropped;
  }

  /**
   * Finalize in-progress candles (end of data / end of session).
   */
  flush(instrumentId?: InstrumentId, triggerCallbacks: boolean = true): void {
    for (const state of this.series.values()) {
      const cur = state.current;
      if (!cur) continue;
      if (instrumentId !== undefined && cur.instrumentId !== instrumentId) continue;
      state.current = null;
      this.finalize(state, cur, triggerCallbacks);
    }
  }

  reset(): void {
    this.series.clear();
    this.lastPrices.clear();
    this.lateDropped = 0;
  }

  private updateWithTick(instrumentId: InstrumentId, price: number, ts: number, interval: number): void {
    const bucket = floorToInterval(ts, interval, this.offsetMinutes);
    const state = this.getSeries(instrumentId, interval);

    if (state.lastClosedStart !== null && bucket <= state.lastClosedStart) {
      this.dropLate(instrumentId, interval, bucket, "tick");
      return;
    }

    const cur = state.current;
    if (!cur) {
      state.current = this.newCandle(instrumentId, interval, bucket, price);
      return;
    }

    if (bucket > cur.windowStart) {
      state.current = this.newCandle(instrumentId, interval, bucket, price);
      this.finalize(state, cur, true);
      return;
    }

    if (bucket < cur.windowStart) {
      this.dropLate(instrumentId, interval, bucket, "tick older than open candle");
      return;
    }

    cur.high = Math.max(cur.high, price);
    cur.low = Math.min(cur.low, price);
    cur.close = price;
  }

  private foldBar(
    instrumentId: InstrumentId,
    bar: OHLC,
    barStart: number,
    barEnd: number,
    interval: number,
    triggerCallbacks: boolean
  ): void {
    const bucket = floorToInterval(barStart, interval, this.offsetMinutes);
    const state = this.getSeries(instrumentId, interval);

    if (state.lastClosedStart !== null && bucket <= state.lastClosedStart) {
      this.dropLate(instrumentId, interval, bucket, "historical bar");
      return;
    }

    const cur = state.current;
    if (cur && bucket < cur.windowStart) {
      this.dropLate(instrumentId, interval, bucket, "historical bar older than open candle");
      return;
    }

    if (!cur || bucket > cur.windowStart) {
      state.current = {
        instrumentId,
        windowStart: bucket,
        intervalMinutes: interval,
        open: bar.open,
        high: bar.high,
        low: bar.low,
        close: bar.close,
      };
      if (cur) this.finalize(state, cur, triggerCallbacks);
    } else {
      cur.high = Math.max(cur.high, bar.high);
      cur.low = Math.min(cur.low, bar.low);
      cur.close = bar.close;
    }

    const bucketEnd = bucket + interval * MINUTE_MS;
    const open = state.current;
    if (open && open.windowStart === bucket && barEnd >= bucketEnd) {
      state.current = null;
      this.finalize(state, open, triggerCallbacks);
    }
  }

  private finalize(state: SeriesState, candle: MutableCandle, notify: boolean): void {
    const frozen: Candle = Object.freeze({ ...candle });
    state.completed.push(frozen);
    state.lastClosedStart = frozen.windowStart;
    if (state.completed.length > this.maxHistory) {
      state.completed.splice(0, state.completed.length - this.maxHistory);
    }
    if (!notify) return;

    for (const listener of this.listeners.get(frozen.intervalMinutes) ?? []) {
      try {
        listener(frozen);
      } catch (err) {
        console.error(
          `[Aggregator] ${frozen.intervalMinutes}m listener failed for ${frozen.instrumentId}: ${errorMessage(err)}`
        );
      }
    }
  }

  private newCandle(instrumentId: InstrumentId, interval: number, windowStart: number, price: number): MutableCandle {
    return { instrumentId, windowStart, intervalMinutes: interval, open: price, high: price, low: price, close: price };
  }

  private dropLate(instrumentId: InstrumentId, interval: number, bucket: number, what: string): void {
    this.lateDropped++;
    // One line per drop would flood on reconnect replays.
    if (this.lateDropped <= 5 || this.lateDropped % 500 === 0) {
      console.warn(
        `[Aggregator] Dropped late ${what} for ${instrumentId} ${interval}m window ${formatDateTime(bucket, this.offsetMinutes)} (total dropped=${this.lateDropped})`
      );
    }
  }

  private getSeries(instrumentId: InstrumentId, interval: number): SeriesState {
    const key = this.key(instrumentId, interval);
    let s = this.series.get(key);
    if (!s) {
      s = { current: null, completed: [], lastClosedStart: null };
      this.series.set(key, s);
    }
    return s;
  }

  private key(instrumentId: InstrumentId, interval: number): string {
    return `${instrumentId}:${interval}`;
  }
}

/**
 * Helper for callers holding HistoricalBar records.
 */
export function ingestBars(
  aggregator: CandleAggregator,
  instrumentId: InstrumentId,
  bars: HistoricalBar[],
  triggerCallbacks: boolean
): number {
  let accepted = 0;
  for (const bar of bars) {
    if (aggregator.ingestHistoricalBar(instrumentId, bar, bar.ts, triggerCallbacks)) accepted++;
  }
  return accepted;
}
