import type {
  BandSnapshot,
  CandleSlice,
  EntryDecision,
  ExitDecision,
  ExitReason,
  InstrumentId,
  OptionContract,
  Position,
  ReferenceBand,
  Side,
  StrategyDecision,
  TradeRecord,
} from "../types.js";
import type { CandleSource } from "../datafeed/candleAggregator.js";
import type { SessionTimes, StrategyParams } from "../config/settings.js";
import type { BandBook } from "./referenceBand.js";
import { EntryDetector, type EntryState } from "./entryDetector.js";
import { StopLossManager } from "./stopLoss.js";
import { OscillatorTracker } from "../utils/indicators.js";
import {
  IST_OFFSET_MINUTES,
  exchangeDateString,
  exchangeTimeToTs,
  formatTime,
} from "../utils/timeUtils.js";

export type SessionConfig = {
  lotSize: number;
  dailyLossLimit: number;
  trailingIncrement: number;
  rsiPeriod: number;
  rsiExitDrop: number;
  candleInterval: number;
  tradingStartMinutes: number;
  hardExitMinutes: number;
  offsetMinutes?: number;
  // Wall-clock hard exit waits this long past the hard-exit time so the
  // candle closing at that time is handled by processSlice first.
  hardExitClockGraceMs?: number;
  // Delay before a failed exit is retried from the wall clock.
  exitRetryMs?: number;
};

export function sessionConfigFrom(
  params: StrategyParams,
  times: SessionTimes,
  offsetMinutes: number = IST_OFFSET_MINUTES
): SessionConfig {
  return {
    lotSize: params.lotSize,
    dailyLossLimit: params.dailyLossLimit,
    trailingIncrement: params.trailingIncrement,
    rsiPeriod: params.rsiPeriod,
    rsiExitDrop: params.rsiExitDrop,
    candleInterval: params.candleInterval,
    tradingStartMinutes: times.tradingStart,
    hardExitMinutes: times.hardExit,
    offsetMinutes,
  };
}

export type SessionLegs = {
  index: InstrumentId;
  call: OptionContract;
  put: OptionContract;
};

type OpenTrade = {
  position: Position;
  stop: StopLossManager;
  oscillator: OscillatorTracker;
  maxPrice: number;
};

export type SessionSnapshot = {
  date: string;
  dailyPnl: number;
  halted: boolean;
  trades: number;
  position: Position | null;
  stop: number | null;
  breakeven: boolean;
  rsiPeak: number | null;
  entry: EntryState;
  pending: "ENTRY" | "EXIT" | null;
};

/**
 * Strategy core for one trading day. Both the live orchestrator and the
 * backtest drive it with the same CandleSlice sequence; everything that
 * changes position state goes through confirmEntry / confirmExit.
 */
export class StrategySession {
  private readonly detector: EntryDetector;
  private readonly offsetMinutes: number;
  private readonly dayStart: number;
  private readonly tradingStartTs: number;
  private readonly hardExitTs: number;
  private legs: SessionLegs | null = null;
  private open: OpenTrade | null = null;
  private pendingEntry: EntryDecision | null = null;
  private pendingExit: ExitDecision | null = null;
  private exitRetryAt = 0;
  private lastLegPrice: Map<InstrumentId, number> = new Map();
  private dailyPnl = 0;
  private haltLogged = false;
  private readonly trades: TradeRecord[] = [];

  constructor(
    readonly date: string,
    private readonly config: SessionConfig,
    private readonly candles: CandleSource,
    private readonly bands: BandBook
  ) {
    this.offsetMinutes = config.offsetMinutes ?? IST_OFFSET_MINUTES;
    this.detector = new EntryDetector(config.tradingStartMinutes, this.offsetMinutes);
    this.dayStart = exchangeTimeToTs(date, 0, this.offsetMinutes);
    this.tradingStartTs = exchangeTimeToTs(date, config.tradingStartMinutes, this.offsetMinutes);
    this.hardExitTs = exchangeTimeToTs(date, config.hardExitMinutes, this.offsetMinutes);
  }

  setLegs(legs: SessionLegs): void {
    if (this.open) {
      console.warn("[Session] Ignoring leg change while a position is open");
      return;
    }
    this.legs = legs;
    console.log(
      `[Session] Legs set: index=${legs.index} call=${legs.call.symbol} put=${legs.put.symbol}`
    );
  }

  getLegs(): SessionLegs | null {
    return this.legs;
  }

  getPosition(): Position | null {
    return this.open?.position ?? null;
  }

  getTrades(): TradeRecord[] {
    return [...this.trades];
  }

  getDailyPnl(): number {
    return this.dailyPnl;
  }

  /**
   * Carry realized P&L over from an earlier run of the same day.
   */
  restoreDailyPnl(pnl: number): void {
    if (!Number.isFinite(pnl)) return;
    this.dailyPnl = pnl;
    console.log(`[Session] Restored daily P&L ${pnl.toFixed(2)} for ${this.date}`);
  }

  isHalted(): boolean {
    return Math.abs(this.dailyPnl) >= this.config.dailyLossLimit;
  }

  hasPending(): boolean {
    return this.pendingEntry !== null || this.pendingExit !== null;
  }

  snapshot(): SessionSnapshot {
    return {
      date: this.date,
      dailyPnl: this.dailyPnl,
      halted: this.isHalted(),
      trades: this.trades.length,
      position: this.open?.position ?? null,
      stop: this.open ? this.open.stop.stop : null,
      breakeven: this.open ? this.open.stop.getState().breakevenReached : false,
      rsiPeak: this.open?.oscillator.getPeak() ?? null,
      entry: this.detector.getState(),
      pending: this.pendingEntry ? "ENTRY" : this.pendingExit ? "EXIT" : null,
    };
  }

  /**
   * Evaluate one completed window. At most one decision per slice.
   */
  processSlice(slice: CandleSlice): StrategyDecision | null {
    this.rememberLegPrices(slice);

    if (this.hasPending()) {
      console.warn(`[Session] Slice ${this.fmt(slice.windowStart)} arrived with an unconfirmed order, entry check only`);
      if (slice.index) this.detector.observe(slice.index);
      return null;
    }

    const band = this.bands.current();

    // 1. Entry
    if (slice.index) {
      if (this.open) {
        this.detector.onCandle(slice.index, band?.index ?? null);
      } else {
        const blocked = this.entryBlockedReason(slice);
        if (blocked) {
          this.detector.observe(slice.index);
        } else {
          const signal = this.detector.onCandle(slice.index, band?.index ?? null);
          if (signal) {
            const entry = this.buildEntry(signal.side, slice, band);
            if (entry) {
              this.pendingEntry = entry;
              return entry;
            }
            this.detector.abandon();
          }
        }
      }
    }

    if (!this.open || this.open.position.openedOnWindow >= slice.windowStart) {
      return null;
    }

    const trade = this.open;
    const leg = trade.position.side === "CALL" ? slice.call : slice.put;

    if (leg) {
      trade.maxPrice = Math.max(trade.maxPrice, leg.high);

      // 2. Stop-loss
      const progressed = trade.stop.advanceProgressive(leg.close);
      if (progressed) {
        console.log(`[Session] Stop ${progressed.stage}: ${progressed.from.toFixed(2)} -> ${progressed.to.toFixed(2)}`);
      }
      const trailed = trade.stop.advanceTrailing(leg.close);
      if (trailed) {
        console.log(`[Session] Stop TRAIL: ${trailed.from.toFixed(2)} -> ${trailed.to.toFixed(2)}`);
      }
      if (trade.stop.checkHit(leg.low)) {
        console.log(
          `[Session] Stop hit at ${this.fmt(slice.closeTs)}: low=${leg.low.toFixed(2)} <= stop=${trade.stop.stop.toFixed(2)}`
        );
        return this.buildExit("SL_HIT", trade.stop.stop, slice.closeTs);
      }

      // 3. Oscillator
      const closes = this.candles
        .getWindow(leg.instrumentId, this.dayStart, slice.windowStart + this.intervalMs(), this.config.candleInterval)
        .map((c) => c.close);
      const reading = trade.oscillator.update(closes);
      if (reading.exit && reading.value !== undefined && reading.peak !== undefined) {
        console.log(
          `[Session] RSI exit at ${this.fmt(slice.closeTs)}: rsi=${reading.value.toFixed(2)} peak=${reading.peak.toFixed(2)}`
        );
        return this.buildExit("RSI_EXIT", leg.close, slice.closeTs);
      }
    } else {
      console.warn(`[Session] No ${trade.position.side} leg candle for ${this.fmt(slice.windowStart)}, stop check deferred`);
    }

    // 4. Hard exit
    if (slice.closeTs >= this.hardExitTs) {
      const price = leg?.close ?? this.lastPrice(trade.position.contract.instrumentId) ?? trade.position.entryPrice;
      console.log(`[Session] Hard exit on ${this.fmt(slice.windowStart)} candle`);
      return this.buildExit("HARD_EXIT", price, slice.closeTs);
    }

    return null;
  }

  /**
   * Wall-clock checks, independent of candle flow.
   */
  onClock(now: number, price?: number): ExitDecision | null {
    if (this.isHalted() && !this.haltLogged) {
      this.haltLogged = true;
      console.warn(
        `[Session] Daily loss limit reached (pnl=${this.dailyPnl.toFixed(2)}, limit=${this.config.dailyLossLimit}), no new entries today`
      );
    }

    if (!this.open || this.hasPending()) return null;
    if (now < this.exitRetryAt) return null;
    if (now < this.hardExitTs + (this.config.hardExitClockGraceMs ?? 0)) return null;

    const contractId = this.open.position.contract.instrumentId;
    const exitPrice = price ?? this.lastPrice(contractId) ?? this.open.position.entryPrice;
    console.log(`[Session] Hard exit from clock at ${this.fmt(now)}`);
    return this.buildExit("HARD_EXIT", exitPrice, now);
  }

  /**
   * Exit outside the candle flow (operator command, shutdown).
   */
  requestExit(reason: ExitReason, now: number, price?: number): ExitDecision | null {
    if (!this.open) return null;
    if (this.hasPending()) {
      console.warn(`[Session] ${reason} exit requested while an order is pending`);
      return null;
    }
    const exitPrice = price ?? this.lastPrice(this.open.position.contract.instrumentId) ?? this.open.position.entryPrice;
    return this.buildExit(reason, exitPrice, now);
  }

  confirmEntry(decision: EntryDecision, fillPrice: number = decision.price): Position | null {
    if (this.pendingEntry?.tradeId !== decision.tradeId) {
      console.warn(`[Session] confirmEntry for unknown trade ${decision.tradeId}`);
      return null;
    }
    this.pendingEntry = null;

    const legBand = this.legBand(decision.side, this.bands.current());
    if (!legBand) {
      // Band was swapped out underneath the order; keep managing with the entry as floor.
      console.warn(`[Session] No ${decision.side} band at fill, stop anchored at entry`);
    }
    const low = legBand?.support ?? fillPrice;
    const mid = legBand?.mid ?? fillPrice;
    const high = legBand?.resistance ?? fillPrice;

    const position: Position = {
      tradeId: decision.tradeId,
      side: decision.side,
      contract: decision.contract,
      entryPrice: fillPrice,
      entryTime: decision.ts,
      openedOnWindow: decision.ts - this.intervalMs(),
    };
    this.open = {
      position,
      stop: new StopLossManager(fillPrice, low, mid, high, this.config.trailingIncrement),
      oscillator: new OscillatorTracker(this.config.rsiPeriod, this.config.rsiExitDrop),
      maxPrice: fillPrice,
    };
    console.log(
      `[Session] ENTERED ${decision.side} ${decision.contract.symbol} @ ${fillPrice.toFixed(2)} stop=${low.toFixed(2)} (${decision.tradeId})`
    );
    return position;
  }

  rejectEntry(decision: EntryDecision, reason: string): void {
    if (this.pendingEntry?.tradeId !== decision.tradeId) return;
    this.pendingEntry = null;
    this.detector.abandon();
    console.warn(`[Session] Entry ${decision.tradeId} rejected: ${reason}`);
  }

  confirmExit(decision: ExitDecision, fillPrice: number = decision.price): TradeRecord | null {
    const trade = this.open;
    if (!trade || this.pendingExit?.tradeId !== decision.tradeId) {
      console.warn(`[Session] confirmExit for unknown trade ${decision.tradeId}`);
      return null;
    }
    this.pendingExit = null;

    const qty = this.quantityFor(trade.position.contract);
    const pnl = (fillPrice - trade.position.entryPrice) * qty;
    const record: TradeRecord = Object.freeze({
      date: this.date,
      side: trade.position.side,
      entryTime: trade.position.entryTime,
      entryPrice: trade.position.entryPrice,
      exitTime: decision.ts,
      exitPrice: fillPrice,
      exitReason: decision.reason,
      pnl,
      metadata: Object.freeze({
        tradeId: trade.position.tradeId,
        symbol: trade.position.contract.symbol,
        qty,
        maxStop: trade.stop.getState().maxStop,
        maxPrice: Math.max(trade.maxPrice, fillPrice),
      }),
    });

    this.trades.push(record);
    this.open = null;
    this.dailyPnl += pnl;
    this.detector.notifyClosed();

    console.log(
      `[Session] EXITED ${record.side} @ ${fillPrice.toFixed(2)} reason=${record.exitReason} pnl=${pnl.toFixed(2)} daily=${this.dailyPnl.toFixed(2)}`
    );
    if (this.isHalted()) {
      this.haltLogged = true;
      console.warn(
        `[Session] Daily loss limit reached (pnl=${this.dailyPnl.toFixed(2)}, limit=${this.config.dailyLossLimit}), no new entries today`
      );
    }
    return record;
  }

  /**
   * The sink could not close the position. It stays open and the exit is
   * retried by a later slice or clock check.
   */
  exitFailed(decision: ExitDecision, reason: string, now: number = decision.ts): void {
    if (this.pendingExit?.tradeId !== decision.tradeId) return;
    this.pendingExit = null;
    this.exitRetryAt = now + (this.config.exitRetryMs ?? 5000);
    console.error(`[Session] Exit ${decision.tradeId} (${decision.reason}) failed: ${reason}. Position kept open`);
  }

  private entryBlockedReason(slice: CandleSlice): string | null {
    if (this.isHalted()) return "daily loss limit reached";
    if (slice.closeTs >= this.hardExitTs) return "hard-exit window";
    if (slice.closeTs <= this.tradingStartTs) return "before trading start";
    return null;
  }

  private buildEntry(side: Side, slice: CandleSlice, band: BandSnapshot | null): EntryDecision | null {
    const skip = (reason: string): null => {
      console.warn(`[Session] ${side} signal at ${this.fmt(slice.closeTs)} not taken: ${reason}`);
      return null;
    };

    if (!band || band.stage !== "FINAL") return skip("reference band is not final");
    if (!this.legs) return skip("strikes not selected");
    const legBand = this.legBand(side, band);
    if (!legBand) return skip(`no ${side} leg band`);
    const leg = side === "CALL" ? slice.call : slice.put;
    if (!leg) return skip(`no ${side} leg candle for this window`);

    const contract = side === "CALL" ? this.legs.call : this.legs.put;
    if (leg.instrumentId !== contract.instrumentId) {
      return skip(`leg candle ${leg.instrumentId} does not match ${contract.symbol}`);
    }

    return {
      type: "ENTER",
      tradeId: makeTradeId(slice.closeTs, side, leg.close, this.offsetMinutes),
      side,
      contract,
      price: leg.close,
      ts: slice.closeTs,
      stopLoss: legBand.support,
    };
  }

  private buildExit(reason: ExitReason, price: number, ts: number): ExitDecision | null {
    const trade = this.open;
    if (!trade) return null;
    const decision: ExitDecision = {
      type: "EXIT",
      tradeId: trade.position.tradeId,
      side: trade.position.side,
      contract: trade.position.contract,
      price,
      ts,
      reason,
    };
    this.pendingExit = decision;
    return decision;
  }

  private legBand(side: Side, band: BandSnapshot | null): ReferenceBand | undefined {
    if (!band) return undefined;
    return side === "CALL" ? band.call : band.put;
  }

  private rememberLegPrices(slice: CandleSlice): void {
    if (slice.call) this.lastLegPrice.set(slice.call.instrumentId, slice.call.close);
    if (slice.put) this.lastLegPrice.set(slice.put.instrumentId, slice.put.close);
  }

  private lastPrice(instrumentId: InstrumentId): number | undefined {
    return this.lastLegPrice.get(instrumentId);
  }

  quantityFor(contract: OptionContract): number {
    return contract.lotSize > 0 ? contract.lotSize : this.config.lotSize;
  }

  private intervalMs(): number {
    return this.config.candleInterval * 60 * 1000;
  }

  private fmt(ts: number): string {
    return formatTime(ts, this.offsetMinutes);
  }
}

/**
 * YYYYMMDD_HHMMSS_SIDE_price in exchange-local time.
 */
export function makeTradeId(ts: number, side: Side, price: number, offsetMinutes: number = IST_OFFSET_MINUTES): string {
  const date = exchangeDateString(ts, offsetMinutes).replace(/-/g, "");
  const time = formatTime(ts, offsetMinutes).replace(/:/g, "");
  return `${date}_${time}_${side}_${Math.trunc(price)}`;
}
