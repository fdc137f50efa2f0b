import type { Candle, ReferenceBand, Side } from "../types.js";
import { IST_OFFSET_MINUTES, formatTime, minutesOfDay } from "../utils/timeUtils.js";

export type EntryPhase = "WAITING" | "ARMED" | "POSITIONED" | "REARM_PENDING";

export type EntryState = Readonly<{
  phase: EntryPhase;
  previousCandle: Candle | null;
  pendingRearmSide: Side | null;
  positionSide: Side | null;
}>;

export type EntrySignal = {
  side: Side;
  candle: Candle;
  previous: Candle;
};

const INITIAL_STATE: EntryState = {
  phase: "WAITING",
  previousCandle: null,
  pendingRearmSide: null,
  positionSide: null,
};

/**
 * Two-candle breakout confirmation on successive index candles:
 *   CALL: P.close > R, C.close > R, C.close > P.close
 *   PUT:  P.close < G, C.close < G, C.close < P.close
 * After a close the same side stays blocked until two successive closes are
 * back inside the band on that side.
 */
export class EntryDetector {
  private state: EntryState = INITIAL_STATE;

  constructor(
    private readonly tradingStartMinutes: number,
    private readonly offsetMinutes: number = IST_OFFSET_MINUTES
  ) {}

  getState(): EntryState {
    return this.state;
  }

  /**
   * Feed the next completed index candle. Returns a signal when one is
   * confirmed; the detector is then POSITIONED until notifyClosed() or
   * abandon().
   */
  onCandle(candle: Candle, band: ReferenceBand | null): EntrySignal | null {
    if (!this.accept(candle)) return null;

    const previous = this.state.previousCandle;
    if (this.state.phase === "WAITING" || !previous) {
      this.state = { ...this.state, phase: this.state.phase === "WAITING" ? "ARMED" : this.state.phase, previousCandle: candle };
      console.log(`[Entry] Armed at ${formatTime(candle.windowStart, this.offsetMinutes)} candle`);
      return null;
    }

    if (this.state.phase === "POSITIONED") {
      this.state = { ...this.state, previousCandle: candle };
      return null;
    }

    if (!band) {
      console.warn(`[Entry] No reference band for ${formatTime(candle.windowStart, this.offsetMinutes)} candle, skipping evaluation`);
      this.state = { ...this.state, previousCandle: candle };
      return null;
    }

    if (this.state.phase === "REARM_PENDING") {
      const side = this.state.pendingRearmSide;
      const cleared =
        side === "CALL"
          ? previous.close <= band.resistance && candle.close <= band.resistance
          : previous.close >= band.support && candle.close >= band.support;
      if (cleared) {
        console.log(
          `[Entry] Re-armed ${side} after closes ${previous.close.toFixed(2)}, ${candle.close.toFixed(2)} back inside band`
        );
        this.state = { ...this.state, phase: "ARMED", pendingRearmSide: null, previousCandle: candle };
      } else {
        this.state = { ...this.state, previousCandle: candle };
      }
      return null;
    }

    const side = evaluateSignal(previous, candle, band);
    this.state = { ...this.state, previousCandle: candle };
    if (!side) return null;

    this.state = { ...this.state, phase: "POSITIONED", positionSide: side };
    console.log(
      `[Entry] ${side} signal at ${formatTime(candle.windowStart, this.offsetMinutes)}: P.close=${previous.close.toFixed(2)} C.close=${candle.close.toFixed(2)} R=${band.resistance.toFixed(2)} G=${band.support.toFixed(2)}`
    );
    return { side, candle, previous };
  }

  /**
   * Track the candle as P without evaluating a signal.
   */
  observe(candle: Candle): void {
    if (!this.accept(candle)) return;
    const phase = this.state.phase === "WAITING" ? "ARMED" : this.state.phase;
    this.state = { ...this.state, phase, previousCandle: candle };
  }

  notifyClosed(): void {
    const side = this.state.positionSide;
    if (this.state.phase !== "POSITIONED" || !side) {
      console.warn(`[Entry] notifyClosed() while ${this.state.phase}, ignoring`);
      return;
    }
    this.state = { ...this.state, phase: "REARM_PENDING", pendingRearmSide: side, positionSide: null };
    console.log(`[Entry] Position closed, ${side} pending re-arm`);
  }

  /**
   * The caller could not act on the last signal.
   */
  abandon(): void {
    if (this.state.phase !== "POSITIONED") return;
    this.state = { ...this.state, phase: "ARMED", positionSide: null };
  }

  reset(): void {
    this.state = INITIAL_STATE;
  }

  private accept(candle: Candle): boolean {
    if (minutesOfDay(candle.windowStart, this.offsetMinutes) < this.tradingStartMinutes) {
      return false;
    }
    const previous = this.state.previousCandle;
    if (previous && previous.instrumentId !== candle.instrumentId) {
      console.warn(
        `[Entry] Rejected candle for instrument ${candle.instrumentId}, tracking ${previous.instrumentId}`
      );
      return false;
    }
    if (previous && candle.windowStart <= previous.windowStart) {
      console.warn(`[Entry] Rejected out-of-order candle ${formatTime(candle.windowStart, this.offsetMinutes)}`);
      return false;
    }
    return true;
  }
}

export function evaluateSignal(previous: Candle, current: Candle, band: ReferenceBand): Side | null {
  if (previous.close > band.resistance && current.close > band.resistance && current.close > previous.close) {
    return "CALL";
  }
  if (previous.close < band.support && current.close < band.support && current.close < previous.close) {
    return "PUT";
  }
  return null;
}
