import type { Candle, CandleSlice, InstrumentId, LegRole } from "../types.js";
import { IST_OFFSET_MINUTES, formatTime } from "../utils/timeUtils.js";

type Tracked = Partial<Record<LegRole, InstrumentId>>;

/**
 * Groups completed candles of the tracked instruments by window. A slice is
 * released once every tracked instrument has reported for that window or
 * the grace period after the window close has passed. Slices leave in
 * window order.
 */
export class SliceAssembler {
  private tracked: Tracked = {};
  private readonly pending: Map<number, CandleSlice> = new Map();
  private lastReleased: number | null = null;

  constructor(
    private readonly intervalMinutes: number,
    private readonly graceMs: number,
    private readonly offsetMinutes: number = IST_OFFSET_MINUTES
  ) {}

  setTracked(tracked: Tracked): void {
    this.tracked = { ...tracked };
  }

  add(candle: Candle): void {
    if (candle.intervalMinutes !== this.intervalMinutes) return;
    const role = this.roleOf(candle.instrumentId);
    if (!role) return;

    if (this.lastReleased !== null && candle.windowStart <= this.lastReleased) {
      console.warn(
        `[Slices] Late ${role} candle ${formatTime(candle.windowStart, this.offsetMinutes)} after slice release, dropped`
      );
      return;
    }

    const slice = this.pending.get(candle.windowStart) ?? {
      windowStart: candle.windowStart,
      closeTs: candle.windowStart + this.intervalMinutes * 60 * 1000,
    };
    if (role === "INDEX") slice.index = candle;
    else if (role === "CALL") slice.call = candle;
    else slice.put = candle;
    this.pending.set(candle.windowStart, slice);
  }

  /**
   * Slices ready at `now`, oldest first. Stops at the first window that is
   * still waiting so order is preserved.
   */
  takeReady(now: number): CandleSlice[] {
    const ready: CandleSlice[] = [];
    const keys = [...this.pending.keys()].sort((a, b) => a - b);
    for (const key of keys) {
      const slice = this.pending.get(key);
      if (!slice) continue;
      const complete = this.isComplete(slice);
      if (!complete && now < slice.closeTs + this.graceMs) break;
      if (!complete) {
        console.warn(
          `[Slices] Releasing ${formatTime(slice.windowStart, this.offsetMinutes)} slice without ${this.missing(slice).join(", ")}`
        );
      }
      this.pending.delete(key);
      this.lastReleased = key;
      ready.push(slice);
    }
    return ready;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  reset(): void {
    this.pending.clear();
    this.lastReleased = null;
    this.tracked = {};
  }

  private isComplete(slice: CandleSlice): boolean {
    return this.missing(slice).length === 0;
  }

  private missing(slice: CandleSlice): LegRole[] {
    const out: LegRole[] = [];
    if (this.tracked.INDEX !== undefined && !slice.index) out.push("INDEX");
    if (this.tracked.CALL !== undefined && !slice.call) out.push("CALL");
    if (this.tracked.PUT !== undefined && !slice.put) out.push("PUT");
    return out;
  }

  private roleOf(id: InstrumentId): LegRole | null {
    if (this.tracked.INDEX === id) return "INDEX";
    if (this.tracked.CALL === id) return "CALL";
    if (this.tracked.PUT === id) return "PUT";
    return null;
  }
}
