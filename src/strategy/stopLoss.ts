export type StopLossState = Readonly<{
  entryPrice: number;
  currentStop: number;
  breakevenReached: boolean;
  referenceLow: number;
  referenceMid: number;
  referenceHigh: number;
  lastTrailingLevel: number;
  maxStop: number;
}>;

export type StopStage = "MID" | "HIGH" | "BREAKEVEN" | "TRAIL";

export type StopUpdate = {
  stage: StopStage;
  from: number;
  to: number;
};

/**
 * Per-trade stop. Before breakeven the progressive rules are checked in
 * order and only the first match applies per call:
 *   1. price >= entry + (mid - low)   and stop < mid   -> stop = mid
 *   2. price >= entry + (high - low)  and stop < high  -> stop = high
 *   3. price >= entry + (entry - low) and stop < entry -> stop = entry, breakeven
 * After breakeven the stop trails in whole increments above entry.
 */
export class StopLossManager {
  private state: StopLossState;

  constructor(
    entryPrice: number,
    referenceLow: number,
    referenceMid: number,
    referenceHigh: number,
    private readonly trailingIncrement: number
  ) {
    if (!(trailingIncrement > 0)) {
      throw new Error(`Trailing increment must be > 0 (got ${trailingIncrement})`);
    }
    this.state = {
      entryPrice,
      currentStop: referenceLow,
      breakevenReached: false,
      referenceLow,
      referenceMid,
      referenceHigh,
      lastTrailingLevel: entryPrice,
      maxStop: referenceLow,
    };
  }

  getState(): StopLossState {
    return this.state;
  }

  get stop(): number {
    return this.state.currentStop;
  }

  advanceProgressive(price: number): StopUpdate | null {
    const s = this.state;
    if (s.breakevenReached) return null;

    const entry = s.entryPrice;
    const low = s.referenceLow;

    if (price >= entry + (s.referenceMid - low) && s.currentStop < s.referenceMid) {
      return this.move("MID", s.referenceMid, false);
    }
    if (price >= entry + (s.referenceHigh - low) && s.currentStop < s.referenceHigh) {
      return this.move("HIGH", s.referenceHigh, false);
    }
    if (price >= entry + (entry - low) && s.currentStop < entry) {
      return this.move("BREAKEVEN", entry, true);
    }
    return null;
  }

  advanceTrailing(price: number): StopUpdate | null {
    const s = this.state;
    if (!s.breakevenReached) return null;

    const n = Math.trunc((price - s.entryPrice) / this.trailingIncrement);
    if (n <= 0) return null;

    const level = s.entryPrice + n * this.trailingIncrement;
    if (level <= s.lastTrailingLevel) return null;

    const update = this.move("TRAIL", level, true);
    this.state = { ...this.state, lastTrailingLevel: level };
    return update;
  }

  checkHit(lowPrice: number): boolean {
    return lowPrice <= this.state.currentStop;
  }

  private move(stage: StopStage, to: number, breakeven: boolean): StopUpdate {
    const from = this.state.currentStop;
    this.state = {
      ...this.state,
      currentStop: to,
      breakevenReached: breakeven,
      maxStop: Math.max(this.state.maxStop, to),
    };
    return { stage, from, to };
  }
}
