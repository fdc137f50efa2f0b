import type { BandSnapshot, BandStage, Candle, ReferenceBand } from "../types.js";

/**
 * R = highest high, G = lowest low, B = midpoint. Null when the window is
 * empty (data gap); the caller defers and retries.
 */
export function computeBand(candles: readonly Candle[]): ReferenceBand | null {
  if (candles.length === 0) return null;
  let resistance = Number.NEGATIVE_INFINITY;
  let support = Number.POSITIVE_INFINITY;
  for (const c of candles) {
    if (c.high > resistance) resistance = c.high;
    if (c.low < support) support = c.low;
  }
  return Object.freeze({ resistance, support, mid: (resistance + support) / 2 });
}

export type BandWindows = {
  index: readonly Candle[];
  call?: readonly Candle[];
  put?: readonly Candle[];
};

export type ComputedBands = {
  index: ReferenceBand | null;
  call?: ReferenceBand | null;
  put?: ReferenceBand | null;
};

export function computeBands(windows: BandWindows): ComputedBands {
  const out: ComputedBands = { index: computeBand(windows.index) };
  if (windows.call) out.call = computeBand(windows.call);
  if (windows.put) out.put = computeBand(windows.put);
  return out;
}

export function formatBand(band: ReferenceBand): string {
  return `R=${band.resistance.toFixed(2)} G=${band.support.toFixed(2)} B=${band.mid.toFixed(2)}`;
}

/**
 * Holds the current band snapshot. Publishing swaps the whole frozen object,
 * so a reader either sees the old snapshot or the new one.
 */
export class BandBook {
  private snapshot: BandSnapshot | null = null;

  current(): BandSnapshot | null {
    return this.snapshot;
  }

  isFinal(): boolean {
    return this.snapshot?.stage === "FINAL";
  }

  publish(stage: BandStage, bands: ComputedBands, computedAt: number): BandSnapshot | null {
    if (!bands.index) {
      console.warn(`[Band] ${stage} band skipped: index reference window is empty`);
      return null;
    }
    if (stage === "FINAL" && (!bands.call || !bands.put)) {
      console.warn("[Band] FINAL band skipped: option leg reference window is empty");
      return null;
    }
    if (this.snapshot?.stage === "FINAL" && stage === "PROVISIONAL") {
      console.warn("[Band] Ignoring PROVISIONAL band, FINAL already published");
      return this.snapshot;
    }

    const next: BandSnapshot = Object.freeze({
      stage,
      computedAt,
      index: bands.index,
      ...(bands.call ? { call: bands.call } : {}),
      ...(bands.put ? { put: bands.put } : {}),
    });
    this.snapshot = next;

    const legs = [
      `index ${formatBand(next.index)}`,
      next.call ? `call ${formatBand(next.call)}` : null,
      next.put ? `put ${formatBand(next.put)}` : null,
    ].filter(Boolean);
    console.log(`[Band] ${stage} band published: ${legs.join(" | ")}`);
    return next;
  }

  clear(): void {
    this.snapshot = null;
  }
}
