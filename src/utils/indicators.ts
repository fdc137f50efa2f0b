/**
 * Compute RSI over the last `period` close-to-close changes
 * (simple mean of gains and losses).
 * Undefined when history is short or the window shows no movement at all.
 */
export function computeRsi(closes: readonly number[], period: number): number | undefined {
  if (period < 1 || closes.length < period + 1) {
    return undefined;
  }

  let gains = 0;
  let losses = 0;
  const start = closes.length - period;
  for (let i = start; i < closes.length; i++) {
    const current = closes[i];
    const previous = closes[i - 1];
    if (current === undefined || previous === undefined) return undefined;
    const delta = current - previous;
    if (delta > 0) gains += delta;
    else losses -= delta;
  }

  const avgGain = gains / period;
  const avgLoss = losses / period;

  if (avgLoss === 0) {
    return avgGain === 0 ? undefined : 100;
  }

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function trackPeak(current: number, peak: number | undefined): number {
  return peak === undefined ? current : Math.max(peak, current);
}

export function shouldExitOnDrop(current: number, peak: number | undefined, threshold: number): boolean {
  if (peak === undefined) return false;
  return peak - current >= threshold;
}

export type OscillatorReading = {
  value: number | undefined;
  peak: number | undefined;
  exit: boolean;
};

/**
 * Per-trade oscillator peak tracker. A reading without a value never exits
 * and never moves the peak.
 */
export class OscillatorTracker {
  private peak: number | undefined;

  constructor(
    private readonly period: number,
    private readonly dropThreshold: number
  ) {}

  update(closes: readonly number[]): OscillatorReading {
    const value = computeRsi(closes, this.period);
    if (value === undefined) {
      return { value, peak: this.peak, exit: false };
    }
    const exit = shouldExitOnDrop(value, this.peak, this.dropThreshold);
    this.peak = trackPeak(value, this.peak);
    return { value, peak: this.peak, exit };
  }

  getPeak(): number | undefined {
    return this.peak;
  }
}
