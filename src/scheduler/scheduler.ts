import type { SessionTimes } from "../config/settings.js";
import { IST_OFFSET_MINUTES, formatMinutes, minutesOfDay } from "../utils/timeUtils.js";
import { errorMessage } from "../utils/errors.js";

export interface ControlLoop {
  controlTick(now: number): Promise<void>;
}

/**
 * Next scheduled step of the trading day after `minutes` (exchange-local).
 */
export function nextTransition(minutes: number, times: SessionTimes): string {
  const steps: Array<[number, string]> = [
    [times.marketStart, "market open"],
    [times.referenceEnd, "provisional band"],
    [times.strikeSelection, "strike selection"],
    [times.tradingStart, "trading start"],
    [times.hardExit, "hard exit"],
    [times.marketEnd, "session summary"],
  ];
  for (const [at, label] of steps) {
    if (minutes < at) return `${label} at ${formatMinutes(at)}`;
  }
  return `market open tomorrow at ${formatMinutes(times.marketStart)}`;
}

/**
 * Polls the control loop once a second. Everything time-based lives in
 * controlTick(); the scheduler only supplies the clock.
 */
export class Scheduler {
  private checkInterval: NodeJS.Timeout | null = null;
  private lastLogTime = 0;

  constructor(
    private readonly loop: ControlLoop,
    private readonly times: SessionTimes,
    private readonly offsetMinutes: number = IST_OFFSET_MINUTES,
    private readonly intervalMs: number = 1000,
    private readonly now: () => number = Date.now
  ) {}

  start(): void {
    if (this.checkInterval) return;
    this.checkInterval = setInterval(() => {
      this.tick();
    }, this.intervalMs);

    // Initial tick
    this.tick();
  }

  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
  }

  private tick(): void {
    const now = this.now();

    // Once per minute to keep the log readable
    if (now - this.lastLogTime >= 60_000) {
      const minutes = minutesOfDay(now, this.offsetMinutes);
      console.log(`[Scheduler] Exchange time ${formatMinutes(minutes)} | Next: ${nextTransition(minutes, this.times)}`);
      this.lastLogTime = now;
    }

    this.loop.controlTick(now).catch((err: unknown) => {
      console.error(`[Scheduler] Control tick failed: ${errorMessage(err)}`);
    });
  }
}
