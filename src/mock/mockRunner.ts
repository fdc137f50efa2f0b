import type { Orchestrator } from "../orchestrator/orchestrator.js";
import type { ReplayFeed } from "./replayFeed.js";
import { formatDateTime } from "../utils/timeUtils.js";

/**
 * Clock handed to the orchestrator in replay runs. Only the driver moves it.
 */
export class ManualClock {
  constructor(private current: number) {}

  now = (): number => this.current;

  set(ts: number): void {
    if (ts < this.current) {
      throw new Error(`Clock cannot move backwards (${ts} < ${this.current})`);
    }
    this.current = ts;
  }
}

export type ReplayWindow = {
  start: number;
  end: number;
  stepMs?: number;     // Default: 15000, one step per replayed tick
};

export type ReplayProgress = {
  steps: number;
  ticks: number;
};

/**
 * Drive the orchestrator through a stored stretch of market time: move the
 * clock, release the ticks that are due, then run one control step.
 */
export async function runReplay(
  orch: Orchestrator,
  feed: ReplayFeed,
  clock: ManualClock,
  window: ReplayWindow
): Promise<ReplayProgress> {
  const stepMs = window.stepMs ?? 15_000;
  if (stepMs <= 0) throw new Error(`stepMs must be > 0 (got ${stepMs})`);

  let steps = 0;
  let ticks = 0;
  for (let t = window.start; t <= window.end; t += stepMs) {
    clock.set(t);
    ticks += feed.advanceTo(t);
    await orch.controlTick(t);
    steps++;
  }
  console.log(
    `[Replay] ${formatDateTime(window.start)} -> ${formatDateTime(window.end)}: ${steps} steps, ${ticks} ticks`
  );
  return { steps, ticks };
}
