import { Orchestrator, type EngineEvent } from "../../src/orchestrator/orchestrator.js";
import { ReplayFeed, ReplayHistoricalProvider, ReplayInstrumentLookup, type ReplayIds } from "../../src/mock/replayFeed.js";
import { ManualClock, runReplay } from "../../src/mock/mockRunner.js";
import { PaperOrderSink } from "../../src/execution/orderSink.js";
import type { MarketRow } from "../../src/datafeed/historicalCsv.js";
import type { HistoricalDataProvider, OrderSink } from "../../src/types.js";
import { OFFSET, STRATEGY, TIMES, at } from "./bandScenario.js";

export const REPLAY_IDS: ReplayIds = { INDEX: 256265, CALL: 256266, PUT: 256267 };

const STEP_MS = 15_000;

export type ReplayHarness = {
  orch: Orchestrator;
  clock: ManualClock;
  events: EngineEvent[];
  /** Replay up to and including the given exchange-local time. */
  runUntil: (hhmm: string, seconds?: number) => Promise<void>;
};

export type ReplayOptions = {
  sink?: OrderSink;
  /** Wraps the stored-rows history provider. */
  historical?: (stored: HistoricalDataProvider) => HistoricalDataProvider;
};

/**
 * Full live path (feed, queue, aggregator, slices, session, sink) over stored
 * rows, driven by a manual clock from market open.
 */
export async function startReplay(rows: readonly MarketRow[], options: ReplayOptions = {}): Promise<ReplayHarness> {
  const feed = new ReplayFeed(rows, REPLAY_IDS);
  const stored = new ReplayHistoricalProvider(rows, REPLAY_IDS);
  const clock = new ManualClock(at("09:15"));
  const events: EngineEvent[] = [];
  const orch = new Orchestrator(
    { instanceId: "test-engine", indexToken: REPLAY_IDS.INDEX, strategy: STRATEGY, times: TIMES, offsetMinutes: OFFSET },
    {
      feed,
      historical: options.historical ? options.historical(stored) : stored,
      sink: options.sink ?? new PaperOrderSink(),
      lookup: new ReplayInstrumentLookup(REPLAY_IDS, "NIFTY", STRATEGY.lotSize),
      onEvent: (event) => events.push(event),
      now: clock.now,
      autoDrain: false,
    }
  );
  await orch.start();

  let next = clock.now();
  const runUntil = async (hhmm: string, seconds = 0): Promise<void> => {
    const end = at(hhmm) + seconds * 1000;
    if (end < next) return;
    await runReplay(orch, feed, clock, { start: next, end, stepMs: STEP_MS });
    next = end + STEP_MS;
  };
  return { orch, clock, events, runUntil };
}
