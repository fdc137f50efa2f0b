import { randomUUID } from "node:crypto";
import type {
  BandSnapshot,
  Candle,
  CandleSlice,
  EntryDecision,
  ExitDecision,
  ExitReason,
  FeedClient,
  HistoricalDataProvider,
  InstrumentId,
  InstrumentLookup,
  OrderSink,
  PersistenceSink,
  Position,
  StrategyDecision,
  Tick,
  TradeRecord,
} from "../types.js";
import { CandleAggregator, ingestBars } from "../datafeed/candleAggregator.js";
import { TickQueue } from "../datafeed/tickQueue.js";
import { BandBook, computeBand, computeBands } from "../strategy/referenceBand.js";
import { StrikeSelector, selectionComplete } from "../strategy/strikeSelector.js";
import { StrategySession, sessionConfigFrom, type SessionLegs, type SessionSnapshot } from "../strategy/strategySession.js";
import { SliceAssembler } from "./sliceAssembler.js";
import { dayTimestamps, type DayTimestamps, type SessionTimes, type StrategyParams } from "../config/settings.js";
import type { PersistedEngineState } from "../persistence/persistedState.js";
import { errorMessage } from "../utils/errors.js";
import { exchangeDateString, floorToInterval, formatDateTime, formatTime } from "../utils/timeUtils.js";

const MINUTE_MS = 60 * 1000;
const MAX_HELD_TICKS = 50_000;

export type OrchestratorConfig = {
  instanceId: string;
  indexToken: InstrumentId;
  strategy: StrategyParams;
  times: SessionTimes;
  offsetMinutes: number;
  sliceGraceMs?: number;          // Default: 3000
  dataWaitMs?: number;            // Default: 60000, how long a step waits for its last reference candle
  selectionRetryMs?: number;      // Default: 5000
};

/**
 * Things worth telling an operator about. Rendered by the Telegram layer.
 */
export type EngineEvent =
  | { type: "ENTRY"; position: Position; stopLoss: number; qty: number }
  | { type: "EXIT"; trade: TradeRecord }
  | { type: "ORDER_FAILED"; decision: StrategyDecision; message: string }
  | { type: "HALT"; date: string; dailyPnl: number; limit: number }
  | { type: "SUMMARY"; date: string; trades: TradeRecord[]; dailyPnl: number }
  | { type: "ORPHANED_POSITION"; position: Position };

export type OrchestratorDeps = {
  feed: FeedClient;
  historical: HistoricalDataProvider;
  sink: OrderSink;
  lookup: InstrumentLookup;
  journal?: PersistenceSink;
  onEvent?: (event: EngineEvent) => void;
  now?: () => number;
  // Off for drivers that own the clock: controlTick() drains the queue instead.
  autoDrain?: boolean;
};

export type OrchestratorStatus = {
  instanceId: string;
  date: string;
  band: BandSnapshot | null;
  legs: SessionLegs | null;
  session: SessionSnapshot;
  indexPrice: number | undefined;
  legPrice: number | undefined;
  queued: number;
  ticks: number;
  lateDropped: number;
  pendingSlices: number;
};

type LegPhase = "IDLE" | "SELECTED" | "READY";

/**
 * Live control loop. Ticks go through the queue into the aggregator;
 * completed 5-minute candles are grouped into slices and handed to the
 * StrategySession. Time-driven steps (reference band, strike selection,
 * hard exit, end of day) run from controlTick(), which the scheduler
 * polls every second.
 */
export class Orchestrator {
  private readonly orchId: string = randomUUID();
  private readonly aggregator: CandleAggregator;
  private readonly queue: TickQueue;
  private readonly bands = new BandBook();
  private readonly selector: StrikeSelector;
  private readonly assembler: SliceAssembler;
  private readonly now: () => number;
  private readonly autoDrain: boolean;
  private readonly sliceGraceMs: number;
  private readonly dataWaitMs: number;
  private readonly selectionRetryMs: number;

  private date: string;
  private clock: DayTimestamps;
  private session: StrategySession;
  private legPhase: LegPhase = "IDLE";
  private legs: SessionLegs | null = null;
  private provisionalDone = false;
  private nextSelectionAttempt = 0;
  private haltNotified = false;
  private summarySent = false;
  private busy = false;
  private started = false;
  private ticksSeen = 0;
  private readonly heldLegs: Set<InstrumentId> = new Set();
  private heldTicks: Tick[] = [];
  private heldDropped = 0;
  private readonly deferLogged: Map<string, number> = new Map();

  constructor(
    private readonly config: OrchestratorConfig,
    private readonly deps: OrchestratorDeps
  ) {
    this.now = deps.now ?? Date.now;
    this.autoDrain = deps.autoDrain ?? true;
    this.sliceGraceMs = config.sliceGraceMs ?? 3000;
    this.dataWaitMs = config.dataWaitMs ?? MINUTE_MS;
    this.selectionRetryMs = config.selectionRetryMs ?? 5000;

    this.aggregator = new CandleAggregator({ intervals: [1, config.strategy.candleInterval], offsetMinutes: config.offsetMinutes });
    this.queue = new TickQueue((tick) => {
      this.ticksSeen++;
      if (this.heldLegs.has(tick.instrumentId)) {
        this.holdTick(tick);
        return;
      }
      this.aggregator.ingestTick(tick.instrumentId, tick.price, tick.ts);
    });
    this.selector = new StrikeSelector(deps.lookup, config.strategy.strikeOffset, config.strategy.strikeStep);
    this.assembler = new SliceAssembler(config.strategy.candleInterval, this.sliceGraceMs, config.offsetMinutes);

    this.aggregator.onComplete(config.strategy.candleInterval, (candle) => {
      this.assembler.add(candle);
      this.journalCandle(candle);
    });
    this.aggregator.onComplete(1, (candle) => this.journalCandle(candle));

    this.date = exchangeDateString(this.now(), config.offsetMinutes);
    this.clock = dayTimestamps(this.date, config.times, config.offsetMinutes);
    this.session = this.newSession(this.date);
    this.assembler.setTracked({ INDEX: config.indexToken });

    console.log(`[Orchestrator] init id=${this.orchId} instance=${config.instanceId} date=${this.date}`);
  }

  /**
   * Subscribe the index, backfill anything missed since market open, then
   * connect the feed.
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    this.deps.feed.onTick((id, price, ts) => this.queue.push(id, price, ts));
    this.deps.feed.subscribe([this.config.indexToken]);

    const now = this.now();
    const backfillEnd = Math.min(floorToInterval(now, 1, this.config.offsetMinutes), this.clock.marketEnd);
    if (backfillEnd > this.clock.marketStart) {
      const accepted = await this.backfill(this.config.indexToken, this.clock.marketStart, backfillEnd);
      console.log(
        `[Orchestrator] Late start: backfilled ${accepted} index bars ${formatTime(this.clock.marketStart, this.config.offsetMinutes)}-${formatTime(backfillEnd, this.config.offsetMinutes)}`
      );
    }

    await this.deps.feed.start();
    if (this.autoDrain) this.queue.startAutoDrain();
    console.log(`[Orchestrator] Started, waiting for ticks on ${this.config.indexToken}`);
  }

  /**
   * One control-loop step. Re-entrant calls while a step is still running
   * (an order in flight, a backfill) are skipped.
   */
  async controlTick(now: number = this.now()): Promise<void> {
    if (this.busy) return;
    this.busy = true;
    try {
      this.checkRollover(now);
      if (!this.autoDrain) this.queue.drain();

      for (const slice of this.assembler.takeReady(now)) {
        await this.handleSlice(slice, now);
      }

      this.maybeProvisionalBand(now);
      await this.maybeSelectStrikes(now);
      await this.clockChecks(now);
      this.maybeSummary(now);
    } catch (err) {
      console.error(`[Orchestrator] Control tick failed: ${errorMessage(err)}`);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Operator exit at the last traded price of the open leg.
   */
  async manualExit(reason: ExitReason = "MANUAL"): Promise<string> {
    const position = this.session.getPosition();
    if (!position) return "No open position";
    const now = this.now();
    const decision = this.session.requestExit(reason, now, this.aggregator.lastPrice(position.contract.instrumentId));
    if (!decision) return "Exit not possible while an order is pending";
    await this.execute(decision, now);
    return this.session.getPosition() ? `Exit of ${position.tradeId} failed, position still open` : `Closed ${position.tradeId}`;
  }

  async shutdown(): Promise<void> {
    this.queue.stopAutoDrain();
    if (this.session.getPosition()) {
      console.warn("[Orchestrator] Shutting down with an open position, sending exit");
      const message = await this.manualExit("SHUTDOWN");
      console.log(`[Orchestrator] ${message}`);
    }
    this.deps.feed.close();
  }

  /**
   * Carry realized P&L of the same trading day over a restart.
   */
  restore(state: PersistedEngineState): void {
    if (state.tradingDate !== this.date) {
      console.log(`[Orchestrator] Persisted state is for ${state.tradingDate}, starting ${this.date} fresh`);
      return;
    }
    this.session.restoreDailyPnl(state.dailyPnl);
    if (state.openPosition) {
      console.warn(
        `[Orchestrator] Previous run left ${state.openPosition.side} ${state.openPosition.contract.symbol} open (${state.openPosition.tradeId}); not managed by this run`
      );
      this.emit({ type: "ORPHANED_POSITION", position: state.openPosition });
    }
  }

  toPersisted(): PersistedEngineState {
    return {
      version: 1,
      instanceId: this.config.instanceId,
      savedAt: this.now(),
      tradingDate: this.date,
      dailyPnl: this.session.getDailyPnl(),
      tradesToday: this.session.getTrades().length,
      openPosition: this.session.getPosition(),
    };
  }

  getStatus(): OrchestratorStatus {
    const position = this.session.getPosition();
    return {
      instanceId: this.config.instanceId,
      date: this.date,
      band: this.bands.current(),
      legs: this.legs,
      session: this.session.snapshot(),
      indexPrice: this.aggregator.lastPrice(this.config.indexToken),
      legPrice: position ? this.aggregator.lastPrice(position.contract.instrumentId) : undefined,
      queued: this.queue.size(),
      ticks: this.ticksSeen,
      lateDropped: this.aggregator.getLateDropped(),
      pendingSlices: this.assembler.pendingCount(),
    };
  }

  getTrades(): TradeRecord[] {
    return this.session.getTrades();
  }

  getSession(): StrategySession {
    return this.session;
  }

  // ---------------------------------------------------------------------------
  // Control steps
  // ---------------------------------------------------------------------------

  private checkRollover(now: number): void {
    const today = exchangeDateString(now, this.config.offsetMinutes);
    if (today === this.date) return;

    const open = this.session.getPosition();
    if (open) {
      console.warn(`[Orchestrator] Day rollover with ${open.tradeId} still open, no longer managed`);
      this.emit({ type: "ORPHANED_POSITION", position: open });
    }
    console.log(`[Orchestrator] Day rollover ${this.date} -> ${today}`);
    this.date = today;
    this.clock = dayTimestamps(today, this.config.times, this.config.offsetMinutes);
    this.aggregator.reset();
    this.bands.clear();
    this.assembler.reset();
    this.assembler.setTracked({ INDEX: this.config.indexToken });
    this.session = this.newSession(today);
    this.legPhase = "IDLE";
    this.legs = null;
    this.provisionalDone = false;
    this.nextSelectionAttempt = 0;
    this.haltNotified = false;
    this.summarySent = false;
    this.deferLogged.clear();
    this.heldLegs.clear();
    this.heldTicks = [];
  }

  private async handleSlice(slice: CandleSlice, now: number): Promise<void> {
    const decision = this.session.processSlice(slice);
    if (decision) await this.execute(decision, now);
  }

  private maybeProvisionalBand(now: number): void {
    if (this.provisionalDone || now < this.clock.referenceEnd || now >= this.clock.hardExit) return;
    const lastMinute = this.clock.referenceEnd - MINUTE_MS;
    const candles = this.aggregator.getWindow(this.config.indexToken, this.clock.referenceStart, this.clock.referenceEnd, 1);
    const haveLast = candles.some((c) => c.windowStart === lastMinute);
    if (!haveLast && now < this.clock.referenceEnd + this.dataWaitMs) {
      this.logDefer("provisional", now, "Provisional band deferred: last reference minute not complete yet");
      return;
    }
    const band = computeBand(candles);
    if (!band) {
      this.logDefer("provisional", now, "Provisional band deferred: no index candles in reference window");
      return;
    }
    // A FINAL band may already be out on a late start.
    if (!this.bands.isFinal()) this.bands.publish("PROVISIONAL", { index: band }, now);
    this.provisionalDone = true;
  }

  private async maybeSelectStrikes(now: number): Promise<void> {
    if (this.legPhase === "READY") return;
    if (now < this.clock.strikeSelection || now >= this.clock.hardExit) return;
    if (now < this.nextSelectionAttempt) return;

    const interval = this.config.strategy.candleInterval;
    const lastWindow = this.clock.referenceEnd - interval * MINUTE_MS;
    const indexWindow = this.aggregator.getWindow(
      this.config.indexToken,
      this.clock.referenceStart,
      this.clock.referenceEnd,
      interval
    );
    if (!indexWindow.some((c) => c.windowStart === lastWindow) && now < this.clock.strikeSelection + this.dataWaitMs) {
      this.logDefer("selection", now, "Strike selection deferred: last reference candle not complete yet");
      return;
    }

    if (this.legPhase === "IDLE") {
      const spot = this.aggregator.lastPrice(this.config.indexToken);
      if (spot === undefined) {
        this.logDefer("selection", now, "Strike selection deferred: no index price yet");
        return;
      }
      const selection = this.selector.select(spot, this.date);
      if (!selectionComplete(selection)) {
        const reasons = [selection.call, selection.put].flatMap((leg) => (leg.ok ? [] : [leg.reason]));
        console.warn(`[Orchestrator] Strike selection incomplete, retrying: ${reasons.join("; ")}`);
        this.nextSelectionAttempt = now + this.selectionRetryMs;
        return;
      }
      this.legs = {
        index: this.config.indexToken,
        call: selection.call.contract,
        put: selection.put.contract,
      };
      this.legPhase = "SELECTED";
    }

    const legs = this.legs;
    if (!legs) return;
    const ready = await this.prepareLegs(legs, now);
    if (!ready) {
      this.nextSelectionAttempt = now + this.selectionRetryMs;
      return;
    }
    this.session.setLegs(legs);
    this.legPhase = "READY";
  }

  /**
   * Subscribe both legs, backfill their history since market open and swap
   * in the final band. Leg ticks are held outside the aggregator until the
   * band is out, so no live candle gets ahead of the backfill however many
   * attempts it takes.
   */
  private async prepareLegs(legs: SessionLegs, now: number): Promise<boolean> {
    const callId = legs.call.instrumentId;
    const putId = legs.put.instrumentId;

    this.heldLegs.add(callId);
    this.heldLegs.add(putId);
    this.deps.feed.subscribe([callId, putId]);
    this.assembler.setTracked({ INDEX: legs.index, CALL: callId, PUT: putId });

    const end = floorToInterval(now, 1, this.config.offsetMinutes);
    const [callBars, putBars] = await Promise.all([
      this.backfill(callId, this.clock.marketStart, end),
      this.backfill(putId, this.clock.marketStart, end),
    ]);
    console.log(`[Orchestrator] Backfilled ${callBars} ${legs.call.symbol} and ${putBars} ${legs.put.symbol} bars`);

    const interval = this.config.strategy.candleInterval;
    const window = (id: InstrumentId): Candle[] =>
      this.aggregator.getWindow(id, this.clock.referenceStart, this.clock.referenceEnd, interval);
    const published = this.bands.publish(
      "FINAL",
      computeBands({ index: window(legs.index), call: window(callId), put: window(putId) }),
      now
    );
    if (!published) {
      console.warn(`[Orchestrator] Final band not available yet, will retry (${this.heldTicks.length} leg ticks held)`);
      return false;
    }
    this.releaseHeldTicks();
    return true;
  }

  private holdTick(tick: Tick): void {
    if (this.heldTicks.length >= MAX_HELD_TICKS) {
      this.heldTicks.shift();
      this.heldDropped++;
      if (this.heldDropped === 1 || this.heldDropped % 1000 === 0) {
        console.warn(`[Orchestrator] Held leg ticks full (${MAX_HELD_TICKS}), dropped oldest (total dropped=${this.heldDropped})`);
      }
    }
    this.heldTicks.push(tick);
  }

  /**
   * Apply leg ticks that arrived while history was loading. Minutes already
   * covered by backfilled bars are dropped as late by the aggregator.
   */
  private releaseHeldTicks(): void {
    const ticks = this.heldTicks;
    this.heldTicks = [];
    this.heldLegs.clear();
    for (const tick of ticks) {
      this.aggregator.ingestTick(tick.instrumentId, tick.price, tick.ts);
    }
    if (ticks.length > 0) console.log(`[Orchestrator] Applied ${ticks.length} leg ticks held during backfill`);
  }

  private async clockChecks(now: number): Promise<void> {
    const position = this.session.getPosition();
    const price = position ? this.aggregator.lastPrice(position.contract.instrumentId) : undefined;
    const decision = this.session.onClock(now, price);
    if (decision) await this.execute(decision, now);
    this.maybeNotifyHalt();
  }

  private maybeSummary(now: number): void {
    if (this.summarySent || now < this.clock.marketEnd) return;
    this.summarySent = true;
    const trades = this.session.getTrades();
    const pnl = this.session.getDailyPnl();
    console.log(`[Orchestrator] Session ${this.date} closed: ${trades.length} trades, P&L ${pnl.toFixed(2)}`);
    console.log(
      `[PULSE] ${JSON.stringify({ type: "day_summary", date: this.date, trades: trades.length, pnl: Number(pnl.toFixed(2)) })}`
    );
    this.emit({ type: "SUMMARY", date: this.date, trades, dailyPnl: pnl });
  }

  private maybeNotifyHalt(): void {
    if (this.haltNotified || !this.session.isHalted()) return;
    this.haltNotified = true;
    this.emit({
      type: "HALT",
      date: this.date,
      dailyPnl: this.session.getDailyPnl(),
      limit: this.config.strategy.dailyLossLimit,
    });
  }

  // ---------------------------------------------------------------------------
  // Order execution
  // ---------------------------------------------------------------------------

  private async execute(decision: StrategyDecision, now: number): Promise<void> {
    if (decision.type === "ENTER") {
      await this.executeEntry(decision);
    } else {
      await this.executeExit(decision, now);
    }
  }

  private async executeEntry(decision: EntryDecision): Promise<void> {
    const qty = this.session.quantityFor(decision.contract);
    let failure: string;
    try {
      const result = await this.deps.sink.placeEntry({
        tradeId: decision.tradeId,
        side: decision.side,
        contract: decision.contract,
        qty,
        price: decision.price,
        ts: decision.ts,
        stopLoss: decision.stopLoss,
      });
      if (result.status === "success") {
        const position = this.session.confirmEntry(decision, result.price);
        if (position) this.emit({ type: "ENTRY", position, stopLoss: decision.stopLoss, qty });
        return;
      }
      failure = result.message;
    } catch (err) {
      failure = errorMessage(err);
    }
    this.session.rejectEntry(decision, failure);
    this.emit({ type: "ORDER_FAILED", decision, message: failure });
  }

  private async executeExit(decision: ExitDecision, now: number): Promise<void> {
    let failure: string;
    try {
      const result = await this.deps.sink.placeExit({
        tradeId: decision.tradeId,
        side: decision.side,
        contract: decision.contract,
        qty: this.session.quantityFor(decision.contract),
        price: decision.price,
        ts: decision.ts,
        reason: decision.reason,
      });
      if (result.status === "success") {
        const trade = this.session.confirmExit(decision, result.price);
        if (trade) {
          this.deps.journal?.saveTrade(trade);
          this.emit({ type: "EXIT", trade });
          this.maybeNotifyHalt();
        }
        return;
      }
      failure = result.message;
    } catch (err) {
      failure = errorMessage(err);
    }
    this.session.exitFailed(decision, failure, now);
    this.emit({ type: "ORDER_FAILED", decision, message: failure });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async backfill(id: InstrumentId, from: number, to: number): Promise<number> {
    if (to <= from) return 0;
    try {
      const bars = await this.deps.historical.fetch(id, from, to, "minute");
      return ingestBars(this.aggregator, id, bars, false);
    } catch (err) {
      console.error(`[Orchestrator] Backfill for ${id} failed: ${errorMessage(err)}`);
      return 0;
    }
  }

  private newSession(date: string): StrategySession {
    const config = {
      ...sessionConfigFrom(this.config.strategy, this.config.times, this.config.offsetMinutes),
      hardExitClockGraceMs: this.sliceGraceMs + 2000,
    };
    return new StrategySession(date, config, this.aggregator, this.bands);
  }

  private journalCandle(candle: Candle): void {
    const journal = this.deps.journal;
    if (!journal) return;
    journal.saveCandle(candle, this.labelOf(candle.instrumentId));
  }

  private labelOf(id: InstrumentId): string {
    if (id === this.config.indexToken) return "INDEX";
    if (this.legs?.call.instrumentId === id) return this.legs.call.symbol;
    if (this.legs?.put.instrumentId === id) return this.legs.put.symbol;
    return String(id);
  }

  private emit(event: EngineEvent): void {
    const handler = this.deps.onEvent;
    if (!handler) return;
    try {
      handler(event);
    } catch (err) {
      console.error(`[Orchestrator] Event handler failed for ${event.type}: ${errorMessage(err)}`);
    }
  }

  private logDefer(key: string, now: number, message: string): void {
    const last = this.deferLogged.get(key);
    if (last !== undefined && now - last < 30_000) return;
    this.deferLogged.set(key, now);
    console.log(`[Orchestrator] ${message} (${formatDateTime(now, this.config.offsetMinutes)})`);
  }
}
