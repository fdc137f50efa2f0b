import type {
  FeedClient,
  HistoricalBar,
  HistoricalDataProvider,
  InstrumentId,
  InstrumentLookup,
  LegRole,
  OHLC,
  OptionContract,
  OptionType,
  Tick,
  TickHandler,
} from "../types.js";
import type { MarketRow } from "../datafeed/historicalCsv.js";
import { errorMessage } from "../utils/errors.js";

export type ReplayIds = Record<LegRole, InstrumentId>;

// Offsets inside each stored minute at which its prices are replayed.
const TICK_OFFSETS_MS: ReadonlyArray<readonly [keyof OHLC, number]> = [
  ["open", 0],
  ["high", 15_000],
  ["low", 30_000],
  ["close", 45_000],
];

function legOf(row: MarketRow, role: LegRole): OHLC {
  return role === "INDEX" ? row.index : role === "CALL" ? row.call : row.put;
}

/**
 * Replays stored 1-minute rows as ticks (open, high, low, close spaced
 * 15s apart). Time only moves when advanceTo() is called, so a driver
 * controls the clock.
 */
export class ReplayFeed implements FeedClient {
  private readonly ticks: Map<InstrumentId, Tick[]> = new Map();
  private readonly cursors: Map<InstrumentId, number> = new Map();
  private readonly handlers: TickHandler[] = [];
  private lastAdvance: number = Number.NEGATIVE_INFINITY;

  constructor(rows: readonly MarketRow[], private readonly ids: ReplayIds) {
    for (const role of ["INDEX", "CALL", "PUT"] as const) {
      const id = ids[role];
      const list: Tick[] = [];
      for (const row of rows) {
        const ohlc = legOf(row, role);
        for (const [field, offset] of TICK_OFFSETS_MS) {
          list.push({ instrumentId: id, price: ohlc[field], ts: row.ts + offset });
        }
      }
      list.sort((a, b) => a.ts - b.ts);
      this.ticks.set(id, list);
    }
  }

  /**
   * A token subscribed mid-replay starts at the ticks stamped at or after the
   * last advance, like a live feed's first snapshot.
   */
  subscribe(instrumentIds: InstrumentId[]): void {
    for (const id of instrumentIds) {
      if (this.cursors.has(id)) continue;
      const list = this.ticks.get(id);
      if (!list) {
        console.warn(`[Replay] No stored data for ${id}`);
        continue;
      }
      const from = list.findIndex((t) => t.ts >= this.lastAdvance);
      this.cursors.set(id, from === -1 ? list.length : from);
    }
  }

  onTick(handler: TickHandler): void {
    this.handlers.push(handler);
  }

  async start(): Promise<void> {
    console.log(`[Replay] Feed ready with ${this.ticks.size} instruments`);
  }

  close(): void {
    this.cursors.clear();
  }

  /**
   * Emit every pending tick stamped at or before `ts`, oldest first.
   */
  advanceTo(ts: number): number {
    const due: Tick[] = [];
    for (const [id, cursor] of this.cursors) {
      const list = this.ticks.get(id) ?? [];
      let i = cursor;
      while (i < list.length) {
        const tick = list[i];
        if (!tick || tick.ts > ts) break;
        due.push(tick);
        i++;
      }
      this.cursors.set(id, i);
    }
    this.lastAdvance = ts;
    due.sort((a, b) => a.ts - b.ts);

    for (const tick of due) {
      for (const handler of this.handlers) {
        try {
          handler(tick.instrumentId, tick.price, tick.ts);
        } catch (err) {
          console.error(`[Replay] Tick handler failed: ${errorMessage(err)}`);
        }
      }
    }
    return due.length;
  }
}

/**
 * Historical provider over the same stored rows.
 */
export class ReplayHistoricalProvider implements HistoricalDataProvider {
  private readonly roles: Map<InstrumentId, LegRole> = new Map();

  constructor(private readonly rows: readonly MarketRow[], ids: ReplayIds) {
    for (const role of ["INDEX", "CALL", "PUT"] as const) {
      this.roles.set(ids[role], role);
    }
  }

  async fetch(instrumentId: InstrumentId, from: number, to: number, _interval: "minute"): Promise<HistoricalBar[]> {
    const role = this.roles.get(instrumentId);
    if (!role) return [];
    return this.rows
      .filter((row) => row.ts >= from && row.ts < to)
      .map((row) => ({ ts: row.ts, ...legOf(row, role) }));
  }
}

/**
 * Stored rows carry one call and one put series, so every strike resolves
 * to the replayed leg of its type.
 */
export class ReplayInstrumentLookup implements InstrumentLookup {
  constructor(
    private readonly ids: ReplayIds,
    private readonly underlying: string,
    private readonly lotSize: number
  ) {}

  nearestExpiry(onOrAfter: string): string | null {
    return onOrAfter;
  }

  find(strike: number, optionType: OptionType, expiry: string): OptionContract | null {
    return Object.freeze({
      instrumentId: optionType === "CE" ? this.ids.CALL : this.ids.PUT,
      symbol: `${this.underlying}${strike}${optionType}`,
      strike,
      optionType,
      expiry,
      lotSize: this.lotSize,
    });
  }

  isLiquid(): boolean {
    return true;
  }
}
