export type TradingMode = "mock" | "paper" | "live";

export type InstrumentId = number;

export type Side = "CALL" | "PUT";

export type OptionType = "CE" | "PE";

export type LegRole = "INDEX" | "CALL" | "PUT";

export type Tick = {
  instrumentId: InstrumentId;
  price: number;
  ts: number; // ms epoch
};

export type OHLC = {
  open: number;
  high: number;
  low: number;
  close: number;
};

/**
 * Finalized candle. windowStart is the tick timestamp truncated to the
 * interval boundary (ms epoch).
 */
export type Candle = Readonly<
  OHLC & {
    instrumentId: InstrumentId;
    windowStart: number;
    intervalMinutes: number;
  }
>;

export type HistoricalBar = OHLC & {
  ts: number; // bar start, ms epoch
  volume?: number;
};

export type ReferenceBand = Readonly<{
  resistance: number; // R
  support: number; // G
  mid: number; // B
}>;

export type BandStage = "PROVISIONAL" | "FINAL";

export type BandSnapshot = Readonly<{
  stage: BandStage;
  computedAt: number;
  index: ReferenceBand;
  call?: ReferenceBand;
  put?: ReferenceBand;
}>;

export type OptionContract = Readonly<{
  instrumentId: InstrumentId;
  symbol: string;
  strike: number;
  optionType: OptionType;
  expiry: string; // YYYY-MM-DD
  lotSize: number;
}>;

/**
 * Same-window candles of the tracked instruments, handed to the strategy
 * core together. closeTs = windowStart + interval.
 */
export type CandleSlice = {
  windowStart: number;
  closeTs: number;
  index?: Candle;
  call?: Candle;
  put?: Candle;
};

export type Position = {
  tradeId: string;
  side: Side;
  contract: OptionContract;
  entryPrice: number;
  entryTime: number;
  openedOnWindow: number;
};

export type ExitReason = "SL_HIT" | "RSI_EXIT" | "HARD_EXIT" | "MANUAL" | "SHUTDOWN";

export type TradeRecord = Readonly<{
  date: string; // YYYY-MM-DD exchange-local
  side: Side;
  entryTime: number;
  entryPrice: number;
  exitTime: number;
  exitPrice: number;
  exitReason: ExitReason;
  pnl: number;
  metadata: Readonly<{
    tradeId: string;
    symbol: string;
    qty: number;
    maxStop: number;
    maxPrice: number;
  }>;
}>;

export type EntryDecision = {
  type: "ENTER";
  tradeId: string;
  side: Side;
  contract: OptionContract;
  price: number;
  ts: number;
  stopLoss: number;
};

export type ExitDecision = {
  type: "EXIT";
  tradeId: string;
  side: Side;
  contract: OptionContract;
  price: number;
  ts: number;
  reason: ExitReason;
};

export type StrategyDecision = EntryDecision | ExitDecision;

// ---------------------------------------------------------------------------
// External collaborators
// ---------------------------------------------------------------------------

export type TickHandler = (instrumentId: InstrumentId, price: number, ts: number) => void;

export interface FeedClient {
  /** Queued until connected; re-sent after every reconnect. Idempotent. */
  subscribe(instrumentIds: InstrumentId[]): void;
  onTick(handler: TickHandler): void;
  start(): Promise<void>;
  close(): void;
}

export interface HistoricalDataProvider {
  /** Ordered 1-minute bars with start in [from, to). May be partial or empty. */
  fetch(instrumentId: InstrumentId, from: number, to: number, interval: "minute"): Promise<HistoricalBar[]>;
}

export type OrderRequest = {
  tradeId: string;
  side: Side;
  contract: OptionContract;
  qty: number;
  price: number;
  ts: number;
};

export type OrderResult =
  | { status: "success"; orderId: string; price: number }
  | { status: "error"; message: string };

export interface OrderSink {
  placeEntry(order: OrderRequest & { stopLoss: number }): Promise<OrderResult>;
  placeExit(order: OrderRequest & { reason: ExitReason }): Promise<OrderResult>;
}

export interface InstrumentLookup {
  nearestExpiry(onOrAfter: string): string | null;
  find(strike: number, optionType: OptionType, expiry: string): OptionContract | null;
  isLiquid(contract: OptionContract): boolean;
}

export interface PersistenceSink {
  saveCandle(candle: Candle, label?: string): void;
  saveTrade(trade: TradeRecord): void;
}
