import { appendFile, mkdir, stat } from "node:fs/promises";
import path from "node:path";
import type { Candle, PersistenceSink, TradeRecord } from "../types.js";
import { toCsvLine } from "../utils/csv.js";
import { errorCode, errorMessage } from "../utils/errors.js";
import { IST_OFFSET_MINUTES, exchangeDateString, formatDateTime, formatTime } from "../utils/timeUtils.js";

export const CANDLE_HEADER = ["datetime", "instrument", "interval", "open", "high", "low", "close"] as const;
export const TRADE_HEADER = [
  "trade_id",
  "date",
  "side",
  "symbol",
  "qty",
  "entry_time",
  "entry_price",
  "exit_time",
  "exit_price",
  "exit_reason",
  "pnl",
  "max_stop",
  "max_price",
] as const;

export function tradeToRow(trade: TradeRecord, offsetMinutes: number = IST_OFFSET_MINUTES): Array<string | number> {
  return [
    trade.metadata.tradeId,
    trade.date,
    trade.side,
    trade.metadata.symbol,
    trade.metadata.qty,
    formatTime(trade.entryTime, offsetMinutes),
    round2(trade.entryPrice),
    formatTime(trade.exitTime, offsetMinutes),
    round2(trade.exitPrice),
    trade.exitReason,
    round2(trade.pnl),
    round2(trade.metadata.maxStop),
    round2(trade.metadata.maxPrice),
  ];
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Appends finalized candles and trades to per-day CSV files under a data
 * directory. Writes are serialized per file and never block the caller.
 */
export class CsvJournal implements PersistenceSink {
  private readonly chains: Map<string, Promise<void>> = new Map();
  private readonly headersWritten: Set<string> = new Set();
  private failures = 0;

  constructor(
    private readonly dataDir: string,
    private readonly offsetMinutes: number = IST_OFFSET_MINUTES
  ) {}

  saveCandle(candle: Candle, label?: string): void {
    const date = exchangeDateString(candle.windowStart, this.offsetMinutes);
    const file = path.join(this.dataDir, "candles", `${date}_${candle.intervalMinutes}m.csv`);
    this.enqueue(file, CANDLE_HEADER, [
      formatDateTime(candle.windowStart, this.offsetMinutes),
      label ?? String(candle.instrumentId),
      candle.intervalMinutes,
      candle.open,
      candle.high,
      candle.low,
      candle.close,
    ]);
  }

  saveTrade(trade: TradeRecord): void {
    const file = path.join(this.dataDir, "trades", `${trade.date}.csv`);
    this.enqueue(file, TRADE_HEADER, tradeToRow(trade, this.offsetMinutes));
  }

  getFailures(): number {
    return this.failures;
  }

  /**
   * Resolves once every queued write has settled.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.chains.values()]);
  }

  private enqueue(file: string, header: readonly string[], row: ReadonlyArray<string | number>): void {
    const previous = this.chains.get(file) ?? Promise.resolve();
    const next = previous
      .then(() => this.write(file, header, row))
      .catch((err: unknown) => {
        this.failures++;
        console.error(`[Journal] Write to ${file} failed: ${errorMessage(err)}`);
      });
    this.chains.set(file, next);
  }

  private async write(file: string, header: readonly string[], row: ReadonlyArray<string | number>): Promise<void> {
    let prefix = "";
    if (!this.headersWritten.has(file)) {
      await mkdir(path.dirname(file), { recursive: true });
      const exists = await stat(file).then(
        (s) => s.size > 0,
        (err: unknown) => {
          if (errorCode(err) === "ENOENT") return false;
          throw err;
        }
      );
      if (!exists) prefix = toCsvLine(header) + "\n";
      this.headersWritten.add(file);
    }
    await appendFile(file, prefix + toCsvLine(row) + "\n", "utf8");
  }
}
