import { readFile } from "node:fs/promises";
import type { OHLC } from "../types.js";
import { missingColumns, parseCsvRecords, type CsvRecord } from "../utils/csv.js";
import { IST_OFFSET_MINUTES, exchangeDateString, parseExchangeDateTime } from "../utils/timeUtils.js";

/**
 * One stored 1-minute row: the index and both option legs.
 */
export type MarketRow = {
  ts: number;
  index: OHLC;
  call: OHLC;
  put: OHLC;
};

const LEGS = ["nifty", "call", "put"] as const;
const FIELDS = ["open", "high", "low", "close"] as const;

export const MARKET_COLUMNS: readonly string[] = [
  "datetime",
  ...LEGS.flatMap((leg) => FIELDS.map((f) => `${leg}_${f}`)),
];

function readOhlc(record: CsvRecord, leg: (typeof LEGS)[number]): OHLC | null {
  const open = Number(record[`${leg}_open`]);
  const high = Number(record[`${leg}_high`]);
  const low = Number(record[`${leg}_low`]);
  const close = Number(record[`${leg}_close`]);
  if (![open, high, low, close].every(Number.isFinite)) return null;
  return { open, high, low, close };
}

export type LoadOptions = {
  start?: string; // YYYY-MM-DD inclusive
  end?: string;   // YYYY-MM-DD inclusive
  offsetMinutes?: number;
};

export function parseMarketRows(text: string, options: LoadOptions = {}): MarketRow[] {
  const offset = options.offsetMinutes ?? IST_OFFSET_MINUTES;
  const records = parseCsvRecords(text);
  const missing = missingColumns(records, MARKET_COLUMNS);
  if (missing.length > 0) {
    throw new Error(`Historical CSV missing columns: ${missing.join(", ")}`);
  }

  const rows: MarketRow[] = [];
  let skipped = 0;
  for (const record of records) {
    const ts = parseExchangeDateTime(record.datetime ?? "", offset);
    const index = readOhlc(record, "nifty");
    const call = readOhlc(record, "call");
    const put = readOhlc(record, "put");
    if (ts === undefined || !index || !call || !put) {
      skipped++;
      continue;
    }
    const date = exchangeDateString(ts, offset);
    if (options.start && date < options.start) continue;
    if (options.end && date > options.end) continue;
    rows.push({ ts, index, call, put });
  }

  if (skipped > 0) console.warn(`[HistoricalCsv] Skipped ${skipped} malformed rows`);
  return rows.sort((a, b) => a.ts - b.ts);
}

export async function loadMarketRows(path: string, options: LoadOptions = {}): Promise<MarketRow[]> {
  const text = await readFile(path, "utf8");
  const rows = parseMarketRows(text, options);
  console.log(`[HistoricalCsv] Loaded ${rows.length} rows from ${path}`);
  return rows;
}

/**
 * Rows grouped by exchange-local date, dates ascending.
 */
export function groupByDate(rows: MarketRow[], offsetMinutes: number = IST_OFFSET_MINUTES): Map<string, MarketRow[]> {
  const out = new Map<string, MarketRow[]>();
  for (const row of rows) {
    const date = exchangeDateString(row.ts, offsetMinutes);
    const list = out.get(date);
    if (list) list.push(row);
    else out.set(date, [row]);
  }
  return new Map([...out.entries()].sort(([a], [b]) => a.localeCompare(b)));
}
