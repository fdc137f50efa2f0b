import { readFileSync } from "node:fs";
import type { InstrumentId, InstrumentLookup, OptionContract, OptionType } from "../types.js";
import { missingColumns, parseCsvRecords, type CsvRecord } from "../utils/csv.js";

const REQUIRED_COLUMNS = ["symbol", "token", "strike", "expiry", "option_type", "lot_size"] as const;

type InstrumentRow = {
  symbol: string;
  token: InstrumentId;
  strike: number;
  expiry: string;
  optionType: string;
  lotSize: number;
};

function toRow(record: CsvRecord): InstrumentRow | null {
  const token = Number(record.token);
  if (!record.symbol || !Number.isInteger(token)) return null;
  const strike = Number(record.strike);
  const lotSize = Number(record.lot_size);
  return {
    symbol: record.symbol,
    token,
    strike: Number.isFinite(strike) ? strike : 0,
    expiry: (record.expiry ?? "").slice(0, 10),
    optionType: (record.option_type ?? "").toUpperCase(),
    lotSize: Number.isFinite(lotSize) && lotSize > 0 ? lotSize : 0,
  };
}

function isOptionType(value: string): value is OptionType {
  return value === "CE" || value === "PE";
}

/**
 * Exchange instrument dump (symbol, token, strike, expiry, option_type, lot_size).
 */
export class InstrumentBook implements InstrumentLookup {
  private readonly options: OptionContract[] = [];
  private readonly others: InstrumentRow[] = [];
  private readonly byKey: Map<string, OptionContract> = new Map();

  constructor(rows: InstrumentRow[]) {
    for (const row of rows) {
      if (isOptionType(row.optionType) && /^\d{4}-\d{2}-\d{2}$/.test(row.expiry)) {
        const contract: OptionContract = Object.freeze({
          instrumentId: row.token,
          symbol: row.symbol,
          strike: row.strike,
          optionType: row.optionType,
          expiry: row.expiry,
          lotSize: row.lotSize,
        });
        this.options.push(contract);
        const key = this.key(contract.strike, contract.optionType, contract.expiry);
        if (!this.byKey.has(key)) this.byKey.set(key, contract);
      } else {
        this.others.push(row);
      }
    }
  }

  static fromCsv(text: string): InstrumentBook {
    const records = parseCsvRecords(text);
    const missing = missingColumns(records, REQUIRED_COLUMNS);
    if (missing.length > 0) {
      throw new Error(`Instruments CSV missing columns: ${missing.join(", ")}`);
    }
    const rows: InstrumentRow[] = [];
    let skipped = 0;
    for (const record of records) {
      const row = toRow(record);
      if (row) rows.push(row);
      else skipped++;
    }
    if (skipped > 0) console.warn(`[Instruments] Skipped ${skipped} malformed rows`);
    return new InstrumentBook(rows);
  }

  static load(path: string): InstrumentBook {
    const book = InstrumentBook.fromCsv(readFileSync(path, "utf8"));
    console.log(`[Instruments] Loaded ${book.size()} option contracts from ${path}`);
    return book;
  }

  size(): number {
    return this.options.length;
  }

  /**
   * Earliest option expiry on or after the date (YYYY-MM-DD), or null.
   */
  nearestExpiry(onOrAfter: string): string | null {
    let best: string | null = null;
    for (const c of this.options) {
      if (c.expiry >= onOrAfter && (best === null || c.expiry < best)) best = c.expiry;
    }
    return best;
  }

  find(strike: number, optionType: OptionType, expiry: string): OptionContract | null {
    return this.byKey.get(this.key(strike, optionType, expiry)) ?? null;
  }

  byToken(token: InstrumentId): OptionContract | null {
    return this.options.find((c) => c.instrumentId === token) ?? null;
  }

  /**
   * Token of a non-option row (index or equity) whose symbol contains `name`.
   */
  indexToken(name: string): InstrumentId | null {
    const needle = name.toUpperCase();
    const row = this.others.find((r) => r.symbol.toUpperCase().includes(needle));
    return row ? row.token : null;
  }

  // No depth data in the dump; a listed contract with a lot size counts as tradeable.
  isLiquid(contract: OptionContract): boolean {
    return contract.lotSize > 0 && this.byKey.has(this.key(contract.strike, contract.optionType, contract.expiry));
  }

  private key(strike: number, optionType: OptionType, expiry: string): string {
    return `${strike}|${optionType}|${expiry}`;
  }
}
