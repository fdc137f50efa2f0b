import { parse } from "csv-parse/sync";

export type CsvRecord = Record<string, string>;

function isRecord(value: unknown): value is CsvRecord {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "string");
}

/**
 * Parse CSV text with a header row into string records. Column names are
 * trimmed and lower-cased.
 */
export function parseCsvRecords(text: string): CsvRecord[] {
  const parsed: unknown = parse(text, {
    columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });
  if (!Array.isArray(parsed)) return [];
  return parsed.filter(isRecord);
}

export function missingColumns(records: CsvRecord[], required: readonly string[]): string[] {
  const first = records[0];
  if (!first) return [];
  return required.filter((col) => !(col in first));
}

export function toCsvLine(values: ReadonlyArray<string | number>): string {
  return values
    .map((v) => {
      const s = String(v);
      return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
    })
    .join(",");
}
