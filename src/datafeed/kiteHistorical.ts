import type { HistoricalBar, HistoricalDataProvider, InstrumentId } from "../types.js";
import { IST_OFFSET_MINUTES, formatDateTime } from "../utils/timeUtils.js";
import { errorMessage } from "../utils/errors.js";

export type KiteHistoricalConfig = {
  apiKey: string;
  accessToken: string;
  baseUrl?: string;
  timeoutMs?: number;
  offsetMinutes?: number;
  fetchImpl?: typeof fetch;
};

/**
 * "2024-01-15T09:15:00+0530" -> ms epoch. The API omits the colon in the zone.
 */
export function parseKiteTimestamp(value: string): number | undefined {
  const normalized = value.trim().replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  const ts = Date.parse(normalized);
  return Number.isFinite(ts) ? ts : undefined;
}

function toBar(row: unknown): HistoricalBar | null {
  if (!Array.isArray(row) || row.length < 5) return null;
  const [rawTs, open, high, low, close, volume] = row;
  const ts = typeof rawTs === "string" ? parseKiteTimestamp(rawTs) : undefined;
  if (ts === undefined) return null;
  const nums = [open, high, low, close].map((v) => (typeof v === "number" ? v : Number(v)));
  if (nums.some((n) => !Number.isFinite(n))) return null;
  const [o, h, l, c] = nums;
  if (o === undefined || h === undefined || l === undefined || c === undefined) return null;
  return { ts, open: o, high: h, low: l, close: c, volume: typeof volume === "number" ? volume : undefined };
}

/**
 * Extract the candle rows of a historical API response body.
 */
export function parseHistoricalResponse(body: unknown): HistoricalBar[] {
  if (typeof body !== "object" || body === null) return [];
  const data: unknown = Reflect.get(body, "data");
  if (typeof data !== "object" || data === null) return [];
  const candles: unknown = Reflect.get(data, "candles");
  if (!Array.isArray(candles)) return [];
  const bars: HistoricalBar[] = [];
  for (const row of candles) {
    const bar = toBar(row);
    if (bar) bars.push(bar);
  }
  return bars.sort((a, b) => a.ts - b.ts);
}

/**
 * Minute candles from the Kite Connect historical endpoint.
 * Failures return an empty list; the caller decides when to retry.
 */
export class KiteHistoricalProvider implements HistoricalDataProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly offsetMinutes: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: KiteHistoricalConfig) {
    this.baseUrl = (config.baseUrl ?? "https://api.kite.trade").replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? 15_000;
    this.offsetMinutes = config.offsetMinutes ?? IST_OFFSET_MINUTES;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async fetch(instrumentId: InstrumentId, from: number, to: number, interval: "minute"): Promise<HistoricalBar[]> {
    if (to <= from) return [];
    const params = new URLSearchParams({
      from: formatDateTime(from, this.offsetMinutes),
      to: formatDateTime(to, this.offsetMinutes),
    });
    const url = `${this.baseUrl}/instruments/historical/${instrumentId}/${interval}?${params.toString()}`;

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          "X-Kite-Version": "3",
          Authorization: `token ${this.config.apiKey}:${this.config.accessToken}`,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`Kite historical API error: ${response.status}`);
      }
      const body: unknown = await response.json();
      const bars = parseHistoricalResponse(body).filter((b) => b.ts >= from && b.ts < to);
      console.log(`[KiteHistorical] ${instrumentId}: ${bars.length} ${interval} bars`);
      return bars;
    } catch (err) {
      console.error(`[KiteHistorical] Fetch failed for ${instrumentId}: ${errorMessage(err)}`);
      return [];
    }
  }
}
