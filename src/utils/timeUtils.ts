/**
 * Exchange-local clock helpers.
 *
 * All engine timestamps are ms epoch. The exchange runs on a fixed UTC offset
 * (IST = UTC+05:30, no DST), so local wall time is a plain shift.
 */
export const IST_OFFSET_MINUTES = 330;

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Parse "HH:MM" into minutes since local midnight.
 * Returns undefined on malformed input.
 */
export function parseHHMM(value: string): number | undefined {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return undefined;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return undefined;
  return hour * 60 + minute;
}

export function formatMinutes(minutes: number): string {
  return `${pad2(Math.floor(minutes / 60))}:${pad2(minutes % 60)}`;
}

/**
 * Minutes since exchange-local midnight for a timestamp.
 */
export function minutesOfDay(ts: number, offsetMinutes: number = IST_OFFSET_MINUTES): number {
  const local = ts + offsetMinutes * MINUTE_MS;
  const intoDay = ((local % DAY_MS) + DAY_MS) % DAY_MS;
  return Math.floor(intoDay / MINUTE_MS);
}

/**
 * Exchange-local date (YYYY-MM-DD) for a timestamp.
 */
export function exchangeDateString(ts: number, offsetMinutes: number = IST_OFFSET_MINUTES): string {
  const local = new Date(ts + offsetMinutes * MINUTE_MS);
  return `${local.getUTCFullYear()}-${pad2(local.getUTCMonth() + 1)}-${pad2(local.getUTCDate())}`;
}

/**
 * Timestamp of an exchange-local wall time on a given date.
 */
export function exchangeTimeToTs(
  date: string,
  minutes: number,
  offsetMinutes: number = IST_OFFSET_MINUTES
): number {
  const [y, m, d] = date.split("-").map((p) => Number(p));
  if (y === undefined || m === undefined || d === undefined || [y, m, d].some((n) => !Number.isFinite(n))) {
    throw new Error(`Invalid exchange date: ${date}`);
  }
  return Date.UTC(y, m - 1, d) + minutes * MINUTE_MS - offsetMinutes * MINUTE_MS;
}

/**
 * Truncate a timestamp to an N-minute boundary of exchange-local time.
 */
export function floorToInterval(
  ts: number,
  intervalMinutes: number,
  offsetMinutes: number = IST_OFFSET_MINUTES
): number {
  const ms = intervalMinutes * MINUTE_MS;
  const shift = offsetMinutes * MINUTE_MS;
  return Math.floor((ts + shift) / ms) * ms - shift;
}

export function formatTime(ts: number, offsetMinutes: number = IST_OFFSET_MINUTES): string {
  const local = new Date(ts + offsetMinutes * MINUTE_MS);
  return `${pad2(local.getUTCHours())}:${pad2(local.getUTCMinutes())}:${pad2(local.getUTCSeconds())}`;
}

export function formatDateTime(ts: number, offsetMinutes: number = IST_OFFSET_MINUTES): string {
  return `${exchangeDateString(ts, offsetMinutes)} ${formatTime(ts, offsetMinutes)}`;
}

/**
 * Parse a stored datetime. "YYYY-MM-DD HH:MM[:SS]" without a zone is taken as
 * exchange-local; strings carrying "Z" or "+HH:MM" are honored as given.
 */
export function parseExchangeDateTime(value: string, offsetMinutes: number = IST_OFFSET_MINUTES): number | undefined {
  const s = value.trim();
  const naive = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/.exec(s);
  if (naive) {
    const [, y, mo, d, h, mi, sec] = naive;
    const utc = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(sec ?? "0"));
    return utc - offsetMinutes * MINUTE_MS;
  }
  const parsed = Date.parse(s);
  return Number.isFinite(parsed) ? parsed : undefined;
}
