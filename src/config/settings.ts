import type { TradingMode } from "../types.js";
import { IST_OFFSET_MINUTES, exchangeTimeToTs, parseHHMM } from "../utils/timeUtils.js";

/**
 * Session clock, all values are minutes since exchange-local midnight.
 */
export type SessionTimes = {
  marketStart: number;
  referenceStart: number;
  referenceEnd: number;
  strikeSelection: number;
  tradingStart: number;
  hardExit: number;
  marketEnd: number;
};

export type StrategyParams = {
  strikeOffset: number;
  strikeStep: number;
  lotSize: number;
  dailyLossLimit: number;
  trailingIncrement: number;
  rsiPeriod: number;
  rsiExitDrop: number;
  candleInterval: number;
};

export type Settings = {
  mode: TradingMode;
  instanceId: string;
  kite: { apiKey?: string; accessToken?: string };
  algoTest: { apiKey?: string; baseUrl: string };
  indexToken: number;
  indexSymbol: string;
  strategy: StrategyParams;
  times: SessionTimes;
  tzOffsetMinutes: number;
  instrumentsCsvPath: string;
  dataDir: string;
  replayCsvPath?: string;
  stateFile?: string;
  telegram: { token?: string; chatId?: string };
};

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n- ${problems.join("\n- ")}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function clampInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? "");
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseTime(value: string | undefined, fallback: string, key: string, problems: string[]): number {
  const raw = value?.trim() || fallback;
  const minutes = parseHHMM(raw);
  if (minutes === undefined) {
    problems.push(`${key} must be HH:MM (got "${raw}")`);
    return parseHHMM(fallback) ?? 0;
  }
  return minutes;
}

function optional(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

function parseMode(value: string | undefined, problems: string[]): TradingMode {
  const raw = (value?.trim() || "paper").toLowerCase();
  if (raw === "mock" || raw === "paper" || raw === "live") return raw;
  problems.push(`TRADING_MODE must be mock, paper or live (got "${raw}")`);
  return "paper";
}

/**
 * Read settings from the environment. Malformed time values are collected
 * and reported by validateSettings together with the rest.
 */
export function loadSettings(
  env: Env = process.env,
  validate: (settings: Settings) => string[] = validateSettings
): { settings: Settings; problems: string[] } {
  const problems: string[] = [];
  const mode = parseMode(env.TRADING_MODE, problems);

  const settings: Settings = {
    mode,
    instanceId: env.INSTANCE_ID?.trim() || "band-engine-001",
    kite: {
      apiKey: optional(env.KITE_API_KEY),
      accessToken: optional(env.KITE_ACCESS_TOKEN),
    },
    algoTest: {
      apiKey: optional(env.ALGOTEST_API_KEY),
      baseUrl: env.ALGOTEST_BASE_URL?.trim() || "https://api.algotest.in",
    },
    indexToken: clampInt(env.INDEX_TOKEN, 256265),
    indexSymbol: env.INDEX_SYMBOL?.trim() || "NIFTY",
    strategy: {
      strikeOffset: clampInt(env.STRIKE_OFFSET, 200),
      strikeStep: clampInt(env.STRIKE_STEP, 50),
      lotSize: clampInt(env.LOT_SIZE, 75),
      dailyLossLimit: parseFloatOr(env.DAILY_LOSS_LIMIT, 10000),
      trailingIncrement: parseFloatOr(env.TRAILING_INCREMENT, 20),
      rsiPeriod: clampInt(env.RSI_PERIOD, 14),
      rsiExitDrop: parseFloatOr(env.RSI_EXIT_DROP, 10),
      candleInterval: 5,
    },
    times: {
      marketStart: parseTime(env.MARKET_START_TIME, "09:15", "MARKET_START_TIME", problems),
      referenceStart: parseTime(env.REFERENCE_WINDOW_START, "09:45", "REFERENCE_WINDOW_START", problems),
      referenceEnd: parseTime(env.REFERENCE_WINDOW_END, "10:00", "REFERENCE_WINDOW_END", problems),
      strikeSelection: parseTime(env.STRIKE_SELECTION_TIME, "10:00", "STRIKE_SELECTION_TIME", problems),
      tradingStart: parseTime(env.TRADING_START_TIME, "10:00", "TRADING_START_TIME", problems),
      hardExit: parseTime(env.HARD_EXIT_TIME, "15:15", "HARD_EXIT_TIME", problems),
      marketEnd: parseTime(env.MARKET_END_TIME, "15:30", "MARKET_END_TIME", problems),
    },
    tzOffsetMinutes: clampInt(env.TZ_OFFSET_MINUTES, IST_OFFSET_MINUTES),
    instrumentsCsvPath: env.INSTRUMENTS_CSV_PATH?.trim() || "data/instruments.csv",
    dataDir: env.DATA_DIR?.trim() || "data",
    replayCsvPath: optional(env.REPLAY_CSV_PATH),
    stateFile: optional(env.STATE_FILE),
    telegram: {
      token: optional(env.TELEGRAM_BOT_TOKEN),
      chatId: optional(env.TELEGRAM_CHAT_ID),
    },
  };

  return { settings, problems: [...problems, ...validate(settings)] };
}

/**
 * Strategy parameters and session clock only. The backtest needs nothing else.
 */
export function validateStrategySettings(settings: Settings): string[] {
  const problems: string[] = [];
  const { strategy, times } = settings;

  if (strategy.strikeOffset <= 0) problems.push(`STRIKE_OFFSET must be > 0 (got ${strategy.strikeOffset})`);
  if (strategy.strikeStep <= 0) problems.push(`STRIKE_STEP must be > 0 (got ${strategy.strikeStep})`);
  if (strategy.lotSize <= 0) problems.push(`LOT_SIZE must be > 0 (got ${strategy.lotSize})`);
  if (strategy.dailyLossLimit <= 0) problems.push(`DAILY_LOSS_LIMIT must be > 0 (got ${strategy.dailyLossLimit})`);
  if (strategy.trailingIncrement <= 0) problems.push(`TRAILING_INCREMENT must be > 0 (got ${strategy.trailingIncrement})`);
  if (strategy.rsiPeriod < 2) problems.push(`RSI_PERIOD must be >= 2 (got ${strategy.rsiPeriod})`);
  if (strategy.rsiExitDrop <= 0) problems.push(`RSI_EXIT_DROP must be > 0 (got ${strategy.rsiExitDrop})`);

  if (times.referenceEnd <= times.referenceStart) {
    problems.push("REFERENCE_WINDOW_END must be after REFERENCE_WINDOW_START");
  }
  if (times.referenceStart < times.marketStart) {
    problems.push("REFERENCE_WINDOW_START must not be before MARKET_START_TIME");
  }
  if (times.strikeSelection < times.referenceEnd) {
    problems.push("STRIKE_SELECTION_TIME must not be before REFERENCE_WINDOW_END");
  }
  if (times.hardExit <= times.tradingStart) {
    problems.push("HARD_EXIT_TIME must be after TRADING_START_TIME");
  }
  if (times.marketEnd < times.hardExit) {
    problems.push("MARKET_END_TIME must not be before HARD_EXIT_TIME");
  }
  return problems;
}

/**
 * Fatal configuration problems. An empty list means the process may start.
 */
export function validateSettings(settings: Settings): string[] {
  const problems = validateStrategySettings(settings);

  if (settings.mode === "paper" || settings.mode === "live") {
    if (!settings.kite.apiKey) problems.push(`KITE_API_KEY is required in ${settings.mode} mode`);
    if (!settings.kite.accessToken) problems.push(`KITE_ACCESS_TOKEN is required in ${settings.mode} mode`);
  }
  if (settings.mode === "live" && !settings.algoTest.apiKey) {
    problems.push("ALGOTEST_API_KEY is required in live mode");
  }
  if (settings.mode === "mock" && !settings.replayCsvPath) {
    problems.push("REPLAY_CSV_PATH is required in mock mode");
  }

  return problems;
}

/**
 * Load and validate, throwing ConfigError on any fatal problem.
 */
export function requireSettings(env: Env = process.env): Settings {
  const { settings, problems } = loadSettings(env);
  if (problems.length > 0) throw new ConfigError(problems);
  return settings;
}

/**
 * Session clock of one trading day as ms epoch.
 */
export type DayTimestamps = { [K in keyof SessionTimes]: number };

export function dayTimestamps(date: string, times: SessionTimes, offsetMinutes: number = IST_OFFSET_MINUTES): DayTimestamps {
  return {
    marketStart: exchangeTimeToTs(date, times.marketStart, offsetMinutes),
    referenceStart: exchangeTimeToTs(date, times.referenceStart, offsetMinutes),
    referenceEnd: exchangeTimeToTs(date, times.referenceEnd, offsetMinutes),
    strikeSelection: exchangeTimeToTs(date, times.strikeSelection, offsetMinutes),
    tradingStart: exchangeTimeToTs(date, times.tradingStart, offsetMinutes),
    hardExit: exchangeTimeToTs(date, times.hardExit, offsetMinutes),
    marketEnd: exchangeTimeToTs(date, times.marketEnd, offsetMinutes),
  };
}
