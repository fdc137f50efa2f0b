#!/usr/bin/env node
import { parseArgs } from "node:util";
import { existsSync } from "node:fs";
import { loadSettings, validateStrategySettings } from "../config/settings.js";
import { loadMarketRows, MARKET_COLUMNS, type MarketRow } from "../datafeed/historicalCsv.js";
import { Backtester } from "./backtester.js";
import { formatStatsTable, writeTradesCsv } from "./report.js";
import { errorMessage } from "../utils/errors.js";
import { formatTime } from "../utils/timeUtils.js";

const USAGE = "Usage: band-backtest --data <csv> [--start YYYY-MM-DD] [--end YYYY-MM-DD] [--out <csv>]";
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

function fail(message: string): never {
  console.error(`[Backtest] ${message}`);
  process.exit(1);
}

function parseCli() {
  try {
    return parseArgs({
      options: {
        data: { type: "string" },
        start: { type: "string" },
        end: { type: "string" },
        out: { type: "string" },
      },
      strict: true,
    }).values;
  } catch (err) {
    fail(`${errorMessage(err)}\n${USAGE}`);
  }
}

async function main(): Promise<void> {
  const values = parseCli();
  const dataPath = values.data;
  if (!dataPath) fail(`--data is required\n${USAGE}`);
  for (const key of ["start", "end"] as const) {
    const value = values[key];
    if (value !== undefined && !DATE_RE.test(value)) fail(`--${key} must be YYYY-MM-DD (got "${value}")`);
  }
  if (!existsSync(dataPath)) {
    fail(`Data file not found: ${dataPath}\nExpected columns: ${MARKET_COLUMNS.join(",")}`);
  }

  const { settings, problems } = loadSettings(process.env, validateStrategySettings);
  if (problems.length > 0) fail(`Invalid configuration:\n- ${problems.join("\n- ")}`);
  const offset = settings.tzOffsetMinutes;
  const outPath = values.out ?? `backtest_results_${Date.now()}.csv`;

  console.log("=".repeat(60));
  console.log("STARTING BACKTEST");
  console.log("=".repeat(60));
  console.log(`Data file: ${dataPath}`);
  if (values.start) console.log(`Start date: ${values.start}`);
  if (values.end) console.log(`End date: ${values.end}`);
  console.log("Strategy Parameters:");
  console.log(`  Strike Offset: ±${settings.strategy.strikeOffset}`);
  console.log(`  Lot Size: ${settings.strategy.lotSize}`);
  console.log(`  Trailing Increment: ${settings.strategy.trailingIncrement}`);
  console.log(`  RSI Period / Exit Drop: ${settings.strategy.rsiPeriod} / ${settings.strategy.rsiExitDrop}`);
  console.log(`  Daily Loss Limit: ${settings.strategy.dailyLossLimit.toFixed(2)}`);

  let rows: MarketRow[];
  try {
    rows = await loadMarketRows(dataPath, { start: values.start, end: values.end, offsetMinutes: offset });
  } catch (err) {
    fail(`Cannot read ${dataPath}: ${errorMessage(err)}`);
  }
  if (rows.length === 0) fail(`No rows in ${dataPath} for the requested range`);

  const result = new Backtester({ strategy: settings.strategy, times: settings.times, offsetMinutes: offset }).run(rows);

  for (const trade of result.trades) {
    console.log(
      `${trade.date} ${formatTime(trade.entryTime, offset)} ${trade.side.padEnd(4)} ${trade.entryPrice.toFixed(2)} -> ${trade.exitPrice.toFixed(2)} ${formatTime(trade.exitTime, offset)} ${trade.exitReason.padEnd(9)} ${trade.pnl.toFixed(2)}`
    );
  }
  console.log(formatStatsTable(result.stats));

  await writeTradesCsv(outPath, result.trades, offset);
  console.log(`Detailed results saved to: ${outPath}`);
}

main().catch((err: unknown) => {
  fail(`Backtest failed: ${errorMessage(err)}`);
});
