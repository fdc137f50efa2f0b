import { writeFile } from "node:fs/promises";
import type { TradeRecord } from "../types.js";
import { TRADE_HEADER, tradeToRow } from "../persistence/csvJournal.js";
import { toCsvLine } from "../utils/csv.js";
import { IST_OFFSET_MINUTES } from "../utils/timeUtils.js";

export type BacktestStats = {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number; // percent
  totalPnl: number;
  averagePnl: number;
  averageWin: number;
  averageLoss: number;
  maxWin: number;
  maxLoss: number;
  profitFactor: number | null; // |average win / average loss|, null without losses
};

const mean = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;

/**
 * A trade with zero P&L counts as a loss.
 */
export function computeStats(trades: readonly TradeRecord[]): BacktestStats {
  const pnls = trades.map((t) => t.pnl);
  const winning = pnls.filter((p) => p > 0);
  const losing = pnls.filter((p) => p <= 0);
  const averageWin = mean(winning);
  const averageLoss = mean(losing);
  const total = pnls.reduce((a, b) => a + b, 0);

  return {
    totalTrades: trades.length,
    wins: winning.length,
    losses: losing.length,
    winRate: trades.length > 0 ? (winning.length / trades.length) * 100 : 0,
    totalPnl: total,
    averagePnl: trades.length > 0 ? total / trades.length : 0,
    averageWin,
    averageLoss,
    maxWin: pnls.length > 0 ? Math.max(...pnls) : 0,
    maxLoss: pnls.length > 0 ? Math.min(...pnls) : 0,
    profitFactor: averageLoss !== 0 ? Math.abs(averageWin / averageLoss) : null,
  };
}

export function formatStatsTable(stats: BacktestStats): string {
  const rows: Array<[string, string]> = [
    ["Total Trades", String(stats.totalTrades)],
    ["Winning Trades", String(stats.wins)],
    ["Losing Trades", String(stats.losses)],
    ["Win Rate", `${stats.winRate.toFixed(2)}%`],
    ["Total P&L", stats.totalPnl.toFixed(2)],
    ["Average P&L", stats.averagePnl.toFixed(2)],
    ["Average Win", stats.averageWin.toFixed(2)],
    ["Average Loss", stats.averageLoss.toFixed(2)],
    ["Max Win", stats.maxWin.toFixed(2)],
    ["Max Loss", stats.maxLoss.toFixed(2)],
    ["Profit Factor", stats.profitFactor === null ? "N/A" : stats.profitFactor.toFixed(2)],
  ];
  const width = Math.max(...rows.map(([label]) => label.length));
  const rule = "=".repeat(width + 16);
  return [rule, "BACKTEST RESULTS", rule, ...rows.map(([label, value]) => `${label.padEnd(width)}  ${value}`), rule].join(
    "\n"
  );
}

export function tradesToCsv(trades: readonly TradeRecord[], offsetMinutes: number = IST_OFFSET_MINUTES): string {
  const lines = [toCsvLine(TRADE_HEADER), ...trades.map((t) => toCsvLine(tradeToRow(t, offsetMinutes)))];
  return lines.join("\n") + "\n";
}

export async function writeTradesCsv(
  path: string,
  trades: readonly TradeRecord[],
  offsetMinutes: number = IST_OFFSET_MINUTES
): Promise<void> {
  await writeFile(path, tradesToCsv(trades, offsetMinutes), "utf8");
}
