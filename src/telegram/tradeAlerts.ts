import type { EngineEvent, OrchestratorStatus } from "../orchestrator/orchestrator.js";
import type { ReferenceBand, Side } from "../types.js";
import { IST_OFFSET_MINUTES, formatTime } from "../utils/timeUtils.js";

const formatPrice = (value?: number): string =>
  value !== undefined && Number.isFinite(value) ? value.toFixed(2) : "n/a";

const formatPnl = (value: number): string => `${value >= 0 ? "+" : ""}${value.toFixed(2)}`;

function sideEmoji(side: Side): string {
  return side === "CALL" ? "🟢" : "🔴";
}

function bandLine(label: string, band?: ReferenceBand): string {
  if (!band) return `${label}: n/a`;
  return `${label}: R ${formatPrice(band.resistance)} | B ${formatPrice(band.mid)} | G ${formatPrice(band.support)}`;
}

/**
 * Render an engine event as a Telegram message.
 */
export function formatEngineEvent(
  instanceId: string,
  event: EngineEvent,
  offsetMinutes: number = IST_OFFSET_MINUTES
): string {
  switch (event.type) {
    case "ENTRY": {
      const p = event.position;
      return [
        `[${instanceId}] ${sideEmoji(p.side)} ENTRY ${p.side}`,
        `${p.contract.symbol} x${event.qty} @ ${formatPrice(p.entryPrice)}`,
        `Stop: ${formatPrice(event.stopLoss)}`,
        `Time: ${formatTime(p.entryTime, offsetMinutes)}`,
        `Trade: ${p.tradeId}`,
      ].join("\n");
    }

    case "EXIT": {
      const t = event.trade;
      const emoji = t.pnl > 0 ? "✅" : t.pnl < 0 ? "❌" : "⚪";
      return [
        `[${instanceId}] ${emoji} EXIT ${t.side} (${t.exitReason})`,
        `${t.metadata.symbol} x${t.metadata.qty}`,
        `Entry: ${formatPrice(t.entryPrice)} @ ${formatTime(t.entryTime, offsetMinutes)}`,
        `Exit: ${formatPrice(t.exitPrice)} @ ${formatTime(t.exitTime, offsetMinutes)}`,
        `P&L: ${formatPnl(t.pnl)}`,
      ].join("\n");
    }

    case "ORDER_FAILED": {
      const d = event.decision;
      const what = d.type === "ENTER" ? "ENTRY" : `EXIT (${d.reason})`;
      return [
        `[${instanceId}] ⚠️ ${what} ORDER FAILED`,
        `${d.contract.symbol} @ ${formatPrice(d.price)}`,
        `Error: ${event.message}`,
        d.type === "ENTER" ? "Signal dropped, waiting for the next setup" : "Position still open, exit will be retried",
      ].join("\n");
    }

    case "HALT":
      return [
        `[${instanceId}] 🛑 DAILY LOSS LIMIT`,
        `Date: ${event.date}`,
        `P&L: ${formatPnl(event.dailyPnl)} (limit ${event.limit.toFixed(2)})`,
        "No new entries today",
      ].join("\n");

    case "SUMMARY": {
      const wins = event.trades.filter((t) => t.pnl > 0).length;
      const lines = [
        `[${instanceId}] 📊 SESSION SUMMARY ${event.date}`,
        `Trades: ${event.trades.length} (wins ${wins}, losses ${event.trades.length - wins})`,
        `P&L: ${formatPnl(event.dailyPnl)}`,
      ];
      for (const t of event.trades) {
        lines.push(
          `${formatTime(t.entryTime, offsetMinutes).slice(0, 5)} ${t.side} ${formatPrice(t.entryPrice)} -> ${formatPrice(t.exitPrice)} ${t.exitReason} ${formatPnl(t.pnl)}`
        );
      }
      return lines.join("\n");
    }

    case "ORPHANED_POSITION": {
      const p = event.position;
      return [
        `[${instanceId}] ⚠️ OPEN POSITION FROM PREVIOUS RUN`,
        `${p.side} ${p.contract.symbol} @ ${formatPrice(p.entryPrice)} (${p.tradeId})`,
        "Not managed by this run, close it manually",
      ].join("\n");
    }
  }
}

export function formatStatus(status: OrchestratorStatus, offsetMinutes: number = IST_OFFSET_MINUTES): string {
  const s = status.session;
  const position = s.position;
  return [
    "=== Engine Status ===",
    "",
    "📈 MARKET:",
    `Date: ${status.date}`,
    `Index: ${formatPrice(status.indexPrice)}`,
    `Band: ${status.band ? status.band.stage : "none"}`,
    status.band ? bandLine("Index", status.band.index) : "",
    status.band?.call ? bandLine("Call", status.band.call) : "",
    status.band?.put ? bandLine("Put", status.band.put) : "",
    status.legs ? `Legs: ${status.legs.call.symbol} / ${status.legs.put.symbol}` : "Legs: not selected",
    "",
    "💼 TRADING:",
    `Entry: ${s.entry.phase}${s.entry.pendingRearmSide ? ` (${s.entry.pendingRearmSide})` : ""}`,
    position
      ? `Position: ${position.side} ${position.contract.symbol} @ ${formatPrice(position.entryPrice)} since ${formatTime(position.entryTime, offsetMinutes)}`
      : "Position: none",
    position ? `Last: ${formatPrice(status.legPrice)} Stop: ${formatPrice(s.stop ?? undefined)}` : "",
    s.pending ? `Pending order: ${s.pending}` : "",
    `Trades: ${s.trades} | P&L: ${formatPnl(s.dailyPnl)}${s.halted ? " | HALTED" : ""}`,
    "",
    "⚙️ SYSTEM:",
    `Ticks: ${status.ticks} | Queued: ${status.queued} | Late dropped: ${status.lateDropped}`,
  ]
    .filter(Boolean)
    .join("\n");
}
