import { ConfigError, dayTimestamps, requireSettings, type Settings } from "./config/settings.js";
import { Orchestrator, type EngineEvent, type OrchestratorConfig } from "./orchestrator/orchestrator.js";
import { Scheduler } from "./scheduler/scheduler.js";
import { CommandHandler } from "./commands.js";
import { StateStore } from "./persistence/stateStore.js";
import { CsvJournal } from "./persistence/csvJournal.js";
import { initTelegram } from "./telegram/telegram.js";
import { sendTelegramMessageSafe } from "./telegram/sendTelegramMessageSafe.js";
import { formatEngineEvent } from "./telegram/tradeAlerts.js";
import { KiteTickerFeed } from "./datafeed/kiteTicker.js";
import { KiteHistoricalProvider } from "./datafeed/kiteHistorical.js";
import { groupByDate, loadMarketRows, type MarketRow } from "./datafeed/historicalCsv.js";
import { InstrumentBook } from "./instruments/instrumentBook.js";
import { AlgoTestOrderSink, PaperOrderSink } from "./execution/orderSink.js";
import { ReplayFeed, ReplayHistoricalProvider, ReplayInstrumentLookup, type ReplayIds } from "./mock/replayFeed.js";
import { ManualClock, runReplay } from "./mock/mockRunner.js";
import { computeStats, formatStatsTable } from "./backtest/report.js";
import type { OrderSink, TradeRecord } from "./types.js";
import { errorMessage } from "./utils/errors.js";

const BUILD_ID = `BAND_ENGINE_${Date.now()}`;

let settings: Settings;
try {
  settings = requireSettings();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error("[Config] Refusing to start:");
    for (const problem of err.problems) console.error(`[Config] - ${problem}`);
    process.exit(1);
  }
  throw err;
}

const { instanceId, mode } = settings;
const offset = settings.tzOffsetMinutes;

// Print startup inventory
console.log("=== STARTUP INVENTORY ===");
console.log(`BUILD_ID: ${BUILD_ID}`);
console.log(`MODE: ${mode}`);
console.log(`INSTANCE_ID: ${instanceId}`);
console.log(`INDEX: ${settings.indexSymbol} (${settings.indexToken})`);
console.log(
  `STRATEGY: offset=${settings.strategy.strikeOffset} step=${settings.strategy.strikeStep} lot=${settings.strategy.lotSize} lossLimit=${settings.strategy.dailyLossLimit} trail=${settings.strategy.trailingIncrement} rsi=${settings.strategy.rsiPeriod}/${settings.strategy.rsiExitDrop}`
);
console.log(`TELEGRAM: ${settings.telegram.token ? "enabled" : "disabled"}`);
console.log("=========================");

const telegram = initTelegram(settings.telegram);

function notify(text: string): void {
  if (!telegram) return;
  sendTelegramMessageSafe(telegram.bot, telegram.chatId, text).catch((err: unknown) => {
    console.warn(`[Telegram] send failed: ${errorMessage(err)}`);
  });
}

const journal = new CsvJournal(settings.dataDir, offset);
const closedTrades: TradeRecord[] = [];

function onEvent(event: EngineEvent): void {
  if (event.type === "EXIT") closedTrades.push(event.trade);
  notify(formatEngineEvent(instanceId, event, offset));
}

const orchestratorConfig: OrchestratorConfig = {
  instanceId,
  indexToken: settings.indexToken,
  strategy: settings.strategy,
  times: settings.times,
  offsetMinutes: offset,
};

if (mode === "mock") {
  await runMock(settings);
} else {
  await runLive(settings);
}

/**
 * Replay a stored session file through the full live path on a manual clock.
 */
async function runMock(s: Settings): Promise<void> {
  const path = s.replayCsvPath;
  if (!path) throw new ConfigError(["REPLAY_CSV_PATH is required in mock mode"]);

  let rows: MarketRow[];
  try {
    rows = await loadMarketRows(path, { offsetMinutes: offset });
  } catch (err) {
    console.error(`[Mock] Cannot read ${path}: ${errorMessage(err)}`);
    process.exit(1);
  }
  const days = groupByDate(rows, offset);
  const firstDay = [...days.keys()][0];
  if (firstDay === undefined) {
    console.error(`[Mock] ${path} holds no usable rows`);
    process.exit(1);
  }

  const ids: ReplayIds = { INDEX: s.indexToken, CALL: s.indexToken + 1, PUT: s.indexToken + 2 };
  const feed = new ReplayFeed(rows, ids);
  const clock = new ManualClock(dayTimestamps(firstDay, s.times, offset).marketStart);
  const orch = new Orchestrator(orchestratorConfig, {
    feed,
    historical: new ReplayHistoricalProvider(rows, ids),
    sink: new PaperOrderSink(),
    lookup: new ReplayInstrumentLookup(ids, s.indexSymbol, s.strategy.lotSize),
    journal,
    onEvent,
    now: clock.now,
    autoDrain: false,
  });

  notify(`🤖 [${instanceId}] MOCK replay of ${days.size} day(s) from ${path}`);
  await orch.start();
  for (const date of days.keys()) {
    const day = dayTimestamps(date, s.times, offset);
    await runReplay(orch, feed, clock, { start: day.marketStart, end: day.marketEnd + 60_000 });
  }

  console.log(formatStatsTable(computeStats(closedTrades)));
  await journal.flush();
  if (telegram) await telegram.bot.stopPolling();
}

async function runLive(s: Settings): Promise<void> {
  const apiKey = s.kite.apiKey;
  const accessToken = s.kite.accessToken;
  if (!apiKey || !accessToken) throw new ConfigError([`Kite credentials are required in ${s.mode} mode`]);

  const book = InstrumentBook.load(s.instrumentsCsvPath);
  const listedIndex = book.indexToken(s.indexSymbol);
  if (listedIndex !== null && listedIndex !== s.indexToken) {
    console.warn(`[Startup] Instruments list ${s.indexSymbol} as ${listedIndex}, using INDEX_TOKEN=${s.indexToken}`);
  }

  let sink: OrderSink;
  if (s.mode === "live") {
    const algoKey = s.algoTest.apiKey;
    if (!algoKey) throw new ConfigError(["ALGOTEST_API_KEY is required in live mode"]);
    sink = new AlgoTestOrderSink({ baseUrl: s.algoTest.baseUrl, apiKey: algoKey });
  } else {
    sink = new PaperOrderSink();
  }

  const orch = new Orchestrator(orchestratorConfig, {
    feed: new KiteTickerFeed({ apiKey, accessToken }),
    historical: new KiteHistoricalProvider({ apiKey, accessToken, offsetMinutes: offset }),
    sink,
    lookup: book,
    journal,
    onEvent,
  });

  // Load persisted state
  const store = new StateStore(instanceId, s.stateFile);
  const persisted = await store.load();
  if (persisted) orch.restore(persisted);

  const commands = new CommandHandler(orch, offset);
  if (telegram) {
    const { bot, chatId } = telegram;
    const reply = (task: () => Promise<string>): void => {
      task()
        .then((text) => sendTelegramMessageSafe(bot, chatId, text))
        .catch((err: unknown) => console.warn(`[Telegram] command failed: ${errorMessage(err)}`));
    };
    bot.onText(/\/status/, () => reply(() => commands.status()));
    bot.onText(/\/exit/, () => reply(() => commands.exit()));
  }

  await orch.start();

  const scheduler = new Scheduler(orch, s.times, offset);
  scheduler.start();

  // Structured pulse (every 60 seconds)
  const pulseTimer = setInterval(() => {
    const st = orch.getStatus();
    const pulse = {
      mode: s.mode,
      date: st.date,
      index: st.indexPrice ?? null,
      band: st.band?.stage ?? null,
      legs: st.legs ? [st.legs.call.symbol, st.legs.put.symbol] : null,
      entry: st.session.entry.phase,
      position: st.session.position?.tradeId ?? null,
      stop: st.session.stop,
      dailyPnl: Number(st.session.dailyPnl.toFixed(2)),
      trades: st.session.trades,
      halted: st.session.halted,
      ticks: st.ticks,
      queued: st.queued,
      lateDropped: st.lateDropped,
    };
    console.log(`[PULSE] ${JSON.stringify(pulse)}`);
  }, 60_000);

  // Periodic state persistence (every 15 seconds)
  const persistTimer = setInterval(() => {
    store.save(orch.toPersisted()).catch((err: unknown) => {
      console.warn(`[persist] save failed: ${errorMessage(err)}`);
    });
  }, 15_000);

  notify(`[${instanceId}] ✅ Engine online. Mode: ${s.mode}`);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    console.log(`[${instanceId}] ${signal} received, shutting down`);
    scheduler.stop();
    clearInterval(pulseTimer);
    clearInterval(persistTimer);
    orch
      .shutdown()
      .then(() => store.save(orch.toPersisted()))
      .then(() => journal.flush())
      .then(() => (telegram ? telegram.bot.stopPolling() : undefined))
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error(`[${instanceId}] Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}
