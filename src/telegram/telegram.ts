import TelegramBot from "node-telegram-bot-api";

export type TelegramHandle = { bot: TelegramBot; chatId: number };

/**
 * Alerts are optional: without a token the engine runs silently.
 */
export function initTelegram(config: { token?: string; chatId?: string }): TelegramHandle | null {
  if (!config.token) {
    console.log("[Telegram] TELEGRAM_BOT_TOKEN not set, alerts disabled");
    return null;
  }
  if (!config.chatId) throw new Error("Missing required env: TELEGRAM_CHAT_ID");
  const chatId = Number(config.chatId);
  if (!Number.isFinite(chatId)) throw new Error("TELEGRAM_CHAT_ID must be a number");

  const bot = new TelegramBot(config.token, { polling: true });
  return { bot, chatId };
}
