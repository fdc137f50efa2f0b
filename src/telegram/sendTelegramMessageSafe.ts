import type TelegramBot from "node-telegram-bot-api";

// Only the methods we actually use, so tests can pass a fake bot
export type TelegramBotLike = {
  sendMessage: (chatId: number, text: string, options?: TelegramBot.SendMessageOptions) => Promise<unknown>;
};

export function chunkString(str: string, maxLen: number): string[] {
  if (str.length <= maxLen) return [str];
  const chunks: string[] = [];
  let i = 0;

  while (i < str.length) {
    let end = Math.min(i + maxLen, str.length);
    const slice = str.slice(i, end);
    const lastNewline = slice.lastIndexOf("\n");
    if (end < str.length && lastNewline > Math.floor(maxLen * 0.6)) end = i + lastNewline + 1;
    chunks.push(str.slice(i, end));
    i = end;
  }
  return chunks;
}

/**
 * Seconds Telegram asked us to wait (HTTP 429), if the error carries one.
 */
export function retryAfterSeconds(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const response: unknown = Reflect.get(err, "response");
  if (typeof response !== "object" || response === null) return undefined;
  const body: unknown = Reflect.get(response, "body");
  if (typeof body !== "object" || body === null) return undefined;
  const parameters: unknown = Reflect.get(body, "parameters");
  if (typeof parameters !== "object" || parameters === null) return undefined;
  const retryAfter: unknown = Reflect.get(parameters, "retry_after");
  return typeof retryAfter === "number" && retryAfter > 0 ? retryAfter : undefined;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export async function sendTelegramMessageSafe(
  bot: TelegramBotLike,
  chatId: number,
  text: string,
  sleep: (ms: number) => Promise<void> = defaultSleep
): Promise<void> {
  const MAX = 3800;
  const chunks = chunkString(text, MAX);

  for (const part of chunks) {
    try {
      await bot.sendMessage(chatId, part, { disable_web_page_preview: true });
    } catch (err) {
      const retryAfter = retryAfterSeconds(err);
      if (retryAfter === undefined) throw err;
      await sleep(retryAfter * 1000);
      await bot.sendMessage(chatId, part, { disable_web_page_preview: true });
    }
    if (chunks.length > 1) await sleep(80);
  }
}
