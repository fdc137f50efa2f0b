/**
 * Kite Connect ticker feed
 * Binary market-data packets over WebSocket, full mode for every subscribed token.
 */

import WebSocket from "ws";
import type { FeedClient, InstrumentId, Tick, TickHandler } from "../types.js";
import { errorMessage } from "../utils/errors.js";

export interface KiteTickerConfig {
  apiKey: string;
  accessToken: string;
  url?: string;                // Default: wss://ws.kite.trade
  mode?: "ltp" | "quote" | "full";
}

const SEGMENT_CDS = 3;
const SEGMENT_BCD = 6;
const SEGMENT_INDICES = 9;

function priceDivisor(token: number): number {
  const segment = token & 0xff;
  if (segment === SEGMENT_CDS) return 10_000_000;
  if (segment === SEGMENT_BCD) return 10_000;
  return 100;
}

/**
 * Decode one binary ticker message into ticks. The first two bytes hold the
 * packet count; each packet is prefixed by its two-byte length. Packets
 * without an exchange timestamp are stamped with `receivedAt`.
 */
export function parseBinaryMessage(buf: Buffer, receivedAt: number): Tick[] {
  if (buf.length < 2) return []; // heartbeat
  const count = buf.readUInt16BE(0);
  const ticks: Tick[] = [];
  let offset = 2;

  for (let i = 0; i < count; i++) {
    if (offset + 2 > buf.length) break;
    const length = buf.readUInt16BE(offset);
    offset += 2;
    if (offset + length > buf.length) break;
    const packet = buf.subarray(offset, offset + length);
    offset += length;

    const tick = parsePacket(packet, receivedAt);
    if (tick) ticks.push(tick);
  }
  return ticks;
}

function parsePacket(packet: Buffer, receivedAt: number): Tick | null {
  if (packet.length < 8) return null;
  const token = packet.readUInt32BE(0);
  const divisor = priceDivisor(token);
  const price = packet.readInt32BE(4) / divisor;
  const isIndex = (token & 0xff) === SEGMENT_INDICES;

  let exchangeTs: number | undefined;
  if (isIndex && packet.length >= 32) {
    exchangeTs = packet.readUInt32BE(28);
  } else if (!isIndex && packet.length >= 64) {
    exchangeTs = packet.readUInt32BE(60);
  }

  return {
    instrumentId: token,
    price,
    ts: exchangeTs && exchangeTs > 0 ? exchangeTs * 1000 : receivedAt,
  };
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class KiteTickerFeed implements FeedClient {
  private ws: WebSocket | null = null;
  private readonly tokens: Set<InstrumentId> = new Set();
  private readonly handlers: TickHandler[] = [];
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectBackoff: number = 5000; // Start with 5 seconds
  private readonly maxBackoff: number = 60000;
  private closed = false;
  private isConnected = false;
  private ticksReceived = 0;

  constructor(private readonly config: KiteTickerConfig) {}

  /**
   * Tokens requested before the socket is open are sent on connect, and the
   * whole set is re-sent after every reconnect.
   */
  subscribe(instrumentIds: InstrumentId[]): void {
    const fresh = instrumentIds.filter((id) => !this.tokens.has(id));
    for (const id of fresh) this.tokens.add(id);
    if (fresh.length === 0) return;
    if (this.isConnected) {
      this.sendSubscription(fresh);
    } else {
      console.log(`[KiteTicker] Queued subscription for ${fresh.join(", ")} until connected`);
    }
  }

  onTick(handler: TickHandler): void {
    this.handlers.push(handler);
  }

  getStats(): { connected: boolean; tokens: number; ticksReceived: number } {
    return { connected: this.isConnected, tokens: this.tokens.size, ticksReceived: this.ticksReceived };
  }

  /**
   * Resolves once the first connection is open. Reconnects continue in the
   * background until close().
   */
  start(): Promise<void> {
    this.closed = false;
    return new Promise((resolve) => {
      this.connect(resolve);
    });
  }

  close(): void {
    this.closed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws.close();
      this.ws = null;
    }
    this.isConnected = false;
  }

  private getWebSocketUrl(): string {
    const base = this.config.url ?? "wss://ws.kite.trade";
    const params = new URLSearchParams({ api_key: this.config.apiKey, access_token: this.config.accessToken });
    return `${base}?${params.toString()}`;
  }

  private connect(onFirstOpen?: () => void): void {
    if (this.closed) return;
    console.log(`[KiteTicker] Connecting (backoff: ${this.reconnectBackoff}ms)...`);
    const ws = new WebSocket(this.getWebSocketUrl());
    this.ws = ws;

    ws.on("open", () => {
      this.isConnected = true;
      this.reconnectBackoff = 5000;
      console.log(`[KiteTicker] Connected, subscribing ${this.tokens.size} tokens`);
      if (this.tokens.size > 0) this.sendSubscription([...this.tokens]);
      onFirstOpen?.();
      onFirstOpen = undefined;
    });

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (!isBinary) {
        this.handleText(toBuffer(data).toString("utf8"));
        return;
      }
      const ticks = parseBinaryMessage(toBuffer(data), Date.now());
      this.ticksReceived += ticks.length;
      for (const tick of ticks) {
        for (const handler of this.handlers) {
          try {
            handler(tick.instrumentId, tick.price, tick.ts);
          } catch (err) {
            console.error(`[KiteTicker] Tick handler failed: ${errorMessage(err)}`);
          }
        }
      }
    });

    ws.on("error", (err) => {
      console.error(`[KiteTicker] WebSocket error: ${errorMessage(err)}`);
    });

    ws.on("close", (code: number, reason: Buffer) => {
      this.isConnected = false;
      this.ws = null;
      console.log(`[KiteTicker] WebSocket closed (code: ${code}, reason: ${reason.toString() || "none"})`);
      if (this.closed) return;
      const wait = this.reconnectBackoff;
      this.reconnectBackoff = Math.min(this.reconnectBackoff * 1.5, this.maxBackoff);
      console.log(`[KiteTicker] Will reconnect in ${wait / 1000}s...`);
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        this.connect(onFirstOpen);
      }, wait);
    });
  }

  private sendSubscription(tokens: InstrumentId[]): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return;
    const mode = this.config.mode ?? "full";
    this.ws.send(JSON.stringify({ a: "subscribe", v: tokens }));
    this.ws.send(JSON.stringify({ a: "mode", v: [mode, tokens] }));
    console.log(`[KiteTicker] Subscribed ${tokens.join(", ")} (${mode})`);
  }

  private handleText(text: string): void {
    try {
      const message: unknown = JSON.parse(text);
      if (typeof message !== "object" || message === null) return;
      const type: unknown = Reflect.get(message, "type");
      if (type === "error") {
        console.error(`[KiteTicker] Server error: ${String(Reflect.get(message, "data"))}`);
      } else if (type === "message") {
        console.log(`[KiteTicker] Server message: ${String(Reflect.get(message, "data"))}`);
      }
    } catch (err) {
      console.warn(`[KiteTicker] Unparseable text frame: ${errorMessage(err)}`);
    }
  }
}
