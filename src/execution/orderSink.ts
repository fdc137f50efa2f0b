import type { ExitReason, OrderRequest, OrderResult, OrderSink } from "../types.js";
import { errorMessage } from "../utils/errors.js";

type SignalType = "ENTRY" | "EXIT";

export type PaperFill = {
  orderId: string;
  signal: SignalType;
  tradeId: string;
  symbol: string;
  qty: number;
  price: number;
  ts: number;
};

/**
 * Simulated broker: every order fills immediately at the requested price.
 */
export class PaperOrderSink implements OrderSink {
  private seq = 0;
  private readonly fills: PaperFill[] = [];

  async placeEntry(order: OrderRequest & { stopLoss: number }): Promise<OrderResult> {
    return this.fill("ENTRY", order);
  }

  async placeExit(order: OrderRequest & { reason: ExitReason }): Promise<OrderResult> {
    return this.fill("EXIT", order);
  }

  getFills(): PaperFill[] {
    return [...this.fills];
  }

  private fill(signal: SignalType, order: OrderRequest): OrderResult {
    this.seq++;
    const orderId = `PAPER_${order.ts}_${this.seq}`;
    this.fills.push({
      orderId,
      signal,
      tradeId: order.tradeId,
      symbol: order.contract.symbol,
      qty: order.qty,
      price: order.price,
      ts: order.ts,
    });
    console.log(`[Paper] ${signal} ${order.contract.symbol} x${order.qty} @ ${order.price.toFixed(2)} (${orderId})`);
    return { status: "success", orderId, price: order.price };
  }
}

export type AlgoTestConfig = {
  baseUrl: string;
  apiKey: string;
  maxRetries?: number;
  timeoutMs?: number;
  backoffBaseMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function readString(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function readNumber(body: unknown, key: string): number | undefined {
  if (typeof body !== "object" || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  const n = typeof value === "string" ? Number(value) : value;
  return typeof n === "number" && Number.isFinite(n) ? n : undefined;
}

/**
 * Signal webhook for the live broker bridge. Retries with exponential
 * backoff; the idempotency key keeps a retried request from doubling an order.
 */
export class AlgoTestOrderSink implements OrderSink {
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly backoffBaseMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly config: AlgoTestConfig) {
    this.maxRetries = Math.max(1, config.maxRetries ?? 3);
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.backoffBaseMs = config.backoffBaseMs ?? 1000;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.sleep = config.sleep ?? defaultSleep;
  }

  async placeEntry(order: OrderRequest & { stopLoss: number }): Promise<OrderResult> {
    return this.send("ENTRY", order, { side: "BUY", stop_loss: order.stopLoss });
  }

  async placeExit(order: OrderRequest & { reason: ExitReason }): Promise<OrderResult> {
    return this.send("EXIT", order, { side: "SELL", exit_reason: order.reason });
  }

  private async send(
    signal: SignalType,
    order: OrderRequest,
    extra: Record<string, string | number>
  ): Promise<OrderResult> {
    const payload = {
      signal_type: signal,
      trade_id: order.tradeId,
      symbol: order.contract.symbol,
      qty: order.qty,
      order_type: "MARKET",
      price: order.price,
      timestamp: Math.floor(order.ts / 1000),
      ...extra,
    };
    const url = `${this.config.baseUrl.replace(/\/+$/, "")}/signals`;
    const idempotencyKey = `${order.tradeId}-${signal}`;
    let lastError = "unknown error";

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        console.log(`[AlgoTest] Sending ${signal} ${order.tradeId} (attempt ${attempt}/${this.maxRetries})`);
        const response = await this.fetchImpl(url, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.config.apiKey}`,
            "Content-Type": "application/json",
            "Idempotency-Key": idempotencyKey,
          },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
          const text = await response.text().catch(() => "");
          lastError = `HTTP ${response.status}${text ? `: ${text.slice(0, 200)}` : ""}`;
          // Client errors other than rate limiting will not succeed on retry.
          if (response.status >= 400 && response.status < 500 && response.status !== 429) {
            console.error(`[AlgoTest] ${signal} ${order.tradeId} rejected: ${lastError}`);
            return { status: "error", message: lastError };
          }
        } else {
          const body: unknown = await response.json().catch(() => null);
          const orderId = readString(body, "order_id") ?? readString(body, "id") ?? idempotencyKey;
          const price = readNumber(body, "average_price") ?? order.price;
          console.log(`[AlgoTest] ${signal} ${order.tradeId} accepted (order ${orderId})`);
          return { status: "success", orderId, price };
        }
      } catch (err) {
        lastError = errorMessage(err);
      }

      console.warn(`[AlgoTest] ${signal} ${order.tradeId} attempt ${attempt} failed: ${lastError}`);
      if (attempt < this.maxRetries) {
        await this.sleep(this.backoffBaseMs * 2 ** (attempt - 1));
      }
    }

    console.error(`[AlgoTest] ${signal} ${order.tradeId} failed after ${this.maxRetries} attempts`);
    return { status: "error", message: lastError };
  }
}
