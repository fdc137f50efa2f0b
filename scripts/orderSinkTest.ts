import { test } from "node:test";
import assert from "node:assert/strict";
import { AlgoTestOrderSink, PaperOrderSink } from "../src/execution/orderSink.js";
import type { OptionContract, OrderRequest } from "../src/types.js";
import { at } from "./helpers/bandScenario.js";

const CONTRACT: OptionContract = {
  instrumentId: 256266,
  symbol: "NIFTY21800CE",
  strike: 21800,
  optionType: "CE",
  expiry: "2024-01-18",
  lotSize: 75,
};

const ORDER: OrderRequest = {
  tradeId: "20240115_101500_CALL_100",
  side: "CALL",
  contract: CONTRACT,
  qty: 75,
  price: 100,
  ts: at("10:15"),
};

type Call = { url: string; idempotencyKey: string | null; body: unknown };

function fakeFetch(responses: Response[], calls: Call[]): typeof fetch {
  return async (input, init) => {
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : null;
    calls.push({ url: String(input), idempotencyKey: new Headers(init?.headers).get("Idempotency-Key"), body });
    const next = responses.shift();
    if (!next) throw new Error("no response queued");
    return next;
  };
}

function sink(responses: Response[], calls: Call[], sleeps: number[] = []): AlgoTestOrderSink {
  return new AlgoTestOrderSink({
    baseUrl: "https://signals.test/",
    apiKey: "test-key",
    fetchImpl: fakeFetch(responses, calls),
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
}

test("paper fills at the requested price", async () => {
  const paper = new PaperOrderSink();
  const result = await paper.placeEntry({ ...ORDER, stopLoss: 90 });
  assert.deepEqual(result, { status: "success", orderId: `PAPER_${ORDER.ts}_1`, price: 100 });
  assert.equal(paper.getFills()[0]?.signal, "ENTRY");
});

test("entry signal payload and fill price", async () => {
  const calls: Call[] = [];
  const result = await sink([Response.json({ order_id: "A1", average_price: 100.5 })], calls).placeEntry({
    ...ORDER,
    stopLoss: 90,
  });

  assert.deepEqual(result, { status: "success", orderId: "A1", price: 100.5 });
  assert.equal(calls[0]?.url, "https://signals.test/signals");
  assert.equal(calls[0]?.idempotencyKey, "20240115_101500_CALL_100-ENTRY");
  assert.deepEqual(calls[0]?.body, {
    signal_type: "ENTRY",
    trade_id: "20240115_101500_CALL_100",
    symbol: "NIFTY21800CE",
    qty: 75,
    order_type: "MARKET",
    price: 100,
    timestamp: Math.floor(ORDER.ts / 1000),
    side: "BUY",
    stop_loss: 90,
  });
});

test("server errors are retried with backoff under the same key", async () => {
  const calls: Call[] = [];
  const sleeps: number[] = [];
  const result = await sink(
    [new Response("busy", { status: 503 }), new Response("busy", { status: 500 }), Response.json({ id: 77 })],
    calls,
    sleeps
  ).placeExit({ ...ORDER, price: 120, reason: "SL_HIT" });

  assert.deepEqual(result, { status: "success", orderId: "77", price: 120 });
  assert.deepEqual(sleeps, [1000, 2000]);
  assert.deepEqual(
    calls.map((c) => c.idempotencyKey),
    ["20240115_101500_CALL_100-EXIT", "20240115_101500_CALL_100-EXIT", "20240115_101500_CALL_100-EXIT"]
  );
});

test("client errors are not retried", async () => {
  const calls: Call[] = [];
  const result = await sink([new Response("bad symbol", { status: 400 })], calls).placeExit({
    ...ORDER,
    reason: "MANUAL",
  });
  assert.deepEqual(result, { status: "error", message: "HTTP 400: bad symbol" });
  assert.equal(calls.length, 1);
});

test("giving up reports the last error", async () => {
  const calls: Call[] = [];
  const result = await sink([], calls).placeEntry({ ...ORDER, stopLoss: 90 });
  assert.deepEqual(result, { status: "error", message: "no response queued" });
  assert.equal(calls.length, 3);
});
