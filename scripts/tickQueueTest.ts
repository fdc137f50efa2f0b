import { test } from "node:test";
import assert from "node:assert/strict";
import { TickQueue } from "../src/datafeed/tickQueue.js";
import type { Tick } from "../src/types.js";

const nextTurn = () => new Promise<void>((resolve) => setImmediate(resolve));

test("drain hands ticks to the consumer in arrival order", () => {
  const seen: Tick[] = [];
  const queue = new TickQueue((t) => seen.push(t));
  queue.push(1, 100, 1000);
  queue.push(2, 50, 1001);
  queue.push(1, 101, 1002);

  assert.equal(queue.size(), 3);
  assert.equal(queue.drain(), 3);
  assert.equal(queue.size(), 0);
  assert.deepEqual(
    seen.map((t) => [t.instrumentId, t.price]),
    [
      [1, 100],
      [2, 50],
      [1, 101],
    ]
  );
});

test("drain(max) consumes at most max ticks", () => {
  const seen: number[] = [];
  const queue = new TickQueue((t) => seen.push(t.price));
  for (let i = 0; i < 5; i++) queue.push(1, i, i);

  assert.equal(queue.drain(2), 2);
  assert.deepEqual(seen, [0, 1]);
  assert.equal(queue.size(), 3);
});

test("a full queue drops its oldest tick", () => {
  const seen: number[] = [];
  const queue = new TickQueue((t) => seen.push(t.price), { capacity: 2 });
  queue.push(1, 1, 1);
  queue.push(1, 2, 2);
  queue.push(1, 3, 3);

  assert.equal(queue.getDropped(), 1);
  queue.drain();
  assert.deepEqual(seen, [2, 3]);
});

test("a failing consumer call does not lose the rest of the batch", () => {
  const seen: number[] = [];
  const queue = new TickQueue((t) => {
    if (t.price === 2) throw new Error("bad tick");
    seen.push(t.price);
  });
  queue.push(1, 1, 1);
  queue.push(1, 2, 2);
  queue.push(1, 3, 3);

  assert.equal(queue.drain(), 3);
  assert.deepEqual(seen, [1, 3]);
});

test("auto-drain consumes on the next turn until stopped", async () => {
  const seen: number[] = [];
  const queue = new TickQueue((t) => seen.push(t.price));
  queue.startAutoDrain();

  queue.push(1, 10, 1);
  assert.deepEqual(seen, []);
  await nextTurn();
  assert.deepEqual(seen, [10]);

  queue.stopAutoDrain();
  queue.push(1, 11, 2);
  await nextTurn();
  assert.deepEqual(seen, [10]);
  assert.equal(queue.size(), 1);
});
