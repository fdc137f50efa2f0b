import type { InstrumentId, Tick } from "../types.js";
import { errorMessage } from "../utils/errors.js";

export type TickConsumer = (tick: Tick) => void;

export type TickQueueOptions = {
  capacity?: number;
  batchSize?: number;
};

/**
 * Bounded FIFO between feed callbacks and the single aggregation consumer.
 * Producers only push; drain() is the one place ticks reach the consumer,
 * so candle state is never touched from two call paths at once.
 */
export class TickQueue {
  private buffer: Tick[] = [];
  private head = 0;
  private readonly capacity: number;
  private readonly batchSize: number;
  private dropped = 0;
  private scheduled = false;
  private autoDrain = false;

  constructor(private readonly consumer: TickConsumer, options: TickQueueOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 50_000);
    this.batchSize = Math.max(1, options.batchSize ?? 500);
  }

  /**
   * Drain on the event loop after every push (setImmediate batches).
   */
  startAutoDrain(): void {
    this.autoDrain = true;
    this.schedule();
  }

  stopAutoDrain(): void {
    this.autoDrain = false;
  }

  push(instrumentId: InstrumentId, price: number, ts: number): void {
    if (this.size() >= this.capacity) {
      this.head++;
      this.dropped++;
      if (this.dropped === 1 || this.dropped % 1000 === 0) {
        console.warn(`[TickQueue] Queue full (${this.capacity}), dropped oldest tick (total dropped=${this.dropped})`);
      }
    }
    this.buffer.push({ instrumentId, price, ts });
    if (this.autoDrain) this.schedule();
  }

  size(): number {
    return this.buffer.length - this.head;
  }

  getDropped(): number {
    return this.dropped;
  }

  /**
   * Hand up to `max` ticks to the consumer. Returns how many were consumed.
   */
  drain(max: number = Number.POSITIVE_INFINITY): number {
    let consumed = 0;
    while (consumed < max && this.head < this.buffer.length) {
      const tick = this.buffer[this.head];
      this.head++;
      if (!tick) continue;
      consumed++;
      try {
        this.consumer(tick);
      } catch (err) {
        console.error(`[TickQueue] Consumer failed for ${tick.instrumentId}: ${errorMessage(err)}`);
      }
    }
    this.compact();
    return consumed;
  }

  private compact(): void {
    if (this.head === 0) return;
    if (this.head >= this.buffer.length) {
      this.buffer = [];
      this.head = 0;
    } else if (this.head > 4096) {
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }
  }

  private schedule(): void {
    if (this.scheduled || !this.autoDrain) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.drain(this.batchSize);
      if (this.size() > 0) this.schedule();
    });
  }
}
