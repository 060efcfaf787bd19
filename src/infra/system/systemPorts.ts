import { randomUUID } from "node:crypto";
import type { StockEntity } from "../../core/entities/stock";
import type {
  ClockPort,
  HistoryJobFactoryPort,
  HistoryJobPayload,
  IdGeneratorPort,
  StockLockPort,
} from "../../core/ports/outboundPorts";

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}

/**
 * Builds history job payloads. The idempotency key buckets requests per stock and hour,
 * so repeated enqueues inside the same hour collapse into one job.
 * Uses hyphen delimiters because BullMQ custom job ids cannot include colon.
 */
export class HistoryJobFactory implements HistoryJobFactoryPort {
  constructor(private readonly clock: ClockPort) {}

  create(
    stock: Pick<StockEntity, "id" | "code">,
    pages: number,
  ): HistoryJobPayload {
    const now = this.clock.now();
    const hourBucket = now.toISOString().slice(0, 13);
    const stockCode = stock.code.toUpperCase();

    return {
      stockId: stock.id,
      stockCode,
      pages,
      idempotencyKey: `${stockCode}-history-${hourBucket}`,
      requestedAt: now.toISOString(),
    };
  }
}

/**
 * Queues work per stock inside this process. Each caller waits for the tail of the
 * stock's chain, then becomes the new tail.
 */
export class InProcessStockLock implements StockLockPort {
  private readonly tails = new Map<string, Promise<void>>();

  async withStockLock<T>(stockId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(stockId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(stockId, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(stockId) === tail) {
        this.tails.delete(stockId);
      }
    }
  }

  /** Stocks with a holder or a waiter. */
  get lockedStocks(): number {
    return this.tails.size;
  }
}
