import type postgres from "postgres";
import type { StockLockPort } from "../../core/ports/outboundPorts";
import { InProcessStockLock } from "../system/systemPorts";

/**
 * Holds a Postgres session advisory lock keyed on the stock id for the duration of
 * `work`, so ingestion runs in other processes wait as well. Callers in this process
 * queue locally first, so waiters never pin more than one pooled connection per stock.
 */
export class PostgresAdvisoryStockLock implements StockLockPort {
  constructor(
    private readonly sql: postgres.Sql,
    private readonly local: StockLockPort = new InProcessStockLock(),
  ) {}

  async withStockLock<T>(stockId: string, work: () => Promise<T>): Promise<T> {
    return this.local.withStockLock(stockId, async () => {
      const connection = await this.sql.reserve();
      try {
        await connection`select pg_advisory_lock(hashtext(${stockId}))`;
        try {
          return await work();
        } finally {
          await connection`select pg_advisory_unlock(hashtext(${stockId}))`;
        }
      } finally {
        connection.release();
      }
    });
  }
}
