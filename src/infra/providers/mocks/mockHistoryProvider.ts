import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import type {
  HistoryProviderPort,
  RawHistoryEntry,
} from "../../../core/ports/inboundPorts";

const SECONDS_PER_DAY = 24 * 60 * 60;

const formatBrl = (value: number): string => value.toFixed(2).replace(".", ",");

const seedFor = (code: string): number =>
  [...code].reduce((total, char) => total + char.charCodeAt(0), 0);

/**
 * Generates repeatable daily quotes so ingestion runs can be exercised without the quotes
 * endpoint. Page 0 holds the most recent days, one entry per calendar day, stamped at
 * 13:00 UTC.
 */
export class MockHistoryProvider implements HistoryProviderPort {
  constructor(
    private readonly clock: ClockPort,
    private readonly pageSize = 50,
  ) {}

  async fetchPage(
    stockCode: string,
    pageIndex: number,
  ): Promise<Result<RawHistoryEntry[], AppBoundaryError>> {
    const code = stockCode.toUpperCase();
    const now = this.clock.now();
    const anchor =
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), 13) /
      1000;
    const base = 10 + (seedFor(code) % 40);

    return ok(
      Array.from({ length: this.pageSize }, (_, index) => {
        const offset = pageIndex * this.pageSize + index;
        const timestamp = anchor - offset * SECONDS_PER_DAY;
        const open = base + (offset % 7) * 0.25;
        const close = open + ((offset % 3) - 1) * 0.1;
        const day = new Date(timestamp * 1000);

        return {
          dateDisplay: `${String(day.getUTCDate()).padStart(2, "0")}/${String(day.getUTCMonth() + 1).padStart(2, "0")}/${day.getUTCFullYear()}`,
          dateTimestamp: timestamp,
          openPrice: formatBrl(open),
          closePrice: formatBrl(close),
          variation: formatBrl(((close - open) / open) * 100),
          minPrice: formatBrl(Math.min(open, close) - 0.05),
          maxPrice: formatBrl(Math.max(open, close) + 0.05),
          volume: String(100_000 + offset * 1_000),
        };
      }),
    );
  }
}
