import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  HistoryProviderPort,
  RawHistoryEntry,
} from "../../../core/ports/inboundPorts";
import {
  HttpJsonClient,
  type HttpClientError,
} from "../../http/httpJsonClient";

const PROVIDER = "quotes-api";

const figure = z.union([z.string(), z.number()]).transform(String);

/**
 * `[{ display, timestamp }, open, close, variation, min, max, volume]`
 */
const historyRowSchema = z.tuple([
  z.object({
    display: z.string(),
    timestamp: z.coerce.number().int().nonnegative(),
  }),
  figure,
  figure,
  figure,
  figure,
  figure,
  figure,
]);

const historyPageSchema = z.array(z.unknown());

export type QuotesHistoryProviderOptions = {
  baseUrl: string;
  historyPath: string;
  pageSize: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
};

/**
 * Reads one page of daily quotes per call. Rows that do not match the tuple layout are
 * dropped with a warning; a payload that is not a list fails the page.
 */
export class QuotesHistoryProvider implements HistoryProviderPort {
  constructor(
    private readonly options: QuotesHistoryProviderOptions,
    private readonly logger: Logger,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async fetchPage(
    stockCode: string,
    pageIndex: number,
  ): Promise<Result<RawHistoryEntry[], AppBoundaryError>> {
    const symbol = stockCode.trim().toUpperCase();
    const url = new URL(this.options.historyPath, this.options.baseUrl);

    this.logger.debug({ symbol, pageIndex }, "Fetching quotes history page");

    const payloadResult = await this.httpClient.requestJson({
      url: url.toString(),
      method: "POST",
      headers: { "x-requested-with": "XMLHttpRequest" },
      body: {
        kind: "form",
        fields: {
          page: pageIndex,
          numberItems: this.options.pageSize,
          symbol,
        },
      },
      timeoutMs: this.options.timeoutMs,
      retries: this.options.retries,
      retryDelayMs: this.options.retryDelayMs ?? 500,
    });

    if (payloadResult.isErr()) {
      return err(this.mapHttpError(payloadResult.error));
    }

    const page = historyPageSchema.safeParse(payloadResult.value);
    if (!page.success) {
      return err({
        source: "history",
        code: "malformed_response",
        provider: PROVIDER,
        message: "Quotes history response was not a list of rows.",
        retryable: false,
        cause: page.error.issues,
      });
    }

    const entries: RawHistoryEntry[] = [];
    page.data.forEach((row, rowIndex) => {
      const parsed = historyRowSchema.safeParse(row);
      if (!parsed.success) {
        this.logger.warn(
          { symbol, pageIndex, rowIndex, issues: parsed.error.issues.length },
          "Skipping malformed quotes history row",
        );
        return;
      }

      const [date, openPrice, closePrice, variation, minPrice, maxPrice, volume] =
        parsed.data;
      entries.push({
        dateDisplay: date.display,
        dateTimestamp: date.timestamp,
        openPrice,
        closePrice,
        variation,
        minPrice,
        maxPrice,
        volume,
      });
    });

    return ok(entries);
  }

  private mapHttpError(failure: HttpClientError): AppBoundaryError {
    return {
      source: "history",
      code: this.mapHttpCode(failure),
      provider: PROVIDER,
      message: failure.message,
      retryable: failure.retryable,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    };
  }

  private mapHttpCode(failure: HttpClientError): AppBoundaryError["code"] {
    if (failure.httpStatus === 429) {
      return "rate_limited";
    }

    switch (failure.code) {
      case "timeout":
        return "timeout";
      case "invalid_json":
        return "invalid_json";
      case "transport_error":
        return "transport_error";
      default:
        return "provider_error";
    }
  }
}
