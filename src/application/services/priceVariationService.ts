import { err, ok, type Result } from "neverthrow";
import type { HistoricalEntryEntity } from "../../core/entities/historicalEntry";
import type {
  HistoricalEntryRepositoryPort,
  StockRepositoryPort,
} from "../../core/ports/outboundPorts";
import { shiftTradingDay } from "../../core/time/tradingDay";

export type PricePoint = Pick<HistoricalEntryEntity, "tradingDate" | "variation">;

export type PriceVariation = {
  stockId: string;
  days: number;
  startDate: string;
  endDate: string;
  startPrice: string;
  endPrice: string;
  absoluteVariation: number;
  percentageVariation: number;
};

export type PriceVariationError =
  | { type: "StockNotFoundError"; message: string; stockCode: string }
  | { type: "NoHistoryError"; message: string; stockId: string }
  | {
      type: "NoDataInWindowError";
      message: string;
      stockId: string;
      days: number;
    }
  | { type: "ParseError"; message: string; value: string };

const roundTo2 = (value: number): number =>
  Math.round((value + Number.EPSILON) * 100) / 100;

const COMMA_DECIMAL = /^-?(\d{1,3}(\.\d{3})+|\d+),\d+$/;
const DOT_DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * Reads "1.234,56", "12,50" or "12.50". Dots are thousands separators only when a comma
 * is present. Anything else, hex and exponents included, is a ParseError.
 */
export const parseDecimal = (
  value: string,
): Result<number, PriceVariationError> => {
  const trimmed = value.trim();
  const normalized = COMMA_DECIMAL.test(trimmed)
    ? trimmed.replace(/\./g, "").replace(",", ".")
    : trimmed;

  if (!DOT_DECIMAL.test(normalized)) {
    return err({
      type: "ParseError",
      message: `Cannot read '${value}' as a number`,
      value,
    });
  }
  const parsed = Number(normalized);
  return ok(parsed);
};

/**
 * Change from the earliest point in `window` to `latest`. A zero start yields a 0%
 * percentage.
 */
export const calculatePriceVariation = (
  stockId: string,
  days: number,
  window: readonly PricePoint[],
  latest: PricePoint,
): Result<PriceVariation, PriceVariationError> => {
  const [earliest] = [...window].sort((left, right) =>
    left.tradingDate.localeCompare(right.tradingDate),
  );
  if (!earliest) {
    return err({
      type: "NoDataInWindowError",
      message: `No historical data available for the last ${days} days`,
      stockId,
      days,
    });
  }

  return parseDecimal(earliest.variation).andThen((start) =>
    parseDecimal(latest.variation).map((end) => {
      const absolute = end - start;
      const percentage = start === 0 ? 0 : (absolute / start) * 100;

      return {
        stockId,
        days,
        startDate: earliest.tradingDate,
        endDate: latest.tradingDate,
        startPrice: earliest.variation,
        endPrice: latest.variation,
        absoluteVariation: roundTo2(absolute),
        percentageVariation: roundTo2(percentage),
      };
    }),
  );
};

export class PriceVariationService {
  constructor(
    private readonly stocksRepo: StockRepositoryPort,
    private readonly historyRepo: HistoricalEntryRepositoryPort,
  ) {}

  /**
   * The window is `[latest.tradingDate - days, latest.tradingDate]`, both ends inclusive.
   */
  async getPriceVariation(
    stockId: string,
    days: number,
  ): Promise<Result<PriceVariation, PriceVariationError>> {
    const latest = await this.historyRepo.findLatestByStockId(stockId);
    if (!latest) {
      return err({
        type: "NoHistoryError",
        message: "No historical data available for this stock",
        stockId,
      });
    }

    const window = await this.historyRepo.findByStockIdAndDateRange(
      stockId,
      shiftTradingDay(latest.tradingDate, -days),
      latest.tradingDate,
    );

    return calculatePriceVariation(stockId, days, window, latest);
  }

  async getPriceVariationByCode(
    stockCode: string,
    days: number,
  ): Promise<Result<PriceVariation, PriceVariationError>> {
    const stock = await this.stocksRepo.findByCode(stockCode);
    if (!stock) {
      return err({
        type: "StockNotFoundError",
        message: `Stock with code ${stockCode} not found`,
        stockCode,
      });
    }

    return this.getPriceVariation(stock.id, days);
  }
}
