import { err, ok, type Result } from "neverthrow";
import type {
  HistoricalEntryEntity,
  HistoryDateRange,
} from "../../core/entities/historicalEntry";
import type { StockEntity } from "../../core/entities/stock";
import type {
  HistoricalEntryRepositoryPort,
  StockRepositoryPort,
} from "../../core/ports/outboundPorts";
import { isTradingDay } from "../../core/time/tradingDay";

export type HistoryQueryError =
  | { type: "StockNotFoundError"; message: string; stockCode: string }
  | { type: "NoHistoryError"; message: string; stockId: string }
  | { type: "InvalidDateRangeError"; message: string };

export type StockHistory = {
  stock: StockEntity;
  history: HistoricalEntryEntity[];
};

export type StockHistoryInRange = StockHistory & {
  startDate: string;
  endDate: string;
};

/**
 * Read paths over stored history, all addressed by stock code.
 */
export class HistoryQueryService {
  constructor(
    private readonly stocksRepo: StockRepositoryPort,
    private readonly historyRepo: HistoricalEntryRepositoryPort,
  ) {}

  async getHistoryByCode(
    stockCode: string,
  ): Promise<Result<StockHistory, HistoryQueryError>> {
    const stock = await this.findStock(stockCode);
    if (stock.isErr()) {
      return err(stock.error);
    }

    return ok({
      stock: stock.value,
      history: await this.historyRepo.findByStockId(stock.value.id),
    });
  }

  /**
   * Both bounds are YYYY-MM-DD trading days and inclusive.
   */
  async getHistoryInRange(
    stockCode: string,
    startDate: string,
    endDate: string,
  ): Promise<Result<StockHistoryInRange, HistoryQueryError>> {
    if (!isTradingDay(startDate) || !isTradingDay(endDate)) {
      return err({
        type: "InvalidDateRangeError",
        message: `Invalid date format: expected YYYY-MM-DD, got ${startDate} and ${endDate}`,
      });
    }
    if (startDate > endDate) {
      return err({
        type: "InvalidDateRangeError",
        message: `Start date ${startDate} is after end date ${endDate}`,
      });
    }

    const stock = await this.findStock(stockCode);
    if (stock.isErr()) {
      return err(stock.error);
    }

    return ok({
      stock: stock.value,
      startDate,
      endDate,
      history: await this.historyRepo.findByStockIdAndDateRange(
        stock.value.id,
        startDate,
        endDate,
      ),
    });
  }

  async getLatestEntry(
    stockCode: string,
  ): Promise<
    Result<{ stock: StockEntity; latest: HistoricalEntryEntity }, HistoryQueryError>
  > {
    const stock = await this.findStock(stockCode);
    if (stock.isErr()) {
      return err(stock.error);
    }

    const latest = await this.historyRepo.findLatestByStockId(stock.value.id);
    if (!latest) {
      return err({
        type: "NoHistoryError",
        message: `No historical data found for stock ${stock.value.code}`,
        stockId: stock.value.id,
      });
    }

    return ok({ stock: stock.value, latest });
  }

  async getAvailableDateRange(
    stockCode: string,
  ): Promise<
    Result<{ stock: StockEntity; dateRange: HistoryDateRange }, HistoryQueryError>
  > {
    const stock = await this.findStock(stockCode);
    if (stock.isErr()) {
      return err(stock.error);
    }

    return ok({
      stock: stock.value,
      dateRange: await this.historyRepo.getDateRangeForStock(stock.value.id),
    });
  }

  private async findStock(
    stockCode: string,
  ): Promise<Result<StockEntity, HistoryQueryError>> {
    const stock = await this.stocksRepo.findByCode(stockCode);
    if (!stock) {
      return err({
        type: "StockNotFoundError",
        message: `Stock with code ${stockCode} not found`,
        stockCode,
      });
    }
    return ok(stock);
  }
}
