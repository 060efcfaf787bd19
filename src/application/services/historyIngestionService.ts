import type { Logger } from "pino";
import type { NewHistoricalEntry } from "../../core/entities/historicalEntry";
import type { StockEntity } from "../../core/entities/stock";
import type {
  HistoryProviderPort,
  RawHistoryEntry,
} from "../../core/ports/inboundPorts";
import type {
  HistoricalEntryRepositoryPort,
  StockLockPort,
  StockRepositoryPort,
} from "../../core/ports/outboundPorts";
import { toTradingDay } from "../../core/time/tradingDay";
import { toErrorDetails } from "../../shared/logger/logger";

export type HistoryIngestionResult = {
  success: boolean;
  stockId: string;
  stockCode: string;
  pagesRequested: number;
  entriesSaved: number;
  duplicatesSkipped: number;
  errors: string[];
};

export type HistoryIngestionOptions = {
  marketTimeZone: string;
};

/**
 * Pulls paginated daily history for a stock and persists only trading days the stock
 * does not have yet. Pages run one after another: the source paginates per session,
 * and the known-days set is shared across the whole run. Runs for the same stock hold
 * its lock from the baseline read to the last save, so two runs never claim the same day.
 */
export class HistoryIngestionService {
  constructor(
    private readonly historyProvider: HistoryProviderPort,
    private readonly stocksRepo: StockRepositoryPort,
    private readonly historyRepo: HistoricalEntryRepositoryPort,
    private readonly stockLock: StockLockPort,
    private readonly options: HistoryIngestionOptions,
    private readonly logger: Logger,
  ) {}

  async ingest(
    stock: Pick<StockEntity, "id" | "code">,
    pageCount: number,
  ): Promise<HistoryIngestionResult> {
    return this.stockLock.withStockLock(stock.id, () =>
      this.ingestLocked(stock, pageCount),
    );
  }

  private async ingestLocked(
    stock: Pick<StockEntity, "id" | "code">,
    pageCount: number,
  ): Promise<HistoryIngestionResult> {
    const baseline = await this.historyRepo.findByStockId(stock.id);
    const knownDays = new Set(baseline.map((entry) => entry.tradingDate));

    this.logger.info(
      { stockCode: stock.code, knownDays: knownDays.size, pageCount },
      "Loaded history baseline",
    );

    let entriesSaved = 0;
    let duplicatesSkipped = 0;
    const errors: string[] = [];

    for (let page = 0; page < pageCount; page += 1) {
      const pageResult = await this.historyProvider.fetchPage(stock.code, page);
      if (pageResult.isErr()) {
        this.logger.warn(
          {
            stockCode: stock.code,
            page,
            provider: pageResult.error.provider,
            code: pageResult.error.code,
            reason: pageResult.error.message,
          },
          "History page fetch failed",
        );
        errors.push(`Failed to fetch page ${page}: ${pageResult.error.message}`);
        continue;
      }

      const { batch, duplicates } = this.collectNovelEntries(
        stock.id,
        pageResult.value,
        knownDays,
      );
      duplicatesSkipped += duplicates;

      this.logger.info(
        {
          stockCode: stock.code,
          page,
          fetched: pageResult.value.length,
          duplicates,
          saving: batch.length,
        },
        "History page deduplicated",
      );

      if (batch.length === 0) {
        continue;
      }

      try {
        const saved = await this.historyRepo.saveEntries(batch);
        entriesSaved += saved.length;
      } catch (error) {
        // The page's days were never stored, so a later page may still supply them.
        batch.forEach((entry) => knownDays.delete(entry.tradingDate));
        this.logger.error(
          { stockCode: stock.code, page, error: toErrorDetails(error) },
          "History page save failed",
        );
        errors.push(
          `Failed to save page ${page}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    const result: HistoryIngestionResult = {
      success: entriesSaved > 0 || duplicatesSkipped > 0,
      stockId: stock.id,
      stockCode: stock.code,
      pagesRequested: pageCount,
      entriesSaved,
      duplicatesSkipped,
      errors,
    };

    this.logger.info(
      {
        stockCode: stock.code,
        entriesSaved,
        duplicatesSkipped,
        errorCount: errors.length,
        success: result.success,
      },
      "History ingestion finished",
    );

    return result;
  }

  /**
   * Resolves the stock by code first; unknown codes produce a failed result rather than a throw.
   */
  async ingestByCode(
    stockCode: string,
    pageCount: number,
  ): Promise<HistoryIngestionResult> {
    const stock = await this.stocksRepo.findByCode(stockCode);
    if (!stock) {
      return {
        success: false,
        stockId: "",
        stockCode: stockCode.toUpperCase(),
        pagesRequested: pageCount,
        entriesSaved: 0,
        duplicatesSkipped: 0,
        errors: [`Stock with code ${stockCode} not found`],
      };
    }

    return this.ingest(stock, pageCount);
  }

  /**
   * Ingests every active stock in code order, one stock at a time.
   */
  async ingestAll(pageCount: number): Promise<HistoryIngestionResult[]> {
    const stocks = await this.stocksRepo.findAll({ orderBy: { field: "code" } });
    const results: HistoryIngestionResult[] = [];

    for (const stock of stocks) {
      results.push(await this.ingest(stock, pageCount));
    }

    return results;
  }

  /**
   * Claims each new day in `knownDays` as soon as it is seen, so a day repeated later in
   * the page or on a later page counts as a duplicate.
   */
  private collectNovelEntries(
    stockId: string,
    rawEntries: RawHistoryEntry[],
    knownDays: Set<string>,
  ): { batch: NewHistoricalEntry[]; duplicates: number } {
    const batch: NewHistoricalEntry[] = [];
    let duplicates = 0;

    for (const raw of rawEntries) {
      const tradingDate = toTradingDay(
        raw.dateTimestamp,
        this.options.marketTimeZone,
      );
      if (knownDays.has(tradingDate)) {
        duplicates += 1;
        continue;
      }

      knownDays.add(tradingDate);
      batch.push({
        stockId,
        tradingDate,
        openPrice: raw.openPrice,
        closePrice: raw.closePrice,
        variation: raw.variation,
        minPrice: raw.minPrice,
        maxPrice: raw.maxPrice,
        volume: raw.volume,
      });
    }

    return { batch, duplicates };
  }
}
