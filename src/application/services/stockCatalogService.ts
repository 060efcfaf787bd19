import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { StockEntity } from "../../core/entities/stock";
import type { StockListProviderPort } from "../../core/ports/inboundPorts";
import type { StockRepositoryPort } from "../../core/ports/outboundPorts";

export type StockSyncSummary = {
  received: number;
  created: StockEntity[];
};

/**
 * Keeps the stock table in step with the stock-list source and exposes catalogue lookups.
 */
export class StockCatalogService {
  constructor(
    private readonly stockListProvider: StockListProviderPort,
    private readonly stocksRepo: StockRepositoryPort,
    private readonly logger: Logger,
  ) {}

  async syncFromProvider(): Promise<Result<StockSyncSummary, AppBoundaryError>> {
    const fetched = await this.stockListProvider.fetchStocks();
    if (fetched.isErr()) {
      this.logger.warn(
        {
          provider: fetched.error.provider,
          code: fetched.error.code,
          reason: fetched.error.message,
        },
        "Stock list fetch failed",
      );
      return err(fetched.error);
    }

    const created = await this.stocksRepo.bulkCreateSkippingDuplicates(
      fetched.value,
    );
    return ok({ received: fetched.value.length, created });
  }

  async listStocks(): Promise<StockEntity[]> {
    return this.stocksRepo.findAll({ orderBy: { field: "code" } });
  }

  async getByCode(stockCode: string): Promise<StockEntity | null> {
    return this.stocksRepo.findByCode(stockCode);
  }

  async getById(stockId: string): Promise<StockEntity | null> {
    return this.stocksRepo.findById(stockId);
  }

  async searchByName(fragment: string): Promise<StockEntity[]> {
    return this.stocksRepo.searchByName(fragment);
  }

  /**
   * Returns false when the code is unknown or the stock is already deleted.
   */
  async removeByCode(stockCode: string): Promise<boolean> {
    const stock = await this.stocksRepo.findByCode(stockCode);
    if (!stock) {
      return false;
    }
    return this.stocksRepo.softDelete(stock.id);
  }
}
