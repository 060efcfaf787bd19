import type {
  HistoricalEntryEntity,
  HistoryDateRange,
  NewHistoricalEntry,
} from "../entities/historicalEntry";
import type {
  NewNewsArticle,
  NewsArticleContent,
  NewsArticleEntity,
} from "../entities/newsArticle";
import type { PersistedEntity } from "../entities/persistedEntity";
import type { NewStock, StockEntity } from "../entities/stock";
import type { FilterSpec, FindOptions } from "../query/filterSpec";

export type HistoryJobPayload = {
  stockId: string;
  stockCode: string;
  pages: number;
  idempotencyKey: string;
  requestedAt: string;
};

export interface QueuePort {
  enqueueHistoryIngestion(payload: HistoryJobPayload): Promise<void>;
}

export interface HistoryJobFactoryPort {
  create(stock: Pick<StockEntity, "id" | "code">, pages: number): HistoryJobPayload;
}

/**
 * CRUD over one entity type. Misses are `null`/`false`; storage failures throw
 * `StorageError`.
 */
export interface EntityRepositoryPort<
  TEntity extends PersistedEntity,
  TNew extends object,
> {
  create(attributes: TNew): Promise<TEntity>;
  createMany(items: TNew[]): Promise<TEntity[]>;
  findById(id: string): Promise<TEntity | null>;
  findAll(options?: FindOptions<TEntity>): Promise<TEntity[]>;
  findBy(
    filter: FilterSpec<TEntity>,
    options?: FindOptions<TEntity>,
  ): Promise<TEntity[]>;
  findOneBy(
    filter: FilterSpec<TEntity>,
    options?: Omit<FindOptions<TEntity>, "limit">,
  ): Promise<TEntity | null>;
  count(filter?: FilterSpec<TEntity>): Promise<number>;
  exists(filter: FilterSpec<TEntity>): Promise<boolean>;
  update(id: string, attributes: Partial<TNew>): Promise<TEntity | null>;
  softDelete(id: string): Promise<boolean>;
  delete(id: string): Promise<boolean>;
}

export interface StockRepositoryPort
  extends EntityRepositoryPort<StockEntity, NewStock> {
  findByCode(code: string): Promise<StockEntity | null>;
  searchByName(fragment: string): Promise<StockEntity[]>;
  findWithoutNewsUrl(): Promise<StockEntity[]>;
  findWithNewsUrl(): Promise<StockEntity[]>;
  bulkCreateSkippingDuplicates(records: NewStock[]): Promise<StockEntity[]>;
}

export interface HistoricalEntryRepositoryPort
  extends EntityRepositoryPort<HistoricalEntryEntity, NewHistoricalEntry> {
  findByStockId(stockId: string): Promise<HistoricalEntryEntity[]>;
  findByStockIdAndDateRange(
    stockId: string,
    startDate: string,
    endDate: string,
  ): Promise<HistoricalEntryEntity[]>;
  findLatestByStockId(stockId: string): Promise<HistoricalEntryEntity | null>;
  findOldestByStockId(stockId: string): Promise<HistoricalEntryEntity | null>;
  getDateRangeForStock(stockId: string): Promise<HistoryDateRange>;
  findByTradingDate(tradingDate: string): Promise<HistoricalEntryEntity[]>;
  saveEntries(entries: NewHistoricalEntry[]): Promise<HistoricalEntryEntity[]>;
}

export interface NewsArticleRepositoryPort
  extends EntityRepositoryPort<NewsArticleEntity, NewNewsArticle> {
  findByUrl(url: string): Promise<NewsArticleEntity[]>;
  findByStockId(stockId: string): Promise<NewsArticleEntity[]>;
  findPendingEnrichment(): Promise<NewsArticleEntity[]>;
  findWithoutContent(): Promise<NewsArticleEntity[]>;
  saveNewsUrls(stockId: string, urls: string[]): Promise<NewsArticleEntity[]>;
  applyContent(url: string, content: NewsArticleContent): Promise<number>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}

/**
 * Serializes work per stock. A holder of one stock's lock never overlaps another
 * holder of the same stock; different stocks run freely.
 */
export interface StockLockPort {
  withStockLock<T>(stockId: string, work: () => Promise<T>): Promise<T>;
}
