import { and, asc, count, getTableColumns, ilike, isNull, type SQL } from "drizzle-orm";
import type { Logger } from "pino";
import type {
  HistoricalEntryEntity,
  HistoryDateRange,
  NewHistoricalEntry,
} from "../../core/entities/historicalEntry";
import type {
  NewNewsArticle,
  NewsArticleContent,
  NewsArticleEntity,
} from "../../core/entities/newsArticle";
import type { AuditFields } from "../../core/entities/persistedEntity";
import {
  normalizeStockCode,
  type NewStock,
  type StockEntity,
} from "../../core/entities/stock";
import {
  mergeChanges,
  type MergePolicy,
} from "../../core/policies/mergePolicy";
import { where } from "../../core/query/filterSpec";
import type {
  ClockPort,
  HistoricalEntryRepositoryPort,
  IdGeneratorPort,
  NewsArticleRepositoryPort,
  StockRepositoryPort,
} from "../../core/ports/outboundPorts";
import {
  SoftDeleteRepository,
  type AuditChanges,
  type RowQuery,
} from "./baseRepository";
import type { AppDatabase } from "./client";
import { buildFilterWhere } from "./filterQuery";
import {
  historicalEntriesTable,
  newsArticlesTable,
  stocksTable,
} from "./schema";

/**
 * Existing stocks only gain a company or profile URL they were missing; names are
 * never rewritten by a catalogue sync.
 */
const stockMergePolicy: MergePolicy<NewStock> = {
  name: "keep",
  company: "fillIfBlank",
  url: "fillIfBlank",
  urlNews: "fillIfBlank",
};

const escapeLikePattern = (value: string): string =>
  value.replace(/[\\%_]/g, "\\$&");

/**
 * Stocks keyed by their normalized ticker code.
 */
export class PostgresStockRepository
  extends SoftDeleteRepository<StockEntity, NewStock>
  implements StockRepositoryPort
{
  constructor(
    db: AppDatabase,
    clock: ClockPort,
    ids: IdGeneratorPort,
    private readonly logger: Logger,
  ) {
    super(
      db,
      {
        name: "stocks",
        columns: getTableColumns(stocksTable),
        id: stocksTable.id,
        deletedAt: stocksTable.deletedAt,
      },
      ["code", "name", "company", "url", "urlNews"],
      clock,
      ids,
    );
  }

  override async createMany(items: NewStock[]): Promise<StockEntity[]> {
    return super.createMany(
      items.map((item) => ({ ...item, code: normalizeStockCode(item.code) })),
    );
  }

  async findByCode(code: string): Promise<StockEntity | null> {
    return this.findOneBy({ code: normalizeStockCode(code) });
  }

  async searchByName(fragment: string): Promise<StockEntity[]> {
    const pattern = `%${escapeLikePattern(fragment.trim())}%`;
    return this.run("Searching stocks by name", () =>
      this.selectRows({
        where:
          and(isNull(stocksTable.deletedAt), ilike(stocksTable.name, pattern)) ??
          isNull(stocksTable.deletedAt),
        orderBy: asc(stocksTable.name),
      }),
    );
  }

  async findWithoutNewsUrl(): Promise<StockEntity[]> {
    return this.findBy({ urlNews: null }, { orderBy: { field: "code" } });
  }

  async findWithNewsUrl(): Promise<StockEntity[]> {
    return this.findBy(
      { urlNews: where.isNotNull() },
      { orderBy: { field: "code" } },
    );
  }

  /**
   * Inserts the stocks whose code is not stored yet and returns only those. Stored
   * stocks are enriched through `stockMergePolicy`; a code repeated within `records`
   * is inserted once, later repeats merging into the staged record under the same policy.
   */
  async bulkCreateSkippingDuplicates(
    records: NewStock[],
  ): Promise<StockEntity[]> {
    const keyed: NewStock[] = [];
    for (const record of records) {
      const code =
        typeof record.code === "string" ? normalizeStockCode(record.code) : "";
      if (!code) {
        this.logger.warn({ record }, "Skipping stock record without code");
        continue;
      }
      keyed.push({ ...record, code });
    }

    if (keyed.length === 0) {
      return [];
    }

    const codes = Array.from(new Set(keyed.map((record) => record.code)));
    const existing = await this.findBy({ code: where.in(codes) });
    const existingByCode = new Map(existing.map((stock) => [stock.code, stock]));

    const staged = new Map<string, NewStock>();
    let enriched = 0;

    for (const record of keyed) {
      const stored = existingByCode.get(record.code);
      if (stored) {
        const changes = mergeChanges<NewStock>(stored, record, stockMergePolicy);
        if (Object.keys(changes).length === 0) {
          continue;
        }

        const updated = await this.update(stored.id, changes);
        if (updated) {
          existingByCode.set(updated.code, updated);
          enriched += 1;
        }
        continue;
      }

      const pending = staged.get(record.code);
      staged.set(
        record.code,
        pending
          ? { ...pending, ...mergeChanges(pending, record, stockMergePolicy) }
          : record,
      );
    }

    const created = await this.createMany(Array.from(staged.values()));
    this.logger.info(
      {
        received: records.length,
        created: created.length,
        enriched,
      },
      "Stock catalogue merged",
    );
    return created;
  }

  protected async selectRows(query: RowQuery): Promise<StockEntity[]> {
    let statement = this.db
      .select()
      .from(stocksTable)
      .where(query.where)
      .$dynamic();
    if (query.orderBy) {
      statement = statement.orderBy(query.orderBy);
    }
    if (query.limit !== undefined) {
      statement = statement.limit(query.limit);
    }
    return await statement;
  }

  protected async insertRows(
    rows: Array<NewStock & AuditFields>,
  ): Promise<StockEntity[]> {
    return await this.db.insert(stocksTable).values(rows).returning();
  }

  protected async updateRows(
    condition: SQL,
    changes: Partial<NewStock>,
    audit: AuditChanges,
  ): Promise<StockEntity[]> {
    return await this.db
      .update(stocksTable)
      .set({ ...changes, ...audit })
      .where(condition)
      .returning();
  }

  protected async deleteRows(condition: SQL): Promise<number> {
    const removed = await this.db
      .delete(stocksTable)
      .where(condition)
      .returning({ id: stocksTable.id });
    return removed.length;
  }

  protected async countRows(condition: SQL): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(stocksTable)
      .where(condition);
    return row?.value ?? 0;
  }
}

/**
 * Daily price rows. Reads come back in trading-date order.
 */
export class PostgresHistoricalEntryRepository
  extends SoftDeleteRepository<HistoricalEntryEntity, NewHistoricalEntry>
  implements HistoricalEntryRepositoryPort
{
  constructor(db: AppDatabase, clock: ClockPort, ids: IdGeneratorPort) {
    super(
      db,
      {
        name: "historical_entries",
        columns: getTableColumns(historicalEntriesTable),
        id: historicalEntriesTable.id,
        deletedAt: historicalEntriesTable.deletedAt,
      },
      [
        "tradingDate",
        "openPrice",
        "closePrice",
        "variation",
        "minPrice",
        "maxPrice",
        "volume",
      ],
      clock,
      ids,
    );
  }

  async findByStockId(stockId: string): Promise<HistoricalEntryEntity[]> {
    return this.findBy({ stockId }, { orderBy: { field: "tradingDate" } });
  }

  async findByStockIdAndDateRange(
    stockId: string,
    startDate: string,
    endDate: string,
  ): Promise<HistoricalEntryEntity[]> {
    return this.findBy(
      { stockId, tradingDate: where.between(startDate, endDate) },
      { orderBy: { field: "tradingDate" } },
    );
  }

  async findLatestByStockId(
    stockId: string,
  ): Promise<HistoricalEntryEntity | null> {
    return this.findOneBy(
      { stockId },
      { orderBy: { field: "tradingDate", direction: "desc" } },
    );
  }

  async findOldestByStockId(
    stockId: string,
  ): Promise<HistoricalEntryEntity | null> {
    return this.findOneBy(
      { stockId },
      { orderBy: { field: "tradingDate", direction: "asc" } },
    );
  }

  async getDateRangeForStock(stockId: string): Promise<HistoryDateRange> {
    const oldest = await this.findOldestByStockId(stockId);
    const newest = await this.findLatestByStockId(stockId);

    return {
      oldestDate: oldest?.tradingDate ?? null,
      newestDate: newest?.tradingDate ?? null,
      hasData: oldest !== null && newest !== null,
    };
  }

  async findByTradingDate(tradingDate: string): Promise<HistoricalEntryEntity[]> {
    return this.findBy({ tradingDate }, { orderBy: { field: "stockId" } });
  }

  async saveEntries(
    entries: NewHistoricalEntry[],
  ): Promise<HistoricalEntryEntity[]> {
    return this.createMany(entries);
  }

  protected async selectRows(query: RowQuery): Promise<HistoricalEntryEntity[]> {
    let statement = this.db
      .select()
      .from(historicalEntriesTable)
      .where(query.where)
      .$dynamic();
    if (query.orderBy) {
      statement = statement.orderBy(query.orderBy);
    }
    if (query.limit !== undefined) {
      statement = statement.limit(query.limit);
    }
    return await statement;
  }

  protected async insertRows(
    rows: Array<NewHistoricalEntry & AuditFields>,
  ): Promise<HistoricalEntryEntity[]> {
    return await this.db.insert(historicalEntriesTable).values(rows).returning();
  }

  protected async updateRows(
    condition: SQL,
    changes: Partial<NewHistoricalEntry>,
    audit: AuditChanges,
  ): Promise<HistoricalEntryEntity[]> {
    return await this.db
      .update(historicalEntriesTable)
      .set({ ...changes, ...audit })
      .where(condition)
      .returning();
  }

  protected async deleteRows(condition: SQL): Promise<number> {
    const removed = await this.db
      .delete(historicalEntriesTable)
      .where(condition)
      .returning({ id: historicalEntriesTable.id });
    return removed.length;
  }

  protected async countRows(condition: SQL): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(historicalEntriesTable)
      .where(condition);
    return row?.value ?? 0;
  }
}

/**
 * News article references. The same URL may be stored more than once across stocks,
 * so URL lookups return lists.
 */
export class PostgresNewsArticleRepository
  extends SoftDeleteRepository<NewsArticleEntity, NewNewsArticle>
  implements NewsArticleRepositoryPort
{
  constructor(db: AppDatabase, clock: ClockPort, ids: IdGeneratorPort) {
    super(
      db,
      {
        name: "news_articles",
        columns: getTableColumns(newsArticlesTable),
        id: newsArticlesTable.id,
        deletedAt: newsArticlesTable.deletedAt,
      },
      ["stockId", "url", "title", "content", "publishedDate"],
      clock,
      ids,
    );
  }

  async findByUrl(url: string): Promise<NewsArticleEntity[]> {
    return this.findBy({ url });
  }

  async findByStockId(stockId: string): Promise<NewsArticleEntity[]> {
    return this.findBy(
      { stockId },
      { orderBy: { field: "publishedDate", direction: "desc" } },
    );
  }

  /** URL-only articles: a published date means the article page was read. */
  async findPendingEnrichment(): Promise<NewsArticleEntity[]> {
    return this.findBy({ publishedDate: null }, { orderBy: { field: "createdAt" } });
  }

  async findWithoutContent(): Promise<NewsArticleEntity[]> {
    return this.findBy({ content: null }, { orderBy: { field: "createdAt" } });
  }

  /**
   * Stores URL-only articles for a stock, skipping URLs the stock already has and
   * repeats within `urls`.
   */
  async saveNewsUrls(
    stockId: string,
    urls: string[],
  ): Promise<NewsArticleEntity[]> {
    const known = new Set(
      (await this.findBy({ stockId })).map((article) => article.url),
    );

    const fresh: NewNewsArticle[] = [];
    for (const rawUrl of urls) {
      const url = rawUrl.trim();
      if (!url || known.has(url)) {
        continue;
      }
      known.add(url);
      fresh.push({ url, stockId });
    }

    return this.createMany(fresh);
  }

  /**
   * Writes the article page's content onto every stored copy of `url`.
   */
  async applyContent(url: string, content: NewsArticleContent): Promise<number> {
    const updated = await this.run("Updating news article content", () =>
      this.updateRows(
        buildFilterWhere<NewsArticleEntity>(
          getTableColumns(newsArticlesTable),
          newsArticlesTable.deletedAt,
          { url },
        ),
        {
          title: content.title,
          content: content.content,
          publishedDate: content.publishedDate,
        },
        { updatedAt: this.clock.now() },
      ),
    );
    return updated.length;
  }

  protected async selectRows(query: RowQuery): Promise<NewsArticleEntity[]> {
    let statement = this.db
      .select()
      .from(newsArticlesTable)
      .where(query.where)
      .$dynamic();
    if (query.orderBy) {
      statement = statement.orderBy(query.orderBy);
    }
    if (query.limit !== undefined) {
      statement = statement.limit(query.limit);
    }
    return await statement;
  }

  protected async insertRows(
    rows: Array<NewNewsArticle & AuditFields>,
  ): Promise<NewsArticleEntity[]> {
    return await this.db.insert(newsArticlesTable).values(rows).returning();
  }

  protected async updateRows(
    condition: SQL,
    changes: Partial<NewNewsArticle>,
    audit: AuditChanges,
  ): Promise<NewsArticleEntity[]> {
    return await this.db
      .update(newsArticlesTable)
      .set({ ...changes, ...audit })
      .where(condition)
      .returning();
  }

  protected async deleteRows(condition: SQL): Promise<number> {
    const removed = await this.db
      .delete(newsArticlesTable)
      .where(condition)
      .returning({ id: newsArticlesTable.id });
    return removed.length;
  }

  protected async countRows(condition: SQL): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(newsArticlesTable)
      .where(condition);
    return row?.value ?? 0;
  }
}
