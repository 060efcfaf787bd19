import { sql } from "drizzle-orm";
import {
  date,
  index,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

const auditColumns = {
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  deletedAt: timestamp("deleted_at", { withTimezone: true }),
};

export const stocksTable = pgTable(
  "stocks",
  {
    id: text("id").primaryKey(),
    code: text("code").notNull(),
    name: text("name").notNull(),
    company: text("company"),
    url: text("url"),
    urlNews: text("url_news"),
    ...auditColumns,
  },
  (table) => ({
    // Soft-deleted stocks release their code for a later re-listing.
    activeCodeIdx: uniqueIndex("stocks_code_active_uidx")
      .on(table.code)
      .where(sql`${table.deletedAt} is null`),
  }),
);

/**
 * One row per stock and trading day. The pair is deliberately not a unique
 * index: ingestion enforces it while writing.
 */
export const historicalEntriesTable = pgTable(
  "historical_entries",
  {
    id: text("id").primaryKey(),
    stockId: text("stock_id")
      .notNull()
      .references(() => stocksTable.id),
    tradingDate: date("trading_date", { mode: "string" }).notNull(),
    openPrice: text("open_price").notNull(),
    closePrice: text("close_price").notNull(),
    variation: text("variation").notNull(),
    minPrice: text("min_price").notNull(),
    maxPrice: text("max_price").notNull(),
    volume: text("volume").notNull(),
    ...auditColumns,
  },
  (table) => ({
    stockIdx: index("historical_entries_stock_idx").on(table.stockId),
    tradingDateIdx: index("historical_entries_trading_date_idx").on(
      table.tradingDate,
    ),
  }),
);

export const newsArticlesTable = pgTable(
  "news_articles",
  {
    id: text("id").primaryKey(),
    stockId: text("stock_id").references(() => stocksTable.id),
    url: text("url").notNull(),
    title: text("title"),
    content: text("content"),
    publishedDate: timestamp("published_date", { withTimezone: true }),
    ...auditColumns,
  },
  (table) => ({
    stockIdx: index("news_articles_stock_idx").on(table.stockId),
    urlIdx: index("news_articles_url_idx").on(table.url),
  }),
);
