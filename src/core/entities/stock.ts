import type { PersistedEntity } from "./persistedEntity";

export type StockEntity = PersistedEntity & {
  code: string;
  name: string;
  company: string | null;
  url: string | null;
  urlNews: string | null;
};

export type NewStock = {
  code: string;
  name: string;
  company?: string | null;
  url?: string | null;
  urlNews?: string | null;
};

/**
 * Tickers are compared trimmed and upper-cased everywhere a stock is looked up by code.
 */
export const normalizeStockCode = (code: string): string =>
  code.trim().toUpperCase();
