import type { PersistedEntity } from "./persistedEntity";

/**
 * Figures stay in the source's locale formatting ("12,50", "-", "1.234.567"); only the
 * variation calculator interprets them.
 */
export type HistoricalEntryEntity = PersistedEntity & {
  stockId: string;
  /** Calendar day as YYYY-MM-DD in the market time zone. */
  tradingDate: string;
  openPrice: string;
  closePrice: string;
  variation: string;
  minPrice: string;
  maxPrice: string;
  volume: string;
};

export type NewHistoricalEntry = Omit<
  HistoricalEntryEntity,
  keyof PersistedEntity
>;

export type HistoryDateRange = {
  oldestDate: string | null;
  newestDate: string | null;
  hasData: boolean;
};
