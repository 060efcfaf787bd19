import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { NewsArticleContent } from "../entities/newsArticle";
import type { NewStock, StockEntity } from "../entities/stock";

/**
 * One row of a history page. Everything but the date pair is passed through as the
 * source formatted it.
 */
export type RawHistoryEntry = {
  dateDisplay: string;
  /** Unix seconds. */
  dateTimestamp: number;
  openPrice: string;
  closePrice: string;
  variation: string;
  minPrice: string;
  maxPrice: string;
  volume: string;
};

export interface HistoryProviderPort {
  fetchPage(
    stockCode: string,
    pageIndex: number,
  ): Promise<Result<RawHistoryEntry[], AppBoundaryError>>;
}

export interface StockListProviderPort {
  fetchStocks(): Promise<Result<NewStock[], AppBoundaryError>>;
}

export interface NewsSourcePort {
  /** Resolves the stock's news index page, or null when the source has none. */
  discoverNewsPage(
    stock: StockEntity,
  ): Promise<Result<string | null, AppBoundaryError>>;
  listArticleUrls(
    stock: StockEntity,
  ): Promise<Result<string[], AppBoundaryError>>;
  fetchArticle(
    url: string,
  ): Promise<Result<NewsArticleContent, AppBoundaryError>>;
}
