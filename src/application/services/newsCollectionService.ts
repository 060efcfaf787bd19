import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type { NewsArticleEntity } from "../../core/entities/newsArticle";
import type { StockEntity } from "../../core/entities/stock";
import type { NewsSourcePort } from "../../core/ports/inboundPorts";
import type {
  NewsArticleRepositoryPort,
  StockRepositoryPort,
} from "../../core/ports/outboundPorts";

export type NewsStepSummary = {
  processed: number;
  updated: number;
  errors: string[];
};

/**
 * Three passes over the news source: find each stock's news page, store article URLs
 * found there, then read pending articles for title, content and date. A source failure
 * for one stock or article is recorded and the pass moves on.
 */
export class NewsCollectionService {
  constructor(
    private readonly newsSource: NewsSourcePort,
    private readonly stocksRepo: StockRepositoryPort,
    private readonly newsRepo: NewsArticleRepositoryPort,
    private readonly logger: Logger,
  ) {}

  async discoverNewsPages(): Promise<NewsStepSummary> {
    const stocks = await this.stocksRepo.findWithoutNewsUrl();
    const summary: NewsStepSummary = { processed: 0, updated: 0, errors: [] };

    for (const stock of stocks) {
      summary.processed += 1;
      const page = await this.newsSource.discoverNewsPage(stock);
      if (page.isErr()) {
        summary.errors.push(`${stock.code}: ${page.error.message}`);
        continue;
      }
      if (!page.value) {
        this.logger.info({ stockCode: stock.code }, "No news page found");
        continue;
      }

      const updated = await this.stocksRepo.update(stock.id, {
        urlNews: page.value,
      });
      if (updated) {
        summary.updated += 1;
      }
    }

    this.logger.info(summary, "News page discovery finished");
    return summary;
  }

  async collectArticleUrls(): Promise<NewsStepSummary> {
    const stocks = await this.stocksRepo.findWithNewsUrl();
    const summary: NewsStepSummary = { processed: 0, updated: 0, errors: [] };

    for (const stock of stocks) {
      summary.processed += 1;
      const urls = await this.newsSource.listArticleUrls(stock);
      if (urls.isErr()) {
        summary.errors.push(`${stock.code}: ${urls.error.message}`);
        continue;
      }

      const saved = await this.newsRepo.saveNewsUrls(stock.id, urls.value);
      summary.updated += saved.length;
      this.logger.info(
        { stockCode: stock.code, found: urls.value.length, saved: saved.length },
        "News URLs collected",
      );
    }

    return summary;
  }

  /**
   * Each distinct pending URL is fetched once; its content lands on every stored copy.
   */
  async enrichPendingArticles(limit?: number): Promise<NewsStepSummary> {
    const pending = await this.newsRepo.findPendingEnrichment();
    const urls = Array.from(new Set(pending.map((article) => article.url)));
    const batch = limit === undefined ? urls : urls.slice(0, limit);
    const summary: NewsStepSummary = { processed: 0, updated: 0, errors: [] };

    for (const url of batch) {
      summary.processed += 1;
      const article = await this.newsSource.fetchArticle(url);
      if (article.isErr()) {
        this.logger.warn(
          { url, code: article.error.code, reason: article.error.message },
          "News article fetch failed",
        );
        summary.errors.push(`${url}: ${article.error.message}`);
        continue;
      }

      summary.updated += await this.newsRepo.applyContent(url, article.value);
    }

    this.logger.info(
      { pending: pending.length, ...summary },
      "News enrichment finished",
    );
    return summary;
  }

  async getNewsByStockCode(
    stockCode: string,
  ): Promise<
    Result<
      { stock: StockEntity; articles: NewsArticleEntity[] },
      { type: "StockNotFoundError"; message: string; stockCode: string }
    >
  > {
    const stock = await this.stocksRepo.findByCode(stockCode);
    if (!stock) {
      return err({
        type: "StockNotFoundError",
        message: `Stock with code ${stockCode} not found`,
        stockCode,
      });
    }

    return ok({
      stock,
      articles: await this.newsRepo.findByStockId(stock.id),
    });
  }
}
