import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { NewsArticleContent } from "../../../core/entities/newsArticle";
import type { StockEntity } from "../../../core/entities/stock";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import type { NewsSourcePort } from "../../../core/ports/inboundPorts";

const NEWS_HOST = "https://news.example.local";

/**
 * Serves predictable news pages and articles so collection and enrichment can run
 * without scraping.
 */
export class MockNewsSource implements NewsSourcePort {
  constructor(
    private readonly clock: ClockPort,
    private readonly articlesPerStock = 3,
  ) {}

  async discoverNewsPage(
    stock: StockEntity,
  ): Promise<Result<string | null, AppBoundaryError>> {
    return ok(`${NEWS_HOST}/stocks/${stock.code.toLowerCase()}/`);
  }

  async listArticleUrls(
    stock: StockEntity,
  ): Promise<Result<string[], AppBoundaryError>> {
    const code = stock.code.toLowerCase();
    return ok(
      Array.from(
        { length: this.articlesPerStock },
        (_, index) => `${NEWS_HOST}/articles/${code}-${index + 1}`,
      ),
    );
  }

  async fetchArticle(
    url: string,
  ): Promise<Result<NewsArticleContent, AppBoundaryError>> {
    const slug = url.split("/").filter(Boolean).pop() ?? url;
    const ordinal = Number(slug.split("-").pop()) || 1;

    return ok({
      title: `Market update ${slug}`,
      content: `Simulated coverage for ${slug}: trading volume, guidance and sector context.`,
      publishedDate: new Date(
        this.clock.now().getTime() - ordinal * 60 * 60 * 1000,
      ),
    });
  }
}
