import type { HistoryProviderPort } from "../../core/ports/inboundPorts";
import type { ClockPort, QueuePort } from "../../core/ports/outboundPorts";
import { PostgresAdvisoryStockLock } from "../../infra/db/advisoryStockLock";
import { createDb } from "../../infra/db/client";
import {
  PostgresHistoricalEntryRepository,
  PostgresNewsArticleRepository,
  PostgresStockRepository,
} from "../../infra/db/repositories";
import { MockHistoryProvider } from "../../infra/providers/mocks/mockHistoryProvider";
import { MockNewsSource } from "../../infra/providers/mocks/mockNewsSource";
import { MockStockListProvider } from "../../infra/providers/mocks/mockStockListProvider";
import { QuotesHistoryProvider } from "../../infra/providers/quotes/quotesHistoryProvider";
import { BullMqQueue } from "../../infra/queue/bullMqQueue";
import { redisConfigFromUrl } from "../../infra/queue/queues";
import {
  HistoryJobFactory,
  SystemClock,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import type { AppConfig } from "../../shared/config/env";
import type { Logger } from "../../shared/logger/logger";
import { HistoryIngestionService } from "../services/historyIngestionService";
import { HistoryOrchestratorService } from "../services/historyOrchestratorService";
import { HistoryQueryService } from "../services/historyQueryService";
import { NewsCollectionService } from "../services/newsCollectionService";
import { PriceVariationService } from "../services/priceVariationService";
import { StockCatalogService } from "../services/stockCatalogService";

const createHistoryProvider = (
  config: AppConfig,
  clock: ClockPort,
  logger: Logger,
): HistoryProviderPort => {
  if (config.HISTORY_PROVIDER === "quotes-api") {
    return new QuotesHistoryProvider(
      {
        baseUrl: config.QUOTES_API_BASE_URL,
        historyPath: config.QUOTES_API_HISTORY_PATH,
        pageSize: config.HISTORY_PAGE_SIZE,
        timeoutMs: config.QUOTES_API_TIMEOUT_MS,
        retries: config.QUOTES_API_RETRIES,
      },
      logger.child({ provider: "quotes-api" }),
    );
  }

  return new MockHistoryProvider(clock, config.HISTORY_PAGE_SIZE);
};

/**
 * Centralizes runtime wiring so the CLI and worker entry points share one composition root.
 * The Redis-backed queue is opened on first use, so read-only commands never connect to it.
 */
export const createRuntime = (config: AppConfig, logger: Logger) => {
  const { db, sql } = createDb(config.POSTGRES_URL);

  const clock = new SystemClock();
  const ids = new UuidIdGenerator();

  let bullQueue: BullMqQueue | undefined;
  const getQueue = (): BullMqQueue => {
    bullQueue ??= new BullMqQueue(redisConfigFromUrl(config.REDIS_URL));
    return bullQueue;
  };
  const queue: QueuePort = {
    enqueueHistoryIngestion: (payload) =>
      getQueue().enqueueHistoryIngestion(payload),
  };

  const stocksRepo = new PostgresStockRepository(
    db,
    clock,
    ids,
    logger.child({ component: "stocks-repository" }),
  );
  const historyRepo = new PostgresHistoricalEntryRepository(db, clock, ids);
  const newsRepo = new PostgresNewsArticleRepository(db, clock, ids);

  const historyIngestionService = new HistoryIngestionService(
    createHistoryProvider(config, clock, logger),
    stocksRepo,
    historyRepo,
    new PostgresAdvisoryStockLock(sql),
    { marketTimeZone: config.MARKET_TIME_ZONE },
    logger.child({ component: "history-ingestion" }),
  );
  const historyOrchestratorService = new HistoryOrchestratorService(
    queue,
    new HistoryJobFactory(clock),
    stocksRepo,
    ids,
  );
  const historyQueryService = new HistoryQueryService(stocksRepo, historyRepo);
  const priceVariationService = new PriceVariationService(
    stocksRepo,
    historyRepo,
  );
  const stockCatalogService = new StockCatalogService(
    new MockStockListProvider(),
    stocksRepo,
    logger.child({ component: "stock-catalog" }),
  );
  const newsCollectionService = new NewsCollectionService(
    new MockNewsSource(clock),
    stocksRepo,
    newsRepo,
    logger.child({ component: "news-collection" }),
  );

  return {
    config,
    logger,
    db,
    getQueue,
    historyIngestionService,
    historyOrchestratorService,
    historyQueryService,
    priceVariationService,
    stockCatalogService,
    newsCollectionService,
    close: async (): Promise<void> => {
      await bullQueue?.close();
      await sql.end();
    },
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
