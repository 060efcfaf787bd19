import { Command, InvalidArgumentError } from "commander";
import type { Result } from "neverthrow";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import type { HistoryIngestionResult } from "../application/services/historyIngestionService";
import { runMigrations } from "../infra/db/migrate";
import { type AppConfig, containerDnsMismatches } from "../shared/config/env";
import type { Logger } from "../shared/logger/logger";

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

/** Steps from an empty database to a first queued ingestion. */
export const startupWorkflow = [
  "npm run start -- migrate",
  "npm run start -- sync-stocks",
  "npm run worker",
  "npm run start -- enqueue-history --code BBSE3",
] as const;

/**
 * Opens a runtime for one command and always releases its connections.
 */
const withRuntime = async (
  config: AppConfig,
  logger: Logger,
  action: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = createRuntime(config, logger);
  try {
    await action(runtime);
  } finally {
    await runtime.close();
  }
};

const report = <T, E extends { message: string }>(
  logger: Logger,
  result: Result<T, E>,
  message: string,
): void => {
  if (result.isErr()) {
    logger.error({ error: result.error }, result.error.message);
    process.exitCode = 1;
    return;
  }
  logger.info({ result: result.value }, message);
};

const reportIngestion = (
  logger: Logger,
  results: HistoryIngestionResult[],
): void => {
  results.forEach((result) => {
    const log = result.success ? logger.info.bind(logger) : logger.warn.bind(logger);
    log(result, "History ingestion result");
  });
  if (results.some((result) => !result.success)) {
    process.exitCode = 1;
  }
};

/**
 * Defines a single command surface so operational tasks use the same services as the worker.
 */
export const buildCli = (config: AppConfig, logger: Logger) => {
  const cli = new Command();
  cli.name("equity-ledger").description("Equity history and news ledger CLI");

  cli
    .command("migrate")
    .description("Apply pending database migrations")
    .action(async () => {
      await withRuntime(config, logger, async (runtime) => {
        await runMigrations(runtime.db);
        logger.info("Migrations applied");
      });
    });

  cli
    .command("sync-stocks")
    .description("Merge the stock list source into the stock catalogue")
    .action(async () => {
      await withRuntime(config, logger, async (runtime) => {
        const result = await runtime.stockCatalogService.syncFromProvider();
        report(
          logger,
          result.map((summary) => ({
            received: summary.received,
            created: summary.created.map((stock) => stock.code),
          })),
          "Stock catalogue synced",
        );
      });
    });

  cli
    .command("stocks")
    .description("List active stocks")
    .option("--search <text>", "Filter by a fragment of the stock name")
    .action(async (opts: { search?: string }) => {
      await withRuntime(config, logger, async (runtime) => {
        const stocks = opts.search
          ? await runtime.stockCatalogService.searchByName(opts.search)
          : await runtime.stockCatalogService.listStocks();
        logger.info({ count: stocks.length, stocks }, "Stocks");
      });
    });

  cli
    .command("remove-stock")
    .description("Soft-delete a stock")
    .requiredOption("--code <code>", "Stock code")
    .action(async (opts: { code: string }) => {
      await withRuntime(config, logger, async (runtime) => {
        const removed = await runtime.stockCatalogService.removeByCode(opts.code);
        if (!removed) {
          logger.warn({ code: opts.code }, "No active stock with that code");
          process.exitCode = 1;
          return;
        }
        logger.info({ code: opts.code }, "Stock removed");
      });
    });

  cli
    .command("ingest-history")
    .description("Fetch and store daily history in this process")
    .option("--code <code>", "Only this stock; every active stock otherwise")
    .option("--pages <n>", "Pages to fetch per stock", parsePositiveInt)
    .action(async (opts: { code?: string; pages?: number }) => {
      const pages = opts.pages ?? config.HISTORY_DEFAULT_PAGES;
      await withRuntime(config, logger, async (runtime) => {
        const results = opts.code
          ? [await runtime.historyIngestionService.ingestByCode(opts.code, pages)]
          : await runtime.historyIngestionService.ingestAll(pages);
        reportIngestion(logger, results);
      });
    });

  cli
    .command("enqueue-history")
    .description("Queue history ingestion jobs for the worker")
    .option("--code <code>", "Only this stock; every active stock otherwise")
    .option("--pages <n>", "Pages to fetch per stock", parsePositiveInt)
    .option("--force", "Bypass hourly idempotency dedupe for immediate reruns")
    .action(async (opts: { code?: string; pages?: number; force?: boolean }) => {
      const pages = opts.pages ?? config.HISTORY_DEFAULT_PAGES;
      const force = Boolean(opts.force);
      await withRuntime(config, logger, async (runtime) => {
        const payloads = opts.code
          ? [await runtime.historyOrchestratorService.enqueueForStock(opts.code, pages, force)]
          : await runtime.historyOrchestratorService.enqueueAll(pages, force);
        logger.info(
          { jobs: payloads.map((payload) => payload.idempotencyKey), force },
          "Enqueued history jobs",
        );
      });
    });

  cli
    .command("history")
    .description("Show stored history for a stock")
    .requiredOption("--code <code>", "Stock code")
    .option("--start <date>", "First trading day (YYYY-MM-DD)")
    .option("--end <date>", "Last trading day (YYYY-MM-DD)")
    .action(async (opts: { code: string; start?: string; end?: string }) => {
      await withRuntime(config, logger, async (runtime) => {
        if (opts.start || opts.end) {
          const result = await runtime.historyQueryService.getHistoryInRange(
            opts.code,
            opts.start ?? "0001-01-01",
            opts.end ?? "9999-12-31",
          );
          report(logger, result, "Stock history in range");
          return;
        }
        report(
          logger,
          await runtime.historyQueryService.getHistoryByCode(opts.code),
          "Stock history",
        );
      });
    });

  cli
    .command("latest")
    .description("Show the most recent stored entry for a stock")
    .requiredOption("--code <code>", "Stock code")
    .action(async (opts: { code: string }) => {
      await withRuntime(config, logger, async (runtime) => {
        report(
          logger,
          await runtime.historyQueryService.getLatestEntry(opts.code),
          "Latest entry",
        );
      });
    });

  cli
    .command("date-range")
    .description("Show the oldest and newest stored trading days for a stock")
    .requiredOption("--code <code>", "Stock code")
    .action(async (opts: { code: string }) => {
      await withRuntime(config, logger, async (runtime) => {
        report(
          logger,
          await runtime.historyQueryService.getAvailableDateRange(opts.code),
          "Available date range",
        );
      });
    });

  cli
    .command("variation")
    .description("Price change over a trailing window of days")
    .requiredOption("--code <code>", "Stock code")
    .option("--days <n>", "Window length in calendar days", parsePositiveInt)
    .action(async (opts: { code: string; days?: number }) => {
      await withRuntime(config, logger, async (runtime) => {
        report(
          logger,
          await runtime.priceVariationService.getPriceVariationByCode(
            opts.code,
            opts.days ?? config.VARIATION_DEFAULT_DAYS,
          ),
          "Price variation",
        );
      });
    });

  cli
    .command("discover-news")
    .description("Find the news page of stocks that have none")
    .action(async () => {
      await withRuntime(config, logger, async (runtime) => {
        await runtime.newsCollectionService.discoverNewsPages();
      });
    });

  cli
    .command("collect-news")
    .description("Store article URLs from each stock's news page")
    .action(async () => {
      await withRuntime(config, logger, async (runtime) => {
        const summary = await runtime.newsCollectionService.collectArticleUrls();
        logger.info(summary, "News URLs collected");
      });
    });

  cli
    .command("enrich-news")
    .description("Read pending articles for title, content and date")
    .option("--limit <n>", "Maximum distinct URLs to fetch", parsePositiveInt)
    .action(async (opts: { limit?: number }) => {
      await withRuntime(config, logger, async (runtime) => {
        await runtime.newsCollectionService.enrichPendingArticles(opts.limit);
      });
    });

  cli
    .command("news")
    .description("List stored articles for a stock")
    .requiredOption("--code <code>", "Stock code")
    .action(async (opts: { code: string }) => {
      await withRuntime(config, logger, async (runtime) => {
        report(
          logger,
          await runtime.newsCollectionService.getNewsByStockCode(opts.code),
          "Stock news",
        );
      });
    });

  cli
    .command("status")
    .description("Report configuration and queue backlog")
    .action(async () => {
      await withRuntime(config, logger, async (runtime) => {
        const queueCounts = await runtime.getQueue().getQueueCounts();

        logger.info(
          {
            historyProvider: config.HISTORY_PROVIDER,
            marketTimeZone: config.MARKET_TIME_ZONE,
            redis: config.REDIS_URL,
            postgres: config.POSTGRES_URL,
            queueCounts,
            containerDnsMismatches: containerDnsMismatches(config),
            startupWorkflow,
          },
          "Runtime status",
        );
      });
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (
  argv: string[],
  config: AppConfig,
  logger: Logger,
): Promise<void> => {
  const cli = buildCli(config, logger);
  await cli.parseAsync(argv);
};
