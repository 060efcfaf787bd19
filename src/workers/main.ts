import "dotenv/config";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { createHistoryWorker } from "../infra/queue/bullMqQueue";
import { redisConfigFromUrl } from "../infra/queue/queues";
import { containerDnsMismatches, loadAppConfig } from "../shared/config/env";
import { createLogger, toErrorDetails } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const config = loadAppConfig();
  const logger = createLogger(config, "equity-ledger-worker");
  const runtime = createRuntime(config, logger);
  const startedAtByJobId = new Map<string, number>();

  const mismatches = containerDnsMismatches(config);
  if (mismatches.length > 0) {
    logger.warn(
      { mismatches },
      "Connection settings use compose-only hostnames outside a container",
    );
  }

  logger.info(
    {
      historyProvider: config.HISTORY_PROVIDER,
      quotesApiBaseUrl: config.QUOTES_API_BASE_URL,
      marketTimeZone: config.MARKET_TIME_ZONE,
      concurrency: config.QUEUE_CONCURRENCY_HISTORY,
      redisUrl: config.REDIS_URL,
      postgresUrl: config.POSTGRES_URL,
    },
    "Worker runtime configuration",
  );

  const worker = createHistoryWorker(
    redisConfigFromUrl(config.REDIS_URL),
    config.QUEUE_CONCURRENCY_HISTORY,
    async (payload) => {
      const result = await runtime.historyIngestionService.ingest(
        { id: payload.stockId, code: payload.stockCode },
        payload.pages,
      );
      if (!result.success) {
        throw new Error(
          `History ingestion for ${payload.stockCode} stored nothing: ${result.errors.join("; ")}`,
        );
      }
    },
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());

    logger.info(
      {
        jobId: job.id,
        stockCode: job.data.stockCode,
        pages: job.data.pages,
        idempotencyKey: job.data.idempotencyKey,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        stockCode: job?.data.stockCode,
        idempotencyKey: job?.data.idempotencyKey,
        attemptsMade: job?.attemptsMade,
        durationMs,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      {
        jobId: job.id,
        stockCode: job.data.stockCode,
        idempotencyKey: job.data.idempotencyKey,
        durationMs,
      },
      "Worker job completed",
    );
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    await worker.close();
    await runtime.close();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info("Worker online");
};

run().catch((error) => {
  console.error("Worker bootstrap failed", toErrorDetails(error));
  process.exit(1);
});
