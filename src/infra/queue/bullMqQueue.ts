import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type {
  HistoryJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { queueNames } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

const QUEUE_RETRIES = 2;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  backoff: {
    type: "exponential",
    delay: 1_000,
  },
} as const;

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqQueue implements QueuePort {
  private readonly historyQueue: Queue<HistoryJobPayload>;

  constructor(connection: RedisOptions) {
    this.historyQueue = new Queue<HistoryJobPayload>(
      queueNames.historyIngest,
      { connection, defaultJobOptions },
    );
  }

  /**
   * The idempotency key doubles as the job id, so BullMQ drops a repeat while the first
   * job is still retained.
   */
  async enqueueHistoryIngestion(payload: HistoryJobPayload): Promise<void> {
    await this.historyQueue.add(payload.idempotencyKey, payload, {
      jobId: payload.idempotencyKey,
    });
  }

  async close(): Promise<void> {
    await this.historyQueue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.historyQueue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

/**
 * One coordinator invocation per job; `concurrency` bounds how many stocks ingest at once.
 */
export const createHistoryWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: HistoryJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<HistoryJobPayload>(
    queueNames.historyIngest,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
