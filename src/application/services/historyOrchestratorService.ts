import type { StockEntity } from "../../core/entities/stock";
import type {
  HistoryJobFactoryPort,
  HistoryJobPayload,
  IdGeneratorPort,
  QueuePort,
  StockRepositoryPort,
} from "../../core/ports/outboundPorts";

/**
 * Fans history ingestion out to the queue, one job per stock, so the worker can ingest
 * different stocks concurrently.
 */
export class HistoryOrchestratorService {
  constructor(
    private readonly queue: QueuePort,
    private readonly jobFactory: HistoryJobFactoryPort,
    private readonly stocksRepo: StockRepositoryPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  /**
   * `force` bypasses the hourly idempotency bucket for operator reruns.
   */
  async enqueueForStock(
    stockCode: string,
    pages: number,
    force = false,
  ): Promise<HistoryJobPayload> {
    const stock = await this.stocksRepo.findByCode(stockCode);
    if (!stock) {
      throw new Error(`Stock with code ${stockCode} not found`);
    }

    return this.enqueue(stock, pages, force);
  }

  async enqueueAll(pages: number, force = false): Promise<HistoryJobPayload[]> {
    const stocks = await this.stocksRepo.findAll({ orderBy: { field: "code" } });
    const payloads: HistoryJobPayload[] = [];

    for (const stock of stocks) {
      payloads.push(await this.enqueue(stock, pages, force));
    }

    return payloads;
  }

  private async enqueue(
    stock: StockEntity,
    pages: number,
    force: boolean,
  ): Promise<HistoryJobPayload> {
    const job = this.jobFactory.create(stock, pages);
    const payload = force
      ? { ...job, idempotencyKey: `${job.idempotencyKey}-force-${this.ids.next()}` }
      : job;

    await this.queue.enqueueHistoryIngestion(payload);
    return payload;
  }
}
