import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type {
  HistoryJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { PostgresStockRepository } from "../../infra/db/repositories";
import { HistoryJobFactory } from "../../infra/system/systemPorts";
import {
  FixedClock,
  SequentialIds,
  silentLogger,
} from "../../__tests__/support/fakes";
import {
  createTestDatabase,
  type TestDatabase,
} from "../../__tests__/support/testDatabase";
import { HistoryOrchestratorService } from "./historyOrchestratorService";

describe("HistoryOrchestratorService", () => {
  let database: TestDatabase;
  let stocksRepo: PostgresStockRepository;
  let enqueued: HistoryJobPayload[];
  let service: HistoryOrchestratorService;

  const clock = new FixedClock(new Date("2024-03-15T10:20:00.000Z"));

  beforeAll(async () => {
    database = await createTestDatabase();
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await database.reset();
    stocksRepo = new PostgresStockRepository(
      database.db,
      clock,
      new SequentialIds("stock"),
      silentLogger,
    );
    enqueued = [];

    const queue: QueuePort = {
      enqueueHistoryIngestion: async (payload) => {
        enqueued.push(payload);
      },
    };

    service = new HistoryOrchestratorService(
      queue,
      new HistoryJobFactory(clock),
      stocksRepo,
      new SequentialIds("force"),
    );
  });

  it("enqueues one hour-bucketed job for a known stock", async () => {
    const stock = await stocksRepo.create({ code: "BBSE3", name: "BB Seguridade" });

    await service.enqueueForStock("bbse3", 3);

    expect(enqueued).toEqual([
      {
        stockId: stock.id,
        stockCode: "BBSE3",
        pages: 3,
        idempotencyKey: "BBSE3-history-2024-03-15T10",
        requestedAt: "2024-03-15T10:20:00.000Z",
      },
    ]);
  });

  it("appends a unique suffix when forced", async () => {
    await stocksRepo.create({ code: "PETR4", name: "Petrobras PN" });

    const payload = await service.enqueueForStock("PETR4", 1, true);

    expect(payload.idempotencyKey).toBe(
      "PETR4-history-2024-03-15T10-force-force-0001",
    );
  });

  it("throws for unknown stock codes", async () => {
    await expect(service.enqueueForStock("XXXX3", 1)).rejects.toThrow(
      "Stock with code XXXX3 not found",
    );
    expect(enqueued).toHaveLength(0);
  });

  it("enqueues every active stock in code order", async () => {
    await stocksRepo.createMany([
      { code: "VALE3", name: "Vale ON" },
      { code: "BBSE3", name: "BB Seguridade" },
      { code: "ITUB4", name: "Itaú Unibanco PN" },
    ]);
    const itub = await stocksRepo.findByCode("ITUB4");
    if (!itub) {
      throw new Error("expected ITUB4");
    }
    await stocksRepo.softDelete(itub.id);

    const payloads = await service.enqueueAll(2);

    expect(payloads.map((payload) => payload.stockCode)).toEqual([
      "BBSE3",
      "VALE3",
    ]);
    expect(enqueued).toHaveLength(2);
  });
});
