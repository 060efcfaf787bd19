import { err, ok, type Result } from "neverthrow";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { NewStock } from "../../core/entities/stock";
import type { StockListProviderPort } from "../../core/ports/inboundPorts";
import { PostgresStockRepository } from "../../infra/db/repositories";
import {
  FixedClock,
  SequentialIds,
  silentLogger,
} from "../../__tests__/support/fakes";
import {
  createTestDatabase,
  type TestDatabase,
} from "../../__tests__/support/testDatabase";
import { StockCatalogService } from "./stockCatalogService";

class StubStockList implements StockListProviderPort {
  constructor(public response: Result<NewStock[], AppBoundaryError>) {}

  async fetchStocks(): Promise<Result<NewStock[], AppBoundaryError>> {
    return this.response;
  }
}

describe("StockCatalogService", () => {
  let database: TestDatabase;
  let stocksRepo: PostgresStockRepository;
  let stockList: StubStockList;
  let service: StockCatalogService;

  const clock = new FixedClock(new Date("2024-03-15T12:00:00.000Z"));

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
    stockList = new StubStockList(
      ok([
        { code: "bbse3", name: "BB Seguridade" },
        { code: "PETR4", name: "Petrobras PN", company: "Petróleo Brasileiro S.A." },
      ]),
    );
    service = new StockCatalogService(stockList, stocksRepo, silentLogger);
  });

  it("creates new stocks and enriches known ones on resync", async () => {
    const first = await service.syncFromProvider();
    expect(first._unsafeUnwrap().created.map((stock) => stock.code)).toEqual([
      "BBSE3",
      "PETR4",
    ]);

    stockList.response = ok([
      { code: "BBSE3", name: "Renamed", company: "BB Seguridade Participações S.A." },
      { code: "VALE3", name: "Vale ON" },
    ]);
    const second = await service.syncFromProvider();

    expect(second._unsafeUnwrap()).toMatchObject({ received: 2 });
    expect(second._unsafeUnwrap().created.map((stock) => stock.code)).toEqual(["VALE3"]);

    const bbse = await service.getByCode("bbse3");
    expect(bbse?.name).toBe("BB Seguridade");
    expect(bbse?.company).toBe("BB Seguridade Participações S.A.");
  });

  it("passes provider failures through", async () => {
    stockList.response = err({
      source: "stocks",
      code: "transport_error",
      provider: "stub",
      message: "socket reset",
      retryable: true,
    });

    const result = await service.syncFromProvider();

    expect(result._unsafeUnwrapErr().message).toBe("socket reset");
    expect(await stocksRepo.count()).toBe(0);
  });

  it("lists, searches and removes stocks", async () => {
    await service.syncFromProvider();

    expect((await service.listStocks()).map((stock) => stock.code)).toEqual([
      "BBSE3",
      "PETR4",
    ]);
    expect((await service.searchByName("petro")).map((stock) => stock.code)).toEqual([
      "PETR4",
    ]);

    expect(await service.removeByCode("PETR4")).toBe(true);
    expect(await service.removeByCode("PETR4")).toBe(false);
    expect((await service.listStocks()).map((stock) => stock.code)).toEqual(["BBSE3"]);
  });
});
