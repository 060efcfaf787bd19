import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import {
  PostgresHistoricalEntryRepository,
  PostgresStockRepository,
} from "../../infra/db/repositories";
import {
  FixedClock,
  SequentialIds,
  silentLogger,
} from "../../__tests__/support/fakes";
import {
  createTestDatabase,
  type TestDatabase,
} from "../../__tests__/support/testDatabase";
import { HistoryQueryService } from "./historyQueryService";

describe("HistoryQueryService", () => {
  let database: TestDatabase;
  let stocksRepo: PostgresStockRepository;
  let historyRepo: PostgresHistoricalEntryRepository;
  let service: HistoryQueryService;
  let stockId: string;

  const clock = new FixedClock(new Date("2024-03-16T12:00:00.000Z"));

  const entry = (tradingDate: string, closePrice: string) => ({
    stockId,
    tradingDate,
    openPrice: closePrice,
    closePrice,
    variation: closePrice,
    minPrice: closePrice,
    maxPrice: closePrice,
    volume: "100",
  });

  beforeAll(async () => {
    database = await createTestDatabase();
  });

  afterAll(async () => {
    await database.close();
  });

  beforeEach(async () => {
    await database.reset();
    const ids = new SequentialIds();
    stocksRepo = new PostgresStockRepository(database.db, clock, ids, silentLogger);
    historyRepo = new PostgresHistoricalEntryRepository(database.db, clock, ids);
    service = new HistoryQueryService(stocksRepo, historyRepo);

    const stock = await stocksRepo.create({ code: "VALE3", name: "Vale ON" });
    stockId = stock.id;
    await historyRepo.saveEntries([
      entry("2024-03-13", "61,00"),
      entry("2024-03-11", "60,00"),
      entry("2024-03-15", "62,40"),
      entry("2024-03-14", "61,80"),
    ]);
  });

  it("returns full history in trading-date order", async () => {
    const result = await service.getHistoryByCode("vale3");

    const { history } = result._unsafeUnwrap();
    expect(history.map((item) => item.tradingDate)).toEqual([
      "2024-03-11",
      "2024-03-13",
      "2024-03-14",
      "2024-03-15",
    ]);
  });

  it("includes both bounds of a date range", async () => {
    const result = await service.getHistoryInRange("VALE3", "2024-03-13", "2024-03-14");

    const value = result._unsafeUnwrap();
    expect(value.history.map((item) => item.closePrice)).toEqual(["61,00", "61,80"]);
    expect(value.startDate).toBe("2024-03-13");
    expect(value.endDate).toBe("2024-03-14");
  });

  it("rejects malformed and inverted ranges", async () => {
    const malformed = await service.getHistoryInRange("VALE3", "13/03/2024", "2024-03-14");
    const inverted = await service.getHistoryInRange("VALE3", "2024-03-15", "2024-03-11");

    expect(malformed._unsafeUnwrapErr().type).toBe("InvalidDateRangeError");
    expect(inverted._unsafeUnwrapErr()).toEqual({
      type: "InvalidDateRangeError",
      message: "Start date 2024-03-15 is after end date 2024-03-11",
    });
  });

  it("returns the latest entry", async () => {
    const result = await service.getLatestEntry("VALE3");

    expect(result._unsafeUnwrap().latest.tradingDate).toBe("2024-03-15");
  });

  it("reports a stock without history when asking for the latest entry", async () => {
    await stocksRepo.create({ code: "WEGE3", name: "WEG ON" });

    const result = await service.getLatestEntry("WEGE3");

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "NoHistoryError",
      message: "No historical data found for stock WEGE3",
    });
  });

  it("summarises the available date range", async () => {
    const result = await service.getAvailableDateRange("VALE3");

    expect(result._unsafeUnwrap().dateRange).toEqual({
      oldestDate: "2024-03-11",
      newestDate: "2024-03-15",
      hasData: true,
    });
  });

  it("reports unknown stock codes", async () => {
    const result = await service.getHistoryByCode("XXXX3");

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "StockNotFoundError",
      message: "Stock with code XXXX3 not found",
      stockCode: "XXXX3",
    });
  });
});
