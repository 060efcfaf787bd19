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
import {
  calculatePriceVariation,
  parseDecimal,
  PriceVariationService,
  type PricePoint,
} from "./priceVariationService";

const point = (tradingDate: string, variation: string): PricePoint => ({
  tradingDate,
  variation,
});

describe("parseDecimal", () => {
  it("reads comma decimals and strips thousands separators", () => {
    expect(parseDecimal("12,50")._unsafeUnwrap()).toBe(12.5);
    expect(parseDecimal("1.234,56")._unsafeUnwrap()).toBe(1234.56);
    expect(parseDecimal("12.50")._unsafeUnwrap()).toBe(12.5);
    expect(parseDecimal(" -3,25 ")._unsafeUnwrap()).toBe(-3.25);
  });

  it("rejects placeholders", () => {
    expect(parseDecimal("-")._unsafeUnwrapErr()).toEqual({
      type: "ParseError",
      message: "Cannot read '-' as a number",
      value: "-",
    });
    expect(parseDecimal("").isErr()).toBe(true);
  });

  it("rejects hex, exponents and dot-grouped thousands", () => {
    expect(parseDecimal("0x1A").isErr()).toBe(true);
    expect(parseDecimal("1e3").isErr()).toBe(true);
    expect(parseDecimal("1,234.56")._unsafeUnwrapErr()).toEqual({
      type: "ParseError",
      message: "Cannot read '1,234.56' as a number",
      value: "1,234.56",
    });
    expect(parseDecimal("12,").isErr()).toBe(true);
  });
});

describe("calculatePriceVariation", () => {
  it("measures change from the earliest point in the window", () => {
    const result = calculatePriceVariation(
      "stock-1",
      30,
      [point("2024-03-15", "12,50"), point("2024-02-14", "10,00"), point("2024-03-01", "11,00")],
      point("2024-03-15", "12,50"),
    );

    expect(result._unsafeUnwrap()).toEqual({
      stockId: "stock-1",
      days: 30,
      startDate: "2024-02-14",
      endDate: "2024-03-15",
      startPrice: "10,00",
      endPrice: "12,50",
      absoluteVariation: 2.5,
      percentageVariation: 25,
    });
  });

  it("rounds both figures to two decimals", () => {
    const result = calculatePriceVariation(
      "stock-1",
      7,
      [point("2024-03-08", "3,00")],
      point("2024-03-15", "4,00"),
    )._unsafeUnwrap();

    expect(result.absoluteVariation).toBe(1);
    expect(result.percentageVariation).toBe(33.33);
  });

  it("reports falling prices as negative", () => {
    const result = calculatePriceVariation(
      "stock-1",
      7,
      [point("2024-03-08", "12,00")],
      point("2024-03-15", "9,00"),
    )._unsafeUnwrap();

    expect(result.absoluteVariation).toBe(-3);
    expect(result.percentageVariation).toBe(-25);
  });

  it("uses a zero percentage when the start is zero", () => {
    const result = calculatePriceVariation(
      "stock-1",
      7,
      [point("2024-03-08", "0,00")],
      point("2024-03-15", "5,00"),
    )._unsafeUnwrap();

    expect(result.absoluteVariation).toBe(5);
    expect(result.percentageVariation).toBe(0);
  });

  it("fails on an empty window", () => {
    const result = calculatePriceVariation("stock-1", 7, [], point("2024-03-15", "5,00"));

    expect(result._unsafeUnwrapErr().type).toBe("NoDataInWindowError");
  });

  it("fails when a price cannot be parsed", () => {
    const result = calculatePriceVariation(
      "stock-1",
      7,
      [point("2024-03-08", "n/d")],
      point("2024-03-15", "5,00"),
    );

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "ParseError",
      value: "n/d",
    });
  });
});

describe("PriceVariationService", () => {
  let database: TestDatabase;
  let stocksRepo: PostgresStockRepository;
  let historyRepo: PostgresHistoricalEntryRepository;
  let service: PriceVariationService;

  const clock = new FixedClock(new Date("2024-03-16T12:00:00.000Z"));

  const entry = (stockId: string, tradingDate: string, variation: string) => ({
    stockId,
    tradingDate,
    openPrice: variation,
    closePrice: variation,
    variation,
    minPrice: variation,
    maxPrice: variation,
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
    service = new PriceVariationService(stocksRepo, historyRepo);
  });

  it("includes the day exactly `days` before the latest entry", async () => {
    const stock = await stocksRepo.create({ code: "BBSE3", name: "BB Seguridade" });
    await historyRepo.saveEntries([
      entry(stock.id, "2024-02-13", "5,00"),
      entry(stock.id, "2024-02-14", "10,00"),
      entry(stock.id, "2024-03-01", "11,00"),
      entry(stock.id, "2024-03-15", "12,50"),
    ]);

    const result = await service.getPriceVariationByCode("bbse3", 30);

    expect(result._unsafeUnwrap()).toMatchObject({
      startDate: "2024-02-14",
      endDate: "2024-03-15",
      absoluteVariation: 2.5,
      percentageVariation: 25,
    });
  });

  it("reports a stock without history", async () => {
    const stock = await stocksRepo.create({ code: "PETR4", name: "Petrobras PN" });

    const result = await service.getPriceVariation(stock.id, 30);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "NoHistoryError",
      message: "No historical data available for this stock",
      stockId: stock.id,
    });
  });

  it("reports unknown stock codes", async () => {
    const result = await service.getPriceVariationByCode("XXXX3", 30);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "StockNotFoundError",
      stockCode: "XXXX3",
    });
  });
});
