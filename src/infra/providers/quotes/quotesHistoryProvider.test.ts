import pino from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";
import { QuotesHistoryProvider } from "./quotesHistoryProvider";

const logger = pino({ level: "silent" });

const createProvider = () =>
  new QuotesHistoryProvider(
    {
      baseUrl: "https://quotes.test",
      historyPath: "/v1/quotes/history",
      pageSize: 25,
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    },
    logger,
  );

const respondWith = (body: unknown, status = 200) => {
  const handler = vi.fn(
    async (..._args: Parameters<typeof fetch>) =>
      new Response(JSON.stringify(body), { status }),
  );
  vi.stubGlobal("fetch", handler);
  return handler;
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("QuotesHistoryProvider", () => {
  it("posts the page request as form fields", async () => {
    const fetchMock = respondWith([]);

    await createProvider().fetchPage(" petr4 ", 2);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("https://quotes.test/v1/quotes/history");
    expect(call?.[1]?.method).toBe("POST");
    expect(call?.[1]?.body).toBe("page=2&numberItems=25&symbol=PETR4");
  });

  it("maps tuple rows and drops rows that do not match the layout", async () => {
    respondWith([
      [
        { display: "15/03/2024", timestamp: 1710460800 },
        "12,50",
        "12,10",
        "1,20",
        "12,00",
        "12,80",
        "1.234.567",
      ],
      [{ display: "14/03/2024", timestamp: "1710374400" }, 10, 11, "0,5", 9, 12, 1000],
      ["not a row"],
    ]);

    const result = await createProvider().fetchPage("BBSE3", 0);

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual([
      {
        dateDisplay: "15/03/2024",
        dateTimestamp: 1710460800,
        openPrice: "12,50",
        closePrice: "12,10",
        variation: "1,20",
        minPrice: "12,00",
        maxPrice: "12,80",
        volume: "1.234.567",
      },
      {
        dateDisplay: "14/03/2024",
        dateTimestamp: 1710374400,
        openPrice: "10",
        closePrice: "11",
        variation: "0,5",
        minPrice: "9",
        maxPrice: "12",
        volume: "1000",
      },
    ]);
  });

  it("fails the page when the payload is not a list", async () => {
    respondWith({ rows: [] });

    const result = await createProvider().fetchPage("BBSE3", 0);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected malformed response");
    }

    expect(result.error.source).toBe("history");
    expect(result.error.code).toBe("malformed_response");
    expect(result.error.provider).toBe("quotes-api");
  });

  it("maps server failures to retryable provider errors", async () => {
    respondWith("unavailable", 503);

    const result = await createProvider().fetchPage("BBSE3", 1);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected provider error");
    }

    expect(result.error).toMatchObject({
      source: "history",
      code: "provider_error",
      httpStatus: 503,
      retryable: true,
      message: "HTTP request failed with status 503.",
    });
  });

  it("maps throttling to rate_limited", async () => {
    respondWith("slow down", 429);

    const result = await createProvider().fetchPage("BBSE3", 0);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected rate limit error");
    }

    expect(result.error.code).toBe("rate_limited");
  });
});
