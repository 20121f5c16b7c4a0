import { describe, expect, it } from "vitest";
import { HttpClient, HttpClientResponse } from "@effect/platform";
import { Effect, Either, Layer } from "effect";
import {
  decodeChartResponse,
  decodeFinancialsResponse,
  decodeInfoResponse,
  unwrapValue,
  YahooFinanceLive,
} from "./yahoo-finance.ts";
import { MarketData } from "../market-data.ts";

// --- Test data ---

const summaryResponse = {
  quoteSummary: {
    result: [
      {
        price: {
          regularMarketPrice: { raw: 1519.9, fmt: "1,519.90" },
          currency: "INR",
          marketCap: { raw: 6_300_000_000_000, fmt: "6.3T" },
        },
        summaryDetail: {
          trailingPE: 22.8,
          dividendYield: {},
          fiftyTwoWeekHigh: { raw: 1990.9, fmt: "1,990.90" },
        },
        defaultKeyStatistics: { lastSplitFactor: "2:1", bookValue: 220.1 },
        financialData: { currentPrice: { raw: 1520.4, fmt: "1,520.40" } },
      },
    ],
    error: null,
  },
};

const chartResponse = {
  chart: {
    result: [
      {
        meta: { symbol: "INFY.NS", currency: "INR" },
        timestamp: [1735689600, 1735776000, 1735862400],
        indicators: {
          quote: [
            {
              open: [100, null, 102],
              high: [105, null, 106],
              low: [99, null, 101],
              close: [104, null, 105],
              volume: [1000, null, null],
            },
          ],
        },
      },
    ],
    error: null,
  },
};

// Fiscal years ending 2023-03-31 and 2024-03-31.
const FY2023 = 1680220800;
const FY2024 = 1711843200;

const financialsResponse = {
  quoteSummary: {
    result: [
      {
        incomeStatementHistory: {
          incomeStatementHistory: [
            { endDate: FY2024, totalRevenue: 1536, netIncome: 262 },
            { endDate: FY2023, totalRevenue: 1467, netIncome: 240 },
          ],
        },
        balanceSheetHistory: {
          balanceSheetStatements: [
            { endDate: { raw: FY2024, fmt: "2024-03-31" }, totalStockholderEquity: 881 },
          ],
        },
      },
    ],
    error: null,
  },
};

// --- Helpers ---

async function success<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isLeft(result)) throw new Error("Expected success but got failure");
  return result.right;
}

async function failure<A, E>(effect: Effect.Effect<A, E>): Promise<E> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- unwrapValue ---

describe("unwrapValue", () => {
  it("unwraps raw figures and drops empty objects", () => {
    expect(unwrapValue({ raw: 3, fmt: "3" })).toBe(3);
    expect(unwrapValue({})).toBeUndefined();
    expect(unwrapValue("2:1")).toBe("2:1");
  });
});

// --- decodeInfoResponse ---

describe("decodeInfoResponse", () => {
  it("flattens the modules into one info-mapping", async () => {
    const info = await success(decodeInfoResponse(summaryResponse, "INFY.NS"));

    expect(info["currentPrice"]).toBe(1520.4);
    expect(info["regularMarketPrice"]).toBe(1519.9);
    expect(info["trailingPE"]).toBe(22.8);
    expect(info["fiftyTwoWeekHigh"]).toBe(1990.9);
    expect(info["marketCap"]).toBe(6_300_000_000_000);
    expect(info["lastSplitFactor"]).toBe("2:1");
    expect(info["currency"]).toBe("INR");
    expect("dividendYield" in info).toBe(false);
  });

  it("falls back to the market price when financialData has no current price", async () => {
    const [result] = summaryResponse.quoteSummary.result;
    const { financialData: _, ...withoutFinancialData } = result;

    const info = await success(
      decodeInfoResponse(
        { quoteSummary: { result: [withoutFinancialData], error: null } },
        "INFY.NS",
      ),
    );

    expect(info["currentPrice"]).toBe(1519.9);
  });

  it("API error is surfaced as SymbolNotFound", async () => {
    const error = await failure(
      decodeInfoResponse(
        {
          quoteSummary: {
            result: null,
            error: { code: "Not Found", description: "Quote not found" },
          },
        },
        "NOPE.NS",
      ),
    );
    expect(error._tag).toBe("SymbolNotFound");
  });

  it("empty result returns SymbolNotFound", async () => {
    const error = await failure(
      decodeInfoResponse({ quoteSummary: { result: [], error: null } }, "X"),
    );
    expect(error._tag).toBe("SymbolNotFound");
  });

  it("null input returns ParseError", async () => {
    const error = await failure(decodeInfoResponse(null, "X"));
    expect(error._tag).toBe("ParseError");
  });
});

// --- decodeChartResponse ---

describe("decodeChartResponse", () => {
  it("produces daily bars and drops sessions with missing prices", async () => {
    const bars = await success(decodeChartResponse(chartResponse, "INFY.NS"));

    expect(bars).toEqual([
      { date: "2025-01-01", open: 100, high: 105, low: 99, close: 104, volume: 1000 },
      { date: "2025-01-03", open: 102, high: 106, low: 101, close: 105, volume: 0 },
    ]);
  });

  it("result without timestamps yields an empty series", async () => {
    const bars = await success(
      decodeChartResponse(
        { chart: { result: [{ indicators: { quote: [{}] } }], error: null } },
        "INFY.NS",
      ),
    );
    expect(bars).toEqual([]);
  });

  it("API error is surfaced as SymbolNotFound", async () => {
    const error = await failure(
      decodeChartResponse(
        { chart: { result: null, error: { description: "No data found" } } },
        "NOPE",
      ),
    );
    expect(error._tag).toBe("SymbolNotFound");
  });

  it("non-object chart field returns ParseError", async () => {
    const error = await failure(decodeChartResponse({ chart: "nope" }, "X"));
    expect(error._tag).toBe("ParseError");
  });
});

// --- decodeFinancialsResponse ---

describe("decodeFinancialsResponse", () => {
  it("merges statements by fiscal year, oldest first", async () => {
    const years = await success(
      decodeFinancialsResponse(financialsResponse, "INFY.NS"),
    );

    expect(years).toEqual([
      { year: 2023, revenue: 1467, netIncome: 240 },
      { year: 2024, revenue: 1536, netIncome: 262, equity: 881 },
    ]);
  });

  it("missing statement modules yield no years", async () => {
    const years = await success(
      decodeFinancialsResponse(
        { quoteSummary: { result: [{}], error: null } },
        "INFY.NS",
      ),
    );
    expect(years).toEqual([]);
  });
});

// --- YahooFinanceLive ---

describe("YahooFinanceLive", () => {
  function stubHttp(respond: (url: URL) => Response) {
    const urls: string[] = [];
    const client = HttpClient.make((request, url) => {
      urls.push(url.href);
      return Effect.succeed(HttpClientResponse.fromWeb(request, respond(url)));
    });
    return { urls, layer: Layer.succeed(HttpClient.HttpClient, client) };
  }

  const yahoo = (url: URL) => {
    if (url.hostname === "fc.yahoo.com") return new Response("", { status: 404 });
    if (url.pathname === "/v1/test/getcrumb") return new Response("test-crumb");
    if (url.pathname.startsWith("/v10/finance/quoteSummary/INFY.NS")) {
      return new Response(JSON.stringify(summaryResponse));
    }
    return new Response("", { status: 404 });
  };

  it("acquires a crumb once and sends it with every summary request", async () => {
    const { urls, layer } = stubHttp(yahoo);

    const [first, second] = await Effect.runPromise(
      Effect.gen(function* () {
        const market = yield* MarketData;
        const a = yield* market.lookup("INFY.NS");
        const b = yield* market.lookup("INFY.NS");
        return [a, b] as const;
      }).pipe(Effect.provide(YahooFinanceLive.pipe(Layer.provide(layer)))),
    );

    expect(first["currentPrice"]).toBe(1520.4);
    expect(second).toEqual(first);
    expect(urls).toHaveLength(4);
    expect(new URL(urls[0]).hostname).toBe("fc.yahoo.com");
    expect(new URL(urls[1]).pathname).toBe("/v1/test/getcrumb");
    expect(new URL(urls[2]).searchParams.get("crumb")).toBe("test-crumb");
    expect(new URL(urls[3]).searchParams.get("modules")).toBe(
      "price,summaryDetail,defaultKeyStatistics,financialData",
    );
  });

  it("drops a rejected crumb and fetches a new one on the next lookup", async () => {
    let summaries = 0;
    const { urls, layer } = stubHttp((url) => {
      if (url.pathname.startsWith("/v10/finance/quoteSummary/")) {
        summaries++;
        if (summaries === 1) return new Response("", { status: 401 });
      }
      return yahoo(url);
    });

    const [first, second] = await Effect.runPromise(
      Effect.gen(function* () {
        const market = yield* MarketData;
        const a = yield* Effect.either(market.lookup("INFY.NS"));
        const b = yield* market.lookup("INFY.NS");
        return [a, b] as const;
      }).pipe(Effect.provide(YahooFinanceLive.pipe(Layer.provide(layer)))),
    );

    expect(Either.isLeft(first) ? first.left._tag : null).toBe("HttpError");
    expect(second["currentPrice"]).toBe(1520.4);
    expect(
      urls.filter((u) => new URL(u).pathname === "/v1/test/getcrumb"),
    ).toHaveLength(2);
    expect(urls).toHaveLength(6);
  });

  it("maps a 404 from the provider to HttpError", async () => {
    const { layer } = stubHttp(yahoo);

    const error = await failure(
      Effect.gen(function* () {
        const market = yield* MarketData;
        return yield* market.lookup("NOPE.NS");
      }).pipe(Effect.provide(YahooFinanceLive.pipe(Layer.provide(layer)))),
    );

    expect(error._tag).toBe("HttpError");
    if (error._tag === "HttpError") expect(error.status).toBe(404);
  });
});
