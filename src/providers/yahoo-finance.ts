// Yahoo Finance: implementation of MarketData.

import {
  Cookies,
  HttpClient,
  type HttpClientError,
  HttpClientRequest,
} from "@effect/platform";
import { Config, Effect, Layer, Option, Predicate, Ref, Schema } from "effect";
import type {
  FinancialYear,
  HistoryRange,
  InfoMapping,
  PriceBar,
} from "../domain.ts";
import {
  HttpError,
  MarketData,
  type MarketDataError,
  NetworkError,
  ParseError,
  SymbolNotFound,
} from "../market-data.ts";

// --- Modules ---

/** Later modules win when two carry the same key. */
export const INFO_MODULES = [
  "price",
  "summaryDetail",
  "defaultKeyStatistics",
  "financialData",
] as const;

export const FINANCIAL_MODULES = [
  "incomeStatementHistory",
  "balanceSheetHistory",
] as const;

// --- Yahoo response schemas ---

const YahooErrorBody = Schema.NullOr(
  Schema.Struct({
    code: Schema.optional(Schema.String),
    description: Schema.optional(Schema.String),
  }),
);

const QuoteSummaryResponse = Schema.Struct({
  quoteSummary: Schema.Struct({
    result: Schema.NullOr(
      Schema.Array(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
    ),
    error: YahooErrorBody,
  }),
});

const NullableSeries = Schema.optional(
  Schema.Array(Schema.NullOr(Schema.Number)),
);

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(
      Schema.Array(
        Schema.Struct({
          timestamp: Schema.optional(Schema.Array(Schema.Number)),
          indicators: Schema.Struct({
            quote: Schema.Array(
              Schema.Struct({
                open: NullableSeries,
                high: NullableSeries,
                low: NullableSeries,
                close: NullableSeries,
                volume: NullableSeries,
              }),
            ),
          }),
        }),
      ),
    ),
    error: YahooErrorBody,
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;

type SummaryResult = Readonly<Record<string, unknown>>;

// --- Decoding (pure) ---

function toParseError(e: { readonly message: string }): ParseError {
  return new ParseError({ message: `Invalid response: ${e.message}` });
}

type QuoteSummaryResponseType = typeof QuoteSummaryResponse.Type;

export function decodeQuoteSummary(
  json: unknown,
  symbol: string,
): Effect.Effect<SummaryResult, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(QuoteSummaryResponse)(json).pipe(
    Effect.mapError(toParseError),
    Effect.flatMap((response) => interpretQuoteSummary(response, symbol)),
  );
}

function interpretQuoteSummary(
  response: QuoteSummaryResponseType,
  symbol: string,
): Effect.Effect<SummaryResult, SymbolNotFound> {
  const { quoteSummary } = response;

  if (quoteSummary.error !== null) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  if (quoteSummary.result === null || quoteSummary.result.length === 0) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  return Effect.succeed(quoteSummary.result[0]);
}

/** Yahoo wraps figures as `{ raw, fmt }` and reports absent ones as `{}`. */
export function unwrapValue(value: unknown): unknown {
  if (!Predicate.isRecord(value)) return value;
  if ("raw" in value) return value["raw"];
  return Object.keys(value).length === 0 ? undefined : value;
}

/** Flatten the fundamentals modules into a single info-mapping. */
export function toInfoMapping(result: SummaryResult): InfoMapping {
  const info: Record<string, unknown> = {};
  for (const name of INFO_MODULES) {
    const module = result[name];
    if (!Predicate.isRecord(module)) continue;
    for (const [key, value] of Object.entries(module)) {
      const unwrapped = unwrapValue(value);
      if (unwrapped !== undefined && unwrapped !== null) info[key] = unwrapped;
    }
  }
  if (info["currentPrice"] === undefined && info["regularMarketPrice"] !== undefined) {
    info["currentPrice"] = info["regularMarketPrice"];
  }
  return info;
}

export function decodeInfoResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<InfoMapping, ParseError | SymbolNotFound> {
  return decodeQuoteSummary(json, symbol).pipe(Effect.map(toInfoMapping));
}

function statementYear(row: Readonly<Record<string, unknown>>): Option.Option<number> {
  const endDate = unwrapValue(row["endDate"]);
  const ms = typeof endDate === "number"
    ? endDate * 1000
    : typeof endDate === "string"
    ? Date.parse(endDate)
    : Number.NaN;
  return Number.isFinite(ms)
    ? Option.some(new Date(ms).getUTCFullYear())
    : Option.none();
}

function statementRows(
  result: SummaryResult,
  module: string,
  listKey: string,
): readonly Readonly<Record<string, unknown>>[] {
  const container = result[module];
  if (!Predicate.isRecord(container)) return [];
  const rows = container[listKey];
  return Array.isArray(rows) ? rows.filter(Predicate.isRecord) : [];
}

function figureOf(row: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = unwrapValue(row[key]);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

type YearFigures = { revenue?: number; netIncome?: number; equity?: number };

/** Merge income statement and balance sheet rows by fiscal year, oldest first. */
export function toFinancialYears(result: SummaryResult): FinancialYear[] {
  const years = new Map<number, YearFigures>();
  const entry = (year: number): YearFigures => {
    const existing = years.get(year);
    if (existing !== undefined) return existing;
    const created: YearFigures = {};
    years.set(year, created);
    return created;
  };

  for (const row of statementRows(result, "incomeStatementHistory", "incomeStatementHistory")) {
    const year = statementYear(row);
    if (Option.isNone(year)) continue;
    const e = entry(year.value);
    const revenue = figureOf(row, "totalRevenue");
    const netIncome = figureOf(row, "netIncome");
    if (revenue !== undefined) e.revenue = revenue;
    if (netIncome !== undefined) e.netIncome = netIncome;
  }
  for (const row of statementRows(result, "balanceSheetHistory", "balanceSheetStatements")) {
    const year = statementYear(row);
    if (Option.isNone(year)) continue;
    const equity = figureOf(row, "totalStockholderEquity");
    if (equity !== undefined) entry(year.value).equity = equity;
  }

  return [...years.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, figures]) => ({ year, ...figures }));
}

export function decodeFinancialsResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<FinancialYear[], ParseError | SymbolNotFound> {
  return decodeQuoteSummary(json, symbol).pipe(Effect.map(toFinancialYears));
}

export function decodeChartResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<PriceBar[], ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(toParseError),
    Effect.flatMap((response) => interpretChartResponse(response, symbol)),
  );
}

function interpretChartResponse(
  response: YahooChartResponseType,
  symbol: string,
): Effect.Effect<PriceBar[], SymbolNotFound> {
  const { chart } = response;

  if (chart.error !== null || chart.result === null || chart.result.length === 0) {
    return Effect.fail(new SymbolNotFound({ symbol }));
  }

  const { timestamp = [], indicators } = chart.result[0];
  const quote = indicators.quote[0];
  if (quote === undefined) return Effect.succeed([]);

  const bars: PriceBar[] = [];
  timestamp.forEach((epoch, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    // Halted sessions come back as nulls.
    if (open == null || high == null || low == null || close == null) return;
    bars.push({
      date: new Date(epoch * 1000).toISOString().slice(0, 10),
      open,
      high,
      low,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  });
  return Effect.succeed(bars);
}

// --- Transport ---

export function fromHttpClientError(
  e: HttpClientError.HttpClientError,
): MarketDataError {
  if (e._tag === "RequestError") return new NetworkError({ message: e.message });
  return e.reason === "StatusCode"
    ? new HttpError({ status: e.response.status })
    : new ParseError({ message: `JSON parse failed: ${e.message}` });
}

// --- Yahoo Finance layer ---

export const makeYahooFinanceApi = Effect.gen(function* () {
  const cookies = yield* Ref.make(Cookies.empty);
  const session = (yield* HttpClient.HttpClient).pipe(
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
    HttpClient.withCookiesRef(cookies),
  );
  const client = session.pipe(HttpClient.filterStatusOk);
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com"),
  );
  const cookieUrl = yield* Config.string("YAHOO_COOKIE_URL").pipe(
    Config.withDefault("https://fc.yahoo.com"),
  );

  // quoteSummary wants a crumb tied to the session cookie; the cookie
  // endpoint answers 404 but still sets it.
  const crumbRef = yield* Ref.make(Option.none<string>());
  const fetchCrumb = session.get(cookieUrl).pipe(
    Effect.ignore,
    Effect.zipRight(client.get(`${baseUrl}/v1/test/getcrumb`)),
    Effect.flatMap((response) => response.text),
    Effect.tap((crumb) => Ref.set(crumbRef, Option.some(crumb))),
    Effect.tap(() => Effect.logDebug("[yahoo] session crumb acquired")),
  );
  const crumb = Ref.get(crumbRef).pipe(
    Effect.flatMap(Option.match({
      onNone: () => fetchCrumb,
      onSome: Effect.succeed,
    })),
  );

  const getJson = (url: string) =>
    client.get(url).pipe(
      Effect.flatMap((response) => response.json),
      Effect.mapError(fromHttpClientError),
    );

  const getSummary = (symbol: string, modules: readonly string[]) =>
    crumb.pipe(
      Effect.mapError(fromHttpClientError),
      Effect.flatMap((c) => {
        const params = new URLSearchParams({
          modules: modules.join(","),
          formatted: "false",
          crumb: c,
        });
        return getJson(
          `${baseUrl}/v10/finance/quoteSummary/${encodeURIComponent(symbol)}?${params}`,
        );
      }),
      // A rejected crumb is dropped so the next request starts a new session.
      Effect.tapError((e) =>
        e._tag === "HttpError" && e.status === 401
          ? Ref.set(crumbRef, Option.none()).pipe(
            Effect.zipRight(Effect.logDebug("[yahoo] crumb rejected, cleared")),
          )
          : Effect.void
      ),
    );

  return MarketData.of({
    lookup: (symbol: string) =>
      getSummary(symbol, INFO_MODULES).pipe(
        Effect.flatMap((json) => decodeInfoResponse(json, symbol)),
      ),
    history: (symbol: string, range: HistoryRange) =>
      getJson(
        `${baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}?range=${range}&interval=1d`,
      ).pipe(Effect.flatMap((json) => decodeChartResponse(json, symbol))),
    financials: (symbol: string) =>
      getSummary(symbol, FINANCIAL_MODULES).pipe(
        Effect.flatMap((json) => decodeFinancialsResponse(json, symbol)),
      ),
  });
});

export const YahooFinanceLive = Layer.effect(MarketData, makeYahooFinanceApi);
