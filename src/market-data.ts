// Market data: service definition and provider errors.

import { Context, Data, type Effect } from "effect";
import type {
  FinancialYear,
  HistoryRange,
  InfoMapping,
  PriceBar,
} from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export type MarketDataError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound;

/** One-line description of a provider error, for logs and placeholders. */
export function describeMarketDataError(e: MarketDataError): string {
  switch (e._tag) {
    case "NetworkError":
    case "ParseError":
      return `${e._tag}: ${e.message}`;
    case "HttpError":
      return `HTTP ${e.status}`;
    case "SymbolNotFound":
      return `unknown symbol ${e.symbol}`;
  }
}

// --- Service ---

export interface MarketDataService {
  /** Provider info-mapping for an exchange-qualified symbol. */
  readonly lookup: (
    symbol: string,
  ) => Effect.Effect<InfoMapping, MarketDataError>;
  /** Daily OHLCV bars, oldest first. */
  readonly history: (
    symbol: string,
    range: HistoryRange,
  ) => Effect.Effect<readonly PriceBar[], MarketDataError>;
  /** Yearly statement figures, oldest first. */
  readonly financials: (
    symbol: string,
  ) => Effect.Effect<readonly FinancialYear[], MarketDataError>;
}

export class MarketData extends Context.Tag("MarketData")<
  MarketData,
  MarketDataService
>() {}
