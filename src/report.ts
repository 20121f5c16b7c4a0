// Report assembly: resolve once, then build each section independently.
// A failing section degrades to a placeholder; the others still render.

import { Effect, Option } from "effect";
import { analyzeQuote } from "./analysis.ts";
import {
  buildFinancialsChart,
  buildPriceChart,
  type FinancialsChart,
  type PriceChart,
} from "./chart.ts";
import type { HistoryRange, NormalizedQuote } from "./domain.ts";
import { describeMarketDataError, MarketData } from "./market-data.ts";
import { type ResolutionFailure, TickerResolver } from "./resolver.ts";
import type { TextCompletion } from "./text-completion.ts";

// --- Sections ---

export type Section<A> =
  | { readonly _tag: "Available"; readonly value: A }
  | { readonly _tag: "Unavailable"; readonly reason: string }
  | { readonly _tag: "Skipped" };

export const Available = <A>(value: A): Section<A> => ({
  _tag: "Available",
  value,
});

export const Unavailable = <A>(reason: string): Section<A> => ({
  _tag: "Unavailable",
  reason,
});

export const Skipped: Section<never> = { _tag: "Skipped" };

export const NO_HISTORY = "No historical data available.";
export const NO_FINANCIALS = "Financial data not available for this stock.";

export interface Report {
  readonly query: string;
  readonly quote: NormalizedQuote;
  readonly range: HistoryRange;
  readonly priceChart: Section<PriceChart>;
  readonly financials: Section<FinancialsChart>;
  readonly insights: Section<string>;
}

export interface ReportOptions {
  readonly range: HistoryRange;
  readonly insights: boolean;
}

// --- Section builders ---

function fromOption<A>(
  option: Option.Option<A>,
  reason: string,
): Section<A> {
  return Option.match(option, {
    onNone: () => Unavailable<A>(reason),
    onSome: Available,
  });
}

export function priceChartSection(
  symbol: string,
  range: HistoryRange,
): Effect.Effect<Section<PriceChart>, never, MarketData> {
  return Effect.gen(function* () {
    const { history } = yield* MarketData;
    const bars = yield* history(symbol, range);
    return fromOption(buildPriceChart(bars), NO_HISTORY);
  }).pipe(
    Effect.catchAll((e) =>
      Effect.logWarning(
        `[report] history for ${symbol} failed: ${describeMarketDataError(e)}`,
      ).pipe(Effect.as(Unavailable<PriceChart>(NO_HISTORY)))
    ),
  );
}

export function financialsSection(
  symbol: string,
): Effect.Effect<Section<FinancialsChart>, never, MarketData> {
  return Effect.gen(function* () {
    const { financials } = yield* MarketData;
    const years = yield* financials(symbol);
    return fromOption(buildFinancialsChart(years), NO_FINANCIALS);
  }).pipe(
    Effect.catchAll((e) =>
      Effect.logWarning(
        `[report] financials for ${symbol} failed: ${describeMarketDataError(e)}`,
      ).pipe(Effect.as(Unavailable<FinancialsChart>(NO_FINANCIALS)))
    ),
  );
}

// --- Report ---

export function buildReport(
  rawTicker: string,
  options: ReportOptions,
): Effect.Effect<
  Report,
  ResolutionFailure,
  TickerResolver | MarketData | TextCompletion
> {
  return Effect.gen(function* () {
    const resolver = yield* TickerResolver;
    const quote = yield* resolver.resolve(rawTicker);

    const priceChart = yield* priceChartSection(quote.symbol, options.range);
    const financials = yield* financialsSection(quote.symbol);
    const insights: Section<string> = options.insights
      ? Available(yield* analyzeQuote(rawTicker.toUpperCase(), quote))
      : Skipped;

    return {
      query: rawTicker,
      quote,
      range: options.range,
      priceChart,
      financials,
      insights,
    };
  });
}
