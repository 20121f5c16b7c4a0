// Ticker resolver: finds the exchange a raw symbol trades on and
// normalizes the provider payload into a NormalizedQuote.

import {
  Cause,
  Context,
  Data,
  Effect,
  Either,
  HashMap,
  Layer,
  Option,
  Ref,
} from "effect";
import {
  EXCHANGE_CANDIDATES,
  type ExchangeCandidate,
  type ExchangeLabel,
  type InfoMapping,
  NOT_AVAILABLE,
  type NormalizedQuote,
  type NumericField,
} from "./domain.ts";
import {
  describeMarketDataError,
  MarketData,
  type MarketDataService,
} from "./market-data.ts";

// --- Error ---

export class ResolutionFailure extends Data.TaggedError("ResolutionFailure")<{
  readonly query: string;
}> {}

// --- Normalization (pure) ---

export function toNumber(value: unknown): Option.Option<number> {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Option.some(value) : Option.none();
  }
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? Option.some(n) : Option.none();
  }
  return Option.none();
}

export function toText(value: unknown): string {
  if (typeof value === "string" && value.trim() !== "") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return NOT_AVAILABLE;
}

/** A payload is usable when it is non-empty and carries a numeric current price. */
export function isUsable(info: InfoMapping): boolean {
  return Object.keys(info).length > 0 &&
    Option.isSome(toNumber(info["currentPrice"]));
}

export function normalizeInfo(
  info: InfoMapping,
  symbol: string,
  exchange: ExchangeLabel,
): NormalizedQuote {
  const missing: NumericField[] = [];
  const num = (field: NumericField, key: string): number =>
    Option.getOrElse(toNumber(info[key]), () => {
      missing.push(field);
      return 0;
    });

  return {
    symbol,
    exchange,
    currentPrice: num("currentPrice", "currentPrice"),
    high52Week: num("high52Week", "fiftyTwoWeekHigh"),
    low52Week: num("low52Week", "fiftyTwoWeekLow"),
    peRatio: num("peRatio", "trailingPE"),
    pbRatio: num("pbRatio", "priceToBook"),
    roe: num("roe", "returnOnEquity"),
    deRatio: num("deRatio", "debtToEquity"),
    divYield: num("divYield", "dividendYield"),
    bookValue: num("bookValue", "bookValue"),
    faceValue: toText(info["lastSplitFactor"]),
    epsTtm: num("epsTtm", "trailingEps"),
    marketCap: num("marketCap", "marketCap"),
    volume: num("volume", "volume"),
    currency: toText(info["currency"]),
    missing,
  };
}

// --- Probing ---

function describeDefect(defect: unknown): string {
  return `defect: ${defect instanceof Error ? defect.message : String(defect)}`;
}

function probe(
  lookup: MarketDataService["lookup"],
  ticker: string,
  candidate: ExchangeCandidate,
): Effect.Effect<Option.Option<NormalizedQuote>> {
  const symbol = ticker + candidate.suffix;
  const miss = (reason: string) =>
    Effect.logDebug(`[resolver] ${symbol} miss: ${reason}`).pipe(
      Effect.as(Option.none<NormalizedQuote>()),
    );

  return Effect.logDebug(`[resolver] trying ${symbol}...`).pipe(
    Effect.flatMap(() => lookup(symbol)),
    Effect.matchCauseEffect({
      // Defects from the provider count as a miss too; interruption does not.
      onFailure: (cause) =>
        Cause.isInterruptedOnly(cause)
          ? Effect.interrupt
          : miss(
            Option.match(Cause.failureOption(cause), {
              onNone: () => describeDefect(Cause.squash(cause)),
              onSome: describeMarketDataError,
            }),
          ),
      onSuccess: (info) =>
        isUsable(info)
          ? Effect.succeed(
            Option.some(normalizeInfo(info, symbol, candidate.exchange)),
          )
          : miss("no current price"),
    }),
  );
}

/** Probe candidates strictly in order; the first usable payload wins. */
export function resolveTicker(
  lookup: MarketDataService["lookup"],
  rawTicker: string,
  candidates: readonly ExchangeCandidate[] = EXCHANGE_CANDIDATES,
): Effect.Effect<NormalizedQuote, ResolutionFailure> {
  const ticker = rawTicker.toUpperCase();

  const loop = (
    index: number,
  ): Effect.Effect<NormalizedQuote, ResolutionFailure> => {
    if (index >= candidates.length) {
      return Effect.fail(new ResolutionFailure({ query: ticker }));
    }
    return probe(lookup, ticker, candidates[index]).pipe(
      Effect.flatMap(Option.match({
        onNone: () => loop(index + 1),
        onSome: (quote) =>
          Effect.logDebug(
            `[resolver] matched ${quote.symbol} on ${quote.exchange}`,
          ).pipe(Effect.as(quote)),
      })),
    );
  };

  return loop(0);
}

// --- Service ---

export class TickerResolver extends Context.Tag("TickerResolver")<
  TickerResolver,
  {
    readonly resolve: (
      rawTicker: string,
    ) => Effect.Effect<NormalizedQuote, ResolutionFailure>;
    /** Drop every memoized result. */
    readonly invalidate: Effect.Effect<void>;
  }
>() {}

type Resolution = Either.Either<NormalizedQuote, ResolutionFailure>;

const fromResolution = (
  resolution: Resolution,
): Effect.Effect<NormalizedQuote, ResolutionFailure> =>
  Either.isLeft(resolution)
    ? Effect.fail(resolution.left)
    : Effect.succeed(resolution.right);

/** Resolver memoized by the raw query string for the process lifetime. */
export const makeTickerResolver = Effect.gen(function* () {
  const { lookup } = yield* MarketData;
  const cache = yield* Ref.make(HashMap.empty<string, Resolution>());

  const resolve = (rawTicker: string) =>
    Effect.gen(function* () {
      const hit = HashMap.get(yield* Ref.get(cache), rawTicker);
      if (Option.isSome(hit)) {
        yield* Effect.logDebug(`[resolver] cache hit for ${rawTicker}`);
        return yield* fromResolution(hit.value);
      }
      const resolution = yield* Effect.either(resolveTicker(lookup, rawTicker));
      yield* Ref.update(cache, HashMap.set(rawTicker, resolution));
      return yield* fromResolution(resolution);
    });

  return TickerResolver.of({
    resolve,
    invalidate: Ref.set(cache, HashMap.empty()),
  });
});

export const TickerResolverLive = Layer.effect(
  TickerResolver,
  makeTickerResolver,
);
