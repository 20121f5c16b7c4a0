// AI analysis: prompt template and the degrading call into TextCompletion.

import { Effect } from "effect";
import {
  NOT_AVAILABLE,
  type NormalizedQuote,
  type NumericField,
} from "./domain.ts";
import { TextCompletion } from "./text-completion.ts";

/** Field value as shown to the model: unknown figures read "N/A", not 0. */
export function figure(quote: NormalizedQuote, field: NumericField): string {
  return quote.missing.includes(field) ? NOT_AVAILABLE : String(quote[field]);
}

export function buildAnalysisPrompt(
  ticker: string,
  quote: NormalizedQuote,
): string {
  const f = (field: NumericField) => figure(quote, field);
  return [
    `You are a professional stock analyst. Analyze ${ticker} (${quote.symbol}, listed on ${quote.exchange}) using the following data:`,
    "",
    `- Current Price: ${f("currentPrice")}`,
    `- 52 Week High: ${f("high52Week")}`,
    `- 52 Week Low: ${f("low52Week")}`,
    `- P/E Ratio: ${f("peRatio")}`,
    `- P/B Ratio: ${f("pbRatio")}`,
    `- ROE: ${f("roe")}`,
    `- Debt/Equity: ${f("deRatio")}`,
    `- Dividend Yield: ${f("divYield")}`,
    `- EPS (TTM): ${f("epsTtm")}`,
    `- Market Cap: ${f("marketCap")}`,
    `- Volume: ${f("volume")}`,
    `- Currency: ${quote.currency}`,
    "",
    "Provide:",
    "1. A short, beginner-friendly summary of this stock.",
    "2. Key opportunities and risks.",
    "3. A clear recommendation (Buy, Hold, or Sell) with reasoning.",
    "4. Long-term vs. short-term outlook.",
  ].join("\n");
}

/** Ask the model for a recommendation. Never fails: errors become the text. */
export function analyzeQuote(
  ticker: string,
  quote: NormalizedQuote,
): Effect.Effect<string, never, TextCompletion> {
  return Effect.gen(function* () {
    const { complete } = yield* TextCompletion;
    return yield* complete(buildAnalysisPrompt(ticker, quote));
  }).pipe(
    Effect.catchTag("CompletionError", (e) =>
      Effect.logWarning(`[analysis] completion failed: ${e.message}`).pipe(
        Effect.as(`Analysis failed: ${e.message}`),
      )),
  );
}
