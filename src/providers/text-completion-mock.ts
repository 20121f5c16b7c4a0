// TextCompletionTest: canned analyst for development without credentials.

import { Effect, Layer } from "effect";
import { TextCompletion } from "../text-completion.ts";

export const CANNED_ANALYSIS = [
  "Summary: a steady large-cap business with consistent earnings.",
  "Opportunities: recurring revenue, healthy margins. Risks: valuation, sector slowdown.",
  "Recommendation: Hold. The price sits mid-range between its 52-week extremes.",
  "Outlook: constructive long term; range-bound short term.",
].join("\n");

export const TextCompletionTestLive = Layer.succeed(
  TextCompletion,
  TextCompletion.of({
    complete: (_prompt: string) => Effect.succeed(CANNED_ANALYSIS),
  }),
);
