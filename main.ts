import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Config, Console, Effect, Layer, Logger, LogLevel } from "effect";
import { HISTORY_RANGES } from "./src/domain.ts";
import { buildReport } from "./src/report.ts";
import { TickerResolverLive } from "./src/resolver.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { MarketDataTestLive } from "./src/providers/market-data-mock.ts";
import { GeminiLive } from "./src/providers/gemini.ts";
import { TextCompletionTestLive } from "./src/providers/text-completion-mock.ts";
import { formatReport, formatResolutionFailure } from "./src/format.ts";

// --- CLI ---

const symbol = Options.text("symbol").pipe(
  Options.withDescription("Ticker symbol (e.g. INFY, RELIANCE, AAPL)"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a stock ticker:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Ticker cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);

const period = Options.choice("period", HISTORY_RANGES).pipe(
  Options.withDescription("Price history window for the chart"),
  Options.withDefault("6mo"),
);

const noInsights = Options.boolean("no-insights").pipe(
  Options.withDescription("Skip the AI buy/hold/sell analysis"),
);

const command = Command.make("stock-analyzer", {
  symbol,
  period,
  noInsights,
}).pipe(
  Command.withHandler(({ symbol, period, noInsights }) =>
    buildReport(symbol, { range: period, insights: !noInsights }).pipe(
      Effect.flatMap((report) => Console.log(formatReport(report))),
      Effect.catchTag("ResolutionFailure", (e) =>
        Console.error(formatResolutionFailure(e))),
    )
  ),
);

// --- Layers ---
// STOCK_PROVIDER: "yahoo" (default) or "test".
// ANALYST_PROVIDER: "gemini" (default) or "test".

const MarketDataLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("STOCK_PROVIDER").pipe(
      Config.withDefault("yahoo"),
    );
    return provider === "test" ? MarketDataTestLive : YahooFinanceLive;
  }),
);

const TextCompletionLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("ANALYST_PROVIDER").pipe(
      Config.withDefault("gemini"),
    );
    return provider === "test" ? TextCompletionTestLive : GeminiLive;
  }),
);

const AppLive = TickerResolverLive.pipe(
  Layer.provideMerge(Layer.merge(MarketDataLive, TextCompletionLive)),
  Layer.provide(FetchHttpClient.layer),
);

// --- Run ---

const cli = Command.run(command, {
  name: "stock-analyzer",
  version: "0.1.0",
});

const program = Effect.gen(function* () {
  const level = yield* Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info),
  );
  return yield* cli(process.argv).pipe(Logger.withMinimumLogLevel(level));
});

program.pipe(
  Effect.provide(AppLive),
  Effect.provide(Logger.pretty),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
