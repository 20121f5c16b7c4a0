// MarketDataTest: in-memory implementation of MarketData for development.

import { Effect, Layer } from "effect";
import type {
  FinancialYear,
  HistoryRange,
  InfoMapping,
  PriceBar,
} from "../domain.ts";
import { MarketData, SymbolNotFound } from "../market-data.ts";

// --- Sample data ---

const infos: Record<string, InfoMapping> = {
  "INFY.NS": {
    currentPrice: 1520.4,
    fiftyTwoWeekHigh: 1990.9,
    fiftyTwoWeekLow: 1307.0,
    trailingPE: 22.8,
    priceToBook: 6.9,
    returnOnEquity: 0.29,
    debtToEquity: 9.4,
    dividendYield: 2.83,
    bookValue: 220.1,
    lastSplitFactor: "2:1",
    trailingEps: 66.7,
    marketCap: 6_310_000_000_000,
    volume: 5_812_004,
    currency: "INR",
  },
  "INFY.BO": {
    currentPrice: 1520.9,
    currency: "INR",
  },
  AAPL: {
    currentPrice: 225.3,
    fiftyTwoWeekHigh: 260.1,
    fiftyTwoWeekLow: 169.2,
    trailingPE: 34.1,
    priceToBook: 51.3,
    returnOnEquity: 1.38,
    debtToEquity: 154.5,
    dividendYield: 0.44,
    bookValue: 4.4,
    lastSplitFactor: "4:1",
    trailingEps: 6.6,
    marketCap: 3_380_000_000_000,
    volume: 48_120_300,
    currency: "USD",
  },
};

const financials: Record<string, readonly FinancialYear[]> = {
  "INFY.NS": [
    { year: 2022, revenue: 1_216_410e6, netIncome: 222_100e6, equity: 755_500e6 },
    { year: 2023, revenue: 1_467_670e6, netIncome: 240_950e6, equity: 754_070e6 },
    { year: 2024, revenue: 1_536_700e6, netIncome: 262_330e6, equity: 881_510e6 },
  ],
  AAPL: [
    { year: 2022, revenue: 394_328e6, netIncome: 99_803e6, equity: 50_672e6 },
    { year: 2023, revenue: 383_285e6, netIncome: 96_995e6, equity: 62_146e6 },
    { year: 2024, revenue: 391_035e6, netIncome: 93_736e6, equity: 56_950e6 },
  ],
};

const TRADING_DAYS: Record<HistoryRange, number> = {
  "1mo": 21,
  "3mo": 63,
  "6mo": 126,
  "1y": 252,
  "2y": 504,
  "5y": 1260,
};

/** Deterministic oscillating series ending at the symbol's current price. */
function syntheticHistory(last: number, days: number): PriceBar[] {
  const start = Date.parse("2025-01-01T00:00:00Z");
  return Array.from({ length: days }, (_, i) => {
    const drift = (days - 1 - i) * 0.001;
    const close = last * (1 - drift) * (1 + 0.02 * Math.sin(i / 5));
    return {
      date: new Date(start + i * 86_400_000).toISOString().slice(0, 10),
      open: close * 0.995,
      high: close * 1.01,
      low: close * 0.99,
      close,
      volume: 1_000_000 + (i % 7) * 50_000,
    };
  });
}

// --- Mock layer ---

export const MarketDataTestLive = Layer.succeed(
  MarketData,
  MarketData.of({
    lookup: (symbol: string) => {
      const info = infos[symbol];
      return info !== undefined
        ? Effect.succeed(info)
        : Effect.fail(new SymbolNotFound({ symbol }));
    },
    history: (symbol: string, range: HistoryRange) => {
      const price = infos[symbol]?.["currentPrice"];
      return typeof price === "number"
        ? Effect.succeed(syntheticHistory(price, TRADING_DAYS[range]))
        : Effect.fail(new SymbolNotFound({ symbol }));
    },
    financials: (symbol: string) => Effect.succeed(financials[symbol] ?? []),
  }),
);
