// Chart construction: pure data in, figure description out.

import { Option } from "effect";
import type { FinancialYear, PriceBar } from "./domain.ts";

// --- Price chart ---

export interface LineSeries {
  readonly name: string;
  /** One point per x value; null where the series is undefined. */
  readonly values: readonly (number | null)[];
}

export interface PriceChart {
  readonly title: string;
  readonly candles: readonly PriceBar[];
  readonly overlays: readonly LineSeries[];
}

export const SHORT_WINDOW = 50;
export const LONG_WINDOW = 200;

/** Simple rolling mean; null until `window` values have been seen. */
export function movingAverage(
  values: readonly number[],
  window: number,
): (number | null)[] {
  const out: (number | null)[] = [];
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= window) sum -= values[i - window];
    out.push(i >= window - 1 ? sum / window : null);
  }
  return out;
}

export function buildPriceChart(
  bars: readonly PriceBar[],
): Option.Option<PriceChart> {
  if (bars.length === 0) return Option.none();
  const closes = bars.map((b) => b.close);
  return Option.some({
    title: "Stock Price with Moving Averages",
    candles: bars,
    overlays: [
      { name: `${SHORT_WINDOW}D MA`, values: movingAverage(closes, SHORT_WINDOW) },
      { name: `${LONG_WINDOW}D MA`, values: movingAverage(closes, LONG_WINDOW) },
    ],
  });
}

// --- Financials chart ---

export type FinancialMetric = "revenue" | "netIncome" | "equity";

const METRIC_LABELS: Record<FinancialMetric, string> = {
  revenue: "Revenue",
  netIncome: "Profit",
  equity: "Net Worth",
};

export interface FinancialsChart {
  readonly title: string;
  readonly years: readonly number[];
  readonly series: readonly LineSeries[];
}

/** Yearly revenue/profit/net-worth lines; only metrics reported at least once. */
export function buildFinancialsChart(
  years: readonly FinancialYear[] | undefined,
): Option.Option<FinancialsChart> {
  if (years === undefined || years.length === 0) return Option.none();

  const metrics: FinancialMetric[] = ["revenue", "netIncome", "equity"];
  const series = metrics
    .filter((m) => years.some((y) => y[m] !== undefined))
    .map((m) => ({
      name: METRIC_LABELS[m],
      values: years.map((y) => y[m] ?? null),
    }));

  if (series.length === 0) return Option.none();

  return Option.some({
    title: "Financial Performance (Yearly)",
    years: years.map((y) => y.year),
    series,
  });
}
