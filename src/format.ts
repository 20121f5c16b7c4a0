// Pure formatting functions, no I/O.

import type { FinancialsChart, PriceChart } from "./chart.ts";
import {
  NOT_AVAILABLE,
  type NormalizedQuote,
  type NumericField,
} from "./domain.ts";
import type { Report, Section } from "./report.ts";
import type { ResolutionFailure } from "./resolver.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Numbers ---

export function fixed(n: number): string {
  return n.toFixed(2);
}

/** Whole number with thousands separators: 5812004 → "5,812,004". */
export function grouped(n: number): string {
  return n.toLocaleString("en-US", { maximumFractionDigits: 0 });
}

/** Short magnitude form: 1536700000000 → "1.54T". */
export function compact(n: number): string {
  const abs = Math.abs(n);
  if (abs >= 1e12) return `${fixed(n / 1e12)}T`;
  if (abs >= 1e9) return `${fixed(n / 1e9)}B`;
  if (abs >= 1e6) return `${fixed(n / 1e6)}M`;
  if (abs >= 1e3) return `${fixed(n / 1e3)}K`;
  return fixed(n);
}

// --- Resolution ---

export function formatResolved(quote: NormalizedQuote, query: string): string {
  return `${GREEN}${BOLD}  ✓ Found ${query.toUpperCase()} on ${quote.exchange}${RESET} ${DIM}(${quote.symbol})${RESET}`;
}

export function formatResolutionFailure(error: ResolutionFailure): string {
  return [
    "",
    `${RED}${BOLD}  ✗ Could not fetch data for ${error.query}${RESET}`,
    `  ${DIM}Tried NSE, BSE and international listings. Check the ticker and try again.${RESET}`,
    "",
  ].join("\n");
}

// --- Key metrics ---

export interface MetricCell {
  readonly label: string;
  readonly value: string;
}

export function metricCells(quote: NormalizedQuote): MetricCell[] {
  const known = (field: NumericField) => !quote.missing.includes(field);
  const show = (field: NumericField, render: (n: number) => string) =>
    known(field) ? render(quote[field]) : NOT_AVAILABLE;
  const money = (n: number) => `${fixed(n)} ${quote.currency}`;

  return [
    { label: "Current Price", value: show("currentPrice", money) },
    { label: "52W High", value: show("high52Week", money) },
    { label: "52W Low", value: show("low52Week", money) },
    { label: "P/E Ratio", value: show("peRatio", fixed) },
    { label: "Market Cap", value: show("marketCap", grouped) },
    { label: "Volume", value: show("volume", grouped) },
    { label: "P/B Ratio", value: show("pbRatio", fixed) },
    { label: "ROE", value: show("roe", fixed) },
    { label: "Debt/Equity", value: show("deRatio", fixed) },
    { label: "Dividend Yield", value: show("divYield", fixed) },
    { label: "Book Value", value: show("bookValue", fixed) },
    { label: "EPS (TTM)", value: show("epsTtm", fixed) },
  ];
}

const COLUMNS = 4;
const CELL_WIDTH = 24;

export function formatMetrics(quote: NormalizedQuote): string {
  const cells = metricCells(quote);
  const lines: string[] = [];
  for (let i = 0; i < cells.length; i += COLUMNS) {
    const row = cells.slice(i, i + COLUMNS);
    lines.push(
      "  " + row.map((c) => `${DIM}${c.label.padEnd(CELL_WIDTH)}${RESET}`).join(""),
    );
    lines.push(
      "  " + row.map((c) => `${BOLD}${c.value.padEnd(CELL_WIDTH)}${RESET}`).join(""),
    );
  }
  return lines.join("\n");
}

// --- Charts ---

/** Index into a series of `length` for column `col` of `columns`. */
function sampleIndex(col: number, columns: number, length: number): number {
  return columns <= 1 ? length - 1 : Math.round((col * (length - 1)) / (columns - 1));
}

/** Plot series onto a character grid; later series draw over earlier ones. */
export function plot(
  series: readonly (readonly (number | null)[])[],
  glyphs: readonly string[],
  height: number,
  width: number,
): string[] {
  const values = series.flat().filter((v): v is number => v !== null);
  if (values.length === 0) return [];
  const min = Math.min(...values);
  const max = Math.max(...values);
  const length = Math.max(...series.map((s) => s.length));
  const columns = Math.min(width, length);
  const grid = Array.from({ length: height }, () => Array<string>(columns).fill(" "));

  series.forEach((s, k) => {
    for (let col = 0; col < columns; col++) {
      const v = s[sampleIndex(col, columns, s.length)];
      if (v === null || v === undefined) continue;
      const level = max === min ? 0.5 : (v - min) / (max - min);
      grid[height - 1 - Math.round(level * (height - 1))][col] = glyphs[k];
    }
  });

  const axis = [fixed(max), fixed(min)];
  const pad = Math.max(...axis.map((a) => a.length));
  return grid.map((row, r) => {
    const label = r === 0 ? axis[0] : r === height - 1 ? axis[1] : "";
    return `  ${label.padStart(pad)} │${row.join("")}`;
  });
}

const CHART_HEIGHT = 12;
const CHART_WIDTH = 72;

function lastDefined(values: readonly (number | null)[]): number | null {
  for (let i = values.length - 1; i >= 0; i--) {
    const v = values[i];
    if (v !== null) return v;
  }
  return null;
}

export function formatPriceChart(chart: PriceChart): string {
  const closes = chart.candles.map((c) => c.close);
  const first = chart.candles[0];
  const last = chart.candles[chart.candles.length - 1];
  const overlayGlyphs = [`${YELLOW}·${RESET}`, `${CYAN}·${RESET}`];

  const legend = chart.overlays.map((o, i) => {
    const v = lastDefined(o.values);
    return `${overlayGlyphs[i] ?? "·"} ${o.name}: ${v === null ? NOT_AVAILABLE : fixed(v)}`;
  });

  return [
    `  ${BOLD}${chart.title}${RESET}`,
    ...plot(
      [...chart.overlays.map((o) => o.values), closes],
      [...overlayGlyphs.slice(0, chart.overlays.length), `${GREEN}●${RESET}`],
      CHART_HEIGHT,
      CHART_WIDTH,
    ),
    `  ${DIM}${first.date} → ${last.date} (${chart.candles.length} sessions)${RESET}`,
    `  ${GREEN}●${RESET} Close: ${fixed(last.close)}   ${legend.join("   ")}`,
  ].join("\n");
}

export function formatFinancials(chart: FinancialsChart): string {
  const header = ["Year", ...chart.series.map((s) => s.name)];
  const rows = chart.years.map((year, i) => [
    String(year),
    ...chart.series.map((s) => {
      const v = s.values[i];
      return v === null || v === undefined ? NOT_AVAILABLE : compact(v);
    }),
  ]);
  const line = (cells: readonly string[]) =>
    "  " + cells.map((c) => c.padStart(12)).join("");

  return [
    `  ${BOLD}${chart.title}${RESET}`,
    `${DIM}${line(header)}${RESET}`,
    ...rows.map(line),
  ].join("\n");
}

// --- Report ---

function heading(title: string): string {
  return `\n${BOLD}${CYAN}── ${title} ${RESET}`;
}

export function formatSection<A>(
  section: Section<A>,
  render: (value: A) => string,
  skippedHint: string,
): string {
  switch (section._tag) {
    case "Available":
      return render(section.value);
    case "Unavailable":
      return `${YELLOW}  ⚠ ${section.reason}${RESET}`;
    case "Skipped":
      return `  ${DIM}${skippedHint}${RESET}`;
  }
}

export function formatReport(report: Report): string {
  const indent = (text: string) =>
    text.split("\n").map((l) => `  ${l}`).join("\n");

  return [
    "",
    formatResolved(report.quote, report.query),
    heading("Key Metrics"),
    formatMetrics(report.quote),
    heading(`Stock Price Chart (${report.range})`),
    formatSection(report.priceChart, formatPriceChart, ""),
    heading("Financial Performance"),
    formatSection(report.financials, formatFinancials, ""),
    heading("AI-Powered Investment Analysis"),
    formatSection(
      report.insights,
      indent,
      "Skipped. Run without --no-insights to request an analysis.",
    ),
    "",
  ].join("\n");
}
