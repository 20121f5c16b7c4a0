// Pure domain types. No framework dependency, no I/O.

// --- Exchanges ---

export type ExchangeLabel = "NSE" | "BSE" | "INTL";

export interface ExchangeCandidate {
  readonly suffix: string;
  readonly exchange: ExchangeLabel;
}

/** Lookup priority: domestic primary, domestic secondary, then unsuffixed. */
export const EXCHANGE_CANDIDATES: readonly ExchangeCandidate[] = [
  { suffix: ".NS", exchange: "NSE" },
  { suffix: ".BO", exchange: "BSE" },
  { suffix: "", exchange: "INTL" },
];

// --- Provider payload ---

/** Untyped provider info-mapping; any key may be absent. */
export type InfoMapping = Readonly<Record<string, unknown>>;

// --- Normalized quote ---

export type NumericField =
  | "currentPrice"
  | "high52Week"
  | "low52Week"
  | "peRatio"
  | "pbRatio"
  | "roe"
  | "deRatio"
  | "divYield"
  | "bookValue"
  | "epsTtm"
  | "marketCap"
  | "volume";

export type NormalizedQuote = {
  readonly symbol: string;
  readonly exchange: ExchangeLabel;
  readonly faceValue: string;
  readonly currency: string;
  /** Numeric fields absent upstream; their value is the 0 default. */
  readonly missing: readonly NumericField[];
} & { readonly [K in NumericField]: number };

export const NOT_AVAILABLE = "N/A";

// --- History & financials ---

export interface PriceBar {
  readonly date: string; // YYYY-MM-DD
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export interface FinancialYear {
  readonly year: number;
  readonly revenue?: number;
  readonly netIncome?: number;
  readonly equity?: number;
}

export type HistoryRange = "1mo" | "3mo" | "6mo" | "1y" | "2y" | "5y";

export const HISTORY_RANGES: readonly HistoryRange[] = [
  "1mo",
  "3mo",
  "6mo",
  "1y",
  "2y",
  "5y",
];
