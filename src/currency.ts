// Currency display adapter — converts USD rows into a display currency.
//
// Multiplying by a non-unit rate and rounding to cents can make distinct
// USD prices collide (JPY especially). Collisions are collapsed per
// section, and the anchor row always survives.

import type { ExchangeRateTable, ProjectionRow } from "./domain.ts";
import { roundCents } from "./intervals.ts";

export const BASE_CURRENCY = "USD";

const DEFAULT_SYMBOL = "$";

export const KNOWN_SYMBOLS: Readonly<Record<string, string>> = {
  USD: "$",
  EUR: "€",
  GBP: "£",
  JPY: "¥",
  AUD: "A$",
};

/** Rate table for a USD-only cycle, when no rates were fetched. */
export const USD_ONLY: ExchangeRateTable = {
  rates: { [BASE_CURRENCY]: 1 },
  symbols: { [BASE_CURRENCY]: DEFAULT_SYMBOL },
};

export function normalizeCurrency(code: string): string {
  const trimmed = code.trim().toUpperCase();
  return trimmed.length === 0 ? BASE_CURRENCY : trimmed;
}

/** Unknown codes, and rates that are not positive and finite, fall back to 1. */
export function resolveRate(table: ExchangeRateTable, currency: string): number {
  const rate = table.rates[normalizeCurrency(currency)];
  return rate !== undefined && Number.isFinite(rate) && rate > 0 ? rate : 1;
}

export function resolveSymbol(table: ExchangeRateTable, currency: string): string {
  const code = normalizeCurrency(currency);
  return table.symbols[code] ?? KNOWN_SYMBOLS[code] ?? DEFAULT_SYMBOL;
}

export function convertRow(row: ProjectionRow, rate: number): ProjectionRow {
  return {
    ...row,
    displayPrice: roundCents(row.usdPrice * rate),
    portfolioValue: row.portfolioValue * rate,
    marketCap: row.marketCap * rate,
  };
}

// --- Deduplication ---

function byDisplayThenUsd(a: ProjectionRow, b: ProjectionRow): number {
  return a.displayPrice - b.displayPrice || a.usdPrice - b.usdPrice;
}

/** Sort, then keep the first row per display price (smaller USD price wins). */
export function dedupeByDisplayPrice(
  rows: ReadonlyArray<ProjectionRow>,
): ProjectionRow[] {
  const seen = new Set<number>();
  return [...rows].sort(byDisplayThenUsd).filter((row) => {
    if (seen.has(row.displayPrice)) return false;
    seen.add(row.displayPrice);
    return true;
  });
}

// --- Adapter ---

export interface DisplayRows {
  readonly rows: ReadonlyArray<ProjectionRow>;
  readonly symbol: string;
}

export function toDisplayCurrency(
  rows: ReadonlyArray<ProjectionRow>,
  currency: string,
  table: ExchangeRateTable,
): DisplayRows {
  const symbol = resolveSymbol(table, currency);

  if (normalizeCurrency(currency) === BASE_CURRENCY) {
    return { rows, symbol };
  }

  const rate = resolveRate(table, currency);
  const converted = rows.map((row) => convertRow(row, rate));
  const anchor = converted.find((row) => row.position === "at");

  const below = dedupeByDisplayPrice(
    converted.filter((row) => row.position === "below"),
  );
  const above = dedupeByDisplayPrice(
    converted.filter((row) => row.position === "above"),
  );

  if (anchor === undefined) {
    return { rows: dedupeByDisplayPrice([...below, ...above]), symbol };
  }

  const lastBelow = below.at(-1);
  if (lastBelow !== undefined && lastBelow.displayPrice === anchor.displayPrice) {
    below.pop();
  }
  const firstAbove = above.at(0);
  if (firstAbove !== undefined && firstAbove.displayPrice === anchor.displayPrice) {
    above.shift();
  }

  return { rows: [...below, anchor, ...above], symbol };
}
