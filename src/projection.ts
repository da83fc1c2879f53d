// Projection rows — pure, all values in USD until the display pass.

import type {
  ExchangeRateTable,
  PricePosition,
  ProjectionRow,
  ProjectionTable,
} from "./domain.ts";
import { normalizeCurrency, toDisplayCurrency } from "./currency.ts";
import {
  generatePriceIntervals,
  type IntervalOptions,
  roundCents,
} from "./intervals.ts";

export const SUPPLY_UNIT = 1_000_000_000;

export function classifyPosition(usdPrice: number, anchor: number): PricePosition {
  if (usdPrice < anchor) return "below";
  return usdPrice === anchor ? "at" : "above";
}

export interface RowInputs {
  readonly holdings: number;
  readonly circulatingSupplyBillions: number;
  readonly anchor: number;
}

export function buildProjectionRow(
  usdPrice: number,
  { holdings, circulatingSupplyBillions, anchor }: RowInputs,
): ProjectionRow {
  return {
    usdPrice,
    displayPrice: usdPrice,
    portfolioValue: holdings * usdPrice,
    marketCap: circulatingSupplyBillions * SUPPLY_UNIT * usdPrice,
    position: classifyPosition(usdPrice, anchor),
  };
}

export function buildProjectionRows(
  intervals: ReadonlyArray<number>,
  inputs: RowInputs,
): ProjectionRow[] {
  return intervals.map((price) => buildProjectionRow(price, inputs));
}

/**
 * Full projection cycle: intervals → USD rows → display currency.
 * Inputs are expected to have passed validation already.
 */
export function generateProjection(
  holdings: number,
  currentPriceUsd: number,
  circulatingSupplyBillions: number,
  currencyCode: string,
  rates: ExchangeRateTable,
  options: IntervalOptions = {},
): ProjectionTable {
  const anchor = roundCents(currentPriceUsd);
  const intervals = generatePriceIntervals(currentPriceUsd, options);
  const usdRows = buildProjectionRows(intervals, {
    holdings,
    circulatingSupplyBillions,
    anchor,
  });
  const currency = normalizeCurrency(currencyCode);
  const { rows, symbol } = toDisplayCurrency(usdRows, currency, rates);

  return {
    rows,
    currency,
    symbol,
    anchorIndex: rows.findIndex((row) => row.position === "at"),
  };
}
