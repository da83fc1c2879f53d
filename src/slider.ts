// Price explorer — log-scale mapping between a 0..100 control and a price.

import type {
  ExchangeRateTable,
  ProjectionInputs,
  ProjectionRow,
  ProjectionTable,
  SliderState,
} from "./domain.ts";
import { convertRow, normalizeCurrency, BASE_CURRENCY, resolveRate } from "./currency.ts";
import { DEFAULT_CEILING, DEFAULT_FLOOR, roundCents } from "./intervals.ts";
import { buildProjectionRow } from "./projection.ts";

export const SLIDER_MIN = 0;
export const SLIDER_MAX = 100;

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

/** Rescales with the current price: the rounded price, never below a cent. */
export function sliderFloor(currentPriceUsd: number): number {
  return Math.max(roundCents(currentPriceUsd), DEFAULT_FLOOR);
}

export function sliderState(
  position: number,
  currentPriceUsd: number,
  ceiling: number = DEFAULT_CEILING,
): SliderState {
  return {
    position: clamp(position, SLIDER_MIN, SLIDER_MAX),
    priceFloor: sliderFloor(currentPriceUsd),
    priceCeiling: ceiling,
  };
}

export function priceAtSliderPosition(
  position: number,
  currentPriceUsd: number,
  ceiling: number = DEFAULT_CEILING,
): number {
  const floor = sliderFloor(currentPriceUsd);
  const t = clamp(position, SLIDER_MIN, SLIDER_MAX) / SLIDER_MAX;
  return floor * Math.pow(ceiling / floor, t);
}

export function sliderPositionForPrice(
  price: number,
  currentPriceUsd: number,
  ceiling: number = DEFAULT_CEILING,
): number {
  const floor = sliderFloor(currentPriceUsd);
  if (ceiling <= floor) return SLIDER_MIN;
  const clamped = clamp(price, floor, ceiling);
  const position = (SLIDER_MAX * Math.log(clamped / floor)) / Math.log(ceiling / floor);
  return clamp(position, SLIDER_MIN, SLIDER_MAX);
}

/** Index of the row closest in display price; earliest wins ties, -1 when empty. */
export function nearestRow(
  table: Pick<ProjectionTable, "rows">,
  targetDisplayPrice: number,
): number {
  let best = -1;
  let bestDistance = Infinity;
  table.rows.forEach((row, index) => {
    const distance = Math.abs(row.displayPrice - targetDisplayPrice);
    if (distance < bestDistance) {
      best = index;
      bestDistance = distance;
    }
  });
  return best;
}

// --- On-demand row ---

export interface SliderReading {
  readonly state: SliderState;
  readonly row: ProjectionRow;
}

export function readSlider(
  position: number,
  inputs: ProjectionInputs,
  rates: ExchangeRateTable,
  ceiling: number = DEFAULT_CEILING,
): SliderReading {
  const state = sliderState(position, inputs.currentPriceUsd, ceiling);
  const price = priceAtSliderPosition(state.position, inputs.currentPriceUsd, ceiling);
  const usdRow = buildProjectionRow(price, {
    holdings: inputs.holdings,
    circulatingSupplyBillions: inputs.circulatingSupplyBillions,
    anchor: roundCents(inputs.currentPriceUsd),
  });
  const rate = normalizeCurrency(inputs.currency) === BASE_CURRENCY
    ? 1
    : resolveRate(rates, inputs.currency);
  return { state, row: convertRow(usdRow, rate) };
}
