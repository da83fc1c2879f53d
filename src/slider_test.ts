import { expect, test } from "vitest";
import type { ExchangeRateTable, ProjectionInputs, ProjectionRow } from "./domain.ts";
import {
  nearestRow,
  priceAtSliderPosition,
  readSlider,
  sliderFloor,
  sliderPositionForPrice,
  sliderState,
} from "./slider.ts";

const rates: ExchangeRateTable = {
  rates: { USD: 1, JPY: 149.5 },
  symbols: { USD: "$", JPY: "¥" },
};

const inputs: ProjectionInputs = {
  holdings: 1000,
  currentPriceUsd: 0.25,
  circulatingSupplyBillions: 25,
  currency: "USD",
};

function row(displayPrice: number): ProjectionRow {
  return {
    usdPrice: displayPrice,
    displayPrice,
    portfolioValue: 0,
    marketCap: 0,
    position: "above",
  };
}

// --- sliderFloor / sliderState ---

test("sliderFloor: rounded current price, never below a cent", () => {
  expect(sliderFloor(0.2711)).toBe(0.27);
  expect(sliderFloor(0.001)).toBe(0.01);
});

test("sliderState: clamps the position", () => {
  expect(sliderState(150, 0.25)).toEqual({
    position: 100,
    priceFloor: 0.25,
    priceCeiling: 1000,
  });
  expect(sliderState(-5, 0.25, 50).position).toBe(0);
});

// --- priceAtSliderPosition ---

test("priceAtSliderPosition: ends of the scale are floor and ceiling", () => {
  expect(priceAtSliderPosition(0, 0.25, 1000)).toBe(0.25);
  expect(priceAtSliderPosition(100, 0.25, 1000)).toBeCloseTo(1000, 9);
});

test("priceAtSliderPosition: midpoint is the geometric mean", () => {
  expect(priceAtSliderPosition(50, 0.25, 1000)).toBeCloseTo(Math.sqrt(0.25 * 1000), 9);
});

test("priceAtSliderPosition: monotonic across the range", () => {
  const prices = [0, 10, 25, 50, 75, 90, 100].map((p) =>
    priceAtSliderPosition(p, 0.25)
  );
  expect(prices.every((p, i) => i === 0 || prices[i - 1] < p)).toBe(true);
});

test("priceAtSliderPosition: floor rescales with the current price", () => {
  expect(priceAtSliderPosition(0, 0.001)).toBe(0.01);
  expect(priceAtSliderPosition(0, 3.456)).toBe(3.46);
});

// --- sliderPositionForPrice ---

test("sliderPositionForPrice: clamps prices outside the range", () => {
  expect(sliderPositionForPrice(5000, 0.25, 1000)).toBeCloseTo(100, 9);
  expect(sliderPositionForPrice(0.001, 0.25, 1000)).toBe(0);
});

test("sliderPositionForPrice: round-trips priceAtSliderPosition", () => {
  for (const position of [0, 1, 12.5, 33, 50, 87.5, 99, 100]) {
    const price = priceAtSliderPosition(position, 0.25, 1000);
    expect(sliderPositionForPrice(price, 0.25, 1000)).toBeCloseTo(position, 9);
  }
});

test("sliderPositionForPrice: degenerate range maps to 0", () => {
  expect(sliderPositionForPrice(1200, 1500, 1000)).toBe(0);
});

// --- nearestRow ---

test("nearestRow: closest display price", () => {
  const table = { rows: [row(1), row(2), row(4)] };
  expect(nearestRow(table, 3.9)).toBe(2);
  expect(nearestRow(table, 10)).toBe(2);
  expect(nearestRow(table, 0)).toBe(0);
});

test("nearestRow: ties resolve to the earliest row", () => {
  const table = { rows: [row(1), row(2), row(4)] };
  expect(nearestRow(table, 3)).toBe(1);
});

test("nearestRow: empty table", () => {
  expect(nearestRow({ rows: [] }, 3)).toBe(-1);
});

// --- readSlider ---

test("readSlider: position 0 reads the anchor row", () => {
  const reading = readSlider(0, inputs, rates);

  expect(reading.state.priceFloor).toBe(0.25);
  expect(reading.row).toEqual({
    usdPrice: 0.25,
    displayPrice: 0.25,
    portfolioValue: 250,
    marketCap: 6_250_000_000,
    position: "at",
  });
});

test("readSlider: converts to the display currency", () => {
  const reading = readSlider(100, { ...inputs, currency: "JPY" }, rates);

  expect(reading.row.position).toBe("above");
  expect(reading.row.displayPrice).toBe(149500);
  expect(reading.row.portfolioValue).toBeCloseTo(149_500_000, 3);
});
