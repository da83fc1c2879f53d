import { expect, test } from "vitest";
import {
  formatError,
  formatMetrics,
  formatMoney,
  formatProjectionTable,
  formatRow,
  formatSliderReading,
  formatTitle,
} from "./format.ts";
import {
  CoinNotFound,
  HttpError,
  NetworkError,
  ParseError,
  ServiceError,
} from "./market-data.ts";
import { InvalidInput } from "./validate.ts";
import type { PortfolioMetrics, ProjectionRow, ProjectionTable } from "./domain.ts";

// --- Test data ---

const anchor: ProjectionRow = {
  usdPrice: 0.25,
  displayPrice: 0.25,
  portfolioValue: 250,
  marketCap: 6_250_000_000,
  position: "at",
};

const below: ProjectionRow = {
  usdPrice: 0.01,
  displayPrice: 0.01,
  portfolioValue: 10,
  marketCap: 250_000_000,
  position: "below",
};

const above: ProjectionRow = {
  usdPrice: 2.5,
  displayPrice: 2.5,
  portfolioValue: 2500,
  marketCap: 62_500_000_000,
  position: "above",
};

const table: ProjectionTable = {
  rows: [below, anchor, above],
  currency: "USD",
  symbol: "$",
  anchorIndex: 1,
};

const metrics: PortfolioMetrics = {
  currency: "USD",
  symbol: "$",
  holdings: 1000,
  portfolioValue: 250,
  marketCap: 6_250_000_000,
  targetValue: 1_000_000,
  priceNeeded: 1000,
  marketCapNeeded: 25_000_000_000_000,
  bitcoin: { marketCap: 2_000_000_000_000, ratio: 12.5 },
};

// --- formatMoney / formatTitle ---

test("formatMoney: symbol, grouping and fixed decimals", () => {
  expect(formatMoney("$", 6_250_000_000)).toBe("$6,250,000,000.00");
  expect(formatMoney("¥", 14.95)).toBe("¥14.95");
  expect(formatMoney("$", 1_000_000, 0)).toBe("$1,000,000");
});

test("formatTitle: capitalizes the name, falls back to Unnamed", () => {
  expect(formatTitle("my stack")).toBe("My stack Portfolio Projection");
  expect(formatTitle(undefined)).toBe("Unnamed Portfolio Projection");
  expect(formatTitle("   ")).toBe("Unnamed Portfolio Projection");
});

// --- formatRow / formatProjectionTable ---

test("formatRow: anchor row is bold and marked", () => {
  const output = formatRow(anchor, "$");
  expect(output.startsWith("\x1b[1m")).toBe(true);
  expect(output.includes("$6,250,000,000.00")).toBe(true);
  expect(output.includes("◀ current")).toBe(true);
});

test("formatRow: below rows are red, above rows green", () => {
  expect(formatRow(below, "$").startsWith("\x1b[31m")).toBe(true);
  expect(formatRow(above, "$").startsWith("\x1b[32m")).toBe(true);
  expect(formatRow(above, "$").includes("◀ current")).toBe(false);
});

test("formatProjectionTable: header names the currency, one line per row", () => {
  const lines = formatProjectionTable({ ...table, currency: "JPY", symbol: "¥" }).split("\n");

  expect(lines[0].includes("Price (JPY)")).toBe(true);
  expect(lines[0].includes("Market Cap (JPY)")).toBe(true);
  expect(lines[2].includes("¥0.25")).toBe(true);
  expect(lines).toHaveLength(5);
});

// --- formatMetrics ---

test("formatMetrics: values and Bitcoin comparison", () => {
  const output = formatMetrics(metrics, { title: "test", unit: "kaspa" });

  expect(output.includes("Test Portfolio Projection")).toBe(true);
  expect(output.includes("1,000.00 kaspa")).toBe(true);
  expect(output.includes("Price needed for $1,000,000")).toBe(true);
  expect(output.includes("$25,000,000,000,000.00")).toBe(true);
  expect(output.includes("12.500000")).toBe(true);
  expect(output.includes("$2,000,000,000,000.00")).toBe(true);
});

test("formatMetrics: missing Bitcoin data is called out", () => {
  const { bitcoin: _, ...withoutBitcoin } = metrics;
  const output = formatMetrics(withoutBitcoin, { unit: "kaspa" });

  expect(output.includes("Bitcoin market cap data unavailable.")).toBe(true);
  expect(output.includes("Unnamed Portfolio Projection")).toBe(true);
});

// --- formatSliderReading ---

test("formatSliderReading: position, range and nearest row", () => {
  const output = formatSliderReading(
    {
      state: { position: 50, priceFloor: 0.25, priceCeiling: 1000 },
      row: { ...above, usdPrice: 15.81, displayPrice: 15.81, position: "above" },
    },
    "$",
    { index: 2, row: above },
  );

  expect(output.includes("Price explorer 50.00 / 100")).toBe(true);
  expect(output.includes("$0.25 – $1,000.00 USD")).toBe(true);
  expect(output.includes("Price:        $15.81")).toBe(true);
  expect(output.includes("Nearest table row #3:")).toBe(true);
});

test("formatSliderReading: no nearest row", () => {
  const output = formatSliderReading(
    { state: { position: 0, priceFloor: 0.25, priceCeiling: 1000 }, row: anchor },
    "$",
    undefined,
  );
  expect(output.includes("Nearest table row")).toBe(false);
});

// --- formatError ---

test("formatError: NetworkError suggests offline figures", () => {
  const output = formatError(new NetworkError({ message: "Fetch failed" }));
  expect(output.includes("Network error")).toBe(true);
  expect(output.includes("--price and --supply")).toBe(true);
});

test("formatError: HttpError 429 shows rate limited", () => {
  expect(formatError(new HttpError({ status: 429 })).includes("Rate limited")).toBe(true);
});

test("formatError: HttpError 503 shows server error", () => {
  expect(formatError(new HttpError({ status: 503 })).includes("Server error")).toBe(true);
});

test("formatError: HttpError 401 shows the status", () => {
  expect(formatError(new HttpError({ status: 401 })).includes("HTTP 401")).toBe(true);
});

test("formatError: CoinNotFound names the coin", () => {
  const output = formatError(new CoinNotFound({ coinId: "nope" }));
  expect(output.includes("Coin not found")).toBe(true);
  expect(output.includes("'nope'")).toBe(true);
});

test("formatError: ServiceError shows its message", () => {
  expect(formatError(new ServiceError({ message: "b down" })).includes("b down")).toBe(true);
});

test("formatError: ParseError shows unexpected response", () => {
  const output = formatError(new ParseError({ message: "Invalid response" }));
  expect(output.includes("Unexpected response")).toBe(true);
});

test("formatError: InvalidInput names the field", () => {
  const output = formatError(
    new InvalidInput({ field: "holdings", message: "Holdings must be greater than 0" }),
  );
  expect(output.includes("Invalid input")).toBe(true);
  expect(output.includes("holdings: Holdings must be greater than 0")).toBe(true);
});
