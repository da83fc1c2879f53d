// Pure formatting functions — no I/O.

import type {
  PortfolioMetrics,
  PricePosition,
  ProjectionRow,
  ProjectionTable,
} from "./domain.ts";
import type { HttpError, MarketDataError } from "./market-data.ts";
import type { SliderReading } from "./slider.ts";
import type { InvalidInput } from "./validate.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

const POSITION_STYLE: Record<PricePosition, string> = {
  below: RED,
  at: BOLD,
  above: GREEN,
};

// --- Numbers ---

export function formatMoney(symbol: string, value: number, digits = 2): string {
  return `${symbol}${
    value.toLocaleString("en-US", {
      minimumFractionDigits: digits,
      maximumFractionDigits: digits,
    })
  }`;
}

export function formatTitle(name: string | undefined): string {
  const trimmed = name?.trim() ?? "";
  return trimmed.length === 0
    ? "Unnamed Portfolio Projection"
    : `${trimmed[0].toUpperCase()}${trimmed.slice(1)} Portfolio Projection`;
}

// --- Metrics ---

export interface MetricsLabels {
  readonly title?: string;
  readonly unit: string;
}

export function formatMetrics(
  metrics: PortfolioMetrics,
  labels: MetricsLabels,
): string {
  const money = (value: number) => formatMoney(metrics.symbol, value);
  const target = formatMoney("$", metrics.targetValue, 0);

  const rows: Array<[string, string]> = [
    ["Holdings", `${formatMoney("", metrics.holdings)} ${labels.unit}`],
    ["Portfolio value", money(metrics.portfolioValue)],
    ["Market cap", money(metrics.marketCap)],
    [`Price needed for ${target}`, money(metrics.priceNeeded)],
    [`Market cap needed for ${target}`, money(metrics.marketCapNeeded)],
  ];

  const comparison = metrics.bitcoin === undefined
    ? `${DIM}  Bitcoin market cap data unavailable.${RESET}`
    : `  Market cap needed is about ${BOLD}${metrics.bitcoin.ratio.toFixed(6)}${RESET} times the current Bitcoin market cap of ${money(metrics.bitcoin.marketCap)}.`;

  return [
    "",
    `${BOLD}  ${formatTitle(labels.title)}${RESET} ${DIM}(${metrics.currency})${RESET}`,
    ...rows.map(([label, value]) => `  ${label.padEnd(34)}${value}`),
    comparison,
    "",
  ].join("\n");
}

// --- Projection table ---

const PRICE_WIDTH = 16;
const VALUE_WIDTH = 24;
const CAP_WIDTH = 28;

function formatCells(price: string, value: string, cap: string): string {
  return `  ${price.padStart(PRICE_WIDTH)}  ${value.padStart(VALUE_WIDTH)}  ${cap.padStart(CAP_WIDTH)}`;
}

export function formatRow(row: ProjectionRow, symbol: string): string {
  const cells = formatCells(
    formatMoney(symbol, row.displayPrice),
    formatMoney(symbol, row.portfolioValue),
    formatMoney(symbol, row.marketCap),
  );
  const marker = row.position === "at" ? "  ◀ current" : "";
  return `${POSITION_STYLE[row.position]}${cells}${marker}${RESET}`;
}

export function formatProjectionTable(table: ProjectionTable): string {
  const c = table.currency;
  return [
    `${BOLD}${formatCells(`Price (${c})`, `Portfolio (${c})`, `Market Cap (${c})`)}${RESET}`,
    ...table.rows.map((row) => formatRow(row, table.symbol)),
    "",
  ].join("\n");
}

// --- Price explorer ---

export interface NearestMatch {
  readonly index: number;
  readonly row: ProjectionRow;
}

export function formatSliderReading(
  reading: SliderReading,
  symbol: string,
  nearest: NearestMatch | undefined,
): string {
  const { state, row } = reading;
  const lines = [
    "",
    `${BOLD}  Price explorer ${state.position.toFixed(2)} / 100${RESET} ${DIM}(${formatMoney("$", state.priceFloor)} – ${formatMoney("$", state.priceCeiling)} USD)${RESET}`,
    `  Price:        ${formatMoney(symbol, row.displayPrice)}`,
    `  Portfolio:    ${formatMoney(symbol, row.portfolioValue)}`,
    `  Market cap:   ${formatMoney(symbol, row.marketCap)}`,
  ];
  if (nearest !== undefined) {
    lines.push(
      `  ${DIM}Nearest table row #${nearest.index + 1}:${RESET}`,
      formatRow(nearest.row, symbol),
    );
  }
  lines.push("");
  return lines.join("\n");
}

// --- Error formatting ---

export function formatError(error: MarketDataError | InvalidInput): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: MarketDataError | InvalidInput): ClassifiedError {
  switch (error._tag) {
    case "InvalidInput":
      return {
        title: "Invalid input",
        hint: `${error.field}: ${error.message}`,
      };
    case "NetworkError":
      return {
        title: "Network error",
        hint: "Could not reach the API. Check your internet connection, or pass --price and --supply.",
      };
    case "HttpError":
      return classifyHttpError(error);
    case "CoinNotFound":
      return {
        title: "Coin not found",
        hint: `No market data for '${error.coinId}'. Use a CoinGecko coin id (e.g. kaspa, bitcoin).`,
      };
    case "ServiceError":
      return {
        title: "Service unavailable",
        hint: error.message,
      };
    case "ParseError":
      return {
        title: "Unexpected response",
        hint: "The API returned data in an unexpected format.",
      };
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests, wait a moment and try again.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "CoinGecko is having issues. Try again in a few minutes.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status}`,
  };
}
