// Portfolio metrics — current position and what a target valuation needs.

import type { ExchangeRateTable, PortfolioMetrics } from "./domain.ts";
import { normalizeCurrency, resolveRate, resolveSymbol } from "./currency.ts";
import { SUPPLY_UNIT } from "./projection.ts";

export const DEFAULT_TARGET_VALUE = 1_000_000;

export interface MetricsInputs {
  readonly holdings: number;
  readonly currentPriceUsd: number;
  readonly circulatingSupplyBillions: number;
  readonly btcMarketCapUsd: number;
  readonly currency: string;
  readonly rates: ExchangeRateTable;
  readonly targetValueUsd?: number;
}

/** Price needed per coin for the holdings to reach `target`; 0 with no holdings. */
export function priceNeededFor(target: number, holdings: number): number {
  return holdings > 0 ? target / holdings : 0;
}

export function computeMetrics(inputs: MetricsInputs): PortfolioMetrics {
  const currency = normalizeCurrency(inputs.currency);
  const rate = resolveRate(inputs.rates, currency);
  const supply = inputs.circulatingSupplyBillions * SUPPLY_UNIT;
  const targetValue = inputs.targetValueUsd ?? DEFAULT_TARGET_VALUE;

  const priceNeededUsd = priceNeededFor(targetValue, inputs.holdings);
  const marketCapNeededUsd = priceNeededUsd * supply;
  const btc = inputs.btcMarketCapUsd;

  return {
    currency,
    symbol: resolveSymbol(inputs.rates, currency),
    holdings: inputs.holdings,
    portfolioValue: inputs.holdings * inputs.currentPriceUsd * rate,
    marketCap: supply * inputs.currentPriceUsd * rate,
    targetValue,
    priceNeeded: priceNeededUsd * rate,
    marketCapNeeded: marketCapNeededUsd * rate,
    ...(btc > 0
      ? { bitcoin: { marketCap: btc * rate, ratio: marketCapNeededUsd / btc } }
      : {}),
  };
}
