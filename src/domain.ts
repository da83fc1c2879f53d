// Pure domain types — no framework dependency, no I/O.

/** Where a row sits relative to the rounded current price. Decided in USD. */
export type PricePosition = "below" | "at" | "above";

export interface ProjectionRow {
  readonly usdPrice: number;
  readonly displayPrice: number;
  readonly portfolioValue: number;
  readonly marketCap: number;
  readonly position: PricePosition;
}

export interface ProjectionTable {
  readonly rows: ReadonlyArray<ProjectionRow>;
  readonly currency: string;
  readonly symbol: string;
  readonly anchorIndex: number;
}

/** Multiplicative rates relative to USD, plus display symbols. */
export interface ExchangeRateTable {
  readonly rates: Readonly<Record<string, number>>;
  readonly symbols: Readonly<Record<string, string>>;
}

export interface SpotData {
  readonly price: number; // USD
  readonly circulatingSupply: number; // coin units
  readonly btcMarketCap: number; // USD, 0 when unknown
}

export interface SliderState {
  readonly position: number; // 0..100
  readonly priceFloor: number;
  readonly priceCeiling: number;
}

export interface ProjectionInputs {
  readonly holdings: number;
  readonly currentPriceUsd: number;
  readonly circulatingSupplyBillions: number;
  readonly currency: string;
}

export interface PortfolioMetrics {
  readonly currency: string;
  readonly symbol: string;
  readonly holdings: number;
  readonly portfolioValue: number;
  readonly marketCap: number;
  readonly targetValue: number; // USD
  readonly priceNeeded: number;
  readonly marketCapNeeded: number;
  readonly bitcoin?: {
    readonly marketCap: number;
    readonly ratio: number;
  };
}
