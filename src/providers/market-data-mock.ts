// MarketDataTest — in-process implementation of MarketData for testing and development.

import { Effect, Layer } from "effect";
import type { SpotData } from "../domain.ts";
import { CoinNotFound, MarketData } from "../market-data.ts";
import { STATIC_RATES } from "./static-rates.ts";

// --- Sample data ---

const BTC_MARKET_CAP = 1_900_000_000_000;

const spot: Record<string, SpotData> = {
  kaspa: {
    price: 0.12,
    circulatingSupply: 25_600_000_000,
    btcMarketCap: BTC_MARKET_CAP,
  },
  dogecoin: {
    price: 0.18,
    circulatingSupply: 146_000_000_000,
    btcMarketCap: BTC_MARKET_CAP,
  },
  bitcoin: {
    price: 95_000,
    circulatingSupply: 20_000_000,
    btcMarketCap: BTC_MARKET_CAP,
  },
};

// --- Mock layer ---

export const MarketDataTestLive = Layer.succeed(
  MarketData,
  MarketData.of({
    getSpotData: (coinId: string) => {
      const data = spot[coinId.toLowerCase()];
      return data !== undefined
        ? Effect.succeed(data)
        : Effect.fail(new CoinNotFound({ coinId }));
    },
    getExchangeRates: Effect.succeed(STATIC_RATES),
  }),
);
