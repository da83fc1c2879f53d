// Built-in exchange-rate snapshot, served when the live feed is unavailable.

import { Effect } from "effect";
import type { ExchangeRateTable } from "../domain.ts";
import { KNOWN_SYMBOLS } from "../currency.ts";

export const STATIC_RATES: ExchangeRateTable = {
  rates: {
    USD: 1.0,
    EUR: 0.92,
    GBP: 0.79,
    JPY: 149.5,
    AUD: 1.55,
  },
  symbols: KNOWN_SYMBOLS,
};

export const getStaticRates: Effect.Effect<ExchangeRateTable> = Effect.succeed(
  STATIC_RATES,
);
