// Session loader — turns CLI input plus fetched market data into one
// immutable snapshot per cycle. The engine only ever sees the snapshot.

import { Effect, Option } from "effect";
import type { ExchangeRateTable, ProjectionInputs } from "./domain.ts";
import { BASE_CURRENCY, normalizeCurrency, USD_ONLY } from "./currency.ts";
import { MarketData, type MarketDataError } from "./market-data.ts";
import { SUPPLY_UNIT } from "./projection.ts";
import { type InvalidInput, parseAmount, validateInputs } from "./validate.ts";

export interface ProjectorRequest {
  readonly holdings: string;
  readonly price: Option.Option<number>;
  readonly supply: Option.Option<number>; // billions
  readonly currency: string;
  readonly coinId: string;
}

export interface Snapshot {
  readonly inputs: ProjectionInputs;
  readonly rates: ExchangeRateTable;
  readonly btcMarketCapUsd: number; // 0 when not fetched
}

export function loadSnapshot(
  request: ProjectorRequest,
): Effect.Effect<Snapshot, MarketDataError | InvalidInput, MarketData> {
  return Effect.gen(function* () {
    const api = yield* MarketData;
    const holdings = yield* parseAmount("holdings", request.holdings);
    const currency = normalizeCurrency(request.currency);

    // Spot data is only needed when the user left a market figure blank.
    const needsSpot = Option.isNone(request.price) || Option.isNone(request.supply);
    const spot = needsSpot
      ? Option.some(yield* api.getSpotData(request.coinId))
      : Option.none();

    const currentPriceUsd = Option.getOrElse(request.price, () =>
      Option.match(spot, { onNone: () => 0, onSome: (s) => s.price }),
    );
    const circulatingSupplyBillions = Option.getOrElse(request.supply, () =>
      Option.match(spot, {
        onNone: () => 0,
        onSome: (s) => s.circulatingSupply / SUPPLY_UNIT,
      }),
    );

    const inputs = yield* validateInputs({
      holdings,
      currentPriceUsd,
      circulatingSupplyBillions,
      currency,
    });

    const rates = currency === BASE_CURRENCY
      ? USD_ONLY
      : yield* api.getExchangeRates;

    return {
      inputs,
      rates,
      btcMarketCapUsd: Option.match(spot, {
        onNone: () => 0,
        onSome: (s) => s.btcMarketCap,
      }),
    };
  });
}
