// Fallback MarketData — live CoinGecko data, with the built-in rate
// snapshot behind it when the rate feed is unhealthy.

import { Console, Effect, Layer } from "effect";
import type { ExchangeRateTable } from "./domain.ts";
import {
  MarketData,
  type MarketDataError,
  NetworkError,
  ServiceError,
} from "./market-data.ts";
import { makeCoinGeckoApi } from "./providers/coingecko.ts";
import { getStaticRates } from "./providers/static-rates.ts";

// --- Types ---

export interface NamedProvider<A> {
  readonly name: string;
  readonly fetch: Effect.Effect<A, MarketDataError>;
}

// --- Trippable error predicate ---

/** Errors that indicate the provider is unhealthy. CoinNotFound is NOT
 *  trippable — it's a valid answer that should propagate immediately.
 *  429 counts: CoinGecko's public tier rate-limits aggressively. */
export function isTrippable(e: MarketDataError): boolean {
  switch (e._tag) {
    case "NetworkError":
    case "ParseError":
    case "ServiceError":
      return true;
    case "HttpError":
      return e.status >= 500 || e.status === 429;
    case "CoinNotFound":
      return false;
  }
}

// --- Timeout boundary ---

const PROVIDER_TIMEOUT = "5 seconds";

export function withTimeout<A>(provider: NamedProvider<A>): NamedProvider<A> {
  return {
    name: provider.name,
    fetch: provider.fetch.pipe(
      Effect.timeoutFail({
        duration: PROVIDER_TIMEOUT,
        onTimeout: () =>
          new NetworkError({ message: `${provider.name}: request timed out` }),
      }),
    ),
  };
}

// --- Fallback logic ---

export function tryProviders<A>(
  providers: ReadonlyArray<NamedProvider<A>>,
): Effect.Effect<A, MarketDataError> {
  const loop = (
    index: number,
    lastError: MarketDataError,
  ): Effect.Effect<A, MarketDataError> => {
    if (index >= providers.length) return Effect.fail(lastError);

    const { name, fetch } = providers[index];

    return Console.debug(`[fallback] trying ${name}...`).pipe(
      Effect.flatMap(() => fetch),
      Effect.tapError((e) =>
        Console.debug(`[fallback] ${name} failed: ${e._tag}`),
      ),
      Effect.catchIf(isTrippable, (e) => loop(index + 1, e)),
    );
  };

  return loop(0, new ServiceError({ message: "No providers configured" }));
}

// --- Layer ---

export const FallbackMarketDataLive = Layer.effect(
  MarketData,
  Effect.gen(function* () {
    const coingecko = yield* makeCoinGeckoApi;

    const rateProviders: ReadonlyArray<NamedProvider<ExchangeRateTable>> = [
      withTimeout({ name: "coingecko", fetch: coingecko.getExchangeRates }),
      { name: "snapshot", fetch: getStaticRates },
    ];

    yield* Console.debug(
      `[fallback] rate providers: ${rateProviders.map((p) => p.name).join(", ")}`,
    );

    return MarketData.of({
      getSpotData: (coinId: string) =>
        tryProviders([
          withTimeout({ name: "coingecko", fetch: coingecko.getSpotData(coinId) }),
        ]),
      getExchangeRates: tryProviders(rateProviders),
    });
  }),
);
