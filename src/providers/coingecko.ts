// CoinGecko — spot data and fiat exchange rates.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Option, Redacted, Schema } from "effect";
import type { ExchangeRateTable, SpotData } from "../domain.ts";
import {
  CoinNotFound,
  HttpError,
  MarketData,
  NetworkError,
  ParseError,
} from "../market-data.ts";

const BITCOIN_ID = "bitcoin";

// --- /coins/markets schema ---

const CoinMarket = Schema.Struct({
  id: Schema.String,
  current_price: Schema.NullOr(Schema.Number),
  market_cap: Schema.NullOr(Schema.Number),
  circulating_supply: Schema.NullOr(Schema.Number),
});

const CoinMarketsResponse = Schema.Array(CoinMarket);

type CoinMarketType = typeof CoinMarket.Type;

// --- /exchange_rates schema ---

const ExchangeRateEntry = Schema.Struct({
  name: Schema.String,
  unit: Schema.String,
  value: Schema.Number,
  type: Schema.String,
});

const ExchangeRatesResponse = Schema.Struct({
  rates: Schema.Record({ key: Schema.String, value: ExchangeRateEntry }),
});

type ExchangeRatesResponseType = typeof ExchangeRatesResponse.Type;

// --- Decoding ---

export function decodeMarketsResponse(
  json: unknown,
  coinId: string,
): Effect.Effect<SpotData, ParseError | CoinNotFound> {
  return Schema.decodeUnknown(CoinMarketsResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({ message: `Invalid response: ${schemaError.message}` }),
    ),
    Effect.flatMap((markets) => interpretMarkets(markets, coinId)),
  );
}

function interpretMarkets(
  markets: ReadonlyArray<CoinMarketType>,
  coinId: string,
): Effect.Effect<SpotData, ParseError | CoinNotFound> {
  const coin = markets.find((m) => m.id === coinId);
  if (coin === undefined) {
    return Effect.fail(new CoinNotFound({ coinId }));
  }
  if (coin.current_price === null) {
    return Effect.fail(new ParseError({ message: `Missing price for '${coinId}'` }));
  }
  if (coin.circulating_supply === null) {
    return Effect.fail(
      new ParseError({ message: `Missing circulating supply for '${coinId}'` }),
    );
  }

  const bitcoin = markets.find((m) => m.id === BITCOIN_ID);

  return Effect.succeed({
    price: coin.current_price,
    circulatingSupply: coin.circulating_supply,
    btcMarketCap: bitcoin?.market_cap ?? 0,
  });
}

export function decodeExchangeRates(
  json: unknown,
): Effect.Effect<ExchangeRateTable, ParseError> {
  return Schema.decodeUnknown(ExchangeRatesResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({ message: `Invalid response: ${schemaError.message}` }),
    ),
    Effect.flatMap(rebaseOnUsd),
  );
}

// CoinGecko quotes every currency per 1 BTC; divide by the USD entry.
function rebaseOnUsd(
  response: ExchangeRatesResponseType,
): Effect.Effect<ExchangeRateTable, ParseError> {
  const usd = response.rates["usd"];
  if (usd === undefined || usd.value <= 0) {
    return Effect.fail(new ParseError({ message: "Missing USD reference rate" }));
  }

  const rates: Record<string, number> = {};
  const symbols: Record<string, string> = {};
  for (const [code, entry] of Object.entries(response.rates)) {
    if (entry.type !== "fiat" || entry.value <= 0) continue;
    const key = code.toUpperCase();
    rates[key] = entry.value / usd.value;
    symbols[key] = entry.unit;
  }
  rates["USD"] = 1;

  return Effect.succeed({ rates, symbols });
}

// --- Service implementation ---

export const makeCoinGeckoApi = Effect.gen(function* () {
  const apiKey = yield* Config.option(Config.redacted("COINGECKO_API_KEY"));
  const baseUrl = yield* Config.string("COINGECKO_BASE_URL").pipe(
    Config.withDefault("https://api.coingecko.com/api/v3"),
  );
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(HttpClientRequest.acceptJson),
    HttpClient.mapRequest((request) =>
      Option.match(apiKey, {
        onNone: () => request,
        onSome: (key) =>
          HttpClientRequest.setHeader(request, "x-cg-demo-api-key", Redacted.value(key)),
      })
    ),
  );

  const getJson = (url: string) =>
    Effect.gen(function* () {
      const response = yield* client.get(url);
      return yield* response.json;
    }).pipe(
      Effect.scoped,
      Effect.catchTags({
        RequestError: (e) =>
          Effect.fail(new NetworkError({ message: e.message })),
        ResponseError: (e) =>
          e.reason === "StatusCode"
            ? Effect.fail(new HttpError({ status: e.response.status }))
            : Effect.fail(
                new ParseError({ message: `JSON parse failed: ${e.message}` }),
              ),
      }),
    );

  return MarketData.of({
    getSpotData: (coinId: string) => {
      const ids = [coinId, BITCOIN_ID].map(encodeURIComponent).join(",");
      return getJson(`${baseUrl}/coins/markets?vs_currency=usd&ids=${ids}`).pipe(
        Effect.flatMap((json) => decodeMarketsResponse(json, coinId)),
      );
    },
    getExchangeRates: getJson(`${baseUrl}/exchange_rates`).pipe(
      Effect.flatMap(decodeExchangeRates),
    ),
  });
});
