// Market data — service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { ExchangeRateTable, SpotData } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class CoinNotFound extends Data.TaggedError("CoinNotFound")<{
  readonly coinId: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export type MarketDataError =
  | NetworkError
  | HttpError
  | ParseError
  | CoinNotFound
  | ServiceError;

// --- Service ---

export class MarketData extends Context.Tag("MarketData")<
  MarketData,
  {
    readonly getSpotData: (
      coinId: string,
    ) => Effect.Effect<SpotData, MarketDataError>;
    readonly getExchangeRates: Effect.Effect<ExchangeRateTable, MarketDataError>;
  }
>() {}
