// Validation boundary — everything the engine assumes is checked here.

import { Data, Effect } from "effect";
import type { ProjectionInputs } from "./domain.ts";
import { normalizeCurrency } from "./currency.ts";

export class InvalidInput extends Data.TaggedError("InvalidInput")<{
  readonly field: string;
  readonly message: string;
}> {}

/** Parse a user-entered number, allowing thousands separators ("1,367.5"). */
export function parseAmount(
  field: string,
  raw: string,
): Effect.Effect<number, InvalidInput> {
  const cleaned = raw.replace(/,/g, "").trim();
  const value = cleaned.length === 0 ? NaN : Number(cleaned);
  return Number.isFinite(value)
    ? Effect.succeed(value)
    : Effect.fail(new InvalidInput({ field, message: `"${raw}" is not a number` }));
}

export function validateCeiling(
  ceiling: number,
): Effect.Effect<number, InvalidInput> {
  return Number.isFinite(ceiling) && ceiling > 0
    ? Effect.succeed(ceiling)
    : Effect.fail(
        new InvalidInput({ field: "ceiling", message: "Ceiling must be greater than 0" }),
      );
}

export interface RawInputs {
  readonly holdings: number;
  readonly currentPriceUsd: number;
  readonly circulatingSupplyBillions: number;
  readonly currency: string;
}

export function validateInputs(
  raw: RawInputs,
): Effect.Effect<ProjectionInputs, InvalidInput> {
  if (!(raw.holdings > 0)) {
    return Effect.fail(
      new InvalidInput({ field: "holdings", message: "Holdings must be greater than 0" }),
    );
  }
  if (!(raw.currentPriceUsd > 0)) {
    return Effect.fail(
      new InvalidInput({ field: "price", message: "Current price must be greater than 0" }),
    );
  }
  if (!(raw.circulatingSupplyBillions >= 0)) {
    return Effect.fail(
      new InvalidInput({ field: "supply", message: "Circulating supply cannot be negative" }),
    );
  }
  return Effect.succeed({
    holdings: raw.holdings,
    currentPriceUsd: raw.currentPriceUsd,
    circulatingSupplyBillions: raw.circulatingSupplyBillions,
    currency: normalizeCurrency(raw.currency),
  });
}
