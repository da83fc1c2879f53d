// Price interval sampler — pure functions.
//
// Below the anchor: linear spacing, fine-grained downside.
// Above the anchor: geometric spacing, so 2x / 5x / 10x multiples get
// even coverage without an unbounded row count.

export const DEFAULT_FLOOR = 0.01;
export const DEFAULT_CEILING = 1000;
export const BELOW_COUNT = 9;
export const ABOVE_COUNT = 240;

const CENT = 0.01;

export interface IntervalOptions {
  readonly floor?: number;
  readonly ceiling?: number;
  readonly belowCount?: number;
  readonly aboveCount?: number;
}

// --- Helpers ---

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/** `num` evenly spaced points from `start` to `stop`, both included. */
export function linspace(start: number, stop: number, num: number): number[] {
  if (num <= 0) return [];
  if (num === 1) return [start];
  const step = (stop - start) / (num - 1);
  const points = Array.from({ length: num }, (_, i) => start + i * step);
  points[num - 1] = stop;
  return points;
}

/** `num` points from `start` to `stop` with a constant ratio. Both must be > 0. */
export function geomspace(start: number, stop: number, num: number): number[] {
  if (num <= 0) return [];
  if (num === 1) return [start];
  const ratio = stop / start;
  const points = Array.from(
    { length: num },
    (_, i) => start * Math.pow(ratio, i / (num - 1)),
  );
  points[0] = start;
  points[num - 1] = stop;
  return points;
}

// --- Generator ---

export function generatePriceIntervals(
  currentPrice: number,
  options: IntervalOptions = {},
): number[] {
  const floor = options.floor ?? DEFAULT_FLOOR;
  const ceiling = options.ceiling ?? DEFAULT_CEILING;
  const anchor = roundCents(currentPrice);

  const belowEnd = roundCents(anchor - CENT);
  const below = belowEnd < floor
    ? []
    : linspace(floor, belowEnd, options.belowCount ?? BELOW_COUNT);

  const aboveStart = roundCents(anchor + CENT);
  const above = aboveStart >= ceiling
    ? []
    : geomspace(aboveStart, ceiling, options.aboveCount ?? ABOVE_COUNT);

  const unique = new Set([...below, anchor, ...above].map(roundCents));
  return [...unique].sort((a, b) => a - b);
}
