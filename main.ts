import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Config, Console, Effect, Layer, Option, Schedule } from "effect";
import { DEFAULT_CEILING } from "./src/intervals.ts";
import { generateProjection } from "./src/projection.ts";
import { computeMetrics } from "./src/metrics.ts";
import { nearestRow, readSlider, sliderPositionForPrice } from "./src/slider.ts";
import { loadSnapshot, type ProjectorRequest } from "./src/projector.ts";
import { type InvalidInput, validateCeiling } from "./src/validate.ts";
import { type MarketDataError, NetworkError } from "./src/market-data.ts";
import { FallbackMarketDataLive } from "./src/market-data-fallback.ts";
import { MarketDataTestLive } from "./src/providers/market-data-mock.ts";
import {
  formatError,
  formatMetrics,
  formatProjectionTable,
  formatSliderReading,
} from "./src/format.ts";

// --- Options ---

const holdings = Options.text("holdings").pipe(
  Options.withDescription("Coins held (thousands separators allowed, e.g. 1,367)"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter your holdings:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Holdings cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);

const price = Options.float("price").pipe(
  Options.withDescription("Current price in USD (fetched when omitted)"),
  Options.optional,
);

const supply = Options.float("supply").pipe(
  Options.withDescription("Circulating supply in billions (fetched when omitted)"),
  Options.optional,
);

const currency = Options.text("currency").pipe(
  Options.withDescription("Display currency code (e.g. USD, EUR, JPY)"),
  Options.withDefault("USD"),
);

const ceiling = Options.float("ceiling").pipe(
  Options.withDescription("Highest projected price in USD"),
  Options.withDefault(DEFAULT_CEILING),
);

const coin = Options.text("coin").pipe(
  Options.withDescription("CoinGecko coin id"),
  Options.withDefault("kaspa"),
);

const name = Options.text("name").pipe(
  Options.withDescription("Portfolio name used in the heading"),
  Options.optional,
);

const position = Options.float("position").pipe(
  Options.withDescription("Explorer position, 0 (current price) to 100 (ceiling)"),
  Options.withDefault(0),
);

const target = Options.float("target").pipe(
  Options.withDescription("Explore a specific USD price instead of a position"),
  Options.optional,
);

// --- Snapshot loading ---

interface MarketOptions {
  readonly holdings: string;
  readonly price: Option.Option<number>;
  readonly supply: Option.Option<number>;
  readonly currency: string;
  readonly coin: string;
}

const toRequest = (opts: MarketOptions): ProjectorRequest => ({
  holdings: opts.holdings,
  price: opts.price,
  supply: opts.supply,
  currency: opts.currency,
  coinId: opts.coin,
});

const load = (request: ProjectorRequest) =>
  loadSnapshot(request).pipe(
    Effect.timeoutFail({
      duration: "10 seconds",
      onTimeout: () => new NetworkError({ message: "Request timed out" }),
    }),
    Effect.retry({
      while: (e) => e._tag === "NetworkError",
      schedule: Schedule.exponential("1 second").pipe(
        Schedule.compose(Schedule.recurs(2)),
      ),
    }),
  );

// --- Commands ---

const table = Command.make(
  "table",
  { holdings, price, supply, currency, ceiling, coin, name },
).pipe(
  Command.withDescription("Print portfolio metrics and the projection table"),
  Command.withHandler((opts) =>
    Effect.gen(function* () {
      const bound = yield* validateCeiling(opts.ceiling);
      const { inputs, rates, btcMarketCapUsd } = yield* load(toRequest(opts));
      const projection = generateProjection(
        inputs.holdings,
        inputs.currentPriceUsd,
        inputs.circulatingSupplyBillions,
        inputs.currency,
        rates,
        { ceiling: bound },
      );
      const metrics = computeMetrics({ ...inputs, btcMarketCapUsd, rates });

      yield* Console.log(
        formatMetrics(metrics, {
          title: Option.getOrUndefined(opts.name),
          unit: opts.coin,
        }),
      );
      yield* Console.log(formatProjectionTable(projection));
    })
  ),
);

const explore = Command.make(
  "explore",
  { holdings, price, supply, currency, ceiling, coin, position, target },
).pipe(
  Command.withDescription("Read the price explorer and find the nearest table row"),
  Command.withHandler((opts) =>
    Effect.gen(function* () {
      const bound = yield* validateCeiling(opts.ceiling);
      const { inputs, rates } = yield* load(toRequest(opts));
      const slider = Option.match(opts.target, {
        onNone: () => opts.position,
        onSome: (usd) => sliderPositionForPrice(usd, inputs.currentPriceUsd, bound),
      });
      const reading = readSlider(slider, inputs, rates, bound);
      const projection = generateProjection(
        inputs.holdings,
        inputs.currentPriceUsd,
        inputs.circulatingSupplyBillions,
        inputs.currency,
        rates,
        { ceiling: bound },
      );
      const index = nearestRow(projection, reading.row.displayPrice);

      yield* Console.log(
        formatSliderReading(
          reading,
          projection.symbol,
          index >= 0 ? { index, row: projection.rows[index] } : undefined,
        ),
      );
    })
  ),
);

const command = Command.make("projector").pipe(
  Command.withSubcommands([table, explore]),
);

// --- Layers ---
// Set PROJECTOR_PROVIDER to "coingecko" (default) or "test".

const MarketDataLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("PROJECTOR_PROVIDER").pipe(
      Config.withDefault("coingecko"),
    );
    switch (provider) {
      case "test":
        return MarketDataTestLive;
      default:
        return FallbackMarketDataLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "projector",
  version: "0.1.0",
});

const logError = (e: MarketDataError | InvalidInput) => Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    NetworkError: logError,
    HttpError: logError,
    ParseError: logError,
    CoinNotFound: logError,
    ServiceError: logError,
    InvalidInput: logError,
  }),
  Effect.provide(MarketDataLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
