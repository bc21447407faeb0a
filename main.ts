import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Config, Console, Effect, Layer } from "effect";
import { type PipelineError, runPipeline } from "./src/pipeline.ts";
import { ConsoleReporterLive } from "./src/reporter.ts";
import { CoinGeckoLive } from "./src/providers/coingecko.ts";
import { PriceSourceTestLive } from "./src/providers/price-source-mock.ts";
import { StaticHeadlinesLive } from "./src/providers/static-headlines.ts";
import { FileHeadlinesLive } from "./src/providers/file-headlines.ts";
import { LexiconScorerLive } from "./src/providers/lexicon-scorer.ts";
import { HuggingFaceLive } from "./src/providers/huggingface.ts";
import { SentimentScorerTestLive } from "./src/providers/sentiment-scorer-mock.ts";
import { formatError } from "./src/format.ts";

// --- CLI ---

const asset = Options.text("asset").pipe(
  Options.withDescription("CoinGecko coin id (e.g. cardano, bitcoin)"),
  Options.withDefault("cardano"),
);

const currency = Options.text("currency").pipe(
  Options.withDescription("Quote currency (e.g. usd, eur)"),
  Options.withDefault("usd"),
);

const command = Command.make("sentiment-advisor", { asset, currency }).pipe(
  Command.withHandler(({ asset, currency }) =>
    runPipeline({ asset, currency }).pipe(Effect.asVoid)
  ),
);

// --- Layers ---
// PRICE_PROVIDER: "coingecko" (default) or "test".
// HEADLINE_SOURCE: "static" (default) or "file" (reads HEADLINES_FILE).
// SENTIMENT_PROVIDER: "lexicon" (default), "huggingface" or "test".

const PriceSourceLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("PRICE_PROVIDER").pipe(
      Config.withDefault("coingecko"),
    );
    switch (provider) {
      case "test":
        return PriceSourceTestLive;
      default:
        return CoinGeckoLive;
    }
  }),
);

const HeadlineSourceLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const source = yield* Config.string("HEADLINE_SOURCE").pipe(
      Config.withDefault("static"),
    );
    switch (source) {
      case "file":
        return FileHeadlinesLive;
      default:
        return StaticHeadlinesLive;
    }
  }),
);

const SentimentScorerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("SENTIMENT_PROVIDER").pipe(
      Config.withDefault("lexicon"),
    );
    switch (provider) {
      case "huggingface":
        return HuggingFaceLive;
      case "test":
        return SentimentScorerTestLive;
      default:
        return LexiconScorerLive;
    }
  }),
);

const AdvisorLive = Layer.mergeAll(
  PriceSourceLive,
  HeadlineSourceLive,
  SentimentScorerLive,
  ConsoleReporterLive,
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "sentiment-advisor",
  version: "0.1.0",
});

const logPipelineError = (e: PipelineError) => Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    SourceUnavailable: logPipelineError,
    InvalidInput: logPipelineError,
  }),
  Effect.provide(AdvisorLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
