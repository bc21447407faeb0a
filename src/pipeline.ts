// Pipeline: one run from price quote to recommendation.

import { Data, Effect } from "effect";
import {
  aggregateSentiment,
  decide,
  type InvalidInput,
  toHeadlineScore,
} from "./decision.ts";
import type { Recommendation } from "./domain.ts";
import { Reporter } from "./reporter.ts";
import {
  HeadlineSource,
  type HeadlineSourceError,
  NetworkError,
  PriceSource,
  type PriceSourceError,
  SentimentScorer,
  type SentimentScorerError,
} from "./sources.ts";

// --- Errors ---

export class EmptyFeed extends Data.TaggedError("EmptyFeed")<{
  readonly message: string;
}> {}

export type SourceName = "price" | "headlines" | "sentiment";

export type SourceFailure =
  | PriceSourceError
  | HeadlineSourceError
  | SentimentScorerError
  | EmptyFeed;

/** A collaborator failed; the run stops and no recommendation is produced. */
export class SourceUnavailable extends Data.TaggedError("SourceUnavailable")<{
  readonly source: SourceName;
  readonly reason: SourceFailure;
}> {}

export type PipelineError = SourceUnavailable | InvalidInput;

// --- Run ---

export const PRICE_TIMEOUT = "10 seconds";

export interface PipelineRequest {
  readonly asset: string;
  readonly currency: string;
}

const unavailable =
  (source: SourceName) =>
  (reason: SourceFailure): SourceUnavailable =>
    new SourceUnavailable({ source, reason });

/**
 * Price, then headlines, then one scoring call per headline in feed order,
 * then aggregation and the decision. Each step reports before the next one
 * starts; any failure ends the run.
 */
export function runPipeline({
  asset,
  currency,
}: PipelineRequest): Effect.Effect<
  Recommendation,
  PipelineError,
  PriceSource | HeadlineSource | SentimentScorer | Reporter
> {
  return Effect.gen(function* () {
    const prices = yield* PriceSource;
    const feed = yield* HeadlineSource;
    const scorer = yield* SentimentScorer;
    const reporter = yield* Reporter;

    yield* reporter.stage(`Fetching ${asset.toUpperCase()} price`);
    const quote = yield* prices.getPrice(asset, currency).pipe(
      Effect.timeoutFail({
        duration: PRICE_TIMEOUT,
        onTimeout: () =>
          new NetworkError({ message: "Price request timed out" }),
      }),
      Effect.mapError(unavailable("price")),
    );
    yield* reporter.price(quote);

    yield* reporter.stage("Fetching news headlines");
    const headlines = yield* feed.getHeadlines.pipe(
      Effect.mapError(unavailable("headlines")),
    );
    if (headlines.length === 0) {
      return yield* Effect.fail(
        unavailable("headlines")(
          new EmptyFeed({ message: "Headline source returned no headlines" }),
        ),
      );
    }
    yield* reporter.headlines(headlines);

    yield* reporter.stage("Analyzing sentiment");
    const labels = yield* Effect.forEach(headlines, (headline) =>
      scorer.score(headline),
    ).pipe(Effect.mapError(unavailable("sentiment")));
    const averageSentiment = yield* aggregateSentiment(labels);
    const scores = labels.map(toHeadlineScore);
    yield* reporter.sentiment(averageSentiment, scores);

    yield* reporter.stage("Making decision");
    const decision = decide(averageSentiment, quote.price);
    yield* reporter.decision(decision);

    return { quote, headlines, scores, averageSentiment, decision };
  });
}
