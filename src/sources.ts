// Collaborator services: price, headline and sentiment sources, and their errors.

import { Context, Data, Effect } from "effect";
import type { PriceQuote, SentimentLabel } from "./domain.ts";

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

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export class AssetNotFound extends Data.TaggedError("AssetNotFound")<{
  readonly asset: string;
  readonly currency: string;
}> {}

export class IoError extends Data.TaggedError("IoError")<{
  readonly message: string;
}> {}

export type PriceSourceError =
  | NetworkError
  | HttpError
  | ParseError
  | AssetNotFound;

export type HeadlineSourceError = IoError;

export type SentimentScorerError =
  | NetworkError
  | HttpError
  | ParseError
  | ServiceError;

// --- Services ---

export class PriceSource extends Context.Tag("PriceSource")<
  PriceSource,
  {
    readonly getPrice: (
      asset: string,
      currency: string,
    ) => Effect.Effect<PriceQuote, PriceSourceError>;
  }
>() {}

export class HeadlineSource extends Context.Tag("HeadlineSource")<
  HeadlineSource,
  {
    /** Headlines in feed order. May be empty; the pipeline decides what that means. */
    readonly getHeadlines: Effect.Effect<readonly string[], HeadlineSourceError>;
  }
>() {}

export class SentimentScorer extends Context.Tag("SentimentScorer")<
  SentimentScorer,
  {
    readonly score: (
      text: string,
    ) => Effect.Effect<SentimentLabel, SentimentScorerError>;
  }
>() {}
