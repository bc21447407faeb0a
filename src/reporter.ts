// Reporter: renders each pipeline stage for a human.

import { Console, Context, Effect, Layer } from "effect";
import type { Decision, PriceQuote } from "./domain.ts";
import {
  formatDecision,
  formatHeadlines,
  formatPrice,
  formatSentiment,
  formatStage,
} from "./format.ts";

export class Reporter extends Context.Tag("Reporter")<
  Reporter,
  {
    readonly stage: (title: string) => Effect.Effect<void>;
    readonly price: (quote: PriceQuote) => Effect.Effect<void>;
    readonly headlines: (headlines: readonly string[]) => Effect.Effect<void>;
    readonly sentiment: (
      average: number,
      scores: readonly number[],
    ) => Effect.Effect<void>;
    readonly decision: (decision: Decision) => Effect.Effect<void>;
  }
>() {}

export const ConsoleReporterLive = Layer.succeed(
  Reporter,
  Reporter.of({
    stage: (title) => Console.log(formatStage(title)),
    price: (quote) => Console.log(formatPrice(quote)),
    headlines: (headlines) => Console.log(formatHeadlines(headlines)),
    sentiment: (average, scores) =>
      Console.log(formatSentiment(average, scores)),
    decision: (decision) => Console.log(formatDecision(decision)),
  }),
);
