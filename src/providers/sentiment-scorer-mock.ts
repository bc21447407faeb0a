// SentimentScorerTest: canned implementation of SentimentScorer for testing and development.

import { Effect, Layer } from "effect";
import type { SentimentLabel } from "../domain.ts";
import { SentimentScorer, ServiceError } from "../sources.ts";
import { DEMO_HEADLINES } from "./static-headlines.ts";

// --- Sample data ---

const cannedScores: readonly SentimentLabel[] = [
  { label: "POSITIVE", confidence: 0.95 },
  { label: "NEGATIVE", confidence: 0.8 },
  { label: "POSITIVE", confidence: 0.99 },
  { label: "NEGATIVE", confidence: 0.55 },
  { label: "POSITIVE", confidence: 0.89 },
];

const scores = new Map<string, SentimentLabel>(
  DEMO_HEADLINES.map((headline, i) => [headline, cannedScores[i]] as const),
);

// --- Mock layer ---

export const SentimentScorerTestLive = Layer.succeed(
  SentimentScorer,
  SentimentScorer.of({
    score: (text: string) => {
      const sentiment = scores.get(text);
      return sentiment !== undefined
        ? Effect.succeed(sentiment)
        : Effect.fail(
            new ServiceError({ message: `No canned score for "${text}"` }),
          );
    },
  }),
);
