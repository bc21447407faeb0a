// Word-list scorer: offline implementation of SentimentScorer.

import { Effect, Layer } from "effect";
import type { SentimentLabel } from "../domain.ts";
import { SentimentScorer } from "../sources.ts";
import lexicon from "./lexicon.json";

const POSITIVE = new Set(lexicon.positive);
const NEGATIVE = new Set(lexicon.negative);

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+(?:'[a-z]+)*/g) ?? [];
}

/**
 * Net share of positive word hits, as a label plus confidence.
 * Text with no hits, or as many negative as positive hits, is POSITIVE with
 * confidence 0.
 */
export function scoreText(text: string): SentimentLabel {
  let pos = 0;
  let neg = 0;
  for (const word of tokenize(text)) {
    if (POSITIVE.has(word)) pos++;
    else if (NEGATIVE.has(word)) neg++;
  }

  if (pos + neg === 0) return { label: "POSITIVE", confidence: 0 };

  const raw = (pos - neg) / (pos + neg); // -1..+1
  return raw >= 0
    ? { label: "POSITIVE", confidence: raw }
    : { label: "NEGATIVE", confidence: -raw };
}

export const LexiconScorerLive = Layer.succeed(
  SentimentScorer,
  SentimentScorer.of({
    score: (text: string) => Effect.succeed(scoreText(text)),
  }),
);
