// Decision core: sentiment aggregation and the threshold rule.
//
// Pure functions over plain numbers. The only failure is InvalidInput from
// aggregation; decide() is total.

import { Data, Effect } from "effect";
import type { Decision, SentimentLabel } from "./domain.ts";

// --- Thresholds ---

export const BUY_THRESHOLD = 0.3;
export const SELL_THRESHOLD = -0.3;

// --- Error ---

export class InvalidInput extends Data.TaggedError("InvalidInput")<{
  readonly message: string;
}> {}

// --- Aggregation ---

/** Signed score for one headline: +confidence when POSITIVE, -confidence when NEGATIVE. */
export function toHeadlineScore(sentiment: SentimentLabel): number {
  return sentiment.label === "POSITIVE"
    ? sentiment.confidence
    : -sentiment.confidence;
}

/** Unweighted mean of the signed headline scores. Fails on an empty sequence
 *  or on a confidence outside [0, 1]. */
export function aggregateSentiment(
  labels: readonly SentimentLabel[],
): Effect.Effect<number, InvalidInput> {
  if (labels.length === 0) {
    return Effect.fail(
      new InvalidInput({ message: "Cannot aggregate an empty list of scores" }),
    );
  }

  const invalid = labels.findIndex(
    ({ confidence }) =>
      !Number.isFinite(confidence) || confidence < 0 || confidence > 1,
  );
  if (invalid !== -1) {
    return Effect.fail(
      new InvalidInput({
        message: `Confidence at index ${invalid} is outside [0, 1]: ${labels[invalid].confidence}`,
      }),
    );
  }

  const sum = labels.reduce((acc, label) => acc + toHeadlineScore(label), 0);
  return Effect.succeed(sum / labels.length);
}

// --- Decision rule ---

/**
 * Map an average sentiment to a recommendation. Both thresholds are strict,
 * so exactly ±0.3 is HOLD.
 *
 * `_currentPrice` is accepted for call-site compatibility and does not affect
 * the result.
 */
export function decide(avgSentiment: number, _currentPrice?: number): Decision {
  if (avgSentiment > BUY_THRESHOLD) return "BUY";
  if (avgSentiment < SELL_THRESHOLD) return "SELL";
  return "HOLD";
}
