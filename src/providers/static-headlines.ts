// Static headline feed: stands in for a news API.

import { Effect, Layer } from "effect";
import { HeadlineSource } from "../sources.ts";

export const DEMO_HEADLINES: readonly string[] = [
  "Cardano Surges After Positive Development Updates",
  "Experts Warn Of Possible Correction in Cardano",
  "Major Financial Institution to Begin Holding ADA Reserves",
  "Bearish Signals Emerge Despite Cardano's Strong Performance",
  "Investors Show Growing Interest in Cardano's Future",
];

export const StaticHeadlinesLive = Layer.succeed(
  HeadlineSource,
  HeadlineSource.of({
    getHeadlines: Effect.succeed(DEMO_HEADLINES),
  }),
);
