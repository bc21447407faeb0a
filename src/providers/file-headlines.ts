// File headline feed: one headline per line, read through the platform FileSystem.

import { FileSystem } from "@effect/platform";
import { Config, Effect, Layer } from "effect";
import { HeadlineSource, IoError } from "../sources.ts";

/** Trimmed non-empty lines, skipping `#` comments. */
export function parseHeadlines(text: string): readonly string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export const FileHeadlinesLive = Layer.effect(
  HeadlineSource,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Config.string("HEADLINES_FILE");

    return HeadlineSource.of({
      getHeadlines: fs.readFileString(path).pipe(
        Effect.map(parseHeadlines),
        Effect.tap((headlines) =>
          Effect.logDebug(`[headlines] read ${headlines.length} headlines from ${path}`),
        ),
        Effect.mapError(
          (e) => new IoError({ message: `${path}: ${e.message}` }),
        ),
      ),
    });
  }),
);
