// Hugging Face Inference API: implementation of SentimentScorer.

import {
  HttpClient,
  HttpClientRequest,
  type HttpClientResponse,
} from "@effect/platform";
import { Config, Effect, Layer, Redacted, Schema } from "effect";
import type { SentimentLabel } from "../domain.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  SentimentScorer,
  ServiceError,
} from "../sources.ts";

// --- Inference API response schema ---

const Candidate = Schema.Struct({
  label: Schema.String,
  score: Schema.Number,
});

type CandidateType = typeof Candidate.Type;

// Text classification answers [[...]] for a single input; some models answer [...].
const ClassificationResponse = Schema.Union(
  Schema.Array(Schema.Array(Candidate)),
  Schema.Array(Candidate),
);

type ClassificationResponseType = typeof ClassificationResponse.Type;

// --- Decode inference response into SentimentLabel ---

// The API reports model-level failures as { "error": "..." }.
function errorMessage(json: unknown): string | undefined {
  return typeof json === "object" &&
    json !== null &&
    "error" in json &&
    typeof json.error === "string"
    ? json.error
    : undefined;
}

/** Non-2xx answers often carry the service's own message; prefer it over the bare status. */
function failFromErrorResponse(
  response: HttpClientResponse.HttpClientResponse,
): Effect.Effect<never, HttpError | ServiceError> {
  return response.json.pipe(
    Effect.orElseSucceed((): unknown => undefined),
    Effect.flatMap((json): Effect.Effect<never, HttpError | ServiceError> => {
      const message = errorMessage(json);
      return message !== undefined
        ? Effect.fail(new ServiceError({ message }))
        : Effect.fail(new HttpError({ status: response.status }));
    }),
  );
}

export function decodeHuggingFaceResponse(
  json: unknown,
): Effect.Effect<SentimentLabel, ParseError | ServiceError> {
  const message = errorMessage(json);
  if (message !== undefined) {
    return Effect.fail(new ServiceError({ message }));
  }

  return Schema.decodeUnknown(ClassificationResponse)(json).pipe(
    Effect.mapError(
      (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap(pickTopLabel),
  );
}

function flatten(response: ClassificationResponseType): CandidateType[] {
  const candidates: CandidateType[] = [];
  for (const entry of response) {
    if ("label" in entry) candidates.push(entry);
    else candidates.push(...entry);
  }
  return candidates;
}

function pickTopLabel(
  response: ClassificationResponseType,
): Effect.Effect<SentimentLabel, ParseError> {
  const candidates = flatten(response);
  if (candidates.length === 0) {
    return Effect.fail(new ParseError({ message: "No labels in response" }));
  }

  const top = candidates.reduce((best, c) => (c.score > best.score ? c : best));
  const label = top.label.toUpperCase();

  if (label !== "POSITIVE" && label !== "NEGATIVE") {
    return Effect.fail(
      new ParseError({ message: `Unsupported label '${top.label}'` }),
    );
  }
  if (top.score < 0 || top.score > 1) {
    return Effect.fail(
      new ParseError({ message: `Score out of range: ${top.score}` }),
    );
  }

  return Effect.succeed({ label, confidence: top.score });
}

// --- Hugging Face layer ---

export const HuggingFaceLive = Layer.effect(
  SentimentScorer,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );
    const token = yield* Config.redacted("HUGGINGFACE_API_TOKEN");
    const model = yield* Config.string("HUGGINGFACE_MODEL").pipe(
      Config.withDefault("distilbert-base-uncased-finetuned-sst-2-english"),
    );
    const baseUrl = yield* Config.string("HUGGINGFACE_BASE_URL").pipe(
      Config.withDefault("https://router.huggingface.co/hf-inference/models"),
    );
    const url = `${baseUrl}/${model}`;

    return SentimentScorer.of({
      score: (text: string) =>
        Effect.gen(function* () {
          yield* Effect.logDebug(`[huggingface] POST ${url}`);
          const request = HttpClientRequest.post(url).pipe(
            HttpClientRequest.bearerToken(Redacted.value(token)),
            HttpClientRequest.bodyUnsafeJson({ inputs: text }),
          );
          const response = yield* client.execute(request);
          const json = yield* response.json;
          return yield* decodeHuggingFaceResponse(json);
        }).pipe(
          Effect.catchTags({
            RequestError: (e) =>
              Effect.fail(new NetworkError({ message: e.message })),
            ResponseError: (e) =>
              e.reason === "StatusCode"
                ? failFromErrorResponse(e.response)
                : Effect.fail(
                    new ParseError({
                      message: `JSON parse failed: ${e.message}`,
                    }),
                  ),
          }),
          Effect.scoped,
        ),
    });
  }),
);
