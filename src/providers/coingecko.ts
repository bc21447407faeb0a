// CoinGecko: implementation of PriceSource.

import { HttpClient } from "@effect/platform";
import { Config, Effect, Layer, Schema } from "effect";
import type { PriceQuote } from "../domain.ts";
import {
  AssetNotFound,
  HttpError,
  NetworkError,
  ParseError,
  PriceSource,
} from "../sources.ts";

// --- CoinGecko response schema ---

// { "cardano": { "usd": 0.35 } }
const SimplePriceResponse = Schema.Record({
  key: Schema.String,
  value: Schema.Record({ key: Schema.String, value: Schema.Number }),
});

type SimplePriceResponseType = typeof SimplePriceResponse.Type;

// --- Decode CoinGecko response into PriceQuote ---

export function decodeCoinGeckoResponse(
  json: unknown,
  asset: string,
  currency: string,
): Effect.Effect<PriceQuote, ParseError | AssetNotFound> {
  return Schema.decodeUnknown(SimplePriceResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap((response) =>
      interpretSimplePrice(response, asset, currency),
    ),
  );
}

function interpretSimplePrice(
  response: SimplePriceResponseType,
  asset: string,
  currency: string,
): Effect.Effect<PriceQuote, ParseError | AssetNotFound> {
  const prices: Readonly<Record<string, number>> = Object.hasOwn(response, asset)
    ? response[asset]
    : {};
  const price: number | undefined = Object.hasOwn(prices, currency)
    ? prices[currency]
    : undefined;

  if (price === undefined) {
    return Effect.fail(new AssetNotFound({ asset, currency }));
  }

  if (!Number.isFinite(price) || price <= 0) {
    return Effect.fail(
      new ParseError({ message: `Price must be positive, got ${price}` }),
    );
  }

  return Effect.succeed({ asset, currency, price });
}

// --- CoinGecko layer ---

export const CoinGeckoLive = Layer.effect(
  PriceSource,
  Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );
    const baseUrl = yield* Config.string("COINGECKO_BASE_URL").pipe(
      Config.withDefault("https://api.coingecko.com/api/v3"),
    );

    return PriceSource.of({
      getPrice: (asset: string, currency: string) => {
        const id = asset.toLowerCase();
        const vs = currency.toLowerCase();
        return Effect.gen(function* () {
          const url =
            `${baseUrl}/simple/price?ids=${encodeURIComponent(id)}&vs_currencies=${encodeURIComponent(vs)}`;
          yield* Effect.logDebug(`[coingecko] GET ${url}`);
          const response = yield* client.get(url);
          const json = yield* response.json;
          return yield* decodeCoinGeckoResponse(json, id, vs);
        }).pipe(
          Effect.scoped,
          Effect.catchTags({
            RequestError: (e) =>
              Effect.fail(new NetworkError({ message: e.message })),
            ResponseError: (e) =>
              e.reason === "StatusCode"
                ? Effect.fail(new HttpError({ status: e.response.status }))
                : Effect.fail(
                    new ParseError({
                      message: `JSON parse failed: ${e.message}`,
                    }),
                  ),
          }),
        );
      },
    });
  }),
);
