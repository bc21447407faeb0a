import { describe, expect, it } from "vitest";
import { Effect, Either } from "effect";
import { PriceSourceTestLive } from "./price-source-mock.ts";
import { PriceSource } from "../sources.ts";

function getPrice(asset: string, currency: string) {
  return Effect.runPromise(
    Effect.gen(function* () {
      const prices = yield* PriceSource;
      return yield* Effect.either(prices.getPrice(asset, currency));
    }).pipe(Effect.provide(PriceSourceTestLive)),
  );
}

describe("PriceSourceTestLive", () => {
  it("normalises asset and currency case", async () => {
    const result = await getPrice("Cardano", "EUR");
    expect(Either.getOrThrow(result)).toEqual({ asset: "cardano", currency: "eur", price: 0.32 });
  });

  it("unknown asset returns AssetNotFound", async () => {
    const result = await getPrice("dogecoin", "usd");
    expect(Either.isLeft(result) && result.left._tag).toBe("AssetNotFound");
  });

  it("inherited object keys are not treated as currencies", async () => {
    for (const currency of ["constructor", "toString", "valueOf"]) {
      const result = await getPrice("cardano", currency);
      expect(Either.isLeft(result) && result.left).toMatchObject({
        _tag: "AssetNotFound",
        asset: "cardano",
        currency,
      });
    }
  });

  it("inherited object keys are not treated as assets", async () => {
    const result = await getPrice("constructor", "usd");
    expect(Either.isLeft(result) && result.left._tag).toBe("AssetNotFound");
  });
});
