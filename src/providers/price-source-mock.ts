// PriceSourceTest: in-memory implementation of PriceSource for testing and development.

import { Effect, Layer } from "effect";
import { AssetNotFound, PriceSource } from "../sources.ts";

// --- Sample data ---

const prices: Record<string, Record<string, number>> = {
  cardano: { usd: 0.35, eur: 0.32 },
  bitcoin: { usd: 67000 },
  ethereum: { usd: 3400 },
};

// --- Mock layer ---

export const PriceSourceTestLive = Layer.succeed(
  PriceSource,
  PriceSource.of({
    getPrice: (asset: string, currency: string) => {
      const id = asset.toLowerCase();
      const vs = currency.toLowerCase();
      const table: Readonly<Record<string, number>> = Object.hasOwn(prices, id)
        ? prices[id]
        : {};
      const price: number | undefined = Object.hasOwn(table, vs)
        ? table[vs]
        : undefined;
      return price !== undefined
        ? Effect.succeed({ asset: id, currency: vs, price })
        : Effect.fail(new AssetNotFound({ asset, currency }));
    },
  }),
);
