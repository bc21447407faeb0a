import { describe, expect, it } from "vitest";
import {
  formatDecision,
  formatError,
  formatHeadlines,
  formatPrice,
  formatSentiment,
  formatSignedScore,
  formatStage,
} from "./format.ts";
import { InvalidInput } from "./decision.ts";
import { EmptyFeed, SourceUnavailable } from "./pipeline.ts";
import {
  AssetNotFound,
  HttpError,
  IoError,
  NetworkError,
  ParseError,
  ServiceError,
} from "./sources.ts";

// Strips ANSI escapes so assertions read like the terminal output.
const plain = (s: string) => s.replace(/\x1b\[\d+m/g, "");

// --- Stage formatting ---

describe("stage formatting", () => {
  it("formatStage: renders a banner preceded by a blank line", () => {
    expect(plain(formatStage("Making decision"))).toBe("\n=== Making decision ===");
  });

  it("formatPrice: upper-cases asset and currency", () => {
    const output = formatPrice({ asset: "cardano", currency: "usd", price: 0.35 });
    expect(plain(output)).toBe("  Current CARDANO price (USD): 0.35");
  });

  it("formatHeadlines: one bullet per headline", () => {
    expect(formatHeadlines(["First", "Second"])).toBe("  - First\n  - Second");
  });

  it("formatSignedScore: positive scores carry a plus sign", () => {
    expect(formatSignedScore(0.95)).toBe("+0.95");
    expect(formatSignedScore(-0.8)).toBe("-0.80");
    expect(formatSignedScore(0)).toBe("+0.00");
  });

  it("formatSentiment: average to four decimals, then per-headline scores", () => {
    const output = formatSentiment(0.29600000000000004, [0.95, -0.8]);
    expect(plain(output)).toBe(
      "  Average sentiment score: 0.2960\n  Per headline: +0.95, -0.80",
    );
  });

  it("formatDecision: colours by recommendation", () => {
    expect(formatDecision("BUY")).toBe("  Final recommendation: \x1b[32m\x1b[1mBUY\x1b[0m\n");
    expect(formatDecision("SELL").includes("\x1b[31m")).toBe(true);
    expect(plain(formatDecision("HOLD"))).toBe("  Final recommendation: HOLD\n");
  });
});

// --- formatError ---

function errorLines(output: string): string[] {
  return plain(output).split("\n").filter((line) => line.length > 0);
}

describe("formatError", () => {
  it("NetworkError on the price source", () => {
    const output = formatError(
      new SourceUnavailable({
        source: "price",
        reason: new NetworkError({ message: "Price request timed out" }),
      }),
    );
    expect(errorLines(output)).toEqual([
      "  ✗ Price unavailable: network error",
      "  Could not reach the price API (Price request timed out). Check your internet connection.",
    ]);
  });

  it("HttpError 429 shows rate limited", () => {
    const output = formatError(
      new SourceUnavailable({ source: "price", reason: new HttpError({ status: 429 }) }),
    );
    expect(errorLines(output)[0]).toBe("  ✗ Price unavailable: rate limited");
  });

  it("HttpError 401 on the sentiment service shows not authorized", () => {
    const output = formatError(
      new SourceUnavailable({ source: "sentiment", reason: new HttpError({ status: 401 }) }),
    );
    expect(errorLines(output)).toEqual([
      "  ✗ Sentiment scoring failed: not authorized",
      "  The sentiment service rejected the credentials (HTTP 401).",
    ]);
  });

  it("HttpError 502 shows server error", () => {
    const output = formatError(
      new SourceUnavailable({ source: "price", reason: new HttpError({ status: 502 }) }),
    );
    expect(errorLines(output)[0]).toBe("  ✗ Price unavailable: server error");
  });

  it("HttpError 418 falls back to the status code", () => {
    const output = formatError(
      new SourceUnavailable({ source: "price", reason: new HttpError({ status: 418 }) }),
    );
    expect(errorLines(output)).toEqual(["  ✗ Price unavailable: HTTP error", "  HTTP 418"]);
  });

  it("ParseError shows unexpected response", () => {
    const output = formatError(
      new SourceUnavailable({ source: "price", reason: new ParseError({ message: "bad" }) }),
    );
    expect(errorLines(output)[0]).toBe("  ✗ Price unavailable: unexpected response");
  });

  it("AssetNotFound names the asset and currency", () => {
    const output = formatError(
      new SourceUnavailable({
        source: "price",
        reason: new AssetNotFound({ asset: "notacoin", currency: "usd" }),
      }),
    );
    expect(errorLines(output)[1]).toBe(
      "  No usd price for 'notacoin'. Use a CoinGecko coin id (e.g. cardano, bitcoin).",
    );
  });

  it("ServiceError passes the service message through", () => {
    const output = formatError(
      new SourceUnavailable({
        source: "sentiment",
        reason: new ServiceError({ message: "Model is loading" }),
      }),
    );
    expect(errorLines(output)).toEqual([
      "  ✗ Sentiment scoring failed: service error",
      "  Model is loading",
    ]);
  });

  it("IoError and EmptyFeed on the headline source", () => {
    const read = formatError(
      new SourceUnavailable({
        source: "headlines",
        reason: new IoError({ message: "headlines.txt: not found" }),
      }),
    );
    expect(errorLines(read)).toEqual([
      "  ✗ Headlines unavailable: read failed",
      "  headlines.txt: not found",
    ]);

    const empty = formatError(
      new SourceUnavailable({
        source: "headlines",
        reason: new EmptyFeed({ message: "Headline source returned no headlines" }),
      }),
    );
    expect(errorLines(empty)[0]).toBe("  ✗ Headlines unavailable: no headlines");
  });

  it("InvalidInput shows the validation message", () => {
    const output = formatError(new InvalidInput({ message: "Cannot aggregate an empty list of scores" }));
    expect(errorLines(output)).toEqual([
      "  ✗ Invalid input",
      "  Cannot aggregate an empty list of scores",
    ]);
  });
});
