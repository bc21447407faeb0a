// Pure formatting functions: no I/O.

import type { InvalidInput } from "./decision.ts";
import type { Decision, PriceQuote } from "./domain.ts";
import type {
  PipelineError,
  SourceName,
  SourceUnavailable,
} from "./pipeline.ts";
import type { HttpError } from "./sources.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Stage formatting ---

export function formatStage(title: string): string {
  return `\n${BOLD}=== ${title} ===${RESET}`;
}

export function formatPrice(quote: PriceQuote): string {
  return `  Current ${quote.asset.toUpperCase()} price (${quote.currency.toUpperCase()}): ${BOLD}${quote.price}${RESET}`;
}

export function formatHeadlines(headlines: readonly string[]): string {
  return headlines.map((headline) => `  - ${headline}`).join("\n");
}

export function formatSignedScore(score: number): string {
  const sign = score >= 0 ? "+" : "";
  return `${sign}${score.toFixed(2)}`;
}

export function formatSentiment(
  average: number,
  scores: readonly number[],
): string {
  return [
    `  Average sentiment score: ${BOLD}${average.toFixed(4)}${RESET}`,
    `  ${DIM}Per headline: ${scores.map(formatSignedScore).join(", ")}${RESET}`,
  ].join("\n");
}

const decisionColor: Record<Decision, string> = {
  BUY: GREEN,
  SELL: RED,
  HOLD: YELLOW,
};

export function formatDecision(decision: Decision): string {
  return `  Final recommendation: ${decisionColor[decision]}${BOLD}${decision}${RESET}\n`;
}

// --- Error formatting ---

export function formatError(error: PipelineError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

const sourceTitle: Record<SourceName, string> = {
  price: "Price unavailable",
  headlines: "Headlines unavailable",
  sentiment: "Sentiment scoring failed",
};

const sourceService: Record<SourceName, string> = {
  price: "price API",
  headlines: "headline source",
  sentiment: "sentiment service",
};

function classifyError(error: PipelineError): ClassifiedError {
  switch (error._tag) {
    case "SourceUnavailable":
      return classifySourceError(error);
    case "InvalidInput":
      return classifyInvalidInput(error);
  }
}

function classifyInvalidInput(error: InvalidInput): ClassifiedError {
  return { title: "Invalid input", hint: error.message };
}

function classifySourceError(error: SourceUnavailable): ClassifiedError {
  const title = sourceTitle[error.source];
  const service = sourceService[error.source];
  const { reason } = error;

  switch (reason._tag) {
    case "NetworkError":
      return {
        title: `${title}: network error`,
        hint: `Could not reach the ${service} (${reason.message}). Check your internet connection.`,
      };
    case "HttpError":
      return classifyHttpError(title, service, reason);
    case "ParseError":
      return {
        title: `${title}: unexpected response`,
        hint: `The ${service} returned data in an unexpected format.`,
      };
    case "ServiceError":
      return { title: `${title}: service error`, hint: reason.message };
    case "AssetNotFound":
      return {
        title: `${title}: asset not found`,
        hint: `No ${reason.currency} price for '${reason.asset}'. Use a CoinGecko coin id (e.g. cardano, bitcoin).`,
      };
    case "IoError":
      return { title: `${title}: read failed`, hint: reason.message };
    case "EmptyFeed":
      return {
        title: `${title}: no headlines`,
        hint: "There is nothing to score, so no recommendation was made.",
      };
  }
}

function classifyHttpError(
  title: string,
  service: string,
  error: HttpError,
): ClassifiedError {
  if (error.status === 401 || error.status === 403) {
    return {
      title: `${title}: not authorized`,
      hint: `The ${service} rejected the credentials (HTTP ${error.status}).`,
    };
  }
  if (error.status === 404) {
    return {
      title: `${title}: not found`,
      hint: `The ${service} does not know this resource (HTTP 404).`,
    };
  }
  if (error.status === 429) {
    return {
      title: `${title}: rate limited`,
      hint: "Too many requests. Wait a moment and try again.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: `${title}: server error`,
      hint: `The ${service} is having issues. Try again in a few minutes.`,
    };
  }
  return {
    title: `${title}: HTTP error`,
    hint: `HTTP ${error.status}`,
  };
}
