// Pure domain types: no framework dependency, no I/O.

export interface PriceQuote {
  readonly asset: string;
  readonly currency: string;
  readonly price: number;
}

export type Polarity = "POSITIVE" | "NEGATIVE";

/** A scorer's verdict on one piece of text. `confidence` is in [0, 1]. */
export interface SentimentLabel {
  readonly label: Polarity;
  readonly confidence: number;
}

export type Decision = "BUY" | "SELL" | "HOLD";

export interface Recommendation {
  readonly quote: PriceQuote;
  readonly headlines: readonly string[];
  readonly scores: readonly number[]; // signed, one per headline
  readonly averageSentiment: number;
  readonly decision: Decision;
}
