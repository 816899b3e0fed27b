import { getEncoding } from "js-tiktoken";
import type { Tiktoken, TiktokenEncoding } from "js-tiktoken";

/** Anything that can count tokens in a string. */
export interface TokenCounting {
  count(text: string): number;
}

export const DEFAULT_ENCODING: TiktokenEncoding = "cl100k_base";

/**
 * Counts tokens with a tiktoken encoding. Construct once and pass the instance
 * to whoever needs counts; `count` only reads the encoder, so one instance can
 * be shared freely.
 */
export class TokenCounter implements TokenCounting {
  private readonly encoder: Tiktoken;
  readonly encodingName: TiktokenEncoding;

  constructor(encodingName: TiktokenEncoding = DEFAULT_ENCODING) {
    this.encodingName = encodingName;
    this.encoder = getEncoding(encodingName);
  }

  count(text: string): number {
    if (text.length === 0) return 0;
    // Special-token markers in source text are counted as plain text
    return this.encoder.encode(text, [], []).length;
  }
}
