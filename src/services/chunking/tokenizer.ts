/**
 * Tokenizers for the chunking engine.
 *
 * A tokenizer returns the end offset of every token so chunks can be cut on
 * token boundaries and mapped back to exact character spans. The last end
 * offset always equals the text length.
 */

import { getEncoding, type Tiktoken } from "js-tiktoken";

export const TOKENIZER_KINDS = ["tiktoken", "words"] as const;
export type TokenizerKind = (typeof TOKENIZER_KINDS)[number];

export interface Tokenizer {
  readonly name: string;
  /** End offset (exclusive) of each token, in order */
  tokenize(text: string): number[];
  count(text: string): number;
}

/**
 * Splits into words, each carrying its trailing whitespace. Leading
 * whitespace forms its own token.
 */
export class WordTokenizer implements Tokenizer {
  readonly name = "words";

  tokenize(text: string): number[] {
    const ends: number[] = [];
    for (const match of text.matchAll(/\S+\s*|\s+/g)) {
      ends.push((match.index ?? 0) + match[0].length);
    }
    return ends;
  }

  count(text: string): number {
    return this.tokenize(text).length;
  }
}

/**
 * cl100k_base tokens. A character split across several tokens is credited
 * to the last of them; the others get zero width.
 */
export class TiktokenTokenizer implements Tokenizer {
  readonly name = "cl100k_base";

  constructor(private readonly encoder: Tiktoken) {}

  tokenize(text: string): number[] {
    const tokens = this.encoder.encode(text, [], []);
    const ends: number[] = [];
    let pos = 0;
    let pending: number[] = [];

    for (const token of tokens) {
      pending.push(token);
      const piece = this.encoder.decode(pending);
      if (!text.startsWith(piece, pos)) continue;
      for (let i = 1; i < pending.length; i++) ends.push(pos);
      pos += piece.length;
      ends.push(pos);
      pending = [];
    }
    for (let i = 0; i < pending.length; i++) ends.push(text.length);
    if (ends.length > 0) ends[ends.length - 1] = text.length;
    return ends;
  }

  count(text: string): number {
    return this.encoder.encode(text, [], []).length;
  }
}

let cachedEncoder: Tiktoken | null = null;

/**
 * Build a tokenizer. "tiktoken" falls back to words when the encoder
 * cannot be loaded.
 */
export function createTokenizer(kind: TokenizerKind = "tiktoken"): Tokenizer {
  if (kind === "words") return new WordTokenizer();
  try {
    cachedEncoder ??= getEncoding("cl100k_base");
    return new TiktokenTokenizer(cachedEncoder);
  } catch (err) {
    console.warn("[Chunking] Falling back to word tokenizer:", err);
    return new WordTokenizer();
  }
}
