/**
 * Chunking types.
 */

export const CHUNKING_STRATEGIES = ["token", "semantic", "hybrid"] as const;
export type ChunkingStrategy = (typeof CHUNKING_STRATEGIES)[number];

/** Why a chunk ended where it did. */
export type BreakKind = "paragraph" | "sentence" | "limit" | "end";

/** Resume point for restarting chunking mid-text. */
export interface ChunkCursor {
  /** Index the next chunk will carry */
  index: number;
  /** Token offset the next chunk starts at */
  tokenStart: number;
  /** Token offset the emitted chunk ended at; fixes the next chunk's overlap */
  previousTokenEnd: number;
}

export interface Chunk {
  index: number;
  text: string;
  tokenCount: number;
  /** Character span in the source text, end exclusive */
  span: { start: number; end: number };
  /** Token span in the source token stream, end exclusive */
  tokenSpan: { start: number; end: number };
  strategy: ChunkingStrategy;
  breakKind: BreakKind;
  /** Tokens shared with the previous chunk */
  overlapTokens: number;
  /** Characters shared with the previous chunk */
  overlapChars: number;
  /** Cursor for the chunk after this one, null for the last */
  next: ChunkCursor | null;
}
