/**
 * Chunking Engine
 *
 * Splits text into bounded, optionally overlapping chunks for language-model
 * consumption.
 *
 * - token: fixed windows of `maxTokens`; neighbours share `overlapTokens`.
 * - semantic: end on the paragraph (else sentence) break nearest the limit,
 *   inside a window of 25% of `maxTokens`; otherwise cut at the limit.
 * - hybrid: the semantic window first, then the nearest break before the
 *   limit or after it up to 1.5x `maxTokens`; cut at the limit only when
 *   neither exists.
 *
 * Each chunk is an exact slice of the input, so dropping every chunk's
 * leading `overlapChars` and joining reconstructs the text.
 */

import type { ChunkingConfig } from "../../config.js";
import {
  CHUNKING_STRATEGIES,
  type BreakKind,
  type Chunk,
  type ChunkCursor,
  type ChunkingStrategy,
} from "../../types/chunk.js";
import { ConfigurationError } from "../errors.js";
import { buildBoundaryTable, PARAGRAPH, type BoundaryTable } from "./boundaries.js";
import { createTokenizer, type Tokenizer } from "./tokenizer.js";

const SEMANTIC_TOLERANCE = 0.25;
const HYBRID_CEILING = 1.5;

export interface ChunkOptions {
  /** Defaults to cl100k_base */
  tokenizer?: Tokenizer;
  /** Resume from a chunk's `next` cursor */
  from?: ChunkCursor;
}

interface ChunkEnd {
  end: number;
  kind: BreakKind;
}

function validateSizes(strategy: string, maxTokens: number, overlapTokens: number): void {
  const issues: string[] = [];
  if (!CHUNKING_STRATEGIES.some((s) => s === strategy)) {
    issues.push(`strategy must be one of ${CHUNKING_STRATEGIES.join(", ")}`);
  }
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    issues.push("maxTokens must be a positive integer");
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    issues.push("overlapTokens must be a non-negative integer");
  } else if (overlapTokens >= maxTokens) {
    issues.push("overlapTokens must be smaller than maxTokens");
  }
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid chunking parameters", issues);
  }
}

function breakKindAt(table: BoundaryTable, e: number): BreakKind {
  return table.strengthAt(e) === PARAGRAPH ? "paragraph" : "sentence";
}

function findEnd(
  strategy: ChunkingStrategy,
  start: number,
  maxTokens: number,
  table: BoundaryTable
): ChunkEnd {
  const n = table.size;
  const limit = start + maxTokens;
  if (limit >= n) return { end: n, kind: "end" };
  if (strategy === "token") return { end: limit, kind: "limit" };

  const tolerance = Math.max(1, Math.floor(maxTokens * SEMANTIC_TOLERANCE));
  const low = Math.max(start + 1, limit - tolerance);
  const paragraph = table.lastParagraph(limit);
  if (paragraph >= low) return { end: paragraph, kind: "paragraph" };
  const sentence = table.lastBreak(limit);
  if (sentence >= low) return { end: sentence, kind: breakKindAt(table, sentence) };
  if (strategy === "semantic") return { end: limit, kind: "limit" };

  const ceiling = start + Math.floor(maxTokens * HYBRID_CEILING);
  const candidates: ChunkEnd[] = [];
  if (sentence > start) {
    candidates.push({ end: sentence, kind: breakKindAt(table, sentence) });
  }
  const forward = table.nextBreak(limit + 1);
  if (forward !== -1 && forward <= ceiling) {
    candidates.push({ end: forward, kind: breakKindAt(table, forward) });
  } else if (n <= ceiling) {
    candidates.push({ end: n, kind: "end" });
  }

  // Nearest to the limit wins; the backward candidate comes first, so it
  // wins ties.
  let best: ChunkEnd | null = null;
  for (const candidate of candidates) {
    if (!best || Math.abs(candidate.end - limit) < Math.abs(best.end - limit)) {
      best = candidate;
    }
  }
  return best ?? { end: limit, kind: "limit" };
}

/**
 * Split `text` into chunks.
 *
 * @throws ConfigurationError for an unknown strategy, `maxTokens < 1`,
 *   `overlapTokens >= maxTokens`, or a cursor outside the text
 */
export function chunk(
  text: string,
  strategy: ChunkingStrategy,
  maxTokens: number,
  overlapTokens: number,
  options: ChunkOptions = {}
): Chunk[] {
  validateSizes(strategy, maxTokens, overlapTokens);
  const tokenizer = options.tokenizer ?? createTokenizer("tiktoken");
  const ends = tokenizer.tokenize(text);
  const n = ends.length;
  if (n === 0) return [];

  const from = options.from;
  if (from && (from.tokenStart < 0 || from.tokenStart > from.previousTokenEnd || from.previousTokenEnd > n)) {
    throw new ConfigurationError("Chunk cursor does not fit this text", [
      `tokenStart ${from.tokenStart}, previousTokenEnd ${from.previousTokenEnd}, tokens ${n}`,
    ]);
  }

  const table = buildBoundaryTable(text, ends);
  const offset = (t: number): number => (t <= 0 ? 0 : (ends[t - 1] ?? text.length));

  const chunks: Chunk[] = [];
  let start = from?.tokenStart ?? 0;
  let index = from?.index ?? 0;
  let previousEnd: number | null = from?.previousTokenEnd ?? null;

  while (start < n) {
    const { end, kind } = findEnd(strategy, start, maxTokens, table);
    const next: ChunkCursor | null =
      end >= n
        ? null
        : { index: index + 1, tokenStart: Math.max(end - overlapTokens, start + 1), previousTokenEnd: end };

    chunks.push({
      index,
      text: text.slice(offset(start), offset(end)),
      tokenCount: end - start,
      span: { start: offset(start), end: offset(end) },
      tokenSpan: { start, end },
      strategy,
      breakKind: kind,
      overlapTokens: previousEnd === null ? 0 : previousEnd - start,
      overlapChars: previousEnd === null ? 0 : offset(previousEnd) - offset(start),
      next,
    });

    if (!next) break;
    previousEnd = end;
    start = next.tokenStart;
    index = next.index;
  }

  return chunks;
}

/**
 * Chunk with the configured strategy, sizes and tokenizer.
 */
export function chunkWithConfig(text: string, config: ChunkingConfig): Chunk[] {
  return chunk(text, config.strategy, config.maxTokens, config.overlapTokens, {
    tokenizer: createTokenizer(config.tokenizer),
  });
}

/**
 * Rebuild the source text from a complete, ordered chunk list.
 */
export function joinChunks(chunks: readonly Chunk[]): string {
  return chunks.map((c, i) => (i === 0 ? c.text : c.text.slice(c.overlapChars))).join("");
}
