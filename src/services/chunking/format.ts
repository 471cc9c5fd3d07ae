/**
 * Chunk files: `chunk_NNN.md` with YAML-style front matter, plus a manifest.
 */

import type { Chunk } from "../../types/chunk.js";

export function chunkFileName(chunk: Chunk): string {
  return `chunk_${String(chunk.index + 1).padStart(3, "0")}.md`;
}

export function renderChunkFile(chunk: Chunk, total: number, source: string): string {
  const frontMatter = [
    "---",
    `chunk: ${chunk.index + 1}`,
    `total_chunks: ${total}`,
    `source: ${JSON.stringify(source)}`,
    `strategy: ${chunk.strategy}`,
    `tokens: ${chunk.tokenCount}`,
    `break: ${chunk.breakKind}`,
    `char_span: [${chunk.span.start}, ${chunk.span.end}]`,
    `overlap_tokens: ${chunk.overlapTokens}`,
    "---",
  ];
  return `${frontMatter.join("\n")}\n\n${chunk.text}\n`;
}

export interface ChunkManifest {
  source: string;
  strategy: Chunk["strategy"] | null;
  totalChunks: number;
  totalTokens: number;
  chunks: Array<{
    file: string;
    index: number;
    tokenCount: number;
    span: Chunk["span"];
    tokenSpan: Chunk["tokenSpan"];
    breakKind: Chunk["breakKind"];
    overlapTokens: number;
    overlapChars: number;
  }>;
}

export function buildChunkManifest(chunks: readonly Chunk[], source: string): ChunkManifest {
  return {
    source,
    strategy: chunks[0]?.strategy ?? null,
    totalChunks: chunks.length,
    totalTokens: chunks.reduce((sum, c) => sum + c.tokenCount - c.overlapTokens, 0),
    chunks: chunks.map((c) => ({
      file: chunkFileName(c),
      index: c.index,
      tokenCount: c.tokenCount,
      span: c.span,
      tokenSpan: c.tokenSpan,
      breakKind: c.breakKind,
      overlapTokens: c.overlapTokens,
      overlapChars: c.overlapChars,
    })),
  };
}
