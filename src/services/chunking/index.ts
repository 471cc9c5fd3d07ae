/**
 * Chunking Engine
 */

export { chunk, chunkWithConfig, joinChunks, type ChunkOptions } from "./chunker.js";
export {
  createTokenizer,
  TiktokenTokenizer,
  WordTokenizer,
  TOKENIZER_KINDS,
  type Tokenizer,
  type TokenizerKind,
} from "./tokenizer.js";
export { buildBoundaryTable, type BoundaryTable } from "./boundaries.js";
export { buildChunkManifest, chunkFileName, renderChunkFile, type ChunkManifest } from "./format.js";
