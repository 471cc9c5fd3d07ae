import { describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  buildBoundaryTable,
  buildChunkManifest,
  chunk,
  chunkFileName,
  createTokenizer,
  joinChunks,
  renderChunkFile,
  WordTokenizer,
} from "../../../src/services/chunking/index.js";
import { ConfigurationError } from "../../../src/services/errors.js";
import { CHUNKING_STRATEGIES } from "../../../src/types/chunk.js";

const words = new WordTokenizer();
const SENTENCES = "One two three. Four five six. Seven eight nine ten eleven.";

describe("chunk", () => {
  describe("token strategy", () => {
    const chunks = chunk("a b c d e f g h i j", "token", 4, 1, { tokenizer: words });

    it("cuts fixed windows that share the overlap", () => {
      expect(chunks.map((c) => [c.text, c.breakKind, c.overlapTokens, c.overlapChars])).toEqual([
        ["a b c d ", "limit", 0, 0],
        ["d e f g ", "limit", 1, 2],
        ["g h i j", "end", 1, 2],
      ]);
      expect(chunks[0]?.span).toEqual({ start: 0, end: 8 });
      expect(chunks[1]?.tokenSpan).toEqual({ start: 3, end: 7 });
      expect(chunks[2]?.next).toBeNull();
    });

    it("resumes from a cursor", () => {
      const first = chunks[0];
      expect(first?.next).toEqual({ index: 1, tokenStart: 3, previousTokenEnd: 4 });

      const resumed = chunk("a b c d e f g h i j", "token", 4, 1, {
        tokenizer: words,
        ...(first?.next ? { from: first.next } : {}),
      });
      expect(resumed).toEqual(chunks.slice(1));
    });

    it("counts each token once in the manifest", () => {
      const manifest = buildChunkManifest(chunks, "notes.txt");
      expect(manifest.totalChunks).toBe(3);
      expect(manifest.totalTokens).toBe(10);
      expect(manifest.strategy).toBe("token");
      expect(manifest.chunks.map((c) => c.file)).toEqual(["chunk_001.md", "chunk_002.md", "chunk_003.md"]);
    });
  });

  it("ends semantic chunks on sentence breaks inside the tolerance window", () => {
    const chunks = chunk(SENTENCES, "semantic", 4, 0, { tokenizer: words });

    expect(chunks.map((c) => [c.text, c.breakKind])).toEqual([
      ["One two three. ", "sentence"],
      ["Four five six. ", "sentence"],
      ["Seven eight nine ten ", "limit"],
      ["eleven.", "end"],
    ]);
  });

  it("lets hybrid chunks run past the limit to the next break", () => {
    const chunks = chunk(SENTENCES, "hybrid", 4, 0, { tokenizer: words });

    expect(chunks.map((c) => [c.text, c.breakKind, c.tokenCount])).toEqual([
      ["One two three. ", "sentence", 3],
      ["Four five six. ", "sentence", 3],
      ["Seven eight nine ten eleven.", "end", 5],
    ]);
  });

  describe("with cl100k_base tokens", () => {
    const tiktoken = createTokenizer("tiktoken");
    const text = "One two three. Four five six. Seven eight nine ten eleven twelve.";

    it("finds breaks where a token ends on the punctuation", () => {
      const table = buildBoundaryTable(text, tiktoken.tokenize(text));
      expect(table.size).toBe(15);
      expect(table.strengthAt(4)).toBe(1);
      expect(table.strengthAt(5)).toBe(0);
      expect(table.strengthAt(8)).toBe(1);
      expect(table.lastBreak(13)).toBe(8);
    });

    it("ends semantic chunks on sentences", () => {
      const chunks = chunk(text, "semantic", 5, 0, { tokenizer: tiktoken });

      expect(chunks.map((c) => [c.text, c.breakKind])).toEqual([
        ["One two three.", "sentence"],
        [" Four five six.", "sentence"],
        [" Seven eight nine ten eleven", "limit"],
        [" twelve.", "end"],
      ]);
      expect(joinChunks(chunks)).toBe(text);
    });

    it("lets hybrid chunks run to the end of the text", () => {
      const chunks = chunk(text, "hybrid", 5, 0, { tokenizer: tiktoken });

      expect(chunks.map((c) => [c.text, c.breakKind, c.tokenCount])).toEqual([
        ["One two three.", "sentence", 4],
        [" Four five six.", "sentence", 4],
        [" Seven eight nine ten eleven twelve.", "end", 7],
      ]);
    });

    it("finds paragraph breaks", () => {
      const chunks = chunk("One two.\n\nThree four five six seven", "semantic", 4, 0, { tokenizer: tiktoken });
      expect(chunks[0]?.text.trimEnd()).toBe("One two.");
      expect(chunks[0]?.breakKind).toBe("paragraph");
    });
  });

  it("prefers paragraph breaks", () => {
    const chunks = chunk("a b c\n\nd e f g h", "semantic", 4, 0, { tokenizer: words });

    expect(chunks.map((c) => [c.text, c.breakKind])).toEqual([
      ["a b c\n\n", "paragraph"],
      ["d e f g ", "limit"],
      ["h", "end"],
    ]);
  });

  it("returns nothing for empty text", () => {
    expect(chunk("", "hybrid", 4, 0, { tokenizer: words })).toEqual([]);
  });

  it("rejects invalid sizes", () => {
    expect(() => chunk("a b", "token", 4, 4, { tokenizer: words })).toThrow(ConfigurationError);
    expect(() => chunk("a b", "token", 0, 0, { tokenizer: words })).toThrow("maxTokens must be a positive integer");
  });

  it("rejects a cursor that does not fit the text", () => {
    expect(() =>
      chunk("a b", "token", 4, 0, { tokenizer: words, from: { index: 1, tokenStart: 3, previousTokenEnd: 9 } })
    ).toThrow("Chunk cursor does not fit this text");
  });
});

describe("tokenizers", () => {
  it("gives word tokens their trailing whitespace", () => {
    expect(words.tokenize("  ab cd\n")).toEqual([2, 5, 8]);
  });

  it("maps cl100k_base tokens to character ends", () => {
    const tokenizer = createTokenizer("tiktoken");
    expect(tokenizer.count("hello world")).toBe(2);
    expect(tokenizer.tokenize("hello world")).toEqual([5, 11]);
  });

  it("does not count the end of the text as a break", () => {
    const text = "Done. ";
    const table = buildBoundaryTable(text, words.tokenize(text));
    expect(table.size).toBe(1);
    expect(table.strengthAt(1)).toBe(0);
  });
});

describe("chunk files", () => {
  it("renders front matter before the text", () => {
    const [first] = chunk("a b c d e f g h i j", "token", 4, 0, { tokenizer: words });
    if (!first) throw new Error("expected a chunk");

    expect(chunkFileName(first)).toBe("chunk_001.md");
    expect(renderChunkFile(first, 3, "doc.docx")).toBe(
      [
        "---",
        "chunk: 1",
        "total_chunks: 3",
        'source: "doc.docx"',
        "strategy: token",
        "tokens: 4",
        "break: limit",
        "char_span: [0, 8]",
        "overlap_tokens: 0",
        "---",
        "",
        "a b c d ",
        "",
      ].join("\n")
    );
  });
});

describe("chunk properties", () => {
  const textArb = fc
    .array(fc.constantFrom("alpha", "beta.", "gamma!", " ", "\n\n", "delta", "  "), { maxLength: 60 })
    .map((parts) => parts.join(" "));
  const sizesArb = fc
    .integer({ min: 1, max: 12 })
    .chain((max) => fc.tuple(fc.constant(max), fc.integer({ min: 0, max: max - 1 })));

  it("reconstructs the text for every strategy", () => {
    fc.assert(
      fc.property(textArb, sizesArb, fc.constantFrom(...CHUNKING_STRATEGIES), (text, [max, overlap], strategy) => {
        const chunks = chunk(text, strategy, max, overlap, { tokenizer: words });
        expect(joinChunks(chunks)).toBe(text);
      })
    );
  });

  it("keeps chunk sizes within each strategy's ceiling", () => {
    fc.assert(
      fc.property(textArb, sizesArb, fc.constantFrom(...CHUNKING_STRATEGIES), (text, [max, overlap], strategy) => {
        const ceiling = strategy === "hybrid" ? Math.floor(max * 1.5) : max;
        for (const c of chunk(text, strategy, max, overlap, { tokenizer: words })) {
          expect(c.tokenCount).toBeGreaterThan(0);
          expect(c.tokenCount).toBeLessThanOrEqual(ceiling);
          expect(c.text).toBe(text.slice(c.span.start, c.span.end));
        }
      })
    );
  });

  it("overlaps token chunks by exactly the requested amount", () => {
    fc.assert(
      fc.property(textArb, sizesArb, (text, [max, overlap]) => {
        const chunks = chunk(text, "token", max, overlap, { tokenizer: words });
        chunks.forEach((c, i) => {
          expect(c.index).toBe(i);
          if (i > 0) expect(c.overlapTokens).toBe(overlap);
        });
      })
    );
  });
});
