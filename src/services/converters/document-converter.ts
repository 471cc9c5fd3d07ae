/**
 * Document Converter
 *
 * Converts DOCX files to markdown and plain text, with optional metadata,
 * style manifest, deduplicated images and chunked output for language
 * models. A `conversion_manifest.json` lists everything written.
 */

import type { DocumentConfig, PipelineConfig } from "../../config.js";
import type { ConversionResult, ConvertibleFile, ExtractedImageRef } from "../../types/conversion.js";
import type { Chunk } from "../../types/chunk.js";
import { buildChunkManifest, chunkFileName, chunkWithConfig, renderChunkFile } from "../chunking/index.js";
import { ProcessingError } from "../errors.js";
import { assertConvertible, displayStem, fileExtension, outputDirFor, throwIfCancelled } from "./common.js";
import {
  createOrderedParser,
  imageRelIds,
  readBody,
  readNumbering,
  renderBody,
  type DocxBlock,
} from "./docx/body.js";
import { buildImageManifest, collectImages, type ImageCollection } from "./docx/images.js";
import {
  countWords,
  readAppProperties,
  readCoreProperties,
  readCustomProperties,
  type DocumentMetadata,
} from "./docx/metadata.js";
import { buildStyleManifest, readStyles, styleNameMap, stylesToCss } from "./docx/styles.js";
import { createXmlParser, openPackage, readEntry, readRelationships } from "./ooxml.js";
import type { ConversionContext, Converter } from "./types.js";
import { withWorkspace } from "./workspace.js";

const DOCX_ARRAY_TAGS = new Set(["w:style", "w:abstractNum", "w:lvl", "w:num", "property", "Relationship"]);
const HYPERLINK_TYPE = /\/hyperlink$/;
const DOCUMENT_PART = "word/document.xml";

function countBlocks(blocks: readonly DocxBlock[]) {
  let paragraphs = 0;
  let headings = 0;
  let listItems = 0;
  let tables = 0;
  let images = 0;
  for (const block of blocks) {
    if (block.type === "table") {
      tables++;
      for (const row of block.rows) {
        for (const cell of row) {
          for (const p of cell) images += p.inlines.filter((i) => i.type === "image").length;
        }
      }
      continue;
    }
    paragraphs++;
    if (block.heading !== null) headings++;
    if (block.list) listItems++;
    images += block.inlines.filter((i) => i.type === "image").length;
  }
  return { paragraphs, headings, listItems, tables, images };
}

export class DocumentConverter implements Converter {
  readonly id = "document" as const;

  supports(file: ConvertibleFile): boolean {
    const kind = file.detectedType.kind;
    return kind === "docx" || (kind === "zip" && fileExtension(file) === ".docx");
  }

  isEnabled(config: PipelineConfig): boolean {
    return config.converters.document.enabled;
  }

  async convert(file: ConvertibleFile, context: ConversionContext): Promise<ConversionResult> {
    const settings: DocumentConfig = context.config.converters.document;
    assertConvertible(file, { label: "Document", maxBytes: settings.maxBytes, kinds: ["docx", "zip"] });
    throwIfCancelled(context.signal);

    const startedAt = context.now();
    const zip = await openPackage(file.content, file.originalName);
    const documentXml = await readEntry(zip, DOCUMENT_PART);
    if (documentXml === null) {
      throw new ProcessingError(`${file.originalName} has no ${DOCUMENT_PART} part`);
    }

    const parser = createXmlParser({
      isArray: (name, _jpath, _isLeaf, isAttribute) => !isAttribute && DOCX_ARRAY_TAGS.has(name),
    });
    const warnings: string[] = [];
    let partial = false;

    const rels = await readRelationships(zip, DOCUMENT_PART, parser);
    const hyperlinks = new Map<string, string>();
    for (const rel of rels.values()) {
      if (HYPERLINK_TYPE.test(rel.type) && rel.external) hyperlinks.set(rel.id, rel.target);
    }

    // Style names are needed for heading detection even when no manifest is written
    const stylesXml = await readEntry(zip, "word/styles.xml");
    const definitions = readStyles(stylesXml, parser);
    const numbering = readNumbering(await readEntry(zip, "word/numbering.xml"), parser);

    const body = readBody(
      documentXml,
      { styleNames: styleNameMap(definitions), numbering, hyperlinks },
      createOrderedParser()
    );
    throwIfCancelled(context.signal);

    const stem = displayStem(file);
    const counts = countBlocks(body.blocks);
    let images: ImageCollection | null = null;
    if (settings.extractImages) {
      images = await collectImages(zip, imageRelIds(body.blocks), rels, stem);
      if (images.warnings.length > 0) {
        warnings.push(...images.warnings);
        partial = true;
      }
    }
    const collected = images;
    const rendered = renderBody(body.blocks, (relId) => {
      const image = collected?.byRelId.get(relId);
      return image ? `images/${image.file}` : null;
    });

    let chunks: Chunk[] = [];
    if (context.config.chunking.enabled && rendered.text.trim() !== "") {
      const chunkText = rendered.text;
      const chunking = context.config.chunking;
      chunks = context.timing
        ? context.timing.timeSync("chunking", () => chunkWithConfig(chunkText, chunking))
        : chunkWithConfig(chunkText, chunking);
    }

    const outputDir = outputDirFor(this.id, file, context.now());
    const mainOutput = `${stem}.md`;

    return withWorkspace(context.fs, "document-", async (workspace) => {
      await workspace.write(mainOutput, rendered.markdown ? `${rendered.markdown}\n` : "");
      await workspace.write(`${stem}.txt`, rendered.text ? `${rendered.text}\n` : "");

      let metadata: DocumentMetadata | null = null;
      if (settings.extractMetadata) {
        try {
          metadata = {
            core: await readCoreProperties(zip, parser),
            app: await readAppProperties(zip, parser),
            custom: await readCustomProperties(zip, parser),
            counts: {
              ...counts,
              words: countWords(rendered.text),
              characters: rendered.text.length,
              revisions: body.revisions,
              hasComments: zip.file("word/comments.xml") !== null,
            },
          };
          await workspace.write("metadata.json", JSON.stringify(metadata, null, 2));
        } catch (err) {
          partial = true;
          const message = err instanceof Error ? err.message : String(err);
          console.warn(`[Document] Metadata of ${file.originalName} unreadable: ${message}`);
          warnings.push(`Metadata could not be read: ${message}`);
        }
      }

      if (settings.extractStyles) {
        const styles = readStyles(stylesXml, parser, body.usedStyles);
        if (settings.styleFormat === "css") {
          await workspace.write("styles.css", stylesToCss(styles));
        } else {
          await workspace.write("styles.json", JSON.stringify(buildStyleManifest(styles), null, 2));
        }
      }

      const imageRefs: ExtractedImageRef[] = [];
      if (images && images.images.length > 0) {
        for (const image of images.images) {
          const bytes = images.content.get(image.file);
          if (!bytes) continue;
          await workspace.write(`images/${image.file}`, bytes);
          imageRefs.push({
            path: `${outputDir}/images/${image.file}`,
            sha256: image.sha256,
            size: image.size,
            mimeType: image.mimeType,
          });
        }
        await workspace.write(
          "images/image_manifest.json",
          JSON.stringify(buildImageManifest(images, counts.images), null, 2)
        );
      }

      if (chunks.length > 0) {
        for (const chunk of chunks) {
          await workspace.write(`chunks/${chunkFileName(chunk)}`, renderChunkFile(chunk, chunks.length, file.originalName));
        }
        await workspace.write(
          "chunk_manifest.json",
          JSON.stringify(
            {
              ...buildChunkManifest(chunks, file.originalName),
              maxTokens: context.config.chunking.maxTokens,
              overlapTokens: context.config.chunking.overlapTokens,
            },
            null,
            2
          )
        );
      }

      const manifest = {
        sourceFile: file.originalName,
        converter: this.id,
        conversionTime: startedAt.toISOString(),
        outputDirectory: outputDir,
        mainOutput,
        features: {
          metadata: metadata !== null,
          styles: settings.extractStyles,
          styleFormat: settings.styleFormat,
          images: imageRefs.length > 0,
          chunking: chunks.length > 0,
        },
        // Written last, so it lists every other file
        outputs: [...workspace.files, "conversion_manifest.json"].sort(),
        warnings,
      };
      await workspace.write("conversion_manifest.json", JSON.stringify(manifest, null, 2));

      const outputs = await workspace.commit(outputDir);
      console.log(
        `[Document] ${file.originalName}: ${counts.paragraphs} paragraph(s), ${imageRefs.length} image(s), ${chunks.length} chunk(s)`
      );

      const resultMetadata: Record<string, unknown> = {
        counts: metadata?.counts ?? counts,
        styleCount: definitions.length,
      };
      if (metadata) {
        resultMetadata.title = metadata.core.title ?? null;
        resultMetadata.author = metadata.core.creator ?? null;
      }

      return {
        converterId: this.id,
        outputText: rendered.markdown,
        outputDir,
        outputs,
        images: imageRefs,
        metadata: resultMetadata,
        ...(chunks.length > 0 ? { chunks } : {}),
        partial,
        retries: 0,
        warnings,
      };
    });
  }
}
