/**
 * MIME Extractor
 *
 * Turns a raw message into body text, attachments and inline images. Each
 * attachment and inline image leaves exactly one marker in the body text,
 * placed where it sat in the message, so reading order can be rebuilt.
 *
 * Inline images referenced from the chosen HTML body through `cid:` are
 * marked where the <img> stood; everything else is marked at its position
 * in the part tree.
 */

import { createHash } from "node:crypto";
import { convert, type HtmlToTextOptions } from "html-to-text";
import type {
  Attachment,
  BodyPart,
  BodySource,
  ExtractionResult,
  InlineImage,
  Part,
  PartSummary,
  PositionRef,
} from "../types/message.js";
import type { SecurityPolicy } from "../types/validation.js";
import { DEFAULT_CONFIG } from "../config.js";
import { describeKind, detectFileType } from "./file-signatures.js";
import {
  buildGeneratedName,
  extensionForContentType,
  messageKeyFor,
  NameRegistry,
  sanitizeFilename,
} from "./filenames.js";
import { decodeText, decodeTransferEncoding } from "./mime-decoding.js";
import { headerValue, parseMessage, walkParts } from "./mime-parser.js";
import { validate } from "./security-validator.js";

export interface ExtractOptions {
  /** Policy applied to every attachment and inline image */
  policy?: SecurityPolicy;
  /** Share across a batch to keep generated names unique between messages */
  names?: NameRegistry;
  /** Used as message id when the message has no Message-ID header */
  sourceId?: string;
}

const HTML_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: "img", format: "skip" },
    { selector: "script", format: "skip" },
    { selector: "style", format: "skip" },
    { selector: "h1", options: { uppercase: false } },
    { selector: "h2", options: { uppercase: false } },
    { selector: "h3", options: { uppercase: false } },
    { selector: "h4", options: { uppercase: false } },
    { selector: "h5", options: { uppercase: false } },
    { selector: "h6", options: { uppercase: false } },
    { selector: "table", options: { uppercaseHeaderCells: false } },
  ],
};

const CID_IMAGE = /<img\b[^>]*?\bsrc\s*=\s*(["']?)cid:([^"'\s>]+)\1[^>]*>/gi;

export function attachmentMarker(index: number): string {
  return `[[attachment:${index}]]`;
}

export function imageMarker(index: number): string {
  return `[[image:${index}]]`;
}

/** Matches every marker the extractor can emit. */
export const MARKER_PATTERN = /\[\[(attachment|image):(\d+)\]\]/g;

type LeafRole = "body" | "attachment" | "image" | "ignored";

type ExtractionEvent =
  | { type: "text"; part: Part; source: BodySource }
  | { type: "attachment"; item: Attachment }
  | { type: "image"; item: InlineImage };

function isContainer(part: Part): boolean {
  return part.children.length > 0;
}

function bodySource(part: Part): BodySource | null {
  if (part.contentType === "text/plain") return "plain";
  if (part.contentType === "text/html") return "html";
  return null;
}

function classifyLeaf(part: Part): LeafRole {
  if (part.contentType.startsWith("image/") && part.contentId && part.disposition !== "attachment") {
    return "image";
  }
  if (part.disposition === "attachment") return "attachment";
  if (bodySource(part) && !part.filename) return "body";
  if (part.raw.length === 0 && !part.filename) return "ignored";
  return "attachment";
}

/** First body flavour found in a subtree, used to rank alternatives. */
function flavourOf(part: Part): BodySource | null {
  for (const node of walkParts(part)) {
    if (!isContainer(node) && classifyLeaf(node) === "body") return bodySource(node);
  }
  return null;
}

function chooseAlternative(children: Part[]): Part | undefined {
  return (
    children.find((c) => flavourOf(c) === "plain") ??
    children.find((c) => flavourOf(c) === "html") ??
    children[0]
  );
}

function stripCid(contentId: string): string {
  const local = contentId.split("@")[0] ?? contentId;
  return local || contentId;
}

class Extraction {
  readonly events: ExtractionEvent[] = [];
  readonly attachments: Attachment[] = [];
  readonly inlineImages: InlineImage[] = [];
  private counter = 0;
  private contentIdCounts = new Map<string, number>();

  constructor(
    private readonly messageKey: string,
    private readonly policy: SecurityPolicy,
    private readonly names: NameRegistry
  ) {}

  walk(part: Part, emitBody: boolean): void {
    if (isContainer(part)) {
      const chosen = part.contentType === "multipart/alternative" ? chooseAlternative(part.children) : undefined;
      for (const child of part.children) {
        this.walk(child, emitBody && (chosen === undefined || child === chosen));
      }
      return;
    }

    switch (classifyLeaf(part)) {
      case "body": {
        const source = bodySource(part);
        if (emitBody && source) this.events.push({ type: "text", part, source });
        return;
      }
      case "image":
        this.events.push({ type: "image", item: this.addImage(part) });
        return;
      case "attachment":
        this.events.push({ type: "attachment", item: this.addAttachment(part) });
        return;
      case "ignored":
        return;
    }
  }

  private buildFile(part: Part, originalName: string, marker: string) {
    const content = decodeTransferEncoding(part.raw, part.transferEncoding);
    const detectedType = content.length > 0 ? detectFileType(content) : describeKind("unknown");
    let fallbackExtension = extensionForContentType(part.contentType);
    if (fallbackExtension === ".bin" && detectedType.extension) {
      fallbackExtension = detectedType.extension;
    }
    this.counter += 1;
    const generatedName = this.names.claim(
      buildGeneratedName(originalName, this.messageKey, this.counter, fallbackExtension)
    );
    return {
      partId: part.id,
      originalName,
      generatedName,
      contentType: part.contentType,
      content,
      size: content.length,
      detectedType,
      validation: validate({ name: originalName, content, contentType: part.contentType }, this.policy),
      marker,
    };
  }

  private addAttachment(part: Part): Attachment {
    const index = this.attachments.length + 1;
    const fallback =
      part.contentType === "message/rfc822"
        ? "message.eml"
        : `attachment${extensionForContentType(part.contentType)}`;
    const attachment: Attachment = {
      index,
      ...this.buildFile(part, part.filename ?? fallback, attachmentMarker(index)),
    };
    this.attachments.push(attachment);
    return attachment;
  }

  private addImage(part: Part): InlineImage {
    const index = this.inlineImages.length + 1;
    const originalContentId = part.contentId ?? "";
    const seen = this.contentIdCounts.get(originalContentId) ?? 0;
    this.contentIdCounts.set(originalContentId, seen + 1);
    const contentId = seen === 0 ? originalContentId : `${originalContentId}_${seen}`;

    const fallback = sanitizeFilename(stripCid(originalContentId));
    const named = /\.[a-z0-9]+$/i.test(fallback) ? fallback : `${fallback}${extensionForContentType(part.contentType)}`;
    const image: InlineImage = {
      index,
      ...this.buildFile(part, part.filename ?? named, imageMarker(index)),
      contentId,
      originalContentId,
    };
    this.inlineImages.push(image);
    return image;
  }
}

interface AssembledBody {
  text: string;
  parts: BodyPart[];
  positions: PositionRef[];
}

function positionFor(
  item: Attachment | InlineImage,
  kind: "attachment" | "image",
  offset: number,
  anchor: PositionRef["anchor"]
): PositionRef {
  return {
    marker: item.marker,
    kind,
    index: item.index,
    partId: item.partId,
    originalName: item.originalName,
    generatedName: item.generatedName,
    offset,
    anchor,
  };
}

interface DecodedBody {
  part: Part;
  source: BodySource;
  charset: string;
  text: string;
  referenced: InlineImage[];
}

/**
 * Decode a body part. HTML is flattened to text, and `cid:` images it
 * references not yet claimed by an earlier body are replaced by their markers.
 */
function decodeBody(part: Part, source: BodySource, images: InlineImage[], placed: Set<InlineImage>): DecodedBody {
  const bytes = decodeTransferEncoding(part.raw, part.transferEncoding);
  const decoded = decodeText(bytes, part.contentTypeParams.charset ?? null);
  const referenced: InlineImage[] = [];
  let text = decoded.text;

  if (source === "html") {
    const html = text.replace(CID_IMAGE, (_tag: string, _quote: string, cid: string) => {
      const image = images.find((img) => img.originalContentId === cid && !placed.has(img));
      if (!image) return "";
      placed.add(image);
      referenced.push(image);
      return ` ${image.marker} `;
    });
    text = convert(html, HTML_OPTIONS);

    // Markers inside comments, scripts or the head do not survive conversion;
    // those images fall back to their part position
    for (const image of referenced.filter((img) => !text.includes(img.marker))) {
      placed.delete(image);
      referenced.splice(referenced.indexOf(image), 1);
    }
  }

  text = text.replace(/\r\n/g, "\n").replace(/\s+$/, "");
  return { part, source, charset: decoded.charset, text, referenced };
}

function assembleBody(events: ExtractionEvent[], images: InlineImage[]): AssembledBody {
  const blocks: string[] = [];
  const parts: BodyPart[] = [];
  const positions: PositionRef[] = [];
  const placed = new Set<InlineImage>();
  let length = 0;

  // Bodies are decoded before placing anything, so an image part that comes
  // ahead of the HTML referencing it is still marked only once
  const bodies = new Map<Part, DecodedBody>();
  for (const event of events) {
    if (event.type === "text") bodies.set(event.part, decodeBody(event.part, event.source, images, placed));
  }

  const push = (block: string): number => {
    const start = blocks.length === 0 ? 0 : length + 2;
    blocks.push(block);
    length = start + block.length;
    return start;
  };

  for (const event of events) {
    if (event.type === "text") {
      const body = bodies.get(event.part);
      if (!body) continue;
      parts.push({ partId: body.part.id, source: body.source, charset: body.charset, text: body.text });
      if (!body.text && body.referenced.length === 0) continue;

      const start = push(body.text);
      for (const image of body.referenced) {
        positions.push(positionFor(image, "image", start + body.text.indexOf(image.marker), "html_reference"));
      }
      continue;
    }

    if (event.type === "image" && placed.has(event.item)) continue;
    const start = push(event.item.marker);
    positions.push(positionFor(event.item, event.type, start, "part_position"));
  }

  positions.sort((a, b) => a.offset - b.offset);
  return { text: blocks.join("\n\n"), parts, positions };
}

function resolveMessageId(raw: Buffer | string, headerId: string | null, sourceId?: string): string {
  const cleaned = headerId?.trim().replace(/^<|>$/g, "");
  if (cleaned) return cleaned;
  if (sourceId) return sourceId;
  const digest = createHash("sha256").update(raw).digest("hex").slice(0, 16);
  return `generated-${digest}`;
}

/**
 * Extract body text, attachments and inline images from a raw message.
 *
 * @throws MalformedMessageError when the top-level structure is unparseable
 */
export function extract(raw: Buffer | string, options: ExtractOptions = {}): ExtractionResult {
  const message = parseMessage(raw);
  const messageId = resolveMessageId(raw, headerValue(message.headers, "message-id"), options.sourceId);
  const messageKey = messageKeyFor(messageId);

  const extraction = new Extraction(
    messageKey,
    options.policy ?? DEFAULT_CONFIG.security,
    options.names ?? new NameRegistry()
  );
  extraction.walk(message.root, true);

  const body = assembleBody(extraction.events, extraction.inlineImages);
  const parts: PartSummary[] = [...walkParts(message.root)].map((part) => ({
    id: part.id,
    contentType: part.contentType,
    size: part.raw.length,
    degraded: part.degraded,
  }));

  return {
    messageId,
    messageKey,
    headers: message.headers,
    subject: headerValue(message.headers, "subject"),
    from: headerValue(message.headers, "from"),
    to: headerValue(message.headers, "to"),
    date: headerValue(message.headers, "date"),
    bodyText: body.text,
    bodyParts: body.parts,
    attachments: extraction.attachments,
    inlineImages: extraction.inlineImages,
    positions: body.positions,
    parts,
    warnings: message.warnings,
  };
}
