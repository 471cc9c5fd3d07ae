/**
 * MIME Parser
 *
 * Builds the part tree of a raw message. The message is handled as a latin1
 * string so every byte maps to one code unit and part bodies can be sliced
 * back into exact bytes.
 *
 * Multipart bodies are split by comparing each line against the delimiter
 * string; no pattern is compiled from the boundary, so any character is
 * allowed in it.
 */

import type { Disposition, HeaderField, Message, Part } from "../types/message.js";
import { MalformedMessageError } from "./errors.js";
import { decodeHeaderValue, decodeRawHeaderBytes, parseHeaderParams } from "./mime-decoding.js";

/** Containers nested deeper than this are kept as single parts */
export const MAX_PART_DEPTH = 32;

const HEADER_LINE = /^[\x21-\x39\x3b-\x7e]+[ \t]*:/;

interface RawEntity {
  headers: HeaderField[];
  body: string;
}

/**
 * Parse a header block into fields, unfolding continuation lines.
 * Values are returned as written (not decoded).
 */
export function parseHeaderBlock(block: string): HeaderField[] {
  const fields: HeaderField[] = [];
  for (const line of block.split(/\r?\n/)) {
    const last = fields[fields.length - 1];
    if (/^[ \t]/.test(line)) {
      if (last) last.value += ` ${line.trim()}`;
      continue;
    }
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    fields.push({ name: line.slice(0, colon).trim(), value: line.slice(colon + 1).trim() });
  }
  return fields;
}

/**
 * First value of a header, case-insensitive.
 */
export function headerValue(headers: HeaderField[], name: string): string | null {
  const lower = name.toLowerCase();
  return headers.find((h) => h.name.toLowerCase() === lower)?.value ?? null;
}

function splitEntity(text: string): RawEntity {
  if (text.startsWith("\r\n") || text.startsWith("\n")) {
    return { headers: [], body: text.slice(text.startsWith("\r\n") ? 2 : 1) };
  }
  const match = /\r?\n\r?\n/.exec(text);
  if (!match) {
    return { headers: parseHeaderBlock(text), body: "" };
  }
  return {
    headers: parseHeaderBlock(text.slice(0, match.index)),
    body: text.slice(match.index + match[0].length),
  };
}

function stripTrailingNewline(text: string): string {
  if (text.endsWith("\r\n")) return text.slice(0, -2);
  if (text.endsWith("\n")) return text.slice(0, -1);
  return text;
}

export interface MultipartSplit {
  parts: string[];
  /** Whether the closing delimiter was found */
  closed: boolean;
}

/**
 * Split a multipart body on its boundary. Returns null when no delimiter
 * line occurs at all. The preamble and epilogue are discarded.
 */
export function splitMultipart(body: string, boundary: string): MultipartSplit | null {
  const delimiter = `--${boundary}`;
  const parts: string[] = [];
  let partStart = -1;
  let pos = 0;

  while (pos <= body.length) {
    const eol = body.indexOf("\n", pos);
    const lineEnd = eol === -1 ? body.length : eol;
    const line = body.slice(pos, lineEnd).replace(/[\r \t]+$/, "");

    if (line.startsWith(delimiter)) {
      const rest = line.slice(delimiter.length);
      if (rest === "" || rest === "--") {
        if (partStart !== -1) {
          parts.push(stripTrailingNewline(body.slice(partStart, pos)));
        }
        if (rest === "--") return { parts, closed: true };
        partStart = eol === -1 ? body.length : eol + 1;
      }
    }

    if (eol === -1) break;
    pos = eol + 1;
  }

  if (partStart === -1) return null;
  parts.push(body.slice(partStart));
  return { parts, closed: false };
}

function parseDisposition(value: string | null): {
  disposition: Disposition | null;
  params: Record<string, string>;
} {
  if (value === null) return { disposition: null, params: {} };
  const parsed = parseHeaderParams(value);
  const kind = parsed.value.toLowerCase();
  const disposition: Disposition | null =
    kind === "inline" ? "inline" : kind === "" ? null : "attachment";
  return { disposition, params: parsed.params };
}

class PartBuilder {
  readonly warnings: string[] = [];

  build(
    entity: RawEntity,
    id: string,
    parentId: string | null,
    depth: number,
    defaultType: string
  ): Part {
    const { headers, body } = entity;
    const contentTypeHeader = parseHeaderParams(headerValue(headers, "content-type") ?? defaultType);
    let contentType = contentTypeHeader.value.toLowerCase();
    if (!/^[a-z0-9.+-]+\/[a-z0-9.+-]+$/.test(contentType)) {
      if (contentType) this.warnings.push(`Part ${id}: invalid content type "${contentType}"`);
      contentType = defaultType;
    }

    const { disposition, params: dispositionParams } = parseDisposition(
      headerValue(headers, "content-disposition")
    );
    const contentId = headerValue(headers, "content-id")?.trim().replace(/^<|>$/g, "") || null;

    const part: Part = {
      id,
      parentId,
      headers: headers.map((h) => ({ name: h.name, value: decodeHeaderValue(decodeRawHeaderBytes(h.value)) })),
      contentType,
      contentTypeParams: contentTypeHeader.params,
      transferEncoding: (headerValue(headers, "content-transfer-encoding") ?? "7bit").trim().toLowerCase(),
      disposition,
      filename: dispositionParams.filename ?? contentTypeHeader.params.name ?? null,
      contentId,
      raw: Buffer.from(body, "latin1"),
      children: [],
      degraded: false,
    };

    if (contentType.startsWith("multipart/")) {
      this.buildChildren(part, body, depth);
    } else if (contentType === "message/rfc822" && disposition !== "attachment") {
      if (depth + 1 >= MAX_PART_DEPTH) {
        this.warnings.push(`Part ${id}: embedded message nested too deeply, kept as attachment`);
      } else {
        part.children.push(this.build(splitEntity(body), `${id}.1`, id, depth + 1, "text/plain"));
      }
    }
    return part;
  }

  private buildChildren(part: Part, body: string, depth: number): void {
    const boundary = part.contentTypeParams.boundary;
    if (!boundary) {
      this.degrade(part, "multipart without boundary parameter");
      return;
    }
    if (depth + 1 >= MAX_PART_DEPTH) {
      this.degrade(part, `nesting deeper than ${MAX_PART_DEPTH}`);
      return;
    }

    const split = splitMultipart(body, boundary);
    if (!split) {
      this.degrade(part, `boundary "${boundary}" not found`);
      return;
    }
    if (!split.closed) {
      this.warnings.push(`Part ${part.id}: closing boundary missing, kept remaining content`);
    }

    const childType = part.contentType === "multipart/digest" ? "message/rfc822" : "text/plain";
    split.parts.forEach((text, i) => {
      part.children.push(this.build(splitEntity(text), `${part.id}.${i + 1}`, part.id, depth + 1, childType));
    });
  }

  private degrade(part: Part, reason: string): void {
    this.warnings.push(`Part ${part.id}: ${reason}; treated as a single text part`);
    part.contentType = "text/plain";
    part.degraded = true;
  }
}

/**
 * Parse a raw message into its part tree.
 *
 * @throws MalformedMessageError when the input is empty or does not start
 *   with a header block
 */
export function parseMessage(raw: Buffer | string): Message {
  const bytes = typeof raw === "string" ? Buffer.from(raw, "utf-8") : raw;
  let text = bytes.toString("latin1");

  if (text.trim() === "") {
    throw new MalformedMessageError("Message is empty");
  }

  // mbox "From " separator line
  if (text.startsWith("From ")) {
    const eol = text.indexOf("\n");
    text = eol === -1 ? "" : text.slice(eol + 1);
  }
  text = text.replace(/^(\r?\n)+/, "");

  if (!HEADER_LINE.test(text)) {
    throw new MalformedMessageError("Message does not start with a header block");
  }

  const entity = splitEntity(text);
  if (entity.headers.length === 0) {
    throw new MalformedMessageError("Message has no parseable headers");
  }

  const builder = new PartBuilder();
  const root = builder.build(entity, "1", null, 0, "text/plain");
  return {
    headers: root.headers,
    root,
    warnings: builder.warnings,
  };
}

/**
 * Depth-first walk in document order.
 */
export function* walkParts(part: Part): Generator<Part> {
  yield part;
  for (const child of part.children) {
    yield* walkParts(child);
  }
}
