/**
 * File type detection from magic bytes.
 *
 * The declared extension of an attachment is untrusted; these checks look at
 * the leading bytes (and, for ZIP containers, the entry names) instead.
 */

import type { DetectedFileKind, DetectedFileType } from "../types/validation.js";

interface Signature {
  kind: DetectedFileKind;
  offset: number;
  bytes: readonly number[];
  /** Extra check for short or offset signatures */
  verify?: (buffer: Uint8Array) => boolean;
}

const SIGNATURES: readonly Signature[] = [
  { kind: "pdf", offset: 0, bytes: [0x25, 0x50, 0x44, 0x46, 0x2d] }, // %PDF-
  { kind: "png", offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { kind: "jpeg", offset: 0, bytes: [0xff, 0xd8, 0xff] },
  { kind: "gif", offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] }, // GIF8
  {
    kind: "bmp",
    offset: 0,
    bytes: [0x42, 0x4d],
    // reserved header words are zero
    verify: (b) => b.length >= 14 && b[6] === 0 && b[7] === 0 && b[8] === 0 && b[9] === 0,
  },
  { kind: "tiff", offset: 0, bytes: [0x49, 0x49, 0x2a, 0x00] },
  { kind: "tiff", offset: 0, bytes: [0x4d, 0x4d, 0x00, 0x2a] },
  {
    kind: "webp",
    offset: 8,
    bytes: [0x57, 0x45, 0x42, 0x50], // RIFF....WEBP
    verify: (b) => b[0] === 0x52 && b[1] === 0x49 && b[2] === 0x46 && b[3] === 0x46,
  },
  { kind: "zip", offset: 0, bytes: [0x50, 0x4b, 0x03, 0x04] },
  { kind: "zip", offset: 0, bytes: [0x50, 0x4b, 0x05, 0x06] }, // empty archive
  { kind: "ole", offset: 0, bytes: [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1] },
  { kind: "gzip", offset: 0, bytes: [0x1f, 0x8b] },
];

const KIND_INFO: Record<DetectedFileKind, { mimeType: string; extension: string }> = {
  pdf: { mimeType: "application/pdf", extension: ".pdf" },
  png: { mimeType: "image/png", extension: ".png" },
  jpeg: { mimeType: "image/jpeg", extension: ".jpg" },
  gif: { mimeType: "image/gif", extension: ".gif" },
  bmp: { mimeType: "image/bmp", extension: ".bmp" },
  tiff: { mimeType: "image/tiff", extension: ".tiff" },
  webp: { mimeType: "image/webp", extension: ".webp" },
  zip: { mimeType: "application/zip", extension: ".zip" },
  docx: {
    mimeType: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
    extension: ".docx",
  },
  xlsx: {
    mimeType: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    extension: ".xlsx",
  },
  pptx: {
    mimeType: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
    extension: ".pptx",
  },
  ole: { mimeType: "application/x-ole-storage", extension: "" },
  gzip: { mimeType: "application/gzip", extension: ".gz" },
  text: { mimeType: "text/plain", extension: ".txt" },
  unknown: { mimeType: "application/octet-stream", extension: "" },
};

/**
 * Which detected kinds are acceptable for a declared extension.
 * Extensions not listed are not signature-checked.
 */
const EXTENSION_KINDS: Record<string, readonly DetectedFileKind[]> = {
  ".pdf": ["pdf"],
  ".png": ["png"],
  ".jpg": ["jpeg"],
  ".jpeg": ["jpeg"],
  ".gif": ["gif"],
  ".bmp": ["bmp"],
  ".tif": ["tiff"],
  ".tiff": ["tiff"],
  ".webp": ["webp"],
  ".docx": ["docx"],
  ".xlsx": ["xlsx"],
  ".xlsm": ["xlsx"],
  ".pptx": ["pptx"],
  ".zip": ["zip", "docx", "xlsx", "pptx"],
  ".doc": ["ole"],
  ".xls": ["ole"],
  ".ppt": ["ole"],
  ".msg": ["ole"],
  ".gz": ["gzip"],
  ".txt": ["text"],
  ".csv": ["text"],
  ".html": ["text"],
  ".htm": ["text"],
  ".eml": ["text"],
  ".json": ["text"],
  ".xml": ["text"],
};

function matches(buffer: Uint8Array, signature: Signature): boolean {
  if (buffer.length < signature.offset + signature.bytes.length) return false;
  if (!signature.bytes.every((byte, i) => buffer[signature.offset + i] === byte)) return false;
  return signature.verify ? signature.verify(buffer) : true;
}

/**
 * Refine a ZIP container into an OOXML kind by looking for its main part.
 * Local file headers store entry names uncompressed.
 */
function refineZip(buffer: Uint8Array): DetectedFileKind {
  const names = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength).toString("latin1");
  if (names.includes("word/document.xml") || names.includes("word/_rels")) return "docx";
  if (names.includes("xl/workbook.xml") || names.includes("xl/_rels")) return "xlsx";
  if (names.includes("ppt/presentation.xml")) return "pptx";
  return "zip";
}

/**
 * Heuristic text check over the first 4 KiB: no NUL bytes and few control
 * characters.
 */
export function isLikelyText(buffer: Uint8Array): boolean {
  const sample = buffer.subarray(0, 4096);
  if (sample.length === 0) return false;
  let control = 0;
  for (const byte of sample) {
    if (byte === 0) return false;
    if (byte < 0x09 || (byte > 0x0d && byte < 0x20)) control++;
  }
  return control / sample.length < 0.1;
}

export function describeKind(kind: DetectedFileKind): DetectedFileType {
  return { kind, ...KIND_INFO[kind] };
}

/**
 * Detect the true type of a file from its content.
 */
export function detectFileType(buffer: Uint8Array): DetectedFileType {
  for (const signature of SIGNATURES) {
    if (!matches(buffer, signature)) continue;
    const kind = signature.kind === "zip" ? refineZip(buffer) : signature.kind;
    return describeKind(kind);
  }
  return describeKind(isLikelyText(buffer) ? "text" : "unknown");
}

/**
 * Whether the detected type is consistent with the declared extension.
 * Returns null when the extension carries no expectation.
 */
export function isConsistentWithExtension(
  extension: string,
  detected: DetectedFileType
): boolean | null {
  const expected = EXTENSION_KINDS[extension.toLowerCase()];
  if (!expected) return null;
  return expected.includes(detected.kind);
}
