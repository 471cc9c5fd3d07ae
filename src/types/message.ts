/**
 * MIME message model and extraction results.
 */

import type { DetectedFileType, ValidationOutcome } from "./validation.js";

export interface HeaderField {
  /** Header name as written */
  name: string;
  /** Unfolded, encoded-word decoded value */
  value: string;
}

export type Disposition = "inline" | "attachment";

/**
 * One node of the MIME tree. Children are owned exclusively; `parentId` is
 * kept for diagnostics only.
 */
export interface Part {
  /** Dotted path, root is "1", its children "1.1", "1.2", ... */
  id: string;
  parentId: string | null;
  headers: HeaderField[];
  /** Lower-case "type/subtype" */
  contentType: string;
  contentTypeParams: Record<string, string>;
  /** Lower-case transfer encoding, "7bit" when absent */
  transferEncoding: string;
  disposition: Disposition | null;
  /** filename from Content-Disposition, falling back to the Content-Type name */
  filename: string | null;
  /** Content-ID without angle brackets */
  contentId: string | null;
  /** Body bytes as found in the message, still transfer-encoded */
  raw: Buffer;
  children: Part[];
  /** Set when a container could not be split and was kept as one leaf */
  degraded: boolean;
}

export interface Message {
  headers: HeaderField[];
  root: Part;
  warnings: string[];
}

export type BodySource = "plain" | "html";

export interface BodyPart {
  partId: string;
  source: BodySource;
  charset: string;
  text: string;
}

export type MarkerKind = "attachment" | "image";

/** Links a marker in the body text to the artifact it stands for. */
export interface PositionRef {
  marker: string;
  kind: MarkerKind;
  /** 1-based index within attachments or inline images */
  index: number;
  partId: string;
  originalName: string;
  generatedName: string;
  /** Character offset of the marker in the body text */
  offset: number;
  /** Where the marker was placed from */
  anchor: "html_reference" | "part_position";
}

interface ExtractedFile {
  index: number;
  partId: string;
  originalName: string;
  /** Sanitized, globally unique output name */
  generatedName: string;
  /** Declared content type */
  contentType: string;
  content: Buffer;
  size: number;
  detectedType: DetectedFileType;
  validation: ValidationOutcome;
  marker: string;
}

export type Attachment = ExtractedFile;

export interface InlineImage extends ExtractedFile {
  /** Content-ID after duplicate suffixing */
  contentId: string;
  /** Content-ID as it appeared in the message */
  originalContentId: string;
}

export interface PartSummary {
  id: string;
  contentType: string;
  size: number;
  degraded: boolean;
}

export interface ExtractionResult {
  messageId: string;
  /** Short stable key derived from the message id, used in file names */
  messageKey: string;
  headers: HeaderField[];
  subject: string | null;
  from: string | null;
  to: string | null;
  date: string | null;
  /** Body text with positional markers */
  bodyText: string;
  bodyParts: BodyPart[];
  attachments: Attachment[];
  inlineImages: InlineImage[];
  positions: PositionRef[];
  parts: PartSummary[];
  warnings: string[];
}
