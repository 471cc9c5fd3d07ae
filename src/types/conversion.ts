/**
 * Converter results.
 */

import type { Chunk } from "./chunk.js";
import type { Attachment } from "./message.js";

export const CONVERTER_IDS = ["spreadsheet", "ocr", "document"] as const;
export type ConverterId = (typeof CONVERTER_IDS)[number];

export interface ExtractedImageRef {
  /** Path of the written image, relative to the output root */
  path: string;
  sha256: string;
  size: number;
  mimeType: string;
  width?: number;
  height?: number;
  /** 1-based page the image was found on (OCR only) */
  page?: number;
}

export interface ConversionResult {
  converterId: ConverterId;
  /** Converted text or markup */
  outputText: string;
  /** Directory holding the converted set, relative to the output root */
  outputDir: string;
  /** Every written file, relative to the output root */
  outputs: string[];
  images: ExtractedImageRef[];
  metadata: Record<string, unknown>;
  chunks?: Chunk[];
  /** Some pages or sheets failed while others succeeded */
  partial: boolean;
  /** Retries spent on external calls */
  retries: number;
  warnings: string[];
}

/** What a converter reads from an attachment. */
export type ConvertibleFile = Pick<
  Attachment,
  "originalName" | "generatedName" | "contentType" | "content" | "detectedType"
>;
