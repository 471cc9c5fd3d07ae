/**
 * Message Scanner
 *
 * Inventories a message before processing: what each attachment really is,
 * which converter would take it, a rough page count and time estimate, and
 * a profile recommendation. Nothing is written and no external service is
 * called.
 */

import type { PipelineConfig } from "../config.js";
import type { ConverterId } from "../types/conversion.js";
import type { DetectedFileKind } from "../types/validation.js";
import type { Attachment } from "../types/message.js";
import type { ConverterRegistry } from "./converters/registry.js";
import { inspectPdf } from "./converters/ocr-converter.js";
import { readWorkbook } from "./converters/spreadsheet-converter.js";
import { readAppProperties } from "./converters/docx/metadata.js";
import { createXmlParser, openPackage } from "./converters/ooxml.js";
import type { NameRegistry } from "./filenames.js";
import { extract } from "./mime-extractor.js";

export type FileCategory = "pdf" | "document" | "spreadsheet" | "image" | "text" | "other";

export const COMPLEXITY_LEVELS = ["simple", "moderate", "complex", "very_complex"] as const;
export type ComplexityLevel = (typeof COMPLEXITY_LEVELS)[number];

export interface AttachmentScan {
  index: number;
  partId: string;
  originalName: string;
  generatedName: string;
  contentType: string;
  size: number;
  detectedKind: DetectedFileKind;
  category: FileCategory;
  complexity: ComplexityLevel;
  allowed: boolean;
  /** Converter that would handle it, null when none supports the format */
  converterId: ConverterId | null;
  converterEnabled: boolean;
  /** Pages (PDF, DOCX) when they can be told without converting */
  estimatedPages: number | null;
  sheetCount: number | null;
  estimatedSeconds: number;
  warnings: string[];
}

export interface MessageScan {
  messageId: string;
  messageKey: string;
  subject: string | null;
  from: string | null;
  date: string | null;
  size: number;
  bodySize: number;
  attachments: AttachmentScan[];
  inlineImageCount: number;
  /** 0 to 10 */
  complexityScore: number;
  estimatedSeconds: number;
  recommendedProfile: "quick" | "comprehensive" | "ai_ready";
  recommendations: string[];
  warnings: string[];
}

export interface ScanOptions {
  sourceId?: string;
  names?: NameRegistry;
}

const MiB = 1024 * 1024;

const CATEGORY_BY_KIND: Partial<Record<DetectedFileKind, FileCategory>> = {
  pdf: "pdf",
  docx: "document",
  xlsx: "spreadsheet",
  png: "image",
  jpeg: "image",
  gif: "image",
  bmp: "image",
  tiff: "image",
  webp: "image",
  text: "text",
};

/** Upper size bounds in MiB for simple, moderate and complex */
const COMPLEXITY_BOUNDS: Record<FileCategory, [number, number, number]> = {
  pdf: [1, 5, 20],
  document: [0.5, 2, 10],
  spreadsheet: [0.1, 1, 5],
  image: [1, 5, Infinity],
  text: [1, 5, Infinity],
  other: [1, 5, Infinity],
};

const SECONDS_PER_MIB: Record<FileCategory, number> = {
  pdf: 30,
  document: 5,
  spreadsheet: 3,
  image: 2,
  text: 1,
  other: 1,
};

const COMPLEXITY_POINTS: Record<ComplexityLevel, number> = {
  simple: 0.5,
  moderate: 1,
  complex: 2,
  very_complex: 3,
};

const AVERAGE_PDF_PAGE_BYTES = 75 * 1024;
const OCR_STARTUP_SECONDS = 5;
const MESSAGE_BASE_SECONDS = 5;

export function categorize(kind: DetectedFileKind): FileCategory {
  return CATEGORY_BY_KIND[kind] ?? "other";
}

export function complexityOf(category: FileCategory, size: number): ComplexityLevel {
  const mib = size / MiB;
  const [simple, moderate, complex] = COMPLEXITY_BOUNDS[category];
  if (mib < simple) return "simple";
  if (mib < moderate) return "moderate";
  if (mib < complex) return "complex";
  return "very_complex";
}

export function estimateSeconds(category: FileCategory, size: number): number {
  const seconds = Math.max(1, (size / MiB) * SECONDS_PER_MIB[category]);
  return Math.floor(category === "pdf" ? seconds + OCR_STARTUP_SECONDS : seconds);
}

/**
 * Overall score: body size, attachment count, the most complex attachment,
 * type diversity and total size each add points, capped at 10.
 */
export function complexityScore(attachments: readonly AttachmentScan[], bodySize: number): number {
  const bodyKib = bodySize / 1024;
  let score = bodyKib < 10 ? 0.2 : bodyKib < 50 ? 0.5 : 1;
  score += Math.min(2, attachments.length * 0.5);
  if (attachments.length > 0) {
    score += Math.max(...attachments.map((a) => COMPLEXITY_POINTS[a.complexity]));
  }
  score += Math.min(2, new Set(attachments.map((a) => a.category)).size * 0.5);
  const totalMib = attachments.reduce((sum, a) => sum + a.size, 0) / MiB;
  if (totalMib > 10) score += 0.5;
  if (totalMib > 50) score += 0.5;
  return Math.min(10, score);
}

function sizeWarnings(attachment: Attachment, category: FileCategory): string[] {
  const warnings: string[] = [];
  const mib = attachment.size / MiB;
  if (mib > 50) warnings.push(`Large file (${mib.toFixed(1)} MB) may take longer to process`);
  if (category === "pdf" && mib > 20) warnings.push("Large PDF may need significant OCR time");
  if (category === "spreadsheet" && mib > 10) warnings.push("Large spreadsheet may need extra memory");
  if (attachment.originalName.length > 255) warnings.push("Very long filename");
  return warnings;
}

async function estimateStructure(
  attachment: Attachment,
  category: FileCategory
): Promise<{ pages: number | null; sheets: number | null; warnings: string[] }> {
  if (category === "pdf") {
    const inspection = inspectPdf(attachment.content);
    const pages = inspection.pageCount ?? Math.max(1, Math.floor(attachment.size / AVERAGE_PDF_PAGE_BYTES));
    return { pages, sheets: null, warnings: inspection.warnings };
  }
  if (category !== "document" && category !== "spreadsheet") {
    return { pages: null, sheets: null, warnings: [] };
  }

  try {
    const zip = await openPackage(attachment.content, attachment.originalName);
    if (category === "spreadsheet") {
      const workbook = await readWorkbook(zip);
      return { pages: null, sheets: workbook.sheets.length, warnings: [] };
    }
    const app = await readAppProperties(zip, createXmlParser());
    return { pages: app.pages ?? null, sheets: null, warnings: [] };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { pages: null, sheets: null, warnings: [`Package could not be inspected: ${message}`] };
  }
}

function recommend(
  attachments: readonly AttachmentScan[],
  score: number,
  config: PipelineConfig
): { profile: MessageScan["recommendedProfile"]; recommendations: string[] } {
  const profile = score < 3 ? "quick" : score < 6 ? "comprehensive" : "ai_ready";
  const recommendations = [`Use the "${profile}" profile`];

  const pdfs = attachments.filter((a) => a.category === "pdf");
  if (pdfs.length > 0) {
    if (pdfs.some((a) => a.size > 5 * MiB)) {
      recommendations.push('Use OCR mode "text" for faster processing of large PDFs');
    } else {
      recommendations.push('Use OCR mode "all" to keep page images');
    }
  }
  const documents = attachments.filter((a) => a.category === "document");
  if (documents.length > 0) {
    recommendations.push("Enable chunking for language-model-ready document text");
    if (documents.some((a) => a.size > 2 * MiB)) {
      recommendations.push('Use the "semantic" chunking strategy for large documents');
    }
  }
  if (attachments.length > 5 && config.concurrency.attachments < 2) {
    recommendations.push("Raise attachment concurrency for messages with many attachments");
  }
  return { profile, recommendations };
}

export class MessageScanner {
  constructor(private readonly registry: ConverterRegistry) {}

  async scan(raw: Buffer | string, config: PipelineConfig, options: ScanOptions = {}): Promise<MessageScan> {
    const extraction = extract(raw, {
      policy: config.security,
      ...(options.names ? { names: options.names } : {}),
      ...(options.sourceId !== undefined ? { sourceId: options.sourceId } : {}),
    });

    const attachments: AttachmentScan[] = [];
    for (const attachment of extraction.attachments) {
      const category = categorize(attachment.detectedType.kind);
      const converter = this.registry.select(attachment, config);
      const structure = await estimateStructure(attachment, category);
      const warnings = [
        ...attachment.validation.warnings,
        ...structure.warnings,
        ...sizeWarnings(attachment, category),
      ];
      if (!attachment.validation.allowed) warnings.push(`Will be rejected: ${attachment.validation.reason}`);
      if (converter && !converter.isEnabled(config)) warnings.push(`The ${converter.id} converter is disabled`);

      attachments.push({
        index: attachment.index,
        partId: attachment.partId,
        originalName: attachment.originalName,
        generatedName: attachment.generatedName,
        contentType: attachment.contentType,
        size: attachment.size,
        detectedKind: attachment.detectedType.kind,
        category,
        complexity: complexityOf(category, attachment.size),
        allowed: attachment.validation.allowed,
        converterId: converter?.id ?? null,
        converterEnabled: converter?.isEnabled(config) ?? false,
        estimatedPages: structure.pages,
        sheetCount: structure.sheets,
        estimatedSeconds: estimateSeconds(category, attachment.size),
        warnings,
      });
    }

    const bodySize = extraction.bodyParts.reduce((sum, part) => sum + Buffer.byteLength(part.text), 0);
    const score = complexityScore(attachments, bodySize);
    const { profile, recommendations } = recommend(attachments, score, config);
    const size = typeof raw === "string" ? Buffer.byteLength(raw) : raw.length;

    const warnings = [...extraction.warnings];
    if (size > 100 * MiB) warnings.push(`Large message (${(size / MiB).toFixed(1)} MB)`);
    if (attachments.some((a) => a.category === "pdf") && !config.converters.ocr.enabled) {
      warnings.push("PDF attachments will be skipped while OCR is disabled");
    }

    let estimated = MESSAGE_BASE_SECONDS + attachments.reduce((sum, a) => sum + a.estimatedSeconds, 0);
    if (attachments.length > 1) estimated += attachments.length * 2;

    return {
      messageId: extraction.messageId,
      messageKey: extraction.messageKey,
      subject: extraction.subject,
      from: extraction.from,
      date: extraction.date,
      size,
      bodySize,
      attachments,
      inlineImageCount: extraction.inlineImages.length,
      complexityScore: score,
      estimatedSeconds: estimated,
      recommendedProfile: profile,
      recommendations,
      warnings,
    };
  }
}
