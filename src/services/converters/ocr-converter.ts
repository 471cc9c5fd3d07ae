/**
 * OCR Converter
 *
 * Converts PDFs (and, when enabled, scanned images) to markdown through an
 * OCR service. The document is uploaded once, processed in page batches and
 * released afterwards. Every service call goes through the endpoint's
 * circuit breaker and the retry policy; a process-wide semaphore caps
 * concurrent calls.
 */

import { createHash } from "node:crypto";
import type { OcrConfig, PipelineConfig } from "../../config.js";
import type { ConversionResult, ConvertibleFile, ExtractedImageRef } from "../../types/conversion.js";
import type { DetectedFileKind } from "../../types/validation.js";
import type { CircuitBreakerRegistry } from "../circuit-breaker.js";
import { Semaphore } from "../concurrency.js";
import {
  CancelledError,
  ConfigurationError,
  ExternalServiceError,
  ServiceUnavailableError,
} from "../errors.js";
import { detectFileType } from "../file-signatures.js";
import type { OcrImage, OcrPage, OcrService } from "../ocr-client.js";
import { callResilient, type RetryOptions, type RetryPolicy } from "../retry.js";
import { assertConvertible, displayStem, outputDirFor, throwIfCancelled } from "./common.js";
import type { ConversionContext, Converter } from "./types.js";
import { withWorkspace } from "./workspace.js";

const IMAGE_KINDS: readonly DetectedFileKind[] = ["png", "jpeg", "tiff"];

export interface PdfInspection {
  /** Page objects counted in the file, null when none were found */
  pageCount: number | null;
  encrypted: boolean;
  warnings: string[];
}

/**
 * Cheap structural checks on a PDF: header position, encryption dictionary,
 * trailing %%EOF marker and a page-object count.
 */
export function inspectPdf(content: Uint8Array): PdfInspection {
  const text = Buffer.from(content.buffer, content.byteOffset, content.byteLength).toString("latin1");
  const warnings: string[] = [];

  const header = text.indexOf("%PDF-");
  if (header === -1) warnings.push("PDF header not found");
  else if (header > 0) warnings.push(`PDF header found at offset ${header}, expected 0`);

  const encrypted = /\/Encrypt\b/.test(text);
  if (encrypted) warnings.push("PDF is encrypted; OCR may fail or return no text");

  if (!text.slice(-1024).includes("%%EOF")) {
    warnings.push("PDF trailer (%%EOF) missing; the file may be truncated");
  }

  const pages = text.match(/\/Type\s*\/Page(?!s)\b/g)?.length ?? 0;
  return { pageCount: pages > 0 ? pages : null, encrypted, warnings };
}

/** Page batches of 0-based indices; a single whole-document batch when disabled. */
export function planBatches(pageCount: number | null, batchSize: number): Array<number[] | null> {
  if (batchSize <= 0 || pageCount === null || pageCount <= batchSize) return [null];
  const batches: number[][] = [];
  for (let start = 0; start < pageCount; start += batchSize) {
    batches.push(Array.from({ length: Math.min(batchSize, pageCount - start) }, (_, i) => start + i));
  }
  return batches;
}

function describePages(pages: number[] | null): string {
  if (!pages || pages.length === 0) return "all pages";
  const first = (pages[0] ?? 0) + 1;
  const last = (pages[pages.length - 1] ?? 0) + 1;
  return first === last ? `page ${first}` : `pages ${first}-${last}`;
}

function keepImage(image: OcrImage, minSize: number): boolean {
  if (image.base64 === null) return false;
  if (minSize <= 0 || image.width === null || image.height === null) return true;
  return image.width >= minSize && image.height >= minSize;
}

function decodeImage(base64: string): Buffer {
  return Buffer.from(base64.replace(/^data:[^,]*,/, ""), "base64");
}

function escapeLinkTarget(target: string): string {
  return target.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface CallState {
  retries: number;
}

export interface OcrConverterOptions {
  /** null when OCR is switched off and no client was built */
  service: OcrService | null;
  breakers: CircuitBreakerRegistry;
  /** Caps concurrent service calls; defaults to two permits */
  limiter?: Semaphore;
  /** Backoff sleep, injected by tests */
  sleep?: RetryOptions["sleep"];
}

export class OcrConverter implements Converter {
  readonly id = "ocr" as const;
  private readonly client: OcrService | null;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly limiter: Semaphore;
  private readonly sleep: RetryOptions["sleep"];

  constructor(options: OcrConverterOptions) {
    this.client = options.service;
    this.breakers = options.breakers;
    this.limiter = options.limiter ?? new Semaphore(2);
    this.sleep = options.sleep;
  }

  supports(file: ConvertibleFile, config: PipelineConfig): boolean {
    const kind = file.detectedType.kind;
    return kind === "pdf" || (config.converters.ocr.scanImages && IMAGE_KINDS.includes(kind));
  }

  isEnabled(config: PipelineConfig): boolean {
    return config.converters.ocr.enabled;
  }

  private get service(): OcrService {
    if (!this.client) {
      throw new ConfigurationError("OCR converter has no service configured");
    }
    return this.client;
  }

  private async call<T>(
    state: CallState,
    context: ConversionContext,
    operation: string,
    fn: () => Promise<T>
  ): Promise<T> {
    const { resilience } = context.config;
    const policy: RetryPolicy = {
      maxRetries: resilience.maxRetries,
      baseDelayMs: resilience.baseDelayMs,
      multiplier: resilience.backoffMultiplier,
      maxDelayMs: resilience.maxDelayMs,
    };
    const breaker = this.breakers.get(this.service.endpoint);
    const attempt = () => this.limiter.withPermit(fn, context.signal);
    const options: RetryOptions = {
      onRetry: ({ attempt: n, delayMs, error }) => {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[OCR] ${operation} retry ${n} in ${delayMs}ms: ${message}`);
      },
      ...(context.signal ? { signal: context.signal } : {}),
      ...(this.sleep ? { sleep: this.sleep } : {}),
    };

    const run = async () => {
      try {
        const outcome = await callResilient(breaker, policy, attempt, options);
        state.retries += outcome.retries;
        return outcome.value;
      } catch (err) {
        if (err instanceof ExternalServiceError) state.retries += Math.max(0, err.attempts - 1);
        throw err;
      }
    };
    return context.timing ? context.timing.time(`ocr.${operation}`, run) : run();
  }

  async convert(file: ConvertibleFile, context: ConversionContext): Promise<ConversionResult> {
    const settings: OcrConfig = context.config.converters.ocr;
    assertConvertible(file, {
      label: "OCR",
      maxBytes: settings.maxBytes,
      kinds: settings.scanImages ? ["pdf", ...IMAGE_KINDS] : ["pdf"],
    });
    throwIfCancelled(context.signal);

    const startedAt = context.now();
    const isPdf = file.detectedType.kind === "pdf";
    const inspection: PdfInspection = isPdf
      ? inspectPdf(file.content)
      : { pageCount: 1, encrypted: false, warnings: [] };
    const warnings = [...inspection.warnings];
    const batches = planBatches(inspection.pageCount, settings.pageBatchSize);
    if (settings.pageBatchSize > 0 && inspection.pageCount === null) {
      warnings.push("Page count unknown; sending the whole document in one request");
    }

    const state: CallState = { retries: 0 };
    const includeImages = settings.mode !== "text";
    const pages = new Map<number, OcrPage>();
    const failedPages = new Set<number>();
    let failedWhole = false;
    let lastError: unknown = null;

    console.log(`[OCR] Converting ${file.originalName} (${batches.length} request(s), mode ${settings.mode})`);
    const ref = await this.call(state, context, "upload", () =>
      this.service.upload(file.content, file.originalName, context.signal)
    );

    try {
      for (const [position, batch] of batches.entries()) {
        throwIfCancelled(context.signal);
        try {
          const result = await this.call(state, context, "process", () =>
            this.service.process(ref, {
              includeImages,
              imageLimit: settings.imageLimit,
              imageMinSize: settings.imageMinSize,
              ...(batch ? { pages: batch } : {}),
              ...(context.signal ? { signal: context.signal } : {}),
            })
          );
          for (const page of result) pages.set(page.index, page);
        } catch (err) {
          if (err instanceof CancelledError) throw err;
          lastError = err;
          const message = err instanceof Error ? err.message : String(err);
          const remaining = err instanceof ServiceUnavailableError ? batches.slice(position) : [batch];
          for (const skipped of remaining) {
            if (skipped === null) failedWhole = true;
            else skipped.forEach((page) => failedPages.add(page));
            warnings.push(`OCR failed for ${describePages(skipped)}: ${message}`);
          }
          console.warn(`[OCR] ${file.originalName} ${describePages(batch)} failed: ${message}`);
          if (err instanceof ServiceUnavailableError) break;
        }
      }
    } finally {
      await this.service.release(ref).catch((err: unknown) => {
        console.warn(`[OCR] Could not release upload ${ref.fileId}:`, err);
      });
    }

    if (pages.size === 0 && lastError !== null) {
      if (lastError instanceof ExternalServiceError) throw lastError;
      throw new ExternalServiceError("server", `OCR failed for every page of ${file.originalName}`, {
        cause: lastError,
      });
    }

    const outputDir = outputDirFor(this.id, file, context.now());
    const stem = displayStem(file);
    const ordered = [...pages.values()].sort((a, b) => a.index - b.index);
    const pageCount = Math.max(inspection.pageCount ?? 0, (ordered[ordered.length - 1]?.index ?? -1) + 1);

    return withWorkspace(context.fs, "ocr-", async (workspace) => {
      const images: ExtractedImageRef[] = [];
      /** Image ids are only unique within a page */
      const renamed = new Map<number, Map<string, string>>();

      if (includeImages) {
        for (const page of ordered) {
          let ordinal = 0;
          const pageNames = new Map<string, string>();
          renamed.set(page.index, pageNames);
          for (const image of page.images) {
            if (settings.imageLimit > 0 && images.length >= settings.imageLimit) break;
            if (!keepImage(image, settings.imageMinSize) || image.base64 === null) continue;
            ordinal++;
            const bytes = decodeImage(image.base64);
            const detected = detectFileType(bytes);
            const extension = detected.kind === "unknown" || detected.kind === "text" ? ".png" : detected.extension;
            const pageLabel = String(page.index + 1).padStart(2, "0");
            const name = `images/${stem}_page_${pageLabel}_image_${String(ordinal).padStart(2, "0")}${extension}`;
            await workspace.write(name, bytes);
            pageNames.set(image.id, name);
            images.push({
              path: `${outputDir}/${name}`,
              sha256: createHash("sha256").update(bytes).digest("hex"),
              size: bytes.length,
              mimeType: detected.kind === "unknown" || detected.kind === "text" ? "image/png" : detected.mimeType,
              ...(image.width !== null ? { width: image.width } : {}),
              ...(image.height !== null ? { height: image.height } : {}),
              page: page.index + 1,
            });
          }
        }
      }

      const body =
        settings.mode === "images"
          ? ""
          : this.joinPages(ordered, failedPages, pageCount, settings.pageSeparator, renamed);
      const imageSection =
        images.length > 0
          ? "## Extracted Images\n\n" +
            images.map((img, i) => `![Image ${i + 1}](${img.path.slice(outputDir.length + 1)})`).join("\n\n") +
            "\n"
          : "";
      const header = [
        "---",
        `source_file: ${JSON.stringify(file.originalName)}`,
        `converter: ${this.id}`,
        `extraction_mode: ${settings.mode}`,
        `conversion_time: ${startedAt.toISOString()}`,
        `file_size: ${file.content.length} bytes`,
        `pages: ${pageCount}`,
        "---",
        "",
        `# ${isPdf ? "PDF" : "Image"} Conversion: ${file.originalName}`,
        "",
        "",
      ].join("\n");
      const outputText = [body, imageSection].filter((part) => part !== "").join("\n\n");
      await workspace.write(`${stem}.md`, header + outputText);

      const outputs = await workspace.commit(outputDir);
      const partial = failedPages.size > 0 || failedWhole;
      console.log(
        `[OCR] ${file.originalName}: ${ordered.length} page(s), ${images.length} image(s), ${state.retries} retr${state.retries === 1 ? "y" : "ies"}`
      );

      return {
        converterId: this.id,
        outputText,
        outputDir,
        outputs,
        images,
        metadata: {
          model: settings.model,
          mode: settings.mode,
          pageCount,
          pagesConverted: ordered.length,
          failedPages: [...failedPages].sort((a, b) => a - b).map((p) => p + 1),
          encrypted: inspection.encrypted,
          imageCount: images.length,
        },
        partial,
        retries: state.retries,
        warnings,
      };
    });
  }

  private joinPages(
    pages: readonly OcrPage[],
    failed: ReadonlySet<number>,
    pageCount: number,
    separator: string,
    renamed: ReadonlyMap<number, ReadonlyMap<string, string>>
  ): string {
    const byIndex = new Map(pages.map((page) => [page.index, page]));
    const parts: string[] = [];
    for (let index = 0; index < pageCount; index++) {
      const page = byIndex.get(index);
      if (page) {
        let markdown = page.markdown;
        for (const [id, name] of renamed.get(index) ?? []) {
          markdown = markdown.replace(new RegExp(`\\]\\(${escapeLinkTarget(id)}\\)`, "g"), `](${name})`);
        }
        parts.push(markdown);
      } else if (failed.has(index)) {
        parts.push(`<!-- page ${index + 1}: OCR failed -->`);
      }
    }
    return parts.join(separator);
  }
}
