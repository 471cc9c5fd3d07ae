/**
 * Orchestrator
 *
 * Routes each extracted attachment to a converter and collects the outcome.
 * Attachment-level failures are recorded in the report and never escape.
 */

import type { PipelineConfig } from "../config.js";
import type { OutputFileSystem } from "../storage/filesystem.js";
import type { Attachment, ExtractionResult } from "../types/message.js";
import type { AttachmentOutcome, ProcessingReport, ReportStatus, ReportSummary } from "../types/report.js";
import { mapWithConcurrency } from "./concurrency.js";
import type { ConverterRegistry } from "./converters/registry.js";
import {
  CancelledError,
  ExternalServiceError,
  summarizeError,
  toPipelineError,
  UnsupportedFormatError,
} from "./errors.js";
import { assertAllowed } from "./security-validator.js";
import type { TimingCollector } from "./timing.js";

export interface ProcessOptions {
  signal?: AbortSignal;
  /** generatedName -> where the original attachment was preserved */
  preservedPaths?: ReadonlyMap<string, string>;
  timing?: TimingCollector;
}

export function summarize(outcomes: readonly AttachmentOutcome[]): ReportSummary {
  const counts: ReportSummary = {
    converted: 0,
    partial: 0,
    failed: 0,
    rejected: 0,
    unsupported: 0,
    skipped: 0,
    cancelled: 0,
    total: outcomes.length,
  };
  for (const outcome of outcomes) counts[outcome.status]++;
  return counts;
}

/**
 * Overall status. Rejected, unsupported and skipped attachments are
 * decisions, not failures.
 */
export function reportStatus(summary: ReportSummary, cancelled: boolean): ReportStatus {
  if (cancelled && summary.cancelled > 0) return "cancelled";
  const attempted = summary.converted + summary.partial + summary.failed;
  if (summary.failed > 0 && summary.failed === attempted) return "failed";
  if (summary.failed > 0 || summary.partial > 0) return "partial";
  return "success";
}

export class Orchestrator {
  constructor(
    private readonly registry: ConverterRegistry,
    private readonly fs: OutputFileSystem,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Convert every attachment of an extracted message.
   */
  async process(
    extraction: ExtractionResult,
    config: PipelineConfig,
    options: ProcessOptions = {}
  ): Promise<ProcessingReport> {
    const startedAt = this.now();
    const cancelledIndexes: number[] = [];

    const outcomes = await mapWithConcurrency(
      extraction.attachments,
      config.concurrency.attachments,
      (attachment) => this.processAttachment(attachment, config, options),
      {
        ...(options.signal ? { signal: options.signal } : {}),
        onCancelled: (index) => cancelledIndexes.push(index),
      }
    );

    for (const index of cancelledIndexes) {
      const attachment = extraction.attachments[index];
      if (!attachment) continue;
      outcomes.push({
        ...this.baseOutcome(attachment),
        status: "cancelled",
        reason: "Cancelled before conversion started",
      });
    }
    outcomes.sort((a, b) => a.index - b.index);

    const summary = summarize(outcomes);
    const status = reportStatus(summary, options.signal?.aborted ?? false);
    console.log(
      `[Pipeline] ${extraction.messageKey}: ${summary.converted} converted, ${summary.partial} partial, ` +
        `${summary.failed} failed, ${summary.rejected} rejected, ${summary.unsupported} unsupported, ` +
        `${summary.skipped} skipped, ${summary.cancelled} cancelled`
    );

    return {
      messageId: extraction.messageId,
      messageKey: extraction.messageKey,
      status,
      startedAt,
      completedAt: this.now(),
      attachments: outcomes,
      inlineImageCount: extraction.inlineImages.length,
      summary,
    };
  }

  private baseOutcome(attachment: Attachment): Omit<AttachmentOutcome, "status"> {
    return {
      index: attachment.index,
      partId: attachment.partId,
      originalName: attachment.originalName,
      generatedName: attachment.generatedName,
      warnings: [...attachment.validation.warnings],
    };
  }

  private async processAttachment(
    attachment: Attachment,
    config: PipelineConfig,
    options: ProcessOptions
  ): Promise<AttachmentOutcome> {
    const base = this.baseOutcome(attachment);

    if (!attachment.validation.allowed) {
      try {
        assertAllowed(attachment.validation);
      } catch (err) {
        return { ...base, status: "rejected", reason: attachment.validation.reason, error: summarizeError(err) };
      }
    }

    const converter = this.registry.select(attachment, config);
    if (!converter) {
      const error = new UnsupportedFormatError(
        `No converter for ${attachment.detectedType.kind} content (${attachment.originalName})`
      );
      return { ...base, status: "unsupported", reason: error.message, error: summarizeError(error) };
    }
    if (!converter.isEnabled(config)) {
      return {
        ...base,
        status: "skipped",
        converterId: converter.id,
        reason: `The ${converter.id} converter is disabled`,
      };
    }

    const started = performance.now();
    try {
      const convert = () =>
        converter.convert(attachment, {
          config,
          fs: this.fs,
          now: this.now,
          ...(options.signal ? { signal: options.signal } : {}),
          ...(options.timing ? { timing: options.timing } : {}),
        });
      const result = options.timing
        ? await options.timing.time(`convert.${converter.id}`, convert)
        : await convert();

      return {
        ...base,
        status: result.partial ? "partial" : "converted",
        converterId: converter.id,
        outputDir: result.outputDir,
        outputs: result.outputs,
        ...(result.chunks ? { chunkCount: result.chunks.length } : {}),
        retries: result.retries,
        durationMs: Math.round(performance.now() - started),
        warnings: [...base.warnings, ...result.warnings],
      };
    } catch (err) {
      const durationMs = Math.round(performance.now() - started);
      if (err instanceof CancelledError) {
        return { ...base, status: "cancelled", converterId: converter.id, reason: err.message, durationMs };
      }

      const error = toPipelineError(err);
      const preserved = options.preservedPaths?.get(attachment.generatedName);
      if (error.partialOutput === undefined && preserved !== undefined) {
        error.partialOutput = preserved;
      }
      console.error(`[Pipeline] ${converter.id} conversion of ${attachment.originalName} failed:`, error.message);
      return {
        ...base,
        status: "failed",
        converterId: converter.id,
        reason: error.message,
        error: summarizeError(error),
        durationMs,
        ...(error instanceof ExternalServiceError ? { retries: Math.max(0, error.attempts - 1) } : {}),
      };
    }
  }
}
