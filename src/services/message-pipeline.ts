/**
 * Message Pipeline
 *
 * End-to-end processing of raw messages:
 * 1. Extract body text, attachments and inline images
 * 2. Write the body text and preserve allowed files
 * 3. Convert attachments through the orchestrator
 * 4. Write the metadata document and record the outcome in the ledger
 *
 * Batches share one name registry so generated names stay unique across
 * messages. A failing message never stops the rest of the batch.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { PipelineConfig } from "../config.js";
import type { MessageLedger } from "../storage/message-records.js";
import { messageRecordId } from "../storage/message-records.js";
import type { OutputFileSystem } from "../storage/filesystem.js";
import type { ExtractionResult } from "../types/message.js";
import type {
  AttachmentOutcome,
  BatchReport,
  MessageOutcome,
  MessageRecordStatus,
  ProcessingReport,
} from "../types/report.js";
import { mapWithConcurrency } from "./concurrency.js";
import type { ConverterRegistry } from "./converters/registry.js";
import { summarizeError, toPipelineError } from "./errors.js";
import { NameRegistry } from "./filenames.js";
import { extract } from "./mime-extractor.js";
import { Orchestrator } from "./orchestrator.js";
import { formatRunMetrics, systemClock, TimingCollector, type RunMetrics } from "./timing.js";

export const OUTPUT_DIRS = {
  text: "processed_text",
  attachments: "attachments",
  inlineImages: "inline_images",
  metadata: "metadata",
} as const;

/** A raw message and where it came from. */
export interface MessageSource {
  /** File path or caller-chosen id; keys the processing ledger */
  id: string;
  read(): Promise<Buffer | string>;
}

export interface MessagePipelineOptions {
  fs: OutputFileSystem;
  registry: ConverterRegistry;
  ledger?: MessageLedger;
  now?: () => Date;
}

export interface ProcessMessageOptions {
  names?: NameRegistry;
  signal?: AbortSignal;
  timing?: TimingCollector;
  /** Reprocess even when the ledger has the message as complete */
  force?: boolean;
}

export interface ProcessBatchOptions {
  signal?: AbortSignal;
  force?: boolean;
  trigger?: string;
}

export function messageSource(id: string, content: Buffer | string): MessageSource {
  return { id, read: async () => content };
}

/**
 * Sources for every `.eml` file in a directory, sorted by name.
 */
export async function messageSourcesFromDirectory(dir: string): Promise<MessageSource[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".eml"))
    .map((entry) => path.join(dir, entry.name))
    .sort()
    .map((file) => ({ id: file, read: () => fs.readFile(file) }));
}

function recordStatus(report: ProcessingReport): MessageRecordStatus {
  if (report.status === "success") return "complete";
  if (report.status === "failed") return "failed";
  return "partial";
}

function firstFailure(outcomes: readonly AttachmentOutcome[]): string | null {
  const failed = outcomes.find((o) => o.status === "failed");
  return failed ? `${failed.originalName}: ${failed.reason ?? "failed"}` : null;
}

export function buildMetadataDocument(
  source: string,
  extraction: ExtractionResult,
  report: ProcessingReport,
  preserved: ReadonlyMap<string, string>,
  bodyTextPath: string
) {
  const outcomes = new Map(report.attachments.map((o) => [o.index, o]));
  return {
    source,
    messageId: extraction.messageId,
    messageKey: extraction.messageKey,
    subject: extraction.subject,
    from: extraction.from,
    to: extraction.to,
    date: extraction.date,
    headers: extraction.headers,
    processedAt: report.completedAt.toISOString(),
    status: report.status,
    bodyText: bodyTextPath,
    bodyParts: extraction.bodyParts.map(({ partId, source: kind, charset, text }) => ({
      partId,
      source: kind,
      charset,
      characters: text.length,
    })),
    attachments: extraction.attachments.map((attachment) => {
      const outcome = outcomes.get(attachment.index);
      return {
        index: attachment.index,
        partId: attachment.partId,
        marker: attachment.marker,
        originalName: attachment.originalName,
        generatedName: attachment.generatedName,
        contentType: attachment.contentType,
        detectedType: attachment.detectedType.kind,
        size: attachment.size,
        validation: {
          allowed: attachment.validation.allowed,
          reason: attachment.validation.reason,
          ...(attachment.validation.violation ? { violation: attachment.validation.violation } : {}),
          warnings: attachment.validation.warnings,
        },
        preservedPath: preserved.get(attachment.generatedName) ?? null,
        status: outcome?.status ?? null,
        converter: outcome?.converterId ?? null,
        outputDir: outcome?.outputDir ?? null,
        outputs: outcome?.outputs ?? [],
        ...(outcome?.chunkCount !== undefined ? { chunkCount: outcome.chunkCount } : {}),
        ...(outcome?.reason !== undefined ? { reason: outcome.reason } : {}),
        ...(outcome?.error ? { error: outcome.error } : {}),
      };
    }),
    inlineImages: extraction.inlineImages.map((image) => ({
      index: image.index,
      partId: image.partId,
      marker: image.marker,
      contentId: image.contentId,
      originalContentId: image.originalContentId,
      originalName: image.originalName,
      generatedName: image.generatedName,
      contentType: image.contentType,
      size: image.size,
      allowed: image.validation.allowed,
      preservedPath: preserved.get(image.generatedName) ?? null,
    })),
    positions: extraction.positions,
    parts: extraction.parts,
    summary: report.summary,
    warnings: extraction.warnings,
  };
}

export class MessagePipeline {
  private readonly orchestrator: Orchestrator;
  private readonly now: () => Date;
  private lastRunMetrics: RunMetrics | null = null;

  constructor(
    private readonly config: PipelineConfig,
    private readonly options: MessagePipelineOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.orchestrator = new Orchestrator(options.registry, options.fs, this.now);
  }

  get metrics(): RunMetrics | null {
    return this.lastRunMetrics;
  }

  /**
   * Process one message. Message-level failures are returned as a failed
   * outcome, never thrown.
   */
  async processMessage(source: MessageSource, options: ProcessMessageOptions = {}): Promise<MessageOutcome> {
    const ledger = this.options.ledger;
    const recordId = messageRecordId(source.id);

    if (ledger && !options.force) {
      const existing = await ledger.find(recordId);
      if (existing?.status === "complete") {
        console.log(`[Pipeline] Skipping ${source.id} (already processed)`);
        return {
          source: source.id,
          status: "skipped",
          ...(existing.messageId !== null ? { messageId: existing.messageId } : {}),
        };
      }
    }

    let messageId: string | null = null;
    try {
      const raw = await source.read();
      const extraction = this.extract(raw, source.id, options);
      messageId = extraction.messageId;

      const bodyTextPath = `${OUTPUT_DIRS.text}/${extraction.messageKey}.txt`;
      await this.options.fs.writeFile(bodyTextPath, extraction.bodyText);
      const preserved = await this.preserve(extraction);

      const report = await this.orchestrator.process(extraction, this.config, {
        preservedPaths: preserved,
        ...(options.signal ? { signal: options.signal } : {}),
        ...(options.timing ? { timing: options.timing } : {}),
      });

      const metadataPath = `${OUTPUT_DIRS.metadata}/${extraction.messageKey}.json`;
      await this.options.fs.writeFile(
        metadataPath,
        JSON.stringify(buildMetadataDocument(source.id, extraction, report, preserved, bodyTextPath), null, 2)
      );

      await ledger
        ?.upsert({
          id: recordId,
          source: source.id,
          messageId,
          status: recordStatus(report),
          attachmentCount: report.summary.total,
          failedAttachments: report.summary.failed,
          lastError: firstFailure(report.attachments),
        })
        .catch((ledgerErr: unknown) => {
          console.error(`[Pipeline] Could not record result of ${source.id}:`, ledgerErr);
        });

      return {
        source: source.id,
        status: report.status === "cancelled" ? "cancelled" : "processed",
        messageId,
        messageKey: extraction.messageKey,
        report,
        bodyTextPath,
        metadataPath,
      };
    } catch (err) {
      const error = toPipelineError(err);
      console.error(`[Pipeline] Failed to process ${source.id}:`, error.message);
      await ledger
        ?.upsert({
          id: recordId,
          source: source.id,
          messageId,
          status: "failed",
          attachmentCount: 0,
          failedAttachments: 0,
          lastError: error.message,
        })
        .catch((ledgerErr: unknown) => {
          console.error(`[Pipeline] Could not record failure of ${source.id}:`, ledgerErr);
        });
      return {
        source: source.id,
        status: "failed",
        ...(messageId !== null ? { messageId } : {}),
        error: summarizeError(error),
      };
    }
  }

  /**
   * Process messages on a bounded pool. Once the signal fires no new message
   * starts; finished ones keep their results.
   */
  async processBatch(sources: readonly MessageSource[], options: ProcessBatchOptions = {}): Promise<BatchReport> {
    const timing = new TimingCollector(options.trigger ?? "manual", {
      now: this.now,
      elapsedMs: systemClock.elapsedMs,
    });
    const names = new NameRegistry();
    const cancelled: number[] = [];
    console.log(`[Pipeline] Processing ${sources.length} message(s)...`);

    const indexed = await mapWithConcurrency(
      sources,
      this.config.concurrency.messages,
      async (source, index) => ({
        index,
        outcome: await timing.time("message", () =>
          this.processMessage(source, {
            names,
            timing,
            ...(options.signal ? { signal: options.signal } : {}),
            ...(options.force ? { force: true } : {}),
          })
        ),
      }),
      {
        ...(options.signal ? { signal: options.signal } : {}),
        onCancelled: (index) => cancelled.push(index),
      }
    );

    for (const index of cancelled) {
      const source = sources[index];
      if (source) indexed.push({ index, outcome: { source: source.id, status: "cancelled" } });
    }
    const messages = indexed.sort((a, b) => a.index - b.index).map((entry) => entry.outcome);

    const count = (status: MessageOutcome["status"]) => messages.filter((m) => m.status === status).length;
    const report: BatchReport = {
      total: sources.length,
      processed: count("processed"),
      failed: count("failed"),
      skipped: count("skipped"),
      cancelled: count("cancelled"),
      messages,
    };

    this.lastRunMetrics = timing.finalize(report);
    console.log(formatRunMetrics(this.lastRunMetrics));
    return report;
  }

  private extract(raw: Buffer | string, sourceId: string, options: ProcessMessageOptions): ExtractionResult {
    const run = () =>
      extract(raw, {
        policy: this.config.security,
        sourceId,
        ...(options.names ? { names: options.names } : {}),
      });
    return options.timing ? options.timing.timeSync("extract", run) : run();
  }

  /**
   * Copy allowed attachments and inline images to their output directories.
   * Denied files are never written.
   */
  private async preserve(extraction: ExtractionResult): Promise<Map<string, string>> {
    const preserved = new Map<string, string>();
    const groups = [
      { dir: OUTPUT_DIRS.attachments, files: extraction.attachments },
      { dir: OUTPUT_DIRS.inlineImages, files: extraction.inlineImages },
    ];
    for (const { dir, files } of groups) {
      for (const file of files) {
        if (!file.validation.allowed) continue;
        const target = `${dir}/${file.generatedName}`;
        await this.options.fs.writeFile(target, file.content);
        preserved.set(file.generatedName, target);
      }
    }
    return preserved;
  }
}

let isRunning = false;

/**
 * Run a batch unless one is already in progress.
 *
 * @returns the batch report, or null when skipped or failed
 */
export async function runMessageBatch(
  pipeline: MessagePipeline,
  sources: readonly MessageSource[],
  trigger: "manual" | "scheduled" | "startup",
  options: Omit<ProcessBatchOptions, "trigger"> = {}
): Promise<BatchReport | null> {
  if (isRunning) {
    console.log(`[Pipeline] Skipping (${trigger}) - already running`);
    return null;
  }

  isRunning = true;
  try {
    console.log(`[Pipeline] Starting (${trigger})...`);
    const report = await pipeline.processBatch(sources, { ...options, trigger });
    console.log(
      `[Pipeline] Completed (${trigger}): ${report.processed} processed, ${report.failed} failed, ` +
        `${report.skipped} skipped, ${report.cancelled} cancelled`
    );
    return report;
  } catch (err) {
    console.error(`[Pipeline] Failed (${trigger}):`, err);
    return null;
  } finally {
    isRunning = false;
  }
}
