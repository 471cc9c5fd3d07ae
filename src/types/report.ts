/**
 * Processing reports and ledger records.
 */

import type { ErrorSummary } from "../services/errors.js";
import type { ConverterId } from "./conversion.js";

export const ATTACHMENT_STATUSES = [
  "converted",
  "partial",
  "failed",
  "rejected",
  "unsupported",
  "skipped",
  "cancelled",
] as const;

export type AttachmentStatus = (typeof ATTACHMENT_STATUSES)[number];

export interface AttachmentOutcome {
  index: number;
  partId: string;
  originalName: string;
  generatedName: string;
  status: AttachmentStatus;
  converterId?: ConverterId;
  outputDir?: string;
  outputs?: string[];
  chunkCount?: number;
  retries?: number;
  durationMs?: number;
  reason?: string;
  error?: ErrorSummary;
  warnings: string[];
}

export type ReportSummary = Record<AttachmentStatus, number> & { total: number };

export type ReportStatus = "success" | "partial" | "failed" | "cancelled";

export interface ProcessingReport {
  messageId: string;
  messageKey: string;
  status: ReportStatus;
  startedAt: Date;
  completedAt: Date;
  attachments: AttachmentOutcome[];
  inlineImageCount: number;
  summary: ReportSummary;
}

export type MessageStatus = "processed" | "failed" | "skipped" | "cancelled";

export interface MessageOutcome {
  /** Source path or caller-supplied id */
  source: string;
  status: MessageStatus;
  messageId?: string;
  messageKey?: string;
  report?: ProcessingReport;
  bodyTextPath?: string;
  metadataPath?: string;
  error?: ErrorSummary;
}

export interface BatchReport {
  total: number;
  processed: number;
  failed: number;
  skipped: number;
  cancelled: number;
  messages: MessageOutcome[];
}

export type MessageRecordStatus = "complete" | "partial" | "failed";

/** Processing ledger entry, one per message source. */
export interface MessageRecord {
  /** Stable id derived from the source */
  id: string;
  source: string;
  messageId: string | null;
  status: MessageRecordStatus;
  attachmentCount: number;
  failedAttachments: number;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type CreateMessageRecordInput = Omit<MessageRecord, "createdAt" | "updatedAt">;
