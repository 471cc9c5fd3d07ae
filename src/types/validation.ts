/**
 * Security validation types.
 *
 * Describes what a file really is (by magic bytes) and the allow/deny
 * decision taken for it.
 */

import type { ValidationViolation } from "../services/errors.js";

export const DETECTED_FILE_KINDS = [
  "pdf",
  "png",
  "jpeg",
  "gif",
  "bmp",
  "tiff",
  "webp",
  "zip",
  "docx",
  "xlsx",
  "pptx",
  "ole",
  "gzip",
  "text",
  "unknown",
] as const;

export type DetectedFileKind = (typeof DETECTED_FILE_KINDS)[number];

export interface DetectedFileType {
  kind: DetectedFileKind;
  /** Canonical MIME type for the detected kind */
  mimeType: string;
  /** Canonical extension including the dot, or "" when unknown */
  extension: string;
}

/**
 * strict     - allow-list and signature mismatches are denied, names must carry an extension
 * graceful   - as strict, but a missing extension is inferred from the content type
 * permissive - signature mismatches are downgraded to warnings
 */
export const SECURITY_MODES = ["strict", "graceful", "permissive"] as const;
export type SecurityMode = (typeof SECURITY_MODES)[number];

export interface SecurityPolicy {
  maxBytes: number;
  /** Lower-case extensions including the dot */
  allowedExtensions: readonly string[];
  blockedExtensions: readonly string[];
  mode: SecurityMode;
}

export interface ValidationOutcome {
  allowed: boolean;
  /** Human-readable reason for the decision (also set when allowed) */
  reason: string;
  violation?: ValidationViolation;
  warnings: string[];
  detectedType: DetectedFileType;
  /** Sanitized form of the original name */
  sanitizedName: string;
  /** Extension the checks were run against, "" when none could be found */
  extension: string;
  size: number;
  /** Limit in force when the size was checked */
  maxBytes: number;
}

/** Minimal view of a file the validator needs. */
export interface ValidationSubject {
  name: string;
  content: Uint8Array;
  contentType?: string;
}
