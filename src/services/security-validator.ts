/**
 * Security Validator
 *
 * Decides whether an extracted file may be kept and converted. Checks run in
 * a fixed order (path traversal, size, blocked extension, allow-list,
 * signature) and the first failing check sets the reason.
 */

import type {
  DetectedFileType,
  SecurityPolicy,
  ValidationOutcome,
  ValidationSubject,
} from "../types/validation.js";
import type { ValidationViolation } from "./errors.js";
import {
  DisallowedExtensionError,
  FileSizeError,
  PathTraversalError,
  TypeMismatchError,
} from "./errors.js";
import { detectFileType, isConsistentWithExtension } from "./file-signatures.js";
import { extensionForContentType, sanitizeFilename, splitExtension } from "./filenames.js";

/**
 * True when a name tries to escape its directory.
 */
export function hasPathTraversal(name: string): boolean {
  if (name.includes("\0")) return true;
  if (name.startsWith("/") || name.startsWith("\\")) return true;
  if (/^[a-zA-Z]:[\\/]/.test(name)) return true;
  return name.split(/[\\/]/).some((segment) => segment === "..");
}

function resolveExtension(
  subject: ValidationSubject,
  policy: SecurityPolicy,
  detected: DetectedFileType
): string {
  const { extension } = splitExtension(subject.name);
  if (extension || policy.mode === "strict") return extension;

  if (subject.contentType) {
    const fromType = extensionForContentType(subject.contentType);
    if (fromType !== ".bin") return fromType;
  }
  return detected.extension;
}

/**
 * Validate a file against a policy. Never throws; the decision and its
 * reason are in the returned outcome.
 */
export function validate(subject: ValidationSubject, policy: SecurityPolicy): ValidationOutcome {
  const detectedType = detectFileType(subject.content);
  const size = subject.content.length;
  const extension = resolveExtension(subject, policy, detectedType);
  const warnings: string[] = [];

  const outcome = (
    allowed: boolean,
    reason: string,
    violation?: ValidationViolation
  ): ValidationOutcome => ({
    allowed,
    reason,
    ...(violation === undefined ? {} : { violation }),
    warnings,
    detectedType,
    sanitizedName: sanitizeFilename(subject.name),
    extension,
    size,
    maxBytes: policy.maxBytes,
  });

  if (hasPathTraversal(subject.name)) {
    return outcome(false, `Name "${subject.name}" contains a path traversal segment`, "path_traversal");
  }

  if (size > policy.maxBytes) {
    return outcome(false, `Size ${size} bytes exceeds limit of ${policy.maxBytes} bytes`, "file_size");
  }

  if (extension && policy.blockedExtensions.includes(extension)) {
    return outcome(false, `Extension ${extension} is blocked`, "blocked_extension");
  }

  if (!extension) {
    return outcome(false, "File has no extension and none could be inferred", "extension_not_allowed");
  }

  if (!policy.allowedExtensions.includes(extension)) {
    return outcome(false, `Extension ${extension} is not in the allow-list`, "extension_not_allowed");
  }

  if (size === 0) {
    warnings.push("File is empty; signature not checked");
    return outcome(true, "allowed");
  }

  const consistent = isConsistentWithExtension(extension, detectedType);
  if (consistent === false) {
    const message = `Content looks like ${detectedType.kind}, not ${extension}`;
    if (policy.mode !== "permissive") {
      return outcome(false, message, "type_mismatch");
    }
    warnings.push(message);
  }

  return outcome(true, "allowed");
}

/**
 * Turn a denial into the matching ValidationError.
 */
export function assertAllowed(outcome: ValidationOutcome): void {
  if (outcome.allowed) return;

  switch (outcome.violation) {
    case "path_traversal":
      throw new PathTraversalError(outcome.reason);
    case "file_size":
      throw new FileSizeError(outcome.size, outcome.maxBytes);
    case "blocked_extension":
    case "extension_not_allowed":
      throw new DisallowedExtensionError(outcome.violation, outcome.reason);
    case "type_mismatch":
    case undefined:
      throw new TypeMismatchError(outcome.reason);
  }
}
