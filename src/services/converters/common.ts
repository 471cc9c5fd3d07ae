/**
 * Checks and naming shared by the converters.
 */

import type { ConverterId, ConvertibleFile } from "../../types/conversion.js";
import type { DetectedFileKind } from "../../types/validation.js";
import { CancelledError, FileSizeError, TypeMismatchError } from "../errors.js";
import { formatTimestamp, splitExtension } from "../filenames.js";

/** Lower-case extension from the original name, else the generated one. */
export function fileExtension(file: ConvertibleFile): string {
  return splitExtension(file.originalName).extension || splitExtension(file.generatedName).extension;
}

/**
 * `converted/<converter>/<stem>_<YYYYMMDDHHMMSS>`; the stem comes from the
 * generated name, which is unique across a batch.
 */
export function outputDirFor(id: ConverterId, file: ConvertibleFile, now: Date): string {
  const { stem } = splitExtension(file.generatedName);
  return `converted/${id}/${stem}_${formatTimestamp(now)}`;
}

/** Stem used for names inside a converted set. */
export function displayStem(file: ConvertibleFile): string {
  const { stem } = splitExtension(file.originalName);
  return stem.replace(/\s+/g, "_").replace(/[^\p{L}\p{N}._-]/gu, "") || "file";
}

export interface ConvertibleCheck {
  label: string;
  maxBytes: number;
  kinds: readonly DetectedFileKind[];
}

/**
 * Re-check size and true type before converting.
 *
 * @throws FileSizeError or TypeMismatchError
 */
export function assertConvertible(file: ConvertibleFile, check: ConvertibleCheck): void {
  if (file.content.length > check.maxBytes) {
    throw new FileSizeError(file.content.length, check.maxBytes);
  }
  if (!check.kinds.includes(file.detectedType.kind)) {
    throw new TypeMismatchError(
      `${check.label} converter expects ${check.kinds.join("/")} content, got ${file.detectedType.kind}`
    );
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}
