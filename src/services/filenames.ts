/**
 * Filename helpers: sanitizing untrusted names and generating unique output
 * names for extracted files.
 */

import { createHash } from "node:crypto";

const MAX_FILENAME_LENGTH = 255;
const MAX_GENERATED_STEM = 80;

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "application/pdf": ".pdf",
  "application/msword": ".doc",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": ".docx",
  "application/vnd.ms-excel": ".xls",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": ".xlsx",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation": ".pptx",
  "application/zip": ".zip",
  "application/gzip": ".gz",
  "application/json": ".json",
  "message/rfc822": ".eml",
  "text/plain": ".txt",
  "text/html": ".html",
  "text/csv": ".csv",
  "text/calendar": ".ics",
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "image/bmp": ".bmp",
  "image/tiff": ".tiff",
  "image/webp": ".webp",
  "image/svg+xml": ".svg",
};

/**
 * Make an untrusted filename safe to write: path separators and reserved
 * characters become "_", control characters are removed, leading/trailing
 * dots and spaces are trimmed.
 */
export function sanitizeFilename(filename: string): string {
  let name = filename
    .replace(/[\\/:*?"<>|]/g, "_")
    .replace(/[\x00-\x1f\x7f]/g, "")
    .replace(/^[. ]+|[. ]+$/g, "");

  if (!name) name = "unnamed_file";

  if (name.length > MAX_FILENAME_LENGTH) {
    const { stem, extension } = splitExtension(name);
    name = stem.slice(0, MAX_FILENAME_LENGTH - extension.length) + extension;
  }
  return name;
}

/**
 * Split "report.final.pdf" into { stem: "report.final", extension: ".pdf" }.
 * The extension is lower-cased; dotfiles have no extension.
 */
export function splitExtension(filename: string): { stem: string; extension: string } {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0 || dot === filename.length - 1) {
    return { stem: filename, extension: "" };
  }
  const extension = filename.slice(dot).toLowerCase();
  if (!/^\.[a-z0-9]{1,10}$/.test(extension)) {
    return { stem: filename, extension: "" };
  }
  return { stem: filename.slice(0, dot), extension };
}

/**
 * Extension for a MIME type, falling back to the subtype for images and
 * ".bin" for anything else.
 */
export function extensionForContentType(contentType: string): string {
  const mediaType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  const known = CONTENT_TYPE_EXTENSIONS[mediaType];
  if (known) return known;
  if (mediaType.startsWith("image/")) {
    const subtype = mediaType.slice("image/".length).replace(/[^a-z0-9]/g, "");
    if (subtype) return `.${subtype}`;
  }
  return ".bin";
}

/**
 * Short stable key for a message, used to make generated names unique
 * across messages.
 */
export function messageKeyFor(messageId: string): string {
  return createHash("sha256").update(messageId).digest("hex").slice(0, 8);
}

/**
 * UTC timestamp formatted as YYYYMMDDHHMMSS.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, "").slice(0, 14);
}

/**
 * Build the generated name for an extracted file:
 * `<stem>_<messageKey>_<NN><ext>`.
 */
export function buildGeneratedName(
  originalName: string,
  messageKey: string,
  counter: number,
  fallbackExtension: string
): string {
  const { stem, extension } = splitExtension(sanitizeFilename(originalName));
  const safeStem =
    stem
      .replace(/\s+/g, "_")
      .replace(/[[\]{}()#%&$@!'`~^=+,;]/g, "")
      .slice(0, MAX_GENERATED_STEM) || "file";
  const ext = extension || fallbackExtension;
  return `${safeStem}_${messageKey}_${String(counter).padStart(2, "0")}${ext}`;
}

/**
 * Tracks generated names so no two extracted files share one. Share a
 * registry across a batch to keep names unique between messages.
 */
export class NameRegistry {
  private used = new Set<string>();

  /**
   * Reserve `name`, or the first free `<stem>-<n><ext>` variant.
   */
  claim(name: string): string {
    if (!this.used.has(name)) {
      this.used.add(name);
      return name;
    }
    const { stem, extension } = splitExtension(name);
    let n = 2;
    while (this.used.has(`${stem}-${n}${extension}`)) n++;
    const unique = `${stem}-${n}${extension}`;
    this.used.add(unique);
    return unique;
  }

  has(name: string): boolean {
    return this.used.has(name);
  }

  get size(): number {
    return this.used.size;
  }
}
