/**
 * Embedded DOCX images, deduplicated by SHA-256.
 */

import { createHash } from "node:crypto";
import * as path from "node:path";
import type JSZip from "jszip";
import { detectFileType } from "../../file-signatures.js";
import { readBinaryEntry, type Relationship } from "../ooxml.js";

export interface StoredImage {
  /** Name under the set's images/ directory */
  file: string;
  sha256: string;
  size: number;
  mimeType: string;
  /** Package parts with this content */
  sources: string[];
  /** Relationship ids pointing at it */
  relIds: string[];
}

export interface ImageCollection {
  /** Unique images in first-reference order */
  images: StoredImage[];
  byRelId: Map<string, StoredImage>;
  /** Bytes per unique image, keyed by file */
  content: Map<string, Buffer>;
  warnings: string[];
}

const MIME_BY_EXTENSION: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".webp": "image/webp",
  ".emf": "image/emf",
  ".wmf": "image/wmf",
  ".svg": "image/svg+xml",
};

/**
 * Read the images the body references. Parts with identical bytes are
 * stored once, whatever relationship or part name points at them.
 */
export async function collectImages(
  zip: JSZip,
  relIds: readonly string[],
  rels: ReadonlyMap<string, Relationship>,
  stem: string
): Promise<ImageCollection> {
  const collection: ImageCollection = { images: [], byRelId: new Map(), content: new Map(), warnings: [] };
  const bySha = new Map<string, StoredImage>();

  for (const relId of relIds) {
    const rel = rels.get(relId);
    if (!rel) {
      collection.warnings.push(`Image relationship ${relId} not found`);
      continue;
    }
    if (rel.external) {
      collection.warnings.push(`Image ${relId} is linked externally (${rel.target}) and was not extracted`);
      continue;
    }
    const bytes = await readBinaryEntry(zip, rel.target);
    if (!bytes) {
      collection.warnings.push(`Image part ${rel.target} is missing`);
      continue;
    }

    const sha256 = createHash("sha256").update(bytes).digest("hex");
    let image = bySha.get(sha256);
    if (!image) {
      const detected = detectFileType(bytes);
      const partExtension = path.posix.extname(rel.target).toLowerCase();
      const isImage = detected.mimeType.startsWith("image/");
      const extension = isImage ? detected.extension : partExtension || ".bin";
      const ordinal = String(collection.images.length + 1).padStart(3, "0");
      image = {
        file: `${stem}_image_${ordinal}${extension}`,
        sha256,
        size: bytes.length,
        mimeType: isImage ? detected.mimeType : (MIME_BY_EXTENSION[partExtension] ?? "application/octet-stream"),
        sources: [],
        relIds: [],
      };
      bySha.set(sha256, image);
      collection.images.push(image);
      collection.content.set(image.file, bytes);
    }
    if (!image.sources.includes(rel.target)) image.sources.push(rel.target);
    image.relIds.push(relId);
    collection.byRelId.set(relId, image);
  }
  return collection;
}

export interface ImageManifest {
  totalReferences: number;
  uniqueImages: number;
  duplicatesRemoved: number;
  totalSize: number;
  images: Array<Omit<StoredImage, "relIds"> & { references: number }>;
}

export function buildImageManifest(collection: ImageCollection, referenceCount: number): ImageManifest {
  const parts = collection.images.reduce((sum, img) => sum + img.sources.length, 0);
  return {
    totalReferences: referenceCount,
    uniqueImages: collection.images.length,
    duplicatesRemoved: parts - collection.images.length,
    totalSize: collection.images.reduce((sum, img) => sum + img.size, 0),
    images: collection.images.map(({ relIds, ...image }) => ({ ...image, references: relIds.length })),
  };
}
