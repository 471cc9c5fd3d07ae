/**
 * Helpers for reading Office Open XML packages (XLSX, DOCX).
 */

import JSZip from "jszip";
import { XMLParser, type X2jOptions } from "fast-xml-parser";
import * as path from "node:path";
import { ProcessingError } from "../errors.js";

export type XmlRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is XmlRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toRecord(value: unknown): XmlRecord | undefined {
  return isRecord(value) ? value : undefined;
}

export function toArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (value === undefined || value === null) return [];
  return [value];
}

/** Attribute or text value as a string, or undefined. */
export function attr(node: unknown, name: string): string | undefined {
  const value = toRecord(node)?.[name];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

/** Text content of an element parsed without attribute grouping. */
export function textOf(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  const text = toRecord(node)?.["#text"];
  return typeof text === "string" || typeof text === "number" ? String(text) : "";
}

export function createXmlParser(options: Partial<X2jOptions> = {}): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "",
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    ...options,
  });
}

/**
 * Open an OOXML package.
 *
 * @throws ProcessingError when the bytes are not a readable ZIP
 */
export async function openPackage(content: Uint8Array, label: string): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(content);
  } catch (err) {
    throw new ProcessingError(`${label} is not a readable package`, { cause: err });
  }
}

export async function readEntry(zip: JSZip, entry: string): Promise<string | null> {
  const file = zip.file(entry);
  return file ? file.async("string") : null;
}

export async function readBinaryEntry(zip: JSZip, entry: string): Promise<Buffer | null> {
  const file = zip.file(entry);
  return file ? file.async("nodebuffer") : null;
}

export interface Relationship {
  id: string;
  type: string;
  /** Package path of the target, or the raw target for external links */
  target: string;
  external: boolean;
}

/**
 * Read the relationships of a part, e.g. `word/document.xml` reads
 * `word/_rels/document.xml.rels`. Targets are resolved against the part.
 */
export async function readRelationships(
  zip: JSZip,
  partPath: string,
  parser: XMLParser
): Promise<Map<string, Relationship>> {
  const dir = path.posix.dirname(partPath);
  const relsPath = path.posix.join(dir, "_rels", `${path.posix.basename(partPath)}.rels`);
  const xml = await readEntry(zip, relsPath);
  const rels = new Map<string, Relationship>();
  if (!xml) return rels;

  const root = toRecord(toRecord(parser.parse(xml))?.Relationships);
  for (const rel of toArray(root?.Relationship)) {
    const id = attr(rel, "Id");
    const target = attr(rel, "Target");
    if (!id || target === undefined) continue;
    const external = attr(rel, "TargetMode") === "External";
    rels.set(id, {
      id,
      type: attr(rel, "Type") ?? "",
      target: external
        ? target
        : target.startsWith("/")
          ? target.slice(1)
          : path.posix.normalize(path.posix.join(dir, target)),
      external,
    });
  }
  return rels;
}
