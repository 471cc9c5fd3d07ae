/**
 * Document properties from `docProps/core.xml`, `docProps/app.xml` and
 * `docProps/custom.xml`, plus counts taken from the converted body.
 */

import type JSZip from "jszip";
import type { XMLParser } from "fast-xml-parser";
import { attr, readEntry, textOf, toArray, toRecord, type XmlRecord } from "../ooxml.js";

export interface CoreProperties {
  title?: string;
  subject?: string;
  creator?: string;
  keywords?: string;
  description?: string;
  lastModifiedBy?: string;
  revision?: number;
  created?: string;
  modified?: string;
  category?: string;
  contentStatus?: string;
  language?: string;
}

export interface AppProperties {
  application?: string;
  appVersion?: string;
  company?: string;
  template?: string;
  pages?: number;
  words?: number;
  characters?: number;
  lines?: number;
  paragraphs?: number;
  totalEditingMinutes?: number;
}

export type CustomValue = string | number | boolean;

export interface DocumentCounts {
  paragraphs: number;
  headings: number;
  tables: number;
  listItems: number;
  images: number;
  words: number;
  characters: number;
  revisions: number;
  hasComments: boolean;
}

export interface DocumentMetadata {
  core: CoreProperties;
  app: AppProperties;
  custom: Record<string, CustomValue>;
  counts: DocumentCounts;
}

type CoreTextKey = Exclude<keyof CoreProperties, "revision">;
type AppTextKey = "application" | "appVersion" | "company" | "template";
type AppNumberKey = Exclude<keyof AppProperties, AppTextKey>;

const CORE_FIELDS: ReadonlyArray<[CoreTextKey, string]> = [
  ["title", "dc:title"],
  ["subject", "dc:subject"],
  ["creator", "dc:creator"],
  ["keywords", "cp:keywords"],
  ["description", "dc:description"],
  ["lastModifiedBy", "cp:lastModifiedBy"],
  ["created", "dcterms:created"],
  ["modified", "dcterms:modified"],
  ["category", "cp:category"],
  ["contentStatus", "cp:contentStatus"],
  ["language", "dc:language"],
];

const APP_TEXT_FIELDS: ReadonlyArray<[AppTextKey, string]> = [
  ["application", "Application"],
  ["appVersion", "AppVersion"],
  ["company", "Company"],
  ["template", "Template"],
];

const APP_NUMBER_FIELDS: ReadonlyArray<[AppNumberKey, string]> = [
  ["pages", "Pages"],
  ["words", "Words"],
  ["characters", "Characters"],
  ["lines", "Lines"],
  ["paragraphs", "Paragraphs"],
  ["totalEditingMinutes", "TotalTime"],
];

function toNumber(value: string): number | undefined {
  const n = Number(value.trim());
  return value.trim() !== "" && Number.isFinite(n) ? n : undefined;
}

async function readPart(zip: JSZip, path: string, root: string, parser: XMLParser): Promise<XmlRecord | undefined> {
  const xml = await readEntry(zip, path);
  return xml ? toRecord(toRecord(parser.parse(xml))?.[root]) : undefined;
}

export async function readCoreProperties(zip: JSZip, parser: XMLParser): Promise<CoreProperties> {
  const core = await readPart(zip, "docProps/core.xml", "cp:coreProperties", parser);
  const result: CoreProperties = {};
  if (!core) return result;
  for (const [key, tag] of CORE_FIELDS) {
    const value = textOf(core[tag]).trim();
    if (value) result[key] = value;
  }
  const revision = toNumber(textOf(core["cp:revision"]));
  if (revision !== undefined) result.revision = revision;
  return result;
}

export async function readAppProperties(zip: JSZip, parser: XMLParser): Promise<AppProperties> {
  const app = await readPart(zip, "docProps/app.xml", "Properties", parser);
  const result: AppProperties = {};
  if (!app) return result;
  for (const [key, tag] of APP_TEXT_FIELDS) {
    const value = textOf(app[tag]).trim();
    if (value) result[key] = value;
  }
  for (const [key, tag] of APP_NUMBER_FIELDS) {
    const value = toNumber(textOf(app[tag]));
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Custom properties keep their variant type: numbers for vt:i4/vt:r8 and
 * friends, booleans for vt:bool, strings otherwise.
 */
export async function readCustomProperties(zip: JSZip, parser: XMLParser): Promise<Record<string, CustomValue>> {
  const custom = await readPart(zip, "docProps/custom.xml", "Properties", parser);
  const result: Record<string, CustomValue> = {};
  for (const property of toArray(custom?.property)) {
    const name = attr(property, "name");
    const record = toRecord(property);
    if (!name || !record) continue;
    const variant = Object.keys(record).find((key) => key.startsWith("vt:"));
    if (!variant) continue;
    const raw = textOf(record[variant]);
    if (/^vt:(i[1248]|ui[1248]|int|uint|r[48]|decimal)$/.test(variant)) {
      result[name] = toNumber(raw) ?? raw;
    } else if (variant === "vt:bool") {
      result[name] = raw === "true" || raw === "1";
    } else {
      result[name] = raw;
    }
  }
  return result;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word !== "").length;
}
