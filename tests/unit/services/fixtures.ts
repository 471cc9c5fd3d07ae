/**
 * In-memory fixtures for converter and pipeline tests: OOXML packages built
 * with JSZip, convertible files, scripted converters and a configuration
 * that ignores the environment.
 */

import JSZip from "jszip";
import { resolveConfig, type ConfigOverrides, type PipelineConfig } from "../../../src/config.js";
import { detectFileType } from "../../../src/services/file-signatures.js";
import type { ConversionContext, Converter } from "../../../src/services/converters/types.js";
import type { ConversionResult, ConverterId, ConvertibleFile } from "../../../src/types/conversion.js";

export const FIXED_NOW = new Date("2026-01-02T03:04:05.000Z");

export function testConfig(overrides: ConfigOverrides = {}): PipelineConfig {
  return resolveConfig(overrides, {});
}

export function convertible(originalName: string, generatedName: string, content: Buffer): ConvertibleFile {
  const detectedType = detectFileType(content);
  return { originalName, generatedName, contentType: detectedType.mimeType, content, detectedType };
}

export function zipOf(entries: Record<string, string | Uint8Array>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, data] of Object.entries(entries)) zip.file(name, data);
  return zip.generateAsync({ type: "nodebuffer" });
}

const REL_TYPE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";

export interface SheetFixture {
  name: string;
  /** Worksheet XML; omit to leave the part out of the package */
  xml?: string;
}

export interface WorkbookFixture {
  sheets: SheetFixture[];
  sharedStrings?: string[];
  /** numFmtId per cellXfs index */
  cellFormats?: number[];
  customFormats?: Record<number, string>;
  date1904?: boolean;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export function worksheet(rows: string): string {
  return `<worksheet><sheetData>${rows}</sheetData></worksheet>`;
}

export function buildXlsx(workbook: WorkbookFixture): Promise<Buffer> {
  const sheets = workbook.sheets
    .map((sheet, i) => `<sheet name="${escapeXml(sheet.name)}" sheetId="${i + 1}" r:id="rId${i + 1}"/>`)
    .join("");
  const rels = workbook.sheets
    .map((_, i) => `<Relationship Id="rId${i + 1}" Type="${REL_TYPE}/worksheet" Target="worksheets/sheet${i + 1}.xml"/>`)
    .join("");

  const entries: Record<string, string> = {
    "xl/workbook.xml":
      `<workbook xmlns:r="${REL_TYPE}">` +
      (workbook.date1904 ? `<workbookPr date1904="1"/>` : "") +
      `<sheets>${sheets}</sheets></workbook>`,
    "xl/_rels/workbook.xml.rels": `<Relationships>${rels}</Relationships>`,
  };
  workbook.sheets.forEach((sheet, i) => {
    if (sheet.xml !== undefined) entries[`xl/worksheets/sheet${i + 1}.xml`] = sheet.xml;
  });
  if (workbook.sharedStrings) {
    entries["xl/sharedStrings.xml"] = `<sst>${workbook.sharedStrings.map((s) => `<si>${s}</si>`).join("")}</sst>`;
  }
  if (workbook.cellFormats) {
    const custom = Object.entries(workbook.customFormats ?? {})
      .map(([id, code]) => `<numFmt numFmtId="${id}" formatCode="${escapeXml(code)}"/>`)
      .join("");
    const xfs = workbook.cellFormats.map((id) => `<xf numFmtId="${id}"/>`).join("");
    entries["xl/styles.xml"] =
      `<styleSheet>${custom ? `<numFmts>${custom}</numFmts>` : ""}<cellXfs>${xfs}</cellXfs></styleSheet>`;
  }
  return zipOf(entries);
}

const W_NS =
  'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main" ' +
  `xmlns:r="${REL_TYPE}" ` +
  'xmlns:wp="http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing" ' +
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main"';

export interface DocxFixture {
  /** Children of w:body */
  body: string;
  styles?: string;
  numbering?: string;
  /** Relationship elements of word/document.xml */
  relationships?: string;
  core?: string;
  app?: string;
  custom?: string;
  /** Extra package parts, e.g. media */
  parts?: Record<string, string | Uint8Array>;
}

export function buildDocx(docx: DocxFixture): Promise<Buffer> {
  const entries: Record<string, string | Uint8Array> = {
    "word/document.xml": `<w:document ${W_NS}><w:body>${docx.body}</w:body></w:document>`,
    ...docx.parts,
  };
  if (docx.styles !== undefined) entries["word/styles.xml"] = `<w:styles ${W_NS}>${docx.styles}</w:styles>`;
  if (docx.numbering !== undefined) {
    entries["word/numbering.xml"] = `<w:numbering ${W_NS}>${docx.numbering}</w:numbering>`;
  }
  if (docx.relationships !== undefined) {
    entries["word/_rels/document.xml.rels"] = `<Relationships>${docx.relationships}</Relationships>`;
  }
  if (docx.core !== undefined) {
    entries["docProps/core.xml"] =
      '<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" ' +
      'xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/">' +
      `${docx.core}</cp:coreProperties>`;
  }
  if (docx.app !== undefined) entries["docProps/app.xml"] = `<Properties>${docx.app}</Properties>`;
  if (docx.custom !== undefined) {
    entries["docProps/custom.xml"] =
      '<Properties xmlns:vt="http://schemas.openxmlformats.org/officeDocument/2006/docPropsVTypes">' +
      `${docx.custom}</Properties>`;
  }
  return zipOf(entries);
}

export function paragraph(text: string, style?: string): string {
  const props = style ? `<w:pPr><w:pStyle w:val="${style}"/></w:pPr>` : "";
  return `<w:p>${props}<w:r><w:t xml:space="preserve">${escapeXml(text)}</w:t></w:r></w:p>`;
}

/** Minimal PDF with `pages` page objects. */
export function pdfWithPages(pages: number): Buffer {
  const objects = Array.from({ length: pages }, (_, i) => `${i + 3} 0 obj << /Type /Page /Parent 2 0 R >> endobj`);
  return Buffer.from(
    [
      "%PDF-1.4",
      "1 0 obj << /Type /Catalog /Pages 2 0 R >> endobj",
      "2 0 obj << /Type /Pages >> endobj",
      ...objects,
      "%%EOF",
      "",
    ].join("\n"),
    "latin1"
  );
}

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 13, 0x49, 0x48, 0x44, 0x52]);

type ConvertBehavior = (file: ConvertibleFile, context: ConversionContext) => Promise<ConversionResult>;

/** Converter that claims files by original name and runs a scripted conversion. */
export class FakeConverter implements Converter {
  readonly calls: string[] = [];

  constructor(
    readonly id: ConverterId,
    private readonly handles: readonly string[],
    private readonly behavior: ConvertBehavior = (file) => Promise.resolve(fakeResult(id, file)),
    private readonly enabled = true
  ) {}

  supports(file: ConvertibleFile): boolean {
    return this.handles.includes(file.originalName);
  }

  isEnabled(_config: PipelineConfig): boolean {
    return this.enabled;
  }

  convert(file: ConvertibleFile, context: ConversionContext): Promise<ConversionResult> {
    this.calls.push(file.originalName);
    return this.behavior(file, context);
  }
}

export function fakeResult(id: ConverterId, file: ConvertibleFile, overrides: Partial<ConversionResult> = {}): ConversionResult {
  const outputDir = `converted/${id}/${file.generatedName}`;
  return {
    converterId: id,
    outputText: `converted ${file.originalName}`,
    outputDir,
    outputs: [`${outputDir}/out.md`],
    images: [],
    metadata: {},
    partial: false,
    retries: 0,
    warnings: [],
    ...overrides,
  };
}
