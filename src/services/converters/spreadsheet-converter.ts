/**
 * Spreadsheet Converter
 *
 * Turns an XLSX workbook into one CSV file per sheet. Cells are written as
 * displayed: formulas reduce to their cached value, shared and inline strings
 * are resolved, numbers and dates keep their number format.
 */

import { stringify } from "csv-stringify/sync";
import type JSZip from "jszip";
import type { XMLParser } from "fast-xml-parser";
import type { PipelineConfig, SpreadsheetConfig } from "../../config.js";
import type { ConversionResult, ConvertibleFile } from "../../types/conversion.js";
import { ProcessingError } from "../errors.js";
import { NameRegistry } from "../filenames.js";
import {
  assertConvertible,
  displayStem,
  fileExtension,
  outputDirFor,
  throwIfCancelled,
} from "./common.js";
import { BUILTIN_FORMATS, formatCellNumber } from "./number-format.js";
import {
  attr,
  createXmlParser,
  openPackage,
  readEntry,
  readRelationships,
  textOf,
  toArray,
  toRecord,
} from "./ooxml.js";
import type { ConversionContext, Converter } from "./types.js";
import { withWorkspace } from "./workspace.js";

const ARRAY_TAGS = new Set(["sheet", "row", "c", "si", "r", "xf", "numFmt", "Relationship"]);

interface SheetRef {
  name: string;
  /** Package path of the worksheet part */
  path: string;
}

export interface Workbook {
  sheets: SheetRef[];
  sharedStrings: string[];
  /** Format code per cellXfs index */
  cellFormats: string[];
  date1904: boolean;
}

export interface SheetTable {
  rows: string[][];
  columns: number;
  warnings: string[];
}

interface SheetSummary {
  name: string;
  output: string;
  rows: number;
  columns: number;
  truncated: boolean;
}

function createSheetParser(): XMLParser {
  return createXmlParser({
    isArray: (name, _jpath, _isLeaf, isAttribute) => !isAttribute && ARRAY_TAGS.has(name),
  });
}

/** Concatenated text of a string item: plain `<t>` or rich-text runs. */
function stringItemText(item: unknown): string {
  const record = toRecord(item);
  if (!record) return textOf(item);
  if (record.t !== undefined) return textOf(record.t);
  return toArray(record.r)
    .map((run) => textOf(toRecord(run)?.t))
    .join("");
}

/**
 * Zero-based column index of a cell reference such as "AB12".
 */
export function columnIndex(ref: string): number | null {
  const letters = /^([A-Z]+)\d*$/i.exec(ref)?.[1];
  if (!letters) return null;
  let index = 0;
  for (const ch of letters.toUpperCase()) {
    index = index * 26 + (ch.charCodeAt(0) - 64);
  }
  return index - 1;
}

export async function readWorkbook(zip: JSZip, parser: XMLParser = createSheetParser()): Promise<Workbook> {
  const workbookXml = await readEntry(zip, "xl/workbook.xml");
  if (!workbookXml) {
    throw new ProcessingError("Workbook part xl/workbook.xml is missing");
  }
  const workbook = toRecord(toRecord(parser.parse(workbookXml))?.workbook);
  const rels = await readRelationships(zip, "xl/workbook.xml", parser);

  const sheets: SheetRef[] = [];
  for (const sheet of toArray(toRecord(workbook?.sheets)?.sheet)) {
    const name = attr(sheet, "name");
    const relId = attr(sheet, "r:id");
    const target = relId ? rels.get(relId) : undefined;
    if (!name || !target || target.external) continue;
    sheets.push({ name, path: target.target });
  }

  const date1904Flag = attr(workbook?.workbookPr, "date1904");
  const date1904 = date1904Flag === "1" || date1904Flag === "true";

  const sharedStrings: string[] = [];
  const sstXml = await readEntry(zip, "xl/sharedStrings.xml");
  if (sstXml) {
    const sst = toRecord(toRecord(parser.parse(sstXml))?.sst);
    for (const item of toArray(sst?.si)) sharedStrings.push(stringItemText(item));
  }

  const cellFormats: string[] = [];
  const stylesXml = await readEntry(zip, "xl/styles.xml");
  if (stylesXml) {
    const styles = toRecord(toRecord(parser.parse(stylesXml))?.styleSheet);
    const custom = new Map<number, string>();
    for (const fmt of toArray(toRecord(styles?.numFmts)?.numFmt)) {
      const id = Number(attr(fmt, "numFmtId"));
      const code = attr(fmt, "formatCode");
      if (Number.isInteger(id) && code !== undefined) custom.set(id, code);
    }
    for (const xf of toArray(toRecord(styles?.cellXfs)?.xf)) {
      const id = Number(attr(xf, "numFmtId") ?? 0);
      cellFormats.push(custom.get(id) ?? BUILTIN_FORMATS[id] ?? "General");
    }
  }

  return { sheets, sharedStrings, cellFormats, date1904 };
}

function cellText(cell: unknown, workbook: Workbook, warnings: string[]): string {
  const type = attr(cell, "t") ?? "n";
  const record = toRecord(cell);
  const raw = record?.v === undefined ? undefined : textOf(record.v);
  const ref = attr(cell, "r") ?? "?";

  if (type === "inlineStr") return stringItemText(record?.is);
  if (raw === undefined) {
    if (record?.f !== undefined) {
      warnings.push(`Formula in ${ref} has no cached value`);
    }
    return "";
  }

  switch (type) {
    case "s":
      return workbook.sharedStrings[Number(raw)] ?? "";
    case "str":
    case "e":
    case "d":
      return raw;
    case "b":
      return raw === "1" || raw.toLowerCase() === "true" ? "TRUE" : "FALSE";
    default: {
      const value = Number(raw);
      if (raw.trim() === "" || !Number.isFinite(value)) return raw;
      const style = Number(attr(cell, "s") ?? 0);
      const code = workbook.cellFormats[style] ?? "General";
      return formatCellNumber(value, code, workbook.date1904);
    }
  }
}

/**
 * Read a worksheet into a dense table. Missing cells and rows between
 * populated ones become empty strings.
 */
export function readSheet(xml: string, workbook: Workbook, maxRows: number, parser: XMLParser = createSheetParser()): SheetTable {
  const worksheet = toRecord(toRecord(parser.parse(xml))?.worksheet);
  const warnings: string[] = [];
  const sparse = new Map<number, string[]>();
  let lastRow = -1;
  let columns = 0;

  for (const row of toArray(toRecord(worksheet?.sheetData)?.row)) {
    const declared = Number(attr(row, "r"));
    const rowIndex = Number.isInteger(declared) && declared > 0 ? declared - 1 : lastRow + 1;
    lastRow = rowIndex;
    const values: string[] = [];
    let nextColumn = 0;
    for (const cell of toArray(toRecord(row)?.c)) {
      const ref = attr(cell, "r");
      const col = (ref ? columnIndex(ref) : null) ?? nextColumn;
      values[col] = cellText(cell, workbook, warnings);
      nextColumn = col + 1;
    }
    // Trailing empty cells do not widen the table
    let width = values.length;
    while (width > 0 && !values[width - 1]) width--;
    columns = Math.max(columns, width);
    sparse.set(rowIndex, values.slice(0, width));
  }

  let rowCount = lastRow + 1;
  if (maxRows > 0 && rowCount > maxRows) {
    warnings.push(`Truncated to ${maxRows} of ${rowCount} rows`);
    rowCount = maxRows;
  }

  const rows: string[][] = [];
  for (let i = 0; i < rowCount; i++) {
    const values = sparse.get(i) ?? [];
    rows.push(Array.from({ length: columns }, (_, col) => values[col] ?? ""));
  }
  return { rows, columns, warnings };
}

function sheetFileLabel(name: string, position: number): string {
  const label = name.replace(/\s+/g, "_").replace(/[^\p{L}\p{N}._-]/gu, "");
  return label || `sheet${position + 1}`;
}

export class SpreadsheetConverter implements Converter {
  readonly id = "spreadsheet" as const;

  supports(file: ConvertibleFile): boolean {
    const kind = file.detectedType.kind;
    return kind === "xlsx" || (kind === "zip" && fileExtension(file) === ".xlsx");
  }

  isEnabled(config: PipelineConfig): boolean {
    return config.converters.spreadsheet.enabled;
  }

  async convert(file: ConvertibleFile, context: ConversionContext): Promise<ConversionResult> {
    const settings: SpreadsheetConfig = context.config.converters.spreadsheet;
    assertConvertible(file, { label: "Spreadsheet", maxBytes: settings.maxBytes, kinds: ["xlsx", "zip"] });
    throwIfCancelled(context.signal);

    const zip = await openPackage(file.content, file.originalName);
    const parser = createSheetParser();
    const workbook = await readWorkbook(zip, parser);
    if (workbook.sheets.length === 0) {
      throw new ProcessingError(`Workbook ${file.originalName} has no sheets`);
    }

    const outputDir = outputDirFor(this.id, file, context.now());
    const stem = displayStem(file);
    const names = new NameRegistry();
    const warnings: string[] = [];
    const summaries: SheetSummary[] = [];
    const sections: string[] = [];
    let failed = 0;

    return withWorkspace(context.fs, "spreadsheet-", async (workspace) => {
      for (const [position, sheet] of workbook.sheets.entries()) {
        throwIfCancelled(context.signal);
        try {
          const xml = await readEntry(zip, sheet.path);
          if (xml === null) {
            throw new ProcessingError(`part ${sheet.path} is missing`);
          }
          const table = readSheet(xml, workbook, settings.maxRowsPerSheet, parser);
          const csv = table.rows.length > 0 ? stringify(table.rows, { delimiter: settings.delimiter }) : "";
          const output = names.claim(`${stem}_${sheetFileLabel(sheet.name, position)}.csv`);
          await workspace.write(output, csv);

          warnings.push(...table.warnings.map((w) => `Sheet "${sheet.name}": ${w}`));
          summaries.push({
            name: sheet.name,
            output,
            rows: table.rows.length,
            columns: table.columns,
            truncated: table.warnings.some((w) => w.startsWith("Truncated")),
          });
          sections.push(`## ${sheet.name}\n\n${csv}`);
        } catch (err) {
          failed++;
          const message = err instanceof Error ? err.message : String(err);
          console.warn(`[Spreadsheet] Sheet "${sheet.name}" of ${file.originalName} failed: ${message}`);
          warnings.push(`Sheet "${sheet.name}" failed: ${message}`);
        }
      }

      if (failed === workbook.sheets.length) {
        throw new ProcessingError(`No sheet of ${file.originalName} could be converted`);
      }

      const outputs = await workspace.commit(outputDir);
      return {
        converterId: this.id,
        outputText: sections.join("\n"),
        outputDir,
        outputs,
        images: [],
        metadata: {
          sheetCount: workbook.sheets.length,
          date1904: workbook.date1904,
          sheets: summaries,
        },
        partial: failed > 0,
        retries: 0,
        warnings,
      };
    });
  }
}
