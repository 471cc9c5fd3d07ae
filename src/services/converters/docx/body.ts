/**
 * DOCX body model.
 *
 * `word/document.xml` is parsed in document order into paragraphs and tables
 * of inline runs, then rendered to markdown or plain text. Images stay as
 * relationship ids until the caller resolves them to written files.
 */

import type { XMLParser } from "fast-xml-parser";
import { attr, createXmlParser, isRecord, toArray, toRecord, type XmlRecord } from "../ooxml.js";

export type Inline =
  | { type: "text"; text: string; bold: boolean; italic: boolean; strike: boolean; href: string | null }
  | { type: "break" }
  | { type: "image"; relId: string; alt: string };

export interface ListInfo {
  numId: string;
  level: number;
  ordered: boolean;
}

export interface ParagraphBlock {
  type: "paragraph";
  styleId: string | null;
  /** 1-6 for headings */
  heading: number | null;
  list: ListInfo | null;
  inlines: Inline[];
}

export interface TableBlock {
  type: "table";
  /** rows, then cells, then the paragraphs of each cell */
  rows: ParagraphBlock[][][];
}

export type DocxBlock = ParagraphBlock | TableBlock;

export interface DocxBody {
  blocks: DocxBlock[];
  usedStyles: Set<string>;
  /** Tracked insertions and deletions seen */
  revisions: number;
}

export interface BodyContext {
  /** styleId -> display name */
  styleNames: ReadonlyMap<string, string>;
  /** numId -> level -> ordered */
  numbering: ReadonlyMap<string, ReadonlyMap<number, boolean>>;
  /** relationship id -> external hyperlink target */
  hyperlinks: ReadonlyMap<string, string>;
}

/** Resolves an image relationship to the markdown target of its written file. */
export type ImageResolver = (relId: string) => string | null;

export function createOrderedParser(): XMLParser {
  return createXmlParser({ preserveOrder: true });
}

function nameOf(node: XmlRecord): string | undefined {
  return Object.keys(node).find((key) => key !== ":@");
}

function childNodes(node: XmlRecord): XmlRecord[] {
  const name = nameOf(node);
  if (!name || name === "#text") return [];
  return toArray(node[name]).filter(isRecord);
}

function attrOf(node: XmlRecord, name: string): string | undefined {
  return attr(node[":@"], name);
}

function findChild(node: XmlRecord, name: string): XmlRecord | undefined {
  return childNodes(node).find((child) => nameOf(child) === name);
}

function findDeep(node: XmlRecord, name: string): XmlRecord | undefined {
  for (const child of childNodes(node)) {
    if (nameOf(child) === name) return child;
    const found = findDeep(child, name);
    if (found) return found;
  }
  return undefined;
}

function textContent(node: XmlRecord): string {
  return childNodes(node)
    .map((child) => {
      const value = child["#text"];
      return typeof value === "string" || typeof value === "number" ? String(value) : "";
    })
    .join("");
}

/** `<w:b/>` is on; `<w:b w:val="0"/>` and friends are off. */
function isOn(node: XmlRecord | undefined): boolean {
  if (!node) return false;
  const value = attrOf(node, "w:val");
  return value === undefined || !["0", "false", "off", "none"].includes(value.toLowerCase());
}

export function headingLevel(styleId: string | null, styleNames: ReadonlyMap<string, string>): number | null {
  if (!styleId) return null;
  const name = styleNames.get(styleId) ?? styleId;
  if (/^title$/i.test(name)) return 1;
  const level = /^heading\s*([1-9])$/i.exec(name)?.[1];
  return level ? Math.min(Number(level), 6) : null;
}

interface RunFormat {
  bold: boolean;
  italic: boolean;
  strike: boolean;
  href: string | null;
}

class BodyReader {
  readonly usedStyles = new Set<string>();
  revisions = 0;

  constructor(private readonly context: BodyContext) {}

  readBlocks(container: XmlRecord): DocxBlock[] {
    const blocks: DocxBlock[] = [];
    for (const node of childNodes(container)) {
      const name = nameOf(node);
      if (name === "w:p") blocks.push(this.readParagraph(node));
      else if (name === "w:tbl") blocks.push(this.readTable(node));
      else if (name === "w:sdt") {
        const content = findChild(node, "w:sdtContent");
        if (content) blocks.push(...this.readBlocks(content));
      }
    }
    return blocks;
  }

  private readTable(node: XmlRecord): TableBlock {
    const tableStyle = findChild(findChild(node, "w:tblPr") ?? {}, "w:tblStyle");
    const styleId = tableStyle ? attrOf(tableStyle, "w:val") : undefined;
    if (styleId) this.usedStyles.add(styleId);

    const rows = childNodes(node)
      .filter((row) => nameOf(row) === "w:tr")
      .map((row) =>
        childNodes(row)
          .filter((cell) => nameOf(cell) === "w:tc")
          .map((cell) =>
            this.readBlocks(cell).flatMap((block) =>
              block.type === "paragraph" ? [block] : flattenTable(block)
            )
          )
      );
    return { type: "table", rows };
  }

  private readParagraph(node: XmlRecord): ParagraphBlock {
    const props = findChild(node, "w:pPr");
    const styleNode = props ? findChild(props, "w:pStyle") : undefined;
    const styleId = (styleNode && attrOf(styleNode, "w:val")) ?? null;
    if (styleId) this.usedStyles.add(styleId);

    let heading = headingLevel(styleId, this.context.styleNames);
    const outline = props ? findChild(props, "w:outlineLvl") : undefined;
    const outlineLevel = outline ? Number(attrOf(outline, "w:val")) : NaN;
    if (heading === null && Number.isInteger(outlineLevel) && outlineLevel >= 0 && outlineLevel < 6) {
      heading = outlineLevel + 1;
    }

    let list: ListInfo | null = null;
    const numPr = props ? findChild(props, "w:numPr") : undefined;
    if (numPr && heading === null) {
      const numIdNode = findChild(numPr, "w:numId");
      const levelNode = findChild(numPr, "w:ilvl");
      const numId = numIdNode ? attrOf(numIdNode, "w:val") : undefined;
      const level = Number((levelNode && attrOf(levelNode, "w:val")) ?? 0);
      // numId 0 removes numbering
      if (numId && numId !== "0") {
        const lvl = Number.isInteger(level) ? level : 0;
        list = { numId, level: lvl, ordered: this.context.numbering.get(numId)?.get(lvl) ?? false };
      }
    }

    const inlines: Inline[] = [];
    const format: RunFormat = { bold: false, italic: false, strike: false, href: null };
    this.readInlines(node, format, inlines);
    return { type: "paragraph", styleId, heading, list, inlines };
  }

  private readInlines(container: XmlRecord, format: RunFormat, out: Inline[]): void {
    for (const node of childNodes(container)) {
      switch (nameOf(node)) {
        case "w:pPr":
        case "w:rPr":
          break;
        case "w:r":
          this.readRun(node, format, out);
          break;
        case "w:hyperlink": {
          const relId = attrOf(node, "r:id");
          const href = (relId && this.context.hyperlinks.get(relId)) ?? null;
          this.readInlines(node, { ...format, href }, out);
          break;
        }
        case "w:del":
        case "w:moveFrom":
          this.revisions++;
          break;
        case "w:ins":
        case "w:moveTo":
          this.revisions++;
          this.readInlines(node, format, out);
          break;
        default:
          // smartTag, sdt, fldSimple and other wrappers
          this.readInlines(node, format, out);
      }
    }
  }

  private readRun(run: XmlRecord, inherited: RunFormat, out: Inline[]): void {
    const props = findChild(run, "w:rPr");
    const styleNode = props ? findChild(props, "w:rStyle") : undefined;
    const runStyle = styleNode ? attrOf(styleNode, "w:val") : undefined;
    if (runStyle) this.usedStyles.add(runStyle);

    const format: RunFormat = {
      bold: props ? isOn(findChild(props, "w:b")) : false,
      italic: props ? isOn(findChild(props, "w:i")) : false,
      strike: props ? isOn(findChild(props, "w:strike")) || isOn(findChild(props, "w:dstrike")) : false,
      href: inherited.href,
    };

    for (const node of childNodes(run)) {
      switch (nameOf(node)) {
        case "w:t":
          out.push({ type: "text", text: textContent(node), ...format });
          break;
        case "w:tab":
          out.push({ type: "text", text: "\t", ...format });
          break;
        case "w:br":
        case "w:cr":
          out.push({ type: "break" });
          break;
        case "w:noBreakHyphen":
          out.push({ type: "text", text: "-", ...format });
          break;
        case "w:drawing": {
          const blip = findDeep(node, "a:blip");
          const relId = blip ? (attrOf(blip, "r:embed") ?? attrOf(blip, "r:link")) : undefined;
          const docPr = findDeep(node, "wp:docPr");
          const alt = docPr ? (attrOf(docPr, "descr") || attrOf(docPr, "title") || attrOf(docPr, "name") || "") : "";
          if (relId) out.push({ type: "image", relId, alt });
          break;
        }
        case "w:pict": {
          const data = findDeep(node, "v:imagedata");
          const relId = data ? attrOf(data, "r:id") : undefined;
          if (relId && data) out.push({ type: "image", relId, alt: attrOf(data, "o:title") ?? "" });
          break;
        }
      }
    }
  }
}

function flattenTable(table: TableBlock): ParagraphBlock[] {
  return table.rows.flatMap((row) => row.flat());
}

/**
 * Parse `word/document.xml`.
 */
export function readBody(xml: string, context: BodyContext, parser: XMLParser = createOrderedParser()): DocxBody {
  const roots = toArray(parser.parse(xml)).filter(isRecord);
  const document = roots.find((node) => nameOf(node) === "w:document");
  const body = document ? findChild(document, "w:body") : undefined;
  const reader = new BodyReader(context);
  const blocks = body ? reader.readBlocks(body) : [];
  return { blocks, usedStyles: reader.usedStyles, revisions: reader.revisions };
}

/** Relationship ids of every image, in document order, without repeats. */
export function imageRelIds(blocks: readonly DocxBlock[]): string[] {
  const ids = new Set<string>();
  const visit = (paragraph: ParagraphBlock) => {
    for (const inline of paragraph.inlines) {
      if (inline.type === "image") ids.add(inline.relId);
    }
  };
  for (const block of blocks) {
    if (block.type === "paragraph") visit(block);
    else flattenTable(block).forEach(visit);
  }
  return [...ids];
}

const MARKDOWN_SPECIAL = /[\\`*_[\]]/g;

function escapeMarkdown(text: string): string {
  return text.replace(MARKDOWN_SPECIAL, "\\$&");
}

function sameFormat(a: RunFormat, b: RunFormat): boolean {
  return a.bold === b.bold && a.italic === b.italic && a.strike === b.strike && a.href === b.href;
}

function wrap(text: string, format: RunFormat): string {
  const match = /^(\s*)([\s\S]*?)(\s*)$/.exec(text);
  const lead = match?.[1] ?? "";
  const core = match?.[2] ?? text;
  const trail = match?.[3] ?? "";
  if (!core) return text;

  let inner = core;
  if (format.bold && format.italic) inner = `***${inner}***`;
  else if (format.bold) inner = `**${inner}**`;
  else if (format.italic) inner = `*${inner}*`;
  if (format.strike) inner = `~~${inner}~~`;
  return lead + inner + trail;
}

type Piece = { kind: "text"; text: string; format: RunFormat } | { kind: "markup"; markdown: string };

function renderInlinesMarkdown(inlines: readonly Inline[], resolveImage: ImageResolver): string {
  // Adjacent runs with the same formatting are merged before wrapping
  const pieces: Piece[] = [];
  for (const inline of inlines) {
    if (inline.type === "text") {
      const format: RunFormat = {
        bold: inline.bold,
        italic: inline.italic,
        strike: inline.strike,
        href: inline.href,
      };
      const last = pieces[pieces.length - 1];
      if (last?.kind === "text" && sameFormat(last.format, format)) last.text += inline.text;
      else pieces.push({ kind: "text", text: inline.text, format });
    } else if (inline.type === "break") {
      pieces.push({ kind: "markup", markdown: "  \n" });
    } else {
      const target = resolveImage(inline.relId);
      if (target) pieces.push({ kind: "markup", markdown: `![${escapeMarkdown(inline.alt)}](${target})` });
    }
  }

  return pieces
    .map((piece) => {
      if (piece.kind === "markup") return piece.markdown;
      const styled = wrap(escapeMarkdown(piece.text), piece.format);
      return piece.format.href && piece.text.trim() ? `[${styled}](${piece.format.href})` : styled;
    })
    .join("");
}

function renderInlinesText(inlines: readonly Inline[]): string {
  return inlines
    .map((inline) => (inline.type === "text" ? inline.text : inline.type === "break" ? "\n" : ""))
    .join("");
}

function renderTableMarkdown(table: TableBlock, resolveImage: ImageResolver): string {
  const width = Math.max(0, ...table.rows.map((row) => row.length));
  if (width === 0) return "";
  const cell = (paragraphs: readonly ParagraphBlock[] | undefined) =>
    (paragraphs ?? [])
      .map((p) => renderInlinesMarkdown(p.inlines, resolveImage).trim())
      .filter((text) => text !== "")
      .join("<br>")
      .replace(/\|/g, "\\|")
      .replace(/\s*\n\s*/g, " ");
  const line = (row: readonly ParagraphBlock[][]) =>
    `| ${Array.from({ length: width }, (_, i) => cell(row[i])).join(" | ")} |`;

  const [header = [], ...rest] = table.rows;
  return [line(header), `| ${Array.from({ length: width }, () => "---").join(" | ")} |`, ...rest.map(line)].join("\n");
}

function renderTableText(table: TableBlock): string {
  return table.rows
    .map((row) =>
      row
        .map((paragraphs) =>
          paragraphs
            .map((p) => renderInlinesText(p.inlines).trim())
            .filter((text) => text !== "")
            .join(" ")
        )
        .join("\t")
    )
    .join("\n");
}

export interface RenderedBody {
  markdown: string;
  text: string;
}

/**
 * Render the body. Consecutive list items sit on adjacent lines; other
 * blocks are separated by a blank line. Empty paragraphs are dropped.
 */
export function renderBody(blocks: readonly DocxBlock[], resolveImage: ImageResolver): RenderedBody {
  const markdown: string[] = [];
  const text: string[] = [];
  let previousWasList = false;
  // numId -> per-level counters
  const counters = new Map<string, number[]>();

  const push = (md: string, plain: string, isList: boolean) => {
    const separator = markdown.length === 0 ? "" : isList && previousWasList ? "\n" : "\n\n";
    markdown.push(separator + md);
    text.push((text.length === 0 ? "" : isList && previousWasList ? "\n" : "\n\n") + plain);
    previousWasList = isList;
  };

  for (const block of blocks) {
    if (block.type === "table") {
      const md = renderTableMarkdown(block, resolveImage);
      if (md) push(md, renderTableText(block), false);
      continue;
    }

    const content = renderInlinesMarkdown(block.inlines, resolveImage).trim();
    const plain = renderInlinesText(block.inlines).trim();
    if (!content) continue;

    if (block.heading !== null) {
      push(`${"#".repeat(block.heading)} ${content}`, plain, false);
    } else if (block.list) {
      const { numId, level, ordered } = block.list;
      const levels = counters.get(numId) ?? [];
      levels[level] = (levels[level] ?? 0) + 1;
      levels.length = level + 1;
      counters.set(numId, levels);
      const marker = ordered ? `${levels[level] ?? 1}.` : "-";
      const indent = "  ".repeat(level);
      push(`${indent}${marker} ${content}`, `${indent}${marker} ${plain}`, true);
    } else {
      push(content, plain, false);
    }
  }

  return { markdown: markdown.join(""), text: text.join("") };
}

/**
 * Read `word/numbering.xml` into numId -> level -> ordered.
 */
export function readNumbering(xml: string | null, parser: XMLParser): Map<string, Map<number, boolean>> {
  const result = new Map<string, Map<number, boolean>>();
  if (!xml) return result;
  const numbering = toRecord(toRecord(parser.parse(xml))?.["w:numbering"]);

  const abstract = new Map<string, Map<number, boolean>>();
  for (const definition of toArray(numbering?.["w:abstractNum"])) {
    const id = attr(definition, "w:abstractNumId");
    if (id === undefined) continue;
    const levels = new Map<number, boolean>();
    for (const lvl of toArray(toRecord(definition)?.["w:lvl"])) {
      const level = Number(attr(lvl, "w:ilvl"));
      const format = attr(toRecord(lvl)?.["w:numFmt"], "w:val") ?? "bullet";
      if (Number.isInteger(level)) levels.set(level, format !== "bullet" && format !== "none");
    }
    abstract.set(id, levels);
  }

  for (const num of toArray(numbering?.["w:num"])) {
    const numId = attr(num, "w:numId");
    const abstractId = attr(toRecord(num)?.["w:abstractNumId"], "w:val");
    const levels = abstractId === undefined ? undefined : abstract.get(abstractId);
    if (numId !== undefined && levels) result.set(numId, levels);
  }
  return result;
}
