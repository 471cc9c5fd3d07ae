/**
 * Style manifest from `word/styles.xml`: fonts and paragraph formatting per
 * style, written as JSON or as CSS classes.
 */

import type { XMLParser } from "fast-xml-parser";
import { attr, toArray, toRecord, type XmlRecord } from "../ooxml.js";

export const STYLE_TYPES = ["paragraph", "character", "table", "numbering"] as const;
export type StyleType = (typeof STYLE_TYPES)[number];

export interface FontStyle {
  name?: string;
  /** points */
  size?: number;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strike?: boolean;
  /** hex, e.g. "#1F3864" */
  color?: string;
  highlight?: string;
}

export interface ParagraphStyle {
  alignment?: "left" | "right" | "center" | "justify";
  /** points */
  indentLeft?: number;
  indentRight?: number;
  indentFirstLine?: number;
  spaceBefore?: number;
  spaceAfter?: number;
  /** multiple of single spacing */
  lineSpacing?: number;
  keepTogether?: boolean;
  keepWithNext?: boolean;
  pageBreakBefore?: boolean;
}

export interface StyleDefinition {
  styleId: string;
  name: string;
  type: StyleType;
  basedOn?: string;
  isDefault: boolean;
  isCustom: boolean;
  hidden: boolean;
  priority?: number;
  font?: FontStyle;
  paragraph?: ParagraphStyle;
  /** Referenced from the document body */
  used: boolean;
}

const ALIGNMENTS: Record<string, ParagraphStyle["alignment"]> = {
  left: "left",
  start: "left",
  right: "right",
  end: "right",
  center: "center",
  both: "justify",
  distribute: "justify",
};

const TWIPS_PER_POINT = 20;

function child(node: XmlRecord, name: string): unknown {
  return node[name];
}

function toggle(node: unknown): boolean | undefined {
  if (node === undefined) return undefined;
  const value = attr(node, "w:val");
  return value === undefined || !["0", "false", "off", "none"].includes(value.toLowerCase());
}

function twips(node: unknown, name: string): number | undefined {
  const raw = attr(node, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value / TWIPS_PER_POINT : undefined;
}

function compact<T extends object>(value: T): T | undefined {
  return Object.values(value).some((v) => v !== undefined) ? value : undefined;
}

function readFont(rPr: XmlRecord): FontStyle | undefined {
  const font: FontStyle = {};
  const fonts = child(rPr, "w:rFonts");
  const name = attr(fonts, "w:ascii") ?? attr(fonts, "w:hAnsi") ?? attr(fonts, "w:cs");
  if (name) font.name = name;
  const halfPoints = Number(attr(child(rPr, "w:sz"), "w:val"));
  if (Number.isFinite(halfPoints) && halfPoints > 0) font.size = halfPoints / 2;
  const bold = toggle(child(rPr, "w:b"));
  if (bold !== undefined) font.bold = bold;
  const italic = toggle(child(rPr, "w:i"));
  if (italic !== undefined) font.italic = italic;
  const underline = attr(child(rPr, "w:u"), "w:val");
  if (underline !== undefined) font.underline = underline !== "none";
  const strike = toggle(child(rPr, "w:strike"));
  if (strike !== undefined) font.strike = strike;
  const color = attr(child(rPr, "w:color"), "w:val");
  if (color && /^[0-9a-f]{6}$/i.test(color)) font.color = `#${color.toUpperCase()}`;
  const highlight = attr(child(rPr, "w:highlight"), "w:val");
  if (highlight && highlight !== "none") font.highlight = highlight;
  return compact(font);
}

function readParagraph(pPr: XmlRecord): ParagraphStyle | undefined {
  const paragraph: ParagraphStyle = {};
  const jc = attr(child(pPr, "w:jc"), "w:val");
  const alignment = jc ? ALIGNMENTS[jc] : undefined;
  if (alignment) paragraph.alignment = alignment;

  const ind = child(pPr, "w:ind");
  const left = twips(ind, "w:left") ?? twips(ind, "w:start");
  if (left !== undefined) paragraph.indentLeft = left;
  const right = twips(ind, "w:right") ?? twips(ind, "w:end");
  if (right !== undefined) paragraph.indentRight = right;
  const firstLine = twips(ind, "w:firstLine");
  const hanging = twips(ind, "w:hanging");
  if (firstLine !== undefined) paragraph.indentFirstLine = firstLine;
  else if (hanging !== undefined) paragraph.indentFirstLine = -hanging;

  const spacing = child(pPr, "w:spacing");
  const before = twips(spacing, "w:before");
  if (before !== undefined) paragraph.spaceBefore = before;
  const after = twips(spacing, "w:after");
  if (after !== undefined) paragraph.spaceAfter = after;
  const line = Number(attr(spacing, "w:line"));
  const rule = attr(spacing, "w:lineRule") ?? "auto";
  // "auto" lines are in 240ths of a line; exact/atLeast are twips
  if (Number.isFinite(line) && line > 0 && rule === "auto") paragraph.lineSpacing = line / 240;

  const keepTogether = toggle(child(pPr, "w:keepLines"));
  if (keepTogether !== undefined) paragraph.keepTogether = keepTogether;
  const keepWithNext = toggle(child(pPr, "w:keepNext"));
  if (keepWithNext !== undefined) paragraph.keepWithNext = keepWithNext;
  const pageBreakBefore = toggle(child(pPr, "w:pageBreakBefore"));
  if (pageBreakBefore !== undefined) paragraph.pageBreakBefore = pageBreakBefore;
  return compact(paragraph);
}

function isStyleType(value: string | undefined): value is StyleType {
  return STYLE_TYPES.some((t) => t === value);
}

/**
 * Read every style definition; `usedStyles` marks the ones the body
 * references.
 */
export function readStyles(xml: string | null, parser: XMLParser, usedStyles: ReadonlySet<string> = new Set()): StyleDefinition[] {
  if (!xml) return [];
  const root = toRecord(toRecord(parser.parse(xml))?.["w:styles"]);
  const styles: StyleDefinition[] = [];

  for (const node of toArray(root?.["w:style"])) {
    const record = toRecord(node);
    const styleId = attr(node, "w:styleId");
    const type = attr(node, "w:type") ?? "paragraph";
    if (!record || !styleId || !isStyleType(type)) continue;

    const style: StyleDefinition = {
      styleId,
      name: attr(record["w:name"], "w:val") ?? styleId,
      type,
      isDefault: ["1", "true"].includes(attr(node, "w:default") ?? ""),
      isCustom: ["1", "true"].includes(attr(node, "w:customStyle") ?? ""),
      hidden: toggle(record["w:hidden"]) === true || toggle(record["w:semiHidden"]) === true,
      used: usedStyles.has(styleId),
    };
    const basedOn = attr(record["w:basedOn"], "w:val");
    if (basedOn) style.basedOn = basedOn;
    const priority = Number(attr(record["w:uiPriority"], "w:val"));
    if (Number.isInteger(priority)) style.priority = priority;
    const rPr = toRecord(record["w:rPr"]);
    const font = rPr ? readFont(rPr) : undefined;
    if (font) style.font = font;
    const pPr = toRecord(record["w:pPr"]);
    const paragraph = pPr ? readParagraph(pPr) : undefined;
    if (paragraph) style.paragraph = paragraph;
    styles.push(style);
  }
  return styles;
}

/** styleId -> display name, for heading detection. */
export function styleNameMap(styles: readonly StyleDefinition[]): Map<string, string> {
  return new Map(styles.map((s) => [s.styleId, s.name]));
}

export function fontToCss(font: FontStyle): Array<[string, string]> {
  const css: Array<[string, string]> = [];
  if (font.name) css.push(["font-family", JSON.stringify(font.name)]);
  if (font.size) css.push(["font-size", `${font.size}pt`]);
  if (font.bold) css.push(["font-weight", "bold"]);
  if (font.italic) css.push(["font-style", "italic"]);
  const decorations = [font.underline ? "underline" : "", font.strike ? "line-through" : ""].filter(Boolean);
  if (decorations.length > 0) css.push(["text-decoration", decorations.join(" ")]);
  if (font.color) css.push(["color", font.color]);
  if (font.highlight) css.push(["background-color", font.highlight]);
  return css;
}

export function paragraphToCss(paragraph: ParagraphStyle): Array<[string, string]> {
  const css: Array<[string, string]> = [];
  if (paragraph.alignment) css.push(["text-align", paragraph.alignment]);
  if (paragraph.indentLeft) css.push(["margin-left", `${paragraph.indentLeft}pt`]);
  if (paragraph.indentRight) css.push(["margin-right", `${paragraph.indentRight}pt`]);
  if (paragraph.indentFirstLine) css.push(["text-indent", `${paragraph.indentFirstLine}pt`]);
  if (paragraph.spaceBefore) css.push(["margin-top", `${paragraph.spaceBefore}pt`]);
  if (paragraph.spaceAfter) css.push(["margin-bottom", `${paragraph.spaceAfter}pt`]);
  if (paragraph.lineSpacing) css.push(["line-height", String(paragraph.lineSpacing)]);
  return css;
}

export function cssClassName(styleId: string, prefix = "docx"): string {
  return `${prefix}-${styleId.replace(/\s+/g, "-").replace(/[^A-Za-z0-9_-]/g, "").toLowerCase()}`;
}

/**
 * CSS classes for paragraph and character styles that carry formatting.
 */
export function stylesToCss(styles: readonly StyleDefinition[], prefix = "docx"): string {
  const rules: string[] = [];
  for (const style of styles) {
    if (style.type !== "paragraph" && style.type !== "character") continue;
    const properties = [
      ...(style.font ? fontToCss(style.font) : []),
      ...(style.type === "paragraph" && style.paragraph ? paragraphToCss(style.paragraph) : []),
    ];
    if (properties.length === 0) continue;
    const body = properties.map(([name, value]) => `  ${name}: ${value};`).join("\n");
    rules.push(`/* ${style.name} */\n.${cssClassName(style.styleId, prefix)} {\n${body}\n}`);
  }
  return rules.length > 0 ? `${rules.join("\n\n")}\n` : "";
}

export interface StyleManifest {
  totalStyles: number;
  usedStyles: number;
  styles: Record<string, Omit<StyleDefinition, "styleId">>;
}

export function buildStyleManifest(styles: readonly StyleDefinition[]): StyleManifest {
  const map: StyleManifest["styles"] = {};
  for (const { styleId, ...rest } of styles) map[styleId] = rest;
  return {
    totalStyles: styles.length,
    usedStyles: styles.filter((s) => s.used).length,
    styles: map,
  };
}
