/**
 * MIME decoding helpers: transfer encodings, charsets, encoded-word headers
 * and header parameters.
 */

import iconv from "iconv-lite";
import { detect as detectCharset } from "chardet";

const CHARSET_ALIASES: Record<string, string> = {
  "utf8": "utf-8",
  "latin1": "iso-8859-1",
  "latin-1": "iso-8859-1",
  "ascii": "us-ascii",
  "cp1252": "windows-1252",
  "x-sjis": "shift_jis",
  "ks_c_5601-1987": "euc-kr",
};

export interface DecodedText {
  text: string;
  /** Charset actually used */
  charset: string;
  /** True when the charset came from auto-detection */
  detected: boolean;
}

/**
 * Normalize a charset label; returns null when iconv cannot decode it.
 */
export function normalizeCharset(label: string | null | undefined): string | null {
  if (!label) return null;
  const cleaned = label.trim().replace(/^["']|["']$/g, "").toLowerCase();
  if (!cleaned) return null;
  const charset = CHARSET_ALIASES[cleaned] ?? cleaned;
  return iconv.encodingExists(charset) ? charset : null;
}

export function decodeBase64(raw: Buffer): Buffer {
  const cleaned = raw.toString("latin1").replace(/[^A-Za-z0-9+/=_-]/g, "");
  // Padding may only appear at the end; a lone trailing character carries no byte
  const unpadded = cleaned.replace(/=+(?=[^=])/g, "").replace(/=+$/, "");
  const usable = unpadded.length % 4 === 1 ? unpadded.slice(0, -1) : unpadded;
  return Buffer.from(usable, "base64");
}

export function decodeQuotedPrintable(raw: Buffer): Buffer {
  const text = raw.toString("latin1").replace(/[ \t]+(\r?\n)/g, "$1").replace(/=\r?\n/g, "");
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 0x3d /* = */ && i + 2 < text.length) {
      const hex = text.slice(i + 1, i + 3);
      if (/^[0-9A-Fa-f]{2}$/.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 2;
        continue;
      }
    }
    bytes.push(ch & 0xff);
  }
  return Buffer.from(bytes);
}

/**
 * Undo a Content-Transfer-Encoding. Unknown encodings pass through raw.
 */
export function decodeTransferEncoding(raw: Buffer, encoding: string): Buffer {
  switch (encoding.trim().toLowerCase()) {
    case "base64":
      return decodeBase64(raw);
    case "quoted-printable":
      return decodeQuotedPrintable(raw);
    default:
      return raw;
  }
}

/**
 * Decode bytes to text with the declared charset, or a detected one when the
 * declaration is missing or unknown.
 */
export function decodeText(bytes: Buffer, declared: string | null): DecodedText {
  const charset = normalizeCharset(declared);
  if (charset) {
    return { text: iconv.decode(bytes, charset), charset, detected: false };
  }

  const guess = normalizeCharset(detectCharset(bytes));
  if (guess) {
    return { text: iconv.decode(bytes, guess), charset: guess, detected: true };
  }
  return { text: iconv.decode(bytes, "utf-8"), charset: "utf-8", detected: true };
}

function decodeQEncoding(text: string): Buffer {
  return decodeQuotedPrintable(Buffer.from(text.replace(/_/g, " "), "latin1"));
}

/**
 * Header bytes above 0x7f (RFC 6532 raw UTF-8) arrive as latin1 code units;
 * reinterpret them as UTF-8 when they form valid UTF-8.
 */
export function decodeRawHeaderBytes(value: string): string {
  if (!/[\x80-\xff]/.test(value)) return value;
  const bytes = Buffer.from(value, "latin1");
  const utf8 = bytes.toString("utf-8");
  return utf8.includes("\uFFFD") ? iconv.decode(bytes, "windows-1252") : utf8;
}

const ENCODED_WORD = /=\?([^?\s]+)\?([bBqQ])\?([^?]*)\?=/g;

/**
 * Decode RFC 2047 encoded-words. Whitespace between adjacent encoded words
 * is dropped; undecodable words are left as written.
 */
export function decodeHeaderValue(value: string): string {
  const joined = value.replace(/(\?=)[ \t\r\n]+(?==\?)/g, "$1");
  return joined.replace(ENCODED_WORD, (word: string, label: string, encoding: string, text: string) => {
    const charset = normalizeCharset(label.split("*")[0]);
    if (!charset) return word;
    const bytes = encoding.toUpperCase() === "B" ? decodeBase64(Buffer.from(text, "latin1")) : decodeQEncoding(text);
    return iconv.decode(bytes, charset);
  });
}

/**
 * Split on a separator, ignoring separators inside double quotes.
 */
function splitOutsideQuotes(value: string, separator: string): string[] {
  const pieces: string[] = [];
  let current = "";
  let quoted = false;
  let escaped = false;
  for (const ch of value) {
    if (escaped) {
      current += ch;
      escaped = false;
    } else if (ch === "\\" && quoted) {
      current += ch;
      escaped = true;
    } else if (ch === '"') {
      current += ch;
      quoted = !quoted;
    } else if (ch === separator && !quoted) {
      pieces.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  pieces.push(current);
  return pieces;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, "$1");
  }
  return value;
}

function percentDecode(value: string): number[] {
  const bytes: number[] = [];
  for (let i = 0; i < value.length; i++) {
    const hex = value.slice(i + 1, i + 3);
    if (value[i] === "%" && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(value.charCodeAt(i) & 0xff);
    }
  }
  return bytes;
}

interface ParamPiece {
  index: number;
  value: string;
  encoded: boolean;
}

function joinExtendedParam(pieces: ParamPiece[]): string {
  pieces.sort((a, b) => a.index - b.index);
  let charset = "utf-8";
  const bytes: number[] = [];

  pieces.forEach((piece, i) => {
    let value = piece.value;
    if (i === 0 && piece.encoded) {
      const match = /^([^']*)'[^']*'(.*)$/.exec(value);
      if (match) {
        charset = normalizeCharset(match[1]) ?? "utf-8";
        value = match[2] ?? "";
      }
    }
    if (piece.encoded) {
      bytes.push(...percentDecode(value));
    } else {
      bytes.push(...Buffer.from(value, "latin1"));
    }
  });
  return iconv.decode(Buffer.from(bytes), charset);
}

export interface HeaderValueWithParams {
  value: string;
  /** Parameter names are lower-cased */
  params: Record<string, string>;
}

/**
 * Parse `type/subtype; a=b; c="d"` style header values, including RFC 2231
 * extended and continued parameters.
 */
export function parseHeaderParams(header: string): HeaderValueWithParams {
  const [first = "", ...rest] = splitOutsideQuotes(header, ";");
  const params: Record<string, string> = {};
  const extended = new Map<string, ParamPiece[]>();

  for (const segment of rest) {
    const eq = segment.indexOf("=");
    if (eq === -1) continue;
    const rawName = segment.slice(0, eq).trim().toLowerCase();
    const rawValue = unquote(segment.slice(eq + 1).trim());
    const match = /^([^*]+)(?:\*(\d+))?(\*)?$/.exec(rawName);
    const name = match?.[1];
    if (!match || !name) continue;

    if (match[2] === undefined && match[3] === undefined) {
      params[name] = decodeHeaderValue(decodeRawHeaderBytes(rawValue));
      continue;
    }
    const pieces = extended.get(name) ?? [];
    pieces.push({
      index: match[2] === undefined ? 0 : Number(match[2]),
      value: rawValue,
      encoded: match[3] !== undefined,
    });
    extended.set(name, pieces);
  }

  for (const [name, pieces] of extended) {
    params[name] = joinExtendedParam(pieces);
  }

  return { value: first.trim(), params };
}
