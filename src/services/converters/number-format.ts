/**
 * Spreadsheet number formats.
 *
 * Renders a numeric cell the way its number format displays it: built-in
 * and custom codes, up to four sections, percent, scientific, fractions,
 * thousands separators and date/time codes in both the 1900 and 1904 date
 * systems.
 */

export const BUILTIN_FORMATS: Readonly<Record<number, string>> = {
  0: "General",
  1: "0",
  2: "0.00",
  3: "#,##0",
  4: "#,##0.00",
  9: "0%",
  10: "0.00%",
  11: "0.00E+00",
  12: "# ?/?",
  13: "# ??/??",
  14: "yyyy-mm-dd",
  15: "d-mmm-yy",
  16: "d-mmm",
  17: "mmm-yy",
  18: "h:mm AM/PM",
  19: "h:mm:ss AM/PM",
  20: "h:mm",
  21: "h:mm:ss",
  22: "yyyy-mm-dd h:mm",
  37: "#,##0 ;(#,##0)",
  38: "#,##0 ;[Red](#,##0)",
  39: "#,##0.00;(#,##0.00)",
  40: "#,##0.00;[Red](#,##0.00)",
  45: "mm:ss",
  46: "[h]:mm:ss",
  47: "mm:ss.0",
  48: "##0.0E+0",
  49: "@",
};

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];
const DAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const DAY_MS = 86_400_000;

/**
 * Split a format code into its sections on unquoted semicolons.
 */
export function splitSections(code: string): string[] {
  const sections: string[] = [];
  let current = "";
  let quoted = false;
  let bracket = false;
  for (let i = 0; i < code.length; i++) {
    const ch = code.charAt(i);
    if (ch === "\\" && !quoted && i + 1 < code.length) {
      current += ch + code.charAt(i + 1);
      i++;
      continue;
    }
    if (ch === '"') quoted = !quoted;
    else if (ch === "[" && !quoted) bracket = true;
    else if (ch === "]" && !quoted) bracket = false;
    if (ch === ";" && !quoted && !bracket) {
      sections.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  sections.push(current);
  return sections;
}

/**
 * Drop colour, condition and locale brackets. Currency brackets such as
 * [$€-407] keep their symbol; elapsed-time brackets stay.
 */
function cleanSection(section: string): string {
  return section.replace(/\[([^\]]*)\]/g, (whole: string, inner: string) => {
    if (/^(h+|m+|s+)$/i.test(inner)) return whole;
    const currency = /^\$([^-]*)/.exec(inner);
    if (currency) return currency[1] ? `"${currency[1]}"` : "";
    return "";
  });
}

/** Format code with quoted text and escapes removed, for classification. */
function skeleton(section: string): string {
  return cleanSection(section)
    .replace(/"[^"]*"/g, "")
    .replace(/\\./g, "")
    .replace(/[_*]./g, "");
}

export function isDateFormat(code: string): boolean {
  const first = splitSections(code)[0] ?? "";
  const bare = skeleton(first).replace(/AM\/PM|A\/P/gi, "h");
  if (/^general$/i.test(bare.trim())) return false;
  return /[dmyhs]/i.test(bare.replace(/E[+-]/gi, ""));
}

/**
 * Calendar parts of a serial date. In the 1900 system serial 60 is the
 * fictitious 1900-02-29, so earlier serials are shifted by a day.
 */
export function excelSerialToDate(serial: number, date1904: boolean, keepFraction = false): Date {
  let days = Math.floor(serial);
  let timeMs = Math.round((serial - days) * DAY_MS);
  if (!keepFraction) timeMs = Math.round(timeMs / 1000) * 1000;
  if (timeMs >= DAY_MS) {
    days += 1;
    timeMs -= DAY_MS;
  }
  const epoch = date1904 ? Date.UTC(1904, 0, 1) : Date.UTC(1899, 11, 30);
  const shift = !date1904 && days < 60 ? 1 : 0;
  return new Date(epoch + (days + shift) * DAY_MS + timeMs);
}

type DateToken =
  | { type: "literal"; text: string }
  | { type: "year" | "month" | "day" | "hour" | "minute" | "second"; count: number }
  | { type: "elapsed"; unit: "h" | "m" | "s"; count: number }
  | { type: "ampm"; short: boolean }
  | { type: "fraction"; digits: number };

function tokenizeDate(section: string): DateToken[] {
  const tokens: DateToken[] = [];
  const literal = (text: string) => tokens.push({ type: "literal", text });
  let i = 0;
  while (i < section.length) {
    const ch = section.charAt(i);
    const rest = section.slice(i);
    if (ch === '"') {
      const end = section.indexOf('"', i + 1);
      literal(section.slice(i + 1, end === -1 ? section.length : end));
      i = end === -1 ? section.length : end + 1;
      continue;
    }
    if (ch === "\\") {
      literal(section.charAt(i + 1));
      i += 2;
      continue;
    }
    if (ch === "_") {
      literal(" ");
      i += 2;
      continue;
    }
    if (ch === "*") {
      i += 2;
      continue;
    }
    const elapsed = /^\[(h+|m+|s+)\]/i.exec(rest);
    if (elapsed?.[1]) {
      const unit = elapsed[1].charAt(0).toLowerCase();
      if (unit === "h" || unit === "m" || unit === "s") {
        tokens.push({ type: "elapsed", unit, count: elapsed[1].length });
      }
      i += elapsed[0].length;
      continue;
    }
    if (/^AM\/PM/i.test(rest)) {
      tokens.push({ type: "ampm", short: false });
      i += 5;
      continue;
    }
    if (/^A\/P/i.test(rest)) {
      tokens.push({ type: "ampm", short: true });
      i += 3;
      continue;
    }
    const run = /^(y+|m+|d+|h+|s+)/i.exec(rest)?.[1];
    if (run) {
      const kind = run.charAt(0).toLowerCase();
      const type =
        kind === "y" ? "year" : kind === "m" ? "month" : kind === "d" ? "day" : kind === "h" ? "hour" : "second";
      tokens.push({ type, count: run.length });
      i += run.length;
      continue;
    }
    const fraction = /^\.(0+)/.exec(rest);
    const previous = tokens[tokens.length - 1];
    if (fraction?.[1] && previous && (previous.type === "second" || (previous.type === "elapsed" && previous.unit === "s"))) {
      tokens.push({ type: "fraction", digits: fraction[1].length });
      i += fraction[0].length;
      continue;
    }
    literal(ch);
    i += 1;
  }

  // "m" after an hour or before a second means minutes
  const significant = (from: number, step: number): DateToken | undefined => {
    for (let j = from + step; j >= 0 && j < tokens.length; j += step) {
      const token = tokens[j];
      if (token && token.type !== "literal") return token;
    }
    return undefined;
  };
  tokens.forEach((token, index) => {
    if (token.type !== "month" || token.count > 2) return;
    const before = significant(index, -1);
    const after = significant(index, 1);
    const afterHour = before?.type === "hour" || (before?.type === "elapsed" && before.unit === "h");
    const beforeSecond = after?.type === "second" || (after?.type === "elapsed" && after.unit === "s");
    if (afterHour || beforeSecond) {
      tokens[index] = { type: "minute", count: token.count };
    }
  });
  return tokens;
}

const pad = (value: number, width: number) => String(value).padStart(width, "0");

export function formatDateSerial(serial: number, code: string, date1904: boolean): string {
  const section = cleanSection(splitSections(code)[0] ?? code);
  const tokens = tokenizeDate(section);
  const fractionDigits = tokens.reduce((max, t) => (t.type === "fraction" ? Math.max(max, t.digits) : max), 0);
  const date = excelSerialToDate(serial, date1904, fractionDigits > 0);
  const twelveHour = tokens.some((t) => t.type === "ampm");
  const hours = date.getUTCHours();

  return tokens
    .map((token): string => {
      switch (token.type) {
        case "literal":
          return token.text;
        case "year":
          return token.count <= 2 ? pad(date.getUTCFullYear() % 100, 2) : String(date.getUTCFullYear());
        case "month": {
          const month = date.getUTCMonth();
          const name = MONTHS[month] ?? "";
          if (token.count === 1) return String(month + 1);
          if (token.count === 2) return pad(month + 1, 2);
          if (token.count === 3) return name.slice(0, 3);
          if (token.count === 5) return name.charAt(0);
          return name;
        }
        case "day": {
          const name = DAYS[date.getUTCDay()] ?? "";
          if (token.count === 1) return String(date.getUTCDate());
          if (token.count === 2) return pad(date.getUTCDate(), 2);
          if (token.count === 3) return name.slice(0, 3);
          return name;
        }
        case "hour": {
          const value = twelveHour ? hours % 12 || 12 : hours;
          return token.count >= 2 ? pad(value, 2) : String(value);
        }
        case "minute":
          return token.count >= 2 ? pad(date.getUTCMinutes(), 2) : String(date.getUTCMinutes());
        case "second":
          return token.count >= 2 ? pad(date.getUTCSeconds(), 2) : String(date.getUTCSeconds());
        case "fraction": {
          const ms = pad(date.getUTCMilliseconds(), 3);
          return `.${ms.slice(0, token.digits).padEnd(token.digits, "0")}`;
        }
        case "ampm":
          if (token.short) return hours < 12 ? "A" : "P";
          return hours < 12 ? "AM" : "PM";
        case "elapsed": {
          const totalSeconds = Math.round(serial * 86_400);
          const value =
            token.unit === "h"
              ? Math.floor(totalSeconds / 3600)
              : token.unit === "m"
                ? Math.floor(totalSeconds / 60)
                : totalSeconds;
          return pad(value, token.count);
        }
      }
    })
    .join("");
}

/**
 * General format: integers as written, other values to 15 significant
 * digits without trailing zeros.
 */
export function formatGeneral(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(15)));
}

interface NumberPattern {
  prefix: string;
  pattern: string;
  suffix: string;
}

/** Separate literal text from the run of digit placeholders. */
function splitPattern(section: string): NumberPattern {
  let prefix = "";
  let pattern = "";
  let suffix = "";
  let state: "prefix" | "pattern" | "suffix" = "prefix";
  const emit = (text: string) => {
    if (state === "pattern") state = "suffix";
    if (state === "prefix") prefix += text;
    else suffix += text;
  };

  for (let i = 0; i < section.length; i++) {
    const ch = section.charAt(i);
    if (ch === '"') {
      const end = section.indexOf('"', i + 1);
      emit(section.slice(i + 1, end === -1 ? section.length : end));
      i = end === -1 ? section.length : end;
    } else if (ch === "\\") {
      emit(section.charAt(i + 1));
      i++;
    } else if (ch === "_") {
      emit(" ");
      i++;
    } else if (ch === "*") {
      i++;
    } else if ("0#?.,".includes(ch) && state !== "suffix") {
      if (ch === "," && state === "prefix") {
        emit(ch);
        continue;
      }
      state = "pattern";
      pattern += ch;
    } else {
      emit(ch);
    }
  }
  return { prefix, pattern, suffix };
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

function formatFixed(value: number, pattern: string): string {
  const dot = pattern.indexOf(".");
  let intPattern = dot === -1 ? pattern : pattern.slice(0, dot);
  const decPattern = dot === -1 ? "" : pattern.slice(dot + 1).replace(/,/g, "");

  // Trailing commas scale by a thousand each
  let scaled = value;
  while (intPattern.endsWith(",")) {
    scaled /= 1000;
    intPattern = intPattern.slice(0, -1);
  }
  const thousands = intPattern.includes(",");
  const minInt = (intPattern.match(/0/g) ?? []).length;
  const decimals = (decPattern.match(/[0#?]/g) ?? []).length;
  const minDec = (decPattern.match(/0/g) ?? []).length;

  const [intDigits = "0", decDigits = ""] = scaled.toFixed(decimals).split(".");
  let integer = intDigits === "0" && minInt === 0 ? "" : intDigits.padStart(minInt, "0");
  if (thousands) integer = groupThousands(integer);
  let fraction = decDigits;
  while (fraction.length > minDec && fraction.endsWith("0")) fraction = fraction.slice(0, -1);

  return fraction ? `${integer}.${fraction}` : integer || (minDec === 0 && decimals > 0 ? "0" : integer);
}

function formatScientific(value: number, pattern: string, exponentDigits: number): string {
  const mantissa = pattern.split(/[eE]/)[0] ?? "0";
  const dot = mantissa.indexOf(".");
  const decimals = dot === -1 ? 0 : (mantissa.slice(dot + 1).match(/[0#?]/g) ?? []).length;
  const [base = "0", exponent = "0"] = value.toExponential(decimals).split("e");
  const exp = Number(exponent);
  return `${base}E${exp < 0 ? "-" : "+"}${pad(Math.abs(exp), exponentDigits)}`;
}

function formatFraction(value: number, section: string): string {
  const match = /([#?0]*)\s+([#?0]+)\s*\/\s*([#?0-9]+)/.exec(section) ?? /([#?0]+)\s*\/\s*([#?0-9]+)/.exec(section);
  const denominatorSpec = match?.[match.length - 1] ?? "?";
  const mixed = match !== null && match.length === 4;
  const whole = mixed ? Math.floor(value) : 0;
  const rest = value - whole;

  let numerator = 0;
  let denominator = 1;
  if (/^\d+$/.test(denominatorSpec)) {
    denominator = Number(denominatorSpec);
    numerator = Math.round(rest * denominator);
  } else {
    const maxDenominator = 10 ** denominatorSpec.length - 1;
    let bestError = Infinity;
    for (let d = 1; d <= maxDenominator; d++) {
      const n = Math.round(rest * d);
      const error = Math.abs(rest - n / d);
      if (error < bestError - 1e-12) {
        bestError = error;
        numerator = n;
        denominator = d;
      }
    }
  }

  if (mixed) {
    if (numerator === 0) return String(whole);
    return whole === 0 ? `${numerator}/${denominator}` : `${whole} ${numerator}/${denominator}`;
  }
  return `${numerator}/${denominator}`;
}

/**
 * Render a number with a format code. Date/time codes must go through
 * `formatDateSerial` instead.
 */
export function formatNumber(value: number, code: string): string {
  const sections = splitSections(code);
  let section = sections[0] ?? "General";
  let sign = "";
  let magnitude = value;

  if (value < 0 && sections.length >= 2) {
    section = sections[1] ?? section;
    magnitude = -value;
  } else if (value === 0 && sections.length >= 3) {
    section = sections[2] ?? section;
  } else if (value < 0) {
    sign = "-";
    magnitude = -value;
  }

  section = cleanSection(section);
  const bare = skeleton(section).trim();
  if (bare === "" && !section.includes('"')) return sign + formatGeneral(magnitude);
  if (/^general$/i.test(bare)) return sign + formatGeneral(magnitude);
  if (bare === "@") return sign + formatGeneral(magnitude);

  const percents = (bare.match(/%/g) ?? []).length;
  magnitude *= 100 ** percents;

  if (/[#?0]\s*\/\s*[#?0-9]/.test(bare)) {
    return sign + formatFraction(magnitude, section);
  }

  const { prefix, pattern, suffix } = splitPattern(section);
  const scientific = /[eE]([+-])(0+)/.exec(section);
  if (scientific?.[2]) {
    const mantissa = section.slice(0, scientific.index);
    const mantissaPattern = splitPattern(mantissa).pattern;
    const tail = splitPattern(section.slice(scientific.index + scientific[0].length)).suffix;
    return sign + splitPattern(mantissa).prefix + formatScientific(magnitude, mantissaPattern, scientific[2].length) + tail;
  }
  if (!pattern) return sign + prefix + suffix;
  return sign + prefix + formatFixed(magnitude, pattern) + suffix;
}

/**
 * Render a numeric cell with its format code.
 */
export function formatCellNumber(value: number, code: string, date1904: boolean): string {
  if (isDateFormat(code)) return formatDateSerial(value, code, date1904);
  return formatNumber(value, code);
}
