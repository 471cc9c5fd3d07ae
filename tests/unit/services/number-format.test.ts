import { describe, expect, it } from "vitest";
import {
  excelSerialToDate,
  formatCellNumber,
  formatGeneral,
  formatNumber,
  isDateFormat,
  splitSections,
} from "../../../src/services/converters/number-format.js";

describe("formatNumber", () => {
  it.each([
    [1234.5, "#,##0.00", "1,234.50"],
    [0.256, "0.0%", "25.6%"],
    [-5, "#,##0 ;(#,##0)", "(5)"],
    [-2.5, "0.0", "-2.5"],
    [12345, "0.00E+00", "1.23E+04"],
    [1.5, "# ?/?", "1 1/2"],
    [0, '0.00;-0.00;"zero"', "zero"],
    [1200000, '#,##0,,"M"', "1M"],
    [12.5, "[$€-407]#,##0.00", "€12.50"],
    [3.14159, "General", "3.14159"],
    [7, "[Red]0.00", "7.00"],
  ])("renders %d with %j as %j", (value, code, expected) => {
    expect(formatNumber(value, code)).toBe(expected);
  });

  it("trims floating point noise in the general format", () => {
    expect(formatGeneral(0.1 + 0.2)).toBe("0.3");
    expect(formatGeneral(42)).toBe("42");
  });
});

describe("date formats", () => {
  it("recognizes date and time codes", () => {
    expect(isDateFormat("yyyy-mm-dd")).toBe(true);
    expect(isDateFormat("[h]:mm")).toBe(true);
    expect(isDateFormat("h:mm AM/PM")).toBe(true);
    expect(isDateFormat("General")).toBe(false);
    expect(isDateFormat("0.00E+00")).toBe(false);
    expect(isDateFormat('"d"0')).toBe(false);
    expect(isDateFormat("[Red]0.00")).toBe(false);
  });

  it("maps serials in both date systems", () => {
    expect(excelSerialToDate(45292, false).toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(excelSerialToDate(59, false).toISOString()).toBe("1900-02-28T00:00:00.000Z");
    expect(excelSerialToDate(61, false).toISOString()).toBe("1900-03-01T00:00:00.000Z");
    expect(excelSerialToDate(0, true).toISOString()).toBe("1904-01-01T00:00:00.000Z");
  });

  it.each([
    [45292, "yyyy-mm-dd", "2024-01-01"],
    [45292, "d-mmm-yy", "1-Jan-24"],
    [0.5, "h:mm AM/PM", "12:00 PM"],
    [1.5, "[h]:mm:ss", "36:00:00"],
    [1.25 / 86_400, "mm:ss.0", "00:01.2"],
  ])("renders serial %d with %j as %j", (serial, code, expected) => {
    expect(formatCellNumber(serial, code, false)).toBe(expected);
  });

  it("uses the 1904 epoch when the workbook says so", () => {
    expect(formatCellNumber(0, "yyyy-mm-dd", true)).toBe("1904-01-01");
  });
});

describe("splitSections", () => {
  it("ignores semicolons inside quotes and brackets", () => {
    expect(splitSections('0;"a;b";[<10]0')).toEqual(["0", '"a;b"', "[<10]0"]);
  });
});
