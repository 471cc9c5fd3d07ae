import { describe, expect, it } from "vitest";
import { CircuitBreakerRegistry } from "../../../src/services/circuit-breaker.js";
import { DocumentConverter } from "../../../src/services/converters/document-converter.js";
import { OcrConverter } from "../../../src/services/converters/ocr-converter.js";
import { ConverterRegistry } from "../../../src/services/converters/registry.js";
import { SpreadsheetConverter } from "../../../src/services/converters/spreadsheet-converter.js";
import {
  categorize,
  complexityOf,
  estimateSeconds,
  MessageScanner,
} from "../../../src/services/message-scanner.js";
import { buildDocx, buildXlsx, paragraph, pdfWithPages, testConfig, worksheet } from "./fixtures.js";

const MiB = 1024 * 1024;

function attachmentPart(name: string, contentType: string, content: Buffer): string[] {
  const base64 = content.toString("base64").replace(/.{1,76}/g, "$&\n").trimEnd();
  return [
    "--b",
    `Content-Type: ${contentType}`,
    `Content-Disposition: attachment; filename="${name}"`,
    "Content-Transfer-Encoding: base64",
    "",
    base64,
  ];
}

async function buildMessage(extra: string[] = []): Promise<string> {
  const docx = await buildDocx({ body: paragraph("Hi"), app: "<Pages>4</Pages>" });
  const xlsx = await buildXlsx({
    sheets: [
      { name: "A", xml: worksheet("") },
      { name: "B", xml: worksheet("") },
    ],
  });
  return [
    "Message-ID: <scan@example.com>",
    "Subject: Quarter close",
    "From: finance@example.com",
    "Content-Type: multipart/mixed; boundary=b",
    "",
    "--b",
    "Content-Type: text/plain",
    "",
    "Numbers attached.",
    ...attachmentPart("report.pdf", "application/pdf", pdfWithPages(3)),
    ...attachmentPart("notes.docx", "application/octet-stream", docx),
    ...attachmentPart("budget.xlsx", "application/octet-stream", xlsx),
    ...extra,
    "--b--",
  ].join("\n");
}

function scanner(): MessageScanner {
  const registry = new ConverterRegistry()
    .register(new SpreadsheetConverter())
    .register(
      new OcrConverter({
        service: null,
        breakers: new CircuitBreakerRegistry({ failureThreshold: 5, recoveryTimeoutMs: 1000 }),
      })
    )
    .register(new DocumentConverter());
  return new MessageScanner(registry);
}

describe("MessageScanner", () => {
  it("inventories attachments without converting them", async () => {
    const scan = await scanner().scan(await buildMessage(), testConfig());

    expect(scan.subject).toBe("Quarter close");
    expect(scan.from).toBe("finance@example.com");
    expect(
      scan.attachments.map((a) => [
        a.originalName,
        a.detectedKind,
        a.category,
        a.complexity,
        a.converterId,
        a.converterEnabled,
        a.estimatedPages,
        a.sheetCount,
        a.estimatedSeconds,
      ])
    ).toEqual([
      ["report.pdf", "pdf", "pdf", "simple", "ocr", true, 3, null, 6],
      ["notes.docx", "docx", "document", "simple", "document", true, 4, null, 1],
      ["budget.xlsx", "xlsx", "spreadsheet", "simple", "spreadsheet", true, null, 2, 1],
    ]);
    expect(scan.attachments.every((a) => a.allowed && a.warnings.length === 0)).toBe(true);
  });

  it("scores the message and recommends a profile", async () => {
    const scan = await scanner().scan(await buildMessage(), testConfig());

    expect(scan.complexityScore).toBeCloseTo(3.7);
    expect(scan.estimatedSeconds).toBe(19);
    expect(scan.recommendedProfile).toBe("comprehensive");
    expect(scan.recommendations).toEqual([
      'Use the "comprehensive" profile',
      'Use OCR mode "all" to keep page images',
      "Enable chunking for language-model-ready document text",
    ]);
    expect(scan.warnings).toEqual([]);
  });

  it("warns about rejections and disabled converters", async () => {
    const exe = ["--b", "Content-Type: application/octet-stream", "Content-Disposition: attachment; filename=setup.exe", "", "MZ"];
    const scan = await scanner().scan(await buildMessage(exe), testConfig({ profile: "quick" }));

    expect(scan.attachments[0]?.warnings).toEqual(["The ocr converter is disabled"]);
    expect(scan.attachments[0]?.converterEnabled).toBe(false);
    expect(scan.attachments[3]).toMatchObject({
      originalName: "setup.exe",
      allowed: false,
      converterId: null,
      warnings: ["Will be rejected: Extension .exe is blocked"],
    });
    expect(scan.warnings).toEqual(["PDF attachments will be skipped while OCR is disabled"]);
  });
});

describe("scan heuristics", () => {
  it("grades complexity by category and size", () => {
    expect(complexityOf("pdf", 0.5 * MiB)).toBe("simple");
    expect(complexityOf("pdf", 2 * MiB)).toBe("moderate");
    expect(complexityOf("document", 5 * MiB)).toBe("complex");
    expect(complexityOf("spreadsheet", 6 * MiB)).toBe("very_complex");
    expect(complexityOf("image", 100 * MiB)).toBe("complex");
  });

  it("estimates time with OCR start-up for PDFs", () => {
    expect(estimateSeconds("pdf", 2 * MiB)).toBe(65);
    expect(estimateSeconds("document", 2 * MiB)).toBe(10);
    expect(estimateSeconds("text", 10)).toBe(1);
  });

  it("puts unknown kinds in the other category", () => {
    expect(categorize("ole")).toBe("other");
    expect(categorize("jpeg")).toBe("image");
  });
});
