import { describe, expect, it } from "vitest";
import { MalformedMessageError } from "../../../src/services/errors.js";
import { NameRegistry } from "../../../src/services/filenames.js";
import { decodeHeaderValue, decodeQuotedPrintable, parseHeaderParams } from "../../../src/services/mime-decoding.js";
import { extract, MARKER_PATTERN } from "../../../src/services/mime-extractor.js";
import { parseMessage, splitMultipart } from "../../../src/services/mime-parser.js";

const PDF_BASE64 = "JVBERi0xLjQKJSVFT0YK"; // "%PDF-1.4\n%%EOF\n"
const PNG_BASE64 = "iVBORw0KGgoAAAAN";

function message(lines: string[]): string {
  return lines.join("\n");
}

const MIXED = message([
  "From: Alice <alice@example.com>",
  "To: bob@example.com",
  "Subject: =?UTF-8?B?UmVwb3J0IMOcYmVyc2ljaHQ=?=",
  "Message-ID: <msg-1@example.com>",
  "MIME-Version: 1.0",
  'Content-Type: multipart/mixed; boundary="b(1)+*"',
  "",
  "preamble is ignored",
  "--b(1)+*",
  "Content-Type: text/plain; charset=utf-8",
  "Content-Transfer-Encoding: quoted-printable",
  "",
  "Caf=C3=A9 menu is =",
  "ready.",
  "--b(1)+*",
  'Content-Type: application/pdf; name="report.pdf"',
  'Content-Disposition: attachment; filename="report.pdf"',
  "Content-Transfer-Encoding: base64",
  "",
  PDF_BASE64,
  "--b(1)+*",
  "Content-Type: text/plain; charset=utf-8",
  "",
  "Regards",
  "--b(1)+*--",
  "",
]);

const RELATED = message([
  "Message-ID: <msg-3@example.com>",
  "Subject: Inline",
  "Content-Type: multipart/related; boundary=rel",
  "",
  "--rel",
  "Content-Type: image/png",
  "Content-ID: <logo@x>",
  "Content-Transfer-Encoding: base64",
  "",
  PNG_BASE64,
  "--rel",
  "Content-Type: text/html; charset=utf-8",
  "",
  '<p>Hello <img src="cid:logo@x"> world</p>',
  "--rel",
  "Content-Type: image/png",
  "Content-ID: <logo@x>",
  "Content-Transfer-Encoding: base64",
  "",
  PNG_BASE64,
  "--rel--",
]);

describe("extract", () => {
  it("places attachment markers where the parts stood", () => {
    const result = extract(MIXED);

    expect(result.messageId).toBe("msg-1@example.com");
    expect(result.messageKey).toBe("f5d111cd");
    expect(result.subject).toBe("Report Übersicht");
    expect(result.from).toBe("Alice <alice@example.com>");
    expect(result.bodyText).toBe("Café menu is ready.\n\n[[attachment:1]]\n\nRegards");
    expect(result.positions).toEqual([
      {
        marker: "[[attachment:1]]",
        kind: "attachment",
        index: 1,
        partId: "1.2",
        originalName: "report.pdf",
        generatedName: "report_f5d111cd_01.pdf",
        offset: 21,
        anchor: "part_position",
      },
    ]);
    expect(result.bodyText.slice(21, 37)).toBe("[[attachment:1]]");
  });

  it("decodes and validates attachments", () => {
    const [attachment] = extract(MIXED).attachments;

    expect(attachment?.content.toString("latin1")).toBe("%PDF-1.4\n%%EOF\n");
    expect(attachment?.detectedType.kind).toBe("pdf");
    expect(attachment?.validation.allowed).toBe(true);
    expect(attachment?.contentType).toBe("application/pdf");
  });

  it("records the body parts the text was built from", () => {
    const result = extract(MIXED);

    expect(result.bodyParts.map((p) => [p.partId, p.source, p.charset, p.text])).toEqual([
      ["1.1", "plain", "utf-8", "Café menu is ready."],
      ["1.3", "plain", "utf-8", "Regards"],
    ]);
    expect(result.parts.map((p) => p.id)).toEqual(["1", "1.1", "1.2", "1.3"]);
  });

  it("marks cid-referenced images inside the HTML text and suffixes duplicate content ids", () => {
    const result = extract(RELATED);

    expect(result.bodyText).toBe("Hello [[image:1]] world\n\n[[image:2]]");
    expect(result.inlineImages.map((img) => [img.contentId, img.originalContentId, img.generatedName])).toEqual([
      ["logo@x", "logo@x", "logo_75ff84b2_01.png"],
      ["logo@x_1", "logo@x", "logo_75ff84b2_02.png"],
    ]);
    expect(result.positions.map((p) => [p.marker, p.offset, p.anchor])).toEqual([
      ["[[image:1]]", 6, "html_reference"],
      ["[[image:2]]", 25, "part_position"],
    ]);
  });

  it("emits exactly one marker per attachment and image", () => {
    for (const raw of [MIXED, RELATED]) {
      const result = extract(raw);
      const markers = [...result.bodyText.matchAll(MARKER_PATTERN)].map((m) => m[0]);
      const expected = [...result.attachments, ...result.inlineImages].map((f) => f.marker);
      expect(markers.sort()).toEqual(expected.sort());
    }
  });

  it.each([
    ["a comment", '<!--[if mso]><img src="cid:logo@x"><![endif]--><p>Hi</p>'],
    ["a script", '<script>var s = \'<img src="cid:logo@x">\';</script><p>Hi</p>'],
    ["the head", '<html><head><title><img src="cid:logo@x"></title></head><body><p>Hi</p></body></html>'],
  ])("places an image referenced only inside %s at its part position", (_where, html) => {
    const raw = message([
      "Message-ID: <msg-4@example.com>",
      "Content-Type: multipart/related; boundary=rel",
      "",
      "--rel",
      "Content-Type: text/html; charset=utf-8",
      "",
      html,
      "--rel",
      "Content-Type: image/png",
      "Content-ID: <logo@x>",
      "Content-Transfer-Encoding: base64",
      "",
      PNG_BASE64,
      "--rel--",
    ]);

    const result = extract(raw);

    expect(result.bodyText).toBe("Hi\n\n[[image:1]]");
    expect(result.positions.map((p) => [p.marker, p.offset, p.anchor])).toEqual([["[[image:1]]", 4, "part_position"]]);
  });

  it("prefers the plain branch of an alternative", () => {
    const raw = message([
      "Message-ID: <msg-2@example.com>",
      "Content-Type: multipart/related; boundary=rel",
      "",
      "--rel",
      "Content-Type: multipart/alternative; boundary=alt",
      "",
      "--alt",
      "Content-Type: text/html",
      "",
      "<p>HTML version</p>",
      "--alt",
      "Content-Type: text/plain",
      "",
      "Plain version",
      "--alt--",
      "--rel",
      "Content-Type: image/png",
      "Content-ID: <logo@x>",
      "Content-Transfer-Encoding: base64",
      "",
      PNG_BASE64,
      "--rel--",
    ]);

    const result = extract(raw);
    expect(result.bodyText).toBe("Plain version\n\n[[image:1]]");
    expect(result.inlineImages[0]?.generatedName).toBe("logo_a482961d_01.png");
  });

  it("decodes RFC 2231 file names", () => {
    const raw = message([
      "Message-ID: <msg-6@example.com>",
      "Content-Type: multipart/mixed; boundary=x",
      "",
      "--x",
      "Content-Type: text/csv",
      "Content-Disposition: attachment; filename*=UTF-8''%C3%BCbersicht.txt",
      "",
      "a,b",
      "--x--",
    ]);

    const [attachment] = extract(raw).attachments;
    expect(attachment?.originalName).toBe("übersicht.txt");
    expect(attachment?.generatedName).toBe("übersicht_aaffac92_01.txt");
  });

  it("degrades a multipart without its boundary to one text part", () => {
    const raw = message(["Message-ID: <m@x>", "Content-Type: multipart/mixed; boundary=zzz", "", "just text", ""]);

    const result = extract(raw);
    expect(result.bodyText).toBe("just text");
    expect(result.warnings).toEqual(['Part 1: boundary "zzz" not found; treated as a single text part']);
    expect(result.parts[0]?.degraded).toBe(true);
  });

  it("keeps an unterminated final part", () => {
    const raw = message([
      "Message-ID: <m@x>",
      "Content-Type: multipart/mixed; boundary=x",
      "",
      "--x",
      "Content-Type: text/plain",
      "",
      "first",
      "--x",
      "Content-Type: text/plain",
      "",
      "second",
    ]);

    const result = extract(raw);
    expect(result.bodyText).toBe("first\n\nsecond");
    expect(result.warnings).toEqual(["Part 1: closing boundary missing, kept remaining content"]);
  });

  it("falls back to the source id, then to a content digest", () => {
    const raw = message(["Subject: no id", "", "body"]);

    expect(extract(raw, { sourceId: "source-7" }).messageId).toBe("source-7");
    expect(extract(raw, { sourceId: "source-7" }).messageKey).toBe("4a81437d");
    expect(extract(raw).messageId).toMatch(/^generated-[0-9a-f]{16}$/);
  });

  it("keeps generated names unique across messages sharing a registry", () => {
    const names = new NameRegistry();
    const first = extract(MIXED, { names });
    const second = extract(MIXED, { names });

    expect(first.attachments[0]?.generatedName).toBe("report_f5d111cd_01.pdf");
    expect(second.attachments[0]?.generatedName).toBe("report_f5d111cd_01-2.pdf");
  });

  it("rejects input without a header block", () => {
    expect(() => extract("")).toThrow(MalformedMessageError);
    expect(() => extract("not a header\n\nbody")).toThrow("Message does not start with a header block");
  });

  it("denies blocked attachments without dropping them", () => {
    const raw = message([
      "Message-ID: <m@x>",
      "Content-Type: multipart/mixed; boundary=x",
      "",
      "--x",
      "Content-Type: application/octet-stream",
      "Content-Disposition: attachment; filename=setup.exe",
      "",
      "MZ",
      "--x--",
    ]);

    const [attachment] = extract(raw).attachments;
    expect(attachment?.validation.allowed).toBe(false);
    expect(attachment?.validation.violation).toBe("blocked_extension");
  });
});

describe("MIME parsing helpers", () => {
  it("splits on boundaries containing pattern characters", () => {
    const split = splitMultipart("--a.*b\nfirst\n--a.*b\nsecond\n--a.*b--\n", "a.*b");
    expect(split).toEqual({ parts: ["first", "second"], closed: true });
    expect(splitMultipart("--axxb\nfirst\n", "a.*b")).toBeNull();
  });

  it("numbers parts by dotted path", () => {
    const parsed = parseMessage(MIXED);
    expect(parsed.root.id).toBe("1");
    expect(parsed.root.children.map((c) => [c.id, c.parentId])).toEqual([
      ["1.1", "1"],
      ["1.2", "1"],
      ["1.3", "1"],
    ]);
  });

  it("decodes encoded words and drops whitespace between adjacent ones", () => {
    expect(decodeHeaderValue("=?ISO-8859-1?Q?Caf=E9?= =?UTF-8?Q?_bar?=")).toBe("Café bar");
    expect(decodeHeaderValue("=?unknown-charset?Q?x?=")).toBe("=?unknown-charset?Q?x?=");
  });

  it("joins RFC 2231 continuations", () => {
    const parsed = parseHeaderParams('attachment; filename*0="long "; filename*1="name.pdf"');
    expect(parsed.value).toBe("attachment");
    expect(parsed.params.filename).toBe("long name.pdf");
  });

  it("decodes quoted-printable soft breaks and escapes", () => {
    expect(decodeQuotedPrintable(Buffer.from("a=3Db =\nc")).toString("latin1")).toBe("a=b c");
  });
});
