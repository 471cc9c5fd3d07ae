import { describe, expect, it } from "vitest";
import { configFromEnv, DEFAULT_CONFIG, resolveConfig, resolveOcrApiKey } from "../../src/config.js";
import { createDefaultRegistry } from "../../src/services/converters/index.js";
import { ConfigurationError } from "../../src/services/errors.js";

describe("resolveConfig", () => {
  it("returns the defaults when nothing is overridden", () => {
    const config = resolveConfig({}, {});

    expect(config).toEqual({ ...DEFAULT_CONFIG, profile: null });
    expect(config.security.mode).toBe("graceful");
    expect(config.chunking).toEqual({
      enabled: true,
      strategy: "hybrid",
      maxTokens: 2000,
      overlapTokens: 200,
      tokenizer: "tiktoken",
    });
    expect(config.resilience).toMatchObject({ maxRetries: 3, baseDelayMs: 1000, failureThreshold: 5 });
  });

  it("layers profile, environment and explicit overrides in that order", () => {
    const config = resolveConfig(
      { chunking: { maxTokens: 500 } },
      {
        PIPELINE_PROFILE: "ai_ready",
        PIPELINE_MAX_CHUNK_TOKENS: "800",
        PIPELINE_OCR_MODE: "images",
        PIPELINE_OUTPUT_DIR: "/data/out",
      }
    );

    expect(config.profile).toBe("ai_ready");
    expect(config.chunking).toMatchObject({ strategy: "semantic", maxTokens: 500, overlapTokens: 100 });
    expect(config.converters.ocr.mode).toBe("images");
    expect(config.converters.document.extractStyles).toBe(false);
    expect(config.outputDir).toBe("/data/out");
  });

  it("prefers an explicit profile over the environment", () => {
    const config = resolveConfig({ profile: "quick" }, { PIPELINE_PROFILE: "archive" });

    expect(config.profile).toBe("quick");
    expect(config.converters.spreadsheet.enabled).toBe(true);
    expect(config.converters.ocr.enabled).toBe(false);
    expect(config.concurrency).toEqual({ messages: 1, attachments: 1, ocrCalls: 2 });
  });

  it("rejects unknown profiles", () => {
    expect(() => resolveConfig({ profile: "turbo" }, {})).toThrow(
      'Unknown profile "turbo": expected one of quick, comprehensive, ai_ready, archive'
    );
  });

  it.each(["toString", "constructor", "__proto__"])("does not take %s for a profile", (profile) => {
    expect(() => resolveConfig({ profile }, {})).toThrow(`Unknown profile "${profile}"`);
    expect(() => resolveConfig({}, { PIPELINE_PROFILE: profile })).toThrow(ConfigurationError);
  });

  it("lists every invalid setting", () => {
    let caught: unknown;
    try {
      resolveConfig(
        { chunking: { maxTokens: 100, overlapTokens: 100 }, concurrency: { messages: 0 }, security: { allowedExtensions: ["PDF"] } },
        {}
      );
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.issues : [];
    expect(issues).toContain("chunking.overlapTokens: overlapTokens must be smaller than maxTokens");
    expect(issues).toContain("security.allowedExtensions.0: extensions are lower-case and start with a dot");
    expect(issues.some((issue) => issue.startsWith("concurrency.messages:"))).toBe(true);
  });

  it("rejects a non-numeric token limit from the environment", () => {
    expect(() => resolveConfig({}, { PIPELINE_MAX_CHUNK_TOKENS: "lots" })).toThrow(ConfigurationError);
  });
});

describe("configFromEnv", () => {
  it("ignores blank values", () => {
    expect(configFromEnv({ PIPELINE_MAX_CHUNK_TOKENS: " ", PIPELINE_OUTPUT_DIR: "" })).toEqual({});
  });
});

describe("OCR API key", () => {
  const ocr = DEFAULT_CONFIG.converters.ocr;

  it("reads the variable named by the configuration", () => {
    expect(resolveOcrApiKey(ocr, { MISTRAL_API_KEY: "test-secret-0123456789" })).toBe("test-secret-0123456789");
  });

  it("rejects missing and malformed keys", () => {
    expect(() => resolveOcrApiKey(ocr, {})).toThrow(
      "OCR API key not set: environment variable MISTRAL_API_KEY is empty"
    );
    expect(() => resolveOcrApiKey(ocr, { MISTRAL_API_KEY: "test secret" })).toThrow(
      "OCR API key in MISTRAL_API_KEY looks malformed"
    );
  });

  it("fails fast when OCR is enabled without a key", () => {
    const config = resolveConfig({}, {});

    expect(() => createDefaultRegistry(config, { env: {} })).toThrow(ConfigurationError);
    const registry = createDefaultRegistry(resolveConfig({ profile: "quick" }, {}), { env: {} });
    expect(registry.list().map((c) => c.id)).toEqual(["spreadsheet", "ocr", "document"]);
  });
});
