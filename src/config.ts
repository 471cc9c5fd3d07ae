/**
 * Pipeline Configuration
 *
 * Built-in defaults, named profiles, environment overrides and explicit
 * overrides are merged in that order, then validated. Invalid settings raise
 * ConfigurationError before any message is touched.
 */

import { z } from "zod";
import { ConfigurationError } from "./services/errors.js";
import { TOKENIZER_KINDS } from "./services/chunking/tokenizer.js";
import { CHUNKING_STRATEGIES } from "./types/chunk.js";
import { SECURITY_MODES } from "./types/validation.js";

const MiB = 1024 * 1024;

export const OCR_MODES = ["text", "images", "all"] as const;
export type OcrMode = (typeof OCR_MODES)[number];

const extensionList = z
  .array(z.string().regex(/^\.[a-z0-9]+$/, "extensions are lower-case and start with a dot"));

const securitySchema = z.object({
  maxBytes: z.number().int().positive(),
  allowedExtensions: extensionList,
  blockedExtensions: extensionList,
  mode: z.enum(SECURITY_MODES),
});

const spreadsheetSchema = z.object({
  enabled: z.boolean(),
  maxBytes: z.number().int().positive(),
  /** 0 keeps every row */
  maxRowsPerSheet: z.number().int().min(0),
  delimiter: z.string().length(1),
});

const ocrSchema = z.object({
  enabled: z.boolean(),
  maxBytes: z.number().int().positive(),
  mode: z.enum(OCR_MODES),
  baseUrl: z.string().url(),
  model: z.string().min(1),
  /** Name of the environment variable holding the API key */
  apiKeyEnv: z.string().min(1),
  timeoutMs: z.number().int().positive(),
  pageSeparator: z.string(),
  /** 0 keeps every image */
  imageLimit: z.number().int().min(0),
  imageMinSize: z.number().int().min(0),
  /** 0 sends the whole document in one request */
  pageBatchSize: z.number().int().min(0),
  /** Also OCR standalone PNG/JPEG/TIFF attachments */
  scanImages: z.boolean(),
});

const documentSchema = z.object({
  enabled: z.boolean(),
  maxBytes: z.number().int().positive(),
  extractMetadata: z.boolean(),
  extractStyles: z.boolean(),
  extractImages: z.boolean(),
  styleFormat: z.enum(["json", "css"]),
});

const chunkingSchema = z
  .object({
    enabled: z.boolean(),
    strategy: z.enum(CHUNKING_STRATEGIES),
    maxTokens: z.number().int().positive(),
    overlapTokens: z.number().int().min(0),
    tokenizer: z.enum(TOKENIZER_KINDS),
  })
  .refine((c) => c.overlapTokens < c.maxTokens, {
    message: "overlapTokens must be smaller than maxTokens",
    path: ["overlapTokens"],
  });

const resilienceSchema = z.object({
  maxRetries: z.number().int().min(0),
  baseDelayMs: z.number().min(0),
  backoffMultiplier: z.number().min(1),
  maxDelayMs: z.number().min(0),
  failureThreshold: z.number().int().positive(),
  recoveryTimeoutMs: z.number().int().min(0),
});

const concurrencySchema = z.object({
  messages: z.number().int().positive(),
  attachments: z.number().int().positive(),
  ocrCalls: z.number().int().positive(),
});

export const pipelineConfigSchema = z.object({
  outputDir: z.string().min(1),
  profile: z.string().nullable(),
  security: securitySchema,
  converters: z.object({
    spreadsheet: spreadsheetSchema,
    ocr: ocrSchema,
    document: documentSchema,
  }),
  chunking: chunkingSchema,
  resilience: resilienceSchema,
  concurrency: concurrencySchema,
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type OcrConfig = PipelineConfig["converters"]["ocr"];
export type SpreadsheetConfig = PipelineConfig["converters"]["spreadsheet"];
export type DocumentConfig = PipelineConfig["converters"]["document"];
export type ChunkingConfig = PipelineConfig["chunking"];
export type ResilienceConfig = PipelineConfig["resilience"];

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object | null
      ? DeepPartial<T[K]>
      : T[K];
};

export type ConfigOverrides = DeepPartial<PipelineConfig>;

export const DEFAULT_CONFIG: PipelineConfig = {
  outputDir: "output",
  profile: null,
  security: {
    maxBytes: 50 * MiB,
    allowedExtensions: [
      ".pdf", ".docx", ".doc", ".xlsx", ".xls", ".txt", ".csv",
      ".jpg", ".jpeg", ".png", ".gif", ".zip", ".eml", ".html",
    ],
    blockedExtensions: [
      ".exe", ".bat", ".cmd", ".sh", ".js", ".vbs", ".ps1",
      ".reg", ".msi", ".com", ".jar", ".php", ".py", ".scr",
    ],
    mode: "graceful",
  },
  converters: {
    spreadsheet: {
      enabled: true,
      maxBytes: 25 * MiB,
      maxRowsPerSheet: 0,
      delimiter: ",",
    },
    ocr: {
      enabled: true,
      maxBytes: 50 * MiB,
      mode: "all",
      baseUrl: "https://api.mistral.ai",
      model: "mistral-ocr-latest",
      apiKeyEnv: "MISTRAL_API_KEY",
      timeoutMs: 30_000,
      pageSeparator: "\n\n---\n\n",
      imageLimit: 0,
      imageMinSize: 100,
      pageBatchSize: 0,
      scanImages: false,
    },
    document: {
      enabled: true,
      maxBytes: 50 * MiB,
      extractMetadata: true,
      extractStyles: true,
      extractImages: true,
      styleFormat: "json",
    },
  },
  chunking: {
    enabled: true,
    strategy: "hybrid",
    maxTokens: 2000,
    overlapTokens: 200,
    tokenizer: "tiktoken",
  },
  resilience: {
    maxRetries: 3,
    baseDelayMs: 1000,
    backoffMultiplier: 2,
    maxDelayMs: 30_000,
    failureThreshold: 5,
    recoveryTimeoutMs: 300_000,
  },
  concurrency: {
    messages: 4,
    attachments: 4,
    ocrCalls: 2,
  },
};

/**
 * Named presets layered over the defaults.
 */
export const PROFILES: Record<string, ConfigOverrides> = {
  quick: {
    converters: {
      ocr: { enabled: false },
      document: { enabled: false },
    },
    chunking: { enabled: false },
    concurrency: { messages: 1, attachments: 1 },
  },
  comprehensive: {},
  ai_ready: {
    converters: {
      ocr: { mode: "text" },
      document: { extractStyles: false },
    },
    chunking: { strategy: "semantic", maxTokens: 1000, overlapTokens: 100 },
  },
  archive: {
    converters: {
      spreadsheet: { enabled: false },
      ocr: { enabled: false },
      document: { enabled: false },
    },
    chunking: { enabled: false },
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: unknown, patch: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(patch)) {
    return patch === undefined ? base : patch;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

/**
 * Read the overrides carried by environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const chunking: Record<string, unknown> = {};
  const ocr: Record<string, unknown> = {};

  if (env.PIPELINE_OUTPUT_DIR) overrides.outputDir = env.PIPELINE_OUTPUT_DIR;
  if (env.PIPELINE_CHUNK_STRATEGY) chunking.strategy = env.PIPELINE_CHUNK_STRATEGY;
  const maxTokens = envNumber(env.PIPELINE_MAX_CHUNK_TOKENS);
  if (maxTokens !== undefined) chunking.maxTokens = maxTokens;
  if (env.PIPELINE_OCR_BASE_URL) ocr.baseUrl = env.PIPELINE_OCR_BASE_URL;
  if (env.PIPELINE_OCR_MODE) ocr.mode = env.PIPELINE_OCR_MODE;

  if (Object.keys(chunking).length > 0) overrides.chunking = chunking;
  if (Object.keys(ocr).length > 0) overrides.converters = { ocr };
  return overrides;
}

/**
 * Resolve the effective configuration.
 *
 * Order: defaults, profile (explicit override wins over PIPELINE_PROFILE),
 * environment, explicit overrides.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const profileName = overrides.profile ?? env.PIPELINE_PROFILE ?? null;
  let merged: unknown = DEFAULT_CONFIG;

  if (profileName !== null) {
    const profile = Object.hasOwn(PROFILES, profileName) ? PROFILES[profileName] : undefined;
    if (!profile) {
      throw new ConfigurationError(`Unknown profile "${profileName}"`, [
        `expected one of ${Object.keys(PROFILES).join(", ")}`,
      ]);
    }
    merged = deepMerge(merged, profile);
  }

  merged = deepMerge(merged, configFromEnv(env));
  merged = deepMerge(merged, overrides);
  merged = deepMerge(merged, { profile: profileName });

  const parsed = pipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigurationError("Invalid pipeline configuration", issues);
  }
  return parsed.data;
}

/**
 * Look up the OCR API key named by the configuration.
 */
export function resolveOcrApiKey(
  config: OcrConfig,
  env: NodeJS.ProcessEnv = process.env
): string {
  const key = env[config.apiKeyEnv];
  if (!key) {
    throw new ConfigurationError(`OCR API key not set`, [
      `environment variable ${config.apiKeyEnv} is empty`,
    ]);
  }
  if (/\s/.test(key) || key.length < 16) {
    throw new ConfigurationError(`OCR API key in ${config.apiKeyEnv} looks malformed`);
  }
  return key;
}
