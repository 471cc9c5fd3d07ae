/**
 * mail-artifact-pipeline
 *
 * Turns raw email messages into AI-ready artifacts: body text with
 * positional markers, preserved attachments and inline images, converted
 * documents and token-bounded chunks.
 */

export * from "./types/index.js";
export * from "./storage/index.js";

export {
  DEFAULT_CONFIG,
  PROFILES,
  OCR_MODES,
  resolveConfig,
  configFromEnv,
  resolveOcrApiKey,
  pipelineConfigSchema,
  type PipelineConfig,
  type ConfigOverrides,
  type OcrConfig,
  type SpreadsheetConfig,
  type DocumentConfig,
  type ChunkingConfig,
  type ResilienceConfig,
} from "./config.js";

export * from "./services/errors.js";

// Extraction and validation
export { extract, attachmentMarker, imageMarker, MARKER_PATTERN, type ExtractOptions } from "./services/mime-extractor.js";
export { parseMessage, walkParts, MAX_PART_DEPTH } from "./services/mime-parser.js";
export { validate, assertAllowed, hasPathTraversal } from "./services/security-validator.js";
export { detectFileType, describeKind, isConsistentWithExtension } from "./services/file-signatures.js";
export {
  sanitizeFilename,
  extensionForContentType,
  messageKeyFor,
  buildGeneratedName,
  NameRegistry,
} from "./services/filenames.js";

// Resilience
export { backoffDelay, backoffSchedule, type BackoffPolicy } from "./services/backoff.js";
export { withRetry, callResilient, isTransientError, type RetryPolicy, type RetryOptions } from "./services/retry.js";
export { CircuitBreaker, CircuitBreakerRegistry, type CircuitBreakerOptions } from "./services/circuit-breaker.js";
export { mapWithConcurrency, Semaphore } from "./services/concurrency.js";

// Conversion
export * from "./services/converters/index.js";
export { MistralOcrClient, type OcrService, type OcrPage, type OcrImage } from "./services/ocr-client.js";
export * from "./services/chunking/index.js";

// Orchestration
export { Orchestrator, summarize, reportStatus, type ProcessOptions } from "./services/orchestrator.js";
export {
  MessagePipeline,
  messageSource,
  messageSourcesFromDirectory,
  runMessageBatch,
  OUTPUT_DIRS,
  type MessageSource,
  type MessagePipelineOptions,
} from "./services/message-pipeline.js";
export { MessageScanner, type MessageScan, type AttachmentScan } from "./services/message-scanner.js";
export { TimingCollector, formatRunMetrics, type RunMetrics } from "./services/timing.js";
