/**
 * Converter framework exports and the default registry.
 */

import { resolveOcrApiKey, type PipelineConfig } from "../../config.js";
import { CircuitBreakerRegistry } from "../circuit-breaker.js";
import { Semaphore } from "../concurrency.js";
import { MistralOcrClient, type OcrService } from "../ocr-client.js";
import type { RetryOptions } from "../retry.js";
import type { CircuitStateStore } from "../../storage/circuit-state.js";
import { DocumentConverter } from "./document-converter.js";
import { OcrConverter } from "./ocr-converter.js";
import { ConverterRegistry } from "./registry.js";
import { SpreadsheetConverter } from "./spreadsheet-converter.js";

export { ConverterRegistry } from "./registry.js";
export { SpreadsheetConverter } from "./spreadsheet-converter.js";
export { OcrConverter, inspectPdf, planBatches } from "./ocr-converter.js";
export { DocumentConverter } from "./document-converter.js";
export { withWorkspace, Workspace } from "./workspace.js";
export type { ConversionContext, Converter } from "./types.js";

export interface DefaultRegistryOptions {
  /** OCR backend; built from the configuration when omitted */
  ocrService?: OcrService;
  breakers?: CircuitBreakerRegistry;
  /** Where breaker state is kept when `breakers` is omitted; in memory by default */
  circuitStore?: CircuitStateStore;
  env?: NodeJS.ProcessEnv;
  sleep?: RetryOptions["sleep"];
}

/**
 * Build the OCR client named by the configuration.
 *
 * @throws ConfigurationError when the API key variable is unset or malformed
 */
export function createOcrService(config: PipelineConfig, env: NodeJS.ProcessEnv = process.env): OcrService {
  const ocr = config.converters.ocr;
  return new MistralOcrClient(resolveOcrApiKey(ocr, env), ocr.model, ocr.timeoutMs, ocr.baseUrl);
}

/**
 * Registry with the spreadsheet, OCR and document converters, in that
 * order. The OCR client is only built when OCR is enabled, so a missing key
 * fails here rather than halfway through a batch.
 */
export function createDefaultRegistry(config: PipelineConfig, options: DefaultRegistryOptions = {}): ConverterRegistry {
  const breakers =
    options.breakers ??
    new CircuitBreakerRegistry(
      {
        failureThreshold: config.resilience.failureThreshold,
        recoveryTimeoutMs: config.resilience.recoveryTimeoutMs,
      },
      options.circuitStore
    );
  const registry = new ConverterRegistry().register(new SpreadsheetConverter());

  // A disabled converter stays registered so its files are reported as skipped
  const service =
    options.ocrService ?? (config.converters.ocr.enabled ? createOcrService(config, options.env) : null);
  registry.register(
    new OcrConverter({
      service,
      breakers,
      limiter: new Semaphore(config.concurrency.ocrCalls),
      ...(options.sleep ? { sleep: options.sleep } : {}),
    })
  );
  return registry.register(new DocumentConverter());
}
