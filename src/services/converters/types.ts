/**
 * Converter contract.
 */

import type { PipelineConfig } from "../../config.js";
import type { ConversionResult, ConverterId, ConvertibleFile } from "../../types/conversion.js";
import type { OutputFileSystem } from "../../storage/filesystem.js";
import type { TimingCollector } from "../timing.js";

export interface ConversionContext {
  config: PipelineConfig;
  fs: OutputFileSystem;
  now: () => Date;
  signal?: AbortSignal;
  timing?: TimingCollector;
}

export interface Converter {
  readonly id: ConverterId;
  /** Whether this converter handles the file's format, enabled or not */
  supports(file: ConvertibleFile, config: PipelineConfig): boolean;
  /** Whether the configuration switches this converter on */
  isEnabled(config: PipelineConfig): boolean;
  /**
   * @throws UnsupportedFormatError, FileSizeError, TypeMismatchError,
   *   ExternalServiceError or ProcessingError
   */
  convert(file: ConvertibleFile, context: ConversionContext): Promise<ConversionResult>;
}
