/**
 * Pipeline Errors
 *
 * Typed error taxonomy shared by the extractor, converters, resilience layer
 * and orchestrator. Every error carries a `kind` so reports can record it
 * without instanceof checks.
 */

export const PIPELINE_ERROR_KINDS = [
  "malformed_message",
  "validation",
  "unsupported_format",
  "external_service",
  "configuration",
  "processing",
  "cancelled",
] as const;

export type PipelineErrorKind = (typeof PIPELINE_ERROR_KINDS)[number];

/** Violation codes reported by the security validator. */
export const VALIDATION_VIOLATIONS = [
  "path_traversal",
  "file_size",
  "blocked_extension",
  "extension_not_allowed",
  "type_mismatch",
] as const;

export type ValidationViolation = (typeof VALIDATION_VIOLATIONS)[number];

/** Failure classes of an external call. Only some are worth retrying. */
export type ServiceFailure =
  | "timeout"
  | "server"
  | "rate_limit"
  | "network"
  | "client"
  | "circuit_open";

const TRANSIENT_FAILURES: ReadonlySet<ServiceFailure> = new Set([
  "timeout",
  "server",
  "rate_limit",
  "network",
]);

export interface PipelineErrorOptions {
  cause?: unknown;
  /** Where partial output was left, if any */
  partialOutput?: string;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  /** Where partial output was left, when known */
  partialOutput: string | undefined;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.partialOutput = options.partialOutput;
  }
}

export class MalformedMessageError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super("malformed_message", message, options);
    this.name = "MalformedMessageError";
  }
}

export class ValidationError extends PipelineError {
  readonly violation: ValidationViolation;

  constructor(violation: ValidationViolation, message: string, options: PipelineErrorOptions = {}) {
    super("validation", message, options);
    this.name = "ValidationError";
    this.violation = violation;
  }
}

export class TypeMismatchError extends ValidationError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super("type_mismatch", message, options);
    this.name = "TypeMismatchError";
  }
}

export class FileSizeError extends ValidationError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number, options: PipelineErrorOptions = {}) {
    super("file_size", `File size ${size} bytes exceeds limit of ${limit} bytes`, options);
    this.name = "FileSizeError";
    this.size = size;
    this.limit = limit;
  }
}

export class PathTraversalError extends ValidationError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super("path_traversal", message, options);
    this.name = "PathTraversalError";
  }
}

export class DisallowedExtensionError extends ValidationError {
  constructor(
    violation: "blocked_extension" | "extension_not_allowed",
    message: string,
    options: PipelineErrorOptions = {}
  ) {
    super(violation, message, options);
    this.name = "DisallowedExtensionError";
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super("unsupported_format", message, options);
    this.name = "UnsupportedFormatError";
  }
}

export interface ExternalServiceErrorOptions extends PipelineErrorOptions {
  status?: number;
  attempts?: number;
}

export class ExternalServiceError extends PipelineError {
  readonly failure: ServiceFailure;
  readonly status: number | undefined;
  /** Calls made before giving up; updated by the retry loop */
  attempts: number;

  constructor(failure: ServiceFailure, message: string, options: ExternalServiceErrorOptions = {}) {
    super("external_service", message, options);
    this.name = "ExternalServiceError";
    this.failure = failure;
    this.status = options.status;
    this.attempts = options.attempts ?? 1;
  }

  /** Whether another attempt could plausibly succeed. */
  get transient(): boolean {
    return TRANSIENT_FAILURES.has(this.failure);
  }
}

export class ServiceUnavailableError extends ExternalServiceError {
  readonly endpoint: string;
  readonly retryAt: Date;

  constructor(endpoint: string, retryAt: Date) {
    super("circuit_open", `Circuit breaker for ${endpoint} is open until ${retryAt.toISOString()}`);
    this.name = "ServiceUnavailableError";
    this.endpoint = endpoint;
    this.retryAt = retryAt;
  }
}

export class ConfigurationError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("configuration", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class ProcessingError extends PipelineError {
  constructor(message: string, options: PipelineErrorOptions = {}) {
    super("processing", message, options);
    this.name = "ProcessingError";
  }
}

export class CancelledError extends PipelineError {
  constructor(message = "Operation cancelled") {
    super("cancelled", message);
    this.name = "CancelledError";
  }
}

/**
 * Normalize anything thrown into a PipelineError.
 * Unknown failures become ProcessingError with the original as cause.
 */
export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  if (err instanceof Error) {
    return new ProcessingError(err.message, { cause: err });
  }
  return new ProcessingError(String(err), { cause: err });
}

/** Serializable shape used in reports and metadata documents. */
export interface ErrorSummary {
  kind: PipelineErrorKind;
  name: string;
  message: string;
  violation?: ValidationViolation;
  failure?: ServiceFailure;
  partialOutput?: string;
}

export function summarizeError(err: unknown): ErrorSummary {
  const error = toPipelineError(err);
  const summary: ErrorSummary = {
    kind: error.kind,
    name: error.name,
    message: error.message,
  };
  if (error instanceof ValidationError) summary.violation = error.violation;
  if (error instanceof ExternalServiceError) summary.failure = error.failure;
  if (error.partialOutput !== undefined) summary.partialOutput = error.partialOutput;
  return summary;
}

/**
 * Type guard for Node.js system errors (ENOENT and friends).
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
