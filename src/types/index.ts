/**
 * Type definitions for messages, validation, conversion, chunking,
 * circuit state and processing reports.
 */

// Messages and extraction
export type {
  HeaderField,
  Disposition,
  Part,
  Message,
  BodySource,
  BodyPart,
  MarkerKind,
  PositionRef,
  Attachment,
  InlineImage,
  PartSummary,
  ExtractionResult,
} from "./message.js";

// Security validation
export type {
  DetectedFileKind,
  DetectedFileType,
  SecurityMode,
  SecurityPolicy,
  ValidationOutcome,
  ValidationSubject,
} from "./validation.js";
export { DETECTED_FILE_KINDS, SECURITY_MODES } from "./validation.js";

// Conversion
export type {
  ConverterId,
  ConversionResult,
  ConvertibleFile,
  ExtractedImageRef,
} from "./conversion.js";
export { CONVERTER_IDS } from "./conversion.js";

// Chunking
export type { Chunk, ChunkCursor, ChunkingStrategy, BreakKind } from "./chunk.js";
export { CHUNKING_STRATEGIES } from "./chunk.js";

// Circuit breaker state
export type { CircuitState, CircuitStatus } from "./circuit.js";
export { CIRCUIT_STATUSES } from "./circuit.js";

// Reports and ledger
export type {
  AttachmentStatus,
  AttachmentOutcome,
  ReportSummary,
  ReportStatus,
  ProcessingReport,
  MessageStatus,
  MessageOutcome,
  BatchReport,
  MessageRecordStatus,
  MessageRecord,
  CreateMessageRecordInput,
} from "./report.js";
export { ATTACHMENT_STATUSES } from "./report.js";
