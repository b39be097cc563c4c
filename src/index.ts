/**
 * rtl-contract-extractor – text repair and field extraction for
 * bilingual Arabic/English employment contracts
 *
 * Repairs mirrored right-to-left text extracted from contract PDFs,
 * pulls a fixed 40-field record out of it, scores completeness and can
 * ask an LLM for the fields the rules missed.
 *
 * @packageDocumentation
 */

// ─── Primary API ──────────────────────────────────────────────────────────────
export { ContractExtractor, NOTES } from "./core";
export type {
  ContractExtractorConfigureOptions,
  ProcessOptions,
  BatchOptions,
} from "./core";

// Schema / types
export {
  CONTRACT_FIELDS,
  CONTRACT_SCHEMA,
  createEmptyRecord,
  fieldNames,
  isContractFieldName,
} from "./schema/ContractSchema";
export type {
  ContractFieldName,
  ContractFieldDefinition,
  ContractRecord,
  ContractSchema,
} from "./schema/ContractSchema";
export type {
  ContractDocument,
  DocumentOutcome,
  DocumentStatus,
  QualityStatus,
  FallbackSummary,
  BatchResult,
} from "./types";

// Parser layer
export * from "./parser";

// AI fallback layer
export * from "./ai";

// Text sources
export { Utf8TextSource, TextSourceError } from "./source/TextSource";
export type { TextSource, TextSourceContext } from "./source/TextSource";

// Configuration, scoring, validation & errors
export {
  ExtractorConfigSchema,
  HeuristicsSchema,
  FallbackSettingsSchema,
  defaultConfig,
  configFromEnv,
  QualityScorer,
  DEFAULT_QUALITY_THRESHOLD,
  validateOptions,
  validateDocument,
  sanitiseRecord,
  ContractExtractError,
} from "./core";
export type {
  ExtractorConfig,
  ExtractorConfigInput,
  Heuristics,
  FallbackSettings,
  EnvConfig,
  QualityReport,
  ValidationResult,
  ContractErrorCode,
} from "./core";

// Reporting
export {
  buildReport,
  toLogRow,
  spreadsheetHeaders,
  toSpreadsheetRow,
  LOG_HEADERS,
  REPORT_TITLE,
} from "./utils/report";
export type { LogRow } from "./utils/report";

// Utilities
export { withTempWorkspace } from "./utils/workspace";
export { mapWithConcurrency } from "./utils/concurrency";

// Logger
export { createLogger, scopedLogger, silentLogger } from "./utils/logger";
export type { ExtractorLogger, LogLevel } from "./utils/logger";
