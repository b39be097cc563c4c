/**
 * ContractExtractor – shared type definitions
 */

import type { ContractFieldName, ContractRecord } from "./schema/ContractSchema";
import type { QualityReport } from "./core/quality";

/**
 * One source document. `content` is the already-materialised text, or
 * bytes a TextSource knows how to decode.
 */
export interface ContractDocument {
  fileName: string;
  content: string | Uint8Array;
}

export type QualityStatus = "OK" | "LOW_QUALITY";

/**
 * Per-document status
 * - OK / LOW_QUALITY: parsed; completeness at/below the threshold
 * - SKIPPED: input empty or too small
 * - ERROR: processing this document failed
 */
export type DocumentStatus = QualityStatus | "SKIPPED" | "ERROR";

export type FallbackSummary =
  | {
      applied: true;
      provider: string;
      filledFields: ContractFieldName[];
      evidence: Partial<Record<ContractFieldName, string>>;
      confidence: Partial<Record<ContractFieldName, number>>;
    }
  | { applied: false; error: string };

export interface DocumentOutcome {
  fileName: string;
  status: DocumentStatus;
  record: ContractRecord;
  quality: QualityReport;
  note: string;
  /** ISO-8601 time processing started */
  timestamp: string;
  processingTimeMs: number;
  fallback?: FallbackSummary;
  rawText?: string;
  normalizedText?: string;
}

export interface BatchResult {
  /** One outcome per input document, in input order */
  outcomes: DocumentOutcome[];
  counts: Record<DocumentStatus, number>;
  report: string;
}
