/**
 * ContractExtractor – Batch reporting helpers
 *
 * Plain-data views of a batch (text report, log rows, spreadsheet rows)
 * for whatever writer the caller uses.
 */

import { CONTRACT_SCHEMA } from "../schema/ContractSchema";
import type { ContractRecord, ContractSchema } from "../schema/ContractSchema";
import type { DocumentOutcome, DocumentStatus } from "../types";

export const REPORT_TITLE = "Contracts Extraction Report";

/** Missing fields listed in a log row before it is cut off */
export const LOG_MISSING_LIMIT = 10;

export interface LogRow {
  timestamp: string;
  fileName: string;
  status: DocumentStatus;
  filledFields: number;
  totalFields: number;
  qualityPercent: number;
  missingFields: string;
  note: string;
}

export const LOG_HEADERS: readonly string[] = [
  "timestamp",
  "file_name",
  "status",
  "filled_fields",
  "total_fields",
  "quality_%",
  "missing_fields",
  "note",
];

function reportLine(outcome: DocumentOutcome): string {
  switch (outcome.status) {
    case "SKIPPED":
      return `- ${outcome.fileName}: SKIPPED (empty)`;
    case "ERROR":
      return `- ${outcome.fileName}: ERROR -> ${outcome.note}`;
    default:
      return (
        `- ${outcome.fileName}: ${outcome.status}` +
        ` | Quality ${outcome.quality.percent.toFixed(1)}%` +
        ` | Missing ${outcome.quality.missing.length} fields`
      );
  }
}

export function buildReport(outcomes: readonly DocumentOutcome[]): string {
  return [REPORT_TITLE, ...outcomes.map(reportLine)].join("\n");
}

export function toLogRow(outcome: DocumentOutcome): LogRow {
  const { missing } = outcome.quality;
  const shown = missing.slice(0, LOG_MISSING_LIMIT).join(", ");
  return {
    timestamp: outcome.timestamp,
    fileName: outcome.fileName,
    status: outcome.status,
    filledFields: outcome.quality.filled,
    totalFields: outcome.quality.total,
    qualityPercent: outcome.quality.percent,
    missingFields: missing.length > LOG_MISSING_LIMIT ? `${shown} ...` : shown,
    note: outcome.note,
  };
}

/** Column titles in schema order */
export function spreadsheetHeaders(
  schema: ContractSchema = CONTRACT_SCHEMA,
): string[] {
  return schema.fields.map((f) => f.header);
}

/** Record values aligned with `spreadsheetHeaders(schema)` */
export function toSpreadsheetRow(
  record: ContractRecord,
  schema: ContractSchema = CONTRACT_SCHEMA,
): string[] {
  return schema.fields.map((f) => record[f.key] ?? "");
}
