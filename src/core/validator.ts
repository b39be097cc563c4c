/**
 * ContractExtractor – Input & output validation layer
 *
 * Validates options and documents before processing and sanitises
 * records before they are returned to the caller.
 */

import { ExtractorConfigSchema } from "./config";
import {
  CONTRACT_SCHEMA,
  createEmptyRecord,
  fieldNames,
} from "../schema/ContractSchema";
import type {
  ContractRecord,
  ContractSchema,
} from "../schema/ContractSchema";
import type { ContractDocument } from "../types";

// ─── Input validation ─────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export function validateOptions(options: unknown): ValidationResult {
  const parsed = ExtractorConfigSchema.safeParse(options);
  if (parsed.success) return { valid: true, errors: [] };
  return {
    valid: false,
    errors: parsed.error.issues.map((issue) =>
      issue.path.length > 0
        ? `\`${issue.path.join(".")}\`: ${issue.message}`
        : issue.message,
    ),
  };
}

export function validateDocument(doc: ContractDocument): ValidationResult {
  const errors: string[] = [];

  if (typeof doc.fileName !== "string" || doc.fileName.trim() === "") {
    errors.push("`fileName` must be a non-empty string.");
  }

  if (typeof doc.content !== "string" && !(doc.content instanceof Uint8Array)) {
    errors.push("`content` must be a string or a Uint8Array.");
  }

  return { valid: errors.length === 0, errors };
}

// ─── Record sanitisation ──────────────────────────────────────────────────────

/**
 * Every record field present and never null/undefined; the fields of
 * `schema` carry the trimmed input, the rest are "".
 */
export function sanitiseRecord(
  record: Partial<ContractRecord>,
  schema: ContractSchema = CONTRACT_SCHEMA,
): ContractRecord {
  const out = createEmptyRecord();
  for (const key of fieldNames(schema)) {
    const value = record[key];
    out[key] = value == null ? "" : String(value).trim();
  }
  return out;
}

// ─── Typed error ──────────────────────────────────────────────────────────────

export type ContractErrorCode =
  | "INVALID_INPUT"
  | "SOURCE_FAILED"
  | "PARSE_FAILED"
  | "AI_FAILED"
  | "TIMEOUT"
  | "UNKNOWN";

export class ContractExtractError extends Error {
  constructor(
    message: string,
    public readonly code: ContractErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ContractExtractError";
  }
}
