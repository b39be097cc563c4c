/**
 * ContractExtractor – fill-empty-only merge of fallback values
 */

import { CONTRACT_SCHEMA, fieldNames } from "../schema/ContractSchema";
import type {
  ContractFieldName,
  ContractRecord,
  ContractSchema,
} from "../schema/ContractSchema";
import { CONTRACT_RULES, formatSanitizer } from "../parser/rules";
import type { FieldRule } from "../parser/rules";
import { DEFAULT_SANITIZER_OPTIONS } from "../parser/sanitizers";
import type { SanitizerOptions } from "../parser/sanitizers";

export interface MergeResult {
  record: ContractRecord;
  /** Fields written by the merge, in schema order */
  filledFields: ContractFieldName[];
}

export interface MergeOptions {
  schema?: ContractSchema;
  rules?: readonly FieldRule[];
  sanitizers?: Partial<SanitizerOptions>;
}

/**
 * Copy `values` into a new record, writing a field only when the incoming
 * value is non-empty and the record's own value is empty.
 *
 * Identifiers, dates, amounts, short numbers, IBAN and mobile values go
 * through the field's sanitizer first; one that sanitises to "" is dropped.
 * Free text is only trimmed.
 */
export function mergeFallbackValues(
  record: ContractRecord,
  values: Partial<Record<ContractFieldName, string>>,
  options: MergeOptions = {},
): MergeResult {
  const rules = options.rules ?? CONTRACT_RULES;
  const ctx = {
    options: { ...DEFAULT_SANITIZER_OPTIONS, ...options.sanitizers },
  };
  const merged: ContractRecord = { ...record };
  const filledFields: ContractFieldName[] = [];

  for (const key of fieldNames(options.schema ?? CONTRACT_SCHEMA)) {
    if (merged[key].trim()) continue;
    const incoming = (values[key] ?? "").trim();
    if (!incoming) continue;

    const sanitize = formatSanitizer(key, rules);
    const value = sanitize ? sanitize(incoming, ctx).trim() : incoming;
    if (!value) continue;

    merged[key] = value;
    filledFields.push(key);
  }

  return { record: merged, filledFields };
}
