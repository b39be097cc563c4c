/**
 * ContractExtractor – Extraction quality scoring
 *
 * Completeness of a record: how many schema fields carry a value.
 * Callers use it to label documents; the parser never consults it.
 */

import { CONTRACT_SCHEMA } from "../schema/ContractSchema";
import type {
  ContractFieldName,
  ContractRecord,
  ContractSchema,
} from "../schema/ContractSchema";
import type { QualityStatus } from "../types";

export interface QualityReport {
  filled: number;
  total: number;
  /** 0–100, one decimal */
  percent: number;
  /** Empty fields in schema order */
  missing: ContractFieldName[];
}

export const DEFAULT_QUALITY_THRESHOLD = 35;

export class QualityScorer {
  constructor(
    private readonly schema: ContractSchema = CONTRACT_SCHEMA,
    private readonly threshold: number = DEFAULT_QUALITY_THRESHOLD,
  ) {}

  score(record: ContractRecord): QualityReport {
    const missing: ContractFieldName[] = [];
    let filled = 0;

    for (const { key } of this.schema.fields) {
      if ((record[key] ?? "").trim()) filled++;
      else missing.push(key);
    }

    const total = this.schema.fields.length;
    const percent = total > 0 ? Math.round((filled / total) * 1000) / 10 : 0;
    return { filled, total, percent, missing };
  }

  statusFor(report: QualityReport): QualityStatus {
    return report.percent >= this.threshold ? "OK" : "LOW_QUALITY";
  }
}
