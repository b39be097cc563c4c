/**
 * ContractExtractor – AI response parsing
 *
 * Models answer with a JSON object keyed by the requested field names,
 * optionally wrapped in prose or code fences, plus `evidence` and
 * `confidence` side maps. Keys that were not requested are dropped.
 */

import { z } from "zod";
import type { ContractFieldName } from "../schema/ContractSchema";
import type { AIFillResult } from "./AIProvider";
import { AIProviderError } from "./AIProvider";

const ObjectSchema = z.record(z.unknown());
const ConfidenceSchema = z.coerce.number().min(0).max(1);

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** First JSON object in a model reply, or undefined */
export function extractJsonBlock(content: string): unknown {
  const clean = content
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```\s*$/, "")
    .trim();
  if (!clean) return undefined;

  const direct = tryParseJson(clean);
  if (direct !== undefined) return direct;

  const block = clean.match(/\{[\s\S]*\}/);
  return block ? tryParseJson(block[0]) : undefined;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}

function sideMap(
  obj: Record<string, unknown>,
  ...keys: string[]
): Record<string, unknown> {
  for (const key of keys) {
    const parsed = ObjectSchema.safeParse(obj[key]);
    if (parsed.success) return parsed.data;
  }
  return {};
}

/**
 * Parse a model reply into values/evidence/confidence for `fields`.
 * @throws AIProviderError (kind "malformed") when no JSON object is found
 */
export function parseFillResponse(
  content: string,
  fields: readonly ContractFieldName[],
  provider: string,
): AIFillResult {
  const parsed = ObjectSchema.safeParse(extractJsonBlock(content));
  if (!parsed.success) {
    throw new AIProviderError("AI returned non-JSON", provider, "malformed");
  }
  const obj = parsed.data;

  const evidenceIn = sideMap(obj, "evidence", "_evidence");
  const confidenceIn = sideMap(obj, "confidence", "_confidence");

  const result: AIFillResult = {
    values: {},
    evidence: {},
    confidence: {},
    rawText: content,
    provider,
  };

  for (const field of fields) {
    result.values[field] = toText(obj[field]);

    const ev = toText(evidenceIn[field]);
    if (ev) result.evidence[field] = ev;

    if (confidenceIn[field] !== undefined && confidenceIn[field] !== null) {
      const conf = ConfidenceSchema.safeParse(confidenceIn[field]);
      if (conf.success) result.confidence[field] = conf.data;
    }
  }

  return result;
}
