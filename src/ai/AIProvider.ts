/**
 * ContractExtractor – AI fallback provider abstraction
 *
 * The AI layer is entirely optional; it is only asked for the fields the
 * rule-based parser left empty, and its answers never overwrite a value
 * the parser found.
 */

import type { ContractFieldName } from "../schema/ContractSchema";

// ─── Request / result ────────────────────────────────────────────────────────

export interface FieldRequest {
  key: ContractFieldName;
  /** Column title, given to the model as a hint */
  header: string;
}

export interface AIFillRequest {
  /** Fields to fill – the only keys the provider may answer */
  fields: FieldRequest[];
  /** Normalised contract text, already truncated to the character budget */
  text: string;
}

export interface AIFillResult {
  /** Values for requested fields only; "" when the model found nothing */
  values: Partial<Record<ContractFieldName, string>>;
  /** Short snippet of text supporting each value */
  evidence: Partial<Record<ContractFieldName, string>>;
  /** Model confidence per field (0–1) */
  confidence: Partial<Record<ContractFieldName, number>>;
  /** Raw model output, kept for diagnostics */
  rawText: string;
  /** Name of the provider that produced this result */
  provider: string;
}

// ─── Contract ────────────────────────────────────────────────────────────────

export interface AIProvider {
  /** Unique provider identifier */
  readonly name: string;

  /**
   * Ask the model for the requested fields.
   * Must throw AIProviderError on transport or malformed-response failure.
   */
  fill(request: AIFillRequest): Promise<AIFillResult>;

  /** Return `true` if the provider can be used (e.g. API key configured) */
  isAvailable(): Promise<boolean>;
}

// ─── Error ───────────────────────────────────────────────────────────────────

export type AIFailureKind =
  | "unavailable"
  | "transport"
  | "malformed"
  | "timeout";

export class AIProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly kind: AIFailureKind = "transport",
    public readonly cause?: unknown,
  ) {
    super(`[AI:${provider}] ${message}`);
    this.name = "AIProviderError";
  }
}
