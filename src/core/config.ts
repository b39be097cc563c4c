/**
 * ContractExtractor – Configuration schema
 *
 * Every tunable of the pipeline, with its default. The reversal
 * thresholds were tuned against one contract template family and are
 * exposed here so they can be re-validated against other corpora.
 */

import { z } from "zod";

export const HeuristicsSchema = z.object({
  /** A label side of "label: value" must carry fewer digits than this */
  labelMaxDigits: z.number().int().positive().default(3),
  /** Arabic letters before a colon-free line counts as a sentence */
  sentenceMinArabic: z.number().int().positive().default(10),
  /** Arabic letters before a free-text value is flipped */
  valueFlipMinArabic: z.number().int().positive().default(3),
  /** Short-number tokens read with their two digits swapped */
  swappedDigitsPattern: z.instanceof(RegExp).default(/^0\d$/),
  /** Years above this are digit-reversed */
  maxPlausibleYear: z.number().int().positive().default(2100),
});

export const FallbackSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  /** Normalised text is cut to this many characters before sending */
  maxChars: z.number().int().positive().default(22_000),
  retries: z.number().int().min(0).max(5).default(2),
  retryDelayMs: z.number().int().min(0).default(600),
});

export const ExtractorConfigSchema = z.object({
  /** Completeness percentage at or above which a document is OK */
  qualityThreshold: z.number().min(0).max(100).default(35),
  /** Inputs shorter than this are skipped */
  minInputLength: z.number().int().min(0).default(50),
  emailStrategy: z.enum(["positional", "section"]).default("positional"),
  debug: z.boolean().default(false),
  /** Attach raw and normalised text to every outcome */
  includeText: z.boolean().default(false),
  heuristics: HeuristicsSchema.default({}),
  fallback: FallbackSettingsSchema.default({}),
});

export type ExtractorConfig = z.infer<typeof ExtractorConfigSchema>;
export type ExtractorConfigInput = z.input<typeof ExtractorConfigSchema>;
export type Heuristics = z.infer<typeof HeuristicsSchema>;
export type FallbackSettings = z.infer<typeof FallbackSettingsSchema>;

export function defaultConfig(): ExtractorConfig {
  return ExtractorConfigSchema.parse({});
}

// ─── Environment ──────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  PERPLEXITY_API_KEY: z.string().min(1).optional(),
  FALLBACK_MODEL: z.string().min(1).optional(),
  FALLBACK_MAX_CHARS: z.coerce.number().int().positive().optional(),
  QUALITY_THRESHOLD: z.coerce.number().min(0).max(100).optional(),
  EMAIL_STRATEGY: z.enum(["positional", "section"]).optional(),
  CONTRACT_DEBUG: z.enum(["0", "1", "true", "false"]).optional(),
});

export interface EnvConfig {
  options: ExtractorConfigInput;
  apiKey?: string;
  model?: string;
}

/**
 * Read configuration from environment variables.
 * Unknown and empty variables are ignored; malformed ones throw a ZodError.
 */
export function configFromEnv(
  env: Record<string, string | undefined>,
): EnvConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== "",
    ),
  );
  const e = EnvSchema.parse(present);
  const options: ExtractorConfigInput = {};

  if (e.QUALITY_THRESHOLD !== undefined) {
    options.qualityThreshold = e.QUALITY_THRESHOLD;
  }
  if (e.EMAIL_STRATEGY !== undefined) options.emailStrategy = e.EMAIL_STRATEGY;
  if (e.CONTRACT_DEBUG !== undefined) {
    options.debug = e.CONTRACT_DEBUG === "1" || e.CONTRACT_DEBUG === "true";
  }
  if (e.FALLBACK_MAX_CHARS !== undefined) {
    options.fallback = { maxChars: e.FALLBACK_MAX_CHARS };
  }

  return { options, apiKey: e.PERPLEXITY_API_KEY, model: e.FALLBACK_MODEL };
}
