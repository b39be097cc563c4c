/**
 * ContractExtractor – Main extraction API
 *
 * Entry point for single-document and batch processing.
 *
 * Usage:
 *   import { ContractExtractor } from "rtl-contract-extractor";
 *
 *   const outcome = await ContractExtractor.processDocument({
 *     fileName: "contract-0142.txt",
 *     content: pageText,
 *   });
 *
 * Advanced usage:
 *   ContractExtractor.configure({
 *     qualityThreshold: 40,
 *     emailStrategy: "section",
 *     aiProvider: new PerplexityProvider({ apiKey }),
 *   });
 */

import { ExtractorConfigSchema, defaultConfig } from "./config";
import type { ExtractorConfig, ExtractorConfigInput } from "./config";
import { QualityScorer } from "./quality";
import type { QualityReport } from "./quality";
import {
  ContractExtractError,
  sanitiseRecord,
  validateDocument,
  validateOptions,
} from "./validator";
import { CONTRACT_SCHEMA, createEmptyRecord } from "../schema/ContractSchema";
import type { ContractRecord } from "../schema/ContractSchema";
import { normalizeText } from "../parser/normalizer";
import { ContractParser } from "../parser/ContractParser";
import {
  AIEngine,
  getAIProvider,
  listAIProviders,
  registerAIProvider,
} from "../ai/AIEngine";
import type { AIProvider } from "../ai/AIProvider";
import { mergeFallbackValues } from "../ai/merge";
import { TextSourceError, Utf8TextSource } from "../source/TextSource";
import type { TextSource, TextSourceContext } from "../source/TextSource";
import { createLogger, scopedLogger } from "../utils/logger";
import type { ExtractorLogger } from "../utils/logger";
import { mapWithConcurrency } from "../utils/concurrency";
import { withTempWorkspace } from "../utils/workspace";
import { buildReport } from "../utils/report";
import type {
  BatchResult,
  ContractDocument,
  DocumentOutcome,
  DocumentStatus,
  FallbackSummary,
} from "../types";

// ─── Global configuration ─────────────────────────────────────────────────────

let _config: ExtractorConfig = defaultConfig();
let _textSource: TextSource = new Utf8TextSource();

export type ContractExtractorConfigureOptions = ExtractorConfigInput & {
  /** Register an AI provider for the fallback */
  aiProvider?: AIProvider;
  /** Replace the default UTF-8 text source */
  textSource?: TextSource;
};

export interface ProcessOptions {
  debug?: boolean;
  includeText?: boolean;
  /** `false` skips the AI fallback for this call */
  fallback?: boolean;
  /** Registered provider name; the first registered provider otherwise */
  aiProvider?: string;
  textSource?: TextSource;
}

export interface BatchOptions extends ProcessOptions {
  /** Documents processed at once (default 1) */
  concurrency?: number;
}

export const NOTES = {
  ok: "Parsed successfully",
  lowQuality: "Low filled fields; check normalized text",
  skipped: "File empty/too small",
} as const;

function describe(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

function emptyCounts(): Record<DocumentStatus, number> {
  return { OK: 0, LOW_QUALITY: 0, SKIPPED: 0, ERROR: 0 };
}

// ─── ContractExtractor namespace ──────────────────────────────────────────────

export const ContractExtractor = {
  /**
   * Adjust module-level defaults and register providers.
   * Nested `heuristics` and `fallback` settings are merged key by key.
   *
   * @throws ContractExtractError (INVALID_INPUT) when validation fails
   */
  configure(options: ContractExtractorConfigureOptions): void {
    const { aiProvider, textSource, heuristics, fallback, ...rest } = options;
    const candidate = {
      ..._config,
      ...rest,
      heuristics: { ..._config.heuristics, ...heuristics },
      fallback: { ..._config.fallback, ...fallback },
    };

    const validation = validateOptions(candidate);
    if (!validation.valid) {
      throw new ContractExtractError(
        `Invalid options: ${validation.errors.join("; ")}`,
        "INVALID_INPUT",
      );
    }

    _config = ExtractorConfigSchema.parse(candidate);
    if (textSource) _textSource = textSource;
    if (aiProvider) registerAIProvider(aiProvider);
  },

  /** Current effective configuration */
  getConfig(): ExtractorConfig {
    return {
      ..._config,
      heuristics: { ..._config.heuristics },
      fallback: { ..._config.fallback },
    };
  },

  /** Restore defaults and the UTF-8 text source. Registered providers stay. */
  reset(): void {
    _config = defaultConfig();
    _textSource = new Utf8TextSource();
  },

  normalize(raw: string): string {
    return normalizeText(raw, _config.heuristics);
  },

  extract(normalizedText: string, logger?: ExtractorLogger): ContractRecord {
    const parser = new ContractParser({
      schema: CONTRACT_SCHEMA,
      sanitizers: _config.heuristics,
      emailStrategy: _config.emailStrategy,
      logger: logger ?? createLogger(_config.debug),
    });
    return parser.parse(normalizedText);
  },

  score(record: ContractRecord): QualityReport {
    return new QualityScorer(CONTRACT_SCHEMA, _config.qualityThreshold).score(
      record,
    );
  },

  /**
   * Process one document inside its own temporary workspace.
   * Never throws for document-level failures; they become ERROR outcomes.
   */
  async processDocument(
    doc: ContractDocument,
    options: ProcessOptions = {},
  ): Promise<DocumentOutcome> {
    const logger = createLogger(options.debug ?? _config.debug);
    return withTempWorkspace((workDir) =>
      this.runDocument(doc, options, { workDir }, logger),
    );
  },

  /**
   * Process documents in input order, sharing one temporary workspace that
   * is removed when the run ends.
   *
   * @throws ContractExtractError (INVALID_INPUT) on a bad concurrency value
   */
  async processBatch(
    docs: readonly ContractDocument[],
    options: BatchOptions = {},
  ): Promise<BatchResult> {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ContractExtractError(
        "`concurrency` must be a positive integer.",
        "INVALID_INPUT",
      );
    }

    const logger = createLogger(options.debug ?? _config.debug);
    logger.info(
      `processBatch() started – ${docs.length} document(s), concurrency ${concurrency}`,
    );

    const outcomes = await withTempWorkspace((workDir) =>
      mapWithConcurrency(docs, concurrency, (doc) =>
        this.runDocument(doc, options, { workDir }, logger),
      ),
    );

    const counts = emptyCounts();
    for (const outcome of outcomes) counts[outcome.status]++;

    logger.info(
      `processBatch() finished – OK ${counts.OK}, LOW_QUALITY ${counts.LOW_QUALITY}, SKIPPED ${counts.SKIPPED}, ERROR ${counts.ERROR}`,
    );

    return { outcomes, counts, report: buildReport(outcomes) };
  },

  // ─── Private helpers ──────────────────────────────────────────────────────

  async runDocument(
    doc: ContractDocument,
    options: ProcessOptions,
    context: TextSourceContext,
    batchLogger: ExtractorLogger,
  ): Promise<DocumentOutcome> {
    const logger = scopedLogger(batchLogger, doc.fileName);
    const startTime = Date.now();
    const timestamp = new Date(startTime).toISOString();
    const config = _config;
    const scorer = new QualityScorer(CONTRACT_SCHEMA, config.qualityThreshold);
    const includeText = options.includeText ?? config.includeText;

    const finish = (
      status: DocumentStatus,
      record: ContractRecord,
      note: string,
      extra: Partial<DocumentOutcome> = {},
    ): DocumentOutcome => ({
      fileName: doc.fileName,
      status,
      record,
      quality: scorer.score(record),
      note,
      timestamp,
      processingTimeMs: Date.now() - startTime,
      ...extra,
    });

    try {
      // ── 1. Validate input ───────────────────────────────────────────────
      const validation = validateDocument(doc);
      if (!validation.valid) {
        throw new ContractExtractError(
          `Invalid document: ${validation.errors.join("; ")}`,
          "INVALID_INPUT",
        );
      }

      if (doc.content.length < config.minInputLength) {
        logger.info(`skipped (${doc.content.length} chars)`);
        return finish("SKIPPED", createEmptyRecord(), NOTES.skipped);
      }

      // ── 2. Read text ─────────────────────────────────────────────────────
      const source = options.textSource ?? _textSource;
      let rawText: string;
      try {
        rawText = await source.readText(doc, context);
      } catch (err) {
        throw err instanceof TextSourceError
          ? err
          : new TextSourceError(
              err instanceof Error ? err.message : String(err),
              doc.fileName,
              err,
            );
      }

      // ── 3. Normalise & parse ────────────────────────────────────────────
      const normalizedText = normalizeText(rawText, config.heuristics);
      logger.debug(`${normalizedText.split("\n").length} normalised line(s)`);

      let record: ContractRecord;
      try {
        record = this.extract(normalizedText, logger);
      } catch (err) {
        throw new ContractExtractError(
          `Parsing failed: ${err instanceof Error ? err.message : String(err)}`,
          "PARSE_FAILED",
          err,
        );
      }

      // ── 4. AI fallback (optional) ───────────────────────────────────────
      let fallback: FallbackSummary | undefined;
      const missing = scorer.score(record).missing;
      const wantFallback = options.fallback ?? config.fallback.enabled;
      const hasProvider = options.aiProvider
        ? getAIProvider(options.aiProvider) !== undefined
        : listAIProviders().length > 0;

      if (wantFallback && hasProvider && missing.length > 0) {
        const engine = new AIEngine(logger, {
          preferredProvider: options.aiProvider,
          maxChars: config.fallback.maxChars,
          retries: config.fallback.retries,
          retryDelayMs: config.fallback.retryDelayMs,
        });
        const outcome = await engine.fill(missing, normalizedText);

        if (outcome.ok) {
          const merged = mergeFallbackValues(record, outcome.result.values, {
            schema: CONTRACT_SCHEMA,
            sanitizers: config.heuristics,
          });
          record = sanitiseRecord(merged.record, CONTRACT_SCHEMA);
          fallback = {
            applied: true,
            provider: outcome.result.provider,
            filledFields: merged.filledFields,
            evidence: outcome.result.evidence,
            confidence: outcome.result.confidence,
          };
          logger.info(`AI filled ${merged.filledFields.length} field(s)`);
        } else {
          // non-fatal; keep the rule-based record
          logger.warn(`AI fallback failed – ${outcome.error.message}`);
          fallback = { applied: false, error: outcome.error.message };
        }
      }

      // ── 5. Score & return ───────────────────────────────────────────────
      const quality = scorer.score(record);
      const status = scorer.statusFor(quality);
      logger.info(
        `${status} – ${quality.filled}/${quality.total} (${quality.percent}%)`,
      );

      return finish(
        status,
        record,
        status === "OK" ? NOTES.ok : NOTES.lowQuality,
        {
          ...(fallback ? { fallback } : {}),
          ...(includeText ? { rawText, normalizedText } : {}),
        },
      );
    } catch (err) {
      logger.error(describe(err));
      return finish("ERROR", createEmptyRecord(), describe(err));
    }
  },
};
