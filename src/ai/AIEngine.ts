/**
 * ContractExtractor – AI Engine
 *
 * Manages the AI provider registry and asks the chosen provider for the
 * fields the rule-based parser left empty. Failures come back as values;
 * the engine never throws.
 */

import type { ExtractorLogger } from "../utils/logger";
import { CONTRACT_SCHEMA } from "../schema/ContractSchema";
import type {
  ContractFieldName,
  ContractSchema,
} from "../schema/ContractSchema";
import type { AIFillResult, AIProvider, FieldRequest } from "./AIProvider";
import { AIProviderError } from "./AIProvider";

// ─── Registry ────────────────────────────────────────────────────────────────

const _registry = new Map<string, AIProvider>();

export function registerAIProvider(provider: AIProvider): void {
  _registry.set(provider.name, provider);
}

export function getAIProvider(name: string): AIProvider | undefined {
  return _registry.get(name);
}

export function unregisterAIProvider(name: string): boolean {
  return _registry.delete(name);
}

/** Registered provider names, in registration order */
export function listAIProviders(): string[] {
  return Array.from(_registry.keys());
}

// ─── Engine ──────────────────────────────────────────────────────────────────

export type FallbackOutcome =
  | { ok: true; result: AIFillResult }
  | { ok: false; error: AIProviderError };

export interface AIEngineOptions {
  /** Registered provider name; the first registered provider otherwise */
  preferredProvider?: string;
  maxChars: number;
  retries: number;
  retryDelayMs: number;
}

export const DEFAULT_AI_ENGINE_OPTIONS: AIEngineOptions = {
  maxChars: 22_000,
  retries: 2,
  retryDelayMs: 600,
};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class AIEngine {
  private readonly logger: ExtractorLogger;
  private readonly options: AIEngineOptions;

  constructor(
    logger: ExtractorLogger,
    options: Partial<AIEngineOptions> = {},
  ) {
    this.logger = logger;
    this.options = { ...DEFAULT_AI_ENGINE_OPTIONS, ...options };
  }

  /**
   * Ask a provider for `missing` fields only.
   * Transport, timeout and malformed-response failures are retried.
   */
  async fill(
    missing: readonly ContractFieldName[],
    normalizedText: string,
    schema: ContractSchema = CONTRACT_SCHEMA,
  ): Promise<FallbackOutcome> {
    const providerKey = this.options.preferredProvider ?? this.findFirst();
    if (!providerKey) {
      return this.unavailable("none", "No AI provider registered");
    }

    const provider = _registry.get(providerKey);
    if (!provider) {
      return this.unavailable(
        providerKey,
        `AI provider '${providerKey}' not registered`,
      );
    }

    const wanted = new Set(missing);
    const fields: FieldRequest[] = schema.fields
      .filter((f) => wanted.has(f.key))
      .map((f) => ({ key: f.key, header: f.header }));

    if (fields.length === 0) {
      return {
        ok: true,
        result: {
          values: {},
          evidence: {},
          confidence: {},
          rawText: "",
          provider: provider.name,
        },
      };
    }

    let available: boolean;
    try {
      available = await provider.isAvailable();
    } catch (err) {
      return this.unavailable(providerKey, describe(err));
    }
    if (!available) {
      return this.unavailable(
        providerKey,
        `AI provider '${providerKey}' reported unavailable`,
      );
    }

    const text = normalizedText.trim().slice(0, this.options.maxChars);
    const attempts = this.options.retries + 1;
    let lastError: AIProviderError | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        this.logger.info(
          `Requesting ${fields.length} field(s) from ${providerKey} (attempt ${attempt}/${attempts})`,
        );
        const result = await provider.fill({ fields, text });
        this.logger.debug(`AI fill complete – provider: ${result.provider}`);
        return { ok: true, result };
      } catch (err) {
        lastError =
          err instanceof AIProviderError
            ? err
            : new AIProviderError(describe(err), providerKey, "transport", err);
        this.logger.warn(
          `AI provider '${providerKey}' failed: ${lastError.message}`,
        );
        if (lastError.kind === "unavailable") break;
        if (attempt < attempts) await sleep(this.options.retryDelayMs);
      }
    }

    return {
      ok: false,
      error:
        lastError ??
        new AIProviderError("No attempt was made", providerKey, "transport"),
    };
  }

  private unavailable(provider: string, message: string): FallbackOutcome {
    this.logger.debug(`${message} – skipping AI fallback`);
    return {
      ok: false,
      error: new AIProviderError(message, provider, "unavailable"),
    };
  }

  private findFirst(): string | undefined {
    const keys = listAIProviders();
    return keys.length > 0 ? keys[0] : undefined;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
