/**
 * ContractExtractor – Perplexity provider
 *
 * Perplexity speaks the chat-completions protocol but rejects
 * `response_format: json_object`, so JSON mode is off by default.
 */

import { OpenAIProvider } from "./OpenAIProvider";
import type { OpenAIProviderConfig } from "./OpenAIProvider";

export const PERPLEXITY_BASE_URL = "https://api.perplexity.ai";
export const PERPLEXITY_DEFAULT_MODEL = "sonar";

export class PerplexityProvider extends OpenAIProvider {
  constructor(config: OpenAIProviderConfig) {
    super({
      ...config,
      name: config.name ?? "perplexity",
      baseUrl: config.baseUrl ?? PERPLEXITY_BASE_URL,
      model: config.model ?? PERPLEXITY_DEFAULT_MODEL,
      jsonMode: config.jsonMode ?? false,
    });
  }
}
