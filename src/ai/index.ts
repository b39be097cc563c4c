export {
  AIEngine,
  registerAIProvider,
  getAIProvider,
  unregisterAIProvider,
  listAIProviders,
  DEFAULT_AI_ENGINE_OPTIONS,
} from "./AIEngine";
export type { AIEngineOptions, FallbackOutcome } from "./AIEngine";
export { OpenAIProvider } from "./OpenAIProvider";
export type { OpenAIProviderConfig } from "./OpenAIProvider";
export {
  PerplexityProvider,
  PERPLEXITY_BASE_URL,
  PERPLEXITY_DEFAULT_MODEL,
} from "./PerplexityProvider";
export { AIProviderError } from "./AIProvider";
export type {
  AIProvider,
  AIFillRequest,
  AIFillResult,
  AIFailureKind,
  FieldRequest,
} from "./AIProvider";
export { parseFillResponse, extractJsonBlock } from "./response";
export { mergeFallbackValues } from "./merge";
export type { MergeResult, MergeOptions } from "./merge";
