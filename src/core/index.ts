export { ContractExtractor, NOTES } from "./ContractExtractor";
export type {
  ContractExtractorConfigureOptions,
  ProcessOptions,
  BatchOptions,
} from "./ContractExtractor";
export {
  ExtractorConfigSchema,
  HeuristicsSchema,
  FallbackSettingsSchema,
  defaultConfig,
  configFromEnv,
} from "./config";
export type {
  ExtractorConfig,
  ExtractorConfigInput,
  Heuristics,
  FallbackSettings,
  EnvConfig,
} from "./config";
export { QualityScorer, DEFAULT_QUALITY_THRESHOLD } from "./quality";
export type { QualityReport } from "./quality";
export {
  validateOptions,
  validateDocument,
  sanitiseRecord,
  ContractExtractError,
} from "./validator";
export type { ValidationResult, ContractErrorCode } from "./validator";
