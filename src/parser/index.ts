export { ContractParser, sliceBetween } from "./ContractParser";
export type { ContractParserOptions, EmailStrategy } from "./ContractParser";
export {
  normalizeText,
  normalizeLine,
  cleanLine,
  countScripts,
  detectOrientation,
  reverseText,
  DEFAULT_NORMALIZER_OPTIONS,
} from "./normalizer";
export type {
  NormalizerOptions,
  Orientation,
  ScriptCounts,
} from "./normalizer";
export {
  digitsOnly,
  cleanIban,
  formatDate,
  cleanAmount,
  repairSwappedDigits,
  flipRtl,
  splitCompound,
  normalizeMobile,
  extractEmails,
  EMAIL_PATTERN,
  DEFAULT_SANITIZER_OPTIONS,
} from "./sanitizers";
export type { SanitizerOptions, EmailScanOptions } from "./sanitizers";
export { CONTRACT_RULES, PARTY_SECTIONS, formatSanitizer } from "./rules";
export type {
  FieldRule,
  Locator,
  ValueSanitizer,
  SanitizeContext,
  EmailParty,
} from "./rules";
