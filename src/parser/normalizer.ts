/**
 * ContractExtractor – Directional text normalizer
 *
 * Repairs right-to-left extraction artifacts line by line:
 *   1. NFKC, bidi-mark stripping, Arabic-Indic digit folding
 *   2. Mirrored labels on "label: value" lines are reversed and moved left
 *   3. Mirrored Arabic sentences are reversed as a whole
 *
 * The output is stable: normalizeText(normalizeText(x)) === normalizeText(x).
 * Reversal is only applied when a run is positively oriented backwards, and
 * the orientation evidence of a string is exactly swapped by reversing it.
 */

// ─── Character classes ────────────────────────────────────────────────────────

const ARABIC_LETTER = /[\u0621-\u063a\u0641-\u064a\u0671-\u06d3\u06fa-\u06fc]/g;
const ARABIC_WORD = /[\u0621-\u063a\u0641-\u064a\u0671-\u06d3\u06fa-\u06fc]+/g;
const LATIN_LETTER = /[A-Za-z\u00c0-\u024f]/g;
const DIGIT = /[0-9]/g;

const BIDI_MARKS = /[\u200e\u200f\u061c\u202a-\u202e\u2066-\u2069]/g;
const ZERO_WIDTH = /[\u200b-\u200d\ufeff]/g;

export interface ScriptCounts {
  arabic: number;
  latin: number;
  digits: number;
}

export function countScripts(text: string): ScriptCounts {
  return {
    arabic: text.match(ARABIC_LETTER)?.length ?? 0,
    latin: text.match(LATIN_LETTER)?.length ?? 0,
    digits: text.match(DIGIT)?.length ?? 0,
  };
}

/** Reverse by code point so surrogate pairs survive */
export function reverseText(text: string): string {
  return Array.from(text).reverse().join("");
}

// ─── Orientation evidence ─────────────────────────────────────────────────────

// Definite-article forms only ever start a word; ta marbuta and alef maqsura
// only ever end one. Seen the other way round, the run was extracted mirrored.
const ARTICLE_PREFIXES = ["ال", "بال", "وال", "فال", "كال"];
const WORD_FINAL_LETTERS = ["ة", "ى"];
const MIRRORED_ARTICLES = ARTICLE_PREFIXES.map(reverseText);

function orderedEvidence(word: string): number {
  let n = 0;
  for (const p of ARTICLE_PREFIXES) {
    if (word.length > p.length && word.startsWith(p)) n++;
  }
  for (const f of WORD_FINAL_LETTERS) {
    if (word.length > 1 && word.endsWith(f)) n++;
  }
  return n;
}

function mirroredEvidence(word: string): number {
  let n = 0;
  for (const p of MIRRORED_ARTICLES) {
    if (word.length > p.length && word.endsWith(p)) n++;
  }
  for (const f of WORD_FINAL_LETTERS) {
    if (word.length > 1 && word.startsWith(f)) n++;
  }
  return n;
}

export type Orientation = "ordered" | "mirrored" | "unknown";

export function detectOrientation(text: string): Orientation {
  let ordered = 0;
  let mirrored = 0;
  for (const word of text.match(ARABIC_WORD) ?? []) {
    ordered += orderedEvidence(word);
    mirrored += mirroredEvidence(word);
  }
  if (mirrored > ordered) return "mirrored";
  if (ordered > mirrored) return "ordered";
  return "unknown";
}

// ─── Options ──────────────────────────────────────────────────────────────────

export interface NormalizerOptions {
  /** A label side must carry fewer digits than this */
  labelMaxDigits: number;
  /** Minimum Arabic letters before a colon-free line is treated as a sentence */
  sentenceMinArabic: number;
}

export const DEFAULT_NORMALIZER_OPTIONS: Readonly<NormalizerOptions> =
  Object.freeze({
    labelMaxDigits: 3,
    sentenceMinArabic: 10,
  });

// ─── Line repair ──────────────────────────────────────────────────────────────

function foldArabicDigits(text: string): string {
  return text
    .replace(/[\u0660-\u0669]/g, (d) => String(d.charCodeAt(0) - 0x0660))
    .replace(/[\u06f0-\u06f9]/g, (d) => String(d.charCodeAt(0) - 0x06f0));
}

/** Canonical form of a single line before any directional repair */
export function cleanLine(line: string): string {
  return foldArabicDigits(
    line.normalize("NFKC").replace(BIDI_MARKS, "").replace(ZERO_WIDTH, ""),
  )
    .replace(/[ \t]+/g, " ")
    .trim();
}

function isLabelCandidate(side: string, opts: NormalizerOptions): boolean {
  const c = countScripts(side);
  return c.arabic >= 1 && c.latin === 0 && c.digits < opts.labelMaxDigits;
}

function joinLabelValue(label: string, value: string): string {
  return value ? `${label}: ${value}` : `${label}:`;
}

function repairLabelValue(line: string, opts: NormalizerOptions): string {
  const idx = line.indexOf(":");
  const left = line.slice(0, idx).trim();
  const right = line.slice(idx + 1).trim();

  const leftCandidate = isLabelCandidate(left, opts);

  // "mirrored-label: value"
  if (leftCandidate && detectOrientation(left) === "mirrored") {
    return joinLabelValue(reverseText(left), right);
  }

  // "value :mirrored-label" – unless the left side is already a proper label
  if (
    isLabelCandidate(right, opts) &&
    detectOrientation(right) === "mirrored" &&
    !(leftCandidate && detectOrientation(left) === "ordered")
  ) {
    return joinLabelValue(reverseText(right), left);
  }

  return line;
}

function repairFreeText(line: string, opts: NormalizerOptions): string {
  const c = countScripts(line);
  if (
    c.arabic >= opts.sentenceMinArabic &&
    c.arabic > c.latin &&
    detectOrientation(line) === "mirrored"
  ) {
    return reverseText(line);
  }
  return line;
}

export function normalizeLine(
  line: string,
  options: Partial<NormalizerOptions> = {},
): string {
  const opts: NormalizerOptions = { ...DEFAULT_NORMALIZER_OPTIONS, ...options };
  const t = cleanLine(line);
  if (!t) return "";

  const colons = t.split(":").length - 1;
  let repaired = t;
  if (colons === 1) repaired = repairLabelValue(t, opts);
  else if (colons === 0) repaired = repairFreeText(t, opts);

  // Reversal can bring a letter before its combining mark; recompose.
  return repaired.normalize("NFKC");
}

/**
 * Normalise raw extracted page text.
 * Empty lines are dropped; survivors are joined with "\n".
 */
export function normalizeText(
  raw: string,
  options: Partial<NormalizerOptions> = {},
): string {
  if (!raw) return "";
  return raw
    .split(/\r\n|\r|\n|\f/)
    .map((line) => normalizeLine(line, options))
    .filter(Boolean)
    .join("\n");
}
