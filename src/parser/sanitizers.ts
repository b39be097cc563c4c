/**
 * ContractExtractor – Value sanitizers
 *
 * Pure functions that turn a located raw substring into the canonical
 * value stored in a ContractRecord. None of them throw; an unusable
 * input yields "".
 */

import { countScripts, reverseText } from "./normalizer";

// ─── Heuristic parameters ─────────────────────────────────────────────────────

export interface SanitizerOptions {
  /** Minimum Arabic letters before a value is flipped */
  valueFlipMinArabic: number;
  /** Raw short-number tokens matching this are digit-swapped */
  swappedDigitsPattern: RegExp;
  /** A parsed year above this is treated as digit-reversed */
  maxPlausibleYear: number;
}

export const DEFAULT_SANITIZER_OPTIONS: Readonly<SanitizerOptions> =
  Object.freeze({
    valueFlipMinArabic: 3,
    swappedDigitsPattern: /^0\d$/,
    maxPlausibleYear: 2100,
  });

// ─── Identifiers ──────────────────────────────────────────────────────────────

export function digitsOnly(raw: string | undefined | null): string {
  if (raw == null) return "";
  return String(raw).replace(/\D/g, "");
}

export function cleanIban(raw: string | undefined | null): string {
  if (raw == null) return "";
  return String(raw).replace(/\s+/g, "").toUpperCase();
}

// ─── Dates ────────────────────────────────────────────────────────────────────

const DATE_TOKEN = /(\d{1,4})([-/])(\d{1,2})\2(\d{1,4})/;

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

/** Parse the three parts of a date token, or undefined when invalid */
function parseDateParts(
  a: string,
  b: string,
  c: string,
): { day: number; month: number; year: number } | undefined {
  let day: number;
  let month: number;
  let year: number;

  if (a.length === 4) {
    year = parseInt(a, 10);
    month = parseInt(b, 10);
    day = parseInt(c, 10);
  } else if (c.length === 4 || c.length <= 2) {
    day = parseInt(a, 10);
    month = parseInt(b, 10);
    year = parseInt(c, 10);
    if (c.length <= 2) year += 2000;
  } else {
    return undefined;
  }

  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > 31) return undefined;
  return { day, month, year };
}

function formatDateToken(
  token: string,
  maxYear: number,
): string | undefined {
  const m = token.match(DATE_TOKEN);
  if (!m) return undefined;
  const parts = parseDateParts(m[1], m[3], m[4]);
  if (!parts || parts.year > maxYear) return undefined;
  return `${pad(parts.day, 2)}/${pad(parts.month, 2)}/${pad(parts.year, 4)}`;
}

/**
 * Format the first `a-b-c` / `a/b/c` token as DD/MM/YYYY.
 *
 * Year-first when the first part has four digits, day-first otherwise.
 * A year beyond `maxPlausibleYear` means the token came through reversed:
 * the whole token is reversed first, then only the year part.
 */
export function formatDate(
  raw: string | undefined | null,
  options: Partial<SanitizerOptions> = {},
): string {
  if (raw == null) return "";
  const maxYear = options.maxPlausibleYear ?? DEFAULT_SANITIZER_OPTIONS.maxPlausibleYear;
  const m = String(raw).match(DATE_TOKEN);
  if (!m) return "";

  const direct = formatDateToken(m[0], maxYear);
  if (direct) return direct;

  const [, a, sep, b, c] = m;
  const yearFirst = a.length === 4;
  const year = parseInt(yearFirst ? a : c, 10);
  if (year <= maxYear) return "";

  const wholeReversed = formatDateToken(reverseText(m[0]), maxYear);
  if (wholeReversed) return wholeReversed;

  const yearReversed = yearFirst
    ? `${reverseText(a)}${sep}${b}${sep}${c}`
    : `${a}${sep}${b}${sep}${reverseText(c)}`;
  return formatDateToken(yearReversed, maxYear) ?? "";
}

// ─── Amounts ──────────────────────────────────────────────────────────────────

// "9,720.00" extracted backwards reads "00.027,9": a fraction in front.
const TRANSPOSED_AMOUNT = /^00\.\d/;

/**
 * Integer amount as a digit string: "2,000.00" → "2000".
 * Grouping separators and any fractional part are dropped.
 */
export function cleanAmount(raw: string | undefined | null): string {
  if (raw == null) return "";
  const folded = String(raw).replace(/٬/g, ",").replace(/٫/g, ".");
  const token = folded.match(/\d[\d.,]*/);
  if (!token) return "";

  const repaired = TRANSPOSED_AMOUNT.test(token[0])
    ? reverseText(token[0])
    : token[0];
  const m = repaired.match(/(\d[\d,]*)(?:\.\d+)?/);
  return m ? m[1].replace(/,/g, "") : "";
}

// ─── Short numbers ────────────────────────────────────────────────────────────

/** "09" → "90" for tokens the swapped-digits pattern recognises */
export function repairSwappedDigits(
  raw: string | undefined | null,
  pattern: RegExp = DEFAULT_SANITIZER_OPTIONS.swappedDigitsPattern,
): string {
  if (raw == null) return "";
  const token = String(raw).trim();
  return pattern.test(token) ? reverseText(token) : token;
}

// ─── Free text ────────────────────────────────────────────────────────────────

/**
 * Reverse a mirrored Arabic value.
 * Values carrying an email address or any Latin letter are left alone.
 */
export function flipRtl(
  raw: string | undefined | null,
  minArabic: number = DEFAULT_SANITIZER_OPTIONS.valueFlipMinArabic,
): string {
  if (raw == null) return "";
  const value = String(raw).trim();
  if (value.includes("@")) return value;
  const c = countScripts(value);
  if (c.latin > 0) return value;
  if (c.arabic >= minArabic && c.arabic > c.latin) return reverseText(value);
  return value;
}

/** Split "name <keyword> title"; the title is "" when the keyword is absent */
export function splitCompound(value: string, keyword: string): [string, string] {
  const idx = value.indexOf(keyword);
  if (idx === -1) return [value.trim(), ""];
  return [
    value.slice(0, idx).trim(),
    value.slice(idx + keyword.length).trim(),
  ];
}

// ─── Phone / Email ────────────────────────────────────────────────────────────

const COUNTRY_CODE = "966";

/**
 * Canonical Saudi mobile number from the line that carries it.
 *   "966 0505606061"  → "966505606061"
 *   "9660550266101"   → "966550266101"
 *   "0590123456 966"  → "966590123456"
 */
export function normalizeMobile(line: string | undefined | null): string {
  if (line == null) return "";
  const groups = String(line).match(/\d+/g);
  if (!groups) return "";

  const hasCountryCode = groups.some((g) => g.startsWith(COUNTRY_CODE));

  let local = "";
  for (const g of groups) {
    if (g.length === 10 && g.startsWith("05")) {
      local = g;
      break;
    }
    if (g.length === 9 && g.startsWith("5")) {
      local = `0${g}`;
      break;
    }
  }

  if (hasCountryCode && local) return COUNTRY_CODE + local.slice(1);

  const joined = groups.join("");
  return joined.startsWith(`${COUNTRY_CODE}0`)
    ? COUNTRY_CODE + joined.slice(COUNTRY_CODE.length + 1)
    : joined;
}

export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

export interface EmailScanOptions {
  /** Drop repeats of an address (case-insensitive) */
  unique?: boolean;
}

/** Email addresses in document order */
export function extractEmails(
  text: string,
  options: EmailScanOptions = {},
): string[] {
  const all = text.match(EMAIL_PATTERN) ?? [];
  if (!options.unique) return all;

  const seen = new Set<string>();
  return all.filter((email) => {
    const key = email.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
