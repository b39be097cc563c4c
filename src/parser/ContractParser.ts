/**
 * ContractExtractor – Rule-based field extraction
 *
 * rawText → normalizeText → ContractParser.parse → ContractRecord
 *
 * For every schema field the parser walks that field's rules, tries each
 * locator in order and keeps the first value that survives sanitising.
 * A field that cannot be found (or whose rule throws) stays "".
 */

import {
  CONTRACT_SCHEMA,
  createEmptyRecord,
} from "../schema/ContractSchema";
import type {
  ContractFieldName,
  ContractRecord,
  ContractSchema,
} from "../schema/ContractSchema";
import { sanitiseRecord } from "../core/validator";
import { silentLogger } from "../utils/logger";
import type { ExtractorLogger } from "../utils/logger";
import { CONTRACT_RULES, PARTY_SECTIONS } from "./rules";
import type { EmailParty, FieldRule, Locator, SanitizeContext } from "./rules";
import { DEFAULT_SANITIZER_OPTIONS, extractEmails } from "./sanitizers";
import type { SanitizerOptions } from "./sanitizers";

/**
 * How employer/employee emails are told apart.
 * - positional: first email in the document is the employer's, second the employee's
 * - section: first email inside each party's section of the contract
 */
export type EmailStrategy = "positional" | "section";

export interface ContractParserOptions {
  schema?: ContractSchema;
  rules?: readonly FieldRule[];
  sanitizers?: Partial<SanitizerOptions>;
  emailStrategy?: EmailStrategy;
  logger?: ExtractorLogger;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function aliasSource(alias: string): string {
  return escapeRegExp(alias).replace(/ /g, "[ \\t]+");
}

function nonEmpty(values: ReadonlyArray<string | undefined>): string[] {
  const out: string[] = [];
  for (const v of values) {
    const trimmed = v?.trim();
    if (trimmed) out.push(trimmed);
  }
  return out;
}

/** Non-empty trimmed first-group captures of a global pattern */
function captures(text: string, pattern: RegExp): string[] {
  return nonEmpty(Array.from(text.matchAll(pattern), (m) => m[1]));
}

/** Text between two headings; from `start` to the end when `end` is absent */
export function sliceBetween(text: string, start: string, end: string): string {
  const s = text.indexOf(start);
  if (s === -1) return "";
  const e = text.indexOf(end, s + start.length);
  return e === -1 ? text.slice(s) : text.slice(s, e);
}

// ─── Main parser ──────────────────────────────────────────────────────────────

export class ContractParser {
  private readonly schema: ContractSchema;
  private readonly rulesByField: Map<ContractFieldName, FieldRule[]>;
  private readonly context: SanitizeContext;
  private readonly emailStrategy: EmailStrategy;
  private readonly logger: ExtractorLogger;
  private readonly labelCache = new Map<string, RegExp[]>();

  constructor(options: ContractParserOptions = {}) {
    this.schema = options.schema ?? CONTRACT_SCHEMA;
    this.emailStrategy = options.emailStrategy ?? "positional";
    this.logger = options.logger ?? silentLogger;
    this.context = {
      options: { ...DEFAULT_SANITIZER_OPTIONS, ...options.sanitizers },
    };

    this.rulesByField = new Map();
    for (const rule of options.rules ?? CONTRACT_RULES) {
      const list = this.rulesByField.get(rule.field) ?? [];
      list.push(rule);
      this.rulesByField.set(rule.field, list);
    }
  }

  /**
   * Extract every schema field from normalised text.
   * Never throws; the returned record always carries every field.
   */
  parse(normalizedText: string): ContractRecord {
    const record = createEmptyRecord();
    if (!normalizedText) return record;

    const emails = this.resolveEmails(normalizedText);

    for (const { key } of this.schema.fields) {
      for (const rule of this.rulesByField.get(key) ?? []) {
        try {
          const value = this.applyRule(rule, normalizedText, emails);
          if (value) {
            record[key] = value;
            break;
          }
        } catch (err) {
          this.logger.debug(
            `Rule for '${key}' failed: ${err instanceof Error ? err.message : String(err)}`,
          );
        }
      }
    }

    const filled = Object.values(record).filter(Boolean).length;
    this.logger.debug(
      `Extracted ${filled}/${this.schema.fields.length} fields`,
    );
    return sanitiseRecord(record, this.schema);
  }

  // ─── Rule evaluation ──────────────────────────────────────────────────────

  private applyRule(
    rule: FieldRule,
    text: string,
    emails: Record<EmailParty, string>,
  ): string {
    for (const locator of rule.locators) {
      for (const raw of this.locate(locator, text, emails)) {
        const value = rule.sanitize(raw, this.context).trim();
        if (value) return value;
      }
    }
    return "";
  }

  /** Candidate raw values in the order they should be tried */
  private locate(
    locator: Locator,
    text: string,
    emails: Record<EmailParty, string>,
  ): string[] {
    switch (locator.kind) {
      case "label":
        return this.locateLabel(text, locator.aliases, locator.anchored ?? false);
      case "pattern":
        return nonEmpty([locator.pattern.exec(text)?.[1]]);
      case "line":
        return nonEmpty([this.locateLine(text, locator.keywords)]);
      case "email":
        return nonEmpty([emails[locator.party]]);
    }
  }

  /**
   * `alias: value` first, for every alias in order; then `value : alias`
   * for lines the normaliser could not reorder. Every occurrence of an
   * alias is a candidate, in document order.
   */
  private locateLabel(
    text: string,
    aliases: readonly string[],
    anchored: boolean,
  ): string[] {
    const out: string[] = [];
    for (const alias of aliases) {
      const [after] = this.labelPatterns(alias, anchored);
      out.push(...captures(text, after));
    }
    for (const alias of aliases) {
      const [, before] = this.labelPatterns(alias, anchored);
      out.push(...captures(text, before));
    }
    return out;
  }

  private labelPatterns(alias: string, anchored: boolean): RegExp[] {
    const cacheKey = `${anchored ? "^" : ""}${alias}`;
    const cached = this.labelCache.get(cacheKey);
    if (cached) return cached;

    const a = aliasSource(alias);
    const lead = anchored ? "^[ \\t]*" : "(?<![\\p{L}\\p{M}])";
    const patterns = [
      // the value may sit on the line after its label
      new RegExp(`${lead}${a}\\s*:\\s*([^\\n]*)`, "gimu"),
      new RegExp(`^([^\\n:]+?)[ \\t]*:[ \\t]*${a}[ \\t]*$`, "gimu"),
    ];
    this.labelCache.set(cacheKey, patterns);
    return patterns;
  }

  private locateLine(text: string, keywords: readonly string[]): string {
    const lines = text.split("\n");
    for (const keyword of keywords) {
      const line = lines.find((l) => l.includes(keyword));
      if (line) return line.trim();
    }
    return "";
  }

  // ─── Emails ───────────────────────────────────────────────────────────────

  private resolveEmails(text: string): Record<EmailParty, string> {
    if (this.emailStrategy === "section") {
      const pick = (party: EmailParty): string => {
        const { start, end } = PARTY_SECTIONS[party];
        return extractEmails(sliceBetween(text, start, end))[0] ?? "";
      };
      return { employer: pick("employer"), employee: pick("employee") };
    }

    const all = extractEmails(text);
    return { employer: all[0] ?? "", employee: all[1] ?? "" };
  }
}
