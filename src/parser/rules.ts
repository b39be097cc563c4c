/**
 * ContractExtractor – Field rule table
 *
 * One entry per schema field: where to look (locators, tried in order)
 * and how to turn the located text into a canonical value (sanitizer).
 * Extending extraction means adding aliases or locators here; the parser's
 * control flow never changes.
 */

import type { ContractFieldName } from "../schema/ContractSchema";
import {
  cleanAmount,
  cleanIban,
  digitsOnly,
  flipRtl,
  formatDate,
  normalizeMobile,
  repairSwappedDigits,
  splitCompound,
} from "./sanitizers";
import type { SanitizerOptions } from "./sanitizers";

// ─── Rule model ───────────────────────────────────────────────────────────────

export type EmailParty = "employer" | "employee";

export type Locator =
  /** `alias: value` (or `value : alias`) on a single line */
  | { kind: "label"; aliases: readonly string[]; anchored?: boolean }
  /** Field-specific sentence; the first capture group is the value */
  | { kind: "pattern"; pattern: RegExp }
  /** The whole first line containing one of the keywords */
  | { kind: "line"; keywords: readonly string[] }
  /** Email address assigned to a contract party */
  | { kind: "email"; party: EmailParty };

export interface SanitizeContext {
  options: SanitizerOptions;
}

export type ValueSanitizer = (raw: string, ctx: SanitizeContext) => string;

export interface FieldRule {
  field: ContractFieldName;
  locators: readonly Locator[];
  sanitize: ValueSanitizer;
}

// ─── Shared fragments ─────────────────────────────────────────────────────────

const DATE = String.raw`(\d{1,4}[-/]\d{1,2}[-/]\d{1,4})`;
const AMOUNT = String.raw`(\d[\d.,]*)`;
// Optional tanween / alef after an indefinite noun: أجرًا, تعويضاً
const TANWEEN = "[\\u0627\\u064b]*";
// "بـ" is often written with a tatweel
const BI = "ب\\u0640?";

function sentence(source: string): Locator {
  return { kind: "pattern", pattern: new RegExp(source, "u") };
}

function label(...aliases: string[]): Locator {
  return { kind: "label", aliases };
}

/** Section headings used by the "section" email strategy */
export const PARTY_SECTIONS: Readonly<
  Record<EmailParty, { start: string; end: string }>
> = Object.freeze({
  employer: { start: "الطرف الأول", end: "الطرف الثاني" },
  employee: { start: "الطرف الثاني", end: "اتفق الطرفان" },
});

/** Joins signatory name and title: "<name> بصفته <title>" */
export const SIGNATORY_TITLE_KEYWORD = "بصفته";

// ─── Sanitizers by category ───────────────────────────────────────────────────

function firstNumber(raw: string): string {
  return raw.match(/\d+/)?.[0] ?? "";
}

export const identifier: ValueSanitizer = (raw) => digitsOnly(raw);

export const date: ValueSanitizer = (raw, ctx) => formatDate(raw, ctx.options);

export const amount: ValueSanitizer = (raw) => cleanAmount(raw);

export const count: ValueSanitizer = (raw) => firstNumber(raw);

/** Trial days, leave days, overtime percent: "09" was read for "90" */
export const shortNumber: ValueSanitizer = (raw, ctx) =>
  digitsOnly(
    repairSwappedDigits(firstNumber(raw), ctx.options.swappedDigitsPattern),
  );

export const freeText: ValueSanitizer = (raw, ctx) =>
  flipRtl(raw, ctx.options.valueFlipMinArabic);

export const plain: ValueSanitizer = (raw) => raw.trim();

export const iban: ValueSanitizer = (raw) => cleanIban(raw);

export const mobile: ValueSanitizer = (raw) => normalizeMobile(raw);

const signatoryPart =
  (part: 0 | 1): ValueSanitizer =>
  (raw, ctx) =>
    splitCompound(freeText(raw, ctx), SIGNATORY_TITLE_KEYWORD)[part];

// ─── Rule table ───────────────────────────────────────────────────────────────

const SIGNATORY: readonly Locator[] = [
  label("ويمثلها بالتوقيع", "ويمثلها في التوقيع", "Represented by"),
];

export const CONTRACT_RULES: readonly FieldRule[] = Object.freeze([
  // ── Document metadata ─────────────────────────────────────────────────────
  {
    field: "contractNumber",
    locators: [label("رقم العقد", "Contract Number", "Contract No")],
    sanitize: identifier,
  },
  {
    field: "contractDate",
    locators: [
      sentence(String.raw`في يوم\s*[()]*\s*${DATE}`),
      label("تاريخ العقد", "Contract Date"),
    ],
    sanitize: date,
  },

  // ── Employer ──────────────────────────────────────────────────────────────
  {
    field: "companyName",
    locators: [label("شركة/مؤسسة", "اسم المنشأة", "Corporation/Company")],
    sanitize: freeText,
  },
  {
    field: "unifiedNationalNumber",
    locators: [label("الرقم الوطني الموحد", "National Unified Number")],
    sanitize: identifier,
  },
  {
    field: "establishmentNumber",
    locators: [label("رقم المنشأة", "Establishment Number")],
    sanitize: identifier,
  },
  {
    field: "commercialRegistration",
    locators: [label("السجل التجاري", "Commercial Registration")],
    sanitize: identifier,
  },
  {
    field: "companyAddress",
    locators: [
      label("العنوان", "عنوان المنشأة"),
      { kind: "label", aliases: ["Address"], anchored: true },
    ],
    sanitize: freeText,
  },
  {
    field: "workLocation",
    locators: [label("مكان العمل", "Work Location")],
    sanitize: freeText,
  },
  {
    field: "companyEmail",
    locators: [{ kind: "email", party: "employer" }],
    sanitize: plain,
  },
  { field: "signatoryName", locators: SIGNATORY, sanitize: signatoryPart(0) },
  { field: "signatoryTitle", locators: SIGNATORY, sanitize: signatoryPart(1) },

  // ── Employee ──────────────────────────────────────────────────────────────
  {
    field: "employeeName",
    locators: [
      label("الاسم", "االسم", "اسم الموظف", "Employee Name"),
      { kind: "label", aliases: ["Name"], anchored: true },
    ],
    sanitize: freeText,
  },
  {
    field: "idNumber",
    locators: [label("رقم الهوية", "Identity Number", "ID Number")],
    sanitize: identifier,
  },
  {
    field: "idType",
    locators: [label("نوع الهوية", "ID Type")],
    sanitize: freeText,
  },
  {
    field: "birthDate",
    locators: [label("تاريخ الميلاد", "تاريخ الميالد", "Date of Birth")],
    sanitize: date,
  },
  {
    field: "idExpiryDate",
    locators: [
      label(
        "تاريخ انتهاء الهوية",
        "تاريخ الانتهاء",
        "تاريخ اإلنتهاء",
        "ID Expiry Date",
      ),
    ],
    sanitize: date,
  },
  {
    field: "nationality",
    locators: [label("الجنسية", "Nationality")],
    sanitize: freeText,
  },
  {
    field: "gender",
    locators: [label("الجنس", "Gender")],
    sanitize: freeText,
  },
  {
    field: "religion",
    locators: [label("الديانة", "Religion")],
    sanitize: freeText,
  },
  {
    field: "maritalStatus",
    locators: [
      label("الحالة الاجتماعية", "الحالة االجتماعية", "Marital Status"),
    ],
    sanitize: freeText,
  },
  {
    field: "education",
    locators: [label("المؤهل العلمي", "Education")],
    sanitize: freeText,
  },
  {
    field: "specialty",
    locators: [label("التخصص", "Speciality", "Specialty")],
    sanitize: freeText,
  },
  {
    field: "profession",
    locators: [label("المهنة", "Profession")],
    sanitize: freeText,
  },
  {
    field: "employeeNumber",
    locators: [label("الرقم الوظيفي", "Employee Number")],
    sanitize: identifier,
  },
  {
    field: "iban",
    locators: [label("رقم الآيبان", "رقم اآليبان", "رقم الايبان", "IBAN")],
    sanitize: iban,
  },
  {
    field: "bankName",
    locators: [label("اسم البنك", "Bank Name")],
    sanitize: freeText,
  },
  {
    field: "employeeEmail",
    locators: [{ kind: "email", party: "employee" }],
    sanitize: plain,
  },
  {
    field: "mobileNumber",
    locators: [
      { kind: "line", keywords: ["رقم الجوال", "Mobile Number", "Mobile"] },
    ],
    sanitize: mobile,
  },

  // ── Contract terms ────────────────────────────────────────────────────────
  {
    field: "contractStartDate",
    locators: [
      sentence(String.raw`يبدأ من تاريخ\s*${DATE}`),
      label("بداية العقد", "Contract Start Date", "Start Date"),
    ],
    sanitize: date,
  },
  {
    field: "contractEndDate",
    locators: [
      sentence(String.raw`وينتهي في\s*[,،]?\s*${DATE}`),
      label("نهاية العقد", "Contract End Date", "End Date"),
    ],
    sanitize: date,
  },
  {
    field: "actualJoiningDate",
    locators: [
      sentence(String.raw`تاريخ مباشرة[^\n]*?هو\s*[.،,]?\s*${DATE}`),
      label("تاريخ المباشرة", "Joining Date"),
    ],
    sanitize: date,
  },
  {
    field: "contractDuration",
    locators: [
      sentence(String.raw`مدة هذا العقد\s+(\d+)\s*(?:سنة|سنوات|شهر|أشهر|اشهر)`),
      label("مدة العقد", "Contract Duration"),
    ],
    sanitize: count,
  },
  {
    field: "trialPeriodDays",
    locators: [
      sentence(String.raw`فترة تجربة مدتها\s*(\d+)\s*يوم`),
      label("فترة التجربة", "Probation Period", "Trial Period"),
    ],
    sanitize: shortNumber,
  },
  {
    field: "weeklyWorkDays",
    locators: [
      sentence(String.raw`تحدد أيام العمل العادية ${BI}\s*(\d+)\s*أيام`),
      label("أيام العمل", "Working Days"),
    ],
    sanitize: count,
  },
  {
    field: "dailyWorkHours",
    locators: [
      sentence(String.raw`تحدد ساعات العمل ${BI}\s*(\d+)`),
      label("ساعات العمل", "Working Hours"),
    ],
    sanitize: count,
  },
  {
    field: "basicSalary",
    locators: [
      sentence(String.raw`أجر${TANWEEN}\s*أساسي${TANWEEN}\s*قدره\s*${AMOUNT}`),
      label("الراتب الأساسي", "Basic Salary", "Basic Wage"),
    ],
    sanitize: amount,
  },
  {
    field: "housingAllowance",
    locators: [
      sentence(
        String.raw`أجر\s*${AMOUNT}\s*ريال\s*سعودي\s*[,،]?\s*بدل\s*سكن`,
      ),
      sentence(String.raw`بدل\s*سكن[^\d\n]{0,30}${AMOUNT}`),
      label("بدل السكن", "Housing Allowance"),
    ],
    sanitize: amount,
  },
  {
    field: "annualLeaveDays",
    locators: [
      sentence(String.raw`إجازة\s*سنوية\s*مدتها\s*(\d+)\s*يوم`),
      label("الإجازة السنوية", "Annual Leave"),
    ],
    sanitize: shortNumber,
  },
  {
    field: "overtimeRate",
    locators: [
      sentence(String.raw`مضاف${TANWEEN}\s*إليه\s*[٪%]\s*(\d+)`),
      sentence(String.raw`مضاف${TANWEEN}\s*إليه\s*(\d+)\s*[٪%]`),
      label("أجر الساعة الإضافية", "Overtime"),
    ],
    sanitize: shortNumber,
  },
  {
    field: "terminationCompensation",
    locators: [
      sentence(
        String.raw`تعويض${TANWEEN}[^\n]*?قدره\s*${AMOUNT}\s*ريال`,
      ),
      label("التعويض عند الفسخ", "Termination Compensation"),
    ],
    sanitize: amount,
  },
] satisfies FieldRule[]);

// ─── Format sanitizers ────────────────────────────────────────────────────────

// Canonicalise format only; free text from outside the document is already
// in reading order and must not be flipped.
const FORMAT_SANITIZERS: ReadonlySet<ValueSanitizer> = new Set([
  identifier,
  date,
  amount,
  count,
  shortNumber,
  iban,
  mobile,
]);

/**
 * The sanitizer that puts a value for `field` into canonical form, or
 * undefined when the field holds free text.
 */
export function formatSanitizer(
  field: ContractFieldName,
  rules: readonly FieldRule[] = CONTRACT_RULES,
): ValueSanitizer | undefined {
  const rule = rules.find((r) => r.field === field);
  return rule && FORMAT_SANITIZERS.has(rule.sanitize)
    ? rule.sanitize
    : undefined;
}
