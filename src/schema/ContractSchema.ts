/**
 * ContractExtractor – Output schema
 *
 * The ordered set of canonical fields produced for every contract.
 * Field identity and order are a contract with downstream consumers
 * (spreadsheet columns), so the list is frozen and only ever read.
 */

// ─── Field definitions ────────────────────────────────────────────────────────

export const CONTRACT_FIELDS = [
  // Document metadata
  { key: "contractNumber", header: "رقم العقد" },
  { key: "contractDate", header: "تاريخ العقد" },
  // Employer
  { key: "companyName", header: "شركة/مؤسسة" },
  { key: "unifiedNationalNumber", header: "الرقم الوطني الموحد" },
  { key: "establishmentNumber", header: "رقم المنشأة" },
  { key: "commercialRegistration", header: "السجل التجاري" },
  { key: "companyAddress", header: "عنوان الشركة" },
  { key: "workLocation", header: "مكان العمل" },
  { key: "companyEmail", header: "بريد الشركة" },
  { key: "signatoryName", header: "المسؤول الموقع" },
  { key: "signatoryTitle", header: "الصفة" },
  // Employee
  { key: "employeeName", header: "اسم الموظف" },
  { key: "idNumber", header: "رقم الهوية" },
  { key: "idType", header: "نوع الهوية" },
  { key: "birthDate", header: "تاريخ الميلاد" },
  { key: "idExpiryDate", header: "تاريخ انتهاء الهوية" },
  { key: "nationality", header: "الجنسية" },
  { key: "gender", header: "الجنس" },
  { key: "religion", header: "الديانة" },
  { key: "maritalStatus", header: "الحالة الاجتماعية" },
  { key: "education", header: "المؤهل العلمي" },
  { key: "specialty", header: "التخصص" },
  { key: "profession", header: "المهنة" },
  { key: "employeeNumber", header: "الرقم الوظيفي" },
  { key: "iban", header: "رقم الآيبان" },
  { key: "bankName", header: "اسم البنك" },
  { key: "employeeEmail", header: "بريد الموظف" },
  { key: "mobileNumber", header: "رقم الجوال" },
  // Contract terms
  { key: "contractStartDate", header: "بدء العقد" },
  { key: "contractEndDate", header: "انتهاء العقد" },
  { key: "actualJoiningDate", header: "تاريخ المباشرة الفعلية" },
  { key: "contractDuration", header: "مدة العقد" },
  { key: "trialPeriodDays", header: "فترة التجربة" },
  { key: "weeklyWorkDays", header: "أيام العمل الأسبوعية" },
  { key: "dailyWorkHours", header: "ساعات العمل اليومية" },
  { key: "basicSalary", header: "الراتب الأساسي" },
  { key: "housingAllowance", header: "بدل السكن" },
  { key: "annualLeaveDays", header: "الإجازة السنوية" },
  { key: "overtimeRate", header: "أجر الساعة الإضافية" },
  { key: "terminationCompensation", header: "التعويض عند الفسخ بدون سبب" },
] as const;

export type ContractFieldName = (typeof CONTRACT_FIELDS)[number]["key"];

export interface ContractFieldDefinition {
  readonly key: ContractFieldName;
  /** Column title used by spreadsheet consumers */
  readonly header: string;
}

/** One extracted contract. Every field is present; unknown values are "". */
export type ContractRecord = Record<ContractFieldName, string>;

export interface ContractSchema {
  readonly fields: readonly ContractFieldDefinition[];
}

// ─── Default schema ───────────────────────────────────────────────────────────

export const CONTRACT_SCHEMA: ContractSchema = Object.freeze({
  fields: Object.freeze(
    CONTRACT_FIELDS.map((f): ContractFieldDefinition => Object.freeze({ ...f })),
  ),
});

const FIELD_NAMES: ReadonlySet<string> = new Set(
  CONTRACT_FIELDS.map((f) => f.key),
);

export function isContractFieldName(value: string): value is ContractFieldName {
  return FIELD_NAMES.has(value);
}

export function fieldNames(
  schema: ContractSchema = CONTRACT_SCHEMA,
): ContractFieldName[] {
  return schema.fields.map((f) => f.key);
}

/**
 * A record with every field set to "".
 * Written out in full so a field added to the schema without a default
 * fails to compile.
 */
export function createEmptyRecord(): ContractRecord {
  return {
    contractNumber: "",
    contractDate: "",
    companyName: "",
    unifiedNationalNumber: "",
    establishmentNumber: "",
    commercialRegistration: "",
    companyAddress: "",
    workLocation: "",
    companyEmail: "",
    signatoryName: "",
    signatoryTitle: "",
    employeeName: "",
    idNumber: "",
    idType: "",
    birthDate: "",
    idExpiryDate: "",
    nationality: "",
    gender: "",
    religion: "",
    maritalStatus: "",
    education: "",
    specialty: "",
    profession: "",
    employeeNumber: "",
    iban: "",
    bankName: "",
    employeeEmail: "",
    mobileNumber: "",
    contractStartDate: "",
    contractEndDate: "",
    actualJoiningDate: "",
    contractDuration: "",
    trialPeriodDays: "",
    weeklyWorkDays: "",
    dailyWorkHours: "",
    basicSalary: "",
    housingAllowance: "",
    annualLeaveDays: "",
    overtimeRate: "",
    terminationCompensation: "",
  };
}
