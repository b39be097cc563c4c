/**
 * Report helpers – unit tests
 */
import {
  LOG_HEADERS,
  buildReport,
  spreadsheetHeaders,
  toLogRow,
  toSpreadsheetRow,
} from "../utils/report";
import { QualityScorer } from "../core/quality";
import { createEmptyRecord, fieldNames } from "../schema/ContractSchema";
import type { ContractRecord } from "../schema/ContractSchema";
import type { DocumentOutcome, DocumentStatus } from "../types";

const scorer = new QualityScorer();

function outcome(
  fileName: string,
  status: DocumentStatus,
  record: ContractRecord,
  note: string,
): DocumentOutcome {
  return {
    fileName,
    status,
    record,
    quality: scorer.score(record),
    note,
    timestamp: "2024-09-21T08:00:00.000Z",
    processingTimeMs: 3,
  };
}

const partial: ContractRecord = {
  ...createEmptyRecord(),
  contractNumber: "22477445",
  nationality: "سعودي",
  contractDuration: "1",
};

describe("buildReport", () => {
  it("writes one line per document under the title", () => {
    const report = buildReport([
      outcome("a.txt", "LOW_QUALITY", partial, "Low filled fields"),
      outcome("b.txt", "SKIPPED", createEmptyRecord(), "File empty/too small"),
      outcome(
        "c.txt",
        "ERROR",
        createEmptyRecord(),
        "TextSourceError: [Source:c.txt] Content is not valid UTF-8",
      ),
    ]);
    expect(report).toBe(
      [
        "Contracts Extraction Report",
        "- a.txt: LOW_QUALITY | Quality 7.5% | Missing 37 fields",
        "- b.txt: SKIPPED (empty)",
        "- c.txt: ERROR -> TextSourceError: [Source:c.txt] Content is not valid UTF-8",
      ].join("\n"),
    );
  });

  it("prints a whole percentage with one decimal", () => {
    const full = createEmptyRecord();
    for (const key of fieldNames()) full[key] = "x";
    expect(
      buildReport([outcome("f.txt", "OK", full, "Parsed successfully")]),
    ).toBe(
      "Contracts Extraction Report\n- f.txt: OK | Quality 100.0% | Missing 0 fields",
    );
  });
});

describe("toLogRow", () => {
  it("caps the missing list at ten fields", () => {
    const row = toLogRow(outcome("a.txt", "LOW_QUALITY", partial, "note"));
    expect(row).toEqual({
      timestamp: "2024-09-21T08:00:00.000Z",
      fileName: "a.txt",
      status: "LOW_QUALITY",
      filledFields: 3,
      totalFields: 40,
      qualityPercent: 7.5,
      missingFields:
        "contractDate, companyName, unifiedNationalNumber, establishmentNumber, " +
        "commercialRegistration, companyAddress, workLocation, companyEmail, " +
        "signatoryName, signatoryTitle ...",
      note: "note",
    });
  });

  it("has one header per column", () => {
    const row = toLogRow(outcome("a.txt", "OK", partial, ""));
    expect(LOG_HEADERS).toHaveLength(Object.keys(row).length);
  });
});

describe("spreadsheet rows", () => {
  it("aligns values with headers", () => {
    const headers = spreadsheetHeaders();
    const row = toSpreadsheetRow(partial);
    expect(headers).toHaveLength(40);
    expect(row).toHaveLength(40);
    expect(headers[0]).toBe("رقم العقد");
    expect(row[0]).toBe("22477445");
    expect(row[headers.indexOf("الجنسية")]).toBe("سعودي");
    expect(row[1]).toBe("");
  });
});
