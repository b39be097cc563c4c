/**
 * QualityScorer – unit tests
 */
import { QualityScorer } from "../core/quality";
import { createEmptyRecord, fieldNames } from "../schema/ContractSchema";
import type { ContractRecord } from "../schema/ContractSchema";

function recordWith(filled: number): ContractRecord {
  const record = createEmptyRecord();
  for (const key of fieldNames().slice(0, filled)) record[key] = "x";
  return record;
}

describe("QualityScorer", () => {
  const scorer = new QualityScorer();

  it("scores 14 of 40 as 35% with 26 missing", () => {
    const report = scorer.score(recordWith(14));
    expect(report.filled).toBe(14);
    expect(report.total).toBe(40);
    expect(report.percent).toBe(35);
    expect(report.missing).toHaveLength(26);
    expect(report.missing[0]).toBe("birthDate");
  });

  it("rounds to one decimal", () => {
    expect(scorer.score(recordWith(1)).percent).toBe(2.5);
    expect(scorer.score(recordWith(13)).percent).toBe(32.5);
  });

  it("treats whitespace-only values as missing", () => {
    const record = createEmptyRecord();
    record.iban = "   ";
    expect(scorer.score(record).filled).toBe(0);
  });

  it("scores a full record as 100%", () => {
    const report = scorer.score(recordWith(40));
    expect(report.percent).toBe(100);
    expect(report.missing).toEqual([]);
  });

  describe("statusFor", () => {
    it("is OK at the threshold", () => {
      expect(scorer.statusFor(scorer.score(recordWith(14)))).toBe("OK");
    });

    it("is LOW_QUALITY below the threshold", () => {
      expect(scorer.statusFor(scorer.score(recordWith(13)))).toBe(
        "LOW_QUALITY",
      );
    });

    it("uses a custom threshold", () => {
      const strict = new QualityScorer(undefined, 50);
      expect(strict.statusFor(strict.score(recordWith(14)))).toBe(
        "LOW_QUALITY",
      );
    });
  });
});
