/**
 * mergeFallbackValues – unit tests
 */
import { mergeFallbackValues } from "../ai/merge";
import { createEmptyRecord } from "../schema/ContractSchema";

describe("mergeFallbackValues", () => {
  it("never overwrites a filled field", () => {
    const record = { ...createEmptyRecord(), contractNumber: "X" };
    const { record: merged, filledFields } = mergeFallbackValues(record, {
      contractNumber: "Y",
    });
    expect(merged.contractNumber).toBe("X");
    expect(filledFields).toEqual([]);
  });

  it("fills empty fields and reports them in schema order", () => {
    const record = createEmptyRecord();
    const { record: merged, filledFields } = mergeFallbackValues(record, {
      iban: "SA0380000000608010167519",
      contractNumber: " 22477445 ",
    });
    expect(merged.contractNumber).toBe("22477445");
    expect(merged.iban).toBe("SA0380000000608010167519");
    expect(filledFields).toEqual(["contractNumber", "iban"]);
  });

  it("ignores empty incoming values", () => {
    const { filledFields } = mergeFallbackValues(createEmptyRecord(), {
      gender: "  ",
    });
    expect(filledFields).toEqual([]);
  });

  it("returns a new record and leaves the input untouched", () => {
    const record = createEmptyRecord();
    const { record: merged } = mergeFallbackValues(record, { gender: "ذكر" });
    expect(merged).not.toBe(record);
    expect(record.gender).toBe("");
    expect(merged.gender).toBe("ذكر");
  });

  it("treats a whitespace-only field as empty", () => {
    const record = { ...createEmptyRecord(), religion: " " };
    const { record: merged } = mergeFallbackValues(record, {
      religion: "مسلم",
    });
    expect(merged.religion).toBe("مسلم");
  });

  it("puts numeric, date and mobile values into canonical form", () => {
    const { record: merged, filledFields } = mergeFallbackValues(
      createEmptyRecord(),
      {
        contractDate: "2024-09-21",
        basicSalary: "9,720.00 SAR",
        mobileNumber: "966 0505606061",
        iban: "sa03 8000 0000 6080 1016 7519",
        trialPeriodDays: "90 days",
      },
    );
    expect(merged.contractDate).toBe("21/09/2024");
    expect(merged.basicSalary).toBe("9720");
    expect(merged.mobileNumber).toBe("966505606061");
    expect(merged.iban).toBe("SA0380000000608010167519");
    expect(merged.trialPeriodDays).toBe("90");
    expect(filledFields).toEqual([
      "contractDate",
      "iban",
      "mobileNumber",
      "trialPeriodDays",
      "basicSalary",
    ]);
  });

  it("drops values that sanitise to nothing", () => {
    const { record: merged, filledFields } = mergeFallbackValues(
      createEmptyRecord(),
      { contractDate: "13/13/2024", idNumber: "unknown", gender: "ذكر" },
    );
    expect(merged.contractDate).toBe("");
    expect(merged.idNumber).toBe("");
    expect(filledFields).toEqual(["gender"]);
  });

  it("keeps free text in reading order", () => {
    const { record: merged } = mergeFallbackValues(createEmptyRecord(), {
      employeeName: "محمد العتيبي",
      signatoryName: "خالد أحمد",
    });
    expect(merged.employeeName).toBe("محمد العتيبي");
    expect(merged.signatoryName).toBe("خالد أحمد");
  });

  it("iterates only the fields of the given schema", () => {
    const schema = { fields: [{ key: "iban" as const, header: "IBAN" }] };
    const { filledFields } = mergeFallbackValues(
      createEmptyRecord(),
      { iban: "SA03", gender: "ذكر" },
      { schema },
    );
    expect(filledFields).toEqual(["iban"]);
  });
});
