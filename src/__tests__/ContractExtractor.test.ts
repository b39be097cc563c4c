/**
 * ContractExtractor – end-to-end pipeline tests
 */
import { existsSync, readFileSync } from "fs";
import { join } from "path";

import { ContractExtractor, NOTES } from "../core/ContractExtractor";
import { ContractExtractError } from "../core/validator";
import { listAIProviders, unregisterAIProvider } from "../ai/AIEngine";
import type { AIFillRequest, AIFillResult, AIProvider } from "../ai/AIProvider";
import { AIProviderError } from "../ai/AIProvider";
import type { TextSource } from "../source/TextSource";
import type { ContractDocument } from "../types";

const FIXTURE = readFileSync(
  join(__dirname, "fixtures", "contract-normalized.txt"),
  "utf8",
);

// Three mirrored lines as a PDF text layer returns them
const MIRRORED = [
  "22477445 :دقعلا مقر",
  "يدوعس :ةيسنجلا",
  "ةنس 1 دقعلا اذه ةدم",
  "",
].join("\n");

function doc(fileName: string, content: string | Uint8Array): ContractDocument {
  return { fileName, content };
}

function providerReturning(
  name: string,
  values: AIFillResult["values"],
): AIProvider & { fill: jest.Mock } {
  return {
    name,
    fill: jest.fn(
      async (_req: AIFillRequest): Promise<AIFillResult> => ({
        values,
        evidence: {},
        confidence: {},
        rawText: JSON.stringify(values),
        provider: name,
      }),
    ),
    isAvailable: async () => true,
  };
}

beforeEach(() => {
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
  ContractExtractor.reset();
  for (const name of listAIProviders()) unregisterAIProvider(name);
});

// ─── processDocument ─────────────────────────────────────────────────────────

describe("ContractExtractor.processDocument", () => {
  it("repairs mirrored text and extracts the fields it carries", async () => {
    const outcome = await ContractExtractor.processDocument(
      doc("mirrored.txt", MIRRORED),
      { includeText: true },
    );

    expect(outcome.status).toBe("LOW_QUALITY");
    expect(outcome.note).toBe(NOTES.lowQuality);
    expect(outcome.record.contractNumber).toBe("22477445");
    expect(outcome.record.nationality).toBe("سعودي");
    expect(outcome.record.contractDuration).toBe("1");
    expect(outcome.quality.filled).toBe(3);
    expect(outcome.quality.percent).toBe(7.5);
    expect(outcome.rawText).toBe(MIRRORED);
    expect(outcome.normalizedText).toBe(
      "رقم العقد: 22477445\nالجنسية: يدوعس\nمدة هذا العقد 1 سنة",
    );
    expect(outcome.fallback).toBeUndefined();
  });

  it("omits the texts unless asked for", async () => {
    const outcome = await ContractExtractor.processDocument(
      doc("mirrored.txt", MIRRORED),
    );
    expect(outcome.rawText).toBeUndefined();
    expect(outcome.normalizedText).toBeUndefined();
  });

  it("marks a complete contract OK", async () => {
    const outcome = await ContractExtractor.processDocument(
      doc("full.txt", FIXTURE),
    );
    expect(outcome.status).toBe("OK");
    expect(outcome.note).toBe(NOTES.ok);
    expect(outcome.quality.percent).toBe(100);
    expect(outcome.quality.missing).toEqual([]);
  });

  it("decodes UTF-8 bytes", async () => {
    const outcome = await ContractExtractor.processDocument(
      doc("bytes.txt", new TextEncoder().encode(MIRRORED)),
    );
    expect(outcome.record.contractNumber).toBe("22477445");
  });

  it("skips content below the minimum length", async () => {
    const outcome = await ContractExtractor.processDocument(
      doc("tiny.txt", "رقم العقد: 1"),
    );
    expect(outcome.status).toBe("SKIPPED");
    expect(outcome.note).toBe(NOTES.skipped);
    expect(outcome.quality.filled).toBe(0);
  });

  it("turns undecodable bytes into an ERROR outcome", async () => {
    const outcome = await ContractExtractor.processDocument(
      doc("bad.txt", new Uint8Array(60).fill(0xff)),
    );
    expect(outcome.status).toBe("ERROR");
    expect(outcome.note).toBe(
      "TextSourceError: [Source:bad.txt] Content is not valid UTF-8",
    );
    expect(outcome.record.contractNumber).toBe("");
  });

  it("wraps text source failures", async () => {
    const source: TextSource = {
      name: "broken",
      readText: async () => {
        throw new Error("disk gone");
      },
    };
    const outcome = await ContractExtractor.processDocument(
      doc("x.txt", MIRRORED),
      { textSource: source },
    );
    expect(outcome.note).toBe("TextSourceError: [Source:x.txt] disk gone");
  });

  it("rejects a document without a file name", async () => {
    const outcome = await ContractExtractor.processDocument(doc("", MIRRORED));
    expect(outcome.status).toBe("ERROR");
    expect(outcome.note).toBe(
      "ContractExtractError: Invalid document: `fileName` must be a non-empty string.",
    );
  });

  it("applies a configured quality threshold", async () => {
    ContractExtractor.configure({ qualityThreshold: 5 });
    const outcome = await ContractExtractor.processDocument(
      doc("mirrored.txt", MIRRORED),
    );
    expect(outcome.status).toBe("OK");
  });
});

// ─── AI fallback ─────────────────────────────────────────────────────────────

describe("ContractExtractor AI fallback", () => {
  it("fills only the fields the rules left empty", async () => {
    const provider = providerReturning("mock", {
      contractNumber: "11111111",
      employeeName: "Test Employee",
      basicSalary: "9,720.00 SAR",
    });
    ContractExtractor.configure({ aiProvider: provider });

    const outcome = await ContractExtractor.processDocument(
      doc("mirrored.txt", MIRRORED),
    );

    expect(provider.fill).toHaveBeenCalledTimes(1);
    const request: AIFillRequest = provider.fill.mock.calls[0][0];
    expect(request.fields).toHaveLength(37);
    expect(request.fields[0]).toEqual({
      key: "contractDate",
      header: "تاريخ العقد",
    });
    expect(request.text).toBe(
      "رقم العقد: 22477445\nالجنسية: يدوعس\nمدة هذا العقد 1 سنة",
    );

    expect(outcome.record.contractNumber).toBe("22477445");
    expect(outcome.record.employeeName).toBe("Test Employee");
    expect(outcome.record.basicSalary).toBe("9720");
    expect(outcome.quality.filled).toBe(5);
    expect(outcome.fallback).toEqual({
      applied: true,
      provider: "mock",
      filledFields: ["employeeName", "basicSalary"],
      evidence: {},
      confidence: {},
    });
  });

  it("is not called when the caller disables it", async () => {
    const provider = providerReturning("mock", { employeeName: "X" });
    ContractExtractor.configure({ aiProvider: provider });

    const outcome = await ContractExtractor.processDocument(
      doc("mirrored.txt", MIRRORED),
      { fallback: false },
    );
    expect(provider.fill).not.toHaveBeenCalled();
    expect(outcome.fallback).toBeUndefined();
  });

  it("is not called for a complete record", async () => {
    const provider = providerReturning("mock", {});
    ContractExtractor.configure({ aiProvider: provider });

    await ContractExtractor.processDocument(doc("full.txt", FIXTURE));
    expect(provider.fill).not.toHaveBeenCalled();
  });

  it("keeps the rule-based record when the provider fails", async () => {
    const provider: AIProvider = {
      name: "flaky",
      fill: jest
        .fn()
        .mockRejectedValue(
          new AIProviderError("AI returned non-JSON", "flaky", "malformed"),
        ),
      isAvailable: async () => true,
    };
    ContractExtractor.configure({
      aiProvider: provider,
      fallback: { retries: 0 },
    });

    const outcome = await ContractExtractor.processDocument(
      doc("mirrored.txt", MIRRORED),
    );

    expect(outcome.status).toBe("LOW_QUALITY");
    expect(outcome.record.contractNumber).toBe("22477445");
    expect(outcome.fallback).toEqual({
      applied: false,
      error: "[AI:flaky] AI returned non-JSON",
    });
  });
});

// ─── processBatch ────────────────────────────────────────────────────────────

describe("ContractExtractor.processBatch", () => {
  it("keeps input order and counts statuses", async () => {
    const result = await ContractExtractor.processBatch([
      doc("a.txt", FIXTURE),
      doc("b.txt", ""),
      doc("c.txt", MIRRORED),
      doc("d.txt", new Uint8Array(60).fill(0xff)),
    ]);

    expect(result.outcomes.map((o) => o.fileName)).toEqual([
      "a.txt",
      "b.txt",
      "c.txt",
      "d.txt",
    ]);
    expect(result.counts).toEqual({
      OK: 1,
      LOW_QUALITY: 1,
      SKIPPED: 1,
      ERROR: 1,
    });
    expect(result.report.split("\n")).toEqual([
      "Contracts Extraction Report",
      "- a.txt: OK | Quality 100.0% | Missing 0 fields",
      "- b.txt: SKIPPED (empty)",
      "- c.txt: LOW_QUALITY | Quality 7.5% | Missing 37 fields",
      "- d.txt: ERROR -> TextSourceError: [Source:d.txt] Content is not valid UTF-8",
    ]);
  });

  it("limits documents in flight and removes the shared workspace", async () => {
    let inFlight = 0;
    let peak = 0;
    const workDirs = new Set<string>();
    const source: TextSource = {
      name: "slow",
      readText: async (d, context) => {
        workDirs.add(context.workDir);
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return typeof d.content === "string" ? d.content : "";
      },
    };

    const docs = Array.from({ length: 6 }, (_, i) => doc(`${i}.txt`, MIRRORED));
    const result = await ContractExtractor.processBatch(docs, {
      concurrency: 2,
      textSource: source,
    });

    expect(result.counts.LOW_QUALITY).toBe(6);
    expect(peak).toBe(2);
    expect(workDirs.size).toBe(1);
    for (const dir of workDirs) expect(existsSync(dir)).toBe(false);
  });

  it("rejects a non-positive concurrency", async () => {
    await expect(
      ContractExtractor.processBatch([], { concurrency: 0 }),
    ).rejects.toThrow("`concurrency` must be a positive integer.");
  });
});

// ─── configure ───────────────────────────────────────────────────────────────

describe("ContractExtractor.configure", () => {
  it("merges nested settings key by key", () => {
    ContractExtractor.configure({ fallback: { retries: 0 } });
    const config = ContractExtractor.getConfig();
    expect(config.fallback.retries).toBe(0);
    expect(config.fallback.maxChars).toBe(22_000);
    expect(config.heuristics.labelMaxDigits).toBe(3);
  });

  it("throws INVALID_INPUT and keeps the previous config", () => {
    let caught: unknown;
    try {
      ContractExtractor.configure({ qualityThreshold: 150 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ContractExtractError);
    if (caught instanceof ContractExtractError) {
      expect(caught.code).toBe("INVALID_INPUT");
      expect(caught.message).toMatch(/^Invalid options: `qualityThreshold`/);
    }
    expect(ContractExtractor.getConfig().qualityThreshold).toBe(35);
  });

  it("reset restores defaults", () => {
    ContractExtractor.configure({ emailStrategy: "section", debug: true });
    ContractExtractor.reset();
    const config = ContractExtractor.getConfig();
    expect(config.emailStrategy).toBe("positional");
    expect(config.debug).toBe(false);
  });
});
