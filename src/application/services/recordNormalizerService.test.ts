import { describe, expect, it } from "vitest";
import type { FilingDocument } from "../../core/entities/filing";
import type { RawStockholderRow } from "../../core/entities/stockholder";
import {
  parseOwnershipPercent,
  parseShareCount,
  RecordNormalizerService,
} from "./recordNormalizerService";

const document: FilingDocument = {
  documentId: "doc-1",
  rawContent: "<table></table>",
  companyName: "Acme Robotics, Inc.",
  filingDate: "2026-01-05",
};

const rowOf = (overrides: Partial<RawStockholderRow>): RawStockholderRow => ({
  documentId: "doc-1",
  tableIndex: 0,
  rowIndex: 3,
  name: "Greenfield Foundation(1)",
  percent: "5.2%",
  shares: "1,250,000",
  ...overrides,
});

describe("parseOwnershipPercent", () => {
  it("reads the same value however the percent sign is written", () => {
    expect(parseOwnershipPercent("4.2%").value).toBe(4.2);
    expect(parseOwnershipPercent("4.2").value).toBe(4.2);
    expect(parseOwnershipPercent(" 4.2 % ").value).toBe(4.2);
    expect(parseOwnershipPercent("5.2%(1)").value).toBe(5.2);
  });

  it("treats dashes and asterisks as not reported", () => {
    expect(parseOwnershipPercent("—")).toEqual({ value: null });
    expect(parseOwnershipPercent("*")).toEqual({ value: null });
    expect(parseOwnershipPercent("")).toEqual({ value: null });
  });

  it("records coercion failures for unreadable or impossible values", () => {
    expect(parseOwnershipPercent("n.m.")).toEqual({
      value: null,
      failure: { field: "ownership_percent", raw: "n.m.", reason: "not_numeric" },
    });
    expect(parseOwnershipPercent("101%")).toEqual({
      value: null,
      failure: { field: "ownership_percent", raw: "101%", reason: "out_of_range" },
    });
  });
});

describe("parseShareCount", () => {
  it("drops thousands separators and footnotes", () => {
    expect(parseShareCount("1,250,000").value).toBe(1_250_000);
    expect(parseShareCount("1,250,000 (2)").value).toBe(1_250_000);
  });

  it("rejects fractional and oversized counts", () => {
    expect(parseShareCount("12.5")).toEqual({
      value: null,
      failure: { field: "share_count", raw: "12.5", reason: "not_numeric" },
    });
    expect(parseShareCount("99999999999999999999")).toEqual({
      value: null,
      failure: { field: "share_count", raw: "99999999999999999999", reason: "out_of_range" },
    });
  });
});

describe("RecordNormalizerService", () => {
  const normalizer = new RecordNormalizerService();

  it("builds a record carrying filing provenance", () => {
    const result = normalizer.normalize(rowOf({}), document);

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.reason);
    }

    expect(result.value).toEqual({
      record: {
        rawName: "Greenfield Foundation(1)",
        displayName: "Greenfield Foundation",
        normalizedName: "greenfield",
        ownershipPercent: 5.2,
        shareCount: 1_250_000,
        filingCompany: "Acme Robotics, Inc.",
        filingDate: "2026-01-05",
        sourceDocumentId: "doc-1",
        lowConfidence: false,
      },
      coercionFailures: [],
    });
  });

  it("keeps the row with a null field when one value cannot be read", () => {
    const result = normalizer.normalize(rowOf({ percent: "see note" }), document);

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.reason);
    }

    expect(result.value.record.ownershipPercent).toBeNull();
    expect(result.value.record.shareCount).toBe(1_250_000);
    expect(result.value.record.lowConfidence).toBe(false);
    expect(result.value.coercionFailures).toEqual([
      { field: "ownership_percent", raw: "see note", reason: "not_numeric" },
    ]);
  });

  it("flags records with neither percent nor share count as low confidence", () => {
    const result = normalizer.normalize(
      rowOf({ name: "Maria Lopez", percent: "*", shares: "—" }),
      document,
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.reason);
    }

    expect(result.value.record.lowConfidence).toBe(true);
    expect(result.value.coercionFailures).toEqual([]);
  });

  it("rejects rows whose name is only footnote markers", () => {
    const result = normalizer.normalize(rowOf({ name: " (1) " }), document);

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected rejection");
    }

    expect(result.error).toEqual({
      reason: "empty_name",
      documentId: "doc-1",
      rowIndex: 3,
      rawName: "(1)",
    });
  });
});
