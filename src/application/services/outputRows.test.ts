import { describe, expect, it } from "vitest";
import type { EnrichedRecord } from "../../core/entities/stockholder";
import { buildSearchLink, OUTPUT_COLUMNS, toCells, toOutputRow } from "./outputRows";

const greenfield: EnrichedRecord = {
  rawName: "Greenfield Foundation(1)",
  displayName: "Greenfield Foundation",
  normalizedName: "greenfield",
  ownershipPercent: 5.2,
  shareCount: 1_250_000,
  filingCompany: "Acme Robotics, Inc.",
  filingDate: "2026-01-05",
  sourceDocumentId: "acme-s1",
  lowConfidence: false,
  entityType: "foundation",
  match: {
    matched: true,
    referenceId: "mock-org-101",
    referenceName: "Greenfield Foundation",
    confidence: 100,
    referenceStatus: "Active LP",
    referenceLastActivity: "2026-02-14",
    referenceNotes: "Met at LP summit",
    matchBasis: "organization",
  },
  foundationContacts: [
    { name: "Dana Greenfield", role: "President" },
    { name: "Robert Lee", role: "" },
  ],
  contactLookup: "found",
  foundationEin: "12-3456789",
};

const lopez: EnrichedRecord = {
  ...greenfield,
  rawName: "Maria Lopez",
  displayName: "Maria Lopez",
  normalizedName: "maria lopez",
  ownershipPercent: null,
  shareCount: null,
  lowConfidence: true,
  entityType: "individual",
  match: {
    matched: false,
    referenceId: null,
    referenceName: null,
    confidence: null,
    referenceStatus: null,
    referenceLastActivity: null,
    referenceNotes: null,
    matchBasis: null,
    bestScore: 42,
  },
  foundationContacts: [],
  contactLookup: "not_applicable",
  foundationEin: null,
};

describe("buildSearchLink", () => {
  it("searches people for individuals and companies otherwise", () => {
    expect(buildSearchLink("John Q. Smith", "individual")).toBe(
      "https://www.linkedin.com/search/results/people/?keywords=John%20Q.%20Smith",
    );
    expect(buildSearchLink("Acme Ventures Fund II, L.P.", "fund")).toBe(
      "https://www.linkedin.com/search/results/companies/?keywords=Acme%20Ventures%20Fund%20II%2C%20L.P.",
    );
  });
});

describe("toOutputRow", () => {
  it("renders a matched foundation", () => {
    expect(toOutputRow(greenfield)).toEqual({
      investorName: "Greenfield Foundation",
      ipoCompany: "Acme Robotics, Inc.",
      filingDate: "2026-01-05",
      ownershipPercent: "5.2",
      shareCount: "1250000",
      entityType: "foundation",
      inCrm: true,
      crmStatus: "Active LP",
      crmLastActivity: "2026-02-14",
      crmNotes: "Met at LP summit",
      matchConfidence: "100",
      foundationContacts: "Dana Greenfield (President); Robert Lee",
      contactLookup: "found",
      searchLink: "https://www.linkedin.com/search/results/companies/?keywords=Greenfield%20Foundation",
      sourceDocumentId: "acme-s1",
    });
  });

  it("leaves absent values blank for an unmatched individual", () => {
    const row = toOutputRow(lopez);

    expect(row.ownershipPercent).toBe("");
    expect(row.shareCount).toBe("");
    expect(row.inCrm).toBe(false);
    expect(row.crmStatus).toBe("");
    expect(row.crmLastActivity).toBe("");
    expect(row.crmNotes).toBe("");
    expect(row.matchConfidence).toBe("");
    expect(row.foundationContacts).toBe("");
    expect(row.contactLookup).toBe("");
  });
});

describe("toCells", () => {
  it("follows column order and prints booleans", () => {
    const cells = toCells(toOutputRow(lopez));

    expect(cells).toHaveLength(OUTPUT_COLUMNS.length);
    expect(cells.slice(0, 7)).toEqual([
      "Maria Lopez",
      "Acme Robotics, Inc.",
      "2026-01-05",
      "",
      "",
      "individual",
      "false",
    ]);
    expect(cells[14]).toBe("acme-s1");
  });
});
