import { describe, expect, it } from "vitest";
import type { FilingDocument } from "../../core/entities/filing";
import type { ReferenceEntry } from "../../core/entities/reference";
import { MockRosterLookup } from "../../infra/providers/mocks/mockRosterLookup";
import { EnrichmentService } from "./enrichmentService";
import { EntityClassifierService } from "./entityClassifierService";
import { MatchResolverService } from "./matchResolverService";
import { dedupeKey, ProspectorPipelineService } from "./prospectorPipelineService";
import { RecordNormalizerService } from "./recordNormalizerService";
import { ReferenceSnapshot } from "./referenceSnapshot";
import { TableExtractorService } from "./tableExtractorService";

const entries: ReferenceEntry[] = [
  { referenceId: "mock-org-101", name: "Greenfield Foundation", kind: "organization", status: "Active LP" },
  { referenceId: "mock-org-102", name: "Acme Ventures Fund II LP", kind: "organization", status: "Committed" },
  { referenceId: "mock-person-201", name: "John Smith", kind: "person", status: "Warm intro" },
];

const documentOf = (documentId: string, rawContent: string): FilingDocument => ({
  documentId,
  rawContent,
  companyName: "Acme Robotics, Inc.",
  filingDate: "2026-01-05",
});

const acmeFiling = documentOf(
  "acme-s1",
  `
  <p><b>PRINCIPAL STOCKHOLDERS</b></p>
  <table>
    <tr><td>Name of Beneficial Owner</td><td colspan="2">Shares Beneficially Owned Prior to Offering</td></tr>
    <tr><td></td><td>Number</td><td>Percentage</td></tr>
    <tr><td>Greenfield Foundation(1)</td><td>1,250,000</td><td>5.2%</td></tr>
    <tr><td>Acme Ventures Fund II, L.P.(2)</td><td>3,400,000</td><td>14.1%</td></tr>
    <tr><td>John Q. Smith</td><td>800,000</td><td>3.3%</td></tr>
    <tr><td>Maria Lopez</td><td>&#8212;</td><td>*</td></tr>
  </table>`,
);

const acmeAmendment = documentOf(
  "acme-s1a",
  `
  <p>Principal Stockholders</p>
  <table>
    <tr><td>Name</td><td>Shares</td><td>Percent</td></tr>
    <tr><td>Greenfield Foundation</td><td>1,250,000</td><td>5.2%</td></tr>
    <tr><td>Northwind Holdings</td><td>500,000</td><td>2.1%</td></tr>
  </table>`,
);

const createPipeline = () =>
  new ProspectorPipelineService(
    new TableExtractorService(),
    new RecordNormalizerService(),
    new EntityClassifierService(),
    new MatchResolverService(),
    new EnrichmentService(new MockRosterLookup(), { timeoutMs: 1_000, maxContacts: 5 }),
  );

describe("dedupeKey", () => {
  it("ignores company name case and surrounding whitespace", () => {
    expect(
      dedupeKey({ normalizedName: "greenfield", filingCompany: " Acme Robotics, Inc. ", filingDate: "2026-01-05" }),
    ).toBe(
      dedupeKey({ normalizedName: "greenfield", filingCompany: "ACME ROBOTICS, INC.", filingDate: "2026-01-05" }),
    );
  });
});

describe("ProspectorPipelineService", () => {
  it("matches, enriches and counts records while isolating failing documents", async () => {
    const result = await createPipeline().processBatch(
      [
        acmeFiling,
        documentOf("empty", "   "),
        documentOf("summary-only", "<p>Prospectus summary only.</p>"),
        acmeAmendment,
      ],
      ReferenceSnapshot.fromEntries(entries),
    );

    expect(result.summary).toEqual({
      documentsAttempted: 4,
      documentsWithoutTable: 1,
      documentsFailed: 1,
      recordsExtracted: 6,
      recordsRejected: 0,
      recordsLowConfidence: 1,
      fieldCoercionFailures: 0,
      duplicatesDropped: 1,
      recordsMatched: 3,
      foundationsEnriched: 1,
      lookupsUnavailable: 0,
    });
    expect(result.issues.map(({ documentId, kind }) => ({ documentId, kind }))).toEqual([
      { documentId: "empty", kind: "malformed_document" },
      { documentId: "summary-only", kind: "no_table_found" },
    ]);
    expect(result.records.map((record) => record.displayName)).toEqual([
      "Greenfield Foundation",
      "Acme Ventures Fund II, L.P.",
      "John Q. Smith",
      "Maria Lopez",
      "Northwind Holdings",
    ]);
  });

  it("keeps the first occurrence of a duplicated stockholder", async () => {
    const result = await createPipeline().processBatch(
      [acmeFiling, acmeAmendment],
      ReferenceSnapshot.fromEntries(entries),
    );

    const greenfield = result.records.filter((record) => record.normalizedName === "greenfield");
    expect(greenfield).toHaveLength(1);
    expect(greenfield[0]?.sourceDocumentId).toBe("acme-s1");
  });

  it("attaches CRM status and foundation officers", async () => {
    const result = await createPipeline().processBatch(
      [acmeFiling],
      ReferenceSnapshot.fromEntries(entries),
    );

    const [greenfield, , smith, lopez] = result.records;
    expect(greenfield).toMatchObject({
      entityType: "foundation",
      ownershipPercent: 5.2,
      shareCount: 1_250_000,
      contactLookup: "found",
      foundationEin: "12-3456789",
      foundationContacts: [
        { name: "Dana Greenfield", role: "President" },
        { name: "Robert Lee", role: "Treasurer" },
      ],
    });
    expect(greenfield?.match).toMatchObject({
      matched: true,
      referenceId: "mock-org-101",
      referenceStatus: "Active LP",
    });
    expect(smith?.match).toMatchObject({
      matched: true,
      referenceId: "mock-person-201",
      confidence: 95,
    });
    expect(lopez).toMatchObject({
      entityType: "individual",
      lowConfidence: true,
      ownershipPercent: null,
      shareCount: null,
      contactLookup: "not_applicable",
    });
    expect(lopez?.match.matched).toBe(false);
  });

  it("splits a foundation and an unknown individual against a one-entry CRM list", async () => {
    const result = await createPipeline().processBatch(
      [
        documentOf(
          "two-holders",
          `
          <p>Principal Stockholders</p>
          <table>
            <tr><td>Name</td><td>Percent</td><td>Shares</td></tr>
            <tr><td>Greenfield Foundation</td><td>2.8%</td><td>100000</td></tr>
            <tr><td>John Q. Smith</td><td>1.1%</td><td></td></tr>
          </table>`,
        ),
      ],
      ReferenceSnapshot.fromEntries([
        { referenceId: "ref-1", name: "Greenfield Foundation", kind: "organization", status: null },
      ]),
    );

    const [foundation, individual] = result.records;
    expect(result.records).toHaveLength(2);
    expect(foundation).toMatchObject({
      entityType: "foundation",
      ownershipPercent: 2.8,
      shareCount: 100_000,
      contactLookup: "found",
    });
    expect(foundation?.match.referenceId).toBe("ref-1");
    expect(foundation?.foundationContacts).toHaveLength(2);
    expect(individual).toMatchObject({
      entityType: "individual",
      ownershipPercent: 1.1,
      shareCount: null,
      contactLookup: "not_applicable",
    });
    expect(individual?.match.matched).toBe(false);
    expect(result.summary.fieldCoercionFailures).toBe(0);
  });

  it("keeps distinct stockholders whose names use non-Latin scripts", async () => {
    const filing = documentOf(
      "cjk-s1",
      `
      <p>Principal Stockholders</p>
      <table>
        <tr><td>Name</td><td>Shares</td><td>Percent</td></tr>
        <tr><td>王小明</td><td>1,000</td><td>2.0%</td></tr>
        <tr><td>李华</td><td>500</td><td>1.0%</td></tr>
      </table>`,
    );

    const result = await createPipeline().processBatch([filing], ReferenceSnapshot.fromEntries(entries));

    expect(result.records.map((record) => record.normalizedName)).toEqual(["王小明", "李华"]);
    expect(result.summary.duplicatesDropped).toBe(0);
  });

  it("returns an empty result for an empty batch", async () => {
    const result = await createPipeline().processBatch([], ReferenceSnapshot.fromEntries(entries));

    expect(result.records).toEqual([]);
    expect(result.issues).toEqual([]);
    expect(result.summary.documentsAttempted).toBe(0);
  });
});
