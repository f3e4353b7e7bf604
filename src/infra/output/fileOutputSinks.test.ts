import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { OutputRow } from "../../core/entities/run";
import {
  CsvFileOutputSink,
  escapeCsvField,
  JsonFileOutputSink,
  toCsv,
} from "./fileOutputSinks";

const row: OutputRow = {
  investorName: "Acme Ventures Fund II, L.P.",
  ipoCompany: "Acme Robotics, Inc.",
  filingDate: "2026-01-05",
  ownershipPercent: "14.1",
  shareCount: "3400000",
  entityType: "fund",
  inCrm: true,
  crmStatus: "Committed",
  crmLastActivity: "2026-02-14",
  crmNotes: "Sent deck, follow up in Q2",
  matchConfidence: "100",
  foundationContacts: "",
  contactLookup: "",
  searchLink: "https://www.linkedin.com/search/results/companies/?keywords=Acme",
  sourceDocumentId: "doc-1",
};

const HEADER =
  "investor_name,ipo_company,filing_date,ownership_percent,share_count,entity_type,in_crm,crm_status,crm_last_activity,crm_notes,match_confidence,foundation_contacts,contact_lookup,search_link,source_document_id";

let directory = "";

beforeEach(async () => {
  directory = await mkdtemp(join(tmpdir(), "s1-prospector-"));
});

afterEach(async () => {
  await rm(directory, { recursive: true, force: true });
});

describe("escapeCsvField", () => {
  it("quotes only fields that need it", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("line\nbreak")).toBe('"line\nbreak"');
  });
});

describe("toCsv", () => {
  it("writes the header and one line per row", () => {
    expect(toCsv([row])).toBe(
      `${HEADER}\r\n"Acme Ventures Fund II, L.P.","Acme Robotics, Inc.",2026-01-05,14.1,3400000,fund,true,Committed,2026-02-14,"Sent deck, follow up in Q2",100,,,https://www.linkedin.com/search/results/companies/?keywords=Acme,doc-1\r\n`,
    );
  });

  it("writes only the header when there are no rows", () => {
    expect(toCsv([])).toBe(`${HEADER}\r\n`);
  });
});

describe("CsvFileOutputSink", () => {
  it("writes a dated file into the output directory", async () => {
    const sink = new CsvFileOutputSink(join(directory, "nested"));
    const result = await sink.write([row], { runId: "run-1", runDate: "2026-01-08" });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    const location = join(directory, "nested", "s1_investors_2026-01-08.csv");
    expect(result.value).toEqual({ location, rowCount: 1 });
    expect(await readFile(location, "utf8")).toBe(toCsv([row]));
  });

  it("reports an unwritable directory as a write failure", async () => {
    const blocker = join(directory, "blocker");
    await writeFile(blocker, "not a directory", "utf8");

    const sink = new CsvFileOutputSink(blocker);
    const result = await sink.write([row], { runId: "run-1", runDate: "2026-01-08" });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected write failure");
    }

    expect(result.error.source).toBe("output");
    expect(result.error.code).toBe("write_failed");
    expect(result.error.provider).toBe("csv-file");
  });
});

describe("JsonFileOutputSink", () => {
  it("writes rows keyed by column header", async () => {
    const sink = new JsonFileOutputSink(directory);
    const result = await sink.write([row], { runId: "run-1", runDate: "2026-01-08" });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    const written: unknown = JSON.parse(await readFile(result.value.location, "utf8"));
    expect(written).toEqual({
      runId: "run-1",
      runDate: "2026-01-08",
      rows: [
        {
          investor_name: "Acme Ventures Fund II, L.P.",
          ipo_company: "Acme Robotics, Inc.",
          filing_date: "2026-01-05",
          ownership_percent: "14.1",
          share_count: "3400000",
          entity_type: "fund",
          in_crm: true,
          crm_status: "Committed",
          crm_last_activity: "2026-02-14",
          crm_notes: "Sent deck, follow up in Q2",
          match_confidence: "100",
          foundation_contacts: "",
          contact_lookup: "",
          search_link: "https://www.linkedin.com/search/results/companies/?keywords=Acme",
          source_document_id: "doc-1",
        },
      ],
    });
  });
});
