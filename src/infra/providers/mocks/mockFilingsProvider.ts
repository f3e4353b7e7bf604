import { readFile } from "node:fs/promises";
import type {
  FilingsProviderPort,
  FilingsRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { FilingDocument, FilingMetadata } from "../../../core/entities/filing";
import { err, ok, type Result } from "neverthrow";
import { toIsoDate } from "../utils/dateUtils";

type MockFiling = {
  documentId: string;
  companyName: string;
  formType: string;
  fixture: string;
};

const MOCK_FILINGS: MockFiling[] = [
  {
    documentId: "mock-acme-robotics-s1",
    companyName: "Acme Robotics, Inc.",
    formType: "S-1",
    fixture: "acme-robotics-s1.html",
  },
  {
    documentId: "mock-beta-bio-s1a",
    companyName: "Beta Bio Corp",
    formType: "S-1/A",
    fixture: "beta-bio-s1a.html",
  },
  {
    documentId: "mock-gamma-energy-s1",
    companyName: "Gamma Energy Corp.",
    formType: "S-1",
    fixture: "gamma-energy-s1.html",
  },
];

const fixtureUrl = (fixture: string): URL =>
  new URL(`./fixtures/${fixture}`, import.meta.url);

/**
 * Serves bundled S-1 fixtures so the pipeline can run end to end without EDGAR.
 */
export class MockFilingsProvider implements FilingsProviderPort {
  async listFilings(
    request: FilingsRequest,
  ): Promise<Result<FilingMetadata[], AppBoundaryError>> {
    const allowedForms = new Set(request.forms.map((form) => form.toUpperCase()));
    const filingDate = toIsoDate(request.to);

    return ok(
      MOCK_FILINGS.filter((filing) => allowedForms.has(filing.formType))
        .slice(0, request.limit)
        .map((filing) => ({
          documentId: filing.documentId,
          provider: "mock-edgar",
          companyName: filing.companyName,
          formType: filing.formType,
          filingDate,
          docUrl: fixtureUrl(filing.fixture).toString(),
        })),
    );
  }

  async fetchDocument(
    filing: FilingMetadata,
  ): Promise<Result<FilingDocument, AppBoundaryError>> {
    try {
      const rawContent = await readFile(new URL(filing.docUrl), "utf8");
      return ok({
        documentId: filing.documentId,
        rawContent,
        companyName: filing.companyName,
        filingDate: filing.filingDate,
        formType: filing.formType,
        docUrl: filing.docUrl,
      });
    } catch (error) {
      return err({
        source: "filings",
        code: "provider_error",
        provider: "mock-edgar",
        message: `Fixture ${filing.docUrl} could not be read.`,
        retryable: false,
        cause: error,
      });
    }
  }
}
