import type {
  FilingsProviderPort,
  FilingsRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { FilingDocument, FilingMetadata } from "../../../core/entities/filing";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpClient } from "../../http/httpClient";
import { fromHttpFailure, malformedResponse } from "../../http/boundaryError";
import { toIsoDate } from "../utils/dateUtils";

const PROVIDER = "sec-edgar";
const PAGE_SIZE = 100;

const searchHitSchema = z.object({
  _id: z.string(),
  _source: z.object({
    ciks: z.array(z.string()).default([]),
    display_names: z.array(z.string()).default([]),
    file_date: z.string(),
    form: z.string(),
    file_type: z.string().optional(),
    adsh: z.string(),
  }),
});

const searchResponseSchema = z.object({
  hits: z.object({
    total: z.object({ value: z.number() }).optional(),
    hits: z.array(z.unknown()),
  }),
});

type SearchHit = z.infer<typeof searchHitSchema>;

/**
 * EDGAR display names look like `Acme Robotics, Inc.  (ACRB)  (CIK 0001234567)`.
 */
export const cleanDisplayName = (displayName: string): string =>
  displayName
    .replace(/\(CIK\s*\d+\)/gi, "")
    .replace(/\([A-Z0-9.,\s-]{1,20}\)\s*$/, "")
    .replace(/\s+/g, " ")
    .trim();

const asAccessionPathPart = (accessionNo: string): string =>
  accessionNo.replaceAll("-", "");

/**
 * Lists S-1 family filings from the EDGAR full-text search index and downloads their primary documents.
 */
export class SecEdgarFilingsProvider implements FilingsProviderPort {
  constructor(
    private readonly searchUrl: string,
    private readonly archivesBaseUrl: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 60_000,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.userAgent.trim()) {
      throw new Error(
        "SEC_EDGAR_USER_AGENT is required when SEC EDGAR filings provider is enabled.",
      );
    }
  }

  async listFilings(
    request: FilingsRequest,
  ): Promise<Result<FilingMetadata[], AppBoundaryError>> {
    const allowedForms = new Set(request.forms.map((form) => form.toUpperCase()));
    const seen = new Set<string>();
    const filings: FilingMetadata[] = [];

    for (let from = 0; filings.length < request.limit; from += PAGE_SIZE) {
      const pageResult = await this.fetchSearchPage(request, from);
      if (pageResult.isErr()) {
        return err(pageResult.error);
      }

      const { hits, total } = pageResult.value;
      for (const hit of hits) {
        const filing = this.toFilingMetadata(hit);
        if (!filing || !allowedForms.has(filing.formType) || seen.has(filing.documentId)) {
          continue;
        }

        seen.add(filing.documentId);
        filings.push(filing);
        if (filings.length >= request.limit) {
          break;
        }
      }

      if (hits.length < PAGE_SIZE || from + PAGE_SIZE >= total) {
        break;
      }
    }

    return ok(filings);
  }

  async fetchDocument(
    filing: FilingMetadata,
  ): Promise<Result<FilingDocument, AppBoundaryError>> {
    const response = await this.httpClient.requestText({
      url: filing.docUrl,
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 500,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "text/html, text/plain",
      },
    });

    if (response.isErr()) {
      return err(
        fromHttpFailure("filings", PROVIDER, response.error, `Fetching ${filing.docUrl}`),
      );
    }

    return ok({
      documentId: filing.documentId,
      rawContent: response.value,
      companyName: filing.companyName,
      filingDate: filing.filingDate,
      formType: filing.formType,
      docUrl: filing.docUrl,
    });
  }

  private async fetchSearchPage(
    request: FilingsRequest,
    from: number,
  ): Promise<Result<{ hits: SearchHit[]; total: number }, AppBoundaryError>> {
    const url = new URL(this.searchUrl);
    url.searchParams.set("forms", request.forms.join(","));
    url.searchParams.set("dateRange", "custom");
    url.searchParams.set("startdt", toIsoDate(request.from));
    url.searchParams.set("enddt", toIsoDate(request.to));
    url.searchParams.set("from", String(from));

    const response = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 500,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "application/json",
      },
    });

    if (response.isErr()) {
      return err(fromHttpFailure("filings", PROVIDER, response.error, "EDGAR search"));
    }

    const parsed = searchResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        malformedResponse("filings", PROVIDER, "EDGAR search payload was malformed.", parsed.error),
      );
    }

    // Individual hits that fail validation are skipped instead of failing the listing.
    const hits = parsed.data.hits.hits.flatMap((raw) => {
      const hit = searchHitSchema.safeParse(raw);
      return hit.success ? [hit.data] : [];
    });

    return ok({
      hits,
      total: parsed.data.hits.total?.value ?? parsed.data.hits.hits.length,
    });
  }

  private toFilingMetadata(hit: SearchHit): FilingMetadata | null {
    const source = hit._source;
    const fileName = hit._id.split(":")[1]?.trim();
    const accessionNo = source.adsh.trim();
    const cik = source.ciks[0]?.trim();
    const formType = source.form.trim().toUpperCase();

    // Exhibits are indexed as separate hits under the same accession number.
    if (source.file_type && source.file_type.trim().toUpperCase() !== formType) {
      return null;
    }

    if (!fileName || !accessionNo || !cik || !/^\d{4}-\d{2}-\d{2}$/.test(source.file_date)) {
      return null;
    }

    const cikNumber = Number.parseInt(cik, 10);
    return {
      documentId: `${accessionNo}:${fileName}`,
      provider: PROVIDER,
      companyName: cleanDisplayName(source.display_names[0] ?? "") || `CIK ${cikNumber}`,
      cik,
      formType,
      accessionNo,
      filingDate: source.file_date,
      docUrl: `${this.archivesBaseUrl}/${cikNumber}/${asAccessionPathPart(accessionNo)}/${fileName}`,
    };
  }
}
