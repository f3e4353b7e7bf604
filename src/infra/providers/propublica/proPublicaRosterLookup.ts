import type {
  RosterLookupPort,
  RosterLookupRequest,
  RosterLookupResult,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { FoundationContact } from "../../../core/entities/stockholder";
import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import { z } from "zod";
import { normalizeEntityName } from "../../../application/utils/nameText";
import { weightedRatio } from "../../../application/utils/nameSimilarity";
import { logger as defaultLogger } from "../../../shared/logger/logger";
import { HttpClient } from "../../http/httpClient";
import { fromHttpFailure, malformedResponse } from "../../http/boundaryError";

const PROVIDER = "propublica";
const MIN_NAME_SCORE = 80;
const CARE_OF_ROLE = "Principal officer (care of)";

const searchSchema = z.object({
  organizations: z
    .array(
      z.object({
        ein: z.union([z.number(), z.string()]),
        name: z.string(),
      }),
    )
    .default([]),
});

const organizationSchema = z.object({
  organization: z.object({
    ein: z.union([z.number(), z.string()]).optional(),
    name: z.string().nullish(),
    careofname: z.string().nullish(),
  }),
});

/**
 * Nonprofit Explorer returns EINs as bare integers; rosters are reported as `12-3456789`.
 */
export const formatEin = (ein: number | string): string | null => {
  const digits = String(ein).replace(/\D/g, "");
  if (!digits || digits.length > 9) {
    return null;
  }

  const padded = digits.padStart(9, "0");
  return `${padded.slice(0, 2)}-${padded.slice(2)}`;
};

const searchTerm = (name: string): string =>
  name.replace(/\b(?:foundation|endowment)\b/gi, " ").replace(/\s+/g, " ").trim() || name;

/**
 * The organization endpoint exposes the care-of name from the latest 990, written like `% JANE DOE`.
 */
export const careOfContact = (careOfName: string | null | undefined): FoundationContact | null => {
  const name = (careOfName ?? "").replace(/^\s*%\s*/, "").replace(/\s+/g, " ").trim();
  return name ? { name, role: CARE_OF_ROLE } : null;
};

/**
 * Looks foundations up in ProPublica's Nonprofit Explorer and reports the officer named on their filings.
 */
export class ProPublicaRosterLookup implements RosterLookupPort {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpClient(),
    private readonly log: Logger = defaultLogger,
  ) {}

  async lookupOfficers(
    request: RosterLookupRequest,
  ): Promise<Result<RosterLookupResult, AppBoundaryError>> {
    let ein = request.ein ?? null;
    if (!ein) {
      const searchResult = await this.findEin(request);
      if (searchResult.isErr()) {
        return err(searchResult.error);
      }

      ein = searchResult.value;
    }

    if (!ein) {
      this.log.debug({ foundation: request.name }, "No Nonprofit Explorer match");
      return ok({ ein: null, contacts: [] });
    }

    const organizationResult = await this.fetchParsed(
      `organizations/${ein.replace(/\D/g, "")}.json`,
      organizationSchema,
      "Nonprofit Explorer organization",
    );
    if (organizationResult.isErr()) {
      return err(organizationResult.error);
    }

    const contact = careOfContact(organizationResult.value?.organization.careofname);
    return ok({ ein, contacts: contact ? [contact] : [] });
  }

  /**
   * Takes the best-scoring search hit, and only when its name is close to the foundation's normalized name.
   */
  private async findEin(
    request: RosterLookupRequest,
  ): Promise<Result<string | null, AppBoundaryError>> {
    const searchResult = await this.fetchParsed(
      "search.json",
      searchSchema,
      "Nonprofit Explorer search",
      { q: searchTerm(request.name) },
    );
    if (searchResult.isErr()) {
      return err(searchResult.error);
    }

    let best: { ein: string; score: number } | null = null;
    for (const organization of searchResult.value?.organizations ?? []) {
      const ein = formatEin(organization.ein);
      const score = weightedRatio(normalizeEntityName(organization.name), request.normalizedName);
      if (!ein || score < MIN_NAME_SCORE) {
        continue;
      }

      if (!best || score > best.score) {
        best = { ein, score };
      }
    }

    return ok(best?.ein ?? null);
  }

  /**
   * Nonprofit Explorer answers 404 when a search has no hits, which is an empty result rather than a failure.
   */
  private async fetchParsed<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    label: string,
    query: Record<string, string> = {},
  ): Promise<Result<T | null, AppBoundaryError>> {
    const base = this.baseUrl.endsWith("/") ? this.baseUrl : `${this.baseUrl}/`;
    const url = new URL(path, base);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    const response = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 1,
      retryDelayMs: 300,
      headers: { Accept: "application/json" },
    });

    if (response.isErr()) {
      if (response.error.httpStatus === 404) {
        return ok(null);
      }

      return err(fromHttpFailure("roster", PROVIDER, response.error, label));
    }

    const parsed = schema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        malformedResponse("roster", PROVIDER, `${label} payload was malformed.`, parsed.error),
      );
    }

    return ok(parsed.data);
  }
}
