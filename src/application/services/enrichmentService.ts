import type { Logger } from "pino";
import type {
  ContactLookupStatus,
  EnrichedRecord,
  FoundationContact,
  MatchedRecord,
} from "../../core/entities/stockholder";
import type {
  RosterLookupPort,
  RosterLookupRequest,
} from "../../core/ports/inboundPorts";
import { logger as defaultLogger } from "../../shared/logger/logger";

export type EnrichmentOptions = {
  timeoutMs: number;
  maxContacts: number;
};

export type EnrichmentOutcome = {
  status: ContactLookupStatus;
  contacts: FoundationContact[];
  ein: string | null;
};

/**
 * Per-run memo of roster lookups keyed by normalized name.
 */
export type EnrichmentCache = Map<string, Promise<EnrichmentOutcome>>;

const TIMED_OUT = Symbol("timed-out");

const unavailable: EnrichmentOutcome = {
  status: "unavailable",
  contacts: [],
  ein: null,
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Attaches officer contacts to foundation records. Lookup failures never fail the record.
 */
export class EnrichmentService {
  constructor(
    private readonly roster: RosterLookupPort | null,
    private readonly options: EnrichmentOptions,
    private readonly log: Logger = defaultLogger,
  ) {}

  async enrich(
    record: MatchedRecord,
    cache: EnrichmentCache = new Map(),
  ): Promise<EnrichedRecord> {
    if (record.entityType !== "foundation") {
      return {
        ...record,
        foundationContacts: [],
        contactLookup: "not_applicable",
        foundationEin: null,
      };
    }

    const key = record.normalizedName;
    let pending = cache.get(key);
    if (!pending) {
      pending = this.lookup({
        name: record.displayName,
        normalizedName: record.normalizedName,
      });
      cache.set(key, pending);
    }

    const outcome = await pending;
    return {
      ...record,
      foundationContacts: outcome.contacts,
      contactLookup: outcome.status,
      foundationEin: outcome.ein,
    };
  }

  private async lookup(request: RosterLookupRequest): Promise<EnrichmentOutcome> {
    if (!this.roster) {
      return unavailable;
    }

    const roster = this.roster;
    const call = Promise.resolve().then(() => roster.lookupOfficers(request));
    let result: Awaited<typeof call> | typeof TIMED_OUT;
    try {
      result = await this.withTimeout(call);
    } catch (error) {
      this.log.warn(
        { foundation: request.name, error: describeError(error) },
        "Roster lookup threw; contacts unavailable",
      );
      return unavailable;
    }

    if (result === TIMED_OUT) {
      call.catch((error: unknown) => {
        this.log.debug(
          { foundation: request.name, error: describeError(error) },
          "Roster lookup rejected after timeout",
        );
      });
      this.log.warn(
        { foundation: request.name, timeoutMs: this.options.timeoutMs },
        "Roster lookup timed out; contacts unavailable",
      );
      return unavailable;
    }

    if (result.isErr()) {
      this.log.warn(
        {
          foundation: request.name,
          provider: result.error.provider,
          code: result.error.code,
          reason: result.error.message,
        },
        "Roster lookup failed; contacts unavailable",
      );
      return unavailable;
    }

    const contacts = this.cleanContacts(result.value.contacts);
    return {
      status: contacts.length > 0 ? "found" : "none_found",
      contacts,
      ein: result.value.ein,
    };
  }

  private cleanContacts(contacts: FoundationContact[]): FoundationContact[] {
    const seen = new Set<string>();
    const cleaned: FoundationContact[] = [];

    for (const contact of contacts) {
      const name = contact.name.trim();
      const role = contact.role.trim();
      const key = `${name.toLowerCase()}|${role.toLowerCase()}`;
      if (!name || seen.has(key)) {
        continue;
      }

      seen.add(key);
      cleaned.push({ name, role });
    }

    return cleaned.slice(0, this.options.maxContacts);
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T | typeof TIMED_OUT> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.options.timeoutMs);
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
