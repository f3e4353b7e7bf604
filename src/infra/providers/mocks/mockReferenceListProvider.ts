import type { ReferenceListProviderPort } from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { ReferenceEntry } from "../../../core/entities/reference";
import { ok, type Result } from "neverthrow";

/**
 * A small CRM list whose names overlap the bundled filing fixtures.
 */
export class MockReferenceListProvider implements ReferenceListProviderPort {
  constructor(
    private readonly entries: ReferenceEntry[] = [
      {
        referenceId: "mock-org-101",
        name: "Greenfield Foundation",
        kind: "organization",
        status: "Active LP",
        lastActivity: "2026-01-12",
        notes: "Annual LP meeting attendee",
      },
      {
        referenceId: "mock-org-102",
        name: "Acme Ventures Fund II LP",
        kind: "organization",
        status: "Committed",
      },
      {
        referenceId: "mock-org-103",
        name: "Harbor Point Capital",
        kind: "organization",
        status: "Prospect",
      },
      {
        referenceId: "mock-person-201",
        name: "John Smith",
        kind: "person",
        status: "Warm intro",
      },
    ],
  ) {}

  async loadEntries(): Promise<Result<ReferenceEntry[], AppBoundaryError>> {
    return ok(this.entries.map((entry) => ({ ...entry })));
  }
}

/**
 * Stands in when no CRM is configured; every record comes back unmatched.
 */
export class EmptyReferenceListProvider implements ReferenceListProviderPort {
  async loadEntries(): Promise<Result<ReferenceEntry[], AppBoundaryError>> {
    return ok([]);
  }
}
