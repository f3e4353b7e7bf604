import type {
  RosterLookupPort,
  RosterLookupRequest,
  RosterLookupResult,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import { ok, type Result } from "neverthrow";

const MOCK_ROSTERS: ReadonlyMap<string, RosterLookupResult> = new Map([
  [
    "greenfield",
    {
      ein: "12-3456789",
      contacts: [
        { name: "Dana Greenfield", role: "President" },
        { name: "Robert Lee", role: "Treasurer" },
      ],
    },
  ],
]);

/**
 * Returns canned officer rosters keyed by normalized foundation name.
 */
export class MockRosterLookup implements RosterLookupPort {
  async lookupOfficers(
    request: RosterLookupRequest,
  ): Promise<Result<RosterLookupResult, AppBoundaryError>> {
    return ok(MOCK_ROSTERS.get(request.normalizedName) ?? { ein: null, contacts: [] });
  }
}
