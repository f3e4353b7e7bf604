import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { FilingDocument, FilingMetadata } from "../entities/filing";
import type { ReferenceEntry } from "../entities/reference";
import type { FoundationContact } from "../entities/stockholder";

export type FilingsRequest = {
  forms: string[];
  from: Date;
  to: Date;
  limit: number;
};

export type RosterLookupRequest = {
  name: string;
  normalizedName: string;
  ein?: string;
};

export type RosterLookupResult = {
  ein: string | null;
  contacts: FoundationContact[];
};

export interface FilingsProviderPort {
  listFilings(
    request: FilingsRequest,
  ): Promise<Result<FilingMetadata[], AppBoundaryError>>;
  fetchDocument(
    filing: FilingMetadata,
  ): Promise<Result<FilingDocument, AppBoundaryError>>;
}

export interface ReferenceListProviderPort {
  loadEntries(): Promise<Result<ReferenceEntry[], AppBoundaryError>>;
}

export interface RosterLookupPort {
  lookupOfficers(
    request: RosterLookupRequest,
  ): Promise<Result<RosterLookupResult, AppBoundaryError>>;
}
