import type { IsoDate } from "./filing";

export const ENTITY_TYPES = [
  "foundation",
  "family_office",
  "fund",
  "corporate",
  "individual",
  "trust",
  "unknown",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/**
 * Cell strings of one stockholder-table row before any coercion.
 */
export type RawStockholderRow = {
  documentId: string;
  tableIndex: number;
  rowIndex: number;
  name: string;
  percent: string;
  shares: string;
};

export type StockholderRecord = {
  readonly rawName: string;
  readonly displayName: string;
  readonly normalizedName: string;
  readonly ownershipPercent: number | null;
  readonly shareCount: number | null;
  readonly filingCompany: string;
  readonly filingDate: IsoDate;
  readonly sourceDocumentId: string;
  readonly lowConfidence: boolean;
};

export type FieldCoercionFailure = {
  field: "ownership_percent" | "share_count";
  raw: string;
  reason: "not_numeric" | "out_of_range";
};

export type ReferenceKind = "organization" | "person";

export type MatchResult =
  | {
      matched: true;
      referenceId: string;
      referenceName: string;
      confidence: number;
      referenceStatus: string | null;
      referenceLastActivity: string | null;
      referenceNotes: string | null;
      matchBasis: ReferenceKind;
    }
  | {
      matched: false;
      referenceId: null;
      referenceName: null;
      confidence: null;
      referenceStatus: null;
      referenceLastActivity: null;
      referenceNotes: null;
      matchBasis: null;
      /** Highest score seen in either index, for reviewing near misses. */
      bestScore: number;
    };

export type FoundationContact = {
  name: string;
  role: string;
};

export type ContactLookupStatus =
  | "not_applicable"
  | "found"
  | "none_found"
  | "unavailable";

export type ClassifiedRecord = StockholderRecord & {
  readonly entityType: EntityType;
};

export type MatchedRecord = ClassifiedRecord & {
  readonly match: MatchResult;
};

export type EnrichedRecord = MatchedRecord & {
  readonly foundationContacts: readonly FoundationContact[];
  readonly contactLookup: ContactLookupStatus;
  readonly foundationEin: string | null;
};
