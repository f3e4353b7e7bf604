import type { OutputRow } from "../../core/entities/run";
import type { EnrichedRecord, EntityType } from "../../core/entities/stockholder";

/**
 * Column order and header names shared by every sink.
 */
export const OUTPUT_COLUMNS: ReadonlyArray<{ key: keyof OutputRow; header: string }> = [
  { key: "investorName", header: "investor_name" },
  { key: "ipoCompany", header: "ipo_company" },
  { key: "filingDate", header: "filing_date" },
  { key: "ownershipPercent", header: "ownership_percent" },
  { key: "shareCount", header: "share_count" },
  { key: "entityType", header: "entity_type" },
  { key: "inCrm", header: "in_crm" },
  { key: "crmStatus", header: "crm_status" },
  { key: "crmLastActivity", header: "crm_last_activity" },
  { key: "crmNotes", header: "crm_notes" },
  { key: "matchConfidence", header: "match_confidence" },
  { key: "foundationContacts", header: "foundation_contacts" },
  { key: "contactLookup", header: "contact_lookup" },
  { key: "searchLink", header: "search_link" },
  { key: "sourceDocumentId", header: "source_document_id" },
];

const LINKEDIN_SEARCH_BASE = "https://www.linkedin.com/search/results";

export const buildSearchLink = (name: string, entityType: EntityType): string => {
  const vertical = entityType === "individual" ? "people" : "companies";
  return `${LINKEDIN_SEARCH_BASE}/${vertical}/?keywords=${encodeURIComponent(name)}`;
};

const formatNumber = (value: number | null): string =>
  value === null ? "" : String(value);

export const toOutputRow = (record: EnrichedRecord): OutputRow => ({
  investorName: record.displayName,
  ipoCompany: record.filingCompany,
  filingDate: record.filingDate,
  ownershipPercent: formatNumber(record.ownershipPercent),
  shareCount: formatNumber(record.shareCount),
  entityType: record.entityType,
  inCrm: record.match.matched,
  crmStatus: record.match.referenceStatus ?? "",
  crmLastActivity: record.match.referenceLastActivity ?? "",
  crmNotes: record.match.referenceNotes ?? "",
  matchConfidence: record.match.matched ? String(record.match.confidence) : "",
  foundationContacts: record.foundationContacts
    .map((contact) => (contact.role ? `${contact.name} (${contact.role})` : contact.name))
    .join("; "),
  contactLookup: record.contactLookup === "not_applicable" ? "" : record.contactLookup,
  searchLink: buildSearchLink(record.displayName, record.entityType),
  sourceDocumentId: record.sourceDocumentId,
});

/**
 * Renders one row as cell strings in column order; booleans become `true` / `false`.
 */
export const toCells = (row: OutputRow): string[] =>
  OUTPUT_COLUMNS.map(({ key }) => {
    const value = row[key];
    return typeof value === "boolean" ? String(value) : value;
  });
