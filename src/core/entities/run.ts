import type { IsoDate } from "./filing";

export type DocumentIssueKind =
  | "no_table_found"
  | "malformed_document"
  | "fetch_failed"
  | "processing_failed";

export type DocumentIssue = {
  documentId: string;
  kind: DocumentIssueKind;
  message: string;
};

export type RunSummary = {
  documentsAttempted: number;
  documentsWithoutTable: number;
  documentsFailed: number;
  recordsExtracted: number;
  recordsRejected: number;
  recordsLowConfidence: number;
  fieldCoercionFailures: number;
  duplicatesDropped: number;
  recordsMatched: number;
  foundationsEnriched: number;
  lookupsUnavailable: number;
};

/**
 * Sink-independent output row. Absent numbers and statuses render as empty strings.
 */
export type OutputRow = {
  investorName: string;
  ipoCompany: string;
  filingDate: IsoDate;
  ownershipPercent: string;
  shareCount: string;
  entityType: string;
  inCrm: boolean;
  crmStatus: string;
  crmLastActivity: string;
  crmNotes: string;
  matchConfidence: string;
  foundationContacts: string;
  contactLookup: string;
  searchLink: string;
  sourceDocumentId: string;
};
