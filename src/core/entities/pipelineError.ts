export type MalformedDocumentCode =
  | "empty_document"
  | "unreadable_stockholder_table"
  | "unparseable_markup";

export interface MalformedDocumentDiagnostic {
  code: MalformedDocumentCode;
  documentId: string;
  message: string;
  tableIndex?: number;
}

/**
 * Raised when a document has no parseable structure where a stockholder table was expected.
 */
export class MalformedDocumentError extends Error {
  public readonly diagnostic: MalformedDocumentDiagnostic;

  constructor(diagnostic: MalformedDocumentDiagnostic) {
    super(diagnostic.message);
    this.name = "MalformedDocumentError";
    this.diagnostic = diagnostic;
  }
}

export type RunAbortReason = "reference_unavailable" | "filings_unavailable";

/**
 * The only fatal pipeline failure; invalidates the whole batch.
 */
export class RunAbortedError extends Error {
  public readonly reason: RunAbortReason;

  constructor(reason: RunAbortReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RunAbortedError";
    this.reason = reason;
  }
}
