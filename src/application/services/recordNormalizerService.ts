import { err, ok, type Result } from "neverthrow";
import type { FilingDocument } from "../../core/entities/filing";
import type {
  FieldCoercionFailure,
  RawStockholderRow,
  StockholderRecord,
} from "../../core/entities/stockholder";
import {
  collapseWhitespace,
  normalizeEntityName,
  stripFootnoteMarkers,
  toDisplayName,
} from "../utils/nameText";

export type NormalizedRow = {
  record: StockholderRecord;
  coercionFailures: FieldCoercionFailure[];
};

export type RejectedRow = {
  reason: "empty_name";
  documentId: string;
  rowIndex: number;
  rawName: string;
};

type FieldParse<T> = {
  value: T | null;
  failure?: FieldCoercionFailure;
};

// Dashes and a bare asterisk ("less than 1%") mean "nothing reported", not a parse failure.
const ABSENT_VALUE = /^(?:[-–—]+|\*+|n\/?a)?$/i;
const DECIMAL = /^(?:\d+(?:\.\d*)?|\.\d+)$/;
const INTEGER = /^\d+$/;

const cleanNumericCell = (raw: string): string =>
  collapseWhitespace(stripFootnoteMarkers(collapseWhitespace(raw)));

export const parseOwnershipPercent = (raw: string): FieldParse<number> => {
  const cleaned = cleanNumericCell(raw).replace(/%/g, "").replace(/\s+/g, "");
  if (ABSENT_VALUE.test(cleaned)) {
    return { value: null };
  }

  if (!DECIMAL.test(cleaned)) {
    return {
      value: null,
      failure: { field: "ownership_percent", raw, reason: "not_numeric" },
    };
  }

  const value = Number.parseFloat(cleaned);
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    return {
      value: null,
      failure: { field: "ownership_percent", raw, reason: "out_of_range" },
    };
  }

  return { value };
};

export const parseShareCount = (raw: string): FieldParse<number> => {
  const cleaned = cleanNumericCell(raw).replace(/[,\s]/g, "");
  if (ABSENT_VALUE.test(cleaned)) {
    return { value: null };
  }

  if (!INTEGER.test(cleaned)) {
    return {
      value: null,
      failure: { field: "share_count", raw, reason: "not_numeric" },
    };
  }

  const value = Number.parseInt(cleaned, 10);
  if (!Number.isSafeInteger(value)) {
    return {
      value: null,
      failure: { field: "share_count", raw, reason: "out_of_range" },
    };
  }

  return { value };
};

/**
 * Turns raw cell strings into canonical stockholder records; a bad number degrades to null instead of dropping the row.
 */
export class RecordNormalizerService {
  normalize(
    row: RawStockholderRow,
    document: FilingDocument,
  ): Result<NormalizedRow, RejectedRow> {
    const rawName = collapseWhitespace(row.name);
    const displayName = toDisplayName(rawName);

    if (!displayName) {
      return err({
        reason: "empty_name",
        documentId: row.documentId,
        rowIndex: row.rowIndex,
        rawName,
      });
    }

    const percent = parseOwnershipPercent(row.percent);
    const shares = parseShareCount(row.shares);
    const coercionFailures = [percent.failure, shares.failure].filter(
      (failure): failure is FieldCoercionFailure => failure !== undefined,
    );

    return ok({
      record: {
        rawName,
        displayName,
        normalizedName: normalizeEntityName(displayName),
        ownershipPercent: percent.value,
        shareCount: shares.value,
        filingCompany: document.companyName,
        filingDate: document.filingDate,
        sourceDocumentId: document.documentId,
        lowConfidence: percent.value === null && shares.value === null,
      },
      coercionFailures,
    });
  }
}
