import { load, type CheerioAPI } from "cheerio";
import type { FilingDocument } from "../../core/entities/filing";
import { MalformedDocumentError } from "../../core/entities/pipelineError";
import type { RawStockholderRow } from "../../core/entities/stockholder";
import { collapseWhitespace } from "../utils/nameText";

export type ExtractionSummary =
  | { status: "extracted"; tableCount: number; rowCount: number }
  | { status: "no_table" };

export type ColumnRole = "name" | "percent" | "shares";

/**
 * Header synonyms, tested percent first so "Percentage of Shares" is read as a percent column.
 */
export const HEADER_SYNONYMS: ReadonlyArray<{ role: ColumnRole; pattern: RegExp }> = [
  { role: "percent", pattern: /\bpercent(?:age)?\b|%/i },
  { role: "shares", pattern: /\bshares\b|\bnumber\b|\bamount\b/i },
  {
    role: "name",
    pattern: /\bname\b|\bbeneficial\s+owners?\b|\b(?:stock|share)holders?\b/i,
  },
];

const SECTION_PATTERN =
  /principal\s+(?:and\s+selling\s+)?(?:stock|share)holders|security\s+ownership|beneficial(?:ly)?\s+own|selling\s+(?:stock|share)holders/i;

/**
 * Row labels that head a group of holders, such as "5% Stockholders" or "Directors and Named Executive Officers".
 */
const GROUP_LABEL = /\b(?:stock|share)holders\b|\bdirectors\b|\bofficers\b|\bholders\s+of\b|%/i;

/**
 * Blocks that may sit between the two halves of a table split by a page break.
 */
const PAGE_FURNITURE: ReadonlyArray<RegExp> = [
  /^[-–—\s]*(?:page\s+)?(?:\d{1,4}|[ivxlc]{1,6})[-–—\s]*$/i,
  /^table\s+of\s+contents$/i,
  /^(?:\*|\(\d+\))\s/,
];

const NUMERIC_CELL = /^\$?\s*\d[\d,]*(?:\.\d+)?\s*%?$/;
const MAX_COLSPAN = 50;
const HEADER_BAND_DEPTH = 3;

type TableCell = { text: string; span: number };

type ParsedTable = {
  index: number;
  rows: TableCell[][];
  text: string;
  context: string;
  /** Text of each block between this table and the table before it, nearest first. */
  gap: string[];
};

type ColumnMapping = {
  slotCount: number;
  name: number[];
  percent: number[];
  shares: number[];
};

const cellText = (value: string): string => collapseWhitespace(value);

const spanOf = (value: string | undefined): number => {
  const parsed = Number.parseInt(value ?? "1", 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return 1;
  }

  return Math.min(parsed, MAX_COLSPAN);
};

const slotCountOf = (row: TableCell[]): number =>
  row.reduce((total, cell) => total + cell.span, 0);

/**
 * Spreads cells over colspan slots. Header rows fill every slot a cell covers; data rows only its first.
 */
const expandRow = (row: TableCell[], fillSpan: boolean): string[] => {
  const slots: string[] = [];
  for (const cell of row) {
    for (let offset = 0; offset < cell.span; offset += 1) {
      slots.push(offset === 0 || fillSpan ? cell.text : "");
    }
  }

  return slots;
};

const nonEmptyCount = (row: TableCell[]): number =>
  row.filter((cell) => cell.text.length > 0).length;

const isHeaderLike = (row: TableCell[]): boolean =>
  nonEmptyCount(row) >= 2 && !row.some((cell) => NUMERIC_CELL.test(cell.text));

const roleOf = (label: string): ColumnRole | null => {
  for (const synonym of HEADER_SYNONYMS) {
    if (synonym.pattern.test(label)) {
      return synonym.role;
    }
  }

  return null;
};

/**
 * Merges header rows slot-wise and keeps the first contiguous group of slots for each role.
 */
const mapHeaderBand = (band: TableCell[][]): ColumnMapping | null => {
  const slotCount = Math.max(0, ...band.map(slotCountOf));
  const expanded = band.map((row) => expandRow(row, true));
  const labels = Array.from({ length: slotCount }, (_, slot) =>
    collapseWhitespace(expanded.map((row) => row[slot] ?? "").join(" ")),
  );

  const groups: Record<ColumnRole, number[]> = {
    name: [],
    percent: [],
    shares: [],
  };

  let slot = 0;
  while (slot < slotCount) {
    const label = labels[slot] ?? "";
    let end = slot + 1;
    while (end < slotCount && labels[end] === label) {
      end += 1;
    }

    const role = label ? roleOf(label) : null;
    if (role && groups[role].length === 0) {
      for (let index = slot; index < end; index += 1) {
        groups[role].push(index);
      }
    }

    slot = end;
  }

  if (groups.name.length === 0) {
    return null;
  }

  if (groups.percent.length === 0 && groups.shares.length === 0) {
    return null;
  }

  return { slotCount, ...groups };
};

const readSlots = (slots: string[], indices: number[]): string =>
  collapseWhitespace(
    indices
      .map((index) => slots[index] ?? "")
      .filter(Boolean)
      .join(" "),
  );

const isSkippableName = (name: string): boolean =>
  name.length === 0 ||
  name.endsWith(":") ||
  name.startsWith("*") ||
  /^total\b/i.test(name) ||
  /\bas a group\b/i.test(name);

const isGroupLabel = (name: string, percent: string, shares: string): boolean =>
  !percent && !shares && GROUP_LABEL.test(name);

const isPageFurniture = (text: string): boolean =>
  text.length === 0 ||
  SECTION_PATTERN.test(text) ||
  PAGE_FURNITURE.some((pattern) => pattern.test(text));

/**
 * Finds beneficial-ownership tables in filing markup and streams their rows as raw cell strings.
 */
export class TableExtractorService {
  *extract(
    document: FilingDocument,
  ): Generator<RawStockholderRow, ExtractionSummary, undefined> {
    if (!document.rawContent.trim()) {
      throw new MalformedDocumentError({
        code: "empty_document",
        documentId: document.documentId,
        message: `Document ${document.documentId} has no content.`,
      });
    }

    const tables = this.parseTables(document);

    let carried: ColumnMapping | null = null;
    let previousTableIndex = -1;
    let tableCount = 0;
    let rowCount = 0;

    for (const table of tables) {
      const header = this.findHeader(table);
      const inSection =
        SECTION_PATTERN.test(table.text) || SECTION_PATTERN.test(table.context);
      // A table right after a stockholder table continues it across a page break,
      // unless prose or a new heading sits between them.
      const continues =
        carried !== null &&
        previousTableIndex === table.index - 1 &&
        table.gap.every(isPageFurniture);

      let mapping: ColumnMapping | null = null;
      let firstDataRow = 0;

      if (header && (inSection || continues)) {
        mapping = header.mapping;
        firstDataRow = header.rowIndex + 1;
      } else if (
        !header &&
        carried &&
        continues &&
        Math.max(0, ...table.rows.map(slotCountOf)) === carried.slotCount
      ) {
        mapping = carried;
      }

      if (!mapping) {
        carried = null;
        continue;
      }

      if (mapping !== carried) {
        tableCount += 1;
      }
      carried = mapping;
      previousTableIndex = table.index;

      for (let rowIndex = firstDataRow; rowIndex < table.rows.length; rowIndex += 1) {
        const row = table.rows[rowIndex];
        if (!row || nonEmptyCount(row) === 0) {
          continue;
        }

        if (isHeaderLike(row) && mapHeaderBand([row])) {
          continue;
        }

        const slots = expandRow(row, false);
        const name = readSlots(slots, mapping.name);
        const percent = readSlots(slots, mapping.percent);
        const shares = readSlots(slots, mapping.shares);
        if (isSkippableName(name) || isGroupLabel(name, percent, shares)) {
          continue;
        }

        rowCount += 1;
        yield {
          documentId: document.documentId,
          tableIndex: table.index,
          rowIndex,
          name,
          percent,
          shares,
        };
      }
    }

    if (tableCount === 0) {
      return { status: "no_table" };
    }

    if (rowCount === 0) {
      throw new MalformedDocumentError({
        code: "unreadable_stockholder_table",
        documentId: document.documentId,
        message: `Document ${document.documentId} has a stockholder table header but no readable rows.`,
      });
    }

    return { status: "extracted", tableCount, rowCount };
  }

  private parseTables(document: FilingDocument): ParsedTable[] {
    let $: CheerioAPI;
    try {
      $ = load(document.rawContent);
    } catch (error) {
      throw new MalformedDocumentError({
        code: "unparseable_markup",
        documentId: document.documentId,
        message: `Document ${document.documentId} markup could not be parsed: ${
          error instanceof Error ? error.message : String(error)
        }`,
      });
    }

    return $("table")
      .toArray()
      .map((table, index) => {
        const rows = $(table)
          .find("tr")
          .toArray()
          .filter((tr) => $(tr).closest("table").get(0) === table)
          .map((tr) =>
            $(tr)
              .children("td, th")
              .toArray()
              .map((cell) => ({
                text: cellText($(cell).text()),
                span: spanOf($(cell).attr("colspan")),
              })),
          );

        const own = $(table);
        const parent = own.parent();
        const grandparent = parent.parent();
        const context = [
          own.prevAll().slice(0, 5).text(),
          parent.prevAll().slice(0, 5).text(),
          grandparent.prevAll().slice(0, 5).text(),
        ].join(" ");

        const gap: string[] = [];
        let level = own;
        for (let depth = 0; depth < 3 && level.length > 0 && !level.is("body, html"); depth += 1) {
          const reachedTable = level
            .prevAll()
            .toArray()
            .some((sibling) => {
              const block = $(sibling);
              if (block.is("table") || block.find("table").length > 0) {
                return true;
              }
              gap.push(cellText(block.text()));
              return false;
            });
          if (reachedTable) {
            break;
          }
          level = level.parent();
        }

        return {
          index,
          rows,
          text: cellText(own.text()),
          context: cellText(context),
          gap,
        };
      });
  }

  /**
   * Grows a band of consecutive header-like rows until it maps a name column plus shares or percent.
   */
  private findHeader(
    table: ParsedTable,
  ): { mapping: ColumnMapping; rowIndex: number } | null {
    let band: TableCell[][] = [];

    for (let rowIndex = 0; rowIndex < table.rows.length; rowIndex += 1) {
      const row = table.rows[rowIndex];
      if (!row || nonEmptyCount(row) === 0) {
        continue;
      }

      if (!isHeaderLike(row)) {
        band = [];
        continue;
      }

      band = [...band, row].slice(-HEADER_BAND_DEPTH);
      const mapping = mapHeaderBand(band);
      if (mapping) {
        return this.extendHeader(table, band, { mapping, rowIndex });
      }
    }

    return null;
  }

  /**
   * Keeps absorbing sub-header rows such as "Number | Percent" under a spanning "Shares Beneficially Owned".
   */
  private extendHeader(
    table: ParsedTable,
    band: TableCell[][],
    found: { mapping: ColumnMapping; rowIndex: number },
  ): { mapping: ColumnMapping; rowIndex: number } {
    let current = found;
    let currentBand = band;

    for (let rowIndex = found.rowIndex + 1; rowIndex < table.rows.length; rowIndex += 1) {
      const row = table.rows[rowIndex];
      if (!row || nonEmptyCount(row) === 0) {
        continue;
      }

      const labelsRole = row.some((cell) => cell.text && roleOf(cell.text));
      if (!isHeaderLike(row) || !labelsRole || currentBand.length >= HEADER_BAND_DEPTH) {
        break;
      }

      currentBand = [...currentBand, row];
      const mapping = mapHeaderBand(currentBand);
      if (!mapping) {
        break;
      }

      current = { mapping, rowIndex };
    }

    return current;
  }
}
