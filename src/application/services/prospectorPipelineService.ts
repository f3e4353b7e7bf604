import type { Logger } from "pino";
import type { FilingDocument } from "../../core/entities/filing";
import { MalformedDocumentError } from "../../core/entities/pipelineError";
import type { DocumentIssue, RunSummary } from "../../core/entities/run";
import type {
  ClassifiedRecord,
  EnrichedRecord,
  MatchedRecord,
} from "../../core/entities/stockholder";
import { logger as defaultLogger } from "../../shared/logger/logger";
import type { EnrichmentCache, EnrichmentService } from "./enrichmentService";
import type { EntityClassifierService } from "./entityClassifierService";
import type { MatchResolverService } from "./matchResolverService";
import type { RecordNormalizerService } from "./recordNormalizerService";
import type { ReferenceSnapshot } from "./referenceSnapshot";
import type {
  ExtractionSummary,
  TableExtractorService,
} from "./tableExtractorService";

export type PipelineResult = {
  records: EnrichedRecord[];
  summary: RunSummary;
  issues: DocumentIssue[];
};

export const emptyRunSummary = (): RunSummary => ({
  documentsAttempted: 0,
  documentsWithoutTable: 0,
  documentsFailed: 0,
  recordsExtracted: 0,
  recordsRejected: 0,
  recordsLowConfidence: 0,
  fieldCoercionFailures: 0,
  duplicatesDropped: 0,
  recordsMatched: 0,
  foundationsEnriched: 0,
  lookupsUnavailable: 0,
});

export const dedupeKey = (
  record: Pick<ClassifiedRecord, "normalizedName" | "filingCompany" | "filingDate">,
): string =>
  [record.normalizedName, record.filingCompany.trim().toLowerCase(), record.filingDate].join("|");

/**
 * Collects records and counters across every document of one run. First occurrence of a dedupe key wins.
 */
export class RunAccumulator {
  private readonly records: EnrichedRecord[] = [];
  private readonly seenKeys = new Set<string>();
  private readonly issues: DocumentIssue[] = [];
  private readonly summary: RunSummary = emptyRunSummary();
  readonly enrichmentCache: EnrichmentCache = new Map();

  count(field: keyof RunSummary, by = 1): void {
    this.summary[field] += by;
  }

  claim(record: ClassifiedRecord): boolean {
    const key = dedupeKey(record);
    if (this.seenKeys.has(key)) {
      return false;
    }

    this.seenKeys.add(key);
    return true;
  }

  append(record: EnrichedRecord): void {
    this.records.push(record);
  }

  recordIssue(issue: DocumentIssue): void {
    this.issues.push(issue);
  }

  result(): PipelineResult {
    return {
      records: [...this.records],
      summary: { ...this.summary },
      issues: [...this.issues],
    };
  }
}

type DocumentTally = {
  extraction: ExtractionSummary;
  records: ClassifiedRecord[];
  rowsExtracted: number;
  rejected: number;
  lowConfidence: number;
  coercionFailures: number;
};

/**
 * Sequences extraction, normalization, classification, matching and enrichment per document, isolating document failures.
 */
export class ProspectorPipelineService {
  constructor(
    private readonly extractor: TableExtractorService,
    private readonly normalizer: RecordNormalizerService,
    private readonly classifier: EntityClassifierService,
    private readonly matcher: MatchResolverService,
    private readonly enrichment: EnrichmentService,
    private readonly log: Logger = defaultLogger,
  ) {}

  async processBatch(
    documents: Iterable<FilingDocument> | AsyncIterable<FilingDocument>,
    snapshot: ReferenceSnapshot,
  ): Promise<PipelineResult> {
    const accumulator = new RunAccumulator();
    for await (const document of documents) {
      await this.processDocument(document, snapshot, accumulator);
    }

    return accumulator.result();
  }

  async processDocument(
    document: FilingDocument,
    snapshot: ReferenceSnapshot,
    accumulator: RunAccumulator,
  ): Promise<void> {
    accumulator.count("documentsAttempted");

    let tally: DocumentTally;
    try {
      tally = this.readDocument(document);
    } catch (error) {
      accumulator.count("documentsFailed");
      const issue: DocumentIssue =
        error instanceof MalformedDocumentError
          ? {
              documentId: document.documentId,
              kind: "malformed_document",
              message: error.message,
            }
          : {
              documentId: document.documentId,
              kind: "processing_failed",
              message: error instanceof Error ? error.message : String(error),
            };
      accumulator.recordIssue(issue);
      this.log.warn(
        { documentId: document.documentId, company: document.companyName, issue },
        "Document skipped",
      );
      return;
    }

    if (tally.extraction.status === "no_table") {
      accumulator.count("documentsWithoutTable");
      accumulator.recordIssue({
        documentId: document.documentId,
        kind: "no_table_found",
        message: `No stockholder table found in ${document.documentId}.`,
      });
      this.log.info(
        { documentId: document.documentId, company: document.companyName },
        "No stockholder table found",
      );
      return;
    }

    accumulator.count("recordsExtracted", tally.rowsExtracted);
    accumulator.count("recordsRejected", tally.rejected);
    accumulator.count("recordsLowConfidence", tally.lowConfidence);
    accumulator.count("fieldCoercionFailures", tally.coercionFailures);

    for (const record of tally.records) {
      if (!accumulator.claim(record)) {
        accumulator.count("duplicatesDropped");
        continue;
      }

      const matched: MatchedRecord = {
        ...record,
        match: this.matcher.resolve(record, snapshot),
      };
      if (matched.match.matched) {
        accumulator.count("recordsMatched");
      }

      const enriched = await this.enrichment.enrich(
        matched,
        accumulator.enrichmentCache,
      );
      if (enriched.contactLookup === "found") {
        accumulator.count("foundationsEnriched");
      } else if (enriched.contactLookup === "unavailable") {
        accumulator.count("lookupsUnavailable");
      }

      accumulator.append(enriched);
    }

    this.log.info(
      {
        documentId: document.documentId,
        company: document.companyName,
        rows: tally.rowsExtracted,
        records: tally.records.length,
      },
      "Document processed",
    );
  }

  /**
   * Runs the synchronous part of the pipeline for one document; nothing is committed to the run until it returns.
   */
  private readDocument(document: FilingDocument): DocumentTally {
    const records: ClassifiedRecord[] = [];
    let rowsExtracted = 0;
    let rejected = 0;
    let lowConfidence = 0;
    let coercionFailures = 0;

    const rows = this.extractor.extract(document);
    let step = rows.next();
    while (!step.done) {
      rowsExtracted += 1;
      const normalized = this.normalizer.normalize(step.value, document);

      if (normalized.isErr()) {
        rejected += 1;
        this.log.debug({ rejected: normalized.error }, "Row rejected");
      } else {
        const { record, coercionFailures: failures } = normalized.value;
        coercionFailures += failures.length;
        if (failures.length > 0) {
          this.log.debug(
            { documentId: document.documentId, name: record.displayName, failures },
            "Field coercion failed; value set to null",
          );
        }

        if (record.lowConfidence) {
          lowConfidence += 1;
          this.log.info(
            { documentId: document.documentId, name: record.displayName },
            "Retaining low-confidence record without percent or share count",
          );
        }

        records.push({
          ...record,
          entityType: this.classifier.classify(record.displayName),
        });
      }

      step = rows.next();
    }

    return {
      extraction: step.value,
      records,
      rowsExtracted,
      rejected,
      lowConfidence,
      coercionFailures,
    };
  }
}
