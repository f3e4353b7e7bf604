import type { Logger } from "pino";
import type { AppBoundaryError } from "../../core/entities/appError";
import { RunAbortedError } from "../../core/entities/pipelineError";
import type { DocumentIssue, OutputRow, RunSummary } from "../../core/entities/run";
import type {
  FilingsProviderPort,
  ReferenceListProviderPort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  IdGeneratorPort,
  OutputSinkPort,
  OutputWriteReceipt,
} from "../../core/ports/outboundPorts";
import { logger as defaultLogger } from "../../shared/logger/logger";
import { toOutputRow } from "./outputRows";
import type { ProspectorPipelineService } from "./prospectorPipelineService";
import { RunAccumulator } from "./prospectorPipelineService";
import { ReferenceSnapshot } from "./referenceSnapshot";

export type RunRequest = {
  forms: string[];
  lookbackDays: number;
  limit: number;
  dryRun?: boolean;
};

export type RunOutputStatus =
  | { status: "written"; receipt: OutputWriteReceipt }
  | { status: "skipped" }
  | { status: "failed"; error: AppBoundaryError };

export type RunReport = {
  runId: string;
  startedAt: Date;
  rows: OutputRow[];
  summary: RunSummary;
  issues: DocumentIssue[];
  output: RunOutputStatus;
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Owns one run end to end: reference snapshot, filing listing, per-document pipeline, output hand-off.
 */
export class ProspectorRunService {
  constructor(
    private readonly filingsProvider: FilingsProviderPort,
    private readonly referenceProvider: ReferenceListProviderPort,
    private readonly pipeline: ProspectorPipelineService,
    private readonly outputSink: OutputSinkPort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly log: Logger = defaultLogger,
  ) {}

  async run(request: RunRequest): Promise<RunReport> {
    const runId = this.ids.next();
    const startedAt = this.clock.now();
    const log = this.log.child({ runId });

    const snapshot = await this.loadSnapshot(startedAt);
    log.info({ references: snapshot.size }, "Reference snapshot loaded");

    const filingsResult = await this.filingsProvider.listFilings({
      forms: request.forms,
      from: new Date(startedAt.getTime() - request.lookbackDays * DAY_MS),
      to: startedAt,
      limit: request.limit,
    });
    if (filingsResult.isErr()) {
      throw new RunAbortedError(
        "filings_unavailable",
        `Filing listing failed via ${filingsResult.error.provider}: ${filingsResult.error.message}`,
        { cause: filingsResult.error },
      );
    }

    const filings = filingsResult.value;
    log.info({ filings: filings.length, forms: request.forms }, "Filings listed");

    const accumulator = new RunAccumulator();
    for (const filing of filings) {
      const documentResult = await this.filingsProvider.fetchDocument(filing);
      if (documentResult.isErr()) {
        accumulator.count("documentsAttempted");
        accumulator.count("documentsFailed");
        accumulator.recordIssue({
          documentId: filing.documentId,
          kind: "fetch_failed",
          message: documentResult.error.message,
        });
        log.warn(
          {
            documentId: filing.documentId,
            company: filing.companyName,
            code: documentResult.error.code,
            reason: documentResult.error.message,
          },
          "Filing document fetch failed",
        );
        continue;
      }

      await this.pipeline.processDocument(documentResult.value, snapshot, accumulator);
    }

    const { records, summary, issues } = accumulator.result();
    const rows = records.map(toOutputRow);
    const output = await this.writeOutput(rows, runId, startedAt, request.dryRun ?? false);

    log.info({ summary, output: output.status }, "Run complete");

    return { runId, startedAt, rows, summary, issues, output };
  }

  /**
   * A snapshot that cannot be loaded invalidates the whole batch, so it is the one failure that aborts the run.
   */
  private async loadSnapshot(loadedAt: Date): Promise<ReferenceSnapshot> {
    const entriesResult = await this.referenceProvider.loadEntries();
    if (entriesResult.isErr()) {
      throw new RunAbortedError(
        "reference_unavailable",
        `Reference list failed to load via ${entriesResult.error.provider}: ${entriesResult.error.message}`,
        { cause: entriesResult.error },
      );
    }

    return ReferenceSnapshot.fromEntries(entriesResult.value, loadedAt);
  }

  private async writeOutput(
    rows: OutputRow[],
    runId: string,
    startedAt: Date,
    dryRun: boolean,
  ): Promise<RunOutputStatus> {
    if (dryRun) {
      return { status: "skipped" };
    }

    const writeResult = await this.outputSink.write(rows, {
      runId,
      runDate: startedAt.toISOString().slice(0, 10),
    });
    if (writeResult.isErr()) {
      this.log.error(
        { runId, provider: writeResult.error.provider, reason: writeResult.error.message },
        "Output write failed",
      );
      return { status: "failed", error: writeResult.error };
    }

    return { status: "written", receipt: writeResult.value };
  }
}
