import { Command, InvalidArgumentError, Option } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { RunReport } from "../application/services/prospectorRunService";
import { ReferenceSnapshot } from "../application/services/referenceSnapshot";
import { normalizeEntityName, toDisplayName } from "../application/utils/nameText";
import { RunAbortedError } from "../core/entities/pipelineError";
import {
  env,
  filingForms,
  filingsProvider,
  referenceProvider,
  rosterProvider,
  type OutputFormat,
} from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const parseIntegerOption =
  (label: string, min: number, max = Number.MAX_SAFE_INTEGER) =>
  (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`${label} must be an integer between ${min} and ${max}.`);
    }

    return parsed;
  };

/**
 * Formats a finished run into a compact terminal report for manual inspection.
 */
export const formatRunReport = (report: RunReport): string => {
  const { summary } = report;
  const lines: string[] = [];

  lines.push(`Run ${report.runId}`);
  lines.push(`Started: ${report.startedAt.toISOString()}`);
  lines.push(
    `Documents: attempted=${summary.documentsAttempted}, without-table=${summary.documentsWithoutTable}, failed=${summary.documentsFailed}`,
  );
  lines.push(
    `Records: extracted=${summary.recordsExtracted}, rejected=${summary.recordsRejected}, low-confidence=${summary.recordsLowConfidence}, coercion-failures=${summary.fieldCoercionFailures}, duplicates-dropped=${summary.duplicatesDropped}`,
  );
  lines.push(`Matched in CRM: ${summary.recordsMatched} of ${report.rows.length}`);
  lines.push(
    `Foundations: enriched=${summary.foundationsEnriched}, lookups-unavailable=${summary.lookupsUnavailable}`,
  );

  if (report.output.status === "written") {
    lines.push(
      `Output: ${report.output.receipt.location} (${report.output.receipt.rowCount} rows)`,
    );
  } else if (report.output.status === "skipped") {
    lines.push("Output: skipped (dry run)");
  } else {
    lines.push(`Output: failed (${report.output.error.message})`);
  }

  lines.push("");
  lines.push("Document issues:");
  if (report.issues.length === 0) {
    lines.push("- none");
  } else {
    report.issues.forEach((issue) => {
      lines.push(`- ${issue.kind}: ${issue.documentId} (${issue.message})`);
    });
  }

  return lines.join("\n");
};

/**
 * Defines a single command surface so every run path uses the same composition root.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("s1-prospector").description("S-1 stockholder prospecting pipeline");

  cli
    .command("run")
    .description("Extract, classify, match and enrich stockholders from recent S-1 filings")
    .option(
      "--days <days>",
      "Filing lookback window in days",
      parseIntegerOption("--days", 1),
    )
    .option(
      "--limit <limit>",
      "Maximum number of filings to process",
      parseIntegerOption("--limit", 1),
    )
    .option(
      "--threshold <score>",
      "Minimum match confidence (0-100)",
      parseIntegerOption("--threshold", 0, 100),
    )
    .addOption(
      new Option("--format <format>", "Output file format").choices(["csv", "json"]),
    )
    .option("--output-dir <dir>", "Directory for the output file")
    .option("--dry-run", "Run the pipeline without writing an output file")
    .action(
      async (opts: {
        days?: number;
        limit?: number;
        threshold?: number;
        format?: OutputFormat;
        outputDir?: string;
        dryRun?: boolean;
      }) => {
        const runtime = createRuntime({
          matchThreshold: opts.threshold,
          outputFormat: opts.format,
          outputDir: opts.outputDir,
        });

        const report = await runtime.runService.run({
          forms: filingForms(),
          lookbackDays: opts.days ?? env.FILINGS_LOOKBACK_DAYS,
          limit: opts.limit ?? env.FILINGS_LIMIT,
          dryRun: Boolean(opts.dryRun),
        });

        console.log(formatRunReport(report));
        if (report.output.status === "failed") {
          process.exitCode = 1;
        }
      },
    );

  cli
    .command("classify")
    .description("Show how a stockholder name is normalized and classified")
    .requiredOption("--name <name>", "Stockholder name as printed in a filing")
    .action((opts: { name: string }) => {
      const runtime = createRuntime();
      const displayName = toDisplayName(opts.name);
      console.log(
        JSON.stringify(
          {
            displayName,
            normalizedName: normalizeEntityName(displayName),
            entityType: runtime.classifier.classify(displayName),
          },
          null,
          2,
        ),
      );
    });

  cli
    .command("match")
    .description("Resolve a single name against the configured CRM list")
    .requiredOption("--name <name>", "Stockholder name as printed in a filing")
    .option(
      "--threshold <score>",
      "Minimum match confidence (0-100)",
      parseIntegerOption("--threshold", 0, 100),
    )
    .action(async (opts: { name: string; threshold?: number }) => {
      const runtime = createRuntime({ matchThreshold: opts.threshold });
      const entries = await runtime.referenceProvider.loadEntries();
      if (entries.isErr()) {
        throw new RunAbortedError("reference_unavailable", entries.error.message, {
          cause: entries.error,
        });
      }

      const snapshot = ReferenceSnapshot.fromEntries(entries.value, runtime.clock.now());
      const displayName = toDisplayName(opts.name);
      const query = {
        displayName,
        normalizedName: normalizeEntityName(displayName),
        entityType: runtime.classifier.classify(displayName),
      };

      console.log(
        JSON.stringify(
          { ...query, match: runtime.matcher.resolve(query, snapshot) },
          null,
          2,
        ),
      );
    });

  cli
    .command("status")
    .description("Report pipeline configuration")
    .action(() => {
      logger.info(
        {
          filingsProvider: filingsProvider(),
          forms: filingForms(),
          lookbackDays: env.FILINGS_LOOKBACK_DAYS,
          filingsLimit: env.FILINGS_LIMIT,
          referenceProvider: referenceProvider(),
          affinityList: env.AFFINITY_LIST_NAME,
          rosterProvider: rosterProvider(),
          matchThreshold: env.MATCH_THRESHOLD,
          enrichmentTimeoutMs: env.ENRICHMENT_TIMEOUT_MS,
          maxFoundationContacts: env.MAX_FOUNDATION_CONTACTS,
          classifierPolicy: env.CLASSIFIER_POLICY_PATH || "built-in",
          output: { format: env.OUTPUT_FORMAT, directory: env.OUTPUT_DIR },
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
