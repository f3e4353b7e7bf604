import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { OutputRow } from "../../core/entities/run";
import type {
  OutputSinkPort,
  OutputWriteContext,
  OutputWriteReceipt,
} from "../../core/ports/outboundPorts";
import { OUTPUT_COLUMNS, toCells } from "../../application/services/outputRows";

const FILE_PREFIX = "s1_investors";

/**
 * RFC 4180 quoting: fields with a comma, quote or line break are wrapped and inner quotes doubled.
 */
export const escapeCsvField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export const toCsv = (rows: OutputRow[]): string => {
  const lines = [
    OUTPUT_COLUMNS.map((column) => column.header),
    ...rows.map(toCells),
  ].map((cells) => cells.map(escapeCsvField).join(","));

  return `${lines.join("\r\n")}\r\n`;
};

export const toJsonDocument = (
  rows: OutputRow[],
  context: OutputWriteContext,
): string =>
  `${JSON.stringify(
    {
      runId: context.runId,
      runDate: context.runDate,
      rows: rows.map((row) =>
        Object.fromEntries(
          OUTPUT_COLUMNS.map(({ key, header }) => [header, row[key]]),
        ),
      ),
    },
    null,
    2,
  )}\n`;

const writeFailure = (
  provider: string,
  location: string,
  error: unknown,
): AppBoundaryError => ({
  source: "output",
  code: "write_failed",
  provider,
  message: `Could not write ${location}: ${error instanceof Error ? error.message : String(error)}`,
  retryable: false,
  cause: error,
});

/**
 * Writes one file per run into a directory, named after the run date.
 */
abstract class FileOutputSink implements OutputSinkPort {
  protected abstract readonly provider: string;
  protected abstract readonly extension: string;

  constructor(private readonly directory: string) {}

  protected abstract render(rows: OutputRow[], context: OutputWriteContext): string;

  async write(
    rows: OutputRow[],
    context: OutputWriteContext,
  ): Promise<Result<OutputWriteReceipt, AppBoundaryError>> {
    const directory = resolve(this.directory);
    const location = join(directory, `${FILE_PREFIX}_${context.runDate}.${this.extension}`);

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(location, this.render(rows, context), "utf8");
    } catch (error) {
      return err(writeFailure(this.provider, location, error));
    }

    return ok({ location, rowCount: rows.length });
  }
}

export class CsvFileOutputSink extends FileOutputSink {
  protected readonly provider = "csv-file";
  protected readonly extension = "csv";

  protected render(rows: OutputRow[]): string {
    return toCsv(rows);
  }
}

export class JsonFileOutputSink extends FileOutputSink {
  protected readonly provider = "json-file";
  protected readonly extension = "json";

  protected render(rows: OutputRow[], context: OutputWriteContext): string {
    return toJsonDocument(rows, context);
  }
}
