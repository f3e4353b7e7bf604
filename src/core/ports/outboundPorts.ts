import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { OutputRow } from "../entities/run";

export type OutputWriteContext = {
  runId: string;
  runDate: string;
};

export type OutputWriteReceipt = {
  location: string;
  rowCount: number;
};

export interface OutputSinkPort {
  write(
    rows: OutputRow[],
    context: OutputWriteContext,
  ): Promise<Result<OutputWriteReceipt, AppBoundaryError>>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
