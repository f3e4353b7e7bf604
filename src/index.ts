import { runCli } from "./cli/main";
import { RunAbortedError } from "./core/entities/pipelineError";
import { logger } from "./shared/logger/logger";

const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

runCli(process.argv).catch((error) => {
  if (error instanceof RunAbortedError) {
    logger.error(
      { reason: error.reason, error: toErrorDetails(error) },
      "Run aborted; no output was written",
    );
    process.exit(2);
  }

  logger.error({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});
