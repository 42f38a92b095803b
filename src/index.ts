import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

// Pipeline failures leave through exitWithFailure; only defects and bad configuration reach this handler.
runCli(process.argv).catch((error: unknown) => {
  const details =
    error instanceof Error
      ? { name: error.name, message: error.message, stack: error.stack }
      : { message: String(error) };

  logger.error({ error: details }, "Unexpected CLI error");
  process.stderr.write(`Unexpected error: ${details.message}\n`);
  process.exit(1);
});
