import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";

const toErrorDetails = (error: unknown) =>
  error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : { message: String(error) };

runCli(process.argv).catch((error: unknown) => {
  logger.error({ error: toErrorDetails(error) }, "Command failed");
  process.exitCode = 1;
});
