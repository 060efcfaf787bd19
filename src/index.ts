import "dotenv/config";
import { runCli } from "./cli/main";
import { loadAppConfig } from "./shared/config/env";
import { createLogger, toErrorDetails } from "./shared/logger/logger";

const config = loadAppConfig();
const logger = createLogger(config);

runCli(process.argv, config, logger).catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});
