import "dotenv/config";
import { startServer } from "./server";
import { logger } from "./utils/logger";
import { handleError } from "./utils/errors";

startServer().catch((err: unknown) => {
  const error = handleError(err);
  logger.error(`Fatal error starting server: ${error.message}`, { type: error.name });
  process.exit(1);
});
