/**
 * Service entry point.
 *
 * Loads configuration and serves until SIGINT/SIGTERM. Any configuration
 * problem is fatal.
 *
 * @module src/main
 */

import { ConfigurationError } from "./auth/errors.ts";
import { loadConfig } from "./config.ts";
import { createLogger } from "./logger.ts";
import { type RunningService, startService } from "./service.ts";

async function main(): Promise<void> {
  let logger = createLogger();
  let service: RunningService;
  try {
    const config = await loadConfig();
    logger = createLogger(config.logLevel);
    service = await startService(config, logger);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.fatal("Couldn't initialize server", { error: err, cause: err.cause });
      process.exit(1);
    }
    throw err;
  }

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down", { signal });
    service.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Error during shutdown", { error: err });
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("[jwt-subrequest-auth] Fatal:", err);
  process.exit(1);
});
