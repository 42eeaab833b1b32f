/**
 * Cross-venue hedge execution engine
 *
 * Entry point: validates the environment, serves health and metrics, and
 * runs one hedge session. Exits 0 when the session stops on its own terms
 * or on a signal, and 1 on a fatal error.
 */

import { buildConfig } from "./lib/config";
import { getEnv } from "./lib/env";
import { createLogger, toError } from "./lib/logger";
import { startHttpServer } from "./server";
import { startWorker } from "./worker";

const main = async (): Promise<number> => {
  // 1. Validate environment configuration (exits 1 on invalid input)
  const config = buildConfig(getEnv());
  const logger = createLogger(config.logging);

  logger.info("Hedge engine starting...", {
    nodeEnv: config.server.nodeEnv,
    symbol: config.hedge.symbol,
    direction: config.hedge.direction,
  });

  // 2. Start the session
  const worker = startWorker({ config, logger });

  // 3. Start HTTP server (health checks, metrics)
  const httpServer = startHttpServer({
    port: config.server.port,
    logger,
    metrics: worker.session.metrics,
    getHealth: () => worker.session.health(),
  });

  // 4. Graceful shutdown: cancel the session, let in-flight fills settle
  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, initiating graceful shutdown`);
    worker.session.cancel();
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  let exitCode = 0;
  try {
    const summary = await worker.done;
    logger.info("Hedge session finished", { stopReason: summary.stopReason });
  } catch (error) {
    logger.error("Hedge session stopped on a fatal error", toError(error));
    exitCode = 1;
  }

  await httpServer.close();
  return exitCode;
};

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((error: unknown) => {
    console.error("Unhandled error:", error);
    process.exit(1);
  });
