/**
 * Worker orchestrator: builds both venues from the app config and runs
 * one hedge session over them.
 */

import { createVenuePair } from "@/adapters";
import type { SessionSummary } from "@/domains/reporting";
import type { AppConfig } from "@/lib/config";
import type { Logger } from "@/lib/logger";

import { type HedgeSession, createHedgeSession } from "./session";

export interface StartWorkerConfig {
  config: AppConfig;
  logger: Logger;
}

/**
 * Handle returned by startWorker for lifecycle management.
 */
export interface WorkerHandle {
  session: HedgeSession;
  /** Settles when the session stops; rejects on a fatal error */
  done: Promise<SessionSummary>;
}

export const startWorker = (startConfig: StartWorkerConfig): WorkerHandle => {
  const { config, logger } = startConfig;
  const { spot, perp } = createVenuePair(config.venues, config.hedge.symbol, logger);

  logger.info("Starting hedge session", {
    symbol: config.hedge.symbol,
    direction: config.hedge.direction,
    tradeSizeBase: config.hedge.tradeSizeBase,
    targetTrades: config.hedge.targetTrades,
    spot: spot.venue,
    perp: perp.venue,
    dryRun: config.venues.dryRun,
  });

  const session = createHedgeSession(config.hedge, { spot, perp, logger });
  return { session, done: session.run() };
};
