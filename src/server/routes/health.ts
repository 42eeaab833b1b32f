import { Hono } from "hono";

import type { SessionHealth } from "@/worker/session";

export type HealthStatus = "healthy" | "unhealthy";

/**
 * Healthy while the session runs and both venue feeds are live.
 */
export const evaluateHealth = (health: SessionHealth): HealthStatus =>
  health.state === "running" && health.feeds.every((feed) => feed.available)
    ? "healthy"
    : "unhealthy";

export const createHealthRoute = (getHealth: () => SessionHealth): Hono => {
  const health = new Hono();

  health.get("/", (c) => {
    const snapshot = getHealth();
    const status = evaluateHealth(snapshot);

    return c.json(
      {
        status,
        timestamp: new Date().toISOString(),
        session: {
          state: snapshot.state,
          ledgerPhase: snapshot.ledgerPhase,
          tradesCompleted: snapshot.tradesCompleted,
        },
        feeds: snapshot.feeds.map((feed) => ({
          venue: feed.venue,
          market: feed.market,
          available: feed.available,
          lastUpdateAt:
            feed.lastUpdateAt === null ? null : new Date(feed.lastUpdateAt).toISOString(),
          reconnects: feed.reconnects,
          lastError: feed.lastError,
        })),
      },
      status === "healthy" ? 200 : 503,
    );
  });

  return health;
};
