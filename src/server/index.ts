import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { Logger } from "@/lib/logger";
import type { SessionHealth, SessionMetrics } from "@/worker/session";

import { createHealthRoute } from "./routes/health";
import { createMetricsRoute } from "./routes/metrics";

export interface ServerDeps {
  port: number;
  logger: Logger;
  metrics: SessionMetrics;
  getHealth: () => SessionHealth;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: Omit<ServerDeps, "port">): Hono => {
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.debug("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    deps.metrics.recordHttpRequest(duration);
  });

  app.get("/", (c) => c.json({ message: "Hedge execution engine" }));
  app.route("/health", createHealthRoute(deps.getHealth));
  app.route("/metrics", createMetricsRoute(deps.metrics));

  return app;
};

export const startHttpServer = (deps: ServerDeps): HttpServer => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};
