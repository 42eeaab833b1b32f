import { Hono } from "hono";

import { PROMETHEUS_CONTENT_TYPE, type SessionMetrics } from "@/worker/session";

export const createMetricsRoute = (metrics: SessionMetrics): Hono => {
  const route = new Hono();

  route.get("/", (c) =>
    c.text(metrics.render(), 200, {
      "Content-Type": PROMETHEUS_CONTENT_TYPE,
    }),
  );

  return route;
};
