/**
 * Liveness and metrics endpoints. None of these pass through the
 * authorization pipeline.
 *
 * GET /_ping   - plain "pong"
 * GET /health  - JSON status, access cache stats when lockdown is available
 * GET /metrics - Prometheus text format
 */

import { Hono } from "hono";
import type { AccessLockdownCache } from "@scopegate/core";
import { registry } from "../lib/metrics.js";
import { PING_PATH } from "../middleware/request-parse.js";

export function createProbeRoutes(options: { accessCache?: AccessLockdownCache } = {}): Hono {
  const probes = new Hono();

  probes.get(PING_PATH, (c) => c.text("pong"));

  probes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      ...(options.accessCache && {
        accessCache: { size: options.accessCache.size, ...options.accessCache.getStats() },
      }),
    });
  });

  probes.get("/metrics", async (c) => {
    const body = await registry.metrics();
    return c.text(body, 200, { "Content-Type": registry.contentType });
  });

  return probes;
}
