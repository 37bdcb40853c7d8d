// @scopegate/server - Per-request context
//
// Runs before everything else: assigns the correlation ID, attaches a child
// logger, and records the HTTP RED metrics once the response is known.

import type { MiddlewareHandler } from "hono";
import { nanoid } from "nanoid";
import type { AccessLockdownCache } from "@scopegate/core";
import { REQUEST_ID_HEADER } from "../lib/headers.js";
import { createRequestLogger } from "../lib/logger.js";
import { httpRequestDuration, httpRequestsTotal } from "../lib/metrics.js";
import { OAUTH_PROTECTED_RESOURCE_PREFIX } from "../lib/oauth.js";
import { emptyRequestConfig } from "./request-config.js";
import type { GatewayEnv } from "../types.js";

const FIXED_ROUTES = new Set(["/_ping", "/health", "/metrics"]);

/**
 * Low-cardinality route label for metrics.
 */
export function routeLabel(path: string): string {
  if (FIXED_ROUTES.has(path)) return path;
  if (path.startsWith(OAUTH_PROTECTED_RESOURCE_PREFIX)) return OAUTH_PROTECTED_RESOURCE_PREFIX;
  return "mcp";
}

export function requestContext(
  options: { accessCache?: AccessLockdownCache } = {},
): MiddlewareHandler<GatewayEnv> {
  return async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) || nanoid();
    const log = createRequestLogger(requestId);

    c.set("requestId", requestId);
    c.set("logger", log);
    c.set("credential", undefined);
    c.set("requestConfig", emptyRequestConfig());
    c.set("parsedRequest", undefined);
    c.set("accessCache", options.accessCache);
    c.header(REQUEST_ID_HEADER, requestId);

    const start = performance.now();
    await next();
    const seconds = (performance.now() - start) / 1000;

    const labels = {
      method: c.req.method,
      route: routeLabel(c.req.path),
      status: String(c.res.status),
    };
    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, seconds);
    log.info(
      { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Math.round(seconds * 1000) },
      "request completed",
    );
  };
}
