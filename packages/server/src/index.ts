// @scopegate/server - Entry point
//
// Loads config and the tool catalogue, wires the real scope fetcher and
// access cache, and starts listening.

import { serve } from "@hono/node-server";
import {
  AccessLockdownCache,
  createBaseEvent,
  EventNames,
  getGlobalEmitter,
} from "@scopegate/core";
import { getConfig, validateProductionConfig } from "./config.js";
import { createApp } from "./app.js";
import { createRepoAccessQuery } from "./lib/access-query.js";
import { loadToolCatalogue } from "./lib/catalogue.js";
import { initLogger } from "./lib/logger.js";
import { bindMetrics } from "./lib/metrics.js";
import { createScopeFetcher } from "./lib/scope-fetcher.js";

async function main(): Promise<void> {
  const config = getConfig();
  const log = initLogger();

  if (config.isProduction) {
    for (const warning of validateProductionConfig(config)) {
      log.warn(warning);
    }
  }

  const tools = loadToolCatalogue(config.toolsFile);
  log.info({ tools: tools.length, file: config.toolsFile }, "tool catalogue loaded");

  const emitter = getGlobalEmitter();
  const unbindMetrics = bindMetrics(emitter);

  const accessCache = config.accessToken
    ? AccessLockdownCache.getInstance(
        createRepoAccessQuery({ graphqlUrl: config.githubGraphqlUrl, token: config.accessToken }),
        { ttlMs: config.repoAccessCacheTtlMs, emitter },
      )
    : undefined;
  if (!accessCache) {
    log.info("SCOPEGATE_ACCESS_TOKEN not set; lockdown filtering disabled");
  }

  const app = createApp({
    config,
    tools,
    emitter,
    accessCache,
    scopeFetcher: createScopeFetcher({
      apiUrl: config.githubApiUrl,
      timeoutMs: config.scopeFetchTimeoutMs,
    }),
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, "ScopeGate listening");
    emitter.emitSync({ ...createBaseEvent(EventNames.SYSTEM_STARTUP), payload: { port: info.port } });
  });

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    log.info({ signal }, "shutdown started");
    await emitter.emit({ ...createBaseEvent(EventNames.SYSTEM_SHUTDOWN), payload: { signal } });

    // Safety net: force exit if connections do not drain
    const forceExit = setTimeout(() => {
      log.error("forced shutdown after timeout");
      process.exit(1);
    }, 10_000);
    forceExit.unref();

    AccessLockdownCache.resetInstance();
    unbindMetrics();

    server.close((err) => {
      if (err) {
        log.error({ err }, "error closing HTTP server");
        process.exit(1);
      }
      log.info("shutdown complete");
      process.exit(0);
    });
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("Failed to start ScopeGate:", err);
  process.exit(1);
});
