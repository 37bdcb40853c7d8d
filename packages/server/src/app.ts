// @scopegate/server - Application factory
//
// Builds the Hono app from explicit dependencies so tests can supply fakes.
// index.ts wires the real ones and starts listening.

import { Hono, type Handler } from "hono";
import { cors } from "hono/cors";
import {
  OperationScopeIndex,
  SCOPE_HIERARCHY,
  type AccessLockdownCache,
  type ScopeGateEmitter,
  type ScopeHierarchy,
  type ToolDescriptor,
} from "@scopegate/core";
import type { Config } from "./config.js";
import { getLogger } from "./lib/logger.js";
import { composePipeline, type PipelineStage } from "./lib/pipeline.js";
import { createProxyDispatcher } from "./lib/dispatcher.js";
import type { FetchFn, ScopeFetcher } from "./lib/scope-fetcher.js";
import { credentialStage } from "./middleware/credential.js";
import { requestConfigStage } from "./middleware/request-config.js";
import { requestContext } from "./middleware/request-context.js";
import { requestParseStage } from "./middleware/request-parse.js";
import { scopeChallengeStage } from "./middleware/scope-challenge.js";
import { scopeHydrationStage } from "./middleware/scope-hydration.js";
import { createOAuthMetadataRoutes } from "./routes/oauth-metadata.js";
import { createProbeRoutes } from "./routes/probes.js";
import type { GatewayEnv } from "./types.js";

export type { GatewayEnv, GatewayVariables, ParsedRequest, RequestConfig } from "./types.js";

export type AppConfig = Pick<
  Config,
  | "isProduction"
  | "baseUrl"
  | "resourcePath"
  | "authorizationServer"
  | "scopeChallenge"
  | "upstreamMcpUrl"
  | "corsAllowedOrigins"
>;

export interface AppDeps {
  config: AppConfig;
  tools: readonly ToolDescriptor[];
  scopeFetcher: ScopeFetcher;
  hierarchy?: ScopeHierarchy;
  emitter?: ScopeGateEmitter;
  accessCache?: AccessLockdownCache;
  /** Handles requests that pass the pipeline; defaults to the upstream proxy */
  dispatcher?: Handler<GatewayEnv>;
  /** Used by the default proxy dispatcher */
  fetchImpl?: FetchFn;
}

/**
 * Stages in the order they run.
 */
export function buildPipelineStages(deps: AppDeps, index: OperationScopeIndex): PipelineStage[] {
  const { config, scopeFetcher, emitter } = deps;
  const discovery = { baseUrl: config.baseUrl, resourcePath: config.resourcePath };

  const stages: PipelineStage[] = [
    credentialStage({ discovery, emitter }),
    requestConfigStage({ basePath: config.resourcePath }),
    requestParseStage(),
    scopeHydrationStage({ fetcher: scopeFetcher, emitter }),
  ];
  if (config.scopeChallenge) {
    stages.push(scopeChallengeStage({ fetcher: scopeFetcher, emitter, index, discovery }));
  }
  return stages;
}

export function createApp(deps: AppDeps): Hono<GatewayEnv> {
  const { config } = deps;
  const index = OperationScopeIndex.fromCatalogue(deps.tools, deps.hierarchy ?? SCOPE_HIERARCHY);
  const app = new Hono<GatewayEnv>();

  app.use("*", requestContext({ accessCache: deps.accessCache }));

  if (config.corsAllowedOrigins) {
    app.use(
      "*",
      cors({
        origin: config.corsAllowedOrigins,
        allowHeaders: ["Authorization", "Content-Type", "Mcp-Session-Id", "X-MCP-Readonly", "X-MCP-Toolsets", "X-MCP-Tools", "X-MCP-Lockdown", "X-MCP-Insiders", "X-MCP-Features"],
        exposeHeaders: ["WWW-Authenticate", "Mcp-Session-Id"],
      }),
    );
  }

  // Public routes (no credential required)
  app.route("/", createProbeRoutes({ accessCache: deps.accessCache }));
  app.route(
    "/",
    createOAuthMetadataRoutes({
      baseUrl: config.baseUrl,
      resourcePath: config.resourcePath,
      authorizationServer: config.authorizationServer,
    }),
  );

  // Everything else is an MCP request
  app.use("*", composePipeline(buildPipelineStages(deps, index)));
  app.all(
    "*",
    deps.dispatcher ??
      createProxyDispatcher({ upstreamUrl: config.upstreamMcpUrl, index, fetchImpl: deps.fetchImpl }),
  );

  // Global error handler
  app.onError((err, c) => {
    getLogger().error({ err, path: c.req.path }, "unhandled error");

    return c.json(
      {
        error: "Internal Server Error",
        ...(!config.isProduction && { message: err.message }),
      },
      500,
    );
  });

  return app;
}
