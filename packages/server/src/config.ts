// @scopegate/server - Environment configuration
//
// Parsed once from process.env with zod and cached. Tests call resetConfig()
// after changing the environment.

import { fileURLToPath } from "node:url";
import { z } from "zod";
import { relaxedParseBool } from "./lib/headers.js";

export const DEFAULT_AUTHORIZATION_SERVER = "https://github.com/login/oauth";
export const DEFAULT_TOOLS_FILE = fileURLToPath(new URL("../tools.json", import.meta.url));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),
  SCOPEGATE_BASE_URL: z.string().url().optional(),
  SCOPEGATE_RESOURCE_PATH: z.string().optional(),
  SCOPEGATE_AUTHORIZATION_SERVER: z.string().url().default(DEFAULT_AUTHORIZATION_SERVER),
  SCOPEGATE_SCOPE_CHALLENGE: z.string().optional().transform((v) => v === undefined || relaxedParseBool(v)),
  GITHUB_API_URL: z.string().url().default("https://api.github.com"),
  GITHUB_GRAPHQL_URL: z.string().url().default("https://api.github.com/graphql"),
  SCOPEGATE_ACCESS_TOKEN: z.string().optional(),
  SCOPE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  REPO_ACCESS_CACHE_TTL_MS: z.coerce.number().int().default(20 * 60 * 1000),
  UPSTREAM_MCP_URL: z.string().url().default("http://localhost:8082"),
  SCOPEGATE_TOOLS_FILE: z.string().default(DEFAULT_TOOLS_FILE),
  CORS_ALLOWED_ORIGINS: z.string().optional(),
});

export interface Config {
  port: number;
  nodeEnv: "development" | "production" | "test";
  isProduction: boolean;
  isDevelopment: boolean;
  logLevel: string;
  logFormat: "json" | "pretty";

  /** Public URL this service is reached at; overrides the request's host */
  baseUrl: string | undefined;
  /** Externally visible base path, restored when a proxy strips it */
  resourcePath: string | undefined;
  authorizationServer: string;
  scopeChallenge: boolean;

  githubApiUrl: string;
  githubGraphqlUrl: string;
  /** Service credential for lockdown access queries; lockdown is off without it */
  accessToken: string | undefined;
  scopeFetchTimeoutMs: number;
  repoAccessCacheTtlMs: number;

  upstreamMcpUrl: string;
  toolsFile: string;
  corsAllowedOrigins: string[] | undefined;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Build a Config from an environment map. Empty variables count as unset.
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const e = result.data;

  const origins = e.CORS_ALLOWED_ORIGINS
    ?.split(",")
    .map((o) => o.trim())
    .filter((o) => o.length > 0);

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    isProduction: e.NODE_ENV === "production",
    isDevelopment: e.NODE_ENV === "development",
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT,
    baseUrl: e.SCOPEGATE_BASE_URL,
    resourcePath: e.SCOPEGATE_RESOURCE_PATH,
    authorizationServer: e.SCOPEGATE_AUTHORIZATION_SERVER,
    scopeChallenge: e.SCOPEGATE_SCOPE_CHALLENGE,
    githubApiUrl: e.GITHUB_API_URL,
    githubGraphqlUrl: e.GITHUB_GRAPHQL_URL,
    accessToken: e.SCOPEGATE_ACCESS_TOKEN,
    scopeFetchTimeoutMs: e.SCOPE_FETCH_TIMEOUT_MS,
    repoAccessCacheTtlMs: e.REPO_ACCESS_CACHE_TTL_MS,
    upstreamMcpUrl: e.UPSTREAM_MCP_URL,
    toolsFile: e.SCOPEGATE_TOOLS_FILE,
    corsAllowedOrigins: origins && origins.length > 0 ? origins : undefined,
  };
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = parseConfig();
  }
  return _config;
}

/**
 * Drop the cached config (for testing)
 */
export function resetConfig(): void {
  _config = null;
}

/**
 * Non-fatal problems worth a warning when running in production.
 */
export function validateProductionConfig(config: Config): string[] {
  const warnings: string[] = [];

  if (!config.baseUrl) {
    warnings.push(
      "SCOPEGATE_BASE_URL is not set; discovery URLs will be built from request headers",
    );
  } else if (!config.baseUrl.startsWith("https://")) {
    warnings.push("SCOPEGATE_BASE_URL should use https in production");
  }

  if (!config.upstreamMcpUrl.startsWith("https://") && !isLoopback(config.upstreamMcpUrl)) {
    warnings.push("UPSTREAM_MCP_URL is plain http on a non-loopback host");
  }

  if (config.logFormat === "pretty") {
    warnings.push("LOG_FORMAT=pretty is meant for development");
  }

  if (!config.scopeChallenge) {
    warnings.push("SCOPEGATE_SCOPE_CHALLENGE is off; OAuth clients will not be asked for missing scopes");
  }

  return warnings;
}

function isLoopback(url: string): boolean {
  const { hostname } = new URL(url);
  return hostname === "localhost" || hostname === "127.0.0.1" || hostname === "[::1]";
}
