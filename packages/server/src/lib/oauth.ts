/**
 * OAuth 2.0 protected resource metadata (RFC 9728).
 *
 * Clients that receive a 401 or an insufficient_scope challenge follow the
 * `resource_metadata` URL to learn which authorization server to use and
 * which scopes exist. Everything here is derived from the request as the
 * client saw it, which may differ from what reaches us behind a proxy.
 */

import { SUPPORTED_SCOPES } from "@scopegate/core";
import { FORWARDED_HOST_HEADER, FORWARDED_PROTO_HEADER } from "./headers.js";

export const OAUTH_PROTECTED_RESOURCE_PREFIX = "/.well-known/oauth-protected-resource";
export const DEFAULT_RESOURCE_BASE_PATH = "/mcp";
export const RESOURCE_NAME = "GitHub MCP Server";

/** Suffixes under the prefix, one per MCP endpoint variant. */
export const METADATA_ROUTE_PATTERNS = [
  "",
  "/readonly",
  "/insiders",
  "/x/:toolset",
  "/x/:toolset/readonly",
] as const;

export interface DiscoveryConfig {
  baseUrl?: string | undefined;
  resourcePath?: string | undefined;
  authorizationServer: string;
}

export interface ProtectedResourceMetadata {
  resource: string;
  authorization_servers: string[];
  scopes_supported: string[];
  bearer_methods_supported: string[];
  resource_name: string;
}

/**
 * "" and "/" mean no base path; otherwise a leading slash and no trailing one.
 */
export function normalizeBasePath(path: string | undefined): string {
  const trimmed = (path ?? "").trim();
  if (trimmed === "" || trimmed === "/") return "";
  const withLeading = trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
  return withLeading.endsWith("/") ? withLeading.slice(0, -1) : withLeading;
}

/**
 * The path the client used, with the configured base path put back when a
 * proxy stripped it before forwarding.
 */
export function resolveResourcePath(path: string, basePath: string | undefined): string {
  const resolved = path === "" ? "/" : path;
  const base = normalizeBasePath(basePath);
  if (base === "") return resolved;
  if (resolved === "/") return base;
  if (resolved === base || resolved.startsWith(`${base}/`)) return resolved;
  return base + resolved;
}

/**
 * Host and scheme as the client saw them: forwarded headers first, then the
 * request itself.
 */
export function getEffectiveHostAndScheme(request: Request): { host: string; scheme: string } {
  const url = new URL(request.url);

  const host =
    request.headers.get(FORWARDED_HOST_HEADER) ||
    request.headers.get("host") ||
    url.host ||
    "localhost";

  const forwardedProto = request.headers.get(FORWARDED_PROTO_HEADER);
  const scheme = forwardedProto
    ? forwardedProto.toLowerCase()
    : url.protocol === "https:"
      ? "https"
      : "http";

  return { host, scheme };
}

function origin(request: Request, config: Pick<DiscoveryConfig, "baseUrl">): string {
  if (config.baseUrl) {
    return config.baseUrl.endsWith("/") ? config.baseUrl.slice(0, -1) : config.baseUrl;
  }
  const { host, scheme } = getEffectiveHostAndScheme(request);
  return `${scheme}://${host}`;
}

/**
 * URL of the metadata document describing `resourcePath`.
 */
export function buildResourceMetadataURL(
  request: Request,
  config: Pick<DiscoveryConfig, "baseUrl">,
  resourcePath: string,
): string {
  let suffix = "";
  if (resourcePath !== "" && resourcePath !== "/") {
    suffix = resourcePath.startsWith("/") ? resourcePath : `/${resourcePath}`;
  }
  return origin(request, config) + OAUTH_PROTECTED_RESOURCE_PREFIX + suffix;
}

export function buildResourceURL(
  request: Request,
  config: Pick<DiscoveryConfig, "baseUrl">,
  resourcePath: string,
): string {
  let path = resourcePath === "" ? "/" : resourcePath;
  if (!path.startsWith("/")) path = `/${path}`;
  return origin(request, config) + path;
}

/**
 * Metadata document for a request to one of the discovery routes.
 */
export function buildProtectedResourceMetadata(
  request: Request,
  config: DiscoveryConfig,
): ProtectedResourceMetadata {
  const requestPath = new URL(request.url).pathname;
  const suffix = requestPath.startsWith(OAUTH_PROTECTED_RESOURCE_PREFIX)
    ? requestPath.slice(OAUTH_PROTECTED_RESOURCE_PREFIX.length)
    : requestPath;
  const resourcePath = resolveResourcePath(suffix, config.resourcePath);

  return {
    resource: buildResourceURL(request, config, resourcePath),
    authorization_servers: [config.authorizationServer],
    scopes_supported: [...SUPPORTED_SCOPES],
    bearer_methods_supported: ["header"],
    resource_name: RESOURCE_NAME,
  };
}

/**
 * Every discovery route: each pattern under the root and under the base
 * path (or /mcp when none is configured), with and without a trailing slash.
 */
export function metadataRoutePaths(resourcePath: string | undefined): string[] {
  const basePaths = ["", normalizeBasePath(resourcePath) || DEFAULT_RESOURCE_BASE_PATH];
  const routes: string[] = [];
  for (const pattern of METADATA_ROUTE_PATTERNS) {
    for (const basePath of basePaths) {
      const route = OAUTH_PROTECTED_RESOURCE_PREFIX + basePath + pattern;
      routes.push(route, `${route}/`);
    }
  }
  return routes;
}

/**
 * Discovery URL for the resource a request was addressed to.
 */
export function resourceMetadataURLForRequest(
  request: Request,
  config: Pick<DiscoveryConfig, "baseUrl" | "resourcePath">,
): string {
  const resourcePath = resolveResourcePath(new URL(request.url).pathname, config.resourcePath);
  return buildResourceMetadataURL(request, config, resourcePath);
}
