// @scopegate/server - Request config stage
//
// Collects the X-MCP-* directives and the URL directives into one
// RequestConfig. URL directives win over headers.

import type { Context } from "hono";
import {
  MCP_FEATURES_HEADER,
  MCP_INSIDERS_HEADER,
  MCP_LOCKDOWN_HEADER,
  MCP_READONLY_HEADER,
  MCP_TOOLSETS_HEADER,
  MCP_TOOLS_HEADER,
  parseCommaSeparated,
  relaxedParseBool,
} from "../lib/headers.js";
import { normalizeBasePath } from "../lib/oauth.js";
import type { PipelineStage } from "../lib/pipeline.js";
import type { GatewayEnv, RequestConfig } from "../types.js";

export interface UrlDirectives {
  readOnly: boolean;
  insiders: boolean;
  toolset: string | undefined;
}

// [/x/{toolset}][/readonly][/insiders][/]
const URL_DIRECTIVE_PATTERN = /^(?:\/x\/([^/]+))?(\/readonly)?(\/insiders)?\/?$/;

/**
 * Directives encoded in the endpoint path, after removing `basePath` when
 * the request still carries it.
 */
export function parseUrlDirectives(path: string, basePath?: string): UrlDirectives {
  const base = normalizeBasePath(basePath);
  let relative = path;
  if (base !== "" && (path === base || path.startsWith(`${base}/`))) {
    relative = path.slice(base.length);
  }

  const match = URL_DIRECTIVE_PATTERN.exec(relative);
  if (!match) {
    return { readOnly: false, insiders: false, toolset: undefined };
  }
  return {
    readOnly: match[2] !== undefined,
    insiders: match[3] !== undefined,
    toolset: match[1] === undefined ? undefined : decodeSegment(match[1]),
  };
}

// Malformed percent escapes are kept as sent.
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function emptyRequestConfig(): RequestConfig {
  return { readOnly: false, toolsets: [], tools: [], lockdown: false, insiders: false, features: [] };
}

export function readRequestConfig(c: Context<GatewayEnv>, basePath?: string): RequestConfig {
  const url = parseUrlDirectives(c.req.path, basePath);

  return {
    readOnly: url.readOnly || relaxedParseBool(c.req.header(MCP_READONLY_HEADER)),
    toolsets: url.toolset ? [url.toolset] : parseCommaSeparated(c.req.header(MCP_TOOLSETS_HEADER)),
    tools: parseCommaSeparated(c.req.header(MCP_TOOLS_HEADER)),
    lockdown: relaxedParseBool(c.req.header(MCP_LOCKDOWN_HEADER)),
    insiders: url.insiders || relaxedParseBool(c.req.header(MCP_INSIDERS_HEADER)),
    features: parseCommaSeparated(c.req.header(MCP_FEATURES_HEADER)),
  };
}

export function requestConfigStage(options: { basePath?: string | undefined } = {}): PipelineStage {
  return {
    name: "request-config",
    async handle(c, next) {
      c.set("requestConfig", readRequestConfig(c, options.basePath));
      await next();
    },
  };
}
