// @scopegate/server - Request-scoped context shared by the pipeline stages

import type { AccessLockdownCache, Credential } from "@scopegate/core";
import type { Logger } from "./lib/logger.js";

/**
 * Side-channel directives for one request, from X-MCP-* headers and the
 * URL (/readonly, /insiders, /x/{toolset}).
 */
export interface RequestConfig {
  readOnly: boolean;
  toolsets: string[];
  tools: string[];
  lockdown: boolean;
  insiders: boolean;
  features: string[];
}

/**
 * What the JSON-RPC body asks for. `itemName` is the tool or prompt name,
 * or the resource URI; empty for other methods.
 */
export interface ParsedRequest {
  method: string;
  itemName: string;
  arguments?: Record<string, unknown>;
  owner?: string;
  repo?: string;
}

export type GatewayVariables = {
  requestId: string;
  logger: Logger;
  credential: Credential | undefined;
  requestConfig: RequestConfig;
  parsedRequest: ParsedRequest | undefined;
  /** Present when lockdown checks can run */
  accessCache: AccessLockdownCache | undefined;
};

export type GatewayEnv = { Variables: GatewayVariables };
