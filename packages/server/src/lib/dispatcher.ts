// @scopegate/server - Upstream proxy dispatcher
//
// Requests that pass the pipeline are forwarded to the MCP gateway as they
// came in. Two JSON responses are rewritten on the way back: tools/list for
// classic tokens (tools the token cannot use are hidden) and tools/call
// results under lockdown.

import type { Context, Handler } from "hono";
import { z } from "zod";
import {
  filterToolsByScopes,
  supportsScopeDiscovery,
  type OperationScopeIndex,
} from "@scopegate/core";
import { MCP_TOKEN_SCOPES_HEADER, REQUEST_ID_HEADER } from "./headers.js";
import { applyLockdown, lockdownTarget } from "./lockdown.js";
import type { FetchFn } from "./scope-fetcher.js";
import type { GatewayEnv } from "../types.js";

export interface ProxyDispatcherOptions {
  upstreamUrl: string;
  index: OperationScopeIndex;
  fetchImpl?: FetchFn;
}

// Hop-by-hop and body-framing headers that must not be copied verbatim.
const DROPPED_REQUEST_HEADERS = ["host", "connection", "content-length", "keep-alive", "transfer-encoding"];
const DROPPED_RESPONSE_HEADERS = ["connection", "content-length", "content-encoding", "keep-alive", "transfer-encoding"];

const toolsListSchema = z
  .object({
    result: z
      .object({
        tools: z.array(z.object({ name: z.string() }).passthrough()),
      })
      .passthrough(),
  })
  .passthrough();

const toolCallSchema = z
  .object({
    result: z
      .object({
        structuredContent: z.array(z.unknown()),
      })
      .passthrough(),
  })
  .passthrough();

function upstreamTarget(base: string, c: Context<GatewayEnv>): string {
  const trimmed = base.endsWith("/") ? base.slice(0, -1) : base;
  return trimmed + c.req.path + new URL(c.req.url).search;
}

function isJsonResponse(response: Response): boolean {
  return (response.headers.get("content-type") ?? "").includes("application/json");
}

function copyHeaders(source: Headers, dropped: readonly string[]): Headers {
  const headers = new Headers(source);
  for (const name of dropped) headers.delete(name);
  return headers;
}

type JsonRewrite = (body: unknown) => Promise<unknown | undefined>;

/**
 * Pick the rewrite for this response, if any. A rewrite returning undefined
 * leaves the body as it was.
 */
function selectRewrite(c: Context<GatewayEnv>, index: OperationScopeIndex): JsonRewrite | undefined {
  const parsed = c.get("parsedRequest");
  const credential = c.get("credential");
  if (!parsed) return undefined;

  if (
    parsed.method === "tools/list" &&
    credential?.scopesFetched &&
    supportsScopeDiscovery(credential.type)
  ) {
    const scopes = credential.scopes;
    return async (body) => {
      const list = toolsListSchema.safeParse(body);
      if (!list.success) return undefined;
      const tools = filterToolsByScopes(list.data.result.tools, index, scopes);
      return { ...list.data, result: { ...list.data.result, tools } };
    };
  }

  if (parsed.method === "tools/call" && lockdownTarget(c)) {
    return async (body) => {
      const call = toolCallSchema.safeParse(body);
      if (!call.success) return undefined;
      const items = await applyLockdown(c, call.data.result.structuredContent);
      return {
        ...call.data,
        result: {
          ...call.data.result,
          structuredContent: items,
          content: [{ type: "text", text: JSON.stringify(items) }],
        },
      };
    };
  }

  return undefined;
}

export function createProxyDispatcher(options: ProxyDispatcherOptions): Handler<GatewayEnv> {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (c) => {
    const log = c.get("logger");
    const credential = c.get("credential");

    const headers = copyHeaders(c.req.raw.headers, DROPPED_REQUEST_HEADERS);
    headers.set(REQUEST_ID_HEADER, c.get("requestId"));
    if (credential?.scopesFetched) {
      headers.set(MCP_TOKEN_SCOPES_HEADER, credential.scopes.join(","));
    }

    const method = c.req.method;
    const body = method === "GET" || method === "HEAD" ? undefined : await c.req.raw.arrayBuffer();

    let upstream: Response;
    try {
      upstream = await fetchImpl(upstreamTarget(options.upstreamUrl, c), {
        method,
        headers,
        body,
        signal: c.req.raw.signal,
      });
    } catch (err) {
      log.error({ err }, "upstream request failed");
      return c.json({ error: "Bad Gateway" }, 502);
    }

    const responseHeaders = copyHeaders(upstream.headers, DROPPED_RESPONSE_HEADERS);
    const rewrite = isJsonResponse(upstream) ? selectRewrite(c, options.index) : undefined;

    if (rewrite) {
      const text = await upstream.text();
      let document: unknown;
      try {
        document = JSON.parse(text);
      } catch (err) {
        log.warn({ err }, "upstream sent invalid JSON; passing through");
        return new Response(text, { status: upstream.status, headers: responseHeaders });
      }
      const rewritten = await rewrite(document);
      return new Response(rewritten === undefined ? text : JSON.stringify(rewritten), {
        status: upstream.status,
        headers: responseHeaders,
      });
    }

    return new Response(upstream.body, { status: upstream.status, headers: responseHeaders });
  };
}
