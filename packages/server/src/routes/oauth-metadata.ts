/**
 * Protected resource metadata endpoints.
 *
 * GET     /.well-known/oauth-protected-resource[...] - metadata document
 * OPTIONS /.well-known/oauth-protected-resource[...] - CORS preflight (204)
 *
 * Registered for every MCP endpoint variant, under the root and under the
 * base path, so the document is found whether or not a proxy stripped it.
 */

import { Hono, type Context } from "hono";
import {
  buildProtectedResourceMetadata,
  metadataRoutePaths,
  type DiscoveryConfig,
} from "../lib/oauth.js";

const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, OPTIONS",
  "Access-Control-Allow-Headers": "Authorization, Content-Type",
  "Access-Control-Max-Age": "86400",
};

export function createOAuthMetadataRoutes(config: DiscoveryConfig): Hono {
  const router = new Hono();

  const serveMetadata = (c: Context) =>
    c.json(buildProtectedResourceMetadata(c.req.raw, config), 200, CORS_HEADERS);
  const preflight = (c: Context) => c.body(null, 204, CORS_HEADERS);
  const notAllowed = (c: Context) =>
    c.text("Method Not Allowed", 405, { ...CORS_HEADERS, Allow: "GET, OPTIONS" });

  for (const path of metadataRoutePaths(config.resourcePath)) {
    router.get(path, serveMetadata);
    router.options(path, preflight);
    router.all(path, notAllowed);
  }

  return router;
}
