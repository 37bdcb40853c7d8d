// @scopegate/server - Scope challenge stage
//
// OAuth clients can come back with a better token, so a tools/call whose
// tool needs scopes the token lacks is answered with an insufficient_scope
// challenge naming exactly what to ask for.

import {
  createBaseEvent,
  EventNames,
  hasAcceptedScope,
  missingScopes,
  supportsScopeChallenge,
  type OperationScopeIndex,
} from "@scopegate/core";
import { WWW_AUTHENTICATE_HEADER } from "../lib/headers.js";
import { resourceMetadataURLForRequest, type DiscoveryConfig } from "../lib/oauth.js";
import type { PipelineStage } from "../lib/pipeline.js";
import { parseMcpRequestBody, peekBody, PING_PATH } from "./request-parse.js";
import { hydrateCredentialScopes, type ScopeFetchDeps } from "./scope-hydration.js";

export interface ScopeChallengeOptions extends ScopeFetchDeps {
  index: OperationScopeIndex;
  discovery: Pick<DiscoveryConfig, "baseUrl" | "resourcePath">;
}

export function buildInsufficientScopeChallenge(
  currentScopes: readonly string[],
  requiredScopes: readonly string[],
  resourceMetadataUrl: string,
): string {
  const recommended = [...currentScopes, ...requiredScopes].join(" ");
  const description = `Additional scopes required: ${requiredScopes.join(", ")}`;
  return `Bearer error="insufficient_scope", scope="${recommended}", resource_metadata="${resourceMetadataUrl}", error_description="${description}"`;
}

export function scopeChallengeStage(options: ScopeChallengeOptions): PipelineStage {
  return {
    name: "scope-challenge",
    async handle(c, next) {
      const credential = c.get("credential");
      if (c.req.path === PING_PATH || !credential || !supportsScopeChallenge(credential.type)) {
        return next();
      }

      let parsed = c.get("parsedRequest");
      if (!parsed && c.req.method === "POST") {
        try {
          parsed = parseMcpRequestBody(await peekBody(c.req.raw));
        } catch (err) {
          c.get("logger").debug({ err }, "request body unreadable; skipping scope check");
        }
      }
      if (!parsed || parsed.method !== "tools/call") {
        return next();
      }

      const info = options.index.lookup(parsed.itemName);
      if (!info) {
        return next();
      }

      // A failed fetch counts as holding no scopes.
      const scopes = credential.scopesFetched
        ? credential.scopes
        : (await hydrateCredentialScopes(c, credential, options, "challenge")) ?? [];

      if (hasAcceptedScope(info, scopes)) {
        return next();
      }

      const required = missingScopes(info, scopes);
      const metadataUrl = resourceMetadataURLForRequest(c.req.raw, options.discovery);

      options.emitter?.emitSync({
        ...createBaseEvent(EventNames.SCOPE_CHALLENGED),
        payload: { tool: parsed.itemName, missingScopes: required, currentScopes: [...scopes] },
      });
      c.get("logger").info({ tool: parsed.itemName, missingScopes: required }, "insufficient scope");

      return c.text("Forbidden: insufficient scopes", 403, {
        [WWW_AUTHENTICATE_HEADER]: buildInsufficientScopeChallenge(scopes, required, metadataUrl),
      });
    },
  };
}
