// @scopegate/server - Scope hydration stage
//
// Classic tokens report their scopes upstream; fetch them once per request
// and keep them on the credential. Failures never block the request.

import type { Context } from "hono";
import {
  createBaseEvent,
  EventNames,
  ScopeGateError,
  supportsScopeDiscovery,
  type Credential,
  type ScopeFetchStage,
  type ScopeGateEmitter,
} from "@scopegate/core";
import type { ScopeFetcher } from "../lib/scope-fetcher.js";
import type { PipelineStage } from "../lib/pipeline.js";
import type { GatewayEnv } from "../types.js";

export interface ScopeFetchDeps {
  fetcher: ScopeFetcher;
  emitter?: ScopeGateEmitter;
}

/**
 * Fetch the credential's scopes and store them on it. Returns the scopes,
 * or undefined when the fetch failed (already logged and reported).
 */
export async function hydrateCredentialScopes(
  c: Context<GatewayEnv>,
  credential: Credential,
  deps: ScopeFetchDeps,
  stage: ScopeFetchStage,
): Promise<string[] | undefined> {
  try {
    const scopes = await deps.fetcher.fetchTokenScopes(credential.token, c.req.raw.signal);
    credential.scopes = scopes;
    credential.scopesFetched = true;
    deps.emitter?.emitSync({
      ...createBaseEvent(EventNames.SCOPES_HYDRATED),
      payload: { credentialType: credential.type, scopeCount: scopes.length, stage },
    });
    return scopes;
  } catch (err) {
    c.get("logger").warn({ err, stage, credentialType: credential.type }, "failed to fetch token scopes");
    deps.emitter?.emitSync({
      ...createBaseEvent(EventNames.SCOPES_FETCH_FAILED),
      payload: {
        credentialType: credential.type,
        errorCode: err instanceof ScopeGateError ? err.code : "unknown",
        error: err instanceof Error ? err.message : String(err),
        stage,
      },
    });
    return undefined;
  }
}

export function scopeHydrationStage(deps: ScopeFetchDeps): PipelineStage {
  return {
    name: "scope-hydration",
    async handle(c, next) {
      const credential = c.get("credential");
      if (!credential) {
        c.get("logger").warn("no credential in context");
      } else if (supportsScopeDiscovery(credential.type) && !credential.scopesFetched) {
        await hydrateCredentialScopes(c, credential, deps, "hydration");
      }

      await next();
    },
  };
}
