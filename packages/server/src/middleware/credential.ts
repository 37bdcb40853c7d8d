// @scopegate/server - Credential stage
//
// Classifies the Authorization header. A missing header gets a 401 that
// points the client at the discovery document; a header we cannot use gets
// a plain 400.

import {
  classifyAuthorizationHeader,
  createBaseEvent,
  EventNames,
  isCredentialError,
  MissingCredentialError,
  type ScopeGateEmitter,
} from "@scopegate/core";
import { AUTHORIZATION_HEADER, WWW_AUTHENTICATE_HEADER } from "../lib/headers.js";
import { resourceMetadataURLForRequest, type DiscoveryConfig } from "../lib/oauth.js";
import type { PipelineStage } from "../lib/pipeline.js";

export interface CredentialStageOptions {
  discovery: Pick<DiscoveryConfig, "baseUrl" | "resourcePath">;
  emitter?: ScopeGateEmitter;
}

export function credentialStage(options: CredentialStageOptions): PipelineStage {
  return {
    name: "credential",
    async handle(c, next) {
      try {
        c.set("credential", classifyAuthorizationHeader(c.req.header(AUTHORIZATION_HEADER)));
      } catch (err) {
        if (!isCredentialError(err)) throw err;

        options.emitter?.emitSync({
          ...createBaseEvent(EventNames.CREDENTIAL_REJECTED),
          payload: { reason: err.code, path: c.req.path },
        });
        c.get("logger").debug({ reason: err.code }, "credential rejected");

        if (err instanceof MissingCredentialError) {
          const metadataUrl = resourceMetadataURLForRequest(c.req.raw, options.discovery);
          return c.text("Unauthorized", 401, {
            [WWW_AUTHENTICATE_HEADER]: `Bearer resource_metadata="${metadataUrl}"`,
          });
        }
        return c.text(err.message, 400);
      }

      await next();
    },
  };
}
