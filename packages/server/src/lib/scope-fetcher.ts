// @scopegate/server - Token scope discovery
//
// One HEAD request against the REST API root; the platform answers with the
// token's OAuth scopes in a response header. Only classic tokens get a
// meaningful answer: fine-grained tokens come back with no header.

import {
  InvalidCredentialError,
  ScopeFetchNetworkError,
  UnexpectedUpstreamStatusError,
} from "@scopegate/core";
import {
  AUTHORIZATION_HEADER,
  GITHUB_API_VERSION,
  GITHUB_API_VERSION_HEADER,
  OAUTH_SCOPES_HEADER,
  parseCommaSeparated,
} from "./headers.js";

export const DEFAULT_SCOPE_FETCH_TIMEOUT_MS = 5000;

export interface ScopeFetcher {
  fetchTokenScopes(token: string, signal?: AbortSignal): Promise<string[]>;
}

export type FetchFn = typeof fetch;

export interface ScopeFetcherOptions {
  /** REST API base, e.g. https://api.github.com */
  apiUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

/**
 * Parse an X-OAuth-Scopes value. Missing or empty means no scopes.
 */
export function parseScopeHeader(header: string | null | undefined): string[] {
  return parseCommaSeparated(header);
}

export function createScopeFetcher(options: ScopeFetcherOptions): ScopeFetcher {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_SCOPE_FETCH_TIMEOUT_MS;
  const endpoint = options.apiUrl.endsWith("/") ? options.apiUrl : `${options.apiUrl}/`;

  return {
    async fetchTokenScopes(token, signal) {
      const timeout = AbortSignal.timeout(timeoutMs);
      const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

      let response: Response;
      try {
        response = await fetchImpl(endpoint, {
          method: "HEAD",
          headers: {
            [AUTHORIZATION_HEADER]: `Bearer ${token}`,
            Accept: "application/vnd.github+json",
            [GITHUB_API_VERSION_HEADER]: GITHUB_API_VERSION,
          },
          signal: combined,
        });
      } catch (err) {
        throw new ScopeFetchNetworkError(err);
      }

      if (response.status === 401) {
        throw new InvalidCredentialError();
      }
      if (!response.ok) {
        throw new UnexpectedUpstreamStatusError(response.status);
      }

      return parseScopeHeader(response.headers.get(OAUTH_SCOPES_HEADER));
    },
  };
}
