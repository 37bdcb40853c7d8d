/**
 * Credential classification
 *
 * Turns a raw Authorization header into a typed credential. The token
 * family is recognised by its literal prefix; tokens minted before prefixes
 * existed are 40 lowercase hex characters and count as classic tokens.
 */

import {
  MalformedCredentialError,
  MissingCredentialError,
  UnsupportedSchemeError,
} from "./errors.js";

export const CredentialTypes = {
  CLASSIC_PAT: "classic_pat",
  FINE_GRAINED_PAT: "fine_grained_pat",
  OAUTH: "oauth",
  USER_TO_SERVER: "user_to_server",
  SERVER_TO_SERVER: "server_to_server",
  UNKNOWN: "unknown",
} as const;

export type CredentialType = (typeof CredentialTypes)[keyof typeof CredentialTypes];

/**
 * The classified bearer value for one request.
 *
 * `scopes` is filled in place by scope hydration; `scopesFetched` tells later
 * stages not to ask the platform again.
 */
export interface Credential {
  token: string;
  type: CredentialType;
  scopesFetched: boolean;
  scopes: string[];
}

/** Prefix table, checked in order; first match wins. */
export const TOKEN_PREFIXES: ReadonlyArray<readonly [prefix: string, type: CredentialType]> = [
  ["ghp_", CredentialTypes.CLASSIC_PAT],
  ["github_pat_", CredentialTypes.FINE_GRAINED_PAT],
  ["gho_", CredentialTypes.OAUTH],
  ["ghu_", CredentialTypes.USER_TO_SERVER],
  ["ghs_", CredentialTypes.SERVER_TO_SERVER],
];

/** Scheme we recognise but refuse. */
export const UNSUPPORTED_SCHEME = "GitHub-Bearer ";

const BEARER_PREFIX = "bearer ";
const LEGACY_TOKEN_PATTERN = /^[a-f0-9]{40}$/;

/**
 * Classify a bare token (no scheme). Returns `null` when the token matches
 * neither a known prefix nor the legacy pattern.
 */
export function classifyToken(token: string): CredentialType | null {
  for (const [prefix, type] of TOKEN_PREFIXES) {
    if (token.startsWith(prefix)) return type;
  }
  if (LEGACY_TOKEN_PATTERN.test(token)) return CredentialTypes.CLASSIC_PAT;
  return null;
}

/**
 * Parse an Authorization header value into a credential.
 *
 * Accepts `"Bearer <token>"` (scheme matched case-insensitively) or a bare
 * token.
 *
 * @throws MissingCredentialError when the header is absent or empty
 * @throws UnsupportedSchemeError for the `GitHub-Bearer` scheme
 * @throws MalformedCredentialError when the token is not recognised
 */
export function classifyAuthorizationHeader(header: string | null | undefined): Credential {
  if (!header) {
    throw new MissingCredentialError();
  }

  if (header.startsWith(UNSUPPORTED_SCHEME)) {
    throw new UnsupportedSchemeError(UNSUPPORTED_SCHEME.trim());
  }

  const token =
    header.length > BEARER_PREFIX.length &&
    header.slice(0, BEARER_PREFIX.length).toLowerCase() === BEARER_PREFIX
      ? header.slice(BEARER_PREFIX.length)
      : header;

  const type = classifyToken(token);
  if (type === null) {
    throw new MalformedCredentialError();
  }

  return { token, type, scopesFetched: false, scopes: [] };
}

/**
 * Whether the platform reports this credential's scopes through the
 * scope header. Only classic tokens do; fine-grained and app tokens carry
 * permissions the header does not describe.
 */
export function supportsScopeDiscovery(type: CredentialType): boolean {
  return type === CredentialTypes.CLASSIC_PAT;
}

/**
 * Whether a client holding this credential can come back with an upgraded
 * one on demand (an OAuth app re-running authorization with more scopes).
 */
export function supportsScopeChallenge(type: CredentialType): boolean {
  return type === CredentialTypes.OAUTH;
}
