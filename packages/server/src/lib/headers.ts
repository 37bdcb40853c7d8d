// @scopegate/server - Header names and value parsing

export const AUTHORIZATION_HEADER = "Authorization";
export const WWW_AUTHENTICATE_HEADER = "WWW-Authenticate";
export const FORWARDED_HOST_HEADER = "X-Forwarded-Host";
export const FORWARDED_PROTO_HEADER = "X-Forwarded-Proto";
export const REQUEST_ID_HEADER = "X-Request-Id";

export const GITHUB_API_VERSION_HEADER = "X-GitHub-Api-Version";
export const GITHUB_API_VERSION = "2022-11-28";
export const OAUTH_SCOPES_HEADER = "X-OAuth-Scopes";

// Side-channel directives
export const MCP_READONLY_HEADER = "X-MCP-Readonly";
export const MCP_TOOLSETS_HEADER = "X-MCP-Toolsets";
export const MCP_TOOLS_HEADER = "X-MCP-Tools";
export const MCP_LOCKDOWN_HEADER = "X-MCP-Lockdown";
export const MCP_INSIDERS_HEADER = "X-MCP-Insiders";
export const MCP_FEATURES_HEADER = "X-MCP-Features";

/** Added by the proxy dispatcher when the credential's scopes are known */
export const MCP_TOKEN_SCOPES_HEADER = "X-MCP-Token-Scopes";

/**
 * Split on commas, trim, drop empty entries.
 */
export function parseCommaSeparated(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

const FALSE_VALUES = new Set(["", "false", "0", "no", "off", "n", "f"]);

/**
 * Lenient boolean: the usual "off" spellings (and absence) are false,
 * anything else is true. Case-insensitive, whitespace-trimmed.
 */
export function relaxedParseBool(value: string | null | undefined): boolean {
  return !FALSE_VALUES.has((value ?? "").trim().toLowerCase());
}
