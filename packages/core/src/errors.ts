/**
 * Error taxonomy for ScopeGate
 *
 * Every error carries a stable `code` so callers can branch on the failure
 * without matching on messages. The credential-layer errors terminate a
 * request; scope-fetch errors are absorbed by the pipeline; access-query
 * errors are surfaced to whichever policy asked.
 */

export type ScopeGateErrorCode =
  | "missing_credential"
  | "malformed_credential"
  | "unsupported_scheme"
  | "invalid_credential"
  | "unexpected_upstream_status"
  | "network_error"
  | "access_query_failed"
  | "log_read_failed";

/**
 * Base class for all ScopeGate errors
 */
export class ScopeGateError<C extends ScopeGateErrorCode = ScopeGateErrorCode> extends Error {
  readonly code: C;

  constructor(code: C, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ============================================================================
// Credential layer
// ============================================================================

export class MissingCredentialError extends ScopeGateError<"missing_credential"> {
  constructor() {
    super("missing_credential", "missing required Authorization header");
  }
}

export class MalformedCredentialError extends ScopeGateError<"malformed_credential"> {
  constructor() {
    super("malformed_credential", "Authorization header is badly formatted");
  }
}

export class UnsupportedSchemeError extends ScopeGateError<"unsupported_scheme"> {
  constructor(readonly scheme: string) {
    super("unsupported_scheme", `unsupported Authorization header scheme: ${scheme}`);
  }
}

// ============================================================================
// Scope fetch layer
// ============================================================================

export class InvalidCredentialError extends ScopeGateError<"invalid_credential"> {
  constructor() {
    super("invalid_credential", "invalid or expired token");
  }
}

export class UnexpectedUpstreamStatusError extends ScopeGateError<"unexpected_upstream_status"> {
  constructor(readonly status: number) {
    super("unexpected_upstream_status", `unexpected status code: ${status}`);
  }
}

export class ScopeFetchNetworkError extends ScopeGateError<"network_error"> {
  constructor(cause: unknown) {
    super("network_error", `failed to fetch scopes: ${describeCause(cause)}`, { cause });
  }
}

// ============================================================================
// Access cache / log buffer
// ============================================================================

export class AccessQueryError extends ScopeGateError<"access_query_failed"> {
  constructor(message: string, cause?: unknown) {
    super("access_query_failed", `failed to query repository access info: ${message}`, { cause });
  }
}

export class LogReadError extends ScopeGateError<"log_read_failed"> {
  constructor(cause: unknown) {
    super("log_read_failed", `failed to read log content: ${describeCause(cause)}`, { cause });
  }
}

/**
 * True for the three errors that reject a credential outright.
 */
export function isCredentialError(
  err: unknown,
): err is MissingCredentialError | MalformedCredentialError | UnsupportedSchemeError {
  return (
    err instanceof MissingCredentialError ||
    err instanceof MalformedCredentialError ||
    err instanceof UnsupportedSchemeError
  );
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
