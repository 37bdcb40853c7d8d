/**
 * Event types for ScopeGate
 * These events are emitted when the pipeline or the access cache makes a
 * decision worth observing (metrics, audit logging).
 */

import type { CredentialType } from "./credentials.js";
import type { ScopeGateErrorCode } from "./errors.js";

// ============================================================================
// Event Names (Constants)
// ============================================================================

export const EventNames = {
  // Credential events
  CREDENTIAL_REJECTED: "credential.rejected",

  // Scope events
  SCOPES_HYDRATED: "scopes.hydrated",
  SCOPES_FETCH_FAILED: "scopes.fetch_failed",
  SCOPE_CHALLENGED: "scope.challenged",

  // Access cache events
  ACCESS_CACHE_HIT: "access.cache_hit",
  ACCESS_CACHE_MISS: "access.cache_miss",
  ACCESS_QUERY_FAILED: "access.query_failed",

  // System events
  SYSTEM_STARTUP: "system.startup",
  SYSTEM_SHUTDOWN: "system.shutdown",
} as const;

export type EventName = (typeof EventNames)[keyof typeof EventNames];

// ============================================================================
// Base Event Interface
// ============================================================================

export interface BaseEvent<T extends EventName = EventName> {
  /** Event type identifier */
  type: T;
  /** Unix timestamp (ms) when the event occurred */
  timestamp: number;
  /** Unique event ID */
  eventId: string;
  /** Source that generated the event */
  source: string;
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Credential Events
// ============================================================================

/**
 * Emitted when the credential stage terminates a request
 */
export interface CredentialRejectedEvent
  extends BaseEvent<typeof EventNames.CREDENTIAL_REJECTED> {
  payload: {
    reason: Extract<
      ScopeGateErrorCode,
      "missing_credential" | "malformed_credential" | "unsupported_scheme"
    >;
    path: string;
  };
}

// ============================================================================
// Scope Events
// ============================================================================

/** Which pipeline stage asked the platform for scopes */
export type ScopeFetchStage = "hydration" | "challenge";

export interface ScopesHydratedEvent
  extends BaseEvent<typeof EventNames.SCOPES_HYDRATED> {
  payload: {
    credentialType: CredentialType;
    scopeCount: number;
    stage: ScopeFetchStage;
  };
}

export interface ScopesFetchFailedEvent
  extends BaseEvent<typeof EventNames.SCOPES_FETCH_FAILED> {
  payload: {
    credentialType: CredentialType;
    errorCode: ScopeGateErrorCode | "unknown";
    error: string;
    stage: ScopeFetchStage;
  };
}

/**
 * Emitted when a tool call is answered with an insufficient_scope challenge
 */
export interface ScopeChallengedEvent
  extends BaseEvent<typeof EventNames.SCOPE_CHALLENGED> {
  payload: {
    tool: string;
    missingScopes: string[];
    currentScopes: string[];
  };
}

// ============================================================================
// Access Cache Events
// ============================================================================

export interface AccessCacheHitEvent
  extends BaseEvent<typeof EventNames.ACCESS_CACHE_HIT> {
  payload: {
    key: string;
    actor: string;
  };
}

export interface AccessCacheMissEvent
  extends BaseEvent<typeof EventNames.ACCESS_CACHE_MISS> {
  payload: {
    key: string;
    actor: string;
    /** true when the repository was cached but the actor was not */
    repoCached: boolean;
  };
}

export interface AccessQueryFailedEvent
  extends BaseEvent<typeof EventNames.ACCESS_QUERY_FAILED> {
  payload: {
    key: string;
    actor: string;
    error: string;
  };
}

// ============================================================================
// System Events
// ============================================================================

export interface SystemStartupEvent
  extends BaseEvent<typeof EventNames.SYSTEM_STARTUP> {
  payload: {
    port: number;
  };
}

export interface SystemShutdownEvent
  extends BaseEvent<typeof EventNames.SYSTEM_SHUTDOWN> {
  payload: {
    signal: string;
  };
}

// ============================================================================
// Union Type
// ============================================================================

export type ScopeGateEvent =
  | CredentialRejectedEvent
  | ScopesHydratedEvent
  | ScopesFetchFailedEvent
  | ScopeChallengedEvent
  | AccessCacheHitEvent
  | AccessCacheMissEvent
  | AccessQueryFailedEvent
  | SystemStartupEvent
  | SystemShutdownEvent;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a base event with common fields
 */
export function createBaseEvent<T extends EventName>(
  type: T,
  source: string = "scopegate"
): BaseEvent<T> {
  return {
    type,
    timestamp: Date.now(),
    eventId: `evt_${Date.now()}_${Math.random().toString(36).slice(2, 9)}`,
    source,
  };
}
