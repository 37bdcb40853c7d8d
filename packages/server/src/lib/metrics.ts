/**
 * Prometheus metrics for ScopeGate.
 *
 * Authorization metrics:
 *   scopegate_credential_rejections_total (counter, by reason)
 *   scopegate_scope_fetch_total           (counter, by stage+outcome)
 *   scopegate_scope_challenges_total      (counter, by tool)
 *   scopegate_access_cache_lookups_total  (counter, by result)
 *
 * HTTP RED metrics:
 *   http_requests_total           (counter, by method+route+status)
 *   http_request_duration_seconds (histogram, by method+route+status)
 */

import { Registry, Counter, Histogram, collectDefaultMetrics } from "prom-client";
import { EventNames, type ScopeGateEmitter } from "@scopegate/core";

// Singleton registry
export const registry = new Registry();

// Collect Node.js default metrics (GC, event loop, etc.)
collectDefaultMetrics({ register: registry });

// ── Authorization metrics ──────────────────────────────────────

export const credentialRejectionsTotal = new Counter({
  name: "scopegate_credential_rejections_total",
  help: "Requests rejected by the credential stage, by reason",
  labelNames: ["reason"] as const,
  registers: [registry],
});

export const scopeFetchTotal = new Counter({
  name: "scopegate_scope_fetch_total",
  help: "Upstream scope lookups by pipeline stage and outcome",
  labelNames: ["stage", "outcome"] as const,
  registers: [registry],
});

export const scopeChallengesTotal = new Counter({
  name: "scopegate_scope_challenges_total",
  help: "insufficient_scope challenges issued, by tool",
  labelNames: ["tool"] as const,
  registers: [registry],
});

export const accessCacheLookupsTotal = new Counter({
  name: "scopegate_access_cache_lookups_total",
  help: "Repository access cache lookups by result",
  labelNames: ["result"] as const,
  registers: [registry],
});

// ── HTTP RED metrics ───────────────────────────────────────────

export const httpRequestsTotal = new Counter({
  name: "http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["method", "route", "status"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route", "status"] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

/**
 * Feed the counters from pipeline and cache events.
 * Returns a function that removes every subscription.
 */
export function bindMetrics(emitter: ScopeGateEmitter): () => void {
  const unsubscribers = [
    emitter.on(EventNames.CREDENTIAL_REJECTED, (event) => {
      credentialRejectionsTotal.inc({ reason: event.payload.reason });
    }),
    emitter.on(EventNames.SCOPES_HYDRATED, (event) => {
      scopeFetchTotal.inc({ stage: event.payload.stage, outcome: "success" });
    }),
    emitter.on(EventNames.SCOPES_FETCH_FAILED, (event) => {
      scopeFetchTotal.inc({ stage: event.payload.stage, outcome: event.payload.errorCode });
    }),
    emitter.on(EventNames.SCOPE_CHALLENGED, (event) => {
      scopeChallengesTotal.inc({ tool: event.payload.tool });
    }),
    emitter.on(EventNames.ACCESS_CACHE_HIT, () => {
      accessCacheLookupsTotal.inc({ result: "hit" });
    }),
    emitter.on(EventNames.ACCESS_CACHE_MISS, () => {
      accessCacheLookupsTotal.inc({ result: "miss" });
    }),
    emitter.on(EventNames.ACCESS_QUERY_FAILED, () => {
      accessCacheLookupsTotal.inc({ result: "error" });
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}

/**
 * Reset all metrics (for testing).
 */
export function resetMetrics(): void {
  registry.resetMetrics();
}
