import { describe, it, expect, beforeEach } from "vitest";
import { resetMetrics, scopeChallengesTotal } from "../../lib/metrics.js";
import { buildTestApp } from "../helpers/app.js";

describe("Prometheus Metrics - GET /metrics", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("should return Prometheus text format", async () => {
    const { app } = buildTestApp();
    const res = await app.request("/metrics");
    expect(res.status).toBe(200);
    const contentType = res.headers.get("content-type") || "";
    expect(contentType).toContain("text/plain");
    const body = await res.text();
    expect(body).toContain("http_requests_total");
    expect(body).toContain("http_request_duration_seconds");
  });

  it("should expose authorization metrics", async () => {
    const { app } = buildTestApp();
    const res = await app.request("/metrics");
    const body = await res.text();
    // Registered even before the first increment
    expect(body).toContain("scopegate_credential_rejections_total");
    expect(body).toContain("scopegate_scope_fetch_total");
    expect(body).toContain("scopegate_scope_challenges_total");
    expect(body).toContain("scopegate_access_cache_lookups_total");
  });

  it("should include counter values", async () => {
    scopeChallengesTotal.inc({ tool: "create_issue" });

    const { app } = buildTestApp();
    const res = await app.request("/metrics");
    const body = await res.text();
    expect(body).toContain('scopegate_scope_challenges_total{tool="create_issue"} 1');
  });

  it("should record HTTP requests by route", async () => {
    const { app } = buildTestApp();
    await app.request("/_ping");
    await app.request("/mcp", { method: "POST", body: "{}" });

    const res = await app.request("/metrics");
    const body = await res.text();
    expect(body).toContain('http_requests_total{method="GET",route="/_ping",status="200"} 1');
    expect(body).toContain('http_requests_total{method="POST",route="mcp",status="401"} 1');
  });

  it("should not require auth", async () => {
    const { app } = buildTestApp();
    const res = await app.request("/metrics");
    expect(res.status).toBe(200);
  });
});
