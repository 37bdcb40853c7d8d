import { describe, it, expect } from "vitest";
import {
  OperationScopeIndex,
  filterToolsByScopes,
  hasAcceptedScope,
  missingScopes,
  type ToolDescriptor,
} from "../operation-scopes.js";

const catalogue: ToolDescriptor[] = [
  { name: "get_me" },
  { name: "create_issue", requiredScopes: ["repo"] },
  { name: "list_org_teams", requiredScopes: ["read:org"] },
  { name: "list_notifications", requiredScopes: ["notifications"] },
];

describe("OperationScopeIndex", () => {
  const index = OperationScopeIndex.fromCatalogue(catalogue);

  it("should skip tools without required scopes", () => {
    expect(index.lookup("get_me")).toBeUndefined();
    expect(index.size).toBe(3);
  });

  it("should keep required scopes narrow and accepted scopes expanded", () => {
    const info = index.lookup("list_org_teams");
    expect(info?.requiredScopes).toEqual(["read:org"]);
    expect(info?.acceptedScopes).toEqual(new Set(["read:org", "write:org", "admin:org"]));
  });

  it("should freeze entries", () => {
    const info = index.lookup("create_issue");
    expect(Object.isFrozen(info)).toBe(true);
    expect(Object.isFrozen(info?.requiredScopes)).toBe(true);
  });

  it("should build an empty index", () => {
    expect(OperationScopeIndex.empty().size).toBe(0);
  });
});

describe("hasAcceptedScope / missingScopes", () => {
  const index = OperationScopeIndex.fromCatalogue(catalogue);

  it("should accept a parent scope for a child requirement", () => {
    const info = index.lookup("list_org_teams");
    expect(hasAcceptedScope(info, ["admin:org"])).toBe(true);
    expect(missingScopes(info, ["admin:org"])).toEqual([]);
  });

  it("should name only the required scopes when short", () => {
    const info = index.lookup("list_org_teams");
    expect(hasAcceptedScope(info, ["repo"])).toBe(false);
    expect(missingScopes(info, ["repo"])).toEqual(["read:org"]);
  });

  it("should reject an empty scope list for a restricted tool", () => {
    const info = index.lookup("create_issue");
    expect(hasAcceptedScope(info, [])).toBe(false);
    expect(missingScopes(info, [])).toEqual(["repo"]);
  });

  it("should treat unknown tools as unrestricted", () => {
    expect(hasAcceptedScope(undefined, [])).toBe(true);
    expect(missingScopes(undefined, [])).toEqual([]);
  });

  it("should return a copy of the required scopes", () => {
    const info = index.lookup("create_issue");
    const missing = missingScopes(info, []);
    missing.push("gist");
    expect(info?.requiredScopes).toEqual(["repo"]);
  });
});

describe("filterToolsByScopes", () => {
  const index = OperationScopeIndex.fromCatalogue(catalogue);

  it("should hide tools the token cannot use", () => {
    const visible = filterToolsByScopes(catalogue, index, ["write:org"]);
    expect(visible.map((t) => t.name)).toEqual(["get_me", "list_org_teams"]);
  });

  it("should keep everything for a token holding every scope", () => {
    const visible = filterToolsByScopes(catalogue, index, ["repo", "read:org", "notifications"]);
    expect(visible).toHaveLength(4);
  });
});
