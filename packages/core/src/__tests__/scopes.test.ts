import { describe, it, expect } from "vitest";
import {
  SCOPE_HIERARCHY,
  SUPPORTED_SCOPES,
  Scopes,
  expandScopes,
  hasAnyScope,
  type ScopeHierarchy,
} from "../scopes.js";

describe("expandScopes", () => {
  it("should add the parent of a child scope", () => {
    expect(expandScopes([Scopes.PUBLIC_REPO])).toEqual(new Set(["public_repo", "repo"]));
  });

  it("should walk grandparents", () => {
    expect(expandScopes([Scopes.READ_ORG])).toEqual(
      new Set(["read:org", "write:org", "admin:org"]),
    );
  });

  it("should leave top-level scopes alone", () => {
    expect(expandScopes([Scopes.REPO])).toEqual(new Set(["repo"]));
    expect(expandScopes([Scopes.GIST])).toEqual(new Set(["gist"]));
  });

  it("should return an empty set for no requirement", () => {
    expect(expandScopes([]).size).toBe(0);
  });

  it("should union across several required scopes", () => {
    expect(expandScopes([Scopes.READ_PACKAGES, Scopes.READ_USER])).toEqual(
      new Set(["read:packages", "write:packages", "read:user", "user"]),
    );
  });

  it("should be idempotent", () => {
    for (const required of [[], ["read:org"], ["public_repo", "read:user"], ["gist"], [...SUPPORTED_SCOPES]]) {
      const once = expandScopes(required);
      expect(expandScopes([...once])).toEqual(once);
    }
  });

  it("should add the parent for every pair in the hierarchy", () => {
    for (const [parent, children] of SCOPE_HIERARCHY) {
      for (const child of children) {
        expect(expandScopes([child]).has(parent)).toBe(true);
      }
    }
  });

  it("should accept a custom hierarchy", () => {
    const hierarchy: ScopeHierarchy = new Map([["admin:x", new Set(["read:x"])]]);
    expect(expandScopes(["read:x"], hierarchy)).toEqual(new Set(["read:x", "admin:x"]));
    expect(expandScopes(["admin:x"], hierarchy)).toEqual(new Set(["admin:x"]));
  });
});

describe("hasAnyScope", () => {
  it("should pass when nothing is accepted", () => {
    expect(hasAnyScope([], new Set())).toBe(true);
  });

  it("should pass on any overlap", () => {
    expect(hasAnyScope(["gist", "repo"], expandScopes(["public_repo"]))).toBe(true);
  });

  it("should fail without overlap", () => {
    expect(hasAnyScope(["read:org"], expandScopes(["repo"]))).toBe(false);
  });
});

describe("SCOPE_HIERARCHY", () => {
  it("should be acyclic", () => {
    const visiting = new Set<string>();
    const walk = (scope: string): void => {
      expect(visiting.has(scope)).toBe(false);
      visiting.add(scope);
      for (const child of SCOPE_HIERARCHY.get(scope) ?? []) walk(child);
      visiting.delete(scope);
    };
    for (const parent of SCOPE_HIERARCHY.keys()) walk(parent);
  });

  it("should advertise repo and workflow", () => {
    expect(SUPPORTED_SCOPES).toContain("repo");
    expect(SUPPORTED_SCOPES).toContain("workflow");
    expect(SUPPORTED_SCOPES).toHaveLength(12);
  });
});
