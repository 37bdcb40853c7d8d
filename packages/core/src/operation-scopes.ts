/**
 * Tool → scope requirements index
 *
 * Built once from the tool catalogue. Authorization checks run against the
 * broad accepted set; remediation messages always name the narrow required
 * set.
 */

import { expandScopes, hasAnyScope, type ScopeHierarchy, SCOPE_HIERARCHY } from "./scopes.js";

/**
 * The slice of a catalogue entry the index needs.
 */
export interface ToolDescriptor {
  name: string;
  requiredScopes?: readonly string[];
}

export interface OperationScopeInfo {
  readonly requiredScopes: readonly string[];
  readonly acceptedScopes: ReadonlySet<string>;
}

export class OperationScopeIndex {
  private readonly entries: ReadonlyMap<string, OperationScopeInfo>;

  private constructor(entries: Map<string, OperationScopeInfo>) {
    this.entries = entries;
  }

  /**
   * Build the index from every registered tool. Tools without required
   * scopes get no entry.
   */
  static fromCatalogue(
    tools: Iterable<ToolDescriptor>,
    hierarchy: ScopeHierarchy = SCOPE_HIERARCHY,
  ): OperationScopeIndex {
    const entries = new Map<string, OperationScopeInfo>();
    for (const tool of tools) {
      const required = tool.requiredScopes ?? [];
      if (required.length === 0) continue;
      entries.set(
        tool.name,
        Object.freeze({
          requiredScopes: Object.freeze([...required]),
          acceptedScopes: expandScopes(required, hierarchy),
        }),
      );
    }
    return new OperationScopeIndex(entries);
  }

  static empty(): OperationScopeIndex {
    return new OperationScopeIndex(new Map());
  }

  lookup(toolName: string): OperationScopeInfo | undefined {
    return this.entries.get(toolName);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * True when `info` is absent or has no requirement, or when the actor holds
 * any accepted scope.
 */
export function hasAcceptedScope(
  info: OperationScopeInfo | undefined,
  actorScopes: Iterable<string>,
): boolean {
  if (!info || info.requiredScopes.length === 0) return true;
  return hasAnyScope(actorScopes, info.acceptedScopes);
}

/**
 * The scopes to ask for when the actor is short. Empty when the actor is
 * already sufficient; otherwise a copy of the tool's required scopes.
 */
export function missingScopes(
  info: OperationScopeInfo | undefined,
  actorScopes: Iterable<string>,
): string[] {
  if (!info || hasAcceptedScope(info, actorScopes)) return [];
  return [...info.requiredScopes];
}

/**
 * Hide tools the token cannot use. Classic tokens cannot be challenged for
 * more scopes, so their tool list is trimmed instead.
 */
export function filterToolsByScopes<T extends { name: string }>(
  tools: readonly T[],
  index: OperationScopeIndex,
  tokenScopes: readonly string[],
): T[] {
  return tools.filter((tool) => hasAcceptedScope(index.lookup(tool.name), tokenScopes));
}
