/**
 * OAuth scope model
 *
 * Scope names used by the tools behind the gateway, the parent → child
 * implication table, and the expander that turns a tool's required scopes
 * into every scope that satisfies them.
 */

export const Scopes = {
  REPO: "repo",
  PUBLIC_REPO: "public_repo",
  READ_ORG: "read:org",
  WRITE_ORG: "write:org",
  ADMIN_ORG: "admin:org",
  GIST: "gist",
  NOTIFICATIONS: "notifications",
  READ_PROJECT: "read:project",
  PROJECT: "project",
  SECURITY_EVENTS: "security_events",
  USER: "user",
  READ_USER: "read:user",
  USER_EMAIL: "user:email",
  READ_PACKAGES: "read:packages",
  WRITE_PACKAGES: "write:packages",
  WORKFLOW: "workflow",
  CODESPACE: "codespace",
} as const;

export type KnownScope = (typeof Scopes)[keyof typeof Scopes];

/**
 * Holding a parent scope implies holding every one of its children.
 * The table must stay acyclic.
 */
export type ScopeHierarchy = ReadonlyMap<string, ReadonlySet<string>>;

export const SCOPE_HIERARCHY: ScopeHierarchy = new Map<string, ReadonlySet<string>>([
  [Scopes.REPO, new Set([Scopes.PUBLIC_REPO, Scopes.SECURITY_EVENTS])],
  [Scopes.ADMIN_ORG, new Set([Scopes.WRITE_ORG, Scopes.READ_ORG])],
  [Scopes.WRITE_ORG, new Set([Scopes.READ_ORG])],
  [Scopes.PROJECT, new Set([Scopes.READ_PROJECT])],
  [Scopes.WRITE_PACKAGES, new Set([Scopes.READ_PACKAGES])],
  [Scopes.USER, new Set([Scopes.READ_USER, Scopes.USER_EMAIL])],
]);

/**
 * Every scope a tool may ever require, advertised by the discovery endpoint.
 */
export const SUPPORTED_SCOPES: readonly string[] = [
  Scopes.REPO,
  Scopes.READ_ORG,
  Scopes.READ_USER,
  Scopes.USER_EMAIL,
  Scopes.READ_PACKAGES,
  Scopes.WRITE_PACKAGES,
  Scopes.READ_PROJECT,
  Scopes.PROJECT,
  Scopes.GIST,
  Scopes.NOTIFICATIONS,
  Scopes.WORKFLOW,
  Scopes.CODESPACE,
];

/**
 * Compute the accepted scopes for a list of required scopes: the required
 * scopes plus every ancestor that implies one of them.
 *
 * Iterates to a fixed point, so a grandparent (e.g. `admin:org` over
 * `write:org` over `read:org`) is found whatever the table's depth.
 * An empty input yields an empty set, meaning "no scope required".
 */
export function expandScopes(
  required: Iterable<string>,
  hierarchy: ScopeHierarchy = SCOPE_HIERARCHY,
): Set<string> {
  const accepted = new Set(required);
  if (accepted.size === 0) return accepted;

  let changed = true;
  while (changed) {
    changed = false;
    for (const [parent, children] of hierarchy) {
      if (accepted.has(parent)) continue;
      for (const child of children) {
        if (accepted.has(child)) {
          accepted.add(parent);
          changed = true;
          break;
        }
      }
    }
  }

  return accepted;
}

/**
 * True when `granted` contains at least one of `accepted`, or when nothing is
 * accepted (no requirement).
 */
export function hasAnyScope(granted: Iterable<string>, accepted: ReadonlySet<string>): boolean {
  if (accepted.size === 0) return true;
  for (const scope of granted) {
    if (accepted.has(scope)) return true;
  }
  return false;
}
