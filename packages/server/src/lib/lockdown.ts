// @scopegate/server - Lockdown filtering of tool results
//
// With the lockdown directive on, items in a public repository whose author
// cannot push to it are removed before the result reaches the client.

import type { Context } from "hono";
import { filterSafeItems } from "@scopegate/core";
import type { GatewayEnv } from "../types.js";

function loginOf(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("login" in value)) return undefined;
  return typeof value.login === "string" ? value.login : undefined;
}

/**
 * Author login of an issue, comment or review shaped item: `user.login`
 * or `author.login`.
 */
export function authorLogin(item: unknown): string | undefined {
  if (typeof item !== "object" || item === null) return undefined;
  if ("user" in item) {
    const login = loginOf(item.user);
    if (login) return login;
  }
  if ("author" in item) return loginOf(item.author);
  return undefined;
}

/**
 * Whether lockdown applies to this request: the directive is on, the call
 * names a repository, and an access cache is available.
 */
export function lockdownTarget(
  c: Context<GatewayEnv>,
): { owner: string; repo: string } | undefined {
  const parsed = c.get("parsedRequest");
  if (!c.get("requestConfig").lockdown || !c.get("accessCache")) return undefined;
  if (!parsed?.owner || !parsed.repo) return undefined;
  return { owner: parsed.owner, repo: parsed.repo };
}

/**
 * Drop unsafe items. Returns `items` untouched when lockdown does not apply.
 * Access query failures propagate.
 */
export async function applyLockdown<T>(c: Context<GatewayEnv>, items: readonly T[]): Promise<T[]> {
  const target = lockdownTarget(c);
  const cache = c.get("accessCache");
  if (!target || !cache) return [...items];

  const safe = await filterSafeItems(
    cache,
    items,
    authorLogin,
    target.owner,
    target.repo,
    c.req.raw.signal,
  );
  if (safe.length < items.length) {
    c.get("logger").info(
      { owner: target.owner, repo: target.repo, removed: items.length - safe.length },
      "lockdown removed items",
    );
  }
  return safe;
}
