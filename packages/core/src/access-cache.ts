/**
 * Repository access cache for lockdown mode
 *
 * Lockdown hides content from public repositories unless its author can
 * push to the repository: public content from non-collaborators is where
 * untrusted instructions come from. Answering that question needs a
 * platform query per (author, repository); this cache keeps the answers so
 * repeated reads of the same thread cost nothing.
 */

import type { ScopeGateEmitter } from "./emitter.js";
import { createBaseEvent, EventNames } from "./events.js";

export interface RepoAccessInfo {
  isPrivate: boolean;
  hasPushAccess: boolean;
  viewerLogin: string;
}

/**
 * Upstream lookup: is the repository private, who is the querying viewer,
 * and does `actor` have write-or-above permission on it.
 */
export type RepoAccessQuery = (
  actor: string,
  owner: string,
  repo: string,
  signal?: AbortSignal,
) => Promise<RepoAccessInfo>;

export interface AccessCacheEntry {
  isPrivate: boolean;
  viewerLogin: string;
  /** normalized login -> has push access */
  knownActors: Map<string, boolean>;
  expiresAt: number;
}

export interface AccessCacheOptions {
  /** Entry lifetime in ms. Zero or negative disables expiry. */
  ttlMs?: number;
  /** Backing table name. Instances sharing a namespace share entries and lock. */
  namespace?: string;
  emitter?: ScopeGateEmitter;
  /** Interval for sweeping expired entries; 0 disables the sweep. */
  pruneIntervalMs?: number;
  now?: () => number;
}

export interface AccessCacheStats {
  hits: number;
  misses: number;
  evictions: number;
}

export const DEFAULT_REPO_ACCESS_TTL_MS = 20 * 60 * 1000;
export const DEFAULT_REPO_ACCESS_NAMESPACE = "repo-access-cache";
const DEFAULT_PRUNE_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Promise-chain mutex. Each critical section starts once the previous one
 * has settled, whether it resolved or rejected.
 */
class AsyncMutex {
  private tail: Promise<unknown> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

interface CacheTable {
  entries: Map<string, AccessCacheEntry>;
  mutex: AsyncMutex;
}

const tables = new Map<string, CacheTable>();

function tableFor(namespace: string): CacheTable {
  let table = tables.get(namespace);
  if (!table) {
    table = { entries: new Map(), mutex: new AsyncMutex() };
    tables.set(namespace, table);
  }
  return table;
}

export function cacheKey(owner: string, repo: string): string {
  return `${owner.toLowerCase()}/${repo.toLowerCase()}`;
}

export class AccessLockdownCache {
  private static instance: AccessLockdownCache | null = null;

  readonly namespace: string;
  readonly ttlMs: number;

  private readonly query: RepoAccessQuery;
  private readonly table: CacheTable;
  private readonly emitter: ScopeGateEmitter | undefined;
  private readonly now: () => number;
  private readonly stats: AccessCacheStats = { hits: 0, misses: 0, evictions: 0 };
  private pruneTimer: NodeJS.Timeout | null = null;

  constructor(query: RepoAccessQuery, options: AccessCacheOptions = {}) {
    this.query = query;
    this.namespace = options.namespace || DEFAULT_REPO_ACCESS_NAMESPACE;
    this.ttlMs = options.ttlMs ?? DEFAULT_REPO_ACCESS_TTL_MS;
    this.table = tableFor(this.namespace);
    this.emitter = options.emitter;
    this.now = options.now ?? Date.now;

    const pruneIntervalMs = options.pruneIntervalMs ?? DEFAULT_PRUNE_INTERVAL_MS;
    if (this.ttlMs > 0 && pruneIntervalMs > 0) {
      this.pruneTimer = setInterval(() => this.prune(), pruneIntervalMs);
      this.pruneTimer.unref();
    }
  }

  /**
   * Process-wide instance. The first call builds it from its arguments;
   * every later call returns that instance and ignores its arguments.
   */
  static getInstance(query: RepoAccessQuery, options?: AccessCacheOptions): AccessLockdownCache {
    if (!AccessLockdownCache.instance) {
      AccessLockdownCache.instance = new AccessLockdownCache(query, options);
    }
    return AccessLockdownCache.instance;
  }

  /**
   * Drop the process-wide instance and its table (for testing/shutdown)
   */
  static resetInstance(): void {
    const current = AccessLockdownCache.instance;
    if (current) {
      current.close();
      current.clear();
    }
    AccessLockdownCache.instance = null;
  }

  /**
   * Decide whether content authored by `actor` in `owner/repo` may be shown.
   *
   * Private repositories are never filtered, the viewer's own content is
   * never filtered, and otherwise only authors with push access pass.
   * Query failures reject; nothing is assumed on error.
   */
  async isSafeContent(
    actor: string,
    owner: string,
    repo: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const info = await this.getRepoAccessInfo(actor, owner, repo, signal);
    return info.isPrivate || info.viewerLogin === actor || info.hasPushAccess;
  }

  /**
   * Cached access facts for `actor` on `owner/repo`, querying upstream at
   * most once per unknown (actor, repository) pair.
   */
  getRepoAccessInfo(
    actor: string,
    owner: string,
    repo: string,
    signal?: AbortSignal,
  ): Promise<RepoAccessInfo> {
    const key = cacheKey(owner, repo);
    const actorKey = actor.toLowerCase();

    return this.table.mutex.runExclusive(async () => {
      const entry = this.liveEntry(key);

      const cachedHasPush = entry?.knownActors.get(actorKey);
      if (entry && cachedHasPush !== undefined) {
        this.stats.hits++;
        entry.expiresAt = this.expiry();
        this.emitter?.emitSync({
          ...createBaseEvent(EventNames.ACCESS_CACHE_HIT),
          payload: { key, actor },
        });
        return {
          isPrivate: entry.isPrivate,
          hasPushAccess: cachedHasPush,
          viewerLogin: entry.viewerLogin,
        };
      }

      this.stats.misses++;
      this.emitMiss(key, actor, entry !== undefined);

      let info: RepoAccessInfo;
      try {
        info = await this.query(actor, owner, repo, signal);
      } catch (err) {
        this.emitter?.emitSync({
          ...createBaseEvent(EventNames.ACCESS_QUERY_FAILED),
          payload: { key, actor, error: err instanceof Error ? err.message : String(err) },
        });
        throw err;
      }

      const updated: AccessCacheEntry = entry ?? {
        isPrivate: info.isPrivate,
        viewerLogin: info.viewerLogin,
        knownActors: new Map(),
        expiresAt: 0,
      };
      updated.isPrivate = info.isPrivate;
      updated.viewerLogin = info.viewerLogin;
      updated.knownActors.set(actorKey, info.hasPushAccess);
      updated.expiresAt = this.expiry();
      this.table.entries.set(key, updated);

      return {
        isPrivate: updated.isPrivate,
        hasPushAccess: info.hasPushAccess,
        viewerLogin: updated.viewerLogin,
      };
    });
  }

  /**
   * Remove expired entries. Returns how many were evicted.
   */
  prune(): number {
    const now = this.now();
    let evicted = 0;
    for (const [key, entry] of this.table.entries) {
      if (entry.expiresAt <= now) {
        this.table.entries.delete(key);
        evicted++;
      }
    }
    this.stats.evictions += evicted;
    return evicted;
  }

  getStats(): AccessCacheStats {
    return { ...this.stats };
  }

  get size(): number {
    return this.table.entries.size;
  }

  clear(): void {
    this.table.entries.clear();
  }

  /**
   * Stop the background sweep
   */
  close(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
  }

  private liveEntry(key: string): AccessCacheEntry | undefined {
    const entry = this.table.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.table.entries.delete(key);
      this.stats.evictions++;
      return undefined;
    }
    return entry;
  }

  private expiry(): number {
    return this.ttlMs > 0 ? this.now() + this.ttlMs : Number.POSITIVE_INFINITY;
  }

  private emitMiss(key: string, actor: string, repoCached: boolean): void {
    this.emitter?.emitSync({
      ...createBaseEvent(EventNames.ACCESS_CACHE_MISS),
      payload: { key, actor, repoCached },
    });
  }
}

/**
 * Keep only the items whose author passes the lockdown check for
 * `owner/repo`. Items without an author are dropped.
 */
export async function filterSafeItems<T>(
  cache: Pick<AccessLockdownCache, "isSafeContent">,
  items: readonly T[],
  authorOf: (item: T) => string | undefined,
  owner: string,
  repo: string,
  signal?: AbortSignal,
): Promise<T[]> {
  const safe: T[] = [];
  for (const item of items) {
    const author = authorOf(item);
    if (!author) continue;
    if (await cache.isSafeContent(author, owner, repo, signal)) {
      safe.push(item);
    }
  }
  return safe;
}
