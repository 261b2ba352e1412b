import { CacheStatus, Scope } from '../types/index.js';
import { FetchFailureError, safeErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { scopeKey } from './scope.js';

export type Fetcher<T> = (scope: Scope, signal: AbortSignal) => Promise<T[]>;

export interface CachePolicy {
  /** Age in ms after which cached data is refetched on the next read. */
  ttl: number;
  /** Bound on a single remote fetch, in ms. */
  fetchTimeout: number;
}

export interface CacheReadOptions {
  forceRefresh?: boolean;
}

export interface CacheRead<T> {
  entities: T[];
  status: CacheStatus;
  fromCache: boolean;
  /** Set when this read attempted a refresh and it failed. */
  failure: FetchFailureError | null;
}

export interface CacheStoreOptions {
  name: string;
  policy: CachePolicy;
  now?: () => number;
}

interface ScopeEntry<T> {
  entities: T[];
  fetchedAt: number | null;
  lastError: string | null;
}

/**
 * Per-scope entity cache in front of a remote fetcher.
 *
 * A read returns cached entities while they are fresh, otherwise refetches.
 * Concurrent reads of one scope share a single in-flight fetch, and a failed
 * fetch falls back to the last good set marked as stale.
 */
export class CacheStore<T> {
  private readonly name: string;
  private readonly fetcher: Fetcher<T>;
  private readonly policy: CachePolicy;
  private readonly now: () => number;
  private readonly entries = new Map<string, ScopeEntry<T>>();
  private readonly inflight = new Map<string, Promise<CacheRead<T>>>();
  private readonly generations = new Map<string, number>();

  constructor(fetcher: Fetcher<T>, options: CacheStoreOptions) {
    this.fetcher = fetcher;
    this.name = options.name;
    this.policy = options.policy;
    this.now = options.now ?? Date.now;
  }

  async get(scope: Scope, options: CacheReadOptions = {}): Promise<CacheRead<T>> {
    const key = scopeKey(scope);
    const entry = this.entries.get(key);

    if (!options.forceRefresh && entry && entry.fetchedAt !== null && !this.isExpired(entry)) {
      return {
        entities: [...entry.entities],
        status: this.snapshot(key),
        fromCache: true,
        failure: null,
      };
    }

    return this.refresh(scope);
  }

  status(scope: Scope): CacheStatus {
    return this.snapshot(scopeKey(scope));
  }

  /** Cached entities without triggering a fetch. */
  peek(scope: Scope): T[] {
    return [...(this.entries.get(scopeKey(scope))?.entities ?? [])];
  }

  /** Applies a local mutation to a scope's cached set. Returns false when nothing is cached. */
  update(scope: Scope, mutate: (entities: T[]) => T[]): boolean {
    const entry = this.entries.get(scopeKey(scope));
    if (!entry || entry.fetchedAt === null) return false;

    entry.entities = mutate([...entry.entities]);
    return true;
  }

  clear(scope: Scope): void {
    const key = scopeKey(scope);
    this.entries.delete(key);
    this.inflight.delete(key);
    this.generations.set(key, this.generationOf(key) + 1);
    logger.debug(`Cleared ${this.name} cache for ${key}`);
  }

  clearAll(): void {
    const keys = new Set([...this.entries.keys(), ...this.inflight.keys()]);
    for (const key of keys) {
      this.generations.set(key, this.generationOf(key) + 1);
    }
    this.entries.clear();
    this.inflight.clear();
  }

  private refresh(scope: Scope): Promise<CacheRead<T>> {
    const key = scopeKey(scope);
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const run: Promise<CacheRead<T>> = this.fetchAndStore(scope, key, this.generationOf(key)).finally(
      () => {
        if (this.inflight.get(key) === run) {
          this.inflight.delete(key);
        }
      }
    );
    this.inflight.set(key, run);
    return run;
  }

  private async fetchAndStore(scope: Scope, key: string, generation: number): Promise<CacheRead<T>> {
    try {
      const entities = await this.fetchWithTimeout(scope);

      // Evicted while the fetch was running: hand the data to waiting callers only
      if (this.generationOf(key) === generation) {
        this.entries.set(key, { entities, fetchedAt: this.now(), lastError: null });
        logger.debug(`Refreshed ${this.name} cache for ${key}: ${entities.length} items`);
      }

      return {
        entities: [...entities],
        status: this.snapshot(key, false),
        fromCache: false,
        failure: null,
      };
    } catch (error) {
      const failure =
        error instanceof FetchFailureError ? error : new FetchFailureError('network', safeErrorMessage(error));

      const entry = this.entries.get(key);
      if (this.generationOf(key) === generation) {
        if (entry) {
          entry.lastError = failure.message;
        } else {
          this.entries.set(key, { entities: [], fetchedAt: null, lastError: failure.message });
        }
      }

      logger.warn(`Refresh of ${this.name} cache for ${key} failed (${failure.kind}): ${failure.message}`);

      return {
        entities: [...(entry?.entities ?? [])],
        status: this.snapshot(key, false),
        fromCache: true,
        failure,
      };
    }
  }

  private async fetchWithTimeout(scope: Scope): Promise<T[]> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new FetchFailureError('timeout', `Remote fetch timed out after ${this.policy.fetchTimeout}ms`)
        );
      }, this.policy.fetchTimeout);
    });

    try {
      return await Promise.race([this.fetcher(scope, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private isExpired(entry: ScopeEntry<T>): boolean {
    if (entry.fetchedAt === null) return true;
    return this.now() - entry.fetchedAt > this.policy.ttl;
  }

  private generationOf(key: string): number {
    return this.generations.get(key) ?? 0;
  }

  private snapshot(key: string, refreshing = this.inflight.has(key)): CacheStatus {
    const entry = this.entries.get(key);
    const fetchedAt = entry?.fetchedAt ?? null;
    const lastError = entry?.lastError ?? null;
    const expired = entry ? this.isExpired(entry) : true;

    return {
      scope: key,
      lastFetchedAt: fetchedAt === null ? null : new Date(fetchedAt),
      itemCount: entry?.entities.length ?? 0,
      isRefreshing: refreshing,
      isExpired: expired,
      isStale: lastError !== null || (fetchedAt !== null && expired),
      ageMs: fetchedAt === null ? null : this.now() - fetchedAt,
      lastError,
    };
  }
}
