/**
 * Cache Store
 *
 * Content-addressed memo of agent payloads. Entries live until their TTL
 * passes; there is no LRU behaviour. Expiry is checked inside the lookup
 * query itself, so an expired row is never returned, whether or not the
 * periodic sweep has removed it yet.
 *
 * An optional capacity bound (`maxEntries`) drops the entries closest to
 * expiry once the table grows past it. 0 leaves the store unbounded.
 */

import { CacheStoreError, ValidationError, toError } from '../../errors/index.js';
import type { AnalysisStore, CacheRow, StoreDeps } from '../persistence/analysis-store.js';
import { createComponentLogger } from '../utilities/logger.js';
import { AgentPayloadSchema } from './payload.js';
import type { AgentPayload } from './types.js';

const log = createComponentLogger('CacheStore');

// =============================================================================
// TYPES
// =============================================================================

export interface CacheInsertOptions {
  /** Overrides the store default */
  ttlMs?: number;
  /** What computing this payload cost; credited as time saved on each hit */
  computeMs?: number;
  agentId?: string;
}

export interface CacheHit {
  payload: AgentPayload;
  /** Access count after this hit */
  accessCount: number;
  /** Milliseconds this hit saved */
  savedMs: number;
  createdAt: number;
  expiresAt: number;
}

export interface CacheStats {
  entries: number;
  /** Entries past expiry still awaiting a sweep */
  expired: number;
  totalHits: number;
  totalTimeSavedMs: number;
}

/**
 * The orchestrator depends on this interface, not on SQLite.
 */
export interface CacheStore {
  lookup(key: string): CacheHit | undefined;
  insert(key: string, payload: AgentPayload, options?: CacheInsertOptions): void;
  evictExpired(): number;
  purge(): number;
  stats(): CacheStats;
}

export interface SQLiteCacheStoreOptions {
  defaultTtlMs?: number;
  maxEntries?: number;
}

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

// =============================================================================
// SQLITE CACHE STORE
// =============================================================================

export class SQLiteCacheStore implements CacheStore {
  private readonly deps: StoreDeps;
  private readonly defaultTtlMs: number;
  private readonly maxEntries: number;

  constructor(store: AnalysisStore, options: SQLiteCacheStoreOptions = {}) {
    this.deps = store.deps;
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxEntries = options.maxEntries ?? 0;
  }

  /**
   * Return the payload for `key` if present and unexpired, crediting the hit.
   * The read and the counter update share one transaction.
   */
  lookup(key: string): CacheHit | undefined {
    const { db, stmts, now } = this.deps;
    const at = now();

    const read = db.transaction((): CacheRow | undefined => {
      const row = stmts.getLiveCacheEntry.get({ key, now: at });
      if (row) {
        stmts.touchCacheEntry.run({ key, now: at });
      }
      return row;
    });

    let row: CacheRow | undefined;
    try {
      row = read();
    } catch (err) {
      throw new CacheStoreError('lookup', toError(err), { key });
    }
    if (!row) return undefined;

    const parsed = AgentPayloadSchema.safeParse(parseJson(row.payload));
    if (!parsed.success) {
      throw new CacheStoreError('lookup', new Error('stored payload failed validation'), { key });
    }

    return {
      payload: parsed.data,
      accessCount: row.access_count + 1,
      savedMs: row.compute_ms,
      createdAt: row.created_at,
      expiresAt: row.expires_at,
    };
  }

  /**
   * Store `payload` under `key`, replacing any previous entry and its
   * statistics. Expiry is now + ttl.
   */
  insert(key: string, payload: AgentPayload, options: CacheInsertOptions = {}): void {
    const ttlMs = options.ttlMs ?? this.defaultTtlMs;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new ValidationError(`Cache TTL must be positive, got ${ttlMs}`, ['ttlMs']);
    }

    const { db, stmts, now } = this.deps;
    const createdAt = now();

    const write = db.transaction(() => {
      stmts.upsertCacheEntry.run({
        key,
        agentId: options.agentId ?? null,
        payload: JSON.stringify(payload),
        computeMs: Math.max(0, Math.round(options.computeMs ?? 0)),
        createdAt,
        expiresAt: createdAt + ttlMs,
      });

      if (this.maxEntries > 0) {
        const count = stmts.countCache.get()?.n ?? 0;
        if (count > this.maxEntries) {
          stmts.trimCache.run({ excess: count - this.maxEntries });
        }
      }
    });

    try {
      write();
    } catch (err) {
      throw new CacheStoreError('insert', toError(err), { key });
    }
  }

  /**
   * Delete every entry whose expiry has passed. Returns how many went.
   */
  evictExpired(): number {
    try {
      const removed = this.deps.stmts.deleteExpiredCache.run({ now: this.deps.now() }).changes;
      if (removed > 0) {
        log.info('Evicted expired cache entries', { removed });
      }
      return removed;
    } catch (err) {
      throw new CacheStoreError('evict', toError(err));
    }
  }

  /** Drop everything. */
  purge(): number {
    try {
      const removed = this.deps.stmts.deleteAllCache.run().changes;
      log.info('Purged cache', { removed });
      return removed;
    } catch (err) {
      throw new CacheStoreError('purge', toError(err));
    }
  }

  stats(): CacheStats {
    const row = this.deps.stmts.cacheTotals.get({ now: this.deps.now() });
    return {
      entries: row?.entries ?? 0,
      expired: row?.expired ?? 0,
      totalHits: row?.total_hits ?? 0,
      totalTimeSavedMs: row?.total_time_saved_ms ?? 0,
    };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
