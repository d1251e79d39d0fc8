/**
 * Cache store tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SQLiteCacheStore } from '../src/integrations/orchestration/cache-store.js';
import { AnalysisStore } from '../src/integrations/persistence/analysis-store.js';
import type { AgentPayload } from '../src/integrations/orchestration/types.js';
import { ValidationError } from '../src/errors/index.js';

const payload: AgentPayload = {
  narrative: 'Revenue grows 4% per quarter.',
  insights: ['Q4 is strongest'],
  recommendations: ['Stock up before Q4'],
  artifacts: [],
  metadata: {},
};

describe('SQLiteCacheStore', () => {
  let clock: number;
  let store: AnalysisStore;
  let cache: SQLiteCacheStore;

  beforeEach(() => {
    clock = 1_000_000;
    store = new AnalysisStore({ dbPath: ':memory:', now: () => clock });
    cache = new SQLiteCacheStore(store, { defaultTtlMs: 60_000 });
  });

  afterEach(() => {
    store.close();
  });

  it('misses on an unknown key', () => {
    expect(cache.lookup('nope')).toBeUndefined();
  });

  it('returns the stored payload and counts accesses', () => {
    cache.insert('k', payload, { computeMs: 1500, agentId: 'trend_analysis' });

    const first = cache.lookup('k');
    const second = cache.lookup('k');

    expect(first?.payload).toEqual(payload);
    expect(first?.accessCount).toBe(1);
    expect(second?.accessCount).toBe(2);
    expect(second?.savedMs).toBe(1500);
    expect(cache.stats()).toEqual({ entries: 1, expired: 0, totalHits: 2, totalTimeSavedMs: 3000 });
  });

  it('expires entries after their TTL', () => {
    cache.insert('k', payload, { ttlMs: 1000 });

    clock += 999;
    expect(cache.lookup('k')).toBeDefined();

    clock += 1;
    expect(cache.lookup('k')).toBeUndefined();
    expect(cache.stats().expired).toBe(1);
  });

  it('evicts only expired entries', () => {
    cache.insert('short', payload, { ttlMs: 1000 });
    cache.insert('long', payload, { ttlMs: 10_000 });

    clock += 5000;
    expect(cache.evictExpired()).toBe(1);
    expect(cache.lookup('short')).toBeUndefined();
    expect(cache.lookup('long')).toBeDefined();
  });

  it('replaces an entry and resets its statistics', () => {
    cache.insert('k', payload);
    cache.lookup('k');
    cache.insert('k', { ...payload, narrative: 'updated' });

    const hit = cache.lookup('k');
    expect(hit?.payload.narrative).toBe('updated');
    expect(hit?.accessCount).toBe(1);
  });

  it('rejects a non-positive TTL', () => {
    expect(() => cache.insert('k', payload, { ttlMs: 0 })).toThrow(ValidationError);
  });

  it('purges everything', () => {
    cache.insert('a', payload);
    cache.insert('b', payload);
    expect(cache.purge()).toBe(2);
    expect(cache.stats().entries).toBe(0);
  });

  it('keeps at most maxEntries, dropping the soonest to expire', () => {
    const bounded = new SQLiteCacheStore(store, { defaultTtlMs: 60_000, maxEntries: 2 });
    bounded.insert('a', payload, { ttlMs: 1000 });
    bounded.insert('b', payload, { ttlMs: 5000 });
    bounded.insert('c', payload, { ttlMs: 3000 });

    expect(bounded.stats().entries).toBe(2);
    expect(bounded.lookup('a')).toBeUndefined();
    expect(bounded.lookup('b')).toBeDefined();
    expect(bounded.lookup('c')).toBeDefined();
  });
});
