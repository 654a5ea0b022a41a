import { describe, expect, it } from 'vitest';

import { createMemoryCache } from '@/infra/cache/adapters/memory-cache.js';
import { createNoopCache } from '@/infra/cache/adapters/noop-cache.js';

import { makeManualClock } from '../../../fixtures/fakes.js';

describe('MemoryCache', () => {
  it('returns undefined for missing keys', async () => {
    const cache = createMemoryCache<string>({ maxEntries: 10, defaultTtlMs: 1000 });
    const result = await cache.get('missing');
    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toBeUndefined();
  });

  it('stores and retrieves entries with their fetch time', async () => {
    const clock = makeManualClock(5000);
    const cache = createMemoryCache<string>({ maxEntries: 10, defaultTtlMs: 1000, now: clock.now });
    await cache.set('key', 'value');

    const result = await cache.get('key');
    expect(result._unsafeUnwrap()).toEqual({
      value: 'value',
      fetchedAt: 5000,
      ttlMs: 1000,
      expired: false,
    });
  });

  it('returns the stored object itself', async () => {
    const cache = createMemoryCache<{ name: string }>();
    const obj = { name: 'test' };
    await cache.set('key', obj);

    const result = await cache.get('key');
    expect(result._unsafeUnwrap()?.value).toBe(obj);
  });

  it('stays fresh up to the TTL and expires after it', async () => {
    const clock = makeManualClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 100, now: clock.now });
    await cache.set('key', 'value');

    clock.advance(100);
    expect((await cache.get('key'))._unsafeUnwrap()?.expired).toBe(false);

    clock.advance(1);
    const expired = (await cache.get('key'))._unsafeUnwrap();
    expect(expired?.expired).toBe(true);
    expect(expired?.value).toBe('value');
  });

  it('allows custom TTL per set operation', async () => {
    const clock = makeManualClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 1000, now: clock.now });
    await cache.set('short', 'value', { ttlMs: 50 });
    await cache.set('long', 'value', { ttlMs: 5000 });

    clock.advance(100);

    expect((await cache.get('short'))._unsafeUnwrap()?.expired).toBe(true);
    expect((await cache.get('long'))._unsafeUnwrap()?.expired).toBe(false);
  });

  it('restarts the freshness window when a key is stored again', async () => {
    const clock = makeManualClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 100, now: clock.now });
    await cache.set('key', 'old');
    clock.advance(150);
    await cache.set('key', 'new');

    const entry = (await cache.get('key'))._unsafeUnwrap();
    expect(entry?.value).toBe('new');
    expect(entry?.expired).toBe(false);
  });

  it('evicts LRU entries when at capacity', async () => {
    const cache = createMemoryCache<string>({ maxEntries: 2, defaultTtlMs: 10000 });
    await cache.set('a', '1');
    await cache.set('b', '2');
    await cache.set('c', '3'); // Should evict 'a'

    expect((await cache.get('a'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('b'))._unsafeUnwrap()?.value).toBe('2');
    expect((await cache.get('c'))._unsafeUnwrap()?.value).toBe('3');
  });

  it('refreshes LRU order on get', async () => {
    const cache = createMemoryCache<string>({ maxEntries: 2, defaultTtlMs: 10000 });
    await cache.set('a', '1');
    await cache.set('b', '2');

    // Access 'a' to make it more recent than 'b'
    await cache.get('a');

    await cache.set('c', '3');

    expect((await cache.get('a'))._unsafeUnwrap()?.value).toBe('1');
    expect((await cache.get('b'))._unsafeUnwrap()).toBeUndefined();
  });

  it('deletes existing keys', async () => {
    const cache = createMemoryCache<string>();
    await cache.set('key', 'value');
    const deleted = await cache.delete('key');
    expect(deleted._unsafeUnwrap()).toBe(true);
    expect((await cache.get('key'))._unsafeUnwrap()).toBeUndefined();
  });

  it('returns false when deleting non-existent key', async () => {
    const cache = createMemoryCache<string>();
    const deleted = await cache.delete('nonexistent');
    expect(deleted._unsafeUnwrap()).toBe(false);
  });

  it('marks an entry expired only once its age exceeds the TTL', async () => {
    const clock = makeManualClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 50, now: clock.now });
    await cache.set('key', 'value');

    clock.advance(50);
    expect((await cache.get('key'))._unsafeUnwrap()?.expired).toBe(false);

    clock.advance(1);
    expect((await cache.get('key'))._unsafeUnwrap()?.expired).toBe(true);
  });

  it('clears entries by prefix', async () => {
    const cache = createMemoryCache<string>();
    await cache.set('series:a', '1');
    await cache.set('series:b', '2');
    await cache.set('ref:c', '3');

    const cleared = await cache.clearByPrefix('series:');
    expect(cleared._unsafeUnwrap()).toBe(2);

    expect((await cache.get('series:a'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('ref:c'))._unsafeUnwrap()?.value).toBe('3');
  });

  it('clears all entries and reports how many were removed', async () => {
    const cache = createMemoryCache<string>();
    await cache.set('a', '1');
    await cache.set('b', '2');

    const cleared = await cache.clear();

    expect(cleared._unsafeUnwrap()).toBe(2);
    expect((await cache.get('a'))._unsafeUnwrap()).toBeUndefined();
  });

  it('counts expired reads as misses', async () => {
    const clock = makeManualClock();
    const cache = createMemoryCache<string>({ defaultTtlMs: 10, now: clock.now });
    await cache.set('key', 'value');

    await cache.get('key'); // hit
    clock.advance(11);
    await cache.get('key'); // expired
    await cache.get('missing'); // miss

    expect(await cache.stats()).toEqual({ hits: 1, misses: 2, size: 1 });
  });
});

describe('NoopCache', () => {
  it('never returns stored values', async () => {
    const cache = createNoopCache<string>();
    await cache.set('key', 'value');

    expect((await cache.get('key'))._unsafeUnwrap()).toBeUndefined();
    expect(await cache.stats()).toEqual({ hits: 0, misses: 1, size: 0 });
  });
});
