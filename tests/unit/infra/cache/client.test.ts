/**
 * Unit tests for cache client configuration
 */

import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { CacheNamespace, initCache, type CacheConfig } from '@/infra/cache/index.js';
import { createSilentLogger } from '@/infra/logger/index.js';

const baseConfig: CacheConfig = {
  backend: 'memory',
  ttlMs: 1000,
  maxEntries: 10,
  keyPrefix: 'test',
  serveStaleOnError: false,
};

const countingLoader = () => {
  let calls = 0;
  return {
    load: () => {
      calls++;
      return Promise.resolve(ok(calls));
    },
    calls: () => calls,
  };
};

describe('initCache', () => {
  it('uses the configured key prefix', () => {
    const { keyBuilder } = initCache({ config: baseConfig, logger: createSilentLogger() });

    expect(keyBuilder.build(CacheNamespace.REF_ENTITIES, 'catalog')).toBe(
      'test:ref:entities:catalog'
    );
  });

  it('creates caches that store payloads with the memory backend', async () => {
    const client = initCache({ config: baseConfig, logger: createSilentLogger() });
    const cache = client.createCache<number, string>('numbers');
    const loader = countingLoader();

    await cache.getOrLoad('k', loader.load);
    const second = await cache.getOrLoad('k', loader.load);

    expect(second._unsafeUnwrap()).toBe(1);
    expect(loader.calls()).toBe(1);
  });

  it('gives each cache its own store', async () => {
    const client = initCache({ config: baseConfig, logger: createSilentLogger() });
    const first = client.createCache<number, string>('first');
    const second = client.createCache<number, string>('second');
    const loader = countingLoader();

    await first.getOrLoad('k', loader.load);
    await second.getOrLoad('k', loader.load);

    expect(await first.invalidateAll()).toBe(1);
    expect((await second.stats()).size).toBe(1);
  });

  it('applies the shared clock to entry freshness', async () => {
    let now = 0;
    const client = initCache({
      config: baseConfig,
      logger: createSilentLogger(),
      now: () => now,
    });
    const cache = client.createCache<number, string>('numbers');
    const loader = countingLoader();

    await cache.getOrLoad('k', loader.load);
    now = 1001;
    await cache.getOrLoad('k', loader.load);

    expect(loader.calls()).toBe(2);
  });

  it('loads on every call when caching is disabled', async () => {
    const client = initCache({
      config: { ...baseConfig, backend: 'disabled' },
      logger: createSilentLogger(),
    });
    const cache = client.createCache<number, string>('numbers');
    const loader = countingLoader();

    await cache.getOrLoad('k', loader.load);
    await cache.getOrLoad('k', loader.load);

    expect(loader.calls()).toBe(2);
  });
});
