import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Keyv from 'keyv';
import { KeyvCacheAdapter } from '../../src/cache/adapters/keyv-cache-adapter.js';

describe('KeyvCacheAdapter', () => {
  let keyv: Keyv;
  let adapter: KeyvCacheAdapter;

  beforeEach(() => {
    // in-memory Keyv store
    keyv = new Keyv();
    adapter = new KeyvCacheAdapter(keyv);
  });

  afterEach(async () => {
    await adapter.dispose();
  });

  it('should have correct name', () => {
    expect(adapter.name).toBe('keyv');
  });

  it('should set and get values', async () => {
    await adapter.set('key1', 'value1');
    expect(await adapter.get('key1')).toBe('value1');
  });

  it('should return undefined for non-existent key', async () => {
    expect(await adapter.get('nonexistent')).toBeUndefined();
  });

  it('should check if key exists', async () => {
    await adapter.set('key1', 'value1');
    expect(await adapter.has('key1')).toBe(true);
    expect(await adapter.has('nonexistent')).toBe(false);
  });

  it('should delete values', async () => {
    await adapter.set('key1', 'value1');
    await adapter.delete('key1');
    expect(await adapter.get('key1')).toBeUndefined();
  });

  it('should expire values after TTL', async () => {
    await adapter.set('key1', 'value1', 100);
    expect(await adapter.get('key1')).toBe('value1');

    await new Promise(resolve => setTimeout(resolve, 150));
    expect(await adapter.get('key1')).toBeUndefined();
  });

  it('should keep column preferences as plain objects', async () => {
    const prefs = { col_order: [2, 0, 1], col_visib: [1, 0, 1] };

    await adapter.set('ui:shop.orders', prefs);

    expect(await adapter.get('ui:shop.orders')).toEqual(prefs);
  });

  it('should report prefix support from the store', () => {
    const withoutIterator = new KeyvCacheAdapter({
      get: async () => undefined,
      set: async () => true,
      delete: async () => true,
    });

    expect(withoutIterator.capabilities).toEqual({ prefix: false, ttl: true });
  });

  it('should refuse prefix invalidation without an iterator', async () => {
    const withoutIterator = new KeyvCacheAdapter({
      get: async () => undefined,
      set: async () => true,
      delete: async () => true,
    });

    await expect(withoutIterator.invalidatePrefix('session:')).rejects.toThrow(
      'Keyv adapter does not support prefix invalidation in this store.'
    );
  });

  it('should delete only the keys under a prefix', async () => {
    const stored = new Map<string, unknown>([
      ['session:a', 1],
      ['session:b', 2],
      ['ui:shop.orders', 3],
    ]);
    const store = new KeyvCacheAdapter({
      get: async (key: string) => stored.get(key),
      set: async (key: string, value: unknown) => stored.set(key, value),
      delete: async (key: string) => stored.delete(key),
      async *iterator() {
        for (const entry of [...stored.entries()]) yield entry;
      },
    });

    await store.invalidatePrefix('session:');

    expect([...stored.keys()]).toEqual(['ui:shop.orders']);
  });
});
