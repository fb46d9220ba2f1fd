import type { CacheProvider } from '../cache-interfaces.js';

/**
 * The part of Keyv the adapter calls, so any store-backed instance fits
 */
interface KeyvInstance {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttl?: number): Promise<unknown>;
  delete(key: string): Promise<boolean>;
  iterator?: () => AsyncIterable<[string, unknown]>;
  disconnect?(): Promise<void>;
}

/**
 * Cache provider over Keyv (Redis, SQLite and the other Keyv stores)
 */
export class KeyvCacheAdapter implements CacheProvider {
  readonly name = 'keyv';
  readonly capabilities: { prefix: boolean; ttl: boolean };

  constructor(private keyv: KeyvInstance) {
    this.capabilities = { prefix: typeof keyv.iterator === 'function', ttl: true };
  }

  async get(key: string): Promise<unknown> {
    return this.keyv.get(key);
  }

  async has(key: string): Promise<boolean> {
    const value = await this.keyv.get(key);
    return value !== undefined;
  }

  async set(key: string, value: unknown, ttlMs?: number): Promise<void> {
    await this.keyv.set(key, value, ttlMs);
  }

  async delete(key: string): Promise<void> {
    await this.keyv.delete(key);
  }

  async invalidatePrefix(prefix: string): Promise<void> {
    const iterator = this.keyv.iterator;
    if (typeof iterator !== 'function') {
      throw new Error(
        'Keyv adapter does not support prefix invalidation in this store. ' +
        'Consider using a store with iterator support.'
      );
    }

    const keys: string[] = [];
    for await (const [key] of iterator.call(this.keyv)) {
      if (key.startsWith(prefix)) {
        keys.push(key);
      }
    }
    await Promise.all(keys.map(k => this.keyv.delete(k)));
  }

  async dispose(): Promise<void> {
    await this.keyv.disconnect?.();
  }
}
