import type { CacheProvider } from '../cache-interfaces.js';

interface CacheEntry {
  value: unknown;
  expiresAt?: number;
}

/**
 * In-process cache provider, for tests and single-process deployments
 */
export class MemoryCacheAdapter implements CacheProvider {
  readonly name = 'memory';
  readonly capabilities = { prefix: true, ttl: true };
  private storage: Map<string, CacheEntry> = new Map();

  async get(key: string): Promise<unknown> {
    const entry = this.storage.get(key);

    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      await this.delete(key);
      return undefined;
    }

    return structuredClone(entry.value);
  }

  async has(key: string): Promise<boolean> {
    const value = await this.get(key);
    return value !== undefined;
  }

  async set(key: string, value: unknown, ttlMs?: number): Promise<void> {
    this.storage.set(key, {
      value: structuredClone(value),
      expiresAt: ttlMs ? Date.now() + ttlMs : undefined,
    });
  }

  async delete(key: string): Promise<void> {
    this.storage.delete(key);
  }

  async invalidatePrefix(prefix: string): Promise<void> {
    for (const key of [...this.storage.keys()]) {
      if (key.startsWith(prefix)) {
        this.storage.delete(key);
      }
    }
  }

  clear(): void {
    this.storage.clear();
  }

  getStats(): { size: number } {
    return { size: this.storage.size };
  }

  async dispose(): Promise<void> {
    this.clear();
  }
}
