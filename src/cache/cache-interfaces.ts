/**
 * Storage abstraction for session state and table UI preferences
 */

/**
 * Read side of a cache
 */
export interface CacheReader {
  get(key: string): Promise<unknown>;
  has(key: string): Promise<boolean>;
}

/**
 * Write side of a cache
 */
export interface CacheWriter {
  set(key: string, value: unknown, ttlMs?: number): Promise<void>;
  delete(key: string): Promise<void>;
}

/**
 * Bulk removal; not every store can enumerate its keys
 */
export interface CacheInvalidator {
  invalidatePrefix(prefix: string): Promise<void>;
}

/**
 * Features a provider supports, checked at runtime
 */
export interface CacheCapabilities {
  prefix: boolean;
  ttl: boolean;
}

export interface CacheProvider extends CacheReader, CacheWriter, CacheInvalidator {
  readonly name: string;
  readonly capabilities: CacheCapabilities;
  dispose?(): Promise<void>;
}

/**
 * Human-readable TTL: '1d', '2h', '30m', '15s', '1w',
 * or a number of milliseconds
 */
export type Duration = number | `${number}${'s' | 'm' | 'h' | 'd' | 'w'}`;
