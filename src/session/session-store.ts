import { randomUUID } from 'node:crypto';
import type { CacheProvider, Duration } from '../cache/cache-interfaces.js';
import { isValidDuration, parseDuration } from '../cache/duration-utils.js';
import { MemoryCacheAdapter } from '../cache/adapters/memory-cache-adapter.js';
import type { Settings } from '../config/settings.js';
import { createDisplaySession, readDisplaySession, type DisplaySession } from './display-session.js';

export interface SessionStoreOptions {
  /** Idle lifetime of a session */
  ttl?: Duration;
  /** Key prefix in the cache */
  prefix?: string;
}

/**
 * Loads and saves display sessions through a cache provider.
 */
export class SessionStore {
  private readonly ttlMs: number;
  private readonly prefix: string;

  constructor(
    private readonly provider: CacheProvider = new MemoryCacheAdapter(),
    options: SessionStoreOptions = {}
  ) {
    const ttl = options.ttl ?? '1d';
    if (!isValidDuration(ttl)) {
      throw new Error(`Invalid session ttl: ${JSON.stringify(ttl)}.`);
    }
    this.ttlMs = parseDuration(ttl);
    this.prefix = options.prefix ?? 'session:';
  }

  private key(id: string): string {
    return `${this.prefix}${id}`;
  }

  /**
   * Stored session `id`, or a fresh one when it is unknown, expired or
   * unreadable. Without an id a new id is generated.
   */
  async load(id: string | undefined, settings: Settings): Promise<DisplaySession> {
    const sessionId = id === undefined || id === '' ? randomUUID() : id;
    const stored = readDisplaySession(await this.provider.get(this.key(sessionId)));
    return stored ?? createDisplaySession(sessionId, settings);
  }

  async save(session: DisplaySession): Promise<void> {
    await this.provider.set(this.key(session.id), session, this.ttlMs);
  }

  async destroy(id: string): Promise<void> {
    await this.provider.delete(this.key(id));
  }

  /** Drops every session */
  async clear(): Promise<void> {
    if (!this.provider.capabilities.prefix) {
      throw new Error(`Cache provider "${this.provider.name}" cannot clear sessions: it does not support prefix invalidation.`);
    }
    await this.provider.invalidatePrefix(this.prefix);
  }
}
