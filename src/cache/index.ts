// Interfaces
export type {
  CacheReader,
  CacheWriter,
  CacheInvalidator,
  CacheProvider,
  CacheCapabilities,
  Duration,
} from './cache-interfaces.js';

// Utils
export { parseDuration, isValidDuration } from './duration-utils.js';

// Adapters
export { MemoryCacheAdapter } from './adapters/memory-cache-adapter.js';
export { KeyvCacheAdapter } from './adapters/keyv-cache-adapter.js';
