import { describe, it, expect, beforeEach } from 'vitest';
import {
  MemoryCacheAdapter,
  parseDuration,
  isValidDuration,
  type Duration
} from '../../src/cache/index.js';

describe('Cache System', () => {
  describe('Duration Utils', () => {
    it('should parse seconds', () => {
      expect(parseDuration('30s')).toBe(30000);
    });

    it('should parse minutes', () => {
      expect(parseDuration('10m')).toBe(600000);
    });

    it('should parse days', () => {
      expect(parseDuration('1d')).toBe(86400000);
    });

    it('should pass milliseconds through', () => {
      expect(parseDuration(1500)).toBe(1500);
    });

    it('should throw on invalid format', () => {
      const invalid: Duration = JSON.parse('"10x"');
      expect(() => parseDuration(invalid)).toThrow('Invalid duration format: "10x"');
    });

    it('should validate durations', () => {
      expect(isValidDuration('1d')).toBe(true);
      expect(isValidDuration(-1)).toBe(false);
      expect(isValidDuration('1 day')).toBe(false);
    });
  });

  describe('MemoryCacheAdapter', () => {
    let adapter: MemoryCacheAdapter;

    beforeEach(() => {
      adapter = new MemoryCacheAdapter();
    });

    it('should return copies of stored values', async () => {
      const value = { sorted_col: '`id` ASC' };
      await adapter.set('ui:shop.orders', value);
      value.sorted_col = '`id` DESC';

      const stored = await adapter.get('ui:shop.orders');

      expect(stored).toEqual({ sorted_col: '`id` ASC' });
    });

    it('should expire entries after TTL', async () => {
      await adapter.set('key', 'value', 50);
      await new Promise(resolve => setTimeout(resolve, 80));

      expect(await adapter.has('key')).toBe(false);
    });

    it('should invalidate by prefix', async () => {
      await adapter.set('session:a', 1);
      await adapter.set('session:b', 2);
      await adapter.set('mime:shop.orders', 3);

      await adapter.invalidatePrefix('session:');

      expect(adapter.getStats()).toEqual({ size: 1 });
      expect(await adapter.get('mime:shop.orders')).toBe(3);
    });
  });
});
