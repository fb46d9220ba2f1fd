// tests/execution/db-executor.test.ts
import { describe, it, expect } from 'vitest';
import { toCellValue, type DbExecutor } from '../../src/core/execution/db-executor.js';
import { createQueryLoggingExecutor, type QueryLogEntry } from '../../src/core/execution/query-logger.js';

describe('toCellValue', () => {
  it('keeps NULL, text and bytes', () => {
    const bytes = Buffer.from('abc');
    expect(toCellValue(null)).toBeNull();
    expect(toCellValue(undefined)).toBeNull();
    expect(toCellValue('x')).toBe('x');
    expect(toCellValue(bytes)).toBe(bytes);
  });

  it('renders numbers and booleans as text', () => {
    expect(toCellValue(42)).toBe('42');
    expect(toCellValue(9007199254740993n)).toBe('9007199254740993');
    expect(toCellValue(true)).toBe('1');
    expect(toCellValue(false)).toBe('0');
  });

  it('formats dates as DATETIME text', () => {
    expect(toCellValue(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02 03:04:05');
  });

  it('copies typed arrays into buffers', () => {
    expect(toCellValue(new Uint8Array([1, 2]))).toEqual(Buffer.from([1, 2]));
  });

  it('serializes other objects as JSON', () => {
    expect(toCellValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('createQueryLoggingExecutor', () => {
  const executor: DbExecutor = {
    async executeSql() {
      return [{ columns: ['1'], values: [['1']] }];
    },
  };

  it('returns the executor untouched without a logger', () => {
    expect(createQueryLoggingExecutor(executor)).toBe(executor);
  });

  it('logs each statement before running it', async () => {
    const entries: QueryLogEntry[] = [];
    const logged = createQueryLoggingExecutor(executor, entry => entries.push(entry));

    const [result] = await logged.executeSql('SELECT 1', [2]);

    expect(entries).toEqual([{ sql: 'SELECT 1', params: [2] }]);
    expect(result.values).toEqual([['1']]);
  });
});
