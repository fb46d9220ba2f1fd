import { describe, it, expect } from 'vitest';
import {
  backquote,
  bitCellValue,
  formatByteDown,
  formatNumber,
  numberFormat,
  printableBitValue,
  unQuote,
} from '../../src/utils/format.js';

describe('quoting', () => {
  it('backquotes identifiers', () => {
    expect(backquote('a`b')).toBe('`a``b`');
    expect(backquote('*')).toBe('*');
    expect(backquote('')).toBe('');
  });

  it('removes one level of quoting', () => {
    expect(unQuote('`a``b`')).toBe('a`b');
    expect(unQuote("'x'")).toBe('x');
    expect(unQuote('abc')).toBe('abc');
    expect(unQuote('"x"', '`')).toBe('"x"');
  });
});

describe('number formatting', () => {
  it('groups thousands and rounds half away from zero', () => {
    expect(numberFormat(1234567.891, 2)).toBe('1,234,567.89');
    expect(numberFormat(2.5, 0)).toBe('3');
    expect(numberFormat(-0.5, 0)).toBe('-1');
  });

  it('only groups without left digits', () => {
    expect(formatNumber(1234, 0)).toBe('1,234');
    expect(formatNumber('0.001', 0, 2)).toBe(' <0.01');
    expect(formatNumber(0)).toBe('0');
  });

  it('adds an SI prefix', () => {
    expect(formatNumber(12345, 3, 0)).toBe('12 k');
  });

  it('formats byte counts in binary units', () => {
    expect(formatByteDown(5120, 3, 1)).toEqual(['5.0', 'KiB']);
    expect(formatByteDown(100)).toEqual(['100', 'B']);
  });
});

describe('BIT values', () => {
  it('pads the binary representation', () => {
    expect(printableBitValue(5, 8)).toBe('00000101');
  });

  it('reads raw bytes and decimal text', () => {
    expect(bitCellValue(Buffer.from([1, 2]))).toBe(258n);
    expect(bitCellValue('7')).toBe(7n);
  });
});
