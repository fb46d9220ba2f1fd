import { describe, it, expect } from 'vitest';
import {
  TextPlainDateformat,
  formatDateDirectives,
  formatDateLetters,
  parseTimestamp,
} from '../../src/transformations/plugins/dateformat.js';

const date = new Date(Date.UTC(2024, 0, 5, 13, 4, 9));

describe('date formatting', () => {
  it('formats letter patterns', () => {
    expect(formatDateLetters('Y-m-d H:i:s', date)).toBe('2024-01-05 13:04:09');
    expect(formatDateLetters('D, j M y g:i a', date)).toBe('Fri, 5 Jan 24 1:04 pm');
    expect(formatDateLetters('\\Y Y', date)).toBe('Y 2024');
  });

  it('formats directive patterns', () => {
    expect(formatDateDirectives('%B %d, %Y at %I:%M %p', date)).toBe('January 05, 2024 at 01:04 PM');
    expect(formatDateDirectives('%q', date)).toBe('%q');
  });
});

describe('parseTimestamp', () => {
  it('reads compact and wall-clock dates as UTC', () => {
    expect(parseTimestamp('20240105130409', false)).toBe(1704459849);
    expect(parseTimestamp('2024-01-05 13:04:09', false)).toBe(1704459849);
  });

  it('takes integers as Unix timestamps', () => {
    expect(parseTimestamp('1700000000', true)).toBe(1700000000);
  });

  it('returns -1 for values that are not dates', () => {
    expect(parseTimestamp('not a date', false)).toBe(-1);
  });
});

describe('TextPlainDateformat', () => {
  const plugin = new TextPlainDateformat();

  it('formats in UTC letter mode', () => {
    expect(plugin.applyTransformation('2024-01-05 13:04:09', { args: ['0', '', 'utc'] })).toBe(
      '<dfn onclick="alert(&quot;2024-01-05 13:04:09&quot;);" title="2024-01-05 13:04:09">2024-01-05  13:04:09</dfn>'
    );
  });

  it('subtracts the hour offset in directive mode', () => {
    expect(plugin.applyTransformation('2024-01-05 13:04:09', { args: ['1'] })).toBe(
      '<dfn onclick="alert(&quot;2024-01-05 13:04:09&quot;);" title="2024-01-05 13:04:09">January 05, 2024 at 12:04 PM</dfn>'
    );
  });

  it('leaves values that are not dates alone', () => {
    expect(plugin.applyTransformation('<soon>')).toBe('&lt;soon&gt;');
  });

  it('reports an unknown mode', () => {
    expect(plugin.applyTransformation('2024-01-05', { args: ['0', '', 'other'] })).toBe(
      '<dfn onclick="alert(&quot;2024-01-05&quot;);" title="2024-01-05">INVALID DATE TYPE</dfn>'
    );
  });
});
