import { describe, it, expect } from 'vitest';
import { Url } from '../../src/html/url.js';

describe('Url', () => {
  const url = new Url('/app');

  it('builds escaped route URLs, skipping empty values', () => {
    expect(url.getFromRoute('/sql', { db: 'shop', table: 'a&b', pos: 0, flag: true, skip: null })).toBe(
      '/app/sql?db=shop&amp;table=a%26b&amp;pos=0&amp;flag=1'
    );
  });

  it('returns no query string for empty parameters', () => {
    expect(url.getCommonRaw({}, '?')).toBe('');
    expect(url.getCommonRaw({}, '&')).toBe('');
    expect(url.getCommonRaw({}, '#')).toBe('#');
  });

  it('form-encodes values', () => {
    expect(url.getCommonRaw({ a: 'x y', b: false }, '&')).toBe('&a=x+y&b=0');
  });

  it('renders hidden inputs', () => {
    expect(url.getHiddenInputs({ db: 'shop', q: '"x"', n: null })).toBe(
      '<input type="hidden" name="db" value="shop">\n<input type="hidden" name="q" value="&quot;x&quot;">'
    );
  });
});
