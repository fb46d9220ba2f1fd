import { describe, it, expect } from 'vitest';
import { escapeHtml, escapeJsString, mimeDefaultFunction, stripTags } from '../../src/html/escape.js';

describe('escape helpers', () => {
  it('escapes the HTML special characters', () => {
    expect(escapeHtml('<a href="x">&\'</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&#039;&lt;/a&gt;');
  });

  it('keeps space runs and line breaks in cell values', () => {
    expect(mimeDefaultFunction('a  b\nc<')).toBe('a &nbsp;b<br>\nc&lt;');
  });

  it('escapes JavaScript string literals', () => {
    expect(escapeJsString("a'b\n")).toBe("a\\'b\\n");
    expect(escapeJsString('</script>')).toBe("</' + 'script>");
  });

  it('strips tags', () => {
    expect(stripTags('<b>x</b> y')).toBe('x y');
  });
});
