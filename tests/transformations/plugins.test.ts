import { describe, it, expect } from 'vitest';
import {
  TextOctetstreamHex,
  TextPlainAppend,
  TextPlainBool2Text,
  TextPlainFormatted,
  TextPlainLongtoipv4,
  TextPlainPreApPend,
  TextPlainSubstring,
} from '../../src/transformations/plugins/text.js';
import { TextPlainJson, TextPlainSql } from '../../src/transformations/plugins/sql.js';
import {
  ImageJpegInline,
  ImageJpegLink,
  TextPlainImageLink,
  TextPlainLink,
  isSafeLink,
} from '../../src/transformations/plugins/link.js';
import { Url } from '../../src/html/url.js';

describe('text plugins', () => {
  it('cuts substrings and marks the cuts', () => {
    const plugin = new TextPlainSubstring();
    expect(plugin.applyTransformation('abcdef', { args: ['1', '3'] })).toBe('…bcd…');
    expect(plugin.applyTransformation('abcdef', { args: ['0', '2'] })).toBe('ab…');
    expect(plugin.applyTransformation('abc')).toBe('abc');
  });

  it('prepends and appends escaped text', () => {
    expect(new TextPlainPreApPend().applyTransformation('x', { args: ['<', '>'] })).toBe('&lt;x&gt;');
    expect(new TextPlainAppend().applyTransformation('5', { args: [' kg'] })).toBe('5 kg');
  });

  it('maps booleans to text', () => {
    const plugin = new TextPlainBool2Text();
    expect(plugin.applyTransformation('0')).toBe('F');
    expect(plugin.applyTransformation('1')).toBe('T');
    expect(plugin.applyTransformation('0', { args: ['yes', 'no'] })).toBe('no');
  });

  it('formats IPv4 addresses stored as integers', () => {
    const plugin = new TextPlainLongtoipv4();
    expect(plugin.applyTransformation('3232235777')).toBe('192.168.1.1');
    expect(plugin.applyTransformation('-1')).toBe('-1');
    expect(plugin.applyTransformation('<x>')).toBe('&lt;x&gt;');
    expect(plugin.applyTransformationNoWrap()).toBe(true);
  });

  it('renders formatted HTML in a sandbox', () => {
    expect(new TextPlainFormatted().applyTransformation('<b>"hi"</b>')).toBe(
      `<iframe srcdoc="<b>'hi'</b>" sandbox=""></iframe>`
    );
  });

  it('dumps bytes as grouped hex', () => {
    const plugin = new TextOctetstreamHex();
    const bytes = Buffer.from([0x01, 0xab, 0xff]);
    expect(plugin.applyTransformation(bytes)).toBe('01 ab ff ');
    expect(plugin.applyTransformation(bytes, { args: ['0'] })).toBe('01abff');
    expect(plugin.applyTransformation(bytes, { args: ['4'] })).toBe('01ab ff ');
  });
});

describe('code plugins', () => {
  it('wraps SQL and JSON in code blocks', () => {
    expect(new TextPlainSql().applyTransformation('SELECT <1>')).toBe(
      '<code class="sql" dir="ltr"><pre>\nSELECT &lt;1&gt;\n</pre></code>'
    );
    expect(new TextPlainJson().applyTransformation('{"a":1}')).toBe(
      '<code class="json"><pre>\n{&quot;a&quot;:1}\n</pre></code>'
    );
  });
});

describe('link plugins', () => {
  it('accepts web, mail and internal links only', () => {
    expect(isSafeLink('https://example.com')).toBe(true);
    expect(isSafeLink('MAILTO:someone@example.com')).toBe(true);
    expect(isSafeLink('/index?route=/sql')).toBe(true);
    expect(isSafeLink('//example.com')).toBe(false);
    expect(isSafeLink('javascript:alert(1)')).toBe(false);
  });

  it('renders text links', () => {
    const plugin = new TextPlainLink();
    expect(plugin.applyTransformation('ada', { args: ['https://example.com/u/', 'Profile'] })).toBe(
      '<a href="https://example.com/u/ada" title="Profile" target="_blank" rel="noopener noreferrer">Profile</a>'
    );
    expect(plugin.applyTransformation('x', { args: ['https://example.com', '', '1'] })).toBe(
      '<a href="https://example.com" title="" target="_blank" rel="noopener noreferrer">x</a>'
    );
    expect(plugin.applyTransformation('javascript:alert(1)')).toBe('javascript:alert(1)');
  });

  it('renders image links', () => {
    expect(new TextPlainImageLink().applyTransformation('a.png', { args: ['https://img.example/'] })).toBe(
      '<a href="https://img.example/a.png" rel="noopener noreferrer" target="_blank">'
      + '<img src="https://img.example/a.png" border="0" width="100" height="50">a.png</a>'
    );
  });

  it('links stored images through the download route', () => {
    const plugin = new ImageJpegLink(new Url('/pma'));
    const html = plugin.applyTransformation('img', {
      args: [],
      wrapperParams: { db: 'shop', table: 't', where_clause: '`id` = 1' },
    });
    expect(html).toBe(
      '<a class="disableAjax" target="_blank" rel="noopener noreferrer" '
      + 'href="/pma/transformation/wrapper?db=shop&amp;table=t&amp;where_clause=%60id%60+%3D+1" alt="[img]">[BLOB]</a>'
    );
  });

  it('inlines images without a download route', () => {
    expect(new ImageJpegInline(new Url()).applyTransformation(Buffer.from([1, 2, 3]))).toBe(
      '<img src="data:image/jpeg;base64,AQID" width="100" height="100" alt="">'
    );
  });
});
