import { describe, it, expect } from 'vitest';
import { Generator } from '../../src/html/generator.js';

describe('Generator', () => {
  const generator = new Generator({ basePath: '/pma', linkLengthLimit: 1000, actionLinksMode: 'both' });

  describe('linkOrButton', () => {
    it('renders a plain link', () => {
      expect(generator.linkOrButton('/pma/sql', { db: 'shop', pos: 25 }, 'Next')).toBe(
        '<a href="/pma/sql?db=shop&amp;pos=25">Next</a>'
      );
    });

    it('posts unsigned queries', () => {
      expect(generator.linkOrButton('/pma/sql', { db: 'shop', sql_query: 'SELECT 1' }, 'Go')).toBe(
        '<a href="/pma/sql" data-post="db=shop&amp;sql_query=SELECT+1">Go</a>'
      );
    });

    it('links signed queries', () => {
      expect(generator.linkOrButton('/pma/sql', { sql_query: 'SELECT 1', sql_signature: 'abc' }, 'Go')).toBe(
        '<a href="/pma/sql?sql_query=SELECT+1&amp;sql_signature=abc">Go</a>'
      );
    });

    it('posts URLs over the length limit', () => {
      const short = new Generator({ linkLengthLimit: 10 });
      expect(short.linkOrButton('/sql', { table: 'orders' }, 'Go')).toBe(
        '<a href="/sql" data-post="table=orders">Go</a>'
      );
    });

    it('continues an existing query string', () => {
      expect(generator.linkOrButton('/pma/sql?db=shop', { pos: 0 }, 'Go')).toBe(
        '<a href="/pma/sql?db=shop&amp;pos=0">Go</a>'
      );
    });

    it('adds a confirmation and a target', () => {
      expect(generator.linkOrButton('/x', null, 'Del', 'Sure?')).toBe(
        '<a href="/x" onclick="return Functions.confirmLink(this, &#039;Sure?&#039;)">Del</a>'
      );
      expect(generator.linkOrButton('/x', {}, 'X', { class: 'ajax' }, '_blank')).toBe(
        '<a href="/x" class="ajax" target="_blank">X</a>'
      );
    });
  });

  it('renders icons with text', () => {
    const image = '<img src="/pma/themes/dot.gif" title="Edit" alt="Edit" class="icon ic_b_edit">';
    expect(generator.getImage('b_edit', 'Edit')).toBe(image);
    expect(generator.getIcon('b_edit', 'Edit')).toBe(`<span class="text-nowrap">${image}&nbsp;Edit</span>`);
  });

  it('follows the action links mode', () => {
    const textOnly = new Generator({ actionLinksMode: 'text' });
    expect(textOnly.getActionLinkContent('b_edit', 'Edit')).toBe('<span class="text-nowrap">Edit</span>');
  });

  it('renders a message with the executed statement', () => {
    expect(generator.getMessage('Done', 'SELECT <1>', 'success')).toBe(
      '<div class="result_query">\n'
      + '<div class="alert alert-success" role="alert">Done</div>\n'
      + '<div class="sqlOuter"><code class="sql"><pre>\nSELECT &lt;1&gt;\n</pre></code></div>\n'
      + '</div>\n'
    );
  });
});
