import { describe, it, expect } from 'vitest';
import { pageSelector, pageSelectorPages } from '../../src/utils/page-selector.js';

describe('pageSelectorPages', () => {
  it('lists every page of small results', () => {
    expect(pageSelectorPages(3, 5)).toEqual([1, 2, 3, 4, 5]);
  });

  it('keeps a current page past the end', () => {
    expect(pageSelectorPages(7, 5)).toEqual([1, 2, 3, 4, 5, 7]);
  });

  it('samples large results', () => {
    const pages = pageSelectorPages(150, 300);

    expect(pages.slice(0, 5)).toEqual([1, 2, 3, 4, 5]);
    expect(pages.slice(-6)).toEqual([295, 296, 297, 298, 299, 300]);
    expect(pages).toContain(140);
    expect(pages).toContain(160);
    expect(pages.length).toBeLessThan(300);
    expect([...pages].sort((a, b) => a - b)).toEqual(pages);
  });
});

describe('pageSelector', () => {
  it('renders offsets as option values', () => {
    expect(pageSelector('pos', 25, 2, 3)).toBe(
      ' <select class="pageselector ajax" name="pos" >'
      + '                <option  value="0">1</option>\n'
      + '                <option selected="selected" style="font-weight: bold" value="25">2</option>\n'
      + '                <option  value="50">3</option>\n'
      + ' </select>'
    );
  });
});
