export interface PageSelectorOptions {
  /** Below this many pages every page is listed */
  showAll?: number;
  sliceStart?: number;
  sliceEnd?: number;
  /** Percentage step between far-away pages */
  percent?: number;
  /** Pages within this distance of the current one are all listed */
  range?: number;
  prompt?: string;
}

/**
 * Page numbers offered in the page drop-down: all pages for small results,
 * otherwise the first and last slices, a percentage-spaced sample, every page
 * near the current one and pages at doubling distances from it.
 */
export function pageSelectorPages(pageNow: number, nbTotalPage: number, options: PageSelectorOptions = {}): number[] {
  const { showAll = 200, sliceStart = 5, sliceEnd = 5, percent = 20, range = 10 } = options;
  let pages: number[] = [];

  if (nbTotalPage < showAll) {
    for (let i = 1; i <= nbTotalPage; i++) pages.push(i);
  } else {
    const increment = Math.floor(nbTotalPage / percent);
    const pageNowMinusRange = pageNow - range;
    const pageNowPlusRange = pageNow + range;

    for (let i = 1; i <= sliceStart; i++) pages.push(i);
    for (let i = nbTotalPage - sliceEnd; i <= nbTotalPage; i++) pages.push(i);

    let i = sliceStart;
    const x = nbTotalPage - sliceEnd;
    let metBoundary = false;
    while (i <= x) {
      if (i >= pageNowMinusRange && i <= pageNowPlusRange) {
        i++;
        metBoundary = true;
      } else {
        i += increment;
        if (i > pageNowMinusRange && !metBoundary) {
          i = pageNowMinusRange;
        }
      }
      if (i <= 0 || i > x) continue;
      pages.push(i);
    }

    i = pageNow;
    let dist = 1;
    while (i < x) {
      dist *= 2;
      i = pageNow + dist;
      if (i <= 0 || i > x) continue;
      pages.push(i);
    }

    i = pageNow;
    dist = 1;
    while (i > 0) {
      dist *= 2;
      i = pageNow - dist;
      if (i <= 0 || i > x) continue;
      pages.push(i);
    }

    pages = [...new Set(pages)].sort((a, b) => a - b);
  }

  if (pageNow > nbTotalPage) pages.push(pageNow);
  return pages;
}

/**
 * Page drop-down; option values are row offsets.
 */
export function pageSelector(
  name: string,
  rows: number,
  pageNow = 1,
  nbTotalPage = 1,
  options: PageSelectorOptions = {}
): string {
  let html = `${options.prompt ?? ''} <select class="pageselector ajax" name="${name}" >`;
  for (const page of pageSelectorPages(pageNow, nbTotalPage, options)) {
    const selected = page === pageNow ? 'selected="selected" style="font-weight: bold"' : '';
    html += `                <option ${selected} value="${(page - 1) * rows}">${page}</option>\n`;
  }
  return `${html} </select>`;
}
