import { escapeHtml } from './escape.js';

export type UrlParamValue = string | number | boolean | null | undefined;
export type UrlParams = Record<string, UrlParamValue>;

const encodeParams = (params: UrlParams): string => {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    search.append(key, typeof value === 'boolean' ? (value ? '1' : '0') : String(value));
  }
  return search.toString();
};

/**
 * Builds the links and hidden form fields of the grid.
 */
export class Url {
  constructor(private readonly basePath = '') {}

  /**
   * Query string prefixed by `divider`. With '?' or '&' an empty query gives ''.
   */
  getCommonRaw(params: UrlParams = {}, divider = '?'): string {
    const query = encodeParams(params);
    if ((divider !== '?' && divider !== '&') || query.length > 0) {
      return divider + query;
    }
    return '';
  }

  /** HTML-escaped variant of getCommonRaw */
  getCommon(params: UrlParams = {}, divider = '?'): string {
    return escapeHtml(this.getCommonRaw(params, divider));
  }

  /** Route path with its escaped query string */
  getFromRoute(route: string, params: UrlParams = {}): string {
    return this.basePath + route + this.getCommon(params, '?');
  }

  /** Path of a route without parameters */
  route(route: string): string {
    return this.basePath + route;
  }

  getHiddenInputs(params: UrlParams = {}): string {
    return Object.entries(params)
      .filter((entry): entry is [string, string | number | boolean] => entry[1] !== null && entry[1] !== undefined)
      .map(([name, value]) => {
        const text = typeof value === 'boolean' ? (value ? '1' : '0') : String(value);
        return `<input type="hidden" name="${escapeHtml(name)}" value="${escapeHtml(text)}">`;
      })
      .join('\n');
  }
}
