import type { RowActionType } from '../config/settings.js';
import { escapeHtml, escapeJsString } from './escape.js';
import { Message } from './message.js';
import { Url, type UrlParams } from './url.js';

export type TagParams = Record<string, string>;

export interface GeneratorOptions {
  basePath?: string;
  linkLengthLimit?: number;
  actionLinksMode?: RowActionType;
}

const renderAttributes = (attributes: TagParams): string =>
  Object.entries(attributes)
    .map(([name, value]) => ` ${name}="${escapeHtml(value)}"`)
    .join('');

/**
 * Markup helpers shared by the grid templates: links, icons, hints and
 * message blocks.
 */
export class Generator {
  readonly url: Url;
  private readonly basePath: string;
  private readonly linkLengthLimit: number;
  private readonly actionLinksMode: RowActionType;

  constructor(options: GeneratorOptions = {}) {
    this.basePath = options.basePath ?? '';
    this.linkLengthLimit = options.linkLengthLimit ?? 1000;
    this.actionLinksMode = options.actionLinksMode ?? 'both';
    this.url = new Url(this.basePath);
  }

  /**
   * Anchor to `urlPath`. When the URL would exceed the link length limit, or
   * carries an unsigned `sql_query`, the parameters move to `data-post` so
   * the client submits them as a POST request.
   * A string `tagParams` is a confirmation text shown before following the link.
   */
  linkOrButton(
    urlPath: string,
    urlParams: UrlParams | null,
    message: string,
    tagParams: TagParams | string = {},
    target = ''
  ): string {
    const attributes: TagParams = typeof tagParams === 'string'
      ? { onclick: `return Functions.confirmLink(this, '${escapeJsString(tagParams)}')` }
      : { ...tagParams };
    if (target !== '') attributes.target = target;

    const divider = urlPath.includes('?') ? '&' : '?';
    const params = urlParams ?? {};
    const rawQuery = this.url.getCommonRaw(params, divider);
    const fullUrl = urlPath + rawQuery;

    const unsignedQuery = 'sql_query' in params && !('sql_signature' in params);
    let href: string;
    if (fullUrl.length > this.linkLengthLimit || unsignedQuery) {
      attributes['data-post'] = rawQuery.slice(1);
      href = urlPath;
    } else {
      href = urlPath + this.url.getCommon(params, divider);
    }

    return `<a href="${href}"${renderAttributes(attributes)}>${message}</a>`;
  }

  /**
   * Sprite icon; `attributes.class` is added to the icon classes, alt and
   * title default to `alternate`.
   */
  getImage(image: string, alternate = '', attributes: TagParams = {}): string {
    const alt = escapeHtml(alternate);
    const { class: extraClass, alt: altOverride, title: titleOverride, ...rest } = attributes;
    const className = extraClass === undefined ? `icon ic_${image}` : `icon ic_${image} ${extraClass}`;
    return `<img src="${this.basePath}/themes/dot.gif" title="${titleOverride ?? alt}" alt="${altOverride ?? alt}"`
      + ` class="${className}"${renderAttributes(rest)}>`;
  }

  /** Icon and/or text, following the action links mode */
  getIcon(icon: string, alternate = '', forceText = false): string {
    const showIcon = this.actionLinksMode !== 'text';
    const showText = forceText || this.actionLinksMode !== 'icons';
    let html = '<span class="text-nowrap">';
    if (showIcon) html += this.getImage(icon, alternate);
    if (showIcon && showText) html += '&nbsp;';
    if (showText) html += alternate;
    return `${html}</span>`;
  }

  /** Content of a row action link */
  getActionLinkContent(icon: string, display: string): string {
    if (this.actionLinksMode === 'icons') {
      return `<span class="text-nowrap">${this.getImage(icon, display)}</span>`;
    }
    if (this.actionLinksMode === 'text') {
      return `<span class="text-nowrap">${display}</span>`;
    }
    return this.getIcon(icon, display);
  }

  showHint(message: string): string {
    return `<span class="pma_hint">${this.getImage('b_help')}<span class="hide">${message}</span></span>`;
  }

  /**
   * Message block, followed by the executed statement when one is given.
   */
  getMessage(message: Message | string, sqlQuery: string | null = null, level: 'success' | 'notice' | 'error' = 'notice'): string {
    const block = typeof message === 'string' ? new Message(message, level) : message;
    let html = `<div class="result_query">\n${block.getDisplay()}`;
    if (sqlQuery !== null && sqlQuery.trim() !== '') {
      html += `<div class="sqlOuter"><code class="sql"><pre>\n${escapeHtml(sqlQuery)}\n</pre></code></div>\n`;
    }
    return `${html}</div>\n`;
  }
}
