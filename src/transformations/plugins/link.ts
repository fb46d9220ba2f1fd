import { escapeHtml } from '../../html/escape.js';
import type { Url } from '../../html/url.js';
import {
  TransformationsPlugin,
  emptyTransformOptions,
  transformInputBytes,
  transformInputText,
  type TransformOptions,
} from '../transformations-plugin.js';

const SAFE_LINK_PREFIXES = ['https://', 'http://', 'ftp://', 'mailto:'];

/** Web, ftp and mail links, and paths of this application, may be rendered as anchors */
export const isSafeLink = (url: string): boolean => {
  const lower = url.toLowerCase();
  if (lower.startsWith('/') && !lower.startsWith('//')) return true;
  return SAFE_LINK_PREFIXES.some(prefix => lower.startsWith(prefix));
};

const WRAPPER_ROUTE = '/transformation/wrapper';

/**
 * Displays a link; options: URL prefix, link title, and whether to use the
 * prefix alone instead of appending the value.
 */
export class TextPlainLink extends TransformationsPlugin {
  getName(): string {
    return 'TextLink';
  }

  getInfo(): string {
    return 'Displays column as a clickable link. The first option is a URL prefix, the second a title.';
  }

  getMIMEType(): string {
    return 'Text';
  }

  getMIMESubtype(): string {
    return 'Plain';
  }

  protected defaults(): string[] {
    return ['', '', ''];
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const text = transformInputText(value);
    const [prefix = '', title = '', prefixOnly = ''] = this.getOptions(options);
    const url = prefix + (prefixOnly !== '' && prefixOnly !== '0' ? '' : text);
    if (!isSafeLink(url)) return escapeHtml(url);
    return `<a href="${escapeHtml(url)}" title="${escapeHtml(title)}" target="_blank" rel="noopener noreferrer">`
      + `${escapeHtml(title !== '' ? title : text)}</a>`;
  }
}

/**
 * Displays an image and a link; the value is the image URL, optionally prefixed.
 */
export class TextPlainImageLink extends TransformationsPlugin {
  getName(): string {
    return 'Image Link';
  }

  getInfo(): string {
    return 'Displays an image and a link; the column contains the filename. Options: URL prefix, width, height.';
  }

  getMIMEType(): string {
    return 'Text';
  }

  getMIMESubtype(): string {
    return 'Plain';
  }

  protected defaults(): string[] {
    return ['', '100', '50'];
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const text = transformInputText(value);
    const [prefix = '', width = '100', height = '50'] = this.getOptions(options);
    const url = prefix + text;
    if (!isSafeLink(url)) return escapeHtml(url);
    return `<a href="${escapeHtml(url)}" rel="noopener noreferrer" target="_blank">`
      + `<img src="${escapeHtml(url)}" border="0" width="${Number.parseInt(width, 10) || 0}" `
      + `height="${Number.parseInt(height, 10) || 0}">${escapeHtml(text)}</a>`;
  }
}

/**
 * Link to the stored JPEG image of the cell.
 */
export class ImageJpegLink extends TransformationsPlugin {
  constructor(private readonly url: Url) {
    super();
  }

  getName(): string {
    return 'ImageLink';
  }

  getInfo(): string {
    return 'Displays a link to download this image.';
  }

  getMIMEType(): string {
    return 'Image';
  }

  getMIMESubtype(): string {
    return 'JPEG';
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const href = this.url.getFromRoute(WRAPPER_ROUTE, options.wrapperParams ?? {});
    return `<a class="disableAjax" target="_blank" rel="noopener noreferrer" href="${href}" `
      + `alt="[${escapeHtml(transformInputText(value))}]">[BLOB]</a>`;
  }
}

/**
 * JPEG thumbnail of the cell; options: width and height.
 */
export class ImageJpegInline extends TransformationsPlugin {
  constructor(private readonly url: Url) {
    super();
  }

  getName(): string {
    return 'Inline';
  }

  getInfo(): string {
    return 'Displays a clickable thumbnail. The options are the maximum width and height in pixels.';
  }

  getMIMEType(): string {
    return 'Image';
  }

  getMIMESubtype(): string {
    return 'JPEG';
  }

  protected defaults(): string[] {
    return ['100', '100'];
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const [width = '100', height = '100'] = this.getOptions(options);
    if (options.wrapperParams !== undefined) {
      const params = options.wrapperParams;
      const src = this.url.getFromRoute(WRAPPER_ROUTE, {
        ...params,
        resize: 'jpeg',
        newWidth: Number.parseInt(width, 10) || 0,
        newHeight: Number.parseInt(height, 10) || 0,
      });
      return `<a href="${this.url.getFromRoute(WRAPPER_ROUTE, params)}" rel="noopener noreferrer" target="_blank">`
        + `<img src="${src}" alt="[${escapeHtml(transformInputText(value))}]" border="0"></a>`;
    }
    return `<img src="data:image/jpeg;base64,${transformInputBytes(value).toString('base64')}" `
      + `width="${Number.parseInt(width, 10) || 0}" height="${Number.parseInt(height, 10) || 0}" alt="">`;
  }
}
