import type { FieldMetadata } from '../database/field-metadata.js';
import type { UrlParams } from '../html/url.js';

/**
 * Options handed to a transformation: the positional options configured for
 * the column plus the download link of the current cell.
 */
export interface TransformOptions {
  args: string[];
  /** Escaped query string identifying the cell */
  wrapperLink?: string;
  wrapperParams?: UrlParams;
}

export const emptyTransformOptions = (): TransformOptions => ({ args: [] });

/** Cell content as text; binary values are decoded as UTF-8 */
export const transformInputText = (value: string | Buffer): string =>
  typeof value === 'string' ? value : value.toString('utf8');

export const transformInputBytes = (value: string | Buffer): Buffer =>
  typeof value === 'string' ? Buffer.from(value, 'utf8') : value;

/**
 * Browser-side display transformation of a column value.
 */
export abstract class TransformationsPlugin {
  /** Display name; names containing "Link" keep their value untruncated */
  abstract getName(): string;

  abstract getInfo(): string;

  abstract getMIMEType(): string;

  abstract getMIMESubtype(): string;

  /** Defaults for each positional option */
  protected defaults(): string[] {
    return [];
  }

  /**
   * Configured options over the plugin defaults; empty options take the default.
   */
  protected getOptions(options: TransformOptions): string[] {
    const defaults = this.defaults();
    const length = Math.max(defaults.length, options.args.length);
    const resolved: string[] = [];
    for (let index = 0; index < length; index++) {
      const given = options.args[index];
      resolved.push(given !== undefined && given !== '' ? given : defaults[index] ?? '');
    }
    return resolved;
  }

  /** Whether the transformed value must not wrap */
  applyTransformationNoWrap(_options: TransformOptions = emptyTransformOptions()): boolean {
    return false;
  }

  /** HTML for the cell */
  abstract applyTransformation(value: string | Buffer, options?: TransformOptions, meta?: FieldMetadata): string;
}
