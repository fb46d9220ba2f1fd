import type { Url } from '../html/url.js';
import type { TransformationsPlugin } from './transformations-plugin.js';
import { TextOctetstreamSql, TextPlainJson, TextPlainSql } from './plugins/sql.js';
import { ImageJpegInline, ImageJpegLink, TextPlainImageLink, TextPlainLink } from './plugins/link.js';
import {
  TextOctetstreamHex,
  TextPlainAppend,
  TextPlainBool2Text,
  TextPlainFormatted,
  TextPlainLongtoipv4,
  TextPlainPreApPend,
  TextPlainSubstring,
} from './plugins/text.js';
import { TextPlainDateformat } from './plugins/dateformat.js';

export interface TransformationContext {
  url: Url;
}

type TransformationFactoryFn = (context: TransformationContext) => TransformationsPlugin;

/** Registry keys are compared case-insensitively, without a file extension */
const normalizeKey = (file: string): string => file.trim().replace(/\.[A-Za-z0-9]+$/, '').toLowerCase();

const BUILT_INS: [string, TransformationFactoryFn][] = [
  ['output/Text_Plain_Sql', () => new TextPlainSql()],
  ['output/Text_Octetstream_Sql', () => new TextOctetstreamSql()],
  ['output/Text_Plain_Json', () => new TextPlainJson()],
  ['output/Text_Plain_Bool2Text', () => new TextPlainBool2Text()],
  ['output/Text_Plain_Dateformat', () => new TextPlainDateformat()],
  ['output/Text_Plain_Formatted', () => new TextPlainFormatted()],
  ['output/Text_Plain_ImageLink', () => new TextPlainImageLink()],
  ['output/Text_Octetstream_Hex', () => new TextOctetstreamHex()],
  ['output/Image_JPEG_Inline', ({ url }) => new ImageJpegInline(url)],
  ['output/Image_JPEG_Link', ({ url }) => new ImageJpegLink(url)],
  ['Text_Plain_Link', () => new TextPlainLink()],
  ['Text_Plain_Substring', () => new TextPlainSubstring()],
  ['Text_Plain_PreApPend', () => new TextPlainPreApPend()],
  ['Text_Plain_Append', () => new TextPlainAppend()],
  ['Text_Plain_Longtoipv4', () => new TextPlainLongtoipv4()],
];

/**
 * Resolves the transformation file names stored with column MIME settings
 * (e.g. "output/Text_Plain_Sql", with or without a file extension) to plugin instances.
 */
export class TransformationFactory {
  private static registry = new Map<string, TransformationFactoryFn>();
  private static defaultsInitialized = false;

  private static ensureDefaults(): void {
    if (this.defaultsInitialized) return;
    this.defaultsInitialized = true;
    for (const [file, factory] of BUILT_INS) {
      const key = normalizeKey(file);
      if (!this.registry.has(key)) this.registry.set(key, factory);
    }
  }

  /** Register (or override) the plugin behind a transformation file name */
  static register(file: string, factory: TransformationFactoryFn): void {
    this.registry.set(normalizeKey(file), factory);
  }

  static has(file: string): boolean {
    this.ensureDefaults();
    return this.registry.has(normalizeKey(file));
  }

  /**
   * @throws Error when no plugin is registered under `file`
   */
  static create(file: string, context: TransformationContext): TransformationsPlugin {
    this.ensureDefaults();
    const factory = this.registry.get(normalizeKey(file));
    if (!factory) {
      throw new Error(`Transformation "${file}" is not registered. Use TransformationFactory.register(...) to register it.`);
    }
    return factory(context);
  }

  static keys(): string[] {
    this.ensureDefaults();
    return [...this.registry.keys()];
  }

  /** Clear all registrations; built-ins come back on the next lookup */
  static clear(): void {
    this.registry.clear();
    this.defaultsInitialized = false;
  }
}
