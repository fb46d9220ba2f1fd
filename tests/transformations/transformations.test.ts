import { describe, it, expect, afterEach } from 'vitest';
import {
  getDefaultTransformationInfo,
  getOptions,
  mimeTypeToMediaType,
} from '../../src/transformations/transformations.js';
import { TransformationFactory } from '../../src/transformations/transformation-factory.js';
import { TextPlainAppend } from '../../src/transformations/plugins/text.js';
import { TextPlainSql } from '../../src/transformations/plugins/sql.js';
import { Url } from '../../src/html/url.js';

describe('getOptions', () => {
  it('splits on commas outside quotes', () => {
    expect(getOptions("'a,b',c")).toEqual(['a,b', 'c']);
    expect(getOptions("'x', 'y'")).toEqual(['x', 'y']);
  });

  it('removes backslash escapes', () => {
    expect(getOptions("a\\'b")).toEqual(["a'b"]);
  });

  it('returns no options for an empty string', () => {
    expect(getOptions('')).toEqual([]);
  });
});

describe('mimeTypeToMediaType', () => {
  it('turns stored MIME types into media types', () => {
    expect(mimeTypeToMediaType('text_plain')).toBe('Text/Plain');
    expect(mimeTypeToMediaType('image_jpeg')).toBe('Image/Jpeg');
  });
});

describe('getDefaultTransformationInfo', () => {
  it('covers the system schemas', () => {
    const info = getDefaultTransformationInfo();
    expect(Object.keys(info)).toEqual(['information_schema', 'mysql']);
    expect(info.mysql.help_topic.url).toEqual(['Text_Plain_Link', 'Text_Plain']);
  });

  it('adds the configuration storage tables', () => {
    const info = getDefaultTransformationInfo('Storage', { history: 'ui_history', tableUiPrefs: 'Table_UiPrefs' });
    expect(info.storage).toEqual({
      ui_history: { sqlquery: ['output/Text_Plain_Sql', 'Text_Plain'] },
      table_uiprefs: { prefs: ['output/Text_Plain_Json', 'Text_Plain'] },
    });
  });
});

describe('TransformationFactory', () => {
  const context = { url: new Url() };

  afterEach(() => {
    TransformationFactory.clear();
  });

  it('resolves built-ins case-insensitively, with or without an extension', () => {
    expect(TransformationFactory.has('output/Text_Plain_Sql.php')).toBe(true);
    expect(TransformationFactory.has('OUTPUT/text_plain_sql')).toBe(true);
    expect(TransformationFactory.create('output/Text_Plain_Sql', context)).toBeInstanceOf(TextPlainSql);
  });

  it('rejects unknown names', () => {
    expect(() => TransformationFactory.create('nope', context)).toThrow(
      'Transformation "nope" is not registered. Use TransformationFactory.register(...) to register it.'
    );
  });

  it('lets registrations override built-ins until cleared', () => {
    TransformationFactory.register('output/Text_Plain_Sql', () => new TextPlainAppend());
    expect(TransformationFactory.create('output/Text_Plain_Sql', context)).toBeInstanceOf(TextPlainAppend);

    TransformationFactory.clear();
    expect(TransformationFactory.create('output/Text_Plain_Sql', context)).toBeInstanceOf(TextPlainSql);
  });
});
