import { escapeHtml } from '../../html/escape.js';
import {
  TransformationsPlugin,
  emptyTransformOptions,
  transformInputBytes,
  transformInputText,
  type TransformOptions,
} from '../transformations-plugin.js';

abstract class TextPlainPlugin extends TransformationsPlugin {
  getMIMEType(): string {
    return 'Text';
  }

  getMIMESubtype(): string {
    return 'Plain';
  }
}

/**
 * Shows part of a string; options: start, length ('all' for the rest) and
 * the marker put where text was cut.
 */
export class TextPlainSubstring extends TextPlainPlugin {
  getName(): string {
    return 'Substring';
  }

  getInfo(): string {
    return 'Displays a part of a string. The first option is the offset, the second the length, the third the ellipsis.';
  }

  protected defaults(): string[] {
    return ['0', 'all', '…'];
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const chars = [...transformInputText(value)];
    const [startOption = '0', lengthOption = 'all', suffix = '…'] = this.getOptions(options);
    const start = Number.parseInt(startOption, 10) || 0;
    const end = lengthOption === 'all' ? undefined : start + (Number.parseInt(lengthOption, 10) || 0);
    let text = chars.slice(start, end).join('');
    const length = [...text].length;
    if (length !== chars.length) {
      if (start !== 0) text = suffix + text;
      if (length + start !== chars.length) text += suffix;
    }
    return escapeHtml(text);
  }
}

export class TextPlainPreApPend extends TextPlainPlugin {
  getName(): string {
    return 'PreApPend';
  }

  getInfo(): string {
    return 'Prepends and/or appends text to a string. The first option is prepended, the second appended.';
  }

  protected defaults(): string[] {
    return ['', ''];
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const [prefix = '', suffix = ''] = this.getOptions(options);
    return escapeHtml(prefix + transformInputText(value) + suffix);
  }
}

export class TextPlainAppend extends TextPlainPlugin {
  getName(): string {
    return 'Append';
  }

  getInfo(): string {
    return 'Appends text to a string. The only option is the text to be appended.';
  }

  protected defaults(): string[] {
    return [''];
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const [suffix = ''] = this.getOptions(options);
    return escapeHtml(transformInputText(value) + suffix);
  }
}

/**
 * Maps '0' to the second option and anything else to the first.
 */
export class TextPlainBool2Text extends TextPlainPlugin {
  getName(): string {
    return 'Bool2Text';
  }

  getInfo(): string {
    return 'Converts Boolean values to text (default \'T\' and \'F\'). The first option is for TRUE, the second for FALSE.';
  }

  protected defaults(): string[] {
    return ['T', 'F'];
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const [whenTrue = 'T', whenFalse = 'F'] = this.getOptions(options);
    return escapeHtml(transformInputText(value) === '0' ? whenFalse : whenTrue);
  }
}

/**
 * Dotted IPv4 notation of an unsigned 32-bit integer.
 */
export class TextPlainLongtoipv4 extends TextPlainPlugin {
  getName(): string {
    return 'Long To IPv4';
  }

  getInfo(): string {
    return 'Converts an (IPv4) Internet network address stored as a BIGINT into a string in Internet standard dotted format.';
  }

  applyTransformationNoWrap(): boolean {
    return true;
  }

  applyTransformation(value: string | Buffer): string {
    const text = transformInputText(value);
    const number = Number(text);
    if (text.trim() === '' || !Number.isInteger(number) || number < 0 || number > 4294967295) {
      return escapeHtml(text);
    }
    return [24, 16, 8, 0].map(shift => Math.floor(number / 2 ** shift) % 256).join('.');
  }
}

/**
 * Renders the value as HTML inside a sandboxed frame.
 */
export class TextPlainFormatted extends TextPlainPlugin {
  getName(): string {
    return 'Formatted';
  }

  getInfo(): string {
    return 'Displays the contents of the column as-is, without escaping its HTML.';
  }

  applyTransformation(value: string | Buffer): string {
    return `<iframe srcdoc="${transformInputText(value).replaceAll('"', '\'')}" sandbox=""></iframe>`;
  }
}

/**
 * Hexadecimal dump; the option is the group size in hex digits (0 for none).
 */
export class TextOctetstreamHex extends TransformationsPlugin {
  getName(): string {
    return 'Hex';
  }

  getInfo(): string {
    return 'Displays hexadecimal representation of data. Optional first parameter specifies how often space will be added (defaults to 2 nibbles).';
  }

  getMIMEType(): string {
    return 'Text';
  }

  getMIMESubtype(): string {
    return 'Octetstream';
  }

  protected defaults(): string[] {
    return ['2'];
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions()): string {
    const hex = transformInputBytes(value).toString('hex');
    const [groupOption = '2'] = this.getOptions(options);
    const group = Number.parseInt(groupOption, 10) || 0;
    if (group < 1) return hex;
    let grouped = '';
    for (let index = 0; index < hex.length; index += group) {
      grouped += `${hex.slice(index, index + group)} `;
    }
    return grouped;
  }
}
