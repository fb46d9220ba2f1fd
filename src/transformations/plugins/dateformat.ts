import type { FieldMetadata } from '../../database/field-metadata.js';
import { escapeHtml } from '../../html/escape.js';
import {
  TransformationsPlugin,
  emptyTransformOptions,
  transformInputText,
  type TransformOptions,
} from '../transformations-plugin.js';

const MONTHS = ['January', 'February', 'March', 'April', 'May', 'June', 'July', 'August', 'September', 'October', 'November', 'December'];
const DAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

const hour12 = (date: Date): number => date.getUTCHours() % 12 || 12;

const DATE_CHARACTERS: Record<string, (date: Date) => string> = {
  d: date => pad(date.getUTCDate()),
  D: date => DAYS[date.getUTCDay()].slice(0, 3),
  j: date => String(date.getUTCDate()),
  l: date => DAYS[date.getUTCDay()],
  N: date => String(date.getUTCDay() || 7),
  F: date => MONTHS[date.getUTCMonth()],
  M: date => MONTHS[date.getUTCMonth()].slice(0, 3),
  m: date => pad(date.getUTCMonth() + 1),
  n: date => String(date.getUTCMonth() + 1),
  Y: date => String(date.getUTCFullYear()),
  y: date => pad(date.getUTCFullYear() % 100),
  a: date => (date.getUTCHours() < 12 ? 'am' : 'pm'),
  A: date => (date.getUTCHours() < 12 ? 'AM' : 'PM'),
  g: date => String(hour12(date)),
  G: date => String(date.getUTCHours()),
  h: date => pad(hour12(date)),
  H: date => pad(date.getUTCHours()),
  i: date => pad(date.getUTCMinutes()),
  s: date => pad(date.getUTCSeconds()),
  U: date => String(Math.floor(date.getTime() / 1000)),
};

const STRFTIME_DIRECTIVES: Record<string, (date: Date) => string> = {
  a: date => DAYS[date.getUTCDay()].slice(0, 3),
  A: date => DAYS[date.getUTCDay()],
  b: date => MONTHS[date.getUTCMonth()].slice(0, 3),
  B: date => MONTHS[date.getUTCMonth()],
  d: date => pad(date.getUTCDate()),
  e: date => String(date.getUTCDate()).padStart(2, ' '),
  H: date => pad(date.getUTCHours()),
  I: date => pad(hour12(date)),
  m: date => pad(date.getUTCMonth() + 1),
  M: date => pad(date.getUTCMinutes()),
  p: date => (date.getUTCHours() < 12 ? 'AM' : 'PM'),
  S: date => pad(date.getUTCSeconds()),
  y: date => pad(date.getUTCFullYear() % 100),
  Y: date => String(date.getUTCFullYear()),
  '%': () => '%',
};

/** Date in the `Y-m-d H:i:s` letter format; a backslash escapes the next letter */
export function formatDateLetters(format: string, date: Date): string {
  let output = '';
  for (let index = 0; index < format.length; index++) {
    const char = format[index];
    if (char === '\\' && index + 1 < format.length) {
      output += format[++index];
      continue;
    }
    const formatter = DATE_CHARACTERS[char];
    output += formatter ? formatter(date) : char;
  }
  return output;
}

/** Date in the `%Y-%m-%d` directive format; unknown directives are kept */
export function formatDateDirectives(format: string, date: Date): string {
  return format.replace(/%(.)/g, (directive, name: string) => {
    const formatter = STRFTIME_DIRECTIVES[name];
    return formatter ? formatter(date) : directive;
  });
}

const isValidDate = (year: number, month: number, day: number): boolean => {
  if (month < 1 || month > 12 || day < 1 || year < 1) return false;
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
};

/**
 * Seconds since the epoch for a cell value; wall-clock values are read as UTC.
 * @returns -1 when the value is not a date
 */
export function parseTimestamp(value: string, isInteger: boolean): number {
  if (isInteger) return Number.parseInt(value, 10);

  let timestamp = -1;
  if (/^(\d{2}){3,7}$/.test(value)) {
    const offset = value.length === 14 || value.length === 8 ? 4 : 2;
    const part = (start: number, length: number): number => Number.parseInt(value.slice(start, start + length), 10) || 0;
    const year = part(0, offset);
    const month = part(offset, 2);
    const day = part(offset + 2, 2);
    if (isValidDate(year, month, day)) {
      timestamp = Date.UTC(year, month - 1, day, part(offset + 4, 2), part(offset + 6, 2), part(offset + 8, 2)) / 1000;
    }
  } else if (/^[0-9]\d{1,9}$/.test(value)) {
    timestamp = Number.parseInt(value, 10);
  } else {
    const wallClock = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/.exec(value.trim());
    const parsed = wallClock
      ? Date.UTC(Number(wallClock[1]), Number(wallClock[2]) - 1, Number(wallClock[3]),
          Number(wallClock[4] ?? 0), Number(wallClock[5] ?? 0), Number(wallClock[6] ?? 0))
      : Date.parse(value);
    if (!Number.isNaN(parsed)) timestamp = Math.floor(parsed / 1000);
  }

  if (timestamp < 0 && /^[1-9]\d{1,9}$/.test(value)) timestamp = Number.parseInt(value, 10);
  return timestamp;
}

/**
 * Reformats dates and Unix timestamps. Options: hours to subtract, format,
 * and 'local' (directive format) or 'utc' (letter format).
 */
export class TextPlainDateformat extends TransformationsPlugin {
  getName(): string {
    return 'Date Format';
  }

  getInfo(): string {
    return 'Displays a TIME, TIMESTAMP, DATETIME or numeric unix timestamp column as formatted date.';
  }

  getMIMEType(): string {
    return 'Text';
  }

  getMIMESubtype(): string {
    return 'Plain';
  }

  protected defaults(): string[] {
    return ['0', '', 'local'];
  }

  applyTransformationNoWrap(): boolean {
    return true;
  }

  applyTransformation(value: string | Buffer, options: TransformOptions = emptyTransformOptions(), meta?: FieldMetadata): string {
    const source = transformInputText(value);
    const [offsetOption = '0', formatOption = '', modeOption = 'local'] = this.getOptions(options);
    const mode = modeOption.toLowerCase();
    const format = formatOption !== ''
      ? formatOption
      : mode === 'local' ? '%B %d, %Y at %I:%M %p' : 'Y-m-d  H:i:s';

    let timestamp = parseTimestamp(source, meta?.isType('int') ?? false);
    if (Number.isNaN(timestamp) || timestamp < 0) return escapeHtml(source);

    timestamp -= (Number.parseInt(offsetOption, 10) || 0) * 3600;
    const date = new Date(timestamp * 1000);
    let text: string;
    if (mode === 'local') text = formatDateDirectives(format, date);
    else if (mode === 'utc') text = formatDateLetters(format, date);
    else text = 'INVALID DATE TYPE';

    return `<dfn onclick="alert(${escapeHtml(JSON.stringify(source))});" title="${escapeHtml(source)}">${escapeHtml(text)}</dfn>`;
  }
}
