/**
 * Quotes an identifier with backticks; '*' and '' pass through unchanged.
 */
export const backquote = (name: string): string =>
  name !== '' && name !== '*' ? `\`${name.replaceAll('`', '``')}\`` : name;

/**
 * Removes one level of quoting (backtick, double or single quote) and
 * un-doubles the escaped quote characters.
 */
export function unQuote(quoted: string, quote?: string): string {
  const quotes = quote === undefined ? ['`', '"', '\''] : [quote];
  for (const candidate of quotes) {
    if (quoted.length >= 2 && quoted.startsWith(candidate) && quoted.endsWith(candidate)) {
      return quoted.slice(1, -1).replaceAll(candidate + candidate, candidate);
    }
  }
  return quoted;
}

const SI_UNITS: Record<number, string> = {
  [-8]: 'y', [-7]: 'z', [-6]: 'a', [-5]: 'f', [-4]: 'p', [-3]: 'n', [-2]: 'µ', [-1]: 'm',
  0: ' ', 1: 'k', 2: 'M', 3: 'G', 4: 'T', 5: 'P', 6: 'E', 7: 'Z', 8: 'Y',
};

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'];

/** Rounds half away from zero, like the usual number formatting of SQL tools */
const roundHalfAway = (value: number, decimals = 0): number => {
  const factor = 10 ** decimals;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
};

/**
 * Fixed decimals with ',' as thousands separator.
 */
export function numberFormat(value: number, decimals: number): string {
  const rounded = roundHalfAway(value, decimals);
  const [integer, fraction] = Math.abs(rounded).toFixed(decimals).split('.');
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = rounded < 0 ? '-' : '';
  return fraction === undefined ? `${sign}${grouped}` : `${sign}${grouped}.${fraction}`;
}

/**
 * Formats a number with an SI prefix so that at least `digitsLeft` digits show
 * before the decimal point. With `digitsLeft` 0 the value is only grouped.
 */
export function formatNumber(
  input: number | string,
  digitsLeft = 3,
  digitsRight = 0,
  onlyDown = false,
  noTrailingZero = true
): string {
  const original = typeof input === 'string' ? Number.parseFloat(input) : input;
  if (original === 0 || Number.isNaN(original)) return '0';

  if (digitsLeft === 0) {
    const formatted = numberFormat(original, digitsRight);
    if (Number.parseFloat(formatted.replaceAll(',', '')) === 0) {
      return ` <${1 / 10 ** digitsRight}`;
    }
    return formatted;
  }

  const sign = original < 0 ? '-' : '';
  const value = Math.abs(original);
  const dh = 10 ** digitsRight;

  let d = Math.floor(Math.log10(value) / 3);
  const currentDigits = Math.floor(Math.log10(value / 1000 ** d) + 1);
  if (digitsLeft > currentDigits) {
    d -= Math.floor((digitsLeft - currentDigits) / 3);
  }
  if (d < 0 && onlyDown) d = 0;

  const scaled = roundHalfAway(value / (1000 ** d / dh)) / dh;
  const unit = SI_UNITS[d] ?? '';

  let formatted = numberFormat(scaled, digitsRight);
  if (noTrailingZero && formatted.includes('.')) {
    formatted = formatted.replace(/\.?0+$/, '');
  }

  if (scaled === 0) {
    return ` <${numberFormat(1 / dh, digitsRight)} ${unit}`;
  }
  return `${sign}${formatted} ${unit}`;
}

/**
 * Byte count in the largest binary unit that keeps `limes` digits.
 * @returns [value, unit], e.g. ['5.0', 'KiB']
 */
export function formatByteDown(input: number | string, limes = 6, comma = 0): [string, string] {
  let value = typeof input === 'string' ? Number.parseFloat(input) : input;
  const dh = 10 ** comma;
  const li = 10 ** limes;
  let unit = BYTE_UNITS[0];

  for (let d = 6, ex = 15; d >= 1; d--, ex -= 3) {
    const unitSize = li * 10 ** ex;
    if (BYTE_UNITS[d] !== undefined && value >= unitSize) {
      value = roundHalfAway(value / (1024 ** d / dh)) / dh;
      unit = BYTE_UNITS[d];
      break;
    }
  }

  const formatted = unit !== BYTE_UNITS[0]
    ? formatNumber(value, 5, comma, true, false)
    : formatNumber(value, 0);
  return [formatted.trim(), unit];
}

/**
 * Binary representation of a BIT value, left-padded to the column length.
 */
export function printableBitValue(value: bigint | number, length: number): string {
  return BigInt(value).toString(2).padStart(length, '0');
}

/**
 * Numeric value of a BIT cell: drivers return raw big-endian bytes, text
 * fixtures may carry the decimal value.
 */
export function bitCellValue(value: string | Buffer): bigint {
  if (typeof value === 'string' && /^\d+$/.test(value)) return BigInt(value);
  const bytes = typeof value === 'string' ? Buffer.from(value, 'latin1') : value;
  return bytes.reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
}
