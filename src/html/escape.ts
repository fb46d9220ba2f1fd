const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  '\'': '&#039;',
};

/**
 * Escapes the five HTML special characters.
 */
export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);

/**
 * Default rendering of a cell value: escaped, with runs of spaces kept and
 * line breaks turned into <br>.
 */
export const mimeDefaultFunction = (value: string): string =>
  escapeHtml(value)
    .replaceAll('  ', ' &nbsp;')
    .replace(/\r\n|\r|\n/g, '<br>\n');

/**
 * Escapes a string for use inside a single- or double-quoted JavaScript literal.
 */
export const escapeJsString = (value: string): string =>
  value
    .replaceAll('\\', '\\\\')
    .replaceAll('\'', '\\\'')
    .replaceAll('"', '\\"')
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\r')
    .replace(/<\/script/gi, '</\' + \'script');

/** Text content of an HTML fragment */
export const stripTags = (html: string): string => html.replace(/<[^>]*>/g, '');
