import { escapeHtml } from '../../html/escape.js';
import { TransformationsPlugin, transformInputText } from '../transformations-plugin.js';

export const formatSql = (sql: string): string =>
  `<code class="sql" dir="ltr"><pre>\n${escapeHtml(sql)}\n</pre></code>`;

/**
 * Shows a text column as a formatted SQL block.
 */
export class TextPlainSql extends TransformationsPlugin {
  getName(): string {
    return 'SQL';
  }

  getInfo(): string {
    return 'Formats text as SQL query with syntax highlighting.';
  }

  getMIMEType(): string {
    return 'Text';
  }

  getMIMESubtype(): string {
    return 'Plain';
  }

  applyTransformation(value: string | Buffer): string {
    return formatSql(transformInputText(value));
  }
}

/** Same as {@link TextPlainSql}, for BLOB columns holding SQL */
export class TextOctetstreamSql extends TextPlainSql {
  getMIMESubtype(): string {
    return 'Octetstream';
  }
}

export class TextPlainJson extends TransformationsPlugin {
  getName(): string {
    return 'JSON';
  }

  getInfo(): string {
    return 'Formats text as JSON with syntax highlighting.';
  }

  getMIMEType(): string {
    return 'Text';
  }

  getMIMESubtype(): string {
    return 'Plain';
  }

  applyTransformation(value: string | Buffer): string {
    const text = transformInputText(value);
    return `<code class="json"><pre>\n${escapeHtml(text)}\n</pre></code>`;
  }
}
