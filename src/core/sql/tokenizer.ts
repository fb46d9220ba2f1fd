export type TokenType =
  | 'whitespace'
  | 'comment'
  | 'word'
  | 'identifier'
  | 'string'
  | 'number'
  | 'literal'
  | 'variable'
  | 'operator'
  | 'punctuation';

export interface Token {
  type: TokenType;
  /** source text, including quotes */
  text: string;
  /** unquoted value for strings and identifiers, upper-cased for words */
  value: string;
  start: number;
  end: number;
}

const WORD_START = /[A-Za-z_$\u0080-￿]/;
const WORD_PART = /[A-Za-z0-9_$\u0080-￿]/;
const DIGIT = /[0-9]/;
const OPERATORS = ['<=>', '<<', '>>', '<=', '>=', '<>', '!=', ':=', '&&', '||', '->>', '->'];
const SINGLE_OPERATORS = '=<>!+-*/%&|^~:?';
const PUNCTUATION = '(),;.';

const readQuoted = (sql: string, start: number, quote: string): { text: string; value: string; end: number } => {
  let value = '';
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch === '\\' && quote !== '`' && i + 1 < sql.length) {
      const next = sql[i + 1];
      const escapes: Record<string, string> = { n: '\n', r: '\r', t: '\t', '0': '\0', b: '\b', Z: '\x1a' };
      value += escapes[next] ?? next;
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[i + 1] === quote) {
        value += quote;
        i += 2;
        continue;
      }
      return { text: sql.slice(start, i + 1), value, end: i + 1 };
    }
    value += ch;
    i++;
  }
  // unterminated: swallow the rest
  return { text: sql.slice(start), value, end: sql.length };
};

/**
 * Splits a MySQL statement into tokens that keep their source offsets.
 */
export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const push = (type: TokenType, start: number, end: number, value?: string) => {
    const text = sql.slice(start, end);
    tokens.push({ type, text, value: value ?? text, start, end });
  };

  while (i < sql.length) {
    const ch = sql[i];
    const start = i;

    if (/\s/.test(ch)) {
      while (i < sql.length && /\s/.test(sql[i])) i++;
      push('whitespace', start, i);
      continue;
    }

    if (ch === '#' || (ch === '-' && sql[i + 1] === '-' && (i + 2 >= sql.length || /\s/.test(sql[i + 2])))) {
      while (i < sql.length && sql[i] !== '\n') i++;
      push('comment', start, i);
      continue;
    }

    if (ch === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2);
      i = close === -1 ? sql.length : close + 2;
      push('comment', start, i);
      continue;
    }

    if (ch === '\'' || ch === '"' || ch === '`') {
      const quoted = readQuoted(sql, i, ch);
      i = quoted.end;
      tokens.push({
        type: ch === '`' ? 'identifier' : 'string',
        text: quoted.text,
        value: quoted.value,
        start,
        end: i,
      });
      continue;
    }

    // x'4D' and b'0101' literals
    if ((ch === 'x' || ch === 'X' || ch === 'b' || ch === 'B') && sql[i + 1] === '\'') {
      const quoted = readQuoted(sql, i + 1, '\'');
      i = quoted.end;
      push('literal', start, i);
      continue;
    }

    if (ch === '0' && (sql[i + 1] === 'x' || sql[i + 1] === 'b') && /[0-9A-Fa-f]/.test(sql[i + 2] ?? '')) {
      i += 2;
      while (i < sql.length && /[0-9A-Fa-f]/.test(sql[i])) i++;
      push('literal', start, i);
      continue;
    }

    if (DIGIT.test(ch) || (ch === '.' && DIGIT.test(sql[i + 1] ?? '') && !WORD_PART.test(sql[i - 1] ?? ' ') && sql[i - 1] !== '`')) {
      while (i < sql.length && DIGIT.test(sql[i])) i++;
      if (sql[i] === '.' && DIGIT.test(sql[i + 1] ?? '')) {
        i++;
        while (i < sql.length && DIGIT.test(sql[i])) i++;
      } else if (sql[i] === '.' && !WORD_START.test(sql[i + 1] ?? '')) {
        i++;
      }
      if ((sql[i] === 'e' || sql[i] === 'E') && /[-+0-9]/.test(sql[i + 1] ?? '')) {
        i += 2;
        while (i < sql.length && DIGIT.test(sql[i])) i++;
      }
      // 1abc is a word in MySQL
      if (WORD_START.test(sql[i] ?? '') && !/[eE]/.test(sql[i] ?? '')) {
        while (i < sql.length && WORD_PART.test(sql[i])) i++;
        push('word', start, i, sql.slice(start, i).toUpperCase());
        continue;
      }
      push('number', start, i);
      continue;
    }

    if (ch === '@') {
      i++;
      if (sql[i] === '@') i++;
      if (sql[i] === '`' || sql[i] === '\'' || sql[i] === '"') {
        i = readQuoted(sql, i, sql[i]).end;
      } else {
        while (i < sql.length && (WORD_PART.test(sql[i]) || sql[i] === '.')) i++;
      }
      push('variable', start, i);
      continue;
    }

    if (WORD_START.test(ch)) {
      while (i < sql.length && WORD_PART.test(sql[i])) i++;
      push('word', start, i, sql.slice(start, i).toUpperCase());
      continue;
    }

    if (PUNCTUATION.includes(ch)) {
      i++;
      push('punctuation', start, i);
      continue;
    }

    const operator = OPERATORS.find(op => sql.startsWith(op, i));
    if (operator) {
      i += operator.length;
      push('operator', start, i);
      continue;
    }

    if (SINGLE_OPERATORS.includes(ch)) {
      i++;
      push('operator', start, i);
      continue;
    }

    // anything else is kept as a one-character operator so offsets stay contiguous
    i++;
    push('operator', start, i);
  }

  return tokens;
}

/** Tokens that carry meaning (no whitespace, no comments). */
export const significantTokens = (tokens: Token[]): Token[] =>
  tokens.filter(token => token.type !== 'whitespace' && token.type !== 'comment');
