import { readFileSync } from 'node:fs';

/**
 * Clause keywords of a SELECT statement, in the order MySQL expects them.
 */
export const SELECT_CLAUSES = [
  'SELECT',
  'FROM',
  'PARTITION',
  'WHERE',
  'GROUP BY',
  'HAVING',
  'WINDOW',
  'ORDER BY',
  'LIMIT',
  'PROCEDURE',
  'INTO',
  'FOR UPDATE',
  'LOCK IN SHARE MODE',
] as const;

export type SelectClauseName = (typeof SELECT_CLAUSES)[number];

/**
 * Keywords that start a JOIN inside the FROM clause
 */
export const JOIN_KEYWORDS = {
  /** plain JOIN */
  JOIN: 'JOIN',
  /** INNER JOIN */
  INNER: 'INNER',
  /** CROSS JOIN */
  CROSS: 'CROSS',
  /** LEFT [OUTER] JOIN */
  LEFT: 'LEFT',
  /** RIGHT [OUTER] JOIN */
  RIGHT: 'RIGHT',
  /** NATURAL JOIN */
  NATURAL: 'NATURAL',
  /** STRAIGHT_JOIN */
  STRAIGHT_JOIN: 'STRAIGHT_JOIN',
  /** FULL [OUTER] JOIN */
  FULL: 'FULL',
} as const;

/**
 * SELECT options that may precede the expression list
 */
export const SELECT_OPTIONS = [
  'ALL',
  'DISTINCT',
  'DISTINCTROW',
  'HIGH_PRIORITY',
  'STRAIGHT_JOIN',
  'SQL_SMALL_RESULT',
  'SQL_BIG_RESULT',
  'SQL_BUFFER_RESULT',
  'SQL_CACHE',
  'SQL_NO_CACHE',
  'SQL_CALC_FOUND_ROWS',
  'MAX_STATEMENT_TIME',
] as const;

/**
 * Aggregate functions that make a result set non-editable
 */
export const AGGREGATE_FUNCTIONS = ['SUM', 'AVG', 'STD', 'STDDEV', 'MIN', 'MAX', 'BIT_OR', 'BIT_AND'] as const;

/**
 * Table maintenance statements
 */
export const MAINTENANCE_STATEMENTS = ['ANALYZE', 'CHECK', 'CHECKSUM', 'OPTIMIZE', 'REPAIR'] as const;

/**
 * Statements that change the schema and require the navigation to reload
 */
export const SCHEMA_STATEMENTS = ['ALTER', 'CREATE', 'DROP', 'RENAME', 'TRUNCATE'] as const;

/**
 * Statement kinds reported by the analyzer
 */
export const STATEMENT_TYPES = {
  SELECT: 'SELECT',
  SHOW: 'SHOW',
  EXPLAIN: 'EXPLAIN',
  CALL: 'CALL',
  INSERT: 'INSERT',
  REPLACE: 'REPLACE',
  UPDATE: 'UPDATE',
  DELETE: 'DELETE',
  ALTER: 'ALTER',
  CREATE: 'CREATE',
  DROP: 'DROP',
  RENAME: 'RENAME',
  TRUNCATE: 'TRUNCATE',
  ANALYZE: 'ANALYZE',
  CHECK: 'CHECK',
  CHECKSUM: 'CHECKSUM',
  OPTIMIZE: 'OPTIMIZE',
  REPAIR: 'REPAIR',
  SET: 'SET',
  USE: 'USE',
  OTHER: 'OTHER',
} as const;

export type StatementType = (typeof STATEMENT_TYPES)[keyof typeof STATEMENT_TYPES];

/**
 * Sort directions accepted in ORDER BY
 */
export const ORDER_DIRECTIONS = {
  /** Ascending order */
  ASC: 'ASC',
  /** Descending order */
  DESC: 'DESC',
} as const;

export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

const RESERVED_WORDS_FILE = new URL('../../../data/reserved-words.json', import.meta.url);

const readWordList = (file: URL): string[] => {
  const data: unknown = JSON.parse(readFileSync(file, 'utf8'));
  if (!Array.isArray(data) || !data.every((word): word is string => typeof word === 'string')) {
    throw new Error(`Word list ${file.pathname} must be an array of strings.`);
  }
  return data;
};

/**
 * Reserved words that can never be a bare alias or identifier
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set(readWordList(RESERVED_WORDS_FILE));
