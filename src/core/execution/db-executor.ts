// src/core/execution/db-executor.ts

/**
 * Raw column definition as reported by the driver for a result set.
 * Only the fields the grid reads are listed; drivers may carry more.
 */
export interface ColumnDefinition {
  name: string;
  orgName?: string;
  table?: string;
  orgTable?: string;
  db?: string;
  /** MySQL protocol column type code */
  columnType?: number;
  /** Column flags bitmask */
  flags?: number;
  decimals?: number;
  columnLength?: number;
  characterSet?: number;
}

/** Cell value as it leaves an executor: text, raw bytes or NULL. */
export type CellValue = string | Buffer | null;

// low-level canonical shape
export type QueryResult = {
  columns: string[];
  values: CellValue[][];
  /** present for statements that return a result set */
  fields?: ColumnDefinition[];
  /** present for statements that only report a row count */
  affectedRows?: number;
};

export interface DbExecutor {
  executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]>;
  dispose?(): Promise<void>;
}

// --- helpers ---

const pad = (value: number, size = 2): string => String(value).padStart(size, '0');

const formatDate = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Normalises a driver value into the text/bytes/NULL shape the grid renders.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (Buffer.isBuffer(value)) return value;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return typeof value === 'boolean' ? (value ? '1' : '0') : value.toString();
  }
  if (value instanceof Date) return formatDate(value);
  if (value instanceof Uint8Array) return Buffer.from(value);
  return JSON.stringify(value);
}
