// src/core/execution/executors/mysql-executor.ts
import type { Pool } from 'mysql2/promise';
import {
  CellValue,
  ColumnDefinition,
  DbExecutor,
  QueryResult,
  toCellValue
} from '../db-executor.js';

/**
 * Options passed with every statement; mysql2 accepts them per query.
 */
export interface MysqlQueryOptions {
  sql: string;
  rowsAsArray: boolean;
  dateStrings: boolean;
  supportBigNumbers: boolean;
  bigNumberStrings: boolean;
}

export interface MysqlClientLike {
  query(
    options: MysqlQueryOptions,
    params?: unknown[]
  ): Promise<[unknown, unknown?]>; // rows, metadata
  release?(): void;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const readString = (source: Record<string, unknown>, key: string): string | undefined => {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
};

const readNumber = (source: Record<string, unknown>, key: string): number | undefined => {
  const value = source[key];
  return typeof value === 'number' ? value : undefined;
};

/**
 * Copies the column definition fields the grid reads out of a mysql2 FieldPacket.
 */
export const toColumnDefinition = (field: unknown): ColumnDefinition => {
  if (!isRecord(field)) {
    throw new Error('Unexpected column metadata returned by the MySQL driver');
  }
  return {
    name: readString(field, 'name') ?? '',
    orgName: readString(field, 'orgName'),
    table: readString(field, 'table'),
    orgTable: readString(field, 'orgTable'),
    db: readString(field, 'db') ?? readString(field, 'schema'),
    columnType: readNumber(field, 'columnType') ?? readNumber(field, 'type'),
    flags: readNumber(field, 'flags'),
    decimals: readNumber(field, 'decimals'),
    columnLength: readNumber(field, 'columnLength') ?? readNumber(field, 'length'),
    characterSet: readNumber(field, 'characterSet') ?? readNumber(field, 'charsetNr'),
  };
};

const toRow = (row: unknown): CellValue[] =>
  Array.isArray(row) ? row.map(toCellValue) : [];

const toResult = (rows: unknown[], metadata: unknown[]): QueryResult => {
  const fields = metadata.map(toColumnDefinition);
  return {
    columns: fields.map(field => field.name),
    values: rows.map(toRow),
    fields,
  };
};

export function createMysqlExecutor(
  client: MysqlClientLike
): DbExecutor {
  return {
    async executeSql(sql, params) {
      const [rows, metadata] = await client.query(
        {
          sql,
          rowsAsArray: true,
          dateStrings: true,
          supportBigNumbers: true,
          bigNumberStrings: true,
        },
        params
      );

      if (!Array.isArray(rows)) {
        // e.g. insert/update returning only a result header
        const affectedRows = isRecord(rows) ? readNumber(rows, 'affectedRows') : undefined;
        return [{ columns: [], values: [], affectedRows }];
      }

      // CALL answers with one [rows, fields] pair per result set plus a trailing header
      if (Array.isArray(metadata) && Array.isArray(metadata[0])) {
        const results: QueryResult[] = [];
        metadata.forEach((fields, index) => {
          const set: unknown = rows[index];
          if (Array.isArray(fields) && Array.isArray(set)) results.push(toResult(set, fields));
        });
        return results;
      }

      return [toResult(rows, Array.isArray(metadata) ? metadata : [])];
    },
    async dispose() {
      // Pool leases are handed back; plain connections stay owned by the caller.
      client.release?.();
    },
  };
}

/**
 * Executor over a mysql2 promise pool. The pool should be created with
 * `dateStrings`, `supportBigNumbers` and `bigNumberStrings` enabled so cells
 * arrive as text; the pool itself is left open on dispose.
 */
export function createMysqlPoolExecutor(pool: Pool): DbExecutor {
  return createMysqlExecutor({
    async query(options, params) {
      const [rows, fields] = await pool.query(options, params);
      return [rows, fields];
    },
  });
}
