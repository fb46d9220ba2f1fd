import type { CellValue, DbExecutor, QueryResult } from '../core/execution/db-executor.js';
import { MySqlDialect } from '../core/dialect/mysql/index.js';
import { ResultSet } from './result-set.js';

export type RowRecord = Record<string, CellValue>;

export const toRows = (result: QueryResult | undefined): RowRecord[] => {
  if (!result) return [];
  return result.values.map(row =>
    result.columns.reduce<RowRecord>((acc, col, idx) => {
      acc[col] = row[idx] ?? null;
      return acc;
    }, {})
  );
};

export const queryRows = async (
  executor: DbExecutor,
  sql: string,
  params: unknown[] = []
): Promise<RowRecord[]> => {
  const [first] = await executor.executeSql(sql, params);
  return toRows(first);
};

/** Cell as text; binary cells are decoded as UTF-8 */
export const cellText = (value: CellValue | undefined): string | null => {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : value.toString('utf8');
};

/**
 * Thin access layer over an executor: buffered results, scalar reads and quoting.
 */
export class DatabaseInterface {
  readonly dialect: MySqlDialect;

  constructor(
    readonly executor: DbExecutor,
    options: { isAmazonRds?: boolean } = {}
  ) {
    this.dialect = new MySqlDialect(options.isAmazonRds ?? false);
  }

  async query(sql: string, params?: unknown[]): Promise<ResultSet> {
    const [first] = await this.executor.executeSql(sql, params);
    return new ResultSet(first ?? { columns: [], values: [] });
  }

  /** First column of the first row; false when there is no row */
  async fetchValue(sql: string, params?: unknown[]): Promise<CellValue | false> {
    const [first] = await this.executor.executeSql(sql, params);
    const row = first?.values[0];
    if (!row) return false;
    return row[0] ?? null;
  }

  fetchRows(sql: string, params?: unknown[]): Promise<RowRecord[]> {
    return queryRows(this.executor, sql, params);
  }

  quoteString(value: string): string {
    return this.dialect.quoteString(value);
  }

  backquote(identifier: string): string {
    return this.dialect.quoteIdentifier(identifier);
  }

  /** Whether the current account can read mysql.user */
  async isSuperUser(): Promise<boolean> {
    try {
      await this.executor.executeSql('SELECT 1 FROM mysql.user LIMIT 1');
      return true;
    } catch {
      return false;
    }
  }

  getKillQuery(processId: number): string {
    return this.dialect.getKillQuery(processId);
  }
}
