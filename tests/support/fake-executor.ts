import type { CellValue, ColumnDefinition, DbExecutor, QueryResult } from '../../src/core/execution/db-executor.js';

type Matcher = string | RegExp;
type Responder = QueryResult | Error | ((sql: string, params: unknown[]) => QueryResult);

interface Route {
  matcher: Matcher;
  responder: Responder;
}

export interface ExecutedStatement {
  sql: string;
  params: unknown[];
}

/** Collapses whitespace so multi-line catalog queries match one-line patterns */
export const normalizeSql = (sql: string): string => sql.replace(/\s+/g, ' ').trim();

/** Result set in the executor's canonical shape */
export const resultOf = (columns: string[], values: CellValue[][], fields?: ColumnDefinition[]): QueryResult => ({
  columns,
  values,
  fields,
});

/**
 * In-process stand-in for MySQL: answers statements from registered routes
 * (first match wins; a string matches as a substring of the normalized SQL)
 * and records everything it runs. Unmatched statements get an empty result.
 */
export class FakeExecutor implements DbExecutor {
  readonly executed: ExecutedStatement[] = [];
  private readonly routes: Route[] = [];

  on(matcher: Matcher, responder: Responder): this {
    this.routes.push({ matcher, responder });
    return this;
  }

  /** Normalized SQL of every statement run, in order */
  get statements(): string[] {
    return this.executed.map(statement => normalizeSql(statement.sql));
  }

  async executeSql(sql: string, params: unknown[] = []): Promise<QueryResult[]> {
    this.executed.push({ sql, params });
    const normalized = normalizeSql(sql);
    const route = this.routes.find(({ matcher }) =>
      typeof matcher === 'string' ? normalized.includes(matcher) : matcher.test(normalized)
    );
    if (!route) return [resultOf([], [])];
    const { responder } = route;
    if (responder instanceof Error) throw responder;
    return [typeof responder === 'function' ? responder(normalized, params) : responder];
  }
}

export interface TableStatusFixture {
  db: string;
  table: string;
  type?: string;
  engine?: string;
  rows?: number | null;
  createTime?: string | null;
}

/** Answers information_schema.tables lookups for the given tables */
export const tableStatusResponder = (tables: TableStatusFixture[]) =>
  (_sql: string, params: unknown[]): QueryResult => {
    const columns = ['table_name', 'table_type', 'engine', 'table_rows', 'create_time'];
    const found = tables.find(table => table.db === params[0] && table.table === params[1]);
    if (!found) return resultOf(columns, []);
    return resultOf(columns, [[
      found.table,
      found.type ?? 'BASE TABLE',
      found.engine ?? 'InnoDB',
      found.rows === undefined || found.rows === null ? null : String(found.rows),
      found.createTime ?? null,
    ]]);
  };

export const TABLE_STATUS_QUERY = 'FROM information_schema.tables';
export const FIRST_CHAR_COLUMN_QUERY = 'AND data_type IN';
export const COLUMN_NAMES_QUERY = 'SELECT column_name FROM information_schema.columns';
export const COLUMN_COMMENTS_QUERY = 'SELECT column_name, column_comment FROM information_schema.columns';
export const INDEXES_QUERY = 'FROM information_schema.statistics';
export const FOREIGN_KEYS_QUERY = 'FROM information_schema.key_column_usage';
