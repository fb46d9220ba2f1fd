import { parseStatement } from './statement-parser.js';
import { AGGREGATE_FUNCTIONS, MAINTENANCE_STATEMENTS, SCHEMA_STATEMENTS, type StatementType } from './sql.js';
import { isSelectStatement, type ParseError, type StatementNode } from '../ast/statement.js';

/**
 * What the renderer and the runner need to know about a statement.
 */
export interface StatementInfo {
  sql: string;
  statement: StatementNode | null;
  parseErrors: ParseError[];
  queryType: StatementType | null;
  isSelect: boolean;
  selectFrom: boolean;
  distinct: boolean;
  isGroup: boolean;
  group: boolean;
  having: boolean;
  isCount: boolean;
  isFunc: boolean;
  isSubquery: boolean;
  isAnalyse: boolean;
  isExport: boolean;
  isExplain: boolean;
  isShow: boolean;
  isMaint: boolean;
  isProcedure: boolean;
  isAffected: boolean;
  isDelete: boolean;
  isInsert: boolean;
  isReplace: boolean;
  join: boolean;
  union: boolean;
  limit: boolean;
  order: boolean;
  offset: boolean;
  reload: boolean;
  dropDatabase: boolean;
  /** [table, database] pairs of FROM and JOIN */
  selectTables: [string, string | null][];
  /** select list expressions as written */
  selectExpressions: string[];
}

const AGGREGATES = new Set<string>(AGGREGATE_FUNCTIONS);
const MAINTENANCE = new Set<string>(MAINTENANCE_STATEMENTS);
const SCHEMA = new Set<string>(SCHEMA_STATEMENTS);

const emptyInfo = (sql: string, parseErrors: ParseError[]): StatementInfo => ({
  sql,
  statement: null,
  parseErrors,
  queryType: null,
  isSelect: false,
  selectFrom: false,
  distinct: false,
  isGroup: false,
  group: false,
  having: false,
  isCount: false,
  isFunc: false,
  isSubquery: false,
  isAnalyse: false,
  isExport: false,
  isExplain: false,
  isShow: false,
  isMaint: false,
  isProcedure: false,
  isAffected: false,
  isDelete: false,
  isInsert: false,
  isReplace: false,
  join: false,
  union: false,
  limit: false,
  order: false,
  offset: false,
  reload: false,
  dropDatabase: false,
  selectTables: [],
  selectExpressions: [],
});

/**
 * Parses `sql` and derives the statement flags.
 */
export function analyzeStatement(sql: string): StatementInfo {
  const { statement, errors } = parseStatement(sql);
  const info = emptyInfo(sql, errors);
  if (!statement) return info;
  info.statement = statement;

  if (!isSelectStatement(statement)) {
    const kind = statement.kind;
    info.queryType = kind;
    info.isExplain = kind === 'EXPLAIN';
    info.isShow = kind === 'SHOW';
    info.isMaint = MAINTENANCE.has(kind);
    info.isProcedure = kind === 'CALL';
    info.isDelete = kind === 'DELETE';
    info.isInsert = kind === 'INSERT';
    info.isReplace = kind === 'REPLACE';
    info.isAffected = ['INSERT', 'REPLACE', 'UPDATE', 'DELETE'].includes(kind);
    info.reload = SCHEMA.has(kind) || kind === 'USE';
    info.dropDatabase = kind === 'DROP' && statement.words.some(word => word === 'DATABASE' || word === 'SCHEMA');
    return info;
  }

  info.queryType = 'SELECT';
  info.isSelect = true;
  info.selectFrom = statement.from.length > 0;
  info.distinct = statement.options.includes('DISTINCT') || statement.options.includes('DISTINCTROW');
  info.group = statement.groupBy.length > 0;
  info.having = statement.having.length > 0;
  info.isGroup = info.group || info.having;
  info.join = statement.joins.length > 0;
  info.union = statement.unions.length > 0;
  info.limit = statement.limit !== undefined;
  info.offset = (statement.limit?.offset ?? 0) > 0;
  info.order = statement.orderBy.length > 0;
  info.isAnalyse = statement.procedure?.name === 'ANALYSE';
  info.isProcedure = statement.procedure !== undefined;
  info.isExport = statement.into?.kind === 'OUTFILE';

  for (const expression of statement.expressions) {
    if (expression.function === 'COUNT') info.isCount = true;
    else if (expression.function !== undefined && AGGREGATES.has(expression.function)) info.isFunc = true;
    if (expression.subquery !== undefined) info.isSubquery = true;
  }

  const tables = [...statement.from, ...statement.joins.map(join => join.table)];
  for (const reference of tables) {
    if (reference.subquery) info.isSubquery = true;
    if (reference.table === undefined) continue;
    const pair: [string, string | null] = [reference.table, reference.database ?? null];
    if (!info.selectTables.some(([table, db]) => table === pair[0] && db === pair[1])) {
      info.selectTables.push(pair);
    }
  }
  info.selectExpressions = statement.expressions.map(expression => expression.expr);
  return info;
}

/**
 * Whether the statement only pages through one table: no grouping,
 * aggregate, union or DISTINCT, and no WHERE beyond `WHERE 1`.
 * A requested exact end count rules it out.
 */
export function isJustBrowsing(info: StatementInfo, findRealEnd = false): boolean {
  const statement = info.statement;
  if (!isSelectStatement(statement) || findRealEnd) return false;
  const where = statement.where;
  return !info.isGroup
    && !info.isFunc
    && !info.union
    && !info.distinct
    && info.selectFrom
    && statement.from.length <= 1
    && (where.length === 0 || (where.length === 1 && where[0]?.expr === '1'));
}
