import type { CacheProvider } from '../cache/cache-interfaces.js';
import { isSelectStatement } from '../core/ast/statement.js';
import type { DbExecutor } from '../core/execution/db-executor.js';
import { createQueryLoggingExecutor, type QueryLogger } from '../core/execution/query-logger.js';
import { buildStatement, getClause, replaceClause } from '../core/sql/clause-utils.js';
import { analyzeStatement, isJustBrowsing, type StatementInfo } from '../core/sql/statement-info.js';
import type { Settings } from '../config/settings.js';
import { TableCatalog } from '../database/catalog.js';
import { DatabaseInterface } from '../database/database-interface.js';
import type { FieldMetadata } from '../database/field-metadata.js';
import type { ResultSet } from '../database/result-set.js';
import { DELETE_LINK, DisplayParts } from '../display/display-parts.js';
import { Results, type DisplayRequest, type ResultsContext } from '../display/results.js';
import { Generator } from '../html/generator.js';
import { Message } from '../html/message.js';
import type { DisplaySession, DisplayTmpval } from '../session/display-session.js';
import { Relation } from '../storage/relation.js';
import type { RelationParameters } from '../storage/relation-parameters.js';
import { Template, type TemplateRegistry } from '../templates/template.js';
import { backquote } from '../utils/format.js';

/** One request to run a statement and render its result */
export interface SqlRequest {
  db: string;
  table: string;
  sqlQuery: string;
  goto?: string;
  server?: number;
  /** Remaining request parameters: display options, pos, session_max_rows, ... */
  params?: DisplayRequest;
}

export interface SqlQueryRunnerOptions {
  /** Lets accounts without access to mysql.user run DROP DATABASE */
  allowUserDropDatabase?: boolean;
}

export interface CreateSqlQueryRunnerOptions extends SqlQueryRunnerOptions {
  executor: DbExecutor;
  settings: Settings;
  session: DisplaySession;
  /** Configuration storage backend */
  store: CacheProvider;
  relationParameters?: RelationParameters;
  queryLogger?: QueryLogger;
  templates?: Partial<TemplateRegistry>;
}

const readErrorText = (error: unknown): string => {
  if (!(error instanceof Error)) return String(error);
  const errno = 'errno' in error ? error.errno : undefined;
  const sqlMessage = 'sqlMessage' in error ? error.sqlMessage : undefined;
  if (typeof errno === 'number' && typeof sqlMessage === 'string') return `#${errno} - ${sqlMessage}`;
  return error.message;
};

/**
 * Whether every column with a table comes from the same one, and at least
 * one column has a table.
 */
export function resultSetHasJustOneTable(fields: FieldMetadata[]): boolean {
  let previousTable = '';
  let justOneTable = true;
  for (const field of fields) {
    if (field.table !== '' && previousTable !== '' && field.table !== previousTable) justOneTable = false;
    if (field.table !== '') previousTable = field.table;
  }
  return justOneTable && previousTable !== '';
}

/** Sorting is remembered for plain `SELECT * FROM table` browses */
export function isRememberSortingOrder(info: StatementInfo, settings: Pick<Settings, 'RememberSorting'>): boolean {
  return settings.RememberSorting
    && !(info.isCount || info.isExport || info.isFunc || info.isAnalyse)
    && info.selectFrom
    && (info.selectExpressions.length === 0
      || (info.selectExpressions.length === 1 && info.selectExpressions[0] === '*'))
    && info.selectTables.length === 1;
}

/** Statements that remove a column or table, whose transformations must go too */
export function isDeleteTransformationInfo(info: StatementInfo): boolean {
  const statement = info.statement;
  if (statement === null || isSelectStatement(statement)) return false;
  if (statement.kind === 'ALTER') return statement.alterations.some(operation => operation.action === 'DROP');
  return statement.kind === 'DROP' && statement.words.includes('TABLE');
}

export function hasNoRightsToDropDatabase(info: StatementInfo, allowUserDropDatabase: boolean, isSuperUser: boolean): boolean {
  return !allowUserDropDatabase && info.dropDatabase && !isSuperUser;
}

/**
 * Runs a statement the way the SQL page does: remembered sorting, paging
 * LIMIT, row counting and editability, then renders the grid.
 */
export class SqlQueryRunner {
  constructor(
    private readonly context: ResultsContext,
    private readonly options: SqlQueryRunnerOptions = {}
  ) {}

  /** Wires the database, catalog, storage and markup helpers around an executor */
  static create(options: CreateSqlQueryRunnerOptions): SqlQueryRunner {
    const executor = createQueryLoggingExecutor(options.executor, options.queryLogger);
    const { settings } = options;
    const dbi = new DatabaseInterface(executor, { isAmazonRds: settings.isAmazonRds });
    const catalog = new TableCatalog(dbi, settings);
    const relation = new Relation(catalog, options.store, options.relationParameters);
    const generator = new Generator({
      basePath: settings.basePath,
      linkLengthLimit: settings.LinkLengthLimit,
      actionLinksMode: settings.RowActionType,
    });
    const template = new Template({ generator }, options.templates);
    return new SqlQueryRunner(
      { dbi, catalog, relation, template, generator, settings, session: options.session },
      { allowUserDropDatabase: options.allowUserDropDatabase }
    );
  }

  private get tmpval(): DisplayTmpval {
    return this.context.session.tmpval;
  }

  /** A LIMIT is added to SELECTs without one unless all rows are shown */
  isAppendLimitClause(info: StatementInfo): boolean {
    return this.tmpval.max_rows !== 'all'
      && !(info.isExport || info.isAnalyse)
      && (info.selectFrom || info.isSubquery)
      && !info.limit;
  }

  getSqlWithLimitClause(info: StatementInfo): string {
    if (!isSelectStatement(info.statement)) return info.sql;
    const maxRows = this.tmpval.max_rows;
    return replaceClause(info.statement, 'LIMIT', `LIMIT ${this.tmpval.pos}, ${maxRows}`);
  }

  /**
   * Adds the remembered sort column to a statement without ORDER BY, or
   * remembers the ORDER BY of one that has it. Returns the statement to run.
   */
  async handleSortOrder(db: string, table: string, info: StatementInfo): Promise<StatementInfo> {
    const statement = info.statement;
    if (!isSelectStatement(statement)) return info;
    const { relation } = this.context;

    if (!info.order) {
      const sortedColumn = await relation.getUiProp(db, table, 'sorted_col');
      if (sortedColumn === false || sortedColumn === '') return info;
      const column = sortedColumn.replaceAll(`${backquote(table)}.`, '');
      return analyzeStatement(replaceClause(statement, 'ORDER BY', `ORDER BY ${column}`));
    }

    await relation.setUiProp(db, table, 'sorted_col', getClause(statement, 'ORDER BY'));
    return info;
  }

  /**
   * Rows the statement would return without the paging LIMIT.
   */
  async countQueryResults(numRows: number, justBrowsing: boolean, db: string, table: string, info: StatementInfo): Promise<number> {
    if (!this.isAppendLimitClause(info)) return numRows;

    const maxRows = this.tmpval.max_rows;
    if (typeof maxRows === 'number' && numRows < maxRows) {
      // last page reached
      return this.tmpval.pos + numRows;
    }

    if (info.queryType !== 'SELECT' && !info.isSubquery) return numRows;

    const { catalog, dbi, settings } = this.context;
    if (justBrowsing && db !== '' && table !== '') {
      const approximate = await catalog.countRecords(db, table);
      return approximate < settings.MaxExactCount ? catalog.countRecords(db, table, true) : approximate;
    }

    if (!isSelectStatement(info.statement)) return numRows;
    const inner = buildStatement(info.statement, { 'ORDER BY': '', LIMIT: '' });
    const count = await dbi.fetchValue(`SELECT COUNT(*) FROM (${inner} ) as cnt`);
    if (count === false || count === null) return 0;
    const parsed = Number(typeof count === 'string' ? count : count.toString('utf8'));
    return Number.isFinite(parsed) ? parsed : 0;
  }

  /** Whether some unique index of the table is fully present in the result */
  async resultSetContainsUniqueKey(db: string, table: string, fields: FieldMetadata[]): Promise<boolean> {
    if (db === '' || table === '') return false;
    const names = new Set(fields.map(field => field.name));
    const indexes = await this.context.catalog.getIndexes(db, table);
    return indexes.some(index => index.unique && index.columns.every(column => names.has(column)));
  }

  private getErrorResponse(error: unknown, sqlQuery: string): string {
    const message = Message.rawText(`MySQL said: ${readErrorText(error)}`, 'error');
    return this.context.generator.getMessage(message, sqlQuery, 'error');
  }

  private queryTookText(seconds: number): string {
    return ` (Query took ${seconds.toFixed(4)} seconds.)`;
  }

  private async clearTransformations(db: string, table: string, info: StatementInfo): Promise<void> {
    const statement = info.statement;
    const { relation } = this.context;
    if (statement === null || isSelectStatement(statement) || !relation.parameters.features.browserTransformation) return;
    const targetTable = statement.table ?? table;
    const targetDb = statement.database ?? db;
    if (statement.kind === 'ALTER') {
      for (const operation of statement.alterations) {
        if (operation.action === 'DROP' && operation.column !== undefined) {
          await relation.clearMime(targetDb, targetTable, operation.column);
        }
      }
      return;
    }
    await relation.clearMime(targetDb, targetTable);
  }

  /**
   * Executes `request.sqlQuery` and returns the HTML fragment: the grid, or
   * a message for statements without rows and for database errors.
   */
  async executeQueryAndGetResponse(request: SqlRequest): Promise<string> {
    const { dbi, catalog, generator, settings } = this.context;
    const params = request.params ?? {};
    let db = request.db;
    let table = request.table;
    let info = analyzeStatement(request.sqlQuery);

    const [firstTable] = info.selectTables;
    if (info.selectTables.length === 1 && firstTable !== undefined) {
      table = firstTable[0];
      db = firstTable[1] ?? db;
    }

    if (hasNoRightsToDropDatabase(info, this.options.allowUserDropDatabase ?? false, await dbi.isSuperUser())) {
      return generator.getMessage(
        Message.error('"DROP DATABASE" statements are disabled.'),
        request.sqlQuery,
        'error'
      );
    }

    if (params.discard_remembered_sort !== undefined && db !== '' && table !== '') {
      await this.context.relation.removeUiProp(db, table, 'sorted_col');
    }
    if (isRememberSortingOrder(info, settings)) {
      info = await this.handleSortOrder(db, table, info);
    }

    const sqlQuery = info.sql;
    const results = new Results(this.context, {
      db,
      table,
      server: request.server ?? 1,
      goto: request.goto ?? '',
      sqlQuery,
    });
    results.setConfigParamsForDisplayTable(info, params);

    const executedQuery = this.isAppendLimitClause(info) ? this.getSqlWithLimitClause(info) : sqlQuery;

    let result: ResultSet;
    const started = performance.now();
    try {
      result = await dbi.query(executedQuery);
    } catch (error) {
      return this.getErrorResponse(error, sqlQuery);
    }
    const queryTime = (performance.now() - started) / 1000;

    if (isDeleteTransformationInfo(info)) {
      await this.clearTransformations(db, table, info);
    }

    if (result.numFields() === 0) {
      const affected = result.affectedRows ?? 0;
      const message = Message.success(affected === 1 ? '%s row affected.' : '%s rows affected.')
        .addParam(affected)
        .addText(this.queryTookText(queryTime), '');
      return generator.getMessage(message, sqlQuery, 'success');
    }

    const numRows = result.numRows();
    if (numRows === 0) {
      const message = Message.success('MySQL returned an empty result set (i.e. zero rows).')
        .addText(this.queryTookText(queryTime), '');
      return generator.getMessage(message, sqlQuery, 'success');
    }

    const justBrowsing = isJustBrowsing(info, params.find_real_end !== undefined);
    const unlimNumRows = await this.countQueryResults(numRows, justBrowsing, db, table, info);

    const fields = result.fields;
    this.tmpval.possible_as_geometry = fields.some(field => field.isMappedTypeGeometry);

    const justOneTable = resultSetHasJustOneTable(fields);
    const hasUniqueKey = await this.resultSetContainsUniqueKey(db, table, fields);
    const updatableView = db !== '' && table !== ''
      && (await catalog.isView(db, table))
      && (await catalog.isUpdatableView(db, table));
    const editable = (hasUniqueKey || settings.RowActionLinksWithoutUnique || updatableView) && justOneTable;

    const displayParts = editable
      ? DisplayParts.fromArray({
        hasEditLink: true,
        deleteLink: DELETE_LINK.DELETE_ROW,
        hasSortLink: true,
        hasNavigationBar: true,
        hasBookmarkForm: true,
        hasTextButton: false,
        hasPrintLink: true,
      })
      : DisplayParts.fromArray({
        hasSortLink: true,
        hasNavigationBar: true,
        hasBookmarkForm: true,
        hasTextButton: true,
        hasPrintLink: true,
      });

    results.setProperties({
      unlimNumRows,
      fieldsMeta: fields,
      isCount: info.isCount,
      isExport: info.isExport,
      isFunc: info.isFunc,
      isAnalyse: info.isAnalyse,
      numRows,
      queryTime,
      textDir: 'ltr',
      isMaint: info.isMaint,
      isExplain: info.isExplain,
      isShow: info.isShow,
      showTable: db !== '' && table !== '' ? await catalog.getStatus(db, table) : null,
      printView: params.printview === '1',
      editable,
      isBrowseDistinct: params.is_browse_distinct === '1',
    });

    return results.getTable(result, displayParts, info);
  }
}
