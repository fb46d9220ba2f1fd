import { createHash, randomInt } from 'node:crypto';
import { isUtf8 } from 'node:buffer';
import type { CellValue } from '../core/execution/db-executor.js';
import { isSelectStatement, type SelectStatementNode } from '../core/ast/statement.js';
import { getClause, replaceClause, buildStatement } from '../core/sql/clause-utils.js';
import { parseStatement } from '../core/sql/statement-parser.js';
import { isJustBrowsing, type StatementInfo } from '../core/sql/statement-info.js';
import type { Settings } from '../config/settings.js';
import type { TableCatalog, TableStatus } from '../database/catalog.js';
import type { DatabaseInterface } from '../database/database-interface.js';
import type { FieldMetadata } from '../database/field-metadata.js';
import type { ResultSet, Row } from '../database/result-set.js';
import { wkbHexWithoutSrid, wkbToWkt } from '../gis/wkb.js';
import { escapeHtml, mimeDefaultFunction, stripTags } from '../html/escape.js';
import type { Generator } from '../html/generator.js';
import { Message } from '../html/message.js';
import type { UrlParams } from '../html/url.js';
import type { DisplaySession, DisplayTmpval, GeometryDisplay, MaxRows, QueryMemory } from '../session/display-session.js';
import { MAX_REMEMBERED_QUERIES } from '../session/display-session.js';
import type { Relation } from '../storage/relation.js';
import type { Template } from '../templates/template.js';
import type {
  ColumnOrderData,
  GridEditConfig,
  HeaderColumn,
  NavigationData,
  OptionsBlockData,
  ResultsOperationsData,
  RowActionLink,
  SortByKeyData,
  TableHeadersData,
} from '../templates/types.js';
import { TransformationFactory } from '../transformations/transformation-factory.js';
import { emptyTransformOptions, type TransformationsPlugin, type TransformOptions } from '../transformations/transformations-plugin.js';
import {
  getDefaultTransformationInfo,
  getOptions,
  type ColumnMime,
  type DefaultTransformationInfo,
} from '../transformations/transformations.js';
import { getSpecialSchemaLinks } from '../transformations/special-schema-links.js';
import {
  backquote,
  bitCellValue,
  formatByteDown,
  formatNumber,
  printableBitValue,
  unQuote,
} from '../utils/format.js';
import { pageSelector } from '../utils/page-selector.js';
import { signSqlQuery } from '../utils/signing.js';
import { getUniqueCondition, type UniqueConditionContext } from '../utils/unique-condition.js';
import { DELETE_LINK, DisplayParts, type DeleteLinkMode } from './display-parts.js';
import type { ForeignKeyMap } from './foreign-key-related-table.js';

export interface ResultsContext {
  dbi: DatabaseInterface;
  catalog: TableCatalog;
  relation: Relation;
  template: Template;
  generator: Generator;
  settings: Settings;
  session: DisplaySession;
}

/** Where the result comes from and where its links lead back to */
export interface ResultsTarget {
  db: string;
  table: string;
  server: number;
  goto: string;
  sqlQuery: string;
}

/** Facts about the executed statement and its result */
export interface ResultProperties {
  unlimNumRows: number;
  fieldsMeta: FieldMetadata[];
  isCount: boolean;
  isExport: boolean;
  isFunc: boolean;
  isAnalyse: boolean;
  numRows: number;
  /** Seconds */
  queryTime: number;
  textDir: string;
  isMaint: boolean;
  isExplain: boolean;
  isShow: boolean;
  showTable: TableStatus | null;
  printView: boolean;
  editable: boolean;
  isBrowseDistinct: boolean;
}

/** Request parameters read by the display options */
export type DisplayRequest = Readonly<Record<string, string | undefined>>;

/** [is truncated, shown text, original length in characters] */
export type PartialText = [boolean, string, number];

const SHOW_STATEMENT = /^SHOW\s+(VARIABLES|(FULL\s+)?PROCESSLIST|STATUS|TABLE|GRANTS|CREATE|LOGS|DATABASES|FIELDS)/i;
const TRAILING_CLAUSES = /(.*)(\s(LIMIT (.*)|PROCEDURE (.*)|FOR UPDATE|LOCK IN SHARE MODE))/is;
const CONTROL_CHARACTERS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x80-\x9F]/u;
const POSITION_LEFT = 'left';
const POSITION_RIGHT = 'right';
const POSITION_BOTH = 'both';
const POSITION_NONE = 'none';
const ROWS_PER_PAGE_DEFAULT = 25;
const GEOMETRY_DISPLAY_OPTIONS: GeometryDisplay[] = ['GEOM', 'WKT', 'WKB'];

const cellText = (value: string | Buffer): string => (typeof value === 'string' ? value : value.toString('utf8'));

const cellBytes = (value: string | Buffer): Buffer => (typeof value === 'string' ? Buffer.from(value, 'utf8') : value);

const isEmptyCell = (value: string | Buffer): boolean => value.length === 0;

const isNumericString = (value: string): boolean => value.trim() !== '' && Number.isFinite(Number(value));

const trimBackticks = (value: string): string => value.replace(/^`+|`+$/g, '');

const DEFAULT_PROPERTIES: ResultProperties = {
  unlimNumRows: 0,
  fieldsMeta: [],
  isCount: false,
  isExport: false,
  isFunc: false,
  isAnalyse: false,
  numRows: 0,
  queryTime: 0,
  textDir: 'ltr',
  isMaint: false,
  isExplain: false,
  isShow: false,
  showTable: null,
  printView: false,
  editable: false,
  isBrowseDistinct: false,
};

interface DisplayParams {
  emptypre: number;
  emptyafter: number;
  desc: string[];
}

interface CellContext {
  condition: boolean;
  meta: FieldMetadata;
  map: ForeignKeyMap;
  info: StatementInfo;
  plugin: TransformationsPlugin | null;
  options: TransformOptions;
  urlParams: UrlParams;
}

/**
 * Renders a query result as the HTML grid: navigation, sortable headers,
 * row action links, transformed cell values and the operations block.
 * One instance serves one request; display options live in the session.
 */
export class Results {
  private properties: ResultProperties = { ...DEFAULT_PROPERTIES };
  private readonly uniqueId = randomInt(0, 1_000_000);
  private readonly transformationInfo: DefaultTransformationInfo;
  private db: string;
  private table: string;
  private readonly server: number;
  private readonly goto: string;
  private readonly sqlQuery: string;

  private highlightColumns = new Set<string>();
  private displayParams: DisplayParams = { emptypre: 0, emptyafter: 0, desc: [] };
  private mimeMap: Record<string, ColumnMime> = {};
  private whereClauseMap: Record<number, Record<string, string>> = {};
  private columnParams: Promise<[number[] | false, number[] | false]> | null = null;

  constructor(
    private readonly context: ResultsContext,
    target: ResultsTarget
  ) {
    this.db = target.db;
    this.table = target.table;
    this.server = target.server;
    this.goto = target.goto;
    this.sqlQuery = target.sqlQuery;
    const { parameters } = context.relation;
    this.transformationInfo = getDefaultTransformationInfo(parameters.db, parameters.tables);
  }

  private get settings(): Settings {
    return this.context.settings;
  }

  private get generator(): Generator {
    return this.context.generator;
  }

  private get tmpval(): DisplayTmpval {
    return this.context.session.tmpval;
  }

  private sign(value: string): string {
    return signSqlQuery(value, this.settings.secret);
  }

  private uniqueContext(): UniqueConditionContext {
    return {
      quoteString: value => this.context.dbi.quoteString(value),
      isView: table => this.context.catalog.isView(this.db, table),
    };
  }

  private async isView(): Promise<boolean> {
    if (this.db === '' || this.table === '') return false;
    return this.context.catalog.isView(this.db, this.table);
  }

  setProperties(properties: Partial<ResultProperties>): void {
    this.properties = { ...this.properties, ...properties };
  }

  /**
   * Merges the request's display options into the options remembered for
   * this query and makes them the current ones.
   */
  setConfigParamsForDisplayTable(info: StatementInfo, request: DisplayRequest): void {
    const key = createHash('md5').update(`${this.server}${this.db}${this.sqlQuery}`).digest('hex');
    const memory: Partial<QueryMemory> = { ...this.tmpval.query[key] };
    memory.sql = this.sqlQuery;

    if (memory.repeat_cells === undefined) memory.repeat_cells = this.settings.RepeatCells;

    const sessionMaxRows = request.session_max_rows;
    if (sessionMaxRows !== undefined && isNumericString(sessionMaxRows)) {
      memory.max_rows = Math.max(0, Math.trunc(Number(sessionMaxRows)));
    } else if (sessionMaxRows === 'all') {
      memory.max_rows = 'all';
    } else if (memory.max_rows === undefined) {
      memory.max_rows = this.settings.MaxRows;
    }

    const pos = request.pos;
    if (pos !== undefined && isNumericString(pos)) {
      memory.pos = Math.max(0, Math.trunc(Number(pos)));
    } else if (memory.pos === undefined) {
      memory.pos = 0;
    }

    const pftext = request.pftext;
    if (pftext === 'P' || pftext === 'F') {
      memory.pftext = pftext;
    } else if (info.isExplain) {
      memory.pftext = 'F';
    } else if (memory.pftext === undefined) {
      memory.pftext = 'P';
    }

    const relationalDisplay = request.relational_display;
    if (relationalDisplay === 'K' || relationalDisplay === 'D') {
      memory.relational_display = relationalDisplay;
    } else if (memory.relational_display === undefined) {
      memory.relational_display = this.settings.RelationalDisplay;
    }

    const geoOption = GEOMETRY_DISPLAY_OPTIONS.find(option => option === request.geoOption);
    if (geoOption !== undefined) {
      memory.geoOption = geoOption;
    } else if (memory.geoOption === undefined) {
      memory.geoOption = 'GEOM';
    }

    const optionsForm = request.display_options_form !== undefined;
    if (request.display_binary !== undefined) {
      memory.display_binary = true;
    } else if (optionsForm) {
      delete memory.display_binary;
    } else if (request.full_text_button === undefined) {
      memory.display_binary = true;
    }

    if (request.display_blob !== undefined) memory.display_blob = true;
    else if (optionsForm) delete memory.display_blob;

    if (request.hide_transformation !== undefined) memory.hide_transformation = true;
    else if (optionsForm) delete memory.hide_transformation;

    const remembered: QueryMemory = {
      sql: memory.sql,
      repeat_cells: memory.repeat_cells,
      max_rows: memory.max_rows,
      pos: memory.pos,
      pftext: memory.pftext,
      relational_display: memory.relational_display,
      geoOption: memory.geoOption,
      display_binary: memory.display_binary,
      display_blob: memory.display_blob,
      hide_transformation: memory.hide_transformation,
    };

    // most recently used last
    const queries = this.tmpval.query;
    delete queries[key];
    queries[key] = remembered;
    const keys = Object.keys(queries);
    if (keys.length > MAX_REMEMBERED_QUERIES) {
      const oldest = keys[0];
      if (oldest !== undefined) delete queries[oldest];
    }

    this.tmpval.pftext = remembered.pftext;
    this.tmpval.relational_display = remembered.relational_display;
    this.tmpval.geoOption = remembered.geoOption;
    this.tmpval.display_binary = remembered.display_binary === true;
    this.tmpval.display_blob = remembered.display_blob === true;
    this.tmpval.hide_transformation = remembered.hide_transformation === true;
    this.tmpval.pos = remembered.pos;
    this.tmpval.max_rows = remembered.max_rows;
    this.tmpval.repeat_cells = remembered.repeat_cells;
  }

  // --- display parts ---

  private async setDisplayPartsAndTotal(displayParts: DisplayParts): Promise<[DisplayParts, number]> {
    const props = this.properties;
    let parts = displayParts;

    if (props.printView) {
      parts = DisplayParts.fromArray({});
    } else if (props.isCount || props.isAnalyse || props.isMaint || props.isExplain) {
      parts = parts.with({
        hasEditLink: false,
        deleteLink: DELETE_LINK.NO_DELETE,
        hasSortLink: false,
        hasNavigationBar: false,
        hasBookmarkForm: true,
        hasTextButton: props.isMaint,
        hasPrintLink: true,
      });
    } else if (props.isShow) {
      const match = SHOW_STATEMENT.exec(this.sqlQuery);
      const isProcessList = match?.[1]?.toUpperCase().includes('PROCESSLIST') ?? false;
      parts = parts.with({
        hasEditLink: false,
        deleteLink: isProcessList ? DELETE_LINK.KILL_PROCESS : DELETE_LINK.NO_DELETE,
        hasSortLink: false,
        hasNavigationBar: false,
        hasBookmarkForm: true,
        hasTextButton: true,
        hasPrintLink: true,
      });
    } else {
      // results spanning several tables are not editable
      const isLink = parts.hasEditLink || parts.deleteLink !== DELETE_LINK.NO_DELETE || parts.hasSortLink;
      let previousTable = '';
      let disableEdit = false;
      for (const field of props.fieldsMeta) {
        if (isLink && previousTable !== '' && field.table !== '' && field.table !== previousTable) {
          disableEdit = true;
          break;
        }
        if (field.table !== '') previousTable = field.table;
      }
      if (previousTable === '') disableEdit = true;
      parts = parts.with({
        hasTextButton: true,
        hasPrintLink: parts.hasPrintLink || props.fieldsMeta.length > 0,
        ...(disableEdit ? { hasEditLink: false, deleteLink: DELETE_LINK.NO_DELETE } : {}),
      });
    }

    let total = 0;
    if (props.unlimNumRows > 0) {
      total = props.unlimNumRows;
    } else if (parts.hasNavigationBar || (parts.hasSortLink && this.db !== '' && this.table !== '')) {
      total = this.db !== '' && this.table !== '' ? await this.context.catalog.countRecords(this.db, this.table) : 0;
    }

    if (props.isCount && props.numRows > 1) {
      parts = parts.with({ hasNavigationBar: true, hasSortLink: true });
    }

    if ((parts.hasNavigationBar || parts.hasSortLink) && props.unlimNumRows < 2 && !(await this.isView())) {
      parts = parts.with({ hasSortLink: false });
    }

    return [parts, total];
  }

  /** A plain SELECT on exactly one table */
  private isSelect(info: StatementInfo): boolean {
    const props = this.properties;
    if (props.isCount || props.isExport || props.isFunc || props.isAnalyse || !info.selectFrom) return false;
    if (!isSelectStatement(info.statement)) return false;
    const { from } = info.statement;
    return from.length === 1 && (from[0]?.table ?? '') !== '';
  }

  // --- navigation ---

  /** [page selector markup, total pages] */
  private getHtmlPageSelector(): [string, number] {
    const maxRows = this.tmpval.max_rows;
    const rows = typeof maxRows === 'number' && maxRows > 0 ? maxRows : ROWS_PER_PAGE_DEFAULT;
    const pageNow = Math.floor(this.tmpval.pos / rows) + 1;
    const numberTotalPage = Math.ceil(this.properties.unlimNumRows / rows);
    if (numberTotalPage <= 1) return ['', numberTotalPage];

    const html = this.context.template.render('page_selector', {
      url_params: {
        db: this.db,
        table: this.table,
        sql_query: this.sqlQuery,
        goto: this.goto,
        is_browse_distinct: this.properties.isBrowseDistinct,
      },
      page_selector: pageSelector('pos', rows, pageNow, numberTotalPage),
    });
    return [html, numberTotalPage];
  }

  private getTableNavigation(
    posNext: number,
    posPrevious: number,
    isInnodb: boolean,
    sortByKey: SortByKeyData | null
  ): NavigationData {
    const { unlimNumRows, numRows } = this.properties;
    const { max_rows: maxRows, pos } = this.tmpval;
    const isShowingAll = maxRows === 'all';
    const rows = typeof maxRows === 'number' ? maxRows : 0;

    let pageSelectorHtml = '';
    let numberTotalPage = 1;
    if (!isShowingAll) {
      [pageSelectorHtml, numberTotalPage] = this.getHtmlPageSelector();
    }

    const isLastPage = unlimNumRows !== -1
      && (isShowingAll || pos + rows >= unlimNumRows || numRows < rows);

    let onsubmit = '';
    let hasRealEndInput = false;
    let posLast = 0;
    if (!isLastPage) {
      const canGoForward = pos + rows < unlimNumRows && numRows >= rows;
      onsubmit = ` onsubmit="return ${canGoForward ? 'true' : 'false'};"`;
      hasRealEndInput = isInnodb && unlimNumRows > this.settings.MaxExactCount;
      posLast = rows > 0 ? (Math.ceil(unlimNumRows / rows) - 1) * rows : 0;
    }

    const sessionMaxRows: MaxRows = isShowingAll ? this.settings.MaxRows : 'all';

    return {
      page_selector: pageSelectorHtml,
      number_total_page: numberTotalPage,
      has_show_all: this.settings.ShowAll || unlimNumRows <= 500,
      hidden_fields: {
        db: this.db,
        table: this.table,
        server: this.server,
        sql_query: this.sqlQuery,
        is_browse_distinct: this.properties.isBrowseDistinct,
        goto: this.goto,
      },
      session_max_rows: sessionMaxRows,
      is_showing_all: isShowingAll,
      max_rows: maxRows,
      pos,
      sort_by_key: sortByKey,
      pos_previous: posPrevious,
      pos_next: posNext,
      pos_last: posLast,
      is_last_page: isLastPage,
      is_last_page_known: true,
      has_real_end_input: hasRealEndInput,
      onsubmit,
    };
  }

  /** [next offset, previous offset] */
  getOffsets(): [number, number] {
    const maxRows = this.tmpval.max_rows;
    if (maxRows === 'all') return [0, 0];
    const pos = this.tmpval.pos;
    return [pos + maxRows, Math.max(0, pos - maxRows)];
  }

  /**
   * Drop-down of the table's indexes, each in ascending and descending
   * order, plus the unsorted query. Null when the table has no index.
   */
  async getSortByKeyDropDown(sortExpression: string[], unsortedSqlQuery: string): Promise<SortByKeyData | null> {
    const indexes = await this.context.catalog.getIndexes(this.db, this.table);
    if (indexes.length === 0) return null;

    const localOrder = sortExpression.join(', ');
    const match = TRAILING_CLAUSES.exec(unsortedSqlQuery);
    const [first, second] = match ? [match[1] ?? '', match[2] ?? ''] : [unsortedSqlQuery, ''];

    const options: SortByKeyData['options'] = [];
    let used = false;
    for (const index of indexes) {
      const asc = `\`${index.columns.join('` ASC, `')}\` ASC`;
      const desc = `\`${index.columns.join('` DESC, `')}\` DESC`;
      const ascSelected = localOrder === asc;
      const descSelected = localOrder === desc;
      used = used || ascSelected || descSelected;
      options.push(
        { value: `${first} ORDER BY ${asc}${second}`, content: `${index.name} (ASC)`, is_selected: ascSelected },
        { value: `${first} ORDER BY ${desc}${second}`, content: `${index.name} (DESC)`, is_selected: descSelected }
      );
    }
    options.push({ value: unsortedSqlQuery, content: 'None', is_selected: !used });

    return {
      hidden_fields: {
        db: this.db,
        table: this.table,
        server: this.server,
        sort_by_key: '1',
        session_max_rows: this.tmpval.max_rows,
      },
      options,
    };
  }

  // --- headers ---

  private getColumnParams(info: StatementInfo): Promise<[number[] | false, number[] | false]> {
    this.columnParams ??= this.loadColumnParams(info);
    return this.columnParams;
  }

  private async loadColumnParams(info: StatementInfo): Promise<[number[] | false, number[] | false]> {
    if (!this.isSelect(info)) return [false, false];
    const { relation } = this.context;
    let order = await relation.getUiProp(this.db, this.table, 'col_order');
    const fieldCount = this.properties.fieldsMeta.length;
    if (order !== false && order.length !== fieldCount) {
      await relation.removeUiProp(this.db, this.table, 'col_order');
      order = false;
    }
    let visibility = await relation.getUiProp(this.db, this.table, 'col_visib');
    if (visibility !== false && visibility.length !== fieldCount) {
      await relation.removeUiProp(this.db, this.table, 'col_visib');
      visibility = false;
    }
    return [order, visibility];
  }

  private async getDataForResettingColumnOrder(info: StatementInfo): Promise<ColumnOrderData | null> {
    if (!this.isSelect(info)) return null;
    const [order, visibility] = await this.getColumnParams(info);
    const isView = await this.isView();
    const createTime = isView ? '' : (await this.context.catalog.getCreateTime(this.db, this.table)) ?? '';
    return { order, visibility, is_view: isView, table_create_time: createTime };
  }

  private setHighlightedColumnGlobalField(statement: SelectStatementNode | null): void {
    this.highlightColumns = new Set();
    if (statement === null) return;
    for (const condition of statement.where) {
      for (const identifier of condition.identifiers) this.highlightColumns.add(identifier);
    }
  }

  private isHighlighted(name: string): boolean {
    return this.highlightColumns.has(name) || this.highlightColumns.has(backquote(name));
  }

  /** Column comments keyed by the table name used in the result */
  private async getTableCommentsArray(statement: SelectStatementNode | null): Promise<Record<string, Record<string, string>>> {
    const comments: Record<string, Record<string, string>> = {};
    if (!this.settings.ShowBrowseComments || statement === null) return comments;
    for (const from of statement.from) {
      const table = from.table ?? '';
      if (table === '') continue;
      comments[table] = await this.context.relation.getComments(from.database || this.db, table);
    }
    return comments;
  }

  private getOptionsBlock(): OptionsBlockData {
    if (this.tmpval.possible_as_geometry === false && this.tmpval.geoOption === 'GEOM') {
      this.tmpval.geoOption = 'WKT';
    }
    return {
      geo_option: this.tmpval.geoOption,
      hide_transformation: this.tmpval.hide_transformation,
      display_blob: this.tmpval.display_blob,
      display_binary: this.tmpval.display_binary,
      relational_display: this.tmpval.relational_display,
      possible_as_geometry: this.tmpval.possible_as_geometry ?? false,
      pftext: this.tmpval.pftext,
    };
  }

  private getFullOrPartialTextButtonOrLink(): string {
    const { generator } = this;
    const [title, pftext] = this.tmpval.pftext === 'F' ? ['Partial texts', 'P'] : ['Full texts', 'F'];
    const image = `<img class="fulltext" src="" alt="${title}" title="${title}">`;
    return generator.linkOrButton(
      generator.url.route('/sql'),
      {
        db: this.db,
        table: this.table,
        sql_query: this.sqlQuery,
        goto: this.goto,
        full_text_button: 1,
        pftext,
      },
      image,
      {},
      ''
    );
  }

  private getFieldVisibilityParams(parts: DisplayParts, fullOrPartialTextLink: string, colspan: string): string {
    const position = this.settings.RowActionLinks;
    const leftOrBoth = position === POSITION_LEFT || position === POSITION_BOTH;
    const hasAction = parts.hasEditLink || parts.deleteLink !== DELETE_LINK.NO_DELETE;

    this.displayParams.emptypre = 0;
    if (!parts.hasEditLink && parts.deleteLink === DELETE_LINK.NO_DELETE && parts.hasTextButton) {
      return '';
    }
    if (leftOrBoth && parts.hasTextButton) {
      this.displayParams.emptypre = parts.hasEditLink && parts.deleteLink !== DELETE_LINK.NO_DELETE ? 4 : 0;
      return `<th class="column_action position-sticky bg-body d-print-none"${colspan}>${fullOrPartialTextLink}</th>`;
    }
    if (leftOrBoth && hasAction) {
      this.displayParams.emptypre = parts.hasEditLink && parts.deleteLink !== DELETE_LINK.NO_DELETE ? 4 : 0;
      return `<td${colspan}></td>`;
    }
    if (position === POSITION_NONE) {
      return '<th class="column_action position-sticky bg-body"></th>';
    }
    return '';
  }

  private getColumnAtRightSide(parts: DisplayParts, fullOrPartialTextLink: string, colspan: string): string {
    const position = this.settings.RowActionLinks;
    const hasAction = parts.hasEditLink || parts.deleteLink !== DELETE_LINK.NO_DELETE;
    const emptyafter = parts.hasEditLink && parts.deleteLink !== DELETE_LINK.NO_DELETE ? 4 : 1;

    if (position === POSITION_RIGHT || (position === POSITION_BOTH && hasAction && parts.hasTextButton)) {
      this.displayParams.emptyafter = emptyafter;
      return `\n<th class="column_action position-sticky bg-body d-print-none"${colspan}>${fullOrPartialTextLink}</th>`;
    }
    if (
      position === POSITION_LEFT
      || (position === POSITION_BOTH && !parts.hasEditLink && parts.deleteLink === DELETE_LINK.NO_DELETE)
    ) {
      this.displayParams.emptyafter = emptyafter;
      return `\n<td class="position-sticky bg-body d-print-none"${colspan}></td>`;
    }
    return '';
  }

  private async getTableHeaders(
    parts: DisplayParts,
    info: StatementInfo,
    sortExpression: string[],
    sortExpressionNoDirection: string[],
    sortDirection: string[],
    isLimitedDisplay: boolean,
    unsortedSqlQuery: string
  ): Promise<TableHeadersData> {
    const statement = isSelectStatement(info.statement) ? info.statement : null;
    this.setHighlightedColumnGlobalField(statement);
    const printView = this.properties.printView;

    const columnOrder = await this.getDataForResettingColumnOrder(info);
    const showOptions = !printView && !isLimitedDisplay;
    const options = showOptions ? this.getOptionsBlock() : null;
    const fullOrPartialTextLink = showOptions ? this.getFullOrPartialTextButtonOrLink() : '';

    const colspan = parts.hasEditLink && parts.deleteLink !== DELETE_LINK.NO_DELETE ? ' colspan="4"' : '';
    const button = this.getFieldVisibilityParams(parts, fullOrPartialTextLink, colspan);

    const headersForColumns = await this.getTableHeadersForColumns(
      parts,
      info,
      sortExpression,
      sortExpressionNoDirection,
      sortDirection,
      isLimitedDisplay,
      unsortedSqlQuery
    );

    this.displayParams.emptyafter = 0;
    const rightSide = printView ? '' : this.getColumnAtRightSide(parts, fullOrPartialTextLink, colspan);

    return {
      column_order: columnOrder,
      options,
      has_bulk_actions_form: parts.deleteLink === DELETE_LINK.DELETE_ROW || parts.deleteLink === DELETE_LINK.KILL_PROCESS,
      button,
      table_headers_for_columns: headersForColumns,
      column_at_right_side: rightSide,
    };
  }

  private async getTableHeadersForColumns(
    parts: DisplayParts,
    info: StatementInfo,
    sortExpression: string[],
    sortExpressionNoDirection: string[],
    sortDirection: string[],
    isLimitedDisplay: boolean,
    unsortedSqlQuery: string
  ): Promise<string> {
    const statement = isSelectStatement(info.statement) ? info.statement : null;
    const fields = this.properties.fieldsMeta;
    const [colOrder, colVisib] = await this.getColumnParams(info);
    const commentsMap = await this.getTableCommentsArray(statement);
    const sessionMaxRows = isLimitedDisplay ? 0 : this.rememberedMaxRows();

    this.displayParams.desc = [];
    const columns: HeaderColumn[] = [];
    for (let j = 0; j < fields.length; j++) {
      const index = colOrder === false ? j : colOrder[j] ?? j;
      const meta = fields[index];
      if (meta === undefined) continue;

      const condition = this.isHighlighted(meta.name);
      const comments = this.context.template.render('comment_for_row', {
        comments_map: commentsMap,
        column_name: meta.name,
        table_name: meta.table,
        limit_chars: this.settings.LimitChars,
      });
      const isHidden = colVisib !== false && !colVisib[j];
      const isNumeric = meta.isType('real') || meta.isMappedTypeBit || meta.isType('int');
      const name = escapeHtml(meta.name);

      if (parts.hasSortLink && !isLimitedDisplay) {
        const sortTable = meta.table !== '' && meta.orgname === meta.name ? `${backquote(meta.table)}.` : '';
        const [singleSortOrder, multiSortOrder, orderImg] = this.getSingleAndMultiSortUrls(
          sortExpression,
          sortExpressionNoDirection,
          sortTable,
          meta.name,
          sortDirection,
          meta
        );

        let singleSortedSql = unsortedSqlQuery + singleSortOrder;
        let multiSortedSql = unsortedSqlQuery + multiSortOrder;
        const trailing = TRAILING_CLAUSES.exec(unsortedSqlQuery);
        if (trailing) {
          const head = trailing[1] ?? '';
          const tail = trailing[2] ?? '';
          singleSortedSql = head + singleSortOrder + tail;
          multiSortedSql = head + multiSortOrder + tail;
        }

        const singleParams: UrlParams = {
          db: this.db,
          table: this.table,
          sql_query: singleSortedSql,
          sql_signature: this.sign(singleSortedSql),
          session_max_rows: sessionMaxRows,
          is_browse_distinct: this.properties.isBrowseDistinct,
        };
        const multiParams: UrlParams = {
          db: this.db,
          table: this.table,
          sql_query: multiSortedSql,
          sql_signature: this.sign(multiSortedSql),
          session_max_rows: sessionMaxRows,
          is_browse_distinct: this.properties.isBrowseDistinct,
        };

        const orderLink = this.getSortOrderLink(orderImg, meta.name, singleParams, multiParams)
          + this.getSortOrderHiddenInputs(multiParams, meta.name);

        columns.push({
          column_name: meta.name,
          order_link: orderLink,
          comments,
          is_browse_pointer_enabled: this.settings.BrowsePointerEnable,
          is_browse_marker_enabled: this.settings.BrowseMarkerEnable,
          is_column_hidden: isHidden,
          is_column_numeric: isNumeric,
          has_condition: condition,
        });
        this.displayParams.desc.push(
          `    <th class="draggable${condition ? ' condition' : ''}" data-column="${name}">\n`
          + `${orderLink}${comments}    </th>\n`
        );
      } else {
        columns.push({
          column_name: meta.name,
          comments,
          is_column_hidden: isHidden,
          is_column_numeric: isNumeric,
          has_condition: condition,
        });
        this.displayParams.desc.push(
          `    <th class="draggable${condition ? ' condition' : ''}" data-column="${name}">        `
          + `${name}${comments}    </th>`
        );
      }
    }

    return this.context.template.render('table_headers_for_columns', {
      is_sortable: parts.hasSortLink && !isLimitedDisplay,
      columns,
    });
  }

  private rememberedMaxRows(): number {
    const key = createHash('md5').update(`${this.server}${this.db}${this.sqlQuery}`).digest('hex');
    const maxRows = this.tmpval.query[key]?.max_rows;
    return typeof maxRows === 'number' ? maxRows : 0;
  }

  /**
   * ORDER BY for sorting by this column alone, ORDER BY adding (or toggling)
   * it among the current sort columns, and the direction images.
   */
  getSingleAndMultiSortUrls(
    sortExpression: string[],
    sortExpressionNoDirection: string[],
    sortTable: string,
    nameToUseInSort: string,
    sortDirection: string[],
    meta: FieldMetadata
  ): [string, string, string] {
    const isInSort = this.isInSorted(sortExpression, sortExpressionNoDirection, sortTable, nameToUseInSort);
    const currentName = nameToUseInSort;
    const noDirection = [...sortExpressionNoDirection];
    const directions = [...sortDirection];

    if ((noDirection[0] ?? '') === '' || !isInSort) {
      const specialIndex = (noDirection[0] ?? '') === '' ? 0 : noDirection.length;
      noDirection[specialIndex] = backquote(currentName);
      const smartDescending = ['time', 'date', 'datetime', 'timestamp'].includes(meta.getMappedType());
      directions[specialIndex] = this.settings.Order === 'SMART'
        ? (smartDescending ? 'DESC' : 'ASC')
        : this.settings.Order;
    }

    let singleSortOrder = '';
    let orderImg = '';
    const columns: string[] = [];
    noDirection.forEach((expression, index) => {
      if (expression === '' || expression === '0') return;
      let name = expression;
      let sortTableNew = sortTable;
      if (name.includes('.') && !name.includes('(')) {
        const parts = name.split('.');
        name = parts[1] ?? '';
        sortTableNew = parts[0] ?? '';
      }
      name = trimBackticks(name.replaceAll(' )', ')').replaceAll('``', '`'));

      let sortOrder = index === 0 ? '\nORDER BY ' : '';
      if (name.includes('(')) {
        sortOrder += name;
      } else {
        if (sortTableNew !== '' && !sortTableNew.endsWith('.')) sortTableNew += '.';
        sortOrder += sortTableNew + backquote(name);
      }

      const direction = directions[index] ?? '';
      if (currentName === name) {
        singleSortOrder = '\nORDER BY ';
        if (!currentName.includes('(')) singleSortOrder += sortTable;
        singleSortOrder += `${backquote(currentName)} `;
        if (isInSort) [singleSortOrder, orderImg] = this.getSortingUrlParams(direction, singleSortOrder);
        else singleSortOrder += direction.toUpperCase();
      }

      sortOrder += ' ';
      if (currentName === name && isInSort) {
        [sortOrder, orderImg] = this.getSortingUrlParams(direction, sortOrder);
        orderImg += ` <small>${index + 1}</small>`;
      } else {
        sortOrder += direction.toUpperCase();
      }
      columns.push(sortOrder);
    });

    return [singleSortOrder, columns.join(', '), orderImg];
  }

  /** Whether the column takes part in the current ORDER BY */
  isInSorted(sortExpression: string[], sortExpressionNoDirection: string[], sortTable: string, nameToUseInSort: string): boolean {
    let index = 0;
    for (const [position, clause] of sortExpressionNoDirection.entries()) {
      let normalized: string;
      if (clause.includes('.')) {
        const fragments = clause.split('.');
        normalized = `${fragments[0] ?? ''}.${(fragments[1] ?? '').replaceAll('`', '')}`;
      } else {
        normalized = sortTable + clause.replaceAll('`', '');
      }
      if (normalized === sortTable + nameToUseInSort) {
        index = position;
        break;
      }
    }

    const expression = sortExpression[index] ?? '';
    if (expression === '' || expression === '0') return false;

    const current = sortExpressionNoDirection[index] ?? '';
    const noSortTable = sortTable === '' || !current.includes(sortTable);
    const noOpenParenthesis = !current.includes('(');
    const newSortExpression = sortTable !== '' && noSortTable && noOpenParenthesis ? sortTable + current : current;

    const sortName = sortTable.replaceAll('`', '') + nameToUseInSort.replaceAll('`', '');
    return sortName === newSortExpression.replaceAll('`', '') || sortName === current.replaceAll('`', '');
  }

  /** Flips the direction; returns [order, direction images] */
  private getSortingUrlParams(sortDirection: string, sortOrder: string): [string, string] {
    const { generator } = this;
    if (sortDirection.trim().toUpperCase() === 'DESC') {
      return [
        `${sortOrder}ASC`,
        ` ${generator.getImage('s_desc', 'Descending', { class: 'soimg', title: '' })}`
        + ` ${generator.getImage('s_asc', 'Ascending', { class: 'soimg hide', title: '' })}`,
      ];
    }
    return [
      `${sortOrder}DESC`,
      ` ${generator.getImage('s_asc', 'Ascending', { class: 'soimg', title: '' })}`
      + ` ${generator.getImage('s_desc', 'Descending', { class: 'soimg hide', title: '' })}`,
    ];
  }

  private getSortOrderLink(orderImg: string, name: string, singleParams: UrlParams, multiParams: UrlParams): string {
    const { generator } = this;
    const route = generator.url.route('/sql');
    const divider = route.includes('?') ? '&' : '?';
    const inner = `${escapeHtml(name)}${orderImg}<input type="hidden" value="${route}${generator.url.getCommon(multiParams, divider)}">`;
    return generator.linkOrButton(route, singleParams, inner, { class: 'sortlink' });
  }

  /** URLs that remove the column from, or add it to, the current sort */
  private getSortOrderHiddenInputs(multiParams: UrlParams, name: string): string {
    const sqlQuery = String(multiParams.sql_query ?? '');
    let removeQuery = sqlQuery;
    let remaining: number | null = null;

    const { statement } = parseStatement(sqlQuery);
    if (isSelectStatement(statement)) {
      const kept = statement.orderBy.filter(item => item.expr.column !== name);
      remaining = kept.length;
      const orderBy = kept.map(item => `${item.expr.expr} ${item.direction}`).join(', ');
      removeQuery = buildStatement(statement, { 'ORDER BY': orderBy === '' ? '' : `ORDER BY ${orderBy}` });
    }

    const { url } = this.generator;
    let urlRemoveOrder = url.getFromRoute('/sql', {
      ...multiParams,
      sql_query: removeQuery,
      sql_signature: this.sign(removeQuery),
    });
    if (remaining === 0) urlRemoveOrder += '&discard_remembered_sort=1';
    const urlAddOrder = url.getFromRoute('/sql', multiParams);

    return `<input type="hidden" name="url-remove-order" value="${urlRemoveOrder}">\n`
      + `<input type="hidden" name="url-add-order" value="${urlAddOrder}">`;
  }

  // --- body ---

  /** Query carried in row links; long SELECTs are cut down to their SELECT and FROM clauses */
  getUrlSqlQuery(info: StatementInfo): string {
    const statement = info.statement;
    if (info.queryType !== 'SELECT' || [...this.sqlQuery].length < 200 || !isSelectStatement(statement)) {
      return this.sqlQuery;
    }
    let query = `SELECT ${getClause(statement, 'SELECT')}`;
    const from = getClause(statement, 'FROM');
    if (from !== '') query += ` FROM ${from}`;
    return query;
  }

  private getGridEditConfig(isLimitedDisplay: boolean): GridEditConfig {
    if (isLimitedDisplay || !this.properties.editable || this.settings.GridEditing === 'disabled') return 'disabled';
    return this.settings.GridEditing === 'click' ? 'click' : 'double-click';
  }

  private async getTableBody(
    result: ResultSet,
    parts: DisplayParts,
    map: ForeignKeyMap,
    info: StatementInfo,
    isLimitedDisplay: boolean
  ): Promise<string> {
    const { template, settings } = this.context;
    const statement = isSelectStatement(info.statement) ? info.statement : null;
    const gridEdit = this.getGridEditConfig(isLimitedDisplay);
    const [colOrder, colVisib] = await this.getColumnParams(info);
    const urlSqlQuery = this.getUrlSqlQuery(info);
    const position = settings.RowActionLinks;
    const hasAction = parts.hasEditLink || parts.deleteLink !== DELETE_LINK.NO_DELETE;

    let html = '';
    let rowNumber = 0;
    this.whereClauseMap = {};

    for (let row = result.fetchRow(); row !== null; row = result.fetchRow()) {
      const repeatCells = this.tmpval.repeat_cells;
      if (rowNumber !== 0 && repeatCells > 0 && rowNumber % repeatCells === 0) {
        html += this.getRepeatingHeaders();
      }

      const classes: string[] = [];
      if (!settings.BrowsePointerEnable) classes.push('nopointer');
      if (!settings.BrowseMarkerEnable) classes.push('nomarker');
      html += classes.length > 0 ? `<tr class="${classes.join(' ')}">` : '<tr>';

      let whereClause = '';
      let clauseIsUnique = true;
      let conditionMap: Record<string, string> = {};
      let edit: RowActionLink & { clause_is_unique: boolean } = { url: null, params: null, string: null, clause_is_unique: true };
      let copy: RowActionLink = { url: null, params: null, string: null };
      let del: RowActionLink = { url: null, params: null, string: null };
      let jsConf = '';

      if (hasAction) {
        [whereClause, clauseIsUnique, conditionMap] = await getUniqueCondition(
          this.properties.fieldsMeta,
          row,
          this.uniqueContext(),
          { restrictToTable: this.table === '' ? undefined : this.table, expressions: statement?.expressions }
        );
        this.whereClauseMap[rowNumber] = { [this.table]: whereClause };

        if (parts.hasEditLink) {
          [edit, copy] = this.getModifiedLinks(whereClause, clauseIsUnique, urlSqlQuery);
        }
        [del, jsConf] = this.getDeleteAndKillLinks(whereClause, clauseIsUnique, urlSqlQuery, parts.deleteLink, row);

        const hasCheckbox = del.url !== null && parts.deleteLink !== DELETE_LINK.KILL_PROCESS;
        if (position === POSITION_LEFT || position === POSITION_BOTH) {
          html += template.render('checkbox_and_links', {
            position: POSITION_LEFT,
            has_checkbox: hasCheckbox,
            edit: { ...edit, params: { ...(edit.params ?? {}), default_action: 'update' } },
            copy: { ...copy, params: { ...(copy.params ?? {}), default_action: 'insert' } },
            delete: del,
            row_number: rowNumber,
            where_clause: whereClause,
            condition: JSON.stringify(conditionMap),
            js_conf: jsConf,
            grid_edit_config: gridEdit,
          });
        } else if (position === POSITION_NONE) {
          html += template.render('checkbox_and_links', {
            position: POSITION_NONE,
            has_checkbox: hasCheckbox,
            edit: { ...edit, params: { ...(edit.params ?? {}), default_action: 'update' } },
            copy: { ...copy, params: { ...(copy.params ?? {}), default_action: 'insert' } },
            delete: del,
            row_number: rowNumber,
            where_clause: whereClause,
            condition: JSON.stringify(conditionMap),
            js_conf: jsConf,
            grid_edit_config: gridEdit,
          });
        }
      }

      html += await this.getRowValues(row, rowNumber, colOrder, map, urlSqlQuery, info, colVisib, gridEdit);

      if (hasAction && (position === POSITION_RIGHT || position === POSITION_BOTH)) {
        html += template.render('checkbox_and_links', {
          position: POSITION_RIGHT,
          has_checkbox: del.url !== null && parts.deleteLink !== DELETE_LINK.KILL_PROCESS,
          edit: { ...edit, params: { ...(edit.params ?? {}), default_action: 'update' } },
          copy: { ...copy, params: { ...(copy.params ?? {}), default_action: 'insert' } },
          delete: del,
          row_number: rowNumber,
          where_clause: whereClause,
          condition: JSON.stringify(conditionMap),
          js_conf: jsConf,
          grid_edit_config: gridEdit,
        });
      }

      html += '</tr>\n';
      rowNumber++;
    }

    return html;
  }

  private getRepeatingHeaders(): string {
    const { emptypre, emptyafter, desc } = this.displayParams;
    const position = this.settings.RowActionLinks;
    let html = '<tr>\n';
    if (emptypre > 0) html += `    <th colspan="${emptypre}">\n        &nbsp;</th>\n`;
    else if (position === POSITION_NONE) html += '    <th></th>\n';
    html += desc.join('');
    if (emptyafter > 0) html += `    <th colspan="${emptyafter}">\n        &nbsp;</th>\n`;
    return `${html}</tr>\n`;
  }

  /** [edit link, copy link] */
  private getModifiedLinks(whereClause: string, clauseIsUnique: boolean, urlSqlQuery: string): [RowActionLink & { clause_is_unique: boolean }, RowActionLink] {
    const { url } = this.generator;
    const params: UrlParams = {
      db: this.db,
      table: this.table,
      where_clause: whereClause,
      where_clause_signature: this.sign(whereClause),
      clause_is_unique: clauseIsUnique,
      sql_query: urlSqlQuery,
      sql_signature: this.sign(urlSqlQuery),
      goto: url.getFromRoute('/sql'),
    };
    const changeUrl = url.getFromRoute('/table/change');
    return [
      {
        url: changeUrl,
        params,
        string: this.generator.getActionLinkContent('b_edit', 'Edit'),
        clause_is_unique: clauseIsUnique,
      },
      { url: changeUrl, params, string: this.generator.getActionLinkContent('b_insrow', 'Copy') },
    ];
  }

  /** [delete or kill link, confirmation text] */
  private getDeleteAndKillLinks(
    whereClause: string,
    clauseIsUnique: boolean,
    urlSqlQuery: string,
    deleteLink: DeleteLinkMode,
    row: Row
  ): [RowActionLink, string] {
    const { generator } = this;
    const { url } = generator;

    if (deleteLink === DELETE_LINK.DELETE_ROW) {
      const messageToShow = 'The row has been deleted.';
      const linkGoto = url.getFromRoute('/sql', {
        db: this.db,
        table: this.table,
        sql_query: urlSqlQuery,
        message_to_show: messageToShow,
        goto: this.goto === '' ? url.getFromRoute('/table/sql') : this.goto,
      });
      const limit = clauseIsUnique ? '' : ' LIMIT 1';
      const deleteQuery = `DELETE FROM ${backquote(this.table)} WHERE ${whereClause}${limit}`;
      return [
        {
          url: url.getFromRoute('/sql'),
          params: {
            db: this.db,
            table: this.table,
            sql_query: deleteQuery,
            message_to_show: messageToShow,
            goto: linkGoto,
          },
          string: generator.getActionLinkContent('b_drop', 'Delete'),
        },
        `DELETE FROM ${this.table} WHERE ${whereClause}${limit}`,
      ];
    }

    if (deleteLink === DELETE_LINK.KILL_PROCESS) {
      const first = row[0];
      const processId = first === null || first === undefined ? 0 : Number.parseInt(cellText(first), 10) || 0;
      const linkGoto = url.getFromRoute('/sql', {
        db: this.db,
        table: this.table,
        sql_query: urlSqlQuery,
        goto: url.getFromRoute('/'),
      });
      const killQuery = this.context.dbi.getKillQuery(processId);
      return [
        {
          url: url.getFromRoute('/sql'),
          params: { db: 'mysql', sql_query: killQuery, goto: linkGoto },
          string: generator.getIcon('b_drop', 'Kill'),
        },
        killQuery,
      ];
    }

    return [{ url: null, params: null, string: null }, ''];
  }

  /** Collects the stored MIME settings of every table in the result */
  private async setMimeMap(): Promise<void> {
    this.mimeMap = {};
    const { features } = this.context.relation.parameters;
    if (
      features.columnComments
      && features.browserTransformation
      && this.settings.BrowseMIME
      && !this.tmpval.hide_transformation
    ) {
      const seen = new Set<string>();
      for (const meta of this.properties.fieldsMeta) {
        if (meta.orgtable === '') continue;
        const key = `${meta.database}.${meta.orgtable}`;
        if (seen.has(key)) continue;
        seen.add(key);
        const mime = await this.context.relation.getMime(meta.database, meta.orgtable, false, true);
        Object.assign(this.mimeMap, mime);
      }
    }

    if (this.properties.isShow && !this.tmpval.hide_transformation) {
      const sqlHighlighting: ColumnMime = { mimetype: 'Text_Plain', transformation: 'output/Text_Plain_Sql' };
      if (/PROCESSLIST/i.test(this.sqlQuery)) this.mimeMap['..Info'] = sqlHighlighting;
      if (/CREATE\s+TABLE/i.test(this.sqlQuery)) this.mimeMap['..Create Table'] = sqlHighlighting;
    }
  }

  private getClassForDateTimeRelatedFields(meta: FieldMetadata): string {
    if (meta.isMappedTypeTimestamp || meta.isType('datetime')) return 'datetimefield';
    if (meta.isType('date')) return 'datefield';
    if (meta.isType('time')) return 'timefield';
    if (meta.isType('string')) return 'text';
    return '';
  }

  private async getRowValues(
    row: Row,
    rowNumber: number,
    colOrder: number[] | false,
    map: ForeignKeyMap,
    urlSqlQuery: string,
    info: StatementInfo,
    colVisib: number[] | false,
    gridEdit: GridEditConfig
  ): Promise<string> {
    const { features } = this.context.relation.parameters;
    const statement = isSelectStatement(info.statement) ? info.statement : null;
    const fields = this.properties.fieldsMeta;
    const specialLinks = getSpecialSchemaLinks();
    const rowInfo = this.getRowInfoForSpecialLinks(row);
    let html = '';

    for (let j = 0; j < fields.length; j++) {
      const i = colOrder === false ? j : colOrder[j] ?? j;
      const meta = fields[i];
      if (meta === undefined) continue;
      const value: CellValue = row[i] ?? null;
      const orgFullColName = `${this.db}.${meta.orgtable}.${meta.orgname}`;

      const classes = [
        'data',
        meta.orgtable !== '' && gridEdit !== 'disabled'
          ? (gridEdit === 'click' ? 'grid_edit click1' : 'grid_edit click2')
          : '',
        meta.isNotNull ? 'not_null' : '',
        map[meta.name] !== undefined ? 'relation' : '',
        colVisib !== false && colVisib[j] !== undefined && !colVisib[j] ? 'hide' : '',
        this.getClassForDateTimeRelatedFields(meta),
      ];
      const cellClass = classes.filter(name => name !== '').join(' ');
      const condition = this.isHighlighted(meta.name);

      let plugin: TransformationsPlugin | null = null;
      let transformationOptions: string[] = [];
      const mime = this.mimeMap[orgFullColName];
      if (
        features.browserTransformation
        && this.settings.BrowseMIME
        && mime !== undefined
        && mime.mimetype !== ''
        && mime.transformation !== ''
        && TransformationFactory.has(mime.transformation)
      ) {
        plugin = TransformationFactory.create(mime.transformation, { url: this.generator.url });
        transformationOptions = getOptions(mime.transformation_options ?? '');
        meta.internalMediaType = mime.mimetype.replaceAll('_', '/');
      }

      const dbLower = meta.database.toLowerCase();
      const tableLower = meta.orgtable.toLowerCase();
      const nameLower = meta.orgname.toLowerCase();
      const defaultInfo = this.transformationInfo[dbLower]?.[tableLower]?.[nameLower];
      if (
        defaultInfo !== undefined
        && value !== null
        && cellText(value).trim() !== ''
        && !this.tmpval.hide_transformation
      ) {
        plugin = TransformationFactory.create(defaultInfo[0], { url: this.generator.url });
        transformationOptions = getOptions(mime?.transformation_options ?? '');
        meta.internalMediaType = defaultInfo[1].replaceAll('_', '/');
      }

      const specialLink = specialLinks[dbLower]?.[tableLower]?.[nameLower];
      if (specialLink !== undefined) {
        const linkValue = value === null ? '' : cellText(value);
        const params: UrlParams = { [specialLink.link_param]: linkValue };
        for (const dependency of specialLink.link_dependancy_params ?? []) {
          params[dependency.param_info] = rowInfo[dependency.column_name.toLowerCase()] ?? '';
        }
        const page = specialLink.default_page;
        const divider = page.indexOf('?') > 0 ? '&' : '?';
        const linkUrl = this.generator.url.route(page) + this.generator.url.getCommonRaw(params, divider);
        plugin = TransformationFactory.create('Text_Plain_Link', { url: this.generator.url });
        transformationOptions = [linkUrl, '', '1'];
        meta.internalMediaType = 'Text/Plain';
      }

      const rowWhere = (this.whereClauseMap[rowNumber] ??= {});
      let whereClause = rowWhere[meta.orgtable];
      if (whereClause === undefined) {
        [whereClause] = await getUniqueCondition(fields, row, this.uniqueContext(), {
          restrictToTable: meta.orgtable === '' ? undefined : meta.orgtable,
          expressions: statement?.expressions,
        });
        rowWhere[meta.orgtable] = whereClause;
      }

      const urlParams: UrlParams = {
        db: this.db,
        table: meta.orgtable,
        where_clause_sign: this.sign(whereClause),
        where_clause: whereClause,
        transform_key: meta.orgname,
      };
      if (this.sqlQuery !== '') urlParams.sql_query = urlSqlQuery;

      const cell: CellContext = {
        condition,
        meta,
        map,
        info,
        plugin,
        options: {
          args: transformationOptions,
          wrapperLink: this.generator.url.getCommon(urlParams),
          wrapperParams: urlParams,
        },
        urlParams,
      };

      if (meta.isNumeric) {
        html += await this.getDataCellForNumericColumns(value, `text-end ${cellClass}`, cell);
      } else if (meta.isMappedTypeGeometry) {
        html += await this.getDataCellForGeometryColumns(value, cellClass.replaceAll('grid_edit', ''), cell);
      } else {
        html += await this.getDataCellForNonNumericColumns(value, cellClass, cell);
      }
    }

    return html;
  }

  /** Cell text per lower-cased column name */
  private getRowInfoForSpecialLinks(row: Row): Record<string, string> {
    const info: Record<string, string> = {};
    this.properties.fieldsMeta.forEach((meta, index) => {
      const value = row[index];
      info[meta.orgname.toLowerCase()] = value === null || value === undefined ? '' : cellText(value);
    });
    return info;
  }

  private addClass(
    className: string,
    condition: boolean,
    meta: FieldMetadata,
    nowrap: string,
    isFieldTruncated = false,
    hasTransformationPlugin = false
  ): string {
    const mimeKey = `${meta.database}.${meta.orgtable}.${meta.orgname}`;
    const inputTransformation = this.mimeMap[mimeKey]?.input_transformation ?? '';
    const classes = [
      className,
      nowrap,
      (meta.internalMediaType ?? '').replaceAll('/', '_'),
      condition ? 'condition' : '',
      isFieldTruncated ? 'truncated' : '',
      hasTransformationPlugin || inputTransformation !== '' ? 'transformed' : '',
      meta.isEnum ? 'enum' : '',
      meta.isSet ? 'set' : '',
      meta.isMappedTypeBit ? 'bit' : '',
      meta.isBinary() ? 'hex' : '',
    ];
    return classes.filter(name => name !== '').join(' ');
  }

  private buildNullDisplay(className: string, condition: boolean, meta: FieldMetadata): string {
    return this.context.template.render('null_display', {
      data_decimals: meta.decimals,
      data_type: meta.getMappedType(),
      classes: this.addClass(className, condition, meta, ''),
    });
  }

  private buildEmptyDisplay(className: string, condition: boolean, meta: FieldMetadata): string {
    return this.context.template.render('empty_display', {
      classes: this.addClass(className, condition, meta, 'text-nowrap'),
    });
  }

  private buildValueDisplay(className: string, condition: boolean, value: string): string {
    return this.context.template.render('value_display', { class: className, condition_field: condition, value });
  }

  private async getDataCellForNumericColumns(value: CellValue, className: string, cell: CellContext): Promise<string> {
    const { meta, condition } = cell;
    if (value === null) return this.buildNullDisplay(className, condition, meta);
    if (isEmptyCell(value)) return this.buildEmptyDisplay(className, condition, meta);
    const text = cellText(value);
    return this.getRowData(className, cell, text, text, 'text-nowrap', ` = ${text}`, false);
  }

  private async getDataCellForGeometryColumns(value: CellValue, className: string, cell: CellContext): Promise<string> {
    const { meta, condition } = cell;
    if (value === null) return this.buildNullDisplay(className, condition, meta);
    if (isEmptyCell(value)) return this.buildEmptyDisplay(className, condition, meta);

    const bytes = cellBytes(value);
    const whereComparison = ` = 0x${bytes.toString('hex')}`;

    if (this.tmpval.geoOption === 'GEOM') {
      const [html] = this.handleNonPrintableContents('GEOMETRY', value, cell.plugin, cell.options, meta, cell.urlParams);
      return this.buildValueDisplay(className, condition, html);
    }

    if (this.tmpval.geoOption === 'WKT') {
      const wkt = wkbToWkt(bytes);
      const [isTruncated, displayed] = this.getPartialText(wkt);
      return this.getRowData(className, cell, wkt, displayed, '', whereComparison, isTruncated);
    }

    if (this.tmpval.display_binary) {
      const hex = wkbHexWithoutSrid(bytes);
      const [isTruncated, displayed] = this.getPartialText(hex);
      return this.getRowData(className, cell, hex, displayed, '', whereComparison, isTruncated);
    }

    const [html] = this.handleNonPrintableContents('BINARY', value, cell.plugin, cell.options, meta, cell.urlParams);
    return this.buildValueDisplay(className, condition, html);
  }

  private async getDataCellForNonNumericColumns(value: CellValue, className: string, cell: CellContext): Promise<string> {
    const { meta, condition, plugin } = cell;
    let cellClass = className;

    const isBlob = meta.isType('blob');
    const protect = this.settings.ProtectBinary;
    const protectsBinary = protect === 'all' || (protect === 'noblob' && !isBlob) || (protect === 'blob' && isBlob);
    const isNonTextPlugin = plugin !== null && !plugin.getMIMEType().includes('Text');
    if ((meta.isBinary() && protectsBinary) || isNonTextPlugin) {
      cellClass = cellClass.replaceAll('grid_edit', '');
    }

    if (value === null) return this.buildNullDisplay(cellClass, condition, meta);
    if (isEmptyCell(value)) return this.buildEmptyDisplay(cellClass, condition, meta);

    const original = cellText(value);
    let column = original;
    let displayed = original;
    let isTruncated = false;
    let originalLength = 0;

    const isLinkPlugin = plugin !== null && plugin.getName().includes('Link');
    if (!isLinkPlugin && !meta.isBinary()) {
      [isTruncated, column, originalLength] = this.getPartialText(original);
    }

    if (meta.isMappedTypeBit) {
      displayed = printableBitValue(bitCellValue(value), meta.length);
      column = displayed;
    } else if (meta.isBinary() && !this.properties.isAnalyse) {
      const category = meta.isType('string') ? 'BINARY' : 'BLOB';
      [displayed, isTruncated] = this.handleNonPrintableContents(category, value, plugin, cell.options, meta, cell.urlParams);
      cellClass = this.addClass(cellClass, condition, meta, '', isTruncated, plugin !== null);
      if (stripTags(column).toLowerCase().includes(category.toLowerCase())) {
        cellClass = cellClass.replaceAll('grid_edit', '');
      }
      return this.buildValueDisplay(cellClass, condition, displayed);
    }

    const nowrap = meta.isDateTimeType() || (plugin !== null && plugin.applyTransformationNoWrap(cell.options))
      ? 'text-nowrap'
      : 'pre_wrap';
    const whereComparison = ` = ${this.context.dbi.quoteString(original)}`;
    return this.getRowData(cellClass, cell, column, displayed, nowrap, whereComparison, isTruncated, String(originalLength));
  }

  /**
   * Summary of a binary value such as `[BLOB - 12 B]`, or its content when
   * the binary or blob display option is on or a text transformation applies.
   * Returns [html, is truncated].
   */
  handleNonPrintableContents(
    category: string,
    content: CellValue,
    plugin: TransformationsPlugin | null,
    options: TransformOptions,
    meta: FieldMetadata,
    urlParams: UrlParams = {}
  ): [string, boolean] {
    let isTruncated = false;
    const bytes = content === null ? Buffer.alloc(0) : cellBytes(content);
    const size = bytes.length;

    let summary = `[${category}`;
    if (content === null) {
      summary += ' - NULL';
    } else {
      const [value, unit] = formatByteDown(size, 3, 1);
      summary += ` - ${value} ${unit}`;
    }
    summary += ']';

    let input: string | Buffer = summary;
    if (plugin !== null) {
      const isOctetstream = plugin.getMIMESubtype().indexOf('Octetstream') > 0;
      if (isOctetstream || plugin.getMIMEType().includes('Text')) input = bytes;
    }

    if (size <= 0) return [typeof input === 'string' ? input : input.toString('utf8'), false];

    if (plugin !== null) return [plugin.applyTransformation(input, options, meta), false];

    let html = mimeDefaultFunction(summary);
    const tmpval = this.tmpval;
    if ((tmpval.display_binary && meta.isType('string')) || (tmpval.display_blob && meta.isType('blob'))) {
      const text = isUtf8(bytes) ? bytes.toString('utf8') : null;
      html = text !== null && !CONTROL_CHARACTERS.test(text) ? escapeHtml(text) : `0x${bytes.toString('hex')}`;
      [isTruncated, html] = this.getPartialText(html);
    }

    if (Object.keys(urlParams).length > 0 && this.db !== '' && meta.orgtable !== '') {
      const whereClause = typeof urlParams.where_clause === 'string' ? urlParams.where_clause : '';
      const href = this.generator.url.getFromRoute('/table/get-field', {
        ...urlParams,
        where_clause_sign: this.sign(whereClause),
      });
      html = `<a href="${href}" class="disableAjax">${html}</a>`;
    }

    return [html, isTruncated];
  }

  /** Display column of the referenced row; false when the row does not exist */
  private async getFromForeign(map: ForeignKeyMap, meta: FieldMetadata, whereComparison: string): Promise<string | null> {
    const related = map[meta.name];
    if (related === undefined) return null;
    const sql = `SELECT ${backquote(related.displayField)} FROM ${backquote(related.database)}.${backquote(related.table)}`
      + ` WHERE ${backquote(related.field)}${whereComparison}`;
    const value = await this.context.dbi.fetchValue(sql);
    if (value === false) return 'Link not found!';
    if (value === null) return null;
    return this.getPartialText(cellText(value))[1];
  }

  private async getRowData(
    className: string,
    cell: CellContext,
    data: string,
    displayedData: string,
    nowrap: string,
    whereComparison: string,
    isFieldTruncated: boolean,
    originalLength = ''
  ): Promise<string> {
    const { meta, map, info, plugin, options, condition } = cell;
    const { generator } = this;
    const tdClass = this.addClass(className, condition, meta, nowrap, isFieldTruncated, plugin !== null);
    const statement = isSelectStatement(info.statement) ? info.statement : null;

    // an aliased column is looked up under its real name
    let columnName = meta.name;
    for (const expression of statement?.expressions ?? []) {
      if (expression.alias !== undefined && expression.column !== undefined
        && expression.alias.toLowerCase() === meta.name.toLowerCase()) {
        columnName = expression.column;
      }
    }

    const related = map[columnName];
    let value: string;
    if (related !== undefined) {
      let dispval: string | null = '';
      if (related.displayField !== '') {
        dispval = await this.getFromForeign({ [meta.name]: related }, meta, whereComparison);
      }

      if (this.properties.printView) {
        const shown = plugin !== null ? plugin.applyTransformation(data, options, meta) : mimeDefaultFunction(data);
        value = `${shown} <code>[-&gt;${dispval ?? ''}]</code>`;
      } else {
        const sqlQuery = `SELECT * FROM ${backquote(related.database)}.${backquote(related.table)}`
          + ` WHERE ${backquote(related.field)}${whereComparison}`;
        const urlParams: UrlParams = {
          db: related.database,
          table: related.table,
          pos: '0',
          sql_signature: this.sign(sqlQuery),
          sql_query: sqlQuery,
        };

        let shown: string;
        if (plugin !== null) {
          shown = plugin.applyTransformation(data, options, meta);
        } else if (this.tmpval.relational_display === 'D' && related.displayField !== '') {
          shown = dispval === null ? '<em>NULL</em>' : mimeDefaultFunction(dispval);
        } else {
          shown = mimeDefaultFunction(displayedData);
        }

        const tagParams: Record<string, string> = {
          title: this.tmpval.relational_display === 'K' ? dispval ?? '' : data,
        };
        if (className.includes('grid_edit')) tagParams.class = 'ajax';
        value = generator.linkOrButton(generator.url.route('/sql'), urlParams, shown, tagParams);
      }
    } else if (plugin !== null) {
      value = plugin.applyTransformation(data, options, meta);
    } else {
      value = mimeDefaultFunction(displayedData);
    }

    return this.context.template.render('row_data', {
      value,
      td_class: tdClass,
      decimals: meta.decimals,
      type: meta.getMappedType(),
      original_length: originalLength,
    });
  }

  /** Truncates to LimitChars characters in partial text mode */
  getPartialText(value: string): PartialText {
    const characters = [...value];
    const originalLength = characters.length;
    if (originalLength > this.settings.LimitChars && this.tmpval.pftext === 'P') {
      return [true, `${characters.slice(0, this.settings.LimitChars).join('')}...`, originalLength];
    }
    return [false, value, originalLength];
  }

  // --- messages ---

  private async getSortedColumnMessage(result: ResultSet, sortExpressionNoDirection: string): Promise<string> {
    if (sortExpressionNoDirection === '') return '';

    let table: string;
    let column: string;
    if (!sortExpressionNoDirection.includes('.')) {
      table = this.table;
      column = sortExpressionNoDirection;
    } else {
      const [first = '', second = ''] = sortExpressionNoDirection.split('.');
      table = first;
      column = second;
    }
    table = unQuote(table);
    column = unQuote(column);

    const fields = this.properties.fieldsMeta;
    const index = fields.findIndex(field => field.table === table && field.name === column);
    const meta = fields[index];
    if (meta === undefined) return '';

    const describe = (row: Row | null): string => {
      const value = row?.[index] ?? null;
      let text: string;
      if (meta.isMappedTypeGeometry || meta.isType('blob') || meta.isBinary()) {
        [text] = this.handleNonPrintableContents(meta.getMappedType(), value, null, emptyTransformOptions(), meta);
      } else {
        text = value === null ? '' : cellText(value);
      }
      return `${[...text].slice(0, this.settings.LimitChars).join('')}...`.toUpperCase();
    };

    const first = describe(result.fetchRow());
    const numRows = result.numRows();
    result.seek(numRows > 0 ? numRows - 1 : 0);
    const last = describe(result.fetchRow());
    result.seek(0);

    return ` [${escapeHtml(column)}: <strong>${escapeHtml(first)} - ${escapeHtml(last)}</strong>]`;
  }

  private async setMessageInformation(
    sortedColumnMessage: string,
    statement: SelectStatementNode | null,
    total: number,
    posNext: number,
    preCount: string,
    afterCount: string
  ): Promise<Message> {
    const { unlimNumRows, queryTime } = this.properties;
    let firstShownRec: number;
    let lastShownRec: number;

    if (statement?.limit !== undefined) {
      firstShownRec = statement.limit.offset;
      const rowCount = statement.limit.rowCount;
      lastShownRec = firstShownRec + (rowCount < total ? rowCount : total) - 1;
    } else if (this.tmpval.max_rows === 'all' || posNext > total) {
      firstShownRec = this.tmpval.pos;
      lastShownRec = total - 1;
    } else {
      firstShownRec = this.tmpval.pos;
      lastShownRec = posNext - 1;
    }

    let warning: string | null = null;
    if ((await this.isView()) && total === this.settings.MaxExactCountViews) {
      warning = this.generator.showHint(
        'This view has at least this number of rows. Please refer to documentation.'
      );
    }

    const message = Message.success('Showing rows %s - %s').addParam(firstShownRec);
    if (warning !== null) message.addParam(`... ${warning}`);
    else message.addParam(lastShownRec);
    message.addText('(');

    if (warning === null) {
      const totalMessage = unlimNumRows !== total
        ? Message.notice(`${preCount}%1$s total, %2$s in query`)
          .addParam(formatNumber(total, 0))
          .addParam(formatNumber(unlimNumRows, 0))
        : Message.notice(`${preCount}%s total`).addParam(formatNumber(total, 0));
      if (afterCount !== '') totalMessage.addHtml(afterCount);
      message.addMessage(totalMessage, '');
      message.addText(', ', '');
    }

    message.addMessage(Message.notice(`Query took ${queryTime.toFixed(4)} seconds.)`), '');
    message.addHtml(sortedColumnMessage, '');
    return message;
  }

  // --- related tables and operations ---

  private async getForeignKeyRelatedTables(): Promise<ForeignKeyMap> {
    const { relation } = this.context;
    const { relations, foreignKeys } = await relation.getForeigners(this.db, this.table, '', 'both');
    const map: ForeignKeyMap = {};

    for (const [field, target] of Object.entries(relations)) {
      map[field] = {
        table: target.foreign_table,
        field: target.foreign_field,
        displayField: await relation.getDisplayField(target.foreign_db, target.foreign_table),
        database: target.foreign_db,
      };
    }

    for (const foreignKey of foreignKeys) {
      const database = foreignKey.refDbName || this.db;
      const displayField = await relation.getDisplayField(database, foreignKey.refTableName);
      foreignKey.indexList.forEach((column, index) => {
        map[column] = {
          table: foreignKey.refTableName,
          field: foreignKey.refIndexList[index] ?? '',
          displayField,
          database,
        };
      });
    }

    return map;
  }

  /** Whether the last row's where clause is unique; decides the bulk action form */
  private async isClauseUnique(result: ResultSet, statement: SelectStatementNode | null, deleteLink: DeleteLinkMode): Promise<boolean> {
    if (deleteLink !== DELETE_LINK.DELETE_ROW) return true;
    const numRows = result.numRows();
    result.seek(numRows > 0 ? numRows - 1 : 0);
    const row = result.fetchRow() ?? [];
    const [, clauseIsUnique] = await getUniqueCondition(this.properties.fieldsMeta, row, this.uniqueContext(), {
      expressions: statement?.expressions,
    });
    result.seek(0);
    return clauseIsUnique;
  }

  private async getResultsOperations(hasPrintLink: boolean, info: StatementInfo): Promise<ResultsOperationsData> {
    const urlParams: UrlParams = {
      db: this.db,
      table: this.table,
      printview: '1',
      sql_query: this.sqlQuery,
    };

    let hasGeometry = false;
    if (info.queryType === 'SELECT' && !info.isProcedure) {
      const tableCount = info.selectTables.length;
      if (tableCount === 1) urlParams.single_table = 'true';
      if (tableCount === 0) urlParams.raw_query = 'true';
      urlParams.unlim_num_rows = this.properties.unlimNumRows;

      if (this.table === '' && this.db !== '') {
        urlParams.table = await this.context.catalog.getFirstTable(this.db);
      }
      hasGeometry = this.properties.fieldsMeta.some(meta => meta.isMappedTypeGeometry);
    }

    return {
      has_procedure: info.isProcedure,
      has_geometry: hasGeometry,
      has_print_link: hasPrintLink,
      has_export_link: info.queryType === 'SELECT',
      url_params: urlParams,
    };
  }

  // --- entry point ---

  /**
   * Renders the whole grid for `result`.
   * @param isLimitedDisplay hides navigation, sorting and options (e.g. inside other pages)
   */
  async getTable(
    result: ResultSet,
    displayParts: DisplayParts,
    info: StatementInfo,
    isLimitedDisplay = false
  ): Promise<string> {
    const { template, generator, settings } = this.context;
    this.columnParams = null;
    this.whereClauseMap = {};
    this.displayParams = { emptypre: 0, emptyafter: 0, desc: [] };

    const statement = isSelectStatement(info.statement) ? info.statement : null;

    const showTable = this.properties.showTable;
    const isInnodb = showTable?.engine === 'InnoDB';
    const [preCount, afterCount] = isInnodb && isJustBrowsing(info)
      ? ['~', generator.showHint('May be approximate. See FAQ 3.11.')]
      : ['', ''];

    const [parts, total] = await this.setDisplayPartsAndTotal(displayParts);

    let posNext = 0;
    let posPrevious = 0;
    if (parts.hasNavigationBar) [posNext, posPrevious] = this.getOffsets();

    const sortExpression: string[] = [];
    const sortExpressionNoDirection: string[] = [];
    const sortDirection: string[] = [];
    if (statement !== null && statement.orderBy.length > 0) {
      for (const item of statement.orderBy) {
        sortExpression.push(`${item.expr.expr} ${item.direction}`);
        sortExpressionNoDirection.push(item.expr.expr);
        sortDirection.push(item.direction);
      }
    } else {
      sortExpression.push('');
      sortExpressionNoDirection.push('');
      sortDirection.push('');
    }

    let sortedColumnMessage = '';
    for (const expression of sortExpressionNoDirection) {
      sortedColumnMessage += await this.getSortedColumnMessage(result, expression);
    }

    let sqlQueryMessage = '';
    if (parts.hasNavigationBar) {
      const message = await this.setMessageInformation(
        sortedColumnMessage,
        statement,
        total,
        posNext,
        preCount,
        afterCount
      );
      sqlQueryMessage = generator.getMessage(message, this.sqlQuery, 'success');
    } else if (!this.properties.printView && !isLimitedDisplay) {
      sqlQueryMessage = generator.getMessage('Your SQL query has been executed successfully.', this.sqlQuery, 'success');
    }

    const firstField = this.properties.fieldsMeta[0];
    if (this.table === '' && info.queryType === 'SELECT' && firstField !== undefined) {
      this.table = firstField.table;
    }

    let unsortedSqlQuery = '';
    let sortByKey: SortByKeyData | null = null;
    if (parts.hasSortLink && statement !== null) {
      unsortedSqlQuery = replaceClause(statement, 'ORDER BY', '');
      if (this.isSelect(info)) {
        sortByKey = await this.getSortByKeyDropDown(sortExpression, unsortedSqlQuery);
      }
    }

    let navigation: NavigationData | null = null;
    if (parts.hasNavigationBar && statement !== null && statement.limit === undefined) {
      navigation = this.getTableNavigation(posNext, posPrevious, isInnodb, sortByKey);
    }

    let map: ForeignKeyMap = {};
    if (this.table !== '') {
      map = await this.getForeignKeyRelatedTables();
      const second = this.properties.fieldsMeta[1];
      if (this.properties.isBrowseDistinct && second !== undefined) {
        map[second.name] = { table: this.table, field: second.name, displayField: '', database: this.db };
      }
    }

    const headers = await this.getTableHeaders(
      parts,
      info,
      sortExpression,
      sortExpressionNoDirection,
      sortDirection,
      isLimitedDisplay,
      unsortedSqlQuery
    );

    await this.setMimeMap();
    const body = await this.getTableBody(result, parts, map, info, isLimitedDisplay);

    const clauseIsUnique = await this.isClauseUnique(result, statement, parts.deleteLink);

    let operations: ResultsOperationsData | null = null;
    if (!this.properties.printView && !isLimitedDisplay) {
      operations = await this.getResultsOperations(parts.hasPrintLink, info);
    }

    const { features } = this.context.relation.parameters;
    return template.render('table', {
      sql_query_message: sqlQueryMessage,
      navigation,
      headers,
      body,
      has_bulk_links: parts.deleteLink === DELETE_LINK.DELETE_ROW,
      has_export_button: parts.deleteLink === DELETE_LINK.DELETE_ROW && info.queryType === 'SELECT',
      clause_is_unique: clauseIsUnique,
      operations,
      db: this.db,
      table: this.table,
      unique_id: this.uniqueId,
      sql_query: this.sqlQuery,
      goto: this.goto,
      unlim_num_rows: this.properties.unlimNumRows,
      displaywork: features.display,
      relwork: features.relation,
      save_cells_at_once: settings.SaveCellsAtOnce,
      default_sliders_state: settings.InitialSlidersState,
      text_dir: this.properties.textDir,
      is_browse_distinct: this.properties.isBrowseDistinct,
    });
  }
}
