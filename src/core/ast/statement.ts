import type { OrderDirection, SelectClauseName, StatementType } from '../sql/sql.js';

/**
 * An expression as it appears in the select list, ORDER BY or GROUP BY
 */
export interface ExpressionNode {
  type: 'Expression';
  /** Expression source text, without its alias */
  expr: string;
  /** Database qualifier of a column reference */
  database?: string;
  /** Table qualifier of a column reference */
  table?: string;
  /** Column name of a column reference */
  column?: string;
  /** Alias given with or without AS */
  alias?: string;
  /** Upper-cased name of the first function called at the top level */
  function?: string;
  /** Set to 'SELECT' when the expression is a subquery */
  subquery?: 'SELECT';
}

/**
 * A table reference of the FROM clause or of a JOIN
 */
export interface TableReferenceNode {
  type: 'TableReference';
  /** Source text of the reference, alias included */
  expr: string;
  database?: string;
  table?: string;
  alias?: string;
  /** True when the reference is a derived table */
  subquery: boolean;
}

export interface JoinNode {
  type: 'Join';
  /** Join keywords, e.g. 'LEFT JOIN' */
  kind: string;
  table: TableReferenceNode;
  /** ON condition text */
  on?: string;
  /** USING column list */
  using?: string[];
}

/**
 * One operand of a WHERE or HAVING clause; logical operators are kept as their own entries
 */
export interface ConditionNode {
  type: 'Condition';
  expr: string;
  /** Column and table names referenced by the condition */
  identifiers: string[];
  isOperator: boolean;
}

export interface OrderByItemNode {
  type: 'OrderByItem';
  expr: ExpressionNode;
  direction: OrderDirection;
}

export interface LimitNode {
  type: 'Limit';
  offset: number;
  rowCount: number;
}

export interface ProcedureNode {
  type: 'Procedure';
  name: string;
  /** Argument text between the parentheses */
  params: string;
}

export interface IntoNode {
  type: 'Into';
  kind: 'OUTFILE' | 'DUMPFILE' | 'VARIABLES';
  /** File name or variable list */
  target: string;
}

/**
 * Source range of a clause: `start` is the keyword, `bodyStart` follows it
 */
export interface ClauseRange {
  name: SelectClauseName;
  start: number;
  bodyStart: number;
  end: number;
}

export interface UnionNode {
  /** 'UNION', 'UNION ALL' or 'UNION DISTINCT' */
  kind: string;
  statement: SelectStatementNode;
}

export interface SelectStatementNode {
  type: 'SelectStatement';
  /** Statement text the offsets refer to */
  source: string;
  options: string[];
  expressions: ExpressionNode[];
  from: TableReferenceNode[];
  joins: JoinNode[];
  where: ConditionNode[];
  groupBy: ExpressionNode[];
  having: ConditionNode[];
  orderBy: OrderByItemNode[];
  limit?: LimitNode;
  procedure?: ProcedureNode;
  into?: IntoNode;
  forUpdate: boolean;
  lockInShareMode: boolean;
  unions: UnionNode[];
  clauses: ClauseRange[];
  /** ORDER BY and LIMIT after the last UNION branch; they apply to the whole result */
  unionClauses: ClauseRange[];
  /** Start offset of the statement, opening parentheses included */
  start: number;
  /** End offset of this SELECT, before any UNION */
  end: number;
  /** Offset of the first UNION keyword */
  unionStart?: number;
  /** End offset of the whole statement, unions included */
  statementEnd: number;
}

export interface AlterOperationNode {
  /** Upper-cased leading keyword, e.g. 'DROP' or 'ADD' */
  action: string;
  /** Column name, for column operations */
  column?: string;
}

/**
 * Any statement other than SELECT
 */
export interface GenericStatementNode {
  type: 'GenericStatement';
  kind: Exclude<StatementType, 'SELECT'>;
  source: string;
  /** Upper-cased words at the top level, in order */
  words: string[];
  /** Target database of the statement, when it names one */
  database?: string;
  /** Target table of the statement, when it names one */
  table?: string;
  /** ALTER TABLE operations */
  alterations: AlterOperationNode[];
}

export type StatementNode = SelectStatementNode | GenericStatementNode;

export interface ParseError {
  message: string;
  /** Offset of the offending token in the source */
  position: number;
  token?: string;
}

export interface ParseResult {
  statement: StatementNode | null;
  errors: ParseError[];
}

export const isSelectStatement = (statement: StatementNode | null | undefined): statement is SelectStatementNode =>
  statement?.type === 'SelectStatement';
