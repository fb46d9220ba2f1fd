import { significantTokens, tokenize, type Token } from './tokenizer.js';
import {
  RESERVED_WORDS,
  SELECT_OPTIONS,
  STATEMENT_TYPES,
  type OrderDirection,
  type SelectClauseName,
  type StatementType
} from './sql.js';
import type {
  AlterOperationNode,
  ClauseRange,
  ConditionNode,
  ExpressionNode,
  GenericStatementNode,
  IntoNode,
  JoinNode,
  LimitNode,
  OrderByItemNode,
  ParseError,
  ParseResult,
  ProcedureNode,
  SelectStatementNode,
  TableReferenceNode,
  UnionNode
} from '../ast/statement.js';

const SELECT_OPTION_WORDS = new Set<string>(SELECT_OPTIONS);
const JOIN_MODIFIERS = new Set(['INNER', 'CROSS', 'LEFT', 'RIGHT', 'NATURAL', 'FULL', 'OUTER']);
const LOGICAL_OPERATORS = new Set(['AND', 'OR', 'XOR', '&&', '||']);
const INDEX_HINTS = new Set(['USE', 'IGNORE', 'FORCE']);
const NON_COLUMN_TARGETS = new Set(['INDEX', 'KEY', 'PRIMARY', 'FOREIGN', 'CHECK', 'CONSTRAINT', 'PARTITION']);

const STATEMENT_KEYWORDS: Record<string, Exclude<StatementType, 'SELECT'>> = {
  SHOW: STATEMENT_TYPES.SHOW,
  EXPLAIN: STATEMENT_TYPES.EXPLAIN,
  DESCRIBE: STATEMENT_TYPES.EXPLAIN,
  DESC: STATEMENT_TYPES.EXPLAIN,
  CALL: STATEMENT_TYPES.CALL,
  INSERT: STATEMENT_TYPES.INSERT,
  REPLACE: STATEMENT_TYPES.REPLACE,
  UPDATE: STATEMENT_TYPES.UPDATE,
  DELETE: STATEMENT_TYPES.DELETE,
  ALTER: STATEMENT_TYPES.ALTER,
  CREATE: STATEMENT_TYPES.CREATE,
  DROP: STATEMENT_TYPES.DROP,
  RENAME: STATEMENT_TYPES.RENAME,
  TRUNCATE: STATEMENT_TYPES.TRUNCATE,
  ANALYZE: STATEMENT_TYPES.ANALYZE,
  CHECK: STATEMENT_TYPES.CHECK,
  CHECKSUM: STATEMENT_TYPES.CHECKSUM,
  OPTIMIZE: STATEMENT_TYPES.OPTIMIZE,
  REPAIR: STATEMENT_TYPES.REPAIR,
  SET: STATEMENT_TYPES.SET,
  USE: STATEMENT_TYPES.USE,
};

// --- token helpers ---

const isWord = (token: Token | undefined, value?: string): boolean =>
  token !== undefined && token.type === 'word' && (value === undefined || token.value === value);

const isPunct = (token: Token | undefined, value: string): boolean =>
  token !== undefined && token.type === 'punctuation' && token.text === value;

const isName = (token: Token | undefined): boolean =>
  token !== undefined && (token.type === 'identifier' || (token.type === 'word' && !RESERVED_WORDS.has(token.value)));

const textOf = (source: string, tokens: Token[]): string =>
  tokens.length === 0 ? '' : source.slice(tokens[0].start, tokens[tokens.length - 1].end);

/** Index of the parenthesis closing the one at `open`, or -1. */
const findClosing = (tokens: Token[], open: number): number => {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (isPunct(tokens[i], '(')) depth++;
    else if (isPunct(tokens[i], ')')) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
};

/** Splits at top-level tokens accepted by `isSeparator`; separators are dropped. */
const splitTopLevel = (tokens: Token[], isSeparator: (token: Token) => boolean): Token[][] => {
  const groups: Token[][] = [];
  let current: Token[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    if (depth === 0 && isSeparator(token)) {
      groups.push(current);
      current = [];
      continue;
    }
    current.push(token);
  }
  groups.push(current);
  return groups;
};

const splitByComma = (tokens: Token[]): Token[][] =>
  splitTopLevel(tokens, token => isPunct(token, ','));

/**
 * Reads a dotted name (`db`.`table`.`column`) starting at `index`.
 */
const readQualifiedName = (tokens: Token[], index: number): { parts: string[]; next: number } => {
  const parts: string[] = [];
  let i = index;
  while (i < tokens.length) {
    const token = tokens[i];
    const isStar = token.type === 'operator' && token.text === '*';
    if (!(isName(token) || (parts.length > 0 && token.type === 'word') || isStar)) break;
    parts.push(isStar ? '*' : token.type === 'identifier' ? token.value : token.text);
    i++;
    if (isStar || !isPunct(tokens[i], '.')) break;
    i++;
  }
  return { parts, next: i };
};

// --- expressions ---

const firstTopLevelFunction = (tokens: Token[]): string | undefined => {
  let depth = 0;
  for (let i = 0; i < tokens.length - 1; i++) {
    const token = tokens[i];
    if (isPunct(token, '(')) depth++;
    else if (isPunct(token, ')')) depth--;
    else if (depth === 0 && token.type === 'word' && isPunct(tokens[i + 1], '(') && !isPunct(tokens[i - 1], '.')) {
      return token.value;
    }
  }
  return undefined;
};

const aliasValue = (token: Token): string =>
  token.type === 'identifier' || token.type === 'string' ? token.value : token.text;

const canPrecedeAlias = (token: Token | undefined): boolean => {
  if (!token) return false;
  if (isPunct(token, ')')) return true;
  if (token.type === 'word') return !RESERVED_WORDS.has(token.value);
  return ['identifier', 'number', 'string', 'literal', 'variable'].includes(token.type);
};

export const parseExpression = (source: string, group: Token[], allowAlias = true): ExpressionNode => {
  let tokens = group;
  let alias: string | undefined;

  if (allowAlias && tokens.length >= 2) {
    const last = tokens[tokens.length - 1];
    const prev = tokens[tokens.length - 2];
    if (isWord(prev, 'AS') && (isName(last) || last.type === 'string' || last.type === 'word')) {
      alias = aliasValue(last);
      tokens = tokens.slice(0, -2);
    } else if (isName(last) && canPrecedeAlias(prev)) {
      alias = aliasValue(last);
      tokens = tokens.slice(0, -1);
    }
  }

  const node: ExpressionNode = { type: 'Expression', expr: textOf(source, tokens) };
  if (alias !== undefined) node.alias = alias;

  if (isPunct(tokens[0], '(') && isWord(tokens[1], 'SELECT')) {
    node.subquery = 'SELECT';
    return node;
  }

  const name = readQualifiedName(tokens, 0);
  if (name.next === tokens.length && name.parts.length > 0 && name.parts.length <= 3) {
    const [column, table, database] = [...name.parts].reverse();
    if (!(name.parts.length === 1 && column === '*')) {
      node.column = column;
      if (table !== undefined) node.table = table;
      if (database !== undefined) node.database = database;
    }
    return node;
  }

  const fn = firstTopLevelFunction(tokens);
  if (fn !== undefined) node.function = fn;
  return node;
};

// --- conditions ---

const collectIdentifiers = (tokens: Token[]): string[] => {
  const identifiers: string[] = [];
  tokens.forEach((token, index) => {
    let name: string | undefined;
    if (token.type === 'identifier') name = token.value;
    else if (token.type === 'word' && !RESERVED_WORDS.has(token.value) && !isPunct(tokens[index + 1], '(')) {
      name = token.text;
    }
    if (name !== undefined && !identifiers.includes(name)) identifiers.push(name);
  });
  return identifiers;
};

export const parseConditions = (source: string, tokens: Token[]): ConditionNode[] => {
  const conditions: ConditionNode[] = [];
  let current: Token[] = [];
  let depth = 0;
  let betweenPending = false;

  const flush = () => {
    if (current.length === 0) return;
    conditions.push({
      type: 'Condition',
      expr: textOf(source, current),
      identifiers: collectIdentifiers(current),
      isOperator: false,
    });
    current = [];
  };

  for (const token of tokens) {
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    const upper = token.type === 'word' ? token.value : token.text;
    if (depth === 0 && isWord(token, 'BETWEEN')) betweenPending = true;
    if (depth === 0 && (token.type === 'word' || token.type === 'operator') && LOGICAL_OPERATORS.has(upper)) {
      if (upper === 'AND' && betweenPending) {
        betweenPending = false;
        current.push(token);
        continue;
      }
      flush();
      conditions.push({ type: 'Condition', expr: upper, identifiers: [], isOperator: true });
      continue;
    }
    current.push(token);
  }
  flush();
  return conditions;
};

// --- FROM / JOIN ---

const parseTableReference = (source: string, tokens: Token[]): TableReferenceNode => {
  const node: TableReferenceNode = { type: 'TableReference', expr: textOf(source, tokens), subquery: false };
  let i = 0;

  if (isPunct(tokens[0], '(')) {
    const close = findClosing(tokens, 0);
    node.subquery = isWord(tokens[1], 'SELECT');
    i = close === -1 ? tokens.length : close + 1;
  } else {
    const name = readQualifiedName(tokens, 0);
    const [table, database] = [...name.parts].reverse();
    if (table !== undefined) node.table = table;
    if (database !== undefined) node.database = database;
    i = name.next;
  }

  while (i < tokens.length) {
    const token = tokens[i];
    if (isWord(token, 'PARTITION') || (token.type === 'word' && INDEX_HINTS.has(token.value))) {
      // skip to the end of the parenthesised list
      const open = tokens.findIndex((candidate, index) => index > i && isPunct(candidate, '('));
      const close = open === -1 ? -1 : findClosing(tokens, open);
      i = close === -1 ? tokens.length : close + 1;
      continue;
    }
    if (isWord(token, 'AS') && tokens[i + 1]) {
      node.alias = aliasValue(tokens[i + 1]);
      i += 2;
      continue;
    }
    if (isName(token) || token.type === 'string') {
      node.alias = aliasValue(token);
    }
    i++;
  }
  return node;
};

const isJoinStart = (tokens: Token[], index: number): boolean => {
  const token = tokens[index];
  if (isWord(token, 'JOIN') || isWord(token, 'STRAIGHT_JOIN')) return true;
  if (token.type !== 'word' || !JOIN_MODIFIERS.has(token.value)) return false;
  let i = index;
  while (tokens[i] && tokens[i].type === 'word' && JOIN_MODIFIERS.has(tokens[i].value)) i++;
  return isWord(tokens[i], 'JOIN');
};

const parseFrom = (source: string, tokens: Token[]): { from: TableReferenceNode[]; joins: JoinNode[] } => {
  // cut the clause into the leading table list and one segment per JOIN
  const segments: Token[][] = [[]];
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    if (depth === 0 && isJoinStart(tokens, i) && !(i > 0 && isJoinStart(tokens, i - 1) && !isWord(tokens[i - 1], 'JOIN'))) {
      segments.push([]);
    }
    segments[segments.length - 1].push(token);
  }

  const [head, ...joinSegments] = segments;
  const from = splitByComma(head)
    .filter(group => group.length > 0)
    .map(group => parseTableReference(source, group));

  const joins = joinSegments.map((segment): JoinNode => {
    const kindWords: string[] = [];
    let i = 0;
    while (i < segment.length && segment[i].type === 'word' && (JOIN_MODIFIERS.has(segment[i].value) || segment[i].value === 'JOIN' || segment[i].value === 'STRAIGHT_JOIN')) {
      kindWords.push(segment[i].value);
      i++;
      if (kindWords[kindWords.length - 1] === 'JOIN' || kindWords[kindWords.length - 1] === 'STRAIGHT_JOIN') break;
    }
    const rest = segment.slice(i);
    let tableEnd = rest.length;
    let depthInner = 0;
    for (let j = 0; j < rest.length; j++) {
      if (isPunct(rest[j], '(')) depthInner++;
      if (isPunct(rest[j], ')')) depthInner--;
      if (depthInner === 0 && (isWord(rest[j], 'ON') || isWord(rest[j], 'USING'))) {
        tableEnd = j;
        break;
      }
    }
    const join: JoinNode = {
      type: 'Join',
      kind: kindWords.join(' '),
      table: parseTableReference(source, rest.slice(0, tableEnd)),
    };
    const condition = rest.slice(tableEnd + 1);
    if (isWord(rest[tableEnd], 'ON')) {
      join.on = textOf(source, condition);
    } else if (isWord(rest[tableEnd], 'USING')) {
      join.using = condition
        .filter(token => isName(token))
        .map(token => aliasValue(token));
    }
    return join;
  });

  return { from, joins };
};

// --- SELECT ---

interface ClauseMatch {
  name: SelectClauseName;
  index: number;
  length: number;
}

const SINGLE_WORD_CLAUSES: Record<string, SelectClauseName> = {
  FROM: 'FROM',
  WHERE: 'WHERE',
  HAVING: 'HAVING',
  WINDOW: 'WINDOW',
  LIMIT: 'LIMIT',
  PROCEDURE: 'PROCEDURE',
  INTO: 'INTO',
};

const matchClauseKeyword = (tokens: Token[], index: number): ClauseMatch | null => {
  const token = tokens[index];
  if (token.type !== 'word') return null;
  const single = SINGLE_WORD_CLAUSES[token.value];
  if (single !== undefined) return { name: single, index, length: 1 };
  const next = tokens[index + 1];
  switch (token.value) {
    case 'GROUP':
      return isWord(next, 'BY') ? { name: 'GROUP BY', index, length: 2 } : null;
    case 'ORDER':
      return isWord(next, 'BY') ? { name: 'ORDER BY', index, length: 2 } : null;
    case 'FOR':
      return isWord(next, 'UPDATE') || isWord(next, 'SHARE') ? { name: 'FOR UPDATE', index, length: 2 } : null;
    case 'LOCK':
      return isWord(next, 'IN') && isWord(tokens[index + 2], 'SHARE') && isWord(tokens[index + 3], 'MODE')
        ? { name: 'LOCK IN SHARE MODE', index, length: 4 }
        : null;
    default:
      return null;
  }
};

const parseLimit = (tokens: Token[], errors: ParseError[]): LimitNode | undefined => {
  const numbers = tokens.filter(token => token.type === 'number');
  const toInt = (token: Token) => Number.parseInt(token.text, 10);
  const valid =
    (tokens.length === 1 && numbers.length === 1) ||
    (tokens.length === 3 && numbers.length === 2 && (isPunct(tokens[1], ',') || isWord(tokens[1], 'OFFSET')));
  if (!valid) {
    errors.push({
      message: 'Unexpected tokens in LIMIT clause.',
      position: tokens[0]?.start ?? 0,
      token: tokens[0]?.text,
    });
    return undefined;
  }
  if (tokens.length === 1) return { type: 'Limit', offset: 0, rowCount: toInt(tokens[0]) };
  if (isWord(tokens[1], 'OFFSET')) return { type: 'Limit', offset: toInt(tokens[2]), rowCount: toInt(tokens[0]) };
  return { type: 'Limit', offset: toInt(tokens[0]), rowCount: toInt(tokens[2]) };
};

const parseOrderBy = (source: string, tokens: Token[]): OrderByItemNode[] =>
  splitByComma(tokens)
    .filter(group => group.length > 0)
    .map(group => {
      const last = group[group.length - 1];
      let direction: OrderDirection = 'ASC';
      let exprTokens = group;
      if (isWord(last, 'ASC') || isWord(last, 'DESC')) {
        direction = last.value === 'DESC' ? 'DESC' : 'ASC';
        exprTokens = group.slice(0, -1);
      }
      return { type: 'OrderByItem', expr: parseExpression(source, exprTokens, false), direction };
    });

const parseProcedure = (source: string, tokens: Token[]): ProcedureNode => {
  const open = tokens.findIndex(token => isPunct(token, '('));
  const close = open === -1 ? -1 : findClosing(tokens, open);
  return {
    type: 'Procedure',
    name: tokens[0]?.value ?? '',
    params: open === -1 || close === -1 ? '' : textOf(source, tokens.slice(open + 1, close)),
  };
};

const parseInto = (source: string, tokens: Token[]): IntoNode => {
  const head = tokens[0];
  if (isWord(head, 'OUTFILE') || isWord(head, 'DUMPFILE')) {
    return {
      type: 'Into',
      kind: head.value === 'OUTFILE' ? 'OUTFILE' : 'DUMPFILE',
      target: tokens[1]?.type === 'string' ? tokens[1].value : textOf(source, tokens.slice(1)),
    };
  }
  return { type: 'Into', kind: 'VARIABLES', target: textOf(source, tokens) };
};

const parseSelect = (source: string, tokens: Token[], errors: ParseError[]): SelectStatementNode => {
  // UNION splits the statement; the first SELECT owns the clause ranges
  const parts: { kind: string; tokens: Token[] }[] = [{ kind: '', tokens: [] }];
  let unionStart: number | undefined;
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    if (depth === 0 && isWord(token, 'UNION')) {
      unionStart ??= token.start;
      let kind = 'UNION';
      if (isWord(tokens[i + 1], 'ALL') || isWord(tokens[i + 1], 'DISTINCT')) {
        kind += ` ${tokens[i + 1].value}`;
        i++;
      }
      parts.push({ kind, tokens: [] });
      continue;
    }
    parts[parts.length - 1].tokens.push(token);
  }

  const [main, ...rest] = parts;
  const lastPart = rest[rest.length - 1];
  const trailer = lastPart === undefined ? null : splitUnionTrailer(lastPart.tokens);
  if (lastPart !== undefined && trailer !== null) lastPart.tokens = trailer.branch;

  const statement = parseSelectPart(source, unwrapParentheses(main.tokens), errors);
  statement.unions = rest.map((part): UnionNode => ({
    kind: part.kind,
    statement: parseSelectPart(source, unwrapParentheses(part.tokens), errors),
  }));
  if (unionStart !== undefined) statement.unionStart = unionStart;
  if (trailer !== null) {
    statement.unionClauses = trailer.ranges;
    statement.orderBy = parseOrderBy(source, trailer.orderBy);
    if (trailer.limit === null) delete statement.limit;
    else statement.limit = parseLimit(trailer.limit, errors);
  }
  statement.start = tokens.length > 0 ? tokens[0].start : 0;
  statement.statementEnd = tokens.length > 0 ? tokens[tokens.length - 1].end : 0;
  return statement;
};

interface UnionTrailer {
  branch: Token[];
  ranges: ClauseRange[];
  orderBy: Token[];
  limit: Token[] | null;
}

// ORDER BY and LIMIT outside parentheses at the end of the last branch
const splitUnionTrailer = (tokens: Token[]): UnionTrailer => {
  const depths: number[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (isPunct(token, ')')) depth--;
    depths.push(depth);
    if (isPunct(token, '(')) depth++;
  }

  const orderAt = tokens.findIndex(
    (token, i) => depths[i] === 0 && isWord(token, 'ORDER') && isWord(tokens[i + 1], 'BY')
  );
  const limitAt = tokens.findIndex(
    (token, i) => depths[i] === 0 && isWord(token, 'LIMIT') && i > orderAt
  );
  const cut = orderAt !== -1 ? orderAt : limitAt;
  if (cut === -1) return { branch: tokens, ranges: [], orderBy: [], limit: null };

  const ranges: ClauseRange[] = [];
  const orderBy = orderAt === -1 ? [] : tokens.slice(orderAt + 2, limitAt === -1 ? tokens.length : limitAt);
  if (orderAt !== -1) {
    const keyword = tokens[orderAt + 1];
    ranges.push({
      name: 'ORDER BY',
      start: tokens[orderAt].start,
      bodyStart: keyword.end,
      end: orderBy.length > 0 ? orderBy[orderBy.length - 1].end : keyword.end,
    });
  }
  const limit = limitAt === -1 ? null : tokens.slice(limitAt + 1);
  if (limitAt !== -1) {
    ranges.push({
      name: 'LIMIT',
      start: tokens[limitAt].start,
      bodyStart: tokens[limitAt].end,
      end: tokens[tokens.length - 1].end,
    });
  }
  return { branch: tokens.slice(0, cut), ranges, orderBy, limit };
};

const unwrapParentheses = (tokens: Token[]): Token[] => {
  let current = tokens;
  while (current.length > 1 && isPunct(current[0], '(') && findClosing(current, 0) === current.length - 1) {
    current = current.slice(1, -1);
  }
  return current;
};

const parseSelectPart = (source: string, tokens: Token[], errors: ParseError[]): SelectStatementNode => {
  const statement: SelectStatementNode = {
    type: 'SelectStatement',
    source,
    options: [],
    expressions: [],
    from: [],
    joins: [],
    where: [],
    groupBy: [],
    having: [],
    orderBy: [],
    forUpdate: false,
    lockInShareMode: false,
    unions: [],
    clauses: [],
    unionClauses: [],
    start: tokens.length > 0 ? tokens[0].start : 0,
    end: tokens.length > 0 ? tokens[tokens.length - 1].end : 0,
    statementEnd: 0,
  };
  if (tokens.length === 0) {
    errors.push({ message: 'A SELECT statement was expected.', position: 0 });
    return statement;
  }

  const matches: ClauseMatch[] = [{ name: 'SELECT', index: 0, length: 1 }];
  let depth = 0;
  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    if (depth !== 0) continue;
    const match = matchClauseKeyword(tokens, i);
    if (!match) continue;
    if (matches.some(existing => existing.name === match.name)) {
      errors.push({ message: `Unexpected ${match.name} clause.`, position: token.start, token: token.text });
      continue;
    }
    matches.push(match);
    i += match.length - 1;
  }

  matches.forEach((match, position) => {
    const next = matches[position + 1];
    const body = tokens.slice(match.index + match.length, next ? next.index : tokens.length);
    const range: ClauseRange = {
      name: match.name,
      start: tokens[match.index].start,
      bodyStart: tokens[match.index + match.length - 1].end,
      end: next ? tokens[next.index].start : statement.end,
    };
    statement.clauses.push(range);

    const expectsBody = match.name !== 'FOR UPDATE' && match.name !== 'LOCK IN SHARE MODE';
    if (expectsBody && body.length === 0) {
      errors.push({ message: 'An expression was expected.', position: range.bodyStart });
      return;
    }

    switch (match.name) {
      case 'SELECT': {
        let i = 0;
        while (i < body.length && body[i].type === 'word' && SELECT_OPTION_WORDS.has(body[i].value)) {
          statement.options.push(body[i].value);
          i++;
        }
        statement.expressions = splitByComma(body.slice(i))
          .filter(group => group.length > 0)
          .map(group => parseExpression(source, group));
        if (statement.expressions.length === 0) {
          errors.push({ message: 'An expression was expected.', position: range.bodyStart });
        }
        break;
      }
      case 'FROM': {
        const { from, joins } = parseFrom(source, body);
        statement.from = from;
        statement.joins = joins;
        break;
      }
      case 'WHERE':
        statement.where = parseConditions(source, body);
        break;
      case 'GROUP BY':
        statement.groupBy = splitByComma(body.filter(token => !isWord(token, 'WITH') && !isWord(token, 'ROLLUP')))
          .filter(group => group.length > 0)
          .map(group => parseExpression(source, group, false));
        break;
      case 'HAVING':
        statement.having = parseConditions(source, body);
        break;
      case 'ORDER BY':
        statement.orderBy = parseOrderBy(source, body);
        break;
      case 'LIMIT':
        statement.limit = parseLimit(body, errors);
        break;
      case 'PROCEDURE':
        statement.procedure = parseProcedure(source, body);
        break;
      case 'INTO':
        statement.into = parseInto(source, body);
        break;
      case 'FOR UPDATE':
        statement.forUpdate = true;
        break;
      case 'LOCK IN SHARE MODE':
        statement.lockInShareMode = true;
        break;
      default:
        break;
    }
  });

  return statement;
};

// --- other statements ---

const readTarget = (tokens: Token[], index: number): { database?: string; table?: string } => {
  let i = index;
  if (isWord(tokens[i], 'IF')) {
    i++;
    if (isWord(tokens[i], 'NOT')) i++;
    if (isWord(tokens[i], 'EXISTS')) i++;
  }
  const { parts } = readQualifiedName(tokens, i);
  const [table, database] = [...parts].reverse();
  return { table, database };
};

const parseAlterations = (tokens: Token[]): AlterOperationNode[] =>
  splitByComma(tokens)
    .filter(group => group.length > 0 && group[0].type === 'word')
    .map(group => {
      const operation: AlterOperationNode = { action: group[0].value };
      let i = 1;
      if (isWord(group[i], 'COLUMN')) i++;
      if (isWord(group[i], 'IF') && isWord(group[i + 1], 'EXISTS')) i += 2;
      const target = group[i];
      if (target && (target.type === 'identifier' || (target.type === 'word' && !NON_COLUMN_TARGETS.has(target.value)))) {
        operation.column = target.type === 'identifier' ? target.value : target.text;
      }
      return operation;
    });

const parseGeneric = (
  source: string,
  tokens: Token[],
  kind: Exclude<StatementType, 'SELECT'>
): GenericStatementNode => {
  const statement: GenericStatementNode = { type: 'GenericStatement', kind, source, words: [], alterations: [] };
  let depth = 0;
  for (const token of tokens) {
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    if (depth === 0 && token.type === 'word') statement.words.push(token.value);
  }

  const indexOfWord = (...values: string[]) => tokens.findIndex(token => token.type === 'word' && values.includes(token.value));
  const assign = (target: { database?: string; table?: string }) => {
    if (target.table !== undefined) statement.table = target.table;
    if (target.database !== undefined) statement.database = target.database;
  };

  switch (kind) {
    case 'ALTER':
    case 'CREATE':
    case 'DROP':
    case 'TRUNCATE':
    case 'RENAME': {
      const databaseWord = indexOfWord('DATABASE', 'SCHEMA');
      const tableWord = indexOfWord('TABLE', 'VIEW');
      if (databaseWord !== -1 && (tableWord === -1 || databaseWord < tableWord)) {
        const target = readTarget(tokens, databaseWord + 1);
        if (target.table !== undefined) statement.database = target.table;
      } else if (tableWord !== -1) {
        const target = readTarget(tokens, tableWord + 1);
        assign(target);
        if (kind === 'ALTER') {
          const { next } = readQualifiedName(tokens, tableWord + 1);
          statement.alterations = parseAlterations(tokens.slice(next));
        }
      } else if (kind === 'TRUNCATE') {
        assign(readTarget(tokens, 1));
      }
      break;
    }
    case 'INSERT':
    case 'REPLACE': {
      const into = indexOfWord('INTO');
      let i = into === -1 ? 1 : into + 1;
      while (tokens[i] && tokens[i].type === 'word' && ['LOW_PRIORITY', 'DELAYED', 'HIGH_PRIORITY', 'IGNORE'].includes(tokens[i].value)) i++;
      assign(readTarget(tokens, i));
      break;
    }
    case 'UPDATE': {
      let i = 1;
      while (tokens[i] && tokens[i].type === 'word' && ['LOW_PRIORITY', 'IGNORE'].includes(tokens[i].value)) i++;
      assign(readTarget(tokens, i));
      break;
    }
    case 'DELETE': {
      const from = indexOfWord('FROM');
      if (from !== -1) assign(readTarget(tokens, from + 1));
      break;
    }
    default:
      break;
  }
  return statement;
};

// --- entry point ---

/**
 * Parses the first statement of `sql`.
 */
export function parseStatement(sql: string): ParseResult {
  const errors: ParseError[] = [];
  const allTokens = tokenize(sql);

  for (const token of allTokens) {
    if (token.type === 'string' || token.type === 'identifier') {
      const quote = token.text[0];
      if (token.text.length < 2 || token.text[token.text.length - 1] !== quote) {
        errors.push({ message: `Ending quote ${quote} was expected.`, position: token.start, token: token.text });
      }
    } else if (token.type === 'comment' && token.text.startsWith('/*') && !token.text.endsWith('*/')) {
      errors.push({ message: 'Ending of comment was expected.', position: token.start, token: token.text });
    }
  }

  const significant = significantTokens(allTokens);
  // keep the first statement only
  let depth = 0;
  let end = significant.length;
  for (let i = 0; i < significant.length; i++) {
    const token = significant[i];
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) {
      depth--;
      if (depth < 0) {
        errors.push({ message: 'Unexpected closing bracket.', position: token.start, token: token.text });
        depth = 0;
      }
    }
    if (depth === 0 && isPunct(token, ';')) {
      end = i;
      break;
    }
  }
  if (depth > 0) {
    errors.push({ message: 'A closing bracket was expected.', position: sql.length });
  }

  const tokens = significant.slice(0, end);
  if (tokens.length === 0) return { statement: null, errors };

  const leading = tokens.find(token => !isPunct(token, '('));
  if (isWord(leading, 'SELECT')) {
    return { statement: parseSelect(sql, tokens, errors), errors };
  }

  const first = tokens[0];
  const kind = first.type === 'word' ? STATEMENT_KEYWORDS[first.value] ?? STATEMENT_TYPES.OTHER : STATEMENT_TYPES.OTHER;
  return { statement: parseGeneric(sql, tokens, kind), errors };
}
