import { SELECT_CLAUSES, type SelectClauseName } from './sql.js';
import type { SelectStatementNode } from '../ast/statement.js';

/** Replacement text per clause, keyword included; an empty string drops the clause. */
export type ClauseOverrides = Partial<Record<SelectClauseName, string>>;

const clauseIndex = (name: SelectClauseName): number => SELECT_CLAUSES.indexOf(name);

// clauses that follow the last branch of a UNION
const UNION_CLAUSES: readonly SelectClauseName[] = ['ORDER BY', 'LIMIT'];

const isUnion = (statement: SelectStatementNode): boolean => statement.unionStart !== undefined;

const buildUnion = (statement: SelectStatementNode, overrides: ClauseOverrides): string => {
  const cut = statement.unionClauses[0]?.start ?? statement.statementEnd;
  const parts = [statement.source.slice(statement.start, cut).trim()];
  for (const name of UNION_CLAUSES) {
    const range = statement.unionClauses.find(clause => clause.name === name);
    const text = overrides[name] ?? (range ? statement.source.slice(range.start, range.end) : '');
    if (text.trim() !== '') parts.push(text.trim());
  }
  return parts.join(' ');
};

/**
 * Body of a clause without its keyword, or '' when the statement has none.
 */
export const getClause = (statement: SelectStatementNode, name: SelectClauseName): string => {
  const ranges = isUnion(statement) && UNION_CLAUSES.includes(name) ? statement.unionClauses : statement.clauses;
  const range = ranges.find(clause => clause.name === name);
  return range ? statement.source.slice(range.bodyStart, range.end).trim() : '';
};

/**
 * Rebuilds the statement with the given clauses replaced, inserted or removed.
 * Absent clauses are inserted before the first present clause that follows them
 * in MySQL's clause order. A UNION keeps its branches as written; only the
 * ORDER BY and LIMIT after its last branch change.
 */
export const buildStatement = (statement: SelectStatementNode, overrides: ClauseOverrides = {}): string => {
  if (isUnion(statement)) return buildUnion(statement, overrides);

  const segments: { name: SelectClauseName; text: string }[] = statement.clauses.map(clause => ({
    name: clause.name,
    text: overrides[clause.name] ?? statement.source.slice(clause.start, clause.end).trim(),
  }));

  for (const name of SELECT_CLAUSES) {
    const text = overrides[name];
    if (text === undefined || text === '' || segments.some(segment => segment.name === name)) continue;
    const before = segments.findIndex(segment => clauseIndex(segment.name) > clauseIndex(name));
    const segment = { name, text };
    if (before === -1) segments.push(segment);
    else segments.splice(before, 0, segment);
  }

  return segments.map(segment => segment.text.trim()).filter(text => text !== '').join(' ');
};

/**
 * Replaces one clause; `replacement` carries the keyword (e.g. `LIMIT 0, 25`).
 */
export const replaceClause = (
  statement: SelectStatementNode,
  name: SelectClauseName,
  replacement: string
): string => buildStatement(statement, { [name]: replacement });
