import { describe, it, expect } from 'vitest';
import { buildStatement, getClause, replaceClause } from '../../src/core/sql/clause-utils.js';
import { parseStatement } from '../../src/core/sql/statement-parser.js';
import { isSelectStatement, type SelectStatementNode } from '../../src/core/ast/statement.js';

const parseSelect = (sql: string): SelectStatementNode => {
  const { statement } = parseStatement(sql);
  if (!isSelectStatement(statement)) throw new Error('expected a SELECT');
  return statement;
};

describe('clause utils', () => {
  const statement = parseSelect('SELECT * FROM `t` WHERE a = 1 ORDER BY b LIMIT 5');

  it('returns clause bodies without keywords', () => {
    expect(getClause(statement, 'FROM')).toBe('`t`');
    expect(getClause(statement, 'WHERE')).toBe('a = 1');
    expect(getClause(statement, 'GROUP BY')).toBe('');
  });

  it('replaces an existing clause', () => {
    expect(replaceClause(statement, 'LIMIT', 'LIMIT 0, 25')).toBe(
      'SELECT * FROM `t` WHERE a = 1 ORDER BY b LIMIT 0, 25'
    );
  });

  it('drops clauses replaced by an empty string', () => {
    expect(buildStatement(statement, { 'ORDER BY': '', LIMIT: '' })).toBe('SELECT * FROM `t` WHERE a = 1');
  });

  it('inserts a missing clause in MySQL clause order', () => {
    const limited = parseSelect('SELECT * FROM t WHERE a = 1 LIMIT 5');
    expect(replaceClause(limited, 'ORDER BY', 'ORDER BY `b` DESC')).toBe(
      'SELECT * FROM t WHERE a = 1 ORDER BY `b` DESC LIMIT 5'
    );
  });

  it('appends a clause that follows every present one', () => {
    const plain = parseSelect('SELECT * FROM t');
    expect(replaceClause(plain, 'LIMIT', 'LIMIT 0, 25')).toBe('SELECT * FROM t LIMIT 0, 25');
  });

  it('replaces the LIMIT that follows the last UNION branch', () => {
    const union = parseSelect('SELECT a FROM t UNION SELECT a FROM u LIMIT 5');
    expect(getClause(union, 'LIMIT')).toBe('5');
    expect(replaceClause(union, 'LIMIT', 'LIMIT 0, 25')).toBe('SELECT a FROM t UNION SELECT a FROM u LIMIT 0, 25');
  });

  it('keeps the parentheses of UNION branches', () => {
    const union = parseSelect('(SELECT a FROM t) UNION (SELECT a FROM u) ORDER BY a');
    expect(getClause(union, 'ORDER BY')).toBe('a');
    expect(buildStatement(union, { 'ORDER BY': '', LIMIT: '' })).toBe('(SELECT a FROM t) UNION (SELECT a FROM u)');
    expect(replaceClause(union, 'ORDER BY', 'ORDER BY a DESC')).toBe(
      '(SELECT a FROM t) UNION (SELECT a FROM u) ORDER BY a DESC'
    );
  });

  it('rebuilds the statement unchanged without overrides', () => {
    expect(buildStatement(parseSelect('SELECT a  FROM t   WHERE b'))).toBe('SELECT a FROM t WHERE b');
  });
});
