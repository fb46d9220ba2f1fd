import { describe, it, expect } from 'vitest';
import { parseStatement } from '../../src/core/sql/statement-parser.js';
import { isSelectStatement, type SelectStatementNode, type StatementNode } from '../../src/core/ast/statement.js';

const select = (statement: StatementNode | null): SelectStatementNode => {
  if (!isSelectStatement(statement)) throw new Error('expected a SELECT');
  return statement;
};

describe('parseStatement', () => {
  describe('SELECT', () => {
    const sql =
      'SELECT DISTINCT u.id, u.name AS n, COUNT(*) FROM shop.users u ' +
      'LEFT JOIN orders o ON o.user_id = u.id ' +
      'WHERE u.id > 3 AND u.age BETWEEN 1 AND 5 ORDER BY u.name DESC LIMIT 10, 20';
    const { statement, errors } = parseStatement(sql);
    const parsed = select(statement);

    it('parses without errors', () => {
      expect(errors).toEqual([]);
    });

    it('reads options and the select list', () => {
      expect(parsed.options).toEqual(['DISTINCT']);
      expect(parsed.expressions).toEqual([
        { type: 'Expression', expr: 'u.id', column: 'id', table: 'u' },
        { type: 'Expression', expr: 'u.name', alias: 'n', column: 'name', table: 'u' },
        { type: 'Expression', expr: 'COUNT(*)', function: 'COUNT' },
      ]);
    });

    it('reads tables and joins', () => {
      expect(parsed.from).toEqual([
        { type: 'TableReference', expr: 'shop.users u', table: 'users', database: 'shop', alias: 'u', subquery: false },
      ]);
      expect(parsed.joins).toHaveLength(1);
      expect(parsed.joins[0].kind).toBe('LEFT JOIN');
      expect(parsed.joins[0].table.table).toBe('orders');
      expect(parsed.joins[0].table.alias).toBe('o');
      expect(parsed.joins[0].on).toBe('o.user_id = u.id');
    });

    it('keeps BETWEEN ... AND in one condition', () => {
      expect(parsed.where.map(condition => condition.expr)).toEqual([
        'u.id > 3',
        'AND',
        'u.age BETWEEN 1 AND 5',
      ]);
      expect(parsed.where[0].identifiers).toEqual(['u', 'id']);
      expect(parsed.where[1].isOperator).toBe(true);
    });

    it('reads ORDER BY and LIMIT', () => {
      expect(parsed.orderBy).toHaveLength(1);
      expect(parsed.orderBy[0].direction).toBe('DESC');
      expect(parsed.orderBy[0].expr.column).toBe('name');
      expect(parsed.limit).toEqual({ type: 'Limit', offset: 10, rowCount: 20 });
    });

    it('reads LIMIT ... OFFSET', () => {
      const parsedOffset = select(parseStatement('SELECT * FROM t LIMIT 5 OFFSET 15').statement);
      expect(parsedOffset.limit).toEqual({ type: 'Limit', offset: 15, rowCount: 5 });
    });

    it('marks subqueries in the select list', () => {
      const parsedSub = select(parseStatement('SELECT (SELECT 1) AS x FROM t').statement);
      expect(parsedSub.expressions).toEqual([
        { type: 'Expression', expr: '(SELECT 1)', alias: 'x', subquery: 'SELECT' },
      ]);
    });

    it('records where UNION starts', () => {
      const union = 'SELECT a FROM t UNION ALL SELECT a FROM u';
      const parsedUnion = select(parseStatement(union).statement);
      expect(parsedUnion.unions.map(part => part.kind)).toEqual(['UNION ALL']);
      expect(parsedUnion.unionStart).toBe(union.indexOf('UNION'));
      expect(parsedUnion.statementEnd).toBe(union.length);
    });

    it('gives ORDER BY and LIMIT after the last branch to the whole UNION', () => {
      const union = 'SELECT a FROM t UNION SELECT a FROM u ORDER BY a DESC LIMIT 10';
      const parsedUnion = select(parseStatement(union).statement);
      expect(parsedUnion.limit).toEqual({ type: 'Limit', offset: 0, rowCount: 10 });
      expect(parsedUnion.orderBy.map(item => item.direction)).toEqual(['DESC']);
      expect(parsedUnion.unions[0]?.statement.limit).toBeUndefined();
      expect(parsedUnion.unions[0]?.statement.orderBy).toEqual([]);
      expect(parsedUnion.unionClauses.map(clause => clause.name)).toEqual(['ORDER BY', 'LIMIT']);
    });

    it('stops at the first statement', () => {
      const parsedFirst = select(parseStatement('SELECT 1; DROP TABLE t').statement);
      expect(parsedFirst.end).toBe(8);
    });
  });

  describe('other statements', () => {
    it('reads ALTER TABLE operations', () => {
      const { statement } = parseStatement('ALTER TABLE `shop`.`users` DROP COLUMN `age`, ADD INDEX (name)');
      expect(statement).toMatchObject({
        type: 'GenericStatement',
        kind: 'ALTER',
        database: 'shop',
        table: 'users',
        alterations: [{ action: 'DROP', column: 'age' }, { action: 'ADD' }],
      });
    });

    it('reads DROP targets', () => {
      expect(parseStatement('DROP TABLE IF EXISTS `t1`').statement).toMatchObject({
        kind: 'DROP',
        table: 't1',
        words: ['DROP', 'TABLE', 'IF', 'EXISTS'],
      });
      expect(parseStatement('DROP DATABASE shop').statement).toMatchObject({ kind: 'DROP', database: 'shop' });
    });

    it('reads DML targets', () => {
      expect(parseStatement('INSERT INTO shop.t VALUES (1)').statement).toMatchObject({ kind: 'INSERT', database: 'shop', table: 't' });
      expect(parseStatement('UPDATE LOW_PRIORITY t SET a = 1').statement).toMatchObject({ kind: 'UPDATE', table: 't' });
      expect(parseStatement('DELETE FROM t WHERE 1').statement).toMatchObject({ kind: 'DELETE', table: 't' });
    });

    it('maps DESCRIBE to EXPLAIN and unknown verbs to OTHER', () => {
      expect(parseStatement('DESCRIBE t').statement).toMatchObject({ kind: 'EXPLAIN' });
      expect(parseStatement('FLUSH PRIVILEGES').statement).toMatchObject({ kind: 'OTHER' });
    });
  });

  describe('errors', () => {
    it('reports an unterminated string', () => {
      expect(parseStatement("SELECT 'abc").errors[0]).toEqual({
        message: "Ending quote ' was expected.",
        position: 7,
        token: "'abc",
      });
    });

    it('reports a missing closing bracket', () => {
      expect(parseStatement('SELECT (1').errors).toEqual([
        { message: 'A closing bracket was expected.', position: 9 },
      ]);
    });

    it('reports a malformed LIMIT', () => {
      expect(parseStatement('SELECT * FROM t LIMIT a').errors).toEqual([
        { message: 'Unexpected tokens in LIMIT clause.', position: 22, token: 'a' },
      ]);
    });

    it('returns no statement for empty input', () => {
      expect(parseStatement('  -- nothing').statement).toBeNull();
    });
  });
});
