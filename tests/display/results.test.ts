import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCacheAdapter } from '../../src/cache/adapters/memory-cache-adapter.js';
import { resolveSettings } from '../../src/config/settings.js';
import { analyzeStatement } from '../../src/core/sql/statement-info.js';
import { BINARY_CHARSET, FieldMetadata, MYSQL_TYPES } from '../../src/database/field-metadata.js';
import { TableCatalog } from '../../src/database/catalog.js';
import { DatabaseInterface } from '../../src/database/database-interface.js';
import { Results } from '../../src/display/results.js';
import { Generator } from '../../src/html/generator.js';
import { createDisplaySession, type DisplaySession } from '../../src/session/display-session.js';
import { Relation } from '../../src/storage/relation.js';
import { createRelationParameters } from '../../src/storage/relation-parameters.js';
import { Template } from '../../src/templates/template.js';
import { emptyTransformOptions } from '../../src/transformations/transformations-plugin.js';
import { FakeExecutor } from '../support/fake-executor.js';

const settings = resolveSettings();

const createResults = (session: DisplaySession, sqlQuery: string): Results => {
  const dbi = new DatabaseInterface(new FakeExecutor());
  const catalog = new TableCatalog(dbi, settings);
  const relation = new Relation(catalog, new MemoryCacheAdapter(), createRelationParameters());
  const generator = new Generator();
  const template = new Template({ generator });
  return new Results(
    { dbi, catalog, relation, template, generator, settings, session },
    { db: 'shop', table: 'customers', server: 1, goto: '', sqlQuery }
  );
};

describe('Results', () => {
  const sql = 'SELECT * FROM `customers`';
  let session: DisplaySession;
  let results: Results;

  beforeEach(() => {
    session = createDisplaySession('s1', settings);
    results = createResults(session, sql);
  });

  describe('setConfigParamsForDisplayTable', () => {
    it('should apply request options to the session', () => {
      results.setConfigParamsForDisplayTable(analyzeStatement(sql), { session_max_rows: '50', pos: '100', pftext: 'F' });

      expect(session.tmpval.max_rows).toBe(50);
      expect(session.tmpval.pos).toBe(100);
      expect(session.tmpval.pftext).toBe('F');
      expect(Object.values(session.tmpval.query)).toHaveLength(1);
    });

    it('should clamp negative positions to zero', () => {
      results.setConfigParamsForDisplayTable(analyzeStatement(sql), { pos: '-20' });
      expect(session.tmpval.pos).toBe(0);
    });

    it('should remember options per query', () => {
      results.setConfigParamsForDisplayTable(analyzeStatement(sql), { session_max_rows: 'all' });
      results.setConfigParamsForDisplayTable(analyzeStatement(sql), {});

      expect(session.tmpval.max_rows).toBe('all');
    });

    it('should show EXPLAIN output in full text', () => {
      const explain = 'EXPLAIN SELECT * FROM `customers`';
      createResults(session, explain).setConfigParamsForDisplayTable(analyzeStatement(explain), {});
      expect(session.tmpval.pftext).toBe('F');
    });

    it('should keep at most ten remembered queries', () => {
      for (let i = 0; i < 12; i++) {
        const query = `SELECT * FROM \`customers\` WHERE id = ${i}`;
        createResults(session, query).setConfigParamsForDisplayTable(analyzeStatement(query), {});
      }

      const remembered = Object.values(session.tmpval.query).map(memory => memory.sql);
      expect(remembered).toHaveLength(10);
      expect(remembered[0]).toBe('SELECT * FROM `customers` WHERE id = 2');
      expect(remembered[9]).toBe('SELECT * FROM `customers` WHERE id = 11');
    });
  });

  it('should compute next and previous offsets', () => {
    session.tmpval.pos = 30;
    session.tmpval.max_rows = 25;
    expect(results.getOffsets()).toEqual([55, 5]);

    session.tmpval.max_rows = 'all';
    expect(results.getOffsets()).toEqual([0, 0]);
  });

  it('should keep the position when rows per page is zero', () => {
    session.tmpval.pos = 30;
    session.tmpval.max_rows = 0;
    expect(results.getOffsets()).toEqual([30, 30]);
  });

  describe('handleNonPrintableContents', () => {
    const binary = new FieldMetadata({ name: 'code', columnType: MYSQL_TYPES.STRING, characterSet: BINARY_CHARSET });

    it('should show binary strings holding DEL as text', () => {
      session.tmpval.display_binary = true;
      expect(results.handleNonPrintableContents('BINARY', Buffer.from('a\x7Fb'), null, emptyTransformOptions(), binary))
        .toEqual(['a\x7Fb', false]);
    });

    it('should show binary strings holding C0 controls as hex', () => {
      session.tmpval.display_binary = true;
      expect(results.handleNonPrintableContents('BINARY', Buffer.from('a\x01b'), null, emptyTransformOptions(), binary))
        .toEqual(['0x610162', false]);
    });

    it('should summarise NULL contents', () => {
      expect(results.handleNonPrintableContents('BINARY', null, null, emptyTransformOptions(), binary))
        .toEqual(['[BINARY - NULL]', false]);
    });
  });

  it('should truncate long text in partial text mode only', () => {
    const long = 'x'.repeat(60);
    expect(results.getPartialText(long)).toEqual([true, `${'x'.repeat(50)}...`, 60]);

    session.tmpval.pftext = 'F';
    expect(results.getPartialText(long)).toEqual([false, long, 60]);
  });

  it('should tell whether a column is in the sort expression', () => {
    expect(results.isInSorted(['`name` DESC'], ['`name`'], '', 'name')).toBe(true);
    expect(results.isInSorted(['`name` DESC'], ['`name`'], '', 'id')).toBe(false);
    expect(results.isInSorted([''], [''], '', 'name')).toBe(false);
  });

  it('should shorten long SELECTs carried in row links', () => {
    expect(results.getUrlSqlQuery(analyzeStatement(sql))).toBe(sql);

    const long = `SELECT id, name FROM \`customers\` WHERE note = '${'x'.repeat(200)}'`;
    expect(createResults(session, long).getUrlSqlQuery(analyzeStatement(long))).toBe('SELECT id, name FROM `customers`');
  });
});
