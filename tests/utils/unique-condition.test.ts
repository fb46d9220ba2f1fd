import { describe, it, expect } from 'vitest';
import type { ColumnDefinition } from '../../src/core/execution/db-executor.js';
import { FIELD_FLAGS, FieldMetadata, MYSQL_TYPES } from '../../src/database/field-metadata.js';
import { getUniqueCondition, type UniqueConditionContext } from '../../src/utils/unique-condition.js';

const field = (definition: ColumnDefinition): FieldMetadata =>
  new FieldMetadata({ table: 't', orgTable: 't', db: 'shop', ...definition });

const views = new Set<string>();
const ctx: UniqueConditionContext = {
  quoteString: value => `'${value.replaceAll("'", "''")}'`,
  isView: async table => views.has(table),
};

const id = field({ name: 'id', columnType: MYSQL_TYPES.LONG, flags: FIELD_FLAGS.PRI_KEY | FIELD_FLAGS.NOT_NULL });
const name = field({ name: 'name', columnType: MYSQL_TYPES.VAR_STRING, characterSet: 255 });
const price = field({ name: 'price', columnType: MYSQL_TYPES.NEWDECIMAL });

describe('getUniqueCondition', () => {
  it('should prefer primary key columns', async () => {
    const result = await getUniqueCondition([id, name], ['7', "O'Brien"], ctx);

    expect(result).toEqual(['`t`.`id` = 7', true, { '`t`.`id`': '= 7' }]);
  });

  it('should fall back to unique key columns', async () => {
    const email = field({ name: 'email', columnType: MYSQL_TYPES.VAR_STRING, flags: FIELD_FLAGS.UNIQUE_KEY });
    const [where, unique] = await getUniqueCondition([name, email], ['Ann', 'ann@example.com'], ctx);

    expect(where).toBe("`t`.`email` = 'ann@example.com'");
    expect(unique).toBe(true);
  });

  it('should use every column without keys and wrap real columns in CONCAT', async () => {
    const [where, unique, map] = await getUniqueCondition([name, price], ["O'Brien", '9.50'], ctx);

    expect(where).toBe("`t`.`name` = 'O''Brien' AND CONCAT(`t`.`price`) = '9.50'");
    expect(unique).toBe(false);
    expect(map).toEqual({ '`t`.`name`': "= 'O''Brien'", 'CONCAT(`t`.`price`)': "= '9.50'" });
  });

  it('should return an empty clause under forceUnique when no key is present', async () => {
    expect(await getUniqueCondition([name], ['Ann'], ctx, { forceUnique: true })).toEqual(['', true, {}]);
  });

  it('should compare NULL cells with IS NULL', async () => {
    const [where] = await getUniqueCondition([name], [null], ctx);
    expect(where).toBe('`t`.`name` IS NULL');
  });

  it('should cast binary values from hex', async () => {
    const blob = field({ name: 'data', columnType: MYSQL_TYPES.BLOB, characterSet: 63 });
    const [where] = await getUniqueCondition([blob], [Buffer.from([0xde, 0xad])], ctx);
    expect(where).toBe('`t`.`data` = CAST(0xdead AS BINARY)');
  });

  it('should write BIT values as bit literals', async () => {
    const flags = field({ name: 'flags', columnType: MYSQL_TYPES.BIT, columnLength: 4 });
    const [where] = await getUniqueCondition([flags], [Buffer.from([5])], ctx);
    expect(where).toBe("`t`.`flags` = b'0101'");
  });

  it('should replace table aliases with the table name unless it is a view', async () => {
    const aliased = new FieldMetadata({ name: 'id', orgName: 'id', table: 'o', orgTable: 'orders', columnType: MYSQL_TYPES.LONG });
    expect((await getUniqueCondition([aliased], ['3'], ctx))[0]).toBe('`orders`.`id` = 3');

    views.add('o');
    try {
      expect((await getUniqueCondition([aliased], ['3'], ctx))[0]).toBe('`o`.`id` = 3');
    } finally {
      views.delete('o');
    }
  });

  it('should map column aliases back through the select expressions', async () => {
    const alias = new FieldMetadata({ name: 'n', orgName: '', table: 't', orgTable: 't', columnType: MYSQL_TYPES.VAR_STRING });
    const [where] = await getUniqueCondition([alias], ['Ann'], ctx, {
      expressions: [{ type: 'Expression', expr: 'name', column: 'name', alias: 'n' }],
    });
    expect(where).toBe("`t`.`name` = 'Ann'");
  });

  it('should skip columns of other tables when restricted', async () => {
    expect(await getUniqueCondition([id], ['7'], ctx, { restrictToTable: 'x' })).toEqual(['', false, {}]);
  });
});
