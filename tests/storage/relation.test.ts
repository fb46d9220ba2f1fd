import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCacheAdapter } from '../../src/cache/adapters/memory-cache-adapter.js';
import { TableCatalog } from '../../src/database/catalog.js';
import { DatabaseInterface } from '../../src/database/database-interface.js';
import { Relation } from '../../src/storage/relation.js';
import { createRelationParameters } from '../../src/storage/relation-parameters.js';
import {
  COLUMN_COMMENTS_QUERY,
  COLUMN_NAMES_QUERY,
  FIRST_CHAR_COLUMN_QUERY,
  FOREIGN_KEYS_QUERY,
  FakeExecutor,
  TABLE_STATUS_QUERY,
  resultOf,
  tableStatusResponder,
} from '../support/fake-executor.js';

const LIMITS = { MaxExactCount: 50000, MaxExactCountViews: 0 };

const createRelation = (executor: FakeExecutor, store: MemoryCacheAdapter, enabled = true): Relation => {
  const catalog = new TableCatalog(new DatabaseInterface(executor), LIMITS);
  return new Relation(catalog, store, createRelationParameters({ db: enabled ? 'storage' : null }));
};

describe('createRelationParameters', () => {
  it('turns every feature off without a storage database', () => {
    expect(createRelationParameters().features).toEqual({
      relation: false,
      display: false,
      columnComments: false,
      browserTransformation: false,
      uiPreferences: false,
    });
  });

  it('enables features by default with a storage database', () => {
    const parameters = createRelationParameters({ db: 'storage', features: { display: false } });
    expect(parameters.features.relation).toBe(true);
    expect(parameters.features.display).toBe(false);
  });
});

describe('Relation', () => {
  let executor: FakeExecutor;
  let store: MemoryCacheAdapter;
  let relation: Relation;

  beforeEach(() => {
    store = new MemoryCacheAdapter();
    executor = new FakeExecutor()
      .on(TABLE_STATUS_QUERY, tableStatusResponder([
        { db: 'shop', table: 'orders', rows: 10, createTime: '2024-01-01 00:00:00' },
      ]))
      .on(FIRST_CHAR_COLUMN_QUERY, resultOf(['column_name'], [['title']]))
      .on(COLUMN_NAMES_QUERY, resultOf(['column_name'], [['id'], ['title']]))
      .on(COLUMN_COMMENTS_QUERY, resultOf(['column_name', 'column_comment'], [['id', 'Key'], ['title', '']]))
      .on(FOREIGN_KEYS_QUERY, resultOf(
        ['constraint_name', 'column_name', 'referenced_table_schema', 'referenced_table_name', 'referenced_column_name'],
        [['fk_user', 'user_id', 'shop', 'users', 'id']]
      ));
    relation = createRelation(executor, store);
  });

  it('merges stored comments over native ones', async () => {
    expect(await relation.getComments('shop', 'orders')).toEqual({ id: 'Key' });

    await relation.setComment('shop', 'orders', 'title', 'Order title');

    expect(await relation.getComments('shop', 'orders')).toEqual({ id: 'Key', title: 'Order title' });
  });

  it('ignores stored comments when the feature is off', async () => {
    await relation.setComment('shop', 'orders', 'title', 'Order title');
    const disabled = createRelation(executor, store, false);

    expect(await disabled.getComments('shop', 'orders')).toEqual({ id: 'Key' });
  });

  it('combines internal relations and foreign keys', async () => {
    await relation.setInternalRelation('shop', 'orders', 'status_id', {
      foreign_db: 'shop',
      foreign_table: 'statuses',
      foreign_field: 'id',
    });

    const foreigners = await relation.getForeigners('shop', 'orders');

    expect(foreigners.relations).toEqual({
      status_id: { foreign_db: 'shop', foreign_table: 'statuses', foreign_field: 'id' },
    });
    expect(foreigners.foreignKeys).toEqual([
      { constraint: 'fk_user', indexList: ['user_id'], refDbName: 'shop', refTableName: 'users', refIndexList: ['id'] },
    ]);
  });

  it('filters relations by column and source', async () => {
    await relation.setInternalRelation('shop', 'orders', 'status_id', {
      foreign_db: 'shop',
      foreign_table: 'statuses',
      foreign_field: 'id',
    });

    expect((await relation.getForeigners('shop', 'orders', 'title')).relations).toEqual({});
    expect((await relation.getForeigners('shop', 'orders', '', 'internal')).foreignKeys).toEqual([]);
  });

  it('falls back to the first character column for display', async () => {
    expect(await relation.getDisplayField('shop', 'users')).toBe('title');

    await relation.setDisplayField('shop', 'users', 'email');

    expect(await relation.getDisplayField('shop', 'users')).toBe('email');
  });

  it('stores MIME settings per column', async () => {
    await relation.setMime('shop', 'orders', 'body', { mimetype: 'text_plain', transformation: 'output/Text_Plain_Sql' });
    await relation.setMime('shop', 'orders', 'note', { mimetype: 'text_plain', transformation: '' });

    expect(Object.keys(await relation.getMime('shop', 'orders'))).toEqual(['body', 'note']);
    expect(Object.keys(await relation.getMime('shop', 'orders', true, true))).toEqual(['shop.orders.body']);

    await relation.clearMime('shop', 'orders', 'body');
    expect(Object.keys(await relation.getMime('shop', 'orders'))).toEqual(['note']);

    await relation.clearMime('shop', 'orders');
    expect(await relation.getMime('shop', 'orders')).toEqual({});
  });

  it('keeps a sorted column that names a column of the table', async () => {
    await relation.setUiProp('shop', 'orders', 'sorted_col', '`orders`.`title` DESC');

    expect(await relation.getUiProp('shop', 'orders', 'sorted_col')).toBe('`orders`.`title` DESC');
  });

  it('drops a sorted column that no longer exists', async () => {
    await relation.setUiProp('shop', 'orders', 'sorted_col', '`gone` ASC');

    expect(await relation.getUiProp('shop', 'orders', 'sorted_col')).toBe(false);
    expect(await store.get('uiprefs:shop.orders')).toEqual({});
  });

  it('drops column order once the table is recreated', async () => {
    await relation.setUiProp('shop', 'orders', 'col_order', [1, 0]);
    expect(await relation.getUiProp('shop', 'orders', 'col_order')).toEqual([1, 0]);

    const recreated = new FakeExecutor().on(TABLE_STATUS_QUERY, tableStatusResponder([
      { db: 'shop', table: 'orders', createTime: '2024-02-01 00:00:00' },
    ]));

    expect(await createRelation(recreated, store).getUiProp('shop', 'orders', 'col_order')).toBe(false);
  });
});
