import type { CacheProvider } from '../cache/cache-interfaces.js';
import type { ForeignKeyConstraint, TableCatalog } from '../database/catalog.js';
import type { ColumnMime } from '../transformations/transformations.js';
import { createRelationParameters, type RelationParameters } from './relation-parameters.js';

/** Target of a relation defined in the configuration storage */
export interface InternalRelation {
  foreign_db: string;
  foreign_table: string;
  foreign_field: string;
}

export interface Foreigners {
  /** Internal relations keyed by source column */
  relations: Record<string, InternalRelation>;
  /** Native foreign key constraints */
  foreignKeys: ForeignKeyConstraint[];
}

export type RelationSource = 'internal' | 'foreign' | 'both';

export type UiProperty = 'col_order' | 'col_visib' | 'sorted_col';

interface UiPreferences {
  CREATE_TIME?: string;
  col_order?: number[];
  col_visib?: number[];
  sorted_col?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringRecord = (value: unknown): value is Record<string, string> =>
  isRecord(value) && Object.values(value).every(entry => typeof entry === 'string');

const isNumberArray = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every(entry => typeof entry === 'number' && Number.isInteger(entry));

const isInternalRelation = (value: unknown): value is InternalRelation =>
  isRecord(value)
  && typeof value.foreign_db === 'string'
  && typeof value.foreign_table === 'string'
  && typeof value.foreign_field === 'string';

const isColumnMime = (value: unknown): value is ColumnMime =>
  isRecord(value) && typeof value.mimetype === 'string' && typeof value.transformation === 'string';

const readRecord = <T>(value: unknown, guard: (entry: unknown) => entry is T): Record<string, T> => {
  const result: Record<string, T> = {};
  if (!isRecord(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    if (guard(entry)) result[key] = entry;
  }
  return result;
};

const readUiPreferences = (value: unknown): UiPreferences => {
  const prefs: UiPreferences = {};
  if (!isRecord(value)) return prefs;
  if (typeof value.CREATE_TIME === 'string') prefs.CREATE_TIME = value.CREATE_TIME;
  if (isNumberArray(value.col_order)) prefs.col_order = value.col_order;
  if (isNumberArray(value.col_visib)) prefs.col_visib = value.col_visib;
  if (typeof value.sorted_col === 'string') prefs.sorted_col = value.sorted_col;
  return prefs;
};

/**
 * Configuration storage: column comments, internal relations, display
 * columns, MIME transformations and per-table UI preferences, kept in a
 * {@link CacheProvider}. Native metadata comes from the catalog.
 */
export class Relation {
  readonly parameters: RelationParameters;

  constructor(
    private readonly catalog: TableCatalog,
    private readonly store: CacheProvider,
    parameters: RelationParameters = createRelationParameters()
  ) {
    this.parameters = parameters;
  }

  getRelationParameters(): RelationParameters {
    return this.parameters;
  }

  private key(kind: string, db: string, table: string): string {
    return `${kind}:${db}.${table}`;
  }

  /**
   * Column comments of a table: native comments, overridden by stored ones
   * when column comments are enabled.
   */
  async getComments(db: string, table: string): Promise<Record<string, string>> {
    const comments = await this.catalog.getColumnComments(db, table);
    if (!this.parameters.features.columnComments) return comments;
    const stored = await this.store.get(this.key('comments', db, table));
    if (isStringRecord(stored)) Object.assign(comments, stored);
    return comments;
  }

  async setComment(db: string, table: string, column: string, comment: string): Promise<void> {
    const key = this.key('comments', db, table);
    const stored = await this.store.get(key);
    const comments = isStringRecord(stored) ? stored : {};
    comments[column] = comment;
    await this.store.set(key, comments);
  }

  /**
   * Relations of a table; `column` restricts internal relations to one column.
   */
  async getForeigners(db: string, table: string, column = '', source: RelationSource = 'both'): Promise<Foreigners> {
    const foreigners: Foreigners = { relations: {}, foreignKeys: [] };

    if (source !== 'foreign' && this.parameters.features.relation) {
      const relations = readRecord(await this.store.get(this.key('relation', db, table)), isInternalRelation);
      for (const [field, relation] of Object.entries(relations)) {
        if (column === '' || column === field) foreigners.relations[field] = relation;
      }
    }

    if (source !== 'internal') {
      foreigners.foreignKeys = await this.catalog.getForeignKeys(db, table);
    }

    return foreigners;
  }

  async setInternalRelation(db: string, table: string, column: string, target: InternalRelation): Promise<void> {
    const key = this.key('relation', db, table);
    const relations = readRecord(await this.store.get(key), isInternalRelation);
    relations[column] = target;
    await this.store.set(key, relations);
  }

  /**
   * Column shown for rows of `table` when they are referenced: the stored
   * display column, else the first character column.
   */
  async getDisplayField(db: string, table: string): Promise<string> {
    if (this.parameters.features.display) {
      const stored = await this.store.get(this.key('display', db, table));
      if (typeof stored === 'string' && stored !== '') return stored;
    }
    return this.catalog.getFirstCharColumn(db, table);
  }

  async setDisplayField(db: string, table: string, column: string): Promise<void> {
    await this.store.set(this.key('display', db, table), column);
  }

  /**
   * MIME settings of the columns of a table.
   * @param strict only columns with a transformation
   * @param fullName key by `db.table.column` instead of the column name
   */
  async getMime(db: string, table: string, strict = false, fullName = false): Promise<Record<string, ColumnMime>> {
    if (!this.parameters.features.browserTransformation) return {};
    const stored = readRecord(await this.store.get(this.key('mime', db, table)), isColumnMime);
    const result: Record<string, ColumnMime> = {};
    for (const [column, mime] of Object.entries(stored)) {
      if (strict && mime.transformation === '') continue;
      result[fullName ? `${db}.${table}.${column}` : column] = mime;
    }
    return result;
  }

  async setMime(db: string, table: string, column: string, mime: ColumnMime): Promise<void> {
    const key = this.key('mime', db, table);
    const stored = readRecord(await this.store.get(key), isColumnMime);
    stored[column] = mime;
    await this.store.set(key, stored);
  }

  /** Drops stored MIME settings of one column, or of the whole table without a column */
  async clearMime(db: string, table: string, column = ''): Promise<void> {
    const key = this.key('mime', db, table);
    if (column === '') {
      await this.store.delete(key);
      return;
    }
    const stored = readRecord(await this.store.get(key), isColumnMime);
    delete stored[column];
    await this.store.set(key, stored);
  }

  private async loadUiPreferences(db: string, table: string): Promise<UiPreferences> {
    if (!this.parameters.features.uiPreferences) return {};
    return readUiPreferences(await this.store.get(this.key('uiprefs', db, table)));
  }

  /**
   * A table UI preference, or false when unset or no longer valid.
   * Column order and visibility are dropped once the table has been
   * recreated (its create time changed); a sorted column is dropped when it
   * names no column of the table.
   */
  async getUiProp(db: string, table: string, property: 'col_order' | 'col_visib'): Promise<number[] | false>;
  async getUiProp(db: string, table: string, property: 'sorted_col'): Promise<string | false>;
  async getUiProp(db: string, table: string, property: UiProperty): Promise<number[] | string | false> {
    const prefs = await this.loadUiPreferences(db, table);
    const value = prefs[property];
    if (value === undefined) return false;

    if (property === 'sorted_col') {
      const columns = await this.catalog.getColumnNames(db, table);
      if (typeof value === 'string' && columns.some(column => value.includes(`\`${column}\``))) return value;
      await this.removeUiProp(db, table, property);
      return false;
    }

    const isView = await this.catalog.isView(db, table);
    if (!isView && prefs.CREATE_TIME !== undefined) {
      const createTime = await this.catalog.getCreateTime(db, table);
      if (createTime !== null && createTime !== prefs.CREATE_TIME) {
        await this.removeUiProp(db, table, property);
        return false;
      }
    }
    return value;
  }

  async setUiProp(db: string, table: string, property: 'col_order' | 'col_visib', value: number[]): Promise<void>;
  async setUiProp(db: string, table: string, property: 'sorted_col', value: string): Promise<void>;
  async setUiProp(db: string, table: string, property: UiProperty, value: number[] | string): Promise<void> {
    if (!this.parameters.features.uiPreferences) return;
    const prefs = await this.loadUiPreferences(db, table);
    if (property === 'sorted_col') {
      if (typeof value === 'string') prefs.sorted_col = value;
    } else if (Array.isArray(value)) {
      prefs[property] = value;
      if (!(await this.catalog.isView(db, table))) {
        prefs.CREATE_TIME = (await this.catalog.getCreateTime(db, table)) ?? undefined;
      }
    }
    await this.store.set(this.key('uiprefs', db, table), prefs);
  }

  async removeUiProp(db: string, table: string, property: UiProperty): Promise<void> {
    if (!this.parameters.features.uiPreferences) return;
    const prefs = await this.loadUiPreferences(db, table);
    delete prefs[property];
    await this.store.set(this.key('uiprefs', db, table), prefs);
  }
}
