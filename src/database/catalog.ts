import { DatabaseInterface, cellText, type RowRecord } from './database-interface.js';

export interface TableStatus {
  name: string;
  /** 'BASE TABLE', 'VIEW' or 'SYSTEM VIEW' */
  type: string;
  engine: string | null;
  /** Row estimate; exact only for MyISAM */
  rows: number | null;
  createTime: string | null;
}

export interface TableIndex {
  name: string;
  columns: string[];
  unique: boolean;
}

export interface ForeignKeyConstraint {
  constraint: string;
  indexList: string[];
  refDbName: string;
  refTableName: string;
  refIndexList: string[];
}

export interface CountLimits {
  MaxExactCount: number;
  MaxExactCountViews: number;
}

type ForeignKeyRow = {
  constraint_name: string;
  column_name: string;
  referenced_table_schema: string;
  referenced_table_name: string;
  referenced_column_name: string;
};

const toNumber = (value: string | null): number | null => {
  if (value === null || value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

const readForeignKeyRow = (row: RowRecord): ForeignKeyRow => ({
  constraint_name: cellText(row.constraint_name) ?? '',
  column_name: cellText(row.column_name) ?? '',
  referenced_table_schema: cellText(row.referenced_table_schema) ?? '',
  referenced_table_name: cellText(row.referenced_table_name) ?? '',
  referenced_column_name: cellText(row.referenced_column_name) ?? '',
});

/**
 * Table-level catalog lookups against information_schema.
 * Status rows are cached for the lifetime of the instance (one request).
 */
export class TableCatalog {
  private readonly statusCache = new Map<string, TableStatus | null>();

  constructor(
    private readonly dbi: DatabaseInterface,
    private readonly limits: CountLimits
  ) {}

  async getStatus(db: string, table: string): Promise<TableStatus | null> {
    const key = `${db}.${table}`;
    const cached = this.statusCache.get(key);
    if (cached !== undefined) return cached;

    const [row] = await this.dbi.fetchRows(
      `
      SELECT table_name, table_type, engine, table_rows, create_time
      FROM information_schema.tables
      WHERE table_schema = ? AND table_name = ?
      `,
      [db, table]
    );
    const status: TableStatus | null = row
      ? {
          name: cellText(row.table_name) ?? table,
          type: cellText(row.table_type) ?? 'BASE TABLE',
          engine: cellText(row.engine),
          rows: toNumber(cellText(row.table_rows)),
          createTime: cellText(row.create_time),
        }
      : null;
    this.statusCache.set(key, status);
    return status;
  }

  async isView(db: string, table: string): Promise<boolean> {
    const status = await this.getStatus(db, table);
    return status !== null && (status.type === 'VIEW' || status.type === 'SYSTEM VIEW');
  }

  async getCreateTime(db: string, table: string): Promise<string | null> {
    return (await this.getStatus(db, table))?.createTime ?? null;
  }

  async getEngine(db: string, table: string): Promise<string | null> {
    return (await this.getStatus(db, table))?.engine ?? null;
  }

  /**
   * Number of rows in a table. Without `forceExact` the engine estimate is used
   * when there is one; views are counted up to MaxExactCountViews rows and not
   * at all when that limit is 0.
   */
  async countRecords(db: string, table: string, forceExact = false): Promise<number> {
    const source = `${this.dbi.backquote(db)}.${this.dbi.backquote(table)}`;

    if (await this.isView(db, table)) {
      if (this.limits.MaxExactCountViews === 0) return 0;
      const count = await this.dbi.fetchValue(
        `SELECT COUNT(*) FROM (SELECT 1 FROM ${source} LIMIT ${this.limits.MaxExactCountViews}) as subquery`
      );
      return count === false ? 0 : toNumber(cellText(count)) ?? 0;
    }

    if (!forceExact) {
      const estimate = (await this.getStatus(db, table))?.rows ?? null;
      if (estimate !== null) return estimate;
    }

    const count = await this.dbi.fetchValue(`SELECT COUNT(*) FROM ${source}`);
    return count === false ? 0 : toNumber(cellText(count)) ?? 0;
  }

  async isUpdatableView(db: string, table: string): Promise<boolean> {
    const value = await this.dbi.fetchValue(
      'SELECT is_updatable FROM information_schema.views WHERE table_schema = ? AND table_name = ?',
      [db, table]
    );
    return value !== false && cellText(value) === 'YES';
  }

  async getIndexes(db: string, table: string): Promise<TableIndex[]> {
    const rows = await this.dbi.fetchRows(
      `
      SELECT index_name, column_name, non_unique
      FROM information_schema.statistics
      WHERE table_schema = ? AND table_name = ?
      ORDER BY index_name = 'PRIMARY' DESC, index_name, seq_in_index
      `,
      [db, table]
    );
    const indexes = new Map<string, TableIndex>();
    for (const row of rows) {
      const name = cellText(row.index_name) ?? '';
      const index = indexes.get(name) ?? { name, columns: [], unique: cellText(row.non_unique) === '0' };
      index.columns.push(cellText(row.column_name) ?? '');
      indexes.set(name, index);
    }
    return [...indexes.values()];
  }

  /** Native column comments, keyed by column name; empty comments are left out */
  async getColumnComments(db: string, table: string): Promise<Record<string, string>> {
    const rows = await this.dbi.fetchRows(
      `
      SELECT column_name, column_comment
      FROM information_schema.columns
      WHERE table_schema = ? AND table_name = ?
      ORDER BY ordinal_position
      `,
      [db, table]
    );
    const comments: Record<string, string> = {};
    for (const row of rows) {
      const comment = cellText(row.column_comment);
      if (comment) comments[cellText(row.column_name) ?? ''] = comment;
    }
    return comments;
  }

  /** Column names in ordinal order */
  async getColumnNames(db: string, table: string): Promise<string[]> {
    const rows = await this.dbi.fetchRows(
      `
      SELECT column_name
      FROM information_schema.columns
      WHERE table_schema = ? AND table_name = ?
      ORDER BY ordinal_position
      `,
      [db, table]
    );
    return rows.map(row => cellText(row.column_name) ?? '');
  }

  /** First character-typed column, the default display column of a table; '' when none */
  async getFirstCharColumn(db: string, table: string): Promise<string> {
    const value = await this.dbi.fetchValue(
      `
      SELECT column_name
      FROM information_schema.columns
      WHERE table_schema = ? AND table_name = ?
        AND data_type IN ('char', 'varchar', 'tinytext', 'text', 'mediumtext', 'longtext', 'enum', 'set')
      ORDER BY ordinal_position
      LIMIT 1
      `,
      [db, table]
    );
    return value === false ? '' : cellText(value) ?? '';
  }

  async getForeignKeys(db: string, table: string): Promise<ForeignKeyConstraint[]> {
    const rows = (
      await this.dbi.fetchRows(
        `
        SELECT constraint_name, column_name, referenced_table_schema,
               referenced_table_name, referenced_column_name
        FROM information_schema.key_column_usage
        WHERE table_schema = ? AND table_name = ? AND referenced_table_name IS NOT NULL
        ORDER BY constraint_name, ordinal_position
        `,
        [db, table]
      )
    ).map(readForeignKeyRow);

    const constraints = new Map<string, ForeignKeyConstraint>();
    for (const row of rows) {
      const constraint = constraints.get(row.constraint_name) ?? {
        constraint: row.constraint_name,
        indexList: [],
        refDbName: row.referenced_table_schema || db,
        refTableName: row.referenced_table_name,
        refIndexList: [],
      };
      constraint.indexList.push(row.column_name);
      constraint.refIndexList.push(row.referenced_column_name);
      constraints.set(row.constraint_name, constraint);
    }
    return [...constraints.values()];
  }

  /** Name of the first table of a database, or '' */
  async getFirstTable(db: string): Promise<string> {
    const value = await this.dbi.fetchValue(`SHOW TABLES FROM ${this.dbi.backquote(db)}`);
    return value === false ? '' : cellText(value) ?? '';
  }
}
