import type { CellValue, QueryResult } from '../core/execution/db-executor.js';
import { FieldMetadata } from './field-metadata.js';

export type Row = CellValue[];

/**
 * Buffered result set with a movable cursor.
 */
export class ResultSet {
  readonly fields: FieldMetadata[];
  /** Rows changed by a statement without a result set */
  readonly affectedRows: number | null;
  private readonly rows: Row[];
  private position = 0;

  constructor(result: QueryResult) {
    this.fields = (result.fields ?? result.columns.map(name => ({ name }))).map(
      definition => new FieldMetadata(definition)
    );
    this.rows = result.values;
    this.affectedRows = result.affectedRows ?? null;
  }

  numRows(): number {
    return this.rows.length;
  }

  numFields(): number {
    return this.fields.length;
  }

  /** Next row, or null past the end */
  fetchRow(): Row | null {
    if (this.position >= this.rows.length) return null;
    const row = this.rows[this.position];
    this.position++;
    return row;
  }

  /** Next row keyed by column name */
  fetchAssoc(): Record<string, CellValue> | null {
    const row = this.fetchRow();
    if (row === null) return null;
    const assoc: Record<string, CellValue> = {};
    this.fields.forEach((field, index) => {
      assoc[field.name] = row[index] ?? null;
    });
    return assoc;
  }

  /** Moves the cursor; false when the offset is out of range */
  seek(offset: number): boolean {
    if (offset < 0 || offset > this.rows.length || (offset === this.rows.length && offset !== 0)) {
      return false;
    }
    this.position = offset;
    return true;
  }
}
