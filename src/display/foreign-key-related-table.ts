/** Target of a foreign key as shown in the grid */
export interface ForeignKeyRelatedTable {
  table: string;
  field: string;
  /** Column shown instead of the key; '' when there is none */
  displayField: string;
  database: string;
}

/** Source column → related table */
export type ForeignKeyMap = Record<string, ForeignKeyRelatedTable>;
