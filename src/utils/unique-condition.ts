import type { CellValue } from '../core/execution/db-executor.js';
import type { ExpressionNode } from '../core/ast/statement.js';
import type { FieldMetadata } from '../database/field-metadata.js';
import type { Row } from '../database/result-set.js';
import { backquote, bitCellValue, printableBitValue } from './format.js';

export interface UniqueConditionContext {
  quoteString(value: string): string;
  /** Whether a table of the current database is a view */
  isView(table: string): Promise<boolean>;
}

export interface UniqueConditionOptions {
  forceUnique?: boolean;
  /** Only columns of this table take part */
  restrictToTable?: string;
  /** Select expressions, used to map column aliases back to columns */
  expressions?: ExpressionNode[];
}

/** [where clause, clause is unique, condition value per column reference] */
export type UniqueCondition = [string, boolean, Record<string, string>];

const valueLength = (value: string | Buffer): number =>
  typeof value === 'string' ? [...value].length : value.length;

const toHex = (value: string | Buffer): string =>
  (typeof value === 'string' ? Buffer.from(value, 'utf8') : value).toString('hex');

const asText = (value: string | Buffer): string =>
  typeof value === 'string' ? value : value.toString('utf8');

/** Loose emptiness of a cell: '' and '0' count as empty */
const isEmptyCell = (value: string | Buffer): boolean => {
  const text = asText(value);
  return text === '' || text === '0';
};

interface ConditionPart {
  key: string;
  condition: string;
  value: string;
}

const buildConditionPart = (
  value: CellValue,
  meta: FieldMetadata,
  fieldsCount: number,
  key: string,
  ctx: UniqueConditionContext
): ConditionPart | null => {
  if (value === null) {
    return { key, condition: ` ${key} `, value: 'IS NULL' };
  }

  const isBinaryString = meta.isType('string') && meta.isBinary();
  const isBinaryBlob = meta.isType('blob') && meta.charsetnr === 63;

  if (meta.isNumeric && !meta.isMappedTypeTimestamp && !meta.isType('real')) {
    return { key, condition: ` ${key} `, value: `= ${asText(value)}` };
  }

  if (isBinaryBlob || (!isEmptyCell(value) && isBinaryString)) {
    const length = valueLength(value);
    if (length > 0 && length < 1000) {
      return { key, condition: ` ${key} `, value: `= CAST(0x${toHex(value)} AS BINARY)` };
    }
    if (fieldsCount === 1) {
      return { key, condition: ` CHAR_LENGTH(${key}) `, value: ` = ${length}` };
    }
    return null;
  }

  if (meta.isMappedTypeGeometry && !isEmptyCell(value)) {
    if (valueLength(value) < 5000) {
      return { key, condition: ` ${key} `, value: `= CAST(0x${toHex(value)} AS BINARY)` };
    }
    return null;
  }

  if (meta.isMappedTypeBit) {
    return { key, condition: ` ${key} `, value: `= b'${printableBitValue(bitCellValue(value), meta.length)}'` };
  }

  return { key, condition: ` ${key} `, value: `= ${ctx.quoteString(asText(value))}` };
};

/**
 * Builds a WHERE clause that identifies `row`: primary key columns when the
 * result carries any, else unique key columns, else every column (in which
 * case the clause is not unique, or empty under `forceUnique`).
 */
export async function getUniqueCondition(
  fields: FieldMetadata[],
  row: Row,
  ctx: UniqueConditionContext,
  options: UniqueConditionOptions = {}
): Promise<UniqueCondition> {
  const primary: ConditionPart[] = [];
  const unique: ConditionPart[] = [];
  const all: ConditionPart[] = [];

  for (const [index, meta] of fields.entries()) {
    // a column alias cannot appear in a condition
    let orgname = meta.orgname;
    if (orgname === '') {
      const aliased = options.expressions?.find(
        expression => expression.alias !== undefined && expression.column !== undefined
          && expression.alias.toLowerCase() === meta.name.toLowerCase()
      );
      orgname = aliased?.column ?? meta.name;
    }

    // neither may a table alias, unless the table is a (possibly updatable) view
    let table = meta.table;
    if (meta.orgtable !== '' && meta.table !== meta.orgtable && !(await ctx.isView(meta.table))) {
      table = meta.orgtable;
    }

    if (options.restrictToTable !== undefined && options.restrictToTable !== table) {
      continue;
    }

    const column = `${backquote(table)}.${backquote(orgname)}`;
    const key = meta.isType('real') ? `CONCAT(${column})` : column;
    const part = buildConditionPart(row[index] ?? null, meta, fields.length, key, ctx);
    if (part === null) continue;

    if (meta.isPrimaryKey) primary.push(part);
    else if (meta.isUniqueKey) unique.push(part);
    all.push(part);
  }

  let chosen: ConditionPart[] = [];
  let clauseIsUnique = true;
  if (primary.length > 0) {
    chosen = primary;
  } else if (unique.length > 0) {
    chosen = unique;
  } else if (!options.forceUnique) {
    chosen = all;
    clauseIsUnique = false;
  }

  const whereClause = chosen
    .map(part => `${part.condition}${part.value}`)
    .join(' AND')
    .trim();
  const conditionMap: Record<string, string> = {};
  for (const part of chosen) conditionMap[part.key] = part.value;

  return [whereClause, clauseIsUnique, conditionMap];
}
