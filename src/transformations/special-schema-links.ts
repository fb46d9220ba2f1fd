import { readFileSync } from 'node:fs';

export interface LinkDependencyParam {
  param_info: string;
  column_name: string;
}

/**
 * How a system-schema column links to its object page: the column value is
 * sent as `link_param`, other columns of the row as their `param_info`.
 */
export interface SpecialSchemaLink {
  link_param: string;
  link_dependancy_params?: LinkDependencyParam[];
  /** Route, possibly with a query string */
  default_page: string;
}

/** database → table → column, all lower case */
export type SpecialSchemaLinks = Record<string, Record<string, Record<string, SpecialSchemaLink>>>;

const LINKS_FILE = new URL('../../data/special-schema-links.json', import.meta.url);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isDependencyParam = (value: unknown): value is LinkDependencyParam =>
  isRecord(value) && typeof value.param_info === 'string' && typeof value.column_name === 'string';

const isSpecialSchemaLink = (value: unknown): value is SpecialSchemaLink =>
  isRecord(value)
  && typeof value.link_param === 'string'
  && typeof value.default_page === 'string'
  && (value.link_dependancy_params === undefined
    || (Array.isArray(value.link_dependancy_params) && value.link_dependancy_params.every(isDependencyParam)));

/**
 * Validates the parsed links file.
 * @throws Error when an entry does not have the expected shape
 */
export function parseSpecialSchemaLinks(data: unknown): SpecialSchemaLinks {
  if (!isRecord(data)) throw new Error('Special schema links must be an object keyed by database.');
  const links: SpecialSchemaLinks = {};
  for (const [db, tables] of Object.entries(data)) {
    if (!isRecord(tables)) throw new Error(`Special schema links of "${db}" must be an object keyed by table.`);
    const dbLinks: Record<string, Record<string, SpecialSchemaLink>> = {};
    for (const [table, columns] of Object.entries(tables)) {
      if (!isRecord(columns)) throw new Error(`Special schema links of "${db}.${table}" must be an object keyed by column.`);
      const tableLinks: Record<string, SpecialSchemaLink> = {};
      for (const [column, link] of Object.entries(columns)) {
        if (!isSpecialSchemaLink(link)) {
          throw new Error(`Invalid special schema link for "${db}.${table}.${column}".`);
        }
        tableLinks[column.toLowerCase()] = link;
      }
      dbLinks[table.toLowerCase()] = tableLinks;
    }
    links[db.toLowerCase()] = dbLinks;
  }
  return links;
}

let cached: SpecialSchemaLinks | undefined;

/** Links of the mysql and information_schema databases, read once */
export function getSpecialSchemaLinks(): SpecialSchemaLinks {
  cached ??= parseSpecialSchemaLinks(JSON.parse(readFileSync(LINKS_FILE, 'utf8')));
  return cached;
}
