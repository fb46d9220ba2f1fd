/**
 * Splits a transformation option string: comma separated values, each
 * optionally wrapped in single quotes (quoted values may contain commas),
 * with backslash escapes removed.
 */
export function getOptions(optionString: string): string[] {
  if (optionString === '') return [];

  const parts = optionString.split(',');
  const result: string[] = [];
  let part = parts.shift();
  while (part !== undefined) {
    let option = part;
    const trimmed = option.trim();
    if (trimmed.length > 1 && trimmed.startsWith('\'') && trimmed.endsWith('\'')) {
      option = trimmed.slice(1, -1);
    } else if (trimmed.startsWith('\'')) {
      let joined = option.trimStart();
      let rightTrimmed = joined;
      let next = parts.shift();
      while (next !== undefined) {
        joined += `,${next}`;
        rightTrimmed = joined.trimEnd();
        if (rightTrimmed.endsWith('\'')) break;
        next = parts.shift();
      }
      option = rightTrimmed.slice(1, -1);
    }
    result.push(option.replace(/\\(.?)/g, '$1'));
    part = parts.shift();
  }
  return result;
}

/** Stored MIME settings of one column */
export interface ColumnMime {
  /** e.g. 'text_plain' or 'Text_Plain' */
  mimetype: string;
  transformation: string;
  transformation_options?: string;
  input_transformation?: string;
  input_transformation_options?: string;
}

/** 'text_plain' → 'Text/Plain' */
export const mimeTypeToMediaType = (mimetype: string): string =>
  mimetype
    .split('_')
    .map(part => (part === '' ? part : part[0].toUpperCase() + part.slice(1)))
    .join('/');

/** [transformation file, media type] of a built-in highlighting */
export type DefaultTransformation = [file: string, mimetype: string];

const SQL_HIGHLIGHTING: DefaultTransformation = ['output/Text_Plain_Sql', 'Text_Plain'];
const BLOB_SQL_HIGHLIGHTING: DefaultTransformation = ['output/Text_Octetstream_Sql', 'Text_Octetstream'];
const JSON_HIGHLIGHTING: DefaultTransformation = ['output/Text_Plain_Json', 'Text_Plain'];
const LINK: DefaultTransformation = ['Text_Plain_Link', 'Text_Plain'];

/** database → table → column, all lower case */
export type DefaultTransformationInfo = Record<string, Record<string, Record<string, DefaultTransformation>>>;

/** Table names of the configuration storage database */
export interface StorageTableNames {
  history?: string;
  bookmark?: string;
  tracking?: string;
  favorite?: string;
  recent?: string;
  savedSearches?: string;
  designerSettings?: string;
  tableUiPrefs?: string;
  userConfig?: string;
  exportTemplates?: string;
}

/**
 * Highlighting applied to known SQL and JSON columns of the system schemas
 * and of the configuration storage database.
 */
export function getDefaultTransformationInfo(
  storageDb: string | null = null,
  storageTables: StorageTableNames = {}
): DefaultTransformationInfo {
  const info: DefaultTransformationInfo = {
    information_schema: {
      events: { event_definition: SQL_HIGHLIGHTING },
      processlist: { info: SQL_HIGHLIGHTING },
      routines: { routine_definition: SQL_HIGHLIGHTING },
      triggers: { action_statement: SQL_HIGHLIGHTING },
      views: { view_definition: SQL_HIGHLIGHTING },
    },
    mysql: {
      event: { body: BLOB_SQL_HIGHLIGHTING, body_utf8: BLOB_SQL_HIGHLIGHTING },
      general_log: { argument: SQL_HIGHLIGHTING },
      help_category: { url: LINK },
      help_topic: { example: SQL_HIGHLIGHTING, url: LINK },
      proc: {
        param_list: BLOB_SQL_HIGHLIGHTING,
        returns: BLOB_SQL_HIGHLIGHTING,
        body: BLOB_SQL_HIGHLIGHTING,
        body_utf8: BLOB_SQL_HIGHLIGHTING,
      },
      slow_log: { sql_text: SQL_HIGHLIGHTING },
    },
  };

  if (storageDb === null) return info;

  const storage: Record<string, Record<string, DefaultTransformation>> = {};
  const add = (table: string | undefined, columns: Record<string, DefaultTransformation>): void => {
    if (table !== undefined) storage[table.toLowerCase()] = columns;
  };
  add(storageTables.history, { sqlquery: SQL_HIGHLIGHTING });
  add(storageTables.bookmark, { query: SQL_HIGHLIGHTING });
  add(storageTables.tracking, { schema_sql: SQL_HIGHLIGHTING, data_sql: SQL_HIGHLIGHTING });
  add(storageTables.favorite, { tables: JSON_HIGHLIGHTING });
  add(storageTables.recent, { tables: JSON_HIGHLIGHTING });
  add(storageTables.savedSearches, { search_data: JSON_HIGHLIGHTING });
  add(storageTables.designerSettings, { settings_data: JSON_HIGHLIGHTING });
  add(storageTables.tableUiPrefs, { prefs: JSON_HIGHLIGHTING });
  add(storageTables.userConfig, { config_data: JSON_HIGHLIGHTING });
  add(storageTables.exportTemplates, { template_data: JSON_HIGHLIGHTING });
  info[storageDb.toLowerCase()] = storage;

  return info;
}
