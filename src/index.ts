/**
 * Result grid exports.
 * Runs MySQL statements and renders their result sets as paginated,
 * sortable HTML grids.
 */
export * from './config/settings.js';
export * from './cache/index.js';
export * from './core/execution/db-executor.js';
export * from './core/execution/query-logger.js';
export * from './core/execution/executors/mysql-executor.js';
export * from './core/dialect/mysql/index.js';
export * from './core/ast/statement.js';
export * from './core/sql/sql.js';
export * from './core/sql/tokenizer.js';
export * from './core/sql/statement-parser.js';
export * from './core/sql/statement-info.js';
export * from './core/sql/clause-utils.js';
export * from './database/field-metadata.js';
export * from './database/result-set.js';
export * from './database/database-interface.js';
export * from './database/catalog.js';
export * from './gis/wkb.js';
export * from './html/index.js';
export * from './session/index.js';
export * from './storage/relation-parameters.js';
export * from './storage/relation.js';
export * from './templates/index.js';
export * from './transformations/index.js';
export * from './utils/format.js';
export * from './utils/page-selector.js';
export * from './utils/signing.js';
export * from './utils/unique-condition.js';
export * from './display/index.js';
export * from './runner/index.js';
export * from './http/index.js';
