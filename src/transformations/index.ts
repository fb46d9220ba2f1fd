export * from './transformations-plugin.js';
export * from './transformations.js';
export * from './transformation-factory.js';
export * from './special-schema-links.js';
export * from './plugins/sql.js';
export * from './plugins/link.js';
export * from './plugins/text.js';
export * from './plugins/dateformat.js';
