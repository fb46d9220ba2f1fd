export * from './display-parts.js';
export * from './foreign-key-related-table.js';
export * from './results.js';
