export * from './sql-query-runner.js';
