export * from './sql-router.js';
