export * from './types.js';
export * from './template.js';
