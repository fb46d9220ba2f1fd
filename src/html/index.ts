export * from './escape.js';
export * from './url.js';
export * from './message.js';
export * from './generator.js';
