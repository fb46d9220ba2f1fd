export * from './display-session.js';
export * from './session-store.js';
