export * from './json.js';
export * from './config.js';
