export * from './string.js';
export * from './lossless.js';
