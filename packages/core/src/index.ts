export * from './types.js';
export * from './reader-modes.js';
