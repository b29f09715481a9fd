export * from './ids.js';
export * from './scenario.js';
export * from './result.js';
