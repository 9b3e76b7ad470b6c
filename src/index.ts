export * from './util/index.js';
export * from './archives/index.js';
export * from './config.js';
