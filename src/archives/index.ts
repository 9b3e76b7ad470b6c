export * from './base-archive.js';

export * from './instagram/index.js';
