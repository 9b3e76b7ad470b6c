export * from './types.js';
export * from './errors.js';
export * from './normalize.js';
export * from './record.js';
export * from './timeline.js';
export * from './comments.js';
export * from './session.js';
export * from './session-store.js';
export * from './history.js';
export * from './media.js';
export * from './display.js';
export * from './client.js';
export * from './feed-archive.js';
