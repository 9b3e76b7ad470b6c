export * from './filestore.js';
export * from './formats/date-time.js';
