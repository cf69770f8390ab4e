export * from './schema.js';
export * from './report.js';
export * from './renderer.js';
