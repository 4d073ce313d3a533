/**
 * Detector exports barrel file.
 */
export * from './source.js';
export * from './imports.js';
export * from './manifest.js';
export * from './patterns.js';
