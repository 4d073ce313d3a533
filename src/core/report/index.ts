/**
 * Report exports barrel file.
 */
export * from './types.js';
export * from './aggregator.js';
export * from './human.js';
export * from './machine.js';
