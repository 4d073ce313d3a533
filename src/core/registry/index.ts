/**
 * Rule registry exports barrel file.
 */
export * from './types.js';
export * from './registry.js';
export { PROFILE_DEFINITIONS } from './profiles.js';
