/**
 * layerguard - architectural boundary checks for Cargo crates.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Rules
export * from './core/registry/index.js';

// File discovery
export * from './core/locator/index.js';

// Detectors
export * from './core/detectors/index.js';

// Reports
export * from './core/report/index.js';

// Engine
export * from './core/engine/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
