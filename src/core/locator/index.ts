export * from './locator.js';
