/**
 * Configuration Module
 * Exports the update configuration store and its helpers
 */

export * from './types.js';
export * from './schema.js';
export * from './repository.js';
export * from './version.js';
export * from './store.js';
export * from './runtime.js';
