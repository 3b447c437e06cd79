/**
 * Update Module
 * Exports the update state machine, its file source, the scheduler and the HTTP API
 */

export * from './types.js';
export * from './file-source.js';
export * from './manager.js';
export * from './scheduler.js';
export * from './router.js';
