/**
 * Maintenance Module
 * Exports maintenance mode management and its HTTP gate
 */

export * from './types.js';
export * from './schema.js';
export * from './ip.js';
export * from './manager.js';
export * from './middleware.js';
