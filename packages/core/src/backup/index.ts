/**
 * Backup Module
 * Exports backup and rollback functionality
 */

export * from './types.js';
export * from './manager.js';
