/**
 * Re-export all schemas
 */

export * from './config.schema.js';
