/**
 * Re-export all types
 */

export * from './script.js';
export * from './highlight.js';
export * from './config.js';
