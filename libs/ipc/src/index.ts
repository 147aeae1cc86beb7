/**
 * Scriptward IPC Library
 *
 * Shared types, schemas, and constants for the analysis engine,
 * the script executor and the CLI.
 *
 * @packageDocumentation
 */

// Types (primary type definitions)
export * from './types/index.js';

// Schemas
export {
  LogLevelSchema,
  HighlightSchemeSchema,
  ScriptTypeSchema,
  ScriptwardConfigSchema,
} from './schemas/index.js';
export type { ScriptwardConfigInput } from './schemas/index.js';

// Constants
export * from './constants.js';
