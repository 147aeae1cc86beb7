/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createDetectCommand } from './detect.js';
export { createValidateCommand } from './validate.js';
export { createMetadataCommand } from './metadata.js';
export { createStatsCommand } from './stats.js';
export { createHighlightCommand } from './highlight.js';
export { createShebangCommand } from './shebang.js';
export { createSchemesCommand } from './schemes.js';
export { createAnalyzeCommand } from './analyze.js';
export { createRunCommand } from './run.js';
