/**
 * @scriptward/engine
 *
 * Script classification and syntax-validation engine. Every analyzer is a
 * pure function of the script text.
 *
 * @packageDocumentation
 */

// Shebang
export { parseShebang, inspectShebang, shebangCommand } from './shebang.js';

// Classification
export {
  classifyScript,
  describeClassification,
  requireKnownType,
  SHEBANG_RULES,
  CONTENT_RULES,
  FALLBACK_SCRIPT_TYPE,
} from './classifier.js';
export type { ClassificationRule } from './classifier.js';

// Validation
export {
  validateScript,
  isScriptValid,
  checkQuoteBalance,
  checkBracketBalance,
  checkShebang,
  checkStructure,
  findQuoteIssue,
  findBracketIssue,
  findShebangIssue,
  scanQuotes,
} from './validate/index.js';
export type { QuoteState, StructureReport } from './validate/index.js';

// Metadata
export { extractMetadata, formatMetadata, matchMetadataComment } from './metadata.js';

// Highlighting
export {
  tokenizeLine,
  tokenizeScript,
  joinSpans,
  highlightScript,
  renderSpan,
  stripAnsi,
  listHighlightSchemes,
  getHighlightSchemeCount,
  getHighlightSchemeName,
  parseHighlightScheme,
} from './highlight/index.js';

// Statistics
export { collectStats, formatStats } from './stats.js';

// Combined analysis
export { analyzeScript } from './analyze.js';
export type { AnalyzeOptions } from './analyze.js';

// Raw byte boundary
export { createRawBoundary, rawBoundary, encodeArgvBlock, decodeArgvBlock } from './boundary.js';
export type { RawBoundary, RawBoundaryOptions } from './boundary.js';

// Text helpers
export { decodeScript, splitLines, countCodePoints } from './text.js';

// Logging
export { noopLogger } from './logger.js';
export type { Logger } from './logger.js';

// Error types
export {
  ScriptwardError,
  InvalidInputError,
  InvalidEncodingError,
  UnsupportedScriptTypeError,
  ConfigError,
  ExecutionError,
} from './errors.js';
