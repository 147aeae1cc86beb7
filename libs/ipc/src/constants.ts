/**
 * Constants for Scriptward
 */

import type { HighlightScheme } from './types/highlight.js';
import type { MetadataField } from './types/script.js';

/** Marker that opens a shebang line */
export const SHEBANG_MARKER = '#!';

/** Interpreter used when a script carries no shebang */
export const DEFAULT_INTERPRETER = '/bin/sh';

/** Default cap on shebang arguments */
export const DEFAULT_MAX_SHEBANG_ARGS = 10;

/** Leading lines inspected for header metadata */
export const METADATA_WINDOW_LINES = 50;

/** Returned by metadata formatting when nothing was found */
export const NO_METADATA_FOUND = 'No metadata found';

/** Default execution timeout (ms) */
export const DEFAULT_EXEC_TIMEOUT_MS = 30000;

/** Schemes in discovery order; the index is stable */
export const HIGHLIGHT_SCHEMES: readonly HighlightScheme[] = ['nano', 'vim', 'default'];

/** Header comment fields, in match priority order */
export const METADATA_FIELDS: readonly Exclude<MetadataField, 'Interpreter'>[] = [
  'Author',
  'Version',
  'Description',
  'Date',
  'License',
  'Copyright',
  'Filename',
  'Usage',
  'Purpose',
  'Note',
  'Todo',
  'Fixme',
  'Bug',
  'Created',
  'Modified',
  'Updated',
];

/** Words the highlighter renders as keywords */
export const SHELL_KEYWORDS: ReadonlySet<string> = new Set([
  'if', 'then', 'else', 'elif', 'fi',
  'for', 'while', 'until', 'do', 'done',
  'case', 'esac', 'function', 'return',
  'local', 'export', 'declare', 'readonly',
  'echo', 'printf', 'read', 'test', 'true', 'false',
]);

/** Single-character operators recognised by the highlighter */
export const SHELL_OPERATORS: ReadonlySet<string> = new Set(['=', '<', '>', '!', '&', '|']);
