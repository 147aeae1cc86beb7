/**
 * Configuration types for Scriptward
 */

import type { HighlightScheme } from './highlight.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ScriptwardConfig {
  /** Minimum level written by the CLI logger */
  logLevel: LogLevel;
  /** Scheme used when a command does not name one */
  highlightScheme: HighlightScheme;
  /** Maximum number of shebang arguments kept after the interpreter */
  maxShebangArgs: number;
  /** Interpreter used for scripts without a shebang */
  defaultInterpreter: string;
  /** Kill a running script after this many milliseconds */
  execTimeoutMs: number;
  /** Refuse to execute scripts that fail validation unless forced */
  requireValidation: boolean;
}
