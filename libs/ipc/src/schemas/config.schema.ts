/**
 * Zod schemas for Scriptward configuration validation
 */

import { z } from 'zod';
import {
  DEFAULT_EXEC_TIMEOUT_MS,
  DEFAULT_INTERPRETER,
  DEFAULT_MAX_SHEBANG_ARGS,
} from '../constants.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const HighlightSchemeSchema = z.enum(['nano', 'vim', 'default']);

export const ScriptTypeSchema = z.enum(['shell', 'python', 'perl', 'ruby', 'unknown']);

export const ScriptwardConfigSchema = z.object({
  logLevel: LogLevelSchema.default('warn'),
  highlightScheme: HighlightSchemeSchema.default('default'),
  maxShebangArgs: z.number().int().min(1).max(255).default(DEFAULT_MAX_SHEBANG_ARGS),
  defaultInterpreter: z.string().min(1).startsWith('/').default(DEFAULT_INTERPRETER),
  execTimeoutMs: z.number().int().min(1).default(DEFAULT_EXEC_TIMEOUT_MS),
  requireValidation: z.boolean().default(true),
});

/** Shape accepted from config files and overrides (every key optional) */
export type ScriptwardConfigInput = z.input<typeof ScriptwardConfigSchema>;
