/**
 * Shebang parsing
 *
 * Reads the interpreter and its arguments from a `#!` first line. Tokens are
 * plain whitespace-separated words; quoting and escaping are not interpreted,
 * matching how kernels read the line.
 */

import type { Shebang, ShebangInspection } from '@scriptward/ipc';
import { DEFAULT_MAX_SHEBANG_ARGS, SHEBANG_MARKER } from '@scriptward/ipc';
import { firstLine } from './text.js';

/**
 * Parse the shebang of a script.
 *
 * @param maxArgs - cap on the arguments kept after the interpreter
 * @returns `null` when the first line is not a shebang or names no interpreter
 */
export function parseShebang(text: string, maxArgs: number = DEFAULT_MAX_SHEBANG_ARGS): Shebang | null {
  const line = firstLine(text);
  if (line === null || !line.startsWith(SHEBANG_MARKER)) return null;

  const command = line.slice(SHEBANG_MARKER.length).trim();
  if (command.length === 0) return null;

  const [interpreter, ...rest] = command.split(/\s+/);
  return {
    interpreter,
    args: rest.slice(0, Math.max(0, maxArgs)),
  };
}

/**
 * Text following `#!` on the first line, trimmed. `null` without a shebang.
 */
export function shebangCommand(text: string): string | null {
  const line = firstLine(text);
  if (line === null || !line.startsWith(SHEBANG_MARKER)) return null;
  return line.slice(SHEBANG_MARKER.length).trim();
}

/**
 * Tell a missing shebang apart from a broken one
 */
export function inspectShebang(text: string, maxArgs: number = DEFAULT_MAX_SHEBANG_ARGS): ShebangInspection {
  if (shebangCommand(text) === null) return { status: 'absent' };

  const shebang = parseShebang(text, maxArgs);
  if (!shebang) {
    return { status: 'malformed', reason: 'Shebang names no interpreter' };
  }
  if (shebang.interpreter.includes('\0')) {
    return { status: 'malformed', reason: 'Shebang interpreter contains a NUL character' };
  }

  return { status: 'present', shebang };
}
