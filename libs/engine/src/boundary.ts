/**
 * Raw entry points for hosts that hand over script bytes
 *
 * Each entry point takes a byte buffer plus an explicit length and never
 * throws: a missing buffer, a bad length or bytes that are not UTF-8 map to
 * the entry point's sentinel. Only the first `length` bytes are read and the
 * buffer is not kept after the call returns. Results are fresh values owned
 * by the caller.
 *
 * | Entry point             | Sentinel    |
 * |-------------------------|-------------|
 * | detectScriptType        | `'unknown'` |
 * | validateScript          | `0`         |
 * | extractMetadata         | `null`      |
 * | scriptStats             | `null`      |
 * | highlightScript         | `null`      |
 * | parseShebang            | `null`      |
 * | parseShebangArgs        | `null`      |
 * | getSchemeName           | `null`      |
 *
 * `parseShebangArgs` caps the whole block at `maxArgs` entries, the
 * interpreter included, so `maxArgs = 1` yields the interpreter alone.
 */

import type { HighlightScheme, ScriptType } from '@scriptward/ipc';
import { DEFAULT_INTERPRETER } from '@scriptward/ipc';
import { classifyScript } from './classifier.js';
import { ScriptwardError } from './errors.js';
import { highlightScript, getHighlightSchemeName } from './highlight/index.js';
import type { Logger } from './logger.js';
import { noopLogger } from './logger.js';
import { extractMetadata, formatMetadata } from './metadata.js';
import { parseShebang } from './shebang.js';
import { collectStats, formatStats } from './stats.js';
import { decodeScript } from './text.js';
import { validateScript } from './validate/index.js';

export interface RawBoundaryOptions {
  logger?: Logger;
  /** Reported by `parseShebang` for scripts without a shebang */
  defaultInterpreter?: string;
}

export interface RawBoundary {
  detectScriptType(buffer: Uint8Array | null | undefined, length: number): ScriptType;
  /** `1` when the script validates, `0` otherwise */
  validateScript(buffer: Uint8Array | null | undefined, length: number): 0 | 1;
  extractMetadata(buffer: Uint8Array | null | undefined, length: number): string | null;
  scriptStats(buffer: Uint8Array | null | undefined, length: number): string | null;
  highlightScript(
    buffer: Uint8Array | null | undefined,
    length: number,
    scheme: HighlightScheme,
  ): string | null;
  /** Interpreter path, or the default interpreter when there is no shebang */
  parseShebang(buffer: Uint8Array | null | undefined, length: number): string | null;
  /**
   * At most `maxArgs` entries, interpreter first, as a NUL-terminated block.
   * `null` when `maxArgs <= 0` or the script has no shebang.
   */
  parseShebangArgs(
    buffer: Uint8Array | null | undefined,
    length: number,
    maxArgs: number,
  ): Uint8Array | null;
  getSchemeName(index: number): HighlightScheme | null;
}

const utf8 = new TextEncoder();

/**
 * Pack strings into one buffer, each followed by a NUL byte
 */
export function encodeArgvBlock(values: readonly string[]): Uint8Array {
  return utf8.encode(values.map((value) => `${value}\0`).join(''));
}

/**
 * Read back a block written by {@link encodeArgvBlock}
 */
export function decodeArgvBlock(block: Uint8Array): string[] {
  const text = new TextDecoder().decode(block);
  const parts = text.split('\0');
  parts.pop();
  return parts;
}

export function createRawBoundary(options: RawBoundaryOptions = {}): RawBoundary {
  const log = options.logger ?? noopLogger;
  const defaultInterpreter = options.defaultInterpreter ?? DEFAULT_INTERPRETER;

  /** Decode, run, and fold any failure into the sentinel */
  function guard<T, S>(
    entry: string,
    buffer: Uint8Array | null | undefined,
    length: number,
    sentinel: S,
    run: (text: string) => T,
  ): T | S {
    try {
      return run(decodeScript(buffer, length));
    } catch (err) {
      const reason = err instanceof ScriptwardError ? err.code : String(err);
      log.debug(`${entry}: rejected input (${reason})`);
      return sentinel;
    }
  }

  return {
    detectScriptType: (buffer, length) =>
      guard('detectScriptType', buffer, length, 'unknown' as const, classifyScript),

    validateScript: (buffer, length) =>
      guard('validateScript', buffer, length, 0 as const, (text): 0 | 1 => (validateScript(text).valid ? 1 : 0)),

    extractMetadata: (buffer, length) =>
      guard('extractMetadata', buffer, length, null, (text) => formatMetadata(extractMetadata(text))),

    scriptStats: (buffer, length) =>
      guard('scriptStats', buffer, length, null, (text) => formatStats(collectStats(text), classifyScript(text))),

    highlightScript: (buffer, length, scheme) =>
      guard('highlightScript', buffer, length, null, (text) => highlightScript(text, scheme)),

    parseShebang: (buffer, length) =>
      guard('parseShebang', buffer, length, null, (text) => parseShebang(text)?.interpreter ?? defaultInterpreter),

    parseShebangArgs: (buffer, length, maxArgs) => {
      if (!Number.isInteger(maxArgs) || maxArgs <= 0) {
        log.debug(`parseShebangArgs: rejected maxArgs ${maxArgs}`);
        return null;
      }
      return guard('parseShebangArgs', buffer, length, null, (text) => {
        const shebang = parseShebang(text, maxArgs - 1);
        return shebang ? encodeArgvBlock([shebang.interpreter, ...shebang.args]) : null;
      });
    },

    getSchemeName: (index) => getHighlightSchemeName(index),
  };
}

/** Boundary with the default options */
export const rawBoundary: RawBoundary = createRawBoundary();
