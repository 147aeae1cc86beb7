/**
 * Debug Logger
 *
 * Appends timestamped lines to SCRIPTWARD_LOG_FILE (default
 * <tmpdir>/scriptward.log) and mirrors them to stderr at debug level.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { LogLevel } from '@scriptward/ipc';
import type { Logger } from '@scriptward/engine';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface DebugLoggerOptions {
  /** Minimum level written */
  level?: LogLevel;
  logFile?: string;
  /** Receives the stderr mirror; defaults to process.stderr */
  mirror?: (line: string) => void;
}

export function defaultLogFile(env: NodeJS.ProcessEnv = process.env): string {
  return env['SCRIPTWARD_LOG_FILE'] || path.join(os.tmpdir(), 'scriptward.log');
}

export function createDebugLogger(options: DebugLoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';
  const logFile = options.logFile ?? defaultLogFile();
  const mirror = options.mirror ?? ((line: string) => process.stderr.write(line));
  let fileFailed = false;

  function write(at: LogLevel, msg: string): void {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;

    const line = `[${new Date().toISOString()}] [pid:${process.pid}] ${at.toUpperCase()} ${msg}\n`;
    if (!fileFailed) {
      try {
        fs.appendFileSync(logFile, line);
      } catch (err) {
        // Report once, then keep going without the file
        fileFailed = true;
        mirror(`[scriptward] cannot write ${logFile}: ${err instanceof Error ? err.message : String(err)}\n`);
      }
    }
    if (level === 'debug') {
      mirror(`[scriptward:${at}] ${msg}\n`);
    }
  }

  return {
    debug: (msg) => write('debug', msg),
    info: (msg) => write('info', msg),
    warn: (msg) => write('warn', msg),
    error: (msg) => write('error', msg),
  };
}
