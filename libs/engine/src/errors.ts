/**
 * Typed error classes for the analysis engine
 */

import type { ScriptType } from '@scriptward/ipc';

export class ScriptwardError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'ScriptwardError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Null buffer, non-positive length, or a length past the end of the buffer
 */
export class InvalidInputError extends ScriptwardError {
  constructor(message = 'Script buffer is missing or empty') {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class InvalidEncodingError extends ScriptwardError {
  constructor(message = 'Script is not valid UTF-8') {
    super(message, 'INVALID_ENCODING');
    this.name = 'InvalidEncodingError';
  }
}

export class UnsupportedScriptTypeError extends ScriptwardError {
  public readonly scriptType: ScriptType;

  constructor(scriptType: ScriptType) {
    super(`Unsupported script type: ${scriptType}`, 'UNSUPPORTED_SCRIPT_TYPE');
    this.name = 'UnsupportedScriptTypeError';
    this.scriptType = scriptType;
  }
}

export class ConfigError extends ScriptwardError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class ExecutionError extends ScriptwardError {
  public readonly interpreter: string;

  constructor(message: string, interpreter: string) {
    super(message, 'EXECUTION_FAILED');
    this.name = 'ExecutionError';
    this.interpreter = interpreter;
  }
}
