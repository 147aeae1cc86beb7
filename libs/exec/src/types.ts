/**
 * Executor Types
 */

import type { ScriptType, ValidationOutcome } from '@scriptward/ipc';
import type { Logger } from '@scriptward/engine';

/**
 * Interpreter command resolved for a script
 */
export interface ExecCommand {
  /** Interpreter path from the shebang, or the default interpreter */
  interpreter: string;
  /** Shebang arguments passed before the script is read from stdin */
  args: string[];
  scriptType: ScriptType;
}

export interface ExecuteOptions {
  /** Skip validation (manual override) */
  force?: boolean;
  /** Kill the interpreter after this many milliseconds */
  timeout?: number;
  /** Working directory for the interpreter */
  cwd?: string;
  /** Extra environment merged over the current process environment */
  env?: Record<string, string>;
}

export interface ExecuteResult {
  success: boolean;
  /** 0 on success, the child's exit code, or -1 when it never ran or was killed */
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Milliseconds from the call to the result */
  duration: number;
  command?: ExecCommand;
  error?: string;
  /** Present when validation ran */
  validation?: ValidationOutcome;
}

export interface AuditEntry {
  interpreter: string;
  args: string[];
  scriptType: ScriptType;
  forced: boolean;
  success: boolean;
  exitCode: number;
  duration: number;
}

export interface ExecutorDependencies {
  /** Return false to refuse running the command */
  checkPolicy?: (command: ExecCommand) => Promise<boolean>;
  auditLog?: (entry: AuditEntry) => void;
  logger?: Logger;
  /** Interpreter for scripts without a shebang (default /bin/sh) */
  defaultInterpreter?: string;
  /** Default for ExecuteOptions.timeout */
  timeoutMs?: number;
  /** Run validation before spawning unless forced (default true) */
  requireValidation?: boolean;
  /** Shebang argument cap */
  maxShebangArgs?: number;
}

/**
 * Outcome of the pre-execution gate
 */
export type ExecutableCheck =
  | { ok: true; interpreter: string }
  | { ok: false; reason: string };
