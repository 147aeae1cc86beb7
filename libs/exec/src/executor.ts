/**
 * Script Executor
 *
 * Runs a script through its interpreter with validation and policy checks.
 */

import { spawn } from 'node:child_process';
import type { ValidationOutcome } from '@scriptward/ipc';
import {
  DEFAULT_EXEC_TIMEOUT_MS,
  DEFAULT_INTERPRETER,
  DEFAULT_MAX_SHEBANG_ARGS,
} from '@scriptward/ipc';
import {
  ExecutionError,
  classifyScript,
  noopLogger,
  parseShebang,
  validateScript,
} from '@scriptward/engine';
import type { Logger } from '@scriptward/engine';
import type { ExecCommand, ExecuteOptions, ExecuteResult, ExecutorDependencies } from './types.js';

interface ProcessOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  signal: NodeJS.Signals | null;
}

export class ScriptExecutor {
  private deps: ExecutorDependencies;
  private log: Logger;

  constructor(deps: ExecutorDependencies = {}) {
    this.deps = deps;
    this.log = deps.logger ?? noopLogger;
  }

  /**
   * Execute a script
   */
  async execute(text: string, options: ExecuteOptions = {}): Promise<ExecuteResult> {
    const startTime = Date.now();
    const forced = options.force === true;
    const empty = { stdout: '', stderr: '' };

    let validation: ValidationOutcome | undefined;
    if (!forced && this.deps.requireValidation !== false) {
      validation = validateScript(text);
      if (!validation.valid) {
        this.log.warn(`Refusing to run script: ${validation.issues.map((i) => i.message).join('; ')}`);
        return {
          success: false,
          exitCode: -1,
          ...empty,
          duration: Date.now() - startTime,
          error: 'Script failed validation',
          validation,
        };
      }
    }

    const command = this.buildCommand(text);

    if (this.deps.checkPolicy) {
      const allowed = await this.deps.checkPolicy(command);
      if (!allowed) {
        return {
          success: false,
          exitCode: -1,
          ...empty,
          duration: Date.now() - startTime,
          command,
          error: 'Execution blocked by policy',
          validation,
        };
      }
    }

    let result: ExecuteResult;
    try {
      const outcome = await this.runProcess(command, text, options);
      result = {
        success: outcome.exitCode === 0,
        exitCode: outcome.exitCode,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        duration: Date.now() - startTime,
        command,
        validation,
      };
      if (outcome.signal) {
        result.error = `Interpreter killed by ${outcome.signal}`;
      }
    } catch (error) {
      result = {
        success: false,
        exitCode: -1,
        ...empty,
        duration: Date.now() - startTime,
        command,
        error: error instanceof Error ? error.message : String(error),
        validation,
      };
    }

    this.log.debug(`${command.interpreter} exited with ${result.exitCode} after ${result.duration}ms`);

    if (this.deps.auditLog) {
      this.deps.auditLog({
        interpreter: command.interpreter,
        args: command.args,
        scriptType: command.scriptType,
        forced,
        success: result.success,
        exitCode: result.exitCode,
        duration: result.duration,
      });
    }

    return result;
  }

  /**
   * Resolve the interpreter command for a script
   */
  buildCommand(text: string): ExecCommand {
    const shebang = parseShebang(text, this.deps.maxShebangArgs ?? DEFAULT_MAX_SHEBANG_ARGS);
    return {
      interpreter: shebang?.interpreter ?? this.deps.defaultInterpreter ?? DEFAULT_INTERPRETER,
      args: shebang?.args ?? [],
      scriptType: classifyScript(text),
    };
  }

  /**
   * Spawn the interpreter and feed the script on stdin
   */
  private runProcess(command: ExecCommand, text: string, options: ExecuteOptions): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const proc = spawn(command.interpreter, command.args, {
        cwd: options.cwd,
        env: {
          ...process.env,
          ...options.env,
        },
        timeout: options.timeout ?? this.deps.timeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS,
      });

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.stdin?.on('error', (err: Error) => {
        this.log.debug(`stdin closed early: ${err.message}`);
      });

      proc.on('error', (err: Error) => {
        if (settled) return;
        settled = true;
        reject(new ExecutionError(`Failed to start ${command.interpreter}: ${err.message}`, command.interpreter));
      });

      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        resolve({ exitCode: code ?? -1, stdout, stderr, signal });
      });

      proc.stdin?.end(text);
    });
  }
}
