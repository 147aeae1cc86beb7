/**
 * @scriptward/exec
 *
 * Runs analyzed scripts through their interpreter.
 */

export { ScriptExecutor } from './executor.js';
export { checkExecutable } from './gate.js';

export type {
  AuditEntry,
  ExecCommand,
  ExecuteOptions,
  ExecuteResult,
  ExecutableCheck,
  ExecutorDependencies,
} from './types.js';
