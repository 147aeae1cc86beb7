/**
 * Tests for ScriptExecutor: command resolution, validation gate, policy hook,
 * process outcome mapping and audit logging.
 */

jest.mock('node:child_process', () => ({
  ...jest.requireActual<typeof import('node:child_process')>('node:child_process'),
  spawn: jest.fn(),
}));

import { once } from 'node:events';
import { PassThrough } from 'node:stream';
import { ChildProcess, spawn } from 'node:child_process';
import { ScriptExecutor } from '../executor.js';

const spawnMock = jest.mocked(spawn);

interface FakeRun {
  stdout?: string;
  stderr?: string;
  code?: number | null;
  signal?: NodeJS.Signals | null;
  error?: Error;
}

/**
 * Make spawn return a child that prints the given output and then closes
 */
function fakeProcess(run: FakeRun = {}) {
  const proc = new ChildProcess();
  const stdin = new PassThrough();
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  proc.stdin = stdin;
  proc.stdout = stdout;
  proc.stderr = stderr;

  const received: string[] = [];
  stdin.on('data', (chunk: Buffer) => received.push(chunk.toString()));

  spawnMock.mockImplementation(() => {
    setImmediate(() => {
      if (run.error) {
        proc.emit('error', run.error);
        return;
      }
      const ended = Promise.all([once(stdout, 'end'), once(stderr, 'end')]);
      stdout.end(run.stdout ?? '');
      stderr.end(run.stderr ?? '');
      void ended.then(() => proc.emit('close', run.code === undefined ? 0 : run.code, run.signal ?? null));
    });
    return proc;
  });

  return { stdinText: () => received.join('') };
}

describe('ScriptExecutor', () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  describe('execute', () => {
    it('runs the shebang interpreter and feeds the script on stdin', async () => {
      const script = '#!/bin/bash -e\necho hi\n';
      const child = fakeProcess({ stdout: 'hi\n' });

      const result = await new ScriptExecutor().execute(script);

      expect(spawnMock).toHaveBeenCalledWith(
        '/bin/bash',
        ['-e'],
        expect.objectContaining({ timeout: 30000 }),
      );
      expect(child.stdinText()).toBe(script);
      expect(result).toMatchObject({
        success: true,
        exitCode: 0,
        stdout: 'hi\n',
        stderr: '',
        command: { interpreter: '/bin/bash', args: ['-e'], scriptType: 'shell' },
      });
      expect(result.validation?.valid).toBe(true);
      expect(result.duration).toBeGreaterThanOrEqual(0);
    });

    it('falls back to the default interpreter without a shebang', async () => {
      fakeProcess();

      await new ScriptExecutor({ defaultInterpreter: '/bin/dash' }).execute('echo hi\n');

      expect(spawnMock).toHaveBeenCalledWith('/bin/dash', [], expect.any(Object));
    });

    it('refuses a script that fails validation', async () => {
      const result = await new ScriptExecutor().execute("#!/bin/sh\necho 'open\n");

      expect(spawnMock).not.toHaveBeenCalled();
      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(-1);
      expect(result.error).toBe('Script failed validation');
      expect(result.validation?.issues).toEqual([
        { code: 'UNBALANCED_QUOTES', message: 'Unclosed single-quoted string' },
      ]);
    });

    it('skips validation when forced', async () => {
      fakeProcess({ code: 2 });

      const result = await new ScriptExecutor().execute("#!/bin/sh\necho 'open\n", { force: true });

      expect(spawnMock).toHaveBeenCalledTimes(1);
      expect(result.exitCode).toBe(2);
      expect(result.validation).toBeUndefined();
    });

    it('skips validation when the executor does not require it', async () => {
      fakeProcess();

      const result = await new ScriptExecutor({ requireValidation: false }).execute('echo (\n');

      expect(result.success).toBe(true);
    });

    it('reports the child exit code and stderr', async () => {
      fakeProcess({ code: 3, stderr: 'boom\n' });

      const result = await new ScriptExecutor().execute('#!/bin/sh\nexit 3\n');

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(3);
      expect(result.stderr).toBe('boom\n');
      expect(result.error).toBeUndefined();
    });

    it('maps a signal kill to -1', async () => {
      fakeProcess({ code: null, signal: 'SIGTERM' });

      const result = await new ScriptExecutor().execute('#!/bin/sh\nsleep 100\n', { timeout: 5 });

      expect(spawnMock).toHaveBeenCalledWith('/bin/sh', [], expect.objectContaining({ timeout: 5 }));
      expect(result.exitCode).toBe(-1);
      expect(result.error).toBe('Interpreter killed by SIGTERM');
    });

    it('maps a spawn failure to -1', async () => {
      fakeProcess({ error: new Error('spawn /opt/none ENOENT') });

      const result = await new ScriptExecutor().execute('#!/opt/none\necho hi\n');

      expect(result.success).toBe(false);
      expect(result.exitCode).toBe(-1);
      expect(result.error).toBe('Failed to start /opt/none: spawn /opt/none ENOENT');
    });

    it('uses the configured timeout when none is given', async () => {
      fakeProcess();

      await new ScriptExecutor({ timeoutMs: 1234 }).execute('#!/bin/sh\ntrue\n');

      expect(spawnMock).toHaveBeenCalledWith('/bin/sh', [], expect.objectContaining({ timeout: 1234 }));
    });

    it('passes extra environment and working directory', async () => {
      fakeProcess();

      await new ScriptExecutor().execute('#!/bin/sh\ntrue\n', { cwd: '/tmp', env: { GREETING: 'hi' } });

      const options = spawnMock.mock.calls[0][2];
      expect(options).toMatchObject({ cwd: '/tmp' });
      expect(options?.env?.GREETING).toBe('hi');
    });
  });

  describe('policy and audit', () => {
    it('blocks execution when the policy refuses', async () => {
      const checkPolicy = jest.fn().mockResolvedValue(false);

      const result = await new ScriptExecutor({ checkPolicy }).execute('echo hi\n');

      expect(checkPolicy).toHaveBeenCalledWith({ interpreter: '/bin/sh', args: [], scriptType: 'shell' });
      expect(spawnMock).not.toHaveBeenCalled();
      expect(result.error).toBe('Execution blocked by policy');
    });

    it('writes an audit entry after running', async () => {
      fakeProcess();
      const auditLog = jest.fn();

      await new ScriptExecutor({ auditLog }).execute('#!/usr/bin/perl -w\nprint "x";\n', { force: true });

      expect(auditLog).toHaveBeenCalledWith(
        expect.objectContaining({
          interpreter: '/usr/bin/perl',
          args: ['-w'],
          scriptType: 'perl',
          forced: true,
          success: true,
          exitCode: 0,
        }),
      );
    });
  });

  describe('buildCommand', () => {
    it('caps shebang arguments', () => {
      const executor = new ScriptExecutor({ maxShebangArgs: 1 });
      expect(executor.buildCommand('#!/usr/bin/env python3 -u\nprint(1)\n')).toEqual({
        interpreter: '/usr/bin/env',
        args: ['python3'],
        scriptType: 'python',
      });
    });
  });
});
