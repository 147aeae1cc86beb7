/**
 * Run command
 *
 * Executes a script through its interpreter after the shebang gate and
 * validation. --force skips both.
 */

import { Command } from 'commander';
import { ScriptExecutor, checkExecutable } from '@scriptward/exec';
import type { ContextProvider } from '../context.js';
import { readScript } from '../utils/read-script.js';
import { parsePositiveInt, printJson } from '../utils/options.js';

interface RunOptions {
  force?: boolean;
  timeout?: number;
  json?: boolean;
}

export function createRunCommand(getContext: ContextProvider): Command {
  return new Command('run')
    .description('Execute a script with its shebang interpreter')
    .argument('<file>', 'Script file, or - for stdin')
    .option('-f, --force', 'Skip the shebang gate and validation')
    .option('--timeout <ms>', 'Kill the interpreter after this many milliseconds', parsePositiveInt)
    .option('-j, --json', 'Output the result as JSON')
    .action(async (file: string, options: RunOptions) => {
      const { config, logger } = getContext();
      const text = await readScript(file);

      if (!options.force) {
        const gate = checkExecutable(text);
        if (!gate.ok) {
          console.error(`Refusing to run ${file}: ${gate.reason}`);
          process.exitCode = 1;
          return;
        }
      }

      const executor = new ScriptExecutor({
        logger,
        defaultInterpreter: config.defaultInterpreter,
        timeoutMs: config.execTimeoutMs,
        requireValidation: config.requireValidation,
        maxShebangArgs: config.maxShebangArgs,
        auditLog: (entry) => logger.info(`run ${file}: ${JSON.stringify(entry)}`),
      });

      const result = await executor.execute(text, { force: options.force, timeout: options.timeout });

      if (options.json) {
        printJson(result);
      } else {
        process.stdout.write(result.stdout);
        process.stderr.write(result.stderr);
        if (result.error) {
          console.error(`Error: ${result.error}`);
          for (const issue of result.validation?.issues ?? []) {
            console.error(`  - ${issue.code}: ${issue.message}`);
          }
        }
      }

      if (!result.success) {
        process.exitCode = result.exitCode > 0 ? result.exitCode : 1;
      }
    });
}
