/**
 * Validate command
 *
 * Runs the syntax checks and exits with status 1 when any fails.
 */

import { Command, Option } from 'commander';
import { ScriptTypeSchema } from '@scriptward/ipc';
import type { ScriptType } from '@scriptward/ipc';
import { requireKnownType, validateScript } from '@scriptward/engine';
import type { ContextProvider } from '../context.js';
import { readScript } from '../utils/read-script.js';
import { printJson } from '../utils/options.js';

interface ValidateOptions {
  type?: ScriptType;
  strictType?: boolean;
  json?: boolean;
}

export function createValidateCommand(getContext: ContextProvider): Command {
  return new Command('validate')
    .description('Check quotes, brackets, shebang and block structure')
    .argument('<file>', 'Script file, or - for stdin')
    .addOption(
      new Option('-t, --type <type>', 'Validate as this script type').choices(ScriptTypeSchema.options),
    )
    .option('--strict-type', 'Fail when the script type cannot be determined')
    .option('-j, --json', 'Output as JSON')
    .action(async (file: string, options: ValidateOptions) => {
      const { logger } = getContext();
      const text = await readScript(file);
      const outcome = validateScript(text, options.type);

      if (options.strictType) {
        requireKnownType(outcome.scriptType);
      }

      logger.debug(`validate ${file}: ${outcome.valid ? 'valid' : `${outcome.issues.length} issue(s)`}`);

      if (options.json) {
        printJson(outcome);
      } else {
        console.log(`${outcome.valid ? 'valid' : 'invalid'} (${outcome.scriptType})`);
        for (const issue of outcome.issues) {
          console.log(`  - ${issue.code}: ${issue.message}`);
        }
      }

      if (!outcome.valid) {
        process.exitCode = 1;
      }
    });
}
