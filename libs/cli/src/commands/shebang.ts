/**
 * Shebang command
 */

import { Command } from 'commander';
import { inspectShebang } from '@scriptward/engine';
import type { ContextProvider } from '../context.js';
import { readScript } from '../utils/read-script.js';
import { parsePositiveInt, printJson } from '../utils/options.js';

interface ShebangOptions {
  maxArgs?: number;
  json?: boolean;
}

export function createShebangCommand(getContext: ContextProvider): Command {
  return new Command('shebang')
    .description('Show the interpreter and arguments from the #! line')
    .argument('<file>', 'Script file, or - for stdin')
    .option('-n, --max-args <count>', 'Keep at most this many arguments', parsePositiveInt)
    .option('-j, --json', 'Output as JSON')
    .action(async (file: string, options: ShebangOptions) => {
      const { config } = getContext();
      const text = await readScript(file);
      const inspection = inspectShebang(text, options.maxArgs ?? config.maxShebangArgs);

      if (options.json) {
        printJson({ ...inspection, defaultInterpreter: config.defaultInterpreter });
        return;
      }

      switch (inspection.status) {
        case 'absent':
          console.log(`No shebang (default interpreter: ${config.defaultInterpreter})`);
          break;
        case 'malformed':
          console.log(`Malformed shebang: ${inspection.reason}`);
          process.exitCode = 1;
          break;
        case 'present':
          console.log(`Interpreter: ${inspection.shebang.interpreter}`);
          if (inspection.shebang.args.length > 0) {
            console.log(`Arguments: ${inspection.shebang.args.join(' ')}`);
          }
          break;
      }
    });
}
