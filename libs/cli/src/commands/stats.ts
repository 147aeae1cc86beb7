/**
 * Stats command
 */

import { Command } from 'commander';
import { classifyScript, collectStats, formatStats } from '@scriptward/engine';
import type { ContextProvider } from '../context.js';
import { readScript } from '../utils/read-script.js';
import { printJson } from '../utils/options.js';

export function createStatsCommand(getContext: ContextProvider): Command {
  return new Command('stats')
    .description('Count code, comment and blank lines')
    .argument('<file>', 'Script file, or - for stdin')
    .option('-j, --json', 'Output as JSON')
    .action(async (file: string, options: { json?: boolean }) => {
      const { logger } = getContext();
      const text = await readScript(file);
      const stats = collectStats(text);
      const scriptType = classifyScript(text);
      logger.debug(`stats ${file}: ${stats.totalLines} line(s), ${scriptType}`);

      if (options.json) {
        printJson({ scriptType, ...stats });
      } else {
        console.log(formatStats(stats, scriptType));
      }
    });
}
