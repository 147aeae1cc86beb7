/**
 * Metadata command
 */

import { Command } from 'commander';
import { extractMetadata, formatMetadata } from '@scriptward/engine';
import type { ContextProvider } from '../context.js';
import { readScript } from '../utils/read-script.js';
import { printJson } from '../utils/options.js';

export function createMetadataCommand(getContext: ContextProvider): Command {
  return new Command('metadata')
    .description('Show header comment fields such as Author and Version')
    .argument('<file>', 'Script file, or - for stdin')
    .option('-j, --json', 'Output as JSON')
    .action(async (file: string, options: { json?: boolean }) => {
      const { logger } = getContext();
      const entries = extractMetadata(await readScript(file));
      logger.debug(`metadata ${file}: ${entries.length} field(s)`);
      if (options.json) {
        printJson(entries);
      } else {
        console.log(formatMetadata(entries));
      }
    });
}
