/**
 * Schemes command
 */

import { Command } from 'commander';
import { getHighlightSchemeCount, getHighlightSchemeName } from '@scriptward/engine';
import type { ContextProvider } from '../context.js';
import { printJson } from '../utils/options.js';

export function createSchemesCommand(getContext: ContextProvider): Command {
  return new Command('schemes')
    .description('List highlight schemes by index')
    .option('-j, --json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const { config } = getContext();
      const names: string[] = [];
      for (let index = 0; index < getHighlightSchemeCount(); index++) {
        const name = getHighlightSchemeName(index);
        if (name !== null) names.push(name);
      }

      if (options.json) {
        printJson(names);
        return;
      }
      names.forEach((name, index) => {
        console.log(`${index}  ${name}${name === config.highlightScheme ? ' *' : ''}`);
      });
    });
}
