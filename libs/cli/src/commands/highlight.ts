/**
 * Highlight command
 *
 * Writes the script with ANSI colors, or its spans with --plain.
 */

import { Command } from 'commander';
import {
  highlightScript,
  listHighlightSchemes,
  parseHighlightScheme,
  tokenizeScript,
} from '@scriptward/engine';
import type { ContextProvider } from '../context.js';
import { readScript } from '../utils/read-script.js';
import { printJson } from '../utils/options.js';

interface HighlightOptions {
  scheme?: string;
  plain?: boolean;
  json?: boolean;
}

export function createHighlightCommand(getContext: ContextProvider): Command {
  return new Command('highlight')
    .description('Print the script with syntax colors')
    .argument('<file>', 'Script file, or - for stdin')
    .option('-s, --scheme <name>', `Color scheme (${listHighlightSchemes().join(', ')})`)
    .option('-p, --plain', 'List spans as "line:category text" instead of colors')
    .option('-j, --json', 'Output spans as JSON')
    .action(async (file: string, options: HighlightOptions) => {
      const { config } = getContext();
      const scheme = options.scheme === undefined ? config.highlightScheme : parseHighlightScheme(options.scheme);
      if (scheme === null) {
        throw new Error(
          `Unknown highlight scheme: ${options.scheme} (expected ${listHighlightSchemes().join(', ')})`,
        );
      }

      const text = await readScript(file);

      if (options.json) {
        printJson(tokenizeScript(text));
        return;
      }

      if (options.plain) {
        tokenizeScript(text).forEach((spans, index) => {
          for (const span of spans) {
            console.log(`${index + 1}:${span.category} ${JSON.stringify(span.text)}`);
          }
        });
        return;
      }

      process.stdout.write(highlightScript(text, scheme));
    });
}
