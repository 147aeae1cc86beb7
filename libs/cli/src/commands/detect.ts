/**
 * Detect command
 *
 * Prints the script type chosen by the classifier.
 */

import { Command } from 'commander';
import { describeClassification } from '@scriptward/engine';
import type { ContextProvider } from '../context.js';
import { readScript } from '../utils/read-script.js';
import { printJson } from '../utils/options.js';

interface DetectOptions {
  json?: boolean;
  explain?: boolean;
}

export function createDetectCommand(getContext: ContextProvider): Command {
  return new Command('detect')
    .description('Detect the script type')
    .argument('<file>', 'Script file, or - for stdin')
    .option('-e, --explain', 'Show the rule that decided the type')
    .option('-j, --json', 'Output as JSON')
    .action(async (file: string, options: DetectOptions) => {
      const { logger } = getContext();
      const text = await readScript(file);
      const classification = describeClassification(text);
      logger.debug(`detect ${file}: ${classification.scriptType} via ${classification.source}`);

      if (options.json) {
        printJson({ file, ...classification });
        return;
      }

      if (!options.explain) {
        console.log(classification.scriptType);
      } else if (classification.marker !== null) {
        console.log(`${classification.scriptType} (${classification.source}: ${JSON.stringify(classification.marker)})`);
      } else {
        console.log(`${classification.scriptType} (${classification.source})`);
      }
    });
}
