/**
 * Program definition shared by the binary and the tests
 */

import { Command, Option } from 'commander';
import { LogLevelSchema } from '@scriptward/ipc';
import { createContext } from './context.js';
import type { CliContext, GlobalOptions } from './context.js';
import {
  createAnalyzeCommand,
  createDetectCommand,
  createHighlightCommand,
  createMetadataCommand,
  createRunCommand,
  createSchemesCommand,
  createShebangCommand,
  createStatsCommand,
  createValidateCommand,
} from './commands/index.js';

export const VERSION = '0.1.0';

/**
 * Create and configure the main CLI program
 */
export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();
  let context: CliContext | null = null;

  const getContext = (): CliContext => {
    if (!context) {
      context = createContext(program.opts<GlobalOptions>(), env);
    }
    return context;
  };

  program
    .name('scriptward')
    .description('Scriptward - classify, validate and highlight interpreter scripts')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-c, --config <path>', 'JSON or YAML config file')
    .addOption(new Option('--log-level <level>', 'Log level').choices(LogLevelSchema.options))
    .addHelpText(
      'after',
      `
Examples:
  $ scriptward detect install.sh          Print the script type
  $ scriptward validate -j postinst       Validation issues as JSON
  $ scriptward highlight -s vim run.py    Colored listing
  $ cat setup.pl | scriptward analyze -   Full report from stdin
  $ scriptward run --timeout 5000 job.sh  Execute with its interpreter
`
    );

  program.addCommand(createDetectCommand(getContext));
  program.addCommand(createValidateCommand(getContext));
  program.addCommand(createMetadataCommand(getContext));
  program.addCommand(createStatsCommand(getContext));
  program.addCommand(createHighlightCommand(getContext));
  program.addCommand(createShebangCommand(getContext));
  program.addCommand(createSchemesCommand(getContext));
  program.addCommand(createAnalyzeCommand(getContext));
  program.addCommand(createRunCommand(getContext));

  return program;
}
