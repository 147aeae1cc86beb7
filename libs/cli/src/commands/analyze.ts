/**
 * Analyze command
 *
 * Runs every analyzer over one script.
 */

import { Command } from 'commander';
import { analyzeScript, formatMetadata, formatStats } from '@scriptward/engine';
import type { ScriptAnalysis } from '@scriptward/ipc';
import type { ContextProvider } from '../context.js';
import { readScript } from '../utils/read-script.js';
import { printJson } from '../utils/options.js';

function formatAnalysis(file: string, analysis: ScriptAnalysis): string {
  const lines = [`File: ${file}`, `Type: ${analysis.scriptType}`];

  if (analysis.shebang) {
    lines.push(`Shebang: ${[analysis.shebang.interpreter, ...analysis.shebang.args].join(' ')}`);
  } else {
    lines.push('Shebang: none');
  }

  const { validation } = analysis;
  lines.push(`Valid: ${validation.valid ? 'yes' : 'no'}`);
  for (const issue of validation.issues) {
    lines.push(`  - ${issue.code}: ${issue.message}`);
  }

  lines.push('', formatMetadata(analysis.metadata), '', formatStats(analysis.stats, analysis.scriptType));
  return lines.join('\n');
}

export function createAnalyzeCommand(getContext: ContextProvider): Command {
  return new Command('analyze')
    .description('Run detection, validation, metadata and statistics together')
    .argument('<file>', 'Script file, or - for stdin')
    .option('-j, --json', 'Output as JSON')
    .action(async (file: string, options: { json?: boolean }) => {
      const { config } = getContext();
      const analysis = analyzeScript(await readScript(file), { maxShebangArgs: config.maxShebangArgs });

      if (options.json) {
        printJson(analysis);
      } else {
        console.log(formatAnalysis(file, analysis));
      }
    });
}
