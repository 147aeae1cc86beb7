import type { ScriptStats, ScriptType } from '@scriptward/ipc';
import { countCodePoints, splitLines } from './text.js';

/**
 * Count blank, comment and code lines, plus the characters of the whole text
 */
export function collectStats(text: string): ScriptStats {
  const lines = splitLines(text);
  let codeLines = 0;
  let commentLines = 0;
  let blankLines = 0;

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length === 0) blankLines++;
    else if (trimmed.startsWith('#')) commentLines++;
    else codeLines++;
  }

  return {
    totalLines: lines.length,
    codeLines,
    commentLines,
    blankLines,
    totalChars: countCodePoints(text),
  };
}

export function formatStats(stats: ScriptStats, scriptType: ScriptType): string {
  return [
    'Script Statistics:',
    `Type: ${scriptType}`,
    `Total lines: ${stats.totalLines}`,
    `Code lines: ${stats.codeLines}`,
    `Comment lines: ${stats.commentLines}`,
    `Blank lines: ${stats.blankLines}`,
    `Total characters: ${stats.totalChars}`,
  ].join('\n');
}
