/**
 * Script type classification
 *
 * Rules are evaluated in table order and the first match wins; there is no
 * scoring. The shebang command is consulted first, then case-insensitive
 * markers in the whole text. Text that matches nothing is treated as shell.
 */

import type { Classification, ScriptType } from '@scriptward/ipc';
import { UnsupportedScriptTypeError } from './errors.js';
import { shebangCommand } from './shebang.js';

/**
 * A rule matches when every marker of any one of its groups is present
 */
export interface ClassificationRule {
  scriptType: ScriptType;
  groups: readonly (readonly string[])[];
}

/** Matched against the text after `#!` (interpreter and arguments) */
export const SHEBANG_RULES: readonly ClassificationRule[] = [
  { scriptType: 'python', groups: [['python']] },
  { scriptType: 'perl', groups: [['perl']] },
  { scriptType: 'ruby', groups: [['ruby']] },
  { scriptType: 'shell', groups: [['sh'], ['bash'], ['zsh']] },
];

/** Matched against the lower-cased whole text */
export const CONTENT_RULES: readonly ClassificationRule[] = [
  { scriptType: 'python', groups: [['import ', 'def '], ['print('], ['from '], ['class ']] },
  { scriptType: 'perl', groups: [['use strict'], ['my $'], ['print "']] },
  { scriptType: 'ruby', groups: [['def '], ['puts '], ['require '], ['end']] },
  { scriptType: 'shell', groups: [['if ['], ['echo '], ['for '], ['while '], ['function ']] },
];

/** Type given to text no rule recognises */
export const FALLBACK_SCRIPT_TYPE: ScriptType = 'shell';

function matchRules(
  haystack: string,
  rules: readonly ClassificationRule[],
): { scriptType: ScriptType; marker: string } | null {
  for (const rule of rules) {
    for (const group of rule.groups) {
      if (group.every((marker) => haystack.includes(marker))) {
        return { scriptType: rule.scriptType, marker: group.join(' + ') };
      }
    }
  }
  return null;
}

/**
 * Classify a script and report which rule decided it
 */
export function describeClassification(text: string): Classification {
  if (text.length === 0) {
    return { scriptType: 'unknown', source: 'empty', marker: null };
  }

  const command = shebangCommand(text);
  if (command !== null) {
    const hit = matchRules(command, SHEBANG_RULES);
    if (hit) return { ...hit, source: 'shebang' };
  }

  const hit = matchRules(text.toLowerCase(), CONTENT_RULES);
  if (hit) return { ...hit, source: 'content' };

  return { scriptType: FALLBACK_SCRIPT_TYPE, source: 'fallback', marker: null };
}

/**
 * Classify a script as shell, python, perl or ruby.
 *
 * Only the empty text yields `unknown`.
 */
export function classifyScript(text: string): ScriptType {
  return describeClassification(text).scriptType;
}

/**
 * Narrow a script type to a known interpreter family
 *
 * @throws UnsupportedScriptTypeError for `unknown`
 */
export function requireKnownType(scriptType: ScriptType): Exclude<ScriptType, 'unknown'> {
  if (scriptType === 'unknown') throw new UnsupportedScriptTypeError(scriptType);
  return scriptType;
}
