/**
 * Type-specific structural checks
 *
 * Coarse keyword counts used as a proxy for well-formed block structure. They
 * compare totals only and do not track nesting order.
 */

import type { ScriptType, ValidationIssue } from '@scriptward/ipc';
import { splitLines } from '../text.js';

export interface StructureReport {
  passed: boolean;
  issue: ValidationIssue | null;
  /** Indentation of each colon-terminated line (Python only) */
  blockIndents: number[];
}

/** Line prefixes that open a block closed by a bare `end` */
const RUBY_OPENERS = ['def ', 'class ', 'module ', 'if ', 'unless ', 'while ', 'for ', 'begin'];

function pass(blockIndents: number[] = []): StructureReport {
  return { passed: true, issue: null, blockIndents };
}

function mismatch(message: string): StructureReport {
  return {
    passed: false,
    issue: { code: 'STRUCTURAL_MISMATCH', message },
    blockIndents: [],
  };
}

function checkShell(text: string): StructureReport {
  let ifs = 0;
  let fis = 0;
  let fors = 0;
  let dones = 0;

  for (const line of splitLines(text)) {
    const trimmed = line.trim();
    if (trimmed.startsWith('if ')) ifs++;
    else if (trimmed === 'fi') fis++;
    else if (trimmed.startsWith('for ')) fors++;
    else if (trimmed === 'done') dones++;
  }

  if (ifs !== fis) return mismatch(`${ifs} 'if' line(s) but ${fis} 'fi' line(s)`);
  if (fors !== dones) return mismatch(`${fors} 'for' line(s) but ${dones} 'done' line(s)`);
  return pass();
}

function checkPython(text: string): StructureReport {
  const blockIndents: number[] = [];

  for (const line of splitLines(text)) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) continue;
    if (trimmed.endsWith(':')) {
      blockIndents.push(line.length - line.replace(/^ +/, '').length);
    }
  }

  return pass(blockIndents);
}

function checkPerl(text: string): StructureReport {
  let depth = 0;
  for (const ch of text) {
    if (ch === '{') depth++;
    else if (ch === '}') depth--;
  }

  return depth === 0 ? pass() : mismatch(`Brace tally is ${depth}, expected 0`);
}

function checkRuby(text: string): StructureReport {
  let opened = 0;
  let ended = 0;

  for (const line of splitLines(text)) {
    const trimmed = line.trim();
    if (RUBY_OPENERS.some((prefix) => trimmed.startsWith(prefix))) opened++;
    else if (trimmed === 'end') ended++;
  }

  return opened === ended
    ? pass()
    : mismatch(`${opened} block opener(s) but ${ended} 'end' line(s)`);
}

/**
 * Run the structural check for a script type. Unknown scripts pass.
 */
export function checkStructure(text: string, scriptType: ScriptType): StructureReport {
  switch (scriptType) {
    case 'shell':
      return checkShell(text);
    case 'python':
      return checkPython(text);
    case 'perl':
      return checkPerl(text);
    case 'ruby':
      return checkRuby(text);
    case 'unknown':
      return pass();
  }
}
