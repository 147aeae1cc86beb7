/**
 * Bracket balance check
 */

import type { ValidationIssue } from '@scriptward/ipc';
import { scanQuotes } from './quotes.js';

const PAIRS: Record<string, { open: string; close: string }> = {
  '{': { open: '{', close: '}' },
  '}': { open: '{', close: '}' },
  '[': { open: '[', close: ']' },
  ']': { open: '[', close: ']' },
  '(': { open: '(', close: ')' },
  ')': { open: '(', close: ')' },
};

/**
 * Count `{}`, `[]` and `()` outside quoted regions.
 *
 * A closer with no open partner fails at once; otherwise every counter has to
 * be back at zero at the end of the text.
 */
export function findBracketIssue(text: string): ValidationIssue | null {
  const counts: Record<string, number> = { '{': 0, '[': 0, '(': 0 };
  const found: { stray: string | null } = { stray: null };

  scanQuotes(text, (ch) => {
    const pair = PAIRS[ch];
    if (!pair) return;

    counts[pair.open] += ch === pair.open ? 1 : -1;
    if (counts[pair.open] < 0) {
      found.stray = ch;
      return false;
    }
  });

  const { stray } = found;
  if (stray !== null) {
    return {
      code: 'UNBALANCED_BRACKETS',
      message: `Unexpected '${stray}' before any matching '${PAIRS[stray].open}'`,
    };
  }

  for (const open of Object.keys(counts)) {
    if (counts[open] !== 0) {
      return {
        code: 'UNBALANCED_BRACKETS',
        message: `${counts[open]} unclosed '${open}'`,
      };
    }
  }

  return null;
}

/**
 * True when all three bracket kinds balance outside quotes
 */
export function checkBracketBalance(text: string): boolean {
  return findBracketIssue(text) === null;
}
