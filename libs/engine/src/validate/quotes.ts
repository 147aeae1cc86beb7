/**
 * Quote tracking shared by the balance checks
 */

import type { ValidationIssue } from '@scriptward/ipc';

export interface QuoteState {
  inSingle: boolean;
  inDouble: boolean;
}

/**
 * Walk a text the way the balance checks see it.
 *
 * Only one kind of quoted region is open at a time; a quote of the other kind
 * inside it is ordinary text. A backslash escapes the next character wherever
 * it appears, so an escaped quote never opens or closes a region. `visit`
 * receives every character outside quotes that does not toggle a region,
 * escaped ones included; returning `false` stops the walk.
 */
export function scanQuotes(text: string, visit?: (ch: string) => boolean | void): QuoteState {
  const state: QuoteState = { inSingle: false, inDouble: false };
  let escapeNext = false;

  for (const ch of text) {
    if (escapeNext) {
      escapeNext = false;
      if (!state.inSingle && !state.inDouble && visit && visit(ch) === false) break;
      continue;
    }

    if (ch === '\\') {
      escapeNext = true;
    } else if (ch === "'" && !state.inDouble) {
      state.inSingle = !state.inSingle;
    } else if (ch === '"' && !state.inSingle) {
      state.inDouble = !state.inDouble;
    } else if (!state.inSingle && !state.inDouble && visit) {
      if (visit(ch) === false) break;
    }
  }

  return state;
}

export function findQuoteIssue(text: string): ValidationIssue | null {
  const { inSingle, inDouble } = scanQuotes(text);
  if (inSingle) {
    return { code: 'UNBALANCED_QUOTES', message: 'Unclosed single-quoted string' };
  }
  if (inDouble) {
    return { code: 'UNBALANCED_QUOTES', message: 'Unclosed double-quoted string' };
  }
  return null;
}

/**
 * True when every quoted region that opens also closes
 */
export function checkQuoteBalance(text: string): boolean {
  return findQuoteIssue(text) === null;
}
