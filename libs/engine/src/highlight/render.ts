/**
 * ANSI rendering of tokenized scripts
 */

import type { HighlightScheme, Span, TokenCategory } from '@scriptward/ipc';
import { tokenizeScript } from './tokenizer.js';

const RESET = '\x1b[0m';

type Palette = Record<Exclude<TokenCategory, 'plain'>, string>;

const NORMAL: Palette = {
  comment: '\x1b[32m',
  string: '\x1b[33m',
  keyword: '\x1b[34m',
  operator: '\x1b[35m',
  variable: '\x1b[36m',
};

const BRIGHT: Palette = {
  comment: '\x1b[92m',
  string: '\x1b[93m',
  keyword: '\x1b[94m',
  operator: '\x1b[95m',
  variable: '\x1b[96m',
};

const PALETTES: Record<HighlightScheme, Palette> = {
  nano: NORMAL,
  vim: BRIGHT,
  default: NORMAL,
};

const ANSI_SEQUENCE = /\x1b\[[0-9;]*m/g;

export function renderSpan(span: Span, scheme: HighlightScheme): string {
  if (span.category === 'plain') return span.text;
  return `${PALETTES[scheme][span.category]}${span.text}${RESET}`;
}

/**
 * Color a script for terminal display. Newlines, including a trailing one,
 * are kept where they were.
 */
export function highlightScript(text: string, scheme: HighlightScheme = 'default'): string {
  return tokenizeScript(text)
    .map((spans) => spans.map((span) => renderSpan(span, scheme)).join(''))
    .join('\n');
}

/**
 * Remove SGR color sequences
 */
export function stripAnsi(rendered: string): string {
  return rendered.replace(ANSI_SEQUENCE, '');
}
