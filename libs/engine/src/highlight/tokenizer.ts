/**
 * Single-pass highlighting tokenizer
 *
 * Shell-flavoured rules applied to every script type. Spans of a line always
 * concatenate back to the line.
 */

import type { Span } from '@scriptward/ipc';
import { SHELL_KEYWORDS, SHELL_OPERATORS } from '@scriptward/ipc';

const ALPHABETIC = /^\p{Alphabetic}$/u;
const WORD_CHAR = /^[\p{Alphabetic}\p{N}_]$/u;
const VARIABLE_CHAR = /^[\p{Alphabetic}\p{N}_{}]$/u;

/**
 * Split one line (without its newline) into categorised spans
 */
export function tokenizeLine(line: string): Span[] {
  const chars = Array.from(line);
  const spans: Span[] = [];
  let i = 0;

  while (i < chars.length) {
    const ch = chars[i];

    if (ch === '#') {
      spans.push({ category: 'comment', text: chars.slice(i).join('') });
      break;
    }

    if (ch === '"' || ch === "'") {
      const start = i;
      i++;
      while (i < chars.length && chars[i] !== ch) {
        i += chars[i] === '\\' ? 2 : 1;
      }
      // closing quote, when there is one
      i = Math.min(i + 1, chars.length);
      spans.push({ category: 'string', text: chars.slice(start, i).join('') });
      continue;
    }

    if (ch === '$') {
      const start = i;
      i++;
      while (i < chars.length && VARIABLE_CHAR.test(chars[i])) i++;
      spans.push({ category: 'variable', text: chars.slice(start, i).join('') });
      continue;
    }

    if (ALPHABETIC.test(ch)) {
      const start = i;
      while (i < chars.length && WORD_CHAR.test(chars[i])) i++;
      const word = chars.slice(start, i).join('');
      spans.push({ category: SHELL_KEYWORDS.has(word) ? 'keyword' : 'plain', text: word });
      continue;
    }

    spans.push({ category: SHELL_OPERATORS.has(ch) ? 'operator' : 'plain', text: ch });
    i++;
  }

  return spans;
}

/**
 * Tokenize every line of a text. Lines are split on `\n` only, so a `\r`
 * stays in its line.
 */
export function tokenizeScript(text: string): Span[][] {
  return text.split('\n').map(tokenizeLine);
}

/**
 * Reassemble text from tokenized lines
 */
export function joinSpans(lines: readonly (readonly Span[])[]): string {
  return lines.map((spans) => spans.map((span) => span.text).join('')).join('\n');
}
