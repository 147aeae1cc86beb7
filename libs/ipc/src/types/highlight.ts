/**
 * Highlighting types
 */

/**
 * Color scheme for terminal rendering. Only changes intensity, never tokenization.
 */
export const HighlightScheme = {
  Nano: 'nano',
  Vim: 'vim',
  Default: 'default',
} as const;

export type HighlightScheme = (typeof HighlightScheme)[keyof typeof HighlightScheme];

/**
 * Semantic category of a highlighted span
 */
export type TokenCategory = 'comment' | 'string' | 'variable' | 'keyword' | 'operator' | 'plain';

/**
 * Contiguous slice of a line tagged with its category
 */
export interface Span {
  category: TokenCategory;
  text: string;
}
