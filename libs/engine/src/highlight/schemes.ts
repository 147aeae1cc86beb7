/**
 * Highlight scheme discovery
 */

import type { HighlightScheme } from '@scriptward/ipc';
import { HIGHLIGHT_SCHEMES } from '@scriptward/ipc';

export function listHighlightSchemes(): HighlightScheme[] {
  return [...HIGHLIGHT_SCHEMES];
}

export function getHighlightSchemeCount(): number {
  return HIGHLIGHT_SCHEMES.length;
}

/**
 * Scheme name at a discovery index, or `null` when the index is out of range
 */
export function getHighlightSchemeName(index: number): HighlightScheme | null {
  if (!Number.isInteger(index) || index < 0 || index >= HIGHLIGHT_SCHEMES.length) return null;
  return HIGHLIGHT_SCHEMES[index];
}

/**
 * Case-insensitive lookup by name
 */
export function parseHighlightScheme(name: string): HighlightScheme | null {
  const wanted = name.trim().toLowerCase();
  return HIGHLIGHT_SCHEMES.find((scheme) => scheme === wanted) ?? null;
}
