/**
 * Header metadata extraction
 *
 * Reads `Field: value` pairs from comment lines near the top of a script.
 * The whole window is scanned even when code lines appear between comments.
 */

import type { MetadataEntry, MetadataField } from '@scriptward/ipc';
import { METADATA_FIELDS, METADATA_WINDOW_LINES, NO_METADATA_FOUND } from '@scriptward/ipc';
import { shebangCommand } from './shebang.js';
import { splitLines } from './text.js';

interface FieldPattern {
  field: MetadataField;
  pattern: RegExp;
}

/** `Field:` at a word boundary, so `Updated:` never reads as `Date:` */
const FIELD_PATTERNS: readonly FieldPattern[] = METADATA_FIELDS.map((field) => ({
  field,
  pattern: new RegExp(`\\b${field}:`, 'i'),
}));

/**
 * Match one comment body against the field vocabulary.
 *
 * Fields are tried in vocabulary order; a field whose value is empty does not
 * count as a match.
 */
export function matchMetadataComment(comment: string): MetadataEntry | null {
  for (const { field, pattern } of FIELD_PATTERNS) {
    const match = pattern.exec(comment);
    if (!match) continue;

    const value = comment.slice(match.index + match[0].length).trim();
    if (value.length > 0) return { field, value };
  }
  return null;
}

/**
 * Extract metadata entries from the first lines of a script, in line order
 */
export function extractMetadata(text: string): MetadataEntry[] {
  const entries: MetadataEntry[] = [];
  const lines = splitLines(text).slice(0, METADATA_WINDOW_LINES);

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed.startsWith('#')) return;

    if (index === 0) {
      const command = shebangCommand(text);
      if (command !== null) {
        if (command.length > 0) entries.push({ field: 'Interpreter', value: command });
        return;
      }
    }

    const entry = matchMetadataComment(trimmed.slice(1).trim());
    if (entry) entries.push(entry);
  });

  return entries;
}

/**
 * Render entries as `Field: value` lines
 */
export function formatMetadata(entries: readonly MetadataEntry[]): string {
  if (entries.length === 0) return NO_METADATA_FOUND;
  return entries.map(({ field, value }) => `${field}: ${value}`).join('\n');
}
