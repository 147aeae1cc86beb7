/**
 * Syntax validation
 *
 * Composes the quote, bracket, shebang and structural checks. The verdict is
 * advisory: passing says the script looks structurally sound, not that it
 * runs or is safe.
 */

import type { ScriptType, ValidationIssue, ValidationOutcome } from '@scriptward/ipc';
import { classifyScript } from '../classifier.js';
import { inspectShebang } from '../shebang.js';
import { findBracketIssue } from './brackets.js';
import { findQuoteIssue } from './quotes.js';
import { checkStructure } from './structure.js';

export { scanQuotes, findQuoteIssue, checkQuoteBalance } from './quotes.js';
export type { QuoteState } from './quotes.js';
export { findBracketIssue, checkBracketBalance } from './brackets.js';
export { checkStructure } from './structure.js';
export type { StructureReport } from './structure.js';

export function findShebangIssue(text: string): ValidationIssue | null {
  const inspection = inspectShebang(text);
  if (inspection.status !== 'malformed') return null;
  return { code: 'MALFORMED_SHEBANG', message: inspection.reason };
}

/**
 * True when the script has no shebang or a shebang naming a usable interpreter
 */
export function checkShebang(text: string): boolean {
  return findShebangIssue(text) === null;
}

/**
 * Validate a script.
 *
 * @param scriptType - type for the structural check; classified from the text when omitted
 */
export function validateScript(text: string, scriptType?: ScriptType): ValidationOutcome {
  const type = scriptType ?? classifyScript(text);
  const issues: ValidationIssue[] = [];

  const quoteIssue = findQuoteIssue(text);
  if (quoteIssue) issues.push(quoteIssue);

  const bracketIssue = findBracketIssue(text);
  if (bracketIssue) issues.push(bracketIssue);

  const shebangIssue = findShebangIssue(text);
  if (shebangIssue) issues.push(shebangIssue);

  const structure = checkStructure(text, type);
  if (structure.issue) issues.push(structure.issue);

  return {
    valid: issues.length === 0,
    scriptType: type,
    issues,
  };
}

export function isScriptValid(text: string, scriptType?: ScriptType): boolean {
  return validateScript(text, scriptType).valid;
}
