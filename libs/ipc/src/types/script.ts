/**
 * Script analysis types for Scriptward
 */

/**
 * Interpreter family of a script
 */
export const ScriptType = {
  Shell: 'shell',
  Python: 'python',
  Perl: 'perl',
  Ruby: 'ruby',
  Unknown: 'unknown',
} as const;

export type ScriptType = (typeof ScriptType)[keyof typeof ScriptType];

/**
 * Interpreter and arguments taken from a `#!` line
 */
export interface Shebang {
  /** Interpreter path (first token after `#!`) */
  interpreter: string;
  /** Arguments following the interpreter, in order */
  args: string[];
}

/**
 * Result of inspecting the first line for a shebang
 */
export type ShebangInspection =
  | { status: 'absent' }
  | { status: 'malformed'; reason: string }
  | { status: 'present'; shebang: Shebang };

/**
 * Which rule decided a classification
 */
export type ClassificationSource = 'shebang' | 'content' | 'fallback' | 'empty';

export interface Classification {
  scriptType: ScriptType;
  source: ClassificationSource;
  /** Marker that matched (`null` for fallback and empty input) */
  marker: string | null;
}

/**
 * Codes of the checks a validation can fail
 */
export type ValidationIssueCode =
  | 'UNBALANCED_QUOTES'
  | 'UNBALANCED_BRACKETS'
  | 'MALFORMED_SHEBANG'
  | 'STRUCTURAL_MISMATCH';

export interface ValidationIssue {
  code: ValidationIssueCode;
  message: string;
}

/**
 * Verdict of the syntax validator
 */
export interface ValidationOutcome {
  /** True when no check failed */
  valid: boolean;
  /** Script type the structural check was dispatched on */
  scriptType: ScriptType;
  /** One entry per failing check, in check order */
  issues: ValidationIssue[];
}

/**
 * Field names recognised in header comments
 */
export type MetadataField =
  | 'Author'
  | 'Version'
  | 'Description'
  | 'Date'
  | 'License'
  | 'Copyright'
  | 'Filename'
  | 'Usage'
  | 'Purpose'
  | 'Note'
  | 'Todo'
  | 'Fixme'
  | 'Bug'
  | 'Created'
  | 'Modified'
  | 'Updated'
  | 'Interpreter';

export interface MetadataEntry {
  field: MetadataField;
  value: string;
}

/**
 * Line and character counts of a script
 */
export interface ScriptStats {
  totalLines: number;
  codeLines: number;
  commentLines: number;
  blankLines: number;
  /** Unicode code points in the whole text */
  totalChars: number;
}

/**
 * Everything the engine reports about one script
 */
export interface ScriptAnalysis {
  scriptType: ScriptType;
  shebang: Shebang | null;
  validation: ValidationOutcome;
  metadata: MetadataEntry[];
  stats: ScriptStats;
}
