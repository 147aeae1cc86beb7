/**
 * One-shot analysis running every component over a script
 */

import type { ScriptAnalysis } from '@scriptward/ipc';
import { DEFAULT_MAX_SHEBANG_ARGS } from '@scriptward/ipc';
import { classifyScript } from './classifier.js';
import { extractMetadata } from './metadata.js';
import { parseShebang } from './shebang.js';
import { collectStats } from './stats.js';
import { validateScript } from './validate/index.js';

export interface AnalyzeOptions {
  /** Cap on shebang arguments */
  maxShebangArgs?: number;
}

export function analyzeScript(text: string, options: AnalyzeOptions = {}): ScriptAnalysis {
  const scriptType = classifyScript(text);

  return {
    scriptType,
    shebang: parseShebang(text, options.maxShebangArgs ?? DEFAULT_MAX_SHEBANG_ARGS),
    validation: validateScript(text, scriptType),
    metadata: extractMetadata(text),
    stats: collectStats(text),
  };
}
