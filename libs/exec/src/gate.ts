import { inspectShebang } from '@scriptward/engine';
import type { ExecutableCheck } from './types.js';

/**
 * Pre-execution gate: the script must be non-empty and start with a shebang
 * naming a non-empty, NUL-free interpreter.
 */
export function checkExecutable(text: string): ExecutableCheck {
  if (text.length === 0) {
    return { ok: false, reason: 'Script is empty' };
  }

  const inspection = inspectShebang(text);
  switch (inspection.status) {
    case 'absent':
      return { ok: false, reason: 'Script has no shebang line' };
    case 'malformed':
      return { ok: false, reason: inspection.reason };
    case 'present':
      return { ok: true, interpreter: inspection.shebang.interpreter };
  }
}
