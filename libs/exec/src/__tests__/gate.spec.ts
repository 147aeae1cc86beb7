import { checkExecutable } from '../gate.js';

describe('checkExecutable', () => {
  it('accepts a script with a shebang', () => {
    expect(checkExecutable('#!/bin/bash\necho hi\n')).toEqual({ ok: true, interpreter: '/bin/bash' });
  });

  it('rejects the empty script', () => {
    expect(checkExecutable('')).toEqual({ ok: false, reason: 'Script is empty' });
  });

  it('rejects a script without a shebang', () => {
    expect(checkExecutable('echo hi\n')).toEqual({ ok: false, reason: 'Script has no shebang line' });
  });

  it('rejects an empty interpreter', () => {
    expect(checkExecutable('#!\n')).toEqual({ ok: false, reason: 'Shebang names no interpreter' });
  });

  it('rejects a NUL in the interpreter', () => {
    expect(checkExecutable('#!/bin/s\0h\n')).toEqual({
      ok: false,
      reason: 'Shebang interpreter contains a NUL character',
    });
  });
});
