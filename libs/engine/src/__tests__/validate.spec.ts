import {
  checkBracketBalance,
  checkQuoteBalance,
  checkShebang,
  checkStructure,
  findBracketIssue,
  isScriptValid,
  validateScript,
} from '../validate/index.js';

describe('checkQuoteBalance', () => {
  it('accepts closed single quotes', () => {
    expect(checkQuoteBalance("echo 'hello world'")).toBe(true);
  });

  it('accepts closed double quotes', () => {
    expect(checkQuoteBalance('echo "hello world"')).toBe(true);
  });

  it('rejects an unclosed single quote', () => {
    expect(checkQuoteBalance("echo 'hello world")).toBe(false);
  });

  it('rejects mismatched quote kinds', () => {
    expect(checkQuoteBalance('echo "hello world\'')).toBe(false);
  });

  it('ignores the other quote kind inside a region', () => {
    expect(checkQuoteBalance('echo "it\'s fine"')).toBe(true);
  });

  it('treats an escaped quote as text', () => {
    expect(checkQuoteBalance("echo don\\'t")).toBe(true);
    expect(checkQuoteBalance('echo "say \\"hi\\""')).toBe(true);
  });
});

describe('checkBracketBalance', () => {
  it('accepts balanced test brackets', () => {
    expect(checkBracketBalance("if [ test ]; then echo 'ok'; fi")).toBe(true);
  });

  it('rejects an unmatched [', () => {
    expect(checkBracketBalance("if [ test; then echo 'ok'; fi")).toBe(false);
  });

  it('accepts a closed array', () => {
    expect(checkBracketBalance('array=(one two three)')).toBe(true);
  });

  it('rejects an unclosed array', () => {
    expect(checkBracketBalance('array=(one two three')).toBe(false);
  });

  it('fails on a closer before its opener even when totals match', () => {
    expect(checkBracketBalance(')(')).toBe(false);
    expect(findBracketIssue('} {')).toEqual({
      code: 'UNBALANCED_BRACKETS',
      message: "Unexpected '}' before any matching '{'",
    });
  });

  it('does not count brackets inside quotes', () => {
    expect(checkBracketBalance("echo '(' \"]\"")).toBe(true);
  });

  it('counts escaped brackets outside quotes', () => {
    expect(findBracketIssue('echo \\)')).toEqual({
      code: 'UNBALANCED_BRACKETS',
      message: "Unexpected ')' before any matching '('",
    });
    expect(checkBracketBalance('find . \\( -name x \\)')).toBe(true);
  });

  it('still ignores escaped brackets inside quotes', () => {
    expect(checkBracketBalance('echo "\\("')).toBe(true);
  });

  it('reports the first unclosed kind', () => {
    expect(findBracketIssue('f() { [')).toEqual({
      code: 'UNBALANCED_BRACKETS',
      message: "1 unclosed '{'",
    });
  });
});

describe('checkShebang', () => {
  it('accepts a missing shebang', () => {
    expect(checkShebang('echo hi\n')).toBe(true);
  });

  it('accepts a normal shebang', () => {
    expect(checkShebang('#!/bin/sh -e\n')).toBe(true);
  });

  it('rejects an empty shebang', () => {
    expect(checkShebang('#!  \necho hi\n')).toBe(false);
  });

  it('rejects a NUL in the interpreter', () => {
    expect(checkShebang('#!/bin/b\0ash\n')).toBe(false);
  });
});

describe('checkStructure', () => {
  it('passes balanced shell if/fi and for/done', () => {
    const script = [
      '#!/bin/sh',
      'if [ -f x ]; then',
      '  echo yes',
      'fi',
      'for f in a b; do',
      '  echo $f',
      'done',
      '',
    ].join('\n');
    expect(checkStructure(script, 'shell').passed).toBe(true);
  });

  it('fails a shell for without done', () => {
    expect(checkStructure('for f in a b; do\n  echo $f\n', 'shell').issue).toEqual({
      code: 'STRUCTURAL_MISMATCH',
      message: "1 'for' line(s) but 0 'done' line(s)",
    });
  });

  it('counts only exact fi lines as closers', () => {
    expect(checkStructure('if true; then\n  echo ok\nfi # end\n', 'shell').issue).toEqual({
      code: 'STRUCTURAL_MISMATCH',
      message: "1 'if' line(s) but 0 'fi' line(s)",
    });
  });

  it('always passes python and records block indentation', () => {
    const report = checkStructure('def f():\n    if x:\n        pass\n# c:\n', 'python');
    expect(report.passed).toBe(true);
    expect(report.blockIndents).toEqual([0, 4]);
  });

  it('counts perl braces even inside quotes', () => {
    expect(checkStructure("print '}';\n", 'perl').issue).toEqual({
      code: 'STRUCTURAL_MISMATCH',
      message: 'Brace tally is -1, expected 0',
    });
    expect(checkStructure('sub f { 1 }\n', 'perl').passed).toBe(true);
  });

  it('matches ruby openers against end lines', () => {
    const script = "class Greeter\n  def hi\n    puts 'hi'\n  end\nend\n";
    expect(checkStructure(script, 'ruby').passed).toBe(true);
    expect(checkStructure("class Greeter\n  def hi\n    puts 'hi'\n  end\n", 'ruby').issue).toEqual({
      code: 'STRUCTURAL_MISMATCH',
      message: "2 block opener(s) but 1 'end' line(s)",
    });
  });

  it('passes unknown scripts', () => {
    expect(checkStructure('fi\nfi\n', 'unknown').passed).toBe(true);
  });
});

describe('validateScript', () => {
  it('accepts a simple bash script', () => {
    expect(validateScript("#!/bin/bash\necho 'hello world'\n")).toEqual({
      valid: true,
      scriptType: 'shell',
      issues: [],
    });
  });

  it('rejects an unclosed quote', () => {
    expect(validateScript("#!/bin/bash\necho 'unclosed quote\n")).toEqual({
      valid: false,
      scriptType: 'shell',
      issues: [{ code: 'UNBALANCED_QUOTES', message: 'Unclosed single-quoted string' }],
    });
  });

  it('reports every failing check in order', () => {
    const outcome = validateScript("#!/bin/bash\nif [ test {\necho 'test'\n");
    expect(outcome.valid).toBe(false);
    expect(outcome.issues.map((issue) => issue.code)).toEqual([
      'UNBALANCED_BRACKETS',
      'STRUCTURAL_MISMATCH',
    ]);
  });

  it('rejects an escaped opener left unclosed', () => {
    expect(validateScript('echo \\(\n')).toEqual({
      valid: false,
      scriptType: 'shell',
      issues: [{ code: 'UNBALANCED_BRACKETS', message: "1 unclosed '('" }],
    });
  });

  it('rejects an empty shebang', () => {
    expect(validateScript('#!   \necho hi\n').issues).toEqual([
      { code: 'MALFORMED_SHEBANG', message: 'Shebang names no interpreter' },
    ]);
  });

  it('uses the given script type for the structural check', () => {
    const outcome = validateScript('sub f { 1 }\nprint "}";\n', 'perl');
    expect(outcome.scriptType).toBe('perl');
    expect(outcome.issues).toEqual([
      { code: 'STRUCTURAL_MISMATCH', message: 'Brace tally is -1, expected 0' },
    ]);
  });

  it('classifies the text when no type is given', () => {
    expect(validateScript("#!/usr/bin/env python3\nprint('x')\n").scriptType).toBe('python');
  });
});

describe('isScriptValid', () => {
  it('mirrors the validation verdict', () => {
    expect(isScriptValid('#!/bin/sh\necho ok\n')).toBe(true);
    expect(isScriptValid('#!/bin/sh\necho (\n')).toBe(false);
  });
});
