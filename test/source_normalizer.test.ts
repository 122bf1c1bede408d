import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { PipelineError } from '../src/diagnostics/errors.js';
import { joinStatements, makeSourceMember, normalizeLine } from '../src/frontend/source.js';

function statementsOf(text: string, diagnostics: Diagnostic[] = []) {
  return joinStatements(makeSourceMember('JOB1', 'LIB', 'LIB(JOB1)', text), diagnostics);
}

describe('normalizeLine', () => {
  it('drops the sequence area and trailing blanks', () => {
    const card = '//STEP1 EXEC PGM=IEFBR14'.padEnd(72) + '00010000';
    expect(normalizeLine(card)).toBe('//STEP1 EXEC PGM=IEFBR14');
  });

  it('returns undefined for comments, delimiters and blank cards', () => {
    expect(normalizeLine('//* a comment')).toBeUndefined();
    expect(normalizeLine('//')).toBeUndefined();
    expect(normalizeLine('/*')).toBeUndefined();
    expect(normalizeLine('    ')).toBeUndefined();
    expect(normalizeLine(' '.repeat(72) + '00020000')).toBeUndefined();
  });
});

describe('makeSourceMember', () => {
  it('splits CRLF text and drops the final empty line', () => {
    expect(makeSourceMember('M', 'L', 'L(M)', 'A\r\nB\r\n').lines).toEqual(['A', 'B']);
  });
});

describe('joinStatements', () => {
  it('joins continuation lines and keeps blanks inside quotes', () => {
    const stmts = statementsOf("//STEP1 EXEC PGM=IEFBR14,\n//             PARM='A B'\n");
    expect(stmts).toHaveLength(1);
    expect(stmts[0]?.text).toBe("//STEP1 EXEC PGM=IEFBR14,PARM='A B'");
    expect(stmts[0]?.span).toEqual({ member: 'JOB1', startLine: 1, endLine: 2 });
  });

  it('joins a continuation that starts in column 4', () => {
    const stmts = statementsOf("//STEP1 EXEC PGM=IEFBR14,\n// PARM='A'\n");
    expect(stmts.map((s) => s.text)).toEqual(["//STEP1 EXEC PGM=IEFBR14,PARM='A'"]);
  });

  it('skips comment cards inside a continuation', () => {
    const stmts = statementsOf('//DD1 DD DSN=A.B,\n//* note\n//   DISP=SHR\n');
    expect(stmts.map((s) => s.text)).toEqual(['//DD1 DD DSN=A.B,DISP=SHR']);
    expect(stmts[0]?.span.endLine).toBe(3);
  });

  it('drops comments that follow the operand field', () => {
    const stmts = statementsOf('//DD1 DD DSN=A.B   INPUT FILE\n');
    expect(stmts[0]?.text).toBe('//DD1 DD DSN=A.B');
  });

  it('renders an unnamed statement with a blank name field', () => {
    const stmts = statementsOf('//      DD DSN=A.C\n');
    expect(stmts[0]?.text).toBe('// DD DSN=A.C');
  });

  it('fails when the member ends inside a continuation', () => {
    let caught: unknown;
    try {
      statementsOf('//S0 EXEC PGM=A\n//S1 EXEC PGM=X,\n');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PipelineError);
    if (!(caught instanceof PipelineError)) return;
    expect(caught.diagnostic.id).toBe('JCL010');
    expect(caught.diagnostic.line).toBe(2);
    expect(caught.diagnostic.message).toBe(
      'Member "JOB1" ends while statement starting on line 2 is still continued.',
    );
  });

  it('collects DD * data up to the /* delimiter', () => {
    const diagnostics: Diagnostic[] = [];
    const stmts = statementsOf(
      '//SYSIN DD *\nLINE ONE\nLINE TWO\n/*\n//S2 EXEC PGM=B\n',
      diagnostics,
    );
    expect(stmts.map((s) => s.text)).toEqual(['//SYSIN DD *', '//S2 EXEC PGM=B']);
    expect(stmts[0]?.instream).toEqual(['LINE ONE', 'LINE TWO']);
    expect(stmts[1]?.span.startLine).toBe(5);
    expect(diagnostics).toEqual([]);
  });

  it('ends DD * data at the next statement', () => {
    const stmts = statementsOf('//IN DD *\nDATA1\n//S2 EXEC PGM=B\n');
    expect(stmts[0]?.instream).toEqual(['DATA1']);
    expect(stmts[1]?.text).toBe('//S2 EXEC PGM=B');
  });

  it('keeps // lines in DD DATA and honours DLM', () => {
    const stmts = statementsOf('//IN DD DATA,DLM=$$\n//NOT A STATEMENT\n$$\n//S2 EXEC PGM=B\n');
    expect(stmts[0]?.instream).toEqual(['//NOT A STATEMENT']);
    expect(stmts.map((s) => s.text)).toEqual(['//IN DD DATA,DLM=$$', '//S2 EXEC PGM=B']);
  });

  it('warns about text outside a statement', () => {
    const diagnostics: Diagnostic[] = [];
    const stmts = statementsOf('GARBAGE\n//S1 EXEC PGM=A\n', diagnostics);
    expect(stmts).toHaveLength(1);
    expect(diagnostics).toEqual([
      {
        id: 'JCL011',
        severity: 'warning',
        message: 'Ignoring text outside a statement: "GARBAGE"',
        file: 'JOB1',
        line: 1,
        column: 1,
      },
    ]);
  });
});
