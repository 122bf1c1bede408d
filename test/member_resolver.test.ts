import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { PipelineError } from '../src/diagnostics/errors.js';
import { createMemoryLookup } from '../src/frontend/members.js';
import { MemberResolver, type ResolvedNode, type ResolverOptions } from '../src/frontend/resolver.js';
import { buildModel } from '../src/model/build.js';

type Libraries = Record<string, Record<string, string>>;

function resolver(
  libraries: Libraries,
  diagnostics: Diagnostic[] = [],
  options: Partial<ResolverOptions> = {},
): MemberResolver {
  return new MemberResolver(
    createMemoryLookup(libraries),
    { searchPaths: ['LIB'], ...options },
    diagnostics,
  );
}

function failure(run: () => unknown): PipelineError {
  try {
    run();
  } catch (err) {
    if (err instanceof PipelineError) return err;
    throw err;
  }
  throw new Error('expected a PipelineError');
}

function programs(nodes: ResolvedNode[]): string[] {
  return nodes.flatMap((n) => (n.kind === 'step' ? [n.exec.target.name] : []));
}

function datasets(nodes: ResolvedNode[]): Array<string | undefined> {
  return nodes.flatMap((n) => (n.kind === 'dd' ? [n.dd.dsn] : []));
}

describe('INCLUDE', () => {
  it('splices the included member in place', () => {
    const nodes = resolver({
      LIB: {
        JOB1: '//S1 EXEC PGM=A\n// INCLUDE MEMBER=DDS\n//S2 EXEC PGM=B\n',
        DDS: '//IN DD DSN=X.Y\n',
      },
    }).run('job1');
    expect(nodes.map((n) => n.kind)).toEqual(['step', 'dd', 'step']);
    const dd = nodes[1];
    expect(dd?.kind === 'dd' ? dd.dd.statement.member : undefined).toBe('DDS');
  });

  it('flattens statements without walking them', () => {
    const r = resolver({ LIB: { INNER: '//X DD DUMMY\n// INCLUDE MEMBER=LAST\n', LAST: '//Y DD DUMMY\n' } });
    const flat = r.expandIncludes([
      { text: '// INCLUDE MEMBER=INNER', member: 'JOB1', span: { member: 'JOB1', startLine: 1, endLine: 1 } },
    ]);
    expect(flat.map((s) => s.text)).toEqual(['//X DD DUMMY', '//Y DD DUMMY']);
  });

  it('detects cycles', () => {
    const err = failure(() =>
      resolver({ LIB: { A: '// INCLUDE MEMBER=B\n', B: '// INCLUDE MEMBER=A\n' } }).run('A'),
    );
    expect(err.diagnostic.id).toBe('JCL021');
    expect(err.diagnostic.message).toBe('Cyclic include detected: A -> B -> A');
    expect(err.diagnostic.file).toBe('B');
  });

  it('detects a member that includes itself', () => {
    const err = failure(() =>
      resolver({ LIB: { JOB1: '//S EXEC PGM=X\n// INCLUDE MEMBER=JOB1\n' } }).run('JOB1'),
    );
    expect(err.diagnostic.id).toBe('JCL021');
    expect(err.diagnostic.message).toBe('Cyclic include detected: JOB1 -> JOB1');
    expect(err.diagnostic.line).toBe(2);
  });

  it('stops at the nesting limit', () => {
    const err = failure(() =>
      resolver(
        { LIB: { M1: '// INCLUDE MEMBER=M2\n', M2: '// INCLUDE MEMBER=M3\n', M3: '//S EXEC PGM=A\n' } },
        [],
        { maxDepth: 2 },
      ).run('M1'),
    );
    expect(err.diagnostic.id).toBe('JCL022');
    expect(err.diagnostic.message).toBe(
      'Expanding "M3" exceeds the nesting limit of 2 (M1 -> M2 -> M3)',
    );
  });

  it('lists every library tried for a missing member', () => {
    const err = failure(() =>
      resolver({ LIB: { JOB1: '// INCLUDE MEMBER=NOPE\n' } }, [], {
        searchPaths: ['LIB', 'LIB2'],
      }).run('JOB1'),
    );
    expect(err.diagnostic).toEqual({
      id: 'JCL020',
      severity: 'error',
      message: 'Member "NOPE" not found. Tried:\n- LIB(NOPE)\n- LIB2(NOPE)',
      file: 'JOB1',
      line: 1,
      column: 1,
      statement: '// INCLUDE MEMBER=NOPE',
    });
  });
});

describe('symbols', () => {
  it('applies SET values to later statements only', () => {
    const diagnostics: Diagnostic[] = [];
    const nodes = resolver(
      {
        LIB: {
          JOB1: '//S0 EXEC PGM=&P\n// SET P=LATE,HLQ=PROD\n//S1 EXEC PGM=&P\n//D DD DSN=&HLQ..X\n',
        },
      },
      diagnostics,
    ).run('JOB1');
    expect(programs(nodes)).toEqual(['&P', 'LATE']);
    expect(datasets(nodes)).toEqual(['PROD.X']);
    expect(diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      ['JCL031', 'Unresolved symbol "&P" left as written.', 1],
    ]);
  });

  it('carries SET values out of an included member', () => {
    const nodes = resolver({
      LIB: { JOB1: '// INCLUDE MEMBER=VARS\n//S1 EXEC PGM=&PGM\n', VARS: '// SET PGM=FROMINC\n' },
    }).run('JOB1');
    expect(programs(nodes)).toEqual(['FROMINC']);
  });
});

describe('procedures', () => {
  const instream = [
    '//J JOB',
    '//P1 PROC HLQ=DFLT,LVL=A',
    "//S EXEC PGM=PRG,PARM='&HLQ..&LVL'",
    '//OUT DD DSN=&HLQ..OUT',
    '// PEND',
    '//RUN EXEC P1,HLQ=OVR',
    '',
  ].join('\n');

  it('expands an in-stream procedure with defaults and overrides', () => {
    const diagnostics: Diagnostic[] = [];
    const nodes = resolver({ LIB: { JOB1: instream } }, diagnostics).run('JOB1');
    expect(nodes.map((n) => n.kind)).toEqual(['call', 'step', 'dd']);
    const [call, step, dd] = nodes;
    expect(call?.kind === 'call' ? call.invocation : undefined).toEqual({
      id: 1,
      procName: 'P1',
      stepName: 'RUN',
    });
    expect(step?.kind === 'step' ? step.exec.parm : undefined).toBe('OVR.A');
    expect(dd?.kind === 'dd' ? dd.dd.dsn : undefined).toBe('OVR.OUT');
    expect(diagnostics).toEqual([]);
  });

  it('expands a procedure called from a procedure', () => {
    const job = [
      '//INNER PROC DSQ=IN',
      "//ISTEP EXEC PGM=IPGM,PARM='&HLQ..&DSQ'",
      '// PEND',
      '//OUTER PROC HLQ=OUT',
      '//OSTEP EXEC PGM=OPGM,PARM=&HLQ',
      '//CALLIN EXEC INNER,DSQ=X',
      '// PEND',
      '//RUN EXEC OUTER,HLQ=CALLER',
      '',
    ].join('\n');
    const diagnostics: Diagnostic[] = [];
    const nodes = resolver({ LIB: { JOB1: job } }, diagnostics).run('JOB1');
    expect(nodes.map((n) => n.kind)).toEqual(['call', 'step', 'call', 'step']);
    const inner = nodes[2];
    expect(inner?.kind === 'call' ? inner.invocation : undefined).toEqual({
      id: 2,
      procName: 'INNER',
      stepName: 'CALLIN',
      parent: { id: 1, procName: 'OUTER', stepName: 'RUN' },
    });
    expect(
      buildModel(nodes, diagnostics).map((s) => [
        s.stepName,
        s.procStepName,
        s.programName,
        s.parameters,
      ]),
    ).toEqual([
      ['RUN', 'OSTEP', 'OPGM', 'CALLER'],
      ['CALLIN', 'ISTEP', 'IPGM', 'CALLER.X'],
    ]);
    expect(diagnostics).toEqual([]);
  });

  it('detects procedures that call each other', () => {
    const err = failure(() =>
      resolver({
        LIB: {
          JOB1: '//S EXEC A\n',
          A: '//A PROC\n//SA EXEC B\n',
          B: '//B PROC\n//SB EXEC A\n',
        },
      }).run('JOB1'),
    );
    expect(err.diagnostic.id).toBe('JCL021');
    expect(err.diagnostic.message).toBe('Cyclic include detected: A -> B -> A');
    expect(err.diagnostic.file).toBe('B');
  });

  it('applies the nesting limit to procedure calls', () => {
    const err = failure(() =>
      resolver(
        {
          LIB: {
            JOB1: '//S EXEC P1\n',
            P1: '//P1 PROC\n//S1 EXEC P2\n',
            P2: '//P2 PROC\n//S2 EXEC P3\n',
            P3: '//P3 PROC\n//S3 EXEC PGM=X\n',
          },
        },
        [],
        { maxDepth: 3 },
      ).run('JOB1'),
    );
    expect(err.diagnostic.id).toBe('JCL022');
    expect(err.diagnostic.message).toBe(
      'Expanding "P3" exceeds the nesting limit of 3 (JOB1 -> P1 -> P2 -> P3)',
    );
  });

  it('finds cataloged procedures through JCLLIB', () => {
    const r = resolver({
      LIB: { JOB1: '// JCLLIB ORDER=PROCS\n//S1 EXEC MYPROC\n' },
      PROCS: { MYPROC: '//MYPROC PROC\n//STEPA EXEC PGM=PA\n' },
    });
    const nodes = r.run('JOB1');
    expect(nodes.map((n) => n.kind)).toEqual(['call', 'step']);
    expect(programs(nodes)).toEqual(['PA']);
    expect(r.libraries()).toEqual(['PROCS', 'LIB']);
  });

  it('routes PARM and COND from the call to the procedure steps', () => {
    const job = [
      '//PP PROC',
      '//A EXEC PGM=PA,PARM=ORIG',
      '//B EXEC PGM=PB,PARM=KEEP',
      '// PEND',
      '//R EXEC PP,PARM=NEW,PARM.B=BEE,COND=(8,LT)',
      '',
    ].join('\n');
    const steps = resolver({ LIB: { JOB1: job } })
      .run('JOB1')
      .flatMap((n) => (n.kind === 'step' ? [n.exec] : []));
    expect(steps.map((s) => [s.label, s.parm, s.cond])).toEqual([
      ['A', 'NEW', '(8,LT)'],
      ['B', 'BEE', '(8,LT)'],
    ]);
  });

  it('keeps calls as steps when expansion is off', () => {
    const nodes = resolver({ LIB: { JOB1: instream } }, [], { expandProcedures: false }).run(
      'JOB1',
    );
    expect(nodes).toHaveLength(1);
    const only = nodes[0];
    expect(only?.kind === 'step' ? only.exec.target : undefined).toEqual({
      kind: 'procedure',
      name: 'P1',
    });
  });

  it('reports an in-stream procedure without PEND', () => {
    const diagnostics: Diagnostic[] = [];
    const nodes = resolver({ LIB: { JOB1: '//P1 PROC\n//S EXEC PGM=A\n' } }, diagnostics).run('JOB1');
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      ['JCL111', 'In-stream procedure "P1" has no PEND; definition ignored.'],
    ]);
    expect(programs(nodes)).toEqual(['A']);
  });

  it('warns about PEND outside a procedure', () => {
    const diagnostics: Diagnostic[] = [];
    resolver({ LIB: { JOB1: '//S EXEC PGM=A\n// PEND\n' } }, diagnostics).run('JOB1');
    expect(diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      ['JCL011', 'PEND outside a procedure ignored.', 2],
    ]);
  });
});
