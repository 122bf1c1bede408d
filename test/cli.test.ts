import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runCli } from '../src/cli.js';

describe('jclx cli', () => {
  let work: string;
  let lib: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    work = mkdtempSync(join(tmpdir(), 'jclx-cli-'));
    lib = join(work, 'lib');
    mkdirSync(lib);
    writeFileSync(join(lib, 'JOB1.jcl'), '//S1 EXEC PGM=IEFBR14\n//D DD DSN=A.B,DISP=SHR\n');
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(work, { recursive: true, force: true });
  });

  it('writes records and report beside the output base', async () => {
    const base = join(work, 'out', 'job1');
    const code = await runCli(['-p', lib, '--ext', 'jcl', '-o', `${base}.json`, 'job1']);
    expect(code).toBe(0);
    expect(stdout).toEqual([`${base}.steps.json\n`]);
    const json: unknown = JSON.parse(readFileSync(`${base}.steps.json`, 'utf8'));
    expect(json).toMatchObject({
      member: 'JOB1',
      steps: [{ step_name: 'S1', program_name: 'IEFBR14' }],
    });
    expect(readFileSync(`${base}.report.txt`, 'utf8').split('\n')[0]).toBe(
      'Resolution report: JOB1',
    );
  });

  it('writes the project given on the command line over the configured one', async () => {
    const cfg = join(work, 'jclx.json');
    writeFileSync(cfg, JSON.stringify({ project: 'FROMFILE', member: 'job1', path: lib, extension: 'jcl' }));
    const base = join(work, 'proj');
    expect(await runCli(['-c', cfg, '--project', 'PAYROLL', '-o', base])).toBe(0);
    const json: unknown = JSON.parse(readFileSync(`${base}.steps.json`, 'utf8'));
    expect(json).toMatchObject({ project: 'PAYROLL', member: 'JOB1' });
  });

  it('skips the report with --noreport', async () => {
    const base = join(work, 'quiet');
    const code = await runCli(['-L', lib, '--ext=jcl', '--noreport', '-o', base, 'JOB1']);
    expect(code).toBe(0);
    expect(existsSync(`${base}.steps.json`)).toBe(true);
    expect(existsSync(`${base}.report.txt`)).toBe(false);
  });

  it('takes the member and libraries from a configuration file', async () => {
    const cfg = join(work, 'jclx.json');
    writeFileSync(cfg, JSON.stringify({ member: 'job1', path: lib, extension: 'jcl' }));
    const base = join(work, 'fromcfg');
    expect(await runCli(['-c', cfg, '-o', base])).toBe(0);
    expect(existsSync(`${base}.steps.json`)).toBe(true);
  });

  it('exits 1 and prints the diagnostic when the member is missing', async () => {
    const code = await runCli(['-p', lib, '-o', join(work, 'x'), 'NOPE']);
    expect(code).toBe(1);
    expect(stderr).toEqual([
      `NOPE: error: [JCL020] Member "NOPE" not found. Tried: - ${join(lib, 'NOPE')}\n`,
    ]);
    expect(existsSync(join(work, 'x.steps.json'))).toBe(false);
  });

  it('exits 2 on usage errors', async () => {
    expect(await runCli(['--bogus'])).toBe(2);
    expect(stderr[0]).toBe('jclx: Unknown option "--bogus"\n');
    stderr.length = 0;
    expect(await runCli(['--max-depth', 'abc', 'JOB1'])).toBe(2);
    expect(stderr[0]).toBe('jclx: --max-depth expects a positive integer, got "abc"\n');
    stderr.length = 0;
    expect(await runCli([])).toBe(2);
    expect(stderr[0]).toBe('jclx: Expected a [member] argument or --config\n');
  });

  it('prints help and version', async () => {
    expect(await runCli(['-h'])).toBe(0);
    expect(stdout[0]?.split('\n')[0]).toBe('jclx [options] [member]');
    stdout.length = 0;
    expect(await runCli(['-V'])).toBe(0);
    expect(stdout).toEqual(['0.1.0\n']);
  });
});
