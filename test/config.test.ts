import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { PipelineError } from '../src/diagnostics/errors.js';
import { loadConfig, parseConfig } from '../src/config.js';

function failure(run: () => unknown): PipelineError {
  try {
    run();
  } catch (err) {
    if (err instanceof PipelineError) return err;
    throw err;
  }
  throw new Error('expected a PipelineError');
}

describe('parseConfig', () => {
  it('reads the current layout', () => {
    expect(
      parseConfig(
        { member: 'payjob', path: '/jcl', libraries: ['/procs'], system: 'pds', maxDepth: 8 },
        'jclx.json',
      ),
    ).toEqual({ member: 'PAYJOB', libraries: ['/jcl', '/procs'], system: 'pds', maxDepth: 8 });
  });

  it('reads the upper-case legacy keys', () => {
    expect(
      parseConfig(
        { PROJECT: 'P1', FILE: 'job1', PATH: '/a', LIB: '/b', SYSTEM: 'z', EXT: 'jcl' },
        'old.json',
      ),
    ).toEqual({
      project: 'P1',
      member: 'JOB1',
      libraries: ['/a', '/b'],
      system: 'pds',
      extension: 'jcl',
    });
    expect(parseConfig({ FILE: 'J', SYSTEM: 'LWM' }, 'old.json').system).toBe('flat');
  });

  it('rejects invalid values with the offending key', () => {
    const err = failure(() => parseConfig({ member: 'X', tier: 'xy' }, 'jclx.json'));
    expect(err.diagnostic.id).toBe('JCL003');
    expect(err.diagnostic.file).toBe('jclx.json');
    expect(err.diagnostic.message).toBe(
      'Invalid configuration: tier: tier must be one upper-case letter',
    );
  });

  it('requires a member', () => {
    expect(failure(() => parseConfig({}, 'jclx.json')).diagnostic.message).toBe(
      'Invalid configuration: member (or FILE) is required',
    );
  });
});

describe('loadConfig', () => {
  let work: string;

  beforeEach(() => {
    work = mkdtempSync(join(tmpdir(), 'jclx-config-'));
  });

  afterEach(() => {
    rmSync(work, { recursive: true, force: true });
  });

  it('reads a JSON file', () => {
    const path = join(work, 'jclx.json');
    writeFileSync(path, JSON.stringify({ member: 'J1', path: 'lib' }));
    expect(loadConfig(path)).toEqual({ member: 'J1', libraries: ['lib'], system: 'flat' });
  });

  it('reports files that are not JSON', () => {
    const path = join(work, 'bad.json');
    writeFileSync(path, '{ member: ');
    const err = failure(() => loadConfig(path));
    expect(err.diagnostic.id).toBe('JCL003');
    expect(err.diagnostic.message.startsWith('Configuration is not valid JSON')).toBe(true);
  });

  it('reports files that cannot be read', () => {
    expect(failure(() => loadConfig(join(work, 'missing.json'))).diagnostic.id).toBe('JCL001');
  });
});
