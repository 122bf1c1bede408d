#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { readFileSync, realpathSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, type JobConfig } from './config.js';
import type { Diagnostic } from './diagnostics/types.js';
import { PipelineError } from './diagnostics/errors.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { compareDiagnostics, formatDiagnostic } from './formats/writeReport.js';
import { lookupForConvention, type HostConvention } from './frontend/members.js';
import { resolveJob } from './resolve.js';

type CliExit = { code: number };

type CliOptions = {
  member?: string;
  project?: string;
  configPath?: string;
  basePath?: string;
  libraries: string[];
  system?: HostConvention;
  extension?: string;
  maxDepth?: number;
  maxExpansionPasses?: number;
  tier?: string;
  expandProcedures: boolean;
  outputPath?: string;
  emitReport: boolean;
};

function usage(): string {
  return [
    'jclx [options] [member]',
    '',
    'Options:',
    '  -c, --config <file>    Job description file (JSON)',
    '      --project <name>   Project the records are filed under',
    '  -p, --path <dir>       Base library searched first',
    '  -L, --lib <dir>        Add a library to the search path (repeatable)',
    '      --system <s>       Member storage convention: flat|pds (default: flat)',
    '      --ext <ext>        Member file extension for the flat convention',
    '      --max-depth <n>    Maximum INCLUDE/procedure nesting (default: 16)',
    '      --max-passes <n>   Maximum symbol substitution passes (default: 16)',
    '      --tier <letter>    Relative step tier letter (default: X)',
    '      --no-procs         Keep procedure calls as steps instead of expanding them',
    '  -o, --output <file>    Output base path (default: ./<member>)',
    '      --noreport         Suppress the .report.txt artifact',
    '  -V, --version          Print version',
    '  -h, --help             Show help',
    '',
    'Notes:',
    '  - [member] may be omitted when the configuration file names one.',
    '  - Command-line values override configuration file values.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function positiveInt(flag: string, v: string): number {
  if (!/^[1-9][0-9]*$/.test(v)) fail(`${flag} expects a positive integer, got "${v}"`);
  return Number.parseInt(v, 10);
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  for (const candidate of [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch {
      // try the next location
    }
  }
  return '0.0.0';
}

export function parseArgs(argv: string[]): CliOptions | CliExit {
  const opts: CliOptions = { libraries: [], expandProcedures: true, emitReport: true };

  const valueOf = (a: string, long: string, i: number): { value: string; next: number } => {
    if (a.startsWith(`${long}=`)) {
      const v = a.slice(long.length + 1);
      if (!v) fail(`${long} expects a value`);
      return { value: v, next: i };
    }
    const v = argv[i + 1];
    if (!v) fail(`${a} expects a value`);
    return { value: v, next: i + 1 };
  };
  const is = (a: string, long: string, short?: string): boolean =>
    a === long || a === short || a.startsWith(`${long}=`);

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (is(a, '--config', '-c')) {
      const { value, next } = valueOf(a, '--config', i);
      opts.configPath = value;
      i = next;
      continue;
    }
    if (is(a, '--project')) {
      const { value, next } = valueOf(a, '--project', i);
      opts.project = value;
      i = next;
      continue;
    }
    if (is(a, '--path', '-p')) {
      const { value, next } = valueOf(a, '--path', i);
      opts.basePath = value;
      i = next;
      continue;
    }
    if (is(a, '--lib', '-L')) {
      const { value, next } = valueOf(a, '--lib', i);
      opts.libraries.push(value);
      i = next;
      continue;
    }
    if (is(a, '--system')) {
      const { value, next } = valueOf(a, '--system', i);
      if (value !== 'flat' && value !== 'pds') {
        fail(`Unsupported --system "${value}" (expected flat|pds)`);
      }
      opts.system = value;
      i = next;
      continue;
    }
    if (is(a, '--ext')) {
      const { value, next } = valueOf(a, '--ext', i);
      opts.extension = value;
      i = next;
      continue;
    }
    if (is(a, '--max-depth')) {
      const { value, next } = valueOf(a, '--max-depth', i);
      opts.maxDepth = positiveInt('--max-depth', value);
      i = next;
      continue;
    }
    if (is(a, '--max-passes')) {
      const { value, next } = valueOf(a, '--max-passes', i);
      opts.maxExpansionPasses = positiveInt('--max-passes', value);
      i = next;
      continue;
    }
    if (is(a, '--tier')) {
      const { value, next } = valueOf(a, '--tier', i);
      if (!/^[A-Z]$/.test(value)) fail(`--tier expects one upper-case letter, got "${value}"`);
      opts.tier = value;
      i = next;
      continue;
    }
    if (a === '--no-procs') {
      opts.expandProcedures = false;
      continue;
    }
    if (is(a, '--output', '-o')) {
      const { value, next } = valueOf(a, '--output', i);
      opts.outputPath = value;
      i = next;
      continue;
    }
    if (a === '--noreport') {
      opts.emitReport = false;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (opts.member !== undefined) {
      fail(`Expected at most one [member] argument`);
    }
    opts.member = a.toUpperCase();
  }

  if (opts.member === undefined && opts.configPath === undefined) {
    fail(`Expected a [member] argument or --config`);
  }
  return opts;
}

/**
 * Merge configuration file values with command-line values (the command line wins).
 */
function effectiveConfig(opts: CliOptions): JobConfig {
  const file = opts.configPath !== undefined ? loadConfig(opts.configPath) : undefined;
  const member = opts.member ?? file?.member;
  if (member === undefined) fail(`No member given on the command line or in the configuration`);

  const cliLibraries = [...(opts.basePath !== undefined ? [opts.basePath] : []), ...opts.libraries];
  const libraries = cliLibraries.length > 0 ? cliLibraries : (file?.libraries ?? ['.']);
  const project = opts.project ?? file?.project;
  const extension = opts.extension ?? file?.extension;
  const maxDepth = opts.maxDepth ?? file?.maxDepth;
  const maxExpansionPasses = opts.maxExpansionPasses ?? file?.maxExpansionPasses;
  const tier = opts.tier ?? file?.tier;
  const expandProcedures = opts.expandProcedures ? file?.expandProcedures : false;

  return {
    ...(project !== undefined ? { project } : {}),
    member,
    libraries,
    system: opts.system ?? file?.system ?? 'flat',
    ...(extension !== undefined ? { extension } : {}),
    ...(maxDepth !== undefined ? { maxDepth } : {}),
    ...(maxExpansionPasses !== undefined ? { maxExpansionPasses } : {}),
    ...(tier !== undefined ? { tier } : {}),
    ...(expandProcedures !== undefined ? { expandProcedures } : {}),
  };
}

function artifactBase(member: string, outputPath?: string): string {
  if (outputPath) {
    const resolved = resolve(outputPath);
    const ext = extname(resolved);
    return ext.length > 0 ? resolved.slice(0, -ext.length) : resolved;
  }
  return resolve(member.toLowerCase());
}

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<void> {
  const recordsPath = `${base}.steps.json`;
  const reportPath = `${base}.report.txt`;
  await mkdir(dirname(recordsPath), { recursive: true });

  const writes: Array<Promise<void>> = [];
  for (const artifact of artifacts) {
    if (artifact.kind === 'records') {
      writes.push(writeFile(recordsPath, JSON.stringify(artifact.json, null, 2) + '\n', 'utf8'));
    } else {
      writes.push(writeFile(reportPath, artifact.text, 'utf8'));
    }
  }
  await Promise.all(writes);
  process.stdout.write(`${recordsPath}\n`);
}

function printDiagnostics(diagnostics: Diagnostic[]): void {
  for (const d of [...diagnostics].sort(compareDiagnostics)) {
    process.stderr.write(`${formatDiagnostic(d)}\n`);
  }
}

export async function runCli(argv: string[]): Promise<number> {
  let config: JobConfig;
  let parsed: CliOptions;
  try {
    const res = parseArgs(argv);
    if ('code' in res) return res.code;
    parsed = res;
    config = effectiveConfig(parsed);
  } catch (err) {
    if (err instanceof PipelineError) {
      printDiagnostics([err.diagnostic]);
      return 1;
    }
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`jclx: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }

  const res = resolveJob(
    {
      member: config.member,
      ...(config.project !== undefined ? { project: config.project } : {}),
      libraries: config.libraries,
      ...(config.maxDepth !== undefined ? { maxDepth: config.maxDepth } : {}),
      ...(config.maxExpansionPasses !== undefined
        ? { maxExpansionPasses: config.maxExpansionPasses }
        : {}),
      ...(config.tier !== undefined ? { tier: config.tier } : {}),
      ...(config.expandProcedures !== undefined
        ? { expandProcedures: config.expandProcedures }
        : {}),
      emitReport: parsed.emitReport,
    },
    {
      lookup: lookupForConvention(config.system, {
        ...(config.extension !== undefined ? { extension: config.extension } : {}),
      }),
      formats: defaultFormatWriters,
    },
  );

  printDiagnostics(res.diagnostics);
  if (res.status === 'failed') return 1;

  await writeArtifacts(artifactBase(config.member, parsed.outputPath), res.artifacts);
  return 0;
}

function samePath(a: string, b: string): boolean {
  const real = (p: string): string => {
    try {
      return realpathSync.native(resolve(p));
    } catch {
      return resolve(p);
    }
  };
  return real(a) === real(b);
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return samePath(invokedAs, fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  runCli(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      process.stderr.write(`jclx: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exit(1);
    },
  );
}
