import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';
import { makeSourceMember, type SourceMember } from './source.js';

/**
 * Host storage convention used to turn (library, member) into a readable location.
 *
 * - `flat`: a directory per library, one file per member (optionally with an extension).
 * - `pds`: partitioned datasets addressed as `//'LIBRARY(MEMBER)'`, as z/OS UNIX exposes them.
 */
export type HostConvention = 'flat' | 'pds';

export type LookupResult =
  | { kind: 'found'; member: SourceMember }
  | { kind: 'missing'; tried: string[] };

/**
 * Member lookup capability consumed by the resolver.
 *
 * Implementations search `libraries` in order; the first library holding the member wins.
 */
export interface MemberLookup {
  find(name: string, libraries: readonly string[]): LookupResult;
}

function isIgnorableProbeError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const code = 'code' in err ? err.code : undefined;
  return code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR';
}

type Candidate = { library: string; location: string };

function probe(name: string, candidates: Candidate[]): LookupResult {
  const tried: string[] = [];
  for (const c of candidates) {
    tried.push(c.location);
    let text: string;
    try {
      text = readFileSync(c.location, 'utf8');
    } catch (err) {
      if (isIgnorableProbeError(err)) continue;
      fail(
        DiagnosticIds.IoReadFailed,
        `Failed to read member "${name}" from "${c.location}": ${String(err)}`,
        { file: name },
      );
    }
    return { kind: 'found', member: makeSourceMember(name, c.library, c.location, text) };
  }
  return { kind: 'missing', tried };
}

function dedupe(libraries: readonly string[]): string[] {
  const seen = new Set<string>();
  return libraries.filter((l) => (seen.has(l) ? false : (seen.add(l), true)));
}

/**
 * Lookup over directories on the host filesystem.
 */
export function createFileSystemLookup(options: { extension?: string } = {}): MemberLookup {
  const ext = options.extension?.replace(/^\./, '') ?? '';
  return {
    find(name, libraries) {
      const fileName = ext ? `${name}.${ext}` : name;
      const candidates = dedupe(libraries).map((library) => ({
        library,
        location: join(library, fileName),
      }));
      return probe(name, candidates);
    },
  };
}

/**
 * Fully qualified partitioned-dataset member path, `//'LIB(MEMBER)'`.
 */
export function datasetMemberPath(library: string, name: string): string {
  const lib = library.replace(/^'+|'+$/g, '').toUpperCase();
  return `//'${lib}(${name.toUpperCase()})'`;
}

/**
 * Lookup over partitioned datasets (only meaningful on a z/OS UNIX host).
 */
export function createDatasetLookup(): MemberLookup {
  return {
    find(name, libraries) {
      const candidates = dedupe(libraries).map((library) => ({
        library,
        location: datasetMemberPath(library, name),
      }));
      return probe(name, candidates);
    },
  };
}

/**
 * In-memory library set: library name -> member name -> text. Member names are matched upper case.
 */
export function createMemoryLookup(
  libraries: Record<string, Record<string, string>>,
): MemberLookup {
  const index = new Map<string, Map<string, string>>();
  for (const [lib, members] of Object.entries(libraries)) {
    index.set(lib, new Map(Object.entries(members).map(([m, t]) => [m.toUpperCase(), t])));
  }
  return {
    find(name, search) {
      const tried: string[] = [];
      for (const library of dedupe(search)) {
        const location = `${library}(${name})`;
        tried.push(location);
        const text = index.get(library)?.get(name.toUpperCase());
        if (text !== undefined) {
          return { kind: 'found', member: makeSourceMember(name, library, location, text) };
        }
      }
      return { kind: 'missing', tried };
    },
  };
}

/**
 * Lookup for a host convention.
 */
export function lookupForConvention(
  convention: HostConvention,
  options: { extension?: string } = {},
): MemberLookup {
  return convention === 'pds' ? createDatasetLookup() : createFileSystemLookup(options);
}
