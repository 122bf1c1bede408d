import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { DiagnosticIds } from './diagnostics/types.js';
import { fail } from './diagnostics/errors.js';
import type { HostConvention } from './frontend/members.js';

/**
 * Job description file.
 *
 * Lower-case keys are the current layout; the upper-case keys of older files (`FILE`, `PATH`, `LIB`,
 * `SYSTEM` with `Z` or `LWM`, `EXT`) are read as well. Unknown keys are ignored.
 */
export const ConfigFileSchema = z.object({
  project: z.string().min(1).optional(),
  member: z.string().min(1).optional(),
  path: z.string().min(1).optional(),
  libraries: z.array(z.string().min(1)).optional(),
  system: z.enum(['flat', 'pds']).optional(),
  extension: z.string().optional(),
  maxDepth: z.number().int().positive().optional(),
  maxExpansionPasses: z.number().int().positive().optional(),
  tier: z
    .string()
    .regex(/^[A-Z]$/, 'tier must be one upper-case letter')
    .optional(),
  expandProcedures: z.boolean().optional(),

  PROJECT: z.string().min(1).optional(),
  FILE: z.string().min(1).optional(),
  PATH: z.string().min(1).optional(),
  LIB: z.union([z.array(z.string().min(1)), z.string().min(1)]).optional(),
  SYSTEM: z
    .string()
    .regex(/^(z|lwm)$/i, 'SYSTEM must be Z or LWM')
    .optional(),
  EXT: z.string().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Validated configuration for one run.
 */
export interface JobConfig {
  project?: string;
  member: string;
  /** Base path first, then the additional libraries, in search order. */
  libraries: string[];
  system: HostConvention;
  extension?: string;
  maxDepth?: number;
  maxExpansionPasses?: number;
  tier?: string;
  expandProcedures?: boolean;
}

function legacySystem(value: string | undefined): HostConvention | undefined {
  if (value === undefined) return undefined;
  return value.toUpperCase() === 'Z' ? 'pds' : 'flat';
}

/**
 * Validate a parsed configuration object. `source` names the file in error messages.
 */
export function parseConfig(raw: unknown, source: string): JobConfig {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    fail(DiagnosticIds.ConfigInvalid, `Invalid configuration: ${problems}`, { file: source });
  }
  const cfg = parsed.data;

  const member = cfg.member ?? cfg.FILE;
  if (member === undefined) {
    fail(DiagnosticIds.ConfigInvalid, 'Invalid configuration: member (or FILE) is required', {
      file: source,
    });
  }
  const base = cfg.path ?? cfg.PATH;
  const extra = cfg.libraries ?? (typeof cfg.LIB === 'string' ? [cfg.LIB] : (cfg.LIB ?? []));
  const project = cfg.project ?? cfg.PROJECT;
  const extension = cfg.extension ?? cfg.EXT;

  return {
    ...(project !== undefined ? { project } : {}),
    member: member.toUpperCase(),
    libraries: [...(base !== undefined ? [base] : []), ...extra],
    system: cfg.system ?? legacySystem(cfg.SYSTEM) ?? 'flat',
    ...(extension !== undefined && extension.length > 0 ? { extension } : {}),
    ...(cfg.maxDepth !== undefined ? { maxDepth: cfg.maxDepth } : {}),
    ...(cfg.maxExpansionPasses !== undefined ? { maxExpansionPasses: cfg.maxExpansionPasses } : {}),
    ...(cfg.tier !== undefined ? { tier: cfg.tier } : {}),
    ...(cfg.expandProcedures !== undefined ? { expandProcedures: cfg.expandProcedures } : {}),
  };
}

/**
 * Read and validate a JSON configuration file.
 */
export function loadConfig(path: string): JobConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    return fail(DiagnosticIds.IoReadFailed, `Failed to read configuration: ${String(err)}`, {
      file: path,
    });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return fail(DiagnosticIds.ConfigInvalid, `Configuration is not valid JSON: ${String(err)}`, {
      file: path,
    });
  }
  return parseConfig(raw, path);
}
