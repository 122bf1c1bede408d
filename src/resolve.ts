import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { PipelineError } from './diagnostics/errors.js';
import type { Artifact } from './formats/types.js';
import { MemberResolver } from './frontend/resolver.js';
import { buildModel } from './model/build.js';
import type { DiagnosticsSummary, PipelineDeps, ResolveFn, ResolveOptions, ResolveResult } from './pipeline.js';

const SKIPPING_IDS: ReadonlySet<string> = new Set<string>([
  DiagnosticIds.ParseError,
  DiagnosticIds.OrphanDd,
  DiagnosticIds.UnterminatedProc,
]);

/**
 * Tally skipped statements and unresolved-symbol occurrences.
 */
export function summarize(diagnostics: Diagnostic[]): DiagnosticsSummary {
  const unresolvedSymbols = new Map<string, number>();
  let skippedStatements = 0;
  for (const d of diagnostics) {
    if (SKIPPING_IDS.has(d.id)) skippedStatements++;
    if (d.id === DiagnosticIds.UnresolvedSymbol && d.symbol !== undefined) {
      unresolvedSymbols.set(d.symbol, (unresolvedSymbols.get(d.symbol) ?? 0) + 1);
    }
  }
  return { skippedStatements, unresolvedSymbols };
}

function failed(diagnostics: Diagnostic[], err: unknown, member: string): ResolveResult {
  if (err instanceof PipelineError) {
    diagnostics.push(err.diagnostic);
  } else {
    diagnostics.push({
      id: DiagnosticIds.InternalError,
      severity: 'error',
      message: `Internal error during resolution: ${String(err)}`,
      file: member,
    });
  }
  return { status: 'failed', diagnostics, steps: [], summary: summarize(diagnostics), artifacts: [] };
}

/**
 * Resolve a job member into steps and data allocations.
 *
 * Normalization and member-resolution failures abandon the run: the result then carries the
 * diagnostics and nothing else. Statements that fail to parse are skipped and reported.
 */
export const resolveJob: ResolveFn = (
  options: ResolveOptions,
  deps: PipelineDeps,
): ResolveResult => {
  const member = options.member.toUpperCase();
  const diagnostics: Diagnostic[] = [];

  let result: Pick<ResolveResult, 'steps' | 'summary'>;
  try {
    const resolver = new MemberResolver(
      deps.lookup,
      {
        searchPaths: options.libraries,
        ...(options.maxDepth !== undefined ? { maxDepth: options.maxDepth } : {}),
        ...(options.maxExpansionPasses !== undefined
          ? { maxExpansionPasses: options.maxExpansionPasses }
          : {}),
        ...(options.expandProcedures !== undefined
          ? { expandProcedures: options.expandProcedures }
          : {}),
      },
      diagnostics,
    );
    const nodes = resolver.run(member);
    const steps = buildModel(nodes, diagnostics, {
      ...(options.tier !== undefined ? { tier: options.tier } : {}),
    });
    result = { steps, summary: summarize(diagnostics) };
  } catch (err) {
    return failed(diagnostics, err, member);
  }

  const artifacts: Artifact[] = [
    deps.formats.writeRecords(member, result.steps, {
      ...(options.project !== undefined ? { project: options.project } : {}),
    }),
  ];
  if (options.emitReport ?? true) {
    if (deps.formats.writeReport) {
      artifacts.push(deps.formats.writeReport(member, diagnostics, result.summary));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitReport=true but no report writer is configured; skipping report artifact.',
        file: member,
      });
    }
  }

  return { status: 'complete', diagnostics, ...result, artifacts };
};
