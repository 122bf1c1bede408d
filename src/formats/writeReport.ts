import type { ReportArtifact, WriteReportOptions } from './types.js';
import type { Diagnostic } from '../diagnostics/types.js';
import type { DiagnosticsSummary } from '../pipeline.js';

const severityRank = (severity: Diagnostic['severity']): number => {
  if (severity === 'error') return 0;
  if (severity === 'warning') return 1;
  return 2;
};

/**
 * Deterministic diagnostic order: file, line, column, severity, id, message.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0 && !Number.isNaN(lineCmp)) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0 && !Number.isNaN(colCmp)) return colCmp;

  const sevCmp = severityRank(a.severity) - severityRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * `file:line:col: severity: [ID] message`, the line format shared by the report and the CLI.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message.split('\n').join(' ')}`;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/**
 * Plain-text end-of-run report: sorted diagnostics, skip count and unresolved-symbol counts.
 */
export function writeReport(
  member: string,
  diagnostics: Diagnostic[],
  summary: DiagnosticsSummary,
  opts?: WriteReportOptions,
): ReportArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const errors = diagnostics.filter((d) => d.severity === 'error').length;
  const warnings = diagnostics.filter((d) => d.severity === 'warning').length;

  const lines: string[] = [];
  lines.push(`Resolution report: ${member}`);
  lines.push(
    `Diagnostics: ${diagnostics.length} (${plural(errors, 'error')}, ${plural(warnings, 'warning')})`,
  );
  for (const d of [...diagnostics].sort(compareDiagnostics)) {
    lines.push(`  ${formatDiagnostic(d)}`);
  }
  lines.push(`Skipped statements: ${summary.skippedStatements}`);
  if (summary.unresolvedSymbols.size === 0) {
    lines.push('Unresolved symbols: none');
  } else {
    lines.push('Unresolved symbols:');
    for (const name of [...summary.unresolvedSymbols.keys()].sort()) {
      lines.push(`  &${name}: ${summary.unresolvedSymbols.get(name) ?? 0}`);
    }
  }
  return { kind: 'report', text: lines.join(lineEnding) + lineEnding };
}
