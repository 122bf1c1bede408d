import type { Diagnostic, DiagnosticId } from './types.js';

/**
 * Fatal pipeline failure. Carries the diagnostic that `resolveJob` reports once the run is abandoned.
 */
export class PipelineError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = 'PipelineError';
    this.diagnostic = diagnostic;
  }
}

/** Where a fatal failure is reported. */
export interface FailureSite {
  file: string;
  line?: number;
  statement?: string;
}

export function fail(id: DiagnosticId, message: string, where: FailureSite): never {
  throw new PipelineError({
    id,
    severity: 'error',
    message,
    file: where.file,
    ...(where.line !== undefined ? { line: where.line, column: 1 } : {}),
    ...(where.statement !== undefined ? { statement: where.statement } : {}),
  });
}
