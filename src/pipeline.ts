import type { Diagnostic } from './diagnostics/types.js';
import type { MemberLookup } from './frontend/members.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { Step } from './model/types.js';

/**
 * Options that drive one resolution run.
 */
export interface ResolveOptions {
  /** Target member (the job) to resolve. */
  member: string;
  /** Project the records belong to; passed through to the records artifact. */
  project?: string;
  /**
   * Libraries searched for the target, INCLUDE members and procedures, in order.
   *
   * JCLLIB statements in the job put their libraries in front of these.
   */
  libraries: string[];
  /** Maximum number of members expanded at once, the target included (default 16). */
  maxDepth?: number;
  /** Maximum symbol substitution passes per statement (default 16). */
  maxExpansionPasses?: number;
  /** Tier letter for relative step identifiers (default `X`). */
  tier?: string;
  /** Expand procedure calls (default true). When false, calls become steps with `procName`. */
  expandProcedures?: boolean;
  /** Produce the diagnostics report artifact (default true). */
  emitReport?: boolean;
}

/**
 * Counts for the end-of-run diagnostics report.
 */
export interface DiagnosticsSummary {
  /** Statements skipped after a recoverable error. */
  skippedStatements: number;
  /** Unresolved `&NAME` references: symbol -> occurrences. */
  unresolvedSymbols: Map<string, number>;
}

/**
 * Result of a run.
 *
 * `status: 'failed'` means a fatal error stopped the run: `steps` and `artifacts` are then empty.
 */
export interface ResolveResult {
  status: 'complete' | 'failed';
  diagnostics: Diagnostic[];
  steps: readonly Step[];
  summary: DiagnosticsSummary;
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the pipeline.
 *
 * Callers provide the member lookup and the artifact writers so the core stays in-memory.
 */
export interface PipelineDeps {
  lookup: MemberLookup;
  formats: FormatWriters;
}

/**
 * Top-level resolve function signature.
 */
export type ResolveFn = (options: ResolveOptions, deps: PipelineDeps) => ResolveResult;
