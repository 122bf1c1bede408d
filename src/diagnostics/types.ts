/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A pipeline diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `JCL020`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  /** Member name (or file path for configuration problems). */
  file: string;
  /** 1-based physical line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** Last physical line of a statement that spans several lines. */
  endLine?: number;
  /** Symbol name, for `UnresolvedSymbol` diagnostics. */
  symbol?: string;
  /** Logical statement text the diagnostic refers to, when there is one. */
  statement?: string;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'JCL000',

  /** A member or configuration file exists but could not be read. */
  IoReadFailed: 'JCL001',

  /** Unexpected exception inside the pipeline. */
  InternalError: 'JCL002',

  /** Configuration file or CLI values failed validation. */
  ConfigInvalid: 'JCL003',

  /** Input ended while a statement was still being continued. */
  UnterminatedContinuation: 'JCL010',

  /** Text outside any statement or in-stream data block. */
  StrayText: 'JCL011',

  /** Member could not be found on any library of the search path. */
  MemberNotFound: 'JCL020',

  /** INCLUDE or procedure call re-entered a member that is still being expanded. */
  CyclicInclude: 'JCL021',

  /** Nesting of INCLUDE members and procedure calls went past the configured bound. */
  RecursionLimitExceeded: 'JCL022',

  /** Symbol substitution was still changing text after the last allowed pass. */
  SymbolExpansionDivergence: 'JCL030',

  /** `&NAME` reference with no binding in scope (left verbatim). */
  UnresolvedSymbol: 'JCL031',

  /** Statement could not be tokenized or classified; it is skipped. */
  ParseError: 'JCL100',

  /** DD statement with no step or no dd_name to attach to; it is skipped. */
  OrphanDd: 'JCL110',

  /** In-stream PROC definition with no closing PEND. */
  UnterminatedProc: 'JCL111',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
