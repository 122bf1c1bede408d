/**
 * Frontend contracts: logical statements and the classified nodes produced from them.
 *
 * This module defines types only (no parsing/semantics).
 */

/**
 * Physical-line span of a logical statement inside one member.
 */
export interface StatementSpan {
  member: string;
  /** 1-based line number of the first physical line. */
  startLine: number;
  /** 1-based line number of the last physical line (continuations included). */
  endLine: number;
}

/**
 * One logical statement: continuation lines joined, comments and the sequence area removed.
 */
export interface Statement {
  readonly text: string;
  readonly member: string;
  readonly span: StatementSpan;
  /** In-stream data lines following a `DD *` / `DD DATA` statement. */
  readonly instream?: readonly string[];
}

/**
 * Operand tree.
 *
 * - `Text`: a bare or quoted value (quotes removed, `''` unescaped). Empty slots are `Text` with `text: ''`.
 * - `List`: a parenthesised sub-list, in order.
 * - `Keyword`: `key=value`; the value may itself be a keyword (`VOL=SER=X`).
 */
export type ParamNode =
  | { kind: 'Text'; text: string; quoted: boolean }
  | { kind: 'List'; items: ParamNode[] }
  | { kind: 'Keyword'; key: string; value: ParamNode };

/**
 * Statement fields after field matching.
 */
export interface TokenStream {
  label?: string;
  opcode: Opcode;
  operands: ParamNode[];
  /** Operand text as written, for opcodes whose operands are opaque (IF). */
  operandText: string;
  statement: Statement;
}

export type Opcode =
  | 'EXEC'
  | 'DD'
  | 'PROC'
  | 'PEND'
  | 'SET'
  | 'INCLUDE'
  | 'JCLLIB'
  | 'IF'
  | 'ELSE'
  | 'ENDIF'
  | 'JOB'
  | 'OUTPUT'
  | 'CNTL'
  | 'ENDCNTL'
  | 'EXPORT'
  | 'NOTIFY'
  | 'SCHEDULE'
  | 'XMIT'
  | 'COMMAND';

export interface BaseNode {
  kind: string;
  statement: Statement;
}

/**
 * EXEC statement: a step running a program, or a call of a procedure.
 */
export interface ExecNode extends BaseNode {
  kind: 'Exec';
  label?: string;
  target: { kind: 'program' | 'procedure'; name: string };
  /** PARM text (quotes removed). */
  parm?: string;
  /** COND text as written. */
  cond?: string;
  /** Step-qualified EXEC parameters (`PARM.PSTEP=`), keyed by procedure step then parameter. */
  stepParams: ReadonlyMap<string, ReadonlyMap<string, string>>;
  /** Keyword pairs that are not EXEC parameters: symbolic overrides for a procedure call. */
  overrides: ReadonlyMap<string, string>;
}

/**
 * Disposition triple. Omitted slots are filled from {@link DISP_DEFAULTS}.
 */
export interface Disposition {
  status: string;
  normal: string;
  abnormal: string;
}

/**
 * DD statement.
 */
export interface DdNode extends BaseNode {
  kind: 'Dd';
  /** dd_name when the name field is present. */
  label?: string;
  /** Procedure step named by an override label (`PSTEP.DDNAME`). */
  procStep?: string;
  dsn?: string;
  dummy: boolean;
  /** `*` or `DATA` when the DD introduces in-stream data. */
  instream?: '*' | 'DATA';
  sysout?: string;
  disp: Disposition;
  unit?: string;
  volSer?: string;
  /** DCB sub-parameters given inside `DCB=(...)`. */
  dcb: ReadonlyMap<string, string>;
  /** DCB sub-parameters given directly on the DD (they win over `dcb`). */
  dcbDirect: ReadonlyMap<string, string>;
  /** `DCB=model.dataset` reference, when DCB names a dataset instead of a list. */
  dcbReference?: string;
}

export interface SetNode extends BaseNode {
  kind: 'Set';
  bindings: ReadonlyArray<readonly [string, string]>;
}

export interface ProcNode extends BaseNode {
  kind: 'Proc';
  name?: string;
  defaults: ReadonlyArray<readonly [string, string]>;
}

export interface IncludeNode extends BaseNode {
  kind: 'Include';
  member: string;
}

export interface PendNode extends BaseNode {
  kind: 'Pend';
}

export interface JcllibNode extends BaseNode {
  kind: 'Jcllib';
  order: readonly string[];
}

export interface IfNode extends BaseNode {
  kind: 'If';
  condition: string;
}

export interface ElseNode extends BaseNode {
  kind: 'Else';
}

export interface EndifNode extends BaseNode {
  kind: 'Endif';
}

/**
 * Recognised statement that contributes nothing to the step/allocation model (JOB, OUTPUT, ...).
 */
export interface ControlNode extends BaseNode {
  kind: 'Control';
  opcode: Opcode;
}

export type ClassifiedNode =
  | ExecNode
  | DdNode
  | SetNode
  | ProcNode
  | IncludeNode
  | PendNode
  | JcllibNode
  | IfNode
  | ElseNode
  | EndifNode
  | ControlNode;
