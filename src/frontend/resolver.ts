import type {
  DdNode,
  ElseNode,
  EndifNode,
  ExecNode,
  IfNode,
  IncludeNode,
  ProcNode,
  Statement,
} from './ast.js';
import type { MemberLookup } from './members.js';
import { parseStatement, tokenize } from './parser.js';
import { joinStatements, type SourceMember } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { fail, type FailureSite } from '../diagnostics/errors.js';
import { expandSymbols } from '../semantics/expand.js';
import { SymbolTable } from '../semantics/symbols.js';

export const DEFAULT_MAX_DEPTH = 16;

export interface ResolverOptions {
  /** Libraries searched for INCLUDE members and procedures, in order. */
  searchPaths: readonly string[];
  /** Maximum number of members being expanded at once (the target member counts). */
  maxDepth?: number;
  maxExpansionPasses?: number;
  /** When false, procedure calls are kept as steps instead of being expanded. */
  expandProcedures?: boolean;
}

/**
 * One expansion of a procedure.
 */
export interface ProcInvocation {
  /** 1-based call sequence number within the run. */
  readonly id: number;
  readonly procName: string;
  /** Label of the EXEC that called the procedure. */
  readonly stepName?: string;
  /** Invocation whose body contains the call, for nested procedures. */
  readonly parent?: ProcInvocation;
}

/**
 * Model-relevant node in the flattened statement stream.
 *
 * - `step`: EXEC of a program (or of a procedure that is not expanded).
 * - `call`: EXEC of a procedure, emitted before the steps of its body.
 * - `dd`: DD statement.
 * - `condition`: IF / ELSE / ENDIF.
 * - `skipped-step`: EXEC that failed to parse; the DDs after it have no step.
 */
export type ResolvedNode =
  | { kind: 'step'; exec: ExecNode; invocation?: ProcInvocation }
  | { kind: 'call'; exec: ExecNode; invocation: ProcInvocation }
  | { kind: 'dd'; dd: DdNode; invocation?: ProcInvocation }
  | { kind: 'condition'; node: IfNode | ElseNode | EndifNode; invocation?: ProcInvocation }
  | { kind: 'skipped-step'; statement: Statement; invocation?: ProcInvocation };

interface ProcDefinition {
  header?: ProcNode;
  body: Statement[];
}

/** State of a procedure call while its body is walked. */
export interface CallFrame {
  invocation: ProcInvocation;
  call: ExecNode;
  steps: number;
}

/** Operation field is EXEC, with or without a name field. */
const EXEC_STATEMENT_RE = /^\/\/(?:\S+\s+|\s*)EXEC(?:\s|$)/i;

function siteOf(statement: Statement): FailureSite {
  return { file: statement.member, line: statement.span.startLine, statement: statement.text };
}

function isOpcode(statement: Statement, opcode: 'PEND' | 'PROC' | 'INCLUDE'): boolean {
  const scratch: Diagnostic[] = [];
  return tokenize(statement, scratch)?.opcode === opcode;
}

/**
 * Resolves a job member into a flat stream of model-relevant nodes.
 *
 * One instance is one run: it owns the search path (JCLLIB extends it), the in-stream procedure
 * definitions and the stack of members being expanded. Nothing is shared between instances.
 */
export class MemberResolver {
  private readonly searchPaths: string[];
  private readonly maxDepth: number;
  private readonly maxPasses: number | undefined;
  private readonly expandProcedures: boolean;
  private readonly procedures = new Map<string, ProcDefinition>();
  private readonly stack: string[] = [];
  private invocations = 0;

  constructor(
    private readonly lookup: MemberLookup,
    options: ResolverOptions,
    private readonly diagnostics: Diagnostic[],
  ) {
    this.searchPaths = [...options.searchPaths];
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxPasses = options.maxExpansionPasses;
    this.expandProcedures = options.expandProcedures ?? true;
  }

  /** Current search path (including libraries added by JCLLIB). */
  libraries(): readonly string[] {
    return this.searchPaths;
  }

  /**
   * Locate a member on the search path. Fails with `MemberNotFound` when no library holds it.
   */
  resolve(
    memberName: string,
    searchPaths: readonly string[] = this.searchPaths,
    site?: FailureSite,
  ): SourceMember {
    const name = memberName.toUpperCase();
    const res = this.lookup.find(name, searchPaths);
    if (res.kind === 'found') return res.member;
    const tried = res.tried.length > 0 ? res.tried.map((t) => `- ${t}`).join('\n') : '- (no libraries)';
    return fail(
      DiagnosticIds.MemberNotFound,
      `Member "${name}" not found. Tried:\n${tried}`,
      site ?? { file: name },
    );
  }

  /** Resolve a member and normalize it into statements. */
  load(memberName: string, site?: FailureSite): Statement[] {
    return joinStatements(this.resolve(memberName, this.searchPaths, site), this.diagnostics);
  }

  /**
   * Resolve the target member and walk it, expanding INCLUDE members and procedure calls.
   */
  run(target: string): ResolvedNode[] {
    const out: ResolvedNode[] = [];
    const name = target.toUpperCase();
    this.enter(name, { file: name });
    this.walk(this.load(name), SymbolTable.empty(), undefined, out);
    this.leave();
    return out;
  }

  /**
   * Replace every INCLUDE statement with the statements of its member, recursively.
   *
   * `MEMBER=` values are substituted from `table` before lookup.
   */
  expandIncludes(statements: Statement[], table: SymbolTable = SymbolTable.empty()): Statement[] {
    const out: Statement[] = [];
    for (const statement of statements) {
      if (!isOpcode(statement, 'INCLUDE')) {
        out.push(statement);
        continue;
      }
      const node = parseStatement(this.substitute(statement, table), this.diagnostics);
      if (node?.kind !== 'Include') continue;
      const body = this.enterInclude(node);
      out.push(...this.expandIncludes(body, table));
      this.leave();
    }
    return out;
  }

  /**
   * Expand a procedure call into `out`, returning the invocation.
   *
   * The body sees a `proc-default` frame seeded from the PROC statement and a `call-override` frame
   * from the EXEC keyword pairs, pushed on top of the caller's scope.
   */
  expandProcCall(
    exec: ExecNode,
    scope: SymbolTable,
    parent: CallFrame | undefined,
    out: ResolvedNode[],
  ): ProcInvocation {
    const name = exec.target.name;
    const site = siteOf(exec.statement);
    this.enter(name, site);

    const definition = this.procedures.get(name) ?? this.catalogedProcedure(name, site);
    const invocation: ProcInvocation = {
      id: ++this.invocations,
      procName: name,
      ...(exec.label !== undefined ? { stepName: exec.label } : {}),
      ...(parent ? { parent: parent.invocation } : {}),
    };
    out.push({ kind: 'call', exec, invocation });

    const inner = scope
      .push('proc-default', definition.header?.defaults ?? [])
      .push('call-override', exec.overrides);
    this.walk(definition.body, inner, { invocation, call: exec, steps: 0 }, out);
    this.leave();
    return invocation;
  }

  private catalogedProcedure(name: string, site: FailureSite): ProcDefinition {
    const statements = this.load(name, site);
    const first = statements[0];
    if (first && isOpcode(first, 'PROC')) {
      const header = parseStatement(first, this.diagnostics);
      return {
        ...(header?.kind === 'Proc' ? { header } : {}),
        body: statements.slice(1),
      };
    }
    return { body: statements };
  }

  private enter(name: string, site: FailureSite): void {
    const key = name.toUpperCase();
    const at = this.stack.indexOf(key);
    if (at >= 0) {
      fail(
        DiagnosticIds.CyclicInclude,
        `Cyclic include detected: ${[...this.stack.slice(at), key].join(' -> ')}`,
        site,
      );
    }
    if (this.stack.length >= this.maxDepth) {
      fail(
        DiagnosticIds.RecursionLimitExceeded,
        `Expanding "${key}" exceeds the nesting limit of ${this.maxDepth} (${[...this.stack, key].join(' -> ')})`,
        site,
      );
    }
    this.stack.push(key);
  }

  private leave(): void {
    this.stack.pop();
  }

  private enterInclude(node: IncludeNode): Statement[] {
    const site = siteOf(node.statement);
    this.enter(node.member, site);
    return this.load(node.member, site);
  }

  private substitute(statement: Statement, scope: SymbolTable): Statement {
    if (!statement.text.includes('&')) return statement;
    const site = siteOf(statement);
    const res = expandSymbols(statement.text, scope, {
      ...(this.maxPasses !== undefined ? { maxPasses: this.maxPasses } : {}),
      site,
    });
    for (const name of res.unresolved) {
      this.diagnostics.push({
        id: DiagnosticIds.UnresolvedSymbol,
        severity: 'warning',
        message: `Unresolved symbol "&${name}" left as written.`,
        file: statement.member,
        line: statement.span.startLine,
        column: 1,
        statement: res.text,
        symbol: name,
      });
    }
    return res.text === statement.text ? statement : { ...statement, text: res.text };
  }

  /**
   * Capture an in-stream procedure definition starting after the PROC statement at `start`.
   *
   * Returns the index of the PEND statement, or `undefined` when there is none.
   */
  private captureProcedure(node: ProcNode, statements: Statement[], start: number): number | undefined {
    for (let i = start; i < statements.length; i++) {
      const statement = statements[i];
      if (statement === undefined || !isOpcode(statement, 'PEND')) continue;
      if (node.name !== undefined) {
        this.procedures.set(node.name, { header: node, body: statements.slice(start, i) });
      }
      return i;
    }
    return undefined;
  }

  private applyCallParameters(exec: ExecNode, frame: CallFrame | undefined): ExecNode {
    if (!frame) return exec;
    const first = frame.steps === 0;
    frame.steps++;
    const call = frame.call;
    const perStep = exec.label !== undefined ? call.stepParams.get(exec.label) : undefined;

    let parm = exec.parm;
    if (call.parm !== undefined) parm = first ? call.parm : undefined;
    const stepParm = perStep?.get('PARM');
    if (stepParm !== undefined) parm = stepParm;

    const cond = perStep?.get('COND') ?? call.cond ?? exec.cond;

    const { parm: _parm, cond: _cond, ...rest } = exec;
    return {
      ...rest,
      ...(parm !== undefined ? { parm } : {}),
      ...(cond !== undefined ? { cond } : {}),
    };
  }

  private walk(
    statements: Statement[],
    table: SymbolTable,
    frame: CallFrame | undefined,
    out: ResolvedNode[],
  ): SymbolTable {
    let scope = table;
    const invocation = frame?.invocation;
    const context = invocation ? { invocation } : {};

    for (let i = 0; i < statements.length; i++) {
      const raw = statements[i];
      if (raw === undefined) continue;
      const statement = this.substitute(raw, scope);
      const node = parseStatement(statement, this.diagnostics);
      if (!node) {
        if (EXEC_STATEMENT_RE.test(statement.text)) {
          out.push({ kind: 'skipped-step', statement, ...context });
        }
        continue;
      }

      switch (node.kind) {
        case 'Set':
          for (const [name, value] of node.bindings) scope = scope.define(name, value, 'global');
          break;
        case 'Jcllib':
          this.searchPaths.unshift(...node.order);
          break;
        case 'Proc': {
          const pend = this.captureProcedure(node, statements, i + 1);
          if (pend === undefined) {
            this.diagnostics.push({
              id: DiagnosticIds.UnterminatedProc,
              severity: 'error',
              message: `In-stream procedure "${node.name ?? ''}" has no PEND; definition ignored.`,
              file: raw.member,
              line: raw.span.startLine,
              column: 1,
              statement: raw.text,
            });
          } else {
            i = pend;
          }
          break;
        }
        case 'Pend':
          if (!frame) {
            this.diagnostics.push({
              id: DiagnosticIds.StrayText,
              severity: 'warning',
              message: 'PEND outside a procedure ignored.',
              file: raw.member,
              line: raw.span.startLine,
              column: 1,
              statement: raw.text,
            });
          }
          break;
        case 'Include': {
          const body = this.enterInclude(node);
          scope = this.walk(body, scope, frame, out);
          this.leave();
          break;
        }
        case 'Exec':
          if (node.target.kind === 'procedure' && this.expandProcedures) {
            this.expandProcCall(node, scope, frame, out);
          } else {
            out.push({ kind: 'step', exec: this.applyCallParameters(node, frame), ...context });
          }
          break;
        case 'Dd':
          out.push({ kind: 'dd', dd: node, ...context });
          break;
        case 'If':
        case 'Else':
        case 'Endif':
          out.push({ kind: 'condition', node, ...context });
          break;
        case 'Control':
          break;
      }
    }
    return scope;
  }
}
