import type { DdNode, ExecNode, Statement } from '../frontend/ast.js';
import type { ProcInvocation, ResolvedNode } from '../frontend/resolver.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';
import { VirtualDsn, type DataAllocation, type DcbValue, type Step } from './types.js';

export const DEFAULT_TIER = 'X';
const MAX_RELATIVE_STEP = 9_999_999;

/** DCB sub-parameters promoted to their own allocation fields. */
const PROMOTED_DCB = ['LRECL', 'BLKSIZE', 'RECFM'] as const;

export interface BuildOptions {
  /** Tier letter prefixed to relative step numbers. */
  tier?: string;
}

/**
 * `X0000001`-style relative step identifier.
 */
export function formatRelativeStep(tier: string, counter: number): string {
  if (!/^[A-Z]$/.test(tier)) {
    throw new RangeError(`Relative step tier must be one letter A-Z, got "${tier}"`);
  }
  if (!Number.isInteger(counter) || counter < 1 || counter > MAX_RELATIVE_STEP) {
    throw new RangeError(`Relative step counter out of range: ${counter}`);
  }
  return `${tier}${String(counter).padStart(7, '0')}`;
}

type StepDraft = Omit<Step, 'allocations'> & { allocations: DataAllocation[] };

/** Procedure call whose steps can still receive DD overrides. */
interface CallRecord {
  invocation: ProcInvocation;
  steps: StepDraft[];
}

/** Concatenation that an unlabeled DD continues. */
interface Group {
  step: StepDraft;
  ddName: string;
  offset: number;
  /** Set when the group was opened by a procedure DD override. */
  call?: CallRecord;
}

/** Digit strings that round-trip through a safe integer become numbers; `0080` stays text. */
function dcbValue(text: string): DcbValue {
  if (!/^\d+$/.test(text)) return text;
  const n = Number(text);
  return Number.isSafeInteger(n) && String(n) === text ? n : text;
}

/**
 * Build one allocation from a DD node.
 *
 * DSN precedence: DUMMY > in-stream > SYSOUT > literal DSN > unnamed temporary.
 */
export function allocationOf(dd: DdNode, ddName: string, offset: number): DataAllocation {
  let dsn: string;
  if (dd.dummy) dsn = VirtualDsn.Dummy;
  else if (dd.instream !== undefined) dsn = VirtualDsn.InputStream;
  else if (dd.sysout !== undefined) dsn = VirtualDsn.OutputStream;
  else if (dd.dsn !== undefined && dd.dsn.length > 0) dsn = dd.dsn;
  else dsn = VirtualDsn.WorkDataset;

  const dcb = new Map<string, string>([...dd.dcb, ...dd.dcbDirect]);
  const [lrecl, blksize, recfm] = PROMOTED_DCB.map((k) => dcb.get(k));
  const attributes = new Map<string, DcbValue>();
  if (dd.dcbReference !== undefined) attributes.set('REFERENCE', dd.dcbReference);
  for (const [k, v] of dcb) {
    if (!(PROMOTED_DCB as readonly string[]).includes(k)) attributes.set(k, dcbValue(v));
  }

  const instream = dd.instream !== undefined ? (dd.statement.instream ?? []).join('\n') : undefined;

  return {
    ddName,
    allocationOffset: offset,
    dsn,
    dispStatus: dd.disp.status,
    dispNormal: dd.disp.normal,
    dispAbnormal: dd.disp.abnormal,
    ...(dd.unit !== undefined ? { unit: dd.unit } : {}),
    ...(dd.volSer !== undefined ? { volSer: dd.volSer } : {}),
    isDummy: dd.dummy,
    ...(instream !== undefined ? { instreamRef: instream } : {}),
    ...(lrecl !== undefined ? { lrecl } : {}),
    ...(blksize !== undefined ? { blksize } : {}),
    ...(recfm !== undefined ? { recfm } : {}),
    dcbAttributes: attributes,
  };
}

/**
 * Replace the allocation at (ddName, offset) or insert it after the last allocation of ddName.
 */
function setAllocation(step: StepDraft, allocation: DataAllocation): void {
  const list = step.allocations;
  const existing = list.findIndex(
    (a) => a.ddName === allocation.ddName && a.allocationOffset === allocation.allocationOffset,
  );
  if (existing >= 0) {
    list[existing] = allocation;
    return;
  }
  let last = -1;
  list.forEach((a, idx) => {
    if (a.ddName === allocation.ddName) last = idx;
  });
  if (last >= 0) list.splice(last + 1, 0, allocation);
  else list.push(allocation);
}

function freeze(step: StepDraft): Step {
  return Object.freeze({ ...step, allocations: Object.freeze([...step.allocations]) });
}

/**
 * Walk the resolved node stream and assemble ordered steps with their allocations.
 *
 * Recoverable problems (a DD with nothing to attach to) are reported as `OrphanDd` and the DD is
 * skipped.
 */
export function buildModel(
  nodes: readonly ResolvedNode[],
  diagnostics: Diagnostic[],
  options: BuildOptions = {},
): readonly Step[] {
  const tier = options.tier ?? DEFAULT_TIER;
  const steps: StepDraft[] = [];
  const conditions: Array<{ text: string; negated: boolean }> = [];
  const calls = new Map<ProcInvocation, CallRecord>();
  // Latest procedure call per nesting level, while no later step has been started at that level.
  const openCall = new Map<ProcInvocation | undefined, CallRecord | undefined>();
  let current: StepDraft | undefined;
  let group: Group | undefined;
  let afterSkipped = false;

  const orphan = (statement: Statement, message: string): void => {
    diagnostics.push({
      id: DiagnosticIds.OrphanDd,
      severity: 'error',
      message,
      file: statement.member,
      line: statement.span.startLine,
      column: 1,
      ...(statement.span.endLine > statement.span.startLine ? { endLine: statement.span.endLine } : {}),
      statement: statement.text,
    });
  };

  const condLogic = (exec: ExecNode): string | undefined => {
    const parts = [
      ...(exec.cond !== undefined ? [exec.cond] : []),
      ...conditions.map((c) => (c.negated ? `IF NOT ${c.text}` : `IF ${c.text}`)),
    ];
    return parts.length > 0 ? parts.join(' AND ') : undefined;
  };

  const startStep = (exec: ExecNode, invocation: ProcInvocation | undefined): void => {
    const stepId = steps.length + 1;
    if (stepId > MAX_RELATIVE_STEP) {
      fail(DiagnosticIds.InternalError, `Too many steps for relative step numbering.`, {
        file: exec.statement.member,
        line: exec.statement.span.startLine,
      });
    }
    const stepName = invocation ? invocation.stepName : exec.label;
    const procStepName = invocation ? exec.label : undefined;
    const cond = condLogic(exec);
    const step: StepDraft = {
      stepId,
      relativeStep: formatRelativeStep(tier, stepId),
      ...(stepName !== undefined ? { stepName } : {}),
      ...(procStepName !== undefined ? { procStepName } : {}),
      ...(exec.target.kind === 'program'
        ? { programName: exec.target.name }
        : { procName: exec.target.name }),
      ...(exec.parm !== undefined ? { parameters: exec.parm } : {}),
      ...(cond !== undefined ? { condLogic: cond } : {}),
      allocations: [],
    };
    steps.push(step);
    current = step;
    group = undefined;
    afterSkipped = false;
    openCall.set(invocation, undefined);
    if (invocation) calls.get(invocation)?.steps.push(step);
  };

  const overrideDd = (dd: DdNode, call: CallRecord): void => {
    if (dd.label === undefined) {
      if (!group || group.call !== call) {
        orphan(dd.statement, 'Unlabeled DD after a procedure call has no DD to concatenate to.');
        return;
      }
      group.offset++;
      setAllocation(group.step, allocationOf(dd, group.ddName, group.offset));
      return;
    }
    const target =
      dd.procStep !== undefined
        ? call.steps.find((s) => s.procStepName === dd.procStep)
        : call.steps[0];
    if (!target) {
      orphan(
        dd.statement,
        `Procedure ${call.invocation.procName} has no step "${dd.procStep ?? ''}" to override.`,
      );
      return;
    }
    setAllocation(target, allocationOf(dd, dd.label, 1));
    group = { step: target, ddName: dd.label, offset: 1, call };
  };

  const addDd = (dd: DdNode, invocation: ProcInvocation | undefined): void => {
    const call = openCall.get(invocation);
    if (call) {
      overrideDd(dd, call);
      return;
    }
    if (dd.procStep !== undefined) {
      orphan(dd.statement, `DD override "${dd.procStep}.${dd.label ?? ''}" does not follow a procedure call.`);
      return;
    }
    if (!current) {
      orphan(
        dd.statement,
        afterSkipped ? 'DD statement follows a step that was skipped.' : 'DD statement before any EXEC.',
      );
      return;
    }
    if (dd.label !== undefined) {
      current.allocations.push(allocationOf(dd, dd.label, 1));
      group = { step: current, ddName: dd.label, offset: 1 };
      return;
    }
    if (!group || group.step !== current) {
      orphan(dd.statement, 'Unlabeled DD with no preceding DD in the step to concatenate to.');
      return;
    }
    group.offset++;
    current.allocations.push(allocationOf(dd, group.ddName, group.offset));
  };

  for (const item of nodes) {
    switch (item.kind) {
      case 'step':
        startStep(item.exec, item.invocation);
        break;
      case 'call': {
        const record: CallRecord = { invocation: item.invocation, steps: [] };
        calls.set(item.invocation, record);
        openCall.set(item.invocation.parent, record);
        current = undefined;
        group = undefined;
        afterSkipped = false;
        break;
      }
      case 'skipped-step':
        current = undefined;
        group = undefined;
        afterSkipped = true;
        openCall.set(item.invocation, undefined);
        break;
      case 'dd':
        addDd(item.dd, item.invocation);
        break;
      case 'condition':
        if (item.node.kind === 'If') conditions.push({ text: item.node.condition, negated: false });
        else if (item.node.kind === 'Else') {
          const top = conditions[conditions.length - 1];
          if (top) top.negated = true;
        } else conditions.pop();
        break;
    }
  }

  return Object.freeze(steps.map(freeze));
}
