import type { AllocationRecord, RecordsArtifact, StepRecord, WriteRecordsOptions } from './types.js';
import type { DataAllocation, DcbValue, Step } from '../model/types.js';

function orNull(v: string | undefined): string | null {
  return v ?? null;
}

/** DCB attributes as a plain object with keys in sorted order. */
function dcbObject(attrs: ReadonlyMap<string, DcbValue>): Record<string, DcbValue> {
  const out: Record<string, DcbValue> = {};
  for (const key of [...attrs.keys()].sort()) {
    const value = attrs.get(key);
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function allocationRecord(a: DataAllocation, dsId: number): AllocationRecord {
  return {
    ds_id: dsId,
    dd_name: a.ddName,
    allocation_offset: a.allocationOffset,
    dsn: a.dsn,
    disp_status: a.dispStatus,
    disp_normal: a.dispNormal,
    disp_abnormal: a.dispAbnormal,
    unit: orNull(a.unit),
    vol_ser: orNull(a.volSer),
    is_dummy: a.isDummy,
    instream_ref: orNull(a.instreamRef),
    lrecl: orNull(a.lrecl),
    blksize: orNull(a.blksize),
    recfm: orNull(a.recfm),
    dcb_attributes: dcbObject(a.dcbAttributes),
  };
}

function stepRecord(step: Step): StepRecord {
  return {
    step_id: step.stepId,
    relative_step: step.relativeStep,
    step_name: orNull(step.stepName),
    proc_step_name: orNull(step.procStepName),
    program_name: orNull(step.programName),
    proc_name: orNull(step.procName),
    parameters: orNull(step.parameters),
    cond_logic: orNull(step.condLogic),
    allocations: step.allocations.map((a, idx) => allocationRecord(a, idx + 1)),
  };
}

/**
 * Serialize steps into the row layout consumed by the persistence layer.
 *
 * `ds_id` numbers allocations within their step, starting at 1. The project is carried as given;
 * key assignment stays with the consumer.
 */
export function writeRecords(
  member: string,
  steps: readonly Step[],
  opts?: WriteRecordsOptions,
): RecordsArtifact {
  return {
    kind: 'records',
    json: {
      format: 'jcl-steps',
      version: 1,
      project: opts?.project ?? null,
      member,
      steps: steps.map(stepRecord),
    },
  };
}
