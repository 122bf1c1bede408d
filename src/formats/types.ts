import type { Diagnostic } from '../diagnostics/types.js';
import type { DiagnosticsSummary } from '../pipeline.js';
import type { Step } from '../model/types.js';

/**
 * Allocation row as handed to the persistence layer. Absent values are `null`.
 */
export interface AllocationRecord {
  ds_id: number;
  dd_name: string;
  allocation_offset: number;
  dsn: string;
  disp_status: string;
  disp_normal: string;
  disp_abnormal: string;
  unit: string | null;
  vol_ser: string | null;
  is_dummy: boolean;
  instream_ref: string | null;
  lrecl: string | null;
  blksize: string | null;
  recfm: string | null;
  dcb_attributes: Record<string, string | number>;
}

/**
 * Step row as handed to the persistence layer.
 */
export interface StepRecord {
  step_id: number;
  relative_step: string;
  step_name: string | null;
  proc_step_name: string | null;
  program_name: string | null;
  proc_name: string | null;
  parameters: string | null;
  cond_logic: string | null;
  allocations: AllocationRecord[];
}

export interface RecordsJson {
  format: 'jcl-steps';
  version: 1;
  /** Project key the consumer files the rows under. */
  project: string | null;
  member: string;
  steps: StepRecord[];
}

export interface RecordsArtifact {
  kind: 'records';
  json: RecordsJson;
}

export interface ReportArtifact {
  kind: 'report';
  text: string;
}

export type Artifact = RecordsArtifact | ReportArtifact;

export interface WriteRecordsOptions {
  project?: string;
}

export interface WriteReportOptions {
  lineEnding?: '\n' | '\r\n';
}

/**
 * Writer contract. Writers return artifacts in memory; the CLI decides where they go.
 */
export interface FormatWriters {
  writeRecords(member: string, steps: readonly Step[], opts?: WriteRecordsOptions): RecordsArtifact;
  writeReport?(
    member: string,
    diagnostics: Diagnostic[],
    summary: DiagnosticsSummary,
    opts?: WriteReportOptions,
  ): ReportArtifact;
}
