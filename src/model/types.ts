/**
 * Virtual dataset names used when a DD does not name a dataset.
 */
export const VirtualDsn = {
  /** DUMMY (or DSN=NULLFILE). */
  Dummy: '(dummy)',
  /** `DD *` / `DD DATA`. */
  InputStream: '(input stream)',
  /** SYSOUT=. */
  OutputStream: '(output stream)',
  /** No DSN at all: an unnamed temporary dataset. */
  WorkDataset: '(work_ds)',
} as const;

/**
 * DCB attribute value. All-digit values are numbers; everything else stays text.
 */
export type DcbValue = string | number;

/**
 * One entry of a DD concatenation.
 */
export interface DataAllocation {
  readonly ddName: string;
  /** 1-based position within the (step, ddName) concatenation. */
  readonly allocationOffset: number;
  /** Dataset name, or one of {@link VirtualDsn}. */
  readonly dsn: string;
  readonly dispStatus: string;
  readonly dispNormal: string;
  readonly dispAbnormal: string;
  readonly unit?: string;
  readonly volSer?: string;
  readonly isDummy: boolean;
  /** In-stream data lines joined with `\n`. */
  readonly instreamRef?: string;
  readonly lrecl?: string;
  readonly blksize?: string;
  readonly recfm?: string;
  /** DCB sub-parameters other than LRECL, BLKSIZE and RECFM. */
  readonly dcbAttributes: ReadonlyMap<string, DcbValue>;
}

/**
 * A job step. Exactly one of `programName` and `procName` is set.
 */
export interface Step {
  /** 1-based sequence within the run. */
  readonly stepId: number;
  /** Tier letter followed by 7 digits, e.g. `X0000001`. */
  readonly relativeStep: string;
  readonly stepName?: string;
  /** Step label inside the procedure the step was expanded from. */
  readonly procStepName?: string;
  readonly programName?: string;
  readonly procName?: string;
  /** Resolved PARM text. */
  readonly parameters?: string;
  /** COND / IF context, carried as text. */
  readonly condLogic?: string;
  readonly allocations: readonly DataAllocation[];
}
