import type { Statement } from './ast.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { fail } from '../diagnostics/errors.js';

/**
 * Columns 1-72 of a card image are significant; 73-80 hold the sequence area.
 */
export const SIGNIFICANT_COLUMNS = 72;

/**
 * Raw member text as returned by a library lookup.
 */
export interface SourceMember {
  /** Logical member name (upper case). */
  name: string;
  /** Library the member was found in. */
  library: string;
  /** Host location that was read (file path or `//'LIB(MEMBER)'`). */
  location: string;
  lines: string[];
}

/**
 * Build a {@link SourceMember} from raw text, splitting on LF or CRLF.
 */
export function makeSourceMember(
  name: string,
  library: string,
  location: string,
  text: string,
): SourceMember {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return { name, library, location, lines };
}

/**
 * Truncate a card image to its significant columns and drop lines that carry no statement text.
 *
 * Returns `undefined` for `//*` comments, a bare `//`, `/*` delimiter lines and lines that are blank
 * once the sequence area is gone.
 */
export function normalizeLine(raw: string): string | undefined {
  const line = raw.slice(0, SIGNIFICANT_COLUMNS).replace(/\s+$/, '');
  if (line.length === 0) return undefined;
  if (line.startsWith('//*')) return undefined;
  if (line === '//') return undefined;
  if (line.startsWith('/*')) return undefined;
  return line;
}

/**
 * Length of the operand field: everything up to the first blank that is not inside a quoted string.
 */
function operandFieldLength(text: string): number {
  let inQuotes = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "'") {
      inQuotes = !inQuotes;
      continue;
    }
    if (!inQuotes && (ch === ' ' || ch === '\t')) return i;
  }
  return text.length;
}

function leadingWord(text: string): string {
  const m = /^\S+/.exec(text);
  return m ? m[0] : '';
}

interface FirstLineFields {
  name: string;
  operation: string;
  operands: string;
}

function splitFirstLine(body: string): FirstLineFields {
  const name = /^\s/.test(body) ? '' : leadingWord(body);
  let rest = body.slice(name.length).trimStart();
  const operation = leadingWord(rest);
  rest = rest.slice(operation.length).trimStart();
  const operands =
    operation.toUpperCase() === 'IF' ? rest : rest.slice(0, operandFieldLength(rest));
  return { name, operation, operands };
}

function renderFirstLine(fields: FirstLineFields): string {
  const parts = [`//${fields.name}`];
  if (fields.operation) parts.push(fields.operation);
  if (fields.operands) parts.push(fields.operands);
  return parts.join(' ');
}

function continuationOperands(body: string): string {
  const rest = body.trimStart();
  return rest.slice(0, operandFieldLength(rest));
}

type InstreamMode = { form: '*' | 'DATA'; delimiter?: string };

function instreamMode(fields: FirstLineFields, operands: string): InstreamMode | undefined {
  if (fields.operation.toUpperCase() !== 'DD') return undefined;
  const first = (operands.split(',')[0] ?? '').toUpperCase();
  const form = first === '*' ? '*' : first === 'DATA' ? 'DATA' : undefined;
  if (form === undefined) return undefined;
  const dlm = /(?:^|,)DLM=(?:'([^']{2})'|([^,']{2}))/i.exec(operands);
  const delimiter = dlm ? (dlm[1] ?? dlm[2]) : undefined;
  return delimiter !== undefined ? { form, delimiter } : { form };
}

/**
 * Collect in-stream data lines starting at `start`.
 *
 * Returns the data lines and the index of the first line that is not consumed.
 */
function collectInstream(
  lines: string[],
  start: number,
  mode: InstreamMode,
): { data: string[]; next: number } {
  const data: string[] = [];
  let idx = start;
  while (idx < lines.length) {
    const raw = (lines[idx] ?? '').slice(0, SIGNIFICANT_COLUMNS).replace(/\s+$/, '');
    if (mode.delimiter !== undefined) {
      if (raw.startsWith(mode.delimiter)) return { data, next: idx + 1 };
    } else {
      if (raw.startsWith('/*')) return { data, next: idx + 1 };
      if (mode.form === '*' && raw.startsWith('//')) return { data, next: idx };
    }
    data.push(raw);
    idx++;
  }
  return { data, next: idx };
}

/**
 * Join the physical lines of a member into logical statements.
 *
 * A statement keeps accumulating lines while its text ends with a comma. Comment lines inside a
 * continuation are dropped without ending it. Fails with `UnterminatedContinuation` when the member
 * ends mid-statement.
 */
export function joinStatements(member: SourceMember, diagnostics: Diagnostic[]): Statement[] {
  const out: Statement[] = [];
  let pending:
    | { text: string; fields: FirstLineFields; startLine: number; endLine: number }
    | undefined;

  let idx = 0;
  while (idx < member.lines.length) {
    const lineNo = idx + 1;
    const line = normalizeLine(member.lines[idx] ?? '');
    idx++;
    if (line === undefined) continue;
    if (!line.startsWith('//')) {
      diagnostics.push({
        id: DiagnosticIds.StrayText,
        severity: 'warning',
        message: `Ignoring text outside a statement: "${line.trim()}"`,
        file: member.name,
        line: lineNo,
        column: 1,
      });
      continue;
    }

    if (pending) {
      pending.text += continuationOperands(line.slice(2));
      pending.fields.operands += continuationOperands(line.slice(2));
      pending.endLine = lineNo;
    } else {
      const fields = splitFirstLine(line.slice(2));
      pending = { text: renderFirstLine(fields), fields, startLine: lineNo, endLine: lineNo };
    }
    if (pending.text.endsWith(',')) continue;

    const span = { member: member.name, startLine: pending.startLine, endLine: pending.endLine };
    const mode = instreamMode(pending.fields, pending.fields.operands);
    if (mode) {
      const { data, next } = collectInstream(member.lines, idx, mode);
      idx = next;
      out.push({ text: pending.text, member: member.name, span, instream: data });
    } else {
      out.push({ text: pending.text, member: member.name, span });
    }
    pending = undefined;
  }

  if (pending) {
    fail(
      DiagnosticIds.UnterminatedContinuation,
      `Member "${member.name}" ends while statement starting on line ${pending.startLine} is still continued.`,
      { file: member.name, line: pending.startLine, statement: pending.text },
    );
  }
  return out;
}
