import type {
  ClassifiedNode,
  DdNode,
  Disposition,
  ExecNode,
  Opcode,
  ParamNode,
  Statement,
  TokenStream,
} from './ast.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

function diag(diagnostics: Diagnostic[], statement: Statement, message: string): void {
  diagnostics.push({
    id: DiagnosticIds.ParseError,
    severity: 'error',
    message,
    file: statement.member,
    line: statement.span.startLine,
    column: 1,
    ...(statement.span.endLine > statement.span.startLine ? { endLine: statement.span.endLine } : {}),
    statement: statement.text,
  });
}

const OPCODES: ReadonlySet<Opcode> = new Set<Opcode>([
  'EXEC',
  'DD',
  'PROC',
  'PEND',
  'SET',
  'INCLUDE',
  'JCLLIB',
  'IF',
  'ELSE',
  'ENDIF',
  'JOB',
  'OUTPUT',
  'CNTL',
  'ENDCNTL',
  'EXPORT',
  'NOTIFY',
  'SCHEDULE',
  'XMIT',
  'COMMAND',
]);

/**
 * Opcodes whose operands are carried as text only; their operand field is not parsed.
 */
const OPAQUE_OPCODES: ReadonlySet<Opcode> = new Set<Opcode>([
  'IF',
  'ELSE',
  'ENDIF',
  'JOB',
  'OUTPUT',
  'CNTL',
  'ENDCNTL',
  'EXPORT',
  'NOTIFY',
  'SCHEDULE',
  'XMIT',
  'COMMAND',
]);

function asOpcode(word: string): Opcode | undefined {
  const upper = word.toUpperCase();
  for (const op of OPCODES) {
    if (op === upper) return op;
  }
  return undefined;
}

/** Name field: 1-8 characters, optionally qualified by a procedure step (`PSTEP.DDNAME`). */
const LABEL_RE = /^[A-Z#$@][A-Z0-9#$@]{0,7}(?:\.[A-Z#$@][A-Z0-9#$@]{0,7})?$/i;

type FieldToken = { kind: 'opcode'; opcode: Opcode } | { kind: 'label'; name: string };

interface FieldMatcher {
  readonly name: FieldToken['kind'];
  match(word: string): FieldToken | undefined;
}

/**
 * Field matchers in priority order. A word that is a reserved opcode is an opcode even where a label
 * could stand.
 */
const FIELD_MATCHERS: readonly FieldMatcher[] = [
  {
    name: 'opcode',
    match: (word) => {
      const opcode = asOpcode(word);
      return opcode ? { kind: 'opcode', opcode } : undefined;
    },
  },
  {
    name: 'label',
    match: (word) => (LABEL_RE.test(word) ? { kind: 'label', name: word.toUpperCase() } : undefined),
  },
];

function matchField(word: string): FieldToken | undefined {
  for (const matcher of FIELD_MATCHERS) {
    const token = matcher.match(word);
    if (token) return token;
  }
  return undefined;
}

class OperandSyntaxError extends Error {}

/**
 * Recursive-descent reader for a comma-delimited operand field.
 */
class OperandReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  readAll(): ParamNode[] {
    if (this.text.length === 0) return [];
    const items = this.readList();
    if (this.pos < this.text.length) {
      throw new OperandSyntaxError(`Unexpected "${this.text[this.pos] ?? ''}" at operand column ${this.pos + 1}`);
    }
    return items;
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private readList(): ParamNode[] {
    const items: ParamNode[] = [this.readOperand()];
    while (this.peek() === ',') {
      this.pos++;
      items.push(this.readOperand());
    }
    return items;
  }

  private readOperand(): ParamNode {
    const keyword = /^([A-Z#$@][A-Z0-9#$@]*(?:\.[A-Z#$@][A-Z0-9#$@]*)?)=/i.exec(
      this.text.slice(this.pos),
    );
    if (keyword) {
      this.pos += keyword[0].length;
      return { kind: 'Keyword', key: (keyword[1] ?? '').toUpperCase(), value: this.readOperand() };
    }
    return this.readValue();
  }

  private readValue(): ParamNode {
    const ch = this.peek();
    if (ch === undefined || ch === ',' || ch === ')') return { kind: 'Text', text: '', quoted: false };
    if (ch === "'") return this.readQuoted();
    if (ch === '(') {
      this.pos++;
      const items = this.readList();
      if (this.peek() !== ')') throw new OperandSyntaxError('Unbalanced parentheses in operand list');
      this.pos++;
      return { kind: 'List', items };
    }
    return this.readBare();
  }

  private readQuoted(): ParamNode {
    this.pos++;
    let text = '';
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === "'") {
        if (this.text[this.pos + 1] === "'") {
          text += "'";
          this.pos += 2;
          continue;
        }
        this.pos++;
        const next = this.peek();
        if (next !== undefined && next !== ',' && next !== ')') {
          throw new OperandSyntaxError(`Unexpected "${next}" after quoted string`);
        }
        return { kind: 'Text', text, quoted: true };
      }
      text += ch;
      this.pos++;
    }
    throw new OperandSyntaxError('Unterminated quoted string');
  }

  /**
   * Bare value. Parentheses inside it (`A.B(+1)`, `LIB(MEM)`) must balance and stay part of the text.
   */
  private readBare(): ParamNode {
    const start = this.pos;
    let depth = 0;
    let inQuotes = false;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (inQuotes) {
        if (ch === "'") inQuotes = false;
        this.pos++;
        continue;
      }
      if (ch === "'") inQuotes = true;
      else if (ch === '(') depth++;
      else if (ch === ')') {
        if (depth === 0) break;
        depth--;
      } else if (ch === ',' && depth === 0) break;
      this.pos++;
    }
    if (inQuotes) throw new OperandSyntaxError('Unterminated quoted string');
    if (depth !== 0) throw new OperandSyntaxError('Unbalanced parentheses in operand value');
    return { kind: 'Text', text: this.text.slice(start, this.pos), quoted: false };
  }
}

/**
 * Parse an operand field into {@link ParamNode} trees. Throws on malformed syntax.
 */
export function parseOperands(text: string): ParamNode[] {
  return new OperandReader(text).readAll();
}

/**
 * Render an operand back to JCL text.
 */
export function renderParam(node: ParamNode): string {
  switch (node.kind) {
    case 'Text':
      return node.quoted ? `'${node.text.replace(/'/g, "''")}'` : node.text;
    case 'List':
      return `(${node.items.map(renderParam).join(',')})`;
    case 'Keyword':
      return `${node.key}=${renderParam(node.value)}`;
  }
}

/**
 * Value text of an operand: quotes removed for text, JCL rendering otherwise.
 */
export function paramText(node: ParamNode): string {
  return node.kind === 'Text' ? node.text : renderParam(node);
}

/**
 * Split a statement into name, operation and operand fields.
 *
 * Returns `undefined` (after reporting a `ParseError`) when the fields cannot be matched or the
 * operand field is malformed.
 */
export function tokenize(statement: Statement, diagnostics: Diagnostic[]): TokenStream | undefined {
  const text = statement.text;
  if (!text.startsWith('//')) {
    diag(diagnostics, statement, 'Statement does not start with "//".');
    return undefined;
  }
  const body = text.slice(2);
  const nameWord = /^\S+/.exec(body)?.[0];
  const afterName = body.slice(nameWord?.length ?? 0).trimStart();

  let label: string | undefined;
  let opcode: Opcode;
  let operandText: string;

  const first = nameWord !== undefined ? matchField(nameWord) : undefined;
  if (nameWord !== undefined && first === undefined) {
    diag(diagnostics, statement, `Invalid name field "${nameWord}".`);
    return undefined;
  }
  if (first?.kind === 'opcode') {
    opcode = first.opcode;
    operandText = afterName;
  } else {
    label = first?.name;
    const opWord = /^\S+/.exec(afterName)?.[0];
    if (opWord === undefined) {
      diag(diagnostics, statement, 'Missing operation field.');
      return undefined;
    }
    const op = matchField(opWord);
    if (op?.kind !== 'opcode') {
      diag(diagnostics, statement, `Unknown operation "${opWord}".`);
      return undefined;
    }
    opcode = op.opcode;
    operandText = afterName.slice(opWord.length).trimStart();
  }

  let operands: ParamNode[] = [];
  if (!OPAQUE_OPCODES.has(opcode)) {
    try {
      operands = parseOperands(operandText);
    } catch (err) {
      if (!(err instanceof OperandSyntaxError)) throw err;
      diag(diagnostics, statement, `Malformed ${opcode} operands: ${err.message}.`);
      return undefined;
    }
  }

  return {
    ...(label !== undefined ? { label } : {}),
    opcode,
    operands,
    operandText,
    statement,
  };
}

/**
 * DISP slot defaults applied when status, normal or abnormal disposition is omitted.
 */
export const DISP_DEFAULTS: Readonly<Disposition> = {
  status: 'NEW',
  normal: 'DELETE',
  abnormal: 'DELETE',
};

/**
 * EXEC keyword parameters. Any other keyword on an EXEC is a symbolic override for a procedure call.
 */
const EXEC_PARAMETERS: ReadonlySet<string> = new Set([
  'PGM',
  'PROC',
  'PARM',
  'PARMDD',
  'COND',
  'REGION',
  'REGIONX',
  'TIME',
  'ACCT',
  'ADDRSPC',
  'DYNAMNBR',
  'PERFORM',
  'RD',
  'CCSID',
  'MEMLIMIT',
  'TVSMSG',
  'TVSAMCOM',
]);

/**
 * DCB sub-parameters that may also be coded directly on a DD statement.
 */
export const DCB_SUBPARAMETERS: ReadonlySet<string> = new Set([
  'BFALN',
  'BFTEK',
  'BLKSIZE',
  'BUFIN',
  'BUFL',
  'BUFMAX',
  'BUFNO',
  'BUFOFF',
  'BUFOUT',
  'BUFSIZE',
  'CPRI',
  'CYLOFL',
  'DEN',
  'DIAGNS',
  'DSORG',
  'EROPT',
  'FUNC',
  'GNCP',
  'INTVL',
  'IPLTXID',
  'KEYLEN',
  'LIMCT',
  'LRECL',
  'MODE',
  'NCP',
  'NTM',
  'OPTCD',
  'PCI',
  'PRTSP',
  'RECFM',
  'RESERVE',
  'RKP',
  'STACK',
  'THRESH',
  'TRTCH',
]);

function keywordsOf(operands: ParamNode[]): Array<{ key: string; value: ParamNode }> {
  return operands.flatMap((o) => (o.kind === 'Keyword' ? [{ key: o.key, value: o.value }] : []));
}

function positionalsOf(operands: ParamNode[]): ParamNode[] {
  return operands.filter((o) => o.kind !== 'Keyword');
}

function parmText(node: ParamNode): string {
  return node.kind === 'List' ? node.items.map(paramText).join(',') : paramText(node);
}

function classifyExec(tokens: TokenStream, diagnostics: Diagnostic[]): ExecNode | undefined {
  const { statement } = tokens;
  const positionals = positionalsOf(tokens.operands);
  const first = tokens.operands[0];
  if (positionals.length > 1 || (positionals.length === 1 && first?.kind === 'Keyword')) {
    diag(diagnostics, statement, 'EXEC accepts one positional procedure name, as its first operand.');
    return undefined;
  }

  let program: string | undefined;
  let procedure: string | undefined =
    first !== undefined && first.kind !== 'Keyword' ? paramText(first).toUpperCase() : undefined;
  let parm: string | undefined;
  let cond: string | undefined;
  const stepParams = new Map<string, Map<string, string>>();
  const overrides = new Map<string, string>();

  for (const { key, value } of keywordsOf(tokens.operands)) {
    const dot = key.indexOf('.');
    if (dot >= 0) {
      const param = key.slice(0, dot);
      const step = key.slice(dot + 1);
      const perStep = stepParams.get(step) ?? new Map<string, string>();
      perStep.set(param, param === 'PARM' ? parmText(value) : renderParam(value));
      stepParams.set(step, perStep);
      continue;
    }
    switch (key) {
      case 'PGM':
        program = paramText(value).toUpperCase();
        break;
      case 'PROC':
        if (procedure !== undefined) {
          diag(diagnostics, statement, 'EXEC names a procedure twice.');
          return undefined;
        }
        procedure = paramText(value).toUpperCase();
        break;
      case 'PARM':
        parm = parmText(value);
        break;
      case 'COND':
        cond = renderParam(value);
        break;
      default:
        if (!EXEC_PARAMETERS.has(key)) overrides.set(key, paramText(value));
    }
  }

  if (program !== undefined && procedure !== undefined) {
    diag(diagnostics, statement, 'EXEC cannot name both a program and a procedure.');
    return undefined;
  }
  const target =
    program !== undefined
      ? { kind: 'program' as const, name: program }
      : procedure !== undefined
        ? { kind: 'procedure' as const, name: procedure }
        : undefined;
  if (!target || target.name.length === 0) {
    diag(diagnostics, statement, 'EXEC requires PGM= or a procedure name.');
    return undefined;
  }

  return {
    kind: 'Exec',
    statement,
    ...(tokens.label !== undefined ? { label: tokens.label } : {}),
    target,
    ...(parm !== undefined ? { parm } : {}),
    ...(cond !== undefined ? { cond } : {}),
    stepParams,
    overrides,
  };
}

function parseDisp(value: ParamNode): Disposition {
  const slots = value.kind === 'List' ? value.items.map(paramText) : [paramText(value)];
  const pick = (idx: number, fallback: string): string => {
    const v = slots[idx]?.trim().toUpperCase() ?? '';
    return v.length > 0 ? v : fallback;
  };
  return {
    status: pick(0, DISP_DEFAULTS.status),
    normal: pick(1, DISP_DEFAULTS.normal),
    abnormal: pick(2, DISP_DEFAULTS.abnormal),
  };
}

function findSer(value: ParamNode): string | undefined {
  if (value.kind === 'Keyword') {
    if (value.key === 'SER') {
      return value.value.kind === 'List'
        ? value.value.items.map(paramText).join(',')
        : paramText(value.value);
    }
    return undefined;
  }
  if (value.kind === 'List') {
    for (const item of value.items) {
      const ser = findSer(item);
      if (ser !== undefined) return ser;
    }
  }
  return undefined;
}

function classifyDd(tokens: TokenStream): DdNode {
  let label: string | undefined = tokens.label;
  let procStep: string | undefined;
  if (label !== undefined && label.includes('.')) {
    const [step, dd] = label.split('.');
    procStep = step;
    label = dd;
  }

  let dummy = false;
  let instream: '*' | 'DATA' | undefined;
  for (const p of positionalsOf(tokens.operands)) {
    const word = paramText(p).toUpperCase();
    if (word === 'DUMMY') dummy = true;
    else if (word === '*') instream = '*';
    else if (word === 'DATA') instream = 'DATA';
  }

  let dsn: string | undefined;
  let sysout: string | undefined;
  let disp: Disposition = { ...DISP_DEFAULTS };
  let unit: string | undefined;
  let volSer: string | undefined;
  let dcbReference: string | undefined;
  const dcb = new Map<string, string>();
  const dcbDirect = new Map<string, string>();

  for (const { key, value } of keywordsOf(tokens.operands)) {
    switch (key) {
      case 'DSN':
      case 'DSNAME':
        dsn = paramText(value);
        if (dsn.toUpperCase() === 'NULLFILE') dummy = true;
        break;
      case 'DISP':
        disp = parseDisp(value);
        break;
      case 'UNIT':
        unit = value.kind === 'List' ? paramText(value.items[0] ?? value) : paramText(value);
        break;
      case 'VOL':
      case 'VOLUME':
        volSer = findSer(value);
        break;
      case 'SYSOUT':
        sysout = renderParam(value);
        break;
      case 'DCB':
        if (value.kind === 'List') {
          for (const item of value.items) {
            if (item.kind === 'Keyword') dcb.set(item.key, paramText(item.value));
            else if (paramText(item).length > 0) dcbReference = paramText(item);
          }
        } else if (value.kind === 'Keyword') {
          dcb.set(value.key, paramText(value.value));
        } else {
          dcbReference = paramText(value);
        }
        break;
      default:
        if (DCB_SUBPARAMETERS.has(key)) dcbDirect.set(key, paramText(value));
    }
  }

  return {
    kind: 'Dd',
    statement: tokens.statement,
    ...(label !== undefined ? { label } : {}),
    ...(procStep !== undefined ? { procStep } : {}),
    ...(dsn !== undefined ? { dsn } : {}),
    dummy,
    ...(instream !== undefined ? { instream } : {}),
    ...(sysout !== undefined ? { sysout } : {}),
    disp,
    ...(unit !== undefined ? { unit } : {}),
    ...(volSer !== undefined ? { volSer } : {}),
    dcb,
    dcbDirect,
    ...(dcbReference !== undefined ? { dcbReference } : {}),
  };
}

function bindingsOf(
  tokens: TokenStream,
  diagnostics: Diagnostic[],
): Array<readonly [string, string]> | undefined {
  if (positionalsOf(tokens.operands).length > 0) {
    diag(diagnostics, tokens.statement, `${tokens.opcode} accepts only NAME=value operands.`);
    return undefined;
  }
  return keywordsOf(tokens.operands).map(({ key, value }) => [key, paramText(value)] as const);
}

/**
 * Classify a token stream into its node variant.
 *
 * Returns `undefined` (after reporting a `ParseError`) when the operands do not fit the opcode.
 */
export function classify(tokens: TokenStream, diagnostics: Diagnostic[]): ClassifiedNode | undefined {
  const { statement } = tokens;
  switch (tokens.opcode) {
    case 'EXEC':
      return classifyExec(tokens, diagnostics);
    case 'DD':
      return classifyDd(tokens);
    case 'SET': {
      const bindings = bindingsOf(tokens, diagnostics);
      if (!bindings) return undefined;
      if (bindings.length === 0) {
        diag(diagnostics, statement, 'SET requires at least one NAME=value operand.');
        return undefined;
      }
      return { kind: 'Set', statement, bindings };
    }
    case 'PROC': {
      const defaults = bindingsOf(tokens, diagnostics);
      if (!defaults) return undefined;
      return {
        kind: 'Proc',
        statement,
        ...(tokens.label !== undefined ? { name: tokens.label } : {}),
        defaults,
      };
    }
    case 'INCLUDE': {
      const member = keywordsOf(tokens.operands).find((k) => k.key === 'MEMBER');
      const name = member ? paramText(member.value).toUpperCase() : '';
      if (name.length === 0) {
        diag(diagnostics, statement, 'INCLUDE requires MEMBER=name.');
        return undefined;
      }
      return { kind: 'Include', statement, member: name };
    }
    case 'PEND':
      return { kind: 'Pend', statement };
    case 'JCLLIB': {
      const order = keywordsOf(tokens.operands).find((k) => k.key === 'ORDER');
      if (!order) {
        diag(diagnostics, statement, 'JCLLIB requires ORDER=.');
        return undefined;
      }
      const libs =
        order.value.kind === 'List' ? order.value.items.map(paramText) : [paramText(order.value)];
      return { kind: 'Jcllib', statement, order: libs.filter((l) => l.length > 0) };
    }
    case 'IF':
      return {
        kind: 'If',
        statement,
        condition: tokens.operandText.replace(/\s+THEN$/i, '').trim(),
      };
    case 'ELSE':
      return { kind: 'Else', statement };
    case 'ENDIF':
      return { kind: 'Endif', statement };
    default:
      return { kind: 'Control', statement, opcode: tokens.opcode };
  }
}

/**
 * Tokenize and classify one statement.
 */
export function parseStatement(
  statement: Statement,
  diagnostics: Diagnostic[],
): ClassifiedNode | undefined {
  const tokens = tokenize(statement, diagnostics);
  return tokens ? classify(tokens, diagnostics) : undefined;
}
