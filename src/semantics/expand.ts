import { DiagnosticIds } from '../diagnostics/types.js';
import { fail, type FailureSite } from '../diagnostics/errors.js';
import type { SymbolTable } from './symbols.js';

export const DEFAULT_MAX_EXPANSION_PASSES = 16;

export interface ExpandOptions {
  /** Upper bound on substitution passes that still change the text. */
  maxPasses?: number;
  /** Where a divergence failure is reported. */
  site?: FailureSite;
}

export interface ExpandResult {
  text: string;
  /** Referenced names with no binding in scope, in order of first appearance. */
  unresolved: string[];
}

const SYMBOL_RE = /^[A-Z#$@][A-Z0-9#$@]*/i;
const TEMP_DSN_RE = /^&&[A-Z0-9#$@]*/i;

function substitutePass(
  text: string,
  table: SymbolTable,
  names: string[],
): { text: string; unresolved: string[] } {
  let out = '';
  const unresolved: string[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch !== '&') {
      out += ch;
      i++;
      continue;
    }
    if (text[i + 1] === '&') {
      const temp = TEMP_DSN_RE.exec(text.slice(i))?.[0] ?? '&&';
      out += temp;
      i += temp.length;
      continue;
    }
    const token = SYMBOL_RE.exec(text.slice(i + 1))?.[0];
    if (token === undefined) {
      out += ch;
      i++;
      continue;
    }
    const upper = token.toUpperCase();
    const name = names.find((n) => upper.startsWith(n));
    const value = name !== undefined ? table.lookup(name) : undefined;
    if (name === undefined || value === undefined) {
      if (!unresolved.includes(upper)) unresolved.push(upper);
      out += text.slice(i, i + 1 + token.length);
      i += 1 + token.length;
      continue;
    }
    i += 1 + name.length;
    // A single period ends the reference and is not emitted.
    if (text[i] === '.') i++;
    out += value;
  }
  return { text: out, unresolved };
}

/**
 * Substitute `&NAME` references until a pass changes nothing.
 *
 * - `&NAME` uses the longest bound name that prefixes the token.
 * - One period right after the name is a delimiter and is dropped, so `&A..` yields `value.`.
 * - `&&NAME` is a temporary dataset name and is never substituted.
 *
 * Fails with `SymbolExpansionDivergence` when the text is still changing after `maxPasses` passes.
 */
export function expandSymbols(
  text: string,
  table: SymbolTable,
  options: ExpandOptions = {},
): ExpandResult {
  const maxPasses = options.maxPasses ?? DEFAULT_MAX_EXPANSION_PASSES;
  const names = table.names();
  let current = text;
  for (let pass = 0; pass <= maxPasses; pass++) {
    const next = substitutePass(current, table, names);
    if (next.text === current) return { text: current, unresolved: next.unresolved };
    current = next.text;
  }
  return fail(
    DiagnosticIds.SymbolExpansionDivergence,
    `Symbol substitution did not settle after ${maxPasses} passes: "${current.slice(0, 120)}"`,
    options.site ?? { file: '<text>', statement: text },
  );
}
