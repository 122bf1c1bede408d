/**
 * Kind of a symbol scope frame.
 *
 * - `global`: SET statements.
 * - `proc-default`: defaults from the PROC statement of the procedure being expanded.
 * - `call-override`: keyword values given on the EXEC that called the procedure.
 */
export type ScopeKind = 'global' | 'proc-default' | 'call-override';

export interface ScopeFrame {
  readonly kind: ScopeKind;
  readonly bindings: ReadonlyMap<string, string>;
}

/**
 * Immutable stack of symbol scope frames.
 *
 * Every update returns a new table, so a caller keeps its own snapshot across a procedure call and
 * the callee's frames disappear when the caller goes back to it.
 */
export class SymbolTable {
  private constructor(readonly frames: readonly ScopeFrame[]) {}

  /** Table holding one empty global frame. */
  static empty(): SymbolTable {
    return new SymbolTable([{ kind: 'global', bindings: new Map() }]);
  }

  static of(frames: readonly ScopeFrame[]): SymbolTable {
    return new SymbolTable(frames);
  }

  /**
   * Value bound to `name`, searching from the top of the stack down.
   *
   * With the push order used for procedure calls (defaults, then overrides) this gives
   * call-override before proc-default before global.
   */
  lookup(name: string): string | undefined {
    const key = name.toUpperCase();
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const value = this.frames[i]?.bindings.get(key);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Bind `name` in the topmost frame of `kind`; a frame of that kind is pushed when none exists.
   */
  define(name: string, value: string, kind: ScopeKind): SymbolTable {
    const key = name.toUpperCase();
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame === undefined || frame.kind !== kind) continue;
      const bindings = new Map(frame.bindings);
      bindings.set(key, value);
      const frames = [...this.frames];
      frames[i] = { kind, bindings };
      return new SymbolTable(frames);
    }
    return this.push(kind, [[key, value]]);
  }

  push(kind: ScopeKind, bindings: Iterable<readonly [string, string]>): SymbolTable {
    const map = new Map<string, string>();
    for (const [k, v] of bindings) map.set(k.toUpperCase(), v);
    return new SymbolTable([...this.frames, { kind, bindings: map }]);
  }

  pop(): SymbolTable {
    return new SymbolTable(this.frames.slice(0, -1));
  }

  /** Every name bound in any frame, longest first. */
  names(): string[] {
    const all = new Set<string>();
    for (const frame of this.frames) {
      for (const k of frame.bindings.keys()) all.add(k);
    }
    return [...all].sort((a, b) => b.length - a.length || a.localeCompare(b));
  }
}
