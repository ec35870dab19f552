/**
 * Data emitted alongside code: interned strings (`.data`) and reserved regions (`.bss`).
 */
export type DataDecl =
  | { kind: 'string'; name: string; value: string }
  | { kind: 'reserve'; name: string; qwords: number };

/**
 * State shared by every function of one compilation unit.
 *
 * Passed explicitly to each lowering call; independent compilations never share one.
 */
export interface CompileContext {
  /** Names first seen unresolved -> their `.bss` symbol, in first-seen order. */
  globals: Map<string, string>;
  /** Every symbol already defined or reserved (function names, externs, generated labels). */
  taken: Set<string>;
  /** Top-level function name -> parameter count. */
  functions: Map<string, number>;
  /** Called names with no definition in the unit. */
  externs: Set<string>;
  data: DataDecl[];
  /** String text -> data label. */
  strings: Map<string, string>;
  /** Monotonic across the whole unit; never reset per function. */
  labelCounter: number;
  /** Aggregate arena symbols, reserved on the first literal. */
  arena?: Arena;
}

/**
 * Bump-allocated `.bss` arena for aggregate literals. `cursor` holds the byte offset of the next
 * free qword; `.bss` is zero-filled, so it starts at 0. Nothing is ever freed.
 */
export interface Arena {
  base: string;
  cursor: string;
}

/** 512 KiB of aggregate storage per program. */
export const ARENA_QWORDS = 65536;

export function createContext(): CompileContext {
  return {
    globals: new Map(),
    taken: new Set(),
    functions: new Map(),
    externs: new Set(),
    data: [],
    strings: new Map(),
    labelCounter: 0,
  };
}

/**
 * Reserve one sequence number for a set of label prefixes and return it, so that
 * `freshId(ctx, ['else', 'end'])` yielding 4 reserves `else_4` and `end_4`.
 */
export function freshId(ctx: CompileContext, prefixes: readonly string[]): number {
  for (;;) {
    const n = ctx.labelCounter++;
    const names = prefixes.map((p) => `${p}_${n}`);
    if (names.some((name) => ctx.taken.has(name))) continue;
    for (const name of names) ctx.taken.add(name);
    return n;
  }
}

/**
 * Claim `base`, or `base_1`, `base_2`... when it is already taken.
 *
 * Function names and externs are reserved before any function is lowered, so a symbol claimed here
 * can never be defined a second time later in the unit.
 */
export function uniqueSymbol(ctx: CompileContext, base: string): string {
  let name = base;
  for (let n = 1; ctx.taken.has(name); n++) name = `${base}_${n}`;
  ctx.taken.add(name);
  return name;
}

/**
 * `.bss` symbol of a global variable, `g_<name>` unless a function or extern already owns that.
 */
export function globalSymbol(ctx: CompileContext, name: string): string {
  const existing = ctx.globals.get(name);
  if (existing !== undefined) return existing;
  const symbol = uniqueSymbol(ctx, `g_${name}`);
  ctx.globals.set(name, symbol);
  return symbol;
}

export function internString(ctx: CompileContext, value: string): string {
  const existing = ctx.strings.get(value);
  if (existing !== undefined) return existing;
  const name = `str_${freshId(ctx, ['str'])}`;
  ctx.strings.set(value, name);
  ctx.data.push({ kind: 'string', name, value });
  return name;
}

export function arenaOf(ctx: CompileContext): Arena {
  if (ctx.arena) return ctx.arena;
  const arena = { base: uniqueSymbol(ctx, 'heap'), cursor: uniqueSymbol(ctx, 'heap_next') };
  ctx.data.push({ kind: 'reserve', name: arena.base, qwords: ARENA_QWORDS });
  ctx.data.push({ kind: 'reserve', name: arena.cursor, qwords: 1 });
  ctx.arena = arena;
  return arena;
}
