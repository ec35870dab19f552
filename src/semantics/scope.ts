import type { CompileContext } from '../lowering/context.js';
import { globalSymbol } from '../lowering/context.js';

/**
 * Names that lower to an immediate and never get storage.
 */
export const BUILTIN_CONSTANTS: ReadonlyMap<string, number> = new Map([
  ['True', 1],
  ['False', 0],
  ['None', 0],
]);

/** Size in bytes of one frame slot. */
export const SLOT_SIZE = 8;

/**
 * Locals of one function: identifier -> frame offset relative to `rbp`.
 *
 * Parameters sit above the saved frame pointer and return address (positive offsets); locals are
 * allocated downward from `rbp - 8` in first-assignment order.
 */
export interface Scope {
  owner: string;
  locals: Map<string, number>;
  /** Number of non-parameter locals allocated so far. */
  localCount: number;
}

export type NameResolution =
  | { kind: 'BuiltinConstant'; value: number }
  | { kind: 'Local'; offset: number }
  | { kind: 'Global'; name: string; symbol: string };

export function createScope(owner: string, params: readonly string[]): Scope {
  const scope: Scope = { owner, locals: new Map(), localCount: 0 };
  params.forEach((p, i) => {
    // Arguments are pushed left to right, so the last one is nearest the return address.
    scope.locals.set(p, 2 * SLOT_SIZE + SLOT_SIZE * (params.length - 1 - i));
  });
  return scope;
}

/**
 * Make `name` local to the scope (idempotent) and return its frame offset.
 */
export function declareLocal(scope: Scope, name: string): number {
  const existing = scope.locals.get(name);
  if (existing !== undefined) return existing;
  scope.localCount++;
  const offset = -SLOT_SIZE * scope.localCount;
  scope.locals.set(name, offset);
  return offset;
}

/**
 * Classify a name reference.
 *
 * A name that is neither builtin, local nor already global is promoted to a global on first sight;
 * an unresolved name is never an error.
 */
export function resolveName(ctx: CompileContext, scope: Scope, name: string): NameResolution {
  const builtin = BUILTIN_CONSTANTS.get(name);
  if (builtin !== undefined) return { kind: 'BuiltinConstant', value: builtin };
  const offset = scope.locals.get(name);
  if (offset !== undefined) return { kind: 'Local', offset };
  return { kind: 'Global', name, symbol: globalSymbol(ctx, name) };
}
