import type { DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { BaseNode, ExpressionNode } from '../frontend/ast.js';
import type { Scope } from '../semantics/scope.js';
import type { CompileContext } from './context.js';
import type { Line } from './instructions.js';

/**
 * Mutable state while lowering one function body.
 */
export interface FunctionState {
  ctx: CompileContext;
  scope: Scope;
  lines: Line[];
}

export type ExprLowerer = (fx: FunctionState, node: ExpressionNode, path: string) => void;

/** Lowers two operands into accumulator (left) and scratch (right). */
export type OperandsLowerer = (
  fx: FunctionState,
  left: ExpressionNode,
  right: ExpressionNode,
  path: string,
  leftKey?: string,
  rightKey?: string,
) => void;

/**
 * Hard lowering failure. Aborts the whole compilation unit; the program driver turns it into a
 * diagnostic.
 */
export class LoweringError extends Error {
  constructor(
    readonly id: DiagnosticId,
    message: string,
    readonly path: string,
    readonly node?: BaseNode,
  ) {
    super(message);
    this.name = 'LoweringError';
  }
}

export function unsupported(node: BaseNode, path: string, message: string): never {
  throw new LoweringError(DiagnosticIds.UnsupportedConstruct, message, path, node);
}

/**
 * Name the kind of a value that escaped an exhaustive switch (only reachable with unchecked input).
 */
export function kindOf(node: never): string {
  const raw: unknown = node;
  if (typeof raw === 'object' && raw !== null && 'kind' in raw) return String(raw.kind);
  return typeof raw;
}

export function emit(fx: FunctionState, ...lines: Line[]): void {
  fx.lines.push(...lines);
}

export function defineLabel(fx: FunctionState, name: string): void {
  fx.lines.push({ kind: 'label', name });
}
