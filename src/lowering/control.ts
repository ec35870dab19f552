import type { IfNode, StatementNode, WhileNode } from '../frontend/ast.js';
import { freshId } from './context.js';
import { ins, label, reg } from './instructions.js';
import type { ExprLowerer, FunctionState } from './state.js';
import { defineLabel, emit } from './state.js';

export type BodyLowerer = (
  fx: FunctionState,
  body: readonly StatementNode[],
  path: string,
) => void;

/**
 * Branch to `target` when the accumulator holds zero (false).
 */
function emitJumpIfFalse(fx: FunctionState, target: string): void {
  emit(fx, ins('test', reg('rax'), reg('rax')), ins('jz', label(target)));
}

/**
 * if/else:
 *
 * ```
 * if_N:    <test>; jz else_N
 *          <then>; jmp end_N
 * else_N:  <else>
 * end_N:
 * ```
 */
export function lowerIf(
  fx: FunctionState,
  node: IfNode,
  path: string,
  lowerExpr: ExprLowerer,
  lowerBody: BodyLowerer,
): void {
  const n = freshId(fx.ctx, ['if', 'else', 'end']);
  const elseLabel = `else_${n}`;
  const endLabel = `end_${n}`;

  defineLabel(fx, `if_${n}`);
  lowerExpr(fx, node.test, `${path}.test`);
  emitJumpIfFalse(fx, elseLabel);
  lowerBody(fx, node.body, `${path}.body`);
  emit(fx, ins('jmp', label(endLabel)));
  defineLabel(fx, elseLabel);
  lowerBody(fx, node.orelse, `${path}.orelse`);
  defineLabel(fx, endLabel);
}

/**
 * while:
 *
 * ```
 * loop_N:  <test>; jz end_N
 *          <body>; jmp loop_N
 * end_N:
 * ```
 */
export function lowerWhile(
  fx: FunctionState,
  node: WhileNode,
  path: string,
  lowerExpr: ExprLowerer,
  lowerBody: BodyLowerer,
): void {
  const n = freshId(fx.ctx, ['loop', 'end']);
  const loopLabel = `loop_${n}`;
  const endLabel = `end_${n}`;

  defineLabel(fx, loopLabel);
  lowerExpr(fx, node.test, `${path}.test`);
  emitJumpIfFalse(fx, endLabel);
  lowerBody(fx, node.body, `${path}.body`);
  emit(fx, ins('jmp', label(loopLabel)));
  defineLabel(fx, endLabel);
}
