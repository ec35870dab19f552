import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  BinaryOpNode,
  BinaryOperator,
  CallNode,
  CompareNode,
  CompareOperator,
  ConstantNode,
  ExpressionNode,
  NameRefNode,
} from '../frontend/ast.js';
import { resolveName, SLOT_SIZE } from '../semantics/scope.js';
import {
  lowerAttributeAccess,
  lowerDictLiteral,
  lowerListLiteral,
  lowerSubscript,
} from './aggregate.js';
import { freshId, internString } from './context.js';
import type { Mnemonic } from './instructions.js';
import { ACCUMULATOR, addr, data, imm, ins, label, reg, SCRATCH, slot } from './instructions.js';
import type { FunctionState } from './state.js';
import { defineLabel, emit, kindOf, LoweringError, unsupported } from './state.js';

const rax = reg(ACCUMULATOR);
const rcx = reg(SCRATCH);

const compareJumps: Record<CompareOperator, Mnemonic> = {
  Gt: 'jg',
  Lt: 'jl',
  Eq: 'je',
  GtE: 'jge',
  LtE: 'jle',
  NotEq: 'jne',
};

function lowerConstant(fx: FunctionState, node: ConstantNode): void {
  const { value } = node;
  if (typeof value === 'string') {
    emit(fx, ins('lea', rax, addr(internString(fx.ctx, value))));
    return;
  }
  if (typeof value === 'boolean') {
    emit(fx, ins('mov', rax, imm(value ? 1 : 0)));
    return;
  }
  emit(fx, ins('mov', rax, imm(value ?? 0)));
}

function lowerNameRef(fx: FunctionState, node: NameRefNode): void {
  const resolved = resolveName(fx.ctx, fx.scope, node.name);
  switch (resolved.kind) {
    case 'BuiltinConstant':
      emit(fx, ins('mov', rax, imm(resolved.value)));
      return;
    case 'Local':
      emit(fx, ins('mov', rax, slot(resolved.offset)));
      return;
    case 'Global':
      emit(fx, ins('mov', rax, data(resolved.symbol)));
      return;
  }
}

/**
 * Evaluate `left` then `right`, leaving left in the accumulator and right in the scratch register.
 *
 * The left value is spilled to the stack while `right` is lowered, so nested right operands cannot
 * clobber it.
 */
export function lowerOperands(
  fx: FunctionState,
  left: ExpressionNode,
  right: ExpressionNode,
  path: string,
  leftKey = 'left',
  rightKey = 'right',
): void {
  lowerExpr(fx, left, `${path}.${leftKey}`);
  emit(fx, ins('push', rax));
  lowerExpr(fx, right, `${path}.${rightKey}`);
  emit(fx, ins('mov', rcx, rax), ins('pop', rax));
}

/**
 * Combine accumulator (left) and scratch (right) into the accumulator.
 */
export function applyBinaryOperator(fx: FunctionState, op: BinaryOperator): void {
  switch (op) {
    case 'Add':
      emit(fx, ins('add', rax, rcx));
      return;
    case 'Sub':
      emit(fx, ins('sub', rax, rcx));
      return;
    case 'Mult':
      emit(fx, ins('imul', rax, rcx));
      return;
    case 'Div':
      emit(fx, ins('cqo'), ins('idiv', rcx));
      return;
    case 'Mod':
      emit(fx, ins('cqo'), ins('idiv', rcx), ins('mov', rax, reg('rdx')));
      return;
  }
}

function lowerBinaryOp(fx: FunctionState, node: BinaryOpNode, path: string): void {
  lowerOperands(fx, node.left, node.right, path);
  applyBinaryOperator(fx, node.op);
}

function lowerCompare(fx: FunctionState, node: CompareNode, path: string): void {
  lowerOperands(fx, node.left, node.right, path);
  const n = freshId(fx.ctx, ['true', 'false', 'end']);
  const trueLabel = `true_${n}`;
  const falseLabel = `false_${n}`;
  const endLabel = `end_${n}`;
  emit(
    fx,
    ins('cmp', rax, rcx),
    ins(compareJumps[node.op], label(trueLabel)),
    ins('jmp', label(falseLabel)),
  );
  defineLabel(fx, trueLabel);
  emit(fx, ins('mov', rax, imm(1)), ins('jmp', label(endLabel)));
  defineLabel(fx, falseLabel);
  emit(fx, ins('mov', rax, imm(0)));
  defineLabel(fx, endLabel);
}

function lowerCall(fx: FunctionState, node: CallNode, path: string): void {
  const arity = fx.ctx.functions.get(node.callee);
  if (arity === undefined) {
    fx.ctx.externs.add(node.callee);
  } else if (arity !== node.args.length) {
    throw new LoweringError(
      DiagnosticIds.ArityMismatch,
      `Function "${node.callee}" takes ${arity} argument(s) but is called with ${node.args.length}.`,
      path,
      node,
    );
  }
  node.args.forEach((arg, i) => {
    lowerExpr(fx, arg, `${path}.args[${i}]`);
    emit(fx, ins('push', rax));
  });
  emit(fx, ins('call', label(node.callee)));
  if (node.args.length > 0) {
    emit(fx, ins('add', reg('rsp'), imm(SLOT_SIZE * node.args.length)));
  }
}

/**
 * Lower an expression so that its value ends up in the accumulator (`rax`).
 */
export function lowerExpr(fx: FunctionState, node: ExpressionNode, path: string): void {
  switch (node.kind) {
    case 'Constant':
      return lowerConstant(fx, node);
    case 'NameRef':
      return lowerNameRef(fx, node);
    case 'BinaryOp':
      return lowerBinaryOp(fx, node, path);
    case 'Compare':
      return lowerCompare(fx, node, path);
    case 'Call':
      return lowerCall(fx, node, path);
    case 'ListLiteral':
      return lowerListLiteral(fx, node, path, lowerExpr);
    case 'DictLiteral':
      return lowerDictLiteral(fx, node, path, lowerExpr);
    case 'Subscript':
      return lowerSubscript(fx, node, path, lowerOperands);
    case 'AttributeAccess':
      return lowerAttributeAccess(fx, node, path, lowerExpr);
    default:
      return unsupported(node, path, `No lowering rule for expression kind "${kindOf(node)}".`);
  }
}
