import { DiagnosticIds } from '../diagnostics/types.js';
import type {
  AssignNode,
  AugAssignNode,
  FunctionDefNode,
  ReturnNode,
  StatementNode,
} from '../frontend/ast.js';
import { BUILTIN_CONSTANTS, createScope, declareLocal, SLOT_SIZE } from '../semantics/scope.js';
import type { CompileContext } from './context.js';
import { lowerIf, lowerWhile } from './control.js';
import { applyBinaryOperator, lowerExpr } from './expr.js';
import type { Instruction, Line } from './instructions.js';
import { imm, ins, reg, slot } from './instructions.js';
import type { FunctionState } from './state.js';
import { emit, kindOf, LoweringError, unsupported } from './state.js';
import type { CompiledUnit } from './unit.js';

const rax = reg('rax');
const rbp = reg('rbp');
const rsp = reg('rsp');

function epilogue(): Instruction[] {
  return [ins('mov', rsp, rbp), ins('pop', rbp), ins('ret')];
}

function declareTarget(fx: FunctionState, node: AssignNode | AugAssignNode, path: string): number {
  if (BUILTIN_CONSTANTS.has(node.target)) {
    throw new LoweringError(
      DiagnosticIds.UnsupportedConstruct,
      `Cannot assign to builtin constant "${node.target}".`,
      `${path}.target`,
      node,
    );
  }
  return declareLocal(fx.scope, node.target);
}

function lowerAssign(fx: FunctionState, node: AssignNode, path: string): void {
  // The target is local before the value is lowered, so `x = x + 1` reads the local `x`.
  const offset = declareTarget(fx, node, path);
  lowerExpr(fx, node.value, `${path}.value`);
  emit(fx, ins('mov', slot(offset), rax));
}

function lowerAugAssign(fx: FunctionState, node: AugAssignNode, path: string): void {
  if (!BUILTIN_CONSTANTS.has(node.target) && !fx.scope.locals.has(node.target)) {
    throw new LoweringError(
      DiagnosticIds.UnsupportedConstruct,
      `Augmented assignment to "${node.target}" before it is assigned.`,
      `${path}.target`,
      node,
    );
  }
  const offset = declareTarget(fx, node, path);
  emit(fx, ins('mov', rax, slot(offset)), ins('push', rax));
  lowerExpr(fx, node.value, `${path}.value`);
  emit(fx, ins('mov', reg('rcx'), rax), ins('pop', rax));
  applyBinaryOperator(fx, node.op);
  emit(fx, ins('mov', slot(offset), rax));
}

function lowerReturn(fx: FunctionState, node: ReturnNode, path: string): void {
  if (node.value) {
    lowerExpr(fx, node.value, `${path}.value`);
  } else {
    emit(fx, ins('mov', rax, imm(0)));
  }
  emit(fx, ...epilogue());
}

function lowerStatement(fx: FunctionState, node: StatementNode, path: string): void {
  switch (node.kind) {
    case 'Assign':
      return lowerAssign(fx, node, path);
    case 'AugAssign':
      return lowerAugAssign(fx, node, path);
    case 'Return':
      return lowerReturn(fx, node, path);
    case 'If':
      return lowerIf(fx, node, path, lowerExpr, lowerBody);
    case 'While':
      return lowerWhile(fx, node, path, lowerExpr, lowerBody);
    case 'ExprStatement':
      return lowerExpr(fx, node.value, `${path}.value`);
    case 'FunctionDef':
      return unsupported(node, path, `Nested function "${node.name}" is not supported.`);
    default:
      return unsupported(node, path, `No lowering rule for statement kind "${kindOf(node)}".`);
  }
}

function lowerBody(fx: FunctionState, body: readonly StatementNode[], path: string): void {
  body.forEach((stmt, i) => lowerStatement(fx, stmt, `${path}[${i}]`));
}

/**
 * Lower one top-level function into a {@link CompiledUnit}.
 *
 * Starts from an empty local scope. The frame size is only known once the body has been walked, so
 * the prologue is prepended afterwards. A fallthrough epilogue always closes the unit, even when
 * the last statement already returned.
 */
export function lowerFunction(
  ctx: CompileContext,
  node: FunctionDefNode,
  path: string,
): CompiledUnit {
  const fx: FunctionState = { ctx, scope: createScope(node.name, node.params), lines: [] };
  lowerBody(fx, node.body, `${path}.body`);

  const prologue: Line[] = [{ kind: 'label', name: node.name }, ins('push', rbp), ins('mov', rbp, rsp)];
  if (fx.scope.localCount > 0) {
    prologue.push(ins('sub', rsp, imm(SLOT_SIZE * fx.scope.localCount)));
  }

  return {
    name: node.name,
    paramCount: node.params.length,
    localCount: fx.scope.localCount,
    lines: [...prologue, ...fx.lines, ...epilogue()],
  };
}
