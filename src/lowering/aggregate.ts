import type {
  AttributeAccessNode,
  DictLiteralNode,
  ExpressionNode,
  ListLiteralNode,
  SubscriptNode,
} from '../frontend/ast.js';
import { SLOT_SIZE } from '../semantics/scope.js';
import { arenaOf, freshId, internString } from './context.js';
import type { Operand } from './instructions.js';
import { addr, data, imm, ins, label, reg } from './instructions.js';
import type { ExprLowerer, FunctionState, OperandsLowerer } from './state.js';
import { defineLabel, emit } from './state.js';

const rax = reg('rax');
const rcx = reg('rcx');
const top: Operand = { kind: 'Mem', base: 'rsp', offset: 0 };

/**
 * Bump-allocate `qwords` from the arena, store `count` in the first qword and push the region
 * address. Every evaluation gets a fresh region.
 */
function allocate(fx: FunctionState, qwords: number, count: number): void {
  const arena = arenaOf(fx.ctx);
  emit(
    fx,
    ins('mov', rcx, data(arena.cursor)),
    ins('lea', rax, addr(arena.base)),
    ins('add', rax, rcx),
    ins('add', rcx, imm(SLOT_SIZE * qwords)),
    ins('mov', data(arena.cursor), rcx),
    ins('mov', { kind: 'Mem', base: 'rax', offset: 0 }, imm(count)),
    ins('push', rax),
  );
}

/** Lower `value` and store it at `offset` inside the region on top of the stack. */
function storeField(
  fx: FunctionState,
  value: ExpressionNode,
  path: string,
  offset: number,
  lowerExpr: ExprLowerer,
): void {
  lowerExpr(fx, value, path);
  emit(fx, ins('mov', rcx, top), ins('mov', { kind: 'Mem', base: 'rcx', offset }, rax));
}

/**
 * `[e0, e1, ...]` -> an arena region of `count + 1` qwords: the count, then each element in order.
 * Leaves the region address in the accumulator.
 */
export function lowerListLiteral(
  fx: FunctionState,
  node: ListLiteralNode,
  path: string,
  lowerExpr: ExprLowerer,
): void {
  const count = node.elements.length;
  emit(fx, { kind: 'comment', text: `list literal, ${count} element(s)` });
  allocate(fx, count + 1, count);
  node.elements.forEach((element, i) => {
    storeField(fx, element, `${path}.elements[${i}]`, SLOT_SIZE * (i + 1), lowerExpr);
  });
  emit(fx, ins('pop', rax));
}

/**
 * `{k0: v0, ...}` -> an arena pair list of `2 * count + 1` qwords: the count, then key/value slots
 * in source order. Duplicate keys each keep their own pair.
 */
export function lowerDictLiteral(
  fx: FunctionState,
  node: DictLiteralNode,
  path: string,
  lowerExpr: ExprLowerer,
): void {
  const count = node.keys.length;
  emit(fx, { kind: 'comment', text: `dict literal, ${count} pair(s)` });
  allocate(fx, 2 * count + 1, count);
  node.keys.forEach((key, i) => {
    const value = node.values[i];
    if (value === undefined) return;
    const pairOffset = SLOT_SIZE + 2 * SLOT_SIZE * i;
    storeField(fx, key, `${path}.keys[${i}]`, pairOffset, lowerExpr);
    storeField(fx, value, `${path}.values[${i}]`, pairOffset + SLOT_SIZE, lowerExpr);
  });
  emit(fx, ins('pop', rax));
}

/**
 * `list[index]`; no bounds check, an index outside the list faults at run time.
 */
export function lowerSubscript(
  fx: FunctionState,
  node: SubscriptNode,
  path: string,
  lowerOperands: OperandsLowerer,
): void {
  lowerOperands(fx, node.value, node.index, path, 'value', 'index');
  emit(
    fx,
    ins('mov', rax, { kind: 'Mem', base: 'rax', index: 'rcx', scale: 8, offset: SLOT_SIZE }),
  );
}

/**
 * `pairs.attr`: scans the pair list from the last pair to the first for the interned key `attr`,
 * so the last-listed duplicate wins. A miss yields 0.
 */
export function lowerAttributeAccess(
  fx: FunctionState,
  node: AttributeAccessNode,
  path: string,
  lowerExpr: ExprLowerer,
): void {
  lowerExpr(fx, node.value, `${path}.value`);
  const key = internString(fx.ctx, node.attr);
  const n = freshId(fx.ctx, ['scan', 'miss', 'end']);
  const scanLabel = `scan_${n}`;
  const missLabel = `miss_${n}`;
  const endLabel = `end_${n}`;
  const rsi = reg('rsi');

  emit(
    fx,
    ins('mov', rcx, { kind: 'Mem', base: 'rax', offset: 0 }),
    ins('lea', reg('rdx'), addr(key)),
  );
  defineLabel(fx, scanLabel);
  emit(
    fx,
    ins('cmp', rcx, imm(0)),
    ins('je', label(missLabel)),
    ins('sub', rcx, imm(1)),
    ins('mov', rsi, rcx),
    ins('shl', rsi, imm(4)),
    ins('add', rsi, rax),
    ins('cmp', { kind: 'Mem', base: 'rsi', offset: SLOT_SIZE }, reg('rdx')),
    ins('jne', label(scanLabel)),
    ins('mov', rax, { kind: 'Mem', base: 'rsi', offset: 2 * SLOT_SIZE }),
    ins('jmp', label(endLabel)),
  );
  defineLabel(fx, missLabel);
  emit(fx, ins('mov', rax, imm(0)));
  defineLabel(fx, endLabel);
}
