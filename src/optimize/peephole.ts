import type { Instruction, Line, Operand } from '../lowering/instructions.js';
import { ins, isMemory, reg, sameOperand } from '../lowering/instructions.js';
import type { OptimizationPass } from './pass.js';

function isInstr(line: Line | undefined): line is Instruction {
  return line?.kind === 'instruction';
}

function isReg(op: Operand | undefined, name: string): boolean {
  return op?.kind === 'Reg' && op.name === name;
}

function movOperands(line: Line | undefined): [Operand, Operand] | undefined {
  if (!isInstr(line) || line.mnemonic !== 'mov') return undefined;
  const [dst, src] = line.operands;
  return dst && src ? [dst, src] : undefined;
}

/**
 * Operand that can be loaded straight into the scratch register: it does not depend on `rax` or
 * the stack pointer.
 */
function isDirectSource(op: Operand): boolean {
  return op.kind === 'Imm' || op.kind === 'Slot' || op.kind === 'Data';
}

/** `mov X, rax` ; `mov rax, X`  ->  `mov X, rax` */
function dropReload(lines: readonly Line[], i: number): Line[] | undefined {
  const store = movOperands(lines[i]);
  const load = movOperands(lines[i + 1]);
  if (!store || !load) return undefined;
  const [storeDst, storeSrc] = store;
  const [loadDst, loadSrc] = load;
  if (!isMemory(storeDst) || !isReg(storeSrc, 'rax')) return undefined;
  if (!isReg(loadDst, 'rax') || !sameOperand(storeDst, loadSrc)) return undefined;
  const kept = lines[i];
  return kept ? [kept] : undefined;
}

/**
 * `push rax` ; `mov rax, S` ; `mov rcx, rax` ; `pop rax`  ->  `mov rcx, S`
 * (and the same through `lea` for symbol addresses).
 */
function loadScratchDirectly(lines: readonly Line[], i: number): Line[] | undefined {
  const [push, load, move, pop] = lines.slice(i, i + 4);
  if (!isInstr(push) || push.mnemonic !== 'push' || !isReg(push.operands[0], 'rax')) return undefined;
  if (!isInstr(pop) || pop.mnemonic !== 'pop' || !isReg(pop.operands[0], 'rax')) return undefined;
  const moved = movOperands(move);
  if (!moved || !isReg(moved[0], 'rcx') || !isReg(moved[1], 'rax')) return undefined;
  if (!isInstr(load) || !isReg(load.operands[0], 'rax')) return undefined;
  const src = load.operands[1];
  if (!src) return undefined;
  if (load.mnemonic === 'mov' && isDirectSource(src)) return [ins('mov', reg('rcx'), src)];
  if (load.mnemonic === 'lea' && src.kind === 'Addr') return [ins('lea', reg('rcx'), src)];
  return undefined;
}

/** `mov r, r`  ->  nothing */
function dropSelfMove(lines: readonly Line[], i: number): Line[] | undefined {
  const moved = movOperands(lines[i]);
  if (!moved || moved[0].kind !== 'Reg') return undefined;
  return sameOperand(moved[0], moved[1]) ? [] : undefined;
}

/** `jmp L` directly followed by a run of labels that includes `L`  ->  nothing */
function dropJumpToNext(lines: readonly Line[], i: number): Line[] | undefined {
  const jump = lines[i];
  if (!isInstr(jump) || jump.mnemonic !== 'jmp') return undefined;
  const [target] = jump.operands;
  if (target?.kind !== 'Label') return undefined;
  for (let j = i + 1; j < lines.length; j++) {
    const line = lines[j];
    if (line?.kind !== 'label') return undefined;
    if (line.name === target.name) return [];
  }
  return undefined;
}

type Rule = {
  /** Number of consecutive instructions the rule replaces. */
  width: number;
  apply: (lines: readonly Line[], i: number) => Line[] | undefined;
};

const rules: Rule[] = [
  { width: 1, apply: dropJumpToNext },
  { width: 1, apply: dropSelfMove },
  { width: 2, apply: dropReload },
  { width: 4, apply: loadScratchDirectly },
];

/**
 * Windows never span a label: a labelled instruction may be reached from elsewhere.
 */
function windowIsStraight(lines: readonly Line[], i: number, width: number): boolean {
  if (i + width > lines.length) return false;
  return lines.slice(i, i + width).every((line) => line.kind === 'instruction');
}

/**
 * Rewrite recognized short instruction windows into shorter equivalents, repeating until no rule
 * applies.
 */
export function rewritePeepholes(input: readonly Line[]): Line[] {
  let lines = [...input];
  let changed = true;
  while (changed) {
    changed = false;
    const out: Line[] = [];
    let i = 0;
    while (i < lines.length) {
      let replaced = false;
      for (const rule of rules) {
        if (!windowIsStraight(lines, i, rule.width)) continue;
        const replacement = rule.apply(lines, i);
        if (replacement === undefined) continue;
        out.push(...replacement);
        i += rule.width;
        replaced = true;
        changed = true;
        break;
      }
      if (!replaced) {
        const line = lines[i];
        if (line) out.push(line);
        i++;
      }
    }
    lines = out;
  }
  return lines;
}

export const peepholePass: OptimizationPass = {
  name: 'peephole',
  run: rewritePeepholes,
};
