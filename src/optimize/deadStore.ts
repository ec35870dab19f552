import type { Instruction, Line } from '../lowering/instructions.js';
import { isJump } from '../lowering/instructions.js';
import type { OptimizationPass } from './pass.js';

type Flow = { succ: number[] } | { unknownTarget: true };

function slotStore(i: Instruction): number | undefined {
  const [dst] = i.operands;
  if (i.mnemonic === 'mov' && dst?.kind === 'Slot') return dst.offset;
  return undefined;
}

function slotUses(i: Instruction): number[] {
  const store = slotStore(i) !== undefined;
  return i.operands
    .filter((_, idx) => !(store && idx === 0))
    .flatMap((op) => (op.kind === 'Slot' ? [op.offset] : []));
}

function successors(lines: readonly Line[], at: number, labels: Map<string, number>): Flow {
  const line = lines[at];
  const next = at + 1 < lines.length ? [at + 1] : [];
  if (line?.kind !== 'instruction') return { succ: next };
  if (line.mnemonic === 'ret') return { succ: [] };
  if (!isJump(line.mnemonic)) return { succ: next };

  const [target] = line.operands;
  const to = target?.kind === 'Label' ? labels.get(target.name) : undefined;
  if (to === undefined) return { unknownTarget: true };
  return { succ: line.mnemonic === 'jmp' ? [to] : [to, ...next] };
}

/**
 * Remove stores to frame slots that are never read before being overwritten or before the function
 * returns.
 *
 * Liveness is computed per line over the unit's control flow (jumps, conditional jumps, `ret`).
 * Global and aggregate stores are left alone; they are visible outside the function.
 */
export function eliminateDeadStores(lines: readonly Line[]): Line[] {
  const labels = new Map<string, number>();
  lines.forEach((line, i) => {
    if (line.kind === 'label') labels.set(line.name, i);
  });

  const flows: number[][] = [];
  for (let i = 0; i < lines.length; i++) {
    const flow = successors(lines, i, labels);
    // A jump out of the unit could reach code that reads anything; keep every store.
    if ('unknownTarget' in flow) return [...lines];
    flows.push(flow.succ);
  }

  const liveIn: Set<number>[] = lines.map(() => new Set());
  const liveOut: Set<number>[] = lines.map(() => new Set());
  let changed = true;
  while (changed) {
    changed = false;
    for (let i = lines.length - 1; i >= 0; i--) {
      const out = new Set<number>();
      for (const s of flows[i] ?? []) {
        for (const v of liveIn[s] ?? []) out.add(v);
      }
      const line = lines[i];
      const inSet = new Set(out);
      if (line?.kind === 'instruction') {
        const def = slotStore(line);
        if (def !== undefined) inSet.delete(def);
        for (const use of slotUses(line)) inSet.add(use);
      }
      if (inSet.size !== liveIn[i]?.size || out.size !== liveOut[i]?.size) changed = true;
      liveIn[i] = inSet;
      liveOut[i] = out;
    }
  }

  return lines.filter((line, i) => {
    if (line.kind !== 'instruction') return true;
    const def = slotStore(line);
    return def === undefined || (liveOut[i]?.has(def) ?? true);
  });
}

export const deadStorePass: OptimizationPass = {
  name: 'dead-store-elimination',
  run: eliminateDeadStores,
};
