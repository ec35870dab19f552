import type { Line } from '../lowering/instructions.js';
import type { CompiledUnit, LoweredProgram } from '../lowering/unit.js';
import { deadStorePass } from './deadStore.js';
import { peepholePass } from './peephole.js';

/**
 * A pure transform over one unit's line sequence. Passes must preserve what the program computes;
 * returning the input unchanged is always valid.
 */
export interface OptimizationPass {
  name: string;
  run(lines: readonly Line[]): Line[];
}

export interface OptimizeOptions {
  /** Run dead-store elimination (default true). */
  deadStores?: boolean;
  /** Run peephole rewriting (default true). */
  peephole?: boolean;
}

/**
 * Passes in their fixed order: dead-store elimination, then peephole rewriting.
 */
export function selectPasses(options: OptimizeOptions = {}): OptimizationPass[] {
  const passes: OptimizationPass[] = [];
  if (options.deadStores ?? true) passes.push(deadStorePass);
  if (options.peephole ?? true) passes.push(peepholePass);
  return passes;
}

export function optimizeUnit(unit: CompiledUnit, passes: readonly OptimizationPass[]): CompiledUnit {
  const lines = passes.reduce<readonly Line[]>((acc, pass) => pass.run(acc), unit.lines);
  return { ...unit, lines: Object.freeze([...lines]) };
}

export function optimizeProgram(
  program: LoweredProgram,
  passes: readonly OptimizationPass[],
): LoweredProgram {
  return { ...program, units: program.units.map((unit) => optimizeUnit(unit, passes)) };
}
