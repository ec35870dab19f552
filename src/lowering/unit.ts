import type { DataDecl } from './context.js';
import type { Line } from './instructions.js';

/**
 * Instruction sequence for one function plus the metadata the listing needs.
 */
export interface CompiledUnit {
  readonly name: string;
  readonly paramCount: number;
  /** Frame slots reserved below `rbp` (parameters excluded). */
  readonly localCount: number;
  readonly lines: readonly Line[];
}

export interface GlobalDecl {
  readonly name: string;
  /** `.bss` label holding the value. */
  readonly symbol: string;
}

/**
 * Everything lowered from one input tree, ready for optimization and text emission.
 */
export interface LoweredProgram {
  readonly units: readonly CompiledUnit[];
  /** Names auto-promoted to globals, in first-seen order. */
  readonly globals: readonly GlobalDecl[];
  readonly data: readonly DataDecl[];
  readonly externs: readonly string[];
  /** Name of the process entry stub unit, when one was requested. */
  readonly entry?: string;
}
