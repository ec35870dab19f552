import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { LoweredProgram } from './lowering/unit.js';
import type { OptimizeOptions } from './optimize/pass.js';

/**
 * Options that influence lowering, optimization and which artifacts are produced.
 */
export interface CompilerOptions {
  /**
   * Zero-parameter function called by a generated `_start` stub, whose result becomes the process
   * exit status. Without it the listing has no process entry point.
   */
  entry?: string;
  /** Optimization pass toggles; `false` disables every pass. */
  optimize?: OptimizeOptions | false;
  /** Emit the `.asm` listing artifact (default true). */
  emitAsm?: boolean;
  /** Annotate each function in the listing with its parameter and local counts. */
  unitComments?: boolean;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 *
 * `program` is the optimized lowering result; it is absent whenever an error was reported.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
  program?: LoweredProgram;
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
