import type { LoweredProgram } from '../lowering/unit.js';

/**
 * Options for `.asm` listing emission.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Emit a `; <name>: params=N locals=M` comment above each function.
   */
  unitComments?: boolean;
}

/**
 * In-memory `.asm` listing artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact;

/**
 * Format writers used by the pipeline to turn lowered programs into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: LoweredProgram, opts?: WriteAsmOptions): AsmArtifact;
}
