import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { FunctionDefNode } from './frontend/ast.js';
import { readTree } from './frontend/reader.js';
import type { Artifact } from './formats/types.js';
import { lowerProgram } from './lowering/emit.js';
import { optimizeProgram, selectPasses } from './optimize/pass.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

/**
 * Lower, optimize and render an already-read tree.
 *
 * `file` only labels diagnostics.
 */
export function compileTree(
  functions: readonly FunctionDefNode[],
  file: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  const lowered = lowerProgram(functions, file, diagnostics, {
    ...(options.entry !== undefined ? { entry: options.entry } : {}),
  });
  if (!lowered || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const passes = options.optimize === false ? [] : selectPasses(options.optimize);
  const program = optimizeProgram(lowered, passes);

  const artifacts: Artifact[] = [];
  if (options.emitAsm ?? true) {
    artifacts.push(
      deps.formats.writeAsm(program, {
        ...(options.unitComments !== undefined ? { unitComments: options.unitComments } : {}),
      }),
    );
  }
  return { diagnostics, artifacts, program };
}

/**
 * Compile a JSON tree file (an array of top-level `FunctionDef` nodes) into an x86-64 listing.
 *
 * Artifacts are produced in memory via `deps.formats`; nothing is written to disk.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  const diagnostics: Diagnostic[] = [];

  let text: string;
  try {
    text = await readFile(entryPath, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read input tree: ${String(err)}`,
      file: entryPath,
    });
    return { diagnostics, artifacts: [] };
  }

  const functions = readTree(entryPath, text, diagnostics);
  if (!functions || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const res = compileTree(functions, entryPath, options, deps);
  return { ...res, diagnostics: [...diagnostics, ...res.diagnostics] };
};
