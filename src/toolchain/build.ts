import { execFile } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs one external command to completion. Resolves with its exit status; rejects only when the
 * command could not be started.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export interface ToolchainOptions {
  /** Assembler executable (default `nasm`). */
  assembler?: string;
  /** Object format passed as `-f` (default `elf64`). */
  format?: string;
  /** Linker executable (default `ld`). */
  linker?: string;
}

export interface BuildResult<T> {
  diagnostics: Diagnostic[];
  /** Value returned by the `use` callback; absent when the build failed. */
  value?: T;
}

/**
 * Default runner backed by `child_process.execFile`.
 */
export const execRunner: CommandRunner = (command, args) =>
  new Promise((resolveRun, rejectRun) => {
    execFile(command, args, { encoding: 'utf8' }, (err, stdout, stderr) => {
      if (!err) {
        resolveRun({ code: 0, stdout, stderr });
        return;
      }
      if (typeof err.code === 'number') {
        resolveRun({ code: err.code, stdout, stderr });
        return;
      }
      rejectRun(err);
    });
  });

function describeFailure(step: string, command: string, res: CommandResult): string {
  const output = [res.stderr.trim(), res.stdout.trim()].filter((s) => s.length > 0).join('\n');
  const detail = output.length > 0 ? `:\n${output}` : '.';
  return `${step} "${command}" exited with status ${res.code}${detail}`;
}

/**
 * Assemble and link `listing` in a private temporary directory, then hand the binary path to `use`.
 *
 * The exit status of each command is the only success signal; a failure is reported as a
 * diagnostic with the captured output and is not retried. The temporary directory (listing, object
 * and binary) is removed on every path, so `use` must copy anything it wants to keep.
 */
export async function assembleAndLink<T>(
  listing: string,
  options: ToolchainOptions,
  use: (binaryPath: string) => Promise<T>,
  runner: CommandRunner = execRunner,
): Promise<BuildResult<T>> {
  const assembler = options.assembler ?? 'nasm';
  const format = options.format ?? 'elf64';
  const linker = options.linker ?? 'ld';
  const diagnostics: Diagnostic[] = [];

  const dir = await mkdtemp(join(tmpdir(), 'acclower-'));
  const asmPath = join(dir, 'program.asm');
  const objPath = join(dir, 'program.o');
  const binPath = join(dir, 'program');

  const run = async (step: string, command: string, args: string[]): Promise<boolean> => {
    let res: CommandResult;
    try {
      res = await runner(command, args);
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.ToolchainUnavailable,
        severity: 'error',
        message: `Failed to start ${step.toLowerCase()} "${command}": ${String(err)}`,
        file: asmPath,
      });
      return false;
    }
    if (res.code === 0) return true;
    diagnostics.push({
      id: DiagnosticIds.ToolchainFailure,
      severity: 'error',
      message: describeFailure(step, command, res),
      file: asmPath,
    });
    return false;
  };

  try {
    await writeFile(asmPath, listing, 'utf8');
    if (!(await run('Assembler', assembler, ['-f', format, asmPath, '-o', objPath]))) {
      return { diagnostics };
    }
    if (!(await run('Linker', linker, [objPath, '-o', binPath]))) {
      return { diagnostics };
    }
    return { diagnostics, value: await use(binPath) };
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
