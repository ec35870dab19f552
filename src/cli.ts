#!/usr/bin/env node
import { copyFile, mkdir, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { OptimizeOptions } from './optimize/pass.js';
import type { CommandRunner, ToolchainOptions } from './toolchain/build.js';
import { assembleAndLink, execRunner } from './toolchain/build.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  asmOnly: boolean;
  emitAsm: boolean;
  annotate: boolean;
  entry?: string;
  optimize: OptimizeOptions | false;
  toolchain: ToolchainOptions;
};

function usage(): string {
  return [
    'acclower [options] <tree.json>',
    '',
    'Options:',
    '  -o, --output <file>   Binary output path (default: input path without extension)',
    '  -S, --asm             Write the .asm listing only; do not assemble or link',
    '      --emit-asm        Also write the .asm listing next to the binary',
    '      --annotate        Comment each function with its parameter and local counts',
    '      --entry <fn>      Emit a _start stub that calls <fn> and exits with its result',
    '      --no-opt          Disable all optimization passes',
    '      --no-dse          Disable dead-store elimination',
    '      --no-peephole     Disable peephole rewriting',
    '      --as <cmd>        Assembler command (default: nasm)',
    '      --ld <cmd>        Linker command (default: ld)',
    '      --format <fmt>    Assembler object format (default: elf64)',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <tree.json> must be the last argument.',
    '',
  ].join('\n');
}

class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function fail(message: string): never {
  throw new CliUsageError(message);
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Sources run from src/, the build from dist/src/.
  const candidates = [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')];
  for (const p of candidates) {
    if (!existsSync(p)) continue;
    const pkg: unknown = JSON.parse(readFileSync(p, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) return String(pkg.version);
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let asmOnly = false;
  let emitAsm = false;
  let annotate = false;
  let entry: string | undefined;
  let optimizeAll = true;
  let deadStores = true;
  let peephole = true;
  const toolchain: ToolchainOptions = {};
  let entryFile: string | undefined;

  const valueOf = (a: string, name: string, next: () => string | undefined): string => {
    const v = a.startsWith(`${name}=`) ? a.slice(name.length + 1) : next();
    if (!v) fail(`${name} expects a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    const next = () => argv[++i];
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      outputPath = valueOf(a, a === '-o' ? '-o' : '--output', next);
      continue;
    }
    if (a === '-S' || a === '--asm') {
      asmOnly = true;
      continue;
    }
    if (a === '--emit-asm') {
      emitAsm = true;
      continue;
    }
    if (a === '--annotate') {
      annotate = true;
      continue;
    }
    if (a === '--entry' || a.startsWith('--entry=')) {
      entry = valueOf(a, '--entry', next);
      continue;
    }
    if (a === '--no-opt') {
      optimizeAll = false;
      continue;
    }
    if (a === '--no-dse') {
      deadStores = false;
      continue;
    }
    if (a === '--no-peephole') {
      peephole = false;
      continue;
    }
    if (a === '--as' || a.startsWith('--as=')) {
      toolchain.assembler = valueOf(a, '--as', next);
      continue;
    }
    if (a === '--ld' || a.startsWith('--ld=')) {
      toolchain.linker = valueOf(a, '--ld', next);
      continue;
    }
    if (a === '--format' || a.startsWith('--format=')) {
      toolchain.format = valueOf(a, '--format', next);
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <tree.json> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <tree.json> argument (and it must be last)`);
  }
  if (asmOnly && outputPath && extname(outputPath).toLowerCase() !== '.asm') {
    fail(`--output must end with ".asm" when --asm is given`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    asmOnly,
    emitAsm,
    annotate,
    ...(entry !== undefined ? { entry } : {}),
    optimize: optimizeAll ? { deadStores, peephole } : false,
    toolchain,
  };
}

function stem(path: string): string {
  const resolved = resolve(path);
  const ext = extname(resolved);
  return ext.length > 0 ? resolved.slice(0, -ext.length) : resolved;
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0 && !Number.isNaN(lineCmp)) return lineCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  const where = d.path ? ` (at ${d.path})` : '';
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}${where}`;
}

function report(diagnostics: Diagnostic[]): boolean {
  const sorted = [...diagnostics].sort(compareDiagnosticsForCli);
  for (const d of sorted) process.stderr.write(`${formatDiagnostic(d)}\n`);
  return sorted.some((d) => d.severity === 'error');
}

async function writeText(path: string, text: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, 'utf8');
}

/**
 * Run the CLI; resolves with the process exit code (0 ok, 1 diagnostics or I/O failure, 2 usage).
 *
 * `runner` executes the assembler and linker.
 */
export async function runCli(argv: string[], runner: CommandRunner = execRunner): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      {
        ...(parsed.entry !== undefined ? { entry: parsed.entry } : {}),
        optimize: parsed.optimize,
        unitComments: parsed.annotate,
      },
      { formats: defaultFormatWriters },
    );
    if (report(res.diagnostics)) return 1;

    const asm = res.artifacts.find((a) => a.kind === 'asm');
    if (!asm) throw new Error('no listing was produced');

    if (parsed.asmOnly) {
      const asmPath = parsed.outputPath ? resolve(parsed.outputPath) : `${stem(parsed.entryFile)}.asm`;
      await writeText(asmPath, asm.text);
      process.stdout.write(`${asmPath}\n`);
      return 0;
    }

    const binPath = parsed.outputPath ? resolve(parsed.outputPath) : stem(parsed.entryFile);
    if (parsed.emitAsm) await writeText(`${stem(binPath)}.asm`, asm.text);

    const built = await assembleAndLink(
      asm.text,
      parsed.toolchain,
      async (tmpBinary) => {
        await mkdir(dirname(binPath), { recursive: true });
        await copyFile(tmpBinary, binPath);
        return binPath;
      },
      runner,
    );
    if (report(built.diagnostics) || built.value === undefined) return 1;

    process.stdout.write(`${built.value}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`acclower: ${msg}\n`);
    if (!(err instanceof CliUsageError)) return 1;
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
