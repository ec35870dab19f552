import type { DataDecl } from '../lowering/context.js';
import { formatLine } from '../lowering/instructions.js';
import type { LoweredProgram } from '../lowering/unit.js';
import type { AsmArtifact, WriteAsmOptions } from './types.js';

function isPlainText(s: string): boolean {
  return /^[\x20-\x7e]*$/.test(s) && !s.includes('"');
}

/**
 * NASM `db` operand list for a NUL-terminated string.
 */
function stringBytes(value: string): string {
  if (value.length > 0 && isPlainText(value)) return `"${value}", 0`;
  const bytes = [...new TextEncoder().encode(value)];
  return [...bytes, 0].join(', ');
}

function dataLine(decl: DataDecl): string | undefined {
  return decl.kind === 'string' ? `${decl.name}: db ${stringBytes(decl.value)}` : undefined;
}

function bssLine(decl: DataDecl): string | undefined {
  return decl.kind === 'reserve' ? `${decl.name}: resq ${decl.qwords}` : undefined;
}

/**
 * Render a lowered program as a NASM x86-64 listing.
 *
 * Layout: `.text` with `global`/`extern` declarations and every unit in order, then `.data`
 * (interned strings) and `.bss` (globals and aggregate regions). Sections with nothing to hold are
 * omitted.
 */
export function writeAsm(program: LoweredProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const lines: string[] = [];
  lines.push('; acclower x86-64 listing');
  lines.push('section .text');
  for (const unit of program.units) lines.push(`global ${unit.name}`);
  for (const name of program.externs) lines.push(`extern ${name}`);

  for (const unit of program.units) {
    lines.push('');
    if (opts?.unitComments) {
      lines.push(`; ${unit.name}: params=${unit.paramCount} locals=${unit.localCount}`);
    }
    for (const line of unit.lines) lines.push(formatLine(line));
  }

  const dataLines = program.data.flatMap((d) => dataLine(d) ?? []);
  if (dataLines.length > 0) {
    lines.push('');
    lines.push('section .data');
    lines.push(...dataLines);
  }

  const bssLines = [
    ...program.globals.map((g) => `${g.symbol}: resq 1`),
    ...program.data.flatMap((d) => bssLine(d) ?? []),
  ];
  if (bssLines.length > 0) {
    lines.push('');
    lines.push('section .bss');
    lines.push(...bssLines);
  }

  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
