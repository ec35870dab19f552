/**
 * Instruction model shared by lowering, the optimizer and the listing writer.
 *
 * Lines are a flat sequence: a `label` line anchors the instruction that follows it.
 */

export type Register = 'rax' | 'rcx' | 'rdx' | 'rsi' | 'rdi' | 'rbp' | 'rsp';

/** Register that always holds the most recently computed expression value. */
export const ACCUMULATOR: Register = 'rax';

/** Register that holds the right operand of a binary operation. */
export const SCRATCH: Register = 'rcx';

export type Operand =
  | { kind: 'Reg'; name: Register }
  | { kind: 'Imm'; value: number }
  /** Frame slot `qword [rbp + offset]` (negative offsets are locals, positive are parameters). */
  | { kind: 'Slot'; offset: number }
  /** Data symbol `qword [rel name + offset]`. */
  | { kind: 'Data'; name: string; offset: number }
  /** Address of a data symbol, `[rel name]` (only as a `lea` source). */
  | { kind: 'Addr'; name: string }
  /** Memory through registers, `qword [base + index*scale + offset]`. */
  | { kind: 'Mem'; base: Register; index?: Register; scale?: 1 | 2 | 4 | 8; offset: number }
  /** Branch or call target. */
  | { kind: 'Label'; name: string };

export type Mnemonic =
  | 'mov'
  | 'lea'
  | 'push'
  | 'pop'
  | 'add'
  | 'sub'
  | 'imul'
  | 'cqo'
  | 'idiv'
  | 'shl'
  | 'cmp'
  | 'test'
  | 'jmp'
  | 'je'
  | 'jne'
  | 'jg'
  | 'jl'
  | 'jge'
  | 'jle'
  | 'jz'
  | 'call'
  | 'ret'
  | 'syscall';

export interface Instruction {
  kind: 'instruction';
  mnemonic: Mnemonic;
  operands: Operand[];
}

export type Line =
  | { kind: 'label'; name: string }
  | Instruction
  | { kind: 'comment'; text: string };

export const reg = (name: Register): Operand => ({ kind: 'Reg', name });
export const imm = (value: number): Operand => ({ kind: 'Imm', value });
export const slot = (offset: number): Operand => ({ kind: 'Slot', offset });
export const data = (name: string, offset = 0): Operand => ({ kind: 'Data', name, offset });
export const addr = (name: string): Operand => ({ kind: 'Addr', name });
export const label = (name: string): Operand => ({ kind: 'Label', name });

export function ins(mnemonic: Mnemonic, ...operands: Operand[]): Instruction {
  return { kind: 'instruction', mnemonic, operands };
}

export function isJump(mnemonic: Mnemonic): boolean {
  return mnemonic === 'jmp' || isConditionalJump(mnemonic);
}

export function isConditionalJump(mnemonic: Mnemonic): boolean {
  switch (mnemonic) {
    case 'je':
    case 'jne':
    case 'jg':
    case 'jl':
    case 'jge':
    case 'jle':
    case 'jz':
      return true;
    default:
      return false;
  }
}

export function sameOperand(a: Operand, b: Operand): boolean {
  switch (a.kind) {
    case 'Reg':
      return b.kind === 'Reg' && a.name === b.name;
    case 'Imm':
      return b.kind === 'Imm' && a.value === b.value;
    case 'Slot':
      return b.kind === 'Slot' && a.offset === b.offset;
    case 'Data':
      return b.kind === 'Data' && a.name === b.name && a.offset === b.offset;
    case 'Addr':
      return b.kind === 'Addr' && a.name === b.name;
    case 'Mem':
      return (
        b.kind === 'Mem' &&
        a.base === b.base &&
        a.index === b.index &&
        a.scale === b.scale &&
        a.offset === b.offset
      );
    case 'Label':
      return b.kind === 'Label' && a.name === b.name;
  }
}

/** True when the operand reads memory. */
export function isMemory(op: Operand): boolean {
  return op.kind === 'Slot' || op.kind === 'Data' || op.kind === 'Mem';
}

function signedOffset(offset: number): string {
  if (offset === 0) return '';
  return offset < 0 ? ` - ${-offset}` : ` + ${offset}`;
}

/**
 * Render an operand in NASM syntax.
 */
export function formatOperand(op: Operand): string {
  switch (op.kind) {
    case 'Reg':
      return op.name;
    case 'Imm':
      return String(op.value);
    case 'Slot':
      return `qword [rbp${signedOffset(op.offset)}]`;
    case 'Data':
      return `qword [rel ${op.name}${signedOffset(op.offset)}]`;
    case 'Addr':
      return `[rel ${op.name}]`;
    case 'Mem': {
      const index = op.index ? ` + ${op.index}*${op.scale ?? 1}` : '';
      return `qword [${op.base}${index}${signedOffset(op.offset)}]`;
    }
    case 'Label':
      return op.name;
  }
}

export function formatInstruction(i: Instruction): string {
  if (i.operands.length === 0) return i.mnemonic;
  return `${i.mnemonic} ${i.operands.map(formatOperand).join(', ')}`;
}

/**
 * Render one line as it appears in the listing (instructions indented four spaces).
 */
export function formatLine(line: Line): string {
  switch (line.kind) {
    case 'label':
      return `${line.name}:`;
    case 'comment':
      return `    ; ${line.text}`;
    case 'instruction':
      return `    ${formatInstruction(line)}`;
  }
}
