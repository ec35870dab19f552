import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import { execute } from './helpers/machine.js';
import { listing, lower, lowerErrors, unitOf } from './helpers/lower.js';
import { assign, augAssign, bin, call, fn, name, num, ret } from './helpers/tree.js';

const epilogue = ['    mov rsp, rbp', '    pop rbp', '    ret'];

describe('function frames', () => {
  it('reserves one slot per local after the frame pointer is set up', () => {
    const program = lower([
      fn('main', [], [assign('x', num(5)), assign('y', num(6)), ret(name('x'))]),
    ]);
    expect(listing(program, 'main')).toEqual([
      'main:',
      '    push rbp',
      '    mov rbp, rsp',
      '    sub rsp, 16',
      '    mov rax, 5',
      '    mov qword [rbp - 8], rax',
      '    mov rax, 6',
      '    mov qword [rbp - 16], rax',
      '    mov rax, qword [rbp - 8]',
      ...epilogue,
      ...epilogue,
    ]);
    expect(unitOf(program, 'main')).toMatchObject({ paramCount: 0, localCount: 2 });
    expect(execute(program, 'main')).toBe(5);
  });

  it('omits the frame reservation when there are no locals', () => {
    const program = lower([fn('id', ['v'], [ret(name('v'))])]);
    expect(listing(program, 'id')).toEqual([
      'id:',
      '    push rbp',
      '    mov rbp, rsp',
      '    mov rax, qword [rbp + 16]',
      ...epilogue,
      ...epilogue,
    ]);
  });

  it('returns 0 from a bare return and from falling off the end', () => {
    const program = lower([fn('bare', [], [ret()]), fn('empty', [], [])]);
    expect(listing(program, 'bare')).toEqual([
      'bare:',
      '    push rbp',
      '    mov rbp, rsp',
      '    mov rax, 0',
      ...epilogue,
      ...epilogue,
    ]);
    expect(execute(program, 'bare')).toBe(0);
  });

  it('binds an assignment target locally before lowering its value', () => {
    const program = lower([fn('main', [], [assign('x', bin('Add', name('x'), num(1))), ret(name('x'))])]);
    expect(listing(program, 'main')[4]).toBe('    mov rax, qword [rbp - 8]');
    expect(program.globals).toEqual([]);
  });

  it('updates a local in place for augmented assignment', () => {
    const program = lower([
      fn('main', [], [assign('total', num(40)), augAssign('total', 'Add', num(2)), ret(name('total'))]),
    ]);
    expect(listing(program, 'main').slice(6, 13)).toEqual([
      '    mov rax, qword [rbp - 8]',
      '    push rax',
      '    mov rax, 2',
      '    mov rcx, rax',
      '    pop rax',
      '    add rax, rcx',
      '    mov qword [rbp - 8], rax',
    ]);
    expect(execute(program, 'main')).toBe(42);
  });

  it('passes several arguments into their parameter slots', () => {
    const program = lower([
      fn('affine', ['a', 'x', 'b'], [ret(bin('Add', bin('Mult', name('a'), name('x')), name('b')))]),
      fn('main', [], [ret(call('affine', num(3), num(7), num(4)))]),
    ]);
    expect(listing(program, 'main')).toContain('    add rsp, 24');
    expect(execute(program, 'main')).toBe(25);
  });

  it('rejects assignment to a builtin constant', () => {
    const diagnostics = lowerErrors([fn('main', [], [assign('True', num(0))])]);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnsupportedConstruct,
        severity: 'error',
        message: 'Cannot assign to builtin constant "True".',
        file: 'mem.json',
        path: '$[0].body[0].target',
      },
    ]);
  });

  it('rejects augmented assignment to a name that was never assigned', () => {
    const diagnostics = lowerErrors([fn('main', [], [augAssign('total', 'Add', num(1)), ret(name('total'))])]);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnsupportedConstruct,
        severity: 'error',
        message: 'Augmented assignment to "total" before it is assigned.',
        file: 'mem.json',
        path: '$[0].body[0].target',
      },
    ]);
  });

  it('allows augmented assignment to a parameter', () => {
    const program = lower([fn('bump', ['n'], [augAssign('n', 'Mult', num(3)), ret(name('n'))])]);
    expect(execute(program, 'bump', [5])).toBe(15);
  });

  it('keeps locals of different functions apart', () => {
    const program = lower([
      fn('inner', [], [assign('x', num(99)), ret(name('x'))]),
      fn('outer', [], [assign('x', num(1)), assign('y', call('inner')), ret(name('x'))]),
    ]);
    expect(listing(program, 'inner')).toContain('    mov qword [rbp - 8], rax');
    expect(listing(program, 'outer')).toContain('    mov qword [rbp - 8], rax');
    expect(program.globals).toEqual([]);
    expect(execute(program, 'outer')).toBe(1);
    expect(execute(program, 'inner')).toBe(99);
  });

  it('rejects nested function definitions', () => {
    const diagnostics = lowerErrors([
      fn('outer', [], [{ ...fn('inner', [], []), line: 2, column: 5 }]),
    ]);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnsupportedConstruct,
        severity: 'error',
        message: 'Nested function "inner" is not supported.',
        file: 'mem.json',
        path: '$[0].body[0]',
        line: 2,
        column: 5,
      },
    ]);
  });

  it('rejects duplicate top-level function names', () => {
    const diagnostics = lowerErrors([fn('f', [], []), fn('f', ['x'], [])]);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.DuplicateFunction,
        severity: 'error',
        message: 'Duplicate function name "f".',
        file: 'mem.json',
        path: '$[1]',
      },
    ]);
  });
});

describe('entry stub', () => {
  it('calls the entry function and exits with its result', () => {
    const program = lower([fn('main', [], [ret(num(7))])], { entry: 'main' });
    expect(program.entry).toBe('_start');
    expect(listing(program, '_start')).toEqual([
      '_start:',
      '    call main',
      '    mov rdi, rax',
      '    mov rax, 60',
      '    syscall',
    ]);
    expect(execute(program, '_start')).toBe(7);
  });

  it('is absent unless requested', () => {
    const program = lower([fn('main', [], [ret(num(7))])]);
    expect(program.entry).toBeUndefined();
    expect(program.units.map((u) => u.name)).toEqual(['main']);
  });

  it('reports a missing entry function', () => {
    expect(lowerErrors([fn('main', [], [])], { entry: 'start' })).toEqual([
      {
        id: DiagnosticIds.EntryError,
        severity: 'error',
        message: 'Entry function "start" is not defined.',
        file: 'mem.json',
      },
    ]);
  });

  it('reports an entry function that takes parameters', () => {
    expect(lowerErrors([fn('main', ['argc'], [])], { entry: 'main' })).toEqual([
      {
        id: DiagnosticIds.EntryError,
        severity: 'error',
        message: 'Entry function "main" must take no parameters (takes 1).',
        file: 'mem.json',
      },
    ]);
  });
});
