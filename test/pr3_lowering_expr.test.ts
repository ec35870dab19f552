import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { CompareOperator } from '../src/frontend/ast.js';
import { execute } from './helpers/machine.js';
import { listing, lower, lowerErrors } from './helpers/lower.js';
import { bin, call, cmp, exprStmt, fn, name, num, ret, str } from './helpers/tree.js';

const epilogue = ['    mov rsp, rbp', '    pop rbp', '    ret'];

describe('expression lowering', () => {
  it('lowers a binary operation through the accumulator and scratch register', () => {
    const program = lower([fn('main', [], [ret(bin('Add', num(2), num(3)))])]);
    expect(listing(program, 'main')).toEqual([
      'main:',
      '    push rbp',
      '    mov rbp, rsp',
      '    mov rax, 2',
      '    push rax',
      '    mov rax, 3',
      '    mov rcx, rax',
      '    pop rax',
      '    add rax, rcx',
      ...epilogue,
      ...epilogue,
    ]);
    expect(execute(program, 'main')).toBe(5);
  });

  it('evaluates the left operand before the right one', () => {
    const program = lower([fn('diff', ['a', 'b'], [ret(bin('Sub', name('a'), name('b')))])]);
    expect(listing(program, 'diff').slice(3, 9)).toEqual([
      '    mov rax, qword [rbp + 24]',
      '    push rax',
      '    mov rax, qword [rbp + 16]',
      '    mov rcx, rax',
      '    pop rax',
      '    sub rax, rcx',
    ]);
    expect(execute(program, 'diff', [10, 3])).toBe(7);
  });

  it('keeps the left operand when the right operand is nested', () => {
    const program = lower([
      fn('main', [], [ret(bin('Sub', num(100), bin('Mult', num(6), bin('Add', num(3), num(4)))))]),
    ]);
    expect(execute(program, 'main')).toBe(58);
  });

  it('divides with truncation and takes the remainder from rdx', () => {
    const program = lower([
      fn('quot', ['a', 'b'], [ret(bin('Div', name('a'), name('b')))]),
      fn('rem', ['a', 'b'], [ret(bin('Mod', name('a'), name('b')))]),
    ]);
    expect(listing(program, 'quot')).toContain('    cqo');
    expect(listing(program, 'rem')).toContain('    mov rax, rdx');
    expect(execute(program, 'quot', [17, 5])).toBe(3);
    expect(execute(program, 'quot', [-7, 2])).toBe(-3);
    expect(execute(program, 'rem', [17, 5])).toBe(2);
    expect(execute(program, 'rem', [-7, 2])).toBe(-1);
  });

  it('materializes a comparison as 1 or 0 through fresh labels', () => {
    const program = lower([fn('main', [], [ret(cmp('Lt', num(3), num(5)))])]);
    expect(listing(program, 'main').slice(8, 17)).toEqual([
      '    cmp rax, rcx',
      '    jl true_0',
      '    jmp false_0',
      'true_0:',
      '    mov rax, 1',
      '    jmp end_0',
      'false_0:',
      '    mov rax, 0',
      'end_0:',
    ]);
    expect(execute(program, 'main')).toBe(1);
  });

  const compareTable: [CompareOperator, number, number, number][] = [
    // op, 2 ? 3, 3 ? 3, 4 ? 3
    ['Gt', 0, 0, 1],
    ['Lt', 1, 0, 0],
    ['Eq', 0, 1, 0],
    ['GtE', 0, 1, 1],
    ['LtE', 1, 1, 0],
    ['NotEq', 1, 0, 1],
  ];

  it.each(compareTable)('evaluates %s', (op, below, equal, above) => {
    const program = lower([fn('check', ['x'], [ret(cmp(op, name('x'), num(3)))])]);
    expect(execute(program, 'check', [2])).toBe(below);
    expect(execute(program, 'check', [3])).toBe(equal);
    expect(execute(program, 'check', [4])).toBe(above);
  });

  it('lowers builtin constants to immediates', () => {
    const program = lower([
      fn('t', [], [ret(name('True'))]),
      fn('f', [], [ret(name('False'))]),
      fn('n', [], [ret(name('None'))]),
    ]);
    expect(listing(program, 't')[3]).toBe('    mov rax, 1');
    expect(listing(program, 'f')[3]).toBe('    mov rax, 0');
    expect(listing(program, 'n')[3]).toBe('    mov rax, 0');
    expect(program.globals).toEqual([]);
  });

  it('interns string constants and loads their address', () => {
    const program = lower([fn('greet', [], [ret(str('hello'))])]);
    expect(listing(program, 'greet')[3]).toBe('    lea rax, [rel str_0]');
    expect(program.data).toEqual([{ kind: 'string', name: 'str_0', value: 'hello' }]);
  });

  it('promotes unresolved names to globals', () => {
    const program = lower([fn('main', [], [ret(name('limit'))])]);
    expect(listing(program, 'main')[3]).toBe('    mov rax, qword [rel g_limit]');
    expect(program.globals).toEqual([{ name: 'limit', symbol: 'g_limit' }]);
  });

  it('shares one global between every function that reads it', () => {
    const program = lower([
      fn('low', [], [ret(name('limit'))]),
      fn('high', [], [ret(bin('Add', name('limit'), num(1)))]),
    ]);
    expect(listing(program, 'low')[3]).toBe('    mov rax, qword [rel g_limit]');
    expect(listing(program, 'high')[3]).toBe('    mov rax, qword [rel g_limit]');
    expect(program.globals).toEqual([{ name: 'limit', symbol: 'g_limit' }]);
  });

  it('pushes arguments left to right and pops them after the call', () => {
    const program = lower([
      fn('pair', ['a', 'b'], [ret(bin('Sub', name('a'), name('b')))]),
      fn('main', [], [ret(call('pair', num(9), num(4)))]),
    ]);
    expect(listing(program, 'main').slice(3, 9)).toEqual([
      '    mov rax, 9',
      '    push rax',
      '    mov rax, 4',
      '    push rax',
      '    call pair',
      '    add rsp, 16',
    ]);
    expect(execute(program, 'main')).toBe(5);
  });

  it('declares calls to undefined functions as external', () => {
    const program = lower([fn('main', [], [exprStmt(call('putchar', num(65))), ret(num(0))])]);
    expect(program.externs).toEqual(['putchar']);
    expect(listing(program, 'main')).toContain('    call putchar');
  });

  it('reports a call with the wrong number of arguments', () => {
    const diagnostics = lowerErrors([
      fn('pair', ['a', 'b'], [ret(name('a'))]),
      fn('main', [], [ret(call('pair', num(1)))]),
    ]);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.ArityMismatch,
        severity: 'error',
        message: 'Function "pair" takes 2 argument(s) but is called with 1.',
        file: 'mem.json',
        path: '$[1].body[0].value',
      },
    ]);
  });
});
