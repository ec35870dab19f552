import { describe, expect, it } from 'vitest';

import { writeAsm } from '../src/formats/writeAsm.js';
import { lower } from './helpers/lower.js';
import { assign, call, cmp, exprStmt, fn, list, name, num, ret, str, whileStmt } from './helpers/tree.js';

const epilogue = ['    mov rsp, rbp', '    pop rbp', '    ret'];

describe('writeAsm', () => {
  it('renders a text-only listing', () => {
    const program = lower([fn('main', [], [ret(num(1))])]);
    expect(writeAsm(program).text).toBe(
      [
        '; acclower x86-64 listing',
        'section .text',
        'global main',
        '',
        'main:',
        '    push rbp',
        '    mov rbp, rsp',
        '    mov rax, 1',
        ...epilogue,
        ...epilogue,
        '',
      ].join('\n'),
    );
  });

  it('declares externs and places strings, globals and regions in their sections', () => {
    const program = lower([
      fn('main', [], [
        assign('s', str('hi')),
        assign('xs', list(num(1), num(2))),
        exprStmt(call('puts', name('s'))),
        ret(name('counter')),
      ]),
    ]);
    const lines = writeAsm(program).text.split('\n');
    expect(lines.slice(0, 4)).toEqual([
      '; acclower x86-64 listing',
      'section .text',
      'global main',
      'extern puts',
    ]);
    expect(lines.slice(-9)).toEqual([
      '',
      'section .data',
      'str_0: db "hi", 0',
      '',
      'section .bss',
      'g_counter: resq 1',
      'heap: resq 65536',
      'heap_next: resq 1',
      '',
    ]);
  });

  it('never defines a symbol twice when user names look like generated ones', () => {
    const program = lower([
      fn('g_x', [], [ret(num(0))]),
      fn('heap', [], [ret(num(0))]),
      fn('main', [], [
        whileStmt(cmp('Lt', name('x'), num(1)), [exprStmt(call('loop_0'))]),
        assign('xs', list(num(1))),
        ret(call('g_y')),
      ]),
      fn('other', [], [ret(name('y'))]),
    ]);
    const lines = writeAsm(program).text.split('\n');
    const defined = lines.flatMap((l) => {
      const m = /^(\w+):/.exec(l);
      return m?.[1] !== undefined ? [m[1]] : [];
    });
    expect(new Set(defined).size).toBe(defined.length);
    expect(lines.filter((l) => l.startsWith('extern '))).toEqual(['extern loop_0', 'extern g_y']);
    expect(defined).not.toContain('loop_0');
    expect(defined).not.toContain('g_y');
    expect(program.globals).toEqual([
      { name: 'x', symbol: 'g_x_1' },
      { name: 'y', symbol: 'g_y_1' },
    ]);
    expect(lines).toContain('heap_1: resq 65536');
    expect(lines).toContain('loop_1:');
  });

  it('spells out strings that are not plain printable text as bytes', () => {
    const program = lower([
      fn('main', [], [assign('a', str('say "x"')), assign('b', str('')), ret(num(0))]),
    ]);
    const lines = writeAsm(program).text.split('\n');
    expect(lines).toContain('str_0: db 115, 97, 121, 32, 34, 120, 34, 0');
    expect(lines).toContain('str_1: db 0');
  });

  it('annotates units with their parameter and local counts', () => {
    const program = lower([fn('f', ['a', 'b'], [assign('c', name('a')), ret(name('c'))])]);
    const lines = writeAsm(program, { unitComments: true }).text.split('\n');
    expect(lines.slice(3, 5)).toEqual(['', '; f: params=2 locals=1']);
  });

  it('declares the entry stub as a global symbol', () => {
    const program = lower([fn('main', [], [ret(num(3))])], { entry: 'main' });
    const lines = writeAsm(program).text.split('\n');
    expect(lines.slice(2, 4)).toEqual(['global main', 'global _start']);
    expect(lines.slice(-7)).toEqual([
      '',
      '_start:',
      '    call main',
      '    mov rdi, rax',
      '    mov rax, 60',
      '    syscall',
      '',
    ]);
  });

  it('honors the requested line ending', () => {
    const program = lower([fn('main', [], [ret(num(1))])]);
    const text = writeAsm(program, { lineEnding: '\r\n' }).text;
    expect(text.startsWith('; acclower x86-64 listing\r\nsection .text\r\n')).toBe(true);
    expect(text.endsWith('    ret\r\n')).toBe(true);
  });
});
