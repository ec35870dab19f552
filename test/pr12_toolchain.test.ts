import { describe, expect, it } from 'vitest';
import { readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { CommandRunner } from '../src/toolchain/build.js';
import { assembleAndLink } from '../src/toolchain/build.js';
import { exists, fakeToolchain } from './helpers/cli.js';

const listing = 'section .text\nglobal main\n';
const readBinary = (path: string) => readFile(path, 'utf8');

describe('assembleAndLink', () => {
  it('assembles then links in a temporary directory and removes it afterwards', async () => {
    const fake = fakeToolchain();
    const res = await assembleAndLink(listing, {}, readBinary, fake.runner);
    expect(res.diagnostics).toEqual([]);
    expect(res.value).toBe(listing);

    expect(fake.calls.map((c) => c.command)).toEqual(['nasm', 'ld']);
    const [asmCall, ldCall] = fake.calls;
    const dir = dirname(asmCall?.args[2] ?? '');
    expect(asmCall?.args).toEqual(['-f', 'elf64', `${dir}/program.asm`, '-o', `${dir}/program.o`]);
    expect(ldCall?.args).toEqual([`${dir}/program.o`, '-o', `${dir}/program`]);
    expect(await exists(dir)).toBe(false);
  });

  it('uses the configured assembler, format and linker', async () => {
    const fake = fakeToolchain();
    await assembleAndLink(listing, { assembler: 'yasm', format: 'macho64', linker: 'lld' }, readBinary, fake.runner);
    expect(fake.calls.map((c) => c.command)).toEqual(['yasm', 'lld']);
    expect(fake.calls[0]?.args.slice(0, 2)).toEqual(['-f', 'macho64']);
  });

  it('reports an assembler failure with its output and stops', async () => {
    const fake = fakeToolchain({ nasm: { code: 1, stderr: 'program.asm:3: error: bad operand\n' } });
    const res = await assembleAndLink(listing, {}, readBinary, fake.runner);
    expect(res.value).toBeUndefined();
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({
      id: DiagnosticIds.ToolchainFailure,
      severity: 'error',
      message: 'Assembler "nasm" exited with status 1:\nprogram.asm:3: error: bad operand',
    });
    expect(fake.calls.map((c) => c.command)).toEqual(['nasm']);
    expect(await exists(dirname(fake.calls[0]?.args[2] ?? ''))).toBe(false);
  });

  it('reports a silent linker failure', async () => {
    const fake = fakeToolchain({ ld: { code: 2 } });
    const res = await assembleAndLink(listing, {}, readBinary, fake.runner);
    expect(res.diagnostics.map((d) => d.message)).toEqual(['Linker "ld" exited with status 2.']);
  });

  it('reports a tool that cannot be started', async () => {
    const runner: CommandRunner = async () => {
      throw new Error('spawn nasm ENOENT');
    };
    const res = await assembleAndLink(listing, {}, readBinary, runner);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({
      id: DiagnosticIds.ToolchainUnavailable,
      message: 'Failed to start assembler "nasm": Error: spawn nasm ENOENT',
    });
  });

  it('removes the temporary directory when the consumer throws', async () => {
    const fake = fakeToolchain();
    let seen = '';
    const use = async (path: string): Promise<void> => {
      seen = dirname(path);
      throw new Error('copy failed');
    };
    await expect(assembleAndLink(listing, {}, use, fake.runner)).rejects.toThrow('copy failed');
    expect(seen).not.toBe('');
    expect(await exists(seen)).toBe(false);
  });
});
