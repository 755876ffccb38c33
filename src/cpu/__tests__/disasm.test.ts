import { describe, it, expect, beforeEach } from 'vitest';
import { formatInstruction, formatBytes, hex8, hex16 } from '../disasm';
import { decode } from '../decoder';
import { FlatMemory } from '../memory';
import { Z80_ARCH, I8085_ARCH, type Architecture } from '../architectures';

describe('disassembly text', () => {
  let mem: FlatMemory;

  beforeEach(() => {
    mem = new FlatMemory();
  });

  function textOf(arch: Architecture, bytes: number[], address = 0x0000): string {
    mem.load(address, bytes);
    return formatInstruction(decode(arch, mem, address));
  }

  it('pads hex values', () => {
    expect(hex8(0x0a)).toBe('$0A');
    expect(hex16(0x1f)).toBe('$001F');
    expect(formatBytes([0xdd, 0x36, 0x05, 0x42])).toBe('DD 36 05 42');
  });

  it.each<[number[], string]>([
    [[0x3e, 0x3c], 'MVI A,$3C'],
    [[0x21, 0x00, 0x28], 'LXI H,$2800'],
    [[0xc2, 0x7d, 0x27], 'JNZ $277D'],
    [[0xdb, 0x20], 'IN $20'],
    [[0x77], 'MOV M,A'],
    [[0xf5], 'PUSH PSW'],
    [[0xef], 'RST 5'],
  ])('8085 %j -> %s', (bytes, text) => {
    expect(textOf(I8085_ARCH, bytes)).toBe(text);
  });

  it.each<[number[], string]>([
    [[0x32, 0x00, 0x90], 'LD ($9000),A'],
    [[0xdb, 0x10], 'IN A,($10)'],
    [[0xdd, 0x7e, 0x05], 'LD A,(IX+$05)'],
    [[0xfd, 0xcb, 0xff, 0x7e], 'BIT 7,(IY-$01)'],
    [[0xed, 0xb0], 'LDIR'],
    [[0xff], 'RST 38H'],
    [[0x08], "EX AF,AF'"],
  ])('Z80 %j -> %s', (bytes, text) => {
    expect(textOf(Z80_ARCH, bytes)).toBe(text);
  });

  it('resolves DJNZ to its target address', () => {
    expect(textOf(Z80_ARCH, [0x10, 0xfd], 0x0004)).toBe('DJNZ $0003');
  });
});
