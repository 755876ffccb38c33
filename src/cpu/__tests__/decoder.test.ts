import { describe, it, expect, beforeEach } from 'vitest';
import { decode, validateEntry } from '../decoder';
import { DecodeError } from '../errors';
import { FlatMemory } from '../memory';
import { Z80_ARCH, I8085_ARCH, type Architecture } from '../architectures';
import { buildPage, reg, ind, idx } from '../opcode-table';
import type { OpcodeEntry, OpcodePage, Operand } from '../instruction';

function definedEntries(page: OpcodePage): OpcodeEntry[] {
  return page.filter((e): e is OpcodeEntry => e !== undefined);
}

/** An architecture whose main page holds a single entry at $00. */
function withSingleEntry(base: Architecture, text: string, operands: Operand[]): Architecture {
  return {
    ...base,
    opcodes: {
      main: buildPage(0, (set) => set(0x00, text, 'move', operands)),
      prefixed: new Map<number, OpcodePage>(),
      indexedBit: new Map<number, OpcodePage>(),
    },
  };
}

function decodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error('expected a DecodeError');
}

describe('decode', () => {
  let mem: FlatMemory;

  beforeEach(() => {
    mem = new FlatMemory();
  });

  describe('Z80', () => {
    it('decodes an immediate load', () => {
      mem.load(0x0100, [0x3e, 0x42]); // LD A,$42
      const instr = decode(Z80_ARCH, mem, 0x0100);
      expect(instr.kind).toBe('move');
      expect(instr.text).toBe('LD A,n');
      expect(instr.length).toBe(2);
      expect(instr.data).toBe(0x42);
      expect(instr.bytes).toEqual([0x3e, 0x42]);
      expect(instr.architecture).toBe('z80');
    });

    it('reads 16-bit operands little-endian', () => {
      mem.load(0x0000, [0x21, 0x34, 0x12]); // LD HL,$1234
      const instr = decode(Z80_ARCH, mem, 0x0000);
      expect(instr.data).toBe(0x1234);
      expect(instr.length).toBe(3);
    });

    it('reads displacement before data for LD (IX+d),n', () => {
      mem.load(0x0000, [0xdd, 0x36, 0x05, 0x42]);
      const instr = decode(Z80_ARCH, mem, 0x0000);
      expect(instr.text).toBe('LD (IX+d),n');
      expect(instr.length).toBe(4);
      expect(instr.displacement).toBe(5);
      expect(instr.data).toBe(0x42);
    });

    it('decodes DD CB d op with the displacement before the opcode', () => {
      mem.load(0x0000, [0xfd, 0xcb, 0xfe, 0x46]); // BIT 0,(IY-2)
      const instr = decode(Z80_ARCH, mem, 0x0000);
      expect(instr.kind).toBe('testBit');
      expect(instr.bit).toBe(0);
      expect(instr.displacement).toBe(-2);
      expect(instr.opcode).toBe(0x46);
      expect(instr.operands).toEqual([{ mode: 'indexed', index: 'iy' }]);
      expect(instr.length).toBe(4);
    });

    it('sign-extends relative displacements', () => {
      mem.load(0x0000, [0x18, 0xfe]); // JR $-2
      expect(decode(Z80_ARCH, mem, 0x0000).displacement).toBe(-2);
    });

    it('decodes ED-page block instructions', () => {
      mem.load(0x0000, [0xed, 0xb0]);
      const instr = decode(Z80_ARCH, mem, 0x0000);
      expect(instr.kind).toBe('loadIncrementRepeat');
      expect(instr.length).toBe(2);
    });

    it('rejects an unknown ED opcode', () => {
      mem.load(0x0200, [0xed, 0x00]);
      const err = decodeError(() => decode(Z80_ARCH, mem, 0x0200));
      expect(err.reason).toBe('illegal-opcode');
      expect(err.address).toBe(0x0200);
      expect(err.bytes).toEqual([0xed, 0x00]);
      expect(err.message).toBe('Illegal opcode at $0200: ED 00');
    });

    it('rejects SLL as undocumented', () => {
      mem.load(0x0000, [0xcb, 0x30]);
      expect(decodeError(() => decode(Z80_ARCH, mem, 0x0000)).reason).toBe('illegal-opcode');
    });

    it('rejects DD CB forms that also copy to a register', () => {
      mem.load(0x0000, [0xdd, 0xcb, 0x01, 0x00]);
      const err = decodeError(() => decode(Z80_ARCH, mem, 0x0000));
      expect(err.bytes).toEqual([0xdd, 0xcb, 0x01, 0x00]);
    });
  });

  describe('8085', () => {
    it('decodes RIM where the Z80 has JR NZ', () => {
      mem.load(0x0000, [0x20]);
      expect(decode(I8085_ARCH, mem, 0x0000).kind).toBe('readInterruptMask');
      mem.load(0x0000, [0x20, 0x00]);
      expect(decode(Z80_ARCH, mem, 0x0000).kind).toBe('jumpRelative');
    });

    it('decodes MOV M,A as a register-indirect store', () => {
      mem.load(0x0000, [0x77]);
      const instr = decode(I8085_ARCH, mem, 0x0000);
      expect(instr.text).toBe('MOV M,A');
      expect(instr.operands).toEqual([
        { mode: 'indirect', pair: 'hl', width: 8 },
        { mode: 'register', reg: 'a' },
      ]);
    });

    it('uses $76 for HLT, not MOV M,M', () => {
      mem.load(0x0000, [0x76]);
      expect(decode(I8085_ARCH, mem, 0x0000).kind).toBe('halt');
    });

    it.each([0x08, 0x10, 0x18, 0x28, 0x38, 0xcb, 0xd9, 0xdd, 0xed, 0xfd])(
      'rejects opcode %i as illegal',
      (opcode) => {
        mem.load(0x0000, [opcode]);
        const err = decodeError(() => decode(I8085_ARCH, mem, 0x0000));
        expect(err.reason).toBe('illegal-opcode');
        expect(err.bytes).toEqual([opcode]);
      },
    );
  });

  describe('operand validation', () => {
    it('rejects a memory-to-memory move', () => {
      const arch = withSingleEntry(Z80_ARCH, 'LD (HL),(HL)', [ind('hl'), ind('hl')]);
      expect(decodeError(() => decode(arch, mem, 0x0000)).reason).toBe('memory-to-memory');
    });

    it('restricts (BC)/(DE) to the accumulator', () => {
      const arch = withSingleEntry(Z80_ARCH, 'LD B,(BC)', [reg('b'), ind('bc')]);
      expect(decodeError(() => decode(arch, mem, 0x0000)).reason).toBe('indirect-pair-accumulator-only');
    });

    it('rejects indexed addressing without index registers', () => {
      const arch = withSingleEntry(I8085_ARCH, 'LD A,(IX+d)', [reg('a'), idx('ix')]);
      expect(decodeError(() => decode(arch, mem, 0x0000)).reason).toBe('unsupported-addressing-mode');
    });

    it('accepts every entry of both opcode tables', () => {
      for (const arch of [Z80_ARCH, I8085_ARCH]) {
        const pages = [arch.opcodes.main, ...arch.opcodes.prefixed.values(), ...arch.opcodes.indexedBit.values()];
        for (const page of pages) {
          for (const entry of definedEntries(page)) {
            expect(validateEntry(arch, entry), entry.text).toBeUndefined();
          }
        }
      }
    });
  });
});

describe('opcode tables', () => {
  it('8085 defines every opcode except the ten unused slots', () => {
    expect(definedEntries(I8085_ARCH.opcodes.main)).toHaveLength(246);
  });

  it('Z80 main page leaves only the four prefixes undefined', () => {
    const main = Z80_ARCH.opcodes.main;
    expect(definedEntries(main)).toHaveLength(252);
    for (const prefix of [0xcb, 0xdd, 0xed, 0xfd]) {
      expect(main[prefix]).toBeUndefined();
    }
  });

  it('unprefixed instructions are 1 to 3 bytes', () => {
    for (const arch of [Z80_ARCH, I8085_ARCH]) {
      for (const entry of definedEntries(arch.opcodes.main)) {
        expect(entry.length).toBeGreaterThanOrEqual(1);
        expect(entry.length).toBeLessThanOrEqual(3);
      }
    }
  });

  it('indexed bit instructions are 4 bytes', () => {
    const page = Z80_ARCH.opcodes.indexedBit.get(0xdd);
    expect(page).toBeDefined();
    for (const entry of definedEntries(page ?? [])) {
      expect(entry.length).toBe(4);
    }
  });

  it('refuses to define an opcode twice', () => {
    expect(() => buildPage(0, (set) => {
      set(0x00, 'NOP', 'nop');
      set(0x00, 'NOP', 'nop');
    })).toThrow('Opcode $0 defined twice (NOP)');
  });
});
