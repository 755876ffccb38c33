/**
 * Architecture variants
 *
 * Everything that differs between the two instruction sets is carried
 * here: flag layout and flag rules, the opcode table, whether IX/IY
 * exist and the reset stack pointer. The dispatcher machinery is shared.
 */

import type { ArchitectureId, FlagLayout } from './types';
import type { OpcodeTable } from './instruction';
import { createFlagRules, type FlagRules } from './alu';
import { Z80_FLAGS } from './z80/types';
import { I8085_FLAGS } from './i8085/types';
import { Z80_OPCODES } from './z80/opcodes';
import { I8085_OPCODES } from './i8085/opcodes';

export interface Architecture {
  readonly id: ArchitectureId;
  readonly name: string;
  readonly flags: FlagLayout;
  readonly rules: FlagRules;
  readonly opcodes: OpcodeTable;
  readonly hasIndexRegisters: boolean;
  /** SP after reset. */
  readonly resetStackPointer: number;
}

export const Z80_ARCH: Architecture = {
  id: 'z80',
  name: 'Zilog Z80',
  flags: Z80_FLAGS,
  rules: createFlagRules(Z80_FLAGS, {
    overflowArithmetic: true,
    halfCarryOn16BitAdd: true,
    clearsHalfCarryOnRotate: true,
  }),
  opcodes: Z80_OPCODES,
  hasIndexRegisters: true,
  resetStackPointer: 0xffff,
};

export const I8085_ARCH: Architecture = {
  id: 'i8085',
  name: 'Intel 8085',
  flags: I8085_FLAGS,
  rules: createFlagRules(I8085_FLAGS, {
    overflowArithmetic: false,
    halfCarryOn16BitAdd: false,
    clearsHalfCarryOnRotate: false,
  }),
  opcodes: I8085_OPCODES,
  hasIndexRegisters: false,
  resetStackPointer: 0x0000,
};

const ARCHITECTURES: Record<ArchitectureId, Architecture> = {
  z80: Z80_ARCH,
  i8085: I8085_ARCH,
};

export function getArchitecture(id: string): Architecture {
  if (id === 'z80' || id === 'i8085') {
    return ARCHITECTURES[id];
  }
  throw new Error(`Unknown architecture: ${id}`);
}
