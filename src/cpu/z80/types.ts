/**
 * Z80 Types
 *
 * The Zilog Z80 has a richer register set than the 8085:
 * - Main registers: A, F, B, C, D, E, H, L
 * - Shadow registers: A', F', B', C', D', E', H', L'
 * - Index registers: IX, IY (16-bit, used with a signed displacement)
 * - Special: SP, PC
 */

import type { FlagLayout } from '@/cpu/types';

// Z80 flag bit positions (in F register)
export const FLAG_C  = 0x01; // Carry
export const FLAG_N  = 0x02; // Subtract (BCD)
export const FLAG_PV = 0x04; // Parity/Overflow
export const FLAG_H  = 0x10; // Half-carry (BCD)
export const FLAG_Z  = 0x40; // Zero
export const FLAG_S  = 0x80; // Sign

export const Z80_FLAGS: FlagLayout = {
  sign: FLAG_S,
  zero: FLAG_Z,
  halfCarry: FLAG_H,
  parity: FLAG_PV,
  subtract: FLAG_N,
  carry: FLAG_C,
  alwaysOne: 0,
  // Undocumented bits 3 and 5 are never computed but POP AF can still load them
  mask: 0xff,
};
