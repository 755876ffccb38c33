/**
 * Intel 8085 Types
 *
 * The 8085 has:
 * - Registers: A (accumulator), B, C, D, E, H, L
 * - Register pairs: BC, DE, HL, SP (for 16-bit operations), PSW (A + flags)
 * - Flags: S, Z, AC (aux carry), P (parity), CY (carry)
 * - No shadow registers, no index registers (those are Z80 additions)
 * - RIM/SIM for the interrupt mask and serial I/O lines
 */

import type { FlagLayout } from '@/cpu/types';

// 8085 flag bit positions (in F register)
// Layout: S Z 0 AC 0 P 1 CY  (bits 7→0)
// Bit 1 is always 1, bits 3 and 5 are always 0
export const FLAG_CY = 0x01; // Carry (bit 0)
export const FLAG_P  = 0x04; // Parity (bit 2)
export const FLAG_AC = 0x10; // Auxiliary carry / half-carry (bit 4)
export const FLAG_Z  = 0x40; // Zero (bit 6)
export const FLAG_S  = 0x80; // Sign (bit 7)

// Bits that are always set/cleared in the flags register
export const FLAG_ALWAYS_ONE = 0x02;  // Bit 1 always 1
export const FLAG_MASK = FLAG_S | FLAG_Z | FLAG_AC | FLAG_P | FLAG_CY | FLAG_ALWAYS_ONE;

export const I8085_FLAGS: FlagLayout = {
  sign: FLAG_S,
  zero: FLAG_Z,
  halfCarry: FLAG_AC,
  parity: FLAG_P,
  subtract: 0,
  carry: FLAG_CY,
  alwaysOne: FLAG_ALWAYS_ONE,
  mask: FLAG_MASK,
};

// RIM/SIM interrupt-mask register bits
export const SIM_MASK_BITS = 0x07;  // M5.5, M6.5, M7.5
export const SIM_MSE = 0x08;        // Mask set enable
export const SIM_SDE = 0x40;        // Serial data enable
export const SIM_SOD = 0x80;        // Serial output data
export const RIM_IE = 0x08;         // Interrupt enable flag
