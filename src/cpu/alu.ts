/**
 * Flag/ALU Unit
 *
 * Pure functions: each takes the operands and the incoming F value and
 * returns the result byte/word together with the complete new F. Nothing
 * here touches registers or memory.
 *
 * The two instruction sets share bit positions for S, Z, H, P and C but
 * disagree on what P/V means for arithmetic and on which flags the
 * rotates and 16-bit add touch. Those differences live in FlagRules.
 */

import type { FlagLayout } from './types';
import { EVEN_PARITY, buildSZTable, buildSZPTable } from './tables';

export interface AluResult {
  value: number;
  flags: number;
}

export interface FlagRules {
  readonly layout: FlagLayout;
  /** P/V reports signed overflow for arithmetic (Z80) instead of parity (8085). */
  readonly overflowArithmetic: boolean;
  /** 16-bit add also sets H from bit 11 and clears N (Z80); otherwise only carry changes. */
  readonly halfCarryOn16BitAdd: boolean;
  /** Accumulator rotates, SCF and CCF clear H and N (Z80); otherwise only carry changes. */
  readonly clearsHalfCarryOnRotate: boolean;
  readonly sz: Uint8Array;
  readonly szp: Uint8Array;
}

export type RotateKind = 'rlc' | 'rrc' | 'rl' | 'rr';
export type ShiftKind = RotateKind | 'sla' | 'sra' | 'srl';

export function createFlagRules(
  layout: FlagLayout,
  options: Pick<FlagRules, 'overflowArithmetic' | 'halfCarryOn16BitAdd' | 'clearsHalfCarryOnRotate'>,
): FlagRules {
  return {
    layout,
    ...options,
    sz: buildSZTable(layout),
    szp: buildSZPTable(layout),
  };
}

function carryIn(rules: FlagRules, flags: number): number {
  return flags & rules.layout.carry ? 1 : 0;
}

// --- 8-bit arithmetic ---

function sum8(rules: FlagRules, a: number, b: number, carry: number): AluResult {
  const L = rules.layout;
  const result = a + b + carry;
  const r8 = result & 0xff;
  const pv = rules.overflowArithmetic
    ? ((((a ^ b) ^ 0x80) & (a ^ r8) & 0x80) ? L.parity : 0)
    : (EVEN_PARITY[r8] ? L.parity : 0);
  return {
    value: r8,
    flags:
      rules.sz[r8] |
      (result > 0xff ? L.carry : 0) |
      ((a ^ b ^ r8) & 0x10 ? L.halfCarry : 0) |
      pv |
      L.alwaysOne,
  };
}

/** a - b - borrow. Carry out means a borrow was needed. */
function difference8(rules: FlagRules, a: number, b: number, borrow: number): AluResult {
  const L = rules.layout;
  const result = a - b - borrow;
  const r8 = result & 0xff;
  const pv = rules.overflowArithmetic
    ? (((a ^ b) & (a ^ r8) & 0x80) ? L.parity : 0)
    : (EVEN_PARITY[r8] ? L.parity : 0);
  return {
    value: r8,
    flags:
      rules.sz[r8] | L.subtract |
      (result < 0 ? L.carry : 0) |
      ((a ^ b ^ r8) & 0x10 ? L.halfCarry : 0) |
      pv |
      L.alwaysOne,
  };
}

export function add8(rules: FlagRules, a: number, b: number): AluResult {
  return sum8(rules, a, b, 0);
}

export function adc8(rules: FlagRules, a: number, b: number, flags: number): AluResult {
  return sum8(rules, a, b, carryIn(rules, flags));
}

export function sub8(rules: FlagRules, a: number, b: number): AluResult {
  return difference8(rules, a, b, 0);
}

export function sbc8(rules: FlagRules, a: number, b: number, flags: number): AluResult {
  return difference8(rules, a, b, carryIn(rules, flags));
}

/** Compare: flags of a - b, operands untouched. */
export function cp8(rules: FlagRules, a: number, b: number): AluResult {
  return { value: a, flags: difference8(rules, a, b, 0).flags };
}

export function neg8(rules: FlagRules, a: number): AluResult {
  return difference8(rules, 0, a, 0);
}

export function inc8(rules: FlagRules, value: number, flags: number): AluResult {
  const L = rules.layout;
  const result = (value + 1) & 0xff;
  const pv = rules.overflowArithmetic
    ? (value === 0x7f ? L.parity : 0)
    : (EVEN_PARITY[result] ? L.parity : 0);
  return {
    value: result,
    flags:
      (flags & L.carry) |
      rules.sz[result] |
      ((value & 0x0f) === 0x0f ? L.halfCarry : 0) |
      pv |
      L.alwaysOne,
  };
}

export function dec8(rules: FlagRules, value: number, flags: number): AluResult {
  const L = rules.layout;
  const result = (value - 1) & 0xff;
  const pv = rules.overflowArithmetic
    ? (value === 0x80 ? L.parity : 0)
    : (EVEN_PARITY[result] ? L.parity : 0);
  return {
    value: result,
    flags:
      (flags & L.carry) | L.subtract |
      rules.sz[result] |
      ((value & 0x0f) === 0x00 ? L.halfCarry : 0) |
      pv |
      L.alwaysOne,
  };
}

// --- Logical ---

function logic(rules: FlagRules, value: number): AluResult {
  return { value, flags: rules.szp[value] | rules.layout.alwaysOne };
}

export function and8(rules: FlagRules, a: number, b: number): AluResult {
  return logic(rules, a & b & 0xff);
}

export function or8(rules: FlagRules, a: number, b: number): AluResult {
  return logic(rules, (a | b) & 0xff);
}

export function xor8(rules: FlagRules, a: number, b: number): AluResult {
  return logic(rules, (a ^ b) & 0xff);
}

/** CPL/CMA: flags unaffected. */
export function cpl(_rules: FlagRules, a: number, flags: number): AluResult {
  return { value: ~a & 0xff, flags };
}

// --- Decimal adjust ---

export function daa(rules: FlagRules, a: number, flags: number): AluResult {
  const L = rules.layout;
  const half = (flags & L.halfCarry) !== 0;
  const carry = (flags & L.carry) !== 0;
  const lo = a & 0x0f;

  if (flags & L.subtract) {
    // After subtraction (Z80 only: N is never set on the 8085)
    let correction = 0;
    let carryOut = carry;
    if (half || lo > 9) correction |= 0x06;
    if (carry || a > 0x99) { correction |= 0x60; carryOut = true; }
    const value = (a - correction) & 0xff;
    return {
      value,
      flags:
        rules.szp[value] | L.subtract |
        (carryOut ? L.carry : 0) |
        (half && lo < 6 ? L.halfCarry : 0) |
        L.alwaysOne,
    };
  }

  let value = a;
  let h = 0;
  if (lo > 9 || half) {
    if (lo + 6 > 0x0f) h = L.halfCarry;
    value += 0x06;
  }
  // The high part may already hold a carry out of the low correction
  if ((value >> 4) > 9 || carry) {
    value += 0x60;
  }
  const carryOut = carry || value > 0xff;
  value &= 0xff;
  return {
    value,
    flags: rules.szp[value] | (carryOut ? L.carry : 0) | h | L.alwaysOne,
  };
}

// --- 16-bit arithmetic ---

export function add16(rules: FlagRules, a: number, b: number, flags: number): AluResult {
  const L = rules.layout;
  const result = a + b;
  const r16 = result & 0xffff;
  const carry = result > 0xffff ? L.carry : 0;
  if (!rules.halfCarryOn16BitAdd) {
    return { value: r16, flags: (flags & ~L.carry & 0xff) | carry | L.alwaysOne };
  }
  return {
    value: r16,
    flags:
      (flags & (L.sign | L.zero | L.parity)) |
      carry |
      ((a ^ b ^ r16) & 0x1000 ? L.halfCarry : 0) |
      L.alwaysOne,
  };
}

export function adc16(rules: FlagRules, a: number, b: number, flags: number): AluResult {
  const L = rules.layout;
  const result = a + b + carryIn(rules, flags);
  const r16 = result & 0xffff;
  return {
    value: r16,
    flags:
      (r16 === 0 ? L.zero : 0) |
      (r16 & 0x8000 ? L.sign : 0) |
      (result > 0xffff ? L.carry : 0) |
      ((a ^ b ^ r16) & 0x1000 ? L.halfCarry : 0) |
      ((((a ^ b) ^ 0x8000) & (a ^ r16) & 0x8000) ? L.parity : 0) |
      L.alwaysOne,
  };
}

export function sbc16(rules: FlagRules, a: number, b: number, flags: number): AluResult {
  const L = rules.layout;
  const result = a - b - carryIn(rules, flags);
  const r16 = result & 0xffff;
  return {
    value: r16,
    flags:
      L.subtract |
      (r16 === 0 ? L.zero : 0) |
      (r16 & 0x8000 ? L.sign : 0) |
      (result < 0 ? L.carry : 0) |
      ((a ^ b ^ r16) & 0x1000 ? L.halfCarry : 0) |
      (((a ^ b) & (a ^ r16) & 0x8000) ? L.parity : 0) |
      L.alwaysOne,
  };
}

// --- Rotates and shifts ---

function shiftBits(kind: ShiftKind, value: number, carry: number): [number, number] {
  switch (kind) {
    case 'rlc': return [((value << 1) | (value >> 7)) & 0xff, value >> 7];
    case 'rrc': return [((value >> 1) | ((value & 1) << 7)) & 0xff, value & 1];
    case 'rl': return [((value << 1) | carry) & 0xff, value >> 7];
    case 'rr': return [((value >> 1) | (carry << 7)) & 0xff, value & 1];
    case 'sla': return [(value << 1) & 0xff, value >> 7];
    case 'sra': return [(value >> 1) | (value & 0x80), value & 1];
    case 'srl': return [value >> 1, value & 1];
  }
}

/** RLCA/RRCA/RLA/RRA (Z80), RLC/RRC/RAL/RAR (8085). S, Z and P/V untouched. */
export function rotateAccumulator(rules: FlagRules, kind: RotateKind, a: number, flags: number): AluResult {
  const L = rules.layout;
  const [value, carry] = shiftBits(kind, a, carryIn(rules, flags));
  const keep = rules.clearsHalfCarryOnRotate
    ? (L.sign | L.zero | L.parity)
    : (~L.carry & 0xff);
  return { value, flags: (flags & keep) | (carry ? L.carry : 0) | L.alwaysOne };
}

/** CB-page rotate/shift of any register or memory byte: full S Z P C update. */
export function shift(rules: FlagRules, kind: ShiftKind, v: number, flags: number): AluResult {
  const L = rules.layout;
  const [value, carry] = shiftBits(kind, v, carryIn(rules, flags));
  return { value, flags: rules.szp[value] | (carry ? L.carry : 0) | L.alwaysOne };
}

/** BIT n: Z (and P/V) set when the bit is clear. Value unchanged. */
export function bit(rules: FlagRules, n: number, value: number, flags: number): AluResult {
  const L = rules.layout;
  const result = value & (1 << n);
  return {
    value,
    flags:
      (flags & L.carry) | L.halfCarry |
      (result === 0 ? (L.zero | L.parity) : 0) |
      (n === 7 && result ? L.sign : 0) |
      L.alwaysOne,
  };
}

/** SCF/STC */
export function scf(rules: FlagRules, flags: number): AluResult {
  const L = rules.layout;
  const keep = rules.clearsHalfCarryOnRotate ? (L.sign | L.zero | L.parity) : 0xff;
  return { value: 0, flags: (flags & keep) | L.carry | L.alwaysOne };
}

/** CCF/CMC. On the Z80 H receives the old carry. */
export function ccf(rules: FlagRules, flags: number): AluResult {
  const L = rules.layout;
  const oldCarry = (flags & L.carry) !== 0;
  if (!rules.clearsHalfCarryOnRotate) {
    return { value: 0, flags: (flags ^ L.carry) | L.alwaysOne };
  }
  return {
    value: 0,
    flags:
      (flags & (L.sign | L.zero | L.parity)) |
      (oldCarry ? L.halfCarry : L.carry) |
      L.alwaysOne,
  };
}

export interface DigitRotateResult {
  accumulator: number;
  memory: number;
  flags: number;
}

/** RLD/RRD: rotate BCD digits between A's low nibble and a memory byte. */
export function rotateDigit(
  rules: FlagRules,
  direction: 'left' | 'right',
  a: number,
  m: number,
  flags: number,
): DigitRotateResult {
  const L = rules.layout;
  const memory = direction === 'left'
    ? ((m & 0x0f) << 4) | (a & 0x0f)
    : ((a & 0x0f) << 4) | (m >> 4);
  const accumulator = direction === 'left'
    ? (a & 0xf0) | (m >> 4)
    : (a & 0xf0) | (m & 0x0f);
  return {
    accumulator,
    memory,
    flags: (flags & L.carry) | rules.szp[accumulator] | L.alwaysOne,
  };
}
