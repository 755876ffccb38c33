/**
 * Opcode table construction helpers.
 *
 * Each page is a 256-slot array filled through `set()`. The encoded
 * length of every entry is derived from the prefix length and the
 * operand descriptors, so tables never state lengths by hand.
 */

import type { IndexRegister, Reg8, Reg16 } from './types';
import {
  operandSize,
  type OpcodeEntry,
  type OpcodePage,
  type Operand,
  type OperationKind,
} from './instruction';

// --- Operand shorthands ---
export const imm8: Operand = { mode: 'immediate', width: 8 };
export const imm16: Operand = { mode: 'immediate', width: 16 };
export const dir8: Operand = { mode: 'direct', width: 8 };
export const dir16: Operand = { mode: 'direct', width: 16 };
export const port: Operand = { mode: 'port' };
export const portC: Operand = { mode: 'portC' };
export const rel: Operand = { mode: 'relative' };

export function reg(name: Reg8): Operand {
  return { mode: 'register', reg: name };
}

export function pair(name: Reg16): Operand {
  return { mode: 'pair', pair: name };
}

export function ind(name: Reg16, width: 8 | 16 = 8): Operand {
  return { mode: 'indirect', pair: name, width };
}

export function idx(index: IndexRegister): Operand {
  return { mode: 'indexed', index };
}

export type EntryExtras = Pick<OpcodeEntry, 'condition' | 'shift' | 'bit' | 'vector'>;

export type SetEntry = (
  opcode: number,
  text: string,
  kind: OperationKind,
  operands?: readonly Operand[],
  extras?: EntryExtras,
) => void;

/**
 * Build one opcode page.
 * @param prefixLength bytes that precede the opcode byte (0 for the main page)
 */
export function buildPage(prefixLength: number, fill: (set: SetEntry) => void): OpcodePage {
  const page = new Array<OpcodeEntry | undefined>(256).fill(undefined);

  const set: SetEntry = (opcode, text, kind, operands = [], extras = {}) => {
    if (page[opcode] !== undefined) {
      throw new Error(`Opcode $${opcode.toString(16)} defined twice (${text})`);
    }
    const length = operands.reduce((n, op) => n + operandSize(op), prefixLength + 1);
    page[opcode] = { text, kind, operands, length, ...extras };
  };

  fill(set);
  return page;
}

/** Register order used by the 3-bit register fields of both instruction sets. */
export const REGISTER_FIELD = ['b', 'c', 'd', 'e', 'h', 'l', 'm', 'a'] as const;
export type RegisterField = typeof REGISTER_FIELD[number];

export const CONDITION_FIELD = ['nz', 'z', 'nc', 'c', 'po', 'pe', 'p', 'm'] as const;
