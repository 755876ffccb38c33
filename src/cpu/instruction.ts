/**
 * Instruction model
 *
 * An opcode table maps encodings to OpcodeEntry records; the decoder
 * combines an entry with the bytes it read to produce an Instruction.
 * Both are plain data so the tables can be inspected and tested on their
 * own.
 */

import type { ArchitectureId, IndexRegister, Reg8, Reg16 } from './types';
import type { ShiftKind } from './alu';

/** Operand descriptor, tagged by addressing mode. */
export type Operand =
  | { readonly mode: 'immediate'; readonly width: 8 | 16 }
  | { readonly mode: 'register'; readonly reg: Reg8 }
  | { readonly mode: 'pair'; readonly pair: Reg16 }
  | { readonly mode: 'indirect'; readonly pair: Reg16; readonly width: 8 | 16 }
  | { readonly mode: 'indexed'; readonly index: IndexRegister }
  | { readonly mode: 'direct'; readonly width: 8 | 16 }
  | { readonly mode: 'port' }
  | { readonly mode: 'portC' }
  | { readonly mode: 'relative' };

export type Condition = 'nz' | 'z' | 'nc' | 'c' | 'po' | 'pe' | 'p' | 'm';

export type OperationKind =
  // Data movement
  | 'nop'
  | 'halt'
  | 'move'
  | 'push'
  | 'pop'
  | 'exchange'
  | 'exchangeMain'
  | 'exchangeAccumulator'
  // 8-bit arithmetic and logic
  | 'add'
  | 'addWithCarry'
  | 'subtract'
  | 'subtractWithBorrow'
  | 'and'
  | 'or'
  | 'xor'
  | 'compare'
  | 'increment'
  | 'decrement'
  | 'decimalAdjust'
  | 'complement'
  | 'negate'
  | 'setCarry'
  | 'complementCarry'
  // 16-bit arithmetic
  | 'increment16'
  | 'decrement16'
  | 'add16'
  | 'addWithCarry16'
  | 'subtractWithBorrow16'
  // Rotates and bits
  | 'rotateAccumulator'
  | 'shift'
  | 'testBit'
  | 'setBit'
  | 'resetBit'
  | 'rotateDigitLeft'
  | 'rotateDigitRight'
  // Control flow
  | 'jump'
  | 'jumpRelative'
  | 'decrementJumpNonZero'
  | 'call'
  | 'return'
  | 'restart'
  // I/O
  | 'portIn'
  | 'portOut'
  // Block transfer and search
  | 'loadIncrement'
  | 'loadDecrement'
  | 'loadIncrementRepeat'
  | 'loadDecrementRepeat'
  | 'compareIncrement'
  | 'compareDecrement'
  | 'compareIncrementRepeat'
  | 'compareDecrementRepeat'
  // Interrupt control
  | 'enableInterrupts'
  | 'disableInterrupts'
  | 'readInterruptMask'
  | 'setInterruptMask';

export interface OpcodeEntry {
  /** Assembly text; n, nn, d and e stand for the operand bytes. */
  readonly text: string;
  readonly kind: OperationKind;
  readonly operands: readonly Operand[];
  /** Total encoded length including prefixes. */
  readonly length: number;
  readonly condition?: Condition;
  readonly shift?: ShiftKind;
  readonly bit?: number;
  readonly vector?: number;
}

/** 256 slots indexed by opcode byte; undefined is an illegal encoding. */
export type OpcodePage = ReadonlyArray<OpcodeEntry | undefined>;

export interface OpcodeTable {
  readonly main: OpcodePage;
  /** Pages selected by a prefix byte (CB, DD, ED, FD). */
  readonly prefixed: ReadonlyMap<number, OpcodePage>;
  /** DD CB d op / FD CB d op, keyed by the first prefix. */
  readonly indexedBit: ReadonlyMap<number, OpcodePage>;
}

/** A decoded instruction, live for one execute cycle. */
export interface Instruction extends OpcodeEntry {
  readonly architecture: ArchitectureId;
  readonly address: number;
  /** Final opcode byte (after any prefixes). */
  readonly opcode: number;
  readonly bytes: readonly number[];
  /** Immediate value, direct address or port number. */
  readonly data?: number;
  /** Signed displacement of an indexed or relative operand. */
  readonly displacement?: number;
}

/** Number of instruction-stream bytes an operand occupies. */
export function operandSize(operand: Operand): number {
  switch (operand.mode) {
    case 'immediate': return operand.width / 8;
    case 'direct': return 2;
    case 'indexed':
    case 'port':
    case 'relative':
      return 1;
    case 'register':
    case 'pair':
    case 'indirect':
    case 'portC':
      return 0;
  }
}

export function isMemoryOperand(operand: Operand): boolean {
  return operand.mode === 'indirect' || operand.mode === 'indexed' || operand.mode === 'direct';
}
