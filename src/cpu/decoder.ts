/**
 * Decoder
 *
 * Turns the bytes at an address into an Instruction using the
 * architecture's opcode table. Decoding only reads memory; PC is left
 * for the dispatcher to move. Encodings the table does not know, and
 * table entries whose operand combination cannot exist, raise
 * DecodeError.
 */

import type { Memory } from './types';
import type { Architecture } from './architectures';
import { DecodeError, type DecodeErrorReason } from './errors';
import { isMemoryOperand, type Instruction, type OpcodeEntry, type Operand } from './instruction';

const INDEX_PREFIXES = new Set([0xdd, 0xfd]);
const BIT_PREFIX = 0xcb;

function toSigned8(value: number): number {
  return value & 0x80 ? value - 0x100 : value;
}

function readBytes(memory: Memory, address: number, length: number): number[] {
  const bytes: number[] = [];
  for (let i = 0; i < length; i++) {
    bytes.push(memory.read8((address + i) & 0xffff));
  }
  return bytes;
}

function usesIndexRegister(operand: Operand): boolean {
  switch (operand.mode) {
    case 'indexed': return true;
    case 'pair':
    case 'indirect':
      return operand.pair === 'ix' || operand.pair === 'iy';
    default: return false;
  }
}

function isAccumulatorOnlyIndirect(operand: Operand): boolean {
  return operand.mode === 'indirect' && operand.width === 8 &&
    (operand.pair === 'bc' || operand.pair === 'de');
}

/**
 * Reject operand combinations no encoding of either instruction set
 * produces. Returns undefined for a valid entry.
 */
export function validateEntry(arch: Architecture, entry: OpcodeEntry): DecodeErrorReason | undefined {
  const { operands } = entry;

  if (!arch.hasIndexRegisters && operands.some(usesIndexRegister)) {
    return 'unsupported-addressing-mode';
  }

  if (entry.kind === 'move' && operands.length === 2 &&
      isMemoryOperand(operands[0]) && isMemoryOperand(operands[1])) {
    return 'memory-to-memory';
  }

  const pairIndex = operands.findIndex(isAccumulatorOnlyIndirect);
  if (pairIndex >= 0) {
    const other = operands[1 - pairIndex];
    if (entry.kind !== 'move' || other === undefined ||
        other.mode !== 'register' || other.reg !== 'a') {
      return 'indirect-pair-accumulator-only';
    }
  }

  return undefined;
}

interface Lookup {
  entry: OpcodeEntry | undefined;
  opcode: number;
  /** Bytes consumed before the operand fields. */
  headerLength: number;
  /** DD CB d op carries its displacement before the opcode. */
  displacement?: number;
}

function lookup(arch: Architecture, memory: Memory, address: number): Lookup {
  const { opcodes } = arch;
  const first = memory.read8(address);
  const page = opcodes.prefixed.get(first);
  if (page === undefined) {
    return { entry: opcodes.main[first], opcode: first, headerLength: 1 };
  }

  const second = memory.read8((address + 1) & 0xffff);
  const bitPage = opcodes.indexedBit.get(first);
  if (INDEX_PREFIXES.has(first) && second === BIT_PREFIX && bitPage !== undefined) {
    const opcode = memory.read8((address + 3) & 0xffff);
    return {
      entry: bitPage[opcode],
      opcode,
      headerLength: 4,
      displacement: toSigned8(memory.read8((address + 2) & 0xffff)),
    };
  }
  return { entry: page[second], opcode: second, headerLength: 2 };
}

export function decode(arch: Architecture, memory: Memory, address: number): Instruction {
  address &= 0xffff;
  const { entry, opcode, headerLength, displacement: bitDisplacement } = lookup(arch, memory, address);

  if (entry === undefined) {
    throw new DecodeError('illegal-opcode', address, readBytes(memory, address, headerLength));
  }

  const bytes = readBytes(memory, address, entry.length);
  const reason = validateEntry(arch, entry);
  if (reason !== undefined) {
    throw new DecodeError(reason, address, bytes);
  }

  // Operand fields follow the opcode in operand order
  let data: number | undefined;
  let displacement = bitDisplacement;
  if (bitDisplacement === undefined) {
    let cursor = headerLength;
    for (const operand of entry.operands) {
      switch (operand.mode) {
        case 'immediate':
          data = operand.width === 16 ? bytes[cursor] | (bytes[cursor + 1] << 8) : bytes[cursor];
          cursor += operand.width / 8;
          break;
        case 'direct':
          data = bytes[cursor] | (bytes[cursor + 1] << 8);
          cursor += 2;
          break;
        case 'port':
          data = bytes[cursor];
          cursor += 1;
          break;
        case 'indexed':
        case 'relative':
          displacement = toSigned8(bytes[cursor]);
          cursor += 1;
          break;
        default:
          break;
      }
    }
  }

  return {
    ...entry,
    architecture: arch.id,
    address,
    opcode,
    bytes,
    data,
    displacement,
  };
}
