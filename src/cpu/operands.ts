/**
 * Addressing Resolver
 *
 * Maps an operand descriptor of a decoded instruction to a Location that
 * can be read and written. Registers, memory and ports are reached through
 * the same two calls, so handlers never branch on addressing mode.
 */

import type { IOBus, Memory } from './types';
import type { RegisterFile } from './registers';
import type { Instruction, Operand } from './instruction';

export interface Location {
  read(): number;
  write(value: number): void;
}

export interface OperandContext {
  readonly registers: RegisterFile;
  readonly memory: Memory;
  readonly io: IOBus;
}

function requireData(instr: Instruction): number {
  if (instr.data === undefined) {
    throw new Error(`${instr.text} at $${instr.address.toString(16)} has no operand data`);
  }
  return instr.data;
}

function requireDisplacement(instr: Instruction): number {
  if (instr.displacement === undefined) {
    throw new Error(`${instr.text} at $${instr.address.toString(16)} has no displacement`);
  }
  return instr.displacement;
}

function readOnly(value: number, what: string): Location {
  return {
    read: () => value,
    write: () => { throw new Error(`Cannot write to ${what}`); },
  };
}

function memoryLocation(memory: Memory, address: number, width: 8 | 16): Location {
  return width === 16
    ? { read: () => memory.read16(address), write: (v) => memory.write16(address, v) }
    : { read: () => memory.read8(address), write: (v) => memory.write8(address, v) };
}

export function resolveOperand(ctx: OperandContext, instr: Instruction, operand: Operand): Location {
  const { registers, memory, io } = ctx;

  switch (operand.mode) {
    case 'immediate':
      return readOnly(requireData(instr), 'an immediate operand');

    case 'register':
      return {
        read: () => registers.get8(operand.reg),
        write: (v) => registers.set8(operand.reg, v),
      };

    case 'pair':
      return {
        read: () => registers.getPair(operand.pair),
        write: (v) => registers.setPair(operand.pair, v),
      };

    case 'indirect':
      return memoryLocation(memory, registers.getPair(operand.pair), operand.width);

    case 'indexed':
      return memoryLocation(
        memory,
        (registers.getPair(operand.index) + requireDisplacement(instr)) & 0xffff,
        8,
      );

    case 'direct':
      return memoryLocation(memory, requireData(instr), operand.width);

    case 'port': {
      const portNumber = requireData(instr) & 0xff;
      return { read: () => io.in(portNumber), write: (v) => io.out(portNumber, v & 0xff) };
    }

    case 'portC':
      return {
        read: () => io.in(registers.c),
        write: (v) => io.out(registers.c, v & 0xff),
      };

    case 'relative':
      // PC has already moved past the instruction
      return readOnly((registers.pc + requireDisplacement(instr)) & 0xffff, 'a branch target');
  }
}
