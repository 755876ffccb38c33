/**
 * Operation handlers
 *
 * One handler per operation kind. A handler runs after PC has been moved
 * past the instruction; it resolves its operands, computes through the
 * ALU and writes the results back.
 */

import type { Architecture } from './architectures';
import type { Condition, Instruction, OperationKind } from './instruction';
import { resolveOperand, type Location, type OperandContext } from './operands';
import {
  add8, adc8, sub8, sbc8, and8, or8, xor8, cp8, inc8, dec8,
  add16, adc16, sbc16, daa, cpl, neg8, scf, ccf,
  rotateAccumulator, shift, bit, rotateDigit,
  type AluResult, type FlagRules, type RotateKind, type ShiftKind,
} from './alu';
import { SIM_MASK_BITS, SIM_MSE, SIM_SDE, SIM_SOD, RIM_IE } from './i8085/types';

/** What a handler may touch. The Cpu class implements it. */
export interface ExecutionContext extends OperandContext {
  readonly architecture: Architecture;
  interruptsEnabled: boolean;
  /** 8085 RST 5.5/6.5/7.5 mask bits, as set by SIM. */
  interruptMask: number;
  /** 8085 SOD latch. */
  serialOutput: number;
  push(value: number): void;
  pop(): number;
  halt(): void;
}

export type Handler = (ctx: ExecutionContext, instr: Instruction) => void;

/** Upper bound on iterations of one repeating block instruction. */
export const MAX_BLOCK_ITERATIONS = 0x10000;

// ========== Helpers ==========

function operand(ctx: ExecutionContext, instr: Instruction, index: number): Location {
  const op = instr.operands[index];
  if (op === undefined) {
    throw new Error(`${instr.text}: missing operand ${index}`);
  }
  return resolveOperand(ctx, instr, op);
}

export function conditionMet(ctx: ExecutionContext, condition: Condition | undefined): boolean {
  if (condition === undefined) return true;
  const f = ctx.registers.f;
  const L = ctx.architecture.flags;
  switch (condition) {
    case 'nz': return (f & L.zero) === 0;
    case 'z': return (f & L.zero) !== 0;
    case 'nc': return (f & L.carry) === 0;
    case 'c': return (f & L.carry) !== 0;
    case 'po': return (f & L.parity) === 0;
    case 'pe': return (f & L.parity) !== 0;
    case 'p': return (f & L.sign) === 0;
    case 'm': return (f & L.sign) !== 0;
  }
}

function isRotateKind(kind: ShiftKind): kind is RotateKind {
  return kind === 'rlc' || kind === 'rrc' || kind === 'rl' || kind === 'rr';
}

function requireShift(instr: Instruction): ShiftKind {
  if (instr.shift === undefined) throw new Error(`${instr.text}: no shift kind`);
  return instr.shift;
}

function requireBit(instr: Instruction): number {
  if (instr.bit === undefined) throw new Error(`${instr.text}: no bit number`);
  return instr.bit;
}

/** A <- fn(A, source). */
function accumulatorOp(fn: (rules: FlagRules, a: number, b: number, flags: number) => AluResult): Handler {
  return (ctx, instr) => {
    const r = ctx.registers;
    const result = fn(ctx.architecture.rules, r.a, operand(ctx, instr, 1).read(), r.f);
    r.a = result.value;
    r.f = result.flags;
  };
}

/** A <- fn(A), no second operand. */
function accumulatorUnary(fn: (rules: FlagRules, a: number, flags: number) => AluResult): Handler {
  return (ctx) => {
    const r = ctx.registers;
    const result = fn(ctx.architecture.rules, r.a, r.f);
    r.a = result.value;
    r.f = result.flags;
  };
}

/** Read-modify-write of the first operand. */
function modify(fn: (rules: FlagRules, value: number, flags: number, instr: Instruction) => AluResult): Handler {
  return (ctx, instr) => {
    const target = operand(ctx, instr, 0);
    const result = fn(ctx.architecture.rules, target.read(), ctx.registers.f, instr);
    target.write(result.value);
    ctx.registers.f = result.flags;
  };
}

function flagsOnly(fn: (rules: FlagRules, flags: number) => AluResult): Handler {
  return (ctx) => {
    ctx.registers.f = fn(ctx.architecture.rules, ctx.registers.f).flags;
  };
}

/** dst <- fn(dst, src) for 16-bit register pairs. */
function pairOp(fn: (rules: FlagRules, a: number, b: number, flags: number) => AluResult): Handler {
  return (ctx, instr) => {
    const dst = operand(ctx, instr, 0);
    const result = fn(ctx.architecture.rules, dst.read(), operand(ctx, instr, 1).read(), ctx.registers.f);
    dst.write(result.value);
    ctx.registers.f = result.flags;
  };
}

function bitUpdate(apply: (value: number, mask: number) => number): Handler {
  return (ctx, instr) => {
    const target = operand(ctx, instr, 0);
    target.write(apply(target.read(), 1 << requireBit(instr)));
  };
}

function digitRotate(direction: 'left' | 'right'): Handler {
  return (ctx) => {
    const r = ctx.registers;
    const address = r.hl;
    const result = rotateDigit(ctx.architecture.rules, direction, r.a, ctx.memory.read8(address), r.f);
    ctx.memory.write8(address, result.memory);
    r.a = result.accumulator;
    r.f = result.flags;
  };
}

// ========== Block transfer and search ==========

/** (DE) <- (HL), step both, BC-1. P/V reports BC != 0. */
function loadStep(ctx: ExecutionContext, delta: 1 | -1): void {
  const r = ctx.registers;
  const L = ctx.architecture.flags;
  ctx.memory.write8(r.de, ctx.memory.read8(r.hl));
  r.hl += delta;
  r.de += delta;
  r.bc -= 1;
  r.f = (r.f & (L.sign | L.zero | L.carry)) | (r.bc !== 0 ? L.parity : 0) | L.alwaysOne;
}

/** Compare A with (HL), step HL, BC-1. Returns true on a match. */
function compareStep(ctx: ExecutionContext, delta: 1 | -1): boolean {
  const r = ctx.registers;
  const L = ctx.architecture.flags;
  const value = ctx.memory.read8(r.hl);
  const result = (r.a - value) & 0xff;
  r.hl += delta;
  r.bc -= 1;
  r.f =
    (r.f & L.carry) | L.subtract |
    ctx.architecture.rules.sz[result] |
    ((r.a ^ value ^ result) & 0x10 ? L.halfCarry : 0) |
    (r.bc !== 0 ? L.parity : 0) |
    L.alwaysOne;
  return result === 0;
}

// Repeat forms run to completion inside one step. A zero count does nothing.
function loadRepeat(delta: 1 | -1): Handler {
  return (ctx) => {
    const r = ctx.registers;
    for (let i = 0; i < MAX_BLOCK_ITERATIONS && r.bc !== 0; i++) {
      loadStep(ctx, delta);
    }
  };
}

function compareRepeat(delta: 1 | -1): Handler {
  return (ctx) => {
    const r = ctx.registers;
    for (let i = 0; i < MAX_BLOCK_ITERATIONS && r.bc !== 0; i++) {
      if (compareStep(ctx, delta)) break;
    }
  };
}

// ========== Dispatch table ==========

export const HANDLERS: Record<OperationKind, Handler> = {
  nop: () => {},
  halt: (ctx) => ctx.halt(),

  move: (ctx, instr) => {
    const value = operand(ctx, instr, 1).read();
    operand(ctx, instr, 0).write(value);
  },
  push: (ctx, instr) => ctx.push(operand(ctx, instr, 0).read()),
  pop: (ctx, instr) => operand(ctx, instr, 0).write(ctx.pop()),
  exchange: (ctx, instr) => {
    const first = operand(ctx, instr, 0);
    const second = operand(ctx, instr, 1);
    const t = first.read();
    first.write(second.read());
    second.write(t);
  },
  exchangeMain: (ctx) => ctx.registers.exchangeMain(),
  exchangeAccumulator: (ctx) => ctx.registers.exchangeAccumulator(),

  // --- 8-bit arithmetic and logic ---
  add: accumulatorOp(add8),
  addWithCarry: accumulatorOp(adc8),
  subtract: accumulatorOp(sub8),
  subtractWithBorrow: accumulatorOp(sbc8),
  and: accumulatorOp(and8),
  or: accumulatorOp(or8),
  xor: accumulatorOp(xor8),
  compare: accumulatorOp(cp8),
  increment: modify((rules, value, flags) => inc8(rules, value, flags)),
  decrement: modify((rules, value, flags) => dec8(rules, value, flags)),
  decimalAdjust: accumulatorUnary(daa),
  complement: accumulatorUnary(cpl),
  negate: accumulatorUnary((rules, a) => neg8(rules, a)),
  setCarry: flagsOnly(scf),
  complementCarry: flagsOnly(ccf),

  // --- 16-bit ---
  increment16: (ctx, instr) => {
    const target = operand(ctx, instr, 0);
    target.write(target.read() + 1);
  },
  decrement16: (ctx, instr) => {
    const target = operand(ctx, instr, 0);
    target.write(target.read() - 1);
  },
  add16: pairOp(add16),
  addWithCarry16: pairOp(adc16),
  subtractWithBorrow16: pairOp(sbc16),

  // --- Rotates and bits ---
  rotateAccumulator: (ctx, instr) => {
    const kind = requireShift(instr);
    if (!isRotateKind(kind)) {
      throw new Error(`${instr.text}: ${kind} is not an accumulator rotate`);
    }
    const r = ctx.registers;
    const result = rotateAccumulator(ctx.architecture.rules, kind, r.a, r.f);
    r.a = result.value;
    r.f = result.flags;
  },
  shift: modify((rules, value, flags, instr) => shift(rules, requireShift(instr), value, flags)),
  testBit: (ctx, instr) => {
    const value = operand(ctx, instr, 0).read();
    ctx.registers.f = bit(ctx.architecture.rules, requireBit(instr), value, ctx.registers.f).flags;
  },
  setBit: bitUpdate((value, mask) => value | mask),
  resetBit: bitUpdate((value, mask) => value & ~mask),
  rotateDigitLeft: digitRotate('left'),
  rotateDigitRight: digitRotate('right'),

  // --- Control flow ---
  jump: (ctx, instr) => {
    if (conditionMet(ctx, instr.condition)) {
      ctx.registers.pc = operand(ctx, instr, 0).read();
    }
  },
  jumpRelative: (ctx, instr) => {
    if (conditionMet(ctx, instr.condition)) {
      ctx.registers.pc = operand(ctx, instr, 0).read();
    }
  },
  decrementJumpNonZero: (ctx, instr) => {
    const r = ctx.registers;
    r.b -= 1;
    if (r.b !== 0) {
      r.pc = operand(ctx, instr, 0).read();
    }
  },
  call: (ctx, instr) => {
    if (conditionMet(ctx, instr.condition)) {
      const target = operand(ctx, instr, 0).read();
      ctx.push(ctx.registers.pc);
      ctx.registers.pc = target;
    }
  },
  return: (ctx, instr) => {
    if (conditionMet(ctx, instr.condition)) {
      ctx.registers.pc = ctx.pop();
    }
  },
  restart: (ctx, instr) => {
    if (instr.vector === undefined) throw new Error(`${instr.text}: no restart vector`);
    ctx.push(ctx.registers.pc);
    ctx.registers.pc = instr.vector;
  },

  // --- I/O ---
  portIn: (ctx, instr) => {
    const value = operand(ctx, instr, 1).read() & 0xff;
    operand(ctx, instr, 0).write(value);
    // IN r,(C) sets S Z P from the byte read; IN A,(n) leaves flags alone
    if (instr.operands[1]?.mode === 'portC') {
      const r = ctx.registers;
      const L = ctx.architecture.flags;
      r.f = (r.f & L.carry) | ctx.architecture.rules.szp[value] | L.alwaysOne;
    }
  },
  portOut: (ctx, instr) => {
    const value = operand(ctx, instr, 1).read();
    operand(ctx, instr, 0).write(value);
  },

  // --- Block transfer and search ---
  loadIncrement: (ctx) => loadStep(ctx, 1),
  loadDecrement: (ctx) => loadStep(ctx, -1),
  loadIncrementRepeat: loadRepeat(1),
  loadDecrementRepeat: loadRepeat(-1),
  compareIncrement: (ctx) => { compareStep(ctx, 1); },
  compareDecrement: (ctx) => { compareStep(ctx, -1); },
  compareIncrementRepeat: compareRepeat(1),
  compareDecrementRepeat: compareRepeat(-1),

  // --- Interrupt control ---
  enableInterrupts: (ctx) => { ctx.interruptsEnabled = true; },
  disableInterrupts: (ctx) => { ctx.interruptsEnabled = false; },
  readInterruptMask: (ctx) => {
    ctx.registers.a = (ctx.interruptMask & SIM_MASK_BITS) | (ctx.interruptsEnabled ? RIM_IE : 0);
  },
  setInterruptMask: (ctx) => {
    const a = ctx.registers.a;
    if (a & SIM_MSE) {
      ctx.interruptMask = a & SIM_MASK_BITS;
    }
    if (a & SIM_SDE) {
      ctx.serialOutput = a & SIM_SOD ? 1 : 0;
    }
  },
};
