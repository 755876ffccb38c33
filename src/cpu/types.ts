/**
 * Shared CPU types
 *
 * Both instruction sets run on one engine, so the interfaces here are
 * written once: the memory bus, the I/O bus, register names and the
 * state snapshot used by tests and tracing.
 */

/** Byte-addressable 64K memory. Addresses wrap modulo 65,536. */
export interface Memory {
  read8(address: number): number;
  write8(address: number, value: number): void;
  read16(address: number): number;
  write16(address: number, value: number): void;
}

/** I/O port interface: IN/OUT instructions route here by 8-bit port number. */
export interface IOBus {
  in(port: number): number;
  out(port: number, value: number): void;
}

/** Bus with nothing attached: reads float high (0xFF), writes are dropped. */
export class NullIOBus implements IOBus {
  in(_port: number): number {
    return 0xff;
  }
  out(_port: number, _value: number): void {
    // no-op
  }
}

export type ArchitectureId = 'z80' | 'i8085';

/** 8-bit registers, F included. */
export type Reg8 = 'a' | 'f' | 'b' | 'c' | 'd' | 'e' | 'h' | 'l';

/** 16-bit registers and register pairs. */
export type Reg16 = 'af' | 'bc' | 'de' | 'hl' | 'sp' | 'ix' | 'iy';

export type IndexRegister = 'ix' | 'iy';

/**
 * Flag bit positions within F.
 * `subtract` is 0 on architectures without an N flag.
 */
export interface FlagLayout {
  readonly sign: number;
  readonly zero: number;
  readonly halfCarry: number;
  readonly parity: number;
  readonly subtract: number;
  readonly carry: number;
  /** Bits that always read as 1. */
  readonly alwaysOne: number;
  /** Bits F can hold (alwaysOne included). */
  readonly mask: number;
}

/** Plain snapshot of the register file. */
export interface RegisterState {
  a: number;
  f: number;
  b: number;
  c: number;
  d: number;
  e: number;
  h: number;
  l: number;

  // Shadow registers
  a_: number;
  f_: number;
  b_: number;
  c_: number;
  d_: number;
  e_: number;
  h_: number;
  l_: number;

  ix: number;
  iy: number;
  sp: number;
  pc: number;
}

export type ExecutionState = 'fetch' | 'decode' | 'execute' | 'halted';

/** Snapshot of the whole CPU for inspection. */
export interface CpuState extends RegisterState {
  architecture: ArchitectureId;
  state: ExecutionState;
  halted: boolean;
  interruptsEnabled: boolean;
  interruptMask: number;
  steps: number;
}

/** One contiguous block of a program image. */
export interface ProgramSegment {
  origin: number;
  bytes: ArrayLike<number>;
}

/** Origin-tagged bytes to place in memory before execution. */
export interface ProgramImage {
  segments: ProgramSegment[];
  entryPoint?: number;
}
