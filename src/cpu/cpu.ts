/**
 * Instruction Dispatcher
 *
 * One engine for both instruction sets. Each step fetches at PC, decodes
 * through the architecture's opcode table, moves PC past the instruction
 * and runs the handler for its operation kind.
 *
 * A DecodeError leaves every register and memory byte as it was (PC
 * still on the offending byte). The error is kept as the CPU's fault and
 * rethrown by later steps until reset(). A device or trace callback that
 * throws puts PC back on the instruction, so stepping again retries it.
 */

import type { ArchitectureId, CpuState, ExecutionState, FlagLayout, IOBus, Memory } from './types';
import { NullIOBus } from './types';
import { RegisterFile } from './registers';
import { getArchitecture, type Architecture } from './architectures';
import { decode } from './decoder';
import { DecodeError } from './errors';
import { HANDLERS, type ExecutionContext } from './handlers';
import type { Instruction } from './instruction';
import { formatInstruction } from './disasm';

export interface TraceEntry {
  address: number;
  bytes: readonly number[];
  text: string;
}

export type TraceCallback = (entry: TraceEntry) => void;

export type RunOutcome = 'halted' | 'budget-exhausted';

export interface RunResult {
  outcome: RunOutcome;
  steps: number;
}

export type FlagName = Exclude<keyof FlagLayout, 'alwaysOne' | 'mask'>;

export class Cpu implements ExecutionContext {
  readonly architecture: Architecture;
  readonly registers: RegisterFile;
  readonly memory: Memory;
  readonly io: IOBus;

  // Interrupt state (no interrupt delivery, only what EI/DI/SIM/RIM observe)
  interruptsEnabled = false;
  interruptMask = 0;
  serialOutput = 0;

  /** Instructions executed since reset. */
  steps = 0;

  private _state: ExecutionState = 'fetch';
  private _fault: DecodeError | null = null;
  private traceCallback: TraceCallback | null = null;

  constructor(architecture: Architecture | ArchitectureId, memory: Memory, io?: IOBus) {
    this.architecture = typeof architecture === 'string' ? getArchitecture(architecture) : architecture;
    this.memory = memory;
    this.io = io ?? new NullIOBus();
    this.registers = new RegisterFile(this.architecture.flags);
    this.reset();
  }

  get state(): ExecutionState {
    return this._state;
  }

  get halted(): boolean {
    return this._state === 'halted';
  }

  /** The decode error that stopped the CPU, if any. */
  get fault(): DecodeError | null {
    return this._fault;
  }

  get flags(): number {
    return this.registers.f;
  }

  testFlag(name: FlagName): boolean {
    const bit = this.architecture.flags[name];
    return bit !== 0 && (this.registers.f & bit) !== 0;
  }

  /** Receive every instruction as it is executed. */
  setTraceCallback(cb: TraceCallback | null): void {
    this.traceCallback = cb;
  }

  // --- Stack operations ---

  /** SP-1 <- high byte, SP-2 <- low byte. */
  push(value: number): void {
    const r = this.registers;
    r.sp -= 1;
    this.memory.write8(r.sp, (value >> 8) & 0xff);
    r.sp -= 1;
    this.memory.write8(r.sp, value & 0xff);
  }

  pop(): number {
    const r = this.registers;
    const lo = this.memory.read8(r.sp);
    r.sp += 1;
    const hi = this.memory.read8(r.sp);
    r.sp += 1;
    return (hi << 8) | lo;
  }

  halt(): void {
    this._state = 'halted';
  }

  reset(): void {
    this.registers.reset(this.architecture.resetStackPointer);
    this.interruptsEnabled = false;
    this.interruptMask = 0;
    this.serialOutput = 0;
    this.steps = 0;
    this._fault = null;
    this._state = 'fetch';
  }

  // --- Execute single instruction ---

  /** Execute one instruction. Returns true when the CPU is halted. */
  step(): boolean {
    if (this._fault) throw this._fault;
    if (this.halted) return true;

    const address = this.registers.pc;
    this._state = 'decode';
    let instr: Instruction;
    try {
      instr = decode(this.architecture, this.memory, address);
    } catch (err) {
      if (err instanceof DecodeError) {
        this._fault = err;
        this._state = 'halted';
      } else {
        this._state = 'fetch';
      }
      throw err;
    }

    this._state = 'execute';
    this.registers.pc = address + instr.length;

    try {
      if (this.traceCallback) {
        this.traceCallback({ address, bytes: instr.bytes, text: formatInstruction(instr) });
      }
      HANDLERS[instr.kind](this, instr);
      this.steps++;
    } catch (err) {
      // Back on the failed instruction so a retry executes it
      this.registers.pc = address;
      this._state = 'fetch';
      throw err;
    }
    // HALT leaves the state at 'halted'
    if (!this.halted) this._state = 'fetch';
    return this.halted;
  }

  /** Step until HALT or until `maxSteps` instructions have run. */
  run(maxSteps: number): RunResult {
    if (!Number.isInteger(maxSteps) || maxSteps < 0) {
      throw new Error(`Step budget must be a non-negative integer, got ${maxSteps}`);
    }
    if (this._fault) throw this._fault;
    let steps = 0;
    while (!this.halted) {
      if (steps >= maxSteps) {
        return { outcome: 'budget-exhausted', steps };
      }
      this.step();
      steps++;
    }
    return { outcome: 'halted', steps };
  }

  getState(): CpuState {
    return {
      ...this.registers.snapshot(),
      architecture: this.architecture.id,
      state: this._state,
      halted: this.halted,
      interruptsEnabled: this.interruptsEnabled,
      interruptMask: this.interruptMask,
      steps: this.steps,
    };
  }
}
