/**
 * Trainer System Integration
 *
 * Wires a CPU of either architecture to 64K of flat RAM and a port
 * router with an 8255 PPI, the way a single-board microprocessor
 * trainer is built. Programs arrive as origin-tagged byte segments.
 *
 * No ROM and no monitor: execution starts wherever the options or the
 * program image say.
 */

import { Cpu, FlatMemory, type ArchitectureId, type ProgramImage, type RunResult, type TraceCallback } from '@/cpu';
import { PortRouter, type DeviceMapping } from './port-router';
import { Ppi8255, type PpiOutputCallback } from './ppi8255';

export interface TrainerOptions {
  /** Default 'z80'. */
  architecture?: ArchitectureId;
  program?: ProgramImage;
  /** Overrides the program image's entry point. */
  entryPoint?: number;
  /** Initial SP; the architecture's reset value when omitted. */
  stackPointer?: number;
  /** First of the four PPI ports (default 0x00). */
  ppiBasePort?: number;
  /** Further devices on the port bus. */
  devices?: readonly DeviceMapping[];
}

export class TrainerSystem {
  readonly cpu: Cpu;
  readonly memory: FlatMemory;
  readonly ports: PortRouter;
  readonly ppi: Ppi8255;

  private readonly options: TrainerOptions;
  /** Entry point of the last image passed to loadProgram(). */
  private loadedEntryPoint: number | undefined;

  constructor(options: TrainerOptions = {}) {
    this.options = options;
    this.memory = new FlatMemory();
    this.ports = new PortRouter();
    this.ppi = new Ppi8255();
    this.ports.map(options.ppiBasePort ?? 0x00, this.ppi, 4);
    for (const { port, count, device } of options.devices ?? []) {
      this.ports.map(port, device, count);
    }
    this.cpu = new Cpu(options.architecture ?? 'z80', this.memory, this.ports);

    if (options.program) {
      this.memory.loadProgram(options.program);
    }
    this.applyStartState();
  }

  /**
   * Reset CPU and devices. Memory is kept; PC returns to the entry point of
   * the last loaded program, else the configured one.
   */
  reset(): void {
    this.ppi.reset();
    this.cpu.reset();
    this.applyStartState();
  }

  /**
   * Load a program image into memory. PC moves to its entry point when it
   * has one.
   */
  loadProgram(image: ProgramImage): void {
    this.memory.loadProgram(image);
    if (image.entryPoint !== undefined) {
      this.loadedEntryPoint = image.entryPoint;
      this.cpu.registers.pc = image.entryPoint;
    }
  }

  step(): boolean {
    return this.cpu.step();
  }

  run(maxSteps: number): RunResult {
    return this.cpu.run(maxSteps);
  }

  setTraceCallback(cb: TraceCallback | null): void {
    this.cpu.setTraceCallback(cb);
  }

  /** Register a callback for PPI output port writes. */
  setPortOutputCallback(cb: PpiOutputCallback | null): void {
    this.ppi.setOutputCallback(cb);
  }

  isHalted(): boolean {
    return this.cpu.halted;
  }

  private applyStartState(): void {
    const { entryPoint, stackPointer, program } = this.options;
    const start = this.loadedEntryPoint ?? entryPoint ?? program?.entryPoint;
    if (start !== undefined) {
      this.cpu.registers.pc = start;
    }
    if (stackPointer !== undefined) {
      this.cpu.registers.sp = stackPointer;
    }
  }
}
