import { describe, it, expect, vi } from 'vitest';
import { TrainerSystem, PPI_PORT_A, PPI_PORT_B, type IOBus } from '@/index';

// Z80: configure the PPI as outputs and write $A5 to Port A
const Z80_BLINK = [
  0x3e, 0x80, // LD A,$80
  0xd3, 0x03, // OUT ($03),A
  0x3e, 0xa5, // LD A,$A5
  0xd3, 0x00, // OUT ($00),A
  0x76,
];

describe('TrainerSystem', () => {
  it('defaults to the Z80 with the PPI at port 0', () => {
    const system = new TrainerSystem();
    expect(system.cpu.architecture.id).toBe('z80');
    expect(system.ports.isMapped(0x03)).toBe(true);
    expect(system.ports.isMapped(0x04)).toBe(false);
  });

  it('loads the program image and starts at its entry point', () => {
    const system = new TrainerSystem({
      program: { segments: [{ origin: 0x8000, bytes: Z80_BLINK }], entryPoint: 0x8000 },
    });
    expect(system.cpu.registers.pc).toBe(0x8000);
    const outputs = vi.fn();
    system.setPortOutputCallback(outputs);
    expect(system.run(100)).toEqual({ outcome: 'halted', steps: 5 });
    expect(system.isHalted()).toBe(true);
    expect(system.ppi.getOutput(PPI_PORT_A)).toBe(0xa5);
    expect(outputs).toHaveBeenCalledWith(PPI_PORT_A, 0xa5);
  });

  it('runs 8085 code against the PPI at another base', () => {
    const system = new TrainerSystem({
      architecture: 'i8085',
      ppiBasePort: 0x20,
      stackPointer: 0x3fff,
      entryPoint: 0x2000,
      program: {
        segments: [{
          origin: 0x2000,
          bytes: [
            0xdb, 0x21,       // IN 21H (Port B)
            0x32, 0x00, 0x30, // STA 3000H
            0x76,
          ],
        }],
      },
    });
    system.ppi.setInput(PPI_PORT_B, 0x42);
    system.run(10);
    expect(system.memory.read8(0x3000)).toBe(0x42);
    expect(system.cpu.registers.sp).toBe(0x3fff);
  });

  it('maps extra devices beside the PPI', () => {
    const display: IOBus = { in: () => 0x00, out: vi.fn() };
    const system = new TrainerSystem({
      devices: [{ port: 0x80, device: display }],
      program: { segments: [{ origin: 0, bytes: [0x3e, 0x07, 0xd3, 0x80, 0x76] }] },
    });
    system.run(10);
    expect(display.out).toHaveBeenCalledWith(0x80, 0x07);
  });

  it('reset keeps memory and returns to the configured start', () => {
    const system = new TrainerSystem({
      entryPoint: 0x8000,
      stackPointer: 0x9000,
      program: { segments: [{ origin: 0x8000, bytes: Z80_BLINK }] },
    });
    system.run(100);
    system.reset();
    expect(system.isHalted()).toBe(false);
    expect(system.cpu.registers.pc).toBe(0x8000);
    expect(system.cpu.registers.sp).toBe(0x9000);
    expect(system.memory.read8(0x8000)).toBe(0x3e);
    expect(system.ppi.getOutput(PPI_PORT_A)).toBe(0x00);
  });

  it('loadProgram moves PC to a new entry point', () => {
    const system = new TrainerSystem();
    system.loadProgram({ segments: [{ origin: 0x4000, bytes: [0x76] }], entryPoint: 0x4000 });
    expect(system.step()).toBe(true);
    expect(system.cpu.registers.pc).toBe(0x4001);
  });

  it('reset returns to the entry point of the loaded program', () => {
    const system = new TrainerSystem({ entryPoint: 0x8000 });
    system.loadProgram({ segments: [{ origin: 0x2000, bytes: [0x00, 0x76] }], entryPoint: 0x2000 });
    system.run(10);
    system.reset();
    expect(system.cpu.registers.pc).toBe(0x2000);
    expect(system.run(10)).toEqual({ outcome: 'halted', steps: 2 });
  });

  it('traces through the CPU', () => {
    const system = new TrainerSystem({ program: { segments: [{ origin: 0, bytes: [0x00, 0x76] }] } });
    const trace = vi.fn();
    system.setTraceCallback(trace);
    system.run(10);
    expect(trace).toHaveBeenCalledTimes(2);
    expect(trace).toHaveBeenLastCalledWith({ address: 0x0001, bytes: [0x76], text: 'HALT' });
  });
});
