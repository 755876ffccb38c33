/**
 * Intel 8255 Programmable Peripheral Interface (mode 0 only)
 *
 * Four registers selected by A1 A0 (the low two bits of the port):
 *   +0 Port A   +1 Port B   +2 Port C   +3 Control word (write-only)
 *
 * Control word with D7=1 sets the port directions:
 *   D4 Port A input, D3 Port C upper input, D1 Port B input,
 *   D0 Port C lower input. D6 D5 and D2 select modes 1/2, which are not
 *   emulated and read as mode 0.
 * Control word with D7=0 sets (D0=1) or resets (D0=0) the Port C bit
 * numbered by D3..D1.
 *
 * Input ports read the external latch set with `setInput()`. Output
 * ports read back their own latch, and every write to an output port is
 * reported through the output callback.
 */

import type { IOBus } from '@/cpu/types';

export const PPI_PORT_A = 0;
export const PPI_PORT_B = 1;
export const PPI_PORT_C = 2;
export const PPI_CONTROL = 3;

const CW_MODE_SET = 0x80;
const CW_A_INPUT = 0x10;
const CW_C_UPPER_INPUT = 0x08;
const CW_B_INPUT = 0x02;
const CW_C_LOWER_INPUT = 0x01;

/** Power-on control word: every port an input. */
export const PPI_RESET_CONTROL = 0x9b;

export type PpiPort = typeof PPI_PORT_A | typeof PPI_PORT_B | typeof PPI_PORT_C;

/** Called when the CPU writes a port configured as output. */
export type PpiOutputCallback = (port: PpiPort, value: number) => void;

/** Register selected by A1 A0; undefined is the control register. */
function selectPort(port: number): PpiPort | undefined {
  switch (port & 0x03) {
    case PPI_PORT_A: return PPI_PORT_A;
    case PPI_PORT_B: return PPI_PORT_B;
    case PPI_PORT_C: return PPI_PORT_C;
    default: return undefined;
  }
}

export class Ppi8255 implements IOBus {
  private control = PPI_RESET_CONTROL;
  private readonly outputLatch = [0, 0, 0];
  private readonly inputLatch = [0, 0, 0];
  private outputCallback: PpiOutputCallback | null = null;

  setOutputCallback(cb: PpiOutputCallback | null): void {
    this.outputCallback = cb;
  }

  /** Drive the external pins of a port (what IN will see when it is an input). */
  setInput(port: PpiPort, value: number): void {
    this.inputLatch[port] = value & 0xff;
  }

  /** Last value written to a port's output latch. */
  getOutput(port: PpiPort): number {
    return this.outputLatch[port];
  }

  get controlWord(): number {
    return this.control;
  }

  /** Bits of each port that are inputs under the current control word. */
  inputMask(port: PpiPort): number {
    switch (port) {
      case PPI_PORT_A: return this.control & CW_A_INPUT ? 0xff : 0x00;
      case PPI_PORT_B: return this.control & CW_B_INPUT ? 0xff : 0x00;
      case PPI_PORT_C:
        return (this.control & CW_C_UPPER_INPUT ? 0xf0 : 0x00) |
          (this.control & CW_C_LOWER_INPUT ? 0x0f : 0x00);
    }
  }

  in(port: number): number {
    const reg = selectPort(port);
    if (reg === undefined) {
      return 0xff;
    }
    const mask = this.inputMask(reg);
    return (this.inputLatch[reg] & mask) | (this.outputLatch[reg] & ~mask & 0xff);
  }

  out(port: number, value: number): void {
    const reg = selectPort(port);
    value &= 0xff;

    if (reg === undefined) {
      this.writeControl(value);
      return;
    }

    this.outputLatch[reg] = value;
    if (this.inputMask(reg) !== 0xff) {
      this.outputCallback?.(reg, this.outputLatch[reg]);
    }
  }

  reset(): void {
    this.control = PPI_RESET_CONTROL;
    this.outputLatch.fill(0);
    this.inputLatch.fill(0);
  }

  private writeControl(value: number): void {
    if (value & CW_MODE_SET) {
      // A mode set clears every output latch
      this.control = value;
      this.outputLatch.fill(0);
      return;
    }

    // Port C bit set/reset
    const bitMask = 1 << ((value >> 1) & 0x07);
    this.outputLatch[PPI_PORT_C] = value & 0x01
      ? this.outputLatch[PPI_PORT_C] | bitMask
      : this.outputLatch[PPI_PORT_C] & ~bitMask;
    if ((this.inputMask(PPI_PORT_C) & bitMask) === 0) {
      this.outputCallback?.(PPI_PORT_C, this.outputLatch[PPI_PORT_C]);
    }
  }
}
