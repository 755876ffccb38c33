import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Ppi8255, PPI_PORT_A, PPI_PORT_B, PPI_PORT_C, PPI_CONTROL, PPI_RESET_CONTROL } from '../ppi8255';

describe('Ppi8255', () => {
  let ppi: Ppi8255;

  beforeEach(() => {
    ppi = new Ppi8255();
  });

  it('powers up with every port an input', () => {
    expect(ppi.controlWord).toBe(PPI_RESET_CONTROL);
    ppi.setInput(PPI_PORT_A, 0x5a);
    expect(ppi.in(PPI_PORT_A)).toBe(0x5a);
  });

  it('reads the control register as $FF', () => {
    expect(ppi.in(PPI_CONTROL)).toBe(0xff);
  });

  it('selects registers by the low two address bits', () => {
    ppi.setInput(PPI_PORT_B, 0x12);
    expect(ppi.in(0x41)).toBe(0x12);
  });

  describe('output ports', () => {
    beforeEach(() => {
      ppi.out(PPI_CONTROL, 0x80); // all outputs
    });

    it('latches and reports writes', () => {
      const cb = vi.fn();
      ppi.setOutputCallback(cb);
      ppi.out(PPI_PORT_A, 0x3c);
      expect(cb).toHaveBeenCalledWith(PPI_PORT_A, 0x3c);
      expect(ppi.getOutput(PPI_PORT_A)).toBe(0x3c);
      expect(ppi.in(PPI_PORT_A)).toBe(0x3c);
    });

    it('a new mode word clears the latches', () => {
      ppi.out(PPI_PORT_B, 0x55);
      ppi.out(PPI_CONTROL, 0x80);
      expect(ppi.getOutput(PPI_PORT_B)).toBe(0x00);
    });

    it('sets and resets single Port C bits', () => {
      const cb = vi.fn();
      ppi.setOutputCallback(cb);
      ppi.out(PPI_CONTROL, 0x0f); // set bit 7
      ppi.out(PPI_CONTROL, 0x03); // set bit 1
      ppi.out(PPI_CONTROL, 0x0e); // reset bit 7
      expect(ppi.getOutput(PPI_PORT_C)).toBe(0x02);
      expect(cb).toHaveBeenLastCalledWith(PPI_PORT_C, 0x02);
      expect(cb).toHaveBeenCalledTimes(3);
    });
  });

  it('mixes input and output halves of Port C', () => {
    ppi.out(PPI_CONTROL, 0x88); // C upper input, rest output
    expect(ppi.inputMask(PPI_PORT_C)).toBe(0xf0);
    ppi.setInput(PPI_PORT_C, 0xa5);
    ppi.out(PPI_PORT_C, 0x3c);
    expect(ppi.in(PPI_PORT_C)).toBe(0xac);
  });

  it('does not report writes to an input port', () => {
    const cb = vi.fn();
    ppi.setOutputCallback(cb);
    ppi.out(PPI_PORT_A, 0x11);
    expect(cb).not.toHaveBeenCalled();
  });

  it('reset restores the power-on state', () => {
    ppi.out(PPI_CONTROL, 0x80);
    ppi.out(PPI_PORT_A, 0x22);
    ppi.reset();
    expect(ppi.controlWord).toBe(PPI_RESET_CONTROL);
    expect(ppi.getOutput(PPI_PORT_A)).toBe(0x00);
  });
});
