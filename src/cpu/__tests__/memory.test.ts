import { describe, it, expect, beforeEach } from 'vitest';
import { FlatMemory } from '../memory';

describe('FlatMemory', () => {
  let mem: FlatMemory;

  beforeEach(() => {
    mem = new FlatMemory();
  });

  it('starts zeroed', () => {
    expect(mem.read8(0x0000)).toBe(0);
    expect(mem.read8(0x8000)).toBe(0);
    expect(mem.read8(0xffff)).toBe(0);
  });

  it('masks written values to a byte', () => {
    mem.write8(0x1000, 0x1ff);
    expect(mem.read8(0x1000)).toBe(0xff);
  });

  it('wraps addresses modulo 64K', () => {
    mem.write8(0x10005, 0x42);
    expect(mem.read8(0x0005)).toBe(0x42);
    expect(mem.read8(-1)).toBe(mem.read8(0xffff));
  });

  describe('16-bit access', () => {
    it('stores low byte first', () => {
      mem.write16(0x2000, 0x1234);
      expect(mem.read8(0x2000)).toBe(0x34);
      expect(mem.read8(0x2001)).toBe(0x12);
      expect(mem.read16(0x2000)).toBe(0x1234);
    });

    it('wraps the high byte to $0000', () => {
      mem.write16(0xffff, 0xabcd);
      expect(mem.read8(0xffff)).toBe(0xcd);
      expect(mem.read8(0x0000)).toBe(0xab);
      expect(mem.read16(0xffff)).toBe(0xabcd);
    });
  });

  describe('loading', () => {
    it('loads a block at an origin', () => {
      mem.load(0x8000, [0x3e, 0x67, 0x76]);
      expect(Array.from(mem.dump(0x8000, 3))).toEqual([0x3e, 0x67, 0x76]);
    });

    it('loads every segment of a program image', () => {
      mem.loadProgram({
        segments: [
          { origin: 0x0000, bytes: [0xc3, 0x00, 0x80] },
          { origin: 0x8000, bytes: new Uint8Array([0x76]) },
        ],
      });
      expect(mem.read8(0x0000)).toBe(0xc3);
      expect(mem.read16(0x0001)).toBe(0x8000);
      expect(mem.read8(0x8000)).toBe(0x76);
    });

    it('dump returns a copy that wraps', () => {
      mem.write8(0xffff, 0x11);
      mem.write8(0x0000, 0x22);
      const bytes = mem.dump(0xffff, 2);
      expect(Array.from(bytes)).toEqual([0x11, 0x22]);
      bytes[0] = 0x99;
      expect(mem.read8(0xffff)).toBe(0x11);
    });

    it('clear zeroes everything', () => {
      mem.load(0x4000, [1, 2, 3]);
      mem.clear();
      expect(Array.from(mem.dump(0x4000, 3))).toEqual([0, 0, 0]);
    });
  });
});
