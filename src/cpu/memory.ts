/**
 * Flat 64K RAM
 *
 * Every address reads and writes; there is no ROM or unmapped region.
 * Address arithmetic wraps modulo 65,536 and values are masked to a
 * byte, so out-of-range arguments are never an error.
 *
 * Implements the Memory interface required by the Cpu class.
 */

import type { Memory, ProgramImage } from './types';

export class FlatMemory implements Memory {
  private ram: Uint8Array;

  constructor() {
    this.ram = new Uint8Array(0x10000); // 64K
  }

  read8(address: number): number {
    return this.ram[address & 0xffff];
  }

  write8(address: number, value: number): void {
    this.ram[address & 0xffff] = value & 0xff;
  }

  /** Little-endian: low byte at `address`, high byte at `address + 1`. */
  read16(address: number): number {
    const lo = this.read8(address);
    const hi = this.read8(address + 1);
    return (hi << 8) | lo;
  }

  write16(address: number, value: number): void {
    this.write8(address, value & 0xff);
    this.write8(address + 1, (value >> 8) & 0xff);
  }

  /** Load a block of bytes at the given address. */
  load(origin: number, bytes: ArrayLike<number>): void {
    for (let i = 0; i < bytes.length; i++) {
      this.ram[(origin + i) & 0xffff] = bytes[i] & 0xff;
    }
  }

  /** Load every segment of a program image. */
  loadProgram(image: ProgramImage): void {
    for (const segment of image.segments) {
      this.load(segment.origin, segment.bytes);
    }
  }

  /** Copy out `length` bytes starting at `address`, wrapping at $FFFF. */
  dump(address: number, length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = this.ram[(address + i) & 0xffff];
    }
    return out;
  }

  /** Clear all RAM to zero. */
  clear(): void {
    this.ram.fill(0);
  }
}
