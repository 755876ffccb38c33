import { describe, it, expect, beforeEach } from 'vitest';
import { PortRouter } from '../port-router';
import type { IOBus } from '@/cpu/types';

class Latch implements IOBus {
  value = 0;
  lastPort = -1;

  in(port: number): number {
    this.lastPort = port;
    return this.value;
  }

  out(port: number, value: number): void {
    this.lastPort = port;
    this.value = value;
  }
}

describe('PortRouter', () => {
  let router: PortRouter;
  let device: Latch;

  beforeEach(() => {
    router = new PortRouter();
    device = new Latch();
  });

  it('floats unmapped reads high', () => {
    expect(router.in(0x10)).toBe(0xff);
  });

  it('drops unmapped writes', () => {
    router.out(0x10, 0x12);
    expect(device.value).toBe(0);
  });

  it('routes a mapped range to its device', () => {
    router.map(0x40, device, 2);
    router.out(0x41, 0x1ab);
    expect(device.value).toBe(0xab);
    expect(device.lastPort).toBe(0x41);
    expect(router.in(0x40)).toBe(0xab);
    expect(router.isMapped(0x42)).toBe(false);
  });

  it('masks port numbers to 8 bits', () => {
    router.map(0x05, device);
    device.value = 0x33;
    expect(router.in(0x1205)).toBe(0x33);
    expect(device.lastPort).toBe(0x05);
  });

  it('refuses to map a port twice', () => {
    router.map(0x20, device, 4);
    expect(() => router.map(0x23, new Latch())).toThrow('Port $23 is already mapped');
  });

  it('a conflicting map leaves the whole range untouched', () => {
    router.map(0x04, device);
    const other = new Latch();
    expect(() => router.map(0x02, other, 4)).toThrow('Port $04 is already mapped');
    expect(router.isMapped(0x02)).toBe(false);
    expect(router.isMapped(0x03)).toBe(false);
    expect(router.isMapped(0x05)).toBe(false);
    router.out(0x04, 0x12);
    expect(device.value).toBe(0x12);
    expect(other.value).toBe(0);
  });

  it('unmap frees a port', () => {
    router.map(0x20, device);
    router.unmap(0x20);
    expect(router.isMapped(0x20)).toBe(false);
    expect(router.in(0x20)).toBe(0xff);
  });
});
