/**
 * Port Router
 *
 * Routes IN/OUT by 8-bit port number to the device mapped there. The
 * CPU sees one IOBus; devices only receive the ports they own.
 * Unmapped reads return 0xFF (floating bus) and unmapped writes are
 * ignored.
 */

import type { IOBus } from '@/cpu/types';

export interface DeviceMapping {
  /** First port the device answers on. */
  port: number;
  /** Number of consecutive ports (default 1). */
  count?: number;
  device: IOBus;
}

export class PortRouter implements IOBus {
  private readonly devices = new Map<number, IOBus>();

  /** Attach a device to `count` consecutive ports starting at `port`. */
  map(port: number, device: IOBus, count = 1): void {
    const ports = Array.from({ length: count }, (_, i) => (port + i) & 0xff);
    const taken = ports.find((p) => this.devices.has(p));
    if (taken !== undefined) {
      throw new Error(`Port $${taken.toString(16).toUpperCase().padStart(2, '0')} is already mapped`);
    }
    for (const p of ports) {
      this.devices.set(p, device);
    }
  }

  unmap(port: number): void {
    this.devices.delete(port & 0xff);
  }

  isMapped(port: number): boolean {
    return this.devices.has(port & 0xff);
  }

  in(port: number): number {
    const p = port & 0xff;
    const device = this.devices.get(p);
    return device ? device.in(p) & 0xff : 0xff;
  }

  out(port: number, value: number): void {
    const p = port & 0xff;
    this.devices.get(p)?.out(p, value & 0xff);
  }
}
