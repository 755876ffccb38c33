/**
 * Precomputed Lookup Tables
 *
 * Parity, Sign+Zero tables for fast flag computation. The tables are
 * built per flag layout since the two architectures name their bits
 * independently.
 */

import type { FlagLayout } from './types';

/** 1 if the byte has an even number of 1-bits. */
export const EVEN_PARITY: Uint8Array = (() => {
  const table = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    let bits = i;
    let parity = 0;
    while (bits) {
      parity ^= bits & 1;
      bits >>= 1;
    }
    table[i] = parity === 0 ? 1 : 0;
  }
  return table;
})();

/** Build Sign+Zero table: sign if bit 7 set, zero if value is 0. */
export function buildSZTable(layout: FlagLayout): Uint8Array {
  const table = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    table[i] = (i === 0 ? layout.zero : 0) | (i & 0x80 ? layout.sign : 0);
  }
  return table;
}

/** Sign+Zero+Parity table for logical results. */
export function buildSZPTable(layout: FlagLayout): Uint8Array {
  const sz = buildSZTable(layout);
  const table = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    table[i] = sz[i] | (EVEN_PARITY[i] ? layout.parity : 0);
  }
  return table;
}
