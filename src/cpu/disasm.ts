/**
 * Disassembly text for decoded instructions.
 *
 * Entry text carries lowercase placeholders for operand bytes:
 *   n   8-bit immediate or port        -> $XX
 *   nn  16-bit immediate or address    -> $XXXX
 *   +d  signed index displacement      -> +$XX / -$XX
 *   e   relative branch                -> absolute target $XXXX
 */

import type { Instruction } from './instruction';

export function hex8(value: number): string {
  return '$' + (value & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

export function hex16(value: number): string {
  return '$' + (value & 0xffff).toString(16).toUpperCase().padStart(4, '0');
}

export function formatInstruction(instr: Instruction): string {
  const data = instr.data ?? 0;
  const displacement = instr.displacement ?? 0;
  return instr.text
    .replace(/\bnn\b/, hex16(data))
    .replace(/\bn\b/, hex8(data))
    .replace(/\+d\b/, displacement < 0 ? `-${hex8(-displacement)}` : `+${hex8(displacement)}`)
    .replace(/\be\b/, hex16(instr.address + instr.length + displacement));
}

/** Hex dump of the instruction bytes, e.g. "DD 36 05 42". */
export function formatBytes(bytes: readonly number[]): string {
  return bytes.map(b => b.toString(16).toUpperCase().padStart(2, '0')).join(' ');
}
