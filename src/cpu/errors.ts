export type DecodeErrorReason =
  | 'illegal-opcode'
  | 'memory-to-memory'
  | 'indirect-pair-accumulator-only'
  | 'unsupported-addressing-mode';

const MESSAGES: Record<DecodeErrorReason, string> = {
  'illegal-opcode': 'Illegal opcode',
  'memory-to-memory': 'Memory-to-memory move is not encodable',
  'indirect-pair-accumulator-only': 'Indirect via BC/DE is only valid with the accumulator',
  'unsupported-addressing-mode': 'Addressing mode not supported by this architecture',
};

function hex(value: number, digits: number): string {
  return value.toString(16).toUpperCase().padStart(digits, '0');
}

/**
 * Raised while decoding, before anything is written. The CPU keeps it as
 * its fault and refuses to step again until reset.
 */
export class DecodeError extends Error {
  readonly reason: DecodeErrorReason;
  readonly address: number;
  readonly bytes: readonly number[];

  constructor(reason: DecodeErrorReason, address: number, bytes: readonly number[]) {
    const encoded = bytes.map(b => hex(b, 2)).join(' ');
    super(`${MESSAGES[reason]} at $${hex(address, 4)}: ${encoded}`);
    this.name = 'DecodeError';
    this.reason = reason;
    this.address = address;
    this.bytes = bytes;
  }
}
