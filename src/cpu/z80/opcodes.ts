/**
 * Z80 opcode tables
 *
 * Main page plus the CB, ED, DD and FD prefix pages and the DD CB / FD CB
 * indexed bit pages. DD and FD share one builder parameterized by the
 * index register. Only documented encodings are present; SLL, the
 * IXH/IXL forms, IM, RETI/RETN, the I/R loads and block I/O are left out.
 */

import type { IndexRegister, Reg16 } from '@/cpu/types';
import type { Operand, OpcodePage, OpcodeTable, OperationKind } from '@/cpu/instruction';
import type { ShiftKind } from '@/cpu/alu';
import {
  buildPage, reg, pair, ind, idx, imm8, imm16, dir8, dir16, port, portC, rel,
  REGISTER_FIELD, CONDITION_FIELD, type RegisterField,
} from '@/cpu/opcode-table';

function field(r: RegisterField): Operand {
  return r === 'm' ? ind('hl') : reg(r);
}

function fieldName(r: RegisterField): string {
  return r === 'm' ? '(HL)' : r.toUpperCase();
}

const PAIRS: readonly Reg16[] = ['bc', 'de', 'hl', 'sp'];
const STACK_PAIRS: readonly Reg16[] = ['bc', 'de', 'hl', 'af'];

// Mnemonic prefix for each ALU op: "ADD A,", "SUB ", ...
const ALU_OPS: readonly [OperationKind, string][] = [
  ['add', 'ADD A,'],
  ['addWithCarry', 'ADC A,'],
  ['subtract', 'SUB '],
  ['subtractWithBorrow', 'SBC A,'],
  ['and', 'AND '],
  ['xor', 'XOR '],
  ['or', 'OR '],
  ['compare', 'CP '],
];

// CB-page shift field; undefined is SLL (undocumented)
const SHIFT_OPS: readonly (ShiftKind | undefined)[] = [
  'rlc', 'rrc', 'rl', 'rr', 'sla', 'sra', undefined, 'srl',
];

const A = reg('a');
const HL = pair('hl');

// ========== Main page ==========

const main = buildPage(0, (set) => {
  set(0x00, 'NOP', 'nop');

  PAIRS.forEach((rp, i) => {
    const base = i << 4;
    const name = rp.toUpperCase();
    set(0x01 | base, `LD ${name},nn`, 'move', [pair(rp), imm16]);
    set(0x03 | base, `INC ${name}`, 'increment16', [pair(rp)]);
    set(0x09 | base, `ADD HL,${name}`, 'add16', [HL, pair(rp)]);
    set(0x0b | base, `DEC ${name}`, 'decrement16', [pair(rp)]);
  });

  set(0x02, 'LD (BC),A', 'move', [ind('bc'), A]);
  set(0x12, 'LD (DE),A', 'move', [ind('de'), A]);
  set(0x0a, 'LD A,(BC)', 'move', [A, ind('bc')]);
  set(0x1a, 'LD A,(DE)', 'move', [A, ind('de')]);
  set(0x22, 'LD (nn),HL', 'move', [dir16, HL]);
  set(0x2a, 'LD HL,(nn)', 'move', [HL, dir16]);
  set(0x32, 'LD (nn),A', 'move', [dir8, A]);
  set(0x3a, 'LD A,(nn)', 'move', [A, dir8]);

  REGISTER_FIELD.forEach((r, i) => {
    const base = i << 3;
    set(0x04 | base, `INC ${fieldName(r)}`, 'increment', [field(r)]);
    set(0x05 | base, `DEC ${fieldName(r)}`, 'decrement', [field(r)]);
    set(0x06 | base, `LD ${fieldName(r)},n`, 'move', [field(r), imm8]);
  });

  set(0x07, 'RLCA', 'rotateAccumulator', [], { shift: 'rlc' });
  set(0x0f, 'RRCA', 'rotateAccumulator', [], { shift: 'rrc' });
  set(0x17, 'RLA', 'rotateAccumulator', [], { shift: 'rl' });
  set(0x1f, 'RRA', 'rotateAccumulator', [], { shift: 'rr' });
  set(0x27, 'DAA', 'decimalAdjust');
  set(0x2f, 'CPL', 'complement');
  set(0x37, 'SCF', 'setCarry');
  set(0x3f, 'CCF', 'complementCarry');

  set(0x08, "EX AF,AF'", 'exchangeAccumulator');
  set(0xd9, 'EXX', 'exchangeMain');
  set(0xe3, 'EX (SP),HL', 'exchange', [ind('sp', 16), HL]);
  set(0xeb, 'EX DE,HL', 'exchange', [pair('de'), HL]);

  // --- Relative jumps ---
  set(0x10, 'DJNZ e', 'decrementJumpNonZero', [rel]);
  set(0x18, 'JR e', 'jumpRelative', [rel]);
  CONDITION_FIELD.slice(0, 4).forEach((condition, i) => {
    set(0x20 | (i << 3), `JR ${condition.toUpperCase()},e`, 'jumpRelative', [rel], { condition });
  });

  // --- LD r,r' (0x76 would be LD (HL),(HL) and is HALT instead) ---
  REGISTER_FIELD.forEach((dst, d) => {
    REGISTER_FIELD.forEach((src, s) => {
      const op = 0x40 | (d << 3) | s;
      if (op === 0x76) return;
      set(op, `LD ${fieldName(dst)},${fieldName(src)}`, 'move', [field(dst), field(src)]);
    });
  });
  set(0x76, 'HALT', 'halt');

  ALU_OPS.forEach(([kind, text], i) => {
    REGISTER_FIELD.forEach((src, s) => {
      set(0x80 | (i << 3) | s, `${text}${fieldName(src)}`, kind, [A, field(src)]);
    });
    set(0xc6 | (i << 3), `${text}n`, kind, [A, imm8]);
  });

  // --- Jumps, calls, returns ---
  CONDITION_FIELD.forEach((condition, i) => {
    const cc = condition.toUpperCase();
    const base = i << 3;
    set(0xc0 | base, `RET ${cc}`, 'return', [], { condition });
    set(0xc2 | base, `JP ${cc},nn`, 'jump', [imm16], { condition });
    set(0xc4 | base, `CALL ${cc},nn`, 'call', [imm16], { condition });
    set(0xc7 | base, `RST ${base.toString(16).toUpperCase().padStart(2, '0')}H`, 'restart', [], { vector: base });
  });
  set(0xc3, 'JP nn', 'jump', [imm16]);
  set(0xc9, 'RET', 'return');
  set(0xcd, 'CALL nn', 'call', [imm16]);
  set(0xe9, 'JP (HL)', 'jump', [HL]);

  STACK_PAIRS.forEach((rp, i) => {
    set(0xc1 | (i << 4), `POP ${rp.toUpperCase()}`, 'pop', [pair(rp)]);
    set(0xc5 | (i << 4), `PUSH ${rp.toUpperCase()}`, 'push', [pair(rp)]);
  });
  set(0xf9, 'LD SP,HL', 'move', [pair('sp'), HL]);

  set(0xd3, 'OUT (n),A', 'portOut', [port, A]);
  set(0xdb, 'IN A,(n)', 'portIn', [A, port]);
  set(0xf3, 'DI', 'disableInterrupts');
  set(0xfb, 'EI', 'enableInterrupts');
});

// ========== CB page: rotates, shifts, bit operations ==========

const cb = buildPage(1, (set) => {
  REGISTER_FIELD.forEach((r, z) => {
    const target = [field(r)];
    const name = fieldName(r);
    SHIFT_OPS.forEach((shift, y) => {
      if (shift === undefined) return;
      set((y << 3) | z, `${shift.toUpperCase()} ${name}`, 'shift', target, { shift });
    });
    for (let bit = 0; bit < 8; bit++) {
      set(0x40 | (bit << 3) | z, `BIT ${bit},${name}`, 'testBit', target, { bit });
      set(0x80 | (bit << 3) | z, `RES ${bit},${name}`, 'resetBit', target, { bit });
      set(0xc0 | (bit << 3) | z, `SET ${bit},${name}`, 'setBit', target, { bit });
    }
  });
});

// ========== ED page: extended instructions ==========

const ed = buildPage(1, (set) => {
  REGISTER_FIELD.forEach((r, i) => {
    // (HL) slot is the undocumented IN F,(C) / OUT (C),0
    if (r === 'm') return;
    const name = r.toUpperCase();
    set(0x40 | (i << 3), `IN ${name},(C)`, 'portIn', [reg(r), portC]);
    set(0x41 | (i << 3), `OUT (C),${name}`, 'portOut', [portC, reg(r)]);
  });

  PAIRS.forEach((rp, i) => {
    const base = i << 4;
    const name = rp.toUpperCase();
    set(0x42 | base, `SBC HL,${name}`, 'subtractWithBorrow16', [HL, pair(rp)]);
    set(0x4a | base, `ADC HL,${name}`, 'addWithCarry16', [HL, pair(rp)]);
    set(0x43 | base, `LD (nn),${name}`, 'move', [dir16, pair(rp)]);
    set(0x4b | base, `LD ${name},(nn)`, 'move', [pair(rp), dir16]);
  });

  set(0x44, 'NEG', 'negate');
  set(0x67, 'RRD', 'rotateDigitRight');
  set(0x6f, 'RLD', 'rotateDigitLeft');

  set(0xa0, 'LDI', 'loadIncrement');
  set(0xa1, 'CPI', 'compareIncrement');
  set(0xa8, 'LDD', 'loadDecrement');
  set(0xa9, 'CPD', 'compareDecrement');
  set(0xb0, 'LDIR', 'loadIncrementRepeat');
  set(0xb1, 'CPIR', 'compareIncrementRepeat');
  set(0xb8, 'LDDR', 'loadDecrementRepeat');
  set(0xb9, 'CPDR', 'compareDecrementRepeat');
});

// ========== DD / FD pages: IX and IY ==========

function indexPage(index: IndexRegister): OpcodePage {
  const X = pair(index);
  const name = index.toUpperCase();
  const mem = idx(index);
  const memName = `(${name}+d)`;

  return buildPage(1, (set) => {
    (['bc', 'de', index, 'sp'] as const).forEach((rp, i) => {
      set(0x09 | (i << 4), `ADD ${name},${rp.toUpperCase()}`, 'add16', [X, pair(rp)]);
    });

    set(0x21, `LD ${name},nn`, 'move', [X, imm16]);
    set(0x22, `LD (nn),${name}`, 'move', [dir16, X]);
    set(0x2a, `LD ${name},(nn)`, 'move', [X, dir16]);
    set(0x23, `INC ${name}`, 'increment16', [X]);
    set(0x2b, `DEC ${name}`, 'decrement16', [X]);

    set(0x34, `INC ${memName}`, 'increment', [mem]);
    set(0x35, `DEC ${memName}`, 'decrement', [mem]);
    set(0x36, `LD ${memName},n`, 'move', [mem, imm8]);

    REGISTER_FIELD.forEach((r, i) => {
      if (r === 'm') return;
      const rName = r.toUpperCase();
      set(0x46 | (i << 3), `LD ${rName},${memName}`, 'move', [reg(r), mem]);
      set(0x70 | i, `LD ${memName},${rName}`, 'move', [mem, reg(r)]);
    });

    ALU_OPS.forEach(([kind, text], i) => {
      set(0x86 | (i << 3), `${text}${memName}`, kind, [A, mem]);
    });

    set(0xe1, `POP ${name}`, 'pop', [X]);
    set(0xe5, `PUSH ${name}`, 'push', [X]);
    set(0xe3, `EX (SP),${name}`, 'exchange', [ind('sp', 16), X]);
    set(0xe9, `JP (${name})`, 'jump', [X]);
    set(0xf9, `LD SP,${name}`, 'move', [pair('sp'), X]);
  });
}

// DD CB d op: displacement precedes the final opcode byte
function indexBitPage(index: IndexRegister): OpcodePage {
  const target = [idx(index)];
  const memName = `(${index.toUpperCase()}+d)`;

  return buildPage(2, (set) => {
    SHIFT_OPS.forEach((shift, y) => {
      if (shift === undefined) return;
      set((y << 3) | 6, `${shift.toUpperCase()} ${memName}`, 'shift', target, { shift });
    });
    for (let bit = 0; bit < 8; bit++) {
      set(0x46 | (bit << 3), `BIT ${bit},${memName}`, 'testBit', target, { bit });
      set(0x86 | (bit << 3), `RES ${bit},${memName}`, 'resetBit', target, { bit });
      set(0xc6 | (bit << 3), `SET ${bit},${memName}`, 'setBit', target, { bit });
    }
  });
}

export const Z80_OPCODES: OpcodeTable = {
  main,
  prefixed: new Map<number, OpcodePage>([
    [0xcb, cb],
    [0xdd, indexPage('ix')],
    [0xed, ed],
    [0xfd, indexPage('iy')],
  ]),
  indexedBit: new Map<number, OpcodePage>([
    [0xdd, indexBitPage('ix')],
    [0xfd, indexBitPage('iy')],
  ]),
};
